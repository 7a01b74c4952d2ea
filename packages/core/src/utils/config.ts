import { z } from 'zod';
import { ConfigurationError } from '../errors.js';

const ConfigSchema = z.object({
  debug: z.object({
    enabled: z.boolean().default(false),
    verbose: z.boolean().default(false),
  }),
});
type Config = z.infer<typeof ConfigSchema>;

// Only diagnostics are configurable; rendered output never depends on the environment.
const ENV_MAP: Record<string, string> = {
  DEBUG_MODE: 'debug.enabled',
  VERBOSE: 'debug.verbose',
};

type Coercer = (raw: string) => unknown;

const toBoolean: Coercer = (raw) => {
  const normalized = raw.trim().toLowerCase();
  if (normalized === 'true' || normalized === '1') return true;
  if (normalized === 'false' || normalized === '0' || normalized === '') return false;
  return raw;
};
const identity: Coercer = (raw) => raw;

const COERCE_MAP: Record<string, Coercer> = {
  'debug.enabled': toBoolean,
  'debug.verbose': toBoolean,
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function setNestedValue(obj: Record<string, unknown>, dotPath: string, value: unknown): void {
  const segments = dotPath.split('.');
  let current: Record<string, unknown> = obj;
  for (let i = 0; i < segments.length - 1; i++) {
    const seg = segments[i];
    if (!seg) continue;
    const next = current[seg];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[seg] = created;
      current = created;
    }
  }
  const lastKey = segments.at(-1);
  if (lastKey) {
    current[lastKey] = value;
  }
}

export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  const config: Record<string, unknown> = { debug: {} };
  for (const [envVar, dotPath] of Object.entries(ENV_MAP)) {
    const raw = env[envVar];
    if (raw === undefined) continue;
    const coerce = COERCE_MAP[dotPath] ?? identity;
    setNestedValue(config, dotPath, coerce(raw));
  }
  return config;
}

export function createConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const result = ConfigSchema.safeParse(loadConfigFromEnv(env));
  if (!result.success) {
    const summary = result.error.issues
      .map((issue, idx) => `${String(idx + 1)}. ${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Config validation failed: ${summary}`, 'environment');
  }
  return result.data;
}

/** Reads the environment on every call, so an invalid value surfaces where the caller handles errors. */
export function getConfig(): Config {
  return createConfig(process.env);
}

export type { Config };
