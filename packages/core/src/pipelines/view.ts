import type { ProgressReporter } from './progress.js';
import { SilentProgress } from './progress.js';
import { parseManifest } from '../manifest/parser.js';
import { sortComponents } from '../manifest/sorter.js';
import { renderComponents } from '../render/renderer.js';
import { readManifestFile } from '../utils/manifest-file.js';
import type { OutputFormat, SortPolicy } from '../schemas/view-options.schema.js';

export interface ViewOptions {
  format: OutputFormat;
  sort: SortPolicy;
  splitParent?: boolean;
}

export interface ViewResult {
  output: string;
  componentCount: number;
  version?: string;
  warnings: string[];
}

/** Parse, sort and render manifest text. Throws before rendering if the manifest is invalid. */
export function viewManifest(xml: string, options: ViewOptions): ViewResult {
  const manifest = parseManifest(xml);
  const ordered = sortComponents(manifest.components, options.sort);
  const output = renderComponents(ordered, options.format, { splitParent: options.splitParent });
  return {
    output,
    componentCount: ordered.length,
    version: manifest.version,
    warnings: manifest.warnings,
  };
}

export interface RunViewOptions extends ViewOptions {
  path: string;
}

export function runView(options: RunViewOptions, progress?: ProgressReporter): ViewResult {
  const p = progress ?? new SilentProgress();

  p.start(`Reading ${options.path}`);
  const xml = readManifestFile(options.path);

  const result = viewManifest(xml, options);
  for (const warning of result.warnings) {
    p.warn(warning);
  }
  const version = result.version ? ` (API version ${result.version})` : '';
  p.succeed(`Parsed ${String(result.componentCount)} components${version}`);
  p.info(`Rendered as ${options.format}, sorted ${options.sort}`);

  return result;
}
