import { z } from 'zod';

/** The subset of a package.json the CLI reads at startup. */
export const PackageJsonSchema = z.object({
  name: z.string(),
  version: z.string().min(1),
});
export type PackageJson = z.infer<typeof PackageJsonSchema>;
