import { z } from 'zod';
import { OutputFormatSchema, SortPolicySchema } from '@pkgview/core';

export const ViewOptionsSchema = z.object({
  format: OutputFormatSchema.default('table'),
  sort: SortPolicySchema.default('by-type'),
  splitParent: z.boolean().optional().default(false),
  verbose: z.boolean().optional().default(false),
});
