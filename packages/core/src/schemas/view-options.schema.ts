import { z } from 'zod';

export const OutputFormatSchema = z.enum(['table', 'csv', 'tsv']);
export type OutputFormat = z.infer<typeof OutputFormatSchema>;

export const SortPolicySchema = z.enum(['by-type', 'as-is']);
export type SortPolicy = z.infer<typeof SortPolicySchema>;
