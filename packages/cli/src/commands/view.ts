import { Command } from 'commander';
import { getConfig, runView, validate } from '@pkgview/core';
import { ErrorHandler } from '../utils/error-handler.js';
import { ViewOptionsSchema } from '../utils/command-schemas.js';
import { createProgress } from '../utils/cli-helpers.js';
import { writeOutput } from '../utils/output-writer.js';

export function createViewCommand(): Command {
  return new Command('pkgview')
    .description('Salesforce package.xml viewer - displays metadata components in readable formats')
    .argument('<path>', 'Path to the package.xml file')
    .option('-f, --format <format>', 'Output format (table, csv, tsv)', 'table')
    .option('-s, --sort <order>', 'Sort order (by-type, as-is)', 'by-type')
    .option('--split-parent', 'Split Parent.Member names into a separate Parent column')
    .option('--verbose', 'Report parsing progress and manifest warnings on stderr')
    .action(async (path: string, options: unknown) => {
      try {
        const config = getConfig();
        const validated = validate(ViewOptionsSchema, options, 'command options');
        const progress = createProgress(!(validated.verbose || config.debug.verbose));
        const result = runView(
          {
            path,
            format: validated.format,
            sort: validated.sort,
            splitParent: validated.splitParent,
          },
          progress
        );
        await writeOutput(result.output);
      } catch (error) {
        ErrorHandler.handleCliError(error);
      }
    });
}
