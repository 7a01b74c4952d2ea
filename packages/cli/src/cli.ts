#!/usr/bin/env node
import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';
import { Logger } from './utils/cli-helpers.js';
import { createViewCommand } from './commands/view.js';
import { PackageJsonSchema, validate } from '@pkgview/core';

function setupSignalHandlers(): void {
  process.on('SIGINT', () => {
    process.exit(130);
  });
  process.on('uncaughtException', (error) => {
    Logger.fail('Uncaught Exception:');
    console.error(error);
    process.exit(1);
  });
  process.on('unhandledRejection', (reason) => {
    Logger.fail('Unhandled Promise Rejection:');
    console.error('Reason:', reason);
    process.exit(1);
  });
}

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Read the CLI package's own version
const packageJson = validate(
  PackageJsonSchema,
  JSON.parse(readFileSync(join(__dirname, '../package.json'), 'utf-8')),
  'PackageJson'
);

setupSignalHandlers();

const program = createViewCommand().version(packageJson.version);

await program.parseAsync(process.argv);
