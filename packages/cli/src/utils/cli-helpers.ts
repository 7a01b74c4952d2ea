import chalk from 'chalk';
import { SilentProgress } from '@pkgview/core';
import type { ProgressReporter } from '@pkgview/core';

// stdout carries rendered output only, so every diagnostic goes to stderr.
class ConsoleProgress implements ProgressReporter {
  start(message: string): void {
    console.error(chalk.cyan(`🔄 ${message}...`));
  }
  succeed(message: string): void {
    console.error(chalk.green(`✓ ${message}`));
  }
  warn(message: string): void {
    console.error(chalk.yellow(`⚠️  ${message}`));
  }
  info(message: string): void {
    console.error(chalk.blue(`ℹ️  ${message}`));
  }
}
export const Logger = {
  fail(message: string): void {
    console.error(chalk.red(`❌ ${message}`));
  },
  warn(message: string): void {
    console.error(chalk.yellow(`⚠️  ${message}`));
  },
  info(message: string): void {
    console.error(chalk.blue(`ℹ️  ${message}`));
  },
  success(message: string): void {
    console.error(chalk.green(`✓ ${message}`));
  },
} as const;
export function createProgress(silent = false): ProgressReporter {
  return silent ? new SilentProgress() : new ConsoleProgress();
}
