import {
  PkgviewError,
  ManifestParseError,
  ConfigurationError,
  ErrorCode,
  getConfig,
} from '@pkgview/core';
import { Logger } from './cli-helpers.js';

function provideSuggestions(error: PkgviewError): void {
  const suggestions: Partial<Record<ErrorCode, string[]>> = {
    [ErrorCode.CONFIG_INVALID]: ['DEBUG_MODE and VERBOSE accept true, false, 1 or 0'],
    [ErrorCode.INPUT_INVALID]: [
      'Formats: table, csv, tsv',
      'Sort orders: by-type, as-is',
      'Run with --help to list every option',
    ],
    [ErrorCode.IO_FILE_NOT_FOUND]: [
      'Double-check the file path',
      'Make sure you are in the right directory',
    ],
    [ErrorCode.IO_PERMISSION_DENIED]: ['Confirm file permissions allow reading'],
    [ErrorCode.MANIFEST_MALFORMED_XML]: [
      'Check the reported line for an unclosed or mismatched tag',
      'Make sure the file is saved as UTF-8',
    ],
    [ErrorCode.MANIFEST_MISSING_TYPE_NAME]: [
      'Every <types> block needs a <name> element, e.g. <name>ApexClass</name>',
    ],
    [ErrorCode.MANIFEST_DUPLICATE_TYPE_NAME]: [
      'Split the block into one <types> element per metadata type',
    ],
  };
  const errorSuggestions = suggestions[error.code];
  if (errorSuggestions && errorSuggestions.length > 0) {
    console.error('\n💡 Hints:');
    errorSuggestions.forEach((suggestion) => {
      Logger.info(`• ${suggestion}`);
    });
  }
}

// An invalid environment cannot also decide whether to print its own stack.
function showStack(error: unknown): boolean {
  return !(error instanceof ConfigurationError) && getConfig().debug.enabled;
}

export const ErrorHandler = {
  formatError(error: unknown): void {
    if (error instanceof PkgviewError) {
      Logger.fail(error.userMessage);
      const details = Object.entries(error.context).filter(
        ([, value]) => value !== undefined && value !== null
      );
      if (details.length > 0) {
        console.error('   Extra details:');
        for (const [key, value] of details) {
          console.error(`   ${key}: ${String(value)}`);
        }
      }
      console.error(`   Code: ${error.code}`);
      provideSuggestions(error);
    } else if (error instanceof Error) {
      Logger.fail(error.message);
    } else {
      Logger.fail(`Something went wrong unexpectedly: ${String(error)}`);
    }
    if (error instanceof Error && error.stack && showStack(error)) {
      console.error(error.stack);
    }
  },
  getExitCode(error: unknown): number {
    if (error instanceof ManifestParseError) {
      return 4;
    }
    if (error instanceof PkgviewError) {
      switch (error.code) {
        case ErrorCode.CONFIG_INVALID:
        case ErrorCode.INPUT_INVALID:
          return 2;
        case ErrorCode.IO_FILE_NOT_FOUND:
        case ErrorCode.IO_PERMISSION_DENIED:
        case ErrorCode.IO_READ_FAILED:
          return 3;
        case ErrorCode.OUTPUT_WRITE_FAILED:
          return 5;
        default:
          return 1;
      }
    }
    return 1;
  },
  handleCliError(error: unknown): never {
    ErrorHandler.formatError(error);
    const exitCode = ErrorHandler.getExitCode(error);
    process.exit(exitCode);
  },
} as const;
