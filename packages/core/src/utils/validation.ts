import type { z } from 'zod';
import { accessSync, statSync, constants as fsConstants } from 'fs';
import { ErrorCode, FileReadError, PkgviewError } from '../errors.js';

export function validatePath(path: string): void {
  if (!path) {
    throw new PkgviewError(
      'Path argument is required',
      ErrorCode.INPUT_INVALID,
      'A valid path must be provided'
    );
  }

  try {
    accessSync(path, fsConstants.R_OK);
  } catch (error) {
    const denied = FileReadError.fromFsError(error, path).code === ErrorCode.IO_PERMISSION_DENIED;
    throw new FileReadError(
      `File is not accessible: ${path}`,
      denied ? ErrorCode.IO_PERMISSION_DENIED : ErrorCode.IO_FILE_NOT_FOUND,
      path,
      denied ? `Permission denied: ${path}` : `Cannot access file: ${path}`
    );
  }

  if (!statSync(path).isFile()) {
    throw new FileReadError(
      `Path is not a file: ${path}`,
      ErrorCode.IO_FILE_NOT_FOUND,
      path,
      `Expected a file but found a directory: ${path}`
    );
  }
}

export function validate<T>(schema: z.ZodType<T>, data: unknown, fieldName?: string): T {
  const result = schema.safeParse(data);
  if (result.success) {
    return result.data;
  }

  const issues = result.error.issues
    .map((issue, idx) => {
      const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `  ${String(idx + 1)}. [${path}] ${issue.message}`;
    })
    .join('\n');

  throw new PkgviewError(
    `Validation failed${fieldName ? ` for ${fieldName}` : ''}:\n${issues}`,
    ErrorCode.INPUT_INVALID,
    `Invalid ${fieldName ?? 'input'}:\n${issues}`,
    { field: fieldName }
  );
}
