export enum ErrorCode {
  CONFIG_INVALID = 'CONFIG_INVALID',
  INPUT_INVALID = 'INPUT_INVALID',
  IO_FILE_NOT_FOUND = 'IO_FILE_NOT_FOUND',
  IO_PERMISSION_DENIED = 'IO_PERMISSION_DENIED',
  IO_READ_FAILED = 'IO_READ_FAILED',
  MANIFEST_MALFORMED_XML = 'MANIFEST_MALFORMED_XML',
  MANIFEST_MISSING_TYPE_NAME = 'MANIFEST_MISSING_TYPE_NAME',
  MANIFEST_DUPLICATE_TYPE_NAME = 'MANIFEST_DUPLICATE_TYPE_NAME',
  OUTPUT_WRITE_FAILED = 'OUTPUT_WRITE_FAILED',
  INTERNAL_UNKNOWN = 'INTERNAL_UNKNOWN',
}
type ErrorContext = Record<string, string | number | boolean | null | undefined>;
export class PkgviewError extends Error {
  public readonly code: ErrorCode;
  public readonly userMessage: string;
  public readonly context: ErrorContext;
  constructor(message: string, code: ErrorCode, userMessage?: string, context: ErrorContext = {}) {
    super(message);
    this.name = 'PkgviewError';
    this.code = code;
    this.userMessage = userMessage ?? message;
    this.context = context;
    Error.captureStackTrace(this, PkgviewError);
  }
  static fromError(
    error: unknown,
    code = ErrorCode.INTERNAL_UNKNOWN,
    userMessage?: string
  ): PkgviewError {
    if (error instanceof PkgviewError) return error;
    const message = error instanceof Error ? error.message : String(error);
    const context = error instanceof Error ? { originalError: error.name } : {};
    return new PkgviewError(message, code, userMessage, context);
  }
}
export class ConfigurationError extends PkgviewError {
  constructor(message: string, configKey?: string) {
    super(message, ErrorCode.CONFIG_INVALID, `Configuration issue: ${message}`, { configKey });
    this.name = 'ConfigurationError';
  }
}

export type ManifestParseErrorKind = 'malformed-xml' | 'missing-type-name' | 'duplicate-type-name';

const PARSE_ERROR_CODES: Record<ManifestParseErrorKind, ErrorCode> = {
  'malformed-xml': ErrorCode.MANIFEST_MALFORMED_XML,
  'missing-type-name': ErrorCode.MANIFEST_MISSING_TYPE_NAME,
  'duplicate-type-name': ErrorCode.MANIFEST_DUPLICATE_TYPE_NAME,
};

export class ManifestParseError extends PkgviewError {
  public readonly kind: ManifestParseErrorKind;
  public readonly blockIndex?: number;
  public readonly line?: number;
  public readonly column?: number;
  private constructor(
    kind: ManifestParseErrorKind,
    message: string,
    userMessage: string,
    location: { blockIndex?: number; line?: number; column?: number } = {}
  ) {
    super(message, PARSE_ERROR_CODES[kind], userMessage, { ...location });
    this.name = 'ManifestParseError';
    this.kind = kind;
    this.blockIndex = location.blockIndex;
    this.line = location.line;
    this.column = location.column;
  }
  static malformedXml(reason: string, line?: number, column?: number): ManifestParseError {
    const where = line !== undefined ? ` (line ${String(line)}, column ${String(column ?? 0)})` : '';
    return new ManifestParseError(
      'malformed-xml',
      `Malformed XML${where}: ${reason}`,
      `The manifest is not well-formed XML${where}: ${reason}`,
      { line, column }
    );
  }
  static missingTypeName(blockIndex: number): ManifestParseError {
    return new ManifestParseError(
      'missing-type-name',
      `<types> block at index ${String(blockIndex)} has no <name>`,
      `The <types> block at index ${String(blockIndex)} does not declare a <name>`,
      { blockIndex }
    );
  }
  static duplicateTypeName(blockIndex: number): ManifestParseError {
    return new ManifestParseError(
      'duplicate-type-name',
      `<types> block at index ${String(blockIndex)} has more than one <name>`,
      `The <types> block at index ${String(blockIndex)} declares <name> more than once`,
      { blockIndex }
    );
  }
}

type FileReadCode =
  | ErrorCode.IO_FILE_NOT_FOUND
  | ErrorCode.IO_PERMISSION_DENIED
  | ErrorCode.IO_READ_FAILED;

export class FileReadError extends PkgviewError {
  public readonly path: string;
  constructor(message: string, code: FileReadCode, path: string, userMessage?: string) {
    super(message, code, userMessage, { path });
    this.name = 'FileReadError';
    this.path = path;
  }
  static fromFsError(error: unknown, path: string): FileReadError {
    if (error instanceof FileReadError) return error;
    const message = error instanceof Error ? error.message : String(error);
    const errno = error instanceof Error && 'code' in error ? error.code : undefined;
    switch (errno) {
      case 'ENOENT':
      case 'EISDIR':
        return new FileReadError(message, ErrorCode.IO_FILE_NOT_FOUND, path, `Cannot read file: ${path}`);
      case 'EACCES':
      case 'EPERM':
        return new FileReadError(
          message,
          ErrorCode.IO_PERMISSION_DENIED,
          path,
          `Permission denied reading: ${path}`
        );
      default:
        return new FileReadError(message, ErrorCode.IO_READ_FAILED, path, `Failed to read ${path}: ${message}`);
    }
  }
}

export class RenderError extends PkgviewError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, ErrorCode.OUTPUT_WRITE_FAILED, `Error writing output: ${message}`, context);
    this.name = 'RenderError';
  }
  static ioFailure(error: unknown): RenderError {
    if (error instanceof RenderError) return error;
    if (error instanceof Error) {
      return new RenderError(error.message, { originalError: error.name });
    }
    return new RenderError(String(error));
  }
}
