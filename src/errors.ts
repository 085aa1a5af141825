export type ErrorCode =
  | 'CONFIG_ERROR'
  | 'UNSUPPORTED_FILE_TYPE'
  | 'EXTRACTION_FAILED'
  | 'EMPTY_EXTRACTION'
  | 'INVALID_CATEGORY'
  | 'PERSISTENCE_FAILED'
  | 'UNEXPECTED';

export const ERROR_HINTS: Record<ErrorCode, string> = {
  CONFIG_ERROR: 'Check the configuration file path and its contents',
  UNSUPPORTED_FILE_TYPE: 'Only .pdf and .docx files can be extracted',
  EXTRACTION_FAILED: 'The document could not be parsed - it may be corrupt or password protected',
  EMPTY_EXTRACTION: 'The document has no text layer (a scanned PDF, for example)',
  INVALID_CATEGORY: 'Categories are external, internal and client',
  PERSISTENCE_FAILED: 'Check permissions and free space at the storage location',
  UNEXPECTED: 'See the log for details',
};

export class PipelineError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly hint: string = ERROR_HINTS[code],
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'PipelineError';
  }
}

export class ConfigurationError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CONFIG_ERROR', message, ERROR_HINTS.CONFIG_ERROR, options);
    this.name = 'ConfigurationError';
  }
}

export class UnsupportedFileTypeError extends PipelineError {
  constructor(public readonly extension: string) {
    super('UNSUPPORTED_FILE_TYPE', `Unsupported file type: ${extension || '(none)'}`);
    this.name = 'UnsupportedFileTypeError';
  }
}

export class ExtractionError extends PipelineError {
  constructor(public readonly filePath: string, options?: { cause?: unknown }) {
    super('EXTRACTION_FAILED', `Failed to extract text from ${filePath}${describeCause(options?.cause)}`, ERROR_HINTS.EXTRACTION_FAILED, options);
    this.name = 'ExtractionError';
  }
}

export class EmptyExtractionError extends PipelineError {
  constructor(public readonly filePath: string) {
    super('EMPTY_EXTRACTION', `No text extracted from ${filePath}`);
    this.name = 'EmptyExtractionError';
  }
}

export class InvalidCategoryError extends PipelineError {
  constructor(public readonly category: string) {
    super('INVALID_CATEGORY', `Invalid category: ${category}`);
    this.name = 'InvalidCategoryError';
  }
}

export class PersistenceError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('PERSISTENCE_FAILED', message, ERROR_HINTS.PERSISTENCE_FAILED, options);
    this.name = 'PersistenceError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function describeCause(cause: unknown): string {
  return cause === undefined ? '' : `: ${errorMessage(cause)}`;
}

export function wrapError(error: unknown, code: ErrorCode = 'UNEXPECTED'): PipelineError {
  if (error instanceof PipelineError) {
    return error;
  }
  return new PipelineError(code, errorMessage(error), ERROR_HINTS[code], { cause: error });
}

/**
 * Startup failures (configuration, tracker state) exit with 1 and a run
 * aborted after startup with 2. A run that completes exits with 0 no
 * matter how many files errored.
 */
export function getExitCode(error: unknown): number {
  if (error instanceof PipelineError) {
    return error.code === 'CONFIG_ERROR' || error.code === 'PERSISTENCE_FAILED' ? 1 : 2;
  }
  return 1;
}

export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
