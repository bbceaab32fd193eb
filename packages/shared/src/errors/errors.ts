/**
 * Base error class for STIG extraction
 */
export class StigExtractError extends Error {
  readonly code: string;
  readonly context?: Record<string, unknown>;

  constructor(message: string, code: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'StigExtractError';
    this.code = code;
    if (context !== undefined) {
      this.context = context;
    }

    // Maintains proper stack trace for where error was thrown

    Error.captureStackTrace?.(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
    };
  }
}

/**
 * Error raised when the document path does not resolve to a file
 */
export class DocumentNotFoundError extends StigExtractError {
  readonly path: string;

  constructor(path: string) {
    super(`XML file not found at ${path}`, 'DOCUMENT_NOT_FOUND', { path });
    this.name = 'DocumentNotFoundError';
    this.path = path;
  }
}

/**
 * Error raised when the document is not well-formed XML
 */
export class MalformedDocumentError extends StigExtractError {
  readonly line?: number;
  readonly column?: number;

  constructor(message: string, position?: { line: number; column: number }, context?: Record<string, unknown>) {
    super(message, 'MALFORMED_DOCUMENT', position ? { ...context, ...position } : context);
    this.name = 'MalformedDocumentError';
    if (position !== undefined) {
      this.line = position.line;
      this.column = position.column;
    }
  }
}

/**
 * Error raised for any other fault while reading or walking a document
 */
export class ExtractionFailedError extends StigExtractError {
  override readonly cause: unknown;

  constructor(message: string, cause: unknown, context?: Record<string, unknown>) {
    super(message, 'EXTRACTION_FAILED', context);
    this.name = 'ExtractionFailedError';
    this.cause = cause;
  }
}

/**
 * Error thrown for configuration issues
 */
export class ConfigurationError extends StigExtractError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', context);
    this.name = 'ConfigurationError';
  }
}

/**
 * Message of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
