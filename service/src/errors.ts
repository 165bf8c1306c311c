/**
 * Error kinds raised across the validation service.
 *
 * Request-level failures (bad uploads, unreadable documents, missing rules) abort
 * the request with the status code carried by the error. Failures of the reasoning
 * stage are converted into an ERROR-shaped validation result instead of being thrown.
 */

export class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;

  constructor(
    message: string,
    code: string,
    statusCode: number = 500,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;

    Error.captureStackTrace(this, this.constructor);
  }
}

/** Rules or document fetch/write failure. */
export class StorageError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "STORAGE_ERROR", 500, options);
  }
}

/** Unreadable or empty text from a claim document. */
export class ExtractionError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "EXTRACTION_FAILED", 400, options);
  }
}

/** Remote reasoning call failure: network, auth, quota, malformed envelope. */
export class TransportError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "TRANSPORT_ERROR", 502, options);
  }
}

/** Model reply could not be decoded as structured data. */
export class ParseError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "PARSE_ERROR", 502, options);
  }
}

/** Rejected upload: wrong file type, too many files, zero files, oversized file. */
export class ValidationInputError extends AppError {
  constructor(message: string) {
    super(message, "INVALID_INPUT", 400);
  }
}

/**
 * Extracts a printable message from anything thrown.
 */
export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
