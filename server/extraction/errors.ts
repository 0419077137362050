/**
 * Error taxonomy for extraction requests.
 *
 * - ValidationError: the caller sent something malformed (page range, options).
 *   Raised before any document data is processed.
 * - DocumentDecodeError: the document itself cannot be opened. The whole
 *   request fails and no partial model is returned.
 * - UnsupportedOperationError: no handler is registered for the operation.
 *
 * Per-item failures (one image, one page's tables) are not errors at this
 * level: they are logged as warnings and the item is skipped.
 */

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

export class DocumentDecodeError extends Error {
  constructor(message = "Invalid or corrupted PDF file", options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DocumentDecodeError";
  }
}

export class UnsupportedOperationError extends Error {
  readonly operation: string;

  constructor(operation: string) {
    super(`Operation '${operation}' is not supported`);
    this.name = "UnsupportedOperationError";
    this.operation = operation;
  }
}

export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof Error && error.name === "ValidationError";
}

export function isDocumentDecodeError(error: unknown): error is DocumentDecodeError {
  return error instanceof Error && error.name === "DocumentDecodeError";
}

export function isUnsupportedOperationError(error: unknown): error is UnsupportedOperationError {
  return error instanceof UnsupportedOperationError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : "Unknown error";
}
