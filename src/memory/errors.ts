export type MemoryErrorCode =
  | "invalid_request"
  | "not_found"
  | "storage_unavailable"
  | "encoding_failed";

export class MemoryError extends Error {
  readonly code: MemoryErrorCode;

  constructor(code: MemoryErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class InvalidRequestError extends MemoryError {
  constructor(message: string) {
    super("invalid_request", message);
  }
}

export class NotFoundError extends MemoryError {
  constructor(message: string) {
    super("not_found", message);
  }
}

/** Vector store connection or query failure. */
export class StorageUnavailableError extends MemoryError {
  constructor(message: string, cause?: unknown) {
    super("storage_unavailable", message, { cause });
  }
}

/** Embedding provider failure (model load, upstream HTTP error, empty vector). */
export class EncodingFailedError extends MemoryError {
  constructor(message: string, cause?: unknown) {
    super("encoding_failed", message, { cause });
  }
}

export function errorMessage(error: unknown, fallback: string): string {
  return error instanceof Error ? error.message : fallback;
}
