// src/services/upload/upload.errors.ts

export type UploadErrorCode =
  | "UPLOAD_NOT_FOUND"
  | "INVALID_CREATE_UPLOAD_REQUEST"
  | "FILE_TOO_LARGE"
  | "TOO_MANY_CHUNKS"
  | "INVALID_CHUNK_INDEX"
  | "CHUNK_SIZE_MISMATCH"
  | "HASH_MISMATCH"
  | "UPLOAD_TERMINAL"
  | "UPLOAD_INCOMPLETE"
  | "UPLOAD_FINALIZATION_IN_PROGRESS"
  | "MERGE_FAILED"
  | "STORAGE_UNAVAILABLE"
  | "CAS_CONFLICT"
  | "CHUNK_NOT_FOUND"
  | "CHUNK_CORRUPT"
  | "CORRUPT_UPLOAD_SESSION";

export interface UploadErrorOptions {
  statusCode: number;
  retryable: boolean;
  details?: Record<string, unknown>;
  cause?: unknown;
}

export class UploadError extends Error {
  readonly code: UploadErrorCode;
  readonly statusCode: number;
  readonly retryable: boolean;
  readonly details?: Record<string, unknown>;

  constructor(code: UploadErrorCode, message: string, options: UploadErrorOptions) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.code = code;
    this.statusCode = options.statusCode;
    this.retryable = options.retryable;
    this.details = options.details;
  }
}

export class SessionNotFoundError extends UploadError {
  constructor(readonly uploadId: string) {
    super("UPLOAD_NOT_FOUND", `Upload session ${uploadId} not found`, {
      statusCode: 404,
      retryable: false,
    });
  }
}

export class InvalidUploadRequestError extends UploadError {
  constructor(message: string) {
    super("INVALID_CREATE_UPLOAD_REQUEST", message, {
      statusCode: 400,
      retryable: false,
    });
  }
}

export class UploadLimitError extends UploadError {
  constructor(code: "FILE_TOO_LARGE" | "TOO_MANY_CHUNKS", message: string) {
    super(code, message, { statusCode: 413, retryable: false });
  }
}

export class InvalidChunkIndexError extends UploadError {
  constructor(readonly index: number, readonly totalChunks: number) {
    super(
      "INVALID_CHUNK_INDEX",
      `Chunk index ${index} is outside [0, ${totalChunks})`,
      { statusCode: 400, retryable: false, details: { index, totalChunks } }
    );
  }
}

export class InvalidChunkError extends UploadError {
  constructor(
    code: "CHUNK_SIZE_MISMATCH" | "HASH_MISMATCH",
    message: string,
    details?: Record<string, unknown>
  ) {
    super(code, message, { statusCode: 400, retryable: false, details });
  }
}

export class SessionTerminalError extends UploadError {
  constructor(readonly uploadId: string, readonly status: string) {
    super("UPLOAD_TERMINAL", `Upload session ${uploadId} no longer accepts this operation (status=${status})`, {
      statusCode: 409,
      retryable: false,
      details: { status },
    });
  }
}

export class IncompleteUploadError extends UploadError {
  constructor(readonly uploadId: string, readonly missingIndices: number[]) {
    super(
      "UPLOAD_INCOMPLETE",
      `Upload session ${uploadId} is missing ${missingIndices.length} chunk(s)`,
      { statusCode: 409, retryable: true, details: { missingIndices } }
    );
  }
}

export class MergeInProgressError extends UploadError {
  constructor(readonly uploadId: string) {
    super("UPLOAD_FINALIZATION_IN_PROGRESS", "Upload is currently finalizing", {
      statusCode: 409,
      retryable: true,
    });
  }
}

export class MergeError extends UploadError {
  constructor(readonly uploadId: string, retryable: boolean, cause: unknown) {
    super(
      "MERGE_FAILED",
      `Merging upload ${uploadId} failed: ${cause instanceof Error ? cause.message : String(cause)}`,
      { statusCode: 502, retryable, cause }
    );
  }
}

export class StorageUnavailableError extends UploadError {
  constructor(message: string, cause?: unknown) {
    super("STORAGE_UNAVAILABLE", message, {
      statusCode: 503,
      retryable: true,
      cause,
    });
  }
}

/** Lost compare-and-swap race. The engine retries these. */
export class ConflictError extends UploadError {
  constructor(readonly uploadId: string, reason: string) {
    super("CAS_CONFLICT", `Concurrent update on ${uploadId}: ${reason}`, {
      statusCode: 409,
      retryable: true,
    });
  }
}

export class ChunkNotFoundError extends UploadError {
  constructor(readonly uploadId: string, readonly index: number) {
    super("CHUNK_NOT_FOUND", `Chunk ${index} of ${uploadId} is missing from the chunk store`, {
      statusCode: 500,
      retryable: false,
    });
  }
}

export class ChunkCorruptError extends UploadError {
  constructor(
    readonly uploadId: string,
    readonly index: number,
    expectedBytes: number,
    actualBytes: number
  ) {
    super(
      "CHUNK_CORRUPT",
      `Chunk ${index} of ${uploadId} holds ${actualBytes} bytes, expected ${expectedBytes}`,
      { statusCode: 500, retryable: false }
    );
  }
}

export class CorruptSessionError extends UploadError {
  constructor(readonly uploadId: string, reason: string) {
    super("CORRUPT_UPLOAD_SESSION", `Stored session ${uploadId} is corrupt: ${reason}`, {
      statusCode: 500,
      retryable: false,
    });
  }
}

/**
 * Wraps a low-level I/O failure so callers only ever see typed errors.
 * Typed upload errors pass through untouched.
 */
export function toStorageError(err: unknown, message: string): UploadError {
  if (err instanceof UploadError) return err;
  return new StorageUnavailableError(message, err);
}
