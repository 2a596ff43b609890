export type UploadErrorKind =
  | "InvalidInput"
  | "ConstraintViolation"
  | "Auth"
  | "RemoteRejected"
  | "TransientNetwork"
  | "ChunkUploadFailed"
  | "Timeout"
  | "IO";

interface UploadErrorOptions {
  status?: number;
  platformCode?: string;
  cause?: unknown;
}

/**
 * Base class for every failure the upload pipeline raises on purpose.
 * `kind` is what ends up in a job's failure reason.
 */
export class UploadError extends Error {
  readonly kind: UploadErrorKind;
  readonly retryable: boolean;
  readonly status?: number;
  readonly platformCode?: string;

  constructor(
    kind: UploadErrorKind,
    message: string,
    options: UploadErrorOptions & { retryable?: boolean } = {},
  ) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "UploadError";
    this.kind = kind;
    this.retryable = options.retryable ?? false;
    this.status = options.status;
    this.platformCode = options.platformCode;
  }
}

/** Bad local input: empty file, malformed job entry, invalid constraints */
export class InvalidInputError extends UploadError {
  constructor(message: string, options?: UploadErrorOptions) {
    super("InvalidInput", message, options);
    this.name = "InvalidInputError";
  }
}

export class ConstraintViolationError extends UploadError {
  constructor(message: string, options?: UploadErrorOptions) {
    super("ConstraintViolation", message, options);
    this.name = "ConstraintViolationError";
  }
}

/** Expired or invalid token. The driver refreshes once, then gives up. */
export class AuthError extends UploadError {
  constructor(message: string, options?: UploadErrorOptions) {
    super("Auth", message, options);
    this.name = "AuthError";
  }
}

/** The platform understood the request and refused it. Never retried. */
export class RemoteRejectedError extends UploadError {
  constructor(message: string, options?: UploadErrorOptions) {
    super("RemoteRejected", message, options);
    this.name = "RemoteRejectedError";
  }
}

/** Connection failure, request timeout, 429 or 5xx */
export class TransientNetworkError extends UploadError {
  constructor(message: string, options?: UploadErrorOptions) {
    super("TransientNetwork", message, { ...options, retryable: true });
    this.name = "TransientNetworkError";
  }
}

export class ChunkUploadFailedError extends UploadError {
  readonly chunkIndex: number;
  readonly attempts: number;

  constructor(chunkIndex: number, attempts: number, cause: UploadError) {
    super(
      "ChunkUploadFailed",
      `Chunk ${chunkIndex} failed after ${attempts} attempts: ${cause.message}`,
      { status: cause.status, cause },
    );
    this.name = "ChunkUploadFailedError";
    this.chunkIndex = chunkIndex;
    this.attempts = attempts;
  }
}

/**
 * No terminal publish status inside the polling budget.
 * The outcome is unknown, not failed: TikTok may still publish the video.
 */
export class TimeoutError extends UploadError {
  readonly publishId: string;
  readonly lastStatus: string;

  constructor(publishId: string, waitedMs: number, lastStatus: string) {
    super(
      "Timeout",
      `Publish status for ${publishId} still ${lastStatus} after ${waitedMs}ms`,
    );
    this.name = "TimeoutError";
    this.publishId = publishId;
    this.lastStatus = lastStatus;
  }
}

/** Local file problem: missing file, short read */
export class IOError extends UploadError {
  constructor(message: string, options?: UploadErrorOptions) {
    super("IO", message, options);
    this.name = "IOError";
  }
}

export function isUploadError(error: unknown): error is UploadError {
  return error instanceof UploadError;
}

export function isTransient(error: unknown): error is TransientNetworkError {
  return error instanceof TransientNetworkError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
