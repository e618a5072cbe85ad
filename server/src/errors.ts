export type ErrorCode =
  | "not_found"
  | "gone"
  | "quota_exceeded"
  | "rate_limited"
  | "storage_error"
  | "conflict";

export class HooktrapError extends Error {
  readonly code: ErrorCode;
  readonly statusCode: number;

  constructor(code: ErrorCode, statusCode: number, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.statusCode = statusCode;
  }
}

export class NotFoundError extends HooktrapError {
  constructor(endpointId: string) {
    super("not_found", 404, `Endpoint ${endpointId} not found`);
  }
}

export class GoneError extends HooktrapError {
  constructor(endpointId: string) {
    super("gone", 410, `Endpoint ${endpointId} is no longer accepting requests`);
  }
}

export class QuotaExceededError extends HooktrapError {
  constructor(
    endpointId: string,
    readonly maxRequests: number,
    readonly retryAfterSeconds: number
  ) {
    super("quota_exceeded", 429, `Endpoint ${endpointId} reached its limit of ${maxRequests} requests`);
  }
}

export class RateLimitedError extends HooktrapError {
  constructor(readonly retryAfterSeconds: number) {
    super("rate_limited", 429, "Too many requests. Please slow down.");
  }
}

export class StorageError extends HooktrapError {
  constructor(message: string, cause?: unknown) {
    super("storage_error", 500, message, { cause });
  }
}

/** Raised when id generation keeps colliding, which points at a broken random source. */
export class ConflictError extends HooktrapError {
  constructor(attempts: number) {
    super("conflict", 500, `Could not allocate a unique endpoint id after ${attempts} attempts`);
  }
}

export const isHooktrapError = (error: unknown): error is HooktrapError =>
  error instanceof HooktrapError;
