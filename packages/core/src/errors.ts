export type PrTimelineErrorCode =
  | "rate_limited"
  | "rate_limit_exceeded"
  | "transient_network"
  | "not_found"
  | "authentication"
  | "cancelled";

export abstract class PrTimelineError extends Error {
  abstract readonly code: PrTimelineErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export interface RateLimitSnapshot {
  remaining: number;
  resetAt: number;
}

/**
 * Raised by a provider when the remote API refused a call for quota reasons.
 * The governor retries these; callers never see one unless they bypass it.
 */
export class RateLimitedError extends PrTimelineError {
  readonly code = "rate_limited";
  readonly retryAfterMs: number | null;
  readonly rateLimit: RateLimitSnapshot | null;

  constructor(
    message: string,
    details: { retryAfterMs?: number | null; rateLimit?: RateLimitSnapshot | null; cause?: unknown } = {}
  ) {
    super(message, { cause: details.cause });
    this.retryAfterMs = details.retryAfterMs ?? null;
    this.rateLimit = details.rateLimit ?? null;
  }
}

export class RateLimitExceededError extends PrTimelineError {
  readonly code = "rate_limit_exceeded";

  constructor(
    readonly label: string,
    readonly attempts: number,
    options?: { cause?: unknown }
  ) {
    super(`Rate limit still exceeded for ${label} after ${attempts} attempts`, options);
  }
}

export class TransientNetworkError extends PrTimelineError {
  readonly code = "transient_network";

  constructor(
    message: string,
    readonly status: number | null = null,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class NotFoundError extends PrTimelineError {
  readonly code = "not_found";

  constructor(
    message: string,
    readonly status: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class AuthenticationError extends PrTimelineError {
  readonly code = "authentication";
}

export class CancelledError extends PrTimelineError {
  readonly code = "cancelled";

  constructor(message = "Operation cancelled") {
    super(message);
  }
}

export function isAbortError(error: unknown): boolean {
  if (error instanceof CancelledError) {
    return true;
  }
  return error instanceof Error && error.name === "AbortError";
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
