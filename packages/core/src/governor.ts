import { CancelledError, RateLimitExceededError, RateLimitedError } from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";
import {
  abortable,
  computeBackoffDelay,
  DEFAULT_RETRY_POLICY,
  sleep,
  type RetryPolicy,
  type SleepFn
} from "./retry.js";

export interface RateLimitGovernorOptions {
  safetyMargin?: number;
  retry?: Partial<RetryPolicy>;
  now?: () => number;
  sleep?: SleepFn;
  random?: () => number;
  logger?: Logger;
}

export interface RatePermit {
  cost: number;
  grantedAt: number;
}

export interface ScheduleOptions {
  cost?: number;
  signal?: AbortSignal;
}

export const DEFAULT_SAFETY_MARGIN = 100;

/**
 * Process-wide gate for outbound API calls.
 *
 * Quota counters are only touched synchronously between awaits, so the event
 * loop serializes every update. When the budget drops under the safety margin
 * all callers wait on one shared pause until the reported reset time.
 */
export class RateLimitGovernor {
  private remaining: number | null = null;
  private resetAt: number | null = null;
  private pause: Promise<void> | null = null;
  private readonly safetyMargin: number;
  private readonly policy: RetryPolicy;
  private readonly now: () => number;
  private readonly sleepFn: SleepFn;
  private readonly random: () => number;
  private readonly logger: Logger;

  constructor(options: RateLimitGovernorOptions = {}) {
    this.safetyMargin = options.safetyMargin ?? DEFAULT_SAFETY_MARGIN;
    this.policy = { ...DEFAULT_RETRY_POLICY, ...options.retry };
    this.now = options.now ?? Date.now;
    this.sleepFn = options.sleep ?? sleep;
    this.random = options.random ?? Math.random;
    this.logger = options.logger ?? silentLogger;
  }

  get quota(): { remaining: number | null; resetAt: number | null } {
    return { remaining: this.remaining, resetAt: this.resetAt };
  }

  async acquire(cost = 1, signal?: AbortSignal): Promise<RatePermit> {
    for (;;) {
      if (signal?.aborted) {
        throw new CancelledError();
      }

      if (this.pause) {
        await abortable(this.pause, signal);
        continue;
      }

      const now = this.now();
      if (this.resetAt !== null && now >= this.resetAt) {
        this.remaining = null;
        this.resetAt = null;
      }

      if (this.mustPause(cost) && this.resetAt !== null) {
        const waitMs = this.resetAt - now;
        this.logger.warn(
          `Rate limit budget low (${this.remaining ?? 0} left). Pausing ${Math.ceil(waitMs / 1000)}s until reset.`
        );
        this.pause = this.sleepFn(waitMs)
          .then(() => {
            this.remaining = null;
            this.resetAt = null;
          })
          .finally(() => {
            this.pause = null;
          });
        continue;
      }

      if (this.remaining !== null) {
        this.remaining -= cost;
      }
      return { cost, grantedAt: now };
    }
  }

  reportHeaders(remaining: number, resetAt: number): void {
    if (!Number.isFinite(remaining) || !Number.isFinite(resetAt)) {
      return;
    }

    // Responses from concurrent calls in the same window can arrive out of order.
    if (this.resetAt === resetAt && this.remaining !== null) {
      this.remaining = Math.min(this.remaining, remaining);
      return;
    }
    this.remaining = remaining;
    this.resetAt = resetAt;
  }

  async schedule<T>(label: string, task: () => Promise<T>, options: ScheduleOptions = {}): Promise<T> {
    const cost = options.cost ?? 1;

    for (let attempt = 0; ; attempt += 1) {
      await this.acquire(cost, options.signal);
      try {
        return await task();
      } catch (error: unknown) {
        if (!(error instanceof RateLimitedError)) {
          throw error;
        }

        if (error.rateLimit) {
          this.reportHeaders(error.rateLimit.remaining, error.rateLimit.resetAt);
        }

        if (attempt >= this.policy.maxRetries) {
          throw new RateLimitExceededError(label, attempt + 1, { cause: error });
        }

        // An exhausted quota is already waited out by acquire().
        if (this.mustPause(cost)) {
          this.logger.warn(`Rate limit exhausted on ${label}. Retry ${attempt + 1}/${this.policy.maxRetries} after reset.`);
          continue;
        }

        const waitMs = error.retryAfterMs ?? computeBackoffDelay(this.policy, attempt, this.random);
        this.logger.warn(
          `Rate limited on ${label}. Waiting ${Math.ceil(waitMs / 1000)}s before retry ${attempt + 1}/${this.policy.maxRetries}.`
        );
        await this.sleepFn(waitMs, options.signal);
      }
    }
  }

  private mustPause(cost: number): boolean {
    if (this.remaining === null || this.resetAt === null) {
      return false;
    }
    return this.now() < this.resetAt && this.remaining - cost < this.safetyMargin;
  }
}
