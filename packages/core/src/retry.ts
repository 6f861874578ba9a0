import { setTimeout as delay } from "node:timers/promises";
import { CancelledError, isAbortError } from "./errors.js";

export interface RetryPolicy {
  maxRetries: number;
  backoffBaseMs: number;
  backoffCapMs: number;
}

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRetries: 6,
  backoffBaseMs: 1_000,
  backoffCapMs: 60_000
};

export async function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    throw new CancelledError();
  }
  try {
    await delay(ms, undefined, signal ? { signal } : undefined);
  } catch (error: unknown) {
    if (isAbortError(error)) {
      throw new CancelledError();
    }
    throw error;
  }
}

/**
 * Exponential backoff with equal jitter: half of the capped delay is fixed,
 * the other half is scaled by `random()`.
 */
export function computeBackoffDelay(
  policy: RetryPolicy,
  attempt: number,
  random: () => number = Math.random
): number {
  const exponential = policy.backoffBaseMs * 2 ** attempt;
  const capped = Math.min(policy.backoffCapMs, exponential);
  const half = capped / 2;
  return Math.round(half + half * random());
}

/** Resolves with `promise`, or rejects with CancelledError as soon as `signal` aborts. */
export function abortable<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) {
    return promise;
  }
  if (signal.aborted) {
    return Promise.reject(new CancelledError());
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new CancelledError());
    signal.addEventListener("abort", onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      }
    );
  });
}
