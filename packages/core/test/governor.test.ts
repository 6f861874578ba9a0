import { describe, expect, it, vi } from "vitest";
import {
  CancelledError,
  RateLimitExceededError,
  RateLimitGovernor,
  RateLimitedError,
  computeBackoffDelay,
  type Logger
} from "../src/index.js";

const NOW = 1_700_000_000_000;

function createSleepRecorder() {
  const sleeps: number[] = [];
  return {
    sleeps,
    sleep: async (ms: number) => {
      sleeps.push(ms);
    }
  };
}

function createLogger(): Logger & { warnings: string[] } {
  const warnings: string[] = [];
  return {
    warnings,
    info: () => undefined,
    warn: (message) => warnings.push(message),
    error: () => undefined
  };
}

describe("computeBackoffDelay", () => {
  const policy = { maxRetries: 6, backoffBaseMs: 1_000, backoffCapMs: 60_000 };

  it("keeps half of the exponential delay fixed and jitters the rest", () => {
    expect(computeBackoffDelay(policy, 0, () => 0)).toBe(500);
    expect(computeBackoffDelay(policy, 0, () => 1)).toBe(1_000);
    expect(computeBackoffDelay(policy, 3, () => 0.5)).toBe(6_000);
  });

  it("caps the delay", () => {
    expect(computeBackoffDelay(policy, 10, () => 1)).toBe(60_000);
    expect(computeBackoffDelay(policy, 10, () => 0)).toBe(30_000);
  });
});

describe("RateLimitGovernor", () => {
  it("grants immediately while no quota is known", async () => {
    const { sleep, sleeps } = createSleepRecorder();
    const governor = new RateLimitGovernor({ now: () => NOW, sleep });

    const permit = await governor.acquire();

    expect(permit).toEqual({ cost: 1, grantedAt: NOW });
    expect(governor.quota).toEqual({ remaining: null, resetAt: null });
    expect(sleeps).toEqual([]);
  });

  it("decrements the reported budget per permit", async () => {
    const governor = new RateLimitGovernor({ now: () => NOW, sleep: async () => undefined });
    governor.reportHeaders(500, NOW + 60_000);

    await governor.acquire();
    await governor.acquire(3);

    expect(governor.quota).toEqual({ remaining: 496, resetAt: NOW + 60_000 });
  });

  it("keeps the lower budget when responses of one window arrive out of order", () => {
    const governor = new RateLimitGovernor({ now: () => NOW });
    governor.reportHeaders(400, NOW + 60_000);
    governor.reportHeaders(450, NOW + 60_000);
    expect(governor.quota.remaining).toBe(400);

    governor.reportHeaders(5_000, NOW + 120_000);
    expect(governor.quota).toEqual({ remaining: 5_000, resetAt: NOW + 120_000 });
  });

  it("pauses until the reset time once the budget falls under the safety margin", async () => {
    const { sleep, sleeps } = createSleepRecorder();
    const logger = createLogger();
    const governor = new RateLimitGovernor({ now: () => NOW, sleep, logger, safetyMargin: 100 });
    governor.reportHeaders(100, NOW + 42_000);

    const permit = await governor.acquire();

    expect(sleeps).toEqual([42_000]);
    expect(permit.grantedAt).toBe(NOW);
    expect(governor.quota).toEqual({ remaining: null, resetAt: null });
    expect(logger.warnings).toEqual(["Rate limit budget low (100 left). Pausing 42s until reset."]);
  });

  it("parks every caller on one shared pause", async () => {
    let release: () => void = () => undefined;
    const sleep = vi.fn(
      () =>
        new Promise<void>((resolve) => {
          release = resolve;
        })
    );
    const governor = new RateLimitGovernor({ now: () => NOW, sleep });
    governor.reportHeaders(10, NOW + 5_000);

    const permits = Promise.all([governor.acquire(), governor.acquire(), governor.acquire()]);
    await Promise.resolve();
    expect(sleep).toHaveBeenCalledTimes(1);

    release();
    await expect(permits).resolves.toHaveLength(3);
    expect(sleep).toHaveBeenCalledTimes(1);
  });

  it("clears an expired window instead of waiting", async () => {
    const { sleep, sleeps } = createSleepRecorder();
    let now = NOW;
    const governor = new RateLimitGovernor({ now: () => now, sleep });
    governor.reportHeaders(0, NOW + 1_000);

    now = NOW + 1_000;
    await governor.acquire();

    expect(sleeps).toEqual([]);
    expect(governor.quota).toEqual({ remaining: null, resetAt: null });
  });

  it("rejects with CancelledError when the signal is already aborted", async () => {
    const governor = new RateLimitGovernor({ now: () => NOW });
    const controller = new AbortController();
    controller.abort();

    await expect(governor.acquire(1, controller.signal)).rejects.toBeInstanceOf(CancelledError);
  });

  it("retries a rate-limited task after the server's retry-after", async () => {
    const { sleep, sleeps } = createSleepRecorder();
    const governor = new RateLimitGovernor({ now: () => NOW, sleep });
    const task = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new RateLimitedError("slow down", { retryAfterMs: 2_000 }))
      .mockResolvedValueOnce("ok");

    await expect(governor.schedule("reviews", task)).resolves.toBe("ok");
    expect(task).toHaveBeenCalledTimes(2);
    expect(sleeps).toEqual([2_000]);
  });

  it("falls back to jittered exponential backoff without retry-after", async () => {
    const { sleep, sleeps } = createSleepRecorder();
    const governor = new RateLimitGovernor({ now: () => NOW, sleep, random: () => 0 });
    const task = vi
      .fn<() => Promise<number>>()
      .mockRejectedValueOnce(new RateLimitedError("secondary limit"))
      .mockRejectedValueOnce(new RateLimitedError("secondary limit"))
      .mockResolvedValueOnce(7);

    await expect(governor.schedule("timeline", task)).resolves.toBe(7);
    expect(sleeps).toEqual([500, 1_000]);
  });

  it("waits for the window reset when the error reports an exhausted quota", async () => {
    const { sleep, sleeps } = createSleepRecorder();
    const governor = new RateLimitGovernor({ now: () => NOW, sleep });
    const task = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(
        new RateLimitedError("primary limit", { rateLimit: { remaining: 0, resetAt: NOW + 30_000 } })
      )
      .mockResolvedValueOnce("done");

    await expect(governor.schedule("commits", task)).resolves.toBe("done");
    expect(sleeps).toEqual([30_000]);
  });

  it("gives up with RateLimitExceededError after the retry budget", async () => {
    const { sleep, sleeps } = createSleepRecorder();
    const governor = new RateLimitGovernor({
      now: () => NOW,
      sleep,
      random: () => 0.5,
      retry: { maxRetries: 2 }
    });
    const task = vi.fn<() => Promise<string>>().mockRejectedValue(new RateLimitedError("nope"));

    const failure = governor.schedule("acme/widgets#7 reviews", task);

    await expect(failure).rejects.toBeInstanceOf(RateLimitExceededError);
    await expect(failure).rejects.toMatchObject({ attempts: 3, label: "acme/widgets#7 reviews" });
    expect(task).toHaveBeenCalledTimes(3);
    expect(sleeps).toEqual([750, 1_500]);
  });

  it("does not retry other failures", async () => {
    const governor = new RateLimitGovernor({ now: () => NOW });
    const task = vi.fn<() => Promise<string>>().mockRejectedValue(new Error("boom"));

    await expect(governor.schedule("pull", task)).rejects.toThrowError("boom");
    expect(task).toHaveBeenCalledTimes(1);
  });
});
