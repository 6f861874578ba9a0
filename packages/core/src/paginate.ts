import {
  CancelledError,
  describeError,
  isAbortError,
  RateLimitExceededError,
  TransientNetworkError
} from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";
import {
  computeBackoffDelay,
  DEFAULT_RETRY_POLICY,
  sleep,
  type RetryPolicy,
  type SleepFn
} from "./retry.js";
import type { PageCursor } from "./types.js";

export interface PageRequest {
  page: number;
  perPage: number;
  signal?: AbortSignal;
}

export interface PageResult<T> {
  items: T[];
  hasNextPage: boolean;
}

export type PageLoader<T> = (request: PageRequest) => Promise<PageResult<T>>;

export interface FetchedPage<T> {
  endpoint: string;
  page: number;
  items: T[];
}

export interface PaginatedFetcherOptions {
  cursor?: PageCursor;
  perPage?: number;
  retry?: Partial<RetryPolicy>;
  signal?: AbortSignal;
  sleep?: SleepFn;
  random?: () => number;
  logger?: Logger;
}

export const DEFAULT_PER_PAGE = 100;

function isRecoverable(error: unknown): boolean {
  return (
    error instanceof TransientNetworkError ||
    error instanceof RateLimitExceededError ||
    isAbortError(error)
  );
}

/**
 * Lazily walks one page-numbered endpoint.
 *
 * The cursor always names the page to start from on the next run: it advances
 * past pages that have a successor, stays on the final page (new items are
 * appended there) and stays on a page that failed.
 */
export class PaginatedFetcher<T> {
  private current: PageCursor;
  private failure: Error | null = null;
  private readonly perPage: number;
  private readonly policy: RetryPolicy;
  private readonly sleepFn: SleepFn;
  private readonly random: () => number;
  private readonly logger: Logger;

  constructor(
    readonly endpoint: string,
    private readonly loader: PageLoader<T>,
    private readonly options: PaginatedFetcherOptions = {}
  ) {
    this.current = { page: Math.max(1, options.cursor?.page ?? 1) };
    this.perPage = options.perPage ?? DEFAULT_PER_PAGE;
    this.policy = { ...DEFAULT_RETRY_POLICY, ...options.retry };
    this.sleepFn = options.sleep ?? sleep;
    this.random = options.random ?? Math.random;
    this.logger = options.logger ?? silentLogger;
  }

  get cursor(): PageCursor {
    return { ...this.current };
  }

  get partial(): boolean {
    return this.failure !== null;
  }

  get error(): Error | null {
    return this.failure;
  }

  async *pages(): AsyncGenerator<FetchedPage<T>, void, undefined> {
    let page = this.current.page;

    for (;;) {
      if (this.options.signal?.aborted) {
        this.failure = new CancelledError(`Fetching ${this.endpoint} cancelled at page ${page}`);
        return;
      }

      let result: PageResult<T>;
      try {
        result = await this.loadPage(page);
      } catch (error: unknown) {
        if (!isRecoverable(error)) {
          throw error;
        }
        this.failure = error instanceof Error ? error : new Error(String(error));
        this.logger.warn(`Stopped ${this.endpoint} at page ${page}: ${describeError(error)}`);
        return;
      }

      this.current = { page: result.hasNextPage ? page + 1 : page };
      yield { endpoint: this.endpoint, page, items: result.items };

      if (!result.hasNextPage) {
        return;
      }
      page += 1;
    }
  }

  async collectAll(): Promise<T[]> {
    const items: T[] = [];
    for await (const page of this.pages()) {
      items.push(...page.items);
    }
    return items;
  }

  private async loadPage(page: number): Promise<PageResult<T>> {
    const request: PageRequest = { page, perPage: this.perPage };
    if (this.options.signal) {
      request.signal = this.options.signal;
    }

    for (let attempt = 0; ; attempt += 1) {
      try {
        return await this.loader(request);
      } catch (error: unknown) {
        if (!(error instanceof TransientNetworkError) || attempt >= this.policy.maxRetries) {
          throw error;
        }
        const waitMs = computeBackoffDelay(this.policy, attempt, this.random);
        this.logger.warn(
          `Retrying ${this.endpoint} page ${page} (${attempt + 1}/${this.policy.maxRetries}) after ${describeError(error)}`
        );
        await this.sleepFn(waitMs, this.options.signal);
      }
    }
  }
}
