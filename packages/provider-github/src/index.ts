import {
  AuthenticationError,
  describeError,
  NotFoundError,
  PaginatedFetcher,
  silentLogger,
  type CollectResult,
  type EventCollector,
  type Logger,
  type PageCursor,
  type PageRequest,
  type PagedEndpoint,
  type PullRequestFilters,
  type PullRequestKey,
  type PullRequestListing,
  type RateLimitGovernor,
  type RawEvent,
  type RetryPolicy,
  type SleepFn,
  type SyncCursor
} from "@prtimeline/core";
import type { GithubApi, GithubPage } from "./api.js";
import { matchesPullRequestFilters } from "./filters.js";
import {
  isPresent,
  normalizeCommit,
  normalizeIssueComment,
  normalizePullRequestState,
  normalizeReview,
  normalizeReviewComment,
  normalizeTimelineEvent,
  parseRepoRef,
  toPullRequestSummary
} from "./normalize.js";
import type { GithubPullRequest } from "./schemas.js";

export * from "./api.js";
export * from "./filters.js";
export * from "./normalize.js";
export * from "./schemas.js";

export interface GithubEventCollectorOptions {
  api: GithubApi;
  governor: RateLimitGovernor;
  perPage?: number;
  retry?: Partial<RetryPolicy>;
  sleep?: SleepFn;
  random?: () => number;
  logger?: Logger;
}

type PageCall<T> = (request: PageRequest) => Promise<GithubPage<T>>;

function fetcherFailures(fetchers: Array<PaginatedFetcher<unknown>>): string[] {
  return fetchers.flatMap((fetcher) =>
    fetcher.error ? [`${fetcher.endpoint}: ${describeError(fetcher.error)}`] : []
  );
}

// Auth failures end the run, missing PRs end the PR; anything else is reported as it came.
function pickFailure(reasons: unknown[]): unknown {
  return (
    reasons.find((reason) => reason instanceof AuthenticationError) ??
    reasons.find((reason) => reason instanceof NotFoundError) ??
    reasons[0]
  );
}

async function settleAll<T extends readonly unknown[] | []>(
  tasks: T
): Promise<{ -readonly [K in keyof T]: Awaited<T[K]> }> {
  const pending: readonly unknown[] = tasks;
  const settled = await Promise.allSettled(pending);
  const reasons = settled.flatMap((result) => (result.status === "rejected" ? [result.reason] : []));
  if (reasons.length > 0) {
    throw pickFailure(reasons);
  }
  return Promise.all(tasks);
}

/**
 * Fetches the six per-PR endpoints concurrently, each through its own
 * paginated fetcher and the shared rate-limit governor, and normalizes the
 * payloads into raw events.
 */
export class GithubEventCollector implements EventCollector {
  private readonly api: GithubApi;
  private readonly governor: RateLimitGovernor;
  private readonly logger: Logger;

  constructor(private readonly options: GithubEventCollectorOptions) {
    this.api = options.api;
    this.governor = options.governor;
    this.logger = options.logger ?? silentLogger;
  }

  async listPullRequests(
    repository: string,
    filters: PullRequestFilters,
    signal?: AbortSignal
  ): Promise<PullRequestListing> {
    const { owner, repo } = parseRepoRef(repository);
    const fetcher = this.createFetcher<GithubPullRequest>(`${repository} pulls`, undefined, signal, (request) =>
      this.api.listPullRequests({ owner, repo, ...request })
    );

    const pulls = await fetcher.collectAll();
    const summaries = pulls.map(toPullRequestSummary);
    const pullRequests = summaries.filter((pr) => matchesPullRequestFilters(pr, filters));
    this.logger.info(`${repository}: listed ${summaries.length} pull requests, ${pullRequests.length} match filters`);

    return {
      pullRequests,
      partial: fetcher.partial,
      failures: fetcherFailures([fetcher])
    };
  }

  async collect(
    repository: string,
    prNumber: number,
    sinceCursor: SyncCursor = {},
    signal?: AbortSignal
  ): Promise<CollectResult> {
    const { owner, repo } = parseRepoRef(repository);
    const key: PullRequestKey = { repository, prNumber };
    const pull = { owner, repo, pullNumber: prNumber };
    const label = `${repository}#${prNumber}`;

    const detail = this.createFetcher("pull", undefined, signal, async (request) => {
      const item = await this.api.getPullRequest({ ...pull, ...(request.signal ? { signal: request.signal } : {}) });
      return { data: [item.data], hasNextPage: false, rateLimit: item.rateLimit };
    });
    const reviews = this.createFetcher("reviews", sinceCursor.reviews, signal, (request) =>
      this.api.listReviews({ ...pull, ...request })
    );
    const issueComments = this.createFetcher("issue_comments", sinceCursor.issue_comments, signal, (request) =>
      this.api.listIssueComments({ ...pull, ...request })
    );
    const reviewComments = this.createFetcher("review_comments", sinceCursor.review_comments, signal, (request) =>
      this.api.listReviewComments({ ...pull, ...request })
    );
    const timeline = this.createFetcher("timeline", sinceCursor.timeline, signal, (request) =>
      this.api.listTimelineEvents({ ...pull, ...request })
    );
    const commits = this.createFetcher("commits", sinceCursor.commits, signal, (request) =>
      this.api.listCommits({ ...pull, ...request })
    );

    const [pulls, reviewItems, issueCommentItems, reviewCommentItems, timelineItems, commitItems] = await settleAll([
      detail.collectAll(),
      reviews.collectAll(),
      issueComments.collectAll(),
      reviewComments.collectAll(),
      timeline.collectAll(),
      commits.collectAll()
    ]);

    const events: RawEvent[] = [
      ...pulls.map((pr) => normalizePullRequestState(key, pr)),
      ...reviewItems.map((review) => normalizeReview(key, review)).filter(isPresent),
      ...issueCommentItems.map((comment) => normalizeIssueComment(key, comment)),
      ...reviewCommentItems.map((comment) => normalizeReviewComment(key, comment)),
      ...timelineItems.map((item) => normalizeTimelineEvent(key, item)).filter(isPresent),
      ...commitItems.map((commit) => normalizeCommit(key, commit)).filter(isPresent)
    ];

    const paged: Array<[PagedEndpoint, PaginatedFetcher<unknown>]> = [
      ["reviews", reviews],
      ["issue_comments", issueComments],
      ["review_comments", reviewComments],
      ["timeline", timeline],
      ["commits", commits]
    ];
    const cursor: SyncCursor = {};
    for (const [endpoint, fetcher] of paged) {
      cursor[endpoint] = fetcher.cursor;
    }

    const all = [detail, ...paged.map(([, fetcher]) => fetcher)];
    const failures = fetcherFailures(all).map((failure) => `${label} ${failure}`);

    return {
      events,
      partial: all.some((fetcher) => fetcher.partial),
      cursor,
      failures
    };
  }

  private createFetcher<T>(
    endpoint: string,
    cursor: PageCursor | undefined,
    signal: AbortSignal | undefined,
    call: PageCall<T>
  ): PaginatedFetcher<T> {
    return new PaginatedFetcher<T>(
      endpoint,
      (request) =>
        this.governor.schedule(
          endpoint,
          async () => {
            const page = await call(request);
            if (page.rateLimit) {
              this.governor.reportHeaders(page.rateLimit.remaining, page.rateLimit.resetAt);
            }
            return { items: page.data, hasNextPage: page.hasNextPage };
          },
          request.signal ? { signal: request.signal } : {}
        ),
      {
        ...(cursor ? { cursor } : {}),
        ...(signal ? { signal } : {}),
        ...(this.options.perPage ? { perPage: this.options.perPage } : {}),
        ...(this.options.retry ? { retry: this.options.retry } : {}),
        ...(this.options.sleep ? { sleep: this.options.sleep } : {}),
        ...(this.options.random ? { random: this.options.random } : {}),
        logger: this.logger
      }
    );
  }
}
