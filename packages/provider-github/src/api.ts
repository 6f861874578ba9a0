import { Octokit } from "@octokit/rest";
import {
  AuthenticationError,
  CancelledError,
  isAbortError,
  NotFoundError,
  RateLimitedError,
  TransientNetworkError,
  type RateLimitSnapshot
} from "@prtimeline/core";
import { z } from "zod";
import {
  githubCommitSchema,
  githubIssueCommentSchema,
  githubPullRequestSchema,
  githubReviewCommentSchema,
  githubReviewSchema,
  githubTimelineEventSchema,
  type GithubCommit,
  type GithubIssueComment,
  type GithubPullRequest,
  type GithubReview,
  type GithubReviewComment,
  type GithubTimelineEvent
} from "./schemas.js";

export interface GithubPage<T> {
  data: T[];
  hasNextPage: boolean;
  rateLimit: RateLimitSnapshot | null;
}

export interface GithubItem<T> {
  data: T;
  rateLimit: RateLimitSnapshot | null;
}

export interface RepoParams {
  owner: string;
  repo: string;
  signal?: AbortSignal;
}

export interface PageParams extends RepoParams {
  page: number;
  perPage: number;
}

export interface PullParams extends RepoParams {
  pullNumber: number;
}

export interface PullPageParams extends PageParams {
  pullNumber: number;
}

export interface GithubApi {
  listPullRequests(params: PageParams): Promise<GithubPage<GithubPullRequest>>;
  getPullRequest(params: PullParams): Promise<GithubItem<GithubPullRequest>>;
  listReviews(params: PullPageParams): Promise<GithubPage<GithubReview>>;
  listIssueComments(params: PullPageParams): Promise<GithubPage<GithubIssueComment>>;
  listReviewComments(params: PullPageParams): Promise<GithubPage<GithubReviewComment>>;
  listTimelineEvents(params: PullPageParams): Promise<GithubPage<GithubTimelineEvent>>;
  listCommits(params: PullPageParams): Promise<GithubPage<GithubCommit>>;
}

type HeaderMap = Record<string, string | number | undefined>;

interface ResponseLike {
  data: unknown;
  headers: HeaderMap;
}

function readNumber(value: unknown): number | null {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

export function parseRateLimit(headers: Record<string, unknown>): RateLimitSnapshot | null {
  const remaining = readNumber(headers["x-ratelimit-remaining"]);
  const resetSeconds = readNumber(headers["x-ratelimit-reset"]);
  if (remaining === null || resetSeconds === null) {
    return null;
  }
  return { remaining, resetAt: resetSeconds * 1000 };
}

export function hasNextPage(headers: Record<string, unknown>): boolean {
  const link = headers.link;
  return typeof link === "string" && /rel="next"/.test(link);
}

function toPage<S extends z.ZodTypeAny>(response: ResponseLike, schema: S): GithubPage<z.infer<S>> {
  return {
    data: z.array(schema).parse(response.data),
    hasNextPage: hasNextPage(response.headers),
    rateLimit: parseRateLimit(response.headers)
  };
}

const requestErrorSchema = z.object({
  status: z.number(),
  message: z.string().optional(),
  response: z
    .object({
      headers: z.record(z.string(), z.unknown()).optional()
    })
    .optional()
});

/** Maps an Octokit failure onto the engine's error taxonomy. */
export function classifyGithubError(error: unknown, label: string): Error {
  if (isAbortError(error)) {
    return new CancelledError(`Request for ${label} cancelled`);
  }

  const parsed = requestErrorSchema.safeParse(error);
  if (!parsed.success) {
    const message = error instanceof Error ? error.message : String(error);
    return new TransientNetworkError(`Network error for ${label}: ${message}`, null, { cause: error });
  }

  const { status, message = "" } = parsed.data;
  const headers = parsed.data.response?.headers ?? {};
  const rateLimit = parseRateLimit(headers);
  const retryAfterSeconds = readNumber(headers["retry-after"]);
  const lower = message.toLowerCase();

  if (status === 401) {
    return new AuthenticationError(`GitHub authentication failed for ${label}. Check token permissions and value.`, {
      cause: error
    });
  }

  if (status === 429 || (status === 403 && (rateLimit?.remaining === 0 || lower.includes("rate limit")))) {
    return new RateLimitedError(`GitHub rate limit reached for ${label}.`, {
      retryAfterMs: retryAfterSeconds === null ? null : retryAfterSeconds * 1000,
      rateLimit,
      cause: error
    });
  }

  if (status === 403 || status === 404 || status === 410) {
    return new NotFoundError(`GitHub resource not found or inaccessible for ${label} (HTTP ${status}).`, status, {
      cause: error
    });
  }

  if (status >= 500) {
    return new TransientNetworkError(`GitHub server error for ${label} (HTTP ${status}).`, status, { cause: error });
  }

  return new Error(`GitHub provider error for ${label}: ${message || `HTTP ${status}`}`, { cause: error });
}

function requestOptions(signal?: AbortSignal): { request?: { signal: AbortSignal } } {
  return signal ? { request: { signal } } : {};
}

class OctokitGithubApi implements GithubApi {
  constructor(private readonly octokit: Octokit) {}

  async listPullRequests(params: PageParams): Promise<GithubPage<GithubPullRequest>> {
    return this.call(`pull requests of ${params.owner}/${params.repo}`, async () =>
      toPage(
        await this.octokit.rest.pulls.list({
          owner: params.owner,
          repo: params.repo,
          state: "all",
          sort: "created",
          direction: "asc",
          per_page: params.perPage,
          page: params.page,
          ...requestOptions(params.signal)
        }),
        githubPullRequestSchema
      )
    );
  }

  async getPullRequest(params: PullParams): Promise<GithubItem<GithubPullRequest>> {
    return this.call(`${params.owner}/${params.repo}#${params.pullNumber}`, async () => {
      const response = await this.octokit.rest.pulls.get({
        owner: params.owner,
        repo: params.repo,
        pull_number: params.pullNumber,
        ...requestOptions(params.signal)
      });
      return {
        data: githubPullRequestSchema.parse(response.data),
        rateLimit: parseRateLimit(response.headers)
      };
    });
  }

  async listReviews(params: PullPageParams): Promise<GithubPage<GithubReview>> {
    return this.call(`reviews of ${params.owner}/${params.repo}#${params.pullNumber}`, async () =>
      toPage(
        await this.octokit.rest.pulls.listReviews({
          owner: params.owner,
          repo: params.repo,
          pull_number: params.pullNumber,
          per_page: params.perPage,
          page: params.page,
          ...requestOptions(params.signal)
        }),
        githubReviewSchema
      )
    );
  }

  async listIssueComments(params: PullPageParams): Promise<GithubPage<GithubIssueComment>> {
    return this.call(`issue comments of ${params.owner}/${params.repo}#${params.pullNumber}`, async () =>
      toPage(
        await this.octokit.rest.issues.listComments({
          owner: params.owner,
          repo: params.repo,
          issue_number: params.pullNumber,
          per_page: params.perPage,
          page: params.page,
          ...requestOptions(params.signal)
        }),
        githubIssueCommentSchema
      )
    );
  }

  async listReviewComments(params: PullPageParams): Promise<GithubPage<GithubReviewComment>> {
    return this.call(`review comments of ${params.owner}/${params.repo}#${params.pullNumber}`, async () =>
      toPage(
        await this.octokit.rest.pulls.listReviewComments({
          owner: params.owner,
          repo: params.repo,
          pull_number: params.pullNumber,
          sort: "created",
          direction: "asc",
          per_page: params.perPage,
          page: params.page,
          ...requestOptions(params.signal)
        }),
        githubReviewCommentSchema
      )
    );
  }

  async listTimelineEvents(params: PullPageParams): Promise<GithubPage<GithubTimelineEvent>> {
    return this.call(`timeline of ${params.owner}/${params.repo}#${params.pullNumber}`, async () =>
      toPage(
        await this.octokit.rest.issues.listEventsForTimeline({
          owner: params.owner,
          repo: params.repo,
          issue_number: params.pullNumber,
          per_page: params.perPage,
          page: params.page,
          ...requestOptions(params.signal)
        }),
        githubTimelineEventSchema
      )
    );
  }

  async listCommits(params: PullPageParams): Promise<GithubPage<GithubCommit>> {
    return this.call(`commits of ${params.owner}/${params.repo}#${params.pullNumber}`, async () =>
      toPage(
        await this.octokit.rest.pulls.listCommits({
          owner: params.owner,
          repo: params.repo,
          pull_number: params.pullNumber,
          per_page: params.perPage,
          page: params.page,
          ...requestOptions(params.signal)
        }),
        githubCommitSchema
      )
    );
  }

  private async call<T>(label: string, run: () => Promise<T>): Promise<T> {
    try {
      return await run();
    } catch (error: unknown) {
      if (error instanceof z.ZodError) {
        throw new Error(`Unexpected GitHub payload for ${label}: ${error.issues[0]?.message ?? "invalid shape"}`, {
          cause: error
        });
      }
      throw classifyGithubError(error, label);
    }
  }
}

export interface GithubApiOptions {
  token: string;
  userAgent?: string;
  baseUrl?: string;
}

export function createGithubApi(options: GithubApiOptions): GithubApi {
  const octokit = new Octokit({
    auth: options.token,
    userAgent: options.userAgent ?? "prtimeline/0.1.0",
    ...(options.baseUrl ? { baseUrl: options.baseUrl } : {})
  });
  return new OctokitGithubApi(octokit);
}
