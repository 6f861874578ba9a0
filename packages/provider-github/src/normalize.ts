import type {
  CommitEvent,
  IssueCommentEvent,
  PullRequestKey,
  PullRequestStateEvent,
  PullRequestSummary,
  ReviewCommentEvent,
  ReviewEvent,
  ReviewVerdict,
  TimelineEvent
} from "@prtimeline/core";
import type {
  GithubCommit,
  GithubIssueComment,
  GithubPullRequest,
  GithubReview,
  GithubReviewComment,
  GithubTimelineEvent
} from "./schemas.js";

type GithubLabel = NonNullable<GithubPullRequest["labels"]>[number];

export function normalizeLabels(labels?: GithubLabel[] | null): string[] {
  return (labels ?? [])
    .map((label) => (typeof label === "string" ? label : (label.name ?? "")))
    .filter(Boolean);
}

export function parseRepoRef(repoRef: string): { owner: string; repo: string } {
  const trimmed = repoRef.trim();
  const parts = trimmed.split("/");
  if (parts.length !== 2 || !parts[0] || !parts[1]) {
    throw new Error(`Invalid repo reference: ${repoRef}. Expected owner/repo.`);
  }

  return { owner: parts[0], repo: parts[1] };
}

export function mapReviewVerdict(state: string): ReviewVerdict {
  switch (state.toUpperCase()) {
    case "APPROVED":
      return "APPROVED";
    case "CHANGES_REQUESTED":
    case "REQUEST_CHANGES":
      return "REQUEST_CHANGES";
    case "COMMENTED":
    case "COMMENT":
      return "COMMENT";
    case "DISMISSED":
      return "DISMISSED";
    default:
      return "PENDING";
  }
}

function isMerged(pr: GithubPullRequest): boolean {
  return pr.merged ?? Boolean(pr.merged_at);
}

export function toPullRequestSummary(pr: GithubPullRequest): PullRequestSummary {
  return {
    number: pr.number,
    title: pr.title,
    author: pr.user?.login ?? null,
    state: pr.state === "closed" ? "closed" : "open",
    draft: pr.draft ?? false,
    merged: isMerged(pr),
    createdAt: pr.created_at,
    updatedAt: pr.updated_at,
    baseBranch: pr.base?.ref ?? null,
    labels: normalizeLabels(pr.labels)
  };
}

export function normalizePullRequestState(key: PullRequestKey, pr: GithubPullRequest): PullRequestStateEvent {
  const summary = toPullRequestSummary(pr);
  return {
    ...key,
    sourceKind: "pr_state",
    timestamp: pr.updated_at,
    actor: summary.author,
    payload: {
      title: summary.title,
      author: summary.author,
      state: summary.state,
      createdAt: summary.createdAt,
      closedAt: pr.closed_at ?? null,
      draft: summary.draft,
      baseBranch: summary.baseBranch,
      labels: summary.labels,
      merged: summary.merged,
      mergedAt: pr.merged_at ?? null
    }
  };
}

export function normalizeReview(key: PullRequestKey, review: GithubReview): ReviewEvent | null {
  // Pending reviews have not been submitted and carry no timestamp.
  if (!review.submitted_at) {
    return null;
  }
  return {
    ...key,
    sourceKind: "review",
    timestamp: review.submitted_at,
    actor: review.user?.login ?? null,
    payload: {
      reviewId: String(review.id),
      verdict: mapReviewVerdict(review.state),
      body: review.body ?? ""
    }
  };
}

export function normalizeIssueComment(key: PullRequestKey, comment: GithubIssueComment): IssueCommentEvent {
  return {
    ...key,
    sourceKind: "issue_comment",
    timestamp: comment.created_at,
    actor: comment.user?.login ?? null,
    payload: { commentId: String(comment.id) }
  };
}

export function normalizeReviewComment(key: PullRequestKey, comment: GithubReviewComment): ReviewCommentEvent {
  return {
    ...key,
    sourceKind: "review_comment",
    timestamp: comment.created_at,
    actor: comment.user?.login ?? null,
    payload: {
      commentId: String(comment.id),
      reviewId: comment.pull_request_review_id == null ? null : String(comment.pull_request_review_id)
    }
  };
}

export function normalizeTimelineEvent(key: PullRequestKey, item: GithubTimelineEvent): TimelineEvent | null {
  if (!item.event || !item.created_at) {
    return null;
  }
  const eventId = item.id != null ? String(item.id) : (item.node_id ?? null);
  return {
    ...key,
    sourceKind: "timeline",
    timestamp: item.created_at,
    actor: item.actor?.login ?? null,
    payload: { event: item.event, eventId }
  };
}

export function normalizeCommit(key: PullRequestKey, commit: GithubCommit): CommitEvent | null {
  const timestamp = commit.commit.author?.date ?? commit.commit.committer?.date;
  if (!timestamp) {
    return null;
  }
  return {
    ...key,
    sourceKind: "commit",
    timestamp,
    actor: commit.author?.login ?? commit.commit.author?.name ?? null,
    payload: { sha: commit.sha, parentCount: commit.parents.length }
  };
}

export function isPresent<T>(value: T | null): value is T {
  return value !== null;
}
