export type SourceKind =
  | "review"
  | "issue_comment"
  | "review_comment"
  | "timeline"
  | "commit"
  | "pr_state";

export type PagedEndpoint = "reviews" | "issue_comments" | "review_comments" | "timeline" | "commits";

export type ReviewVerdict = "APPROVED" | "REQUEST_CHANGES" | "COMMENT" | "DISMISSED" | "PENDING";

export type PullRequestState = "open" | "closed";

export type SyncStatus = "complete" | "partial" | "skipped";

export type CommentKind = "issue_comment" | "review_comment";

export interface PullRequestKey {
  repository: string;
  prNumber: number;
}

interface RawEventBase extends PullRequestKey {
  timestamp: string;
  actor: string | null;
}

export interface ReviewEvent extends RawEventBase {
  sourceKind: "review";
  payload: {
    reviewId: string;
    verdict: ReviewVerdict;
    body: string;
  };
}

export interface IssueCommentEvent extends RawEventBase {
  sourceKind: "issue_comment";
  payload: {
    commentId: string;
  };
}

export interface ReviewCommentEvent extends RawEventBase {
  sourceKind: "review_comment";
  payload: {
    commentId: string;
    reviewId: string | null;
  };
}

export interface TimelineEvent extends RawEventBase {
  sourceKind: "timeline";
  payload: {
    event: string;
    eventId: string | null;
  };
}

export interface CommitEvent extends RawEventBase {
  sourceKind: "commit";
  payload: {
    sha: string;
    parentCount: number;
  };
}

export interface PullRequestMeta {
  title: string;
  author: string | null;
  state: PullRequestState;
  createdAt: string;
  closedAt: string | null;
  draft: boolean;
  baseBranch: string | null;
  labels: string[];
}

export interface PullRequestStateEvent extends RawEventBase {
  sourceKind: "pr_state";
  payload: PullRequestMeta & {
    merged: boolean;
    mergedAt: string | null;
  };
}

export type RawEvent =
  | ReviewEvent
  | IssueCommentEvent
  | ReviewCommentEvent
  | TimelineEvent
  | CommitEvent
  | PullRequestStateEvent;

export interface PageCursor {
  page: number;
}

export type SyncCursor = Partial<Record<PagedEndpoint, PageCursor>>;

export interface CommentEntry {
  timestamp: string;
  kind: CommentKind;
  actor: string | null;
  commentId: string;
}

export interface ReviewRequestSignals {
  readyForReviewAt: string | null;
  openedReadyAt: string | null;
  reviewRequestedAt: string | null;
  convertedToDraftAt: string | null;
}

export interface UnconfirmedReview {
  reviewId: string;
  timestamp: string;
}

/**
 * Review state that must outlive a batch: reviews known to carry inline
 * comments, and reviews that do not yet qualify as substantive but would once
 * an inline comment for them shows up.
 */
export interface ReviewLinks {
  inlineReviewIds: string[];
  unconfirmedReviews: UnconfirmedReview[];
}

export interface DataQualityWarning {
  code: "approval_before_review_request";
  message: string;
}

export interface ReconciledPR extends PullRequestKey {
  meta: PullRequestMeta | null;
  requestToReviewAt: string | null;
  approvedAt: string | null;
  reviewGivenAt: string | null;
  comments: CommentEntry[];
  updates: string[];
  mergedAt: string | null;
  isClosedUnmerged: boolean;
  reviewRequestSignals: ReviewRequestSignals;
  reviewLinks: ReviewLinks;
  stateObservedAt: string | null;
  syncCursor: SyncCursor;
  syncStatus: SyncStatus;
  warnings: DataQualityWarning[];
  failures: string[];
  syncedAt: string | null;
}

export interface PullRequestSummary {
  number: number;
  title: string;
  author: string | null;
  state: PullRequestState;
  draft: boolean;
  merged: boolean;
  createdAt: string;
  updatedAt: string;
  baseBranch: string | null;
  labels: string[];
}

export interface PullRequestFilters {
  createdFrom?: string;
  createdTo?: string;
  author?: string;
  baseBranch?: string;
  state?: "all" | "open" | "closed" | "merged";
  labelsAny?: string[];
}

export interface CollectResult {
  events: RawEvent[];
  partial: boolean;
  cursor: SyncCursor;
  failures: string[];
}

export interface PullRequestListing {
  pullRequests: PullRequestSummary[];
  partial: boolean;
  failures: string[];
}

export interface EventCollector {
  listPullRequests(
    repository: string,
    filters: PullRequestFilters,
    signal?: AbortSignal
  ): Promise<PullRequestListing>;
  collect(
    repository: string,
    prNumber: number,
    sinceCursor?: SyncCursor,
    signal?: AbortSignal
  ): Promise<CollectResult>;
}
