import { deriveReviewSignals } from "./rules/review-signals.js";
import {
  emptyReviewRequestSignals,
  mergeReviewRequestSignals,
  resolveRequestToReview
} from "./rules/request-to-review.js";
import { compareTimestamps, earliest, isOnOrAfter } from "./time.js";
import type {
  CommentEntry,
  CommitEvent,
  DataQualityWarning,
  IssueCommentEvent,
  PullRequestKey,
  PullRequestMeta,
  PullRequestStateEvent,
  RawEvent,
  ReconciledPR,
  ReviewCommentEvent,
  ReviewEvent,
  SourceKind,
  TimelineEvent
} from "./types.js";

const kindOrder: Record<SourceKind, number> = {
  pr_state: 0,
  timeline: 1,
  review: 2,
  review_comment: 3,
  issue_comment: 4,
  commit: 5
};

export function createEmptyRecord(key: PullRequestKey): ReconciledPR {
  return {
    repository: key.repository,
    prNumber: key.prNumber,
    meta: null,
    requestToReviewAt: null,
    approvedAt: null,
    reviewGivenAt: null,
    comments: [],
    updates: [],
    mergedAt: null,
    isClosedUnmerged: false,
    reviewRequestSignals: { ...emptyReviewRequestSignals },
    reviewLinks: { inlineReviewIds: [], unconfirmedReviews: [] },
    stateObservedAt: null,
    syncCursor: {},
    syncStatus: "complete",
    warnings: [],
    failures: [],
    syncedAt: null
  };
}

function eventId(event: RawEvent): string {
  switch (event.sourceKind) {
    case "review":
      return event.payload.reviewId;
    case "issue_comment":
    case "review_comment":
      return event.payload.commentId;
    case "timeline":
      return event.payload.eventId ?? event.payload.event;
    case "commit":
      return event.payload.sha;
    case "pr_state":
      return "";
  }
}

/** Grouped by source kind, then ascending by timestamp, then by id. */
export function orderEvents(events: readonly RawEvent[]): RawEvent[] {
  return [...events].sort((a, b) => {
    const byKind = kindOrder[a.sourceKind] - kindOrder[b.sourceKind];
    if (byKind !== 0) {
      return byKind;
    }
    const byTime = compareTimestamps(a.timestamp, b.timestamp);
    if (byTime !== 0) {
      return byTime;
    }
    return eventId(a).localeCompare(eventId(b));
  });
}

interface EventGroups {
  states: PullRequestStateEvent[];
  timeline: TimelineEvent[];
  reviews: ReviewEvent[];
  reviewComments: ReviewCommentEvent[];
  issueComments: IssueCommentEvent[];
  commits: CommitEvent[];
}

function groupEvents(events: readonly RawEvent[], key: PullRequestKey): EventGroups {
  const groups: EventGroups = {
    states: [],
    timeline: [],
    reviews: [],
    reviewComments: [],
    issueComments: [],
    commits: []
  };

  for (const event of orderEvents(events)) {
    if (event.repository !== key.repository || event.prNumber !== key.prNumber) {
      continue;
    }
    switch (event.sourceKind) {
      case "pr_state":
        groups.states.push(event);
        break;
      case "timeline":
        groups.timeline.push(event);
        break;
      case "review":
        groups.reviews.push(event);
        break;
      case "review_comment":
        groups.reviewComments.push(event);
        break;
      case "issue_comment":
        groups.issueComments.push(event);
        break;
      case "commit":
        groups.commits.push(event);
        break;
    }
  }

  return groups;
}

interface StateResolution {
  meta: PullRequestMeta | null;
  mergedAt: string | null;
  isClosedUnmerged: boolean;
  stateObservedAt: string | null;
}

function resolveState(existing: ReconciledPR, states: PullRequestStateEvent[]): StateResolution {
  const latest = states[states.length - 1];
  const kept: StateResolution = {
    meta: existing.meta,
    mergedAt: existing.mergedAt,
    isClosedUnmerged: existing.isClosedUnmerged,
    stateObservedAt: existing.stateObservedAt
  };

  if (!latest) {
    return kept;
  }
  if (existing.stateObservedAt && !isOnOrAfter(latest.timestamp, existing.stateObservedAt)) {
    return kept;
  }

  const { merged, mergedAt, ...meta } = latest.payload;
  if (merged) {
    return {
      meta,
      mergedAt: mergedAt ?? meta.closedAt ?? latest.timestamp,
      isClosedUnmerged: false,
      stateObservedAt: latest.timestamp
    };
  }

  return {
    meta,
    mergedAt: null,
    isClosedUnmerged: meta.state === "closed",
    stateObservedAt: latest.timestamp
  };
}

function mergeComments(
  existing: CommentEntry[],
  groups: EventGroups,
  author: string | null
): CommentEntry[] {
  const byId = new Map(existing.map((entry) => [entry.commentId, entry] as const));
  const incoming: Array<IssueCommentEvent | ReviewCommentEvent> = [
    ...groups.reviewComments,
    ...groups.issueComments
  ];

  for (const event of incoming) {
    if (author && event.actor === author) {
      continue;
    }
    if (byId.has(event.payload.commentId)) {
      continue;
    }
    byId.set(event.payload.commentId, {
      timestamp: event.timestamp,
      kind: event.sourceKind,
      actor: event.actor,
      commentId: event.payload.commentId
    });
  }

  return [...byId.values()].sort((a, b) => {
    const byTime = compareTimestamps(a.timestamp, b.timestamp);
    return byTime !== 0 ? byTime : a.commentId.localeCompare(b.commentId);
  });
}

function mergeUpdates(existing: string[], groups: EventGroups): string[] {
  const timestamps = new Set(existing);
  for (const commit of groups.commits) {
    // Two or more parents means a merge from the base branch, not a push of new work.
    if (commit.payload.parentCount <= 1) {
      timestamps.add(commit.timestamp);
    }
  }
  for (const event of groups.timeline) {
    if (event.payload.event === "head_ref_force_pushed") {
      timestamps.add(event.timestamp);
    }
  }
  return [...timestamps].sort(compareTimestamps);
}

export function detectWarnings(
  record: Pick<ReconciledPR, "approvedAt" | "requestToReviewAt" | "prNumber" | "repository">
): DataQualityWarning[] {
  const warnings: DataQualityWarning[] = [];
  if (
    record.approvedAt &&
    record.requestToReviewAt &&
    compareTimestamps(record.approvedAt, record.requestToReviewAt) < 0
  ) {
    warnings.push({
      code: "approval_before_review_request",
      message: `${record.repository}#${record.prNumber} approved at ${record.approvedAt} before review was requested at ${record.requestToReviewAt}`
    });
  }
  return warnings;
}

export interface ReconcileOptions {
  /** PR author from the listing, used until a state snapshot names one. */
  author?: string | null;
}

/**
 * Folds a batch of raw events into the canonical record for one pull request.
 * Pure: the same prior record and batch always produce the same result, and
 * replaying a batch against its own output changes nothing.
 */
export function reconcile(
  existing: ReconciledPR | null | undefined,
  events: readonly RawEvent[],
  key: PullRequestKey,
  options: ReconcileOptions = {}
): ReconciledPR {
  const base = existing ?? createEmptyRecord(key);
  const groups = groupEvents(events, key);

  const state = resolveState(base, groups.states);
  const author = state.meta?.author ?? options.author ?? null;
  const reviewSignals = deriveReviewSignals(groups.reviews, groups.reviewComments, base.reviewLinks);
  const reviewRequestSignals = mergeReviewRequestSignals(base.reviewRequestSignals, groups.timeline, state.meta);

  const next: ReconciledPR = {
    ...base,
    meta: state.meta,
    requestToReviewAt: resolveRequestToReview(reviewRequestSignals),
    approvedAt: earliest(base.approvedAt, reviewSignals.firstApprovalAt),
    reviewGivenAt: earliest(base.reviewGivenAt, reviewSignals.firstSubstantiveAt),
    comments: mergeComments(base.comments, groups, author),
    updates: mergeUpdates(base.updates, groups),
    mergedAt: state.mergedAt,
    isClosedUnmerged: state.isClosedUnmerged,
    reviewRequestSignals,
    reviewLinks: reviewSignals.links,
    stateObservedAt: state.stateObservedAt
  };

  return { ...next, warnings: detectWarnings(next) };
}

export function isTerminal(record: ReconciledPR): boolean {
  return record.mergedAt !== null || record.isClosedUnmerged;
}
