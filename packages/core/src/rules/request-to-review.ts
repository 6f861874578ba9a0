import { compareTimestamps, earliest } from "../time.js";
import type { PullRequestMeta, ReviewRequestSignals, TimelineEvent } from "../types.js";

export const emptyReviewRequestSignals: ReviewRequestSignals = {
  readyForReviewAt: null,
  openedReadyAt: null,
  reviewRequestedAt: null,
  convertedToDraftAt: null
};

function firstTimelineEvent(timeline: TimelineEvent[], name: string): string | null {
  return earliest(...timeline.filter((event) => event.payload.event === name).map((event) => event.timestamp));
}

/**
 * Whether the PR was opened as a draft, judged by its first draft transition.
 * Null when no transition is known yet.
 */
export function openedAsDraft(readyForReviewAt: string | null, convertedToDraftAt: string | null): boolean | null {
  if (readyForReviewAt && (!convertedToDraftAt || compareTimestamps(readyForReviewAt, convertedToDraftAt) < 0)) {
    return true;
  }
  if (convertedToDraftAt) {
    return false;
  }
  return null;
}

function resolveOpenedReady(
  existing: string | null,
  meta: PullRequestMeta | null,
  openedDraft: boolean | null
): string | null {
  if (openedDraft === true) {
    return null;
  }
  if (openedDraft === false) {
    return earliest(existing, meta?.createdAt);
  }
  // No transition seen: the current draft flag is the only evidence.
  return meta && !meta.draft ? earliest(existing, meta.createdAt) : existing;
}

export function mergeReviewRequestSignals(
  existing: ReviewRequestSignals,
  timeline: TimelineEvent[],
  meta: PullRequestMeta | null
): ReviewRequestSignals {
  const readyForReviewAt = earliest(existing.readyForReviewAt, firstTimelineEvent(timeline, "ready_for_review"));
  const convertedToDraftAt = earliest(existing.convertedToDraftAt, firstTimelineEvent(timeline, "convert_to_draft"));

  return {
    readyForReviewAt,
    openedReadyAt: resolveOpenedReady(existing.openedReadyAt, meta, openedAsDraft(readyForReviewAt, convertedToDraftAt)),
    reviewRequestedAt: earliest(existing.reviewRequestedAt, firstTimelineEvent(timeline, "review_requested")),
    convertedToDraftAt
  };
}

/** An explicit ready-for-review beats the creation time of a non-draft PR, which beats a review request. */
export function resolveRequestToReview(signals: ReviewRequestSignals): string | null {
  return signals.readyForReviewAt ?? signals.openedReadyAt ?? signals.reviewRequestedAt ?? null;
}
