import { compareTimestamps, earliest } from "../time.js";
import type { ReviewCommentEvent, ReviewEvent, ReviewLinks, UnconfirmedReview } from "../types.js";

export interface ReviewSignals {
  firstApprovalAt: string | null;
  firstSubstantiveAt: string | null;
  links: ReviewLinks;
}

export const emptyReviewLinks: ReviewLinks = {
  inlineReviewIds: [],
  unconfirmedReviews: []
};

export function isSubstantiveReview(review: ReviewEvent, hasInlineComments: boolean): boolean {
  if (review.payload.body.trim().length > 0) {
    return true;
  }
  if (review.payload.verdict === "REQUEST_CHANGES" || review.payload.verdict === "COMMENT") {
    return true;
  }
  return hasInlineComments;
}

/**
 * Walks the reviews once, classifying each as an approval, a substantive
 * review, both, or neither. Inline comments may arrive in a different batch
 * than their review, so both sides of that link are carried in `links`.
 */
export function deriveReviewSignals(
  reviews: ReviewEvent[],
  reviewComments: ReviewCommentEvent[],
  prior: ReviewLinks = emptyReviewLinks
): ReviewSignals {
  const inlineReviewIds = new Set(prior.inlineReviewIds);
  for (const comment of reviewComments) {
    if (comment.payload.reviewId) {
      inlineReviewIds.add(comment.payload.reviewId);
    }
  }

  const unconfirmed = new Map(prior.unconfirmedReviews.map((review) => [review.reviewId, review.timestamp] as const));
  let firstApprovalAt: string | null = null;
  let firstSubstantiveAt: string | null = null;

  for (const review of reviews) {
    if (review.payload.verdict === "PENDING") {
      continue;
    }

    const { reviewId } = review.payload;
    if (review.payload.verdict === "APPROVED") {
      firstApprovalAt = earliest(firstApprovalAt, review.timestamp);
    }
    if (isSubstantiveReview(review, inlineReviewIds.has(reviewId))) {
      firstSubstantiveAt = earliest(firstSubstantiveAt, review.timestamp);
      unconfirmed.delete(reviewId);
    } else {
      unconfirmed.set(reviewId, earliest(unconfirmed.get(reviewId), review.timestamp) ?? review.timestamp);
    }
  }

  const stillUnconfirmed: UnconfirmedReview[] = [];
  for (const [reviewId, timestamp] of unconfirmed) {
    if (inlineReviewIds.has(reviewId)) {
      firstSubstantiveAt = earliest(firstSubstantiveAt, timestamp);
    } else {
      stillUnconfirmed.push({ reviewId, timestamp });
    }
  }

  return {
    firstApprovalAt,
    firstSubstantiveAt,
    links: {
      inlineReviewIds: [...inlineReviewIds].sort(),
      unconfirmedReviews: stillUnconfirmed.sort(
        (a, b) => compareTimestamps(a.timestamp, b.timestamp) || a.reviewId.localeCompare(b.reviewId)
      )
    }
  };
}
