export * from "./types.js";
export * from "./errors.js";
export * from "./logger.js";
export * from "./retry.js";
export * from "./time.js";
export * from "./governor.js";
export * from "./paginate.js";
export * from "./reconciler.js";
export * from "./checkpoint-store.js";
export * from "./concurrency.js";
export * from "./sync.js";
export { deriveReviewSignals, isSubstantiveReview } from "./rules/review-signals.js";
export { resolveRequestToReview } from "./rules/request-to-review.js";
