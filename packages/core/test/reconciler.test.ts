import { describe, expect, it } from "vitest";
import {
  createEmptyRecord,
  isTerminal,
  orderEvents,
  reconcile,
  type CommitEvent,
  type IssueCommentEvent,
  type PullRequestKey,
  type PullRequestStateEvent,
  type RawEvent,
  type ReviewCommentEvent,
  type ReviewEvent,
  type ReviewVerdict,
  type TimelineEvent
} from "../src/index.js";

const key: PullRequestKey = { repository: "acme/widgets", prNumber: 7 };

const T0 = "2024-03-01T09:00:00Z";
const T1 = "2024-03-01T10:00:00Z";
const T2 = "2024-03-01T11:00:00Z";
const T3 = "2024-03-01T12:00:00Z";
const T4 = "2024-03-01T13:00:00Z";
const T5 = "2024-03-01T14:00:00Z";
const T6 = "2024-03-01T15:00:00Z";
const T8 = "2024-03-01T17:00:00Z";
const T9 = "2024-03-01T18:00:00Z";

function prState(timestamp: string, overrides: Partial<PullRequestStateEvent["payload"]> = {}): PullRequestStateEvent {
  return {
    ...key,
    sourceKind: "pr_state",
    timestamp,
    actor: "alice",
    payload: {
      title: "Add widget",
      author: "alice",
      state: "open",
      createdAt: T0,
      closedAt: null,
      draft: false,
      baseBranch: "main",
      labels: [],
      merged: false,
      mergedAt: null,
      ...overrides
    }
  };
}

function review(reviewId: string, timestamp: string, verdict: ReviewVerdict, body = "", actor = "bob"): ReviewEvent {
  return { ...key, sourceKind: "review", timestamp, actor, payload: { reviewId, verdict, body } };
}

function timeline(event: string, timestamp: string, eventId: string): TimelineEvent {
  return { ...key, sourceKind: "timeline", timestamp, actor: "alice", payload: { event, eventId } };
}

function issueComment(commentId: string, timestamp: string, actor = "carol"): IssueCommentEvent {
  return { ...key, sourceKind: "issue_comment", timestamp, actor, payload: { commentId } };
}

function reviewComment(commentId: string, timestamp: string, reviewId: string | null, actor = "bob"): ReviewCommentEvent {
  return { ...key, sourceKind: "review_comment", timestamp, actor, payload: { commentId, reviewId } };
}

function commit(sha: string, timestamp: string, parentCount = 1): CommitEvent {
  return { ...key, sourceKind: "commit", timestamp, actor: "alice", payload: { sha, parentCount } };
}

describe("reconcile scenarios", () => {
  it("treats a lone empty approval as an approval but not as a review", () => {
    const record = reconcile(null, [prState(T1), review("r1", T1, "APPROVED")], key);

    expect(record.requestToReviewAt).toBe(T0);
    expect(record.approvedAt).toBe(T1);
    expect(record.reviewGivenAt).toBeNull();
  });

  it("uses ready_for_review for drafts and counts a change request with a body", () => {
    const record = reconcile(
      null,
      [
        prState(T3),
        timeline("ready_for_review", T2, "900"),
        review("r2", T3, "REQUEST_CHANGES", "Please split this change")
      ],
      key
    );

    expect(record.requestToReviewAt).toBe(T2);
    expect(record.reviewGivenAt).toBe(T3);
    expect(record.approvedAt).toBeNull();
  });

  it("keeps the first approval", () => {
    const record = reconcile(null, [review("r5", T5, "APPROVED"), review("r8", T8, "APPROVED")], key);
    expect(record.approvedAt).toBe(T5);

    const later = reconcile(record, [review("r9", T9, "APPROVED")], key);
    expect(later.approvedAt).toBe(T5);

    const backfilled = reconcile(reconcile(null, [review("r8", T8, "APPROVED")], key), [review("r5", T5, "APPROVED")], key);
    expect(backfilled.approvedAt).toBe(T5);
  });

  it("produces the same record from a resumed sync as from one uninterrupted pass", () => {
    const all: RawEvent[] = [
      prState(T9),
      timeline("review_requested", T1, "901"),
      review("r1", T2, "COMMENT", "A few nits"),
      review("r2", T6, "APPROVED"),
      reviewComment("c1", T2, "r1"),
      issueComment("i1", T3),
      issueComment("i2", T5),
      issueComment("i3", T8),
      commit("aaa", T1),
      commit("bbb", T4),
      commit("mmm", T5, 2)
    ];
    const uninterrupted = reconcile(null, all, key);

    const firstBatch: RawEvent[] = [
      prState(T4),
      timeline("review_requested", T1, "901"),
      review("r1", T2, "COMMENT", "A few nits"),
      reviewComment("c1", T2, "r1"),
      issueComment("i1", T3),
      commit("aaa", T1)
    ];
    // The resumed pass refetches the page it stopped on, so i1 and aaa arrive twice.
    const secondBatch: RawEvent[] = [
      prState(T9),
      review("r2", T6, "APPROVED"),
      issueComment("i1", T3),
      issueComment("i2", T5),
      issueComment("i3", T8),
      commit("aaa", T1),
      commit("bbb", T4),
      commit("mmm", T5, 2)
    ];
    const resumed = reconcile(reconcile(null, firstBatch, key), secondBatch, key);

    expect(resumed).toEqual(uninterrupted);
    expect(resumed.comments.map((comment) => comment.commentId)).toEqual(["c1", "i1", "i2", "i3"]);
    expect(resumed.updates).toEqual([T1, T4]);
  });

  it("lets a later merged snapshot override a closed-unmerged one", () => {
    const closed = reconcile(null, [prState(T3, { state: "closed", closedAt: T3 })], key);
    expect(closed.isClosedUnmerged).toBe(true);
    expect(closed.mergedAt).toBeNull();

    const merged = reconcile(closed, [prState(T4, { state: "closed", closedAt: T3, merged: true, mergedAt: T4 })], key);
    expect(merged.mergedAt).toBe(T4);
    expect(merged.isClosedUnmerged).toBe(false);
  });
});

describe("reconcile", () => {
  const batch: RawEvent[] = [
    prState(T6),
    timeline("review_requested", T1, "901"),
    timeline("head_ref_force_pushed", T3, "902"),
    review("r1", T2, "APPROVED"),
    reviewComment("c1", T2, "r1"),
    issueComment("i1", T4),
    commit("aaa", T1),
    commit("mmm", T5, 2)
  ];

  it("is idempotent", () => {
    const once = reconcile(null, batch, key);
    expect(reconcile(once, batch, key)).toEqual(once);
  });

  it("does not depend on the order events arrive in", () => {
    expect(reconcile(null, [...batch].reverse(), key)).toEqual(reconcile(null, batch, key));
  });

  it("counts an approval with inline comments as a review", () => {
    const record = reconcile(null, batch, key);
    expect(record.approvedAt).toBe(T2);
    expect(record.reviewGivenAt).toBe(T2);
  });

  it("ignores pending reviews but counts reviews by the author", () => {
    const record = reconcile(
      null,
      [
        prState(T6),
        review("r1", T1, "PENDING", "draft notes"),
        review("r2", T2, "APPROVED", "", "alice"),
        review("r3", T3, "COMMENT", "Answering the nits", "alice")
      ],
      key
    );
    expect(record.approvedAt).toBe(T2);
    expect(record.reviewGivenAt).toBe(T3);
  });

  it("counts an empty approval as a review once its inline comment arrives in a later batch", () => {
    const approval = [prState(T6), review("r1", T2, "APPROVED")];
    const inline = [reviewComment("c1", T3, "r1")];
    const clean = reconcile(null, [...approval, ...inline], key);

    const first = reconcile(null, approval, key);
    expect(first.reviewGivenAt).toBeNull();
    expect(first.reviewLinks).toEqual({ inlineReviewIds: [], unconfirmedReviews: [{ reviewId: "r1", timestamp: T2 }] });

    const resumed = reconcile(first, inline, key);
    expect(resumed.reviewGivenAt).toBe(T2);
    expect(resumed.reviewLinks).toEqual({ inlineReviewIds: ["r1"], unconfirmedReviews: [] });
    expect(resumed).toEqual(clean);
  });

  it("counts an empty approval as a review when its inline comment arrived first", () => {
    const first = reconcile(null, [prState(T6), reviewComment("c1", T3, "r1")], key);
    expect(first.reviewGivenAt).toBeNull();

    const resumed = reconcile(first, [review("r1", T2, "APPROVED")], key);
    expect(resumed.approvedAt).toBe(T2);
    expect(resumed.reviewGivenAt).toBe(T2);
    expect(resumed).toEqual(reconcile(null, [prState(T6), reviewComment("c1", T3, "r1"), review("r1", T2, "APPROVED")], key));
  });

  it("does not treat a dismissed empty review as substantive", () => {
    const record = reconcile(null, [review("r1", T1, "DISMISSED")], key);
    expect(record.reviewGivenAt).toBeNull();
  });

  it("dedupes comments by id and drops the author's own", () => {
    const record = reconcile(
      null,
      [prState(T6), issueComment("i1", T2), issueComment("i1", T2), issueComment("i2", T3, "alice"), reviewComment("c1", T1, null)],
      key
    );

    expect(record.comments).toEqual([
      { timestamp: T1, kind: "review_comment", actor: "bob", commentId: "c1" },
      { timestamp: T2, kind: "issue_comment", actor: "carol", commentId: "i1" }
    ]);
  });

  it("drops the author's comments using the author from the listing", () => {
    const record = reconcile(null, [issueComment("i1", T2), issueComment("i2", T3, "alice")], key, { author: "alice" });

    expect(record.meta).toBeNull();
    expect(record.comments.map((entry) => entry.commentId)).toEqual(["i1"]);
  });

  it("records pushes and force pushes but not merge commits", () => {
    const record = reconcile(null, batch, key);
    expect(record.updates).toEqual([T1, T3]);
  });

  it("ignores events of other pull requests", () => {
    const stray: IssueCommentEvent = { ...issueComment("x1", T1), prNumber: 8 };
    const record = reconcile(null, [stray], key);
    expect(record.comments).toEqual([]);
  });

  it("ignores a state snapshot older than the one already applied", () => {
    const closed = reconcile(null, [prState(T5, { state: "closed", closedAt: T5 })], key);
    const stale = reconcile(closed, [prState(T4)], key);

    expect(stale.isClosedUnmerged).toBe(true);
    expect(stale.meta?.state).toBe("closed");
    expect(stale.stateObservedAt).toBe(T5);
  });

  it("never moves review timestamps forward", () => {
    const first = reconcile(null, [review("r1", T2, "APPROVED", "looks good")], key);
    const second = reconcile(first, [review("r2", T5, "APPROVED", "still good")], key);

    expect(second.approvedAt).toBe(T2);
    expect(second.reviewGivenAt).toBe(T2);
  });

  it("falls back to the first review request when the PR was never marked ready", () => {
    const record = reconcile(
      null,
      [prState(T6, { draft: true }), timeline("review_requested", T4, "903"), timeline("review_requested", T2, "904")],
      key
    );
    expect(record.requestToReviewAt).toBe(T2);
  });

  it("uses the creation time of a PR opened ready and later converted to draft", () => {
    const events = [
      prState(T6, { draft: true }),
      timeline("convert_to_draft", T3, "906"),
      timeline("review_requested", T4, "907")
    ];
    expect(reconcile(null, events, key).requestToReviewAt).toBe(T0);

    const firstPass = reconcile(null, [prState(T6, { draft: true })], key);
    expect(firstPass.requestToReviewAt).toBeNull();
    expect(reconcile(firstPass, events.slice(1), key)).toEqual(reconcile(null, events, key));
  });

  it("prefers ready_for_review for a PR opened as a draft even after a non-draft snapshot", () => {
    const firstPass = reconcile(null, [prState(T6)], key);
    expect(firstPass.requestToReviewAt).toBe(T0);

    const resumed = reconcile(firstPass, [timeline("ready_for_review", T2, "908")], key);
    expect(resumed.requestToReviewAt).toBe(T2);
    expect(resumed).toEqual(reconcile(null, [prState(T6), timeline("ready_for_review", T2, "908")], key));
  });

  it("flags an approval that predates the review request", () => {
    const record = reconcile(
      null,
      [prState(T6, { draft: true }), review("r1", T1, "APPROVED"), timeline("ready_for_review", T2, "905")],
      key
    );

    expect(record.warnings).toEqual([
      {
        code: "approval_before_review_request",
        message: `acme/widgets#7 approved at ${T1} before review was requested at ${T2}`
      }
    ]);
  });

  it("keeps sync bookkeeping from the prior record", () => {
    const prior = {
      ...createEmptyRecord(key),
      syncCursor: { reviews: { page: 3 } },
      syncStatus: "partial" as const,
      failures: ["reviews: timeout"],
      syncedAt: T1
    };
    const record = reconcile(prior, [issueComment("i1", T2)], key);

    expect(record.syncCursor).toEqual({ reviews: { page: 3 } });
    expect(record.syncStatus).toBe("partial");
    expect(record.failures).toEqual(["reviews: timeout"]);
    expect(record.syncedAt).toBe(T1);
  });
});

describe("orderEvents", () => {
  it("groups by source kind, then orders by time and id", () => {
    const ordered = orderEvents([commit("b", T2), issueComment("i2", T1), commit("a", T2), prState(T3), review("r", T1, "COMMENT")]);

    expect(ordered.map((event) => event.sourceKind)).toEqual(["pr_state", "review", "issue_comment", "commit", "commit"]);
    expect(ordered.slice(3).map((event) => (event.sourceKind === "commit" ? event.payload.sha : ""))).toEqual(["a", "b"]);
  });
});

describe("isTerminal", () => {
  it("is true for merged or closed pull requests only", () => {
    expect(isTerminal(reconcile(null, [prState(T1)], key))).toBe(false);
    expect(isTerminal(reconcile(null, [prState(T1, { state: "closed", closedAt: T1 })], key))).toBe(true);
    expect(isTerminal(reconcile(null, [prState(T1, { state: "closed", merged: true, mergedAt: T1 })], key))).toBe(true);
  });
});
