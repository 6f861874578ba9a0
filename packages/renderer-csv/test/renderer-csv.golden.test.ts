import { readFile } from "node:fs/promises";
import { describe, expect, it } from "vitest";
import { createEmptyRecord, type PullRequestMeta, type ReconciledPR } from "@prtimeline/core";
import { escapeCsvField, renderCsvReport, toCsvRow } from "../src/index.js";

function meta(partial: Partial<PullRequestMeta>): PullRequestMeta {
  return {
    title: "Untitled",
    author: null,
    state: "open",
    createdAt: "2024-01-01T00:00:00Z",
    closedAt: null,
    draft: false,
    baseBranch: "main",
    labels: [],
    ...partial
  };
}

function createRecord(prNumber: number, partial: Partial<ReconciledPR>): ReconciledPR {
  return {
    ...createEmptyRecord({ repository: "acme/widgets", prNumber }),
    ...partial
  };
}

const merged = createRecord(12, {
  meta: meta({
    title: 'Fix "quoted", parser',
    author: "alice",
    state: "closed",
    createdAt: "2024-03-01T09:00:00Z",
    closedAt: "2024-03-02T12:00:00Z"
  }),
  requestToReviewAt: "2024-03-01T09:00:00Z",
  approvedAt: "2024-03-02T10:00:00Z",
  reviewGivenAt: "2024-03-01T11:00:00Z",
  mergedAt: "2024-03-02T12:00:00Z",
  comments: [
    { timestamp: "2024-03-01T11:00:00Z", kind: "review_comment", actor: "bob", commentId: "301" },
    { timestamp: "2024-03-01T13:00:00Z", kind: "issue_comment", actor: "carol", commentId: "201" }
  ],
  updates: ["2024-03-01T08:30:00Z"]
});

const abandoned = createRecord(3, {
  meta: meta({ title: "Tidy docs", author: "bob", state: "closed", createdAt: "2024-02-20T08:00:00Z" }),
  isClosedUnmerged: true,
  syncStatus: "partial"
});

function normalizeEol(input: string): string {
  return input.replace(/\r\n/g, "\n").trimEnd();
}

describe("renderCsvReport", () => {
  it("matches the golden export", async () => {
    const golden = await readFile(new URL("./fixtures/report.golden.csv", import.meta.url), "utf-8");

    expect(normalizeEol(renderCsvReport([merged, abandoned]))).toBe(normalizeEol(golden));
  });

  it("uses CRLF line endings with a trailing line break", () => {
    const output = renderCsvReport([abandoned]);

    expect(output.split("\r\n")).toHaveLength(3);
    expect(output.endsWith("3,Tidy docs,bob,2024-02-20T08:00:00Z,,,,,true,0,0,partial\r\n")).toBe(true);
  });

  it("writes only the header for an empty export", () => {
    expect(renderCsvReport([])).toBe(
      "pr_number,title,author,created_at,request_to_review_timestamp,pr_approved_timestamp,review_given_timestamp,pr_merge_timestamp,is_closed,total_comments,total_updates,sync_status\r\n"
    );
  });
});

describe("toCsvRow", () => {
  it("leaves fields of a record without metadata empty", () => {
    const row = toCsvRow(createRecord(5, { syncStatus: "skipped" }));

    expect(row.title).toBe("");
    expect(row.author).toBe("");
    expect(row.created_at).toBe("");
    expect(row.is_closed).toBe("false");
    expect(row.sync_status).toBe("skipped");
  });
});

describe("escapeCsvField", () => {
  it("quotes separators, quotes and line breaks", () => {
    expect(escapeCsvField("plain")).toBe("plain");
    expect(escapeCsvField("a,b")).toBe('"a,b"');
    expect(escapeCsvField('say "hi"')).toBe('"say ""hi"""');
    expect(escapeCsvField("line\nbreak")).toBe('"line\nbreak"');
  });
});
