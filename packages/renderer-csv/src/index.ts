import type { ReconciledPR } from "@prtimeline/core";

export const csvColumns = [
  "pr_number",
  "title",
  "author",
  "created_at",
  "request_to_review_timestamp",
  "pr_approved_timestamp",
  "review_given_timestamp",
  "pr_merge_timestamp",
  "is_closed",
  "total_comments",
  "total_updates",
  "sync_status"
] as const;

export type CsvColumn = (typeof csvColumns)[number];

export function escapeCsvField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function toCsvRow(record: ReconciledPR): Record<CsvColumn, string> {
  return {
    pr_number: String(record.prNumber),
    title: record.meta?.title ?? "",
    author: record.meta?.author ?? "",
    created_at: record.meta?.createdAt ?? "",
    request_to_review_timestamp: record.requestToReviewAt ?? "",
    pr_approved_timestamp: record.approvedAt ?? "",
    review_given_timestamp: record.reviewGivenAt ?? "",
    pr_merge_timestamp: record.mergedAt ?? "",
    is_closed: String(record.isClosedUnmerged),
    total_comments: String(record.comments.length),
    total_updates: String(record.updates.length),
    sync_status: record.syncStatus
  };
}

export function renderCsvReport(records: ReconciledPR[]): string {
  const lines = [csvColumns.join(",")];
  for (const record of [...records].sort((a, b) => a.prNumber - b.prNumber)) {
    const row = toCsvRow(record);
    lines.push(csvColumns.map((column) => escapeCsvField(row[column])).join(","));
  }
  return `${lines.join("\r\n")}\r\n`;
}
