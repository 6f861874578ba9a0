import type { PullRequestFilters, PullRequestSummary } from "@prtimeline/core";

function inRange(value: string, since?: Date, until?: Date): boolean {
  const ts = new Date(value).getTime();
  if (!Number.isFinite(ts)) {
    return false;
  }

  if (since && ts < since.getTime()) {
    return false;
  }

  if (until && ts > until.getTime()) {
    return false;
  }

  return true;
}

const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;

// A bare date as the upper bound covers that whole day.
function toUpperBound(value: string): Date {
  return new Date(DATE_ONLY.test(value) ? `${value}T23:59:59.999Z` : value);
}

function hasAnyLabel(labels: string[], filter: string[]): boolean {
  if (filter.length === 0) {
    return true;
  }
  const normalized = new Set(labels.map((label) => label.toLowerCase()));
  return filter.some((label) => normalized.has(label.toLowerCase()));
}

function matchesState(pr: PullRequestSummary, state: PullRequestFilters["state"]): boolean {
  switch (state ?? "all") {
    case "open":
      return pr.state === "open";
    case "closed":
      return pr.state === "closed" && !pr.merged;
    case "merged":
      return pr.merged;
    default:
      return true;
  }
}

export function matchesPullRequestFilters(pr: PullRequestSummary, filters: PullRequestFilters): boolean {
  const createdFrom = filters.createdFrom ? new Date(filters.createdFrom) : undefined;
  const createdTo = filters.createdTo ? toUpperBound(filters.createdTo) : undefined;
  if (!inRange(pr.createdAt, createdFrom, createdTo)) {
    return false;
  }

  if (filters.author && pr.author?.toLowerCase() !== filters.author.toLowerCase()) {
    return false;
  }

  if (filters.baseBranch && pr.baseBranch !== filters.baseBranch) {
    return false;
  }

  if (!matchesState(pr, filters.state)) {
    return false;
  }

  return hasAnyLabel(pr.labels, filters.labelsAny ?? []);
}
