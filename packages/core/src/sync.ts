import type { CheckpointStore } from "./checkpoint-store.js";
import { runWithConcurrency } from "./concurrency.js";
import { AuthenticationError, describeError, NotFoundError } from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";
import { createEmptyRecord, reconcile } from "./reconciler.js";
import { isOnOrAfter } from "./time.js";
import type {
  EventCollector,
  PullRequestFilters,
  PullRequestKey,
  PullRequestSummary,
  ReconciledPR,
  SyncCursor
} from "./types.js";

export const DEFAULT_CONCURRENCY = 5;

export interface SyncOptions {
  repository: string;
  collector: EventCollector;
  store: CheckpointStore;
  concurrency?: number;
  filters?: PullRequestFilters;
  /** Re-fetch every PR from its first pages, frozen ones included. */
  force?: boolean;
  /** Ignore stored cursors of PRs updated at or after this instant. */
  refreshSince?: string;
  signal?: AbortSignal;
  logger?: Logger;
  now?: () => Date;
  onRecord?: (record: ReconciledPR) => void | Promise<void>;
}

export interface SyncCounts {
  complete: number;
  partial: number;
  skipped: number;
  frozen: number;
}

export interface SyncReport {
  repository: string;
  startedAt: string;
  finishedAt: string;
  records: ReconciledPR[];
  counts: SyncCounts;
  listingPartial: boolean;
  cancelled: boolean;
}

interface PullRequestOutcome {
  record: ReconciledPR;
  reused: boolean;
}

class RepositorySync {
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(
    private readonly options: SyncOptions,
    private readonly signal: AbortSignal
  ) {
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? (() => new Date());
  }

  async syncPullRequest(summary: PullRequestSummary): Promise<PullRequestOutcome> {
    const { repository, store } = this.options;
    const key: PullRequestKey = { repository, prNumber: summary.number };
    const checkpoint = await store.load(repository, summary.number);
    const refresh = this.shouldRefresh(summary);

    if (checkpoint?.frozen && !refresh) {
      this.logger.info(`${repository}#${summary.number}: frozen, skipping fetch`);
      return { record: checkpoint.record, reused: true };
    }

    // A refresh only resets where fetching starts; what is already known is kept.
    const existing = checkpoint?.record ?? null;
    const sinceCursor = refresh ? undefined : checkpoint?.cursor;

    let record: ReconciledPR;
    let cursor: SyncCursor;
    let partial: boolean;

    try {
      const collected = await this.options.collector.collect(repository, summary.number, sinceCursor, this.signal);
      const reconciled = reconcile(existing, collected.events, key, { author: summary.author });
      cursor = collected.cursor;
      partial = collected.partial;
      record = {
        ...reconciled,
        syncCursor: cursor,
        syncStatus: partial ? "partial" : "complete",
        failures: collected.failures,
        syncedAt: this.now().toISOString()
      };
    } catch (error: unknown) {
      if (error instanceof AuthenticationError) {
        throw error;
      }
      cursor = checkpoint?.cursor ?? {};
      partial = true;
      record = {
        ...(existing ?? createEmptyRecord(key)),
        syncCursor: cursor,
        syncStatus: error instanceof NotFoundError ? "skipped" : "partial",
        failures: [describeError(error)],
        syncedAt: this.now().toISOString()
      };
      this.logger.error(`${repository}#${summary.number}: ${record.syncStatus}: ${describeError(error)}`);
    }

    try {
      await store.save(repository, summary.number, record, cursor, { partial });
    } catch (error: unknown) {
      this.logger.error(`${repository}#${summary.number}: checkpoint not saved: ${describeError(error)}`);
      record = {
        ...record,
        syncStatus: record.syncStatus === "skipped" ? "skipped" : "partial",
        failures: [...record.failures, `checkpoint not saved: ${describeError(error)}`]
      };
    }

    for (const warning of record.warnings) {
      this.logger.warn(`Data quality: ${warning.message}`);
    }
    if (record.syncStatus === "partial") {
      this.logger.warn(`${repository}#${summary.number}: partial (${record.failures.join("; ")})`);
    }

    return { record, reused: false };
  }

  private shouldRefresh(summary: PullRequestSummary): boolean {
    if (this.options.force) {
      return true;
    }
    const since = this.options.refreshSince;
    return since !== undefined && isOnOrAfter(summary.updatedAt, since);
  }
}

/**
 * Lists the repository's pull requests, then fetches, reconciles and
 * checkpoints each one in a bounded worker pool.
 */
export async function syncRepository(options: SyncOptions): Promise<SyncReport> {
  const logger = options.logger ?? silentLogger;
  const now = options.now ?? (() => new Date());
  const startedAt = now().toISOString();

  const controller = new AbortController();
  const onAbort = () => controller.abort();
  if (options.signal?.aborted) {
    controller.abort();
  }
  options.signal?.addEventListener("abort", onAbort, { once: true });

  const records: ReconciledPR[] = [];
  const counts: SyncCounts = { complete: 0, partial: 0, skipped: 0, frozen: 0 };
  const sync = new RepositorySync(options, controller.signal);

  try {
    const listing = await options.collector.listPullRequests(
      options.repository,
      options.filters ?? {},
      controller.signal
    );
    logger.info(`${options.repository}: ${listing.pullRequests.length} pull requests after filtering`);
    if (listing.partial) {
      logger.warn(`${options.repository}: pull request list is incomplete (${listing.failures.join("; ")})`);
    }

    await runWithConcurrency(
      listing.pullRequests,
      options.concurrency ?? DEFAULT_CONCURRENCY,
      async (summary) => {
        let outcome: PullRequestOutcome;
        try {
          outcome = await sync.syncPullRequest(summary);
        } catch (error: unknown) {
          controller.abort();
          throw error;
        }

        records.push(outcome.record);
        if (outcome.reused) {
          counts.frozen += 1;
        }
        counts[outcome.record.syncStatus] += 1;
        await options.onRecord?.(outcome.record);
      },
      controller.signal
    );

    return {
      repository: options.repository,
      startedAt,
      finishedAt: now().toISOString(),
      records: records.sort((a, b) => a.prNumber - b.prNumber),
      counts,
      listingPartial: listing.partial,
      cancelled: options.signal?.aborted ?? false
    };
  } finally {
    options.signal?.removeEventListener("abort", onAbort);
  }
}
