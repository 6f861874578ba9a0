import { mkdir, open, readFile, rename, rm, type FileHandle } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { silentLogger, type Logger } from "./logger.js";
import { isTerminal } from "./reconciler.js";
import type { ReconciledPR, SyncCursor } from "./types.js";

export interface Checkpoint {
  record: ReconciledPR;
  cursor: SyncCursor;
  partial: boolean;
  frozen: boolean;
  savedAt: string;
}

export interface SaveCheckpointOptions {
  partial: boolean;
}

export interface CheckpointStore {
  load(repository: string, prNumber: number): Promise<Checkpoint | null>;
  save(
    repository: string,
    prNumber: number,
    record: ReconciledPR,
    cursor: SyncCursor,
    options: SaveCheckpointOptions
  ): Promise<Checkpoint>;
}

const nullableString = z.string().nullable();
const pageCursorSchema = z.object({ page: z.number().int().positive() });

const syncCursorSchema = z.object({
  reviews: pageCursorSchema.optional(),
  issue_comments: pageCursorSchema.optional(),
  review_comments: pageCursorSchema.optional(),
  timeline: pageCursorSchema.optional(),
  commits: pageCursorSchema.optional()
});

const reconciledSchema = z.object({
  repository: z.string(),
  prNumber: z.number().int(),
  meta: z
    .object({
      title: z.string(),
      author: nullableString,
      state: z.enum(["open", "closed"]),
      createdAt: z.string(),
      closedAt: nullableString,
      draft: z.boolean(),
      baseBranch: nullableString,
      labels: z.array(z.string())
    })
    .nullable(),
  requestToReviewAt: nullableString,
  approvedAt: nullableString,
  reviewGivenAt: nullableString,
  comments: z.array(
    z.object({
      timestamp: z.string(),
      kind: z.enum(["issue_comment", "review_comment"]),
      actor: nullableString,
      commentId: z.string()
    })
  ),
  updates: z.array(z.string()),
  mergedAt: nullableString,
  isClosedUnmerged: z.boolean(),
  reviewRequestSignals: z.object({
    readyForReviewAt: nullableString,
    openedReadyAt: nullableString,
    reviewRequestedAt: nullableString,
    convertedToDraftAt: nullableString.default(null)
  }),
  reviewLinks: z
    .object({
      inlineReviewIds: z.array(z.string()),
      unconfirmedReviews: z.array(z.object({ reviewId: z.string(), timestamp: z.string() }))
    })
    .default({ inlineReviewIds: [], unconfirmedReviews: [] }),
  stateObservedAt: nullableString,
  syncCursor: syncCursorSchema,
  syncStatus: z.enum(["complete", "partial", "skipped"]),
  warnings: z.array(
    z.object({
      code: z.literal("approval_before_review_request"),
      message: z.string()
    })
  ),
  failures: z.array(z.string()),
  syncedAt: nullableString
});

const checkpointSchema = z.object({
  version: z.literal(1),
  record: reconciledSchema,
  cursor: syncCursorSchema,
  partial: z.boolean(),
  frozen: z.boolean(),
  savedAt: z.string()
});

function buildCheckpoint(
  record: ReconciledPR,
  cursor: SyncCursor,
  options: SaveCheckpointOptions,
  savedAt: string
): Checkpoint {
  return {
    record,
    cursor,
    partial: options.partial,
    frozen: isTerminal(record) && !options.partial,
    savedAt
  };
}

/** Runs tasks one at a time per key; different keys proceed concurrently. */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  async run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await task();
    } finally {
      release();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }
}

export async function withFileHandle<T>(
  filePath: string,
  flags: string,
  use: (handle: FileHandle) => Promise<T>
): Promise<T> {
  const handle = await open(filePath, flags);
  try {
    return await use(handle);
  } finally {
    await handle.close();
  }
}

export interface FileCheckpointStoreOptions {
  now?: () => Date;
  logger?: Logger;
}

function safeSegment(value: string): string {
  return value.replace(/[^a-zA-Z0-9._-]/g, "-");
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export class FileCheckpointStore implements CheckpointStore {
  private readonly mutex = new KeyedMutex();
  private readonly now: () => Date;
  private readonly logger: Logger;

  constructor(
    readonly directory: string,
    options: FileCheckpointStoreOptions = {}
  ) {
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? silentLogger;
  }

  filePath(repository: string, prNumber: number): string {
    const [owner = "", repo = ""] = repository.split("/");
    return path.join(this.directory, safeSegment(owner), safeSegment(repo), `${prNumber}.json`);
  }

  async load(repository: string, prNumber: number): Promise<Checkpoint | null> {
    const filePath = this.filePath(repository, prNumber);
    return this.mutex.run(filePath, async () => {
      let raw: string;
      try {
        raw = await readFile(filePath, "utf-8");
      } catch (error: unknown) {
        if (isMissingFile(error)) {
          return null;
        }
        throw error;
      }

      let parsed: unknown;
      try {
        parsed = JSON.parse(raw);
      } catch (error: unknown) {
        this.logger.warn(`Ignoring unreadable checkpoint ${filePath}: ${String(error)}`);
        return null;
      }

      const result = checkpointSchema.safeParse(parsed);
      if (!result.success) {
        this.logger.warn(`Ignoring invalid checkpoint ${filePath}: ${result.error.issues[0]?.message ?? "schema mismatch"}`);
        return null;
      }

      const { version: _version, ...checkpoint } = result.data;
      return checkpoint;
    });
  }

  async save(
    repository: string,
    prNumber: number,
    record: ReconciledPR,
    cursor: SyncCursor,
    options: SaveCheckpointOptions
  ): Promise<Checkpoint> {
    const filePath = this.filePath(repository, prNumber);
    const checkpoint = buildCheckpoint(record, cursor, options, this.now().toISOString());

    return this.mutex.run(filePath, async () => {
      await mkdir(path.dirname(filePath), { recursive: true });
      const tempPath = `${filePath}.tmp`;
      const content = `${JSON.stringify({ version: 1, ...checkpoint }, null, 2)}\n`;

      try {
        await withFileHandle(tempPath, "w", async (handle) => {
          await handle.writeFile(content, "utf-8");
          await handle.sync();
        });
        await rename(tempPath, filePath);
      } catch (error: unknown) {
        await rm(tempPath, { force: true });
        throw error;
      }

      return checkpoint;
    });
  }
}

export class InMemoryCheckpointStore implements CheckpointStore {
  private readonly entries = new Map<string, Checkpoint>();

  constructor(private readonly now: () => Date = () => new Date()) {}

  async load(repository: string, prNumber: number): Promise<Checkpoint | null> {
    const entry = this.entries.get(`${repository}#${prNumber}`);
    return entry ? structuredClone(entry) : null;
  }

  async save(
    repository: string,
    prNumber: number,
    record: ReconciledPR,
    cursor: SyncCursor,
    options: SaveCheckpointOptions
  ): Promise<Checkpoint> {
    const checkpoint = buildCheckpoint(record, cursor, options, this.now().toISOString());
    this.entries.set(`${repository}#${prNumber}`, structuredClone(checkpoint));
    return checkpoint;
  }
}
