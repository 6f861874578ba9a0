import { readFile } from "node:fs/promises";
import path from "node:path";
import {
  AuthenticationError,
  FileCheckpointStore,
  InMemoryCheckpointStore,
  RateLimitGovernor,
  describeError,
  syncRepository,
  type CheckpointStore,
  type Logger,
  type PullRequestFilters,
  type SleepFn,
  type SyncReport
} from "@prtimeline/core";
import {
  GithubEventCollector,
  createGithubApi,
  type GithubApi,
  type GithubApiOptions
} from "@prtimeline/provider-github";
import { renderCsvReport } from "@prtimeline/renderer-csv";
import { renderJsonReport } from "@prtimeline/renderer-json";
import {
  CONFIG_FILE_NAME,
  formatConfigError,
  isRepoRef,
  loadConfig,
  type OutputFormat,
  type PrTimelineConfig
} from "./config.js";
import { runInitPreset, runInitWizard, type PromptAdapter } from "./init.js";
import { writeExportFiles } from "./writer.js";

type CliCommand = "sync" | "validate" | "init" | "help";

export interface CliIO {
  log: (message: string) => void;
  error: (message: string) => void;
}

export interface CliRuntimeOptions {
  prompts?: PromptAdapter;
  io?: CliIO;
  createGithubApi?: (options: GithubApiOptions) => GithubApi;
  sleep?: SleepFn;
  now?: () => Date;
  signal?: AbortSignal;
}

interface ParsedCommand {
  command: CliCommand;
  args: string[];
}

interface SyncArgs {
  repos: string[];
  format?: OutputFormat;
  concurrency?: number;
  since?: string;
  force: boolean;
  noCache: boolean;
  dryRun: boolean;
  verbose: boolean;
}

interface InitArgs {
  yes: boolean;
  force: boolean;
  repos: string[];
  format?: OutputFormat;
  tokenEnv?: string;
}

function defaultIO(): CliIO {
  return {
    log: (message) => console.log(message),
    error: (message) => console.error(message)
  };
}

function parseCommand(argv: string[]): ParsedCommand {
  const command = argv[0] ?? "help";
  const args = argv.slice(1);
  if (command === "sync" || command === "validate" || command === "init") {
    return { command, args };
  }
  return { command: "help", args: [] };
}

function readValue(args: string[], index: number, flag: string): string {
  const value = args[index + 1];
  if (!value || value.startsWith("--")) {
    throw new Error(`Missing value for ${flag}`);
  }
  return value;
}

function parseFormat(value: string): OutputFormat {
  if (value !== "json" && value !== "csv") {
    throw new Error(`Invalid --format value: ${value}`);
  }
  return value;
}

function parseRepo(value: string): string {
  if (!isRepoRef(value)) {
    throw new Error(`Invalid repo format: ${value}. Expected owner/name.`);
  }
  return value;
}

function parseSyncArgs(args: string[]): SyncArgs {
  const result: SyncArgs = { repos: [], force: false, noCache: false, dryRun: false, verbose: false };

  for (let i = 0; i < args.length; i += 1) {
    const arg = args[i];
    switch (arg) {
      case "--repo":
        result.repos.push(parseRepo(readValue(args, i, arg)));
        i += 1;
        break;
      case "--format":
        result.format = parseFormat(readValue(args, i, arg));
        i += 1;
        break;
      case "--concurrency": {
        const value = Number(readValue(args, i, arg));
        if (!Number.isInteger(value) || value < 1) {
          throw new Error(`Invalid --concurrency value: ${args[i + 1]}`);
        }
        result.concurrency = value;
        i += 1;
        break;
      }
      case "--since": {
        const value = readValue(args, i, arg);
        const parsed = Date.parse(value);
        if (!Number.isFinite(parsed)) {
          throw new Error(`Invalid --since value: ${value}`);
        }
        result.since = new Date(parsed).toISOString();
        i += 1;
        break;
      }
      case "--force":
        result.force = true;
        break;
      case "--no-cache":
        result.noCache = true;
        break;
      case "--dry-run":
        result.dryRun = true;
        break;
      case "--verbose":
        result.verbose = true;
        break;
      default:
        throw new Error(`Unknown option: ${arg}`);
    }
  }

  return result;
}

function parseInitArgs(args: string[]): InitArgs {
  const result: InitArgs = { yes: false, force: false, repos: [] };

  for (let i = 0; i < args.length; i += 1) {
    const arg = args[i];
    switch (arg) {
      case "--yes":
        result.yes = true;
        break;
      case "--force":
        result.force = true;
        break;
      case "--repo":
        result.repos.push(parseRepo(readValue(args, i, arg)));
        i += 1;
        break;
      case "--format":
        result.format = parseFormat(readValue(args, i, arg));
        i += 1;
        break;
      case "--token-env":
        result.tokenEnv = readValue(args, i, arg);
        i += 1;
        break;
      default:
        throw new Error(`Unknown option: ${arg}`);
    }
  }

  return result;
}

function readEnvText(raw: string): Record<string, string> {
  const envMap: Record<string, string> = {};
  for (const line of raw.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) {
      continue;
    }
    const eq = trimmed.indexOf("=");
    if (eq <= 0) {
      continue;
    }

    const key = trimmed.slice(0, eq).trim();
    const value = trimmed.slice(eq + 1).trim();
    const unquoted = value.replace(/^"(.*)"$/, "$1").replace(/^'(.*)'$/, "$1");
    envMap[key] = unquoted;
  }
  return envMap;
}

async function loadDotEnv(cwd: string): Promise<Record<string, string>> {
  const envPath = path.join(cwd, ".env");
  try {
    const raw = await readFile(envPath, "utf-8");
    return readEnvText(raw);
  } catch {
    return {};
  }
}

async function loadToken(cwd: string, tokenKey: string): Promise<string | undefined> {
  const envFile = await loadDotEnv(cwd);
  return process.env[tokenKey] ?? envFile[tokenKey];
}

function createIOLogger(io: CliIO, verbose: boolean): Logger {
  return {
    info: (message) => {
      if (verbose) {
        io.log(message);
      }
    },
    warn: (message) => io.error(`Warning: ${message}`),
    error: (message) => io.error(`Error: ${message}`)
  };
}

function toWebBaseUrl(apiBaseUrl: string | undefined): string {
  if (!apiBaseUrl) {
    return "https://github.com";
  }
  const trimmed = apiBaseUrl.replace(/\/+$/, "");
  if (trimmed === "https://api.github.com") {
    return "https://github.com";
  }
  return trimmed.replace(/\/api\/v3$/, "");
}

function toFilters(config: PrTimelineConfig): PullRequestFilters {
  const { createdFrom, createdTo, author, baseBranch, state, labelsAny } = config.filters;
  return {
    ...(createdFrom ? { createdFrom } : {}),
    ...(createdTo ? { createdTo } : {}),
    ...(author ? { author } : {}),
    ...(baseBranch ? { baseBranch } : {}),
    state,
    labelsAny
  };
}

function renderReport(report: SyncReport, format: OutputFormat, config: PrTimelineConfig, generatedAt: Date): string {
  if (format === "csv") {
    return renderCsvReport(report.records);
  }
  return renderJsonReport(report.records, {
    repository: report.repository,
    generatedAt,
    webBaseUrl: toWebBaseUrl(config.github.baseUrl)
  });
}

function formatCounts(report: SyncReport): string {
  const { complete, partial, skipped, frozen } = report.counts;
  return `Stats: pull_requests=${report.records.length}, complete=${complete}, partial=${partial}, skipped=${skipped}, frozen=${frozen}`;
}

async function loadValidatedConfig(cwd: string, io: CliIO): Promise<PrTimelineConfig | null> {
  try {
    return await loadConfig(cwd);
  } catch (error: unknown) {
    io.error(`Cannot load ${CONFIG_FILE_NAME}`);
    io.error(formatConfigError(error));
    return null;
  }
}

async function runSync(cwd: string, io: CliIO, args: string[], runtimeOptions: CliRuntimeOptions): Promise<number> {
  const config = await loadValidatedConfig(cwd, io);
  if (!config) {
    return 1;
  }

  let parsed: SyncArgs;
  try {
    parsed = parseSyncArgs(args);
  } catch (error: unknown) {
    io.error(formatConfigError(error));
    return 1;
  }

  const repos = parsed.repos.length > 0 ? parsed.repos : config.repos;
  if (repos.length === 0) {
    io.error("Configuration error: repos must include at least one owner/repo (or pass --repo).");
    return 1;
  }

  const tokenKey = config.github.tokenEnv;
  const token = await loadToken(cwd, tokenKey);
  if (!token) {
    io.error(`Missing GitHub token. Set ${tokenKey} in environment or .env`);
    return 1;
  }

  const now = runtimeOptions.now ?? (() => new Date());
  const logger = createIOLogger(io, parsed.verbose);
  const format = parsed.format ?? config.output.format;
  const apiOptions: GithubApiOptions = {
    token,
    ...(config.github.baseUrl ? { baseUrl: config.github.baseUrl } : {})
  };
  const api = runtimeOptions.createGithubApi?.(apiOptions) ?? createGithubApi(apiOptions);

  const retry = {
    maxRetries: config.engine.maxRetries,
    backoffBaseMs: config.engine.backoffBaseMs,
    backoffCapMs: config.engine.backoffCapMs
  };
  const governor = new RateLimitGovernor({
    safetyMargin: config.engine.rateLimitSafetyMargin,
    retry,
    logger,
    ...(runtimeOptions.sleep ? { sleep: runtimeOptions.sleep } : {})
  });
  const collector = new GithubEventCollector({
    api,
    governor,
    perPage: config.engine.perPage,
    retry,
    logger,
    ...(runtimeOptions.sleep ? { sleep: runtimeOptions.sleep } : {})
  });
  const store: CheckpointStore =
    config.cache.enabled && !parsed.noCache
      ? new FileCheckpointStore(path.resolve(cwd, config.cache.dir), { now, logger })
      : new InMemoryCheckpointStore(now);

  const controller = new AbortController();
  const onInterrupt = () => {
    io.error("Interrupted, saving progress and stopping.");
    controller.abort();
  };
  const onExternalAbort = () => controller.abort();
  process.once("SIGINT", onInterrupt);
  runtimeOptions.signal?.addEventListener("abort", onExternalAbort, { once: true });
  if (runtimeOptions.signal?.aborted) {
    controller.abort();
  }

  try {
    for (const repository of repos) {
      if (controller.signal.aborted) {
        break;
      }

      const report = await syncRepository({
        repository,
        collector,
        store,
        concurrency: parsed.concurrency ?? config.engine.concurrency,
        filters: toFilters(config),
        force: parsed.force,
        ...(parsed.since ? { refreshSince: parsed.since } : {}),
        signal: controller.signal,
        logger,
        now
      });

      const generatedAt = now();
      const content = renderReport(report, format, config, generatedAt);
      if (parsed.dryRun) {
        io.log(content.trimEnd());
      } else {
        const files = await writeExportFiles({
          cwd,
          outputDir: config.output.dir,
          repository,
          format,
          date: generatedAt.toISOString().slice(0, 10),
          content
        });
        io.log(`Created ${files.datedFile}`);
        io.log(`Updated ${files.latestFile}`);
      }
      io.log(`${repository} ${formatCounts(report)}`);
      if (report.listingPartial) {
        io.error(`Warning: ${repository} pull request list is incomplete; rerun to fill the gaps.`);
      }
      if (report.cancelled) {
        io.error("Sync cancelled; partial results were saved.");
      }
    }
    return 0;
  } catch (error: unknown) {
    if (error instanceof AuthenticationError) {
      io.error(`GitHub rejected the token. Check the value of ${tokenKey}.`);
    }
    io.error(describeError(error));
    return 1;
  } finally {
    process.removeListener("SIGINT", onInterrupt);
    runtimeOptions.signal?.removeEventListener("abort", onExternalAbort);
  }
}

async function runValidate(cwd: string, io: CliIO): Promise<number> {
  try {
    const config = await loadConfig(cwd);
    if (config.repos.length === 0) {
      io.error("Config validation failed.");
      io.error("repos must include at least one owner/repo.");
      return 1;
    }

    const tokenKey = config.github.tokenEnv;
    const token = await loadToken(cwd, tokenKey);
    if (!token) {
      io.error("Config validation failed.");
      io.error(`Missing token value for ${tokenKey} in environment or .env.`);
      return 1;
    }

    io.log("Config is valid.");
    io.log(`Tracked repos: ${config.repos.length}`);
    io.log(`Output: ${config.output.format} -> ${config.output.dir}`);
    return 0;
  } catch (error: unknown) {
    io.error("Config validation failed.");
    io.error(formatConfigError(error));
    return 1;
  }
}

async function runInit(cwd: string, io: CliIO, args: string[], runtimeOptions: CliRuntimeOptions): Promise<number> {
  try {
    const parsed = parseInitArgs(args);
    const result = parsed.yes
      ? await runInitPreset({
          cwd,
          repos: parsed.repos,
          overwrite: parsed.force,
          ...(parsed.format ? { format: parsed.format } : {}),
          ...(parsed.tokenEnv ? { tokenEnv: parsed.tokenEnv } : {})
        })
      : await runInitWizard({
          cwd,
          overwrite: parsed.force,
          ...(runtimeOptions.prompts ? { prompts: runtimeOptions.prompts } : {})
        });

    io.log(`Created ${result.configPath}`);
    io.log(`Tracked repos: ${result.repos.length}`);
    io.log("Next: run `prtimeline validate`, then `prtimeline sync`.");
    return 0;
  } catch (error: unknown) {
    io.error("Init failed.");
    io.error(formatConfigError(error));
    return 1;
  }
}

function printHelp(io: CliIO): void {
  io.log("prtimeline CLI");
  io.log("Usage: prtimeline <sync|validate|init>");
  io.log("Commands:");
  io.log(`  init      create ${CONFIG_FILE_NAME} interactively or with --yes`);
  io.log(`  validate  validate ${CONFIG_FILE_NAME} and token availability`);
  io.log("  sync      fetch pull request activity and export reconciled timelines");
  io.log("Sync options:");
  io.log("  --repo <owner/repo> repeatable; overrides repos from config");
  io.log("  --format <json|csv>");
  io.log("  --concurrency <n>   pull requests processed in parallel");
  io.log("  --since <ISO>       refetch PRs updated at or after this instant");
  io.log("  --force             refetch every PR from the first page, frozen ones included");
  io.log("  --no-cache          keep checkpoints in memory only");
  io.log("  --dry-run           print the export to stdout without writing files");
  io.log("  --verbose           log progress and rate-limit waits");
  io.log("Init options:");
  io.log("  --yes               non-interactive mode (requires --repo)");
  io.log("  --repo <owner/repo> repeatable");
  io.log("  --format <json|csv>");
  io.log("  --token-env <NAME>  environment variable holding the token");
  io.log("  --force             overwrite an existing config file");
  io.log("Example:");
  io.log("  prtimeline init --yes --repo owner/repo && prtimeline sync --dry-run");
}

export async function runCli(
  argv: string[],
  cwd = process.cwd(),
  runtimeOptions: CliRuntimeOptions = {}
): Promise<number> {
  const io = runtimeOptions.io ?? defaultIO();
  const parsed = parseCommand(argv);

  switch (parsed.command) {
    case "sync":
      return runSync(cwd, io, parsed.args, runtimeOptions);
    case "validate":
      return runValidate(cwd, io);
    case "init":
      return runInit(cwd, io, parsed.args, runtimeOptions);
    default:
      printHelp(io);
      return 0;
  }
}
