import { readFile } from "node:fs/promises";
import path from "node:path";
import { parse, stringify } from "yaml";
import { z } from "zod";

export const CONFIG_FILE_NAME = ".prtimeline.yml";

const repoPattern = /^[^/\s]+\/[^/\s]+$/;

const isoDate = z
  .string()
  .refine((value) => Number.isFinite(Date.parse(value)), "Must be an ISO date or date-time");

const githubSchema = z
  .object({
    tokenEnv: z.string().min(1).default("GITHUB_TOKEN"),
    baseUrl: z.string().url().optional()
  })
  .default({});

const engineSchema = z
  .object({
    concurrency: z.number().int().min(1).max(32).default(5),
    perPage: z.number().int().min(1).max(100).default(100),
    rateLimitSafetyMargin: z.number().int().min(0).default(100),
    maxRetries: z.number().int().min(0).max(20).default(6),
    backoffBaseMs: z.number().int().min(1).default(1_000),
    backoffCapMs: z.number().int().min(1).default(60_000)
  })
  .refine((engine) => engine.backoffCapMs >= engine.backoffBaseMs, {
    message: "backoffCapMs must be at least backoffBaseMs",
    path: ["backoffCapMs"]
  })
  .default({});

const filtersSchema = z
  .object({
    createdFrom: isoDate.optional(),
    createdTo: isoDate.optional(),
    author: z.string().min(1).optional(),
    baseBranch: z.string().min(1).optional(),
    state: z.enum(["all", "open", "closed", "merged"]).default("all"),
    labelsAny: z.array(z.string()).default([])
  })
  .default({});

const cacheSchema = z
  .object({
    enabled: z.boolean().default(true),
    dir: z.string().min(1).default(".prtimeline/checkpoints")
  })
  .default({});

const outputSchema = z
  .object({
    format: z.enum(["json", "csv"]).default("json"),
    dir: z.string().min(1).default("prtimeline")
  })
  .default({});

export const prTimelineConfigSchema = z.object({
  repos: z.array(z.string().regex(repoPattern, "Repo format must be owner/name")).default([]),
  github: githubSchema,
  engine: engineSchema,
  filters: filtersSchema,
  cache: cacheSchema,
  output: outputSchema
});

export type PrTimelineConfig = z.infer<typeof prTimelineConfigSchema>;
export type OutputFormat = PrTimelineConfig["output"]["format"];

export function isRepoRef(value: string): boolean {
  return repoPattern.test(value);
}

export function createDefaultConfig(): PrTimelineConfig {
  return prTimelineConfigSchema.parse({});
}

export function parseConfigString(raw: string): PrTimelineConfig {
  const doc: unknown = parse(raw) ?? {};
  return prTimelineConfigSchema.parse(doc);
}

export async function loadConfig(cwd: string, fileName = CONFIG_FILE_NAME): Promise<PrTimelineConfig> {
  const configPath = path.join(cwd, fileName);
  const raw = await readFile(configPath, "utf-8");
  return parseConfigString(raw);
}

export function serializeConfig(config: PrTimelineConfig): string {
  return stringify(config, {
    lineWidth: 0,
    defaultStringType: "PLAIN"
  });
}

export function formatConfigError(error: unknown): string {
  if (error instanceof z.ZodError) {
    return error.issues
      .map((issue) => {
        const where = issue.path.length > 0 ? issue.path.join(".") : "(root)";
        return `${where}: ${issue.message}`;
      })
      .join("\n");
  }

  if (error instanceof Error) {
    return error.message;
  }

  return String(error);
}
