import { input, select } from "@inquirer/prompts";
import { access, writeFile } from "node:fs/promises";
import path from "node:path";
import {
  CONFIG_FILE_NAME,
  createDefaultConfig,
  isRepoRef,
  prTimelineConfigSchema,
  serializeConfig,
  type OutputFormat
} from "./config.js";

interface SelectOption {
  name: string;
  value: string;
}

export interface PromptAdapter {
  select: (options: { message: string; choices: SelectOption[] }) => Promise<string>;
  input: (options: { message: string; default?: string }) => Promise<string>;
}

export interface InitWizardOptions {
  cwd: string;
  prompts?: PromptAdapter;
  overwrite?: boolean;
}

export interface InitPresetOptions {
  cwd: string;
  repos: string[];
  format?: OutputFormat;
  tokenEnv?: string;
  overwrite?: boolean;
}

export interface InitResult {
  configPath: string;
  repos: string[];
}

function defaultPrompts(): PromptAdapter {
  return {
    select: (options) => select(options),
    input: (options) => input(options)
  };
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
}

async function promptRepos(promptImpl: PromptAdapter): Promise<string[]> {
  const repos: string[] = [];

  while (true) {
    const value = (
      await promptImpl.input({
        message: "Repository (owner/name), press Enter to finish",
        default: ""
      })
    ).trim();

    if (!value) {
      break;
    }

    if (!isRepoRef(value)) {
      throw new Error(`Invalid repo format: ${value}. Expected owner/name.`);
    }

    repos.push(value);
  }

  return repos;
}

async function writeInitialConfig(
  cwd: string,
  values: { repos: string[]; format: OutputFormat; tokenEnv: string },
  overwrite: boolean
): Promise<InitResult> {
  const configPath = path.join(cwd, CONFIG_FILE_NAME);
  if (!overwrite && (await fileExists(configPath))) {
    throw new Error(`${CONFIG_FILE_NAME} already exists. Re-run with --force to overwrite it.`);
  }

  const defaults = createDefaultConfig();
  const config = prTimelineConfigSchema.parse({
    ...defaults,
    repos: values.repos,
    github: { ...defaults.github, tokenEnv: values.tokenEnv },
    output: { ...defaults.output, format: values.format }
  });

  await writeFile(configPath, serializeConfig(config), "utf-8");
  return { configPath, repos: config.repos };
}

export async function runInitWizard(options: InitWizardOptions): Promise<InitResult> {
  const promptImpl = options.prompts ?? defaultPrompts();

  const repos = await promptRepos(promptImpl);
  if (repos.length === 0) {
    throw new Error("At least one repository is required.");
  }

  const formatChoice = await promptImpl.select({
    message: "Export format",
    choices: [
      { name: "JSON", value: "json" },
      { name: "CSV", value: "csv" }
    ]
  });
  const format: OutputFormat = formatChoice === "csv" ? "csv" : "json";

  const tokenEnv = (
    await promptImpl.input({
      message: "Environment variable holding the GitHub token",
      default: "GITHUB_TOKEN"
    })
  ).trim();

  return writeInitialConfig(
    options.cwd,
    { repos, format, tokenEnv: tokenEnv || "GITHUB_TOKEN" },
    options.overwrite ?? false
  );
}

export async function runInitPreset(options: InitPresetOptions): Promise<InitResult> {
  if (options.repos.length === 0) {
    throw new Error("Missing required option: --repo");
  }
  const invalid = options.repos.find((repo) => !isRepoRef(repo));
  if (invalid) {
    throw new Error(`Invalid repo format: ${invalid}. Expected owner/name.`);
  }

  return writeInitialConfig(
    options.cwd,
    {
      repos: options.repos,
      format: options.format ?? "json",
      tokenEnv: options.tokenEnv ?? "GITHUB_TOKEN"
    },
    options.overwrite ?? false
  );
}
