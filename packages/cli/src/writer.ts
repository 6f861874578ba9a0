import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import type { OutputFormat } from "./config.js";

export interface WriteExportOptions {
  cwd: string;
  outputDir: string;
  repository: string;
  format: OutputFormat;
  date: string;
  content: string;
}

function sanitizeForFileName(value: string): string {
  return value.replace(/[^a-zA-Z0-9_-]/g, "-");
}

export async function writeExportFiles(
  options: WriteExportOptions
): Promise<{ datedFile: string; latestFile: string }> {
  const repoDir = path.join(options.cwd, options.outputDir, sanitizeForFileName(options.repository));
  const datedFile = path.join(repoDir, `${sanitizeForFileName(options.date)}.${options.format}`);
  const latestFile = path.join(repoDir, `latest.${options.format}`);

  await mkdir(repoDir, { recursive: true });
  await writeFile(datedFile, options.content, "utf-8");
  await writeFile(latestFile, options.content, "utf-8");

  return { datedFile, latestFile };
}
