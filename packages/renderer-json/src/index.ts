import type { ReconciledPR } from "@prtimeline/core";

export interface JsonPullRequestEntry extends ReconciledPR {
  total_comments: number;
  total_updates: number;
}

export interface JsonReport {
  repository: {
    name: string;
    owner: string;
    url: string;
  };
  generated_at: string;
  pull_requests: JsonPullRequestEntry[];
}

export interface JsonRendererOptions {
  repository: string;
  generatedAt?: Date;
  webBaseUrl?: string;
  indent?: number;
}

export function buildJsonReport(records: ReconciledPR[], options: JsonRendererOptions): JsonReport {
  const [owner = "", name = ""] = options.repository.split("/");
  const webBaseUrl = (options.webBaseUrl ?? "https://github.com").replace(/\/+$/, "");

  return {
    repository: {
      name,
      owner,
      url: `${webBaseUrl}/${owner}/${name}`
    },
    generated_at: (options.generatedAt ?? new Date()).toISOString(),
    pull_requests: [...records]
      .sort((a, b) => a.prNumber - b.prNumber)
      .map((record) => ({
        ...record,
        total_comments: record.comments.length,
        total_updates: record.updates.length
      }))
  };
}

export function renderJsonReport(records: ReconciledPR[], options: JsonRendererOptions): string {
  return `${JSON.stringify(buildJsonReport(records, options), null, options.indent ?? 2)}\n`;
}
