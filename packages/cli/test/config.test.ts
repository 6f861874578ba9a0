import { describe, expect, it } from "vitest";
import { createDefaultConfig, formatConfigError, parseConfigString, serializeConfig } from "../src/config.js";

describe("config", () => {
  it("applies defaults for empty yaml", () => {
    const config = parseConfigString("");
    expect(config.repos).toEqual([]);
    expect(config.github.tokenEnv).toBe("GITHUB_TOKEN");
    expect(config.engine).toEqual({
      concurrency: 5,
      perPage: 100,
      rateLimitSafetyMargin: 100,
      maxRetries: 6,
      backoffBaseMs: 1_000,
      backoffCapMs: 60_000
    });
    expect(config.filters.state).toBe("all");
    expect(config.filters.labelsAny).toEqual([]);
    expect(config.cache).toEqual({ enabled: true, dir: ".prtimeline/checkpoints" });
    expect(config.output).toEqual({ format: "json", dir: "prtimeline" });
  });

  it("reads overrides", () => {
    const config = parseConfigString(`
repos:
  - acme/widgets
github:
  tokenEnv: PRT_TOKEN
  baseUrl: https://github.example.com/api/v3
engine:
  concurrency: 2
filters:
  createdFrom: 2024-01-01
  state: merged
  labelsAny: [feature]
output:
  format: csv
`);

    expect(config.repos).toEqual(["acme/widgets"]);
    expect(config.github).toEqual({ tokenEnv: "PRT_TOKEN", baseUrl: "https://github.example.com/api/v3" });
    expect(config.engine.concurrency).toBe(2);
    expect(config.engine.perPage).toBe(100);
    expect(config.filters).toEqual({ createdFrom: "2024-01-01", state: "merged", labelsAny: ["feature"] });
    expect(config.output.format).toBe("csv");
  });

  it("rejects invalid repo format", () => {
    expect(() =>
      parseConfigString(`
repos:
  - invalid-repo
`)
    ).toThrowError(/Repo format must be owner\/name/);
  });

  it("formats validation issues with their path", () => {
    let message = "";
    try {
      parseConfigString("engine:\n  backoffBaseMs: 5000\n  backoffCapMs: 1000\n");
    } catch (error: unknown) {
      message = formatConfigError(error);
    }

    expect(message).toBe("engine.backoffCapMs: backoffCapMs must be at least backoffBaseMs");
  });

  it("round-trips through yaml", () => {
    const config = { ...createDefaultConfig(), repos: ["acme/widgets"] };
    expect(parseConfigString(serializeConfig(config))).toEqual(config);
  });
});
