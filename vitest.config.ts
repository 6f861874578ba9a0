import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";
import path from "node:path";

const rootDir = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@prtimeline/core": path.join(rootDir, "packages/core/src/index.ts"),
      "@prtimeline/provider-github": path.join(rootDir, "packages/provider-github/src/index.ts"),
      "@prtimeline/renderer-json": path.join(rootDir, "packages/renderer-json/src/index.ts"),
      "@prtimeline/renderer-csv": path.join(rootDir, "packages/renderer-csv/src/index.ts"),
      "@prtimeline/cli": path.join(rootDir, "packages/cli/src/index.ts")
    }
  },
  test: {
    environment: "node",
    include: ["packages/**/test/**/*.test.ts"]
  }
});
