import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";

const isCI = process.env.CI === "1" || process.env.CI === "true";

export default defineConfig({
  resolve: {
    alias: {
      "striplog-engine": fileURLToPath(new URL("./engine/src/index.ts", import.meta.url)),
      "striplog-ingestion": fileURLToPath(new URL("./ingestion/src/api.ts", import.meta.url)),
    },
  },
  test: {
    globals: true,
    environment: "node",
    include: ["engine/tests/**/*.test.ts", "ingestion/tests/**/*.test.ts"],
    pool: isCI ? "forks" : "threads",
    watch: false,
    testTimeout: isCI ? 30000 : 10000,
  },
});
