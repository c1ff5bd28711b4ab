import { defineConfig } from "vitest/config";
import { fileURLToPath } from "url";

const isCI = process.env.CI === "1" || process.env.CI === "true";

export default defineConfig({
  resolve: {
    alias: {
      "geonav-engine": fileURLToPath(new URL("./engine/src/index.ts", import.meta.url)),
      "geonav-ingestion": fileURLToPath(new URL("./ingestion/src/index.ts", import.meta.url)),
    },
  },
  test: {
    environment: "node",
    include: ["engine/tests/**/*.test.ts", "ingestion/tests/**/*.test.ts"],
    watch: false,
    testTimeout: isCI ? 30000 : 10000,
    hookTimeout: isCI ? 30000 : 10000,
  },
});
