import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";

const domainEntry = fileURLToPath(new URL("./packages/domain/src/index.ts", import.meta.url));

export default defineConfig({
  resolve: {
    preserveSymlinks: true,
    alias: {
      "@wattplan/domain": domainEntry,
    },
  },
  test: {
    include: ["backend/test/**/*.spec.ts"],
    pool: "forks",
    globals: true,
    env: {
      NODE_ENV: "test",
      WATTPLAN_STORAGE_PATH: ":memory:",
    },
  },
});
