// vitest.config.ts
// Configuration for vitest test runner

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["test/**/*.test.ts"],
    pool: "threads",
  },
});
