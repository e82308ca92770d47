import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["packages/*/tests/**/*.test.ts"],
    env: {
      // Keep checker output out of the test log unless a test opts in.
      CONNECTIVITY_SILENT: "true",
    },
  },
});
