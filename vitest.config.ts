import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    projects: [
      "packages/types",
      "packages/ledger",
      "packages/access",
      "packages/service",
    ],
  },
});
