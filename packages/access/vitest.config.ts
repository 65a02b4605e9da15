import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "access",
    include: ["tests/**/*.test.ts"],
  },
});
