import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: [
      "protocol/tests/**/*.test.ts",
      "controller/tests/**/*.test.ts",
      "cli/tests/**/*.test.{ts,tsx}",
    ],
    testTimeout: 15_000,
  },
});
