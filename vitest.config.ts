import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: [
      "contracts/tests/**/*.test.ts",
      "lifecycle/tests/**/*.test.ts",
      "shell/tests/**/*.test.ts",
    ],
    setupFiles: ["lifecycle/tests/preload-quiet.ts"],
    environment: "node",
    testTimeout: 10_000,
  },
});
