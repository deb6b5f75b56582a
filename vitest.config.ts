import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: [
      "contracts/src/**/*.test.ts",
      "lifecycle/control/src/**/*.test.ts",
      "lifecycle/tests/**/*.test.ts",
    ],
    setupFiles: ["lifecycle/tests/setup-quiet.ts"],
    environment: "node",
    testTimeout: 10_000,
  },
});
