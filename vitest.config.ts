import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["sdk/typescript/src/**/*.test.ts"],
    // fast-check properties run a few hundred cases each
    testTimeout: 30000,
  },
});
