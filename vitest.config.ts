import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["domain/**/*.test.ts", "server/**/*.test.ts"],
    globals: false,
    testTimeout: 10_000,
  },
});
