import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts"],
    // zeromq and node:inspector both want a real process, not a worker thread
    pool: "forks",
    testTimeout: 20_000,
    env: {
      EGRESS_LOG_LEVEL: "silent",
    },
  },
});
