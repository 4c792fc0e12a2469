import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["tests/**/*.test.ts"],
    environment: "node",
    env: {
      LOG_LEVEL: "silent",
      LOG_PRETTY: "false",
      SCRAPER_ACTION_DELAY_MIN_MS: "0",
      SCRAPER_ACTION_DELAY_MAX_MS: "0",
    },
  },
});
