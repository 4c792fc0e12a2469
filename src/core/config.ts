import { config as dotenvConfig } from "dotenv";
import { z } from "zod";

dotenvConfig();

const envSchema = z.object({
  LOG_LEVEL: z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]).default("info"),
  LOG_PRETTY: z.string().default("true").transform((v) => v === "true"),
  LOG_FILE: z.string().optional(),
  PLAYWRIGHT_HEADLESS: z.string().default("true").transform((v) => v === "true"),
  PLAYWRIGHT_SLOW_MO: z.coerce.number().default(0),
  PLAYWRIGHT_CHANNEL: z.string().optional(),
  PLAYWRIGHT_EXECUTABLE_PATH: z.string().optional(),
  LINKEDIN_SESSION_STATE_PATH: z.string().default("./data/session/linkedin.json"),
  LINKEDIN_PROFILE_DIR: z.string().optional(),
  NAVIGATION_TIMEOUT_MS: z.coerce.number().default(20000),
  NAVIGATION_MAX_ATTEMPTS: z.coerce.number().default(3),
  SCRAPER_ACTION_DELAY_MIN_MS: z.coerce.number().default(600),
  SCRAPER_ACTION_DELAY_MAX_MS: z.coerce.number().default(1800),
  // Run parameters stay raw here; resolveRunOptions validates them so a bad
  // value surfaces as a ConfigError instead of a crash at import time.
  POST_COUNT: z.string().optional(),
  MAX_SCROLL_ATTEMPTS: z.string().optional(),
  SCROLL_SETTLE_MS: z.string().optional(),
  STALL_THRESHOLD: z.string().optional(),
  DATA_DIR: z.string().optional(),
  WRITE_MODE: z.string().optional(),
});

export type Env = z.infer<typeof envSchema>;

export const env = envSchema.parse(process.env);
