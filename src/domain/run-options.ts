import { z } from "zod";
import type { Env } from "../core/config";
import { ConfigError } from "../core/errors";
import { WriteModeSchema } from "./models";

export const RunOptionsSchema = z.object({
  postCount: z.coerce.number().int().min(1).max(500),
  maxScrollAttempts: z.coerce.number().int().min(1).max(200),
  settleDelayMs: z.coerce.number().int().min(0).max(60000),
  stallThreshold: z.coerce.number().int().min(1).max(20),
  dataDir: z.string().trim().min(1),
  writeMode: WriteModeSchema,
});

export type RunOptions = z.infer<typeof RunOptionsSchema>;

export type RunOptionsInput = {
  [K in keyof RunOptions]?: string | number;
};

export type RunOptionsEnv = Pick<
  Env,
  "POST_COUNT" | "MAX_SCROLL_ATTEMPTS" | "SCROLL_SETTLE_MS" | "STALL_THRESHOLD" | "DATA_DIR" | "WRITE_MODE"
>;

export const DEFAULT_RUN_OPTIONS: RunOptions = {
  postCount: 10,
  maxScrollAttempts: 15,
  settleDelayMs: 1500,
  stallThreshold: 2,
  dataDir: "./data/posts",
  writeMode: "replace",
};

function firstSet<T>(...values: Array<T | "" | undefined>): T | undefined {
  for (const value of values) {
    if (value !== undefined && value !== "") return value;
  }
  return undefined;
}

/**
 * CLI flags win over environment values, which win over defaults.
 */
export function resolveRunOptions(cli: RunOptionsInput, source: RunOptionsEnv): RunOptions {
  const merged = {
    postCount: firstSet(cli.postCount, source.POST_COUNT) ?? DEFAULT_RUN_OPTIONS.postCount,
    maxScrollAttempts: firstSet(cli.maxScrollAttempts, source.MAX_SCROLL_ATTEMPTS) ?? DEFAULT_RUN_OPTIONS.maxScrollAttempts,
    settleDelayMs: firstSet(cli.settleDelayMs, source.SCROLL_SETTLE_MS) ?? DEFAULT_RUN_OPTIONS.settleDelayMs,
    stallThreshold: firstSet(cli.stallThreshold, source.STALL_THRESHOLD) ?? DEFAULT_RUN_OPTIONS.stallThreshold,
    dataDir: firstSet(cli.dataDir, source.DATA_DIR) ?? DEFAULT_RUN_OPTIONS.dataDir,
    writeMode: firstSet(cli.writeMode, source.WRITE_MODE) ?? DEFAULT_RUN_OPTIONS.writeMode,
  };

  const parsed = RunOptionsSchema.safeParse(merged);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new ConfigError(`Invalid run options: ${details}`);
  }

  return parsed.data;
}

/** Resolves only the data directory, for commands that never scrape. */
export function resolveDataDir(cliDataDir: string | undefined, source: Pick<Env, "DATA_DIR">): string {
  const parsed = RunOptionsSchema.shape.dataDir.safeParse(firstSet(cliDataDir, source.DATA_DIR) ?? DEFAULT_RUN_OPTIONS.dataDir);
  if (!parsed.success) {
    throw new ConfigError(`Invalid run options: dataDir: ${parsed.error.issues.map((issue) => issue.message).join("; ")}`);
  }
  return parsed.data;
}
