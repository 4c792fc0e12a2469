import type { LifecycleLog } from "../core/logger";
import type { PostRecord, ProfileReference, StopReason } from "./models";
import type { RunOptions } from "./run-options";

/**
 * Everything one extraction run needs, passed explicitly from the runner to
 * each pipeline stage.
 */
export interface RunContext {
  runId: string;
  profile: ProfileReference;
  options: RunOptions;
  log: LifecycleLog;
  signal: AbortSignal;
  startedAt: Date;
}

export interface ScrollOptions {
  settleMs: number;
}

export interface PaginationSummary {
  scrolls: number;
  snapshots: number;
  stopReason: StopReason;
}

export interface FlushedWrite {
  count: number;
  destination: string;
}

export type RunResult =
  | {
      status: "completed";
      runId: string;
      posts: readonly PostRecord[];
      targetCount: number;
      stopReason: StopReason;
      destination: string;
      /** True when the run was cancelled before its natural end. */
      partial: boolean;
    }
  | {
      status: "failed";
      runId: string;
      error: Error;
      flushed: FlushedWrite | null;
    };
