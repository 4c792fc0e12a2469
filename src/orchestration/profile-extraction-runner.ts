import { randomUUID } from "crypto";
import type { PaginationSummary, RunContext, RunResult, FlushedWrite } from "../domain/scrape-types";
import type { ProfileReference, RawSnapshot } from "../domain/models";
import type { RunOptions } from "../domain/run-options";
import { createLifecycleLog, type LifecycleLog } from "../core/logger";
import { describeError, PersistenceError } from "../core/errors";
import { withSession, type RenderDriver } from "../platforms/driver";
import { parseFeedSnapshot } from "../platforms/linkedin/parsers";
import { ensureDataDir, PostSink } from "../services/post-sink";
import { FeedPaginator } from "./feed-paginator";
import { PostCollector } from "./post-collector";

export interface RunRequest {
  profile: ProfileReference;
  options: RunOptions;
  signal: AbortSignal;
}

export interface ProfileExtractionRunnerOptions {
  contract: string;
  /** Builds the lifecycle log for a run; defaults to the pino-backed one. */
  createLog?: (bindings: Record<string, unknown>) => LifecycleLog;
}

interface RunState {
  collector: PostCollector;
  sink: PostSink;
  snapshots: number;
}

export class ProfileExtractionRunner<S> {
  constructor(
    private driver: RenderDriver<S>,
    private runnerOptions: ProfileExtractionRunnerOptions
  ) {}

  async run(request: RunRequest): Promise<RunResult> {
    const runId = randomUUID();
    const createLog = this.runnerOptions.createLog ?? createLifecycleLog;
    const context: RunContext = {
      runId,
      profile: request.profile,
      options: request.options,
      log: createLog({ runId, profile: request.profile.handle, platform: this.driver.platform }),
      signal: request.signal,
      startedAt: new Date(),
    };

    const state: RunState = {
      collector: new PostCollector(context.options.postCount),
      sink: new PostSink({
        dataDir: context.options.dataDir,
        writeMode: context.options.writeMode,
        contract: this.runnerOptions.contract,
      }),
      snapshots: 0,
    };

    try {
      await ensureDataDir(context.options.dataDir);

      const summary = await withSession(this.driver, context.profile, async (session) => {
        context.log.log("info", "session opened", { activityUrl: context.profile.activityUrl });
        return this.paginate(session, context, state);
      });

      return await this.complete(summary, context, state);
    } catch (error) {
      return this.fail(error, context, state);
    }
  }

  private paginate(session: S, context: RunContext, state: RunState): Promise<PaginationSummary> {
    const paginator = new FeedPaginator(this.driver, context.log);

    return paginator.run(
      session,
      {
        targetCount: context.options.postCount,
        maxScrollAttempts: context.options.maxScrollAttempts,
        settleDelayMs: context.options.settleDelayMs,
        stallThreshold: context.options.stallThreshold,
        signal: context.signal,
      },
      (snapshot) => this.absorb(snapshot, context, state)
    );
  }

  private absorb(snapshot: RawSnapshot, context: RunContext, state: RunState): number {
    state.snapshots++;

    const parsed = parseFeedSnapshot(snapshot, { profile: context.profile });
    if (parsed.degradation) {
      context.log.log("warn", "snapshot degraded", {
        scroll: snapshot.scroll,
        code: parsed.degradation.code,
        reason: parsed.degradation.message,
      });
    }

    const accepted = state.collector.accept(parsed.records);
    context.log.log("debug", "snapshot parsed", {
      scroll: snapshot.scroll,
      parsed: parsed.records.length,
      skipped: parsed.skipped,
      ...accepted,
    });

    return state.collector.size;
  }

  private async complete(summary: PaginationSummary, context: RunContext, state: RunState): Promise<RunResult> {
    const posts = state.collector.handOff();
    const cancelled = summary.stopReason === "cancelled";
    const targetCount = context.options.postCount;

    if (posts.length < targetCount && !cancelled) {
      context.log.log("warn", "fewer posts found than requested", {
        requested: targetCount,
        found: posts.length,
        stopReason: summary.stopReason,
        scrolls: summary.scrolls,
      });
    }

    const written = await state.sink.write(posts, context.profile);

    if (cancelled) {
      context.log.log("warn", "run cancelled", { collected: posts.length, destination: written.destination });
    }
    context.log.log("info", `run complete: ${written.count} posts written`, {
      destination: written.destination,
      stopReason: summary.stopReason,
      scrolls: summary.scrolls,
      snapshots: summary.snapshots,
      bytes: written.bytes,
      digest: written.digest,
      durationMs: Date.now() - context.startedAt.getTime(),
    });

    return {
      status: "completed",
      runId: context.runId,
      posts,
      targetCount,
      stopReason: summary.stopReason,
      destination: written.destination,
      partial: cancelled,
    };
  }

  private async fail(error: unknown, context: RunContext, state: RunState): Promise<RunResult> {
    const failure = error instanceof Error ? error : new Error(String(error));
    // A failed write is not retried; anything else after a capture flushes.
    const shouldFlush = state.snapshots > 0 && !(failure instanceof PersistenceError);
    const flushed = shouldFlush ? await this.flushPartial(context, state) : null;

    context.log.log("error", "run failed", {
      error: describeError(failure),
      snapshots: state.snapshots,
      flushed,
    });

    return { status: "failed", runId: context.runId, error: failure, flushed };
  }

  /**
   * Writes what was collected before a failure. A second failure here is
   * logged and leaves the original error as the run's outcome.
   */
  private async flushPartial(context: RunContext, state: RunState): Promise<FlushedWrite | null> {
    const posts = state.collector.handOff();
    try {
      const written = await state.sink.write(posts, context.profile);
      return { count: written.count, destination: written.destination };
    } catch (flushError) {
      context.log.log("error", "partial flush failed", { error: describeError(flushError) });
      return null;
    }
  }
}
