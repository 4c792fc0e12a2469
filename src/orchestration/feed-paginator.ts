import type { RawSnapshot } from "../domain/models";
import type { PaginationSummary } from "../domain/scrape-types";
import type { LifecycleLog } from "../core/logger";
import type { RenderDriver } from "../platforms/driver";

export interface PaginatorOptions {
  targetCount: number;
  maxScrollAttempts: number;
  settleDelayMs: number;
  stallThreshold: number;
  signal: AbortSignal;
}

/** Absorbs one snapshot and returns the collected post count afterwards. */
export type SnapshotConsumer = (snapshot: RawSnapshot) => number;

/**
 * Scrolls the feed until enough posts are collected, the feed stops growing,
 * the attempt ceiling is hit, or the run is aborted. Each snapshot goes to the
 * consumer as soon as it is captured.
 */
export class FeedPaginator<S> {
  constructor(
    private readonly driver: RenderDriver<S>,
    private readonly log: LifecycleLog
  ) {}

  async run(session: S, options: PaginatorOptions, consume: SnapshotConsumer): Promise<PaginationSummary> {
    let snapshots = 0;

    let count = consume(await this.driver.captureSnapshot(session, 0));
    snapshots++;
    this.log.log("debug", "initial snapshot captured", { total: count });

    if (count >= options.targetCount) {
      return { scrolls: 0, snapshots, stopReason: "target_reached" };
    }

    let stalls = 0;

    for (let scroll = 1; scroll <= options.maxScrollAttempts; scroll++) {
      if (options.signal.aborted) {
        return { scrolls: scroll - 1, snapshots, stopReason: "cancelled" };
      }

      const grew = await this.driver.scrollToLoadMore(session, { settleMs: options.settleDelayMs });
      stalls = grew ? 0 : stalls + 1;

      const before = count;
      count = consume(await this.driver.captureSnapshot(session, scroll));
      snapshots++;

      this.log.log("info", `scroll ${scroll}: ${count - before} new posts`, {
        scroll,
        newPosts: count - before,
        total: count,
        grew,
        stalls,
      });

      if (count >= options.targetCount) {
        return { scrolls: scroll, snapshots, stopReason: "target_reached" };
      }
      if (stalls >= options.stallThreshold) {
        return { scrolls: scroll, snapshots, stopReason: "stalled" };
      }
    }

    return { scrolls: options.maxScrollAttempts, snapshots, stopReason: "max_attempts" };
  }
}
