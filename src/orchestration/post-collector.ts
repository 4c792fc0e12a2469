import type { PostRecord } from "../domain/models";
import { mergePostRecords, recordsDiffer } from "../domain/post-merge";

export interface AcceptResult {
  added: number;
  merged: number;
  /** New ids turned away because the target was already reached. */
  ignored: number;
}

/**
 * Accumulates parsed batches for one run. Entries are appended in first-seen
 * order and are never removed or moved.
 */
export class PostCollector {
  private readonly posts = new Map<string, PostRecord>();
  private handedOff = false;

  constructor(private readonly targetCount: number) {}

  get size(): number {
    return this.posts.size;
  }

  get isFull(): boolean {
    return this.posts.size >= this.targetCount;
  }

  accept(batch: readonly PostRecord[]): AcceptResult {
    if (this.handedOff) {
      throw new Error("PostCollector already handed off its collected set");
    }

    const result: AcceptResult = { added: 0, merged: 0, ignored: 0 };

    for (const record of batch) {
      const existing = this.posts.get(record.postId);
      if (existing) {
        const next = mergePostRecords(existing, record);
        if (recordsDiffer(existing, next)) {
          this.posts.set(record.postId, next);
          result.merged++;
        }
        continue;
      }

      if (this.isFull) {
        result.ignored++;
        continue;
      }

      this.posts.set(record.postId, { ...record, mediaRefs: [...record.mediaRefs] });
      result.added++;
    }

    return result;
  }

  snapshot(): readonly PostRecord[] {
    return Array.from(this.posts.values());
  }

  /**
   * Releases the collected set. The collector rejects further batches after
   * this call.
   */
  handOff(): readonly PostRecord[] {
    this.handedOff = true;
    const records = Array.from(this.posts.values(), (record) => {
      Object.freeze(record.mediaRefs);
      return Object.freeze(record);
    });
    return Object.freeze(records);
  }
}
