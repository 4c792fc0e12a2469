import type { PostRecord } from "./models";

function isEmptyValue(value: unknown): boolean {
  if (value === null || value === undefined) return true;
  if (typeof value === "string") return value.length === 0;
  if (Array.isArray(value)) return value.length === 0;
  return false;
}

/**
 * Fill-forward merge of two records with the same postId: the earlier record
 * keeps every field it already has, and its empty fields take the later
 * record's value.
 */
export function mergePostRecords(earlier: PostRecord, later: PostRecord): PostRecord {
  return {
    postId: earlier.postId,
    idSource: earlier.idSource,
    author: isEmptyValue(earlier.author) ? later.author : earlier.author,
    text: isEmptyValue(earlier.text) ? later.text : earlier.text,
    postedAt: isEmptyValue(earlier.postedAt) ? later.postedAt : earlier.postedAt,
    mediaRefs: isEmptyValue(earlier.mediaRefs) ? [...later.mediaRefs] : earlier.mediaRefs,
    extractedAt: earlier.extractedAt,
  };
}

export function recordsDiffer(a: PostRecord, b: PostRecord): boolean {
  return (
    a.author !== b.author ||
    a.text !== b.text ||
    a.postedAt !== b.postedAt ||
    a.mediaRefs.length !== b.mediaRefs.length ||
    a.mediaRefs.some((ref, index) => ref !== b.mediaRefs[index])
  );
}

/**
 * Current run first, in feed order, then historical posts this run did not
 * see. Overlapping ids merge with the historical record as the earlier one.
 */
export function mergeWithHistory(current: readonly PostRecord[], history: readonly PostRecord[]): PostRecord[] {
  const historyById = new Map(history.map((post) => [post.postId, post]));
  const currentIds = new Set(current.map((post) => post.postId));

  const merged = current.map((post) => {
    const previous = historyById.get(post.postId);
    return previous ? mergePostRecords(previous, post) : post;
  });

  for (const previous of history) {
    if (!currentIds.has(previous.postId)) merged.push(previous);
  }

  return merged;
}
