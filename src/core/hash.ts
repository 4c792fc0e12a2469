import crypto from "crypto";
import { normalizeContent, extractMediaFingerprint } from "./normalize";

export const FALLBACK_ID_PREFIX = "hash:";

export function computeContentHash(content: string, mediaUrls: string[] = []): string {
  const normalized = normalizeContent(content);
  const mediaFingerprint = extractMediaFingerprint(mediaUrls);
  const data = mediaFingerprint ? `${normalized}|${mediaFingerprint}` : normalized;
  return crypto.createHash("sha256").update(data).digest("hex");
}

export interface FallbackIdParts {
  author: string;
  text: string;
  /** Absolute calendar day (YYYY-MM-DD) or null when only a relative label exists. */
  day: string | null;
  mediaUrls: string[];
}

/**
 * Identity for posts rendered without a native URN. Lower confidence than a
 * URN: an edit to the text yields a new id.
 */
export function computeFallbackPostId(parts: FallbackIdParts): string {
  const content = [parts.author, parts.text, parts.day ?? ""].join("|");
  return `${FALLBACK_ID_PREFIX}${computeContentHash(content, parts.mediaUrls).slice(0, 24)}`;
}

export function computeDigest(data: string): string {
  return crypto.createHash("sha256").update(data).digest("hex");
}
