import * as cheerio from "cheerio";
import type { Cheerio, CheerioAPI } from "cheerio";
import type { Element } from "domhandler";
import type { PostRecord, ProfileReference, RawSnapshot } from "../../domain/models";
import { ParseDegradation } from "../../core/errors";
import { computeFallbackPostId } from "../../core/hash";
import { mediaKey, normalizeUrl } from "../../core/normalize";
import { LINKEDIN_SELECTORS, URN_PATTERN } from "./selectors";

export interface ParseContext {
  profile: ProfileReference;
}

export interface SnapshotParseResult {
  records: PostRecord[];
  /** Containers found but dropped because they carried no usable identity. */
  skipped: number;
  degradation: ParseDegradation | null;
}

const LINE_BREAK = "\uE000";
const TRUNCATION_SUFFIX = /\s*(?:…|\.\.\.)\s*(?:see more|more)$/i;
const RELATIVE_TIME = /^\d+\s*(?:s|m|h|d|w|mo|yr|y)$/i;

// Activity ids carry their creation time (ms since epoch) above the low 22 bits.
const EARLIEST_PLAUSIBLE_MS = Date.UTC(2003, 0, 1);

export function timestampFromUrn(urn: string, now: Date = new Date()): string | null {
  const match = urn.match(/:(\d{15,})$/);
  if (!match || !match[1]) return null;

  const ms = Number(BigInt(match[1]) >> 22n);
  if (ms < EARLIEST_PLAUSIBLE_MS || ms > now.getTime() + 86_400_000) return null;

  return new Date(ms).toISOString();
}

function outermostContainers($: CheerioAPI): Element[] {
  const all = $<Element, string>(LINKEDIN_SELECTORS.FEED.POST_CONTAINER).toArray();
  const members = new Set(all);
  return all.filter((node) => !$(node).parents().toArray().some((parent) => members.has(parent)));
}

function nativeUrn($post: Cheerio<Element>): string | null {
  for (const attribute of LINKEDIN_SELECTORS.POST.URN_ATTRIBUTES) {
    const match = $post.attr(attribute)?.match(URN_PATTERN);
    if (match) return match[0];
  }

  const permalink = $post.find(LINKEDIN_SELECTORS.POST.PERMALINK).first().attr("href");
  const match = permalink ? decodeSafely(permalink).match(URN_PATTERN) : null;
  return match ? match[0] : null;
}

function decodeSafely(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}

function actorHandle($post: Cheerio<Element>): string | null {
  const $actor = $post.find(LINKEDIN_SELECTORS.POST.ACTOR).first();
  const href =
    $post.find(LINKEDIN_SELECTORS.POST.ACTOR_LINK).first().attr("href") ??
    $actor.find('a[href*="/in/"], a[href*="/company/"]').first().attr("href");
  if (!href) return null;

  const member = href.match(/\/in\/([^/?#]+)/);
  if (member && member[1]) return decodeSafely(member[1]).toLowerCase();

  const company = href.match(/\/company\/([^/?#]+)/);
  if (company && company[1]) return `company:${decodeSafely(company[1]).toLowerCase()}`;

  return null;
}

function postText($post: Cheerio<Element>): string {
  const $text = $post.find(LINKEDIN_SELECTORS.POST.TEXT).first();
  if ($text.length === 0) return "";

  const $clone = $text.clone();
  $clone.find(LINKEDIN_SELECTORS.POST.TEXT_NOISE).remove();
  $clone.find("br").replaceWith(LINE_BREAK);

  return $clone
    .text()
    .replace(/[\u200B-\u200D\uFEFF]/g, "")
    .replace(/\s+/g, " ")
    .replace(new RegExp(` ?${LINE_BREAK} ?`, "g"), "\n")
    .replace(/\n{3,}/g, "\n\n")
    .trim()
    .replace(TRUNCATION_SUFFIX, "");
}

function relativeLabel($post: Cheerio<Element>): string | null {
  const $sub = $post.find(LINKEDIN_SELECTORS.POST.SUB_DESCRIPTION).first();
  if ($sub.length === 0) return null;

  const $visible = $sub.find('span[aria-hidden="true"]').first();
  const raw = ($visible.length > 0 ? $visible : $sub).text();
  const first = raw
    .split("•")
    .map((part) => part.replace(/\s+/g, " ").trim())
    .find((part) => part.length > 0);

  if (!first) return null;
  if (RELATIVE_TIME.test(first)) return first.replace(/\s+/g, "");
  return first.length <= 32 ? first : null;
}

function postedAt($post: Cheerio<Element>, urn: string | null, capturedAt: Date): string | null {
  const datetime = $post.find(LINKEDIN_SELECTORS.POST.TIME).first().attr("datetime");
  if (datetime && !Number.isNaN(Date.parse(datetime))) {
    return new Date(datetime).toISOString();
  }

  const fromUrn = urn ? timestampFromUrn(urn, capturedAt) : null;
  return fromUrn ?? relativeLabel($post);
}

function absoluteDay(value: string | null): string | null {
  if (!value || RELATIVE_TIME.test(value)) return null;
  const parsed = Date.parse(value);
  return Number.isNaN(parsed) ? null : new Date(parsed).toISOString().slice(0, 10);
}

function mediaRefs($: CheerioAPI, $post: Cheerio<Element>): string[] {
  const refs: string[] = [];
  const seen = new Set<string>();

  const push = (candidate: string | undefined): void => {
    if (!candidate || /^(?:data|blob):/i.test(candidate)) return;
    const url = normalizeUrl(candidate, LINKEDIN_SELECTORS.HOME_URL);
    if (!/^https?:\/\//i.test(url)) return;

    const key = mediaKey(url);
    if (seen.has(key)) return;
    seen.add(key);
    refs.push(url);
  };

  $post.find(LINKEDIN_SELECTORS.POST.MEDIA).each((_, node) => {
    const $node = $(node);
    if ($node.closest(LINKEDIN_SELECTORS.POST.MEDIA_EXCLUDED_SCOPE).length > 0) return;

    if (node.tagName === "video") {
      push($node.attr("src") ?? $node.attr("poster"));
      return;
    }
    push($node.attr("data-delayed-url") ?? $node.attr("src"));
  });

  $post.find(LINKEDIN_SELECTORS.POST.ARTICLE_LINK).each((_, node) => {
    push($(node).attr("href"));
  });

  return refs;
}

function parsePostContainer(
  $: CheerioAPI,
  $post: Cheerio<Element>,
  context: ParseContext,
  capturedAt: Date
): PostRecord | null {
  const urn = nativeUrn($post);
  const author = actorHandle($post) ?? context.profile.handle;
  const text = postText($post);
  const media = mediaRefs($, $post);
  const timestamp = postedAt($post, urn, capturedAt);

  if (!urn && !text && media.length === 0) {
    return null;
  }

  const postId =
    urn ?? computeFallbackPostId({ author, text, day: absoluteDay(timestamp), mediaUrls: media });

  return {
    postId,
    idSource: urn ? "native" : "content_hash",
    author,
    text,
    postedAt: timestamp,
    mediaRefs: media,
    extractedAt: capturedAt.toISOString(),
  };
}

/**
 * Turns one captured feed into post records in feed order. Never throws: a
 * snapshot it cannot read comes back empty with a degradation attached.
 */
export function parseFeedSnapshot(snapshot: RawSnapshot, context: ParseContext): SnapshotParseResult {
  try {
    const $ = cheerio.load(snapshot.html);
    const containers = outermostContainers($);

    if (containers.length === 0) {
      const emptyFeed = $(LINKEDIN_SELECTORS.FEED.EMPTY_STATE).length > 0;
      return {
        records: [],
        skipped: 0,
        degradation: emptyFeed
          ? null
          : new ParseDegradation("No post containers recognized in snapshot", "NO_POST_CONTAINERS", snapshot.scroll),
      };
    }

    const records: PostRecord[] = [];
    let skipped = 0;

    for (const node of containers) {
      try {
        const record = parsePostContainer($, $(node), context, snapshot.capturedAt);
        if (record) {
          records.push(record);
        } else {
          skipped++;
        }
      } catch {
        skipped++;
      }
    }

    return { records, skipped, degradation: null };
  } catch (error) {
    const message = error instanceof Error ? error.message : "unreadable markup";
    return {
      records: [],
      skipped: 0,
      degradation: new ParseDegradation(`Snapshot markup could not be read: ${message}`, "MARKUP_UNREADABLE", snapshot.scroll),
    };
  }
}
