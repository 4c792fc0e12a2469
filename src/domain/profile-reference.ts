import { ConfigError } from "../core/errors";
import type { ProfileReference } from "./models";

export const LINKEDIN_ORIGIN = "https://www.linkedin.com";

const HANDLE_PATTERN = /^[\p{L}\p{N}][\p{L}\p{N}._-]{1,99}$/u;

function decodeSegment(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    return segment;
  }
}

function handleFromUrl(raw: string): string {
  const withScheme = /^https?:\/\//i.test(raw) ? raw : `https://${raw}`;

  let url: URL;
  try {
    url = new URL(withScheme);
  } catch {
    throw new ConfigError(`Profile reference is not a valid URL: ${raw}`);
  }

  if (!/(^|\.)linkedin\.com$/i.test(url.hostname)) {
    throw new ConfigError(`Profile reference is not a LinkedIn URL: ${raw}`);
  }

  const match = url.pathname.match(/^\/in\/([^/]+)/);
  if (!match || !match[1]) {
    throw new ConfigError(`Profile reference is not a LinkedIn member profile: ${raw}`);
  }

  return decodeSegment(match[1]);
}

/**
 * Accepts `handle`, `@handle`, or any linkedin.com/in/<handle> URL and
 * returns the canonical reference used for navigation and file naming.
 */
export function parseProfileReference(input: string): ProfileReference {
  const raw = input.trim();
  if (!raw) {
    throw new ConfigError("Profile reference is empty");
  }

  const candidate = /linkedin\.com/i.test(raw) ? handleFromUrl(raw) : raw.replace(/^@/, "");
  if (!HANDLE_PATTERN.test(candidate)) {
    throw new ConfigError(`Profile handle is not valid: ${candidate}`);
  }

  const handle = candidate.toLowerCase();
  const profileUrl = `${LINKEDIN_ORIGIN}/in/${encodeURIComponent(handle)}/`;

  return {
    handle,
    profileUrl,
    activityUrl: `${profileUrl}recent-activity/all/`,
  };
}
