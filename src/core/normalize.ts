const TRACKING_PARAMS = [
  "ref",
  "referral",
  "source",
  "utm_source",
  "utm_medium",
  "utm_campaign",
  "trk",
  "trackingId",
  "lipi",
  "midToken",
  "midSig",
  "fbclid",
];

export function normalizeContent(content: string): string {
  return content
    .trim()
    .replace(/\s+/g, " ")
    .normalize("NFKC")
    .toLowerCase()
    .replace(/[\u200B-\u200D\uFEFF]/g, "")
    .replace(/\\u200B/g, "");
}

export function normalizeUrl(url: string, base?: string): string {
  try {
    const u = base ? new URL(url, base) : new URL(url);
    for (const param of TRACKING_PARAMS) {
      u.searchParams.delete(param);
    }
    u.hash = "";
    return u.toString();
  } catch {
    return url;
  }
}

/**
 * Host and path only. Media CDNs sign their URLs with expiring query
 * parameters, so the query cannot take part in identity.
 */
export function mediaKey(url: string): string {
  try {
    const u = new URL(url);
    return `${u.host}${u.pathname}`;
  } catch {
    return url;
  }
}

export function extractMediaFingerprint(mediaUrls: string[]): string {
  return mediaUrls
    .map((u) => mediaKey(u))
    .sort()
    .join("|");
}
