/**
 * Link Extractor
 * Finds the first YouTube video link in free-form message text.
 */

export type VideoLinkKind = "watch" | "short-link" | "shorts" | "embed" | "live";

export interface VideoReference {
  videoId: string;
  /** Canonical watch URL; playlist and tracking parameters are dropped. */
  url: string;
  kind: VideoLinkKind;
}

const VIDEO_ID_PATTERN = /^[A-Za-z0-9_-]{11}$/;

const YOUTUBE_HOSTS = new Set(["youtube.com", "youtube-nocookie.com"]);
const SHORT_LINK_HOST = "youtu.be";

/** First path segment → link kind, for youtube.com/<segment>/<id> shapes. */
const PATH_KINDS = new Map<string, VideoLinkKind>([
  ["shorts", "shorts"],
  ["embed", "embed"],
  ["v", "embed"],
  ["live", "live"],
]);

const LEADING_PUNCTUATION = /^[<(["']+/;
const TRAILING_PUNCTUATION = /[>)\]"'.,!?;:]+$/;

export function canonicalWatchUrl(videoId: string): string {
  return `https://www.youtube.com/watch?v=${videoId}`;
}

/** Strips www., m. and music. so every YouTube front end maps to one host. */
function normalizeHost(hostname: string): string {
  return hostname.toLowerCase().replace(/^(?:www\.|m\.|music\.)/, "");
}

function toReference(videoId: string | null | undefined, kind: VideoLinkKind): VideoReference | null {
  if (!videoId || !VIDEO_ID_PATTERN.test(videoId)) {
    return null;
  }
  return { videoId, url: canonicalWatchUrl(videoId), kind };
}

/**
 * Parses a single URL-like token. Accepts tokens without a scheme.
 */
export function parseYouTubeUrl(candidate: string): VideoReference | null {
  const token = candidate.trim();
  if (!token) return null;

  let url: URL;
  try {
    url = new URL(/^https?:\/\//i.test(token) ? token : `https://${token}`);
  } catch {
    return null;
  }

  const host = normalizeHost(url.hostname);
  const segments = url.pathname.split("/").filter(Boolean);

  if (host === SHORT_LINK_HOST) {
    return toReference(segments[0], "short-link");
  }

  if (!YOUTUBE_HOSTS.has(host)) {
    return null;
  }

  if (segments[0] === "watch") {
    return toReference(url.searchParams.get("v"), "watch");
  }

  const kind = PATH_KINDS.get(segments[0] ?? "");
  return kind ? toReference(segments[1], kind) : null;
}

/**
 * Scans message text token by token and returns the first video link found.
 * Returns null when nothing in the text is a YouTube video link.
 */
export function extractVideoReference(text: string): VideoReference | null {
  for (const rawToken of text.split(/\s+/)) {
    const token = rawToken.replace(LEADING_PUNCTUATION, "").replace(TRAILING_PUNCTUATION, "");
    if (!/youtu/i.test(token)) continue;

    const reference = parseYouTubeUrl(token);
    if (reference) {
      return reference;
    }
  }
  return null;
}
