/**
 * Best-effort extraction from Instagram page HTML.
 *
 * Instagram's markup is not a stable contract. Every extractor here searches raw text for
 * embedded-JSON key patterns and degrades to `null` / `''` / `[]` when a pattern is absent;
 * nothing in this module throws on unexpected markup. When the page format changes, this
 * is the only file that should need re-targeting.
 */

const INSTAGRAM_ORIGIN = 'https://www.instagram.com';

const HANDLE_RE = /@([A-Za-z0-9._]{2,30})/g;
const POST_SHORTCODE_RE = /\/p\/([A-Za-z0-9_-]{5,})\//g;
const HASHTAG_RE = /#([A-Za-z0-9_]{2,50})/g;
const OWNER_USERNAME_RE = /"owner"\s*:\s*\{[^}]*"username"\s*:\s*"([A-Za-z0-9._]{2,30})"/;
const FOLLOWED_BY_RE = /"edge_followed_by"\s*:\s*\{\s*"count"\s*:\s*(\d+)/;
const TIMELINE_MEDIA_RE = /"edge_owner_to_timeline_media"\s*:\s*\{\s*"count"\s*:\s*(\d+)/;
const BIOGRAPHY_RE = /"biography"\s*:\s*"((?:[^"\\]|\\.)*)"/;
const EXTERNAL_URL_RE = /"external_url"\s*:\s*"((?:[^"\\]|\\.)*)"/;
const VERIFIED_RE = /"is_verified"\s*:\s*true/;

export interface ProfileSnapshot {
  handle: string;
  followers: number | null;
  posts: number | null;
  bio: string;
  externalUrl: string;
  isVerified: boolean;
}

export function hashtagUrl(tag: string): string {
  return `${INSTAGRAM_ORIGIN}/explore/tags/${encodeURIComponent(tag)}/`;
}

export function profileUrl(handle: string): string {
  return `${INSTAGRAM_ORIGIN}/${handle}/`;
}

export function postUrl(shortcode: string): string {
  return `${INSTAGRAM_ORIGIN}/p/${shortcode}/`;
}

/** Handles are case-insensitive: lower-case, no leading `@`. */
export function normalizeHandle(raw: string | null | undefined): string {
  return String(raw ?? '').trim().replace(/^@+/, '').toLowerCase();
}

export function uniqueHandles(values: Iterable<string>): string[] {
  const out: string[] = [];
  const seen = new Set<string>();
  for (const value of values) {
    const handle = normalizeHandle(value);
    if (!handle || seen.has(handle)) continue;
    seen.add(handle);
    out.push(handle);
  }
  return out;
}

/** Shortcodes are case-sensitive: never lower-cased. */
export function uniqueShortcodes(values: Iterable<string>): string[] {
  const out: string[] = [];
  const seen = new Set<string>();
  for (const value of values) {
    const shortcode = String(value ?? '').trim().replace(/^\/+|\/+$/g, '');
    if (!shortcode || seen.has(shortcode)) continue;
    seen.add(shortcode);
    out.push(shortcode);
  }
  return out;
}

/** `@mentions` in first-seen order, normalized, at least two characters. */
export function extractHandles(text: string | null | undefined): string[] {
  if (!text) return [];
  const found: string[] = [];
  for (const match of text.matchAll(HANDLE_RE)) {
    // sentence punctuation: "thanks @jane." -> "jane"
    found.push(match[1].replace(/\.+$/, ''));
  }
  return uniqueHandles(found).filter((handle) => handle.length >= 2);
}

export function extractPostShortcodes(html: string | null | undefined): string[] {
  if (!html) return [];
  return uniqueShortcodes(Array.from(html.matchAll(POST_SHORTCODE_RE), (match) => match[1]));
}

/** Shortcodes of the first `maxPosts` posts linked from a profile page. */
export function extractProfileShortcodes(html: string | null | undefined, maxPosts: number): string[] {
  return extractPostShortcodes(html).slice(0, Math.max(0, maxPosts));
}

export function extractHashtags(text: string | null | undefined): string[] {
  if (!text) return [];
  return Array.from(text.matchAll(HASHTAG_RE), (match) => match[1]);
}

/** Mentions for graph edges: numeric-only tokens are not handles. */
export function extractMentions(text: string | null | undefined): Set<string> {
  return new Set(extractHandles(text).filter((handle) => !/^\d+$/.test(handle)));
}

/** Occurrences per mentioned handle (numeric-only tokens dropped). */
export function countMentions(text: string | null | undefined): Map<string, number> {
  const counts = new Map<string, number>();
  if (!text) return counts;
  for (const match of text.matchAll(HANDLE_RE)) {
    const handle = normalizeHandle(match[1].replace(/\.+$/, ''));
    if (handle.length < 2 || /^\d+$/.test(handle)) continue;
    counts.set(handle, (counts.get(handle) ?? 0) + 1);
  }
  return counts;
}

export function extractOwnerHandle(html: string | null | undefined): string | null {
  if (!html) return null;
  const match = html.match(OWNER_USERNAME_RE);
  return match ? normalizeHandle(match[1]) : null;
}

/**
 * Login wall / throttle page heuristic. Fetchers return these pages as successes, so every
 * caller checks before trusting extracted values.
 */
export function looksLikeLoginWall(html: string | null | undefined): boolean {
  const lower = String(html ?? '').toLowerCase();
  if (lower.includes('please wait a few minutes')) return true;
  return lower.includes('login') && lower.includes('password') && lower.includes('instagram');
}

function parseCount(raw: string | undefined): number | null {
  if (raw === undefined) return null;
  const value = Number.parseInt(raw, 10);
  return Number.isFinite(value) ? value : null;
}

function decodeJsonString(raw: string): string | null {
  try {
    const decoded: unknown = JSON.parse(`"${raw}"`);
    return typeof decoded === 'string' ? decoded : null;
  } catch {
    return null;
  }
}

/** Decode a JSON string body as embedded in page source (`\uXXXX`, `\n`, `\/`). */
export function unescapeEmbeddedString(raw: string): string {
  const decoded = decodeJsonString(raw);
  if (decoded !== null) return decoded;
  // not strict JSON (stray control characters): decode the common escapes by hand
  return raw
    .replace(/\\u([0-9a-fA-F]{4})/g, (_, hex: string) => String.fromCharCode(Number.parseInt(hex, 16)))
    .replace(/\\n/g, '\n')
    .replace(/\\t/g, '\t')
    .replace(/\\(["\\/])/g, '$1');
}

export function parseProfileSnapshot(html: string | null | undefined, handle: string): ProfileSnapshot {
  const text = String(html ?? '');
  const bioMatch = text.match(BIOGRAPHY_RE);
  const externalUrlMatch = text.match(EXTERNAL_URL_RE);

  return {
    handle: normalizeHandle(handle),
    followers: parseCount(text.match(FOLLOWED_BY_RE)?.[1]),
    posts: parseCount(text.match(TIMELINE_MEDIA_RE)?.[1]),
    bio: bioMatch ? unescapeEmbeddedString(bioMatch[1]) : '',
    externalUrl: externalUrlMatch ? unescapeEmbeddedString(externalUrlMatch[1]) : '',
    isVerified: VERIFIED_RE.test(text),
  };
}
