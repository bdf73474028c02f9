import type { Creator } from './creator-types';

export type FollowerBucket = 'micro' | 'micro+' | 'mid' | 'large' | 'mega' | 'unknown';
export type SimilaritySubject = Pick<Creator, 'nicheTags' | 'followersEst'>;

const NICHE_TAGS_MAX_LENGTH = 1500;
const SAME_BUCKET_BONUS = 0.1;

export function splitNicheTags(tags: string | null | undefined): string[] {
  if (!tags) return [];
  return tags
    .split(',')
    .map((tag) => tag.trim())
    .filter((tag) => tag.length > 0);
}

function tagSet(tags: string | null | undefined): Set<string> {
  return new Set(splitNicheTags(tags).map((tag) => tag.toLowerCase()));
}

export function jaccardTags(a: string | null | undefined, b: string | null | undefined): number {
  const left = tagSet(a);
  const right = tagSet(b);
  if (left.size === 0 || right.size === 0) return 0;
  let intersection = 0;
  for (const tag of left) {
    if (right.has(tag)) intersection += 1;
  }
  const union = left.size + right.size - intersection;
  return intersection / union;
}

export function followerBucket(followers: number | null): FollowerBucket {
  if (followers === null) return 'unknown';
  if (followers < 5_000) return 'micro';
  if (followers < 20_000) return 'micro+';
  if (followers < 80_000) return 'mid';
  if (followers < 250_000) return 'large';
  return 'mega';
}

/** Tag Jaccard, plus a flat bonus for the same follower bucket; never above 1. */
export function similarityScore(a: SimilaritySubject, b: SimilaritySubject): number {
  const base = jaccardTags(a.nicheTags, b.nicheTags);
  if (base <= 0) return 0;
  const bonus = followerBucket(a.followersEst) === followerBucket(b.followersEst) ? SAME_BUCKET_BONUS : 0;
  return Math.min(1, base + bonus);
}

/** Comma-joined storage form: case-insensitive dedupe, first spelling wins, capped length. */
export function joinNicheTags(tags: Iterable<string>): string | null {
  const out: string[] = [];
  const seen = new Set<string>();
  for (const raw of tags) {
    const tag = raw.trim();
    const key = tag.toLowerCase();
    if (!tag || seen.has(key)) continue;
    seen.add(key);
    out.push(tag);
  }
  if (out.length === 0) return null;
  return out.join(', ').slice(0, NICHE_TAGS_MAX_LENGTH);
}

export function mergeNicheTags(existing: string | null, incoming: Iterable<string>): string | null {
  return joinNicheTags([...splitNicheTags(existing), ...incoming]);
}
