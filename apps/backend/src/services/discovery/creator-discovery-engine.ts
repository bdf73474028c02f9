import { runWithConcurrency, shuffleInPlace } from '../../lib/concurrency';
import { errorMessage } from '../../lib/errors';
import { assessFraud } from '../creators/fraud-detection';
import type { FraudFlags } from '../creators/creator-types';
import {
  extractHandles,
  extractOwnerHandle,
  extractPostShortcodes,
  hashtagUrl,
  looksLikeLoginWall,
  normalizeHandle,
  parseProfileSnapshot,
  postUrl,
  profileUrl,
  uniqueHandles,
  type ProfileSnapshot,
} from '../scraper/instagram-html';
import type { PageFetcher } from '../scraper/page-fetcher';

/**
 * Creator discovery without an official API:
 * listing page (hashtag or seed profile) → post shortcodes → post pages → owner + @mentions,
 * then profile pages → snapshot → classification.
 *
 * Nothing here touches the database. Fetch failures and login walls contribute nothing
 * and never abort a batch.
 */

// `@media`, `@font-face`, `@context` and friends in inline CSS / JSON-LD look like mentions.
const NON_HANDLE_TOKENS = new Set([
  'media',
  'font',
  'keyframes',
  'import',
  'supports',
  'charset',
  'namespace',
  'layer',
  'container',
  'context',
  'type',
  'graph',
  'id',
]);

const SPAM_BIO_TERMS = [
  'dm for promo',
  'dm for collab',
  'free money',
  'forex',
  'crypto',
  'betting',
  'giveaway',
  'cashapp',
  'onlyfans',
  'telegram',
];
const SPAM_HANDLE_TERMS = ['giveaway', 'promo', 'free', 'forex', 'crypto'];
const COMMERCE_TERMS = ['shop', 'store', 'order'];
const STOREFRONT_PHRASES = ['link in bio', 'shipping'];

export type SeedKind = 'hashtag' | 'profile';

export interface DiscoverHandlesOptions {
  perSeedPosts?: number;
  maxTotalHandles?: number;
  maxConcurrency?: number;
  /** Also collect @mentions from post pages, not just post owners. */
  preferMentions?: boolean;
  /** `profile`: seeds are creator handles whose own pages are the listings. */
  seedKind?: SeedKind;
  random?: () => number;
}

function isPlausibleHandle(handle: string): boolean {
  return handle.length >= 2 && !/^\d+$/.test(handle);
}

// Only body text carries at-rules; a post owner named `graph` is a real account.
function isMentionHandle(handle: string): boolean {
  return isPlausibleHandle(handle) && !NON_HANDLE_TOKENS.has(handle);
}

async function fetchPostHandles(fetcher: PageFetcher, shortcode: string, preferMentions: boolean): Promise<string[]> {
  const url = postUrl(shortcode);
  let html: string;
  try {
    html = await fetcher.fetchHtml(url);
  } catch (error) {
    console.warn(`[Discovery] post fetch failed (${shortcode}): ${errorMessage(error)}`);
    return [];
  }
  if (looksLikeLoginWall(html)) {
    console.warn(`[Discovery] login wall on post ${shortcode}`);
    return [];
  }

  const found: string[] = [];
  const owner = extractOwnerHandle(html);
  if (owner && isPlausibleHandle(owner)) found.push(owner);
  if (preferMentions) found.push(...extractHandles(html).filter(isMentionHandle));
  return uniqueHandles(found);
}

/**
 * Unique handles from the posts linked on each seed's listing page, capped at
 * `maxTotalHandles`.
 *
 * Listing shortcodes are shuffled before truncation so sampling does not always take the
 * top posts. Posts are fetched with bounded concurrency and consumed in completion
 * order; the cap is enforced by the running unique count, so result order is not
 * input order.
 */
export async function discoverHandles(
  fetcher: PageFetcher,
  seedTerms: readonly string[],
  options: DiscoverHandlesOptions = {}
): Promise<string[]> {
  const perSeedPosts = Math.max(0, Math.floor(options.perSeedPosts ?? 60));
  const maxTotalHandles = Math.max(0, Math.floor(options.maxTotalHandles ?? 500));
  const maxConcurrency = options.maxConcurrency ?? 6;
  const preferMentions = options.preferMentions ?? true;
  const seedKind = options.seedKind ?? 'hashtag';
  const random = options.random ?? Math.random;

  const found = new Set<string>();
  const seenPosts = new Set<string>();
  const seedHandles = seedKind === 'profile' ? new Set(uniqueHandles(seedTerms)) : new Set<string>();
  const reachedCap = () => found.size >= maxTotalHandles;

  for (const rawSeed of seedTerms) {
    if (reachedCap()) break;

    const seed = seedKind === 'hashtag' ? String(rawSeed ?? '').trim().replace(/^#+/, '') : normalizeHandle(rawSeed);
    if (!seed) continue;
    const label = seedKind === 'hashtag' ? `#${seed}` : `@${seed}`;
    const listingUrl = seedKind === 'hashtag' ? hashtagUrl(seed) : profileUrl(seed);

    let html: string;
    try {
      html = await fetcher.fetchHtml(listingUrl);
    } catch (error) {
      console.warn(`[Discovery] listing fetch failed for ${label}: ${errorMessage(error)}`);
      continue;
    }
    if (looksLikeLoginWall(html)) {
      console.warn(`[Discovery] login wall on ${label}, skipping seed`);
      continue;
    }

    const shortcodes = shuffleInPlace(extractPostShortcodes(html), random).slice(0, perSeedPosts);
    if (shortcodes.length === 0) {
      console.log(`[Discovery] no posts linked from ${label}`);
      continue;
    }

    const before = found.size;
    await runWithConcurrency(
      shortcodes,
      maxConcurrency,
      async (shortcode) => {
        if (seenPosts.has(shortcode)) return;
        seenPosts.add(shortcode);
        const handles = await fetchPostHandles(fetcher, shortcode, preferMentions);
        for (const handle of handles) {
          if (reachedCap()) break;
          if (seedHandles.has(handle)) continue;
          found.add(handle);
        }
      },
      reachedCap
    );
    console.log(`[Discovery] ${label}: ${shortcodes.length} posts sampled, +${found.size - before} handles`);
  }

  return Array.from(found).slice(0, maxTotalHandles);
}

export type CandidateExcludeReason =
  | 'spammy_profile'
  | 'brand_account'
  | 'mega_account'
  | 'outside_target_follower_range';

export interface FollowerBand {
  followerMin: number;
  followerMax: number;
  hardMaxFollowers: number;
}

export interface EnrichedCandidate {
  handle: string;
  followersEst: number | null;
  postsCount: number | null;
  bio: string;
  externalUrl: string;
  isVerified: boolean;
  isBrand: boolean;
  isSpam: boolean;
  excluded: boolean;
  /** `''` when not excluded. */
  excludeReason: CandidateExcludeReason | '';
  /** Preliminary assessment from the snapshot (bio stands in for notes). */
  fraudScore: number;
  fraudFlags: FraudFlags;
}

export interface EnrichAndFilterOptions extends Partial<FollowerBand> {
  /** Audit mode: return excluded candidates annotated instead of dropping them. */
  includeExcluded?: boolean;
  maxConcurrency?: number;
}

export function isSpammyProfile(handle: string, bio: string): boolean {
  const lowerHandle = handle.toLowerCase();
  if (SPAM_HANDLE_TERMS.some((term) => lowerHandle.includes(term))) return true;
  const lowerBio = bio.toLowerCase();
  return SPAM_BIO_TERMS.some((term) => lowerBio.includes(term));
}

export function looksLikeBrand(bio: string, externalUrl: string): boolean {
  const lowerBio = bio.toLowerCase();
  if (!COMMERCE_TERMS.some((term) => lowerBio.includes(term))) return false;
  if (externalUrl.trim()) return true;
  return STOREFRONT_PHRASES.some((phrase) => lowerBio.includes(phrase));
}

/** First matching rule wins: spam, brand, mega, then the follower band (known counts only). */
export function classifySnapshot(snapshot: ProfileSnapshot, band: FollowerBand): EnrichedCandidate {
  const followers = snapshot.followers;
  const isSpam = isSpammyProfile(snapshot.handle, snapshot.bio);
  const isBrand = looksLikeBrand(snapshot.bio, snapshot.externalUrl);
  const isMega = (followers ?? 0) >= band.hardMaxFollowers;

  let excludeReason: CandidateExcludeReason | '' = '';
  if (isSpam) excludeReason = 'spammy_profile';
  else if (isBrand) excludeReason = 'brand_account';
  else if (isMega) excludeReason = 'mega_account';
  else if (followers !== null && (followers < band.followerMin || followers > band.followerMax)) {
    excludeReason = 'outside_target_follower_range';
  }

  const fraud = assessFraud({
    handle: snapshot.handle,
    followersEst: followers,
    postsCount: snapshot.posts,
    avgEngagementRate: null,
    notes: snapshot.bio,
  });

  return {
    handle: snapshot.handle,
    followersEst: followers,
    postsCount: snapshot.posts,
    bio: snapshot.bio,
    externalUrl: snapshot.externalUrl,
    isVerified: snapshot.isVerified,
    isBrand,
    isSpam,
    excluded: excludeReason !== '',
    excludeReason,
    fraudScore: fraud.score,
    fraudFlags: fraud.flags,
  };
}

export interface EnrichResult {
  items: EnrichedCandidate[];
  /** Candidates dropped by classification (only when `includeExcluded` is off). */
  excluded: number;
}

/**
 * Fetch and classify each unique handle's profile. Login-walled or unreachable profiles
 * are dropped silently. Items arrive in completion order.
 */
export async function enrichAndFilter(
  fetcher: PageFetcher,
  handles: readonly string[],
  options: EnrichAndFilterOptions = {}
): Promise<EnrichResult> {
  const band: FollowerBand = {
    followerMin: options.followerMin ?? 2_000,
    followerMax: options.followerMax ?? 80_000,
    hardMaxFollowers: options.hardMaxFollowers ?? 250_000,
  };
  const includeExcluded = options.includeExcluded ?? false;
  const out: EnrichedCandidate[] = [];
  let walled = 0;
  let dropped = 0;

  await runWithConcurrency(uniqueHandles(handles), options.maxConcurrency ?? 6, async (handle) => {
    let html: string;
    try {
      html = await fetcher.fetchHtml(profileUrl(handle));
    } catch (error) {
      console.warn(`[Enrich] profile fetch failed for @${handle}: ${errorMessage(error)}`);
      return;
    }
    if (looksLikeLoginWall(html)) {
      walled += 1;
      return;
    }

    const item = classifySnapshot(parseProfileSnapshot(html, handle), band);
    if (item.excluded && !includeExcluded) {
      dropped += 1;
      return;
    }
    out.push(item);
  });

  if (walled > 0) {
    console.warn(`[Enrich] ${walled} profile(s) hit a login wall`);
  }
  console.log(`[Enrich] ${out.length} kept, ${dropped} excluded, ${walled} walled`);
  return { items: out, excluded: dropped };
}
