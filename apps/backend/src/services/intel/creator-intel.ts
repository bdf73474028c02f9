import { runWithConcurrency } from '../../lib/concurrency';
import { errorMessage } from '../../lib/errors';
import type { CreatorSession } from '../creators/creator-session';
import type { Creator, NewCreatorSignal } from '../creators/creator-types';
import {
  extractHashtags,
  extractProfileShortcodes,
  looksLikeLoginWall,
  parseProfileSnapshot,
  postUrl,
  profileUrl,
  type ProfileSnapshot,
} from '../scraper/instagram-html';
import type { PageFetcher } from '../scraper/page-fetcher';

const BIO_WEIGHT = 1.5;
const HASHTAG_MATCH_WEIGHT = 0.5;
const SIGNAL_TEXT_MAX_LENGTH = 1200;
const HASHTAGS_PER_SIGNAL = 25;
const PARTNER_LIMIT = 50;
const DAY_MS = 24 * 60 * 60 * 1000;

export interface CreatorIntelParams {
  limit: number;
  postsToScan: number;
}

export interface CreatorIntelDeps {
  session: CreatorSession;
  fetcher: PageFetcher;
  keywords: readonly string[];
  maxConcurrency?: number;
  now?: () => Date;
}

export interface CreatorIntelResult {
  handle: string;
  nicheScore: number;
  growth7d: number | null;
  growth30d: number | null;
  partnerSimilarity: number;
}

export interface CreatorIntelSummary {
  ok: true;
  selected: number;
  scanned: number;
  signals: number;
  results: CreatorIntelResult[];
}

interface PostPage {
  shortcode: string;
  url: string;
  html: string;
}

interface CreatorScan {
  creator: Creator;
  profileUrl: string;
  snapshot: ProfileSnapshot;
  posts: PostPage[];
}

/** UTC calendar day, `YYYY-MM-DD`. */
export function isoDay(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function shiftDay(day: string, deltaDays: number): string {
  return isoDay(new Date(Date.parse(`${day}T00:00:00Z`) + deltaDays * DAY_MS));
}

/** Each keyword found adds 1, plus up to 1 more for longer phrases. */
export function keywordScore(text: string | null | undefined, keywords: readonly string[]): number {
  const lower = (text ?? '').toLowerCase();
  if (!lower) return 0;
  let score = 0;
  for (const keyword of keywords) {
    if (lower.includes(keyword)) score += 1 + Math.min(1, keyword.length / 20);
  }
  return score;
}

export function growthPct(newest: number | null, old: number | null): number | null {
  if (!newest || old === null || old <= 0) return null;
  return (newest - old) / old;
}

function tokens(text: string): Set<string> {
  return new Set(text.toLowerCase().match(/[a-z0-9]{3,}/g) ?? []);
}

/** Token-set Jaccard over 3+ character alphanumeric runs. */
export function lexicalSimilarity(a: string, b: string): number {
  const left = tokens(a);
  const right = tokens(b);
  if (left.size === 0 || right.size === 0) return 0;
  let intersection = 0;
  for (const token of left) {
    if (right.has(token)) intersection += 1;
  }
  return intersection / (left.size + right.size - intersection);
}

async function creatorCorpus(session: CreatorSession, creator: Creator): Promise<string> {
  const signals = await session.listSignals(creator.id);
  return [creator.handle, creator.nicheTags ?? '', creator.notes ?? '', ...signals.map((signal) => signal.signalText)].join(
    ' '
  );
}

export async function bestPartnerSimilarity(
  session: CreatorSession,
  creator: Creator,
  partners: readonly Creator[]
): Promise<number> {
  if (partners.length === 0) return 0;
  const mine = await creatorCorpus(session, creator);
  let best = 0;
  for (const partner of partners) {
    if (partner.id === creator.id) continue;
    best = Math.max(best, lexicalSimilarity(mine, await creatorCorpus(session, partner)));
  }
  return best;
}

async function scanCreator(fetcher: PageFetcher, creator: Creator, postsToScan: number): Promise<CreatorScan | null> {
  const url = profileUrl(creator.handle);
  let html: string;
  try {
    html = await fetcher.fetchHtml(url);
  } catch (error) {
    console.warn(`[Intel] profile fetch failed for @${creator.handle}: ${errorMessage(error)}`);
    return null;
  }
  if (looksLikeLoginWall(html)) {
    console.warn(`[Intel] login wall on @${creator.handle}`);
    return null;
  }

  const posts: PostPage[] = [];
  for (const shortcode of extractProfileShortcodes(html, postsToScan)) {
    const pageUrl = postUrl(shortcode);
    try {
      const postHtml = await fetcher.fetchHtml(pageUrl);
      if (!looksLikeLoginWall(postHtml)) posts.push({ shortcode, url: pageUrl, html: postHtml });
    } catch (error) {
      console.warn(`[Intel] post fetch failed (${shortcode}): ${errorMessage(error)}`);
    }
  }

  return { creator, profileUrl: url, snapshot: parseProfileSnapshot(html, creator.handle), posts };
}

/** Evidence rows plus the niche score they add up to. */
export function buildNicheSignals(
  scan: CreatorScan,
  keywords: readonly string[],
  now: Date
): { nicheScore: number; signals: NewCreatorSignal[] } {
  const creatorId = scan.creator.id;
  const signals: NewCreatorSignal[] = [];
  let nicheScore = 0;

  const bioScore = keywordScore(scan.snapshot.bio, keywords);
  if (bioScore > 0) {
    signals.push({
      creatorId,
      signalType: 'bio',
      signalText: scan.snapshot.bio.slice(0, SIGNAL_TEXT_MAX_LENGTH),
      weight: bioScore,
      sourceUrl: scan.profileUrl,
      createdAt: now,
    });
    nicheScore += bioScore * BIO_WEIGHT;
  }

  for (const post of scan.posts) {
    const postScore = keywordScore(post.html, keywords);
    const hashtags = extractHashtags(post.html);
    const hashtagScore =
      hashtags.filter((hashtag) => keywordScore(hashtag, keywords) > 0).length * HASHTAG_MATCH_WEIGHT;

    if (postScore > 0) {
      signals.push({
        creatorId,
        signalType: 'post',
        signalText: `Matched keywords on post ${post.shortcode}`,
        weight: postScore,
        sourceUrl: post.url,
        createdAt: now,
      });
      nicheScore += postScore;
    }
    if (hashtagScore > 0) {
      signals.push({
        creatorId,
        signalType: 'hashtag',
        signalText: hashtags.slice(0, HASHTAGS_PER_SIGNAL).join(', '),
        weight: hashtagScore,
        sourceUrl: post.url,
        createdAt: now,
      });
      nicheScore += hashtagScore;
    }
  }

  return { nicheScore, signals };
}

/**
 * Daily snapshot, growth, niche signals and partner similarity for the creators whose
 * intel is most overdue. Pages are fetched first; persistence runs afterwards on this task.
 */
export async function runCreatorIntel(params: CreatorIntelParams, deps: CreatorIntelDeps): Promise<CreatorIntelSummary> {
  const { session, fetcher, keywords } = deps;
  const now = (deps.now ?? (() => new Date()))();
  const today = isoDay(now);
  const postsToScan = Math.max(0, Math.floor(params.postsToScan));

  const creators = await session.listCreators({
    limit: Math.max(0, Math.floor(params.limit)),
    order: 'intel_due',
    excludeBrandSpam: true,
  });

  const scans: CreatorScan[] = [];
  await runWithConcurrency(creators, deps.maxConcurrency ?? 3, async (creator) => {
    const scan = await scanCreator(fetcher, creator, postsToScan);
    if (scan) scans.push(scan);
  });

  const partners = await session.listCreators({ limit: PARTNER_LIMIT, order: 'score', partnersOnly: true });
  const results: CreatorIntelResult[] = [];
  let signalCount = 0;

  for (const scan of scans) {
    const { creator, snapshot } = scan;

    const existingSnapshot = await session.findMetricsSnapshot(creator.id, today);
    if (existingSnapshot) {
      await session.updateMetricsSnapshot(existingSnapshot.id, {
        followersEst: snapshot.followers,
        postsCount: snapshot.posts,
      });
    } else {
      await session.insertMetricsSnapshot({
        creatorId: creator.id,
        snapshotDate: today,
        followersEst: snapshot.followers,
        postsCount: snapshot.posts,
      });
    }

    const newest = await session.latestMetricsSnapshot(creator.id);
    const weekAgo = await session.latestMetricsSnapshot(creator.id, shiftDay(today, -7));
    const monthAgo = await session.latestMetricsSnapshot(creator.id, shiftDay(today, -30));
    const growth7d = newest && weekAgo ? growthPct(newest.followersEst, weekAgo.followersEst) : null;
    const growth30d = newest && monthAgo ? growthPct(newest.followersEst, monthAgo.followersEst) : null;

    const { nicheScore, signals } = buildNicheSignals(scan, keywords, now);
    await session.deleteSignals(creator.id);
    for (const signal of signals) {
      await session.insertSignal(signal);
    }
    signalCount += signals.length;

    const updated = await session.updateCreator(creator.id, {
      followersEst: snapshot.followers ?? creator.followersEst,
      postsCount: snapshot.posts ?? creator.postsCount,
      growth7d,
      growth30d,
      nicheScore,
      lastScrapedAt: now,
      lastIntelRunAt: now,
    });
    const partnerSimilarity = await bestPartnerSimilarity(session, updated, partners);

    results.push({ handle: creator.handle, nicheScore, growth7d, growth30d, partnerSimilarity });
  }

  console.log(`[Intel] scanned ${scans.length}/${creators.length} creators, ${signalCount} signals`);
  return { ok: true, selected: creators.length, scanned: scans.length, signals: signalCount, results };
}
