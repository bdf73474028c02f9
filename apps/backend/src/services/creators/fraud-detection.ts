import type { Creator, FraudFlags } from './creator-types';

/**
 * Low-quality / fake-engagement heuristics. Conservative on purpose: the score marks
 * "low confidence" for outreach, it is not an accusation.
 */

export type FraudSubject = Pick<Creator, 'handle' | 'followersEst' | 'postsCount' | 'avgEngagementRate' | 'notes'>;
export type ExclusionSubject = Pick<Creator, 'isBrand' | 'isSpam' | 'followersEst'>;

export interface FraudAssessment {
  score: number;
  flags: FraudFlags;
}

export type HardExcludeReason = 'brand' | 'spam' | 'mega_account';

const BRANDISH_HANDLE_TERMS = ['shop', 'store', 'official', 'boutique', 'brand'];
const SPAM_NOTE_TERMS = ['dm for promo', 'crypto', 'forex', 'giveaway page', 'link in bio→whatsapp'];
const MEGA_ACCOUNT_FOLLOWERS = 250_000;

export function assessFraud(creator: FraudSubject): FraudAssessment {
  const followers = creator.followersEst ?? 0;
  const posts = creator.postsCount;
  const er = creator.avgEngagementRate;
  const flags: FraudFlags = {};
  let score = 0;

  if (posts !== null && posts < 8) {
    score += 25;
    flags.low_posts = posts;
  }

  if (followers >= 20_000 && er !== null && er < 0.2) {
    score += 35;
    flags.low_er_for_size = er;
  }
  if (followers >= 100_000 && er !== null && er < 0.1) {
    score += 25;
    flags.very_low_er_for_mega = er;
  }

  const handle = creator.handle.toLowerCase();
  if (BRANDISH_HANDLE_TERMS.some((term) => handle.includes(term))) {
    score += 15;
    flags.brandish_handle = true;
  }

  const notes = (creator.notes ?? '').toLowerCase();
  if (SPAM_NOTE_TERMS.some((term) => notes.includes(term))) {
    score += 40;
    flags.spam_signals = true;
  }

  return { score: Math.max(0, Math.min(100, score)), flags };
}

/** Hard excludes, independent of the additive score. */
export function isExcludable(creator: ExclusionSubject): HardExcludeReason | null {
  if (creator.isBrand) return 'brand';
  if (creator.isSpam) return 'spam';
  if (creator.followersEst !== null && creator.followersEst >= MEGA_ACCOUNT_FOLLOWERS) return 'mega_account';
  return null;
}
