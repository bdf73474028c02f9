import { errorMessage } from '../../lib/errors';
import type { BrandVoice } from '../../lib/targeting-config';
import type { TextGenerator } from '../ai/text-generator';
import type { CreatorSession } from '../creators/creator-session';
import { OUTREACH_BLOCKING_STATUSES, type Creator, type CreatorRelationship } from '../creators/creator-types';
import { buildPersonalizedDm } from './personalization';

const POOL_MULTIPLIER = 5;
const MIN_POOL_SIZE = 50;
const POLISHED_MAX_LENGTH = 1000;

export interface OutreachBatchParams {
  limit: number;
  campaignName?: string | null;
  offerType?: string | null;
}

export interface OutreachBatchDeps {
  session: CreatorSession;
  brand: BrandVoice;
  generator?: TextGenerator | null;
  now?: () => Date;
}

export interface OutreachBatchSummary {
  ok: true;
  drafted: number;
  polished: number;
  relationshipsCreated: number;
  handles: string[];
}

/**
 * Creators that may receive a new draft: eligible, not brand/spam, relationship not
 * declined/blocked/partnered, and no pending or approved draft. Best score first, then
 * larger audience.
 */
export function selectOutreachCandidates(
  pool: readonly Creator[],
  relationships: ReadonlyMap<number, CreatorRelationship>,
  openDraftCreatorIds: ReadonlySet<number>,
  limit: number
): Creator[] {
  return pool
    .filter((creator) => {
      if (creator.outreachStatus !== 'eligible') return false;
      if (creator.isBrand || creator.isSpam) return false;
      const status = relationships.get(creator.id)?.status;
      if (status && OUTREACH_BLOCKING_STATUSES.includes(status)) return false;
      return !openDraftCreatorIds.has(creator.id);
    })
    .sort((a, b) => b.score - a.score || (b.followersEst ?? 0) - (a.followersEst ?? 0))
    .slice(0, Math.max(0, Math.floor(limit)));
}

function acceptablePolish(text: string, handle: string): boolean {
  if (!text || text.length > POLISHED_MAX_LENGTH) return false;
  if (text.toLowerCase().includes('http')) return false;
  return text.toLowerCase().includes(`@${handle}`);
}

async function polishDm(generator: TextGenerator, template: string, creator: Creator, brand: BrandVoice): Promise<string | null> {
  const prompt = [
    'Rewrite this Instagram DM so it reads naturally and warmly.',
    `Keep it under 90 words, keep the greeting to @${creator.handle}, keep the sign-off, no links, no hashtags.`,
    'Return ONLY the message.',
    '',
    template,
  ].join('\n');

  try {
    const text = (await generator.generate(prompt, `You write short, genuine creator outreach for ${brand.name}.`, 0.5)).trim();
    return acceptablePolish(text, creator.handle) ? text : null;
  } catch (error) {
    console.warn(`[Outreach] polish failed for @${creator.handle}, using template: ${errorMessage(error)}`);
    return null;
  }
}

export async function generateOutreachBatch(
  params: OutreachBatchParams,
  deps: OutreachBatchDeps
): Promise<OutreachBatchSummary> {
  const { session, brand } = deps;
  const now = deps.now ?? (() => new Date());
  const limit = Math.max(0, Math.floor(params.limit));

  const pool = await session.listCreators({
    limit: Math.max(MIN_POOL_SIZE, limit * POOL_MULTIPLIER),
    order: 'score',
    outreachStatus: 'eligible',
    excludeBrandSpam: true,
  });
  const relationships = await session.findRelationships(pool.map((creator) => creator.id));
  const openDrafts = await session.listOpenDraftCreatorIds();
  const candidates = selectOutreachCandidates(pool, relationships, openDrafts, limit);

  let polished = 0;
  let relationshipsCreated = 0;
  for (const creator of candidates) {
    const template = buildPersonalizedDm(creator, brand, params.campaignName);
    const polishedText = deps.generator ? await polishDm(deps.generator, template, creator, brand) : null;
    if (polishedText) polished += 1;

    await session.insertOutreachDraft({
      creatorId: creator.id,
      message: polishedText ?? template,
      offerType: params.offerType ?? null,
      campaignName: params.campaignName ?? null,
      status: 'pending',
      createdAt: now(),
    });

    if (!relationships.has(creator.id)) {
      await session.insertRelationship({
        creatorId: creator.id,
        status: 'new',
        lastContactedAt: null,
        notes: null,
        createdAt: now(),
      });
      relationshipsCreated += 1;
    }
  }

  console.log(`[Outreach] drafted ${candidates.length} (${polished} polished) from a pool of ${pool.length}`);
  return {
    ok: true,
    drafted: candidates.length,
    polished,
    relationshipsCreated,
    handles: candidates.map((creator) => creator.handle),
  };
}
