import type { EnrichedCandidate } from '../discovery/creator-discovery-engine';
import { normalizeHandle } from '../scraper/instagram-html';
import type { CreatorSession } from './creator-session';
import {
  newCreatorRecord,
  type Creator,
  type CreatorPatch,
  type RelationshipStatus,
} from './creator-types';
import { assessFraud } from './fraud-detection';
import { joinNicheTags } from './similarity';

const BIO_NOTE_MAX_LENGTH = 500;
// Relationship states that move a rediscovered creator to do_not_contact
const DO_NOT_CONTACT_RELATIONSHIPS: readonly RelationshipStatus[] = ['declined', 'blocked'];

export interface UpsertCounters {
  created: number;
  updated: number;
  skipped: number;
  excluded: number;
}

export interface UpsertOutcome extends UpsertCounters {
  touchedCreatorIds: number[];
}

export interface UpsertCandidatesOptions {
  /** Max inserts for this call; updates are never capped. */
  cap: number;
  /** Notes line for new creators, e.g. `Discovered via #tag`. */
  source: string;
  nicheTags?: readonly string[];
  now?: Date;
}

export function emptyCounters(): UpsertCounters {
  return { created: 0, updated: 0, skipped: 0, excluded: 0 };
}

function creatorNotes(source: string, bio: string): string {
  const trimmedBio = bio.replace(/\s+/g, ' ').trim().slice(0, BIO_NOTE_MAX_LENGTH);
  return trimmedBio ? `${source}\nBio: ${trimmedBio}` : source;
}

function mergePatch(
  existing: Creator,
  item: EnrichedCandidate,
  relationshipStatus: RelationshipStatus | null,
  now: Date
): CreatorPatch {
  const followersEst = item.followersEst ?? existing.followersEst;
  const postsCount = item.postsCount ?? existing.postsCount;
  const fraud = assessFraud({ ...existing, followersEst, postsCount });

  const patch: CreatorPatch = {
    followersEst,
    postsCount,
    isBrand: existing.isBrand || item.isBrand,
    isSpam: existing.isSpam || item.isSpam,
    fraudFlags: { ...existing.fraudFlags, ...item.fraudFlags, ...fraud.flags },
    fraudScore: fraud.score,
    lastScrapedAt: now,
  };

  if (relationshipStatus !== null && DO_NOT_CONTACT_RELATIONSHIPS.includes(relationshipStatus)) {
    patch.outreachStatus = 'do_not_contact';
    patch.outreachExcludeReason = `relationship_${relationshipStatus}`;
  } else if (existing.outreachStatus !== 'do_not_contact' && item.excluded) {
    patch.outreachStatus = 'excluded';
    patch.outreachExcludeReason = item.excludeReason;
  }
  return patch;
}

/**
 * Reconcile enriched candidates with stored creators on the calling task.
 *
 * Existing creators are merged in place (estimates refreshed, flags OR-ed, fraud flags
 * accumulated); new ones are inserted while under `cap`. Excluded candidates (audit mode)
 * only ever mark existing creators; they are never inserted.
 */
export async function upsertEnrichedCandidates(
  session: CreatorSession,
  items: readonly EnrichedCandidate[],
  options: UpsertCandidatesOptions
): Promise<UpsertOutcome> {
  const now = options.now ?? new Date();
  const nicheTags = joinNicheTags(options.nicheTags ?? []);
  const counters = emptyCounters();
  const touched: number[] = [];
  const processed = new Set<string>();

  for (const item of items) {
    const handle = normalizeHandle(item.handle);
    if (!handle || processed.has(handle)) continue;
    processed.add(handle);

    if (item.excluded) counters.excluded += 1;

    const existing = await session.findCreatorByHandle(handle);
    if (existing) {
      const relationships = await session.findRelationships([existing.id]);
      const relationshipStatus = relationships.get(existing.id)?.status ?? null;
      await session.updateCreator(existing.id, mergePatch(existing, item, relationshipStatus, now));
      counters.updated += 1;
      touched.push(existing.id);
      continue;
    }

    if (item.excluded) continue;

    if (counters.created >= options.cap) {
      counters.skipped += 1;
      continue;
    }

    const record = newCreatorRecord(handle, now, {
      followersEst: item.followersEst,
      postsCount: item.postsCount,
      isBrand: item.isBrand,
      isSpam: item.isSpam,
      nicheTags,
      notes: creatorNotes(options.source, item.bio),
      lastScrapedAt: now,
    });
    const fraud = assessFraud(record);
    const created = await session.insertCreator({
      ...record,
      fraudScore: fraud.score,
      fraudFlags: { ...item.fraudFlags, ...fraud.flags },
    });
    counters.created += 1;
    touched.push(created.id);
  }

  console.log(
    `[CreatorUpsert] ${options.source}: created=${counters.created} updated=${counters.updated} skipped=${counters.skipped} excluded=${counters.excluded}`
  );
  return { ...counters, touchedCreatorIds: touched };
}
