import type { CreatorSession } from './creator-session';
import type { Creator, CreatorEdgeType } from './creator-types';
import { jaccardTags } from './similarity';

// Approximation without platform analytics: shared niche tags plus shared graph neighbours.
const TAG_WEIGHT = 0.7;
const GRAPH_WEIGHT = 0.3;
const NEIGHBOUR_EDGE_TYPES: readonly CreatorEdgeType[] = ['mention', 'co_mentioned'];
const NEIGHBOUR_LIMIT = 500;

async function neighbours(session: CreatorSession, creatorId: number): Promise<Set<number>> {
  return new Set(await session.listEdgeTargets(creatorId, NEIGHBOUR_EDGE_TYPES, NEIGHBOUR_LIMIT));
}

export function neighbourJaccard(a: ReadonlySet<number>, b: ReadonlySet<number>): number {
  if (a.size === 0 || b.size === 0) return 0;
  let intersection = 0;
  for (const id of a) {
    if (b.has(id)) intersection += 1;
  }
  return intersection / (a.size + b.size - intersection);
}

/** 0..1 blend of tag similarity and mention-neighbour overlap. */
export async function overlapScore(
  session: CreatorSession,
  a: Pick<Creator, 'id' | 'nicheTags'>,
  b: Pick<Creator, 'id' | 'nicheTags'>
): Promise<number> {
  const tagSimilarity = jaccardTags(a.nicheTags, b.nicheTags);
  const graphSimilarity = neighbourJaccard(await neighbours(session, a.id), await neighbours(session, b.id));
  return Math.min(1, TAG_WEIGHT * tagSimilarity + GRAPH_WEIGHT * graphSimilarity);
}
