import type { CreatorSession } from './creator-session';
import type { Creator, CreatorEdgeType, EdgeMetadata } from './creator-types';
import { similarityScore } from './similarity';

export type EdgeUpsertResult = 'inserted' | 'updated' | 'skipped';

export interface UpsertEdgeInput {
  sourceId: number;
  targetId: number;
  edgeType: CreatorEdgeType;
  weight: number;
  metadata?: EdgeMetadata | null;
  now?: Date;
}

/**
 * Idempotent edge write keyed by (source, target, type).
 *
 * Weights only grow: an existing edge keeps `max(old, new)`. Metadata is filled in only
 * when the stored edge has none. Self-edges are ignored.
 */
export async function upsertEdge(session: CreatorSession, input: UpsertEdgeInput): Promise<EdgeUpsertResult> {
  if (input.sourceId === input.targetId) return 'skipped';

  const now = input.now ?? new Date();
  const weight = Number.isFinite(input.weight) ? input.weight : 0;
  const existing = await session.findEdge(input.sourceId, input.targetId, input.edgeType);

  if (!existing) {
    await session.insertEdge({
      sourceCreatorId: input.sourceId,
      targetCreatorId: input.targetId,
      edgeType: input.edgeType,
      weight,
      metadata: input.metadata ?? null,
      lastSeenAt: now,
      createdAt: now,
    });
    return 'inserted';
  }

  await session.updateEdge(existing.id, {
    weight: Math.max(existing.weight, weight),
    metadata: existing.metadata ?? input.metadata ?? null,
    lastSeenAt: now,
  });
  return 'updated';
}

export interface ScoredCandidate {
  creator: Creator;
  score: number;
}

/** Positive-scoring candidates, best first, at most `topK`. */
export function rankSimilarCreators(base: Creator, candidates: readonly Creator[], topK: number): ScoredCandidate[] {
  const scored: ScoredCandidate[] = [];
  for (const creator of candidates) {
    if (creator.id === base.id) continue;
    const score = similarityScore(base, creator);
    if (score <= 0) continue;
    scored.push({ creator, score });
  }
  // stable: equal scores keep candidate order
  scored.sort((a, b) => b.score - a.score);
  return scored.slice(0, Math.max(0, Math.floor(topK)));
}

export async function buildSimilarityEdges(
  session: CreatorSession,
  base: Creator,
  candidates: readonly Creator[],
  topK = 25,
  now: Date = new Date()
): Promise<ScoredCandidate[]> {
  const picks = rankSimilarCreators(base, candidates, topK);
  for (const pick of picks) {
    await upsertEdge(session, {
      sourceId: base.id,
      targetId: pick.creator.id,
      edgeType: 'similarity',
      weight: pick.score,
      metadata: { method: 'jaccard+bucket' },
      now,
    });
  }
  return picks;
}
