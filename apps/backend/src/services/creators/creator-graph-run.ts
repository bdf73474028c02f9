import { runWithConcurrency } from '../../lib/concurrency';
import { errorMessage } from '../../lib/errors';
import { countMentions, looksLikeLoginWall, profileUrl } from '../scraper/instagram-html';
import type { PageFetcher } from '../scraper/page-fetcher';
import { overlapScore } from './audience-overlap';
import type { CreatorSession } from './creator-session';
import type { Creator } from './creator-types';
import { buildSimilarityEdges, upsertEdge, type EdgeUpsertResult } from './graph-builder';

const MENTIONS_FOR_FULL_WEIGHT = 3;
const CO_MENTION_WEIGHT = 0.5;

export interface CreatorGraphParams {
  limitCreators: number;
  similarityTopK: number;
}

export interface CreatorGraphDeps {
  session: CreatorSession;
  fetcher: PageFetcher;
  maxConcurrency?: number;
  now?: () => Date;
}

export interface CreatorGraphSummary {
  ok: true;
  creators: number;
  pagesScanned: number;
  mentionEdges: number;
  coMentionEdges: number;
  similarityEdges: number;
  overlapEdges: number;
}

interface ProfileMentions {
  creator: Creator;
  mentions: Map<string, number>;
}

function written(result: EdgeUpsertResult): number {
  return result === 'skipped' ? 0 : 1;
}

async function scanProfileMentions(
  fetcher: PageFetcher,
  creators: readonly Creator[],
  maxConcurrency: number
): Promise<ProfileMentions[]> {
  const scanned: ProfileMentions[] = [];
  await runWithConcurrency(creators, maxConcurrency, async (creator) => {
    let html: string;
    try {
      html = await fetcher.fetchHtml(profileUrl(creator.handle));
    } catch (error) {
      console.warn(`[Graph] profile fetch failed for @${creator.handle}: ${errorMessage(error)}`);
      return;
    }
    if (looksLikeLoginWall(html)) {
      console.warn(`[Graph] login wall on @${creator.handle}`);
      return;
    }
    const mentions = countMentions(html);
    mentions.delete(creator.handle);
    scanned.push({ creator, mentions });
  });
  return scanned;
}

/**
 * Mention, co-mention, similarity and audience-overlap edges for the most recent creators.
 *
 * Profile pages are fetched first; every edge write happens afterwards on this task.
 * Mentions only link creators that already exist.
 */
export async function runCreatorGraphBuild(
  params: CreatorGraphParams,
  deps: CreatorGraphDeps
): Promise<CreatorGraphSummary> {
  const { session, fetcher } = deps;
  const now = deps.now ?? (() => new Date());
  const creators = await session.listCreators({ limit: Math.max(0, Math.floor(params.limitCreators)), order: 'recent' });
  const byHandle = new Map(creators.map((creator) => [creator.handle, creator] as const));

  const scanned = await scanProfileMentions(fetcher, creators, deps.maxConcurrency ?? 4);

  let mentionEdges = 0;
  let coMentionEdges = 0;
  for (const { creator, mentions } of scanned) {
    const targets: number[] = [];
    for (const [handle, occurrences] of mentions) {
      const target = byHandle.get(handle) ?? (await session.findCreatorByHandle(handle));
      if (!target || target.id === creator.id) continue;
      targets.push(target.id);
      mentionEdges += written(
        await upsertEdge(session, {
          sourceId: creator.id,
          targetId: target.id,
          edgeType: 'mention',
          weight: Math.min(1, occurrences / MENTIONS_FOR_FULL_WEIGHT),
          metadata: { via: 'profile', occurrences },
          now: now(),
        })
      );
    }

    for (let i = 0; i < targets.length; i += 1) {
      for (let j = i + 1; j < targets.length; j += 1) {
        for (const [sourceId, targetId] of [
          [targets[i], targets[j]],
          [targets[j], targets[i]],
        ]) {
          coMentionEdges += written(
            await upsertEdge(session, {
              sourceId,
              targetId,
              edgeType: 'co_mentioned',
              weight: CO_MENTION_WEIGHT,
              metadata: { via: creator.handle },
              now: now(),
            })
          );
        }
      }
    }
  }

  let similarityEdges = 0;
  let overlapEdges = 0;
  for (const creator of creators) {
    const picks = await buildSimilarityEdges(session, creator, creators, params.similarityTopK, now());
    similarityEdges += picks.length;

    for (const pick of picks) {
      const overlap = await overlapScore(session, creator, pick.creator);
      if (overlap <= 0) continue;
      overlapEdges += written(
        await upsertEdge(session, {
          sourceId: creator.id,
          targetId: pick.creator.id,
          edgeType: 'audience_overlap',
          weight: overlap,
          metadata: { method: 'tags+neighbours' },
          now: now(),
        })
      );
    }
  }

  const summary: CreatorGraphSummary = {
    ok: true,
    creators: creators.length,
    pagesScanned: scanned.length,
    mentionEdges,
    coMentionEdges,
    similarityEdges,
    overlapEdges,
  };
  console.log(`[Graph] build done: ${JSON.stringify(summary)}`);
  return summary;
}
