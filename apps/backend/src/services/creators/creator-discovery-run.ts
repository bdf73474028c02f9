import { randomSample } from '../../lib/concurrency';
import type { TargetingConfig } from '../../lib/targeting-config';
import {
  discoverHandles,
  enrichAndFilter,
  type EnrichedCandidate,
} from '../discovery/creator-discovery-engine';
import type { PageFetcher } from '../scraper/page-fetcher';
import type { CreatorSession } from './creator-session';
import { emptyCounters, upsertEnrichedCandidates, type UpsertCounters } from './creator-upsert';
import { backfillFraudScores } from './fraud-backfill';
import { excludedByRules } from './rule-exclusions';

export interface CreatorDiscoveryParams {
  /** Max new creators for the whole run (primary and related passes together). */
  limit: number;
  /** How many seed hashtags to sample. */
  rotate: number;
}

export interface CreatorDiscoveryDeps {
  session: CreatorSession;
  fetcher: PageFetcher;
  config: TargetingConfig;
  random?: () => number;
  now?: () => Date;
}

export interface RelatedPassSummary extends UpsertCounters {
  seeds: number;
}

export type CreatorDiscoverySummary =
  | {
      ok: true;
      created: number;
      updated: number;
      skipped: number;
      excluded: number;
      tags: string[];
      discovered: number;
      enriched: number;
      related: RelatedPassSummary | null;
      fraudBackfilled: number;
      config: Pick<
        TargetingConfig,
        'followerMin' | 'followerMax' | 'hardMaxFollowers' | 'oversampleFactor' | 'perSeedPosts' | 'maxTotalHandles'
      >;
    }
  | { ok: false; error: 'no_seed_hashtags' };

interface FilteredCandidates {
  items: EnrichedCandidate[];
  skipped: number;
}

function dropRuleExcludedHandles(handles: readonly string[], rules: TargetingConfig['exclude']) {
  const kept = handles.filter((handle) => excludedByRules(handle, null, rules) === null);
  return { kept, skipped: handles.length - kept.length };
}

function dropRuleExcludedText(items: readonly EnrichedCandidate[], rules: TargetingConfig['exclude']): FilteredCandidates {
  const kept = items.filter((item) => excludedByRules(item.handle, item.bio, rules) === null);
  return { items: kept, skipped: items.length - kept.length };
}

/**
 * One discovery run: sampled hashtags → handles → enrichment → upsert, then an optional
 * related pass seeded from the best stored creators, then a fraud backfill over every
 * creator the run touched.
 *
 * All fetching happens before each pass's writes; the session is only used from this task.
 */
export async function runCreatorDiscovery(
  params: CreatorDiscoveryParams,
  deps: CreatorDiscoveryDeps
): Promise<CreatorDiscoverySummary> {
  const { session, fetcher, config } = deps;
  const random = deps.random ?? Math.random;
  const now = deps.now ?? (() => new Date());
  const limit = Math.max(0, Math.floor(params.limit));

  if (config.seedHashtags.length === 0) {
    console.warn('[Discovery] no seed hashtags configured');
    return { ok: false, error: 'no_seed_hashtags' };
  }

  const tags = randomSample(config.seedHashtags, Math.max(1, Math.floor(params.rotate)), random);
  const maxTotalHandles = Math.min(config.maxTotalHandles, Math.ceil(limit * config.oversampleFactor));
  console.log(`[Discovery] run start: tags=${tags.join(',')} limit=${limit} maxHandles=${maxTotalHandles}`);

  const discovered = await discoverHandles(fetcher, tags, {
    perSeedPosts: config.perSeedPosts,
    maxTotalHandles,
    maxConcurrency: config.maxConcurrency,
    random,
  });
  const byHandle = dropRuleExcludedHandles(discovered, config.exclude);

  const enriched = await enrichAndFilter(fetcher, byHandle.kept, {
    followerMin: config.followerMin,
    followerMax: config.followerMax,
    hardMaxFollowers: config.hardMaxFollowers,
    includeExcluded: config.includeExcluded,
    maxConcurrency: config.maxConcurrency,
  });
  const byText = dropRuleExcludedText(enriched.items, config.exclude);

  const primary = await upsertEnrichedCandidates(session, byText.items, {
    cap: limit,
    source: `Discovered via ${tags.map((tag) => `#${tag}`).join(' ')}`,
    nicheTags: config.targetNiches,
    now: now(),
  });
  primary.skipped += byHandle.skipped + byText.skipped;
  primary.excluded += enriched.excluded;
  await session.flush();

  const touched = [...primary.touchedCreatorIds];
  let related: RelatedPassSummary | null = null;

  if (config.related.enabled) {
    const seeds = await session.listCreators({
      limit: config.related.seedCount,
      order: 'score',
      excludeBrandSpam: true,
    });
    related = { seeds: seeds.length, ...emptyCounters() };

    if (seeds.length > 0) {
      const seedHandles = seeds.map((creator) => creator.handle);
      const relatedHandles = await discoverHandles(fetcher, seedHandles, {
        seedKind: 'profile',
        perSeedPosts: config.related.perSeedPosts,
        maxTotalHandles: config.related.maxTotalHandles,
        maxConcurrency: config.related.maxConcurrency,
        random,
      });
      const relatedByHandle = dropRuleExcludedHandles(relatedHandles, config.exclude);
      const relatedEnriched = await enrichAndFilter(fetcher, relatedByHandle.kept, {
        followerMin: config.followerMin,
        followerMax: config.followerMax,
        hardMaxFollowers: config.hardMaxFollowers,
        includeExcluded: config.includeExcluded,
        maxConcurrency: config.related.maxConcurrency,
      });
      const relatedByText = dropRuleExcludedText(relatedEnriched.items, config.exclude);

      const outcome = await upsertEnrichedCandidates(session, relatedByText.items, {
        cap: Math.max(0, limit - primary.created),
        source: `Related to ${seedHandles.slice(0, 3).map((handle) => `@${handle}`).join(', ')}`,
        nicheTags: config.targetNiches,
        now: now(),
      });
      await session.flush();

      related = {
        seeds: seeds.length,
        created: outcome.created,
        updated: outcome.updated,
        skipped: outcome.skipped + relatedByHandle.skipped + relatedByText.skipped,
        excluded: outcome.excluded + relatedEnriched.excluded,
      };
      touched.push(...outcome.touchedCreatorIds);
    }
  }

  const fraudBackfilled = await backfillFraudScores(session, touched);

  const summary: CreatorDiscoverySummary = {
    ok: true,
    created: primary.created,
    updated: primary.updated,
    skipped: primary.skipped,
    excluded: primary.excluded,
    tags,
    discovered: discovered.length,
    enriched: enriched.items.length,
    related,
    fraudBackfilled,
    config: {
      followerMin: config.followerMin,
      followerMax: config.followerMax,
      hardMaxFollowers: config.hardMaxFollowers,
      oversampleFactor: config.oversampleFactor,
      perSeedPosts: config.perSeedPosts,
      maxTotalHandles,
    },
  };
  console.log(
    `[Discovery] run done: created=${summary.created} updated=${summary.updated} skipped=${summary.skipped} related=${related ? related.created : 'off'}`
  );
  return summary;
}
