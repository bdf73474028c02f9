import { describe, test, expect } from '@jest/globals';
import { runCreatorDiscovery } from '../creator-discovery-run';
import { withCreatorSession } from '../creator-session';
import { parseTargetingConfig } from '../../../lib/targeting-config';
import { hashtagUrl, postUrl, profileUrl } from '../../scraper/instagram-html';
import { FakePageFetcher } from '../../../__tests__/helpers/fake-page-fetcher';
import { MemoryCreatorStore } from '../../../__tests__/helpers/memory-creator-session';
import { listingPageHtml, postPageHtml, profilePageHtml } from '../../../__tests__/helpers/instagram-fixtures';

const NOW = new Date('2026-03-01T12:00:00Z');
const random = () => 0;

function sheaFetcher(): FakePageFetcher {
  return new FakePageFetcher({
    [hashtagUrl('shea')]: listingPageHtml(['SheaP001', 'SheaP002', 'SheaP003', 'SheaP004']),
    [postUrl('SheaP001')]: postPageHtml('glow_kay'),
    [postUrl('SheaP002')]: postPageHtml('promo_bot'),
    [postUrl('SheaP003')]: postPageHtml('amy_makes'),
    [postUrl('SheaP004')]: postPageHtml('mega_mia'),
    [profileUrl('glow_kay')]: profilePageHtml({ followers: 12000, posts: 40, bio: 'Shea butter + self care' }),
    [profileUrl('amy_makes')]: profilePageHtml({ followers: 5000, posts: 30, bio: 'Wholesale inquiries welcome' }),
    [profileUrl('mega_mia')]: profilePageHtml({ followers: 900000, posts: 500, bio: 'Lifestyle' }),
  });
}

function baseConfig(related: Record<string, unknown> = { enabled: false }, extra: Record<string, unknown> = {}) {
  return parseTargetingConfig({
    seedHashtags: ['shea'],
    targetNiches: ['skincare'],
    followerMin: 1000,
    followerMax: 50000,
    perSeedPosts: 10,
    maxTotalHandles: 100,
    maxConcurrency: 2,
    related,
    exclude: { handleContains: ['bot'], textContains: ['wholesale'] },
    ...extra,
  });
}

describe('runCreatorDiscovery', () => {
  test('should refuse to run without seed hashtags', async () => {
    const store = new MemoryCreatorStore();
    const fetcher = new FakePageFetcher();

    const summary = await withCreatorSession(
      () => store.openSession(),
      (session) => runCreatorDiscovery({ limit: 10, rotate: 2 }, { session, fetcher, config: parseTargetingConfig({}) })
    );

    expect(summary).toEqual({ ok: false, error: 'no_seed_hashtags' });
    expect(fetcher.calls).toEqual([]);
  });

  test('should discover, filter and store new creators', async () => {
    const store = new MemoryCreatorStore();

    const summary = await withCreatorSession(
      () => store.openSession(),
      (session) =>
        runCreatorDiscovery(
          { limit: 10, rotate: 1 },
          { session, fetcher: sheaFetcher(), config: baseConfig(), random, now: () => NOW }
        )
    );

    expect(summary).toEqual({
      ok: true,
      created: 1,
      updated: 0,
      skipped: 2,
      excluded: 1,
      tags: ['shea'],
      discovered: 4,
      enriched: 2,
      related: null,
      fraudBackfilled: 1,
      config: {
        followerMin: 1000,
        followerMax: 50000,
        hardMaxFollowers: 250000,
        oversampleFactor: 3,
        perSeedPosts: 10,
        maxTotalHandles: 30,
      },
    });
    expect(store.tables.creators.map((creator) => creator.handle)).toEqual(['glow_kay']);
    expect(store.creator('glow_kay')).toMatchObject({
      followersEst: 12000,
      nicheTags: 'skincare',
      notes: 'Discovered via #shea\nBio: Shea butter + self care',
      outreachStatus: 'eligible',
      fraudScore: 0,
      lastScrapedAt: NOW,
    });
  });

  test('should count classification exclusions in the summary', async () => {
    const store = new MemoryCreatorStore();
    const fetcher = new FakePageFetcher({
      [hashtagUrl('shea')]: listingPageHtml(['MegaP001', 'SpamP001']),
      [postUrl('MegaP001')]: postPageHtml('mega_mia'),
      [postUrl('SpamP001')]: postPageHtml('spam_giveaway'),
      [profileUrl('mega_mia')]: profilePageHtml({ followers: 900000, posts: 500, bio: 'Lifestyle' }),
      [profileUrl('spam_giveaway')]: profilePageHtml({ followers: 9000, posts: 40, bio: 'crypto tips daily' }),
    });

    const summary = await withCreatorSession(
      () => store.openSession(),
      (session) =>
        runCreatorDiscovery({ limit: 10, rotate: 1 }, { session, fetcher, config: baseConfig(), random, now: () => NOW })
    );

    expect(summary).toMatchObject({ ok: true, created: 0, skipped: 0, excluded: 2, discovered: 2, enriched: 0 });
    expect(store.tables.creators).toEqual([]);
  });

  test('should expand from stored creators in the related pass', async () => {
    const store = new MemoryCreatorStore();
    store.seedCreator('top_creator', { score: 90, followersEst: 30000 });
    const fetcher = sheaFetcher()
      .setPage(profileUrl('top_creator'), profilePageHtml({ followers: 30000, shortcodes: ['TopP0001'] }))
      .setPage(postUrl('TopP0001'), postPageHtml('top_creator', 'made with @new_friend'))
      .setPage(profileUrl('new_friend'), profilePageHtml({ followers: 8000, posts: 20, bio: 'Herbal tea rituals' }));

    const summary = await withCreatorSession(
      () => store.openSession(),
      (session) =>
        runCreatorDiscovery(
          { limit: 10, rotate: 1 },
          { session, fetcher, config: baseConfig({ enabled: true, seedCount: 5, perSeedPosts: 5 }), random, now: () => NOW }
        )
    );

    expect(summary.ok && summary.related).toEqual({ seeds: 2, created: 1, updated: 0, skipped: 0, excluded: 0 });
    expect(store.creator('new_friend')?.notes).toBe(
      'Related to @top_creator, @glow_kay\nBio: Herbal tea rituals'
    );
    expect(summary.ok && summary.fraudBackfilled).toBe(2);
  });

  test('should share the creation limit with the related pass', async () => {
    const store = new MemoryCreatorStore();
    store.seedCreator('top_creator', { score: 90, followersEst: 30000 });
    const fetcher = sheaFetcher()
      .setPage(profileUrl('top_creator'), profilePageHtml({ followers: 30000, shortcodes: ['TopP0001'] }))
      .setPage(postUrl('TopP0001'), postPageHtml('top_creator', 'made with @new_friend'))
      .setPage(profileUrl('new_friend'), profilePageHtml({ followers: 8000, posts: 20, bio: 'Herbal tea rituals' }));

    const summary = await withCreatorSession(
      () => store.openSession(),
      (session) =>
        runCreatorDiscovery(
          { limit: 1, rotate: 1 },
          { session, fetcher, config: baseConfig({ enabled: true }, { oversampleFactor: 10 }), random, now: () => NOW }
        )
    );

    expect(summary.ok && summary.created).toBe(1);
    expect(summary.ok && summary.related).toMatchObject({ created: 0, skipped: 1 });
    expect(store.creator('new_friend')).toBeUndefined();
  });
});
