import { describe, test, expect } from '@jest/globals';
import { PageFetchCache } from '../page-fetch-cache';
import { FetchError, type PageFetcher } from '../page-fetcher';
import { FakePageFetcher } from '../../../__tests__/helpers/fake-page-fetcher';

const URL_A = 'https://www.instagram.com/kay/';

describe('PageFetchCache', () => {
  test('should share one fetch between concurrent callers', async () => {
    const fetcher = new FakePageFetcher({ [URL_A]: '<html>kay</html>' });
    const cache = new PageFetchCache(fetcher);

    const [first, second] = await Promise.all([cache.fetchHtml(URL_A), cache.fetchHtml(URL_A)]);

    expect(first).toBe('<html>kay</html>');
    expect(second).toBe('<html>kay</html>');
    expect(fetcher.callsTo(URL_A)).toBe(1);
    expect(cache.stats).toEqual({ cached: 1, hits: 1, misses: 1 });
  });

  test('should serve later calls from the cache', async () => {
    const fetcher = new FakePageFetcher({ [URL_A]: '<html>kay</html>' });
    const cache = new PageFetchCache(fetcher);

    await cache.fetchHtml(URL_A);
    await cache.fetchHtml(URL_A);

    expect(fetcher.calls).toEqual([URL_A]);
    expect(cache.stats.hits).toBe(1);
  });

  test('should not cache failures', async () => {
    let attempts = 0;
    const flaky: PageFetcher = {
      fetchHtml: async (url) => {
        attempts += 1;
        if (attempts === 1) throw new FetchError(url, 'boom');
        return '<html>ok</html>';
      },
    };
    const cache = new PageFetchCache(flaky);

    await expect(cache.fetchHtml(URL_A)).rejects.toBeInstanceOf(FetchError);
    await expect(cache.fetchHtml(URL_A)).resolves.toBe('<html>ok</html>');
    expect(attempts).toBe(2);
  });

  test('should close the wrapped fetcher', async () => {
    const fetcher = new FakePageFetcher();
    const cache = new PageFetchCache(fetcher);
    await cache.close();
    expect(fetcher.closed).toBe(true);
  });
});
