import type { PageFetcher } from './page-fetcher';

/**
 * Per-run URL → HTML cache in front of a fetcher.
 *
 * Lives as long as one run: no TTL, nothing persisted. Concurrent requests for the same URL
 * share one in-flight fetch. Failures are not cached, so a later caller may retry.
 */
export class PageFetchCache implements PageFetcher {
  private readonly pages = new Map<string, string>();
  private readonly inFlight = new Map<string, Promise<string>>();
  private hits = 0;
  private misses = 0;

  constructor(private readonly fetcher: PageFetcher) {}

  fetchHtml(url: string): Promise<string> {
    const cached = this.pages.get(url);
    if (cached !== undefined) {
      this.hits += 1;
      return Promise.resolve(cached);
    }

    const pending = this.inFlight.get(url);
    if (pending) {
      this.hits += 1;
      return pending;
    }

    this.misses += 1;
    const request = this.fetcher
      .fetchHtml(url)
      .then((html) => {
        this.pages.set(url, html);
        return html;
      })
      .finally(() => {
        this.inFlight.delete(url);
      });
    this.inFlight.set(url, request);
    return request;
  }

  get stats(): { cached: number; hits: number; misses: number } {
    return { cached: this.pages.size, hits: this.hits, misses: this.misses };
  }

  async close(): Promise<void> {
    this.pages.clear();
    if (this.fetcher.close) await this.fetcher.close();
  }
}
