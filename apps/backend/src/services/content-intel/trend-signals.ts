import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { ConfigError, errorMessage } from '../../lib/errors';
import type { PageFetcher } from '../scraper/page-fetcher';
import { parseGoogleTrendsRss, parseRedditTitles, parseYoutubeResults, type TitleItem, type TrendItem } from './trend-parsers';

const CONFIG_DIR = path.resolve(__dirname, '../../../config');

const RssSourceSchema = z.object({
  type: z.literal('rss'),
  url: z.string().trim().url(),
});

const HtmlSourceSchema = z.object({
  type: z.literal('html'),
  urls: z.array(z.unknown()).transform((list) =>
    list.filter((item): item is string => typeof item === 'string' && item.trim().length > 0).map((item) => item.trim())
  ),
});

const TrendSourceSchema = z.discriminatedUnion('type', [RssSourceSchema, HtmlSourceSchema]);

const TrendSourcesSchema = z.object({
  maxPagesTotal: z.coerce.number().finite().transform((value) => Math.max(0, Math.floor(value))).catch(10),
  sources: z
    .array(z.unknown())
    .transform((list) =>
      list.flatMap((item) => {
        const parsed = TrendSourceSchema.safeParse(item);
        return parsed.success ? [parsed.data] : [];
      })
    )
    .catch([]),
});

export type TrendSources = z.infer<typeof TrendSourcesSchema>;
export type TrendSource = TrendSources['sources'][number];

export interface TrendSignals {
  trends: TrendItem[];
  youtube: TitleItem[];
  reddit: TitleItem[];
  pagesFetched: number;
  failed: number;
}

export function parseTrendSources(raw: unknown): TrendSources {
  const parsed = TrendSourcesSchema.safeParse(raw);
  return parsed.success ? parsed.data : TrendSourcesSchema.parse({});
}

export function resolveTrendSourcesPath(): string {
  const fromEnv = String(process.env.TREND_SOURCES_PATH || '').trim();
  return fromEnv ? path.resolve(fromEnv) : path.join(CONFIG_DIR, 'trend-sources.json');
}

export function loadTrendSources(filePath: string = resolveTrendSourcesPath()): TrendSources {
  let text: string;
  try {
    text = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Trend sources not readable at ${filePath}`, { cause: error });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ConfigError(`Trend sources at ${filePath} are not valid JSON`, { cause: error });
  }
  return parseTrendSources(raw);
}

/**
 * Fetch every feed, then up to `maxPagesTotal` result pages in order, routing each page
 * to its parser by URL. Failed fetches are counted and skipped.
 */
export async function collectTrendSignals(fetcher: PageFetcher, config: TrendSources): Promise<TrendSignals> {
  const signals: TrendSignals = { trends: [], youtube: [], reddit: [], pagesFetched: 0, failed: 0 };

  const fetchOrNull = async (url: string): Promise<string | null> => {
    try {
      const body = await fetcher.fetchHtml(url);
      signals.pagesFetched += 1;
      return body;
    } catch (error) {
      signals.failed += 1;
      console.warn(`[ContentIntel] fetch failed for ${url}: ${errorMessage(error)}`);
      return null;
    }
  };

  for (const source of config.sources) {
    if (source.type !== 'rss') continue;
    const xml = await fetchOrNull(source.url);
    if (xml !== null) signals.trends.push(...parseGoogleTrendsRss(xml));
  }

  const pageUrls = config.sources
    .flatMap((source) => (source.type === 'html' ? source.urls : []))
    .slice(0, config.maxPagesTotal);

  for (const url of pageUrls) {
    const html = await fetchOrNull(url);
    if (html === null) continue;
    if (url.includes('youtube.com/results')) {
      signals.youtube.push(...parseYoutubeResults(html));
    } else if (url.includes('reddit.com/r/')) {
      signals.reddit.push(...parseRedditTitles(html));
    }
  }

  console.log(
    `[ContentIntel] signals: trends=${signals.trends.length} youtube=${signals.youtube.length} reddit=${signals.reddit.length} failed=${signals.failed}`
  );
  return signals;
}
