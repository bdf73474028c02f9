import * as cheerio from 'cheerio';
import { XMLParser } from 'fast-xml-parser';
import { errorMessage } from '../../lib/errors';

export type TrendItem = {
  trend: string;
  traffic: string;
};

export type TitleItem = {
  title: string;
};

const MAX_TRENDS = 20;
const MAX_VIDEO_TITLES = 20;
const MAX_THREAD_HEADINGS = 25;
const THREAD_TITLE_MIN = 12;
const THREAD_TITLE_MAX = 140;

const rssParser = new XMLParser({
  ignoreAttributes: true,
  processEntities: true,
  parseTagValue: false,
  trimValues: true,
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function text(value: unknown): string {
  if (typeof value === 'string') return value.trim();
  if (typeof value === 'number') return String(value);
  // <title><![CDATA[..]]></title> and tags with attributes come back as objects
  if (isRecord(value) && typeof value['#text'] === 'string') return value['#text'].trim();
  return '';
}

function toList(value: unknown): unknown[] {
  if (value === undefined || value === null) return [];
  return Array.isArray(value) ? value : [value];
}

/** Daily-trends RSS (`<item><title>` + `<ht:approx_traffic>`). */
export function parseGoogleTrendsRss(xml: string): TrendItem[] {
  let doc: unknown;
  try {
    doc = rssParser.parse(xml);
  } catch (error) {
    console.warn(`[ContentIntel] unreadable trends feed: ${errorMessage(error)}`);
    return [];
  }

  const rss = isRecord(doc) ? doc.rss : undefined;
  const channel = isRecord(rss) ? rss.channel : undefined;
  const items = isRecord(channel) ? toList(channel.item) : [];

  return items
    .slice(0, MAX_TRENDS)
    .filter(isRecord)
    .map((item) => ({ trend: text(item.title), traffic: text(item['ht:approx_traffic']) }));
}

/** Search result titles. Results render client-side, so this is a rough signal. */
export function parseYoutubeResults(html: string): TitleItem[] {
  const $ = cheerio.load(html);
  const out: TitleItem[] = [];
  for (const anchor of $('a#video-title').toArray().slice(0, MAX_VIDEO_TITLES)) {
    const title = ($(anchor).attr('title') ?? '').trim();
    if (title) out.push({ title });
  }
  return out;
}

export function parseRedditTitles(html: string): TitleItem[] {
  const $ = cheerio.load(html);
  const out: TitleItem[] = [];
  for (const heading of $('h3').toArray().slice(0, MAX_THREAD_HEADINGS)) {
    const title = $(heading).text().trim();
    if (title.length >= THREAD_TITLE_MIN && title.length <= THREAD_TITLE_MAX) out.push({ title });
  }
  return out;
}
