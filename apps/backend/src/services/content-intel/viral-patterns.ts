/**
 * Most common hooks, CTAs and topics across already-extracted posts. Works on cached
 * extraction fields only; no engagement metrics are fetched here.
 */

export interface PostExtract {
  hook?: string | null;
  cta?: string | null;
  topics?: ReadonlyArray<string | null> | null;
}

export interface AnalyzedPost {
  extracted?: PostExtract | null;
}

export interface PatternCount {
  text: string;
  count: number;
}

export interface ViralReport {
  topHooks: PatternCount[];
  topCtas: PatternCount[];
  topTopics: PatternCount[];
  postSample: number;
}

const PATTERN_MAX_LENGTH = 140;

function normalizePattern(value: string | null | undefined): string | null {
  if (!value) return null;
  const collapsed = value.split(/\s+/).filter(Boolean).join(' ');
  return collapsed ? collapsed.slice(0, PATTERN_MAX_LENGTH) : null;
}

class PatternCounter {
  private readonly counts = new Map<string, number>();

  add(value: string | null | undefined): void {
    const pattern = normalizePattern(value);
    if (pattern) this.counts.set(pattern, (this.counts.get(pattern) ?? 0) + 1);
  }

  // Array sort is stable: ties stay in first-seen order.
  mostCommon(limit: number): PatternCount[] {
    return [...this.counts.entries()]
      .map(([text, count]) => ({ text, count }))
      .sort((a, b) => b.count - a.count)
      .slice(0, limit);
  }
}

export function buildViralReport(posts: readonly AnalyzedPost[]): ViralReport {
  const hooks = new PatternCounter();
  const ctas = new PatternCounter();
  const topics = new PatternCounter();

  for (const post of posts) {
    const extracted = post.extracted ?? {};
    hooks.add(extracted.hook);
    ctas.add(extracted.cta);
    for (const topic of extracted.topics ?? []) topics.add(topic);
  }

  return {
    topHooks: hooks.mostCommon(10),
    topCtas: ctas.mostCommon(10),
    topTopics: topics.mostCommon(15),
    postSample: posts.length,
  };
}
