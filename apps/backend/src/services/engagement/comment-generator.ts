import { errorMessage } from '../../lib/errors';
import type { BrandVoice } from '../../lib/targeting-config';
import type { TextGenerator } from '../ai/text-generator';

const MIN_WORDS = 8;
const MAX_WORDS = 20;
const MIN_CHARS = 30;
const CAPTION_MAX_LENGTH = 600;
const RECENT_COMMENTS_TO_AVOID = 10;

export interface CommentTarget {
  caption?: string | null;
  author?: string | null;
  url: string;
  topicHint?: string | null;
}

function brandVoice(brand?: BrandVoice): string {
  const speaker = brand ? `You comment on behalf of ${brand.name}` : 'You comment on behalf of a small self-care brand';
  return [
    `${speaker}: warm, grounded, real.`,
    'Write human comments that sound like a real person, not a bot.',
    'No links. No emoji-only. Avoid generic praise. No repetitive phrasing.',
  ].join('\n');
}

export function wordCount(text: string): number {
  return text.split(/\s+/).filter((word) => word.length > 0).length;
}

/** Single line, no wrapping quotes, no @mentions or #hashtags. */
export function sanitizeComment(raw: string): string {
  return raw
    .replace(/\s+/g, ' ')
    .trim()
    .replace(/^["']+|["']+$/g, '')
    .replace(/@\w+/g, '')
    .replace(/#\w+/g, '')
    .replace(/\s+/g, ' ')
    .trim();
}

export function passesCommentRules(text: string): boolean {
  const words = wordCount(text);
  if (words < MIN_WORDS || words > MAX_WORDS) return false;
  if (text.length < MIN_CHARS) return false;
  return !text.toLowerCase().includes('http');
}

function commentPrompt(caption: string, topicHint: string, recentComments: readonly string[]): string {
  const avoid = recentComments
    .slice(-RECENT_COMMENTS_TO_AVOID)
    .map((comment) => `- ${comment}`)
    .join('\n');
  return `Write ONE Instagram comment.

Requirements:
- 8-20 words.
- References something specific from the post caption (paraphrase a phrase or theme).
- No emojis-only. Max 1 emoji total (optional).
- No links, no hashtags, no @mentions.
- Not generic ("Love this!", "So good!", "Amazing post" are banned).

Post caption:
"""${caption}"""

Topic hint: ${topicHint}

Avoid repeating these phrases/styles:
${avoid || '- (none)'}

Return ONLY the comment text.`;
}

function repairPrompt(badComment: string, caption: string): string {
  return `Fix this comment to meet the rules (8-20 words, specific, not generic, no links/hashtags/@mentions).
Bad comment: ${badComment}
Post caption: ${caption}
Return ONLY the corrected comment.`;
}

/**
 * One comment for a post, or `''` when the model fails or cannot produce a valid comment
 * after one repair pass. Callers mark empty results as failed actions.
 */
export async function generateComment(
  generator: TextGenerator,
  target: CommentTarget,
  recentComments: readonly string[] = [],
  brand?: BrandVoice
): Promise<string> {
  const caption = (target.caption ?? '').slice(0, CAPTION_MAX_LENGTH);
  const topicHint = target.topicHint || 'wellness';
  const system = brandVoice(brand);

  try {
    let text = sanitizeComment(await generator.generate(commentPrompt(caption, topicHint, recentComments), system, 0.7));
    if (!passesCommentRules(text)) {
      text = sanitizeComment(await generator.generate(repairPrompt(text, caption), system, 0.6));
    }
    return passesCommentRules(text) ? text : '';
  } catch (error) {
    console.warn(`[Engagement] comment generation failed for ${target.url}: ${errorMessage(error)}`);
    return '';
  }
}
