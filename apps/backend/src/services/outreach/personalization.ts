import type { BrandVoice } from '../../lib/targeting-config';
import type { Creator } from '../creators/creator-types';
import { splitNicheTags } from '../creators/similarity';

const TOPIC_KEYWORDS = ['skincare', 'body care', 'wellness', 'herbal', 'self-care', 'faith', 'natural hair'];

export interface PersonalizationContext {
  topNiche: string | null;
  recentTopic: string | null;
  compliment: string | null;
}

export function buildPersonalizationContext(creator: Pick<Creator, 'nicheTags' | 'notes'>): PersonalizationContext {
  const topNiche = splitNicheTags(creator.nicheTags)[0] ?? null;
  const notes = (creator.notes ?? '').toLowerCase();
  const recentTopic = TOPIC_KEYWORDS.find((topic) => notes.includes(topic)) ?? null;

  let compliment: string | null = null;
  if (topNiche) compliment = `I love how you share about ${topNiche}.`;
  else if (recentTopic) compliment = `I really enjoy your ${recentTopic} content.`;

  return { topNiche, recentTopic, compliment };
}

/** Deterministic DM; safe generic language when nothing is known about the creator. */
export function buildPersonalizedDm(
  creator: Pick<Creator, 'handle' | 'nicheTags' | 'notes'>,
  brand: BrandVoice,
  campaignName?: string | null
): string {
  const context = buildPersonalizationContext(creator);
  const handle = creator.handle.replace(/^@+/, '').trim() || 'there';
  const opener = context.compliment ?? 'I love your content and the way you show up for your community.';
  const campaign = campaignName ? ` (${campaignName})` : '';

  return [
    `Hey @${handle}!`,
    opener,
    `I'm with ${brand.name}${campaign}: ${brand.pitch}. Would you be open to a gifted collab + optional affiliate code if it feels aligned?`,
    `If yes, I can send quick details and let you choose what you'd love to try.`,
    `- ${brand.signature}`,
  ].join('\n\n');
}
