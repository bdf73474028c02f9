import type { BrandVoice } from '../../lib/targeting-config';
import type { TextGenerator } from '../ai/text-generator';
import type { CreatorSession } from '../creators/creator-session';
import { normalizeHandle } from '../scraper/instagram-html';
import { scheduleActions } from './action-scheduler';
import { generateComment, type CommentTarget } from './comment-generator';

const PLATFORM = 'instagram';
const CAPTION_MAX_LENGTH = 2000;

export interface QueueEngagementDeps {
  session: CreatorSession;
  generator: TextGenerator | null;
  brand?: BrandVoice;
  startAt?: Date;
  perHour?: number;
  now?: () => Date;
}

export interface QueueEngagementSummary {
  ok: true;
  queued: number;
  failed: number;
  duplicates: number;
}

/**
 * Draft and schedule one comment action per new target. Targets already queued for the
 * same (platform, action, url) are skipped; targets without a usable comment are stored
 * as `failed` so they are visible for review.
 */
export async function queueEngagementComments(
  targets: readonly CommentTarget[],
  deps: QueueEngagementDeps
): Promise<QueueEngagementSummary> {
  const { session } = deps;
  const now = deps.now ?? (() => new Date());

  const fresh: CommentTarget[] = [];
  const seenUrls = new Set<string>();
  let duplicates = 0;
  for (const target of targets) {
    const url = target.url.trim();
    if (!url) continue;
    if (seenUrls.has(url) || (await session.findEngagementAction(PLATFORM, 'comment', url))) {
      duplicates += 1;
      continue;
    }
    seenUrls.add(url);
    fresh.push({ ...target, url });
  }

  const schedule = scheduleActions(fresh.length, deps.startAt ?? now(), deps.perHour);
  const recent: string[] = [];
  let queued = 0;
  let failed = 0;

  for (const [index, target] of fresh.entries()) {
    const comment = deps.generator ? await generateComment(deps.generator, target, recent, deps.brand) : '';
    if (comment) recent.push(comment);

    await session.insertEngagementAction({
      platform: PLATFORM,
      targetUrl: target.url,
      targetHandle: target.author ? normalizeHandle(target.author) || null : null,
      targetCaption: target.caption ? target.caption.slice(0, CAPTION_MAX_LENGTH) : null,
      actionType: 'comment',
      proposedText: comment || null,
      scheduledFor: schedule[index] ?? null,
      status: comment ? 'pending' : 'failed',
      notes: comment ? null : 'comment_generation_failed',
      createdAt: now(),
    });
    if (comment) queued += 1;
    else failed += 1;
  }

  console.log(`[Engagement] queued=${queued} failed=${failed} duplicates=${duplicates}`);
  return { ok: true, queued, failed, duplicates };
}
