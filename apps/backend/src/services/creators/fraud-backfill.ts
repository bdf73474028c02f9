import type { CreatorSession } from './creator-session';
import { assessFraud, isExcludable } from './fraud-detection';

/**
 * Re-score stored creators and apply hard excludes. `do_not_contact` is left untouched.
 * Returns how many creators were rewritten.
 */
export async function backfillFraudScores(session: CreatorSession, creatorIds: readonly number[]): Promise<number> {
  let rewritten = 0;
  for (const id of new Set(creatorIds)) {
    const creator = await session.findCreatorById(id);
    if (!creator) continue;

    const fraud = assessFraud(creator);
    const reason = isExcludable(creator);
    const markExcluded = reason !== null && creator.outreachStatus !== 'do_not_contact';

    await session.updateCreator(creator.id, {
      fraudScore: fraud.score,
      fraudFlags: { ...creator.fraudFlags, ...fraud.flags },
      ...(markExcluded ? { outreachStatus: 'excluded' as const, outreachExcludeReason: reason } : {}),
    });
    rewritten += 1;
  }
  return rewritten;
}
