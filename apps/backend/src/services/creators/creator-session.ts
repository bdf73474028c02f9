import { errorMessage } from '../../lib/errors';
import type {
  Creator,
  CreatorEdge,
  CreatorEdgePatch,
  CreatorEdgeType,
  CreatorMetricsDaily,
  CreatorPatch,
  CreatorRelationship,
  CreatorSignal,
  EngagementAction,
  EngagementActionType,
  NewCreator,
  NewCreatorEdge,
  NewCreatorMetricsDaily,
  NewCreatorRelationship,
  NewCreatorSignal,
  NewEngagementAction,
  NewOutreachDraft,
  OutreachDraft,
  OutreachStatus,
} from './creator-types';

export interface ListCreatorsQuery {
  limit: number;
  /**
   * - `score`: score desc, followers desc (unknown last), newest first
   * - `recent`: newest first
   * - `intel_due`: never-scanned first, then oldest scan
   */
  order?: 'score' | 'recent' | 'intel_due';
  excludeBrandSpam?: boolean;
  outreachStatus?: OutreachStatus;
  partnersOnly?: boolean;
}

/**
 * One transactional unit of work over the creator tables.
 *
 * Not safe for concurrent use: callers finish their fetch phase first and then drive
 * every read/write from a single task. Inserted rows are guaranteed visible to later
 * queries only after `flush()`.
 */
export interface CreatorSession {
  findCreatorByHandle(handle: string): Promise<Creator | null>;
  findCreatorById(id: number): Promise<Creator | null>;
  insertCreator(data: NewCreator): Promise<Creator>;
  updateCreator(id: number, patch: CreatorPatch): Promise<Creator>;
  listCreators(query: ListCreatorsQuery): Promise<Creator[]>;

  findRelationships(creatorIds: readonly number[]): Promise<Map<number, CreatorRelationship>>;
  insertRelationship(data: NewCreatorRelationship): Promise<CreatorRelationship>;

  findEdge(sourceId: number, targetId: number, edgeType: CreatorEdgeType): Promise<CreatorEdge | null>;
  insertEdge(data: NewCreatorEdge): Promise<CreatorEdge>;
  updateEdge(id: number, patch: CreatorEdgePatch): Promise<CreatorEdge>;
  listEdgeTargets(sourceId: number, edgeTypes: readonly CreatorEdgeType[], limit: number): Promise<number[]>;

  findMetricsSnapshot(creatorId: number, snapshotDate: string): Promise<CreatorMetricsDaily | null>;
  /** Newest snapshot, optionally restricted to days on or before `onOrBefore`. */
  latestMetricsSnapshot(creatorId: number, onOrBefore?: string): Promise<CreatorMetricsDaily | null>;
  insertMetricsSnapshot(data: NewCreatorMetricsDaily): Promise<CreatorMetricsDaily>;
  updateMetricsSnapshot(
    id: number,
    patch: Pick<CreatorMetricsDaily, 'followersEst' | 'postsCount'>
  ): Promise<CreatorMetricsDaily>;

  deleteSignals(creatorId: number): Promise<number>;
  insertSignal(data: NewCreatorSignal): Promise<CreatorSignal>;
  listSignals(creatorId: number): Promise<CreatorSignal[]>;

  /** Creators with a `pending` or `approved` draft. */
  listOpenDraftCreatorIds(): Promise<Set<number>>;
  insertOutreachDraft(data: NewOutreachDraft): Promise<OutreachDraft>;

  findEngagementAction(
    platform: string,
    actionType: EngagementActionType,
    targetUrl: string
  ): Promise<EngagementAction | null>;
  insertEngagementAction(data: NewEngagementAction): Promise<EngagementAction>;

  flush(): Promise<void>;
  commit(): Promise<void>;
  rollback(): Promise<void>;
  release(): void;
}

/**
 * Run `fn` inside one session: commit on success; on any error roll back, release the
 * connection and rethrow.
 */
export async function withCreatorSession<T>(
  openSession: () => Promise<CreatorSession>,
  fn: (session: CreatorSession) => Promise<T>
): Promise<T> {
  const session = await openSession();
  try {
    const result = await fn(session);
    await session.commit();
    return result;
  } catch (error) {
    try {
      await session.rollback();
    } catch (rollbackError) {
      console.error(`[db] rollback failed: ${errorMessage(rollbackError)}`);
    }
    throw error;
  } finally {
    session.release();
  }
}
