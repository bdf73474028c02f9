import type { QueryResultRow } from 'pg';
import { timedQuery, type PgClientLike } from '../../lib/db';
import type { CreatorSession, ListCreatorsQuery } from './creator-session';
import {
  CREATOR_EDGE_TYPES,
  CREATOR_SIGNAL_TYPES,
  ENGAGEMENT_ACTION_STATUSES,
  ENGAGEMENT_ACTION_TYPES,
  OUTREACH_DRAFT_STATUSES,
  OUTREACH_STATUSES,
  RELATIONSHIP_STATUSES,
  type Creator,
  type CreatorEdge,
  type CreatorEdgePatch,
  type CreatorEdgeType,
  type CreatorMetricsDaily,
  type CreatorPatch,
  type CreatorRelationship,
  type CreatorSignal,
  type EngagementAction,
  type EngagementActionType,
  type NewCreator,
  type NewCreatorEdge,
  type NewCreatorMetricsDaily,
  type NewCreatorRelationship,
  type NewCreatorSignal,
  type NewEngagementAction,
  type NewOutreachDraft,
  type OutreachDraft,
} from './creator-types';

type CreatorRow = {
  id: number;
  handle: string;
  platform: string;
  followers_est: number | null;
  posts_count: number | null;
  avg_engagement_rate: number | null;
  is_brand: boolean;
  is_spam: boolean;
  fraud_score: number;
  fraud_flags: unknown;
  niche_tags: string | null;
  notes: string | null;
  score: number;
  outreach_status: string;
  outreach_exclude_reason: string | null;
  growth_7d: number | null;
  growth_30d: number | null;
  niche_score: number | null;
  is_partner: boolean;
  last_scraped_at: Date | null;
  last_intel_run_at: Date | null;
  created_at: Date;
};

type RelationshipRow = {
  id: number;
  creator_id: number;
  status: string;
  last_contacted_at: Date | null;
  notes: string | null;
  created_at: Date;
};

type EdgeRow = {
  id: number;
  source_creator_id: number;
  target_creator_id: number;
  edge_type: string;
  weight: number;
  metadata: unknown;
  last_seen_at: Date;
  created_at: Date;
};

type MetricsRow = {
  id: number;
  creator_id: number;
  snapshot_date: string;
  followers_est: number | null;
  posts_count: number | null;
};

type SignalRow = {
  id: number;
  creator_id: number;
  signal_type: string;
  signal_text: string;
  weight: number;
  source_url: string | null;
  created_at: Date;
};

type DraftRow = {
  id: number;
  creator_id: number;
  message: string;
  offer_type: string | null;
  campaign_name: string | null;
  status: string;
  created_at: Date;
};

type ActionRow = {
  id: number;
  platform: string;
  target_url: string;
  target_handle: string | null;
  target_caption: string | null;
  action_type: string;
  proposed_text: string | null;
  scheduled_for: Date | null;
  status: string;
  notes: string | null;
  created_at: Date;
};

const CREATOR_COLUMNS: Record<keyof Omit<Creator, 'id'>, string> = {
  handle: 'handle',
  platform: 'platform',
  followersEst: 'followers_est',
  postsCount: 'posts_count',
  avgEngagementRate: 'avg_engagement_rate',
  isBrand: 'is_brand',
  isSpam: 'is_spam',
  fraudScore: 'fraud_score',
  fraudFlags: 'fraud_flags',
  nicheTags: 'niche_tags',
  notes: 'notes',
  score: 'score',
  outreachStatus: 'outreach_status',
  outreachExcludeReason: 'outreach_exclude_reason',
  growth7d: 'growth_7d',
  growth30d: 'growth_30d',
  nicheScore: 'niche_score',
  isPartner: 'is_partner',
  lastScrapedAt: 'last_scraped_at',
  lastIntelRunAt: 'last_intel_run_at',
  createdAt: 'created_at',
};

const CREATOR_ORDER: Record<NonNullable<ListCreatorsQuery['order']>, string> = {
  score: 'score DESC, followers_est DESC NULLS LAST, created_at DESC, id DESC',
  recent: 'created_at DESC, id DESC',
  intel_due: 'last_intel_run_at ASC NULLS FIRST, id ASC',
};

function pickEnum<T extends string>(value: string, allowed: readonly T[], fallback: T): T {
  const match = allowed.find((item) => item === value);
  return match ?? fallback;
}

function toScalarRecord(value: unknown): Record<string, string | number | boolean> {
  const out: Record<string, string | number | boolean> = {};
  if (!value || typeof value !== 'object' || Array.isArray(value)) return out;
  for (const [key, entry] of Object.entries(value)) {
    if (typeof entry === 'string' || typeof entry === 'number' || typeof entry === 'boolean') {
      out[key] = entry;
    }
  }
  return out;
}

function toCreator(row: CreatorRow): Creator {
  return {
    id: row.id,
    handle: row.handle,
    platform: row.platform,
    followersEst: row.followers_est,
    postsCount: row.posts_count,
    avgEngagementRate: row.avg_engagement_rate,
    isBrand: row.is_brand,
    isSpam: row.is_spam,
    fraudScore: row.fraud_score,
    fraudFlags: toScalarRecord(row.fraud_flags),
    nicheTags: row.niche_tags,
    notes: row.notes,
    score: row.score,
    outreachStatus: pickEnum(row.outreach_status, OUTREACH_STATUSES, 'eligible'),
    outreachExcludeReason: row.outreach_exclude_reason,
    growth7d: row.growth_7d,
    growth30d: row.growth_30d,
    nicheScore: row.niche_score,
    isPartner: row.is_partner,
    lastScrapedAt: row.last_scraped_at,
    lastIntelRunAt: row.last_intel_run_at,
    createdAt: row.created_at,
  };
}

function toRelationship(row: RelationshipRow): CreatorRelationship {
  return {
    id: row.id,
    creatorId: row.creator_id,
    status: pickEnum(row.status, RELATIONSHIP_STATUSES, 'new'),
    lastContactedAt: row.last_contacted_at,
    notes: row.notes,
    createdAt: row.created_at,
  };
}

function toEdge(row: EdgeRow): CreatorEdge {
  return {
    id: row.id,
    sourceCreatorId: row.source_creator_id,
    targetCreatorId: row.target_creator_id,
    edgeType: pickEnum(row.edge_type, CREATOR_EDGE_TYPES, 'mention'),
    weight: row.weight,
    metadata: row.metadata === null ? null : toScalarRecord(row.metadata),
    lastSeenAt: row.last_seen_at,
    createdAt: row.created_at,
  };
}

function toMetrics(row: MetricsRow): CreatorMetricsDaily {
  return {
    id: row.id,
    creatorId: row.creator_id,
    snapshotDate: row.snapshot_date,
    followersEst: row.followers_est,
    postsCount: row.posts_count,
  };
}

function toSignal(row: SignalRow): CreatorSignal {
  return {
    id: row.id,
    creatorId: row.creator_id,
    signalType: pickEnum(row.signal_type, CREATOR_SIGNAL_TYPES, 'bio'),
    signalText: row.signal_text,
    weight: row.weight,
    sourceUrl: row.source_url,
    createdAt: row.created_at,
  };
}

function toDraft(row: DraftRow): OutreachDraft {
  return {
    id: row.id,
    creatorId: row.creator_id,
    message: row.message,
    offerType: row.offer_type,
    campaignName: row.campaign_name,
    status: pickEnum(row.status, OUTREACH_DRAFT_STATUSES, 'pending'),
    createdAt: row.created_at,
  };
}

function toAction(row: ActionRow): EngagementAction {
  return {
    id: row.id,
    platform: row.platform,
    targetUrl: row.target_url,
    targetHandle: row.target_handle,
    targetCaption: row.target_caption,
    actionType: pickEnum(row.action_type, ENGAGEMENT_ACTION_TYPES, 'comment'),
    proposedText: row.proposed_text,
    scheduledFor: row.scheduled_for,
    status: pickEnum(row.status, ENGAGEMENT_ACTION_STATUSES, 'pending'),
    notes: row.notes,
    createdAt: row.created_at,
  };
}

function columnValue(value: unknown): unknown {
  // jsonb columns take serialized objects
  if (value !== null && typeof value === 'object' && !(value instanceof Date)) return JSON.stringify(value);
  return value;
}

function firstRow<T>(rows: T[], what: string): T {
  const row = rows[0];
  if (!row) throw new Error(`[db] ${what} returned no row`);
  return row;
}

const CREATOR_SELECT = `SELECT * FROM creators`;
const METRICS_SELECT = `SELECT id, creator_id, snapshot_date::text AS snapshot_date, followers_est, posts_count
  FROM creator_metrics_daily`;

/**
 * `CreatorSession` over one pooled client inside an explicit transaction.
 * Statements are visible to the same client as soon as they run, so `flush` has nothing to do.
 */
export class PgCreatorSession implements CreatorSession {
  private finished = false;

  constructor(private readonly client: PgClientLike) {}

  static async open(pool: { connect(): Promise<PgClientLike> }): Promise<PgCreatorSession> {
    const client = await pool.connect();
    try {
      await client.query('BEGIN');
    } catch (error) {
      client.release();
      throw error;
    }
    return new PgCreatorSession(client);
  }

  private async rows<T extends QueryResultRow>(text: string, values: unknown[] = [], label?: string): Promise<T[]> {
    const res = await timedQuery<T>(this.client, text, values, label);
    return res.rows;
  }

  async findCreatorByHandle(handle: string): Promise<Creator | null> {
    const rows = await this.rows<CreatorRow>(`${CREATOR_SELECT} WHERE handle = $1 LIMIT 1`, [handle], 'creator by handle');
    return rows[0] ? toCreator(rows[0]) : null;
  }

  async findCreatorById(id: number): Promise<Creator | null> {
    const rows = await this.rows<CreatorRow>(`${CREATOR_SELECT} WHERE id = $1`, [id], 'creator by id');
    return rows[0] ? toCreator(rows[0]) : null;
  }

  async insertCreator(data: NewCreator): Promise<Creator> {
    const keys = Object.keys(CREATOR_COLUMNS).filter((key): key is keyof NewCreator => key in data);
    const columns = keys.map((key) => CREATOR_COLUMNS[key]);
    const values = keys.map((key) => columnValue(data[key]));
    const placeholders = values.map((_, index) => `$${index + 1}`);
    const rows = await this.rows<CreatorRow>(
      `INSERT INTO creators (${columns.join(', ')}) VALUES (${placeholders.join(', ')}) RETURNING *`,
      values,
      'insert creator'
    );
    return toCreator(firstRow(rows, 'insert creator'));
  }

  async updateCreator(id: number, patch: CreatorPatch): Promise<Creator> {
    const keys = Object.keys(patch).filter(
      (key): key is keyof CreatorPatch => key in CREATOR_COLUMNS && key !== 'handle' && key !== 'createdAt'
    );
    if (keys.length === 0) {
      const current = await this.findCreatorById(id);
      if (!current) throw new Error(`[db] creator ${id} not found`);
      return current;
    }
    const assignments = keys.map((key, index) => `${CREATOR_COLUMNS[key]} = $${index + 2}`);
    const values = keys.map((key) => columnValue(patch[key]));
    const rows = await this.rows<CreatorRow>(
      `UPDATE creators SET ${assignments.join(', ')} WHERE id = $1 RETURNING *`,
      [id, ...values],
      'update creator'
    );
    return toCreator(firstRow(rows, `update creator ${id}`));
  }

  async listCreators(query: ListCreatorsQuery): Promise<Creator[]> {
    const where: string[] = [];
    const values: unknown[] = [];
    if (query.excludeBrandSpam) where.push('is_brand = false AND is_spam = false');
    if (query.partnersOnly) where.push('is_partner = true');
    if (query.outreachStatus) {
      values.push(query.outreachStatus);
      where.push(`outreach_status = $${values.length}`);
    }
    values.push(Math.max(0, Math.floor(query.limit)));
    const rows = await this.rows<CreatorRow>(
      `${CREATOR_SELECT}
       ${where.length ? `WHERE ${where.join(' AND ')}` : ''}
       ORDER BY ${CREATOR_ORDER[query.order ?? 'score']}
       LIMIT $${values.length}`,
      values,
      'list creators'
    );
    return rows.map(toCreator);
  }

  async findRelationships(creatorIds: readonly number[]): Promise<Map<number, CreatorRelationship>> {
    const out = new Map<number, CreatorRelationship>();
    if (creatorIds.length === 0) return out;
    const rows = await this.rows<RelationshipRow>(
      `SELECT * FROM creator_relationships WHERE creator_id = ANY($1::int[])`,
      [[...creatorIds]],
      'relationships'
    );
    for (const row of rows) out.set(row.creator_id, toRelationship(row));
    return out;
  }

  async insertRelationship(data: NewCreatorRelationship): Promise<CreatorRelationship> {
    const rows = await this.rows<RelationshipRow>(
      `INSERT INTO creator_relationships (creator_id, status, last_contacted_at, notes, created_at)
       VALUES ($1, $2, $3, $4, $5) RETURNING *`,
      [data.creatorId, data.status, data.lastContactedAt, data.notes, data.createdAt],
      'insert relationship'
    );
    return toRelationship(firstRow(rows, 'insert relationship'));
  }

  async findEdge(sourceId: number, targetId: number, edgeType: CreatorEdgeType): Promise<CreatorEdge | null> {
    const rows = await this.rows<EdgeRow>(
      `SELECT * FROM creator_edges
        WHERE source_creator_id = $1 AND target_creator_id = $2 AND edge_type = $3
        LIMIT 1`,
      [sourceId, targetId, edgeType],
      'find edge'
    );
    return rows[0] ? toEdge(rows[0]) : null;
  }

  async insertEdge(data: NewCreatorEdge): Promise<CreatorEdge> {
    const rows = await this.rows<EdgeRow>(
      `INSERT INTO creator_edges
         (source_creator_id, target_creator_id, edge_type, weight, metadata, last_seen_at, created_at)
       VALUES ($1, $2, $3, $4, $5, $6, $7) RETURNING *`,
      [
        data.sourceCreatorId,
        data.targetCreatorId,
        data.edgeType,
        data.weight,
        columnValue(data.metadata),
        data.lastSeenAt,
        data.createdAt,
      ],
      'insert edge'
    );
    return toEdge(firstRow(rows, 'insert edge'));
  }

  async updateEdge(id: number, patch: CreatorEdgePatch): Promise<CreatorEdge> {
    const rows = await this.rows<EdgeRow>(
      `UPDATE creator_edges SET weight = $2, metadata = $3, last_seen_at = $4 WHERE id = $1 RETURNING *`,
      [id, patch.weight, columnValue(patch.metadata), patch.lastSeenAt],
      'update edge'
    );
    return toEdge(firstRow(rows, `update edge ${id}`));
  }

  async listEdgeTargets(sourceId: number, edgeTypes: readonly CreatorEdgeType[], limit: number): Promise<number[]> {
    const rows = await this.rows<{ target_creator_id: number }>(
      `SELECT target_creator_id FROM creator_edges
        WHERE source_creator_id = $1 AND edge_type = ANY($2::text[])
        ORDER BY id
        LIMIT $3`,
      [sourceId, [...edgeTypes], limit],
      'edge targets'
    );
    return rows.map((row) => row.target_creator_id);
  }

  async findMetricsSnapshot(creatorId: number, snapshotDate: string): Promise<CreatorMetricsDaily | null> {
    const rows = await this.rows<MetricsRow>(
      `${METRICS_SELECT} WHERE creator_id = $1 AND snapshot_date = $2::date`,
      [creatorId, snapshotDate],
      'metrics snapshot'
    );
    return rows[0] ? toMetrics(rows[0]) : null;
  }

  async latestMetricsSnapshot(creatorId: number, onOrBefore?: string): Promise<CreatorMetricsDaily | null> {
    const rows = onOrBefore
      ? await this.rows<MetricsRow>(
          `${METRICS_SELECT} WHERE creator_id = $1 AND snapshot_date <= $2::date ORDER BY snapshot_date DESC LIMIT 1`,
          [creatorId, onOrBefore],
          'metrics on or before'
        )
      : await this.rows<MetricsRow>(
          `${METRICS_SELECT} WHERE creator_id = $1 ORDER BY snapshot_date DESC LIMIT 1`,
          [creatorId],
          'latest metrics'
        );
    return rows[0] ? toMetrics(rows[0]) : null;
  }

  async insertMetricsSnapshot(data: NewCreatorMetricsDaily): Promise<CreatorMetricsDaily> {
    const rows = await this.rows<MetricsRow>(
      `INSERT INTO creator_metrics_daily (creator_id, snapshot_date, followers_est, posts_count)
       VALUES ($1, $2::date, $3, $4)
       RETURNING id, creator_id, snapshot_date::text AS snapshot_date, followers_est, posts_count`,
      [data.creatorId, data.snapshotDate, data.followersEst, data.postsCount],
      'insert metrics'
    );
    return toMetrics(firstRow(rows, 'insert metrics'));
  }

  async updateMetricsSnapshot(
    id: number,
    patch: Pick<CreatorMetricsDaily, 'followersEst' | 'postsCount'>
  ): Promise<CreatorMetricsDaily> {
    const rows = await this.rows<MetricsRow>(
      `UPDATE creator_metrics_daily SET followers_est = $2, posts_count = $3 WHERE id = $1
       RETURNING id, creator_id, snapshot_date::text AS snapshot_date, followers_est, posts_count`,
      [id, patch.followersEst, patch.postsCount],
      'update metrics'
    );
    return toMetrics(firstRow(rows, `update metrics ${id}`));
  }

  async deleteSignals(creatorId: number): Promise<number> {
    const res = await timedQuery(this.client, `DELETE FROM creator_signals WHERE creator_id = $1`, [creatorId], 'delete signals');
    return res.rowCount ?? 0;
  }

  async insertSignal(data: NewCreatorSignal): Promise<CreatorSignal> {
    const rows = await this.rows<SignalRow>(
      `INSERT INTO creator_signals (creator_id, signal_type, signal_text, weight, source_url, created_at)
       VALUES ($1, $2, $3, $4, $5, $6) RETURNING *`,
      [data.creatorId, data.signalType, data.signalText, data.weight, data.sourceUrl, data.createdAt],
      'insert signal'
    );
    return toSignal(firstRow(rows, 'insert signal'));
  }

  async listSignals(creatorId: number): Promise<CreatorSignal[]> {
    const rows = await this.rows<SignalRow>(
      `SELECT * FROM creator_signals WHERE creator_id = $1 ORDER BY id`,
      [creatorId],
      'list signals'
    );
    return rows.map(toSignal);
  }

  async listOpenDraftCreatorIds(): Promise<Set<number>> {
    const rows = await this.rows<{ creator_id: number }>(
      `SELECT DISTINCT creator_id FROM outreach_drafts WHERE status IN ('pending', 'approved')`,
      [],
      'open drafts'
    );
    return new Set(rows.map((row) => row.creator_id));
  }

  async insertOutreachDraft(data: NewOutreachDraft): Promise<OutreachDraft> {
    const rows = await this.rows<DraftRow>(
      `INSERT INTO outreach_drafts (creator_id, message, offer_type, campaign_name, status, created_at)
       VALUES ($1, $2, $3, $4, $5, $6) RETURNING *`,
      [data.creatorId, data.message, data.offerType, data.campaignName, data.status, data.createdAt],
      'insert draft'
    );
    return toDraft(firstRow(rows, 'insert draft'));
  }

  async findEngagementAction(
    platform: string,
    actionType: EngagementActionType,
    targetUrl: string
  ): Promise<EngagementAction | null> {
    const rows = await this.rows<ActionRow>(
      `SELECT * FROM engagement_actions
        WHERE platform = $1 AND action_type = $2 AND target_url = $3
        LIMIT 1`,
      [platform, actionType, targetUrl],
      'find action'
    );
    return rows[0] ? toAction(rows[0]) : null;
  }

  async insertEngagementAction(data: NewEngagementAction): Promise<EngagementAction> {
    const rows = await this.rows<ActionRow>(
      `INSERT INTO engagement_actions
         (platform, target_url, target_handle, target_caption, action_type, proposed_text,
          scheduled_for, status, notes, created_at)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10) RETURNING *`,
      [
        data.platform,
        data.targetUrl,
        data.targetHandle,
        data.targetCaption,
        data.actionType,
        data.proposedText,
        data.scheduledFor,
        data.status,
        data.notes,
        data.createdAt,
      ],
      'insert action'
    );
    return toAction(firstRow(rows, 'insert action'));
  }

  async flush(): Promise<void> {
    // statements already run inside the open transaction
  }

  async commit(): Promise<void> {
    await this.end('COMMIT');
  }

  async rollback(): Promise<void> {
    await this.end('ROLLBACK');
  }

  private async end(statement: 'COMMIT' | 'ROLLBACK'): Promise<void> {
    if (this.finished) return;
    this.finished = true;
    await this.client.query(statement);
  }

  release(): void {
    this.client.release();
  }
}
