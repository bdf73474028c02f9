import type { CreatorSession, ListCreatorsQuery } from '../../services/creators/creator-session';
import {
  newCreatorRecord,
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
} from '../../services/creators/creator-types';

export interface MemoryTables {
  nextId: number;
  creators: Creator[];
  relationships: CreatorRelationship[];
  edges: CreatorEdge[];
  metrics: CreatorMetricsDaily[];
  signals: CreatorSignal[];
  drafts: OutreachDraft[];
  actions: EngagementAction[];
}

const SEED_TIME = new Date('2026-01-01T00:00:00Z');

/**
 * In-process stand-in for the creator tables. Sessions work on a copy that is written back
 * on commit; creators inserted in a session stay invisible to handle lookups and listings
 * until `flush()`, like rows in an unflushed unit of work. Unique constraints throw.
 */
export class MemoryCreatorStore {
  tables: MemoryTables = {
    nextId: 1,
    creators: [],
    relationships: [],
    edges: [],
    metrics: [],
    signals: [],
    drafts: [],
    actions: [],
  };
  commits = 0;
  rollbacks = 0;
  releases = 0;

  seedCreator(handle: string, overrides: Partial<NewCreator> = {}): Creator {
    const creator: Creator = { id: this.tables.nextId++, ...newCreatorRecord(handle, SEED_TIME, overrides) };
    this.tables.creators.push(creator);
    return creator;
  }

  seedRelationship(creatorId: number, status: CreatorRelationship['status']): CreatorRelationship {
    const relationship: CreatorRelationship = {
      id: this.tables.nextId++,
      creatorId,
      status,
      lastContactedAt: null,
      notes: null,
      createdAt: SEED_TIME,
    };
    this.tables.relationships.push(relationship);
    return relationship;
  }

  seedMetrics(creatorId: number, snapshotDate: string, followersEst: number | null): CreatorMetricsDaily {
    const row: CreatorMetricsDaily = { id: this.tables.nextId++, creatorId, snapshotDate, followersEst, postsCount: null };
    this.tables.metrics.push(row);
    return row;
  }

  creator(handle: string): Creator | undefined {
    return this.tables.creators.find((creator) => creator.handle === handle);
  }

  edgesOfType(edgeType: CreatorEdgeType): CreatorEdge[] {
    return this.tables.edges.filter((edge) => edge.edgeType === edgeType);
  }

  async openSession(): Promise<MemoryCreatorSession> {
    return new MemoryCreatorSession(this);
  }
}

function compareNullableAsc(a: number | null, b: number | null): number {
  if (a === b) return 0;
  if (a === null) return -1;
  if (b === null) return 1;
  return a - b;
}

function compareNullableDesc(a: number | null, b: number | null): number {
  if (a === b) return 0;
  if (a === null) return 1;
  if (b === null) return -1;
  return b - a;
}

export class MemoryCreatorSession implements CreatorSession {
  private working: MemoryTables;
  private readonly pendingCreatorIds = new Set<number>();
  private finished = false;

  constructor(private readonly store: MemoryCreatorStore) {
    this.working = structuredClone(store.tables);
  }

  private nextId(): number {
    return this.working.nextId++;
  }

  private visibleCreators(): Creator[] {
    return this.working.creators.filter((creator) => !this.pendingCreatorIds.has(creator.id));
  }

  private requireCreator(id: number): Creator {
    const creator = this.working.creators.find((row) => row.id === id);
    if (!creator) throw new Error(`creator ${id} not found`);
    return creator;
  }

  async findCreatorByHandle(handle: string): Promise<Creator | null> {
    const creator = this.visibleCreators().find((row) => row.handle === handle);
    return creator ? structuredClone(creator) : null;
  }

  async findCreatorById(id: number): Promise<Creator | null> {
    const creator = this.working.creators.find((row) => row.id === id);
    return creator ? structuredClone(creator) : null;
  }

  async insertCreator(data: NewCreator): Promise<Creator> {
    if (this.working.creators.some((row) => row.handle === data.handle)) {
      throw new Error(`duplicate key value violates unique constraint "creators_handle_key" (${data.handle})`);
    }
    const creator: Creator = { id: this.nextId(), ...structuredClone(data) };
    this.working.creators.push(creator);
    this.pendingCreatorIds.add(creator.id);
    return structuredClone(creator);
  }

  async updateCreator(id: number, patch: CreatorPatch): Promise<Creator> {
    const creator = this.requireCreator(id);
    Object.assign(creator, structuredClone(patch));
    return structuredClone(creator);
  }

  async listCreators(query: ListCreatorsQuery): Promise<Creator[]> {
    let rows = this.visibleCreators();
    if (query.excludeBrandSpam) rows = rows.filter((row) => !row.isBrand && !row.isSpam);
    if (query.partnersOnly) rows = rows.filter((row) => row.isPartner);
    if (query.outreachStatus) rows = rows.filter((row) => row.outreachStatus === query.outreachStatus);

    const order = query.order ?? 'score';
    rows = [...rows].sort((a, b) => {
      if (order === 'intel_due') {
        return compareNullableAsc(a.lastIntelRunAt?.getTime() ?? null, b.lastIntelRunAt?.getTime() ?? null) || a.id - b.id;
      }
      const recency = b.createdAt.getTime() - a.createdAt.getTime() || b.id - a.id;
      if (order === 'recent') return recency;
      return b.score - a.score || compareNullableDesc(a.followersEst, b.followersEst) || recency;
    });
    return structuredClone(rows.slice(0, Math.max(0, query.limit)));
  }

  async findRelationships(creatorIds: readonly number[]): Promise<Map<number, CreatorRelationship>> {
    const out = new Map<number, CreatorRelationship>();
    for (const row of this.working.relationships) {
      if (creatorIds.includes(row.creatorId)) out.set(row.creatorId, structuredClone(row));
    }
    return out;
  }

  async insertRelationship(data: NewCreatorRelationship): Promise<CreatorRelationship> {
    if (this.working.relationships.some((row) => row.creatorId === data.creatorId)) {
      throw new Error(`duplicate relationship for creator ${data.creatorId}`);
    }
    const row: CreatorRelationship = { id: this.nextId(), ...structuredClone(data) };
    this.working.relationships.push(row);
    return structuredClone(row);
  }

  async findEdge(sourceId: number, targetId: number, edgeType: CreatorEdgeType): Promise<CreatorEdge | null> {
    const edge = this.working.edges.find(
      (row) => row.sourceCreatorId === sourceId && row.targetCreatorId === targetId && row.edgeType === edgeType
    );
    return edge ? structuredClone(edge) : null;
  }

  async insertEdge(data: NewCreatorEdge): Promise<CreatorEdge> {
    if (data.sourceCreatorId === data.targetCreatorId) {
      throw new Error('self-edge violates check constraint');
    }
    if (await this.findEdge(data.sourceCreatorId, data.targetCreatorId, data.edgeType)) {
      throw new Error(`duplicate edge ${data.sourceCreatorId}->${data.targetCreatorId} (${data.edgeType})`);
    }
    const edge: CreatorEdge = { id: this.nextId(), ...structuredClone(data) };
    this.working.edges.push(edge);
    return structuredClone(edge);
  }

  async updateEdge(id: number, patch: CreatorEdgePatch): Promise<CreatorEdge> {
    const edge = this.working.edges.find((row) => row.id === id);
    if (!edge) throw new Error(`edge ${id} not found`);
    Object.assign(edge, structuredClone(patch));
    return structuredClone(edge);
  }

  async listEdgeTargets(sourceId: number, edgeTypes: readonly CreatorEdgeType[], limit: number): Promise<number[]> {
    return this.working.edges
      .filter((row) => row.sourceCreatorId === sourceId && edgeTypes.includes(row.edgeType))
      .slice(0, limit)
      .map((row) => row.targetCreatorId);
  }

  async findMetricsSnapshot(creatorId: number, snapshotDate: string): Promise<CreatorMetricsDaily | null> {
    const row = this.working.metrics.find((item) => item.creatorId === creatorId && item.snapshotDate === snapshotDate);
    return row ? structuredClone(row) : null;
  }

  async latestMetricsSnapshot(creatorId: number, onOrBefore?: string): Promise<CreatorMetricsDaily | null> {
    const rows = this.working.metrics
      .filter((item) => item.creatorId === creatorId && (onOrBefore === undefined || item.snapshotDate <= onOrBefore))
      .sort((a, b) => b.snapshotDate.localeCompare(a.snapshotDate));
    return rows[0] ? structuredClone(rows[0]) : null;
  }

  async insertMetricsSnapshot(data: NewCreatorMetricsDaily): Promise<CreatorMetricsDaily> {
    if (await this.findMetricsSnapshot(data.creatorId, data.snapshotDate)) {
      throw new Error(`duplicate snapshot for creator ${data.creatorId} on ${data.snapshotDate}`);
    }
    const row: CreatorMetricsDaily = { id: this.nextId(), ...data };
    this.working.metrics.push(row);
    return structuredClone(row);
  }

  async updateMetricsSnapshot(
    id: number,
    patch: Pick<CreatorMetricsDaily, 'followersEst' | 'postsCount'>
  ): Promise<CreatorMetricsDaily> {
    const row = this.working.metrics.find((item) => item.id === id);
    if (!row) throw new Error(`snapshot ${id} not found`);
    Object.assign(row, patch);
    return structuredClone(row);
  }

  async deleteSignals(creatorId: number): Promise<number> {
    const before = this.working.signals.length;
    this.working.signals = this.working.signals.filter((row) => row.creatorId !== creatorId);
    return before - this.working.signals.length;
  }

  async insertSignal(data: NewCreatorSignal): Promise<CreatorSignal> {
    const row: CreatorSignal = { id: this.nextId(), ...structuredClone(data) };
    this.working.signals.push(row);
    return structuredClone(row);
  }

  async listSignals(creatorId: number): Promise<CreatorSignal[]> {
    return structuredClone(this.working.signals.filter((row) => row.creatorId === creatorId));
  }

  async listOpenDraftCreatorIds(): Promise<Set<number>> {
    return new Set(
      this.working.drafts.filter((row) => row.status === 'pending' || row.status === 'approved').map((row) => row.creatorId)
    );
  }

  async insertOutreachDraft(data: NewOutreachDraft): Promise<OutreachDraft> {
    const row: OutreachDraft = { id: this.nextId(), ...structuredClone(data) };
    this.working.drafts.push(row);
    return structuredClone(row);
  }

  async findEngagementAction(
    platform: string,
    actionType: EngagementActionType,
    targetUrl: string
  ): Promise<EngagementAction | null> {
    const row = this.working.actions.find(
      (item) => item.platform === platform && item.actionType === actionType && item.targetUrl === targetUrl
    );
    return row ? structuredClone(row) : null;
  }

  async insertEngagementAction(data: NewEngagementAction): Promise<EngagementAction> {
    if (await this.findEngagementAction(data.platform, data.actionType, data.targetUrl)) {
      throw new Error(`duplicate engagement action for ${data.targetUrl}`);
    }
    const row: EngagementAction = { id: this.nextId(), ...structuredClone(data) };
    this.working.actions.push(row);
    return structuredClone(row);
  }

  async flush(): Promise<void> {
    this.pendingCreatorIds.clear();
  }

  async commit(): Promise<void> {
    if (this.finished) return;
    this.finished = true;
    this.pendingCreatorIds.clear();
    this.store.tables = this.working;
    this.store.commits += 1;
  }

  async rollback(): Promise<void> {
    if (this.finished) return;
    this.finished = true;
    this.store.rollbacks += 1;
  }

  release(): void {
    this.store.releases += 1;
  }
}
