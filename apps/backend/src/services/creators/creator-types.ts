export type OutreachStatus = 'eligible' | 'excluded' | 'do_not_contact';
export type RelationshipStatus = 'new' | 'contacted' | 'replied' | 'partnered' | 'declined' | 'blocked';
export type CreatorEdgeType = 'mention' | 'co_mentioned' | 'similarity' | 'audience_overlap';
export type CreatorSignalType = 'bio' | 'post' | 'hashtag';
export type OutreachDraftStatus = 'pending' | 'approved' | 'rejected';
export type EngagementActionType = 'comment' | 'like' | 'follow';
export type EngagementActionStatus = 'pending' | 'approved' | 'executed' | 'skipped' | 'failed';

export const OUTREACH_STATUSES: readonly OutreachStatus[] = ['eligible', 'excluded', 'do_not_contact'];
export const RELATIONSHIP_STATUSES: readonly RelationshipStatus[] = [
  'new',
  'contacted',
  'replied',
  'partnered',
  'declined',
  'blocked',
];
export const CREATOR_EDGE_TYPES: readonly CreatorEdgeType[] = ['mention', 'co_mentioned', 'similarity', 'audience_overlap'];
export const CREATOR_SIGNAL_TYPES: readonly CreatorSignalType[] = ['bio', 'post', 'hashtag'];
export const OUTREACH_DRAFT_STATUSES: readonly OutreachDraftStatus[] = ['pending', 'approved', 'rejected'];
export const ENGAGEMENT_ACTION_TYPES: readonly EngagementActionType[] = ['comment', 'like', 'follow'];
export const ENGAGEMENT_ACTION_STATUSES: readonly EngagementActionStatus[] = [
  'pending',
  'approved',
  'executed',
  'skipped',
  'failed',
];

/** Relationship states that block any new outreach. */
export const OUTREACH_BLOCKING_STATUSES: readonly RelationshipStatus[] = ['declined', 'blocked', 'partnered'];

/** Flag name → evidence (the triggering value, or `true`). */
export type FraudFlags = Record<string, string | number | boolean>;
export type EdgeMetadata = Record<string, string | number | boolean>;

export interface Creator {
  id: number;
  /** Lower-case, no leading `@`; never changed after insert. */
  handle: string;
  platform: string;
  followersEst: number | null;
  postsCount: number | null;
  avgEngagementRate: number | null;
  isBrand: boolean;
  isSpam: boolean;
  /** 0..100, higher is riskier. */
  fraudScore: number;
  fraudFlags: FraudFlags;
  /** Comma-joined tag list. */
  nicheTags: string | null;
  notes: string | null;
  /** Fit score 0..100; 0 means not yet scored. */
  score: number;
  outreachStatus: OutreachStatus;
  outreachExcludeReason: string | null;
  growth7d: number | null;
  growth30d: number | null;
  nicheScore: number | null;
  isPartner: boolean;
  lastScrapedAt: Date | null;
  lastIntelRunAt: Date | null;
  createdAt: Date;
}

export type NewCreator = Omit<Creator, 'id'>;
export type CreatorPatch = Partial<Omit<Creator, 'id' | 'handle' | 'createdAt'>>;

export interface CreatorRelationship {
  id: number;
  creatorId: number;
  status: RelationshipStatus;
  lastContactedAt: Date | null;
  notes: string | null;
  createdAt: Date;
}

export type NewCreatorRelationship = Omit<CreatorRelationship, 'id'>;

export interface CreatorEdge {
  id: number;
  sourceCreatorId: number;
  targetCreatorId: number;
  edgeType: CreatorEdgeType;
  weight: number;
  metadata: EdgeMetadata | null;
  lastSeenAt: Date;
  createdAt: Date;
}

export type NewCreatorEdge = Omit<CreatorEdge, 'id'>;
export type CreatorEdgePatch = Pick<CreatorEdge, 'weight' | 'metadata' | 'lastSeenAt'>;

export interface CreatorMetricsDaily {
  id: number;
  creatorId: number;
  /** Calendar day, `YYYY-MM-DD` (UTC). */
  snapshotDate: string;
  followersEst: number | null;
  postsCount: number | null;
}

export type NewCreatorMetricsDaily = Omit<CreatorMetricsDaily, 'id'>;

export interface CreatorSignal {
  id: number;
  creatorId: number;
  signalType: CreatorSignalType;
  signalText: string;
  weight: number;
  sourceUrl: string | null;
  createdAt: Date;
}

export type NewCreatorSignal = Omit<CreatorSignal, 'id'>;

export interface OutreachDraft {
  id: number;
  creatorId: number;
  message: string;
  offerType: string | null;
  campaignName: string | null;
  status: OutreachDraftStatus;
  createdAt: Date;
}

export type NewOutreachDraft = Omit<OutreachDraft, 'id'>;

export interface EngagementAction {
  id: number;
  platform: string;
  targetUrl: string;
  targetHandle: string | null;
  targetCaption: string | null;
  actionType: EngagementActionType;
  proposedText: string | null;
  scheduledFor: Date | null;
  status: EngagementActionStatus;
  notes: string | null;
  createdAt: Date;
}

export type NewEngagementAction = Omit<EngagementAction, 'id'>;

export function newCreatorRecord(handle: string, now: Date, overrides: Partial<NewCreator> = {}): NewCreator {
  return {
    handle,
    platform: 'instagram',
    followersEst: null,
    postsCount: null,
    avgEngagementRate: null,
    isBrand: false,
    isSpam: false,
    fraudScore: 0,
    fraudFlags: {},
    nicheTags: null,
    notes: null,
    score: 0,
    outreachStatus: 'eligible',
    outreachExcludeReason: null,
    growth7d: null,
    growth30d: null,
    nicheScore: null,
    isPartner: false,
    lastScrapedAt: null,
    lastIntelRunAt: null,
    createdAt: now,
    ...overrides,
  };
}
