export { loadBackendEnv } from './lib/load-env';
export { getPool, closePool } from './lib/db';
export { validateRuntimePreflight, getPageFetchMode } from './lib/runtime-preflight';
export { checkSchemaReadiness, assertSchemaReadiness } from './lib/schema-readiness';
export {
  ConfigError,
  loadTargetingConfig,
  parseTargetingConfig,
  type TargetingConfig,
  type BrandVoice,
} from './lib/targeting-config';

export * from './services/scraper/instagram-html';
export * from './services/scraper/page-fetcher';
export { PageFetchCache } from './services/scraper/page-fetch-cache';

export * from './services/discovery/creator-discovery-engine';

export * from './services/creators/creator-types';
export * from './services/creators/creator-session';
export { PgCreatorSession } from './services/creators/pg-creator-session';
export * from './services/creators/fraud-detection';
export * from './services/creators/similarity';
export * from './services/creators/graph-builder';
export { overlapScore } from './services/creators/audience-overlap';
export { upsertEnrichedCandidates, type UpsertOutcome } from './services/creators/creator-upsert';
export { backfillFraudScores } from './services/creators/fraud-backfill';
export { excludedByRules } from './services/creators/rule-exclusions';
export * from './services/creators/creator-discovery-run';
export * from './services/creators/creator-graph-run';

export * from './services/intel/creator-intel';

export * from './services/ai/text-generator';
export * from './services/outreach/personalization';
export * from './services/outreach/outreach-batch';

export * from './services/engagement/comment-generator';
export { scheduleActions } from './services/engagement/action-scheduler';
export * from './services/engagement/guardrails';
export * from './services/engagement/engagement-queue';

export * from './services/content-intel/trend-parsers';
export * from './services/content-intel/trend-signals';
export * from './services/content-intel/content-calendar';
export * from './services/content-intel/viral-patterns';
