import type { PgClientLike } from './db';

export interface SchemaReadinessReport {
  schemaReady: boolean;
  missingTables: string[];
  missingColumns: Record<string, string[]>;
  checkedAt: string;
}

const REQUIRED_TABLES = [
  'creators',
  'creator_relationships',
  'creator_edges',
  'creator_metrics_daily',
  'creator_signals',
  'outreach_drafts',
  'engagement_actions',
];

const REQUIRED_COLUMNS: Record<string, string[]> = {
  creators: [
    'posts_count',
    'avg_engagement_rate',
    'is_brand',
    'is_spam',
    'fraud_score',
    'fraud_flags',
    'outreach_status',
    'outreach_exclude_reason',
    'niche_score',
    'growth_7d',
    'growth_30d',
    'is_partner',
    'last_intel_run_at',
  ],
  creator_edges: ['edge_type', 'weight', 'metadata', 'last_seen_at'],
  creator_metrics_daily: ['snapshot_date', 'followers_est', 'posts_count'],
};

export async function checkSchemaReadiness(
  client: Pick<PgClientLike, 'query'>
): Promise<SchemaReadinessReport> {
  const tableRows = await client.query<{ table_name: string }>(
    `SELECT table_name
       FROM information_schema.tables
      WHERE table_schema = 'public'
        AND table_name = ANY($1)`,
    [REQUIRED_TABLES]
  );
  const existingTableSet = new Set(tableRows.rows.map((row) => row.table_name));
  const missingTables = REQUIRED_TABLES.filter((tableName) => !existingTableSet.has(tableName));

  const missingColumns: Record<string, string[]> = {};
  for (const [tableName, columns] of Object.entries(REQUIRED_COLUMNS)) {
    if (!existingTableSet.has(tableName)) {
      missingColumns[tableName] = [...columns];
      continue;
    }

    const columnRows = await client.query<{ column_name: string }>(
      `SELECT column_name
         FROM information_schema.columns
        WHERE table_schema = 'public'
          AND table_name = $1`,
      [tableName]
    );
    const existingColumns = new Set(columnRows.rows.map((row) => row.column_name));
    const missing = columns.filter((column) => !existingColumns.has(column));
    if (missing.length > 0) {
      missingColumns[tableName] = missing;
    }
  }

  return {
    schemaReady: missingTables.length === 0 && Object.keys(missingColumns).length === 0,
    missingTables,
    missingColumns,
    checkedAt: new Date().toISOString(),
  };
}

export function assertSchemaReadiness(report: SchemaReadinessReport): void {
  if (report.schemaReady) return;
  const messages: string[] = [];
  if (report.missingTables.length > 0) {
    messages.push(`missing tables: ${report.missingTables.join(', ')}`);
  }
  const missingColumnsRows = Object.entries(report.missingColumns).map(
    ([table, columns]) => `${table} -> [${columns.join(', ')}]`
  );
  if (missingColumnsRows.length > 0) {
    messages.push(`missing columns: ${missingColumnsRows.join('; ')}`);
  }
  throw new Error(
    `SCHEMA_NOT_MIGRATED: ${messages.join(' | ')}. Apply apps/backend/db/schema.sql before running the worker scripts.`
  );
}
