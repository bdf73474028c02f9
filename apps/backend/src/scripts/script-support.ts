import { closePool, getPool } from '../lib/db';
import { errorMessage } from '../lib/errors';
import { loadBackendEnv } from '../lib/load-env';
import { validateRuntimePreflight } from '../lib/runtime-preflight';
import { assertSchemaReadiness, checkSchemaReadiness } from '../lib/schema-readiness';
import { withCreatorSession, type CreatorSession } from '../services/creators/creator-session';
import { PgCreatorSession } from '../services/creators/pg-creator-session';

/** Positional integer argument (`argv[index]`), or the fallback when missing/not numeric. */
export function readIntArg(argv: readonly string[], index: number, fallback: number, min = 0): number {
  const raw = argv[index];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value)) return fallback;
  return Math.max(min, Math.floor(value));
}

export function readStringArg(argv: readonly string[], index: number): string | null {
  const raw = argv[index]?.trim();
  return raw ? raw : null;
}

/** Env, preflight and schema checks shared by every worker script. */
export async function prepareWorker(tag: string, options: { pageFetching?: boolean } = {}): Promise<void> {
  const envLoad = loadBackendEnv();
  const preflight = validateRuntimePreflight(options);
  console.log(`[${tag}] profile=${envLoad.profile} pageFetchMode=${preflight.pageFetchMode}`);
  for (const warning of preflight.warnings) {
    console.warn(`[Preflight] ${warning}`);
  }
  assertSchemaReadiness(await checkSchemaReadiness(getPool()));
}

export function withWorkerSession<T>(fn: (session: CreatorSession) => Promise<T>): Promise<T> {
  return withCreatorSession(() => PgCreatorSession.open(getPool()), fn);
}

/** Run `main`, print its summary as JSON, always close the pool; exit code 1 on failure. */
export function runScript(tag: string, main: () => Promise<unknown>): void {
  const run = async () => {
    try {
      const summary = await main();
      console.log(JSON.stringify(summary, null, 2));
    } finally {
      await closePool();
    }
  };

  run().catch((error: unknown) => {
    console.error(`[${tag}] failed: ${errorMessage(error)}`);
    if (error instanceof Error && error.stack) console.error(error.stack);
    process.exitCode = 1;
  });
}
