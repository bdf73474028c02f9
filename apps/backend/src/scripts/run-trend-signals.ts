import { loadBackendEnv } from '../lib/load-env';
import { collectTrendSignals, loadTrendSources } from '../services/content-intel/trend-signals';
import { createPageFetcherFromEnv } from '../services/scraper/page-fetcher';
import { runScript } from './script-support';

// Usage: run-trend-signals (no database; sources from TREND_SOURCES_PATH)
runScript('ContentIntel', async () => {
  const envLoad = loadBackendEnv();
  console.log(`[ContentIntel] profile=${envLoad.profile}`);
  const sources = loadTrendSources();

  const fetcher = createPageFetcherFromEnv();
  try {
    return await collectTrendSignals(fetcher, sources);
  } finally {
    await fetcher.close?.();
  }
});
