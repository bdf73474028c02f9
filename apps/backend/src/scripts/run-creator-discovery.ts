import { loadTargetingConfig } from '../lib/targeting-config';
import { runCreatorDiscovery } from '../services/creators/creator-discovery-run';
import { PageFetchCache } from '../services/scraper/page-fetch-cache';
import { createPageFetcherFromEnv } from '../services/scraper/page-fetcher';
import { prepareWorker, readIntArg, runScript, withWorkerSession } from './script-support';

// Usage: run-creator-discovery [limit=200] [rotate=4]
runScript('Discovery', async () => {
  await prepareWorker('Discovery');
  const limit = readIntArg(process.argv, 2, 200, 1);
  const rotate = readIntArg(process.argv, 3, 4, 1);
  const config = loadTargetingConfig();

  const fetcher = new PageFetchCache(createPageFetcherFromEnv());
  try {
    return await withWorkerSession((session) => runCreatorDiscovery({ limit, rotate }, { session, fetcher, config }));
  } finally {
    console.log(`[PageFetch] cache ${JSON.stringify(fetcher.stats)}`);
    await fetcher.close();
  }
});
