import { loadTargetingConfig } from '../lib/targeting-config';
import { runCreatorIntel } from '../services/intel/creator-intel';
import { PageFetchCache } from '../services/scraper/page-fetch-cache';
import { createPageFetcherFromEnv } from '../services/scraper/page-fetcher';
import { prepareWorker, readIntArg, runScript, withWorkerSession } from './script-support';

// Usage: run-creator-intel [limit=40] [postsToScan=8]
runScript('Intel', async () => {
  await prepareWorker('Intel');
  const limit = readIntArg(process.argv, 2, 40, 1);
  const postsToScan = readIntArg(process.argv, 3, 8, 0);
  const { nicheKeywords } = loadTargetingConfig();

  const fetcher = new PageFetchCache(createPageFetcherFromEnv());
  try {
    return await withWorkerSession((session) =>
      runCreatorIntel({ limit, postsToScan }, { session, fetcher, keywords: nicheKeywords })
    );
  } finally {
    await fetcher.close();
  }
});
