import { runCreatorGraphBuild } from '../services/creators/creator-graph-run';
import { PageFetchCache } from '../services/scraper/page-fetch-cache';
import { createPageFetcherFromEnv } from '../services/scraper/page-fetcher';
import { prepareWorker, readIntArg, runScript, withWorkerSession } from './script-support';

// Usage: run-creator-graph [limitCreators=300] [similarityTopK=25]
runScript('Graph', async () => {
  await prepareWorker('Graph');
  const limitCreators = readIntArg(process.argv, 2, 300, 1);
  const similarityTopK = readIntArg(process.argv, 3, 25, 1);

  const fetcher = new PageFetchCache(createPageFetcherFromEnv());
  try {
    return await withWorkerSession((session) =>
      runCreatorGraphBuild({ limitCreators, similarityTopK }, { session, fetcher })
    );
  } finally {
    await fetcher.close();
  }
});
