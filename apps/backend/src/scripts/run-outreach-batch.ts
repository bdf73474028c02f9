import { loadTargetingConfig } from '../lib/targeting-config';
import { createTextGeneratorFromEnv } from '../services/ai/text-generator';
import { generateOutreachBatch } from '../services/outreach/outreach-batch';
import { prepareWorker, readIntArg, readStringArg, runScript, withWorkerSession } from './script-support';

// Usage: run-outreach-batch [limit=25] [campaignName] [offerType]
runScript('Outreach', async () => {
  await prepareWorker('Outreach', { pageFetching: false });
  const limit = readIntArg(process.argv, 2, 25, 1);
  const campaignName = readStringArg(process.argv, 3);
  const offerType = readStringArg(process.argv, 4);
  const { brand } = loadTargetingConfig();

  return withWorkerSession((session) =>
    generateOutreachBatch(
      { limit, campaignName, offerType },
      { session, brand, generator: createTextGeneratorFromEnv('main') }
    )
  );
});
