/**
 * Command-line entry point.
 *
 * 1. Environment validation
 * 2. Discovery over the configured number of search pages
 * 3. Giveaway fetching with the configured cooldown
 *
 * Every record found is logged; failed pages and links are skipped.
 */

import { getLogger } from './shared/logger.js';
import { isOperationalError } from './shared/errors.js';
import { HttpTextClient } from './transport/http-client.js';
import { discoverGiveawayUrls } from './discovery/pipeline.js';
import { GiveawayFetcher } from './giveaway/giveaway-fetcher.js';
import { giveawayUrl, isRunning, maxEntriesPerAccount } from './giveaway/giveaway.js';
import { unixNow } from './shared/timing.js';

const logger = getLogger('app');

async function main(): Promise<void> {
  // ---------------------------------------------------------------------------
  // 1. Validate environment
  // ---------------------------------------------------------------------------
  let env: Awaited<typeof import('./env.js')>['env'];
  try {
    const envModule = await import('./env.js');
    env = envModule.env;
    logger.info({ nodeEnv: env.NODE_ENV, searchPages: env.SEARCH_PAGES }, 'Environment validated');
  } catch (error) {
    logger.fatal({ err: error }, 'Environment validation failed');
    process.exitCode = 1;
    return;
  }

  const client = new HttpTextClient({
    timeoutMs: env.REQUEST_TIMEOUT_MS,
    maxAttempts: env.FETCH_MAX_ATTEMPTS,
  });

  // ---------------------------------------------------------------------------
  // 2. Discover giveaway URLs
  // ---------------------------------------------------------------------------
  const run = await discoverGiveawayUrls(client, env.SEARCH_PAGES);

  // ---------------------------------------------------------------------------
  // 3. Fetch giveaways
  // ---------------------------------------------------------------------------
  const fetcher = new GiveawayFetcher({ fetcher: client });
  const giveaways = await fetcher.fetchMany(run.giveawayUrls, env.FETCH_COOLDOWN_MS);

  const now = unixNow();
  for (const giveaway of giveaways) {
    logger.info(
      {
        url: giveawayUrl(giveaway),
        name: giveaway.name,
        entryCount: giveaway.entryCount,
        maxEntries: maxEntriesPerAccount(giveaway),
        endDate: giveaway.endDate,
        running: isRunning(giveaway, now),
      },
      'Giveaway found',
    );
  }

  logger.info(
    {
      pagesScanned: run.pagesScanned,
      discovered: run.giveawayUrls.length,
      fetched: giveaways.length,
      errors: run.errors.length,
    },
    'Run complete',
  );
}

// ---------------------------------------------------------------------------
// Start
// ---------------------------------------------------------------------------
main().catch((error: unknown) => {
  logger.fatal(
    { err: error, operational: isOperationalError(error) },
    'Giveaway finder stopped unexpectedly',
  );
  process.exitCode = 1;
});
