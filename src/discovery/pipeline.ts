/**
 * Runs the two discovery stages over several search pages: result links
 * are resolved one by one and their giveaway links merged into a single
 * list of canonical URLs. Pages that fail are recorded and skipped.
 */

import { getLogger } from '../shared/logger.js';
import { AppError } from '../shared/errors.js';
import { eventBus, type TypedEventEmitter } from '../shared/events.js';
import type { TextFetcher } from '../transport/types.js';
import { resolveIntermediary } from './intermediary.js';
import { buildSearchUrl, searchResultLinks } from './search.js';
import type { DiscoveryFailure, DiscoveryRun } from './types.js';

const log = getLogger('discovery', { component: 'pipeline' });

function toFailure(url: string, error: unknown): DiscoveryFailure {
  return {
    url,
    message: error instanceof Error ? error.message : String(error),
    code: error instanceof AppError ? error.code : 'DISCOVERY_ERROR',
  };
}

/**
 * Scans search pages `0..pages-1` and every intermediary page they link
 * to. Sequential; one request in flight at a time.
 */
export async function discoverGiveawayUrls(
  fetcher: TextFetcher,
  pages: number,
  events: TypedEventEmitter = eventBus,
): Promise<DiscoveryRun> {
  const giveawayUrls: string[] = [];
  const seen = new Set<string>();
  const errors: DiscoveryFailure[] = [];
  let pagesScanned = 0;
  let intermediariesResolved = 0;

  for (let page = 0; page < pages; page++) {
    let resultLinks: string[];
    try {
      resultLinks = await searchResultLinks(fetcher, page, events);
      pagesScanned++;
    } catch (error) {
      const failure = toFailure(buildSearchUrl(page), error);
      log.warn({ page, ...failure }, 'Search page failed');
      errors.push(failure);
      continue;
    }

    for (const link of resultLinks) {
      try {
        const found = await resolveIntermediary(fetcher, link, events);
        intermediariesResolved++;
        for (const url of found) {
          if (!seen.has(url)) {
            seen.add(url);
            giveawayUrls.push(url);
          }
        }
      } catch (error) {
        const failure = toFailure(link, error);
        log.debug(failure, 'Intermediary page failed');
        errors.push(failure);
      }
    }
  }

  log.info(
    { pagesScanned, intermediariesResolved, giveaways: giveawayUrls.length, errors: errors.length },
    'Discovery run complete',
  );
  return { pagesScanned, intermediariesResolved, giveawayUrls, errors };
}
