/**
 * Search results stage: one results page per call, links in page order.
 */

import { getLogger } from '../shared/logger.js';
import { toGiveawayError } from '../shared/errors.js';
import { eventBus, type TypedEventEmitter } from '../shared/events.js';
import {
  SEARCH_ENGINE_HOST,
  SEARCH_HEADERS,
  SEARCH_QUERY,
  SEARCH_RESULTS_PER_PAGE,
} from '../shared/constants.js';
import type { TextFetcher } from '../transport/types.js';
import { extractResultLinks } from './link-discoverer.js';

const log = getLogger('discovery', { component: 'search' });

/**
 * URL of results page `page` (zero-based) for the platform query,
 * restricted to the last hour and without result filtering.
 */
export function buildSearchUrl(page: number): string {
  const start = page * SEARCH_RESULTS_PER_PAGE;
  return `https://${SEARCH_ENGINE_HOST}/search?q=${SEARCH_QUERY}&tbs=qdr:h&filter=0&start=${start}`;
}

/**
 * Fetches one results page and returns the outbound result links.
 * A page with no results yields `[]`; a failed request rejects with
 * `TimeoutError` or `InvalidResponseError`.
 */
export async function searchResultLinks(
  fetcher: TextFetcher,
  page: number,
  events: TypedEventEmitter = eventBus,
): Promise<string[]> {
  const url = buildSearchUrl(page);
  events.emit('discovery:started', { stage: 'search', url });

  let body: string;
  try {
    body = await fetcher.fetchText(url, SEARCH_HEADERS);
  } catch (error) {
    throw toGiveawayError(error, url);
  }

  const links = extractResultLinks(body);
  log.debug({ page, url, linksFound: links.length }, 'Search page scanned');
  events.emit('discovery:completed', { stage: 'search', url, linksFound: links.length });
  return links;
}
