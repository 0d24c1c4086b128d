/**
 * Intermediary stage: a page that mentions giveaways (video description,
 * blog post...) is scanned for platform links, which are normalized to
 * canonical giveaway URLs.
 */

import { getLogger } from '../shared/logger.js';
import { toGiveawayError } from '../shared/errors.js';
import { eventBus, type TypedEventEmitter } from '../shared/events.js';
import { INTERMEDIARY_HEADERS } from '../shared/constants.js';
import { normalizeGiveawayUrls } from '../giveaway/identifier.js';
import type { TextFetcher } from '../transport/types.js';
import { extractEmbeddedLinks } from './link-discoverer.js';

const log = getLogger('discovery', { component: 'intermediary' });

/**
 * Fetches `url` and returns the unique canonical giveaway URLs it links to,
 * in first-found order. Rejects with `TimeoutError` or
 * `InvalidResponseError` when the page cannot be read.
 */
export async function resolveIntermediary(
  fetcher: TextFetcher,
  url: string,
  events: TypedEventEmitter = eventBus,
): Promise<string[]> {
  events.emit('discovery:started', { stage: 'intermediary', url });

  let body: string;
  try {
    body = await fetcher.fetchText(url, INTERMEDIARY_HEADERS);
  } catch (error) {
    throw toGiveawayError(error, url);
  }

  const candidates = extractEmbeddedLinks(body);
  const giveawayUrls = normalizeGiveawayUrls(candidates);

  log.debug(
    { url, candidates: candidates.length, giveaways: giveawayUrls.length },
    'Intermediary page scanned',
  );
  events.emit('discovery:completed', {
    stage: 'intermediary',
    url,
    linksFound: giveawayUrls.length,
  });
  return giveawayUrls;
}
