/**
 * Fetches giveaway pages and turns them into `Giveaway` records, one at a
 * time, in a batch with a cooldown, or as an in-place refresh.
 */

import { getLogger } from '../shared/logger.js';
import { InvalidResponseError, toGiveawayError } from '../shared/errors.js';
import { eventBus, type TypedEventEmitter } from '../shared/events.js';
import { GIVEAWAY_HEADERS } from '../shared/constants.js';
import { sleep as defaultSleep, unixNow } from '../shared/timing.js';
import type { TextFetcher } from '../transport/types.js';
import { canonicalGiveawayUrl, getGiveawayId } from './identifier.js';
import { parseGiveawayPage } from './page-parser.js';
import { giveawayUrl } from './giveaway.js';
import type { Giveaway, UpdateOutcome } from './types.js';

const log = getLogger('giveaway', { component: 'fetcher' });

export interface GiveawayFetcherOptions {
  fetcher: TextFetcher;
  /** Clock in unix seconds. Default: wall clock. */
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
  events?: TypedEventEmitter;
}

export class GiveawayFetcher {
  private readonly fetcher: TextFetcher;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly events: TypedEventEmitter;

  constructor(options: GiveawayFetcherOptions) {
    this.fetcher = options.fetcher;
    this.now = options.now ?? unixNow;
    this.sleep = options.sleep ?? defaultSleep;
    this.events = options.events ?? eventBus;
  }

  /**
   * Fetches and parses one giveaway. URLs of either accepted shape are
   * fetched through their canonical form; anything else is rejected with
   * `InvalidResponseError` before any request is made.
   */
  async fetch(url: string): Promise<Giveaway> {
    try {
      const giveaway = await this.load(url);
      this.events.emit('giveaway:fetched', { giveawayId: giveaway.id, url });
      return giveaway;
    } catch (error) {
      const failure = toGiveawayError(error, url);
      this.events.emit('giveaway:failed', { url, kind: failure.kind, error: failure.message });
      throw failure;
    }
  }

  /**
   * Fetches every URL in order, pausing `cooldownMs` between two
   * consecutive fetches. Failed URLs are skipped; only parsed records
   * are returned.
   */
  async fetchMany(urls: readonly string[], cooldownMs: number): Promise<Giveaway[]> {
    const giveaways: Giveaway[] = [];

    for (const [index, url] of urls.entries()) {
      if (index > 0) {
        await this.sleep(cooldownMs);
      }

      try {
        giveaways.push(await this.fetch(url));
      } catch (error) {
        const failure = toGiveawayError(error, url);
        log.debug({ url, kind: failure.kind, error: failure.message }, 'Skipping giveaway');
      }
    }

    log.info({ requested: urls.length, fetched: giveaways.length }, 'Giveaway batch complete');
    return giveaways;
  }

  /**
   * Re-fetches a giveaway and overwrites every field in place. On failure
   * the record is left exactly as it was.
   */
  async update(giveaway: Giveaway): Promise<UpdateOutcome> {
    const url = giveawayUrl(giveaway);

    let fresh: Giveaway;
    try {
      fresh = await this.fetch(url);
    } catch (error) {
      const failure = toGiveawayError(error, url);
      log.warn(
        { giveawayId: giveaway.id, kind: failure.kind, error: failure.message },
        'Giveaway update failed',
      );
      return { updated: false, error: failure };
    }

    Object.assign(giveaway, fresh);
    this.events.emit('giveaway:updated', { giveawayId: giveaway.id });
    return { updated: true };
  }

  private async load(url: string): Promise<Giveaway> {
    const id = getGiveawayId(url);
    if (id === null) {
      throw new InvalidResponseError(`Not a giveaway URL: ${url}`, { url, field: 'url' });
    }

    const canonical = canonicalGiveawayUrl(id);
    const body = await this.fetcher.fetchText(canonical, GIVEAWAY_HEADERS);
    log.debug({ giveawayId: id, url: canonical, length: body.length }, 'Giveaway page fetched');

    return parseGiveawayPage(id, body, this.now());
  }
}
