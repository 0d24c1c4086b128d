import { canonicalGiveawayUrl } from './identifier.js';
import type { Giveaway } from './types.js';

/** Canonical URL of a giveaway, rebuilt from its id. */
export function giveawayUrl(giveaway: Pick<Giveaway, 'id'>): string {
  return canonicalGiveawayUrl(giveaway.id);
}

/** True until the end date has passed. `now` is in unix seconds. */
export function isRunning(giveaway: Pick<Giveaway, 'endDate'>, now: number): boolean {
  return now < giveaway.endDate;
}

/** Entries one account can collect by completing every entry method. */
export function maxEntriesPerAccount(giveaway: Pick<Giveaway, 'entryMethods'>): number {
  return giveaway.entryMethods.reduce((total, method) => total + method.worth, 0);
}
