/**
 * Giveaway record types.
 */

import type { GiveawayId } from './identifier.js';

/** One way to earn entries, in page order. */
export interface EntryMethod {
  /** Entry type tag as the platform names it (e.g. "twitter_follow"). */
  kind: string;
  /** Entries earned by completing it. */
  worth: number;
}

/**
 * A fully parsed giveaway. Dates are unix timestamps in seconds; no
 * ordering between `startDate` and `endDate` is enforced.
 */
export interface Giveaway {
  id: GiveawayId;
  name: string;
  description: string;
  /** `null` when the page does not publish a counter. */
  entryCount: number | null;
  entryMethods: EntryMethod[];
  startDate: number;
  endDate: number;
  /** When the record was parsed, not a value read from the page. */
  lastFetchedAt: number;
}

/** Which embedded payload supplied the fields; selects the text decoder. */
export type PayloadEncoding = 'html-entities' | 'script';

/** Payload fields before text decoding. */
export interface RawGiveawayPayload {
  encoding: PayloadEncoding;
  name: string;
  description: string;
  startDate: number;
  endDate: number;
  entryMethods: EntryMethod[];
}

export type UpdateOutcome =
  | { updated: true }
  | { updated: false; error: Error };
