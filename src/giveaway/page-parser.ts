/**
 * Giveaway page parser: raw page text in, complete `Giveaway` out.
 */

import { betweenStrict } from '../shared/text-scan.js';
import { decodeHtmlText, decodeScriptText } from './decode.js';
import { extractPayload } from './payload.js';
import type { GiveawayId } from './identifier.js';
import type { Giveaway, PayloadEncoding } from './types.js';

export const ENTRY_COUNT_OPEN = 'initEntryCount(';
export const ENTRY_COUNT_CLOSE = ')';

const DECODERS: Record<PayloadEncoding, (text: string) => string> = {
  'html-entities': decodeHtmlText,
  'script': decodeScriptText,
};

/**
 * Stage 2: the public entry counter, initialized by a separate script
 * call. `null` when the call is absent or its argument is not a plain
 * unsigned integer.
 */
export function readEntryCount(body: string): number | null {
  const argument = betweenStrict(body, ENTRY_COUNT_OPEN, ENTRY_COUNT_CLOSE);
  if (argument === null || !/^\d+$/.test(argument)) {
    return null;
  }
  const count = Number(argument);
  return Number.isSafeInteger(count) ? count : null;
}

/**
 * Parses a giveaway page. Throws `InvalidResponseError` if the campaign
 * payload is missing or incomplete; never returns a partial record.
 *
 * @param now - unix seconds, stored as `lastFetchedAt`
 */
export function parseGiveawayPage(id: GiveawayId, body: string, now: number): Giveaway {
  const payload = extractPayload(body);
  const decode = DECODERS[payload.encoding];

  return {
    id,
    name: decode(payload.name),
    description: decode(payload.description),
    entryCount: readEntryCount(body),
    entryMethods: payload.entryMethods,
    startDate: payload.startDate,
    endDate: payload.endDate,
    lastFetchedAt: now,
  };
}
