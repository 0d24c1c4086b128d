/**
 * Giveaway module public API.
 */

export type {
  EntryMethod,
  Giveaway,
  PayloadEncoding,
  RawGiveawayPayload,
  UpdateOutcome,
} from './types.js';
export type { GiveawayId, GiveawayUrlShape } from './identifier.js';

export {
  canonicalGiveawayUrl,
  classifyGiveawayUrl,
  getGiveawayId,
  normalizeGiveawayUrls,
} from './identifier.js';
export { giveawayUrl, isRunning, maxEntriesPerAccount } from './giveaway.js';
export { decodeHtmlText, decodeScriptText } from './decode.js';
export { extractPayload } from './payload.js';
export { parseGiveawayPage, readEntryCount } from './page-parser.js';
export { GiveawayFetcher } from './giveaway-fetcher.js';
export type { GiveawayFetcherOptions } from './giveaway-fetcher.js';
