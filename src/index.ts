/**
 * Public API of the giveaway finder.
 */

export * from './discovery/index.js';
export * from './giveaway/index.js';

export {
  before,
  beforeStrict,
  after,
  afterStrict,
  between,
  betweenStrict,
  indexBetweenStrict,
  scanBetween,
  matchesBetween,
  occurrencesAfter,
} from './shared/text-scan.js';
export type { ScanRange, ScanMatch } from './shared/text-scan.js';

export {
  AppError,
  TimeoutError,
  InvalidResponseError,
  TransportError,
  toGiveawayError,
} from './shared/errors.js';
export type {
  GiveawayError,
  GiveawayErrorKind,
  TransportFailureReason,
} from './shared/errors.js';

export { TypedEventEmitter, eventBus } from './shared/events.js';
export type { AppEvents } from './shared/events.js';

export { HttpTextClient } from './transport/http-client.js';
export type { TextFetcher, HttpTextClientOptions } from './transport/types.js';
