/**
 * Discovery module public API: link extraction over raw text and the
 * fetching stages built on it.
 */

// Types
export type {
  ResultLinkMarkers,
  EmbeddedLinkOptions,
  DiscoveryRun,
  DiscoveryFailure,
} from './types.js';

// Extraction
export {
  SEARCH_RESULT_MARKERS,
  PLATFORM_LINK_OPTIONS,
  MAX_EMBEDDED_PATH_LENGTH,
  extractResultLinks,
  extractEmbeddedLinks,
} from './link-discoverer.js';

// Stages
export { buildSearchUrl, searchResultLinks } from './search.js';
export { resolveIntermediary } from './intermediary.js';
export { discoverGiveawayUrls } from './pipeline.js';
