// ---------------------------------------------------------------------------
// Platform
// ---------------------------------------------------------------------------

/** Root every giveaway URL starts with; canonical URLs are `<root><id>/-`. */
export const PLATFORM_ROOT = 'https://gleam.io/';

/** Prefix of the legacy competition URL shape. */
export const COMPETITIONS_ROOT = `${PLATFORM_ROOT}competitions/`;

/** Length of a giveaway code. */
export const GIVEAWAY_ID_LENGTH = 5;

// ---------------------------------------------------------------------------
// Search engine
// ---------------------------------------------------------------------------

export const SEARCH_ENGINE_HOST = 'www.google.com';

/** Query matching every page mentioning the platform, last hour only, unfiltered. */
export const SEARCH_QUERY = '"gleam.io"';

export const SEARCH_RESULTS_PER_PAGE = 10;

// ---------------------------------------------------------------------------
// Request headers per stage
// ---------------------------------------------------------------------------

export const USER_AGENTS = {
  search: 'Mozilla/5.0 (X11; Linux x86_64; rv:71.0) Gecko/20100101 Firefox/71.0',
  intermediary: 'Mozilla/5.0 (X11; Ubuntu; Linux x86_64; rv:78.0) Gecko/20100101 Firefox/78.0',
  giveaway: 'Mozilla/5.0 (X11; Linux x86_64; rv:72.0) Gecko/20100101 Firefox/72.0',
} as const;

export const SEARCH_HEADERS: Record<string, string> = {
  'Accept': 'text/plain',
  'User-Agent': USER_AGENTS.search,
};

export const INTERMEDIARY_HEADERS: Record<string, string> = {
  'Accept': 'text/html,text/plain',
  'User-Agent': USER_AGENTS.intermediary,
};

export const GIVEAWAY_HEADERS: Record<string, string> = {
  'Accept': 'text/html',
  'User-Agent': USER_AGENTS.giveaway,
  'DNT': '1',
  'Upgrade-Insecure-Requests': '1',
};
