/**
 * Link discovery over raw page text.
 *
 * Two modes, both pure and linear:
 * - result links: URLs between an opening and a closing marker, kept only
 *   when a click-tracking attribute follows them (search result blocks)
 * - embedded links: every occurrence of a platform prefix followed by a
 *   URL-path-like run of characters (video descriptions, blog posts...)
 */

import { PLATFORM_ROOT } from '../shared/constants.js';
import { matchesBetween, occurrencesAfter, runLength } from '../shared/text-scan.js';
import type { EmbeddedLinkOptions, ResultLinkMarkers } from './types.js';

/** Markers of an organic result anchor on a search results page. */
export const SEARCH_RESULT_MARKERS: ResultLinkMarkers = {
  open: '"><a href="',
  close: '"',
  acceptedSuffixes: ['" onmousedown="return rwt(', '" data-ved="2a'],
};

/** Longest path kept after the platform prefix; enough for `competitions/xxxxx-s`. */
export const MAX_EMBEDDED_PATH_LENGTH = 20;

export const PLATFORM_LINK_OPTIONS: EmbeddedLinkOptions = {
  prefix: PLATFORM_ROOT,
  maxPathLength: MAX_EMBEDDED_PATH_LENGTH,
};

/**
 * Extracts result URLs in page order. The scan resumes right after each
 * URL, so the closing marker is re-examined but the same anchor is never
 * matched twice. No deduplication.
 */
export function extractResultLinks(
  text: string,
  markers: ResultLinkMarkers = SEARCH_RESULT_MARKERS,
): string[] {
  const links: string[] = [];

  for (const match of matchesBetween(text, markers.open, markers.close)) {
    const isResult = markers.acceptedSuffixes.some((suffix) =>
      text.startsWith(suffix, match.end),
    );
    if (isResult) {
      links.push(text.slice(match.start, match.end));
    }
  }

  return links;
}

/** Characters allowed in an embedded link path. */
export function isPathCharacter(char: string): boolean {
  return /^[A-Za-z0-9/_-]$/.test(char);
}

/**
 * Extracts `prefix + path` links, where the path is the run of path
 * characters after the prefix, cut to `maxPathLength`. Empty paths are
 * skipped; results are unique and in first-found order.
 */
export function extractEmbeddedLinks(
  text: string,
  options: EmbeddedLinkOptions = PLATFORM_LINK_OPTIONS,
): string[] {
  const links: string[] = [];
  const seen = new Set<string>();

  for (const pathStart of occurrencesAfter(text, options.prefix)) {
    const length = Math.min(
      runLength(text, pathStart, isPathCharacter),
      options.maxPathLength,
    );
    if (length === 0) {
      continue;
    }

    const link = options.prefix + text.slice(pathStart, pathStart + length);
    if (!seen.has(link)) {
      seen.add(link);
      links.push(link);
    }
  }

  return links;
}
