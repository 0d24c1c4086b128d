/**
 * Giveaway identifier normalization.
 *
 * Two URL shapes reference a giveaway:
 *   https://gleam.io/competitions/lSq1Q-s   (competition, fixed length)
 *   https://gleam.io/2zAsX/some-slug        (slug, any trailing text)
 * Both collapse to the same 5-character code, and the canonical URL is
 * rebuilt from that code alone, which drops the human-readable slug.
 */

import {
  COMPETITIONS_ROOT,
  GIVEAWAY_ID_LENGTH,
  PLATFORM_ROOT,
} from '../shared/constants.js';

export type GiveawayId = string;

export type GiveawayUrlShape =
  | { kind: 'competition'; id: GiveawayId }
  | { kind: 'slug'; id: GiveawayId }
  | { kind: 'unrecognized' };

/** Total length of a competition URL: root, code and a two-character suffix. */
const COMPETITION_URL_LENGTH = COMPETITIONS_ROOT.length + GIVEAWAY_ID_LENGTH + 2;

/** Shortest slug URL: root, code and the separator after it. */
const SLUG_URL_MIN_LENGTH = PLATFORM_ROOT.length + GIVEAWAY_ID_LENGTH + 1;

const ID_PATTERN = /^[A-Za-z0-9]{5}$/;

function isGiveawayId(candidate: string): boolean {
  return ID_PATTERN.test(candidate);
}

/**
 * Classifies a raw URL as one of the accepted giveaway shapes.
 * Anything else is `unrecognized`, which is not an error.
 */
export function classifyGiveawayUrl(url: string): GiveawayUrlShape {
  if (url.length === COMPETITION_URL_LENGTH && url.startsWith(COMPETITIONS_ROOT)) {
    const id = url.slice(COMPETITIONS_ROOT.length, COMPETITIONS_ROOT.length + GIVEAWAY_ID_LENGTH);
    if (isGiveawayId(id)) {
      return { kind: 'competition', id };
    }
  }

  const separatorIndex = PLATFORM_ROOT.length + GIVEAWAY_ID_LENGTH;
  if (
    url.length >= SLUG_URL_MIN_LENGTH &&
    url.startsWith(PLATFORM_ROOT) &&
    url.charAt(separatorIndex) === '/'
  ) {
    const id = url.slice(PLATFORM_ROOT.length, separatorIndex);
    if (isGiveawayId(id)) {
      return { kind: 'slug', id };
    }
  }

  return { kind: 'unrecognized' };
}

/**
 * Extracts the giveaway code from a URL, or `null` if it is not a giveaway link.
 */
export function getGiveawayId(url: string): GiveawayId | null {
  const shape = classifyGiveawayUrl(url);
  return shape.kind === 'unrecognized' ? null : shape.id;
}

export function canonicalGiveawayUrl(id: GiveawayId): string {
  return `${PLATFORM_ROOT}${id}/-`;
}

/**
 * Maps candidate URLs to canonical giveaway URLs, dropping unrecognized
 * ones and keeping the first occurrence of each code.
 */
export function normalizeGiveawayUrls(urls: Iterable<string>): string[] {
  const seen = new Set<GiveawayId>();
  const canonical: string[] = [];

  for (const url of urls) {
    const id = getGiveawayId(url);
    if (id === null || seen.has(id)) {
      continue;
    }
    seen.add(id);
    canonical.push(canonicalGiveawayUrl(id));
  }

  return canonical;
}
