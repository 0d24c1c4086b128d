/**
 * Positional text scanning.
 *
 * Every lookup finds the leftmost occurrence of a literal marker, never a
 * regular expression. Functions are pure: they take the text and a start
 * position and return new positions, so repeated extraction is a matter of
 * feeding `next` back in (or iterating one of the generators below).
 *
 * Offsets are JavaScript string indices (UTF-16 code units).
 */

/** Half-open range `[start, end)` inside the scanned text. */
export interface ScanRange {
  start: number;
  end: number;
}

/** A range plus the position the following scan should start from. */
export interface ScanMatch extends ScanRange {
  next: number;
}

/**
 * Text before the first `marker`, or the whole text when it is absent.
 */
export function before(text: string, marker: string): string {
  return beforeStrict(text, marker) ?? text;
}

export function beforeStrict(text: string, marker: string): string | null {
  const index = text.indexOf(marker);
  return index === -1 ? null : text.slice(0, index);
}

/**
 * Text after the first `marker`, or `''` when it is absent.
 */
export function after(text: string, marker: string): string {
  return afterStrict(text, marker) ?? '';
}

export function afterStrict(text: string, marker: string): string | null {
  const index = text.indexOf(marker);
  return index === -1 ? null : text.slice(index + marker.length);
}

/**
 * Range of the text between the first `begin` and the first `end` that
 * follows it, or `null` when either marker is missing.
 */
export function indexBetweenStrict(
  text: string,
  begin: string,
  end: string,
): ScanRange | null {
  const match = scanBetween(text, begin, end, 0);
  return match ? { start: match.start, end: match.end } : null;
}

export function betweenStrict(text: string, begin: string, end: string): string | null {
  const range = indexBetweenStrict(text, begin, end);
  return range ? text.slice(range.start, range.end) : null;
}

/**
 * Like `betweenStrict`, but an absent marker yields `''`.
 * Callers that need to tell "empty" from "missing" must use the strict form.
 */
export function between(text: string, begin: string, end: string): string {
  return betweenStrict(text, begin, end) ?? '';
}

/**
 * Finds `begin` at or after `from`, then the first `end` after it.
 * `next` is the start of the `end` marker, so a following scan never
 * re-matches the same `begin`. Empty `begin` markers never match.
 */
export function scanBetween(
  text: string,
  begin: string,
  end: string,
  from = 0,
): ScanMatch | null {
  if (begin.length === 0 || from < 0 || from > text.length) {
    return null;
  }

  const beginIndex = text.indexOf(begin, from);
  if (beginIndex === -1) {
    return null;
  }

  const start = beginIndex + begin.length;
  const endIndex = text.indexOf(end, start);
  if (endIndex === -1) {
    return null;
  }

  return { start, end: endIndex, next: endIndex };
}

/**
 * Lazily yields every `begin`…`end` match, left to right, until the
 * text is exhausted. Each call returns a fresh iterator.
 */
export function* matchesBetween(
  text: string,
  begin: string,
  end: string,
  from = 0,
): Generator<ScanMatch, void, undefined> {
  let position = from;
  let match = scanBetween(text, begin, end, position);

  while (match) {
    yield match;
    position = match.next;
    match = scanBetween(text, begin, end, position);
  }
}

/**
 * Lazily yields the position right after each occurrence of `marker`.
 * Occurrences do not overlap.
 */
export function* occurrencesAfter(
  text: string,
  marker: string,
  from = 0,
): Generator<number, void, undefined> {
  if (marker.length === 0) {
    return;
  }

  let index = text.indexOf(marker, from);
  while (index !== -1) {
    const next = index + marker.length;
    yield next;
    index = text.indexOf(marker, next);
  }
}

/**
 * Length of the run starting at `from` whose characters all satisfy `accept`.
 */
export function runLength(
  text: string,
  from: number,
  accept: (char: string) => boolean,
): number {
  let length = 0;
  while (from + length < text.length && accept(text.charAt(from + length))) {
    length++;
  }
  return length;
}
