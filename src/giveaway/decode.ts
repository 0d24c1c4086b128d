/**
 * Text decoders for giveaway names and descriptions.
 *
 * The page carries text in one of two encodings, depending on where the
 * payload was read from, and each has its own decoder. They are not
 * interchangeable and are never chained.
 */

import { indexBetweenStrict, occurrencesAfter, scanBetween } from '../shared/text-scan.js';

const NO_BREAK_SPACE = '\u00a0';
const APOSTROPHE_ENTITY = '&#39;';

/** Literal (unparsed) JSON escapes as they appear in script text. */
const ESCAPED_TAG_OPEN = '\\u003c';
const ESCAPED_TAG_CLOSE = '\\u003e';
const ESCAPED_AMPERSAND = '\\u0026';
const UNICODE_ESCAPE = '\\u';

const NUMERIC_REFERENCE_MARKERS = ['&#', `${ESCAPED_AMPERSAND}#`] as const;

const MAX_CODE_POINT = 0x10ffff;

/**
 * Removes every `open`…`close` span, delimiters included, always taking the
 * leftmost `open` and the first `close` after it.
 */
export function stripDelimited(text: string, open: string, close: string): string {
  let result = text;
  let range = indexBetweenStrict(result, open, close);

  while (range) {
    result = result.slice(0, range.start - open.length) + result.slice(range.end + close.length);
    range = indexBetweenStrict(result, open, close);
  }

  return result;
}

/**
 * Decodes text taken from the HTML-entity encoded payload:
 * strips tags, turns no-break spaces into line breaks, resolves `&#39;`.
 */
export function decodeHtmlText(text: string): string {
  return stripDelimited(text, '<', '>')
    .replaceAll(NO_BREAK_SPACE, '\n')
    .replaceAll(APOSTROPHE_ENTITY, "'");
}

/**
 * Index of the first escape that cannot be completed: a `\u` without four
 * hex digits after it, or a tag opener with no closer. `-1` if none.
 */
export function findDanglingEscape(text: string): number {
  let dangling = text.indexOf(ESCAPED_TAG_OPEN);

  for (const position of occurrencesAfter(text, UNICODE_ESCAPE)) {
    if (!/^[0-9a-fA-F]{4}/.test(text.slice(position, position + 4))) {
      const start = position - UNICODE_ESCAPE.length;
      if (dangling === -1 || start < dangling) {
        dangling = start;
      }
      break;
    }
  }

  return dangling;
}

function toCodePoint(digits: string): string | null {
  if (!/^\d+$/.test(digits)) {
    return null;
  }
  const code = Number(digits);
  if (code > MAX_CODE_POINT || (code >= 0xd800 && code <= 0xdfff)) {
    return null;
  }
  return String.fromCodePoint(code);
}

interface NumericReference {
  start: number;
  end: number;
  digits: string;
}

function nextNumericReference(text: string, from: number): NumericReference | null {
  let best: NumericReference | null = null;

  for (const marker of NUMERIC_REFERENCE_MARKERS) {
    const match = scanBetween(text, marker, ';', from);
    if (!match) {
      continue;
    }
    const start = match.start - marker.length;
    if (best === null || start < best.start) {
      best = {
        start,
        end: match.end + 1,
        digits: text.slice(match.start, match.end),
      };
    }
  }

  return best;
}

/**
 * Resolves `&#N;` and `\u0026#N;` references left to right. The first
 * reference that is not a valid code point stops decoding; it and the
 * rest of the text are returned unchanged.
 */
export function resolveNumericReferences(text: string): string {
  let output = '';
  let position = 0;
  let reference = nextNumericReference(text, position);

  while (reference) {
    const char = toCodePoint(reference.digits);
    if (char === null) {
      break;
    }
    output += text.slice(position, reference.start) + char;
    position = reference.end;
    reference = nextNumericReference(text, position);
  }

  return output + text.slice(position);
}

const JSON_ESCAPE = /\\(u[0-9a-fA-F]{4}|["\\/bfnrt])/g;

const SIMPLE_ESCAPES: Record<string, string> = {
  '"': '"',
  '\\': '\\',
  '/': '/',
  b: '\b',
  f: '\f',
  n: '\n',
  r: '\r',
  t: '\t',
};

/**
 * Resolves JSON string escapes left to right. Surrogate pairs written as
 * two `\uXXXX` escapes recombine; unknown escapes are kept verbatim.
 */
export function resolveJsonEscapes(text: string): string {
  return text.replace(JSON_ESCAPE, (escape: string, body: string) => {
    if (body.startsWith('u')) {
      return String.fromCharCode(Number.parseInt(body.slice(1), 16));
    }
    return SIMPLE_ESCAPES[body] ?? escape;
  });
}

/**
 * Decodes text read positionally out of a raw JSON-in-script payload:
 * strips escaped tags, cuts at the first dangling escape, resolves the
 * apostrophe entity and numeric character references, then the
 * remaining JSON string escapes.
 */
export function decodeScriptText(text: string): string {
  let result = stripDelimited(text, ESCAPED_TAG_OPEN, ESCAPED_TAG_CLOSE);

  const dangling = findDanglingEscape(result);
  if (dangling !== -1) {
    result = result.slice(0, dangling);
  }

  result = result
    .replaceAll(`${ESCAPED_AMPERSAND}#39;`, "'")
    .replaceAll(APOSTROPHE_ENTITY, "'");

  return resolveJsonEscapes(resolveNumericReferences(result));
}
