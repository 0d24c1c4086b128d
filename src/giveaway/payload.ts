/**
 * Locates and reads the campaign payload embedded in a giveaway page.
 *
 * The page normally initializes its widget with the whole campaign as an
 * HTML-entity encoded JSON argument (`ng-init='initCampaign(...)'`). That
 * blob is un-escaped, parsed and validated against a schema. Pages without
 * it may still carry the campaign as raw JSON inside a script; those fields
 * are read positionally, and their text stays in its escaped script form
 * for the script decoder.
 */

import { z } from 'zod';
import { InvalidResponseError } from '../shared/errors.js';
import { afterStrict, betweenStrict, runLength } from '../shared/text-scan.js';
import type { EntryMethod, RawGiveawayPayload } from './types.js';

export const CAMPAIGN_INIT_OPEN = "<div class='popup-blocks-container' ng-init='initCampaign(";
export const CAMPAIGN_INIT_CLOSE = ")'>";

export const SCRIPT_CAMPAIGN_MARKER = '"campaign":{';
export const SCRIPT_INCENTIVE_MARKER = '"incentive":{';
export const SCRIPT_ENTRY_METHODS_MARKER = '"entry_methods":[';

const unixTimestamp = z.number().int().nonnegative();

export const campaignPayloadSchema = z.object({
  campaign: z.object({
    name: z.string(),
    starts_at: unixTimestamp,
    ends_at: unixTimestamp,
  }),
  incentive: z.object({
    description: z.string(),
  }),
  entry_methods: z.array(
    z.object({
      entry_type: z.string(),
      worth: z.number().int().nonnegative(),
    }),
  ),
});

// ---------------------------------------------------------------------------
// HTML-entity encoded payload
// ---------------------------------------------------------------------------

/**
 * Parses an `initCampaign(...)` argument. Throws `InvalidResponseError`
 * naming the first missing or malformed key (e.g. `campaign.starts_at`).
 */
export function parseCampaignBlob(blob: string): RawGiveawayPayload {
  let json: unknown;
  try {
    json = JSON.parse(blob.replaceAll('&quot;', '"'));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new InvalidResponseError(`Campaign payload is not valid JSON: ${message}`, {
      field: 'payload',
    });
  }

  const result = campaignPayloadSchema.safeParse(json);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue && issue.path.length > 0 ? issue.path.join('.') : 'payload';
    throw new InvalidResponseError(
      `Campaign payload field "${field}" is missing or invalid${issue ? `: ${issue.message}` : ''}`,
      { field },
    );
  }

  const { campaign, incentive, entry_methods } = result.data;
  return {
    encoding: 'html-entities',
    name: campaign.name,
    description: incentive.description,
    startDate: campaign.starts_at,
    endDate: campaign.ends_at,
    entryMethods: entry_methods.map((method) => ({
      kind: method.entry_type,
      worth: method.worth,
    })),
  };
}

// ---------------------------------------------------------------------------
// Raw script payload
// ---------------------------------------------------------------------------

/** True when the character at `index` is preceded by an odd run of backslashes. */
function isEscaped(text: string, index: number): boolean {
  let backslashes = 0;
  while (index - backslashes - 1 >= 0 && text.charAt(index - backslashes - 1) === '\\') {
    backslashes++;
  }
  return backslashes % 2 === 1;
}

/** Index of the first unescaped quote at or after `from`, or `-1`. */
function closingQuoteIndex(text: string, from: number): number {
  let index = text.indexOf('"', from);
  while (index !== -1 && isEscaped(text, index)) {
    index = text.indexOf('"', index + 1);
  }
  return index;
}

/**
 * Index of the `]` closing a list whose body starts at `from`, skipping
 * nested lists, objects and string contents. `-1` when it never closes.
 */
export function listEndIndex(text: string, from = 0): number {
  let depth = 0;

  for (let index = from; index < text.length; index++) {
    const char = text.charAt(index);
    if (char === '"') {
      index = closingQuoteIndex(text, index + 1);
      if (index === -1) {
        return -1;
      }
    } else if (char === '[' || char === '{') {
      depth++;
    } else if (char === ']' || char === '}') {
      if (depth === 0) {
        return char === ']' ? index : -1;
      }
      depth--;
    }
  }

  return -1;
}

interface FieldValue<T> {
  value: T;
  /** Where the `"key":` marker starts. */
  index: number;
  next: number;
}

/**
 * Reads the string value of `"key":"..."` found at or after `from`,
 * without unescaping it.
 */
export function readStringField(
  text: string,
  key: string,
  from = 0,
): FieldValue<string> | null {
  const marker = `"${key}":"`;
  const markerIndex = text.indexOf(marker, from);
  if (markerIndex === -1) {
    return null;
  }

  const start = markerIndex + marker.length;
  const end = closingQuoteIndex(text, start);
  if (end === -1) {
    return null;
  }

  return { value: text.slice(start, end), index: markerIndex, next: end + 1 };
}

/**
 * Reads the unsigned integer value of `"key":123` found at or after `from`.
 */
export function readIntegerField(
  text: string,
  key: string,
  from = 0,
): FieldValue<number> | null {
  const marker = `"${key}":`;
  const markerIndex = text.indexOf(marker, from);
  if (markerIndex === -1) {
    return null;
  }

  const start = markerIndex + marker.length;
  const length = runLength(text, start, (char) => char >= '0' && char <= '9');
  if (length === 0) {
    return null;
  }

  return {
    value: Number(text.slice(start, start + length)),
    index: markerIndex,
    next: start + length,
  };
}

function required<T>(value: FieldValue<T> | null, field: string): T {
  if (value === null) {
    throw new InvalidResponseError(`Script payload field "${field}" is missing or invalid`, {
      field,
    });
  }
  return value.value;
}

/**
 * Each `entry_type` marks one entry method; its `worth` is looked up inside
 * the braces around it, so key order within the object does not matter.
 */
function readScriptEntryMethods(section: string): EntryMethod[] {
  const methods: EntryMethod[] = [];
  let entryType = readStringField(section, 'entry_type');

  while (entryType) {
    const objectStart = Math.max(0, section.lastIndexOf('{', entryType.index));
    const closing = section.indexOf('}', entryType.next);
    const objectEnd = closing === -1 ? section.length : closing;

    methods.push({
      kind: entryType.value,
      worth: required(
        readIntegerField(section.slice(objectStart, objectEnd), 'worth'),
        `entry_methods.${methods.length}.worth`,
      ),
    });

    entryType = readStringField(section, 'entry_type', objectEnd);
  }

  return methods;
}

/**
 * Reads the campaign fields out of raw script text, or returns `null`
 * when the text holds no script campaign at all.
 */
export function readScriptPayload(body: string): RawGiveawayPayload | null {
  const campaign = afterStrict(body, SCRIPT_CAMPAIGN_MARKER);
  if (campaign === null) {
    return null;
  }

  const incentive = afterStrict(body, SCRIPT_INCENTIVE_MARKER);
  if (incentive === null) {
    throw new InvalidResponseError('Script payload has no incentive', { field: 'incentive' });
  }

  const entryMethods = afterStrict(body, SCRIPT_ENTRY_METHODS_MARKER);
  const entryMethodsEnd = entryMethods === null ? -1 : listEndIndex(entryMethods);
  if (entryMethods === null || entryMethodsEnd === -1) {
    throw new InvalidResponseError('Script payload entry method list is missing or unterminated', {
      field: 'entry_methods',
    });
  }

  return {
    encoding: 'script',
    name: required(readStringField(campaign, 'name'), 'campaign.name'),
    description: required(readStringField(incentive, 'description'), 'incentive.description'),
    startDate: required(readIntegerField(campaign, 'starts_at'), 'campaign.starts_at'),
    endDate: required(readIntegerField(campaign, 'ends_at'), 'campaign.ends_at'),
    entryMethods: readScriptEntryMethods(entryMethods.slice(0, entryMethodsEnd)),
  };
}

/**
 * Stage 1: the campaign payload of a giveaway page. The entity-encoded
 * widget payload wins; the script payload is only consulted when the
 * widget marker is absent. A page with neither holds no giveaway.
 */
export function extractPayload(body: string): RawGiveawayPayload {
  const blob = betweenStrict(body, CAMPAIGN_INIT_OPEN, CAMPAIGN_INIT_CLOSE);
  if (blob !== null) {
    return parseCampaignBlob(blob);
  }

  const scriptPayload = readScriptPayload(body);
  if (scriptPayload !== null) {
    return scriptPayload;
  }

  throw new InvalidResponseError('Page holds no campaign payload', { field: 'payload' });
}
