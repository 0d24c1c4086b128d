/**
 * got-backed implementation of `TextFetcher`.
 *
 * Non-2xx responses are not failures here: their bodies are returned and
 * scanned like any other page, and the parser decides whether they hold
 * what it needs. Only requests that cannot complete, and bodies that are
 * not valid UTF-8, reject.
 */

import got, { type Got, type Response } from 'got';
import { getLogger } from '../shared/logger.js';
import { TransportError } from '../shared/errors.js';
import { retry } from '../shared/retry.js';
import type { HttpTextClientOptions, TextFetcher } from './types.js';

const log = getLogger('transport', { component: 'http-client' });

const DEFAULT_RETRY_BASE_DELAY_MS = 2000;

/** Network error codes worth a second attempt. */
const RETRYABLE_ERROR_CODES = ['ECONNRESET', 'ETIMEDOUT', 'ECONNREFUSED', 'EAI_AGAIN'];

/**
 * Decodes a response body as strict UTF-8.
 * Returns `null` when the bytes are not valid UTF-8.
 */
export function decodeBody(body: Uint8Array): string | null {
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(body);
  } catch (error) {
    if (error instanceof TypeError) {
      return null;
    }
    throw error;
  }
}

export class HttpTextClient implements TextFetcher {
  private readonly client: Got;
  private readonly maxAttempts: number;
  private readonly retryBaseDelayMs: number;

  constructor(options: HttpTextClientOptions) {
    this.maxAttempts = options.maxAttempts;
    this.retryBaseDelayMs = options.retryBaseDelayMs ?? DEFAULT_RETRY_BASE_DELAY_MS;
    this.client = got.extend({
      timeout: { request: options.timeoutMs },
      retry: { limit: 0 },
      followRedirect: true,
      throwHttpErrors: false,
      headers: {
        'Accept-Language': 'en-US,en;q=0.9',
        'Connection': 'keep-alive',
      },
    });
  }

  async fetchText(url: string, headers: Record<string, string> = {}): Promise<string> {
    let response: Response<Buffer>;
    try {
      response = await retry<Response<Buffer>>(
        () => this.client.get(url, { headers, responseType: 'buffer' }),
        {
          maxAttempts: this.maxAttempts,
          baseDelayMs: this.retryBaseDelayMs,
          retryableErrors: RETRYABLE_ERROR_CODES,
        },
      );
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      log.debug({ url, error: message }, 'Request did not complete');
      throw new TransportError(message, 'unreachable', url);
    }

    log.debug({ url, statusCode: response.statusCode, bytes: response.body.length }, 'Response received');

    const text = decodeBody(response.body);
    if (text === null) {
      throw new TransportError(`Body of ${url} is not valid UTF-8`, 'undecodable', url);
    }
    return text;
  }
}
