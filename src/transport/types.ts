/**
 * Contract between the pipeline and whatever performs the requests.
 */
export interface TextFetcher {
  /**
   * Performs one GET request and resolves with the body as text.
   * Rejects with a `TransportError` when the request cannot complete
   * (`unreachable`) or the body is not valid text (`undecodable`).
   */
  fetchText(url: string, headers?: Record<string, string>): Promise<string>;
}

export interface HttpTextClientOptions {
  /** Per-request timeout in milliseconds. */
  timeoutMs: number;
  /** Attempts per request, including the first one. */
  maxAttempts: number;
  /** Base delay before a retry. */
  retryBaseDelayMs?: number;
}
