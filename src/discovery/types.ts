/**
 * Type definitions for the discovery module.
 * These types define the markers and options used by the link discoverer
 * and the shape of a discovery run.
 */

// ---------------------------------------------------------------------------
// Link discoverer configuration
// ---------------------------------------------------------------------------

export interface ResultLinkMarkers {
  /** Text right before a result URL. */
  open: string;
  /** Text ending the URL (usually the closing attribute quote). */
  close: string;
  /**
   * A URL is kept only when the text starting at its end begins with one
   * of these (click-tracking attributes of organic results).
   */
  acceptedSuffixes: readonly string[];
}

export interface EmbeddedLinkOptions {
  /** Scheme and host every embedded link starts with, including the trailing slash. */
  prefix: string;
  /** Longer paths are truncated to this many characters. */
  maxPathLength: number;
}

// ---------------------------------------------------------------------------
// Discovery runs
// ---------------------------------------------------------------------------

export interface DiscoveryRun {
  /** Search result pages that were scanned. */
  pagesScanned: number;
  /** Intermediary pages that were fetched and scanned. */
  intermediariesResolved: number;
  /** Canonical giveaway URLs, unique, in discovery order. */
  giveawayUrls: string[];
  /** Pages that could not be looked at. */
  errors: DiscoveryFailure[];
}

export interface DiscoveryFailure {
  url: string;
  message: string;
  code: string;
}
