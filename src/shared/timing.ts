/**
 * Returns a promise that resolves after `ms` milliseconds.
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, Math.max(0, ms)));
}

/**
 * Current time as a unix timestamp in whole seconds.
 */
export function unixNow(): number {
  return Math.floor(Date.now() / 1000);
}
