/** Default autoplay interval between ticks: 200 ms. */
export const DEFAULT_TICK_INTERVAL_MS = 200;

/** Minimum allowed autoplay interval. */
export const MIN_TICK_INTERVAL_MS = 10;

/** Maximum number of tick snapshots retained in the in-memory ring buffer. */
export const MAX_SNAPSHOT_HISTORY = 200;
