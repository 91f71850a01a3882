/** Default port for the Express server. */
export const DEFAULT_PORT = 3000;

/** Interval in milliseconds between SSE keepalive heartbeat comments. */
export const SSE_HEARTBEAT_INTERVAL_MS = 30_000;

/** Suggested reconnection delay in milliseconds sent to SSE clients. */
export const SSE_RETRY_MS = 5_000;

/** History entries returned by GET /api/history when no limit is given. */
export const DEFAULT_HISTORY_LIMIT = 20;

/** Scenario served by the demo when none is named. */
export const DEFAULT_SCENARIO_FILE = 'sample.json';
