export { createServer } from './server.js';
export type { CreateServerOptions, ServerInstance } from './server.js';
export { SseManager, formatSseFrame } from './sse.js';
export { formatRunSummary, formatFleet } from './summary.js';
export { runDemo, resolveScenarioPath } from './demo-scenario.js';
export type { DemoOptions } from './demo-scenario.js';
export {
  DEFAULT_PORT,
  SSE_HEARTBEAT_INTERVAL_MS,
  SSE_RETRY_MS,
  DEFAULT_HISTORY_LIMIT,
  DEFAULT_SCENARIO_FILE,
} from './constants.js';
