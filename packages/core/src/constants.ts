/** Default grid width in cells. */
export const DEFAULT_GRID_WIDTH = 20;

/** Default grid height in cells. */
export const DEFAULT_GRID_HEIGHT = 20;

export const DEFAULT_AGENT_COUNT = 5;
export const DEFAULT_TARGET_COUNT = 3;

/** Agent 0 lies unless configured otherwise. */
export const DEFAULT_BYZANTINE_INDEX = 0;

/** Default fabricated offset reported by the Byzantine agent. */
export const DEFAULT_BYZANTINE_OFFSET = { dx: 3, dy: 3 } as const;

/** Manhattan radius for claim exchange between agents. */
export const DEFAULT_COMMUNICATION_RANGE = 5;

/** Manhattan radius for direct target observation. */
export const DEFAULT_SENSOR_RANGE = 2;

/** Manhattan distance under which two claims land in the same vote bucket. */
export const DEFAULT_TOLERANCE = 1;

/** Votes a winning bucket needs: at least two independent reporters. */
export const DEFAULT_QUORUM = 2;

/** Ticks per run before the simulation stops unconditionally. */
export const DEFAULT_STEP_BUDGET = 100;

/** Recent positions kept per agent for display trails. */
export const DEFAULT_PATH_HISTORY_LENGTH = 20;

/** Ticks between random-walk target moves when none is configured. */
export const DEFAULT_TARGET_MOVE_PERIOD = 5;

export const DEFAULT_SEED = 'swarmgrid';

/** Environment variable consulted by loadSeedFromEnv. */
export const SEED_ENV_VAR = 'SWARMGRID_SEED';
