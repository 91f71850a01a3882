export {
  DEFAULT_GRID_WIDTH,
  DEFAULT_GRID_HEIGHT,
  DEFAULT_AGENT_COUNT,
  DEFAULT_TARGET_COUNT,
  DEFAULT_BYZANTINE_INDEX,
  DEFAULT_BYZANTINE_OFFSET,
  DEFAULT_COMMUNICATION_RANGE,
  DEFAULT_SENSOR_RANGE,
  DEFAULT_TOLERANCE,
  DEFAULT_QUORUM,
  DEFAULT_STEP_BUDGET,
  DEFAULT_PATH_HISTORY_LENGTH,
  DEFAULT_TARGET_MOVE_PERIOD,
  DEFAULT_SEED,
  SEED_ENV_VAR,
} from './constants.js';
export {
  distance,
  isWithinRange,
  samePosition,
  isInBounds,
  clampToBounds,
  reflectIntoBounds,
  stepToward,
  formatPosition,
} from './geometry.js';
export { createRandomSource } from './random.js';
export type { RandomSource } from './random.js';
export { GridWorld, findTargetsWithin } from './grid-world.js';
export { ConfigurationError, resolveSimulationConfig, diagonalStarts, loadSeedFromEnv } from './config.js';
export type {
  Position,
  Bounds,
  TargetMotion,
  TargetSpec,
  Target,
  WorldSnapshot,
  ByzantineStrategy,
  SimulationConfig,
  SimulationConfigInput,
} from './types.js';
