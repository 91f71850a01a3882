import {
  DEFAULT_AGENT_COUNT,
  DEFAULT_BYZANTINE_INDEX,
  DEFAULT_BYZANTINE_OFFSET,
  DEFAULT_COMMUNICATION_RANGE,
  DEFAULT_GRID_HEIGHT,
  DEFAULT_GRID_WIDTH,
  DEFAULT_PATH_HISTORY_LENGTH,
  DEFAULT_QUORUM,
  DEFAULT_SEED,
  DEFAULT_SENSOR_RANGE,
  DEFAULT_STEP_BUDGET,
  DEFAULT_TARGET_COUNT,
  DEFAULT_TARGET_MOVE_PERIOD,
  DEFAULT_TOLERANCE,
  SEED_ENV_VAR,
} from './constants.js';
import { formatPosition, isInBounds } from './geometry.js';
import { createRandomSource } from './random.js';
import type { Bounds, ByzantineStrategy, Position, SimulationConfig, SimulationConfigInput, TargetSpec } from './types.js';

/**
 * Raised before a simulation starts when its configuration cannot satisfy the
 * model's invariants (e.g. a Byzantine index outside the fleet).
 */
export class ConfigurationError extends Error {
  /** Configuration field that failed validation. */
  readonly field: string;

  constructor(field: string, message: string) {
    super(message);
    this.name = 'ConfigurationError';
    this.field = field;
  }
}

function requireInteger(field: string, value: number, min: number): void {
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigurationError(
      field,
      `${field} must be an integer >= ${String(min)}, got ${String(value)}. ` +
        `To fix: Set ${field} to a whole number of at least ${String(min)}.`,
    );
  }
}

function requireNonNegative(field: string, value: number): void {
  if (!Number.isFinite(value) || value < 0) {
    throw new ConfigurationError(
      field,
      `${field} must be a non-negative number, got ${String(value)}. ` +
        `To fix: Use 0 to disable ${field} or a positive radius.`,
    );
  }
}

function requireInBounds(field: string, position: Position, bounds: Bounds): void {
  if (!isInBounds(position, bounds)) {
    throw new ConfigurationError(
      field,
      `${field} ${formatPosition(position)} lies outside the ${String(bounds.width)}x${String(bounds.height)} grid. ` +
        'To fix: Use integer cells with 0 <= x < width and 0 <= y < height.',
    );
  }
}

/**
 * Place agents along the main diagonal, spaced evenly: agent i starts at
 * (i·s, i·s) with s = ⌊min(width, height) / agentCount⌋.
 */
export function diagonalStarts(agentCount: number, bounds: Bounds): Position[] {
  const spacing = Math.floor(Math.min(bounds.width, bounds.height) / agentCount);
  return Array.from({ length: agentCount }, (_, i) => ({
    x: Math.min(bounds.width - 1, i * spacing),
    y: Math.min(bounds.height - 1, i * spacing),
  }));
}

/** Random target placement with random-walk motion, drawn from the run seed. */
function randomTargets(targetCount: number, bounds: Bounds, seed: string): TargetSpec[] {
  const random = createRandomSource(`${seed}:targets`);
  return Array.from({ length: targetCount }, (): TargetSpec => ({
    position: {
      x: random.integer(0, bounds.width - 1),
      y: random.integer(0, bounds.height - 1),
    },
    motion: { kind: 'random-walk', period: DEFAULT_TARGET_MOVE_PERIOD },
  }));
}

function validateTargets(targets: readonly TargetSpec[], bounds: Bounds): void {
  targets.forEach((target, index) => {
    const field = `targets[${String(index)}]`;
    requireInBounds(`${field}.position`, target.position, bounds);
    const { motion } = target;
    if (motion.kind === 'stationary') {
      return;
    }
    requireInteger(`${field}.motion.period`, motion.period, 1);
    if (motion.kind === 'waypoints') {
      if (motion.waypoints.length === 0) {
        throw new ConfigurationError(
          `${field}.motion.waypoints`,
          `${field}.motion.waypoints must not be empty. ` +
            "To fix: List at least one waypoint or use { \"kind\": \"stationary\" }.",
        );
      }
      motion.waypoints.forEach((waypoint, w) => {
        requireInBounds(`${field}.motion.waypoints[${String(w)}]`, waypoint, bounds);
      });
    }
  });
}

/**
 * Fill defaults and validate a simulation configuration.
 * Fails fast: nothing about a run is built from an invalid configuration.
 *
 * @param input - Partial configuration; omitted fields take defaults.
 * @returns A frozen, fully resolved SimulationConfig.
 * @throws ConfigurationError naming the offending field.
 *
 * @example
 * ```typescript
 * const config = resolveSimulationConfig({ byzantineIndex: 2, stepBudget: 50 });
 * config.agentCount; // 5
 * ```
 */
export function resolveSimulationConfig(input: SimulationConfigInput = {}): SimulationConfig {
  const width = input.width ?? DEFAULT_GRID_WIDTH;
  const height = input.height ?? DEFAULT_GRID_HEIGHT;
  requireInteger('width', width, 1);
  requireInteger('height', height, 1);
  const bounds: Bounds = { width, height };

  const agentCount = input.agentCount ?? input.agentStarts?.length ?? DEFAULT_AGENT_COUNT;
  requireInteger('agentCount', agentCount, 1);

  const targetCount = input.targetCount ?? input.targets?.length ?? DEFAULT_TARGET_COUNT;
  requireInteger('targetCount', targetCount, 1);

  const byzantineIndex = input.byzantineIndex === undefined ? DEFAULT_BYZANTINE_INDEX : input.byzantineIndex;
  if (byzantineIndex !== null && (!Number.isInteger(byzantineIndex) || byzantineIndex < 0 || byzantineIndex >= agentCount)) {
    throw new ConfigurationError(
      'byzantineIndex',
      `byzantineIndex ${String(byzantineIndex)} is outside the fleet of ${String(agentCount)} agent(s). ` +
        `To fix: Use an index from 0 to ${String(agentCount - 1)}, or null for an all-honest fleet.`,
    );
  }

  const communicationRange = input.communicationRange ?? DEFAULT_COMMUNICATION_RANGE;
  const sensorRange = input.sensorRange ?? DEFAULT_SENSOR_RANGE;
  const tolerance = input.tolerance ?? DEFAULT_TOLERANCE;
  requireNonNegative('communicationRange', communicationRange);
  requireNonNegative('sensorRange', sensorRange);
  requireNonNegative('tolerance', tolerance);

  const quorum = input.quorum ?? DEFAULT_QUORUM;
  requireInteger('quorum', quorum, 1);
  const sweepSpacing = input.sweepSpacing ?? Math.max(1, Math.floor(sensorRange + communicationRange));
  requireInteger('sweepSpacing', sweepSpacing, 1);
  const stepBudget = input.stepBudget ?? DEFAULT_STEP_BUDGET;
  requireInteger('stepBudget', stepBudget, 1);
  const pathHistoryLength = input.pathHistoryLength ?? DEFAULT_PATH_HISTORY_LENGTH;
  requireInteger('pathHistoryLength', pathHistoryLength, 1);

  const byzantineStrategy: ByzantineStrategy = input.byzantineStrategy ?? { kind: 'offset', ...DEFAULT_BYZANTINE_OFFSET };
  if (byzantineStrategy.kind === 'offset') {
    requireInteger('byzantineStrategy.dx', Math.abs(byzantineStrategy.dx), 0);
    requireInteger('byzantineStrategy.dy', Math.abs(byzantineStrategy.dy), 0);
  }

  const seed = input.seed ?? DEFAULT_SEED;

  const agentStarts = input.agentStarts ?? diagonalStarts(agentCount, bounds);
  if (agentStarts.length !== agentCount) {
    throw new ConfigurationError(
      'agentStarts',
      `agentStarts lists ${String(agentStarts.length)} position(s) for ${String(agentCount)} agent(s). ` +
        'To fix: Give exactly one start cell per agent, or omit agentStarts for the diagonal layout.',
    );
  }
  agentStarts.forEach((start, index) => {
    requireInBounds(`agentStarts[${String(index)}]`, start, bounds);
  });

  const targets = input.targets ?? randomTargets(targetCount, bounds, seed);
  if (targets.length !== targetCount) {
    throw new ConfigurationError(
      'targets',
      `targets lists ${String(targets.length)} target(s) but targetCount is ${String(targetCount)}. ` +
        'To fix: Make targetCount match the targets list, or omit one of them.',
    );
  }
  validateTargets(targets, bounds);

  return Object.freeze({
    width,
    height,
    agentCount,
    targetCount,
    byzantineIndex,
    byzantineStrategy: Object.freeze({ ...byzantineStrategy }),
    communicationRange,
    sensorRange,
    tolerance,
    quorum,
    sweepSpacing,
    stepBudget,
    pathHistoryLength,
    seed,
    agentStarts: Object.freeze(agentStarts.map((start) => Object.freeze({ x: start.x, y: start.y }))),
    targets: Object.freeze(targets.map((target) => Object.freeze({ ...target }))),
  });
}

/**
 * Read the run seed from the environment.
 *
 * @param env - Environment to read; defaults to `process.env`.
 * @returns The trimmed SWARMGRID_SEED value, or undefined when unset or blank.
 */
export function loadSeedFromEnv(env: NodeJS.ProcessEnv = process.env): string | undefined {
  const raw = env[SEED_ENV_VAR]?.trim();
  return raw === undefined || raw === '' ? undefined : raw;
}
