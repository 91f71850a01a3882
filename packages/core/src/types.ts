/** A cell on the grid. `y` grows downward. */
export interface Position {
  readonly x: number;
  readonly y: number;
}

/** Grid dimensions; valid cells are `[0, width) × [0, height)`. */
export interface Bounds {
  readonly width: number;
  readonly height: number;
}

/** How a target moves between ticks. Owned exclusively by the Grid World. */
export type TargetMotion =
  | { readonly kind: 'stationary' }
  | {
      readonly kind: 'random-walk';
      /** Ticks between moves. */
      readonly period: number;
    }
  | {
      readonly kind: 'waypoints';
      /** Cycle of cells to walk toward, one cell per move. */
      readonly waypoints: readonly Position[];
      /** Ticks between moves. */
      readonly period: number;
    };

/** Initial placement and motion rule for one target. */
export interface TargetSpec {
  readonly position: Position;
  readonly motion: TargetMotion;
}

/** Ground-truth view of one target at a given tick. */
export interface Target {
  readonly id: number;
  readonly position: Position;
}

/** Immutable per-tick view of the world handed to every agent's observation phase. */
export interface WorldSnapshot {
  readonly tick: number;
  readonly bounds: Bounds;
  readonly targets: readonly Target[];
}

/**
 * How the Byzantine agent fabricates the positions it reports.
 * `offset` shifts its own belief by a fixed vector; `swap` reports a position
 * it holds for a different target.
 */
export type ByzantineStrategy =
  | { readonly kind: 'offset'; readonly dx: number; readonly dy: number }
  | { readonly kind: 'swap' };

/** Fully resolved simulation configuration. Every field is validated. */
export interface SimulationConfig {
  readonly width: number;
  readonly height: number;
  readonly agentCount: number;
  readonly targetCount: number;
  /** Index of the Byzantine agent, or null for an all-honest fleet. */
  readonly byzantineIndex: number | null;
  readonly byzantineStrategy: ByzantineStrategy;
  /** Manhattan radius within which two agents exchange claims. */
  readonly communicationRange: number;
  /** Manhattan radius within which an agent sees targets directly. */
  readonly sensorRange: number;
  /** Claims within this Manhattan distance of a bucket's seed vote together. */
  readonly tolerance: number;
  /** Minimum votes a winning bucket needs before a belief changes. */
  readonly quorum: number;
  /**
   * Distance between consecutive rings of an agent's home sweep. Defaults
   * to sensorRange + communicationRange; 1 walks every ring.
   */
  readonly sweepSpacing: number;
  /** Hard tick limit; the run ends unconditionally when it is reached. */
  readonly stepBudget: number;
  /** Length of the per-agent recent-position trail kept for display. */
  readonly pathHistoryLength: number;
  readonly seed: string;
  readonly agentStarts: readonly Position[];
  readonly targets: readonly TargetSpec[];
}

/** Caller-supplied configuration; omitted fields take defaults. */
export type SimulationConfigInput = {
  readonly [K in keyof SimulationConfig]?: SimulationConfig[K];
};
