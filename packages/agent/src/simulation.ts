import { EventEmitter } from 'node:events';
import { GridWorld, createRandomSource } from '@swarmgrid/core';
import type { SimulationConfig } from '@swarmgrid/core';
import { SearchAgent } from './agent.js';
import { HonestClaimPolicy, createClaimPolicy } from './claim-policy.js';
import { ConsensusEngine } from './consensus.js';
import { DEFAULT_TICK_INTERVAL_MS, MAX_SNAPSHOT_HISTORY, MIN_TICK_INTERVAL_MS } from './constants.js';
import { MetricsEvaluator } from './metrics.js';
import { buildTickSnapshot, toTargetSnapshots } from './snapshot.js';
import type {
  ConsensusRoundReport,
  MetricsReport,
  SimulationLifecycleEvent,
  SimulationOptions,
  TargetLocatedEvent,
  TickSnapshot,
} from './types.js';

interface RunState {
  readonly world: GridWorld;
  readonly agents: readonly SearchAgent[];
  readonly metrics: MetricsEvaluator;
  snapshot: TickSnapshot;
  history: TickSnapshot[];
  lastRound: ConsensusRoundReport | null;
}

/**
 * Lock-step simulation of the search fleet.
 *
 * `tick()` advances core state unconditionally; `start()` merely drives it
 * from a timer. Emits `tick` (TickSnapshot), `beliefChanged` (BeliefChange),
 * `targetLocated` (TargetLocatedEvent) and `lifecycle`
 * (SimulationLifecycleEvent) for consumers.
 *
 * @param config - Resolved configuration from resolveSimulationConfig.
 */
export class Simulation extends EventEmitter {
  private readonly config: SimulationConfig;
  private readonly engine: ConsensusEngine;
  private readonly historySize: number;
  private state: RunState;
  private intervalId: ReturnType<typeof setInterval> | null = null;

  constructor(config: SimulationConfig, options: SimulationOptions = {}) {
    super();
    this.config = config;
    this.historySize = Math.max(1, options.historySize ?? MAX_SNAPSHOT_HISTORY);
    this.engine = new ConsensusEngine({
      communicationRange: config.communicationRange,
      tolerance: config.tolerance,
      quorum: config.quorum,
    });
    this.state = this.build();
  }

  getConfig(): SimulationConfig {
    return this.config;
  }

  getSnapshot(): TickSnapshot {
    return this.state.snapshot;
  }

  getTick(): number {
    return this.state.snapshot.tick;
  }

  isComplete(): boolean {
    return this.state.snapshot.complete;
  }

  /**
   * Retained snapshots, oldest first.
   *
   * @param limit - Return only the newest `limit` snapshots.
   */
  getHistory(limit?: number): readonly TickSnapshot[] {
    const { history } = this.state;
    const slice = limit === undefined ? history : history.slice(Math.max(0, history.length - limit));
    return Object.freeze([...slice]);
  }

  getMetrics(): MetricsReport {
    return this.state.metrics.report();
  }

  /** Report of the most recent consensus phase; null before the first tick. */
  getLastRound(): ConsensusRoundReport | null {
    return this.state.lastRound;
  }

  /**
   * Advance one tick: targets move, every agent observes the same frozen
   * world view, one consensus round runs, then every agent moves.
   * A no-op once the step budget is spent.
   *
   * @returns The snapshot taken after the tick.
   */
  tick(): TickSnapshot {
    const { state } = this;
    if (state.snapshot.complete) {
      return state.snapshot;
    }

    state.world.advance();
    const view = state.world.snapshot();
    for (const agent of state.agents) {
      agent.observe(view, this.config.sensorRange);
    }

    const round = this.engine.runRound(state.agents, view.tick);
    for (const agent of state.agents) {
      agent.move();
    }

    const located = this.record(view.tick, round);

    for (const change of round.changes) {
      this.emit('beliefChanged', change);
    }
    for (const event of located) {
      this.emit('targetLocated', event);
    }
    this.emit('tick', state.snapshot);
    if (state.snapshot.complete) {
      this.clearTimer();
      this.emitLifecycle('completed');
    }
    return state.snapshot;
  }

  /**
   * Tick until the step budget is spent.
   *
   * @returns The final snapshot.
   */
  run(): TickSnapshot {
    while (!this.isComplete()) {
      this.tick();
    }
    return this.state.snapshot;
  }

  /**
   * Start timer-driven autoplay. Each timer tick runs inside an error
   * boundary: a failure stops autoplay and emits a lifecycle `error`.
   *
   * @param intervalMs - Delay between ticks, at least MIN_TICK_INTERVAL_MS.
   * @throws RangeError when the interval is too short.
   */
  start(intervalMs: number = DEFAULT_TICK_INTERVAL_MS): void {
    if (!Number.isFinite(intervalMs) || intervalMs < MIN_TICK_INTERVAL_MS) {
      throw new RangeError(`intervalMs must be at least ${String(MIN_TICK_INTERVAL_MS)}, got ${String(intervalMs)}`);
    }
    if (this.intervalId !== null || this.isComplete()) {
      return;
    }
    this.intervalId = setInterval(() => {
      this.autoTick();
    }, intervalMs);
    this.emitLifecycle('started');
  }

  /** Pause autoplay. State is kept; `tick()` still works. */
  stop(): void {
    if (this.intervalId === null) {
      return;
    }
    this.clearTimer();
    this.emitLifecycle('paused');
  }

  isRunning(): boolean {
    return this.intervalId !== null;
  }

  /** Stop autoplay and rebuild a fresh run from the same configuration. */
  reset(): TickSnapshot {
    this.clearTimer();
    this.state = this.build();
    this.emitLifecycle('reset');
    this.emit('tick', this.state.snapshot);
    return this.state.snapshot;
  }

  private build(): RunState {
    const { config } = this;
    const world = new GridWorld(config, config.targets, createRandomSource(config.seed));
    const targetIds = config.targets.map((_, id) => id);
    const agents = config.agentStarts.map(
      (start, id) =>
        new SearchAgent({
          id,
          start,
          bounds: world.getBounds(),
          targetIds,
          claimPolicy: id === config.byzantineIndex ? createClaimPolicy(config.byzantineStrategy) : new HonestClaimPolicy(),
          tolerance: config.tolerance,
          pathHistoryLength: config.pathHistoryLength,
          sweepSpacing: config.sweepSpacing,
        }),
    );
    const metrics = new MetricsEvaluator({
      targetCount: config.targetCount,
      tolerance: config.tolerance,
      quorum: config.quorum,
    });
    const agentSnapshots = agents.map((agent) => agent.getSnapshot());
    const targets = toTargetSnapshots(world.getTargets());
    metrics.observe(0, agentSnapshots, targets);
    const snapshot = buildTickSnapshot(
      0,
      config.stepBudget,
      world.getBounds(),
      agentSnapshots,
      targets,
      metrics.competitiveRatio(),
    );
    return { world, agents, metrics, snapshot, history: [snapshot], lastRound: null };
  }

  private record(tick: number, round: ConsensusRoundReport): TargetLocatedEvent[] {
    const { state } = this;
    const agentSnapshots = state.agents.map((agent) => agent.getSnapshot());
    const targets = toTargetSnapshots(state.world.getTargets());
    const located = state.metrics.observe(tick, agentSnapshots, targets);
    state.snapshot = buildTickSnapshot(
      tick,
      this.config.stepBudget,
      state.world.getBounds(),
      agentSnapshots,
      targets,
      state.metrics.competitiveRatio(),
    );
    state.lastRound = round;
    state.history.push(state.snapshot);
    if (state.history.length > this.historySize) {
      state.history.shift();
    }
    return located;
  }

  private autoTick(): void {
    try {
      this.tick();
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`Simulation tick ${String(this.getTick() + 1)} failed: ${message}`);
      this.clearTimer();
      this.emitLifecycle('error', message);
    }
  }

  private clearTimer(): void {
    if (this.intervalId !== null) {
      clearInterval(this.intervalId);
      this.intervalId = null;
    }
  }

  private emitLifecycle(event: SimulationLifecycleEvent['event'], reason?: string): void {
    this.emit('lifecycle', {
      event,
      tick: this.getTick(),
      timestamp: Date.now(),
      ...(reason === undefined ? {} : { reason }),
    } satisfies SimulationLifecycleEvent);
  }
}
