import { distance, samePosition } from '@swarmgrid/core';
import type { Position } from '@swarmgrid/core';
import type { AgentSnapshot, MetricsReport, TargetLocatedEvent, TargetMetric, TargetSnapshot } from './types.js';

export interface MetricsOptions {
  readonly targetCount: number;
  /** An honest belief within this distance of the truth counts as accurate. */
  readonly tolerance: number;
  /** Accurate honest holders needed to call a target converged. */
  readonly quorum: number;
}

interface Located {
  readonly tick: number;
  readonly agentId: number;
  readonly findPoint: Position;
  readonly actualDistance: number;
  readonly optimalDistance: number;
}

/**
 * Ratio of two distances, or null when it is undefined.
 *
 * @example
 * ```typescript
 * distanceRatio(6, 3); // 2
 * distanceRatio(0, 0); // null
 * ```
 */
export function distanceRatio(actual: number, optimal: number): number | null {
  return optimal > 0 ? actual / optimal : null;
}

/**
 * Read-only observer of tick snapshots. Tracks when each target is first
 * reached, the running competitive ratio and per-target belief accuracy.
 * Never fails: undefined ratios are reported as null.
 */
export class MetricsEvaluator {
  private readonly options: MetricsOptions;
  private readonly located: Map<number, Located> = new Map();
  private readonly convergedTicks: Map<number, number> = new Map();
  private holders: Map<number, { honest: number; accurate: number }> = new Map();
  private lastTick = 0;
  private fleetDistance = 0;

  constructor(options: MetricsOptions) {
    this.options = options;
  }

  /**
   * Fold one tick's frozen view into the running metrics.
   *
   * @returns Targets located for the first time this tick.
   */
  observe(tick: number, agents: readonly AgentSnapshot[], targets: readonly TargetSnapshot[]): TargetLocatedEvent[] {
    this.lastTick = tick;
    this.fleetDistance = agents.reduce((sum, agent) => sum + agent.pathLength, 0);
    const events: TargetLocatedEvent[] = [];
    const honest = agents.filter((agent) => !agent.isByzantine);
    const holders = new Map<number, { honest: number; accurate: number }>();

    for (const target of targets) {
      if (!this.located.has(target.targetId)) {
        const finder = agents
          .filter((agent) => samePosition(agent.position, target.position))
          .sort((a, b) => a.agentId - b.agentId)[0];
        if (finder !== undefined) {
          const optimalDistance = Math.min(...agents.map((agent) => distance(agent.start, target.position)));
          this.located.set(target.targetId, {
            tick,
            agentId: finder.agentId,
            findPoint: target.position,
            actualDistance: this.fleetDistance,
            optimalDistance,
          });
          events.push(
            Object.freeze({ targetId: target.targetId, agentId: finder.agentId, tick, position: target.position }),
          );
        }
      }

      let honestHolders = 0;
      let accurateHolders = 0;
      for (const agent of honest) {
        const believed = agent.beliefs.find((view) => view.targetId === target.targetId)?.position ?? null;
        if (believed === null) {
          continue;
        }
        honestHolders++;
        if (distance(believed, target.position) <= this.options.tolerance) {
          accurateHolders++;
        }
      }
      holders.set(target.targetId, { honest: honestHolders, accurate: accurateHolders });
      if (!this.convergedTicks.has(target.targetId) && accurateHolders >= this.options.quorum) {
        this.convergedTicks.set(target.targetId, tick);
      }
    }

    this.holders = holders;
    return events;
  }

  /** Σ actual / Σ optimal over located targets; null when undefined. */
  competitiveRatio(): number | null {
    if (this.located.size === 0) {
      return null;
    }
    let actual = 0;
    let optimal = 0;
    for (const entry of this.located.values()) {
      actual += entry.actualDistance;
      optimal += entry.optimalDistance;
    }
    return distanceRatio(actual, optimal);
  }

  report(): MetricsReport {
    const targets: TargetMetric[] = [];
    for (let targetId = 0; targetId < this.options.targetCount; targetId++) {
      const located = this.located.get(targetId);
      const counts = this.holders.get(targetId) ?? { honest: 0, accurate: 0 };
      targets.push(
        Object.freeze({
          targetId,
          locatedTick: located?.tick ?? null,
          locatedBy: located?.agentId ?? null,
          findPoint: located === undefined ? null : Object.freeze({ ...located.findPoint }),
          actualDistance: located?.actualDistance ?? null,
          optimalDistance: located?.optimalDistance ?? null,
          ratio: located === undefined ? null : distanceRatio(located.actualDistance, located.optimalDistance),
          honestHolders: counts.honest,
          accurateHolders: counts.accurate,
          convergedTick: this.convergedTicks.get(targetId) ?? null,
        }),
      );
    }
    return Object.freeze({
      tick: this.lastTick,
      competitiveRatio: this.competitiveRatio(),
      locatedCount: this.located.size,
      targetCount: this.options.targetCount,
      fleetDistance: this.fleetDistance,
      targets: Object.freeze(targets),
    });
  }
}
