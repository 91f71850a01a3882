import { formatPosition } from '@swarmgrid/core';
import type { MetricsReport, TargetMetric, TickSnapshot } from '@swarmgrid/agent';

function formatRatio(ratio: number | null): string {
  return ratio === null ? 'n/a' : ratio.toFixed(2);
}

function formatTarget(metric: TargetMetric, snapshot: TickSnapshot): string {
  const truth = snapshot.targets.find((target) => target.targetId === metric.targetId);
  const where = truth === undefined ? '' : ` at ${formatPosition(truth.position)}`;
  const consensus = metric.convergedTick === null ? 'no consensus' : `consensus at tick ${String(metric.convergedTick)}`;
  if (metric.locatedTick === null || metric.locatedBy === null) {
    return `  Target ${String(metric.targetId)}${where}: not located; ${consensus}`;
  }
  return (
    `  Target ${String(metric.targetId)}${where}: located by agent ${String(metric.locatedBy)} ` +
    `at tick ${String(metric.locatedTick)}, distance ${String(metric.actualDistance)} ` +
    `(optimal ${String(metric.optimalDistance)}, ratio ${formatRatio(metric.ratio)}); ${consensus}`
  );
}

/**
 * End-of-run report lines for the console.
 *
 * @example
 * ```typescript
 * formatRunSummary(simulation.run(), simulation.getMetrics())[0];
 * // 'Simulation completed after 100 steps'
 * ```
 */
export function formatRunSummary(snapshot: TickSnapshot, metrics: MetricsReport): string[] {
  const verb = snapshot.complete ? 'completed' : 'stopped';
  return [
    `Simulation ${verb} after ${String(snapshot.tick)} steps`,
    `Competitive Ratio: ${formatRatio(metrics.competitiveRatio)}`,
    `Targets located: ${String(metrics.locatedCount)}/${String(metrics.targetCount)}`,
    ...metrics.targets.map((metric) => formatTarget(metric, snapshot)),
    `Fleet distance: ${String(metrics.fleetDistance)}`,
  ];
}

/** One-line description of a fleet for the start-up banner. */
export function formatFleet(snapshot: TickSnapshot): string {
  const byzantine = snapshot.agents.find((agent) => agent.isByzantine);
  const liar = byzantine === undefined ? 'no Byzantine agent' : `agent ${String(byzantine.agentId)} Byzantine`;
  return (
    `${String(snapshot.agents.length)} agents (${liar}), ${String(snapshot.targets.length)} targets, ` +
    `${String(snapshot.bounds.width)}x${String(snapshot.bounds.height)} grid, budget ${String(snapshot.stepBudget)}`
  );
}
