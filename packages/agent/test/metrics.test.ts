import { describe, it, expect } from 'vitest';
import { MetricsEvaluator, distanceRatio } from '../src/metrics.js';
import { buildAgentSnapshot, toTargetSnapshots } from '../src/snapshot.js';
import type { Position } from '@swarmgrid/core';
import type { AgentSnapshot, BeliefEntry } from '../src/types.js';

interface ViewOptions {
  position: Position;
  start: Position;
  pathLength?: number;
  isByzantine?: boolean;
  /** Trusted belief per target id; null for none. */
  beliefs?: Array<Position | null>;
}

function view(agentId: number, options: ViewOptions): AgentSnapshot {
  const beliefs = (options.beliefs ?? []).map((position, targetId): BeliefEntry => ({
    targetId,
    trusted:
      position === null ? null : { targetId, position, confidence: 2, updatedTick: 1, provenance: 'received' },
    observation: null,
  }));
  return buildAgentSnapshot({
    agentId,
    position: options.position,
    start: options.start,
    isByzantine: options.isByzantine ?? false,
    mode: 'search',
    pursuedTargetId: null,
    beliefs,
    recentPositions: [options.position],
    pathLength: options.pathLength ?? 0,
  });
}

const targets = toTargetSnapshots([
  { id: 0, position: { x: 5, y: 5 } },
  { id: 1, position: { x: 10, y: 10 } },
]);

describe('distanceRatio', () => {
  it('divides actual by optimal', () => {
    expect(distanceRatio(6, 3)).toBe(2);
  });

  it('is undefined for a zero optimal distance', () => {
    expect(distanceRatio(0, 0)).toBeNull();
    expect(distanceRatio(4, 0)).toBeNull();
  });
});

describe('MetricsEvaluator', () => {
  it('reports nothing before any target is reached', () => {
    const metrics = new MetricsEvaluator({ targetCount: 2, tolerance: 1, quorum: 2 });
    expect(metrics.observe(0, [view(0, { position: { x: 0, y: 0 }, start: { x: 0, y: 0 } })], targets)).toEqual([]);

    const report = metrics.report();
    expect(report.competitiveRatio).toBeNull();
    expect(report.locatedCount).toBe(0);
    expect(report.targets).toHaveLength(2);
    expect(report.targets[1]).toEqual({
      targetId: 1,
      locatedTick: null,
      locatedBy: null,
      findPoint: null,
      actualDistance: null,
      optimalDistance: null,
      ratio: null,
      honestHolders: 0,
      accurateHolders: 0,
      convergedTick: null,
    });
  });

  it('compares the fleet distance so far with the nearest start in the fleet', () => {
    const metrics = new MetricsEvaluator({ targetCount: 2, tolerance: 1, quorum: 2 });
    const events = metrics.observe(3, [
      view(0, { position: { x: 5, y: 5 }, start: { x: 0, y: 5 }, pathLength: 7 }),
      view(1, { position: { x: 5, y: 2 }, start: { x: 5, y: 1 }, pathLength: 4 }),
    ], targets);

    expect(events).toEqual([{ targetId: 0, agentId: 0, tick: 3, position: { x: 5, y: 5 } }]);
    const [first] = metrics.report().targets;
    expect(first.locatedBy).toBe(0);
    expect(first.actualDistance).toBe(11);
    expect(first.optimalDistance).toBe(4);
    expect(first.ratio).toBe(2.75);
    expect(metrics.competitiveRatio()).toBe(2.75);
  });

  it('credits the lowest agent id when several arrive together', () => {
    const metrics = new MetricsEvaluator({ targetCount: 2, tolerance: 1, quorum: 2 });
    const events = metrics.observe(2, [
      view(3, { position: { x: 5, y: 5 }, start: { x: 5, y: 3 }, pathLength: 2 }),
      view(1, { position: { x: 5, y: 5 }, start: { x: 5, y: 7 }, pathLength: 2 }),
    ], targets);
    expect(events.map((event) => event.agentId)).toEqual([1]);
  });

  it('locates a target once and sums distances across targets', () => {
    const metrics = new MetricsEvaluator({ targetCount: 2, tolerance: 1, quorum: 2 });
    metrics.observe(3, [
      view(0, { position: { x: 5, y: 5 }, start: { x: 0, y: 5 }, pathLength: 7 }),
      view(1, { position: { x: 5, y: 2 }, start: { x: 5, y: 1 }, pathLength: 4 }),
    ], targets);
    const later = metrics.observe(9, [
      view(0, { position: { x: 5, y: 5 }, start: { x: 0, y: 5 }, pathLength: 7 }),
      view(1, { position: { x: 10, y: 10 }, start: { x: 5, y: 1 }, pathLength: 12 }),
    ], targets);

    expect(later).toEqual([{ targetId: 1, agentId: 1, tick: 9, position: { x: 10, y: 10 } }]);
    const report = metrics.report();
    expect(report.tick).toBe(9);
    expect(report.locatedCount).toBe(2);
    expect(report.targets[0].locatedTick).toBe(3);
    expect(report.targets[0].actualDistance).toBe(11);
    expect(report.targets[1].actualDistance).toBe(19);
    expect(report.targets[1].optimalDistance).toBe(14);
    expect(report.competitiveRatio).toBeCloseTo(30 / 18);
    expect(report.fleetDistance).toBe(19);
  });

  it('reports a null ratio when an agent starts on the target', () => {
    const metrics = new MetricsEvaluator({ targetCount: 2, tolerance: 1, quorum: 2 });
    const events = metrics.observe(0, [view(0, { position: { x: 5, y: 5 }, start: { x: 5, y: 5 } })], targets);

    expect(events).toHaveLength(1);
    expect(metrics.report().targets[0].ratio).toBeNull();
    expect(metrics.competitiveRatio()).toBeNull();
  });

  it('counts only honest holders toward convergence', () => {
    const metrics = new MetricsEvaluator({ targetCount: 2, tolerance: 1, quorum: 2 });
    const fleet = (second: Position) => [
      view(0, { position: { x: 0, y: 0 }, start: { x: 0, y: 0 }, beliefs: [{ x: 5, y: 6 }, null] }),
      view(1, { position: { x: 1, y: 0 }, start: { x: 1, y: 0 }, beliefs: [second, null] }),
      view(2, { position: { x: 2, y: 0 }, start: { x: 2, y: 0 }, isByzantine: true, beliefs: [{ x: 5, y: 5 }, null] }),
    ];

    metrics.observe(1, fleet({ x: 9, y: 9 }), targets);
    expect(metrics.report().targets[0]).toMatchObject({ honestHolders: 2, accurateHolders: 1, convergedTick: null });

    metrics.observe(2, fleet({ x: 5, y: 5 }), targets);
    metrics.observe(3, fleet({ x: 9, y: 9 }), targets);
    expect(metrics.report().targets[0]).toMatchObject({ honestHolders: 2, accurateHolders: 1, convergedTick: 2 });
  });
});
