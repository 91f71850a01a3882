import { describe, it, expect } from 'vitest';
import { resolveSimulationConfig } from '@swarmgrid/core';
import type { SimulationConfigInput } from '@swarmgrid/core';
import { Simulation } from '@swarmgrid/agent';
import { formatFleet, formatRunSummary } from '../src/summary.js';

function makeSimulation(overrides: SimulationConfigInput = {}): Simulation {
  return new Simulation(
    resolveSimulationConfig({
      width: 20,
      height: 20,
      stepBudget: 2,
      agentStarts: [
        { x: 17, y: 3 },
        { x: 2, y: 4 },
        { x: 4, y: 2 },
        { x: 16, y: 4 },
        { x: 18, y: 6 },
      ],
      targets: [
        { position: { x: 2, y: 2 }, motion: { kind: 'stationary' } },
        { position: { x: 10, y: 15 }, motion: { kind: 'stationary' } },
        { position: { x: 18, y: 4 }, motion: { kind: 'stationary' } },
      ],
      ...overrides,
    }),
  );
}

describe('formatRunSummary', () => {
  it('summarises a completed run target by target', () => {
    const simulation = makeSimulation();
    const final = simulation.run();

    expect(formatRunSummary(final, simulation.getMetrics())).toEqual([
      'Simulation completed after 2 steps',
      'Competitive Ratio: 5.00',
      'Targets located: 2/3',
      '  Target 0 at (2, 2): located by agent 1 at tick 2, distance 10 (optimal 2, ratio 5.00); consensus at tick 1',
      '  Target 1 at (10, 15): not located; no consensus',
      '  Target 2 at (18, 4): located by agent 0 at tick 2, distance 10 (optimal 2, ratio 5.00); consensus at tick 1',
      'Fleet distance: 10',
    ]);
  });

  it('reports an unfinished run with an undefined ratio', () => {
    const simulation = makeSimulation({ stepBudget: 100 });
    const snapshot = simulation.tick();
    const lines = formatRunSummary(snapshot, simulation.getMetrics());

    expect(lines.slice(0, 3)).toEqual([
      'Simulation stopped after 1 steps',
      'Competitive Ratio: n/a',
      'Targets located: 0/3',
    ]);
    expect(lines[3]).toBe('  Target 0 at (2, 2): not located; consensus at tick 1');
    expect(lines[lines.length - 1]).toBe('Fleet distance: 5');
  });
});

describe('formatFleet', () => {
  it('names the Byzantine agent', () => {
    expect(formatFleet(makeSimulation().getSnapshot())).toBe(
      '5 agents (agent 0 Byzantine), 3 targets, 20x20 grid, budget 2',
    );
  });

  it('describes an all-honest fleet', () => {
    expect(formatFleet(makeSimulation({ byzantineIndex: null }).getSnapshot())).toBe(
      '5 agents (no Byzantine agent), 3 targets, 20x20 grid, budget 2',
    );
  });
});
