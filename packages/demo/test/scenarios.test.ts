import { describe, it, expect } from 'vitest';
import { readdirSync } from 'node:fs';
import path from 'node:path';
import { Simulation, loadScenario } from '@swarmgrid/agent';
import { resolveScenarioPath } from '../src/demo-scenario.js';

const SCENARIO_DIR = path.resolve(import.meta.dirname, '..', '..', '..', 'examples', 'scenarios');

describe('bundled scenarios', () => {
  const files = readdirSync(SCENARIO_DIR).filter((file) => file.endsWith('.json'));

  it('ships the sample and patrol scenarios', () => {
    expect(files.sort()).toEqual(['patrol.json', 'sample.json']);
  });

  it('resolves bundled files from the demo package', () => {
    expect(resolveScenarioPath('patrol.json')).toBe(path.join(SCENARIO_DIR, 'patrol.json'));
    expect(resolveScenarioPath()).toBe(path.join(SCENARIO_DIR, 'sample.json'));
  });

  it.each(files)('%s loads and runs to its step budget', async (file) => {
    const scenario = await loadScenario(path.join(SCENARIO_DIR, file));
    const simulation = new Simulation(scenario.config);
    const final = simulation.run();

    expect(final.tick).toBe(scenario.config.stepBudget);
    expect(final.complete).toBe(true);
  });

  it('sample fleet places one Byzantine agent among five', async () => {
    const scenario = await loadScenario(resolveScenarioPath('sample.json'));

    expect(scenario.config.agentCount).toBe(5);
    expect(scenario.config.byzantineIndex).toBe(0);
    expect(scenario.config.targets.map((target) => target.motion.kind)).toEqual(['stationary', 'stationary', 'stationary']);
  });

  it('patrol moves both targets', async () => {
    const scenario = await loadScenario(resolveScenarioPath('patrol.json'));
    const simulation = new Simulation(scenario.config);
    const start = simulation.getSnapshot().targets.map((target) => target.position);
    simulation.run();
    const end = simulation.getSnapshot().targets.map((target) => target.position);

    expect(scenario.config.byzantineStrategy).toEqual({ kind: 'swap' });
    expect(end[1]).not.toEqual(start[1]);
  });
});
