import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { runDemo, resolveScenarioPath } from '../src/demo-scenario.js';

describe('runDemo (headless)', () => {
  let lines: string[];

  beforeEach(() => {
    lines = [];
    vi.spyOn(console, 'log').mockImplementation((message?: unknown) => {
      lines.push(String(message));
    });
    vi.stubEnv('SWARMGRID_SEED', '');
  });

  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
  });

  it('prints the banner, each located target and the summary', async () => {
    await runDemo({ headless: true });

    expect(lines.slice(0, 4)).toEqual([
      'Swarm search demo: sample',
      '   Three stationary targets, agent 0 reports every position shifted by (+3, +3). Agents start on the diagonal.',
      '   5 agents (agent 0 Byzantine), 3 targets, 20x20 grid, budget 100',
      '   Seed: sample',
    ]);
    expect(lines.filter((line) => line.includes(' reached target '))).toEqual([
      '   Tick 4: agent 0 reached target 0',
      '   Tick 7: agent 4 reached target 1',
      '   Tick 26: agent 3 reached target 2',
    ]);
    expect(lines).toContain('Simulation completed after 100 steps');
    expect(lines).toContain('Competitive Ratio: 6.83');
    expect(lines).toContain('Targets located: 3/3');
  });

  it('takes the seed from SWARMGRID_SEED', async () => {
    vi.stubEnv('SWARMGRID_SEED', ' replay-7 ');
    await runDemo({ headless: true });

    expect(lines).toContain('   Seed: replay-7');
  });

  it('runs another bundled scenario by path', async () => {
    await runDemo({ headless: true, scenarioPath: resolveScenarioPath('patrol.json') });

    expect(lines[0]).toBe('Swarm search demo: patrol');
    expect(lines).toContain('Simulation completed after 150 steps');
  });

  it('rejects a scenario file that does not exist', async () => {
    await expect(runDemo({ headless: true, scenarioPath: resolveScenarioPath('missing.json') })).rejects.toThrow(
      'Cannot read scenario file',
    );
  });
});
