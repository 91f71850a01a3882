import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { loadSeedFromEnv } from '@swarmgrid/core';
import { DEFAULT_TICK_INTERVAL_MS, Simulation, loadScenario } from '@swarmgrid/agent';
import type { SimulationLifecycleEvent, TargetLocatedEvent } from '@swarmgrid/agent';
import { createServer } from './server.js';
import { DEFAULT_PORT, DEFAULT_SCENARIO_FILE } from './constants.js';
import { formatFleet, formatRunSummary } from './summary.js';

export interface DemoOptions {
  /** Run to completion and print the summary without serving anything. */
  headless?: boolean;
  /** Scenario file; defaults to examples/scenarios/sample.json. */
  scenarioPath?: string;
  /** Autoplay interval for the served demo. */
  intervalMs?: number;
}

/** Absolute path of a bundled scenario file. */
export function resolveScenarioPath(fileName: string = DEFAULT_SCENARIO_FILE): string {
  const __dirname = path.dirname(fileURLToPath(import.meta.url));
  return path.resolve(__dirname, '..', '..', '..', 'examples', 'scenarios', fileName);
}

function printSummary(simulation: Simulation): void {
  console.log('');
  for (const line of formatRunSummary(simulation.getSnapshot(), simulation.getMetrics())) {
    console.log(line);
  }
}

export async function runDemo(options: DemoOptions = {}): Promise<void> {
  const scenarioPath = options.scenarioPath ?? resolveScenarioPath();
  const seed = loadSeedFromEnv();
  const scenario = await loadScenario(scenarioPath, seed === undefined ? {} : { seed });
  const simulation = new Simulation(scenario.config);

  console.log(`Swarm search demo: ${scenario.name}`);
  if (scenario.description !== undefined) {
    console.log(`   ${scenario.description}`);
  }
  console.log(`   ${formatFleet(simulation.getSnapshot())}`);
  console.log(`   Seed: ${scenario.config.seed}`);

  simulation.on('targetLocated', (event: TargetLocatedEvent) => {
    console.log(`   Tick ${String(event.tick)}: agent ${String(event.agentId)} reached target ${String(event.targetId)}`);
  });

  if (options.headless) {
    simulation.run();
    printSummary(simulation);
    return;
  }

  const port = Number(process.env['PORT']) || DEFAULT_PORT;
  const { app, sseManager, port: resolvedPort } = createServer({ simulation, port });

  const server = await new Promise<ReturnType<typeof app.listen>>((resolve) => {
    const srv = app.listen(resolvedPort, () => {
      resolve(srv);
    });
  });

  const url = `http://localhost:${String(resolvedPort)}`;
  console.log(`Snapshot feed at ${url}/events`);
  console.log(`   curl -X POST ${url}/api/simulation/pause`);
  console.log(`   curl -X POST ${url}/api/simulation/step`);
  console.log(`   curl -X POST ${url}/api/simulation/reset`);
  console.log('   Press Ctrl+C to stop');

  simulation.on('lifecycle', (event: SimulationLifecycleEvent) => {
    if (event.event === 'completed') {
      printSummary(simulation);
    }
  });

  simulation.start(options.intervalMs ?? DEFAULT_TICK_INTERVAL_MS);

  let isShuttingDown = false;

  function shutdown(): void {
    if (isShuttingDown) return;
    isShuttingDown = true;
    console.log('\nShutting down...');
    simulation.stop();
    sseManager.closeAll();
    server.close(() => {
      process.exit(0);
    });
  }

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

// Top-level execution only when run directly (not when imported via barrel)
const __filename = fileURLToPath(import.meta.url);
if (process.argv[1] && path.resolve(process.argv[1]) === __filename) {
  runDemo({ scenarioPath: process.argv[2] }).catch((err: unknown) => {
    console.error('Demo failed:', err);
    process.exit(1);
  });
}
