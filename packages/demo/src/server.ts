import express from 'express';
import type { Request, Response, NextFunction } from 'express';
import { DEFAULT_TICK_INTERVAL_MS } from '@swarmgrid/agent';
import type { BeliefChange, Simulation, SimulationLifecycleEvent, TargetLocatedEvent, TickSnapshot } from '@swarmgrid/agent';
import { SseManager } from './sse.js';
import { DEFAULT_HISTORY_LIMIT, DEFAULT_PORT, SSE_RETRY_MS } from './constants.js';

/** Options for creating the demo server. */
export interface CreateServerOptions {
  /** The Simulation instance to wire events from and control. */
  readonly simulation: Simulation;
  /** Port to listen on. Defaults to PORT env var or 3000. */
  readonly port?: number;
}

/** Return value from createServer containing the Express app and SSE manager. */
export interface ServerInstance {
  /** The configured Express application. */
  readonly app: ReturnType<typeof express>;
  /** The SSE connection manager. */
  readonly sseManager: SseManager;
  /** The resolved port number. */
  readonly port: number;
}

/** Parse a positive integer query value; undefined when absent, null when invalid. */
function parseLimit(value: unknown): number | null | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'string' || !/^\d+$/.test(value)) {
    return null;
  }
  const limit = Number(value);
  return limit > 0 ? limit : null;
}

function readIntervalMs(body: unknown): number | null {
  if (typeof body !== 'object' || body === null || !('intervalMs' in body)) {
    return DEFAULT_TICK_INTERVAL_MS;
  }
  const { intervalMs } = body;
  return typeof intervalMs === 'number' ? intervalMs : null;
}

/**
 * Create an Express 5 server wired to a Simulation for SSE broadcasting and
 * step/start/pause/reset control. The display cadence never gates `tick()`.
 *
 * @param options - Server configuration with simulation and optional port.
 * @returns The Express app, SSE manager, and resolved port.
 */
export function createServer(options: CreateServerOptions): ServerInstance {
  const { simulation, port = Number(process.env['PORT']) || DEFAULT_PORT } = options;

  const app = express();
  const sseManager = new SseManager(['snapshot']);

  app.use(express.json());

  // SSE endpoint: new clients receive the latest snapshot immediately
  app.get('/events', (_req: Request, res: Response) => {
    res.set({
      'Content-Type': 'text/event-stream',
      'Cache-Control': 'no-cache',
      'Connection': 'keep-alive',
      'X-Accel-Buffering': 'no',
    });
    res.flushHeaders();

    res.write(`retry: ${SSE_RETRY_MS}\n\n`);

    sseManager.addClient(res);
  });

  // --- Simulation event → SSE broadcast wiring ---

  sseManager.broadcast('snapshot', simulation.getSnapshot());

  simulation.on('tick', (snapshot: TickSnapshot) => {
    sseManager.broadcast('snapshot', snapshot);
  });

  simulation.on('beliefChanged', (change: BeliefChange) => {
    sseManager.broadcast('beliefChange', change);
  });

  simulation.on('targetLocated', (event: TargetLocatedEvent) => {
    sseManager.broadcast('targetLocated', event);
  });

  simulation.on('lifecycle', (event: SimulationLifecycleEvent) => {
    sseManager.broadcast('systemEvent', { type: 'lifecycle', ...event });
  });

  // --- Read endpoints ---

  app.get('/api/snapshot', (_req: Request, res: Response) => {
    res.status(200).json(simulation.getSnapshot());
  });

  app.get('/api/metrics', (_req: Request, res: Response) => {
    res.status(200).json(simulation.getMetrics());
  });

  app.get('/api/history', (req: Request, res: Response) => {
    const limit = parseLimit(req.query['limit']);
    if (limit === null) {
      res.status(400).json({ error: 'limit must be a positive integer' });
      return;
    }
    res.status(200).json(simulation.getHistory(limit ?? DEFAULT_HISTORY_LIMIT));
  });

  // --- Simulation control endpoints ---

  app.post('/api/simulation/step', (_req: Request, res: Response) => {
    const snapshot = simulation.tick();
    res.status(200).json({ tick: snapshot.tick, complete: snapshot.complete });
  });

  app.post('/api/simulation/start', (req: Request, res: Response) => {
    const intervalMs = readIntervalMs(req.body);
    if (intervalMs === null) {
      res.status(400).json({ error: 'intervalMs must be a number' });
      return;
    }
    try {
      simulation.start(intervalMs);
    } catch (err) {
      if (err instanceof RangeError) {
        res.status(400).json({ error: err.message });
        return;
      }
      throw err;
    }
    res.status(200).json({ running: simulation.isRunning(), tick: simulation.getTick() });
  });

  app.post('/api/simulation/pause', (_req: Request, res: Response) => {
    simulation.stop();
    res.status(200).json({ running: simulation.isRunning(), tick: simulation.getTick() });
  });

  app.post('/api/simulation/reset', (_req: Request, res: Response) => {
    const snapshot = simulation.reset();
    res.status(200).json({ running: simulation.isRunning(), tick: snapshot.tick });
  });

  // Error handler: Express 5 recognises it by its four parameters
  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    res.status(500).json({ error: err.message });
  });

  return { app, sseManager, port };
}
