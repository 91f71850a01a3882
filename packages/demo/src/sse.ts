import type { Response } from 'express';
import { SSE_HEARTBEAT_INTERVAL_MS } from './constants.js';

interface StreamClient {
  readonly res: Response;
  readonly heartbeat: ReturnType<typeof setInterval>;
}

/** Encode one Server-Sent Events frame. */
export function formatSseFrame(event: string, data: unknown): string {
  return `event: ${event}\ndata: ${JSON.stringify(data)}\n\n`;
}

/**
 * Fan-out of named events to open `text/event-stream` responses.
 *
 * Events listed in `replayEvents` are retained (latest frame per name) and
 * written to every client that connects later, so a new viewer sees the
 * current snapshot without waiting for the next tick.
 */
export class SseManager {
  private readonly clients: Map<Response, StreamClient> = new Map();
  private readonly retained: Map<string, string> = new Map();
  private readonly replayEvents: ReadonlySet<string>;

  constructor(replayEvents: readonly string[] = []) {
    this.replayEvents = new Set(replayEvents);
  }

  /**
   * Register an open stream: replay retained frames, start its keepalive
   * and drop it once the connection closes or errors.
   */
  addClient(res: Response): void {
    for (const frame of this.retained.values()) {
      res.write(frame);
    }

    const heartbeat = setInterval(() => {
      if (!res.writableEnded) {
        res.write(':keepalive\n\n');
      }
    }, SSE_HEARTBEAT_INTERVAL_MS);
    this.clients.set(res, { res, heartbeat });

    const drop = (): void => {
      this.removeClient(res);
    };
    res.on('close', drop);
    res.on('error', drop);
  }

  /** Forget a stream and stop its keepalive. Unknown streams are ignored. */
  removeClient(res: Response): void {
    const client = this.clients.get(res);
    if (client === undefined) {
      return;
    }
    clearInterval(client.heartbeat);
    this.clients.delete(res);
  }

  /** Write one frame to every open stream. */
  broadcast(event: string, data: unknown): void {
    const frame = formatSseFrame(event, data);
    if (this.replayEvents.has(event)) {
      this.retained.set(event, frame);
    }
    for (const { res } of this.clients.values()) {
      if (!res.writableEnded) {
        res.write(frame);
      }
    }
  }

  getClientCount(): number {
    return this.clients.size;
  }

  /** End every open stream; used on shutdown. */
  closeAll(): void {
    for (const { res } of [...this.clients.values()]) {
      this.removeClient(res);
      if (!res.writableEnded) {
        res.end();
      }
    }
  }
}
