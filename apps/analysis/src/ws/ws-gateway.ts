import { WebSocketServer, WebSocket } from 'ws';
import type { Server } from 'http';
import type { DrawSurfacePort, RgbaColor } from '@rail-trace/domain';
import type { DrawCommand } from '../services/replay/recording-surface.js';

export type WsMessage =
  | { type: 'hello'; width: number; height: number }
  | { type: 'frame'; seq: number; commands: DrawCommand[] };

/**
 * Draw surface backed by WebSocket clients: the draw calls of one frame are
 * collected and broadcast as a single `frame` message on `nextFrame()`.
 */
export class WsGateway implements DrawSurfacePort {
  private readonly wss: WebSocketServer;
  private readonly clients = new Set<WebSocket>();
  private commands: DrawCommand[] = [];
  private seq = 0;

  constructor(
    server: Server,
    readonly width: number,
    readonly height: number,
  ) {
    this.wss = new WebSocketServer({ server, path: '/ws' });

    this.wss.on('connection', (ws) => {
      this.clients.add(ws);
      ws.send(JSON.stringify({ type: 'hello', width: this.width, height: this.height } satisfies WsMessage));
      ws.on('close', () => this.clients.delete(ws));
      ws.on('error', () => this.clients.delete(ws));
    });

    console.log('[ws-gateway] listening on /ws');
  }

  get clientCount(): number {
    return this.clients.size;
  }

  private broadcast(msg: WsMessage): void {
    const payload = JSON.stringify(msg);
    for (const client of this.clients) {
      if (client.readyState === WebSocket.OPEN) {
        client.send(payload);
      }
    }
  }

  clearBackground(color: RgbaColor): void {
    this.commands = [{ op: 'clear', color }];
  }

  drawCircle(x: number, y: number, radius: number, color: RgbaColor): void {
    this.commands.push({ op: 'circle', x, y, radius, color });
  }

  async nextFrame(): Promise<void> {
    this.seq += 1;
    this.broadcast({ type: 'frame', seq: this.seq, commands: this.commands });
    this.commands = [];
  }

  close(): Promise<void> {
    for (const client of this.clients) client.terminate();
    return new Promise((resolve, reject) => this.wss.close((err) => (err ? reject(err) : resolve())));
  }
}
