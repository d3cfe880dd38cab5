import { setTimeout as delay } from 'timers/promises';
import { FeedConnectionError } from '@rail-trace/domain';
import type { ClockPort, FeedConnection, FeedConnectorPort, RawLogWriterPort } from '@rail-trace/domain';
import { systemClock } from '@rail-trace/adapters';
import { buildSubscriptionCommands, DEFAULT_SUBSCRIPTION, PING_COMMAND } from './subscription.js';
import type { Subscription } from './subscription.js';

/** Minimum spacing between keepalive PINGs */
export const HEARTBEAT_INTERVAL_MS = 10_000;

export interface FeedSessionOptions {
  url: string;
  connector: FeedConnectorPort;
  log: RawLogWriterPort;
  clock?: ClockPort;
  subscription?: Subscription;
  heartbeatIntervalMs?: number;
  /** Pause before reconnecting. 0 reconnects immediately. */
  reconnectDelayMs?: number;
}

export type SessionEnd = 'closed' | 'failed';

/**
 * Keeps one streaming session to the feed alive and forwards every text
 * frame to the raw log.
 *
 * The read loop is sequential: read a frame, write it, then send a PING if
 * the heartbeat interval has elapsed. There is no separate timer, so a
 * silent connection only notices trouble on the next send.
 */
export class FeedSession {
  private readonly clock: ClockPort;
  private readonly commands: readonly string[];
  private readonly heartbeatIntervalMs: number;
  private readonly reconnectDelayMs: number;
  private current: FeedConnection | null = null;
  private hasConnected = false;
  private stopped = false;
  private sessions = 0;
  private framesLogged = 0;

  constructor(private readonly options: FeedSessionOptions) {
    this.clock = options.clock ?? systemClock;
    this.commands = buildSubscriptionCommands(options.subscription ?? DEFAULT_SUBSCRIPTION);
    this.heartbeatIntervalMs = options.heartbeatIntervalMs ?? HEARTBEAT_INTERVAL_MS;
    this.reconnectDelayMs = options.reconnectDelayMs ?? 0;
  }

  get stats(): { sessions: number; framesLogged: number } {
    return { sessions: this.sessions, framesLogged: this.framesLogged };
  }

  /**
   * Runs sessions back to back until `stop()` is called. Rejects only when the
   * very first connection attempt fails or the log cannot be written.
   */
  async run(): Promise<void> {
    this.stopped = false;
    while (!this.stopped) {
      const end = await this.runOnce();
      if (this.stopped) break;
      console.warn(`[feed-session] session ${end}, reconnecting`);
      if (this.reconnectDelayMs > 0) await delay(this.reconnectDelayMs);
    }
  }

  /** Connects, subscribes and reads until the connection closes or fails. */
  async runOnce(): Promise<SessionEnd> {
    let connection: FeedConnection;
    try {
      connection = await this.options.connector.connect(this.options.url);
    } catch (err) {
      if (!(err instanceof FeedConnectionError) || !this.hasConnected) throw err;
      console.error(`[feed-session] ${err.message}`);
      return 'failed';
    }

    this.hasConnected = true;
    if (this.stopped) {
      connection.close();
      return 'closed';
    }

    this.current = connection;
    this.sessions += 1;
    console.log(`[feed-session] connected (session #${this.sessions})`);

    try {
      for (const command of this.commands) {
        await connection.send(command);
      }
      await connection.send(PING_COMMAND);
      let lastPingMs = this.clock.nowMs();

      for await (const frame of connection.frames()) {
        if (this.stopped || frame.kind === 'close') return 'closed';
        if (frame.kind === 'text') {
          await this.options.log.append(frame.data);
          this.framesLogged += 1;
        }

        const now = this.clock.nowMs();
        if (now - lastPingMs >= this.heartbeatIntervalMs) {
          await connection.send(PING_COMMAND);
          lastPingMs = now;
        }
      }
      return 'closed';
    } catch (err) {
      if (!(err instanceof FeedConnectionError)) throw err;
      console.error(`[feed-session] ${err.message}`);
      return 'failed';
    } finally {
      connection.close();
      this.current = null;
    }
  }

  /** Ends the loop after the current session; closes the open connection. */
  stop(): void {
    this.stopped = true;
    this.current?.close();
  }
}
