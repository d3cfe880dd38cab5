import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { FeedConnectionError } from '@rail-trace/domain';
import type { FeedConnection, FeedConnectorPort, FeedFrame, RawLogWriterPort } from '@rail-trace/domain';
import { DeterministicClock } from '@rail-trace/adapters';
import { FeedSession } from '../feed-session.js';

// ─── In-process stand-ins for the transport and the log ──────────────────────

type Step = FeedFrame | Error;

class ScriptedConnection implements FeedConnection {
  readonly sent: string[] = [];
  closed = false;

  constructor(private readonly script: Step[]) {}

  async send(text: string): Promise<void> {
    this.sent.push(text);
  }

  async *frames(): AsyncGenerator<FeedFrame> {
    for (const step of this.script) {
      if (step instanceof Error) throw step;
      yield step;
    }
  }

  close(): void {
    this.closed = true;
  }
}

class ScriptedConnector implements FeedConnectorPort {
  attempts = 0;
  onExhausted: () => void = () => undefined;

  constructor(private readonly outcomes: Array<ScriptedConnection | Error>) {}

  async connect(): Promise<FeedConnection> {
    const outcome = this.outcomes[this.attempts];
    this.attempts += 1;
    if (!outcome) {
      this.onExhausted();
      throw new FeedConnectionError('no more scripted sessions');
    }
    if (outcome instanceof Error) throw outcome;
    return outcome;
  }
}

/** Holds every connect until `open()` is called. */
class GatedConnector implements FeedConnectorPort {
  attempts = 0;
  private release: () => void = () => undefined;
  private readonly gate = new Promise<void>((resolve) => {
    this.release = resolve;
  });

  constructor(private readonly connection: ScriptedConnection) {}

  async connect(): Promise<FeedConnection> {
    this.attempts += 1;
    await this.gate;
    return this.connection;
  }

  open(): void {
    this.release();
  }
}

class MemoryLog implements RawLogWriterPort {
  readonly lines: string[] = [];

  async append(frame: string): Promise<void> {
    this.lines.push(frame);
  }

  async close(): Promise<void> {}
}

const text = (data: string): FeedFrame => ({ kind: 'text', data });
const CLOSE: FeedFrame = { kind: 'close', code: 1000 };

const EXPECTED_COMMANDS = [
  'BBOX 1152072 6048052 1433666 6205578 5 tenant=sbm',
  'BUFFER 100 100',
  'GET extra_geoms',
  'SUB extra_geoms',
  'GET healthcheck',
  'SUB healthcheck',
  'GET sbm_newsticker',
  'SUB sbm_newsticker',
  'GET station_schematic',
  'SUB station_schematic',
  'GET deleted_vehicles_schematic',
  'SUB deleted_vehicles_schematic',
  'GET trajectory_schematic',
  'SUB trajectory_schematic',
  'GET station',
  'SUB station',
  'GET deleted_vehicles',
  'SUB deleted_vehicles',
  'GET trajectory',
  'SUB trajectory',
  'PING',
];

beforeEach(() => {
  jest.spyOn(console, 'log').mockImplementation(() => undefined);
  jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  jest.spyOn(console, 'error').mockImplementation(() => undefined);
});

afterEach(() => {
  jest.restoreAllMocks();
});

// ═══════════════════════════════════════════════════════════════════════════════

describe('FeedSession.runOnce', () => {
  it('subscribes in order, then sends an initial PING', async () => {
    const conn = new ScriptedConnection([CLOSE]);
    const session = new FeedSession({
      url: 'wss://feed.test/?key=test-key',
      connector: new ScriptedConnector([conn]),
      log: new MemoryLog(),
    });

    await expect(session.runOnce()).resolves.toBe('closed');
    expect(conn.sent).toEqual(EXPECTED_COMMANDS);
    expect(conn.closed).toBe(true);
  });

  it('logs text frames verbatim and ignores binary, ping and pong frames', async () => {
    const log = new MemoryLog();
    const conn = new ScriptedConnection([
      text('{"source":"healthcheck"}'),
      { kind: 'binary' },
      { kind: 'ping' },
      { kind: 'pong' },
      text('{"source":"station"}'),
      CLOSE,
      text('after close'),
    ]);
    const session = new FeedSession({ url: 'wss://feed.test/', connector: new ScriptedConnector([conn]), log });

    await session.runOnce();

    expect(log.lines).toEqual(['{"source":"healthcheck"}', '{"source":"station"}']);
    expect(session.stats).toEqual({ sessions: 1, framesLogged: 2 });
  });

  it('sends a PING after a frame once ten seconds have passed since the last one', async () => {
    // every clock read moves time forward by one second
    const clock = new DeterministicClock(0, 1_000);
    const frames = Array.from({ length: 25 }, (_, i) => text(`{"n":${i}}`));
    const conn = new ScriptedConnection([...frames, CLOSE]);
    const session = new FeedSession({
      url: 'wss://feed.test/',
      connector: new ScriptedConnector([conn]),
      log: new MemoryLog(),
      clock,
    });

    await session.runOnce();

    const pings = conn.sent.filter((c) => c === 'PING');
    expect(pings).toHaveLength(3);
    expect(conn.sent.slice(EXPECTED_COMMANDS.length)).toEqual(['PING', 'PING']);
  });

  it('returns failed on a read error and keeps what was logged before it', async () => {
    const log = new MemoryLog();
    const conn = new ScriptedConnection([text('kept'), new FeedConnectionError('socket hang up')]);
    const session = new FeedSession({ url: 'wss://feed.test/', connector: new ScriptedConnector([conn]), log });

    await expect(session.runOnce()).resolves.toBe('failed');
    expect(log.lines).toEqual(['kept']);
    expect(conn.closed).toBe(true);
  });

  it('propagates log write failures', async () => {
    const log: RawLogWriterPort = {
      append: async () => {
        throw new Error('disk full');
      },
      close: async () => undefined,
    };
    const conn = new ScriptedConnection([text('x'), CLOSE]);
    const session = new FeedSession({ url: 'wss://feed.test/', connector: new ScriptedConnector([conn]), log });

    await expect(session.runOnce()).rejects.toThrow('disk full');
  });
});

describe('FeedSession.run', () => {
  it('reconnects after a close, a read failure and a connect failure', async () => {
    const log = new MemoryLog();
    const first = new ScriptedConnection([text('a'), CLOSE]);
    const second = new ScriptedConnection([text('b'), new FeedConnectionError('reset')]);
    const connector = new ScriptedConnector([first, second, new FeedConnectionError('refused')]);
    const session = new FeedSession({ url: 'wss://feed.test/', connector, log });
    connector.onExhausted = () => session.stop();

    await session.run();

    expect(log.lines).toEqual(['a', 'b']);
    expect(connector.attempts).toBe(4);
    expect(session.stats.sessions).toBe(2);
    expect(second.sent).toEqual(EXPECTED_COMMANDS);
  });

  it('is fatal when the very first connection fails', async () => {
    const connector = new ScriptedConnector([new FeedConnectionError('refused')]);
    const session = new FeedSession({ url: 'wss://feed.test/', connector, log: new MemoryLog() });

    await expect(session.run()).rejects.toBeInstanceOf(FeedConnectionError);
    expect(connector.attempts).toBe(1);
  });

  it('does not start a session when stopped while connecting', async () => {
    const log = new MemoryLog();
    const conn = new ScriptedConnection([text('late'), CLOSE]);
    const connector = new GatedConnector(conn);
    const session = new FeedSession({ url: 'wss://feed.test/', connector, log });

    const running = session.run();
    session.stop();
    connector.open();
    await running;

    expect(connector.attempts).toBe(1);
    expect(conn.sent).toEqual([]);
    expect(conn.closed).toBe(true);
    expect(log.lines).toEqual([]);
    expect(session.stats.sessions).toBe(0);
  });

  it('stops reading once stop() is called mid-session', async () => {
    const lines: string[] = [];
    const conn = new ScriptedConnection([text('a'), text('b'), CLOSE]);
    const connector = new ScriptedConnector([conn]);
    let session: FeedSession | null = null;
    const log: RawLogWriterPort = {
      append: async (frame) => {
        lines.push(frame);
        session?.stop();
      },
      close: async () => undefined,
    };
    session = new FeedSession({ url: 'wss://feed.test/', connector, log });

    await session.run();

    expect(lines).toEqual(['a']);
    expect(connector.attempts).toBe(1);
    expect(conn.closed).toBe(true);
  });
});
