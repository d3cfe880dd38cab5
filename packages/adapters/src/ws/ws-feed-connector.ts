import WebSocket from 'ws';
import type { RawData } from 'ws';
import { FeedConnectionError } from '@rail-trace/domain';
import type { FeedConnection, FeedConnectorPort, FeedFrame } from '@rail-trace/domain';

function rawDataToText(data: RawData): string {
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  return Buffer.from(data).toString('utf8');
}

/**
 * Turns the event-driven `ws` socket into a pull-based frame stream so the
 * session can run a sequential read loop.
 */
class WsFeedConnection implements FeedConnection {
  private readonly pending: FeedFrame[] = [];
  private waiter: (() => void) | null = null;
  private failure: FeedConnectionError | null = null;
  private closed = false;

  constructor(private readonly socket: WebSocket) {
    socket.on('message', (data, isBinary) => {
      this.push(isBinary ? { kind: 'binary' } : { kind: 'text', data: rawDataToText(data) });
    });
    socket.on('ping', () => this.push({ kind: 'ping' }));
    socket.on('pong', () => this.push({ kind: 'pong' }));
    socket.on('close', (code) => {
      // After an error the failure is reported instead of a normal close
      if (!this.failure) this.push({ kind: 'close', code });
      this.closed = true;
      this.wake();
    });
    socket.on('error', (err) => {
      this.failure = new FeedConnectionError(`feed read failed: ${err.message}`, { cause: err });
      this.wake();
    });
  }

  private push(frame: FeedFrame): void {
    if (this.closed) return;
    this.pending.push(frame);
    this.wake();
  }

  private wake(): void {
    const waiter = this.waiter;
    this.waiter = null;
    waiter?.();
  }

  send(text: string): Promise<void> {
    return new Promise((resolve, reject) => {
      if (this.socket.readyState !== WebSocket.OPEN) {
        reject(new FeedConnectionError(`feed send failed: socket is not open`));
        return;
      }
      this.socket.send(text, (err) =>
        err ? reject(new FeedConnectionError(`feed send failed: ${err.message}`, { cause: err })) : resolve(),
      );
    });
  }

  async *frames(): AsyncGenerator<FeedFrame> {
    for (;;) {
      const frame = this.pending.shift();
      if (frame) {
        yield frame;
        if (frame.kind === 'close') return;
        continue;
      }
      if (this.failure) throw this.failure;
      await new Promise<void>((resolve) => {
        this.waiter = resolve;
      });
    }
  }

  close(): void {
    this.socket.terminate();
  }
}

export class WsFeedConnector implements FeedConnectorPort {
  connect(url: string): Promise<FeedConnection> {
    return new Promise((resolve, reject) => {
      const socket = new WebSocket(url);
      const onError = (err: Error) => {
        socket.removeListener('open', onOpen);
        reject(new FeedConnectionError(`feed connect failed: ${err.message}`, { cause: err }));
      };
      const onOpen = () => {
        socket.removeListener('error', onError);
        resolve(new WsFeedConnection(socket));
      };
      socket.once('open', onOpen);
      socket.once('error', onError);
    });
  }
}
