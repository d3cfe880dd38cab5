import { createReadStream, createWriteStream, promises as fsp, constants } from 'fs';
import type { WriteStream } from 'fs';
import { createInterface } from 'readline';
import { RawLogUnavailableError } from '@rail-trace/domain';
import type { RawLogReaderPort, RawLogWriterPort } from '@rail-trace/domain';

/**
 * Newline-delimited raw log writer. Always opened in append mode so that
 * repeated recorder runs accumulate into the same file.
 */
export class JsonlRawLogWriter implements RawLogWriterPort {
  private constructor(
    readonly path: string,
    private readonly stream: WriteStream,
  ) {}

  /** Opens (creating if absent) `path` for appending. */
  static async open(path: string): Promise<JsonlRawLogWriter> {
    const stream = createWriteStream(path, { flags: 'a', encoding: 'utf8' });
    await new Promise<void>((resolve, reject) => {
      stream.once('open', () => resolve());
      stream.once('error', reject);
    });
    return new JsonlRawLogWriter(path, stream);
  }

  append(frame: string): Promise<void> {
    return new Promise((resolve, reject) => {
      this.stream.write(`${frame}\n`, (err) => (err ? reject(err) : resolve()));
    });
  }

  close(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.stream.once('error', reject);
      this.stream.end(() => resolve());
    });
  }
}

/** Reads a raw log line by line, in file order. Empty lines are yielded too. */
export class JsonlRawLogReader implements RawLogReaderPort {
  private constructor(readonly path: string) {}

  static async open(path: string): Promise<JsonlRawLogReader> {
    try {
      await fsp.access(path, constants.R_OK);
    } catch (err) {
      throw new RawLogUnavailableError(path, { cause: err });
    }
    return new JsonlRawLogReader(path);
  }

  async *frames(): AsyncGenerator<string> {
    const input = createReadStream(this.path, { encoding: 'utf8' });
    const lines = createInterface({ input, crlfDelay: Infinity });
    try {
      for await (const line of lines) {
        yield line;
      }
    } finally {
      lines.close();
      input.destroy();
    }
  }
}
