/** Append-only sink for raw feed frames, one frame per line. */
export interface RawLogWriterPort {
  append(frame: string): Promise<void>;
  close(): Promise<void>;
}

/** Sequential reader over a raw log, in log order. */
export interface RawLogReaderPort {
  frames(): AsyncIterable<string>;
}
