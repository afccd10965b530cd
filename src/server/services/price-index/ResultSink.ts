import { once } from 'events';
import type { Writable } from 'stream';
import type { OutputRecord } from './types.js';

/**
 * Destination for extraction output. Records are written in the order the
 * extractor produces them.
 */
export interface ResultSink {
  write(record: OutputRecord): Promise<void>;
}

/**
 * Writes each record as one line of JSON, waiting for the stream to drain
 * when its buffer is full.
 */
export class JsonLinesSink implements ResultSink {
  constructor(private readonly output: Writable) {}

  async write(record: OutputRecord): Promise<void> {
    if (!this.output.write(`${JSON.stringify(record)}\n`)) {
      await once(this.output, 'drain');
    }
  }
}

/**
 * Keeps every record in memory.
 */
export class CollectingSink implements ResultSink {
  readonly records: OutputRecord[] = [];

  async write(record: OutputRecord): Promise<void> {
    this.records.push(record);
  }
}
