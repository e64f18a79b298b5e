import type { OutputRecord } from '../model/Outcome.js';

/**
 * Port for durable, append-only output.
 *
 * `flush()` writes one group of records in the order given and must release the
 * destination on every exit path. The coordinator never has two flushes in flight.
 */
export interface ResultSink {
  flush(records: readonly OutputRecord[]): Promise<void>;
}
