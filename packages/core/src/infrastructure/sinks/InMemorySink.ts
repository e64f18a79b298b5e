import type { OutputRecord } from '../../domain/model/Outcome.js';
import type { ResultSink } from '../../domain/ports/ResultSink.js';

/** Non-persistent sink that keeps every flushed group. Useful in tests and when embedding the engine. */
export class InMemorySink implements ResultSink {
  private readonly groups: OutputRecord[][] = [];

  flush(records: readonly OutputRecord[]): Promise<void> {
    this.groups.push([...records]);
    return Promise.resolve();
  }

  /** Flushed groups in flush order. */
  get flushes(): readonly (readonly OutputRecord[])[] {
    return this.groups;
  }

  /** All flushed records in flush order. */
  records(): readonly OutputRecord[] {
    return this.groups.flat();
  }
}
