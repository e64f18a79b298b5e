/** Real-time progress counters for an in-flight join. */
export interface JoinProgress {
  /** Page index currently (or last) requested from the pager. */
  readonly currentPage: number;
  readonly pagesFetched: number;
  readonly pagesFailed: number;
  /** Records handed to resolution tasks so far. */
  readonly dispatchedRecords: number;
  /** Records resolved to a polygon. */
  readonly resolvedRecords: number;
  /** Records whose point matched no polygon. Counted as successes. */
  readonly unmatchedRecords: number;
  readonly pointFailures: number;
  readonly polygonFailures: number;
  /** Sequence number the next dispatched identifier will receive. */
  readonly nextSequence: number;
  readonly elapsedMs: number;
}

/** Final summary emitted with the `join:completed` event and returned by `start()`. */
export interface JoinSummary {
  readonly pagesFetched: number;
  readonly pagesFailed: number;
  readonly total: number;
  readonly resolved: number;
  readonly unmatched: number;
  readonly pointFailures: number;
  readonly polygonFailures: number;
  /** Last sequence number written, or `null` when nothing was dispatched. */
  readonly lastSequence: number | null;
  readonly elapsedMs: number;
}
