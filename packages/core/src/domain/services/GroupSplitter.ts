/**
 * Domain service that partitions a page into concurrency-bounded groups.
 *
 * Pure logic, no I/O. Every group holds `width` identifiers except possibly the
 * last, which holds the remainder.
 */
export class GroupSplitter {
  constructor(private readonly width: number) {
    if (!Number.isInteger(width) || width < 1) {
      throw new Error('Group width must be a positive integer');
    }
  }

  *split(identifiers: readonly string[]): Iterable<readonly string[]> {
    for (let start = 0; start < identifiers.length; start += this.width) {
      yield identifiers.slice(start, start + this.width);
    }
  }
}
