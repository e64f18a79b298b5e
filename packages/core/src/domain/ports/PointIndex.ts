import type { IdentifierPager } from './IdentifierPager.js';
import type { PointProvider } from './PointProvider.js';

/** An index that both lists identifiers and resolves their points. */
export interface PointIndex extends IdentifierPager, PointProvider {
  /** Release connections held by the index. */
  close?(): Promise<void>;
}
