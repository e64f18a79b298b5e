import type { Page } from '../model/Page.js';

/**
 * Port for paging through the identifier index.
 *
 * `pageIndex` is 1-based and `pageSize` bounds the number of identifiers returned.
 * Implementations throw `FetchIdBatchError` on any failure; callers discard the
 * whole page in that case.
 */
export interface IdentifierPager {
  fetchPage(pageIndex: number, pageSize: number): Promise<Page>;
}
