import { z } from 'zod';
import type { Coordinates } from '../../domain/model/Coordinates.js';
import type { Page } from '../../domain/model/Page.js';
import type { PointIndex } from '../../domain/ports/PointIndex.js';
import { FetchIdBatchError, FetchPointError, errorMessage } from '../../domain/errors.js';
import { DEFAULT_TIMEOUT_MS, fetchWithTimeout, hasLinkRelation } from '../http/fetchWithTimeout.js';
import type { TextResponse } from '../http/fetchWithTimeout.js';

export interface LinkedDataRegisterOptions {
  /** Register listing URL, e.g. `http://linked.data.gov.au/dataset/gnaf/address/`. */
  readonly endpoint: string;
  /** Per-request timeout in milliseconds. Default: `30000`. */
  readonly timeoutMs?: number;
}

const JSON_HEADERS = { Accept: 'application/json' } as const;

/** Listing body: each item starts with the URI of the register entry. */
const registerListingSchema = z.object({
  register_items: z.array(z.tuple([z.string()]).rest(z.unknown())),
});

const POINT_LITERAL = /POINT\s*\(\s*(-?\d+(?:\.\d+)?)\s+(-?\d+(?:\.\d+)?)\s*\)/i;

/**
 * Find the first `POINT(x y)` literal in a payload.
 *
 * The literal may be embedded in a larger string (e.g. a WKT value with a CRS
 * prefix inside a JSON document). Values are returned as found.
 */
export function extractPoint(payload: string): Coordinates | null {
  const match = POINT_LITERAL.exec(payload);
  const longitude = match?.[1];
  const latitude = match?.[2];
  if (longitude === undefined || latitude === undefined) return null;
  return { longitude, latitude };
}

/**
 * Index backed by a linked-data register API.
 *
 * Pages with `?page=&per_page=` and continues while the response advertises a
 * `rel="next"` link; there is no up-front count. Identifiers are entry URIs, and
 * an entry's point is read from the `POINT(...)` literal in its JSON view.
 */
export class LinkedDataRegister implements PointIndex {
  private readonly endpoint: URL;
  private readonly timeoutMs: number;

  constructor(options: LinkedDataRegisterOptions) {
    this.endpoint = new URL(options.endpoint);
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  async fetchPage(pageIndex: number, pageSize: number): Promise<Page> {
    const url = new URL(this.endpoint);
    url.searchParams.set('page', String(pageIndex));
    url.searchParams.set('per_page', String(pageSize));

    let response: TextResponse;
    try {
      response = await fetchWithTimeout(url.toString(), JSON_HEADERS, this.timeoutMs);
    } catch (error) {
      throw new FetchIdBatchError(pageIndex, pageSize, errorMessage(error), { cause: error });
    }

    if (!response.ok) {
      throw new FetchIdBatchError(pageIndex, pageSize, `HTTP ${String(response.status)} from ${url.toString()}`);
    }

    let json: unknown;
    try {
      json = JSON.parse(response.body);
    } catch (error) {
      throw new FetchIdBatchError(pageIndex, pageSize, 'response is not JSON', { cause: error });
    }

    const listing = registerListingSchema.safeParse(json);
    if (!listing.success) {
      throw new FetchIdBatchError(pageIndex, pageSize, `unexpected listing shape: ${listing.error.message}`);
    }

    return {
      identifiers: listing.data.register_items.map(([uri]) => uri),
      hasMore: hasLinkRelation(response.headers.get('link'), 'next'),
    };
  }

  async getPoint(identifier: string): Promise<Coordinates> {
    let response: TextResponse;
    try {
      response = await fetchWithTimeout(identifier, JSON_HEADERS, this.timeoutMs);
    } catch (error) {
      throw new FetchPointError(identifier, errorMessage(error), { cause: error });
    }

    if (!response.ok) {
      throw new FetchPointError(identifier, `HTTP ${String(response.status)}`);
    }

    const point = extractPoint(response.body);
    if (!point) {
      throw new FetchPointError(identifier, 'no POINT literal in response');
    }
    return point;
  }
}
