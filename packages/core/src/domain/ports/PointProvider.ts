import type { Coordinates } from '../model/Coordinates.js';

/** Port for looking up the point of a record. Throws `FetchPointError` on failure. */
export interface PointProvider {
  getPoint(identifier: string): Promise<Coordinates>;
}
