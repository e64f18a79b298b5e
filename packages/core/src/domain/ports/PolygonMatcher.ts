import type { Coordinates } from '../model/Coordinates.js';

/**
 * Port for the point-in-polygon lookup.
 *
 * `predicate` names a spatial relation (`Contains`, `Intersects`, ...) and is passed
 * to the service verbatim. Resolves to the identifier of the matching polygon, or
 * `null` when no polygon matched. Throws `PIPError` when the response cannot be read.
 */
export interface PolygonMatcher {
  matchPolygon(point: Coordinates, predicate: string): Promise<string | null>;
}
