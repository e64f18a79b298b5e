/**
 * A point as returned by a point provider.
 *
 * Values are kept as the literal text the provider found (no parsing, no
 * reprojection) and are forwarded as-is to the polygon matcher.
 */
export interface Coordinates {
  readonly longitude: string;
  readonly latitude: string;
}
