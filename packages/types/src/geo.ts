/**
 * Geographic utility types.
 */

/** A WGS84 position in degrees */
export interface Coordinate {
  readonly lat: number;
  readonly lon: number;
}

/**
 * A contiguous, ordered slice of the route.
 *
 * Order matters: it defines the polyline the `around` filter follows.
 */
export type RouteChunk = readonly Coordinate[];
