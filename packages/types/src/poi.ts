/**
 * Points of interest - the output of the finder.
 */

import type { Coordinate } from "./geo.js";
import type { Tags } from "./elements.js";

/** A named waypoint near the route. Field names follow GPX. */
export interface Poi {
  readonly name: string;
  readonly lat: number;
  readonly lon: number;
  /** The element's full tag map, serialized as JSON */
  readonly description: string;
  /** GPX symbol label, empty when no symbol rule matched */
  readonly symbol: string;
}

/** A way reduced to the mean of its node coordinates */
export interface WayCentroid {
  id: number;
  centre: Coordinate;
  /** The way's own tags, not its nodes' */
  tags: Tags;
}
