/**
 * POI construction and output ordering.
 */

import type { Coordinate, Poi, Tags } from "@route-pois/types";
import { classify, type ClassificationConfig } from "../classify/classifier.js";
import type { ClassificationStats } from "../classify/stats.js";

function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Serialize a tag map with its keys sorted, so equal tags always give
 * the same description.
 */
export function describeTags(tags: Tags): string {
  const entries = Object.entries(tags).sort(([a], [b]) => compareStrings(a, b));
  return JSON.stringify(Object.fromEntries(entries));
}

/**
 * Build a POI from an element's tags and position.
 *
 * @throws ClassificationError if the tags give no name
 */
export function createPoi(
  tags: Tags,
  position: Coordinate,
  config: ClassificationConfig,
  stats?: ClassificationStats
): Poi {
  const { name, symbol } = classify(tags, config, stats);
  return Object.freeze({
    name,
    lat: position.lat,
    lon: position.lon,
    description: describeTags(tags),
    symbol,
  });
}

/**
 * Total order over POIs: name, description, symbol, then lat and lon.
 */
export function comparePois(a: Poi, b: Poi): number {
  return (
    compareStrings(a.name, b.name) ||
    compareStrings(a.description, b.description) ||
    compareStrings(a.symbol, b.symbol) ||
    a.lat - b.lat ||
    a.lon - b.lon
  );
}

/** Sorted copy of a POI list; the input is left as is */
export function sortPois(pois: readonly Poi[]): Poi[] {
  return [...pois].sort(comparePois);
}
