/**
 * Waypoint output: GPX 1.1 for GPS devices and route planners, or a plain
 * JSON array for scripting.
 */

import { mkdirSync, writeFileSync } from "node:fs";
import { dirname, extname } from "node:path";
import { XMLBuilder } from "fast-xml-parser";
import type { Poi } from "@route-pois/types";

export const GPX_NAMESPACE = "http://www.topografix.com/GPX/1/1";

/** Plain decimal text for a coordinate; GPX takes no exponent notation */
export function formatCoordinate(value: number): string {
  const text = String(value);
  if (!text.includes("e")) return text;
  return value.toFixed(20).replace(/\.?0+$/, "");
}

const builder = new XMLBuilder({
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
  format: true,
});

/**
 * Render POIs as GPX waypoints (`name`, `desc`, and `sym` when set).
 */
export function writeGpxWaypoints(
  pois: readonly Poi[],
  creator = "route-pois"
): string {
  const doc = {
    "?xml": { "@_version": "1.0", "@_encoding": "UTF-8" },
    gpx: {
      "@_version": "1.1",
      "@_creator": creator,
      "@_xmlns": GPX_NAMESPACE,
      wpt: pois.map((poi) => ({
        "@_lat": formatCoordinate(poi.lat),
        "@_lon": formatCoordinate(poi.lon),
        name: poi.name,
        desc: poi.description,
        ...(poi.symbol !== "" ? { sym: poi.symbol } : {}),
      })),
    },
  };
  const xml: string = builder.build(doc);
  return xml;
}

/**
 * Render POIs as an indented JSON array using GPX field names.
 */
export function writePoisJson(pois: readonly Poi[]): string {
  const records = pois.map((poi) => ({
    name: poi.name,
    lat: poi.lat,
    lon: poi.lon,
    desc: poi.description,
    sym: poi.symbol,
  }));
  return JSON.stringify(records, null, 2) + "\n";
}

/**
 * Write POIs to a file; `.gpx` paths get GPX, anything else JSON.
 */
export function writePoisFile(path: string, pois: readonly Poi[]): void {
  const content =
    extname(path).toLowerCase() === ".gpx"
      ? writeGpxWaypoints(pois)
      : writePoisJson(pois);
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, content);
}
