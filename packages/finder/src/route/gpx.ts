/**
 * GPX route reader.
 *
 * A route is the single segment of the single track in a GPX file,
 * which is what GPS recorders and route planners export.
 */

import { readFileSync } from "node:fs";
import { XMLParser, XMLValidator } from "fast-xml-parser";
import { z } from "zod";
import type { Coordinate } from "@route-pois/types";
import { RouteInputError } from "../errors.js";

const ARRAY_ELEMENTS = new Set(["trk", "trkseg", "trkpt"]);

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
  isArray: (name: string) => ARRAY_ELEMENTS.has(name),
});

// Empty elements (`<trkseg/>`) come back from the parser as ""
const element = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess((v) => (v === "" ? {} : v), schema);

const coordinateText = z.string().trim().min(1);

const trackPointSchema = element(
  z.object({
    "@_lat": coordinateText,
    "@_lon": coordinateText,
  })
);

const gpxSchema = z.object({
  gpx: element(
    z.object({
      trk: z
        .array(
          element(
            z.object({
              trkseg: z
                .array(
                  element(
                    z.object({ trkpt: z.array(trackPointSchema).default([]) })
                  )
                )
                .default([]),
            })
          )
        )
        .default([]),
    })
  ),
});

/**
 * Parse the route out of a GPX document.
 *
 * @param xml - GPX document text
 * @returns Track points in recorded order
 */
export function readGpxRoute(xml: string): Coordinate[] {
  const valid = XMLValidator.validate(xml);
  if (valid !== true) {
    throw new RouteInputError(
      `parsing gpx file: ${valid.err.msg} (line ${valid.err.line})`
    );
  }

  const parsed = gpxSchema.safeParse(parser.parse(xml));
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? issue.path.join(".") : "document";
    throw new RouteInputError(`parsing gpx file: invalid ${where}`);
  }

  const tracks = parsed.data.gpx.trk;
  if (tracks.length !== 1) {
    throw new RouteInputError(
      `expected gpx file to contain exactly one track but found ${tracks.length}`
    );
  }
  const segments = tracks[0]!.trkseg;
  if (segments.length !== 1) {
    throw new RouteInputError(
      `expected gpx track to contain exactly one segment but found ${segments.length}`
    );
  }

  return segments[0]!.trkpt.map((pt, i) => {
    const lat = Number(pt["@_lat"]);
    const lon = Number(pt["@_lon"]);
    if (!Number.isFinite(lat) || !Number.isFinite(lon)) {
      throw new RouteInputError(
        `track point ${i} has invalid coordinates (${pt["@_lat"]}, ${pt["@_lon"]})`
      );
    }
    return { lat, lon };
  });
}

/** Read and parse a GPX route file */
export function readGpxRouteFile(path: string): Coordinate[] {
  let xml: string;
  try {
    xml = readFileSync(path, "utf-8");
  } catch (err) {
    throw new RouteInputError(`opening gpx file ${path}`, { cause: err });
  }
  return readGpxRoute(xml);
}
