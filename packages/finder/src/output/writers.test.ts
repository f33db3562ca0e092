import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, readFileSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { XMLParser } from "fast-xml-parser";
import { z } from "zod";
import type { Poi } from "@route-pois/types";
import {
  formatCoordinate,
  writeGpxWaypoints,
  writePoisJson,
  writePoisFile,
  GPX_NAMESPACE,
} from "./writers.js";

const pois: Poi[] = [
  {
    name: "Joe's",
    lat: 39.7392,
    lon: -104.9903,
    description: '{"amenity":"cafe","name":"Joe\'s"}',
    symbol: "Restaurant",
  },
  { name: "spring", lat: 40.1, lon: -105.2, description: '{"natural":"spring"}', symbol: "" },
];

const gpxSchema = z.object({
  gpx: z.object({
    "@_version": z.string(),
    "@_xmlns": z.string(),
    wpt: z.array(
      z.object({
        "@_lat": z.string(),
        "@_lon": z.string(),
        name: z.string(),
        desc: z.string(),
        sym: z.string().optional(),
      })
    ),
  }),
});

function readBack(xml: string) {
  const parser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: "@_",
    parseTagValue: false,
    isArray: (name: string) => name === "wpt",
  });
  return gpxSchema.parse(parser.parse(xml)).gpx;
}

describe("writeGpxWaypoints", () => {
  it("writes a GPX 1.1 document", () => {
    const gpx = readBack(writeGpxWaypoints(pois));
    expect(gpx["@_version"]).toBe("1.1");
    expect(gpx["@_xmlns"]).toBe(GPX_NAMESPACE);
  });

  it("writes one waypoint per POI, in order", () => {
    const [first, second] = readBack(writeGpxWaypoints(pois)).wpt;
    expect(first).toEqual({
      "@_lat": "39.7392",
      "@_lon": "-104.9903",
      name: "Joe's",
      desc: '{"amenity":"cafe","name":"Joe\'s"}',
      sym: "Restaurant",
    });
    expect(second?.name).toBe("spring");
  });

  it("leaves out empty symbols", () => {
    const [, second] = readBack(writeGpxWaypoints(pois)).wpt;
    expect(second?.sym).toBeUndefined();
  });
});

describe("formatCoordinate", () => {
  it("keeps ordinary coordinates as they are", () => {
    expect(formatCoordinate(39.7392)).toBe("39.7392");
    expect(formatCoordinate(-105)).toBe("-105");
    expect(formatCoordinate(0)).toBe("0");
  });

  it("never uses exponent notation", () => {
    expect(formatCoordinate(1e-7)).toBe("0.0000001");
    expect(formatCoordinate(-2.5e-7)).toBe("-0.00000025");
  });

  it("writes tiny coordinates as plain decimals in GPX", () => {
    const tiny: Poi = { name: "buoy", lat: 1e-7, lon: -2.5e-7, description: "{}", symbol: "" };
    const [wpt] = readBack(writeGpxWaypoints([tiny])).wpt;
    expect(wpt?.["@_lat"]).toBe("0.0000001");
    expect(wpt?.["@_lon"]).toBe("-0.00000025");
  });
});

describe("writePoisJson", () => {
  it("writes an indented array with GPX field names", () => {
    const json = writePoisJson([pois[1]!]);
    expect(json).toBe(
      '[\n  {\n    "name": "spring",\n    "lat": 40.1,\n    "lon": -105.2,\n    "desc": "{\\"natural\\":\\"spring\\"}",\n    "sym": ""\n  }\n]\n'
    );
  });

  it("writes an empty array for no POIs", () => {
    expect(writePoisJson([])).toBe("[]\n");
  });
});

describe("writePoisFile", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "poi-output-test-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("writes GPX for .gpx paths", () => {
    const path = join(dir, "out", "pois.gpx");
    writePoisFile(path, pois);
    expect(readFileSync(path, "utf-8")).toBe(writeGpxWaypoints(pois));
  });

  it("writes JSON otherwise", () => {
    const path = join(dir, "pois.json");
    writePoisFile(path, pois);
    expect(readFileSync(path, "utf-8")).toBe(writePoisJson(pois));
  });
});
