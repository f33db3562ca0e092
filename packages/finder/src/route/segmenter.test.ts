import { describe, it, expect } from "vitest";
import type { Coordinate } from "@route-pois/types";
import { segmentRoute, DEFAULT_CHUNK_COUNT } from "./segmenter.js";
import { RouteInputError } from "../errors.js";

function line(n: number): Coordinate[] {
  return Array.from({ length: n }, (_, i) => ({ lat: i, lon: -i }));
}

describe("segmentRoute", () => {
  it("uses ceil(N / K) points per chunk with a shorter last chunk", () => {
    const chunks = segmentRoute(line(10), 3);
    expect(chunks.map((c) => c.length)).toEqual([4, 4, 2]);
  });

  it("splits evenly when K divides N", () => {
    const chunks = segmentRoute(line(20), 10);
    expect(chunks).toHaveLength(10);
    expect(chunks.every((c) => c.length === 2)).toBe(true);
  });

  it("gives one-point chunks when the route is shorter than the chunk count", () => {
    const points = line(3);
    expect(segmentRoute(points, 10)).toEqual(points.map((p) => [p]));
  });

  it("defaults to 10 chunks", () => {
    expect(DEFAULT_CHUNK_COUNT).toBe(10);
    expect(segmentRoute(line(100))).toHaveLength(10);
  });

  it("concatenates back to the original route for any N and K", () => {
    for (let n = 1; n <= 25; n++) {
      const points = line(n);
      for (let k = 1; k <= 12; k++) {
        const chunks = segmentRoute(points, k);
        expect(chunks.every((c) => c.length > 0)).toBe(true);
        expect(chunks.flat()).toEqual(points);
      }
    }
  });

  it("throws on an empty route", () => {
    expect(() => segmentRoute([], 3)).toThrow(RouteInputError);
    expect(() => segmentRoute([], 3)).toThrow("no route points provided");
  });

  it("throws on a non-positive chunk count", () => {
    expect(() => segmentRoute(line(5), 0)).toThrow(RouteInputError);
    expect(() => segmentRoute(line(5), 2.5)).toThrow(RouteInputError);
  });
});
