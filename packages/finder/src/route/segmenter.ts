/**
 * Route segmentation.
 *
 * Overpass rejects (or times out on) `around` filters with very long
 * polylines, so the route is queried in a fixed number of pieces.
 */

import type { Coordinate, RouteChunk } from "@route-pois/types";
import { RouteInputError } from "../errors.js";

/** Number of chunks a route is split into by default */
export const DEFAULT_CHUNK_COUNT = 10;

/**
 * Split a route into contiguous, non-overlapping chunks.
 *
 * Each chunk holds `ceil(N / chunkCount)` points except possibly the last.
 * Routes shorter than `chunkCount` still produce chunks of one point.
 *
 * @param points - Route coordinates, in travel order
 * @param chunkCount - Target number of chunks
 */
export function segmentRoute(
  points: readonly Coordinate[],
  chunkCount: number = DEFAULT_CHUNK_COUNT
): RouteChunk[] {
  if (!Number.isInteger(chunkCount) || chunkCount < 1) {
    throw new RouteInputError(
      `chunk count must be a positive integer, got ${chunkCount}`
    );
  }
  if (points.length === 0) {
    throw new RouteInputError("no route points provided");
  }

  const chunkSize = Math.max(1, Math.ceil(points.length / chunkCount));
  const chunks: RouteChunk[] = [];
  for (let i = 0; i < points.length; i += chunkSize) {
    chunks.push(points.slice(i, i + chunkSize));
  }
  return chunks;
}
