/**
 * Route input: reading GPX tracks and splitting them into query chunks.
 */

export { segmentRoute, DEFAULT_CHUNK_COUNT } from "./segmenter.js";
export { readGpxRoute, readGpxRouteFile } from "./gpx.js";
