/**
 * Overpass API module.
 *
 * Compiles rules into Overpass QL around the route, fetches responses
 * through a content-addressed disk cache and decodes them.
 */

export {
  compileQuery,
  validateRule,
  renderCondition,
  renderAround,
  fetchQuery,
  DEFAULT_ENDPOINT,
  DEFAULT_RADIUS_METERS,
  type Logger,
  type OverpassOptions,
} from "./query.js";
export { decodeResponse } from "./parser.js";
export {
  defaultCacheDir,
  queryCacheKey,
  readCachedResponse,
  writeCachedResponse,
  getCachePath,
} from "./cache.js";
