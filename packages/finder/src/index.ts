/**
 * @route-pois/finder
 *
 * Finds points of interest along a recorded route.
 *
 * Pipeline:
 * 1. Read the route from GPX and split it into chunks
 * 2. Compile each rule into an Overpass query around each chunk
 * 3. Fetch through the content-addressed disk cache and decode
 * 4. Reduce ways to centroids, name and symbolize every element
 * 5. Sort and write the POIs as GPX waypoints (or JSON)
 */

// Errors
export {
  PoiFinderError,
  RouteInputError,
  ConditionValidationError,
  OverpassRequestError,
  ResponseDecodeError,
  ResponseConsistencyError,
  ClassificationError,
  ConfigError,
} from "./errors.js";

// Route input
export {
  segmentRoute,
  DEFAULT_CHUNK_COUNT,
  readGpxRoute,
  readGpxRouteFile,
} from "./route/index.js";

// Overpass API
export {
  compileQuery,
  validateRule,
  renderCondition,
  renderAround,
  fetchQuery,
  decodeResponse,
  queryCacheKey,
  readCachedResponse,
  writeCachedResponse,
  getCachePath,
  defaultCacheDir,
  DEFAULT_ENDPOINT,
  DEFAULT_RADIUS_METERS,
  type Logger,
  type OverpassOptions,
} from "./overpass/index.js";

// Resolution
export {
  resolveElements,
  wayCentroid,
  expectNodesOnly,
  type ResolvedElements,
} from "./resolve/index.js";

// Classification
export {
  classify,
  resolveName,
  resolveSymbol,
  matchesSymbolRule,
  ClassificationStats,
  type Classification,
  type ClassificationConfig,
  type ClassificationSummary,
  type SymbolRule,
} from "./classify/index.js";

// POIs
export { createPoi, describeTags, comparePois, sortPois } from "./poi/index.js";

// Output
export {
  formatCoordinate,
  writeGpxWaypoints,
  writePoisJson,
  writePoisFile,
  GPX_NAMESPACE,
} from "./output/index.js";

// Configuration
export {
  findConfigsRoot,
  toCondition,
  parseRuleSet,
  loadRuleSet,
  withDefaultRadius,
  parseClassificationConfig,
  loadClassificationConfig,
} from "./config/index.js";

// Pipeline
export {
  findPois,
  collectPois,
  ELEMENT_KINDS,
  type FindPoisOptions,
  type FindPoisResult,
} from "./pipeline/index.js";
