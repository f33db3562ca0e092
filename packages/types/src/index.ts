/**
 * @route-pois/types
 *
 * Shared domain types for the route POI finder.
 *
 * - Geo: coordinates and route chunks
 * - Rules: tag conditions compiled into Overpass queries
 * - Elements: decoded Overpass nodes and ways
 * - POI: the waypoints written out at the end
 */

export * from "./geo.js";
export * from "./rules.js";
export * from "./elements.js";
export * from "./poi.js";
