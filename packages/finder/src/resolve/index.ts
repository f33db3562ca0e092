/**
 * Response resolution: ways to centroids, with integrity checks.
 */

export {
  resolveElements,
  wayCentroid,
  expectNodesOnly,
  type ResolvedElements,
} from "./aggregator.js";
