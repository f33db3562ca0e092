/**
 * Element resolution.
 *
 * A way query answers with the matching ways plus every node they
 * reference (the `(._;>;)` recursion). Each way is reduced to a single
 * point, the mean of its node coordinates, so it can become one waypoint.
 */

import type {
  RawElement,
  RawNode,
  RawWay,
  WayCentroid,
} from "@route-pois/types";
import { ResponseConsistencyError } from "../errors.js";

/** Result of resolving a response batch */
export interface ResolvedElements {
  /** Every node in the batch, by ascending id */
  points: RawNode[];
  /** One centroid per way, by ascending id */
  wayCentroids: WayCentroid[];
}

/**
 * Compute a way's centroid as the unweighted mean of its nodes.
 *
 * @param way - The way to reduce
 * @param nodes - Node lookup for the same response batch
 * @throws ResponseConsistencyError if the way has no nodes or references
 * a node missing from the batch
 */
export function wayCentroid(way: RawWay, nodes: ReadonlyMap<number, RawNode>): WayCentroid {
  if (way.nodes.length === 0) {
    throw new ResponseConsistencyError(`no nodes for way ${way.id}`);
  }

  let latSum = 0;
  let lonSum = 0;
  for (const nodeId of way.nodes) {
    const node = nodes.get(nodeId);
    if (!node) {
      throw new ResponseConsistencyError(
        `node ${nodeId} referenced by way ${way.id} not found`
      );
    }
    latSum += node.lat;
    lonSum += node.lon;
  }

  return {
    id: way.id,
    centre: {
      lat: latSum / way.nodes.length,
      lon: lonSum / way.nodes.length,
    },
    tags: way.tags,
  };
}

/**
 * Partition a response batch by kind and reduce every way to its centroid.
 */
export function resolveElements(elements: readonly RawElement[]): ResolvedElements {
  const nodes = new Map<number, RawNode>();
  const ways = new Map<number, RawWay>();
  for (const element of elements) {
    if (element.type === "node") {
      nodes.set(element.id, element);
    } else {
      ways.set(element.id, element);
    }
  }

  const wayCentroids = [...ways.values()]
    .map((way) => wayCentroid(way, nodes))
    .sort((a, b) => a.id - b.id);
  const points = [...nodes.values()].sort((a, b) => a.id - b.id);

  return { points, wayCentroids };
}

/**
 * Check a node query's response holds nothing but nodes.
 *
 * @returns The nodes, by ascending id
 */
export function expectNodesOnly(elements: readonly RawElement[]): RawNode[] {
  const nodes: RawNode[] = [];
  for (const element of elements) {
    if (element.type !== "node") {
      throw new ResponseConsistencyError(
        `node query response returned non-node element: ${element.type} ${element.id}`
      );
    }
    nodes.push(element);
  }
  return nodes.sort((a, b) => a.id - b.id);
}
