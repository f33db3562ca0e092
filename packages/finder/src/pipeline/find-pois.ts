/**
 * Route -> POI pipeline.
 *
 * Pipeline:
 * 1. Split the route into chunks
 * 2. For every chunk x rule x element kind, compile and fetch a query
 *    (through the disk cache) and decode the response
 * 3. Nodes become POIs where they are; ways become POIs at their centroid
 * 4. Sort the lot into a stable output order
 *
 * Queries run strictly one after another. The first failure aborts the run.
 */

import type {
  Coordinate,
  ElementKind,
  Poi,
  RawElement,
  Rule,
} from "@route-pois/types";
import type { ClassificationConfig } from "../classify/classifier.js";
import { ClassificationStats, type ClassificationSummary } from "../classify/stats.js";
import { ClassificationError, ConditionValidationError } from "../errors.js";
import {
  compileQuery,
  decodeResponse,
  fetchQuery,
  validateRule,
  type OverpassOptions,
} from "../overpass/index.js";
import { createPoi, sortPois } from "../poi/poi.js";
import { expectNodesOnly, resolveElements } from "../resolve/aggregator.js";
import { DEFAULT_CHUNK_COUNT, segmentRoute } from "../route/segmenter.js";

/** Element kinds queried for every rule, in order */
export const ELEMENT_KINDS: readonly ElementKind[] = ["node", "way"];

/** Options for the full pipeline */
export interface FindPoisOptions extends OverpassOptions {
  /** What to search for */
  rules: readonly Rule[];
  /** Naming and symbol tables */
  classification: ClassificationConfig;
  /** Number of route chunks (default: 10) */
  chunkCount?: number;
  /** Accumulator for classification counts (default: a fresh one) */
  stats?: ClassificationStats;
}

/** Result of a pipeline run */
export interface FindPoisResult {
  /** POIs in output order */
  pois: Poi[];
  stats: ClassificationSummary;
  /** Number of queries issued (cache hits included) */
  queries: number;
}

function withElementContext<T>(kind: ElementKind, id: number, build: () => T): T {
  try {
    return build();
  } catch (err) {
    if (err instanceof ClassificationError) {
      throw new ClassificationError(`${kind} ${id}: ${err.message}`, { cause: err });
    }
    throw err;
  }
}

/**
 * Turn one decoded response into POIs.
 *
 * A node query yields one POI per node; a way query yields one POI per way,
 * and the nodes that came back with the ways only serve to place them.
 */
export function collectPois(
  kind: ElementKind,
  elements: readonly RawElement[],
  config: ClassificationConfig,
  stats?: ClassificationStats
): Poi[] {
  if (kind === "node") {
    return expectNodesOnly(elements).map((node) =>
      withElementContext("node", node.id, () => createPoi(node.tags, node, config, stats))
    );
  }
  return resolveElements(elements).wayCentroids.map((way) =>
    withElementContext("way", way.id, () => createPoi(way.tags, way.centre, config, stats))
  );
}

/**
 * Find POIs along a route.
 *
 * @param route - Route coordinates, in travel order
 * @param options - Rules, classification tables, chunking and Overpass options
 */
export async function findPois(
  route: readonly Coordinate[],
  options: FindPoisOptions
): Promise<FindPoisResult> {
  const logger = options.logger ?? console;
  const stats = options.stats ?? new ClassificationStats();

  if (options.rules.length === 0) {
    throw new ConditionValidationError("no rules to search for");
  }
  // Fail on a bad rule before any network traffic
  options.rules.forEach(validateRule);

  const chunks = segmentRoute(route, options.chunkCount ?? DEFAULT_CHUNK_COUNT);
  logger.log(
    `[find-pois] points: ${route.length}, chunks: ${chunks.length}, rules: ${options.rules.length}`
  );

  const pois: Poi[] = [];
  let queries = 0;
  for (const [c, chunk] of chunks.entries()) {
    for (const [r, rule] of options.rules.entries()) {
      for (const kind of ELEMENT_KINDS) {
        logger.log(
          `[find-pois] chunk ${c + 1}/${chunks.length}, rule ${rule.name ?? r}, ${kind}s`
        );
        const query = compileQuery(kind, rule, chunk);
        const body = await fetchQuery(query, options);
        queries++;
        pois.push(...collectPois(kind, decodeResponse(body), options.classification, stats));
      }
    }
  }

  const summary = stats.summary();
  logger.log(
    `[find-pois] queries: ${queries}, pois: ${pois.length}, without symbol: ${summary.withoutSymbol}`
  );

  return { pois: sortPois(pois), stats: summary, queries };
}
