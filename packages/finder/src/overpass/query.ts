/**
 * Overpass API query construction and execution.
 *
 * Compiles tag rules into Overpass QL around a route chunk and fetches
 * results with a single form-encoded POST, through the disk cache.
 */

import type {
  Condition,
  ElementKind,
  Rule,
  RouteChunk,
} from "@route-pois/types";
import axios, { type AxiosInstance, type AxiosResponse } from "axios";
import {
  ConditionValidationError,
  OverpassRequestError,
  RouteInputError,
} from "../errors.js";
import {
  defaultCacheDir,
  getCachePath,
  readCachedResponse,
  writeCachedResponse,
} from "./cache.js";

/** Anything with a console-style `log` */
export type Logger = Pick<Console, "log">;

/** Options for Overpass API requests */
export interface OverpassOptions {
  /** Overpass API endpoint URL (for self-hosted instances) */
  endpoint?: string;
  /** User-agent string */
  userAgent?: string;
  /** Bypass cache read (still writes to cache) */
  force?: boolean;
  /** Override the cache directory (default: ~/.route-pois/overpass-cache/) */
  cacheDir?: string;
  /** Disable caching entirely (no read or write) */
  noCache?: boolean;
  /** Where progress lines go (default: console) */
  logger?: Logger;
  /** HTTP client to post with (default: the shared axios instance) */
  client?: AxiosInstance;
}

export const DEFAULT_ENDPOINT = "https://overpass-api.de/api/interpreter";

/** Search radius used when a rule does not set one */
export const DEFAULT_RADIUS_METERS = 80;

const REGEX_SPECIAL = /[.*+?^${}()|[\]\\]/g;

/** Quote a string literal for Overpass QL */
function qlString(value: string): string {
  return `"${value.replace(/\\/g, "\\\\").replace(/"/g, '\\"')}"`;
}

function describeCondition(condition: Condition, index: number): string {
  return `condition ${index} (${condition.kind} "${condition.key}")`;
}

/**
 * Check a rule can be compiled.
 *
 * @throws ConditionValidationError naming the offending condition
 */
export function validateRule(rule: Rule): void {
  if (rule.radius !== undefined && !(Number.isFinite(rule.radius) && rule.radius > 0)) {
    throw new ConditionValidationError(
      `rule radius must be a positive number of meters, got ${rule.radius}`
    );
  }
  if (rule.conditions.length === 0) {
    throw new ConditionValidationError("rule has no conditions");
  }

  rule.conditions.forEach((condition, i) => {
    if (typeof condition.key !== "string" || condition.key === "") {
      throw new ConditionValidationError(`condition ${i} has an empty tag key`);
    }
    switch (condition.kind) {
      case "match":
      case "exclude":
        if (condition.values.length === 0) {
          throw new ConditionValidationError(
            `${describeCondition(condition, i)} lists no values`
          );
        }
        break;
      case "exists":
        if (typeof condition.present !== "boolean") {
          throw new ConditionValidationError(
            `${describeCondition(condition, i)} needs a boolean "present"`
          );
        }
        break;
      default:
        throw new ConditionValidationError(
          `condition ${i} has no recognised mode: ${JSON.stringify(condition satisfies never)}`
        );
    }
  });
}

/**
 * Render one condition as Overpass QL tag filters.
 *
 * - match   -> ["k"~"^(a|b)$"]  (values escaped, so only whole literals match)
 * - exclude -> ["k"!="a"]["k"!="b"]  (each must hold on its own)
 * - exists  -> ["k"] or [!"k"]
 */
export function renderCondition(condition: Condition): string {
  const key = qlString(condition.key);
  switch (condition.kind) {
    case "match": {
      const alternation = condition.values
        .map((v) => v.replace(REGEX_SPECIAL, "\\$&"))
        .join("|");
      return `[${key}~${qlString(`^(${alternation})$`)}]`;
    }
    case "exclude":
      return condition.values.map((v) => `[${key}!=${qlString(v)}]`).join("");
    case "exists":
      return condition.present ? `[${key}]` : `[!${key}]`;
  }
}

/**
 * Render the `around` filter for a route chunk.
 *
 * Coordinates use six fixed decimals (about 0.1m) so the text, and with it
 * the cache key, is the same on every run.
 */
export function renderAround(radius: number, chunk: RouteChunk): string {
  if (chunk.length === 0) {
    throw new RouteInputError("no route points provided");
  }
  const coords = chunk
    .map((p) => `${p.lat.toFixed(6)},${p.lon.toFixed(6)}`)
    .join(",");
  return `(around:${radius},${coords})`;
}

/**
 * Compile a rule into an Overpass QL query around a route chunk.
 *
 * The query selects elements of `kind` matching every condition within the
 * rule's radius of the chunk's polyline, then recurses down so ways come
 * back together with their nodes.
 *
 * @param kind - Element kind to select
 * @param rule - Tag conditions and radius
 * @param chunk - Route coordinates, in order
 * @returns Overpass QL query string
 */
export function compileQuery(
  kind: ElementKind,
  rule: Rule,
  chunk: RouteChunk
): string {
  validateRule(rule);
  const filters = rule.conditions.map(renderCondition).join("");
  const around = renderAround(rule.radius ?? DEFAULT_RADIUS_METERS, chunk);

  return `[out:json];${kind}${filters}${around};
(._;>;);
out meta;`;
}

/**
 * Fetch the raw response body for a query, through the disk cache.
 *
 * On a miss the query is posted once; any failure is fatal for the query
 * and is not retried. A successful body is written to the cache before it
 * is returned.
 *
 * @param query - Compiled Overpass QL
 * @param options - API and cache options
 * @returns Verbatim response body
 */
export async function fetchQuery(
  query: string,
  options?: OverpassOptions
): Promise<Buffer> {
  const useCache = !options?.noCache;
  const cacheDir = options?.cacheDir ?? defaultCacheDir();
  const logger = options?.logger ?? console;

  if (useCache && !options?.force) {
    const cached = readCachedResponse(query, cacheDir);
    if (cached) {
      logger.log(`[overpass-cache] hit ${getCachePath(query, cacheDir)}`);
      return cached;
    }
  }

  const endpoint = options?.endpoint ?? DEFAULT_ENDPOINT;
  const headers: Record<string, string> = {
    "Content-Type": "application/x-www-form-urlencoded",
  };
  if (options?.userAgent) {
    headers["User-Agent"] = options.userAgent;
  }

  logger.log(`[overpass] POST ${endpoint}`);
  let res: AxiosResponse<ArrayBuffer>;
  try {
    res = await (options?.client ?? axios).post<ArrayBuffer>(
      endpoint,
      `data=${encodeURIComponent(query)}`,
      {
        headers,
        responseType: "arraybuffer",
        validateStatus: () => true,
      }
    );
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new OverpassRequestError(`posting query: ${reason}`, query, {
      cause: err,
    });
  }

  const body = Buffer.from(res.data);
  if (res.status < 200 || res.status >= 300) {
    const status = [res.status, res.statusText].filter(Boolean).join(" ");
    const detail = body.toString("utf-8").trim();
    throw new OverpassRequestError(
      `posting query: ${status}${detail ? `: ${detail}` : ""}`,
      query
    );
  }

  if (useCache) {
    const path = writeCachedResponse(query, body, cacheDir);
    logger.log(`[overpass-cache] wrote ${path}`);
  }

  return body;
}
