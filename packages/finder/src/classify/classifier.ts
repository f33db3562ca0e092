/**
 * Derive a waypoint's display name and GPX symbol from OSM tags.
 *
 * Both are driven by ordered tables (see configs/classification.json):
 * the order of the tables is the policy, so lookups always take the first
 * entry that applies.
 */

import type { Tags } from "@route-pois/types";
import { ClassificationError } from "../errors.js";
import type { ClassificationStats } from "./stats.js";

/** Map a set of exact tag values to a GPX symbol */
export interface SymbolRule {
  /** Every key must carry exactly this value */
  match: Readonly<Record<string, string>>;
  symbol: string;
}

export interface ClassificationConfig {
  /** Tag keys to take the name from, highest priority first */
  nameKeys: readonly string[];
  /** Symbol rules, first full match wins */
  symbols: readonly SymbolRule[];
}

export interface Classification {
  name: string;
  /** Tag key the name was taken from */
  nameKey: string;
  /** GPX symbol, "" when no rule matched */
  symbol: string;
}

/**
 * Resolve the display name: the first key in priority order whose
 * value is a string.
 *
 * @throws ClassificationError if no key gives a name
 */
export function resolveName(
  tags: Tags,
  nameKeys: readonly string[]
): { name: string; nameKey: string } {
  for (const key of nameKeys) {
    const value = tags[key];
    if (typeof value === "string") {
      return { name: value, nameKey: key };
    }
  }
  throw new ClassificationError("no suitable tag for name");
}

/**
 * Check every pair of a symbol rule against the tags.
 */
export function matchesSymbolRule(tags: Tags, rule: SymbolRule): boolean {
  return Object.entries(rule.match).every(([key, value]) => tags[key] === value);
}

/**
 * Resolve the GPX symbol. No match is not an error.
 */
export function resolveSymbol(tags: Tags, rules: readonly SymbolRule[]): string {
  return rules.find((rule) => matchesSymbolRule(tags, rule))?.symbol ?? "";
}

/**
 * Classify an element's tags, recording the outcome in `stats` if given.
 */
export function classify(
  tags: Tags,
  config: ClassificationConfig,
  stats?: ClassificationStats
): Classification {
  const { name, nameKey } = resolveName(tags, config.nameKeys);
  const result = { name, nameKey, symbol: resolveSymbol(tags, config.symbols) };
  stats?.record(result);
  return result;
}
