/**
 * POI classification: display names and GPX symbols from tags.
 */

export {
  classify,
  resolveName,
  resolveSymbol,
  matchesSymbolRule,
  type Classification,
  type ClassificationConfig,
  type SymbolRule,
} from "./classifier.js";
export { ClassificationStats, type ClassificationSummary } from "./stats.js";
