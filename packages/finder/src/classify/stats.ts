import type { Classification } from "./classifier.js";

/** Plain snapshot of a ClassificationStats, keys sorted */
export interface ClassificationSummary {
  classified: number;
  /** Elements no symbol rule matched */
  withoutSymbol: number;
  bySymbol: Record<string, number>;
  byNameKey: Record<string, number>;
}

function increment(counts: Map<string, number>, key: string): void {
  counts.set(key, (counts.get(key) ?? 0) + 1);
}

function sortedRecord(counts: Map<string, number>): Record<string, number> {
  const record: Record<string, number> = {};
  for (const key of [...counts.keys()].sort()) {
    record[key] = counts.get(key) ?? 0;
  }
  return record;
}

/**
 * Running counts of classification outcomes over a run.
 *
 * Created by the caller and passed down explicitly; one instance per run.
 */
export class ClassificationStats {
  private classified = 0;
  private withoutSymbol = 0;
  private readonly bySymbol = new Map<string, number>();
  private readonly byNameKey = new Map<string, number>();

  record(result: Classification): void {
    this.classified++;
    if (result.symbol === "") {
      this.withoutSymbol++;
    } else {
      increment(this.bySymbol, result.symbol);
    }
    increment(this.byNameKey, result.nameKey);
  }

  summary(): ClassificationSummary {
    return {
      classified: this.classified,
      withoutSymbol: this.withoutSymbol,
      bySymbol: sortedRecord(this.bySymbol),
      byNameKey: sortedRecord(this.byNameKey),
    };
  }
}
