import type { CountTable, ProbabilityTable } from "./types";
import { ModelInvariantError } from "./errors";
import { historyOf } from "./sequence";

/**
 * Maximum-likelihood P(w | h) = count(h w) / count(h) for every counted n-gram.
 * Only strictly positive probabilities are stored.
 */
export function estimateProbabilities(ngramCounts: CountTable, historyCounts: CountTable): ProbabilityTable {
  const table = new Map<string, number>();
  for (const [ngram, count] of ngramCounts) {
    const history = historyOf(ngram);
    const total = historyCounts.get(history);
    if (total === undefined || total <= 0) {
      throw new ModelInvariantError(`n-gram "${ngram}" has no count for its history "${history}"`);
    }
    const probability = count / total;
    if (probability > 0) table.set(ngram, probability);
  }
  return table;
}
