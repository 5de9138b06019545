import type { CountTable, Token } from "./types";

export function formatVocabulary(vocabulary: readonly Token[]): string[] {
  return [...vocabulary];
}

// Entries follow the table's insertion order.
export function formatCounts(ngramCounts: CountTable): string[] {
  return [...ngramCounts.entries()].map(([ngram, count]) => `${ngram}\t${count}`);
}

export function formatCompletion(tokens: readonly Token[]): string {
  return tokens.map((t) => ` ${t}`).join("") + "\n";
}
