import type { CountResult, CountTable, Token } from "./types";
import { assertPositiveInteger } from "./errors";
import { joinTokens, lineTokens } from "./sequence";

function inc(map: CountTable, key: string, delta = 1): void {
  map.set(key, (map.get(key) ?? 0) + delta);
}

/**
 * Yields every window of a line that gets counted: for each start position
 * except the last, windows of 1..maxOrder tokens that stay inside the line,
 * then the final token on its own. Lines shorter than two tokens yield nothing.
 */
export function* lineWindows(tokens: readonly Token[], maxOrder: number): Generator<Token[]> {
  if (tokens.length < 2) return;
  for (let i = 0; i < tokens.length - 1; i++) {
    const limit = Math.min(maxOrder, tokens.length - i);
    for (let n = 1; n <= limit; n++) {
      yield tokens.slice(i, i + n);
    }
  }
  yield tokens.slice(-1);
}

export function extractCounts(lines: Iterable<string>, maxOrder: number): CountResult {
  assertPositiveInteger("maxOrder", maxOrder);

  const ngramCounts: CountTable = new Map();
  const historyCounts: CountTable = new Map();
  const vocabulary: Token[] = [];
  const seen = new Set<Token>();

  for (const line of lines) {
    for (const window of lineWindows(lineTokens(line), maxOrder)) {
      const key = joinTokens(window);
      inc(historyCounts, key);
      if (window.length > 1) {
        inc(ngramCounts, key);
      } else if (!seen.has(key)) {
        seen.add(key);
        vocabulary.push(key);
      }
    }
  }

  return { ngramCounts, historyCounts, vocabulary };
}
