import type { Token } from "./types";

export function joinTokens(tokens: readonly Token[]): string {
  return tokens.join(" ");
}

export function splitTokens(text: string): Token[] {
  return text.split(" ");
}

// Tokens of a corpus line. A trailing run of empty fields (from trailing
// spaces) is dropped; an empty line yields no tokens.
export function lineTokens(line: string): Token[] {
  const tokens = splitTokens(line);
  let end = tokens.length;
  while (end > 0 && tokens[end - 1] === "") end--;
  return tokens.slice(0, end);
}

export function historyOf(ngram: string): string {
  const cut = ngram.lastIndexOf(" ");
  return cut < 0 ? "" : ngram.slice(0, cut);
}

export function tail(tokens: readonly Token[], size: number): Token[] {
  if (size <= 0) return [];
  if (tokens.length <= size) return [...tokens];
  return tokens.slice(tokens.length - size);
}
