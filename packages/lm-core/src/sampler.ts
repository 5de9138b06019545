import type { CompletionOptions, ProbabilityTable, RandomSource, Token } from "./types";
import { END_TOKEN, FAIL_TOKEN } from "./types";
import { assertPositiveInteger } from "./errors";
import { joinTokens, tail } from "./sequence";

export type SamplerState = {
  probabilities: ProbabilityTable;
  vocabulary: readonly Token[];
  random: RandomSource;
};

export function isTerminal(token: Token): boolean {
  return token === END_TOKEN || token === FAIL_TOKEN;
}

/**
 * Draws the next word after `history` using at most `order - 1` context words.
 *
 * Inverse-CDF sampling over the vocabulary in its stored order. The last
 * vocabulary word never enters the running sum: it is returned only when the
 * other words' mass is positive but does not exceed the draw. When no word has
 * mass under the context the result is FAIL_TOKEN.
 */
export function drawNext(state: SamplerState, history: readonly Token[], order: number): Token {
  assertPositiveInteger("order", order);
  const { probabilities, vocabulary, random } = state;

  const context = history.length >= order ? tail(history, order - 1) : history;
  const key = joinTokens(context);
  const r = random();

  let cumulative = 0;
  for (let i = 0; i < vocabulary.length - 1; i++) {
    const candidate = vocabulary[i];
    cumulative += probabilities.get(`${key} ${candidate}`) ?? 0;
    if (cumulative > r) return candidate;
  }

  if (cumulative === 0) return FAIL_TOKEN;
  return vocabulary[vocabulary.length - 1];
}

/**
 * Draws words until END_TOKEN or FAIL_TOKEN and returns them, terminal token
 * included. `history` is copied, never modified. Without `maxLength` the loop
 * only ends on a terminal token.
 */
export function completeSentence(
  state: SamplerState,
  history: readonly Token[],
  order: number,
  options: CompletionOptions = {}
): Token[] {
  const { maxLength } = options;
  if (maxLength !== undefined) assertPositiveInteger("maxLength", maxLength);

  const context = [...history];
  const out: Token[] = [];
  for (;;) {
    const word = drawNext(state, context, order);
    out.push(word);
    context.push(word);
    if (isTerminal(word)) break;
    if (maxLength !== undefined && out.length >= maxLength) break;
  }
  return out;
}
