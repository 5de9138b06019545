import { describe, it, expect } from "vitest";
import { extractCounts } from "../src/counter";
import { estimateProbabilities } from "../src/estimator";
import { completeSentence, drawNext, isTerminal, type SamplerState } from "../src/sampler";
import { fixedRandom } from "../src/random";
import { InvalidArgumentError } from "../src/errors";
import { END_TOKEN, FAIL_TOKEN } from "../src/types";

function stateFor(lines: string[], maxOrder: number, draws: number[]): SamplerState {
  const { ngramCounts, historyCounts, vocabulary } = extractCounts(lines, maxOrder);
  return {
    probabilities: estimateProbabilities(ngramCounts, historyCounts),
    vocabulary,
    random: fixedRandom(draws)
  };
}

// vocabulary: <s> a b </s> c
const TWO_LINES = ["<s> a b </s>", "<s> c </s>"];

describe("drawNext", () => {
  it("returns the only continuation of the sentence start", () => {
    const state = stateFor(["<s> a b </s>"], 2, [0.99]);
    expect(drawNext(state, ["<s>"], 2)).toBe("a");
  });

  it("returns the first word with mass on a zero draw", () => {
    const state = stateFor(TWO_LINES, 2, [0]);
    expect(drawNext(state, ["<s>"], 2)).toBe("a");
  });

  it("falls back to the last vocabulary word when the draw is not exceeded", () => {
    const state = stateFor(TWO_LINES, 2, [0.7]);
    expect(drawNext(state, ["<s>"], 2)).toBe("c");
  });

  it("fails when only the last vocabulary word follows the history", () => {
    const state = stateFor(["<s> a b </s>"], 2, [0.5]);
    expect(drawNext(state, ["b"], 2)).toBe(FAIL_TOKEN);
  });

  it("fails on an unseen history", () => {
    const state = stateFor(TWO_LINES, 2, [0.3]);
    expect(drawNext(state, ["x"], 2)).toBe(FAIL_TOKEN);
  });

  it("fails with an empty vocabulary", () => {
    const state: SamplerState = { probabilities: new Map(), vocabulary: [], random: fixedRandom([0.1]) };
    expect(drawNext(state, ["<s>"], 2)).toBe(FAIL_TOKEN);
  });

  it("conditions on at most order - 1 words", () => {
    const bigram = stateFor(["<s> a b </s>"], 3, [0.4]);
    expect(drawNext(bigram, ["x", "<s>", "a"], 2)).toBe("b");

    const trigram = stateFor(["<s> a b </s>", "<s> c a </s>"], 3, [0.4]);
    expect(drawNext(trigram, ["x", "c", "a"], 3)).toBe(END_TOKEN);
  });

  it("uses the whole history when it is shorter than the order", () => {
    const state = stateFor(["<s> a b </s>"], 3, [0.4]);
    expect(drawNext(state, ["a"], 3)).toBe("b");
  });

  it("has no context at order 1", () => {
    const state = stateFor(TWO_LINES, 2, [0.1]);
    expect(drawNext(state, ["<s>"], 1)).toBe(FAIL_TOKEN);
  });

  it("rejects a non-positive order", () => {
    const state = stateFor(TWO_LINES, 2, [0.1]);
    expect(() => drawNext(state, ["<s>"], 0)).toThrow(InvalidArgumentError);
  });
});

describe("completeSentence", () => {
  it("draws until the sentence end and includes it", () => {
    const state = stateFor(TWO_LINES, 2, [0.2, 0.5, 0.9]);
    expect(completeSentence(state, ["<s>"], 2)).toEqual(["a", "b", "</s>"]);
  });

  it("follows the fallback branch", () => {
    const state = stateFor(TWO_LINES, 2, [0.7, 0.1]);
    expect(completeSentence(state, ["<s>"], 2)).toEqual(["c", "</s>"]);
  });

  it("stops on failure", () => {
    const state = stateFor(["<s> a b </s>"], 2, [0.1, 0.1, 0.1]);
    expect(completeSentence(state, ["<s>"], 2)).toEqual(["a", "b", "<fail>"]);
  });

  it("does not modify the history", () => {
    const history = ["<s>"];
    const state = stateFor(TWO_LINES, 2, [0.2, 0.5, 0.9]);
    completeSentence(state, history, 2);
    expect(history).toEqual(["<s>"]);
  });

  it("accepts a frozen history", () => {
    const state = stateFor(TWO_LINES, 2, [0.1]);
    expect(completeSentence(state, Object.freeze(["x"]), 2)).toEqual(["<fail>"]);
  });

  it("stops at maxLength without a terminal token", () => {
    const state = stateFor(TWO_LINES, 2, [0.2, 0.5]);
    expect(completeSentence(state, ["<s>"], 2, { maxLength: 2 })).toEqual(["a", "b"]);
  });

  it("rejects a non-positive maxLength", () => {
    const state = stateFor(TWO_LINES, 2, []);
    expect(() => completeSentence(state, ["<s>"], 2, { maxLength: 0 })).toThrow(InvalidArgumentError);
  });

  it("treats only the end and failure markers as terminal", () => {
    expect(isTerminal("</s>")).toBe(true);
    expect(isTerminal("<fail>")).toBe(true);
    expect(isTerminal("<s>")).toBe(false);
  });
});
