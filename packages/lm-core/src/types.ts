export const START_TOKEN = "<s>";
export const END_TOKEN = "</s>";
export const FAIL_TOKEN = "<fail>";

export type Token = string;

// Keys are n-grams joined by single spaces ("<s> the cat").
export type CountTable = Map<string, number>;

export type ProbabilityTable = ReadonlyMap<string, number>;

export type CountResult = {
  ngramCounts: CountTable;   // windows of 2+ tokens
  historyCounts: CountTable; // windows of 1+ tokens
  vocabulary: Token[];       // first-occurrence order
};

/** Returns a value in [0, 1). */
export type RandomSource = () => number;

export type CompletionOptions = {
  maxLength?: number;
};

export type ModelOptions = {
  maxOrder: number;
  random?: RandomSource;
};
