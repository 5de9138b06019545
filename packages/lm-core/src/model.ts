import type { CompletionOptions, CountResult, ModelOptions, ProbabilityTable, RandomSource, Token } from "./types";
import { extractCounts } from "./counter";
import { estimateProbabilities } from "./estimator";
import { completeSentence, drawNext, type SamplerState } from "./sampler";
import { assertPositiveInteger } from "./errors";
import { defaultRandom } from "./random";

/**
 * Maximum-likelihood n-gram model built once from a corpus and then queried
 * for random completions.
 */
export class LanguageModel {
  private readonly counts: CountResult;
  private readonly probabilities: ProbabilityTable;
  private readonly vocabulary: readonly Token[];
  private readonly maxOrder: number;
  private readonly random: RandomSource;

  private constructor(counts: CountResult, options: ModelOptions) {
    assertPositiveInteger("maxOrder", options.maxOrder);
    this.counts = counts;
    this.probabilities = estimateProbabilities(counts.ngramCounts, counts.historyCounts);
    this.vocabulary = Object.freeze([...counts.vocabulary]);
    this.maxOrder = options.maxOrder;
    this.random = options.random ?? defaultRandom;
  }

  /** Counts `lines` (one sentence per line, space separated) and estimates P(w | h). */
  static fromLines(lines: Iterable<string>, options: ModelOptions): LanguageModel {
    return new LanguageModel(extractCounts(lines, options.maxOrder), options);
  }

  static fromCounts(counts: CountResult, options: ModelOptions): LanguageModel {
    return new LanguageModel(counts, options);
  }

  getMaxOrder(): number {
    return this.maxOrder;
  }

  getVocabulary(): readonly Token[] {
    return this.vocabulary;
  }

  getProbabilities(): ProbabilityTable {
    return this.probabilities;
  }

  getCounts(): CountResult {
    return this.counts;
  }

  probability(ngram: string): number {
    return this.probabilities.get(ngram) ?? 0;
  }

  randomNextWord(history: readonly Token[], order = this.maxOrder): Token {
    return drawNext(this.state(), history, order);
  }

  randomCompletion(history: readonly Token[], order = this.maxOrder, options?: CompletionOptions): Token[] {
    return completeSentence(this.state(), history, order, options);
  }

  private state(): SamplerState {
    return { probabilities: this.probabilities, vocabulary: this.vocabulary, random: this.random };
  }
}
