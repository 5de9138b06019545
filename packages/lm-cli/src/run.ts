import {
  LanguageModel,
  defaultRandom,
  fixedRandom,
  formatCompletion,
  seededRandom,
  splitTokens,
  type RandomSource
} from "@ngramlm/lm-core";
import type { Config } from "./config";
import type { Logger } from "./logger";
import { loadCorpus } from "./corpus";
import { saveCounts, saveVocabulary } from "./output";

export type RunIO = {
  logger: Logger;
  write(text: string): void;
};

function randomFor(cfg: Config): RandomSource {
  if (cfg.draws) return fixedRandom(cfg.draws);
  if (cfg.seed !== undefined) return seededRandom(cfg.seed);
  return defaultRandom;
}

export function historyTokens(history: string): string[] {
  return splitTokens(history.trim()).filter((t) => t.length > 0);
}

/**
 * Trains on the configured corpus, writes the optional dumps, then prints
 * `samples` completions for every history as "<history> w1 w2 ... </s>".
 */
export async function run(cfg: Config, io: RunIO): Promise<LanguageModel> {
  const { logger } = io;
  const { files, lines } = await loadCorpus(cfg.textPatterns);
  logger.info(`input files: ${files.length} (${lines.length} lines)`);

  const model = LanguageModel.fromLines(lines, { maxOrder: cfg.maxOrder, random: randomFor(cfg) });
  const { ngramCounts } = model.getCounts();
  logger.info(`order ${model.getMaxOrder()}: ${model.getVocabulary().length} words, ${ngramCounts.size} n-grams`);

  if (cfg.vocabFile) {
    await saveVocabulary(cfg.vocabFile, model.getVocabulary());
    logger.info(`vocab: ${cfg.vocabFile}`);
  }
  if (cfg.countsFile) {
    await saveCounts(cfg.countsFile, ngramCounts);
    logger.info(`counts: ${cfg.countsFile}`);
  }

  for (const history of cfg.histories) {
    const tokens = historyTokens(history);
    for (let i = 0; i < cfg.samples; i++) {
      const completion = model.randomCompletion(tokens, cfg.maxOrder, { maxLength: cfg.maxLength });
      io.write(tokens.join(" ") + formatCompletion(completion));
    }
  }
  return model;
}
