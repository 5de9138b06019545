import path from "node:path";
import { LanguageModelError, START_TOKEN } from "@ngramlm/lm-core";

export class ConfigError extends LanguageModelError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export type Config = {
  textPatterns: string[];
  maxOrder: number;
  seed?: number | string;
  draws?: number[];
  vocabFile?: string;
  countsFile?: string;
  histories: string[];
  samples: number;
  maxLength?: number;
  quiet: boolean;
};

const MAX_NUMERIC_SEED = 0xffffffff;

export const DEFAULT_CONFIG: Config = {
  textPatterns: [],
  maxOrder: 3,
  histories: [],
  samples: 1,
  quiet: false
};

function positiveInt(flag: string, value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) {
    throw new ConfigError(`${flag} expects a positive integer, got "${value}"`);
  }
  return n;
}

function parseDraws(value: string): number[] {
  return value.split(",").map((raw) => {
    const n = Number(raw.trim());
    if (raw.trim() === "" || !(n >= 0 && n < 1)) {
      throw new ConfigError(`--draws expects numbers in [0, 1), got "${raw}"`);
    }
    return n;
  });
}

export function parseArgs(argv: readonly string[]): Config {
  const cfg: Config = { ...DEFAULT_CONFIG, textPatterns: [], histories: [] };
  for (const arg of argv) {
    if (arg === "--quiet") {
      cfg.quiet = true;
      continue;
    }
    const eq = arg.indexOf("=");
    if (eq < 0) continue;
    const key = arg.slice(0, eq);
    const value = arg.slice(eq + 1);
    switch (key) {
      case "--text":
        cfg.textPatterns.push(value);
        break;
      case "--order":
        cfg.maxOrder = positiveInt(key, value);
        break;
      case "--seed":
        // Seeds beyond 32 bits are hashed like any other string.
        cfg.seed = /^\d+$/.test(value) && Number(value) <= MAX_NUMERIC_SEED ? Number(value) : value;
        break;
      case "--draws":
        cfg.draws = parseDraws(value);
        break;
      case "--vocab":
        cfg.vocabFile = path.resolve(value);
        break;
      case "--counts":
        cfg.countsFile = path.resolve(value);
        break;
      case "--history":
        cfg.histories.push(value);
        break;
      case "--samples":
        cfg.samples = positiveInt(key, value);
        break;
      case "--max-length":
        cfg.maxLength = positiveInt(key, value);
        break;
      default:
        break;
    }
  }
  if (cfg.textPatterns.length === 0) {
    throw new ConfigError("missing --text=<corpus file or glob>");
  }
  if (cfg.histories.length === 0) cfg.histories.push(START_TOKEN);
  return cfg;
}

export function usage(): string {
  return [
    "Usage: ngram-complete --text=<file|glob> [options]",
    "",
    "  --text=<file|glob>    training corpus, one sentence per line (repeatable)",
    "  --order=<n>           maximum n-gram order (default: 3)",
    "  --seed=<n|str>        seed for deterministic sampling",
    "  --draws=<r1,r2,...>   replay fixed random draws instead of a generator",
    "  --vocab=<file>        write the vocabulary, one word per line",
    "  --counts=<file>       write n-gram counts as <ngram>\\t<count>",
    "  --history=<words>     space-separated history to complete (repeatable, default: <s>)",
    "  --samples=<n>         completions per history (default: 1)",
    "  --max-length=<n>      stop a completion after n words",
    "  --quiet               only print completions"
  ].join("\n");
}
