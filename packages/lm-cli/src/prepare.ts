import path from "node:path";
import { END_TOKEN, START_TOKEN } from "@ngramlm/lm-core";

// Applied in order before whitespace is collapsed.
const SCRUB: ReadonlyArray<readonly [RegExp, string]> = [
  [/https?:\/\/\S+/g, " "],
  [/\S+@\S+\.\S+/g, " "],
  [/<(?!\/?s>)[^>]*>/g, " "], // markup, but not <s> and </s>
  [/\p{Cc}/gu, " "]
];

const TOKEN_RE = /<\/?s>|[\p{L}\p{N}']+/gu;

export function normalizeLine(line: string): string {
  const scrubbed = SCRUB.reduce((s, [re, replacement]) => s.replace(re, replacement), line.normalize("NFKC"));
  return scrubbed.replace(/\s+/g, " ").trim();
}

// A sentence ends at terminal punctuation or right after an end marker.
export function splitSentences(text: string): string[] {
  return text
    .split(/(?<=<\/s>)|[.!?]/)
    .map((x) => x.trim())
    .filter((x) => x.length > 0);
}

export function tokenize(sentence: string): string[] {
  return (sentence.match(TOKEN_RE) ?? []).map((x) => x.toLowerCase());
}

function isMarker(token: string): boolean {
  return token === START_TOKEN || token === END_TOKEN;
}

/**
 * Turns raw text lines into training lines: one sentence per line, lowercase
 * words separated by single spaces, wrapped in sentence markers. Markers that
 * are already present are kept rather than doubled.
 */
export function toTrainingLines(rawLines: Iterable<string>): string[] {
  const out: string[] = [];
  for (const line of rawLines) {
    const normalized = normalizeLine(line);
    if (!normalized) continue;
    for (const sentence of splitSentences(normalized)) {
      const tokens = tokenize(sentence);
      if (tokens.every(isMarker)) continue;
      if (tokens[0] !== START_TOKEN) tokens.unshift(START_TOKEN);
      if (tokens[tokens.length - 1] !== END_TOKEN) tokens.push(END_TOKEN);
      out.push(tokens.join(" "));
    }
  }
  return out;
}

export type PrepareConfig = {
  inputDir: string;
  outFile: string;
};

export const DEFAULT_PREPARE_CONFIG: PrepareConfig = {
  inputDir: path.resolve("corpus/raw"),
  outFile: path.resolve("corpus/generated/train.txt")
};

export function parsePrepareArgs(argv: readonly string[]): PrepareConfig {
  const cfg: PrepareConfig = { ...DEFAULT_PREPARE_CONFIG };
  for (const arg of argv) {
    const eq = arg.indexOf("=");
    if (eq < 0) continue;
    const value = arg.slice(eq + 1);
    switch (arg.slice(0, eq)) {
      case "--input":
        cfg.inputDir = path.resolve(value);
        break;
      case "--out":
        cfg.outFile = path.resolve(value);
        break;
      default:
        break;
    }
  }
  return cfg;
}
