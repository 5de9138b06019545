import { promises as fs } from "node:fs";
import { glob } from "glob";
import { LanguageModelError } from "@ngramlm/lm-core";

export class CorpusLoadError extends LanguageModelError {
  public readonly source: string;

  constructor(source: string, message: string) {
    super(message);
    this.name = "CorpusLoadError";
    this.source = source;
  }
}

export async function resolveCorpusFiles(patterns: readonly string[]): Promise<string[]> {
  const out: string[] = [];
  const seen = new Set<string>();
  for (const pattern of patterns) {
    const matches = (await glob(pattern, { nodir: true, absolute: true })).sort();
    if (matches.length === 0) {
      throw new CorpusLoadError(pattern, `No corpus files match ${pattern}`);
    }
    for (const file of matches) {
      if (seen.has(file)) continue;
      seen.add(file);
      out.push(file);
    }
  }
  return out;
}

async function readLinesFromFile(file: string): Promise<string[]> {
  let raw: string;
  try {
    raw = await fs.readFile(file, "utf8");
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new CorpusLoadError(file, `Unable to read ${file}: ${reason}`);
  }
  return raw.split(/\r?\n/);
}

/** Lines of every matched file, files in sorted order per pattern. */
export async function loadCorpus(patterns: readonly string[]): Promise<{ files: string[]; lines: string[] }> {
  const files = await resolveCorpusFiles(patterns);
  const lines: string[] = [];
  for (const file of files) {
    lines.push(...(await readLinesFromFile(file)));
  }
  return { files, lines };
}
