import { promises as fs } from "node:fs";
import path from "node:path";
import { formatCounts, formatVocabulary, type CountTable, type Token } from "@ngramlm/lm-core";

async function writeLines(file: string, rows: readonly string[]): Promise<void> {
  await fs.mkdir(path.dirname(file), { recursive: true });
  await fs.writeFile(file, rows.map((row) => row + "\n").join(""), "utf8");
}

export async function saveVocabulary(file: string, vocabulary: readonly Token[]): Promise<void> {
  await writeLines(file, formatVocabulary(vocabulary));
}

export async function saveCounts(file: string, ngramCounts: CountTable): Promise<void> {
  await writeLines(file, formatCounts(ngramCounts));
}
