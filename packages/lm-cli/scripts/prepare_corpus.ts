import { promises as fs } from "node:fs";
import path from "node:path";
import { glob } from "glob";
import { parsePrepareArgs, toTrainingLines } from "../src/prepare";
import { createLogger } from "../src/logger";

const logger = createLogger("corpus");

async function main(): Promise<void> {
  const cfg = parsePrepareArgs(process.argv.slice(2));
  const files = (await glob("**/*.{txt,md}", { cwd: cfg.inputDir, nodir: true, absolute: true })).sort();
  if (files.length === 0) {
    throw new Error(`No source files in ${cfg.inputDir}`);
  }

  const out: string[] = [];
  let rawLineCount = 0;
  for (const file of files) {
    const lines = (await fs.readFile(file, "utf8")).split(/\r?\n/);
    rawLineCount += lines.length;
    out.push(...toTrainingLines(lines));
  }

  await fs.mkdir(path.dirname(cfg.outFile), { recursive: true });
  await fs.writeFile(cfg.outFile, out.map((l) => l + "\n").join(""), "utf8");

  logger.info(`input files: ${files.length} (${rawLineCount} lines)`);
  logger.info(`sentences: ${out.length}`);
  logger.info(`output: ${cfg.outFile}`);
}

main().catch((err) => {
  logger.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
