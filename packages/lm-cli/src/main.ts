import { LanguageModelError } from "@ngramlm/lm-core";
import { parseArgs, usage } from "./config";
import { createLogger } from "./logger";
import { run } from "./run";

export type CliIO = {
  write(text: string): void;
  exit(code: number): void;
};

/**
 * Runs the command line. Library errors print as a tagged message, anything
 * else prints as is; both end with exit code 1.
 */
export async function main(argv: readonly string[], io: CliIO): Promise<void> {
  try {
    if (argv.includes("--help") || argv.includes("-h")) {
      io.write(usage() + "\n");
      return;
    }
    const cfg = parseArgs(argv);
    const logger = createLogger("lm", { quiet: cfg.quiet });
    await run(cfg, { logger, write: (text) => io.write(text) });
  } catch (err: unknown) {
    if (err instanceof LanguageModelError) {
      createLogger("lm").error(err.message);
    } else {
      console.error(err);
    }
    io.exit(1);
  }
}
