export type Logger = {
  info(message: string): void;
  error(message: string): void;
};

export function createLogger(tag: string, opts: { quiet?: boolean } = {}): Logger {
  return {
    info(message) {
      if (!opts.quiet) console.log(`[${tag}] ${message}`);
    },
    error(message) {
      console.error(`[${tag}] ${message}`);
    }
  };
}
