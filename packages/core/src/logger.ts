import chalk from "chalk";

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};

/** Console logger in the CLI's "  message" style. Debug lines only print when verbose. */
export function createConsoleLogger(options?: { verbose?: boolean }): Logger {
  const verbose = options?.verbose ?? false;
  return {
    debug(message) {
      if (verbose) console.log(chalk.dim(`  ${message}`));
    },
    info(message) {
      console.log(`  ${message}`);
    },
    warn(message) {
      console.warn(chalk.yellow(`  Warning: ${message}`));
    },
    error(message) {
      console.error(chalk.red(`  Error: ${message}`));
    },
  };
}
