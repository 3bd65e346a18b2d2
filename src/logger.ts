import { log } from "@clack/prompts";
import chalk from "chalk";

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface LoggerOptions {
  verbose?: boolean;
}

/**
 * Logger that writes through clack's log so messages line up with the
 * spinners and prompts of the interactive commands.
 */
export function createCliLogger(opts: LoggerOptions = {}): Logger {
  return {
    debug(message) {
      if (opts.verbose) log.message(chalk.dim(message));
    },
    info(message) {
      log.info(message);
    },
    warn(message) {
      log.warn(chalk.yellow(message));
    },
    error(message) {
      log.error(chalk.red(message));
    },
  };
}

export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};
