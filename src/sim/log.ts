import chalk from "chalk";

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export type LoggerOptions = {
  /**
   * drop `info` messages, warnings and errors still go out
   */
  quiet?: boolean;
};

const tag = () => chalk.green.bold("[cachesim]:");

export function createLogger(options: LoggerOptions = {}): Logger {
  return {
    info(message) {
      if (options.quiet) return;
      console.log(`${tag()} ${chalk.italic.gray(message)}`);
    },
    warn(message) {
      console.warn(`${tag()} ${chalk.yellow(message)}`);
    },
    error(message) {
      console.error(`${tag()} ${chalk.red(message)}`);
    },
  };
}

export const silentLogger: Logger = {
  info() {},
  warn() {},
  error() {},
};
