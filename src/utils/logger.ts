import chalk from 'chalk';

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface ConsoleLoggerOptions {
  verbose?: boolean;
}

export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const verbose = options.verbose || false;
  return {
    debug(message) {
      if (verbose) console.error(chalk.dim(message));
    },
    info(message) {
      console.log(message);
    },
    warn(message) {
      console.warn(chalk.yellow(message));
    },
    error(message) {
      console.error(chalk.red(message));
    },
  };
}
