import chalk from 'chalk';
import type { Logger } from '../core/logger.js';

/**
 * Logger writing to stderr, so values on stdout stay pipeable.
 */
export function createConsoleLogger(verbose: boolean): Logger {
  return {
    debug: (message) => {
      if (verbose) console.error(chalk.gray(message));
    },
    info: (message) => {
      if (verbose) console.error(message);
    },
    warn: (message) => {
      console.error(chalk.yellow(message));
    },
  };
}
