import chalk from 'chalk';
import ora from 'ora';
import type { Ora } from 'ora';

import type { Logger } from '../lib/utils/logger.js';

export interface SpinnerHandle {
  start(text: string): SpinnerHandle;
  succeed(text?: string): SpinnerHandle;
  fail(text?: string): SpinnerHandle;
  warn(text?: string): SpinnerHandle;
  stop(): void;
}

/**
 * Chainable ora wrapper; `start` after a terminal state spins again on a new line
 */
export function createSpinner(): SpinnerHandle {
  let spinner: Ora | undefined;

  return {
    start(text: string) {
      if (!spinner) {
        spinner = ora(text).start();
      } else {
        spinner.text = text;
        if (!spinner.isSpinning) spinner.start();
      }
      return this;
    },
    succeed(text?: string) {
      spinner?.succeed(text && chalk.green(text));
      return this;
    },
    fail(text?: string) {
      spinner?.fail(text && chalk.red(text));
      return this;
    },
    warn(text?: string) {
      spinner?.warn(text && chalk.yellow(text));
      return this;
    },
    stop() {
      spinner?.stop();
    },
  };
}

const warnSymbol = chalk.yellow('⚠');

export function heading(title: string) {
  console.log('\n' + chalk.bold.blue(title));
}

export function kv(label: string, value: string) {
  console.log('  ' + chalk.gray(label + ':') + ' ' + chalk.white(value));
}

export const render = {
  warn(msg: string) {
    console.log(warnSymbol + ' ' + chalk.yellow(msg));
  },
  list(values: readonly string[]) {
    values.forEach((v) => console.log('  - ' + chalk.white(v)));
  },
};

/**
 * Progress goes to the spinner text, warnings and errors stay on screen
 */
export function createSpinnerLogger(spinner: SpinnerHandle): Logger {
  return {
    info: (message) => {
      spinner.start(message);
    },
    warn: (message) => {
      spinner.warn(message);
    },
    error: (message) => {
      spinner.fail(message);
    },
  };
}
