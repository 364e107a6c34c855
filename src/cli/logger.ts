import chalk from 'chalk';
import ora from 'ora';
import type { Ora } from 'ora';

export interface SpinnerHandle {
  start(text: string): SpinnerHandle;
  succeed(text?: string): SpinnerHandle;
  fail(text?: string): SpinnerHandle;
  info(text?: string): SpinnerHandle;
  stop(): void;
}

/**
 * Simple wrapper around ora providing chainable API and consistent colors.
 * Each `start` after a finished step begins a new spinner line.
 */
export function createSpinner(): SpinnerHandle {
  let spinner: Ora | undefined;

  return {
    start(text: string) {
      if (spinner?.isSpinning) spinner.text = text;
      else spinner = ora(text).start();
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
    info(text?: string) {
      spinner?.info(text && chalk.cyan(text));
      return this;
    },
    stop() {
      spinner?.stop();
    },
  };
}

export const symbols = {
  success: chalk.green('✔'),
  fail: chalk.red('✖'),
  warn: chalk.yellow('⚠'),
  info: chalk.cyan('ℹ'),
};

/** Lightweight render helpers to avoid scattered console.log formatting */
export const render = {
  line(msg = '') {
    console.log(msg);
  },
  raw(text: string) {
    process.stdout.write(text);
  },
  success(msg: string) {
    console.log(symbols.success + ' ' + chalk.green(msg));
  },
  info(msg: string) {
    console.log(symbols.info + ' ' + chalk.cyan(msg));
  },
  warn(msg: string) {
    console.log(symbols.warn + ' ' + chalk.yellow(msg));
  },
  error(msg: string) {
    console.error(symbols.fail + ' ' + chalk.red(msg));
  },
  hint(msg: string) {
    console.error(chalk.gray(msg));
  },
};
