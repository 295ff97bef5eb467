/**
 * Progress reporting for multi-step commands.
 * Services report through this interface; commands decide how it looks.
 */

import chalk from 'chalk';
import ora, { type Ora } from 'ora';

export interface StepReporter {
  /** Begin a step that may take a while */
  start(text: string): void;
  succeed(text: string): void;
  warn(text: string): void;
  fail(text: string): void;
  info(text: string): void;
}

/**
 * ora spinners for steps, chalk for the rest.
 * Everything goes to stderr, where ora writes, so stdout carries only command output.
 */
export function createSpinnerReporter(): StepReporter {
  let spinner: Ora | null = null;

  const settle = (method: 'succeed' | 'warn' | 'fail', text: string, fallback: string) => {
    if (spinner) {
      spinner[method](text);
      spinner = null;
    } else {
      console.error(fallback);
    }
  };

  return {
    start(text) {
      if (spinner) {
        spinner.stop();
      }
      spinner = ora(text).start();
    },
    succeed(text) {
      settle('succeed', text, chalk.green(`  ✓ ${text}`));
    },
    warn(text) {
      settle('warn', text, chalk.yellow(`  ⚠ ${text}`));
    },
    fail(text) {
      settle('fail', text, chalk.red(`  ✗ ${text}`));
    },
    info(text) {
      if (spinner) {
        spinner.info(text);
        spinner = null;
      } else {
        console.error(chalk.blue(`  ℹ ${text}`));
      }
    },
  };
}
