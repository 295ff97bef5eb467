/**
 * Helpers shared by appship commands
 */

import chalk from 'chalk';
import inquirer from 'inquirer';
import { createAzRunner, type AzRunner } from '../azure';
import { buildConfig, type CliConfig } from '../config';
import { AppshipError, TemplateValidationError, EXIT_FAILURE, errorMessage } from '../errors';
import { getLogPath, isLoggingEnabled, logFullError } from '../logger';
import { createSpinnerReporter, type StepReporter } from '../reporter';

export type ConfirmFn = (message: string) => Promise<boolean>;

/**
 * Overridable collaborators. Commands use the real az CLI, spinners and
 * prompts unless a caller supplies replacements.
 */
export interface CommandDeps {
  runner?: AzRunner;
  reporter?: StepReporter;
  config?: CliConfig;
  cwd?: string;
  now?: Date;
  confirm?: ConfirmFn;
}

export interface CommandContext {
  runner: AzRunner;
  reporter: StepReporter;
  config: CliConfig;
  cwd: string;
  now: Date;
  confirm: ConfirmFn;
}

export async function confirmPrompt(message: string): Promise<boolean> {
  const { confirm } = await inquirer.prompt<{ confirm: boolean }>([
    {
      type: 'confirm',
      name: 'confirm',
      message,
      default: false,
    },
  ]);
  return confirm;
}

export function resolveContext(deps: CommandDeps): CommandContext {
  const config = deps.config ?? buildConfig();
  const cwd = deps.cwd ?? process.cwd();
  return {
    runner: deps.runner ?? createAzRunner({ timeoutMs: config.azTimeoutMs, cwd }),
    reporter: deps.reporter ?? createSpinnerReporter(),
    config,
    cwd,
    now: deps.now ?? new Date(),
    confirm: deps.confirm ?? confirmPrompt,
  };
}

/**
 * Print a failure, log it in full and return the exit code
 */
export function handleCommandError(commandName: string, error: unknown): number {
  logFullError(commandName, error);

  console.log(chalk.red(`\n  ❌ ${errorMessage(error)}`));
  if (error instanceof TemplateValidationError) {
    for (const detail of error.details) {
      console.log(chalk.red(`     - ${detail}`));
    }
  }
  if (error instanceof AppshipError && error.hint) {
    console.log(chalk.gray(`  ${error.hint}`));
  }
  if (isLoggingEnabled()) {
    console.log(chalk.gray(`  Debug log: ${getLogPath()}\n`));
  } else {
    console.log();
  }

  return EXIT_FAILURE;
}

/**
 * Run a command body and exit with its code
 */
export function exitWith(run: Promise<number>): Promise<void> {
  return run.then((code) => {
    process.exitCode = code;
  });
}
