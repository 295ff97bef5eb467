/**
 * appship status
 *
 * Show the last deployment recorded in .appship/deployment.json and,
 * with --live, what Azure currently reports for it.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import * as path from 'path';
import { getWebApp, resourceGroupExists } from '../../azure';
import { ConfigError, EXIT_SUCCESS } from '../../errors';
import { checkPrerequisites } from '../../services/prerequisites.service';
import { readDeploymentReceipt } from '../../services/receipt.service';
import { formatDeploymentReport, printSection } from '../../services/report.service';
import { exitWith, handleCommandError, resolveContext, type CommandDeps } from '../shared';

export interface StatusCommandOptions {
  live?: boolean;
  json?: boolean;
}

export async function runStatusCommand(
  options: StatusCommandOptions,
  deps: CommandDeps = {}
): Promise<number> {
  try {
    const ctx = resolveContext(deps);
    const receipt = await readDeploymentReceipt(path.resolve(ctx.cwd, ctx.config.stateDir));
    if (!receipt) {
      throw new ConfigError('No deployment recorded.', 'Run `appship deploy` first.');
    }

    if (options.json && !options.live) {
      console.log(JSON.stringify(receipt, null, 2));
      return EXIT_SUCCESS;
    }

    if (!options.json) {
      console.log(chalk.bold('\n  Deployment Status'));
      printSection('Last Deployment', [
        ...formatDeploymentReport(receipt),
        `📍 Location: ${receipt.location}`,
        `🏷️  Environment: ${receipt.environment}`,
        `🕒 Deployed At: ${receipt.timestamp}`,
      ]);
    }

    if (!options.live) {
      console.log();
      return EXIT_SUCCESS;
    }

    await checkPrerequisites(ctx.runner, ctx.reporter);

    ctx.reporter.start('Querying Azure...');
    const groupExists = await resourceGroupExists(ctx.runner, receipt.resourceGroupName);
    const webApp = groupExists
      ? await getWebApp(ctx.runner, receipt.resourceGroupName, receipt.webAppName)
      : null;
    ctx.reporter.succeed('Queried Azure');

    if (options.json) {
      console.log(
        JSON.stringify(
          {
            ...receipt,
            live: {
              resourceGroupExists: groupExists,
              webApp,
            },
          },
          null,
          2
        )
      );
      return EXIT_SUCCESS;
    }

    const lines = [
      groupExists
        ? chalk.green(`Resource group ${receipt.resourceGroupName} exists`)
        : chalk.red(`Resource group ${receipt.resourceGroupName} not found`),
    ];
    if (webApp) {
      const stateColor = webApp.state === 'Running' ? chalk.green : chalk.yellow;
      lines.push(stateColor(`Web app ${webApp.name} is ${webApp.state}`));
      lines.push(`Host: https://${webApp.defaultHostName}`);
      lines.push(`HTTPS only: ${webApp.httpsOnly ? 'yes' : 'no'}`);
    } else if (groupExists) {
      lines.push(chalk.red(`Web app ${receipt.webAppName} not found`));
    }
    printSection('Live State', lines);
    console.log();

    return EXIT_SUCCESS;
  } catch (error) {
    return handleCommandError('status', error);
  }
}

export const statusCommand = new Command('status')
  .description('Show the last recorded deployment')
  .option('--live', 'Query Azure for the current state')
  .option('--json', 'Output as JSON')
  .action(async (options: StatusCommandOptions) => {
    await exitWith(runStatusCommand(options));
  });
