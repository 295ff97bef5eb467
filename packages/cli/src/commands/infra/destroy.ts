/**
 * appship destroy
 *
 * Delete the resource group of the last deployment (or the one given).
 */

import { Command } from 'commander';
import chalk from 'chalk';
import * as path from 'path';
import { deleteResourceGroup, resourceGroupExists } from '../../azure';
import { ConfigError, DeploymentError, EXIT_SUCCESS, errorMessage } from '../../errors';
import { checkPrerequisites } from '../../services/prerequisites.service';
import { logWarn } from '../../logger';
import {
  readDeploymentReceipt,
  removeDeploymentReceipt,
  type DeploymentReceipt,
} from '../../services/receipt.service';
import { exitWith, handleCommandError, resolveContext, type CommandDeps } from '../shared';

export interface DestroyCommandOptions {
  resourceGroup?: string;
  yes?: boolean;
}

/**
 * The recorded deployment, or null when the receipt cannot be read
 */
async function readReceiptIfValid(stateDir: string): Promise<DeploymentReceipt | null> {
  try {
    return await readDeploymentReceipt(stateDir);
  } catch (error) {
    if (error instanceof ConfigError) {
      logWarn('Ignoring unreadable deployment receipt', { error: error.message });
      return null;
    }
    throw error;
  }
}

export async function runDestroyCommand(
  options: DestroyCommandOptions,
  deps: CommandDeps = {}
): Promise<number> {
  console.log(chalk.bold('\n  Destroy Infrastructure\n'));

  try {
    const ctx = resolveContext(deps);
    const stateDir = path.resolve(ctx.cwd, ctx.config.stateDir);
    const receipt = options.resourceGroup
      ? await readReceiptIfValid(stateDir)
      : await readDeploymentReceipt(stateDir);
    const resourceGroupName = options.resourceGroup ?? receipt?.resourceGroupName;

    if (!resourceGroupName) {
      throw new ConfigError(
        'No resource group given and no deployment recorded.',
        'Pass --resource-group <name>.'
      );
    }

    await checkPrerequisites(ctx.runner, ctx.reporter);

    ctx.reporter.start(`Checking resource group ${resourceGroupName}...`);
    const exists = await resourceGroupExists(ctx.runner, resourceGroupName);
    if (!exists) {
      ctx.reporter.warn(`Resource group ${resourceGroupName} does not exist`);
      if (receipt?.resourceGroupName === resourceGroupName) {
        await removeDeploymentReceipt(stateDir);
      }
      return EXIT_SUCCESS;
    }
    ctx.reporter.succeed(`Resource group ${resourceGroupName} found`);

    if (!options.yes) {
      console.log(chalk.yellow(`\n  Warning: This deletes ${resourceGroupName} and everything in it.`));
      console.log(chalk.yellow('  This action cannot be undone.\n'));

      const confirmed = await ctx.confirm('Are you sure you want to destroy?');
      if (!confirmed) {
        console.log(chalk.gray('\n  Cancelled.\n'));
        return EXIT_SUCCESS;
      }
    }

    ctx.reporter.start(`Deleting ${resourceGroupName}...`);
    try {
      await deleteResourceGroup(ctx.runner, resourceGroupName);
    } catch (error) {
      ctx.reporter.fail('Delete failed');
      throw new DeploymentError(errorMessage(error));
    }
    ctx.reporter.succeed(`Deletion of ${resourceGroupName} started`);

    if (receipt?.resourceGroupName === resourceGroupName) {
      await removeDeploymentReceipt(stateDir);
    }

    console.log(chalk.gray(`\n  Track progress with: az group show --name "${resourceGroupName}"\n`));
    return EXIT_SUCCESS;
  } catch (error) {
    return handleCommandError('destroy', error);
  }
}

export const destroyCommand = new Command('destroy')
  .description('Delete the deployed resource group')
  .option('-g, --resource-group <name>', 'Resource group to delete (default: last deployment)')
  .option('-y, --yes', 'Skip confirmation prompt')
  .action(async (options: DestroyCommandOptions) => {
    await exitWith(runDestroyCommand(options));
  });
