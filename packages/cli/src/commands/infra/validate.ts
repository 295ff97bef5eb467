/**
 * appship validate
 *
 * Check prerequisites and validate the template locally and with Azure.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { EXIT_SUCCESS } from '../../errors';
import { runDeployment, type DeployOptions } from '../../services/deploy.service';
import { formatPlan, printSection } from '../../services/report.service';
import { exitWith, handleCommandError, resolveContext, type CommandDeps } from '../shared';

export type ValidateCommandOptions = Omit<DeployOptions, 'whatIf' | 'validateOnly'>;

export async function runValidateCommand(
  options: ValidateCommandOptions,
  deps: CommandDeps = {}
): Promise<number> {
  console.log(chalk.bold('\n  Validating Bicep Templates\n'));

  try {
    const ctx = resolveContext(deps);
    const result = await runDeployment({ ...options, validateOnly: true }, ctx);
    printSection('Validated Parameters', formatPlan(result.plan));
    console.log(chalk.green('\n  ✅ Template validation passed\n'));
    return EXIT_SUCCESS;
  } catch (error) {
    return handleCommandError('validate', error);
  }
}

export const validateCommand = new Command('validate')
  .description('Validate the templates without deploying')
  .option('-l, --location <location>', 'Azure region')
  .option('-g, --resource-group <name>', 'Resource group name')
  .option('-n, --name <name>', 'Web app name')
  .option('-e, --env <environment>', 'Parameter file environment (dev, staging, prod)')
  .option('--sku <sku>', 'App Service Plan pricing tier')
  .option('--runtime <version>', '.NET runtime version')
  .option('--plan-name <name>', 'App Service Plan name')
  .option('-t, --template <path>', 'Subscription-level Bicep template')
  .option('-s, --subscription <id>', 'Subscription to validate against')
  .action(async (options: ValidateCommandOptions) => {
    await exitWith(runValidateCommand(options));
  });
