/**
 * appship deploy
 *
 * Validate and deploy the App Service Plan and Web App, then record the
 * outputs in .appship/deployment.json.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { EXIT_SUCCESS } from '../../errors';
import { planDeployment, runDeployment, type DeployOptions } from '../../services/deploy.service';
import { formatPlan, printDeploymentSummary, printSection } from '../../services/report.service';
import { exitWith, handleCommandError, resolveContext, type CommandDeps } from '../shared';

export interface DeployCommandOptions extends DeployOptions {
  yes?: boolean;
}

export async function runDeployCommand(
  options: DeployCommandOptions,
  deps: CommandDeps = {}
): Promise<number> {
  console.log(chalk.bold('\n  Azure Infrastructure Deployment\n'));
  console.log(chalk.gray('  Deploys an App Service Plan and Web App for a .NET application\n'));

  try {
    const ctx = resolveContext(deps);
    const plan = planDeployment(options, ctx);
    printSection('Deployment Plan', formatPlan(plan));
    console.log();

    const previewOnly = options.whatIf || options.validateOnly;
    if (!options.yes && !previewOnly) {
      const proceed = await ctx.confirm('Do you want to proceed with deployment?');
      if (!proceed) {
        console.log(chalk.gray('\n  Deployment cancelled.\n'));
        return EXIT_SUCCESS;
      }
    }

    const result = await runDeployment(options, ctx);

    switch (result.status) {
      case 'validated':
        console.log(chalk.green('\n  ✅ Template is valid. Nothing was deployed.\n'));
        break;
      case 'previewed':
        printSection('What-if', result.preview.trim().split('\n'));
        console.log(chalk.gray('\n  Nothing was deployed.\n'));
        break;
      case 'deployed':
        printDeploymentSummary(result.receipt, result.receiptPath);
        console.log(chalk.green('  🎉 All done! Your infrastructure is ready for deployment.\n'));
        break;
    }

    return EXIT_SUCCESS;
  } catch (error) {
    return handleCommandError('deploy', error);
  }
}

export const deployCommand = new Command('deploy')
  .description('Validate and deploy the App Service Plan and Web App')
  .option('-l, --location <location>', 'Azure region (default: East US)')
  .option('-g, --resource-group <name>', 'Resource group name (default: rg-dotnet-app-<timestamp>)')
  .option('-n, --name <name>', 'Web app name (default: webapp-dotnet-<timestamp>)')
  .option('-e, --env <environment>', 'Parameter file environment (dev, staging, prod)')
  .option('--sku <sku>', 'App Service Plan pricing tier')
  .option('--runtime <version>', '.NET runtime version')
  .option('--plan-name <name>', 'App Service Plan name (default: asp-<web app name>)')
  .option('-t, --template <path>', 'Subscription-level Bicep template')
  .option('-s, --subscription <id>', 'Subscription to deploy into')
  .option('--what-if', 'Preview changes without deploying')
  .option('--validate-only', 'Validate the template without deploying')
  .option('-y, --yes', 'Skip confirmation prompt')
  .action(async (options: DeployCommandOptions) => {
    await exitWith(runDeployCommand(options));
  });
