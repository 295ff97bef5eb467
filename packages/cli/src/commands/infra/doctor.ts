/**
 * appship doctor
 *
 * Run health checks on the local toolchain, the Azure login and the
 * templates. Identifies issues before they cause deploy failures.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import * as path from 'path';
import {
  ENVIRONMENTS,
  findParameterFile,
  formatValidationErrors,
  parseParameterFile,
  parseTemplateFile,
  validateParameters,
} from '@appship/blueprint';
import { getAccount, getAzVersion, installBicep, isBicepAvailable } from '../../azure';
import { EXIT_FAILURE, EXIT_SUCCESS, errorMessage } from '../../errors';
import { exitWith, handleCommandError, resolveContext, type CommandContext, type CommandDeps } from '../shared';

export interface CheckResult {
  name: string;
  status: 'ok' | 'warn' | 'fail';
  message: string;
  fix?: string;
}

export interface DoctorOptions {
  fix?: boolean;
}

const MIN_NODE_MAJOR = 20;

function checkNode(): CheckResult {
  const major = Number(process.versions.node.split('.')[0]);
  if (major >= MIN_NODE_MAJOR) {
    return { name: 'Node.js', status: 'ok', message: `v${process.versions.node}` };
  }
  return {
    name: 'Node.js',
    status: 'fail',
    message: `v${process.versions.node} is older than ${MIN_NODE_MAJOR}`,
    fix: `Install Node.js ${MIN_NODE_MAJOR} or newer`,
  };
}

async function checkAzure(ctx: CommandContext, options: DoctorOptions): Promise<CheckResult[]> {
  const version = await getAzVersion(ctx.runner);
  if (version === null) {
    return [
      {
        name: 'Azure CLI',
        status: 'fail',
        message: 'az not found',
        fix: 'Install from https://learn.microsoft.com/cli/azure/install-azure-cli',
      },
    ];
  }

  const results: CheckResult[] = [{ name: 'Azure CLI', status: 'ok', message: version }];

  let bicep = await isBicepAvailable(ctx.runner);
  let installFailure: string | null = null;
  if (!bicep && options.fix) {
    try {
      await installBicep(ctx.runner);
      bicep = await isBicepAvailable(ctx.runner);
    } catch (error) {
      installFailure = errorMessage(error);
    }
  }
  if (installFailure !== null) {
    results.push({ name: 'Bicep', status: 'fail', message: installFailure, fix: 'az bicep install' });
  } else {
    results.push(
      bicep
        ? { name: 'Bicep', status: 'ok', message: 'available' }
        : { name: 'Bicep', status: 'warn', message: 'not installed', fix: 'az bicep install' }
    );
  }

  const account = await getAccount(ctx.runner);
  results.push(
    account
      ? {
          name: 'Azure login',
          status: 'ok',
          message: `${account.user || 'signed in'} on ${account.subscriptionName} (${account.subscriptionId})`,
        }
      : { name: 'Azure login', status: 'fail', message: 'not logged in', fix: 'az login' }
  );

  return results;
}

function checkTemplates(ctx: CommandContext): CheckResult[] {
  const results: CheckResult[] = [];
  const templateFile = path.resolve(ctx.cwd, ctx.config.templateFile);

  try {
    const info = parseTemplateFile(templateFile);
    results.push({
      name: 'Template',
      status: info.targetScope === 'subscription' ? 'ok' : 'fail',
      message: `${path.relative(ctx.cwd, templateFile)}: ${info.parameters.length} parameters, ${info.outputs.length} outputs, scope ${info.targetScope}`,
      ...(info.targetScope === 'subscription' ? {} : { fix: "Set targetScope = 'subscription'" }),
    });
  } catch (error) {
    results.push({ name: 'Template', status: 'fail', message: errorMessage(error), fix: 'Pass --template or set APPSHIP_TEMPLATE' });
  }

  const parametersDir = path.resolve(ctx.cwd, ctx.config.parametersDir);
  for (const environment of ENVIRONMENTS) {
    const name = `Parameters (${environment})`;
    const filePath = findParameterFile(parametersDir, environment);
    if (!filePath) {
      results.push({ name, status: 'warn', message: 'no parameter file', fix: `Create ${environment}.parameters.json` });
      continue;
    }

    try {
      const values = parseParameterFile(filePath);
      const validation = validateParameters({
        location: ctx.config.location,
        sku: ctx.config.sku,
        runtimeVersion: ctx.config.runtimeVersion,
        environment,
        resourceGroupName: 'rg-doctor',
        webAppName: 'webapp-doctor',
        ...values,
      });
      results.push(
        validation.valid
          ? { name, status: 'ok', message: path.relative(ctx.cwd, filePath) }
          : { name, status: 'fail', message: formatValidationErrors(validation.errors).join('; ') }
      );
    } catch (error) {
      results.push({ name, status: 'fail', message: errorMessage(error) });
    }
  }

  return results;
}

/**
 * Run every check without printing
 */
export async function collectChecks(ctx: CommandContext, options: DoctorOptions): Promise<CheckResult[]> {
  return [checkNode(), ...(await checkAzure(ctx, options)), ...checkTemplates(ctx)];
}

function displayResult(result: CheckResult): void {
  const icon =
    result.status === 'ok' ? chalk.green('✓') : result.status === 'warn' ? chalk.yellow('⚠') : chalk.red('✗');
  console.log(`  ${icon} ${result.name}: ${chalk.gray(result.message)}`);
}

export async function runDoctorCommand(options: DoctorOptions, deps: CommandDeps = {}): Promise<number> {
  console.log(chalk.bold('\n  appship Doctor\n'));

  try {
    const ctx = resolveContext(deps);
    const results = await collectChecks(ctx, options);
    results.forEach(displayResult);

    const passed = results.filter((r) => r.status === 'ok').length;
    const warnings = results.filter((r) => r.status === 'warn');
    const failed = results.filter((r) => r.status === 'fail');

    console.log(chalk.bold('\n  Summary\n'));
    console.log(chalk.green(`  ✓ ${passed} checks passed`));
    if (warnings.length > 0) console.log(chalk.yellow(`  ⚠ ${warnings.length} warnings`));
    if (failed.length > 0) console.log(chalk.red(`  ✗ ${failed.length} checks failed`));

    const fixes = [...failed, ...warnings].filter((r) => r.fix);
    if (fixes.length > 0) {
      console.log(chalk.bold('\n  Recommended Actions\n'));
      for (const result of fixes) {
        console.log(chalk.gray(`  ${result.name}:`));
        console.log(chalk.cyan(`    ${result.fix}`));
      }
    }
    console.log();

    return failed.length > 0 ? EXIT_FAILURE : EXIT_SUCCESS;
  } catch (error) {
    return handleCommandError('doctor', error);
  }
}

export const doctorCommand = new Command('doctor')
  .description('Check prerequisites, Azure login and templates')
  .option('--fix', 'Install Bicep when it is missing')
  .action(async (options: DoctorOptions) => {
    await exitWith(runDoctorCommand(options));
  });
