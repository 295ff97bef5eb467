/**
 * appship oidc
 *
 * Configure GitHub Actions to log in to Azure with federated credentials
 * instead of a stored secret.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import * as path from 'path';
import { ConfigError, EXIT_SUCCESS } from '../../errors';
import {
  branchSubject,
  pullRequestSubject,
  setupOidc,
  type OidcSetupOptions,
} from '../../services/oidc.service';
import { readOidcReceipt } from '../../services/receipt.service';
import { formatGithubSecrets, formatOidcReport, printSection } from '../../services/report.service';
import { exitWith, handleCommandError, resolveContext, type CommandDeps } from '../shared';

export interface OidcSetupCommandOptions extends OidcSetupOptions {
  yes?: boolean;
}

export async function runOidcSetupCommand(
  options: OidcSetupCommandOptions,
  deps: CommandDeps = {}
): Promise<number> {
  console.log(chalk.bold('\n  GitHub Actions OIDC Setup\n'));

  try {
    const ctx = resolveContext(deps);
    const target = {
      org: options.org ?? ctx.config.oidc.githubOrg,
      repo: options.repo ?? ctx.config.oidc.githubRepo,
      branch: options.branch ?? ctx.config.oidc.branch,
    };

    printSection('Plan', [
      `Application:  ${options.appName ?? ctx.config.oidc.appName}`,
      `Repository:   ${target.org}/${target.repo}`,
      `Role:         ${options.role ?? ctx.config.oidc.role} on the current subscription`,
      `Subjects:     ${branchSubject(target)}`,
      `              ${pullRequestSubject(target)}`,
    ]);
    console.log();

    if (!options.yes) {
      const proceed = await ctx.confirm('Create or update these identities?');
      if (!proceed) {
        console.log(chalk.gray('\n  Cancelled.\n'));
        return EXIT_SUCCESS;
      }
    }

    const result = await setupOidc(options, ctx);

    console.log(chalk.green('\n  ✅ OIDC configuration complete'));
    printSection('Identifiers', formatOidcReport(result.receipt));
    printSection('Add these GitHub repository secrets', formatGithubSecrets(result.receipt));
    console.log(chalk.gray(`\n  Receipt written to ${result.receiptPath}\n`));

    return EXIT_SUCCESS;
  } catch (error) {
    return handleCommandError('oidc setup', error);
  }
}

export interface OidcShowCommandOptions {
  json?: boolean;
}

export async function runOidcShowCommand(
  options: OidcShowCommandOptions,
  deps: CommandDeps = {}
): Promise<number> {
  try {
    const ctx = resolveContext(deps);
    const receipt = await readOidcReceipt(path.resolve(ctx.cwd, ctx.config.stateDir));
    if (!receipt) {
      throw new ConfigError('No OIDC setup recorded.', 'Run `appship oidc setup` first.');
    }

    if (options.json) {
      console.log(JSON.stringify(receipt, null, 2));
    } else {
      printSection('OIDC Configuration', formatOidcReport(receipt));
      printSection('GitHub repository secrets', formatGithubSecrets(receipt));
      console.log();
    }
    return EXIT_SUCCESS;
  } catch (error) {
    return handleCommandError('oidc show', error);
  }
}

const setupCommand = new Command('setup')
  .description('Create the app registration, service principal, role and federated credentials')
  .option('--org <org>', 'GitHub organization or user')
  .option('--repo <repo>', 'GitHub repository')
  .option('--app-name <name>', 'Application display name')
  .option('--branch <branch>', 'Branch trusted for deployments')
  .option('--role <role>', 'Role assigned on the subscription')
  .option('-s, --subscription <id>', 'Subscription to grant access to')
  .option('-y, --yes', 'Skip confirmation prompt')
  .action(async (options: OidcSetupCommandOptions) => {
    await exitWith(runOidcSetupCommand(options));
  });

const showCommand = new Command('show')
  .description('Show the recorded OIDC identifiers')
  .option('--json', 'Output as JSON')
  .action(async (options: OidcShowCommandOptions) => {
    await exitWith(runOidcShowCommand(options));
  });

export const oidcCommand = new Command('oidc')
  .description('Configure GitHub Actions OIDC federation')
  .addCommand(setupCommand)
  .addCommand(showCommand);
