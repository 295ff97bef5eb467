/**
 * Prerequisite checks shared by every command that talks to Azure:
 * az installed, Bicep available, signed in.
 */

import {
  getAccount,
  getAzVersion,
  installBicep,
  isBicepAvailable,
  setSubscription,
  AzCliError,
  type AzRunner,
  type AzureAccount,
} from '../azure';
import { PrerequisiteError } from '../errors';
import type { StepReporter } from '../reporter';

export interface PrerequisiteOptions {
  /** Check for Bicep and install it when missing (deployments only) */
  requireBicep?: boolean;
  /** Switch to this subscription before reading the account */
  subscription?: string;
}

export interface PrerequisiteResult {
  azVersion: string;
  bicepInstalled: boolean;
  account: AzureAccount;
}

/**
 * Run the checks in order and stop at the first failure
 */
export async function checkPrerequisites(
  runner: AzRunner,
  reporter: StepReporter,
  options: PrerequisiteOptions = {}
): Promise<PrerequisiteResult> {
  reporter.start('Checking Azure CLI...');
  const azVersion = await getAzVersion(runner);
  if (azVersion === null) {
    reporter.fail('Azure CLI is not installed');
    throw new PrerequisiteError(
      'Azure CLI is not installed.',
      'Install it from https://learn.microsoft.com/cli/azure/install-azure-cli'
    );
  }
  reporter.succeed(`Azure CLI is installed (${azVersion})`);

  let bicepInstalled = false;
  if (options.requireBicep) {
    reporter.start('Checking Bicep...');
    if (!(await isBicepAvailable(runner))) {
      reporter.warn('Bicep is not installed. Installing now...');
      reporter.start('Installing Bicep...');
      try {
        await installBicep(runner);
      } catch (error) {
        reporter.fail('Bicep installation failed');
        const detail = error instanceof AzCliError ? error.message : String(error);
        throw new PrerequisiteError(`Could not install Bicep: ${detail}`, 'Run `az bicep install` manually.');
      }
      bicepInstalled = true;
    }
    reporter.succeed('Bicep is available');
  }

  if (options.subscription) {
    reporter.start(`Selecting subscription ${options.subscription}...`);
    try {
      await setSubscription(runner, options.subscription);
    } catch (error) {
      reporter.fail(`Could not select subscription ${options.subscription}`);
      const detail = error instanceof AzCliError ? error.message : String(error);
      throw new PrerequisiteError(detail, 'Run `az account list` to see available subscriptions.');
    }
  }

  reporter.start('Checking Azure login...');
  const account = await getAccount(runner);
  if (!account) {
    reporter.fail('Not logged in to Azure');
    throw new PrerequisiteError('Not logged in to Azure.', "Run 'az login' first.");
  }
  reporter.succeed(`Logged in to Azure${account.user ? ` as ${account.user}` : ''}`);
  reporter.info(`Current subscription: ${account.subscriptionName} (${account.subscriptionId})`);

  return { azVersion, bicepInstalled, account };
}
