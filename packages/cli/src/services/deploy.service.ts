/**
 * Deploy Service
 *
 * Sequences the az calls for a subscription-level deployment:
 * prerequisites -> local template check -> provider validation ->
 * (what-if) -> deployment -> outputs -> receipt.
 * Every step is fatal on failure; nothing is retried or rolled back.
 */

import { existsSync } from 'fs';
import * as path from 'path';
import {
  findParameterFile,
  formatValidationErrors,
  generateDefaultNames,
  parseParameterFile,
  toCliParameters,
  validateAgainstTemplate,
  type DeploymentOutputs,
  type DeploymentParameters,
  type ParameterValues,
} from '@appship/blueprint';
import {
  AzCliError,
  createSubscriptionDeployment,
  getSubscriptionDeploymentOutputs,
  validateSubscriptionDeployment,
  whatIfSubscriptionDeployment,
  type AzRunner,
  type AzureAccount,
  type SubscriptionDeploymentRequest,
} from '../azure';
import type { CliConfig } from '../config';
import { ConfigError, DeploymentError, TemplateValidationError, errorMessage } from '../errors';
import { createCommandLogger } from '../logger';
import type { StepReporter } from '../reporter';
import { checkPrerequisites } from './prerequisites.service';
import { writeDeploymentReceipt, type DeploymentReceipt } from './receipt.service';

const log = createCommandLogger('deploy');

export interface DeployOptions {
  location?: string;
  resourceGroup?: string;
  name?: string;
  env?: string;
  sku?: string;
  runtime?: string;
  planName?: string;
  template?: string;
  subscription?: string;
  whatIf?: boolean;
  validateOnly?: boolean;
}

export interface DeployContext {
  runner: AzRunner;
  reporter: StepReporter;
  config: CliConfig;
  cwd: string;
  now?: Date;
}

export interface DeploymentPlan {
  deploymentName: string;
  templateFile: string;
  parameterFile: string | null;
  parameters: DeploymentParameters;
  request: SubscriptionDeploymentRequest;
}

export type DeployResult =
  | { status: 'validated'; plan: DeploymentPlan; account: AzureAccount }
  | { status: 'previewed'; plan: DeploymentPlan; account: AzureAccount; preview: string }
  | {
      status: 'deployed';
      plan: DeploymentPlan;
      account: AzureAccount;
      outputs: DeploymentOutputs;
      receipt: DeploymentReceipt;
      receiptPath: string;
    };

/**
 * Merge defaults, the environment's parameter file and command-line options,
 * then check the result against the template. Makes no az calls.
 *
 * Precedence: CLI options > parameter file > configuration defaults.
 */
export function planDeployment(options: DeployOptions, ctx: DeployContext): DeploymentPlan {
  const { config, cwd } = ctx;
  const defaults = generateDefaultNames(ctx.now ?? new Date());
  const environment = options.env ?? config.environment;

  const templateFile = path.resolve(cwd, options.template ?? config.templateFile);
  if (!existsSync(templateFile)) {
    throw new ConfigError(`Template file not found: ${templateFile}`, 'Pass --template or set APPSHIP_TEMPLATE.');
  }

  const parametersDir = path.resolve(cwd, config.parametersDir);
  const parameterFile = findParameterFile(parametersDir, environment);
  if (!parameterFile && options.env) {
    throw new ConfigError(
      `No parameter file for environment "${environment}" in ${parametersDir}`,
      `Create ${path.join(parametersDir, `${environment}.parameters.json`)}.`
    );
  }

  const values: ParameterValues = {
    location: config.location,
    sku: config.sku,
    runtimeVersion: config.runtimeVersion,
    environment,
  };

  if (parameterFile) {
    try {
      Object.assign(values, parseParameterFile(parameterFile));
    } catch (error) {
      throw new TemplateValidationError(errorMessage(error));
    }
  }

  values.resourceGroupName = options.resourceGroup ?? values.resourceGroupName ?? defaults.resourceGroupName;
  values.webAppName = options.name ?? values.webAppName ?? defaults.webAppName;
  if (options.location !== undefined) values.location = options.location;
  if (options.sku !== undefined) values.sku = options.sku;
  if (options.runtime !== undefined) values.runtimeVersion = options.runtime;
  if (options.planName !== undefined) values.appServicePlanName = options.planName;

  const validation = validateAgainstTemplate(templateFile, values);
  if (!validation.valid || !validation.parameters) {
    const details = formatValidationErrors(validation.errors);
    log.warn('Local template check failed', { details });
    throw new TemplateValidationError('Parameters do not satisfy the template.', details);
  }

  const parameters = validation.parameters;
  return {
    deploymentName: defaults.deploymentName,
    templateFile,
    parameterFile,
    parameters,
    request: {
      deploymentName: defaults.deploymentName,
      location: parameters.location,
      templateFile,
      parameters: toCliParameters(parameters),
    },
  };
}

/**
 * Validate with the provider. Rejections become TemplateValidationError.
 */
export async function validateWithProvider(
  plan: DeploymentPlan,
  ctx: DeployContext
): Promise<void> {
  ctx.reporter.start('Validating deployment template...');
  try {
    await validateSubscriptionDeployment(ctx.runner, plan.request);
  } catch (error) {
    ctx.reporter.fail('Template validation failed');
    if (error instanceof AzCliError) {
      throw new TemplateValidationError('Azure rejected the template.', [error.message]);
    }
    throw error;
  }
  ctx.reporter.succeed('Template validation passed');
}

/**
 * Run the full deployment pipeline
 */
export async function runDeployment(options: DeployOptions, ctx: DeployContext): Promise<DeployResult> {
  const { runner, reporter, config } = ctx;

  const { account } = await checkPrerequisites(runner, reporter, {
    requireBicep: true,
    subscription: options.subscription ?? config.subscription,
  });

  const plan = planDeployment(options, ctx);
  reporter.succeed(
    plan.parameterFile
      ? `Parameters resolved (${path.relative(ctx.cwd, plan.parameterFile)})`
      : 'Parameters resolved'
  );
  log.info('Deployment planned', { deploymentName: plan.deploymentName, parameters: plan.parameters });

  await validateWithProvider(plan, ctx);

  if (options.validateOnly) {
    return { status: 'validated', plan, account };
  }

  if (options.whatIf) {
    reporter.start('Computing changes...');
    let preview: string;
    try {
      preview = await whatIfSubscriptionDeployment(runner, plan.request);
    } catch (error) {
      reporter.fail('What-if failed');
      throw new DeploymentError(errorMessage(error));
    }
    reporter.succeed('Change preview ready');
    return { status: 'previewed', plan, account, preview };
  }

  reporter.start(`Deploying ${plan.deploymentName} (this can take a few minutes)...`);
  let provisioningState: string;
  try {
    provisioningState = await createSubscriptionDeployment(runner, plan.request);
  } catch (error) {
    reporter.fail('Deployment failed');
    throw new DeploymentError(
      errorMessage(error),
      `Inspect it with: az deployment sub show --name ${plan.deploymentName}`
    );
  }
  if (provisioningState !== 'Succeeded') {
    reporter.fail(`Deployment finished in state ${provisioningState}`);
    throw new DeploymentError(
      `Deployment ${plan.deploymentName} finished in state ${provisioningState}.`,
      `Inspect it with: az deployment sub show --name ${plan.deploymentName}`
    );
  }
  reporter.succeed('Infrastructure deployment completed');

  reporter.start('Reading deployment outputs...');
  let outputs: DeploymentOutputs;
  try {
    outputs = await getSubscriptionDeploymentOutputs(runner, plan.deploymentName);
  } catch (error) {
    reporter.fail('Could not read deployment outputs');
    throw new DeploymentError(errorMessage(error));
  }
  reporter.succeed('Deployment outputs read');

  const receipt: DeploymentReceipt = {
    resourceGroupName: outputs.resourceGroupName,
    webAppName: outputs.webAppName,
    webAppUrl: outputs.webAppUrl,
    deploymentName: plan.deploymentName,
    location: plan.parameters.location,
    environment: plan.parameters.environment,
    subscriptionId: account.subscriptionId,
    timestamp: (ctx.now ?? new Date()).toISOString(),
  };
  const receiptPath = await writeDeploymentReceipt(path.resolve(ctx.cwd, config.stateDir), receipt);
  log.info('Receipt written', { receiptPath });

  return { status: 'deployed', plan, account, outputs, receipt, receiptPath };
}
