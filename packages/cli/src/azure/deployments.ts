/**
 * Subscription-scope deployments and the resources they create
 */

import { z } from 'zod';
import { outputsFromDeployment, type DeploymentOutputs } from '@appship/blueprint';
import { AzCliError, runAzJson, runAzTsv, type AzRunner } from './runner';

export interface SubscriptionDeploymentRequest {
  deploymentName: string;
  location: string;
  templateFile: string;
  /** `name=value` pairs, or `@file` references */
  parameters: string[];
}

export interface WebAppInfo {
  name: string;
  state: string;
  defaultHostName: string;
  httpsOnly: boolean;
}

const webAppSchema = z.object({
  name: z.string(),
  state: z.string(),
  defaultHostName: z.string(),
  httpsOnly: z.boolean().optional(),
});

const deploymentSchema = z.object({
  name: z.string(),
  properties: z.object({
    provisioningState: z.string(),
    outputs: z.unknown().optional(),
  }),
});

function deploymentArgs(request: SubscriptionDeploymentRequest): string[] {
  return [
    '--location',
    request.location,
    '--template-file',
    request.templateFile,
    '--parameters',
    ...request.parameters,
  ];
}

/**
 * Validate a subscription-level deployment with the provider
 */
export async function validateSubscriptionDeployment(
  runner: AzRunner,
  request: SubscriptionDeploymentRequest
): Promise<void> {
  await runAzJson(runner, [
    'deployment',
    'sub',
    'validate',
    '--name',
    request.deploymentName,
    ...deploymentArgs(request),
  ]);
}

/**
 * Preview the changes a deployment would make
 */
export async function whatIfSubscriptionDeployment(
  runner: AzRunner,
  request: SubscriptionDeploymentRequest
): Promise<string> {
  const { stdout } = await runner.run([
    'deployment',
    'sub',
    'what-if',
    '--name',
    request.deploymentName,
    ...deploymentArgs(request),
    '--no-pretty-print',
  ]);
  return stdout;
}

/**
 * Submit a subscription-level deployment and wait for it to finish
 */
export async function createSubscriptionDeployment(
  runner: AzRunner,
  request: SubscriptionDeploymentRequest
): Promise<string> {
  const raw = await runAzJson(runner, [
    'deployment',
    'sub',
    'create',
    '--name',
    request.deploymentName,
    ...deploymentArgs(request),
  ]);

  const parsed = deploymentSchema.safeParse(raw);
  return parsed.success ? parsed.data.properties.provisioningState : 'Unknown';
}

/**
 * Read the outputs of a finished deployment
 */
export async function getSubscriptionDeploymentOutputs(
  runner: AzRunner,
  deploymentName: string
): Promise<DeploymentOutputs> {
  const raw = await runAzJson(runner, [
    'deployment',
    'sub',
    'show',
    '--name',
    deploymentName,
    '--query',
    'properties.outputs',
  ]);
  return outputsFromDeployment(raw);
}

/**
 * Check whether a resource group exists
 */
export async function resourceGroupExists(runner: AzRunner, name: string): Promise<boolean> {
  const value = await runAzTsv(runner, ['group', 'exists', '--name', name]);
  return value === 'true';
}

/**
 * Start deleting a resource group without waiting for completion
 */
export async function deleteResourceGroup(runner: AzRunner, name: string): Promise<void> {
  await runner.run(['group', 'delete', '--name', name, '--yes', '--no-wait']);
}

/**
 * Get a web app's current state, or null when it does not exist
 */
export async function getWebApp(
  runner: AzRunner,
  resourceGroupName: string,
  webAppName: string
): Promise<WebAppInfo | null> {
  let raw: unknown;
  try {
    raw = await runAzJson(runner, [
      'webapp',
      'show',
      '--resource-group',
      resourceGroupName,
      '--name',
      webAppName,
    ]);
  } catch (error) {
    if (error instanceof AzCliError && !error.notInstalled) {
      return null;
    }
    throw error;
  }

  const parsed = webAppSchema.safeParse(raw);
  if (!parsed.success) {
    return null;
  }
  return {
    name: parsed.data.name,
    state: parsed.data.state,
    defaultHostName: parsed.data.defaultHostName,
    httpsOnly: parsed.data.httpsOnly ?? false,
  };
}
