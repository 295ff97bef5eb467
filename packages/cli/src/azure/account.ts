/**
 * Azure account and tooling checks
 */

import { z } from 'zod';
import { AzCliError, runAzJson, type AzRunner } from './runner';

export interface AzureAccount {
  subscriptionId: string;
  subscriptionName: string;
  tenantId: string;
  user: string;
}

const accountSchema = z.object({
  id: z.string(),
  name: z.string(),
  tenantId: z.string(),
  user: z.object({ name: z.string() }).optional(),
});

const versionSchema = z.object({
  'azure-cli': z.string(),
});

/**
 * Get the installed az CLI version, or null when az cannot be run
 */
export async function getAzVersion(runner: AzRunner): Promise<string | null> {
  try {
    const parsed = versionSchema.safeParse(await runAzJson(runner, ['version']));
    return parsed.success ? parsed.data['azure-cli'] : 'unknown';
  } catch (error) {
    if (error instanceof AzCliError) {
      return null;
    }
    throw error;
  }
}

/**
 * Check if the Bicep compiler is available to az
 */
export async function isBicepAvailable(runner: AzRunner): Promise<boolean> {
  try {
    await runner.run(['bicep', 'version']);
    return true;
  } catch (error) {
    if (error instanceof AzCliError) {
      return false;
    }
    throw error;
  }
}

/**
 * Install the Bicep compiler through az
 */
export async function installBicep(runner: AzRunner): Promise<void> {
  await runner.run(['bicep', 'install']);
}

/**
 * Get the signed-in account, or null when not logged in
 */
export async function getAccount(runner: AzRunner): Promise<AzureAccount | null> {
  let raw: unknown;
  try {
    raw = await runAzJson(runner, ['account', 'show']);
  } catch (error) {
    if (error instanceof AzCliError && !error.notInstalled) {
      return null;
    }
    throw error;
  }

  const parsed = accountSchema.safeParse(raw);
  if (!parsed.success) {
    return null;
  }

  return {
    subscriptionId: parsed.data.id,
    subscriptionName: parsed.data.name,
    tenantId: parsed.data.tenantId,
    user: parsed.data.user?.name ?? '',
  };
}

/**
 * Set the active subscription
 */
export async function setSubscription(runner: AzRunner, subscription: string): Promise<void> {
  await runner.run(['account', 'set', '--subscription', subscription]);
}
