/**
 * Local receipts of the last deployment and the last OIDC setup.
 * Plain JSON under the state directory, for humans and follow-up commands.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import { ConfigError } from '../errors';

export const DEPLOYMENT_RECEIPT_FILE = 'deployment.json';
export const OIDC_RECEIPT_FILE = 'oidc.json';

const deploymentReceiptSchema = z.object({
  resourceGroupName: z.string().min(1),
  webAppName: z.string().min(1),
  webAppUrl: z.string().url(),
  deploymentName: z.string().min(1),
  location: z.string().min(1),
  environment: z.string().min(1),
  subscriptionId: z.string().min(1),
  timestamp: z.string().datetime(),
});

const oidcReceiptSchema = z.object({
  clientId: z.string().min(1),
  tenantId: z.string().min(1),
  subscriptionId: z.string().min(1),
  repository: z.string().regex(/^[^/\s]+\/[^/\s]+$/),
  appObjectId: z.string().min(1),
  servicePrincipalId: z.string().min(1),
  role: z.string().min(1),
  subjects: z.array(z.string()),
  timestamp: z.string().datetime(),
});

export type DeploymentReceipt = z.infer<typeof deploymentReceiptSchema>;
export type OidcReceipt = z.infer<typeof oidcReceiptSchema>;

async function writeReceipt<T>(
  stateDir: string,
  fileName: string,
  schema: z.ZodType<T>,
  receipt: T
): Promise<string> {
  const data = schema.parse(receipt);
  await fs.mkdir(stateDir, { recursive: true });
  const filePath = path.join(stateDir, fileName);
  await fs.writeFile(filePath, JSON.stringify(data, null, 2) + '\n');
  return filePath;
}

async function readReceipt<T>(
  stateDir: string,
  fileName: string,
  schema: z.ZodType<T>
): Promise<T | null> {
  const filePath = path.join(stateDir, fileName);

  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return null;
    }
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch {
    throw new ConfigError(`Receipt ${filePath} is not valid JSON`, `Delete ${filePath} and run the command again.`);
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ConfigError(
      `Receipt ${filePath} is malformed: ${issue ? `${issue.path.join('.')}: ${issue.message}` : 'invalid'}`,
      `Delete ${filePath} and run the command again.`
    );
  }
  return result.data;
}

export function writeDeploymentReceipt(stateDir: string, receipt: DeploymentReceipt): Promise<string> {
  return writeReceipt(stateDir, DEPLOYMENT_RECEIPT_FILE, deploymentReceiptSchema, receipt);
}

export function readDeploymentReceipt(stateDir: string): Promise<DeploymentReceipt | null> {
  return readReceipt(stateDir, DEPLOYMENT_RECEIPT_FILE, deploymentReceiptSchema);
}

export async function removeDeploymentReceipt(stateDir: string): Promise<void> {
  await fs.rm(path.join(stateDir, DEPLOYMENT_RECEIPT_FILE), { force: true });
}

export function writeOidcReceipt(stateDir: string, receipt: OidcReceipt): Promise<string> {
  return writeReceipt(stateDir, OIDC_RECEIPT_FILE, oidcReceiptSchema, receipt);
}

export function readOidcReceipt(stateDir: string): Promise<OidcReceipt | null> {
  return readReceipt(stateDir, OIDC_RECEIPT_FILE, oidcReceiptSchema);
}
