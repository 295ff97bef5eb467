/**
 * Human-readable reports printed after a command finishes
 */

import chalk from 'chalk';
import { getAppServicePlanName, getWebAppUrl } from '@appship/blueprint';
import type { DeploymentPlan } from './deploy.service';
import type { DeploymentReceipt, OidcReceipt } from './receipt.service';

export function formatPlan(plan: DeploymentPlan): string[] {
  const { parameters } = plan;
  return [
    `Resource Group: ${parameters.resourceGroupName}`,
    `Web App Name:   ${parameters.webAppName}`,
    `Plan Name:      ${parameters.appServicePlanName ?? getAppServicePlanName(parameters.webAppName)}`,
    `Location:       ${parameters.location}`,
    `Pricing Tier:   ${parameters.sku}`,
    `Runtime:        .NET ${parameters.runtimeVersion}`,
    `Environment:    ${parameters.environment}`,
    `Deployment:     ${plan.deploymentName}`,
    `Expected URL:   ${getWebAppUrl(parameters.webAppName)}`,
  ];
}

export function formatDeploymentReport(receipt: DeploymentReceipt): string[] {
  return [
    `🌐 Web App URL: ${receipt.webAppUrl}`,
    `📱 Web App Name: ${receipt.webAppName}`,
    `📦 Resource Group: ${receipt.resourceGroupName}`,
    `🕒 Deployment Name: ${receipt.deploymentName}`,
  ];
}

export function formatNextSteps(receipt: DeploymentReceipt): string[] {
  return [
    '1. Build and publish your .NET application',
    '   dotnet publish -c Release -o ./publish && (cd publish && zip -r ../publish.zip .)',
    '2. Deploy your application using:',
    '   az webapp deployment source config-zip \\',
    `     --resource-group "${receipt.resourceGroupName}" \\`,
    `     --name "${receipt.webAppName}" \\`,
    '     --src "./publish.zip"',
  ];
}

export function formatCleanup(resourceGroupName: string): string {
  return `az group delete --name "${resourceGroupName}" --yes --no-wait`;
}

export function formatOidcReport(receipt: OidcReceipt): string[] {
  return [
    `Application (client) ID: ${receipt.clientId}`,
    `Tenant ID:               ${receipt.tenantId}`,
    `Subscription ID:         ${receipt.subscriptionId}`,
    `Repository:              ${receipt.repository}`,
    `Role:                    ${receipt.role}`,
    ...receipt.subjects.map((subject) => `Trusted subject:         ${subject}`),
  ];
}

export function formatGithubSecrets(receipt: OidcReceipt): string[] {
  return [
    `AZURE_CLIENT_ID=${receipt.clientId}`,
    `AZURE_TENANT_ID=${receipt.tenantId}`,
    `AZURE_SUBSCRIPTION_ID=${receipt.subscriptionId}`,
  ];
}

/**
 * Print a titled, indented block
 */
export function printSection(title: string, lines: string[]): void {
  console.log(chalk.bold(`\n  ${title}\n`));
  for (const line of lines) {
    console.log(`  ${line}`);
  }
}

export function printDeploymentSummary(receipt: DeploymentReceipt, receiptPath: string): void {
  console.log(chalk.green('\n  ✅ Deployment completed successfully!'));
  printSection('Deployment Details', formatDeploymentReport(receipt));
  printSection('Next Steps', formatNextSteps(receipt));
  printSection('To clean up resources later', [formatCleanup(receipt.resourceGroupName)]);
  console.log(chalk.gray(`\n  Receipt written to ${receiptPath}\n`));
}
