/**
 * Centralized naming utilities for the deployed resources.
 *
 * Default names carry a second-resolution timestamp so repeated runs
 * never collide with an earlier deployment.
 */

import type { DefaultNames } from './schema.js';

const RESOURCE_GROUP_PREFIX = 'rg-dotnet-app';
const WEB_APP_PREFIX = 'webapp-dotnet';
const DEPLOYMENT_PREFIX = 'infrastructure-deployment';

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Format a date as YYYYMMDDHHMMSS in local time.
 */
export function formatTimestamp(date: Date): string {
  return (
    String(date.getFullYear()) +
    pad(date.getMonth() + 1) +
    pad(date.getDate()) +
    pad(date.getHours()) +
    pad(date.getMinutes()) +
    pad(date.getSeconds())
  );
}

/**
 * Get the default resource group, web app and deployment names.
 * Pattern: ${prefix}-${timestamp}
 */
export function generateDefaultNames(date: Date = new Date()): DefaultNames {
  const timestamp = formatTimestamp(date);
  return {
    timestamp,
    resourceGroupName: `${RESOURCE_GROUP_PREFIX}-${timestamp}`,
    webAppName: `${WEB_APP_PREFIX}-${timestamp}`,
    deploymentName: `${DEPLOYMENT_PREFIX}-${timestamp}`,
  };
}

/**
 * Get the App Service Plan name.
 * Pattern: asp-${webAppName}
 */
export function getAppServicePlanName(webAppName: string): string {
  return `asp-${webAppName}`;
}

/**
 * Get the public URL of a web app on the default domain.
 */
export function getWebAppUrl(webAppName: string): string {
  return `https://${webAppName}.azurewebsites.net`;
}
