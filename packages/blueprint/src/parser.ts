/**
 * appship Blueprint Parser
 * Reads parameter files and validates deployment parameters
 */

import { readFileSync, existsSync } from 'fs';
import { resolve } from 'path';
import { z } from 'zod';
import {
  APP_SERVICE_SKUS,
  RUNTIME_VERSIONS,
  ENVIRONMENTS,
  OUTPUT_NAMES,
  type DeploymentParameters,
  type DeploymentOutputs,
  type ParameterValues,
  type ValidationError,
  type ValidationResult,
} from './schema.js';

const parameterFileSchema = z.object({
  $schema: z.string().optional(),
  contentVersion: z.string().optional(),
  parameters: z.record(z.object({ value: z.unknown() })),
});

const deploymentOutputsSchema = z.record(
  z.object({
    type: z.string().optional(),
    value: z.unknown(),
  })
);

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Candidate file names for an environment's parameter file
 */
function parameterFileNames(environment: string): string[] {
  return [`${environment}.parameters.json`, `${environment}.json`];
}

/**
 * Find the parameter file for an environment in the given directory
 */
export function findParameterFile(dir: string, environment: string): string | null {
  for (const filename of parameterFileNames(environment)) {
    const filepath = resolve(dir, filename);
    if (existsSync(filepath)) {
      return filepath;
    }
  }
  return null;
}

/**
 * Parse an ARM deployment parameter file into a flat name -> value map
 */
export function parseParameterFile(filePath: string): ParameterValues {
  if (!existsSync(filePath)) {
    throw new Error(`Parameter file not found: ${filePath}`);
  }

  const content = readFileSync(filePath, 'utf-8');

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`Invalid JSON in parameter file ${filePath}: ${message}`);
  }

  const result = parameterFileSchema.safeParse(parsed);
  if (!result.success) {
    throw new Error(`Invalid parameter file ${filePath}: ${formatIssues(result.error)}`);
  }

  const values: ParameterValues = {};
  for (const [name, entry] of Object.entries(result.data.parameters)) {
    values[name] = entry.value;
  }
  return values;
}

// =============================================================================
// Validation
// =============================================================================

export interface ParameterValidationResult extends ValidationResult {
  parameters?: DeploymentParameters;
}

function isOneOf<T extends string>(allowed: readonly T[], value: unknown): value is T {
  const list: readonly unknown[] = allowed;
  return typeof value === 'string' && list.includes(value);
}

function isStringRecord(value: unknown): value is Record<string, string> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  return Object.values(value).every((v) => typeof v === 'string');
}

/**
 * Resource group names: 1-90 chars, alphanumerics, underscores, hyphens,
 * periods and parentheses, not ending in a period
 */
export function isValidResourceGroupName(name: string): boolean {
  return name.length <= 90 && /^[-\w.()]+$/.test(name) && !name.endsWith('.');
}

/**
 * Web app names: 2-60 chars, alphanumerics and hyphens,
 * no leading or trailing hyphen
 */
export function isValidWebAppName(name: string): boolean {
  return (
    name.length >= 2 &&
    name.length <= 60 &&
    /^[a-zA-Z0-9][a-zA-Z0-9-]*[a-zA-Z0-9]$/.test(name)
  );
}

function requireString(
  values: ParameterValues,
  key: string,
  errors: ValidationError[]
): string | undefined {
  const value = values[key];
  if (value === undefined || value === null || value === '') {
    errors.push({ path: key, message: `${key} is required` });
    return undefined;
  }
  if (typeof value !== 'string') {
    errors.push({ path: key, message: `${key} must be a string`, value });
    return undefined;
  }
  return value;
}

function requireAllowed<T extends string>(
  values: ParameterValues,
  key: string,
  allowed: readonly T[],
  errors: ValidationError[]
): T | undefined {
  const value = values[key];
  if (value === undefined || value === null || value === '') {
    errors.push({ path: key, message: `${key} is required` });
    return undefined;
  }
  if (!isOneOf(allowed, value)) {
    errors.push({
      path: key,
      message: `${key} must be one of: ${allowed.join(', ')}`,
      value,
    });
    return undefined;
  }
  return value;
}

/**
 * Validate merged deployment parameters against the template's rules
 */
export function validateParameters(values: ParameterValues): ParameterValidationResult {
  const errors: ValidationError[] = [];

  const resourceGroupName = requireString(values, 'resourceGroupName', errors);
  if (resourceGroupName !== undefined && !isValidResourceGroupName(resourceGroupName)) {
    errors.push({
      path: 'resourceGroupName',
      message:
        'resourceGroupName must be 1-90 chars of letters, digits, _ - . ( ) and not end with a period',
      value: resourceGroupName,
    });
  }

  const location = requireString(values, 'location', errors);

  const webAppName = requireString(values, 'webAppName', errors);
  if (webAppName !== undefined && !isValidWebAppName(webAppName)) {
    errors.push({
      path: 'webAppName',
      message:
        'webAppName must be 2-60 chars of letters, digits and hyphens, starting and ending with a letter or digit',
      value: webAppName,
    });
  }

  const sku = requireAllowed(values, 'sku', APP_SERVICE_SKUS, errors);
  const runtimeVersion = requireAllowed(values, 'runtimeVersion', RUNTIME_VERSIONS, errors);
  const environment = requireAllowed(values, 'environment', ENVIRONMENTS, errors);

  let appServicePlanName: string | undefined;
  const rawPlanName = values.appServicePlanName;
  if (rawPlanName !== undefined && rawPlanName !== '') {
    if (typeof rawPlanName !== 'string' || rawPlanName.length > 40 || !/^[-\w]+$/.test(rawPlanName)) {
      errors.push({
        path: 'appServicePlanName',
        message: 'appServicePlanName must be 1-40 chars of letters, digits, _ and -',
        value: rawPlanName,
      });
    } else {
      appServicePlanName = rawPlanName;
    }
  }

  let tags: Record<string, string> | undefined;
  if (values.tags !== undefined) {
    if (!isStringRecord(values.tags)) {
      errors.push({ path: 'tags', message: 'tags must be an object of string values', value: values.tags });
    } else {
      tags = values.tags;
    }
  }

  const known = new Set([
    'resourceGroupName',
    'location',
    'webAppName',
    'sku',
    'runtimeVersion',
    'environment',
    'appServicePlanName',
    'tags',
  ]);
  for (const key of Object.keys(values)) {
    if (!known.has(key)) {
      errors.push({ path: key, message: `Unknown parameter: ${key}` });
    }
  }

  if (
    errors.length > 0 ||
    resourceGroupName === undefined ||
    location === undefined ||
    webAppName === undefined ||
    sku === undefined ||
    runtimeVersion === undefined ||
    environment === undefined
  ) {
    return { valid: false, errors };
  }

  const parameters: DeploymentParameters = {
    resourceGroupName,
    location,
    webAppName,
    sku,
    runtimeVersion,
    environment,
  };
  if (appServicePlanName !== undefined) {
    parameters.appServicePlanName = appServicePlanName;
  }
  if (tags !== undefined) {
    parameters.tags = tags;
  }

  return { valid: true, errors, parameters };
}

// =============================================================================
// CLI Arguments / Outputs
// =============================================================================

/**
 * Render parameters as `name=value` arguments for `az deployment ... --parameters`
 */
export function toCliParameters(params: DeploymentParameters): string[] {
  const args = [
    `resourceGroupName=${params.resourceGroupName}`,
    `location=${params.location}`,
    `webAppName=${params.webAppName}`,
    `sku=${params.sku}`,
    `runtimeVersion=${params.runtimeVersion}`,
    `environment=${params.environment}`,
  ];

  if (params.appServicePlanName) {
    args.push(`appServicePlanName=${params.appServicePlanName}`);
  }
  if (params.tags && Object.keys(params.tags).length > 0) {
    args.push(`tags=${JSON.stringify(params.tags)}`);
  }

  return args;
}

/**
 * Convert the provider's `{ name: { type, value } }` outputs map
 */
export function outputsFromDeployment(raw: unknown): DeploymentOutputs {
  const result = deploymentOutputsSchema.safeParse(raw);
  if (!result.success) {
    throw new Error(`Unexpected deployment outputs: ${formatIssues(result.error)}`);
  }

  const read = (name: keyof DeploymentOutputs): string => {
    const entry = result.data[name];
    if (!entry || typeof entry.value !== 'string' || entry.value === '') {
      throw new Error(`Deployment output "${name}" is missing`);
    }
    return entry.value;
  };

  const outputs: DeploymentOutputs = {
    webAppUrl: '',
    webAppName: '',
    resourceGroupName: '',
  };
  for (const name of OUTPUT_NAMES) {
    outputs[name] = read(name);
  }
  return outputs;
}
