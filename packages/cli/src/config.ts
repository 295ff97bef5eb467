/**
 * CLI configuration
 *
 * Defaults can be overridden through APPSHIP_* environment variables.
 * Command-line options take precedence over both.
 */

import { z } from 'zod';
import {
  APP_SERVICE_SKUS,
  RUNTIME_VERSIONS,
  ENVIRONMENTS,
  type AppServiceSku,
  type EnvironmentName,
  type RuntimeVersion,
} from '@appship/blueprint';
import { ConfigError } from './errors';

export interface OidcDefaults {
  githubOrg: string;
  githubRepo: string;
  appName: string;
  branch: string;
  role: string;
  issuer: string;
  audience: string;
}

export interface CliConfig {
  location: string;
  templateFile: string;
  parametersDir: string;
  stateDir: string;
  sku: AppServiceSku;
  runtimeVersion: RuntimeVersion;
  environment: EnvironmentName;
  subscription?: string;
  /** Per-invocation az timeout, 0 for none */
  azTimeoutMs: number;
  oidc: OidcDefaults;
}

const envSchema = z.object({
  APPSHIP_LOCATION: z.string().min(1).default('East US'),
  APPSHIP_TEMPLATE: z.string().min(1).default('bicep/deploy.bicep'),
  APPSHIP_PARAMETERS_DIR: z.string().min(1).default('bicep/parameters'),
  APPSHIP_STATE_DIR: z.string().min(1).default('.appship'),
  APPSHIP_SKU: z.enum(APP_SERVICE_SKUS).default('B1'),
  APPSHIP_RUNTIME: z.enum(RUNTIME_VERSIONS).default('8.0'),
  APPSHIP_ENVIRONMENT: z.enum(ENVIRONMENTS).default('dev'),
  APPSHIP_SUBSCRIPTION: z.string().min(1).optional(),
  APPSHIP_AZ_TIMEOUT_MS: z.coerce.number().int().nonnegative().default(0),
  APPSHIP_GITHUB_ORG: z.string().min(1).default('my-org'),
  APPSHIP_GITHUB_REPO: z.string().min(1).default('dotnet-webapp'),
  APPSHIP_OIDC_APP_NAME: z.string().min(1).default('github-actions-oidc'),
  APPSHIP_OIDC_BRANCH: z.string().min(1).default('main'),
  APPSHIP_OIDC_ROLE: z.string().min(1).default('Contributor'),
});

export const GITHUB_OIDC_ISSUER = 'https://token.actions.githubusercontent.com';
export const AZURE_TOKEN_AUDIENCE = 'api://AzureADTokenExchange';

/**
 * Build configuration from an environment map
 */
export function buildConfig(env: NodeJS.ProcessEnv = process.env): CliConfig {
  // Empty strings are treated as unset so `APPSHIP_SKU= appship deploy` falls back to defaults.
  const present: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (key.startsWith('APPSHIP_') && value !== undefined && value !== '') {
      present[key] = value;
    }
  }

  const result = envSchema.safeParse(present);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigError(
      `Invalid environment configuration: ${issues.join('; ')}`,
      'Check the APPSHIP_* environment variables.'
    );
  }

  const values = result.data;
  return {
    location: values.APPSHIP_LOCATION,
    templateFile: values.APPSHIP_TEMPLATE,
    parametersDir: values.APPSHIP_PARAMETERS_DIR,
    stateDir: values.APPSHIP_STATE_DIR,
    sku: values.APPSHIP_SKU,
    runtimeVersion: values.APPSHIP_RUNTIME,
    environment: values.APPSHIP_ENVIRONMENT,
    subscription: values.APPSHIP_SUBSCRIPTION,
    azTimeoutMs: values.APPSHIP_AZ_TIMEOUT_MS,
    oidc: {
      githubOrg: values.APPSHIP_GITHUB_ORG,
      githubRepo: values.APPSHIP_GITHUB_REPO,
      appName: values.APPSHIP_OIDC_APP_NAME,
      branch: values.APPSHIP_OIDC_BRANCH,
      role: values.APPSHIP_OIDC_ROLE,
      issuer: GITHUB_OIDC_ISSUER,
      audience: AZURE_TOKEN_AUDIENCE,
    },
  };
}
