/**
 * appship Blueprint Schema
 * Types for the App Service templates, their parameters and outputs
 */

// =============================================================================
// Allow-lists (must match the @allowed decorators in bicep/)
// =============================================================================

export const APP_SERVICE_SKUS = [
  'F1',
  'B1',
  'B2',
  'B3',
  'S1',
  'S2',
  'S3',
  'P1v3',
  'P2v3',
  'P3v3',
] as const;

export const RUNTIME_VERSIONS = ['6.0', '7.0', '8.0'] as const;

export const ENVIRONMENTS = ['dev', 'staging', 'prod'] as const;

export type AppServiceSku = (typeof APP_SERVICE_SKUS)[number];
export type RuntimeVersion = (typeof RUNTIME_VERSIONS)[number];
export type EnvironmentName = (typeof ENVIRONMENTS)[number];

// =============================================================================
// Template Inputs / Outputs
// =============================================================================

/**
 * Named inputs of bicep/deploy.bicep
 */
export interface DeploymentParameters {
  resourceGroupName: string;
  location: string;
  webAppName: string;
  sku: AppServiceSku;
  runtimeVersion: RuntimeVersion;
  environment: EnvironmentName;
  appServicePlanName?: string;
  tags?: Record<string, string>;
}

/**
 * Parameters as read from a parameter file or the command line,
 * before validation
 */
export type ParameterValues = Record<string, unknown>;

/**
 * Named outputs of bicep/deploy.bicep
 */
export interface DeploymentOutputs {
  webAppUrl: string;
  webAppName: string;
  resourceGroupName: string;
}

export const OUTPUT_NAMES: ReadonlyArray<keyof DeploymentOutputs> = [
  'webAppUrl',
  'webAppName',
  'resourceGroupName',
];

export interface DefaultNames {
  timestamp: string;
  resourceGroupName: string;
  webAppName: string;
  deploymentName: string;
}

// =============================================================================
// Parsed Templates
// =============================================================================

export type TemplateScope = 'subscription' | 'resourceGroup' | 'managementGroup' | 'tenant';

export interface TemplateParameter {
  name: string;
  type: string;
  /** Literal default, or the raw expression when it is not a literal */
  defaultValue?: unknown;
  hasDefault: boolean;
  allowed?: string[];
  minLength?: number;
  maxLength?: number;
  description?: string;
}

export interface TemplateOutput {
  name: string;
  type: string;
  expression: string;
}

export interface TemplateModule {
  symbol: string;
  path: string;
}

export interface TemplateInfo {
  targetScope: TemplateScope;
  parameters: TemplateParameter[];
  outputs: TemplateOutput[];
  modules: TemplateModule[];
}

// =============================================================================
// Validation
// =============================================================================

export interface ValidationError {
  path: string;
  message: string;
  value?: unknown;
}

export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
}
