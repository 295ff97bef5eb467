/**
 * @appship/blueprint
 * Template contract, parameter handling and naming for the App Service deployment
 */

// Schema types
export {
  APP_SERVICE_SKUS,
  RUNTIME_VERSIONS,
  ENVIRONMENTS,
  OUTPUT_NAMES,
} from './schema.js';
export type {
  AppServiceSku,
  RuntimeVersion,
  EnvironmentName,
  DeploymentParameters,
  DeploymentOutputs,
  ParameterValues,
  DefaultNames,
  TemplateScope,
  TemplateParameter,
  TemplateOutput,
  TemplateModule,
  TemplateInfo,
  ValidationResult,
  ValidationError,
} from './schema.js';

// Naming
export {
  formatTimestamp,
  generateDefaultNames,
  getAppServicePlanName,
  getWebAppUrl,
} from './naming.js';

// Parser
export {
  findParameterFile,
  parseParameterFile,
  validateParameters,
  isValidResourceGroupName,
  isValidWebAppName,
  toCliParameters,
  outputsFromDeployment,
  type ParameterValidationResult,
} from './parser.js';

// Templates
export {
  parseTemplate,
  parseTemplateFile,
  resolveModulePath,
  checkParametersAgainstTemplate,
} from './template.js';

// =============================================================================
// Convenience Functions
// =============================================================================

import { validateParameters } from './parser.js';
import { parseTemplateFile, checkParametersAgainstTemplate } from './template.js';
import type { ParameterValues, ValidationError } from './schema.js';
import type { ParameterValidationResult } from './parser.js';

/**
 * Validate parameters against both the schema rules and the template file's
 * own declarations
 */
export function validateAgainstTemplate(
  templatePath: string,
  values: ParameterValues
): ParameterValidationResult {
  const schemaResult = validateParameters(values);
  const templateResult = checkParametersAgainstTemplate(parseTemplateFile(templatePath), values);

  const errors: ValidationError[] = [...schemaResult.errors];
  for (const error of templateResult.errors) {
    if (!errors.some((e) => e.path === error.path)) {
      errors.push(error);
    }
  }

  if (errors.length > 0) {
    return { valid: false, errors };
  }
  return schemaResult;
}

/**
 * Format validation errors one per line
 */
export function formatValidationErrors(errors: ValidationError[]): string[] {
  return errors.map((e) => `${e.path}: ${e.message}`);
}
