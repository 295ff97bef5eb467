/**
 * Bicep template inspection
 *
 * Reads the declarations that form the template's contract (target scope,
 * parameters with their decorators, outputs, modules). Resource bodies and
 * expressions are left to the provider's compiler.
 */

import { readFileSync, existsSync } from 'fs';
import { dirname, resolve } from 'path';
import type {
  ParameterValues,
  TemplateInfo,
  TemplateModule,
  TemplateOutput,
  TemplateParameter,
  TemplateScope,
  ValidationError,
  ValidationResult,
} from './schema.js';

interface PendingDecorators {
  allowed?: string[];
  minLength?: number;
  maxLength?: number;
  description?: string;
}

const SCOPES: readonly TemplateScope[] = ['subscription', 'resourceGroup', 'managementGroup', 'tenant'];

function isScope(value: string): value is TemplateScope {
  const scopes: readonly string[] = SCOPES;
  return scopes.includes(value);
}

/**
 * Remove a trailing `//` comment, ignoring `//` inside quoted strings
 */
function stripLineComment(line: string): string {
  let inString = false;
  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (ch === '\\' && inString) {
      i++;
      continue;
    }
    if (ch === "'") {
      inString = !inString;
    } else if (!inString && ch === '/' && line[i + 1] === '/') {
      return line.slice(0, i);
    }
  }
  return line;
}

function extractQuoted(text: string): string[] {
  const items: string[] = [];
  for (const match of text.matchAll(/'((?:[^'\\]|\\.)*)'/g)) {
    items.push(match[1]);
  }
  return items;
}

function parseLiteral(expression: string): unknown {
  const trimmed = expression.trim();
  const str = trimmed.match(/^'((?:[^'\\]|\\.)*)'$/);
  if (str && !str[1].includes('${')) {
    return str[1].replace(/\\'/g, "'");
  }
  if (/^-?\d+$/.test(trimmed)) {
    return Number(trimmed);
  }
  if (trimmed === 'true') return true;
  if (trimmed === 'false') return false;
  if (trimmed === '{}') return {};
  if (trimmed === '[]') return [];
  return trimmed;
}

/**
 * Parse Bicep source into its contract
 */
export function parseTemplate(source: string): TemplateInfo {
  const parameters: TemplateParameter[] = [];
  const outputs: TemplateOutput[] = [];
  const modules: TemplateModule[] = [];
  let targetScope: TemplateScope = 'resourceGroup';

  let pending: PendingDecorators = {};
  let collectingAllowed: string[] | null = null;
  let inBlockComment = false;

  const lines = source.split(/\r?\n/);
  for (let index = 0; index < lines.length; index++) {
    let line = lines[index];

    if (inBlockComment) {
      const end = line.indexOf('*/');
      if (end === -1) continue;
      line = line.slice(end + 2);
      inBlockComment = false;
    }
    const blockStart = line.indexOf('/*');
    if (blockStart !== -1 && !line.slice(0, blockStart).includes("'")) {
      const end = line.indexOf('*/', blockStart + 2);
      if (end === -1) {
        inBlockComment = true;
        line = line.slice(0, blockStart);
      } else {
        line = line.slice(0, blockStart) + line.slice(end + 2);
      }
    }

    line = stripLineComment(line).trim();
    if (!line) continue;

    if (collectingAllowed) {
      const close = line.indexOf('])');
      collectingAllowed.push(...extractQuoted(close === -1 ? line : line.slice(0, close)));
      if (close !== -1) {
        pending.allowed = collectingAllowed;
        collectingAllowed = null;
      }
      continue;
    }

    const scope = line.match(/^targetScope\s*=\s*'(\w+)'/);
    if (scope) {
      if (!isScope(scope[1])) {
        throw new Error(`Line ${index + 1}: unknown targetScope '${scope[1]}'`);
      }
      targetScope = scope[1];
      continue;
    }

    if (line.startsWith('@allowed(')) {
      const open = line.indexOf('[');
      const close = line.indexOf('])');
      if (open === -1) {
        throw new Error(`Line ${index + 1}: @allowed expects an array`);
      }
      if (close === -1) {
        collectingAllowed = extractQuoted(line.slice(open + 1));
      } else {
        pending.allowed = extractQuoted(line.slice(open + 1, close));
      }
      continue;
    }

    const description = line.match(/^@description\('((?:[^'\\]|\\.)*)'\)/);
    if (description) {
      pending.description = description[1].replace(/\\'/g, "'");
      continue;
    }

    const minLength = line.match(/^@minLength\((\d+)\)/);
    if (minLength) {
      pending.minLength = Number(minLength[1]);
      continue;
    }

    const maxLength = line.match(/^@maxLength\((\d+)\)/);
    if (maxLength) {
      pending.maxLength = Number(maxLength[1]);
      continue;
    }

    const param = line.match(/^param\s+(\w+)\s+(\w+)(?:\s*=\s*(.+))?$/);
    if (param) {
      const [, name, type, defaultExpression] = param;
      const parameter: TemplateParameter = {
        name,
        type,
        hasDefault: defaultExpression !== undefined,
        ...pending,
      };
      if (defaultExpression !== undefined) {
        parameter.defaultValue = parseLiteral(defaultExpression);
      }
      parameters.push(parameter);
      pending = {};
      continue;
    }

    const output = line.match(/^output\s+(\w+)\s+(\w+)\s*=\s*(.+)$/);
    if (output) {
      outputs.push({ name: output[1], type: output[2], expression: output[3].trim() });
      pending = {};
      continue;
    }

    const module = line.match(/^module\s+(\w+)\s+'([^']+)'/);
    if (module) {
      modules.push({ symbol: module[1], path: module[2] });
      pending = {};
      continue;
    }

    if (!line.startsWith('@')) {
      pending = {};
    }
  }

  if (collectingAllowed) {
    throw new Error('Unterminated @allowed decorator');
  }

  return { targetScope, parameters, outputs, modules };
}

/**
 * Parse a Bicep template from disk
 */
export function parseTemplateFile(templatePath: string): TemplateInfo {
  if (!existsSync(templatePath)) {
    throw new Error(`Template file not found: ${templatePath}`);
  }
  return parseTemplate(readFileSync(templatePath, 'utf-8'));
}

/**
 * Resolve a module reference relative to the template that declares it
 */
export function resolveModulePath(templatePath: string, module: TemplateModule): string {
  return resolve(dirname(templatePath), module.path);
}

function matchesType(type: string, value: unknown): boolean {
  switch (type) {
    case 'string':
      return typeof value === 'string';
    case 'int':
      return typeof value === 'number' && Number.isInteger(value);
    case 'bool':
      return typeof value === 'boolean';
    case 'object':
      return typeof value === 'object' && value !== null && !Array.isArray(value);
    case 'array':
      return Array.isArray(value);
    default:
      return true;
  }
}

/**
 * Check parameter values against a template's declarations before
 * handing them to the provider
 */
export function checkParametersAgainstTemplate(
  template: TemplateInfo,
  values: ParameterValues
): ValidationResult {
  const errors: ValidationError[] = [];
  const declared = new Map(template.parameters.map((p) => [p.name, p]));

  for (const key of Object.keys(values)) {
    if (!declared.has(key)) {
      errors.push({ path: key, message: `Template does not declare parameter ${key}` });
    }
  }

  for (const param of template.parameters) {
    const value = values[param.name];

    if (value === undefined) {
      if (!param.hasDefault) {
        errors.push({ path: param.name, message: `${param.name} is required by the template` });
      }
      continue;
    }

    if (!matchesType(param.type, value)) {
      errors.push({ path: param.name, message: `${param.name} must be of type ${param.type}`, value });
      continue;
    }

    if (param.allowed && !(typeof value === 'string' && param.allowed.includes(value))) {
      errors.push({
        path: param.name,
        message: `${param.name} must be one of: ${param.allowed.join(', ')}`,
        value,
      });
    }

    if (typeof value === 'string') {
      if (param.minLength !== undefined && value.length < param.minLength) {
        errors.push({
          path: param.name,
          message: `${param.name} must be at least ${param.minLength} characters`,
          value,
        });
      }
      if (param.maxLength !== undefined && value.length > param.maxLength) {
        errors.push({
          path: param.name,
          message: `${param.name} must be at most ${param.maxLength} characters`,
          value,
        });
      }
    }
  }

  return { valid: errors.length === 0, errors };
}
