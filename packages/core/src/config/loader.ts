/**
 * Configuration loading
 *
 * YAML or JSON files with environment variable substitution
 * (`${VAR}` and `${VAR:-default}`), validated against EngineConfigSchema.
 */

import * as fs from 'fs';
import * as yaml from 'yaml';
import type { ZodError } from 'zod';
import { ConfigLoadError, ConfigValidationError, type ValidationIssue } from '../errors';
import { EngineConfigSchema, type EngineConfig } from './schema';

export type Environment = Readonly<Record<string, string | undefined>>;

export interface LoadConfigOptions {
  /** Variables used for substitution; `process.env` when omitted */
  env?: Environment;
}

const PLACEHOLDER = /\$\{(\w+)(?::-([^}]*))?\}/g;
const SOLE_PLACEHOLDER = /^\$\{\w+(?::-[^}]*)?\}$/;

/**
 * Read, substitute and validate a configuration file
 */
export function loadConfigFile(path: string, options: LoadConfigOptions = {}): EngineConfig {
  if (!fs.existsSync(path)) {
    throw new ConfigLoadError(`Config file not found: ${path}`);
  }

  let content: string;
  try {
    content = fs.readFileSync(path, 'utf8');
  } catch (e) {
    throw new ConfigLoadError(`Failed to read config file: ${path}`, e instanceof Error ? e : undefined);
  }

  return parseConfig(parseConfigText(content), options);
}

/**
 * Parse YAML (a superset of JSON) into a plain value
 */
export function parseConfigText(content: string): unknown {
  try {
    return yaml.parse(content) ?? {};
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    throw new ConfigLoadError(`Invalid YAML: ${message}`, e instanceof Error ? e : undefined);
  }
}

/**
 * Substitute environment variables and validate
 */
export function parseConfig(raw: unknown, options: LoadConfigOptions = {}): EngineConfig {
  return validateConfig(substituteEnvVars(raw, options.env ?? process.env));
}

/**
 * Validate and apply defaults, without substitution
 */
export function validateConfig(input: unknown): EngineConfig {
  const result = EngineConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = toIssues(result.error);
    throw new ConfigValidationError(
      `Invalid configuration: ${issues.map(issue => `${issue.path}: ${issue.message}`).join('; ')}`,
      issues,
    );
  }
  return result.data;
}

export function substituteEnvVars(value: unknown, env: Environment): unknown {
  if (typeof value === 'string') {
    const replaced = value.replace(PLACEHOLDER, (_match: string, name: string, fallback?: string) => {
      const resolved = env[name];
      // Empty counts as unset when a default is given
      if (resolved === '' && fallback !== undefined) {
        return fallback;
      }
      if (resolved === undefined && fallback === undefined) {
        throw new ConfigLoadError(`Required environment variable '${name}' not set`);
      }
      return resolved ?? fallback ?? '';
    });
    return SOLE_PLACEHOLDER.test(value) ? coerceScalar(replaced) : replaced;
  }
  if (Array.isArray(value)) {
    return value.map(item => substituteEnvVars(item, env));
  }
  if (typeof value === 'object' && value !== null) {
    return Object.fromEntries(
      Object.entries(value).map(([key, item]) => [key, substituteEnvVars(item, env)]),
    );
  }
  return value;
}

/**
 * A value that came entirely from one variable takes the scalar type it spells
 */
function coerceScalar(value: string): string | number | boolean {
  if (/^-?\d+(\.\d+)?$/.test(value)) {
    return Number(value);
  }
  if (value === 'true') return true;
  if (value === 'false') return false;
  return value;
}

export function toIssues(error: ZodError): ValidationIssue[] {
  return error.errors.map(issue => ({
    path: issue.path.length > 0 ? issue.path.join('.') : '(root)',
    message: issue.message,
  }));
}
