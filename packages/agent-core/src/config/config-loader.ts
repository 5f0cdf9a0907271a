/**
 * Configuration loading.
 *
 * The document is YAML or JSON (JSON parses as YAML). Validation failures
 * are reported as one ConfigInvalidError listing every issue.
 */

import { readFile } from 'node:fs/promises';
import { parse as parseYAML } from 'yaml';
import type { z } from 'zod';
import type { BatonConfig, ConfigIssue } from '@baton/agent-contracts';
import { ConfigInvalidError, errorMessage, validateBatonConfig } from '@baton/agent-contracts';

function toConfigIssues(error: z.ZodError): ConfigIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.length > 0 ? issue.path.join('.') : '(root)',
    message: issue.message,
  }));
}

/**
 * Validate already-parsed configuration data
 *
 * @returns Validation result with data or issues
 */
export function validateConfig(data: unknown): { success: true; data: BatonConfig } | { success: false; issues: ConfigIssue[] } {
  const validation = validateBatonConfig(data);
  if (validation.success && validation.data) {
    return { success: true, data: validation.data };
  }
  return {
    success: false,
    issues: validation.error ? toConfigIssues(validation.error) : [{ path: '(root)', message: 'Invalid config' }],
  };
}

/**
 * Parse configuration data, applying defaults
 *
 * @throws ConfigInvalidError
 */
export function parseConfig(data: unknown): BatonConfig {
  const result = validateConfig(data);
  if (!result.success) {
    throw new ConfigInvalidError(result.issues);
  }
  return result.data;
}

/**
 * Parse a YAML or JSON document
 *
 * @throws ConfigInvalidError
 */
export function parseConfigText(text: string, source = '(inline)'): BatonConfig {
  let data: unknown;
  try {
    data = parseYAML(text);
  } catch (error) {
    throw new ConfigInvalidError([{ path: source, message: `Failed to parse: ${errorMessage(error)}` }]);
  }
  return parseConfig(data);
}

/**
 * Load and validate a configuration file
 *
 * @throws ConfigInvalidError
 */
export async function loadConfig(path: string): Promise<BatonConfig> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (error) {
    throw new ConfigInvalidError([{ path, message: `Failed to read: ${errorMessage(error)}` }]);
  }
  return parseConfigText(text, path);
}

function lookup(config: unknown, path: string): unknown {
  let current: unknown = config;
  for (const segment of path.split('.')) {
    if (current === null || typeof current !== 'object') {
      return undefined;
    }
    if (Array.isArray(current)) {
      const index = Number(segment);
      current = Number.isInteger(index) ? current[index] : undefined;
    } else {
      current = Object.getOwnPropertyDescriptor(current, segment)?.value;
    }
  }
  return current;
}

/**
 * Dotted-path lookup. With a fallback, a missing value or one of a
 * different primitive type yields the fallback.
 *
 * @example
 * getConfigValue(config, 'search.timeout', 60_000)
 * getConfigValue(config, 'agents.0.name', 'unknown')
 */
export function getConfigValue(config: unknown, path: string, fallback: number): number;
export function getConfigValue(config: unknown, path: string, fallback: string): string;
export function getConfigValue(config: unknown, path: string, fallback: boolean): boolean;
export function getConfigValue(config: unknown, path: string): unknown;
export function getConfigValue(config: unknown, path: string, fallback?: unknown): unknown {
  const value = lookup(config, path);
  if (value === undefined) {
    return fallback;
  }
  if (fallback !== undefined && typeof value !== typeof fallback) {
    return fallback;
  }
  return value;
}
