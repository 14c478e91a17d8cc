/**
 * Configuration Loader for the scrawl CLI
 * Loads and validates .scrawlrc.yaml configuration files.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import * as yaml from 'yaml';

// ============================================================
// CONSTANTS
// ============================================================

/** Configuration file name */
export const CONFIG_FILE_NAME = '.scrawlrc.yaml';

export interface CliConfig {
  /** Read loop prompt */
  readonly prompt: string;
  /** Input that ends the read loop */
  readonly exitCommand: string;
  /** Passed to createRuntimeContext; runtime default when unset */
  readonly maxCallDepth?: number | undefined;
  readonly requireSemicolons: boolean;
  /** Print each parsed program as JSON before evaluating it */
  readonly showAst: boolean;
}

const KNOWN_KEYS = new Set([
  'prompt',
  'exitCommand',
  'maxCallDepth',
  'requireSemicolons',
  'showAst',
]);

export function createDefaultConfig(): CliConfig {
  return {
    prompt: '> ',
    exitCommand: 'exit',
    requireSemicolons: false,
    showAst: false,
  };
}

// ============================================================
// VALIDATION
// ============================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readString(
  data: Record<string, unknown>,
  key: string,
  fallback: string
): string {
  const value = data[key];
  if (value === undefined) return fallback;
  if (typeof value !== 'string') {
    throw new Error(`Invalid configuration: ${key} must be a string`);
  }
  return value;
}

function readBoolean(
  data: Record<string, unknown>,
  key: string,
  fallback: boolean
): boolean {
  const value = data[key];
  if (value === undefined) return fallback;
  if (typeof value !== 'boolean') {
    throw new Error(`Invalid configuration: ${key} must be a boolean`);
  }
  return value;
}

function readPositiveInteger(
  data: Record<string, unknown>,
  key: string
): number | undefined {
  const value = data[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 1) {
    throw new Error(`Invalid configuration: ${key} must be a positive integer`);
  }
  return value;
}

/**
 * Validate configuration structure and merge with defaults.
 * Throws Error if configuration is invalid.
 */
export function validateConfig(data: unknown): CliConfig {
  // An empty file parses to null
  if (data === null || data === undefined) {
    return createDefaultConfig();
  }
  if (!isRecord(data)) {
    throw new Error('Invalid configuration: must be a mapping');
  }

  for (const key of Object.keys(data)) {
    if (!KNOWN_KEYS.has(key)) {
      throw new Error(`Invalid configuration: unknown key ${key}`);
    }
  }

  const defaults = createDefaultConfig();
  return {
    prompt: readString(data, 'prompt', defaults.prompt),
    exitCommand: readString(data, 'exitCommand', defaults.exitCommand),
    maxCallDepth: readPositiveInteger(data, 'maxCallDepth'),
    requireSemicolons: readBoolean(
      data,
      'requireSemicolons',
      defaults.requireSemicolons
    ),
    showAst: readBoolean(data, 'showAst', defaults.showAst),
  };
}

// ============================================================
// CONFIGURATION LOADING
// ============================================================

/**
 * Load configuration from .scrawlrc.yaml in the specified directory.
 *
 * @returns Defaults when the file does not exist
 * @throws Error with "Invalid configuration: {reason}" for unreadable,
 *   malformed or ill-typed files
 */
export function loadConfig(cwd: string): CliConfig {
  const configPath = join(cwd, CONFIG_FILE_NAME);

  if (!existsSync(configPath)) {
    return createDefaultConfig();
  }

  let fileContent: string;
  try {
    fileContent = readFileSync(configPath, 'utf-8');
  } catch (err) {
    throw new Error(
      `Invalid configuration: failed to read file (${err instanceof Error ? err.message : String(err)})`
    );
  }

  let parsedData: unknown;
  try {
    parsedData = yaml.parse(fileContent);
  } catch (err) {
    throw new Error(
      `Invalid configuration: invalid YAML (${err instanceof Error ? err.message : String(err)})`
    );
  }

  return validateConfig(parsedData);
}
