/**
 * Configuration loader for nsconf.
 *
 * Loads nsconf.config.json from the working directory or a specified path.
 * Provides parser limits, dump formatting and tracing for RuntimeStore.
 */

import * as fs from 'fs';
import * as path from 'path';

export interface NsconfConfig {
  /** Deepest list nesting the parser accepts. */
  maxDepth?: number;
  /** Spaces before each `$name` line when serializing. */
  indent?: number;
  /** Log load and mutation activity with `[trace]` lines. */
  trace?: boolean;
}

const CONFIG_FILENAMES = ['nsconf.config.json', '.nsconfrc.json'];

export const MAX_INDENT = 16;

/**
 * Load nsconf configuration from the filesystem.
 *
 * Search order:
 * 1. Explicit path (if provided)
 * 2. nsconf.config.json in cwd
 * 3. .nsconfrc.json in cwd
 *
 * Returns empty config if no file is found (not an error).
 */
export function loadConfig(explicitPath?: string): NsconfConfig {
  if (explicitPath) {
    return readConfigFile(explicitPath);
  }

  return findConfigIn(process.cwd()) ?? {};
}

/**
 * Load config relative to a configuration document's directory, falling
 * back to cwd. Useful when running `nsconf path/to/app.nsc` from elsewhere.
 */
export function loadConfigForFile(documentPath: string): NsconfConfig {
  const documentDir = path.dirname(path.resolve(documentPath));
  return findConfigIn(documentDir) ?? loadConfig();
}

function findConfigIn(dir: string): NsconfConfig | undefined {
  for (const filename of CONFIG_FILENAMES) {
    const filePath = path.join(dir, filename);
    if (fs.existsSync(filePath)) {
      return readConfigFile(filePath);
    }
  }
  return undefined;
}

function readConfigFile(filePath: string): NsconfConfig {
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new Error(`Invalid JSON in config file ${filePath}: ${error.message}`);
    }
    throw error;
  }
  return validateConfig(parsed, filePath);
}

/**
 * Validate config structure. Throws on invalid config.
 */
function validateConfig(raw: unknown, filePath: string): NsconfConfig {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new Error(`Invalid config in ${filePath}: must be a JSON object`);
  }

  const config: NsconfConfig = {};
  for (const [key, value] of Object.entries(raw)) {
    switch (key) {
      case 'maxDepth':
        if (typeof value !== 'number' || !Number.isInteger(value) || value < 1) {
          throw new Error(`Invalid "maxDepth" in ${filePath}: must be a positive integer`);
        }
        config.maxDepth = value;
        break;
      case 'indent':
        if (typeof value !== 'number' || !Number.isInteger(value) || value < 0 || value > MAX_INDENT) {
          throw new Error(`Invalid "indent" in ${filePath}: must be an integer between 0 and ${MAX_INDENT}`);
        }
        config.indent = value;
        break;
      case 'trace':
        if (typeof value !== 'boolean') {
          throw new Error(`Invalid "trace" in ${filePath}: must be a boolean`);
        }
        config.trace = value;
        break;
      default:
        throw new Error(`Unknown key "${key}" in ${filePath}`);
    }
  }
  return config;
}
