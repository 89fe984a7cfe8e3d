/**
 * Configuration loader for the weft CLI.
 *
 * Loads weft.config.json from the working directory or a specified path.
 */

import * as fs from 'fs';
import * as path from 'path';

const CONFIG_FILENAMES = ['weft.config.json', '.weftrc.json'];

export type OutputFormat = 'text' | 'json';

export interface WeftConfig {
  /** How tokens are printed. Default: text. */
  format?: OutputFormat;
  /** Keep scanning past invalid characters and report them all. */
  recover?: boolean;
  /** Print the trailing EOF token. Default: true. */
  showEof?: boolean;
}

/**
 * Load weft configuration from the filesystem.
 *
 * Search order:
 * 1. Explicit path (if provided)
 * 2. weft.config.json in cwd
 * 3. .weftrc.json in cwd
 *
 * Returns empty config if no file is found (not an error).
 */
export function loadConfig(explicitPath?: string): WeftConfig {
  if (explicitPath) {
    return readConfigFile(explicitPath);
  }

  return findConfigIn(process.cwd()) ?? {};
}

/**
 * Load config relative to a source file's directory, falling back to cwd.
 */
export function loadConfigForScript(scriptPath: string): WeftConfig {
  const scriptDir = path.dirname(path.resolve(scriptPath));
  return findConfigIn(scriptDir) ?? loadConfig();
}

function findConfigIn(dir: string): WeftConfig | undefined {
  for (const filename of CONFIG_FILENAMES) {
    const filePath = path.join(dir, filename);
    if (fs.existsSync(filePath)) {
      return readConfigFile(filePath);
    }
  }
  return undefined;
}

function readConfigFile(filePath: string): WeftConfig {
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
function validateConfig(raw: unknown, filePath: string): WeftConfig {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new Error(`Invalid config in ${filePath}: must be an object`);
  }

  const config: WeftConfig = {};
  const entries = new Map<string, unknown>(Object.entries(raw));

  const format = entries.get('format');
  if (format === 'text' || format === 'json') {
    config.format = format;
  } else if (format !== undefined) {
    throw new Error(`Invalid "format" in ${filePath}: must be "text" or "json"`);
  }

  for (const key of ['recover', 'showEof'] as const) {
    const value = entries.get(key);
    if (value === undefined) continue;
    if (typeof value !== 'boolean') {
      throw new Error(`Invalid "${key}" in ${filePath}: must be a boolean`);
    }
    config[key] = value;
  }

  return config;
}
