/**
 * Configuration loader for Tessera.
 *
 * Loads tessera.config.json from the working directory or a specified path.
 * Provides the default schema, tracing and alias limits for parsing.
 */

import * as fs from 'fs';
import * as path from 'path';
import { isSchemaName, SchemaName } from '../parser/schema';

const CONFIG_FILENAMES = ['tessera.config.json', '.tesserarc.json'];

export interface TesseraConfig {
  schema?: SchemaName;
  trace?: boolean;
  /** Upper bound on the nodes aliases may expand to per document. */
  maxAliasExpansion?: number;
}

/**
 * Load Tessera configuration from the filesystem.
 *
 * Search order:
 * 1. Explicit path (if provided)
 * 2. tessera.config.json in cwd
 * 3. .tesserarc.json in cwd
 *
 * Returns empty config if no file is found (not an error).
 */
export function loadConfig(explicitPath?: string): TesseraConfig {
  if (explicitPath) {
    return readConfigFile(explicitPath);
  }

  const cwd = process.cwd();

  for (const filename of CONFIG_FILENAMES) {
    const filePath = path.join(cwd, filename);
    if (fs.existsSync(filePath)) {
      return readConfigFile(filePath);
    }
  }

  return {};
}

/**
 * Load config relative to an input file's directory.
 * Useful when running `tessera path/to/file.yaml` from a different cwd.
 */
export function loadConfigForFile(inputPath: string): TesseraConfig {
  const inputDir = path.dirname(path.resolve(inputPath));

  for (const filename of CONFIG_FILENAMES) {
    const filePath = path.join(inputDir, filename);
    if (fs.existsSync(filePath)) {
      return readConfigFile(filePath);
    }
  }

  return loadConfig();
}

function readConfigFile(filePath: string): TesseraConfig {
  let raw: unknown;
  try {
    const content = fs.readFileSync(filePath, 'utf-8');
    raw = JSON.parse(content);
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new Error(`Invalid JSON in config file ${filePath}: ${error.message}`);
    }
    throw error;
  }
  return validateConfig(raw, filePath);
}

/**
 * Validate config structure. Throws on invalid config.
 */
export function validateConfig(raw: unknown, filePath: string): TesseraConfig {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new Error(`Invalid config in ${filePath}: must be a JSON object`);
  }

  const config: TesseraConfig = {};
  const fields: Record<string, unknown> = Object.fromEntries(Object.entries(raw));
  const { schema, trace, maxAliasExpansion } = fields;

  if (schema !== undefined) {
    if (!isSchemaName(schema)) {
      throw new Error(`Invalid "schema" in ${filePath}: must be one of failsafe, json, core, yaml-1.1`);
    }
    config.schema = schema;
  }

  if (trace !== undefined) {
    if (typeof trace !== 'boolean') {
      throw new Error(`Invalid "trace" in ${filePath}: must be a boolean`);
    }
    config.trace = trace;
  }

  if (maxAliasExpansion !== undefined) {
    if (typeof maxAliasExpansion !== 'number' || !Number.isInteger(maxAliasExpansion) || maxAliasExpansion < 0) {
      throw new Error(`Invalid "maxAliasExpansion" in ${filePath}: must be a non-negative integer`);
    }
    config.maxAliasExpansion = maxAliasExpansion;
  }

  return config;
}
