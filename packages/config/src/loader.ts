/**
 * Configuration Loader
 *
 * Loads `shiplog.config.yaml` and the note schema descriptor from a
 * repository root.
 */

import { isAbsolute, resolve } from 'node:path';
import { readFile } from 'node:fs/promises';
import { parse as parseYaml } from 'yaml';

import { ConfigurationError, errorMessage, logDebug } from '@shiplog/utils';

import { SHIPLOG_DEFAULTS } from './constants.js';
import {
  ShiplogConfigSchema,
  safeValidateConfig,
  safeValidateNoteSchema,
  type NoteSchemaDescriptor,
  type ShiplogConfig,
} from './schema.js';

/**
 * Read a file, returning undefined when it does not exist
 */
async function readOptionalFile(path: string): Promise<string | undefined> {
  try {
    return await readFile(path, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return undefined;
    }
    throw new ConfigurationError(`Failed to read ${path}: ${errorMessage(error)}`, { cause: error });
  }
}

function parseYamlDocument(content: string, path: string): unknown {
  try {
    return parseYaml(content);
  } catch (error) {
    throw new ConfigurationError(`Invalid YAML in ${path}: ${errorMessage(error)}`, { cause: error });
  }
}

function invalid(path: string, errors: string[]): ConfigurationError {
  return new ConfigurationError(
    `Configuration is invalid: ${path}\n${errors.map(err => `  • ${err}`).join('\n')}`
  );
}

/**
 * Load project configuration from a file path
 *
 * @throws ConfigurationError if the file is unreadable or invalid
 */
export async function loadConfigFromFile(configPath: string): Promise<ShiplogConfig> {
  const absolutePath = resolve(configPath);

  if (!absolutePath.endsWith('.yaml') && !absolutePath.endsWith('.yml')) {
    throw new ConfigurationError(
      `Unsupported config file format: ${absolutePath}\n` +
      `Only YAML is supported. Please use ${SHIPLOG_DEFAULTS.CONFIG_FILE_NAME}`
    );
  }

  const content = await readOptionalFile(absolutePath);
  if (content === undefined) {
    throw new ConfigurationError(`Config file not found: ${absolutePath}`);
  }

  // An empty file means "all defaults"
  const raw = parseYamlDocument(content, absolutePath) ?? {};

  const result = safeValidateConfig(raw);
  if (!result.success) {
    throw invalid(absolutePath, result.errors);
  }
  return result.data;
}

/**
 * Load project configuration from a repository root
 *
 * A missing `shiplog.config.yaml` yields the defaults.
 *
 * @throws ConfigurationError if the file exists but is invalid
 */
export async function loadConfig(root: string): Promise<ShiplogConfig> {
  const configPath = resolve(root, SHIPLOG_DEFAULTS.CONFIG_FILE_NAME);
  const content = await readOptionalFile(configPath);

  if (content === undefined) {
    logDebug('config', `No ${SHIPLOG_DEFAULTS.CONFIG_FILE_NAME} found, using defaults`, { root });
    return ShiplogConfigSchema.parse({});
  }

  return loadConfigFromFile(configPath);
}

/**
 * Load the note schema descriptor
 *
 * @param schemaPath - Absolute path, or relative to `root`
 * @throws ConfigurationError if the schema is missing or invalid
 */
export async function loadNoteSchema(schemaPath: string, root: string = process.cwd()): Promise<NoteSchemaDescriptor> {
  const absolutePath = isAbsolute(schemaPath) ? schemaPath : resolve(root, schemaPath);
  const content = await readOptionalFile(absolutePath);

  if (content === undefined) {
    throw new ConfigurationError(
      `Note schema not found: ${absolutePath}\nCreate ${SHIPLOG_DEFAULTS.SCHEMA_PATH} listing the fields every note declares`
    );
  }

  const result = safeValidateNoteSchema(parseYamlDocument(content, absolutePath));
  if (!result.success) {
    throw invalid(absolutePath, result.errors);
  }

  logDebug('config', `Loaded note schema`, { path: absolutePath, fields: result.data.map(field => field.label) });
  return result.data;
}
