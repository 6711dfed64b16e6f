/**
 * YAML Configuration Loader
 * Loads and caches log format configuration with Zod validation
 */

import { readFileSync } from 'fs';
import { dirname, isAbsolute, join, resolve } from 'path';
import { fileURLToPath } from 'url';
import yaml from 'js-yaml';
import { z } from 'zod';
import { ValidationError } from '../analyzers/errors.js';
import type { AmbiguousBlockPolicy, LogFormat } from '../analyzers/git-log/types.js';
import { LogFormatYamlSchema } from '../schemas/log-format-schemas.js';
import { extractErrorMessage } from './error-handler.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

export const DEFAULT_FORMAT_FILE = 'log-format.yaml';

// Cache for loaded configurations, keyed by resolved path
const configCache = new Map<string, unknown>();

/**
 * Get the config directory path
 */
export function getConfigDir(): string {
  // In development: src/utils -> ../../config-defaults
  // In production: dist/utils -> ../../config-defaults
  return join(__dirname, '../../config-defaults');
}

/**
 * Load a YAML configuration file and validate it against a schema.
 * Relative paths resolve against the config-defaults directory.
 */
export function loadYamlConfig<T>(filename: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
  const configPath = isAbsolute(filename) ? filename : resolve(getConfigDir(), filename);

  if (configCache.has(configPath)) {
    return schema.parse(configCache.get(configPath));
  }

  let fileContents: string;
  try {
    fileContents = readFileSync(configPath, 'utf8');
  } catch (error) {
    throw new ValidationError(`Failed to read config file ${filename}: ${extractErrorMessage(error)}`, {
      configPath,
    });
  }

  let config: unknown;
  try {
    config = yaml.load(fileContents);
  } catch (error) {
    throw new ValidationError(`Failed to parse config file ${filename}: ${extractErrorMessage(error)}`, {
      configPath,
    });
  }

  const result = schema.safeParse(config);
  if (!result.success) {
    throw new ValidationError(`Validation failed for ${filename}: ${result.error.message}`, { configPath });
  }

  configCache.set(configPath, result.data);
  return result.data;
}

/**
 * Clear the configuration cache
 * Useful for testing or reloading configs
 */
export function clearConfigCache(): void {
  configCache.clear();
}

export interface LogFormatConfig {
  readonly format: LogFormat;
  readonly ambiguousBlocks: AmbiguousBlockPolicy;
}

/**
 * Load the log format, from a user file when given, otherwise from the shipped defaults
 */
export function loadLogFormatConfig(filePath?: string): LogFormatConfig {
  const file = filePath ? resolve(filePath) : DEFAULT_FORMAT_FILE;
  const raw = loadYamlConfig(file, LogFormatYamlSchema);

  return {
    format: {
      quoteChar: raw.quote_char,
      fieldDelimiter: raw.field_delimiter,
      headerMarker: raw.header_marker,
      changeSeparator: raw.change_separator,
      blockDelimiter: raw.block_delimiter,
      lineDelimiter: raw.line_delimiter,
    },
    ambiguousBlocks: raw.ambiguous_blocks,
  };
}
