import { isAbsolute, join, resolve } from 'path';
import { CONFIG_FILE_NAMES, DEFAULT_DEPENDENCY_FIELDS, FIELD_LABELS } from '../constants/index.js';
import type { AutomarkConfig } from '../types/index.js';
import { ConfigError } from '../utils/errors.js';
import { exists } from '../utils/fs.js';
import { isPlainObject, readJsoncFile } from '../utils/jsonc.js';
import { logger } from '../utils/logger.js';

/**
 * Configuration loading for automark
 * Supports both JSON and JSONC formats
 */

const ALLOWED_KEYS = new Set(['dependencyFields', 'providesField', 'columns']);

export interface LoadConfigOptions {
  /** Directory searched for automark.jsonc / automark.json */
  cwd?: string;
  /** Explicit config file; must exist */
  configPath?: string;
}

export function getDefaultConfig(): AutomarkConfig {
  return {
    dependencyFields: [...DEFAULT_DEPENDENCY_FIELDS],
    providesField: FIELD_LABELS.PROVIDES
  };
}

/**
 * Find the existing config file in `cwd` (automark.jsonc first).
 * Returns null if none exists.
 */
export async function findConfigFile(cwd: string): Promise<string | null> {
  for (const fileName of CONFIG_FILE_NAMES) {
    const path = join(cwd, fileName);
    if (await exists(path)) {
      return path;
    }
  }
  return null;
}

function validateConfig(raw: unknown, path: string): Partial<AutomarkConfig> {
  if (!isPlainObject(raw)) {
    throw new ConfigError(`${path}: root must be an object`, { path });
  }

  for (const key of Object.keys(raw)) {
    if (!ALLOWED_KEYS.has(key)) {
      throw new ConfigError(`${path}: unknown key "${key}"`, { path, key });
    }
  }

  const config: Partial<AutomarkConfig> = {};

  if (raw.dependencyFields !== undefined) {
    const fields = raw.dependencyFields;
    if (!Array.isArray(fields)) {
      throw new ConfigError(`${path}: dependencyFields must be an array of field labels`, { path });
    }
    config.dependencyFields = fields.map((field: unknown, index: number) => {
      if (typeof field !== 'string' || field.trim().length === 0) {
        throw new ConfigError(`${path}: dependencyFields[${index}] must be a non-empty string`, { path });
      }
      return field.trim();
    });
  }

  if (raw.providesField !== undefined) {
    if (typeof raw.providesField !== 'string' || raw.providesField.trim().length === 0) {
      throw new ConfigError(`${path}: providesField must be a non-empty string`, { path });
    }
    config.providesField = raw.providesField.trim();
  }

  if (raw.columns !== undefined) {
    const columns = raw.columns;
    if (typeof columns !== 'number' || !Number.isInteger(columns) || columns <= 0) {
      throw new ConfigError(`${path}: columns must be a positive integer`, { path });
    }
    config.columns = columns;
  }

  return config;
}

/**
 * Load configuration, falling back to defaults when no file is present.
 * An explicit `configPath` that does not exist is an error.
 */
export async function loadAutomarkConfig(options: LoadConfigOptions = {}): Promise<AutomarkConfig> {
  const cwd = resolve(options.cwd ?? process.cwd());

  let configPath: string | null;
  if (options.configPath) {
    configPath = isAbsolute(options.configPath) ? options.configPath : join(cwd, options.configPath);
    if (!(await exists(configPath))) {
      throw new ConfigError(`Config file not found: ${configPath}`, { path: configPath });
    }
  } else {
    configPath = await findConfigFile(cwd);
  }

  if (!configPath) {
    logger.debug('Config file not found, using defaults');
    return getDefaultConfig();
  }

  logger.debug(`Loading config from: ${configPath}`);
  const { value, errors } = await readJsoncFile(configPath);
  if (errors.length > 0) {
    throw new ConfigError(`${configPath}: invalid JSONC (${errors.join('; ')})`, { path: configPath, errors });
  }

  return {
    ...getDefaultConfig(),
    ...validateConfig(value, configPath)
  };
}
