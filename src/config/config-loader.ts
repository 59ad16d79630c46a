import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import * as yaml from 'js-yaml';
import { ConfigError, errorMessage } from '../errors/custom-errors.js';
import { resolveEnvRecursive } from '../utils/env-resolver.js';
import { logger } from '../utils/logger.js';
import { DEFAULT_CONFIG_PATH } from './config-defaults.js';
import { type Config, collectConfigWarnings, type RawConfig, validateConfigSafe } from './config-schema.js';

function isRecord(value: unknown): value is RawConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Load and parse configuration from a YAML (or JSON) file
 *
 * @param configPath - Path to config file, relative to the working directory
 * @returns Validated configuration with defaults applied
 * @throws ConfigError if the file is missing, unreadable or invalid
 */
export async function loadConfig(configPath: string = DEFAULT_CONFIG_PATH): Promise<Config> {
  const absolutePath = resolve(configPath);

  if (!existsSync(absolutePath)) {
    throw new ConfigError(
      `Configuration file not found: "${absolutePath}". Create a config.yaml file or specify a different path.`,
    );
  }

  let content: string;
  try {
    content = await readFile(absolutePath, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Failed to read configuration: ${errorMessage(error)}`);
  }

  let parsed: unknown;
  try {
    parsed = yaml.load(content);
  } catch (error) {
    throw new ConfigError(`Failed to parse YAML: ${errorMessage(error)}`);
  }

  // An empty document means "all defaults"
  const rawConfig = parsed ?? {};
  if (!isRecord(rawConfig)) {
    throw new ConfigError('Configuration must be a mapping of option names to values');
  }

  let resolved: unknown;
  try {
    resolved = resolveEnvRecursive(rawConfig);
  } catch (error) {
    throw new ConfigError(errorMessage(error));
  }
  if (!isRecord(resolved)) {
    throw new ConfigError('Configuration must be a mapping of option names to values');
  }

  for (const warning of collectConfigWarnings(resolved)) {
    logger.warning(`Config: ${warning}`);
  }

  const result = validateConfigSafe(resolved);
  if (!result.success) {
    throw new ConfigError(`Invalid configuration: ${result.error}`);
  }

  return result.config;
}
