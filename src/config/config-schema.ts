/**
 * Zod schema for config.yaml
 *
 * The schema is the single source of the Config type. Every key has a default,
 * so an empty document is a valid configuration.
 */

import { z } from 'zod';
import { BATCH_SIZE_LIMIT } from '../state/batch-state.js';
import { defaults } from './config-defaults.js';

export const LogLevelSettingSchema = z.enum(['debug', 'info', 'warning', 'error']);

export const ConfigSchema = z.object({
  output_base: z.string().min(1).default(defaults.output_base).describe('Root output directory'),
  filename_max_length: z
    .number()
    .int()
    .min(16)
    .max(255)
    .default(defaults.filename_max_length)
    .describe('Maximum length of a generated filename, extension excluded'),
  batch_max_size: z
    .number()
    .int()
    .min(1)
    .max(BATCH_SIZE_LIMIT, `Cannot exceed ${BATCH_SIZE_LIMIT}`)
    .default(defaults.batch_max_size)
    .describe('Maximum number of URLs per batch'),
  include_links_default: z
    .boolean()
    .default(defaults.include_links_default)
    .describe('Extract links from the video description'),
  subfolder_by: z.enum(['author']).default(defaults.subfolder_by).describe('Output subfolder grouping'),
  overwrite: z
    .boolean()
    .default(defaults.overwrite)
    .describe('Overwrite existing outputs instead of adding a numeric suffix'),
  log_level: LogLevelSettingSchema.default(defaults.log_level).describe('Minimum log level'),
  cookie_file: z.string().min(1).optional().describe('Netscape cookie file passed to yt-dlp'),
});

export type Config = z.output<typeof ConfigSchema>;

/**
 * Raw configuration before env var resolution
 */
export type RawConfig = Record<string, unknown>;

const KNOWN_KEYS = new Set(Object.keys(ConfigSchema.shape));

function toSnakeCase(key: string): string {
  return key.replace(/[A-Z]/g, (letter) => `_${letter.toLowerCase()}`);
}

/**
 * Collect warnings for keys the schema ignores, with a hint for camelCase spellings
 */
export function collectConfigWarnings(rawConfig: RawConfig): string[] {
  const warnings: string[] = [];

  for (const key of Object.keys(rawConfig)) {
    if (KNOWN_KEYS.has(key)) continue;

    const snake = toSnakeCase(key);
    if (KNOWN_KEYS.has(snake)) {
      warnings.push(`'${key}' is not a recognized option. Did you mean '${snake}'?`);
    } else {
      warnings.push(`'${key}' is not a recognized option and will be ignored`);
    }
  }

  return warnings;
}

/**
 * Validate configuration using Zod
 *
 * @throws z.ZodError if validation fails
 */
export function validateConfig(rawConfig: RawConfig): Config {
  return ConfigSchema.parse(rawConfig);
}

/**
 * Validate with custom error formatting
 */
export function validateConfigSafe(
  rawConfig: RawConfig,
): { success: true; config: Config } | { success: false; error: string } {
  const result = ConfigSchema.safeParse(rawConfig);
  if (result.success) {
    return { success: true, config: result.data };
  }
  return { success: false, error: formatZodError(result.error) };
}

/**
 * Format Zod error into a readable message
 */
export function formatZodError(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? `"${issue.path.join('.')}"` : 'value';
      const code = issue.code.toUpperCase();
      return `${path} ${issue.message} [${code}]`;
    })
    .join('; ');
}
