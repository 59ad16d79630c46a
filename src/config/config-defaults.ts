/**
 * Default config file path
 */
export const DEFAULT_CONFIG_PATH = './config.yaml';

export const DEFAULT_OUTPUT_BASE = '~/transcripts';

export const defaults = {
  output_base: DEFAULT_OUTPUT_BASE,
  filename_max_length: 50,
  batch_max_size: 10,
  include_links_default: true,
  subfolder_by: 'author',
  overwrite: true,
  log_level: 'info',
} as const;
