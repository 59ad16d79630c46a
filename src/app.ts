import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { boolean, command, flag, option, optional, restPositionals, string } from 'cmd-ts';
import { DEFAULT_CONFIG_PATH } from './config/config-defaults.js';
import { loadConfig } from './config/config-loader.js';
import { type Config, validateConfig } from './config/config-schema.js';
import { YtDlpDownloader } from './downloader/impl/yt-dlp-downloader.js';
import { YtdlpWrapper } from './downloader/lib/ytdlp-wrapper.js';
import type { VideoSource } from './downloader/types.js';
import { ConfigError, errorMessage, TubescribeError, WorkflowError } from './errors/custom-errors.js';
import { SessionMetrics } from './metrics/metrics.js';
import { ConsoleNotifier } from './notifications/console-notifier.js';
import { NotificationLevel, type Notifier } from './notifications/notifier.js';
import { isSuccess, ProcessStatus } from './types/process-result.types.js';
import { expandPath } from './utils/env-resolver.js';
import { LogLevel, logger, parseLogLevel } from './utils/logger.js';
import { Orchestrator } from './workflow/orchestrator.js';
import { runInteractiveReview } from './workflow/review-prompt.js';
import { createSessionContext } from './workflow/session-context.js';

export type CliOptions = {
  urls: string[];
  fromFile?: string;
  config?: string;
  outputDir?: string;
  author?: string;
  topic?: string;
  year?: string;
  noLinks: boolean;
  yes: boolean;
  verbose: boolean;
  metrics: boolean;
};

export type AppDependencies = {
  loadConfig: typeof loadConfig;
  readUrlFile: (path: string) => Promise<string>;
  createVideoSource: (config: Config) => VideoSource;
  createNotifier: (minLevel: NotificationLevel) => Notifier;
  runReview: (orchestrator: Orchestrator) => Promise<boolean>;
  isInteractive: () => boolean;
};

export const defaultDependencies: AppDependencies = {
  loadConfig,
  readUrlFile: (path) => readFile(resolve(path), 'utf-8'),
  createVideoSource: (config) =>
    new YtDlpDownloader(new YtdlpWrapper(), {
      cookieFile: config.cookie_file ? expandPath(config.cookie_file) : undefined,
    }),
  createNotifier: (minLevel) => new ConsoleNotifier(minLevel),
  runReview: (orchestrator) => runInteractiveReview(orchestrator),
  isInteractive: () => process.stdin.isTTY === true && process.stdout.isTTY === true,
};

export const YTDLP_INSTALL_HINT =
  'yt-dlp is not installed. Please install it first:\n' +
  '  - macOS: brew install yt-dlp\n' +
  '  - Linux: pip install yt-dlp\n' +
  '  - Windows: winget install yt-dlp';

/**
 * Load the config file; without --config a missing ./config.yaml means defaults
 */
async function resolveConfig(options: CliOptions, deps: AppDependencies): Promise<Config> {
  let config: Config;
  if (options.config === undefined && !existsSync(resolve(DEFAULT_CONFIG_PATH))) {
    logger.debug(`No ${DEFAULT_CONFIG_PATH} found, using defaults`);
    config = validateConfig({});
  } else {
    const configPath = options.config ?? DEFAULT_CONFIG_PATH;
    logger.info(`Loading configuration from ${configPath}...`);
    config = await deps.loadConfig(configPath);
  }

  return {
    ...config,
    ...(options.outputDir !== undefined && { output_base: options.outputDir }),
    ...(options.noLinks && { include_links_default: false }),
  };
}

/**
 * Run one batch from the command line
 *
 * @returns Process exit code: 0 when no entry failed, 1 otherwise
 */
export async function runApp(options: CliOptions, deps: AppDependencies = defaultDependencies): Promise<number> {
  const config = await resolveConfig(options, deps);
  logger.setLevel(options.verbose ? LogLevel.DEBUG : parseLogLevel(config.log_level));

  const source = deps.createVideoSource(config);
  if (!(await source.checkInstalled())) {
    throw new TubescribeError(YTDLP_INSTALL_HINT);
  }

  const urls = [...options.urls];
  if (options.fromFile) {
    urls.push(await deps.readUrlFile(options.fromFile));
  }
  if (urls.length === 0) {
    throw new WorkflowError('No URLs given. Pass them as arguments or with --from-file.');
  }

  const context = createSessionContext({
    config,
    notifier: deps.createNotifier(options.verbose ? NotificationLevel.DEBUG : NotificationLevel.INFO),
    source,
    utilities: options.metrics ? { metrics: new SessionMetrics() } : undefined,
  });
  const orchestrator = new Orchestrator(context);

  await orchestrator.submitUrls(urls.join('\n'));
  const progress = await orchestrator.fetchAll();

  applyNamingOverrides(orchestrator, options);

  if (!options.yes && progress.fetched > 0 && deps.isInteractive()) {
    if (!(await deps.runReview(orchestrator))) {
      logger.warning('Review cancelled, nothing was saved');
      return 1;
    }
  } else {
    for (const preview of orchestrator.review()) {
      logger.info(`Will save ${preview.path}`);
    }
  }

  const results = await orchestrator.saveAll();
  const count = (status: ProcessStatus) => results.filter((result) => result.status === status).length;
  const failed = count(ProcessStatus.ERROR);

  const saved = results.filter(isSuccess).length;
  const summary = `Done: ${saved} saved, ${failed} failed, ${count(ProcessStatus.SKIPPED)} skipped`;
  if (failed > 0) {
    logger.warning(summary);
  } else {
    logger.success(summary);
  }

  return failed > 0 ? 1 : 0;
}

/**
 * --author/--topic/--year apply only to a single URL
 */
function applyNamingOverrides(orchestrator: Orchestrator, options: CliOptions): void {
  const { author, topic, year } = options;
  if (author === undefined && topic === undefined && year === undefined) {
    return;
  }

  const entries = orchestrator.batch.entries;
  if (entries.length !== 1) {
    logger.warning('--author, --topic and --year only apply to a single URL; ignoring them');
    return;
  }
  if (!entries[0]?.video) {
    return;
  }

  orchestrator.edit({ index: 0, author, topic, year });
}

// Define CLI using cmd-ts
export const cli = command({
  name: 'tubescribe',
  description: 'Save YouTube transcripts and metadata as Markdown, Word and JSON',
  version: '0.1.0',
  args: {
    urls: restPositionals({
      type: string,
      displayName: 'urls',
      description: 'YouTube video URLs',
    }),
    fromFile: option({
      type: optional(string),
      long: 'from-file',
      short: 'f',
      description: 'Read URLs from a file, one per line (# starts a comment)',
    }),
    config: option({
      type: optional(string),
      long: 'config',
      short: 'c',
      description: 'Path to configuration file (default: ./config.yaml when present)',
    }),
    outputDir: option({
      type: optional(string),
      long: 'output-dir',
      short: 'o',
      description: 'Override output_base',
    }),
    author: option({ type: optional(string), long: 'author', description: 'Author for a single URL' }),
    topic: option({ type: optional(string), long: 'topic', description: 'Topic for a single URL' }),
    year: option({ type: optional(string), long: 'year', description: 'Year for a single URL' }),
    noLinks: flag({
      type: boolean,
      long: 'no-links',
      description: 'Do not extract links from the description',
    }),
    yes: flag({
      type: boolean,
      long: 'yes',
      short: 'y',
      description: 'Accept the proposed naming without the interactive review',
    }),
    verbose: flag({
      type: boolean,
      long: 'verbose',
      description: 'Show debug output',
    }),
    metrics: flag({
      type: boolean,
      long: 'metrics',
      description: 'Print session counters after saving',
    }),
  },
  handler: async (args) => {
    try {
      process.exitCode = await runApp(args);
    } catch (error) {
      if (error instanceof ConfigError) {
        logger.error(`Configuration error: ${error.message}`);
      } else {
        logger.error(`Fatal error: ${errorMessage(error)}`);
      }
      process.exitCode = 1;
    }
  },
});
