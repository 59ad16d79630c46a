import * as fsPromises from 'node:fs/promises';
import { join } from 'node:path';
import { errorMessage } from '../../errors/custom-errors.js';
import { type CommandRunner, execaRunner } from './command-runner.js';

export const YTDLP_BINARY = 'yt-dlp';

export type YtdlpWrapperOptions = {
  /** Additional yt-dlp CLI arguments */
  args?: string[];
  /** Path to cookie file (Netscape format) */
  cookieFile?: string;
  /** Callback for log messages */
  onLog?: (message: string) => void;
};

export type YtdlpDownloadResult = {
  /** Every file yt-dlp reported writing */
  files: string[];
};

const FILE_PATTERNS = [/\[download\] Destination:\s*(.+)/, /\[info\] Writing video subtitles to:\s*(.+)/];

/**
 * Low-level wrapper for the yt-dlp CLI
 */
export class YtdlpWrapper {
  constructor(private readonly runner: CommandRunner = execaRunner) {}

  /**
   * Run yt-dlp with --dump-single-json and return the raw JSON text
   *
   * @throws Error when yt-dlp exits non-zero or cannot be started
   */
  async dumpJson(url: string, options: YtdlpWrapperOptions = {}): Promise<string> {
    const cmdArgs = [...this.baseArgs(options), '--dump-single-json', ...(options.args ?? []), url];

    try {
      return await this.runner.run(YTDLP_BINARY, cmdArgs);
    } catch (error) {
      throw new Error(`yt-dlp failed: ${errorMessage(error)}`);
    }
  }

  /**
   * Run yt-dlp writing into dir with `<outputName>.<ext>` names
   *
   * @param url - Video URL
   * @param outputName - Output filename without extension (for -o template)
   * @param dir - Target directory, created if missing
   */
  async download(
    url: string,
    outputName: string,
    dir: string,
    options: YtdlpWrapperOptions = {},
  ): Promise<YtdlpDownloadResult> {
    const { args = [], onLog } = options;

    await fsPromises.mkdir(dir, { recursive: true });

    const cmdArgs = [...this.baseArgs(options), '--newline', '-o', join(dir, `${outputName}.%(ext)s`), ...args, url];

    const files = new Set<string>();
    const outputBuffer: string[] = [];

    const handleLine = (line: string) => {
      const text = line.trim();
      if (!text) return;

      outputBuffer.push(text);

      for (const pattern of FILE_PATTERNS) {
        const match = text.match(pattern);
        if (match?.[1]) files.add(match[1]);
      }

      onLog?.(text);
    };

    try {
      await this.runner.stream(YTDLP_BINARY, cmdArgs, handleLine);
    } catch (error) {
      throw new Error(`yt-dlp failed: ${errorMessage(error)}\n\nLog output:\n${outputBuffer.join('\n')}`);
    }

    return { files: Array.from(files) };
  }

  /**
   * Check if yt-dlp is installed
   */
  async checkInstalled(): Promise<boolean> {
    try {
      await this.runner.run(YTDLP_BINARY, ['--version']);
      return true;
    } catch {
      return false;
    }
  }

  private baseArgs(options: YtdlpWrapperOptions): string[] {
    const args = ['--no-warnings', '--no-playlist'];
    if (options.cookieFile) {
      args.unshift('--cookies', options.cookieFile);
    }
    return args;
  }
}
