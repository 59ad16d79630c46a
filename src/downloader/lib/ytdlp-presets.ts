import type { YtdlpWrapper, YtdlpWrapperOptions } from './ytdlp-wrapper.js';

/**
 * The two yt-dlp modes the downloader uses
 */
export class YtdlpPresets {
  constructor(private wrapper: YtdlpWrapper) {}

  /**
   * Metadata only: the info dump, nothing downloaded
   */
  async fetchInfo(url: string, options?: YtdlpWrapperOptions): Promise<string> {
    return this.wrapper.dumpJson(url, {
      ...options,
      args: ['--skip-download', ...(options?.args ?? [])],
    });
  }

  /**
   * Auto-generated subtitles only, as VTT, for the given languages
   */
  async downloadAutoSubtitles(
    url: string,
    outputName: string,
    dir: string,
    subLangs: string[],
    options?: YtdlpWrapperOptions,
  ) {
    return this.wrapper.download(url, outputName, dir, {
      ...options,
      args: [
        '--skip-download',
        '--write-auto-subs',
        '--sub-langs',
        subLangs.join(','),
        '--sub-format',
        'vtt',
        ...(options?.args ?? []),
      ],
    });
  }
}
