import { execa } from 'execa';

/**
 * Subprocess seam used by YtdlpWrapper
 */
export type CommandRunner = {
  /**
   * Run to completion and return stdout
   */
  run(file: string, args: string[]): Promise<string>;

  /**
   * Run to completion, handing each stdout/stderr line to onLine as it arrives
   */
  stream(file: string, args: string[], onLine: (line: string) => void): Promise<void>;
};

/**
 * CommandRunner backed by execa. Non-zero exits reject with execa's error.
 */
export const execaRunner: CommandRunner = {
  async run(file, args) {
    const { stdout } = await execa(file, args);
    return stdout;
  },

  async stream(file, args, onLine) {
    const subprocess = execa(file, args, { all: true });
    for await (const line of subprocess.iterable({ from: 'all' })) {
      onLine(line);
    }
    await subprocess;
  },
};
