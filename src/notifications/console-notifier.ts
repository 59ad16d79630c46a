import { logger } from '../utils/logger.js';
import { isAtLeast, NotificationLevel, type Notifier } from './notifier.js';

const BAR_WIDTH = 20;

/**
 * Render `[███░░░] 3/10 label`
 */
export function formatProgress(current: number, total: number, label: string): string {
  const ratio = total > 0 ? Math.min(1, Math.max(0, current / total)) : 0;
  const filled = Math.round(ratio * BAR_WIDTH);
  return `[${'█'.repeat(filled)}${'░'.repeat(BAR_WIDTH - filled)}] ${current}/${total} ${label}`;
}

/**
 * Terminal notifier: messages go through the logger, progress redraws a single line
 */
export class ConsoleNotifier implements Notifier {
  private lastProgressLength = 0;
  private minLevel: NotificationLevel;
  private stream: NodeJS.WriteStream;

  constructor(minLevel: NotificationLevel = NotificationLevel.INFO, stream: NodeJS.WriteStream = process.stdout) {
    this.minLevel = minLevel;
    this.stream = stream;
  }

  notify(level: NotificationLevel, message: string): void {
    if (!isAtLeast(level, this.minLevel)) {
      return;
    }

    this.clearProgressLine();

    switch (level) {
      case NotificationLevel.DEBUG:
        logger.debug(message);
        break;
      case NotificationLevel.INFO:
        logger.info(message);
        break;
      case NotificationLevel.SUCCESS:
        logger.success(message);
        break;
      case NotificationLevel.WARNING:
        logger.warning(message);
        break;
      case NotificationLevel.ERROR:
        logger.error(message);
        break;
      case NotificationLevel.HIGHLIGHT:
        logger.highlight(message);
        break;
    }
  }

  progress(current: number, total: number, label: string): void {
    const line = formatProgress(current, total, label);
    this.clearProgressLine();
    this.stream.write(`\r${line}`);
    this.lastProgressLength = line.length;
  }

  endProgress(): void {
    if (this.lastProgressLength > 0) {
      this.stream.write('\n');
      this.lastProgressLength = 0;
    }
  }

  private clearProgressLine(): void {
    if (this.lastProgressLength > 0) {
      this.stream.write(`\r${' '.repeat(this.lastProgressLength)}\r`);
      this.lastProgressLength = 0;
    }
  }
}
