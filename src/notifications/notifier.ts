import { createEnum } from '../utils/create-enum.js';

const notificationLevel = createEnum(['debug', 'info', 'success', 'highlight', 'warning', 'error'] as const);

export const NotificationLevel = notificationLevel.object;

export type NotificationLevel = typeof notificationLevel.type;

/**
 * Whether level is at least as severe as minLevel
 */
export function isAtLeast(level: NotificationLevel, minLevel: NotificationLevel): boolean {
  return notificationLevel.values.indexOf(level) >= notificationLevel.values.indexOf(minLevel);
}

/**
 * User-facing status channel for the workflow: per-entry outcomes and batch progress
 */
export type Notifier = {
  notify(level: NotificationLevel, message: string): Promise<void> | void;

  /**
   * Show batch progress, e.g. "Fetching 3/10"
   */
  progress(current: number, total: number, label: string): Promise<void> | void;

  /**
   * Close the progress line
   */
  endProgress(): Promise<void> | void;
};
