export type NotificationLevel = 'success' | 'warning' | 'error';

export type NotificationDetails = Record<string, unknown>;

/**
 * Best-effort notification channel. A failed delivery resolves to false;
 * callers never abort on it.
 */
export interface INotificationService {
  notify(level: NotificationLevel, message: string, details?: NotificationDetails): Promise<boolean>;
}
