import { inject, injectable } from 'tsyringe';
import { INotificationService, NotificationDetails, NotificationLevel } from './notification.interface';

const LEVEL_RANK: Record<NotificationLevel, number> = {
  success: 0,
  warning: 1,
  error: 2
};

const LEVEL_LABEL: Record<NotificationLevel, string> = {
  success: 'SUCCESS',
  warning: 'WARNING',
  error: 'ERROR'
};

@injectable()
export class ConsoleNotificationAdapter implements INotificationService {
  constructor(@inject('NotificationLevel') private readonly minLevel: NotificationLevel) {}

  async notify(level: NotificationLevel, message: string, details?: NotificationDetails): Promise<boolean> {
    // Errors always go out
    if (level !== 'error' && LEVEL_RANK[level] < LEVEL_RANK[this.minLevel]) {
      return true;
    }

    try {
      const line = details
        ? `[Notification] ${LEVEL_LABEL[level]}: ${message} | Details: ${JSON.stringify(details)}`
        : `[Notification] ${LEVEL_LABEL[level]}: ${message}`;

      if (level === 'error') {
        console.error(line);
      } else if (level === 'warning') {
        console.warn(line);
      } else {
        console.log(line);
      }
      return true;
    } catch (error) {
      console.error('[Notification] Failed to send notification:', error);
      return false;
    }
  }
}
