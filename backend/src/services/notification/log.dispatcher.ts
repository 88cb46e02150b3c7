import type { NotificationDispatcher, Notification } from './notification.interface';
import { createChildLogger } from '../../utils/logger';

const logger = createChildLogger({ module: 'notifications' });

const SUBJECTS: Record<Notification['kind'], string> = {
    email_verification: 'Confirm your email',
    password_reset: 'Password Reset Request',
};

/**
 * Dispatcher used when no mail transport is configured.
 * The link carries a live token, so it is only emitted at debug level.
 */
export class LogNotificationDispatcher implements NotificationDispatcher {
    readonly name = 'log';

    async send(notification: Notification): Promise<void> {
        logger.info({ to: notification.to, kind: notification.kind }, SUBJECTS[notification.kind]);
        logger.debug({ to: notification.to, link: notification.link }, 'Notification link');
    }
}
