export type { NotificationDispatcher, Notification, NotificationKind } from './notification.interface';
export { LogNotificationDispatcher } from './log.dispatcher';
