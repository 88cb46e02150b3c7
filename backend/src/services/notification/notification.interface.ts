export type NotificationKind = 'email_verification' | 'password_reset';

export interface Notification {
    kind: NotificationKind;
    to: string;
    username: string;
    link: string;
}

/**
 * Out-of-band delivery of verification and password-reset links.
 * Implement this for SMTP, a transactional mail API, etc.
 */
export interface NotificationDispatcher {
    readonly name: string;
    send(notification: Notification): Promise<void>;
}
