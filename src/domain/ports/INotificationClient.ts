import { NotificationResult, NotifyOptions } from '../entities/Notification';

/**
 * Port for sending push notifications.
 * Implementations: PushoverNotificationClient
 */
export interface INotificationClient {
    /**
     * Sends one notification.
     * Throws ValidationError synchronously for bad arguments; every runtime
     * failure resolves as an unsuccessful result instead of rejecting.
     * @param message Message body, at most 1024 characters
     */
    notify(message: string, options?: NotifyOptions): Promise<NotificationResult>;
}
