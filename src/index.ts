/**
 * Library entry point.
 *
 * Use src/cli.ts for the command-line sender.
 */

export { PushoverNotificationClient, PUSHOVER_API_URL, DEFAULT_TIMEOUT_MS } from './infrastructure/notifications/PushoverNotificationClient';
export type { PushoverClientOptions } from './infrastructure/notifications/PushoverNotificationClient';
export { createPushoverClient } from './infrastructure/notifications/PushoverClientFactory';
export { parsePushoverResponse } from './infrastructure/notifications/PushoverResponse';
export type { PushoverResponse } from './infrastructure/notifications/PushoverResponse';
export type { INotificationClient } from './domain/ports/INotificationClient';
export {
    NotificationPriority,
    PRIORITY_LEVELS,
    PUSHOVER_SOUNDS,
    MAX_MESSAGE_LENGTH,
    MAX_TITLE_LENGTH,
    DEFAULT_SOUND,
    createNotificationRequest,
    toFormFields,
    isKnownSound,
    isNotificationPriority,
} from './domain/entities/Notification';
export type {
    NotifyOptions,
    EmergencyOptions,
    NotificationRequest,
    NotificationCredentials,
    NotificationResult,
    NotificationFailure,
    OversizePolicy,
} from './domain/entities/Notification';
export { ValidationError } from './domain/errors';
export { loadConfig, validateConfig, getConfig, resetConfig } from './config';
export type { Config } from './config';
