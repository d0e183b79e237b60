import { Config } from '../../config';
import { PushoverNotificationClient } from './PushoverNotificationClient';

/**
 * Builds a client from loaded configuration.
 */
export function createPushoverClient(config: Config): PushoverNotificationClient {
    return new PushoverNotificationClient(config.userKey, config.apiToken, {
        apiUrl: config.apiUrl,
        timeoutMs: config.timeoutMs,
        oversizePolicy: config.oversizePolicy,
    });
}
