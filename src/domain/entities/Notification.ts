/**
 * Notification Entity
 *
 * A single push notification, validated and ready to encode for the
 * Pushover messages endpoint. Nothing here outlives one notify call.
 */

import { ValidationError } from '../errors';

/**
 * Delivery priority. Values are the integers the service expects on the wire.
 */
export enum NotificationPriority {
    /** No notification, only the app badge is incremented */
    LOWEST = -2,
    /** Popup without sound or vibration */
    LOW = -1,
    /** Sound, vibration and popup, subject to device settings */
    NORMAL = 0,
    /** Bypasses the user's quiet hours */
    HIGH = 1,
    /** Re-alerts until acknowledged or expired */
    EMERGENCY = 2,
}

export const PRIORITY_LEVELS: readonly NotificationPriority[] = [
    NotificationPriority.LOWEST,
    NotificationPriority.LOW,
    NotificationPriority.NORMAL,
    NotificationPriority.HIGH,
    NotificationPriority.EMERGENCY,
];

export const MAX_MESSAGE_LENGTH = 1024;
export const MAX_TITLE_LENGTH = 250;
export const MAX_URL_LENGTH = 512;
export const MAX_URL_TITLE_LENGTH = 100;

export const DEFAULT_SOUND = 'persistent';
export const DEFAULT_EMERGENCY_RETRY_SECONDS = 60;
export const DEFAULT_EMERGENCY_EXPIRE_SECONDS = 3600;
export const MIN_EMERGENCY_RETRY_SECONDS = 30;
export const MAX_EMERGENCY_EXPIRE_SECONDS = 10800;

/**
 * Built-in sounds. Accounts may upload custom sounds, so this list only
 * drives a warning, never a rejection.
 */
export const PUSHOVER_SOUNDS: readonly string[] = [
    'pushover', 'bike', 'bugle', 'cashregister', 'classical', 'cosmic', 'falling', 'gamelan',
    'incoming', 'intermission', 'magic', 'mechanical', 'pianobar', 'siren', 'spacealarm',
    'tugboat', 'alien', 'climb', 'persistent', 'echo', 'updown', 'vibrate', 'none',
];

/**
 * What to do with a message or title longer than the service accepts.
 */
export type OversizePolicy = 'reject' | 'truncate';

export interface EmergencyOptions {
    /** Seconds between re-alerts (minimum 30) */
    retrySeconds?: number;
    /** Seconds before re-alerting stops (maximum 10800) */
    expireSeconds?: number;
}

/**
 * Optional display parameters accepted by notify().
 */
export interface NotifyOptions {
    /** Defaults to the application's name on the service side */
    title?: string;
    /** Registered device name; omitted means every device on the account */
    deviceId?: string;
    sound?: string;
    priority?: NotificationPriority;
    /** Supplementary URL shown with the message */
    url?: string;
    urlTitle?: string;
    /** Only valid with EMERGENCY priority */
    emergency?: EmergencyOptions;
}

export interface NotificationRequest {
    message: string;
    title?: string;
    deviceId?: string;
    sound: string;
    priority: NotificationPriority;
    url?: string;
    urlTitle?: string;
    retrySeconds?: number;
    expireSeconds?: number;
}

export interface NotificationCredentials {
    /** User or group key of the receiving account */
    accountKey: string;
    /** API token of the sending application */
    applicationKey: string;
}

export type NotificationFailure = 'transport' | 'http' | 'service' | 'protocol';

export type NotificationResult =
    | {
        success: true;
        detail: string;
        requestId?: string;
        /** Receipt for acknowledging EMERGENCY notifications */
        receipt?: string;
    }
    | {
        success: false;
        detail: string;
        failure: NotificationFailure;
        /** HTTP status, when a response arrived */
        status?: number;
        requestId?: string;
    };

export function isNotificationPriority(value: unknown): value is NotificationPriority {
    return typeof value === 'number' && PRIORITY_LEVELS.some(level => level === value);
}

export function isKnownSound(name: string): boolean {
    return PUSHOVER_SOUNDS.includes(name);
}

/**
 * Length in code points, the unit the service counts in.
 */
export function textLength(text: string): number {
    return Array.from(text).length;
}

const ELLIPSIS = '…';

function truncateText(text: string, maxLength: number): string {
    const codePoints = Array.from(text);
    if (codePoints.length <= maxLength) {
        return text;
    }
    return codePoints.slice(0, maxLength - 1).join('') + ELLIPSIS;
}

function fitLength(field: string, text: string, maxLength: number, policy: OversizePolicy): string {
    const length = textLength(text);
    if (length <= maxLength) {
        return text;
    }
    if (policy === 'truncate') {
        return truncateText(text, maxLength);
    }
    throw new ValidationError(field, `${field} must be at most ${maxLength} characters, got ${length}`);
}

function requireNonBlank(field: string, value: unknown): string {
    if (typeof value !== 'string' || !value.trim()) {
        throw new ValidationError(field, `${field} must be a non-empty string`);
    }
    return value;
}

function requireInteger(field: string, value: number, min: number, max: number): number {
    if (!Number.isInteger(value) || value < min || value > max) {
        throw new ValidationError(field, `${field} must be an integer between ${min} and ${max}, got ${value}`);
    }
    return value;
}

/**
 * Validates notify() arguments and applies defaults.
 * @throws ValidationError when any argument breaks the service's limits
 */
export function createNotificationRequest(
    message: string,
    options: NotifyOptions = {},
    policy: OversizePolicy = 'reject'
): NotificationRequest {
    const priority = options.priority ?? NotificationPriority.NORMAL;
    if (!isNotificationPriority(priority)) {
        throw new ValidationError('priority', `priority must be one of ${PRIORITY_LEVELS.join(', ')}, got ${String(priority)}`);
    }

    const request: NotificationRequest = {
        message: fitLength('message', requireNonBlank('message', message), MAX_MESSAGE_LENGTH, policy),
        sound: requireNonBlank('sound', options.sound ?? DEFAULT_SOUND),
        priority,
    };

    if (options.title !== undefined) {
        request.title = fitLength('title', requireNonBlank('title', options.title), MAX_TITLE_LENGTH, policy);
    }
    if (options.deviceId !== undefined) {
        request.deviceId = requireNonBlank('deviceId', options.deviceId);
    }

    if (options.url !== undefined) {
        request.url = fitLength('url', requireNonBlank('url', options.url), MAX_URL_LENGTH, 'reject');
    }
    if (options.urlTitle !== undefined) {
        if (request.url === undefined) {
            throw new ValidationError('urlTitle', 'urlTitle requires url');
        }
        request.urlTitle = fitLength('urlTitle', requireNonBlank('urlTitle', options.urlTitle), MAX_URL_TITLE_LENGTH, policy);
    }

    if (priority === NotificationPriority.EMERGENCY) {
        const emergency = options.emergency ?? {};
        request.retrySeconds = requireInteger(
            'emergency.retrySeconds',
            emergency.retrySeconds ?? DEFAULT_EMERGENCY_RETRY_SECONDS,
            MIN_EMERGENCY_RETRY_SECONDS,
            MAX_EMERGENCY_EXPIRE_SECONDS
        );
        request.expireSeconds = requireInteger(
            'emergency.expireSeconds',
            emergency.expireSeconds ?? DEFAULT_EMERGENCY_EXPIRE_SECONDS,
            1,
            MAX_EMERGENCY_EXPIRE_SECONDS
        );
    } else if (options.emergency !== undefined) {
        throw new ValidationError('emergency', 'emergency options require EMERGENCY priority');
    }

    return request;
}

/**
 * Encodes a request as the form fields the messages endpoint takes.
 */
export function toFormFields(request: NotificationRequest, credentials: NotificationCredentials): URLSearchParams {
    const form = new URLSearchParams();
    form.append('token', credentials.applicationKey);
    form.append('user', credentials.accountKey);
    form.append('message', request.message);

    if (request.title !== undefined) {
        form.append('title', request.title);
    }
    if (request.deviceId !== undefined) {
        form.append('device', request.deviceId);
    }

    form.append('sound', request.sound);
    form.append('priority', String(request.priority));

    if (request.url !== undefined) {
        form.append('url', request.url);
    }
    if (request.urlTitle !== undefined) {
        form.append('url_title', request.urlTitle);
    }
    if (request.retrySeconds !== undefined && request.expireSeconds !== undefined) {
        form.append('retry', String(request.retrySeconds));
        form.append('expire', String(request.expireSeconds));
    }

    return form;
}
