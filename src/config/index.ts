import dotenv from 'dotenv';
import { NotificationPriority, OversizePolicy, isNotificationPriority } from '../domain/entities/Notification';
import { DEFAULT_TIMEOUT_MS, PUSHOVER_API_URL } from '../infrastructure/notifications/PushoverNotificationClient';

// Load environment variables
dotenv.config();

/**
 * Configuration loaded from environment variables.
 */
export interface Config {
    // Credentials
    userKey: string;
    apiToken: string;

    // Transport
    apiUrl: string;
    timeoutMs: number;

    // Defaults applied by the CLI
    defaultDevice?: string;
    defaultSound: string;
    defaultPriority: NotificationPriority;
    oversizePolicy: OversizePolicy;
}

function getEnvVar(key: string, defaultValue: string): string {
    let value = process.env[key];
    if (value === undefined) {
        return defaultValue;
    }

    // Trim whitespace and remove wrapping quotes
    value = value.trim();
    if (value.startsWith('"') && value.endsWith('"')) {
        value = value.substring(1, value.length - 1);
    } else if (value.startsWith("'") && value.endsWith("'")) {
        value = value.substring(1, value.length - 1);
    }

    return value;
}

function getEnvVarNumber(key: string, defaultValue: number): number {
    const value = getEnvVar(key, String(defaultValue));
    const parsed = Number(value);
    if (value === '' || isNaN(parsed)) {
        throw new Error(`Environment variable ${key} must be a number, got: ${value}`);
    }
    return parsed;
}

function getEnvVarPriority(key: string, defaultValue: NotificationPriority): NotificationPriority {
    const value = getEnvVarNumber(key, defaultValue);
    if (!isNotificationPriority(value)) {
        throw new Error(`Environment variable ${key} must be a priority between -2 and 2, got: ${value}`);
    }
    return value;
}

function getEnvVarOversizePolicy(key: string): OversizePolicy {
    const value = getEnvVar(key, 'reject').toLowerCase();
    if (value !== 'reject' && value !== 'truncate') {
        throw new Error(`Environment variable ${key} must be "reject" or "truncate", got: ${value}`);
    }
    return value;
}

/**
 * Loads configuration from environment variables.
 * Missing credentials load as empty strings; validateConfig() reports them.
 */
export function loadConfig(): Config {
    const defaultDevice = getEnvVar('PUSHOVER_DEVICE', '');
    return {
        userKey: getEnvVar('PUSHOVER_USER_KEY', ''),
        apiToken: getEnvVar('PUSHOVER_API_TOKEN', ''),

        apiUrl: getEnvVar('PUSHOVER_API_URL', PUSHOVER_API_URL),
        timeoutMs: getEnvVarNumber('PUSHOVER_TIMEOUT_MS', DEFAULT_TIMEOUT_MS),

        defaultDevice: defaultDevice || undefined,
        defaultSound: getEnvVar('PUSHOVER_SOUND', 'persistent'),
        defaultPriority: getEnvVarPriority('PUSHOVER_PRIORITY', NotificationPriority.NORMAL),
        oversizePolicy: getEnvVarOversizePolicy('PUSHOVER_OVERSIZE_POLICY'),
    };
}

/**
 * Validates that the values needed to send are present and usable.
 */
export function validateConfig(config: Config): string[] {
    const errors: string[] = [];

    if (!config.userKey) {
        errors.push('PUSHOVER_USER_KEY is required');
    }
    if (!config.apiToken) {
        errors.push('PUSHOVER_API_TOKEN is required');
    }
    if (!Number.isInteger(config.timeoutMs) || config.timeoutMs <= 0) {
        errors.push('PUSHOVER_TIMEOUT_MS must be a positive integer');
    }
    if (!config.defaultSound) {
        errors.push('PUSHOVER_SOUND must not be empty');
    }

    return errors;
}

// Singleton config instance (lazy loaded)
let cachedConfig: Config | null = null;

export function getConfig(): Config {
    if (!cachedConfig) {
        cachedConfig = loadConfig();
    }
    return cachedConfig;
}

export function resetConfig(): void {
    cachedConfig = null;
}
