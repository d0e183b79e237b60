import axios from 'axios';
import { INotificationClient } from '../../domain/ports/INotificationClient';
import {
    NotificationCredentials,
    NotificationRequest,
    NotificationResult,
    NotifyOptions,
    OversizePolicy,
    createNotificationRequest,
    isKnownSound,
    toFormFields,
} from '../../domain/entities/Notification';
import { ValidationError } from '../../domain/errors';
import { parsePushoverResponse } from './PushoverResponse';

export const PUSHOVER_API_URL = 'https://api.pushover.net/1/messages.json';
export const DEFAULT_TIMEOUT_MS = 15000;

export interface PushoverClientOptions {
    /** Messages endpoint, overridable for proxies and tests */
    apiUrl?: string;
    /** Upper bound for the whole request, connect through last body byte */
    timeoutMs?: number;
    oversizePolicy?: OversizePolicy;
}

const TIMEOUT_CODES = ['ECONNABORTED', 'ETIMEDOUT'];

/**
 * Pushover client. Sends one form-encoded POST per notification and reports
 * the outcome as a result value. No retries.
 *
 * Holds no per-call state, so sequential reuse is safe; callers coordinating
 * concurrent sends share the underlying HTTP agent.
 */
export class PushoverNotificationClient implements INotificationClient {
    private readonly credentials: NotificationCredentials;
    private readonly apiUrl: string;
    private readonly timeoutMs: number;
    private readonly oversizePolicy: OversizePolicy;

    constructor(accountKey: string, applicationKey: string, options: PushoverClientOptions = {}) {
        if (!accountKey || !accountKey.trim()) {
            throw new ValidationError('accountKey', 'Pushover account key is required');
        }
        if (!applicationKey || !applicationKey.trim()) {
            throw new ValidationError('applicationKey', 'Pushover application key is required');
        }

        const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
        if (!Number.isInteger(timeoutMs) || timeoutMs <= 0) {
            throw new ValidationError('timeoutMs', `timeoutMs must be a positive integer, got ${timeoutMs}`);
        }

        this.credentials = { accountKey, applicationKey };
        this.apiUrl = options.apiUrl ?? PUSHOVER_API_URL;
        this.timeoutMs = timeoutMs;
        this.oversizePolicy = options.oversizePolicy ?? 'reject';
    }

    /**
     * Validates synchronously, then sends.
     * @throws ValidationError before any request is made
     */
    notify(message: string, options: NotifyOptions = {}): Promise<NotificationResult> {
        const request = createNotificationRequest(message, options, this.oversizePolicy);
        return this.send(request);
    }

    /**
     * Form body that notify() would send for these arguments.
     */
    buildForm(message: string, options: NotifyOptions = {}): URLSearchParams {
        return toFormFields(createNotificationRequest(message, options, this.oversizePolicy), this.credentials);
    }

    private async send(request: NotificationRequest): Promise<NotificationResult> {
        if (!isKnownSound(request.sound)) {
            console.warn(`[Pushover] Sound "${request.sound}" is not a built-in sound; the service may reject it`);
        }

        const target = request.deviceId ?? 'all devices';
        console.log(`[Pushover] Sending notification (priority ${request.priority}) to ${target}`);

        // Deadline for the whole exchange; axios's own timeout resets on every byte
        const controller = new AbortController();
        const deadline = setTimeout(() => controller.abort(), this.timeoutMs);

        let status: number;
        let body: string;
        try {
            const response = await axios.post<string>(
                this.apiUrl,
                toFormFields(request, this.credentials).toString(),
                {
                    headers: {
                        'Content-Type': 'application/x-www-form-urlencoded',
                    },
                    timeout: this.timeoutMs,
                    signal: controller.signal,
                    responseType: 'text',
                    // Every status is interpreted below
                    validateStatus: () => true,
                }
            );
            status = response.status;
            body = typeof response.data === 'string' ? response.data : '';
        } catch (error) {
            const detail = `network error: ${this.describeTransportError(error, controller.signal.aborted)}`;
            console.error(`[Pushover] ${detail}`);
            return { success: false, detail, failure: 'transport' };
        } finally {
            clearTimeout(deadline);
        }

        const result = this.interpretResponse(status, body);
        if (!result.success) {
            console.error(`[Pushover] Notification failed: ${result.detail}`);
        }
        return result;
    }

    private interpretResponse(status: number, body: string): NotificationResult {
        const ok = status >= 200 && status < 300;
        const parsed = parsePushoverResponse(body);

        if (!parsed) {
            return ok
                ? { success: false, detail: 'malformed response', failure: 'protocol', status }
                : { success: false, detail: `http error: status ${status}`, failure: 'http', status };
        }

        if (ok && parsed.status === 1) {
            return {
                success: true,
                detail: 'success',
                requestId: parsed.request,
                receipt: parsed.receipt,
            };
        }

        if (parsed.errors && parsed.errors.length > 0) {
            return {
                success: false,
                detail: `service rejected request: ${parsed.errors.join('; ')}`,
                failure: 'service',
                status,
                requestId: parsed.request,
            };
        }

        if (ok) {
            return {
                success: false,
                detail: `service rejected request: status ${parsed.status}`,
                failure: 'service',
                status,
                requestId: parsed.request,
            };
        }

        return {
            success: false,
            detail: `http error: status ${status}`,
            failure: 'http',
            status,
            requestId: parsed.request,
        };
    }

    private describeTransportError(error: unknown, deadlineExpired: boolean): string {
        if (deadlineExpired || axios.isCancel(error)) {
            return `request timed out after ${this.timeoutMs}ms`;
        }
        if (axios.isAxiosError(error)) {
            if (error.code && TIMEOUT_CODES.includes(error.code)) {
                return `request timed out after ${this.timeoutMs}ms`;
            }
            return error.message;
        }
        return error instanceof Error ? error.message : String(error);
    }
}
