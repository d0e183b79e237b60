import Ajv, { JSONSchemaType } from 'ajv';

/**
 * Body returned by the messages endpoint, on success and on rejection.
 */
export interface PushoverResponse {
    /** 1 when the message was accepted */
    status: number;
    request?: string;
    errors?: string[];
    receipt?: string;
}

const PUSHOVER_RESPONSE_SCHEMA: JSONSchemaType<PushoverResponse> = {
    type: 'object',
    properties: {
        status: { type: 'integer' },
        request: { type: 'string', nullable: true },
        errors: { type: 'array', items: { type: 'string' }, nullable: true },
        receipt: { type: 'string', nullable: true },
    },
    required: ['status'],
    additionalProperties: true,
};

const ajv = new Ajv({ allErrors: true });
const validateResponse = ajv.compile(PUSHOVER_RESPONSE_SCHEMA);

/**
 * Parses a raw response body. Returns null for anything that is not JSON
 * of the documented shape.
 */
export function parsePushoverResponse(body: string): PushoverResponse | null {
    let data: unknown;
    try {
        data = JSON.parse(body);
    } catch {
        return null;
    }
    return validateResponse(data) ? data : null;
}
