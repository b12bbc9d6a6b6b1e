import { isMessageType } from '@iotgw/contracts';
import type { MessageEnvelope, ValidationErrorKind } from '@iotgw/contracts';
import { unreachable, type ValidationError } from './errors';

export type ValidationResult =
    | { ok: true; envelope: MessageEnvelope }
    | { ok: false; error: ValidationError };

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isAbsent(value: unknown): boolean {
    return value === undefined || value === null;
}

function reject(kind: ValidationErrorKind, field: string, detail: string): ValidationResult {
    return { ok: false, error: { category: 'validation', kind, field, detail } };
}

/**
 * Check an inbound message and narrow it to a {@link MessageEnvelope}.
 *
 * `type` is checked before `data` so an unknown type is reported even when the
 * payload is also missing or wrong.
 */
export function validateEnvelope(raw: unknown): ValidationResult {
    if (!isRecord(raw)) {
        return reject('MalformedPayload', 'body', 'Message must be a JSON object');
    }

    const { deviceId, type, data } = raw;

    if (isAbsent(deviceId) || deviceId === '') {
        return reject('MissingField', 'deviceId', 'deviceId is required');
    }
    if (typeof deviceId !== 'string') {
        return reject('MalformedPayload', 'deviceId', 'deviceId must be a string');
    }
    if (deviceId.trim() === '') {
        return reject('MissingField', 'deviceId', 'deviceId is required');
    }
    // URL parsers collapse these as dot segments, even percent-encoded.
    if (deviceId === '.' || deviceId === '..') {
        return reject('MalformedPayload', 'deviceId', 'deviceId must not be "." or ".."');
    }

    if (isAbsent(type)) {
        return reject('MissingField', 'type', 'type is required');
    }
    if (!isMessageType(type)) {
        return reject('UnknownType', 'type', `Unsupported message type: ${JSON.stringify(type)}`);
    }

    if (isAbsent(data)) {
        return reject('MissingField', 'data', 'data is required');
    }
    if (!isRecord(data)) {
        return reject('MalformedPayload', 'data', 'data must be an object');
    }

    switch (type) {
        case 'registration': {
            const { username } = data;
            if (typeof username !== 'string' || username.trim() === '') {
                return reject('MalformedPayload', 'data.username', 'Registration data must contain username');
            }
            return { ok: true, envelope: { deviceId, type, data: { username } } };
        }
        case 'reading': {
            const { reading } = data;
            if (typeof reading !== 'number' || !Number.isFinite(reading)) {
                return reject('MalformedPayload', 'data.reading', 'Reading data must contain a numeric reading value');
            }
            return { ok: true, envelope: { deviceId, type, data: { reading } } };
        }
        default:
            return unreachable(type);
    }
}
