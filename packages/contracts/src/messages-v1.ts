export const MESSAGE_TYPES = ['registration', 'reading'] as const;

export type MessageType = typeof MESSAGE_TYPES[number];

export interface RegistrationData {
    username: string;
}

export interface ReadingData {
    reading: number;
}

export interface RegistrationEnvelope {
    deviceId: string;
    type: 'registration';
    data: RegistrationData;
}

export interface ReadingEnvelope {
    deviceId: string;
    type: 'reading';
    data: ReadingData;
}

export type MessageEnvelope = RegistrationEnvelope | ReadingEnvelope;

// ─── Downstream request bodies ───────────────────────────────────────────────

// PUT {deviceService}/devices/:deviceId
export interface DeviceUpsertBody {
    deviceId: string;
    username: string;
}

// POST {readingService}/readings
export interface ReadingIngestBody {
    deviceId: string;
    reading: number;
}

// ─── Gateway responses ───────────────────────────────────────────────────────

export type ValidationErrorKind = 'MissingField' | 'UnknownType' | 'MalformedPayload';
export type RoutingErrorKind = 'NoTargetConfigured';
export type DownstreamErrorKind = 'Unreachable' | 'Timeout' | 'BadResponse';

export type GatewayErrorKind = ValidationErrorKind | RoutingErrorKind | DownstreamErrorKind;

export interface GatewayErrorBody {
    error: {
        kind: GatewayErrorKind;
        field?: string;
        detail?: string;
        downstreamStatus?: number;
    };
}

export interface GatewaySuccessBody {
    ok: true;
    message: string;
    deviceId: string;
    type: MessageType;
    reading?: number;
    downstreamStatus: number;
    result: unknown;
}

export type GatewayResponseBody = GatewaySuccessBody | GatewayErrorBody;

export function isMessageType(value: unknown): value is MessageType {
    return MESSAGE_TYPES.some((type) => type === value);
}
