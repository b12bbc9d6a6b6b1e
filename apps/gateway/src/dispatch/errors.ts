import type {
    DownstreamErrorKind,
    MessageType,
    RoutingErrorKind,
    ValidationErrorKind,
} from '@iotgw/contracts';

// Caller's fault: malformed or unrecognized envelope.
export interface ValidationError {
    category: 'validation';
    kind: ValidationErrorKind;
    field: string;
    detail: string;
}

// Operator's fault: known type with no configured target.
export interface RoutingError {
    category: 'routing';
    kind: RoutingErrorKind;
    type: MessageType;
    detail: string;
}

// Environment's fault: network, timeout or bad response from a collaborator.
export interface DownstreamError {
    category: 'downstream';
    kind: DownstreamErrorKind;
    status?: number;
    detail: string;
}

export type DispatchError = ValidationError | RoutingError | DownstreamError;

export function unreachable(value: never): never {
    throw new Error(`Unhandled variant: ${JSON.stringify(value)}`);
}
