import type { MessageType } from '@iotgw/contracts';
import type { RoutingError } from './errors';

/** Base URL per message type; `null` leaves a type unserved. Frozen at startup. */
export type RoutingTargets = Readonly<Record<MessageType, string | null>>;

export interface DownstreamTarget {
    type: MessageType;
    baseUrl: string;
}

export type RouteResult =
    | { ok: true; target: DownstreamTarget }
    | { ok: false; error: RoutingError };

export function createRoutingTargets(targets: Record<MessageType, string | null>): RoutingTargets {
    return Object.freeze({ ...targets });
}

export function routeMessage(targets: RoutingTargets, type: MessageType): RouteResult {
    const baseUrl = targets[type];
    if (!baseUrl) {
        return {
            ok: false,
            error: {
                category: 'routing',
                kind: 'NoTargetConfigured',
                type,
                detail: `No downstream service configured for message type "${type}"`,
            },
        };
    }
    return { ok: true, target: { type, baseUrl } };
}
