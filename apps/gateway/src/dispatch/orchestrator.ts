/**
 * Dispatch Orchestrator — end-to-end handling of one inbound message.
 *
 * Received → Validating → Routing → Forwarding → Completed, with an exit to
 * Failed from any step. Exactly one GatewayResponse per message and at most one
 * downstream call. No state survives between calls to `handle`.
 */

import type { FastifyBaseLogger } from 'fastify';
import type { GatewayErrorBody, GatewaySuccessBody, MessageEnvelope } from '@iotgw/contracts';
import { unreachable, type DispatchError } from './errors';
import { validateEnvelope } from './validate';
import { routeMessage, type RoutingTargets } from './router';
import type { DownstreamClient, DownstreamResponse } from './downstream';

// ─── Types ───────────────────────────────────────────────────────────────────

export type DispatchState = 'Received' | 'Validating' | 'Routing' | 'Forwarding' | 'Completed' | 'Failed';

export interface DispatchResult {
    success: boolean;
    downstreamStatus?: number;
    body?: unknown;
    error?: DispatchError;
}

export type GatewayResponse =
    | {
        state: 'Completed';
        statusCode: number;
        body: GatewaySuccessBody;
        result: DispatchResult;
    }
    | {
        state: 'Failed';
        // The step that was running when dispatch failed.
        failedIn: DispatchState;
        statusCode: number;
        body: GatewayErrorBody;
        result: DispatchResult;
    };

export type DispatchLogger = Pick<FastifyBaseLogger, 'debug' | 'info' | 'warn' | 'error'>;

export interface HandleOptions {
    log: DispatchLogger;
    // Aborted when the inbound caller goes away.
    signal?: AbortSignal;
}

export interface Dispatcher {
    handle(raw: unknown, options: HandleOptions): Promise<GatewayResponse>;
}

export interface DispatcherDeps {
    targets: RoutingTargets;
    client: DownstreamClient;
}

// ─── Status mapping ──────────────────────────────────────────────────────────

export function statusForError(error: DispatchError): number {
    switch (error.category) {
        case 'validation':
            return 422;
        case 'routing':
            return 500;
        case 'downstream': {
            const kind = error.kind;
            switch (kind) {
                case 'Unreachable':
                    return 502;
                case 'Timeout':
                    return 504;
                case 'BadResponse':
                    // Downstream 4xx means the collaborator rejected what we sent; pass it through.
                    return error.status !== undefined && error.status >= 400 && error.status < 500
                        ? error.status
                        : 502;
                default:
                    return unreachable(kind);
            }
        }
        default:
            return unreachable(error);
    }
}

export function errorBody(error: DispatchError): GatewayErrorBody {
    const body: GatewayErrorBody = { error: { kind: error.kind, detail: error.detail } };
    if (error.category === 'validation') {
        body.error.field = error.field;
    }
    if (error.category === 'downstream' && error.status !== undefined) {
        body.error.downstreamStatus = error.status;
    }
    return body;
}

function successBody(envelope: MessageEnvelope, response: DownstreamResponse): GatewaySuccessBody {
    switch (envelope.type) {
        case 'registration':
            return {
                ok: true,
                message: 'Registration processed successfully',
                deviceId: envelope.deviceId,
                type: 'registration',
                downstreamStatus: response.status,
                result: response.body,
            };
        case 'reading':
            return {
                ok: true,
                message: 'Reading processed successfully',
                deviceId: envelope.deviceId,
                type: 'reading',
                reading: envelope.data.reading,
                downstreamStatus: response.status,
                result: response.body,
            };
        default:
            return unreachable(envelope);
    }
}

// ─── Dispatcher ──────────────────────────────────────────────────────────────

export function createDispatcher({ targets, client }: DispatcherDeps): Dispatcher {
    return {
        async handle(raw, { log, signal }) {
            let state: DispatchState = 'Received';
            const enter = (next: DispatchState) => {
                log.debug({ event: 'dispatch_state', from: state, to: next }, 'Dispatch state change');
                state = next;
            };

            const failed = (error: DispatchError, context: Record<string, unknown>): GatewayResponse => {
                const failedIn = state;
                enter('Failed');
                const statusCode = statusForError(error);
                const fields = {
                    event: `dispatch_${error.category}_failed`,
                    kind: error.kind,
                    failed_in: failedIn,
                    status_code: statusCode,
                    detail: error.detail,
                    ...context,
                };
                if (error.category === 'validation') {
                    log.warn(fields, 'Message rejected');
                } else {
                    log.error(fields, 'Message dispatch failed');
                }

                const result: DispatchResult = { success: false, error };
                if (error.category === 'downstream' && error.status !== undefined) {
                    result.downstreamStatus = error.status;
                }
                return { state: 'Failed', failedIn, statusCode, body: errorBody(error), result };
            };

            enter('Validating');
            const validated = validateEnvelope(raw);
            if (!validated.ok) {
                return failed(validated.error, { field: validated.error.field });
            }
            const envelope = validated.envelope;
            const context = { device_id: envelope.deviceId, type: envelope.type };
            log.info({ event: 'message_received', ...context }, 'Received message');

            enter('Routing');
            const routed = routeMessage(targets, envelope.type);
            if (!routed.ok) {
                return failed(routed.error, context);
            }

            enter('Forwarding');
            const forwarded = await client.forward(routed.target, envelope, signal);
            if (!forwarded.ok) {
                return failed(forwarded.error, context);
            }

            enter('Completed');
            const { response } = forwarded;
            log.info({ event: 'message_dispatched', ...context, downstream_status: response.status }, 'Message dispatched');
            return {
                state: 'Completed',
                statusCode: 200,
                body: successBody(envelope, response),
                result: { success: true, downstreamStatus: response.status, body: response.body },
            };
        },
    };
}
