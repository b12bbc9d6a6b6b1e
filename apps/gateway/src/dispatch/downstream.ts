/**
 * Downstream Client — one outbound HTTP call per dispatched message.
 *
 * Single attempt, bounded by `timeoutMs` over the whole exchange (connect,
 * status and body). Transport failures come back as a {@link DownstreamError}
 * value; nothing here throws for a failed call.
 */

import type { DeviceUpsertBody, MessageEnvelope, ReadingIngestBody } from '@iotgw/contracts';
import { unreachable, type DownstreamError } from './errors';
import type { DownstreamTarget } from './router';

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface DownstreamClientOptions {
    timeoutMs: number;
    fetch?: FetchLike;
}

export interface DownstreamResponse {
    status: number;
    body: unknown;
}

export type DownstreamResult =
    | { ok: true; response: DownstreamResponse }
    | { ok: false; error: DownstreamError };

export interface DownstreamClient {
    forward(target: DownstreamTarget, envelope: MessageEnvelope, signal?: AbortSignal): Promise<DownstreamResult>;
}

export interface OutboundRequest {
    method: 'PUT' | 'POST';
    url: string;
    body: DeviceUpsertBody | ReadingIngestBody;
}

export function buildOutboundRequest(baseUrl: string, envelope: MessageEnvelope): OutboundRequest {
    switch (envelope.type) {
        case 'registration':
            return {
                method: 'PUT',
                url: `${baseUrl}/devices/${encodeURIComponent(envelope.deviceId)}`,
                body: { deviceId: envelope.deviceId, username: envelope.data.username },
            };
        case 'reading':
            return {
                method: 'POST',
                url: `${baseUrl}/readings`,
                body: { deviceId: envelope.deviceId, reading: envelope.data.reading },
            };
        default:
            return unreachable(envelope);
    }
}

export function createDownstreamClient({ timeoutMs, fetch: fetchImpl = fetch }: DownstreamClientOptions): DownstreamClient {
    return {
        async forward(target, envelope, signal) {
            const request = buildOutboundRequest(target.baseUrl, envelope);

            const controller = new AbortController();
            let timedOut = false;
            const timer = setTimeout(() => {
                timedOut = true;
                controller.abort();
            }, timeoutMs);
            const onCallerAbort = () => controller.abort();
            if (signal?.aborted) {
                controller.abort();
            } else {
                signal?.addEventListener('abort', onCallerAbort, { once: true });
            }

            try {
                const res = await fetchImpl(request.url, {
                    method: request.method,
                    headers: {
                        'Content-Type': 'application/json',
                        Accept: 'application/json',
                    },
                    body: JSON.stringify(request.body),
                    signal: controller.signal,
                });
                const text = await res.text();

                if (!res.ok) {
                    const reason = extractErrorMessage(text);
                    return fail(
                        'BadResponse',
                        `${request.method} ${request.url} responded with status ${res.status}${reason ? `: ${reason}` : ''}`,
                        res.status,
                    );
                }

                const parsed = parseJson(text);
                if (!parsed.ok) {
                    return fail('BadResponse', `${request.method} ${request.url} returned a malformed response body`, res.status);
                }
                return { ok: true, response: { status: res.status, body: parsed.value } };
            } catch (error) {
                if (timedOut) {
                    return fail('Timeout', `${request.method} ${request.url} did not respond within ${timeoutMs} ms`);
                }
                if (signal?.aborted) {
                    return fail('Unreachable', `${request.method} ${request.url} was cancelled by the caller`);
                }
                return fail('Unreachable', `${request.method} ${request.url} failed: ${describeTransportError(error)}`);
            } finally {
                clearTimeout(timer);
                signal?.removeEventListener('abort', onCallerAbort);
            }
        },
    };
}

function fail(kind: DownstreamError['kind'], detail: string, status?: number): DownstreamResult {
    const error: DownstreamError = { category: 'downstream', kind, detail };
    if (status !== undefined) {
        error.status = status;
    }
    return { ok: false, error };
}

// An empty 2xx body is a valid acknowledgment.
function parseJson(text: string): { ok: true; value: unknown } | { ok: false } {
    if (text.trim() === '') {
        return { ok: true, value: null };
    }
    try {
        const value: unknown = JSON.parse(text);
        return { ok: true, value };
    } catch {
        return { ok: false };
    }
}

// Collaborators answer with `{ error }` or `{ detail }`.
function extractErrorMessage(text: string): string | null {
    const parsed = parseJson(text);
    if (!parsed.ok) {
        return null;
    }
    const body = parsed.value;
    if (typeof body !== 'object' || body === null) {
        return null;
    }
    if ('error' in body && typeof body.error === 'string') {
        return body.error;
    }
    if ('detail' in body && typeof body.detail === 'string') {
        return body.detail;
    }
    return null;
}

function describeTransportError(error: unknown): string {
    if (error instanceof Error) {
        return error.cause instanceof Error ? `${error.message} (${error.cause.message})` : error.message;
    }
    return String(error);
}
