import { describe, test, expect, vi, beforeEach, afterEach } from 'vitest';
import { buildGatewayApp } from '../app';
import { loadConfig } from '../config';
import type { FetchLike } from '../dispatch/downstream';

function jsonResponse(status: number, body: unknown): Response {
    return new Response(JSON.stringify(body), {
        status,
        headers: { 'Content-Type': 'application/json' },
    });
}

describe('POST /messages', () => {
    const fetchMock = vi.fn<FetchLike>();
    let app: Awaited<ReturnType<typeof buildGatewayApp>>;

    beforeEach(async () => {
        fetchMock.mockReset();
        fetchMock.mockImplementation(async () => jsonResponse(200, { message: 'Device updated successfully' }));
        app = await buildGatewayApp({
            config: loadConfig({
                DEVICE_SERVICE_URL: 'http://device-service:8001/',
                READING_SERVICE_URL: 'http://reading-service:8002',
            }),
            logger: false,
            fetch: fetchMock,
        });
    });

    afterEach(async () => {
        await app.close();
    });

    test('registration message is forwarded and answered with 200', async () => {
        const res = await app.inject({
            method: 'POST',
            url: '/messages',
            payload: { deviceId: 'reg123', type: 'registration', data: { username: 'user_test' } },
        });

        expect(res.statusCode).toBe(200);
        expect(res.json()).toEqual({
            ok: true,
            message: 'Registration processed successfully',
            deviceId: 'reg123',
            type: 'registration',
            downstreamStatus: 200,
            result: { message: 'Device updated successfully' },
        });
        expect(fetchMock).toHaveBeenCalledTimes(1);
        expect(fetchMock.mock.calls[0][0]).toBe('http://device-service:8001/devices/reg123');
    });

    test('reading message echoes the reading', async () => {
        fetchMock.mockImplementation(async () => jsonResponse(201, { message: 'Reading stored successfully' }));

        const res = await app.inject({
            method: 'POST',
            url: '/messages',
            payload: { deviceId: 'read123', type: 'reading', data: { reading: 99.9 } },
        });

        expect(res.statusCode).toBe(200);
        expect(res.json().type).toBe('reading');
        expect(res.json().reading).toBe(99.9);
        expect(res.json().downstreamStatus).toBe(201);
        expect(fetchMock.mock.calls[0][0]).toBe('http://reading-service:8002/readings');
        expect(fetchMock.mock.calls[0][1].body).toBe('{"deviceId":"read123","reading":99.9}');
    });

    test('invalid message type is a 422 validation error', async () => {
        const res = await app.inject({
            method: 'POST',
            url: '/messages',
            payload: { deviceId: 'bad123', type: 'invalid', data: {} },
        });

        expect(res.statusCode).toBe(422);
        expect(res.json()).toEqual({
            error: { kind: 'UnknownType', field: 'type', detail: 'Unsupported message type: "invalid"' },
        });
        expect(fetchMock).not.toHaveBeenCalled();
    });

    test('a dot-segment device id is refused before any outbound call', async () => {
        const res = await app.inject({
            method: 'POST',
            url: '/messages',
            payload: { deviceId: '..', type: 'registration', data: { username: 'alice' } },
        });

        expect(res.statusCode).toBe(422);
        expect(res.json().error.field).toBe('deviceId');
        expect(fetchMock).not.toHaveBeenCalled();
    });

    test('unparseable JSON is a 400 MalformedPayload', async () => {
        const res = await app.inject({
            method: 'POST',
            url: '/messages',
            headers: { 'content-type': 'application/json' },
            payload: '{"deviceId":',
        });

        expect(res.statusCode).toBe(400);
        expect(res.json().error.kind).toBe('MalformedPayload');
        expect(res.json().error.field).toBe('body');
        expect(fetchMock).not.toHaveBeenCalled();
    });

    test('unsupported content type is rejected with 415', async () => {
        const res = await app.inject({
            method: 'POST',
            url: '/messages',
            headers: { 'content-type': 'application/xml' },
            payload: '<message/>',
        });

        expect(res.statusCode).toBe(415);
        expect(res.json().error.kind).toBe('MalformedPayload');
        expect(fetchMock).not.toHaveBeenCalled();
    });

    test('unreachable downstream is a 502', async () => {
        fetchMock.mockRejectedValue(new TypeError('fetch failed'));

        const res = await app.inject({
            method: 'POST',
            url: '/messages',
            payload: { deviceId: 'sensor-001', type: 'registration', data: { username: 'alice' } },
        });

        expect(res.statusCode).toBe(502);
        expect(res.json()).toEqual({
            error: {
                kind: 'Unreachable',
                detail: 'PUT http://device-service:8001/devices/sensor-001 failed: fetch failed',
            },
        });
    });

    test('downstream 400 is passed through', async () => {
        fetchMock.mockImplementation(async () => jsonResponse(400, { error: 'username is required' }));

        const res = await app.inject({
            method: 'POST',
            url: '/messages',
            payload: { deviceId: 'sensor-001', type: 'registration', data: { username: 'alice' } },
        });

        expect(res.statusCode).toBe(400);
        expect(res.json().error.kind).toBe('BadResponse');
        expect(res.json().error.downstreamStatus).toBe(400);
    });

    test('a plain-text body parses but is not an envelope', async () => {
        const res = await app.inject({
            method: 'POST',
            url: '/messages',
            headers: { 'content-type': 'text/plain' },
            payload: 'hello',
        });

        expect(res.statusCode).toBe(422);
        expect(res.json()).toEqual({
            error: { kind: 'MalformedPayload', field: 'body', detail: 'Message must be a JSON object' },
        });
    });

    test('dispatch stats count each outcome', async () => {
        await app.inject({
            method: 'POST',
            url: '/messages',
            payload: { deviceId: 'sensor-001', type: 'registration', data: { username: 'alice' } },
        });
        await app.inject({ method: 'POST', url: '/messages', payload: { type: 'reading' } });
        fetchMock.mockRejectedValue(new TypeError('fetch failed'));
        await app.inject({
            method: 'POST',
            url: '/messages',
            payload: { deviceId: 'sensor-001', type: 'reading', data: { reading: 1 } },
        });

        const res = await app.inject({ method: 'GET', url: '/internal/dispatch-stats' });
        expect(res.json()).toEqual({
            total_messages: 3,
            total_dispatched: 1,
            total_validation_failed: 1,
            total_routing_failed: 0,
            total_downstream_failed: 1,
        });
    });
});

describe('GET /health', () => {
    test('returns ok', async () => {
        const app = await buildGatewayApp({ config: loadConfig({}), logger: false });
        const res = await app.inject({ method: 'GET', url: '/health' });
        expect(res.statusCode).toBe(200);
        expect(res.json()).toEqual({ ok: true });
        await app.close();
    });
});

describe('routing gaps', () => {
    test('a type without a configured service is a 500 NoTargetConfigured', async () => {
        const fetchMock = vi.fn<FetchLike>();
        const app = await buildGatewayApp({
            config: loadConfig({ DEVICE_SERVICE_URL: 'http://device-service:8001' }),
            logger: false,
            fetch: fetchMock,
        });

        const res = await app.inject({
            method: 'POST',
            url: '/messages',
            payload: { deviceId: 'sensor-001', type: 'reading', data: { reading: 23.5 } },
        });

        expect(res.statusCode).toBe(500);
        expect(res.json()).toEqual({
            error: {
                kind: 'NoTargetConfigured',
                detail: 'No downstream service configured for message type "reading"',
            },
        });
        expect(fetchMock).not.toHaveBeenCalled();
        await app.close();
    });
});
