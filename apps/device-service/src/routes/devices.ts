import type { FastifyPluginAsync } from 'fastify';
import type { DeviceStore } from '@iotgw/database';

interface DeviceParams {
    deviceId: string;
}

interface DeviceUpsertRequest {
    username?: unknown;
    // Optional echo of the path id sent by the gateway
    deviceId?: unknown;
}

export interface DeviceRoutesOptions {
    store: DeviceStore;
}

const deviceRoutes: FastifyPluginAsync<DeviceRoutesOptions> = async (fastify, { store }) => {

    // PUT /devices/:deviceId - create or update the device → username mapping
    fastify.put<{ Params: DeviceParams; Body: DeviceUpsertRequest | undefined }>('/devices/:deviceId', async (request, reply) => {
        const { deviceId } = request.params;
        const body = request.body;

        if (!body || typeof body.username !== 'string' || body.username.trim() === '') {
            reply.code(400).send({ error: 'username is required' });
            return;
        }
        if (body.deviceId !== undefined && body.deviceId !== deviceId) {
            reply.code(400).send({ error: 'deviceId in body does not match path' });
            return;
        }

        try {
            const result = store.upsertDevice(deviceId, body.username);
            request.log.info({
                event: result.created ? 'device_created' : 'device_updated',
                device_id: deviceId,
                username: body.username,
            }, result.created ? 'Created device' : 'Updated device');

            return { message: 'Device updated successfully', device_id: deviceId, created: result.created };
        } catch (error) {
            request.log.error({ event: 'device_upsert_error', device_id: deviceId, error }, 'Unexpected error');
            reply.code(500).send({ error: 'Internal Server Error' });
            return;
        }
    });

    // GET /devices/:deviceId/username
    fastify.get<{ Params: DeviceParams }>('/devices/:deviceId/username', async (request, reply) => {
        const { deviceId } = request.params;

        const username = store.getDeviceUsername(deviceId);
        if (username === null) {
            request.log.warn({ event: 'device_not_found', device_id: deviceId }, 'Device not found');
            reply.code(404).send({ error: `Device ${deviceId} not found` });
            return;
        }

        return { username };
    });
};

export default deviceRoutes;
