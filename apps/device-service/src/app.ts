import Fastify from 'fastify';
import cors from '@fastify/cors';
import type { DeviceStore } from '@iotgw/database';
import type { DeviceServiceConfig } from './config';
import deviceRoutes from './routes/devices';

export interface BuildDeviceServiceOptions {
    store: DeviceStore;
    corsOrigins?: DeviceServiceConfig['corsOrigins'];
    logger?: boolean | { level: string };
}

export async function buildDeviceServiceApp({ store, corsOrigins = [], logger = true }: BuildDeviceServiceOptions) {
    const fastify = Fastify({ logger });

    await fastify.register(cors, {
        origin: corsOrigins,
        methods: ['GET', 'PUT', 'OPTIONS'],
        allowedHeaders: ['Content-Type'],
        credentials: true,
    });

    fastify.get('/health', async () => {
        return { ok: true };
    });

    await fastify.register(deviceRoutes, { store });

    return fastify;
}
