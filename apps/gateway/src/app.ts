import Fastify, { type FastifyError } from 'fastify';
import cors from '@fastify/cors';
import type { GatewayErrorBody } from '@iotgw/contracts';
import type { GatewayConfig } from './config';
import type { FetchLike } from './dispatch/downstream';
import dispatchPlugin from './plugins/dispatch';
import messageRoutes from './routes/messages';
import internalStatsRoutes from './routes/internal-stats';

export interface BuildGatewayOptions {
    config: GatewayConfig;
    logger?: boolean | { level: string };
    fetch?: FetchLike;
}

export async function buildGatewayApp({ config, logger = { level: config.logLevel }, fetch }: BuildGatewayOptions) {
    const fastify = Fastify({ logger });

    await fastify.register(cors, {
        origin: config.corsOrigins,
        methods: ['GET', 'POST', 'OPTIONS'],
        allowedHeaders: ['Content-Type'],
        credentials: true,
    });

    await fastify.register(dispatchPlugin, { config, fetch });

    // Body parser failures (bad JSON, wrong content type, oversize) use the envelope error shape.
    fastify.setErrorHandler((error: FastifyError, request, reply) => {
        if (error.statusCode !== undefined && error.statusCode >= 400 && error.statusCode < 500) {
            request.log.warn({ event: 'message_unparseable', code: error.code }, error.message);
            fastify.dispatchStats.increment('total_messages');
            fastify.dispatchStats.increment('total_validation_failed');
            const body: GatewayErrorBody = {
                error: { kind: 'MalformedPayload', field: 'body', detail: error.message },
            };
            return reply.code(error.statusCode).send(body);
        }
        request.log.error(error, 'Unhandled request error');
        return reply.code(500).send({ error: 'Internal Server Error' });
    });

    fastify.get('/health', async () => {
        return { ok: true };
    });

    await fastify.register(messageRoutes);
    await fastify.register(internalStatsRoutes);

    return fastify;
}
