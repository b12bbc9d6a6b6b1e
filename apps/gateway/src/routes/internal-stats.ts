import type { FastifyInstance } from 'fastify';

export default async function internalStatsRoutes(fastify: FastifyInstance) {
    fastify.get('/internal/dispatch-stats', async () => {
        return fastify.dispatchStats.snapshot();
    });
}
