import type { FastifyInstance } from 'fastify';
import type { GatewayResponseBody } from '@iotgw/contracts';

export default async function messageRoutes(fastify: FastifyInstance) {
    // POST /messages - validate, route and forward one device message
    fastify.post<{ Reply: GatewayResponseBody }>('/messages', async (request, reply) => {
        // Cancel the outbound call if the device hangs up before we answer.
        const controller = new AbortController();
        const onClose = () => {
            if (!reply.raw.writableFinished) {
                controller.abort();
            }
        };
        reply.raw.once('close', onClose);

        const response = await fastify.dispatcher
            .handle(request.body, { log: request.log, signal: controller.signal })
            .finally(() => reply.raw.off('close', onClose));

        fastify.dispatchStats.record(response);
        return reply.code(response.statusCode).send(response.body);
    });
}
