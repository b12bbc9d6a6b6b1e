import type { FastifyPluginAsync } from 'fastify';
import fp from 'fastify-plugin';
import type { GatewayConfig } from '../config';
import { createDownstreamClient, type FetchLike } from '../dispatch/downstream';
import { createDispatcher, type Dispatcher } from '../dispatch/orchestrator';
import { createDispatchStats, type DispatchStats } from '../dispatch/dispatch-stats';

declare module 'fastify' {
    interface FastifyInstance {
        dispatcher: Dispatcher;
        dispatchStats: DispatchStats;
    }
}

export interface DispatchPluginOptions {
    config: GatewayConfig;
    // Outbound transport; global fetch unless a test swaps it.
    fetch?: FetchLike;
}

const dispatchPlugin: FastifyPluginAsync<DispatchPluginOptions> = async (app, { config, fetch }) => {
    const client = createDownstreamClient({ timeoutMs: config.downstreamTimeoutMs, fetch });
    app.decorate('dispatcher', createDispatcher({ targets: config.targets, client }));
    app.decorate('dispatchStats', createDispatchStats());
};

export default fp(dispatchPlugin, { name: 'dispatch' });
