import 'dotenv/config';
import { CONTRACT_VERSION } from '@iotgw/contracts';
import { loadConfig, SERVICE } from './config';
import { buildGatewayApp } from './app';

const init = async () => {
    const config = loadConfig();
    const fastify = await buildGatewayApp({ config });
    return { config, fastify };
};

const start = async () => {
    const { config, fastify } = await init().catch((err: unknown) => {
        console.error(`[${SERVICE}] Failed to initialise:`, err instanceof Error ? err.message : err);
        process.exit(1);
    });

    try {
        fastify.log.info({
            contract_version: CONTRACT_VERSION,
            targets: config.targets,
            downstream_timeout_ms: config.downstreamTimeoutMs,
        }, `Starting ${SERVICE}`);
        for (const [type, baseUrl] of Object.entries(config.targets)) {
            if (!baseUrl) {
                fastify.log.warn({ type }, 'No downstream service configured; messages of this type will be refused');
            }
        }

        await fastify.listen({ port: config.port, host: config.host });

        // Graceful Shutdown
        const shutdown = async (signal: string) => {
            fastify.log.info(`[${signal}] Shutting down ${SERVICE}...`);
            await fastify.close();
            process.exit(0);
        };

        process.on('SIGTERM', () => void shutdown('SIGTERM'));
        process.on('SIGINT', () => void shutdown('SIGINT'));
    } catch (err) {
        fastify.log.error(err);
        process.exit(1);
    }
};

void start();
