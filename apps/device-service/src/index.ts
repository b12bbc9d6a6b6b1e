import 'dotenv/config';
import { openDatabase, createDeviceStore } from '@iotgw/database';
import { loadConfig, SERVICE } from './config';
import { buildDeviceServiceApp } from './app';

const init = async () => {
    const config = loadConfig();
    const db = openDatabase(config.databasePath);
    const fastify = await buildDeviceServiceApp({
        store: createDeviceStore(db),
        corsOrigins: config.corsOrigins,
        logger: { level: config.logLevel },
    });
    fastify.addHook('onClose', async () => {
        db.close();
    });
    return { config, fastify };
};

const start = async () => {
    const { config, fastify } = await init().catch((err: unknown) => {
        console.error(`[${SERVICE}] Failed to initialise:`, err instanceof Error ? err.message : err);
        process.exit(1);
    });

    try {
        fastify.log.info({ database_path: config.databasePath }, `Starting ${SERVICE}`);
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
