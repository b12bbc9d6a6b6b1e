export const SERVICE = 'device-service';

export interface DeviceServiceConfig {
    port: number;
    host: string;
    databasePath: string;
    corsOrigins: string[];
    logLevel: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): DeviceServiceConfig {
    const port = Number(env.PORT || 8001);
    if (!Number.isInteger(port) || port <= 0) {
        throw new Error(`PORT must be a positive integer, got "${env.PORT}"`);
    }

    return Object.freeze({
        port,
        host: env.HOST || '0.0.0.0',
        databasePath: env.DATABASE_PATH || './device_service.db',
        corsOrigins: (env.CORS_ORIGINS || 'http://localhost:3000,http://localhost:5173')
            .split(',')
            .map((s) => s.trim())
            .filter((s) => s !== ''),
        logLevel: env.LOG_LEVEL || 'info',
    });
}
