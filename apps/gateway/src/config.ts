import type { MessageType } from '@iotgw/contracts';
import { createRoutingTargets, type RoutingTargets } from './dispatch/router';

export const SERVICE = 'message-gateway';

export interface GatewayConfig {
    port: number;
    host: string;
    targets: RoutingTargets;
    downstreamTimeoutMs: number;
    corsOrigins: string[];
    logLevel: string;
}

const DEFAULT_CORS_ORIGINS = 'http://localhost:3000,http://localhost:5173';

/** Read gateway settings from the environment. Throws on values that cannot be served. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): GatewayConfig {
    const targets: Record<MessageType, string | null> = {
        registration: optionalUrl('DEVICE_SERVICE_URL', env.DEVICE_SERVICE_URL),
        reading: optionalUrl('READING_SERVICE_URL', env.READING_SERVICE_URL),
    };

    return Object.freeze({
        port: positiveInt('PORT', env.PORT, 8000),
        host: env.HOST || '0.0.0.0',
        targets: createRoutingTargets(targets),
        downstreamTimeoutMs: positiveInt('DOWNSTREAM_TIMEOUT_MS', env.DOWNSTREAM_TIMEOUT_MS, 30_000),
        corsOrigins: parseList(env.CORS_ORIGINS || DEFAULT_CORS_ORIGINS),
        logLevel: env.LOG_LEVEL || 'info',
    });
}

// Unset leaves the message type without a target; the router reports it per message.
export function optionalUrl(name: string, value: string | undefined): string | null {
    const trimmed = value?.trim();
    if (!trimmed) {
        return null;
    }
    let url: URL;
    try {
        url = new URL(trimmed);
    } catch {
        throw new Error(`${name} is not a valid URL: ${trimmed}`);
    }
    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
        throw new Error(`${name} must be an http(s) URL: ${trimmed}`);
    }
    return trimmed.replace(/\/+$/, '');
}

export function positiveInt(name: string, value: string | undefined, fallback: number): number {
    if (value === undefined || value.trim() === '') {
        return fallback;
    }
    const n = Number(value);
    if (!Number.isInteger(n) || n <= 0) {
        throw new Error(`${name} must be a positive integer, got "${value}"`);
    }
    return n;
}

export function parseList(value: string): string[] {
    return value.split(',').map((s) => s.trim()).filter((s) => s !== '');
}
