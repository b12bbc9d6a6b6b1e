import { describe, test, expect } from 'vitest';
import { loadConfig, parseList } from '../config';

describe('loadConfig', () => {
    test('defaults', () => {
        const config = loadConfig({});
        expect(config.port).toBe(8000);
        expect(config.host).toBe('0.0.0.0');
        expect(config.downstreamTimeoutMs).toBe(30_000);
        expect(config.targets).toEqual({ registration: null, reading: null });
        expect(config.corsOrigins).toEqual(['http://localhost:3000', 'http://localhost:5173']);
        expect(config.logLevel).toBe('info');
    });

    test('reads targets and timeout, trimming trailing slashes', () => {
        const config = loadConfig({
            DEVICE_SERVICE_URL: 'http://device-service:8001//',
            READING_SERVICE_URL: ' https://readings.local/api ',
            DOWNSTREAM_TIMEOUT_MS: '2500',
            PORT: '9000',
        });
        expect(config.targets).toEqual({
            registration: 'http://device-service:8001',
            reading: 'https://readings.local/api',
        });
        expect(config.downstreamTimeoutMs).toBe(2500);
        expect(config.port).toBe(9000);
    });

    test('config and targets are immutable', () => {
        const config = loadConfig({ DEVICE_SERVICE_URL: 'http://device-service:8001' });
        expect(Object.isFrozen(config)).toBe(true);
        expect(Object.isFrozen(config.targets)).toBe(true);
    });

    test('rejects an invalid URL', () => {
        expect(() => loadConfig({ DEVICE_SERVICE_URL: 'not a url' })).toThrow('DEVICE_SERVICE_URL is not a valid URL: not a url');
    });

    test('rejects a non-http URL', () => {
        expect(() => loadConfig({ READING_SERVICE_URL: 'ftp://readings' })).toThrow(/must be an http\(s\) URL/);
    });

    test.each(['0', '-5', '1.5', 'soon'])('rejects DOWNSTREAM_TIMEOUT_MS=%s', (value) => {
        expect(() => loadConfig({ DOWNSTREAM_TIMEOUT_MS: value })).toThrow(/DOWNSTREAM_TIMEOUT_MS must be a positive integer/);
    });
});

describe('parseList', () => {
    test('splits and drops blanks', () => {
        expect(parseList(' a, ,b ,')).toEqual(['a', 'b']);
    });
});
