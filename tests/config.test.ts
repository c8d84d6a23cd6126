/**
 * Engine configuration Tests
 */

import path from 'path';
import { describe, it, expect } from 'vitest';
import { EnvMode, detectMode, loadEngineConfig } from '../src/config/env.js';
import { ValidationError } from '../src/lib/errors/index.js';

describe('loadEngineConfig', () => {
    it('should fall back to defaults for everything unset', () => {
        const config = loadEngineConfig({});

        expect(config).toEqual({
            mode: EnvMode.LOCAL,
            api: { baseUrl: 'http://localhost:3000', token: '' },
            storage: { dataDir: path.resolve('./.attendance-data') },
            geo: { accuracyCeilingMeters: 50 },
            sync: {
                intervalMs: 60_000,
                timeoutMs: 30_000,
                batchSize: 50,
                backoffBaseMs: 2_000,
                backoffCapMs: 300_000,
                backoffJitter: 0.2,
                retryHorizonMs: 1_209_600_000,
                errorVisibilityThreshold: 3,
            },
            pin: { maxAttempts: 5, lockoutMs: 900_000 },
        });
        expect(Object.isFrozen(config)).toBe(true);
    });

    it('should read overrides and normalise the base URL', () => {
        const config = loadEngineConfig({
            NODE_ENV: 'production',
            ATTENDANCE_API_URL: 'https://attendance.example.test/api/',
            ATTENDANCE_API_TOKEN: 'test-secret',
            SYNC_BATCH_SIZE: '10',
            SYNC_RETRY_HORIZON_DAYS: '7',
            PIN_LOCKOUT_MINUTES: '30',
        });

        expect(config.mode).toBe(EnvMode.PRODUCTION);
        expect(config.api).toEqual({ baseUrl: 'https://attendance.example.test/api', token: 'test-secret' });
        expect(config.sync.batchSize).toBe(10);
        expect(config.sync.retryHorizonMs).toBe(604_800_000);
        expect(config.pin.lockoutMs).toBe(1_800_000);
    });

    it('should treat empty strings as unset', () => {
        expect(loadEngineConfig({ SYNC_INTERVAL_MS: '' }).sync.intervalMs).toBe(60_000);
    });

    it('should reject values that fail validation', () => {
        expect(() => loadEngineConfig({ SYNC_BATCH_SIZE: 'lots' })).toThrow(ValidationError);
        expect(() => loadEngineConfig({ SYNC_BACKOFF_JITTER: '2' })).toThrow(
            /^Invalid engine configuration: SYNC_BACKOFF_JITTER: /
        );
    });
});

describe('detectMode', () => {
    it('should recognise test runs', () => {
        expect(detectMode({ VITEST: 'true' })).toBe(EnvMode.TEST);
        expect(detectMode({ NODE_ENV: 'test' })).toBe(EnvMode.TEST);
    });

    it('should default to local', () => {
        expect(detectMode({ NODE_ENV: 'development' })).toBe(EnvMode.LOCAL);
    });
});
