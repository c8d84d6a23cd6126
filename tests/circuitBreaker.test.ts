/**
 * CircuitBreaker Tests
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { CircuitBreaker, CircuitOpenError, type CircuitState } from '../src/infra/CircuitBreaker.js';
import { SyncError } from '../src/lib/errors/index.js';
import { ManualClock } from './helpers.js';

const down = () => Promise.reject(new SyncError('SERVER_UNAVAILABLE', 'down'));
const up = () => Promise.resolve('ok');

describe('CircuitBreaker', () => {
    let clock: ManualClock;
    let changes: Array<[CircuitState, CircuitState]>;
    let breaker: CircuitBreaker;

    beforeEach(() => {
        clock = new ManualClock('2026-03-02T09:00:00.000Z');
        changes = [];
        breaker = new CircuitBreaker('api', {
            failureThreshold: 2,
            resetTimeoutMs: 30_000,
            clock: clock.now,
            onStateChange: (_name, from, to) => changes.push([from, to]),
        });
    });

    it('should open after the failure threshold and then fail fast', async () => {
        await expect(breaker.execute(down)).rejects.toThrow('down');
        expect(breaker.getState()).toBe('CLOSED');
        await expect(breaker.execute(down)).rejects.toThrow('down');
        expect(breaker.getState()).toBe('OPEN');

        const fn = vi.fn(up);
        clock.advance(10_000);
        await expect(breaker.execute(fn)).rejects.toThrow("Circuit 'api' is open; retry in 20s");
        expect(fn).not.toHaveBeenCalled();
    });

    it('should close again after a successful trial request', async () => {
        await breaker.execute(down).catch(() => undefined);
        await breaker.execute(down).catch(() => undefined);
        clock.advance(30_000);

        await expect(breaker.execute(up)).resolves.toBe('ok');

        expect(breaker.getState()).toBe('CLOSED');
        expect(breaker.getFailureCount()).toBe(0);
        expect(changes).toEqual([
            ['CLOSED', 'OPEN'],
            ['OPEN', 'HALF_OPEN'],
            ['HALF_OPEN', 'CLOSED'],
        ]);
    });

    it('should reopen when the trial request fails', async () => {
        await breaker.execute(down).catch(() => undefined);
        await breaker.execute(down).catch(() => undefined);
        clock.advance(30_000);

        await expect(breaker.execute(down)).rejects.toThrow('down');

        expect(breaker.getState()).toBe('OPEN');
        await expect(breaker.execute(up)).rejects.toBeInstanceOf(CircuitOpenError);
    });

    it('should let only one trial request through at a time', async () => {
        await breaker.execute(down).catch(() => undefined);
        await breaker.execute(down).catch(() => undefined);
        clock.advance(30_000);

        let finishTrial: (value: string) => void = () => undefined;
        const trial = breaker.execute(
            () =>
                new Promise<string>((resolve) => {
                    finishTrial = resolve;
                })
        );

        await expect(breaker.execute(up)).rejects.toBeInstanceOf(CircuitOpenError);
        finishTrial('tried');
        await expect(trial).resolves.toBe('tried');
        expect(breaker.getState()).toBe('CLOSED');
    });

    it('should ignore errors the classifier does not count', async () => {
        const selective = new CircuitBreaker('api', {
            failureThreshold: 1,
            isFailure: (error) => error instanceof SyncError && error.isTransient,
        });

        await expect(
            selective.execute(() => Promise.reject(new SyncError('SERVER_REJECTED', 'bad request')))
        ).rejects.toThrow('bad request');

        expect(selective.getState()).toBe('CLOSED');
        expect(selective.getFailureCount()).toBe(0);
    });

    it('should forget failures on success and on reset', async () => {
        await breaker.execute(down).catch(() => undefined);
        await breaker.execute(up);
        expect(breaker.getFailureCount()).toBe(0);

        await breaker.execute(down).catch(() => undefined);
        await breaker.execute(down).catch(() => undefined);
        breaker.reset();
        expect(breaker.getState()).toBe('CLOSED');
        await expect(breaker.execute(up)).resolves.toBe('ok');
    });
});
