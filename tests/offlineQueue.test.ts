/**
 * OfflineQueue Tests
 *
 * Durability, idempotent enqueue, per-employee ordering, backoff and the
 * retry horizon.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { StorageError } from '../src/lib/errors/index.js';
import { MemoryLogStore } from '../src/infra/storage/MemoryLogStore.js';
import { OfflineQueue } from '../src/services/sync/OfflineQueue.js';
import { calculateBackoff } from '../src/utils/backoff.js';
import { DAY, ManualClock, makeRecord } from './helpers.js';

const BACKOFF = { baseDelayMs: 1_000, maxDelayMs: 60_000, jitter: 0.2, random: () => 0.5 };

const queued = (id: string, time: string, employeeId = 'emp-1') =>
    makeRecord({ id, type: 'CLOCK_IN', timestamp: `2026-03-02T${time}:00.000Z`, state: 'QUEUED', employeeId });

describe('OfflineQueue', () => {
    let clock: ManualClock;
    let store: MemoryLogStore;
    let queue: OfflineQueue;

    beforeEach(async () => {
        clock = new ManualClock('2026-03-02T18:00:00.000Z');
        store = new MemoryLogStore();
        queue = new OfflineQueue(store, { backoff: BACKOFF });
        await queue.open();
    });

    it('should ignore a second enqueue of the same record', async () => {
        expect(await queue.enqueue(queued('r1', '09:00'), clock.now())).toBe(true);
        expect(await queue.enqueue(queued('r1', '09:00'), clock.now())).toBe(false);
        expect(queue.depth()).toBe(1);
        expect(store.size('sync-queue')).toBe(1);
    });

    it('should hand out due items in timestamp order', async () => {
        await queue.enqueue(queued('late', '17:00'), clock.now());
        await queue.enqueue(queued('early', '09:00'), clock.now());
        await queue.enqueue(queued('other', '08:00', 'emp-2'), clock.now());

        expect(queue.peekBatch(10, clock.now()).map((item) => item.record.id)).toEqual(['other', 'early', 'late']);
        expect(queue.peekBatch(2, clock.now())).toHaveLength(2);
    });

    it('should schedule a retry with backoff after a failure', async () => {
        await queue.enqueue(queued('r1', '09:00'), clock.now());
        const failed = await queue.markFailed('r1', 'SERVER_TIMEOUT: slow', clock.now());

        expect(failed).toMatchObject({
            status: 'PENDING',
            attemptCount: 1,
            lastError: 'SERVER_TIMEOUT: slow',
            lastAttemptAt: '2026-03-02T18:00:00.000Z',
            nextAttemptAt: '2026-03-02T18:00:01.000Z',
        });
        expect(queue.peekBatch(10, clock.now())).toEqual([]);

        clock.advance(1_000);
        expect(queue.peekBatch(10, clock.now()).map((item) => item.record.id)).toEqual(['r1']);
    });

    it('should not let a later record of the same employee overtake one that is waiting', async () => {
        await queue.enqueue(queued('first', '09:00'), clock.now());
        await queue.enqueue(queued('second', '17:00'), clock.now());
        await queue.enqueue(queued('someone-else', '10:00', 'emp-2'), clock.now());
        await queue.markFailed('first', 'NETWORK_UNAVAILABLE: offline', clock.now());

        expect(queue.peekBatch(10, clock.now()).map((item) => item.record.id)).toEqual(['someone-else']);
    });

    it('should hold back an employee with an upload in flight until released', async () => {
        await queue.enqueue(queued('first', '09:00'), clock.now());
        await queue.enqueue(queued('second', '17:00'), clock.now());
        queue.markInFlight(['first']);

        expect(queue.peekBatch(10, clock.now())).toEqual([]);
        expect(queue.get('first')?.status).toBe('IN_FLIGHT');

        queue.release(['first']);
        expect(queue.get('first')?.status).toBe('PENDING');
        expect(queue.get('first')?.attemptCount).toBe(0);
        expect(queue.peekBatch(10, clock.now())).toHaveLength(2);
    });

    it('should mark a record failing once a day for 15 days STALE_UNSYNCED', async () => {
        await queue.enqueue(queued('r1', '09:00'), clock.now());

        const statuses: string[] = [];
        for (let day = 0; day < 15; day++) {
            const item = await queue.markFailed('r1', 'NETWORK_UNAVAILABLE: offline', clock.now());
            statuses.push(item?.status ?? 'missing');
            clock.advance(DAY);
        }

        expect(statuses.slice(0, 14).every((status) => status === 'PENDING')).toBe(true);
        expect(statuses[14]).toBe('STALE_UNSYNCED');
        expect(queue.staleCount()).toBe(1);

        clock.advance(DAY);
        expect(queue.peekBatch(10, clock.now())).toEqual([]);
    });

    it('should put revived items back into rotation with a fresh horizon', async () => {
        await queue.enqueue(queued('r1', '09:00'), clock.now());
        clock.advance(14 * DAY);
        await queue.markFailed('r1', 'NETWORK_UNAVAILABLE: offline', clock.now());
        expect(queue.get('r1')?.status).toBe('STALE_UNSYNCED');

        expect(await queue.revive(['r1', 'unknown'], clock.now())).toBe(1);
        expect(queue.get('r1')).toMatchObject({ status: 'PENDING', attemptCount: 1 });
        expect(queue.peekBatch(10, clock.now()).map((item) => item.record.id)).toEqual(['r1']);

        const again = await queue.markFailed('r1', 'NETWORK_UNAVAILABLE: offline', clock.now());
        expect(again?.status).toBe('PENDING');
    });

    it('should rebuild its state from the log, reopening in-flight items as PENDING', async () => {
        await queue.enqueue(queued('r1', '09:00'), clock.now());
        await queue.enqueue(queued('r2', '10:00'), clock.now());
        await queue.markFailed('r2', 'SERVER_UNAVAILABLE: 503', clock.now());
        queue.markInFlight(['r1']);

        const reopened = new OfflineQueue(store, { backoff: BACKOFF });
        await reopened.open();

        expect(reopened.list().map((item) => [item.record.id, item.status, item.attemptCount])).toEqual([
            ['r1', 'PENDING', 0],
            ['r2', 'PENDING', 1],
        ]);
    });

    it('should drop acknowledged items and compact their events away', async () => {
        await queue.enqueue(queued('r1', '09:00'), clock.now());
        await queue.enqueue(queued('r2', '10:00'), clock.now());
        await queue.ack(['r1'], clock.now());

        expect(queue.depth()).toBe(1);
        expect(store.size('sync-queue')).toBe(3);

        expect(await queue.compact()).toBe(2);
        expect(store.size('sync-queue')).toBe(1);
        expect(await queue.compact()).toBe(0);

        const reopened = new OfflineQueue(store);
        await reopened.open();
        expect(reopened.list().map((item) => item.record.id)).toEqual(['r2']);
    });

    it('should remove rejected items for good', async () => {
        await queue.enqueue(queued('r1', '09:00'), clock.now());
        await queue.remove(['r1'], clock.now());
        expect(queue.get('r1')).toBeUndefined();
        expect(queue.peekBatch(10, clock.now())).toEqual([]);
    });

    it('should hold conflicted items out of normal batches', async () => {
        const record = queued('r1', '09:00');
        await queue.enqueue(record, clock.now());
        await queue.markConflicted({ ...record, state: 'CONFLICTED', version: 2 }, clock.now());

        expect(queue.listConflicted().map((item) => item.record.state)).toEqual(['CONFLICTED']);
        expect(queue.peekBatch(10, clock.now())).toEqual([]);
    });

    it('should hold back the later records of an employee with an unresolved conflict', async () => {
        const record = queued('first', '09:00');
        await queue.enqueue(record, clock.now());
        await queue.enqueue(queued('second', '17:00'), clock.now());
        await queue.enqueue(queued('someone-else', '10:00', 'emp-2'), clock.now());
        await queue.markConflicted({ ...record, state: 'CONFLICTED', version: 2 }, clock.now());

        expect(queue.peekBatch(10, clock.now()).map((item) => item.record.id)).toEqual(['someone-else']);
    });

    it('should back off a failed conflicted item and keep it CONFLICTED until it goes stale', async () => {
        const record = queued('r1', '09:00');
        await queue.enqueue(record, clock.now());
        await queue.markConflicted({ ...record, state: 'CONFLICTED', version: 2 }, clock.now());

        const failed = await queue.markFailed('r1', 'SERVER_UNAVAILABLE: down', clock.now());
        expect(failed).toMatchObject({
            status: 'CONFLICTED',
            attemptCount: 1,
            nextAttemptAt: '2026-03-02T18:00:01.000Z',
        });
        expect(queue.listConflicted(clock.now())).toEqual([]);

        clock.advance(1_000);
        expect(queue.listConflicted(clock.now()).map((item) => item.record.id)).toEqual(['r1']);

        const reopened = new OfflineQueue(store, { backoff: BACKOFF });
        await reopened.open();
        expect(reopened.get('r1')).toMatchObject({ status: 'CONFLICTED', attemptCount: 1 });

        clock.set('2026-03-16T18:00:00.000Z');
        expect((await queue.markFailed('r1', 'SERVER_UNAVAILABLE: down', clock.now()))?.status).toBe('STALE_UNSYNCED');
        expect(queue.listConflicted(clock.now())).toEqual([]);

        expect(await queue.revive(['r1'], clock.now())).toBe(1);
        expect(queue.get('r1')?.status).toBe('CONFLICTED');
    });

    it('should not queue an acknowledged record again', async () => {
        await queue.enqueue(queued('r1', '09:00'), clock.now());
        await queue.ack(['r1'], clock.now());

        expect(await queue.enqueue(queued('r1', '09:00'), clock.now())).toBe(false);
        expect(queue.depth()).toBe(0);
    });

    it('should not queue a record the ledger already settled', async () => {
        const guarded = new OfflineQueue(new MemoryLogStore(), { isSettled: (id) => id === 'synced-1' });
        await guarded.open();

        expect(await guarded.enqueue(queued('synced-1', '09:00'), clock.now())).toBe(false);
        expect(await guarded.enqueue(queued('fresh-1', '10:00'), clock.now())).toBe(true);
        expect(guarded.list().map((item) => item.record.id)).toEqual(['fresh-1']);
    });

    it('should refuse to open over a corrupt log', async () => {
        await store.append('sync-queue', [{ kind: 'SOMETHING_ELSE' }]);
        await expect(new OfflineQueue(store).open()).rejects.toThrow(StorageError);
    });
});

describe('calculateBackoff', () => {
    const options = { baseDelayMs: 2_000, maxDelayMs: 300_000, jitter: 0.2 };

    it('should double per failed attempt', () => {
        const mid = { ...options, random: () => 0.5 };
        expect([1, 2, 3, 4].map((n) => calculateBackoff(n, mid))).toEqual([2_000, 4_000, 8_000, 16_000]);
    });

    it('should cap the delay', () => {
        expect(calculateBackoff(20, { ...options, random: () => 0.5 })).toBe(300_000);
    });

    it('should stay within ±20% jitter', () => {
        expect(calculateBackoff(1, { ...options, random: () => 0 })).toBe(1_600);
        expect(calculateBackoff(1, { ...options, random: () => 1 })).toBe(2_400);
    });
});
