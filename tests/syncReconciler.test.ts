/**
 * SyncReconciler Tests
 *
 * Upload verdicts, batch failures, cancellation and conflict resolution
 * against an in-process server.
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { SyncError } from '../src/lib/errors/index.js';
import { KeyedMutex } from '../src/infra/KeyedMutex.js';
import { MemoryLogStore } from '../src/infra/storage/MemoryLogStore.js';
import { LeaveBook } from '../src/services/leave/LeaveBook.js';
import { LeaveTypeRegistry } from '../src/services/leave/LeaveTypeRegistry.js';
import { RecordLedger } from '../src/services/RecordLedger.js';
import { RecordStateMachine } from '../src/services/RecordStateMachine.js';
import { OfflineQueue } from '../src/services/sync/OfflineQueue.js';
import { SUPERSEDED_NOTICE, SyncReconciler } from '../src/services/sync/SyncReconciler.js';
import type { PunchType } from '../src/types/index.js';
import { FakeAttendanceServer } from './fakes/FakeAttendanceServer.js';
import { DAY, ManualClock, makeRecord } from './helpers.js';

const NO_JITTER = { baseDelayMs: 1_000, maxDelayMs: 60_000, jitter: 0.2, random: () => 0.5 };

describe('SyncReconciler', () => {
    let clock: ManualClock;
    let ledger: RecordLedger;
    let queue: OfflineQueue;
    let server: FakeAttendanceServer;
    let reconciler: SyncReconciler;

    const build = (timeoutMs = 30_000) =>
        new SyncReconciler({
            queue,
            ledger,
            stateMachine: new RecordStateMachine(clock.now),
            api: server,
            mutex: new KeyedMutex(),
            clock: clock.now,
            timeoutMs,
        });

    const queueLocal = async (id: string, type: PunchType, time: string) => {
        const record = makeRecord({ id, type, timestamp: `2026-03-02T${time}:00.000Z`, state: 'QUEUED' });
        await ledger.append(record);
        await queue.enqueue(record, clock.now());
        return record;
    };

    beforeEach(async () => {
        clock = new ManualClock('2026-03-02T18:00:00.000Z');
        const store = new MemoryLogStore();
        ledger = new RecordLedger(store);
        queue = new OfflineQueue(store, { backoff: NO_JITTER });
        await ledger.open();
        await queue.open();
        server = new FakeAttendanceServer();
        reconciler = build();
    });

    describe('verdicts', () => {
        it('should do nothing with an empty queue', async () => {
            const result = await reconciler.syncOnce();
            expect(result.attempted).toBe(0);
            expect(server.uploads).toHaveLength(0);
        });

        it('should mark accepted records SYNCED and drop them from the queue', async () => {
            await queueLocal('ci-1', 'CLOCK_IN', '09:00');

            const result = await reconciler.syncOnce();

            expect(result.synced).toEqual(['ci-1']);
            expect(ledger.get('ci-1')).toMatchObject({ state: 'SYNCED', serverRevision: 1, version: 2 });
            expect(queue.depth()).toBe(0);
        });

        it('should upload one employee in timestamp order within a single call', async () => {
            await queueLocal('co-1', 'CLOCK_OUT', '17:00');
            await queueLocal('ci-1', 'CLOCK_IN', '09:00');

            await reconciler.syncOnce();

            expect(server.uploads).toHaveLength(1);
            expect(server.uploads[0]?.map((upload) => upload.record.id)).toEqual(['ci-1', 'co-1']);
        });

        it('should record server rejections with their reason and never retry them', async () => {
            await queueLocal('ci-1', 'CLOCK_IN', '09:00');
            server.rejectRecord('ci-1', 'DUPLICATE_PUNCH');

            const result = await reconciler.syncOnce();

            expect(result.rejected).toEqual(['ci-1']);
            expect(ledger.get('ci-1')).toMatchObject({
                state: 'REJECTED',
                stateReason: 'SERVER_REJECTED:DUPLICATE_PUNCH',
            });
            expect(queue.get('ci-1')).toBeUndefined();
        });

        describe('when the ledger missed the QUEUED entry', () => {
            beforeEach(async () => {
                const verified = makeRecord({ id: 'ci-1', type: 'CLOCK_IN', timestamp: '2026-03-02T09:00:00.000Z', state: 'VERIFIED' });
                await ledger.append(verified);
                await queue.enqueue({ ...verified, state: 'QUEUED', version: 2 }, clock.now());
            });

            it('should still carry an accepted record through to SYNCED', async () => {
                const result = await reconciler.syncOnce();

                expect(result.synced).toEqual(['ci-1']);
                expect(ledger.get('ci-1')).toMatchObject({ state: 'SYNCED', serverRevision: 1, version: 3 });
                expect(ledger.history('ci-1').map((record) => record.state)).toEqual(['VERIFIED', 'QUEUED', 'SYNCED']);
                expect(queue.depth()).toBe(0);
            });

            it('should still record a server rejection', async () => {
                server.rejectRecord('ci-1', 'DUPLICATE_PUNCH');

                await reconciler.syncOnce();

                expect(ledger.get('ci-1')).toMatchObject({
                    state: 'REJECTED',
                    stateReason: 'SERVER_REJECTED:DUPLICATE_PUNCH',
                    version: 3,
                });
            });
        });
    });

    describe('batch failures', () => {
        it('should keep the record QUEUED and schedule a retry on a transient failure', async () => {
            await queueLocal('ci-1', 'CLOCK_IN', '09:00');
            server.failNext(new SyncError('SERVER_UNAVAILABLE', 'down'));

            const result = await reconciler.syncOnce();

            expect(result.failed).toEqual(['ci-1']);
            expect(result.error?.code).toBe('SERVER_UNAVAILABLE');
            expect(ledger.get('ci-1')?.state).toBe('QUEUED');
            expect(queue.get('ci-1')).toMatchObject({
                status: 'PENDING',
                attemptCount: 1,
                lastError: 'SERVER_UNAVAILABLE: down',
                nextAttemptAt: '2026-03-02T18:00:01.000Z',
            });
        });

        it('should release the batch without counting an attempt when the caller cancels', async () => {
            await queueLocal('ci-1', 'CLOCK_IN', '09:00');
            server.hang();
            const controller = new AbortController();

            const running = reconciler.syncOnce(controller.signal);
            controller.abort();
            const result = await running;

            expect(result.released).toEqual(['ci-1']);
            expect(result.failed).toEqual([]);
            expect(queue.get('ci-1')).toMatchObject({ status: 'PENDING', attemptCount: 0 });
        });

        it('should count a run that outlives its time limit as a SERVER_TIMEOUT failure', async () => {
            reconciler = build(20);
            await queueLocal('ci-1', 'CLOCK_IN', '09:00');
            server.hang();

            const result = await reconciler.syncOnce();

            expect(result.failed).toEqual(['ci-1']);
            expect(result.error?.code).toBe('SERVER_TIMEOUT');
            expect(queue.get('ci-1')?.lastError).toBe('SERVER_TIMEOUT: Sync attempt exceeded its time limit');
        });
    });

    describe('conflicts', () => {
        beforeEach(async () => {
            await queueLocal('ci-1', 'CLOCK_IN', '09:00');
            await reconciler.syncOnce();
        });

        it('should let the server win when the local ClockOut would break pairing', async () => {
            server.seed({
                id: 'co-tablet',
                employeeId: 'emp-1',
                deviceId: 'tablet-1',
                type: 'CLOCK_OUT',
                timestamp: '2026-03-02T17:05:00.000Z',
                verificationMethod: 'KIOSK_PIN',
                verification: { method: 'KIOSK_PIN', kioskId: 'kiosk-1', pinHashMatched: true },
            });
            await queueLocal('co-1', 'CLOCK_OUT', '17:00');

            const result = await reconciler.syncOnce();

            expect(result.conflicted).toEqual(['co-1']);
            expect(result.resolvedSuperseded).toEqual(['co-1']);
            expect(result.notices).toEqual([SUPERSEDED_NOTICE]);
            expect(ledger.get('co-1')).toMatchObject({
                state: 'RESOLVED_SUPERSEDED',
                stateReason: 'SERVER_WINS_PAIRING',
            });
            expect(ledger.get('co-tablet')).toMatchObject({ state: 'SYNCED', origin: 'REMOTE', serverRevision: 2 });
            expect(server.uploads).toHaveLength(2);
            expect(queue.depth()).toBe(0);
        });

        describe('with a stray server BreakEnd', () => {
            beforeEach(async () => {
                server.seed({
                    id: 'be-tablet',
                    employeeId: 'emp-1',
                    deviceId: 'tablet-1',
                    type: 'BREAK_END',
                    timestamp: '2026-03-02T12:00:00.000Z',
                    verificationMethod: 'KIOSK_PIN',
                    verification: { method: 'KIOSK_PIN', kioskId: 'kiosk-1', pinHashMatched: true },
                });
                await queueLocal('bs-1', 'BREAK_START', '11:59');
                server.forceConflict('bs-1', 'be-tablet');
            });

            it('should re-upload the later local record in place of the server one', async () => {
                const result = await reconciler.syncOnce();

                expect(result.resolvedAccepted).toEqual(['bs-1']);
                expect(result.notices).toEqual([]);
                expect(ledger.get('bs-1')).toMatchObject({ state: 'RESOLVED_ACCEPTED', serverRevision: 4 });
                expect(ledger.get('be-tablet')).toMatchObject({
                    state: 'RESOLVED_SUPERSEDED',
                    stateReason: 'SUPERSEDED_BY_DEVICE',
                });
                expect(server.uploads[2]).toEqual([
                    { record: expect.objectContaining({ id: 'bs-1', state: 'CONFLICTED' }), supersedes: 'be-tablet' },
                ]);
                expect(server.records.has('be-tablet')).toBe(false);
            });

            it('should supersede the local record when the server sequence is not newer', async () => {
                server.nextConflictSequence = 0;

                const result = await reconciler.syncOnce();

                expect(result.resolvedSuperseded).toEqual(['bs-1']);
                expect(ledger.get('bs-1')?.stateReason).toBe('SERVER_RECORD_NEWER');
                expect(ledger.get('be-tablet')?.state).toBe('SYNCED');
                expect(server.uploads).toHaveLength(2);
            });

            it('should leave the record CONFLICTED when the re-upload fails, and settle it next run', async () => {
                const upload = server.uploadRecords.bind(server);
                let calls = 0;
                vi.spyOn(server, 'uploadRecords').mockImplementation(async (records, signal) => {
                    calls++;
                    if (calls === 2) throw new SyncError('SERVER_UNAVAILABLE', 'down');
                    return upload(records, signal);
                });

                const first = await reconciler.syncOnce();
                expect(first.conflicted).toEqual(['bs-1']);
                expect(first.failed).toEqual(['bs-1']);
                expect(first.error?.code).toBe('SERVER_UNAVAILABLE');
                expect(ledger.get('bs-1')?.state).toBe('CONFLICTED');
                expect(queue.get('bs-1')).toMatchObject({
                    status: 'CONFLICTED',
                    attemptCount: 1,
                    nextAttemptAt: '2026-03-02T18:00:01.000Z',
                });

                expect((await reconciler.syncOnce()).attempted).toBe(0);

                clock.advance(1_000);
                const second = await reconciler.syncOnce();
                expect(second.attempted).toBe(1);
                expect(second.resolvedAccepted).toEqual(['bs-1']);
                expect(ledger.get('bs-1')).toMatchObject({ state: 'RESOLVED_ACCEPTED', serverRevision: 4 });
                expect(queue.depth()).toBe(0);
            });

            it('should back off a conflict whose re-upload keeps failing until it goes stale', async () => {
                const upload = server.uploadRecords.bind(server);
                let calls = 0;
                vi.spyOn(server, 'uploadRecords').mockImplementation(async (records, signal) => {
                    calls++;
                    if (calls >= 2) throw new SyncError('SERVER_UNAVAILABLE', 'down');
                    return upload(records, signal);
                });

                await reconciler.syncOnce();
                for (let day = 1; day < 20; day++) {
                    clock.advance(DAY);
                    await reconciler.syncOnce();
                }

                // one batch upload, then one re-upload a day until the 14-day horizon
                expect(calls).toBe(16);
                expect(queue.get('bs-1')).toMatchObject({ status: 'STALE_UNSYNCED', attemptCount: 15 });
                expect(queue.staleCount()).toBe(1);
                expect(ledger.get('bs-1')?.state).toBe('CONFLICTED');
            });

            it('should settle an earlier conflict before uploading the same employee\'s later records', async () => {
                const upload = server.uploadRecords.bind(server);
                const calls: string[][] = [];
                vi.spyOn(server, 'uploadRecords').mockImplementation(async (records, signal) => {
                    calls.push(records.map((entry) => entry.record.id));
                    if (calls.length === 2) throw new SyncError('SERVER_UNAVAILABLE', 'down');
                    return upload(records, signal);
                });

                await reconciler.syncOnce();
                await queueLocal('co-1', 'CLOCK_OUT', '17:00');
                clock.advance(1_000);
                expect(queue.peekBatch(50, clock.now())).toEqual([]);

                const result = await reconciler.syncOnce();

                expect(calls.slice(2)).toEqual([['bs-1'], ['co-1']]);
                expect(result.attempted).toBe(2);
                expect(result.resolvedAccepted).toEqual(['bs-1']);
                expect(result.synced).toEqual(['co-1']);
                expect(queue.depth()).toBe(0);
            });
        });
    });

    describe('leave requests', () => {
        let book: LeaveBook;

        const applyForLeave = async () => {
            const applied = await book.applyForLeave(
                {
                    employeeId: 'emp-1',
                    deviceId: 'phone-1',
                    leaveTypeId: 'casual',
                    startDate: '2026-03-03',
                    endDate: '2026-03-03',
                },
                clock.now()
            );
            if (!applied.success) throw applied.error;
            return applied.data;
        };

        beforeEach(async () => {
            const types = new LeaveTypeRegistry();
            types.register({ id: 'casual', name: 'Casual', maximumDays: 2, criteria: 'WEEKLY' });
            book = new LeaveBook(new MemoryLogStore(), types);
            await book.open();
            reconciler = new SyncReconciler({
                queue,
                ledger,
                stateMachine: new RecordStateMachine(clock.now),
                api: server,
                mutex: new KeyedMutex(),
                clock: clock.now,
                leave: book,
            });
        });

        it('should upload pending leave and take the approval the server reports', async () => {
            const request = await applyForLeave();
            server.leaveApprovals.set(request.id, { approvedBy: 'mgr-1', approvedAt: '2026-03-02T17:30:00.000Z' });

            const result = await reconciler.syncOnce();

            expect(result.attempted).toBe(0);
            expect(result.leaveSynced).toEqual([request.id]);
            expect(server.leaveUploads).toEqual([[request.id]]);
            expect(book.get(request.id)).toMatchObject({
                status: 'APPROVED',
                approvedBy: 'mgr-1',
                uploadStatus: 'UPLOADED',
                uploadedAt: '2026-03-02T18:00:00.000Z',
            });

            await reconciler.syncOnce();
            expect(server.leaveUploads).toHaveLength(1);
        });

        it('should keep leave pending and report the error when its upload fails', async () => {
            const request = await applyForLeave();
            server.failNext(new SyncError('SERVER_UNAVAILABLE', 'down'));

            const result = await reconciler.syncOnce();

            expect(result.leaveSynced).toEqual([]);
            expect(result.error?.code).toBe('SERVER_UNAVAILABLE');
            expect(book.get(request.id)?.uploadStatus).toBe('PENDING');
        });
    });
});
