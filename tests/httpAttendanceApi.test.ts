/**
 * HttpAttendanceApi Tests
 *
 * Request shape, status mapping, timeouts and the circuit breaker, with
 * fetch replaced by a mock.
 */

import { describe, it, expect, vi } from 'vitest';
import { CircuitBreaker, CircuitOpenError } from '../src/infra/CircuitBreaker.js';
import { SyncError } from '../src/lib/errors/index.js';
import { HttpAttendanceApi } from '../src/services/sync/HttpAttendanceApi.js';
import type { LeaveRequest } from '../src/types/index.js';
import { makeRecord, standardPolicy } from './helpers.js';

const BASE_URL = 'https://attendance.example.test/api/';

const json = (body: unknown, status = 200) =>
    new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } });

function respondWith(status: number, body: unknown = {}) {
    return vi.fn<typeof fetch>().mockImplementation(async () => json(body, status));
}

/** Never answers; rejects once the request signal aborts */
const neverAnswers = () =>
    vi.fn<typeof fetch>().mockImplementation(
        (_input, init) =>
            new Promise((_resolve, reject) => {
                const signal = init?.signal;
                if (signal?.aborted) {
                    reject(new Error('This operation was aborted'));
                    return;
                }
                signal?.addEventListener('abort', () => reject(new Error('This operation was aborted')), { once: true });
            })
    );

async function failureOf(promise: Promise<unknown>): Promise<SyncError> {
    try {
        await promise;
    } catch (error) {
        if (error instanceof SyncError) return error;
        throw error;
    }
    throw new Error('expected the request to fail');
}

const record = makeRecord({ id: 'ci-1', type: 'CLOCK_IN', timestamp: '2026-03-02T09:00:00.000Z', state: 'QUEUED' });

describe('HttpAttendanceApi', () => {
    describe('uploadRecords', () => {
        it('should POST the batch with the bearer token and return the verdicts', async () => {
            const fetchImpl = respondWith(200, {
                results: [{ recordId: 'ci-1', status: 'ACCEPTED', serverRevision: 7 }],
            });
            const api = new HttpAttendanceApi({ baseUrl: BASE_URL, token: 'test-secret', fetchImpl });

            const verdicts = await api.uploadRecords([{ record, supersedes: 'be-tablet' }]);

            expect(verdicts).toEqual([{ recordId: 'ci-1', status: 'ACCEPTED', serverRevision: 7 }]);
            const [url, init] = fetchImpl.mock.calls[0] ?? [];
            expect(url).toBe('https://attendance.example.test/api/attendance/records');
            expect(init).toMatchObject({
                method: 'POST',
                headers: {
                    accept: 'application/json',
                    'content-type': 'application/json',
                    authorization: 'Bearer test-secret',
                },
            });
            expect(JSON.parse(String(init?.body))).toEqual({ records: [{ ...record, supersedes: 'be-tablet' }] });
        });

        it('should not call the server for an empty batch', async () => {
            const fetchImpl = respondWith(200, { results: [] });
            const api = new HttpAttendanceApi({ baseUrl: BASE_URL, fetchImpl });

            expect(await api.uploadRecords([])).toEqual([]);
            expect(fetchImpl).not.toHaveBeenCalled();
        });

        it('should omit the authorization header without a token', async () => {
            const fetchImpl = respondWith(200, { results: [] });
            const api = new HttpAttendanceApi({ baseUrl: BASE_URL, token: '', fetchImpl });

            await api.uploadRecords([{ record }]);

            expect(fetchImpl.mock.calls[0]?.[1]?.headers).toEqual({
                accept: 'application/json',
                'content-type': 'application/json',
            });
        });

        it.each([
            [503, 'SERVER_UNAVAILABLE'],
            [429, 'SERVER_UNAVAILABLE'],
            [504, 'SERVER_TIMEOUT'],
            [408, 'SERVER_TIMEOUT'],
            [400, 'SERVER_REJECTED'],
            [404, 'SERVER_REJECTED'],
        ] as const)('should map HTTP %i to %s', async (status, code) => {
            const api = new HttpAttendanceApi({ baseUrl: BASE_URL, fetchImpl: respondWith(status) });

            const error = await failureOf(api.uploadRecords([{ record }]));

            expect(error.code).toBe(code);
            expect(error.message).toBe(`POST /attendance/records answered HTTP ${status}`);
        });

        it('should treat a malformed body as the server being unavailable', async () => {
            const api = new HttpAttendanceApi({
                baseUrl: BASE_URL,
                fetchImpl: respondWith(200, { results: [{ recordId: 'ci-1', status: 'MAYBE' }] }),
            });

            const error = await failureOf(api.uploadRecords([{ record }]));

            expect(error.code).toBe('SERVER_UNAVAILABLE');
            expect(error.message).toBe('Malformed response from /attendance/records');
        });

        it('should give up with SERVER_TIMEOUT after the configured time', async () => {
            const api = new HttpAttendanceApi({ baseUrl: BASE_URL, timeoutMs: 10, fetchImpl: neverAnswers() });

            const error = await failureOf(api.uploadRecords([{ record }]));

            expect(error.code).toBe('SERVER_TIMEOUT');
            expect(error.message).toBe('POST /attendance/records timed out after 10ms');
        });

        it('should report a cancelled request as an aborted network failure', async () => {
            const api = new HttpAttendanceApi({ baseUrl: BASE_URL, fetchImpl: neverAnswers() });
            const controller = new AbortController();
            controller.abort();

            const error = await failureOf(api.uploadRecords([{ record }], controller.signal));

            expect(error.code).toBe('NETWORK_UNAVAILABLE');
            expect(error.details).toEqual({ aborted: true });
        });

        it('should report a transport failure as NETWORK_UNAVAILABLE', async () => {
            const fetchImpl = vi.fn<typeof fetch>().mockRejectedValue(new TypeError('fetch failed'));
            const api = new HttpAttendanceApi({ baseUrl: BASE_URL, fetchImpl });

            const error = await failureOf(api.uploadRecords([{ record }]));

            expect(error.code).toBe('NETWORK_UNAVAILABLE');
            expect(error.message).toBe('POST /attendance/records failed: fetch failed');
        });

        it('should stop calling a failing server once the circuit opens', async () => {
            const fetchImpl = respondWith(503);
            const breaker = new CircuitBreaker('attendance-api', { failureThreshold: 2 });
            const api = new HttpAttendanceApi({ baseUrl: BASE_URL, fetchImpl, breaker });

            await failureOf(api.uploadRecords([{ record }]));
            await failureOf(api.uploadRecords([{ record }]));
            const error = await failureOf(api.uploadRecords([{ record }]));

            expect(error).toBeInstanceOf(CircuitOpenError);
            expect(error.code).toBe('SERVER_UNAVAILABLE');
            expect(fetchImpl).toHaveBeenCalledTimes(2);
        });
    });

    describe('uploadLeaveRequests', () => {
        const leave: LeaveRequest = {
            id: 'leave-1',
            employeeId: 'emp-1',
            deviceId: 'phone-1',
            leaveTypeId: 'casual',
            startDate: '2026-03-03',
            endDate: '2026-03-03',
            days: 1,
            status: 'PENDING',
            appliedAt: '2026-03-02T18:00:00.000Z',
            uploadStatus: 'PENDING',
        };

        it('should POST the requests and return the approvals', async () => {
            const fetchImpl = respondWith(200, {
                results: [
                    {
                        requestId: 'leave-1',
                        status: 'APPROVED',
                        approvedBy: 'mgr-1',
                        approvedAt: '2026-03-02T18:30:00.000Z',
                    },
                ],
            });
            const api = new HttpAttendanceApi({ baseUrl: BASE_URL, fetchImpl });

            const verdicts = await api.uploadLeaveRequests([leave]);

            expect(verdicts).toEqual([
                { requestId: 'leave-1', status: 'APPROVED', approvedBy: 'mgr-1', approvedAt: '2026-03-02T18:30:00.000Z' },
            ]);
            expect(fetchImpl.mock.calls[0]?.[0]).toBe('https://attendance.example.test/api/attendance/leave-requests');
            expect(JSON.parse(String(fetchImpl.mock.calls[0]?.[1]?.body))).toEqual({ requests: [leave] });
        });

        it('should not call the server with nothing to upload', async () => {
            const fetchImpl = respondWith(200, { results: [] });
            const api = new HttpAttendanceApi({ baseUrl: BASE_URL, fetchImpl });

            expect(await api.uploadLeaveRequests([])).toEqual([]);
            expect(fetchImpl).not.toHaveBeenCalled();
        });
    });

    describe('fetchPolicy', () => {
        it('should GET the policy in effect at the given instant', async () => {
            const policy = standardPolicy();
            const fetchImpl = respondWith(200, { policy });
            const api = new HttpAttendanceApi({ baseUrl: BASE_URL, fetchImpl });

            const fetched = await api.fetchPolicy('policy-standard', new Date('2026-03-02T09:00:00.000Z'));

            expect(fetched).toEqual(policy);
            expect(fetchImpl.mock.calls[0]?.[0]).toBe(
                'https://attendance.example.test/api/attendance/policy/policy-standard?asOf=2026-03-02T09%3A00%3A00.000Z'
            );
            expect(fetchImpl.mock.calls[0]?.[1]?.method).toBe('GET');
        });

        it('should resolve undefined when the server has no such policy', async () => {
            const api = new HttpAttendanceApi({ baseUrl: BASE_URL, fetchImpl: respondWith(404) });

            expect(await api.fetchPolicy('policy-unknown', new Date('2026-03-02T09:00:00.000Z'))).toBeUndefined();
        });
    });
});
