/**
 * HTTP client for the attendance server.
 *
 * - POST /attendance/records    batch upload, idempotent by record id
 * - POST /attendance/leave-requests  leave upload, answered with approval state
 * - GET  /attendance/policy/:id policy snapshot effective at ?asOf=
 *
 * Every request carries the bearer token, is bounded by a timeout that
 * combines with the caller's signal, and runs through a circuit breaker.
 * Responses are validated with zod; anything malformed is a SyncError.
 */

import type { ZodType, ZodTypeDef } from 'zod';
import { CircuitBreaker } from '../../infra/CircuitBreaker.js';
import { SyncError, errorMessage } from '../../lib/errors/index.js';
import { leaveUploadResponseSchema, policySnapshotResponseSchema, uploadResponseSchema } from '../../lib/validators.js';
import type { LeaveRequest, LeaveVerdict, OvertimePolicy, RecordVerdict, UploadRecord } from '../../types/index.js';
import { syncLogger } from '../../utils/logger.js';
import type { AttendanceApi } from './AttendanceApi.js';

const logger = syncLogger.child({ module: 'HttpAttendanceApi' });

export interface HttpAttendanceApiOptions {
  baseUrl: string;
  token?: string;
  timeoutMs?: number;
  breaker?: CircuitBreaker;
  fetchImpl?: typeof fetch;
}

export class HttpAttendanceApi implements AttendanceApi {
  private readonly baseUrl: string;
  private readonly token?: string;
  private readonly timeoutMs: number;
  private readonly breaker: CircuitBreaker;
  private readonly fetchImpl: typeof fetch;

  constructor(options: HttpAttendanceApiOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.token = options.token || undefined;
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.breaker =
      options.breaker ??
      new CircuitBreaker('attendance-api', {
        isFailure: (error) => error instanceof SyncError && error.isTransient && error.details?.aborted !== true,
      });
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async uploadRecords(records: UploadRecord[], signal?: AbortSignal): Promise<RecordVerdict[]> {
    if (records.length === 0) return [];

    const body = await this.request(
      'POST',
      '/attendance/records',
      uploadResponseSchema,
      signal,
      JSON.stringify({
        records: records.map(({ record, supersedes }) => ({ ...record, supersedes })),
      })
    );
    logger.debug({ uploaded: records.length, verdicts: body?.results.length ?? 0 }, 'Upload answered');
    return body?.results ?? [];
  }

  async uploadLeaveRequests(requests: LeaveRequest[], signal?: AbortSignal): Promise<LeaveVerdict[]> {
    if (requests.length === 0) return [];

    const body = await this.request(
      'POST',
      '/attendance/leave-requests',
      leaveUploadResponseSchema,
      signal,
      JSON.stringify({ requests })
    );
    return body?.results ?? [];
  }

  async fetchPolicy(policyId: string, asOf: Date, signal?: AbortSignal): Promise<OvertimePolicy | undefined> {
    const path = `/attendance/policy/${encodeURIComponent(policyId)}?asOf=${encodeURIComponent(asOf.toISOString())}`;
    const body = await this.request('GET', path, policySnapshotResponseSchema, signal);
    return body?.policy;
  }

  // ==========================================================================
  // TRANSPORT
  // ==========================================================================

  /** Resolves undefined on 404 */
  private async request<T>(
    method: 'GET' | 'POST',
    path: string,
    schema: ZodType<T, ZodTypeDef, unknown>,
    signal: AbortSignal | undefined,
    body?: string
  ): Promise<T | undefined> {
    return this.breaker.execute(async () => {
      const controller = new AbortController();
      let timedOut = false;
      const timer = setTimeout(() => {
        timedOut = true;
        controller.abort();
      }, this.timeoutMs);
      const onAbort = () => controller.abort();
      if (signal?.aborted) controller.abort();
      signal?.addEventListener('abort', onAbort, { once: true });

      const headers: Record<string, string> = { accept: 'application/json' };
      if (body !== undefined) headers['content-type'] = 'application/json';
      if (this.token) headers.authorization = `Bearer ${this.token}`;

      try {
        let response: Response;
        try {
          response = await this.fetchImpl(`${this.baseUrl}${path}`, {
            method,
            headers,
            body,
            signal: controller.signal,
          });
        } catch (error) {
          throw transportError(method, path, error, timedOut, signal, this.timeoutMs);
        }

        if (response.status === 404 && method === 'GET') return undefined;
        if (!response.ok) throw statusError(method, path, response.status);

        let json: unknown;
        try {
          json = await response.json();
        } catch (error) {
          if (timedOut || signal?.aborted) throw transportError(method, path, error, timedOut, signal, this.timeoutMs);
          throw new SyncError('SERVER_UNAVAILABLE', `Unreadable response from ${path}: ${errorMessage(error)}`);
        }

        const parsed = schema.safeParse(json);
        if (!parsed.success) {
          throw new SyncError('SERVER_UNAVAILABLE', `Malformed response from ${path}`, {
            issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
          });
        }
        return parsed.data;
      } finally {
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
      }
    });
  }
}

function transportError(
  method: string,
  path: string,
  error: unknown,
  timedOut: boolean,
  signal: AbortSignal | undefined,
  timeoutMs: number
): SyncError {
  if (timedOut) {
    return new SyncError('SERVER_TIMEOUT', `${method} ${path} timed out after ${timeoutMs}ms`);
  }
  if (signal?.aborted) {
    return new SyncError('NETWORK_UNAVAILABLE', `${method} ${path} was cancelled`, { aborted: true });
  }
  return new SyncError('NETWORK_UNAVAILABLE', `${method} ${path} failed: ${errorMessage(error)}`);
}

function statusError(method: string, path: string, status: number): SyncError {
  const message = `${method} ${path} answered HTTP ${status}`;
  if (status === 408 || status === 504) return new SyncError('SERVER_TIMEOUT', message, { status });
  if (status === 429 || status >= 500) return new SyncError('SERVER_UNAVAILABLE', message, { status });
  return new SyncError('SERVER_REJECTED', message, { status });
}
