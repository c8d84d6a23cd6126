/**
 * SYNC RECONCILER
 *
 * Uploads queued records and merges the server's verdicts into the ledger.
 *
 * FLOW:
 * 1. Retry due CONFLICTED items, one employee's in timestamp order
 * 2. Peek a batch (an employee with an unresolved conflict is held back), mark it in flight
 * 3. Upload per employee in timestamp order; employees run in parallel
 * 4. ACCEPTED → SYNCED, acked
 *    REJECTED → REJECTED, removed (never retried)
 *    CONFLICTS_WITH → CONFLICTED, then resolved in the same run
 * 5. Upload failures (network, 5xx, timeout) → backoff, conflicted or not;
 *    cancellation → released
 * 6. Leave requests the server has not seen or approved go up in one call;
 *    a failure leaves them for the next run
 *
 * CONFLICTS:
 * - If the local record breaks the pairing of the employee's server
 *   timeline (added beside the competing record or replacing it), the
 *   server record wins unconditionally
 * - Otherwise the later server-assigned sequence wins: the local record is
 *   re-uploaded with `supersedes`; an older sequence loses
 * - The competing server record is kept in the replica as a REMOTE record
 */

import { SyncError, StorageError, errorMessage } from '../../lib/errors/index.js';
import type { KeyedMutex } from '../../infra/KeyedMutex.js';
import {
  systemClock,
  type AttendanceRecord,
  type Clock,
  type LeaveVerdict,
  type RecordVerdict,
  type ServerRecord,
  type SyncQueueItem,
} from '../../types/index.js';
import { syncLogger } from '../../utils/logger.js';
import type { LeaveBook } from '../leave/LeaveBook.js';
import type { RecordLedger } from '../RecordLedger.js';
import { SERVER_CONFIRMED_STATES, type RecordStateMachine } from '../RecordStateMachine.js';
import { validatePairing } from '../policy/pairing.js';
import type { AttendanceApi } from './AttendanceApi.js';
import type { OfflineQueue } from './OfflineQueue.js';

const logger = syncLogger.child({ module: 'SyncReconciler' });

export const SUPERSEDED_NOTICE = "Your device's record was replaced by another device's record for the same time.";

export const DEFAULT_SYNC_TIMEOUT_MS = 30_000;
export const DEFAULT_BATCH_SIZE = 50;

// ============================================================================
// TYPES
// ============================================================================

export interface SyncResult {
  startedAt: string;
  finishedAt: string;
  attempted: number;
  synced: string[];
  rejected: string[];
  conflicted: string[];
  resolvedAccepted: string[];
  resolvedSuperseded: string[];
  failed: string[];
  released: string[];
  /** One per superseded record, for the user */
  notices: string[];
  /** Leave requests the server answered for */
  leaveSynced: string[];
  /** First batch-level failure of the run */
  error?: SyncError;
}

export interface SyncReconcilerDeps {
  queue: OfflineQueue;
  ledger: RecordLedger;
  stateMachine: RecordStateMachine;
  api: AttendanceApi;
  /** Shared with the engine so record writes for one employee never interleave */
  mutex: KeyedMutex;
  /** Leave requests ride along with every run when present */
  leave?: LeaveBook;
  clock?: Clock;
  batchSize?: number;
  timeoutMs?: number;
}

type ConflictVerdict = Extract<RecordVerdict, { status: 'CONFLICTS_WITH' }>;

// ============================================================================
// RECONCILER
// ============================================================================

export class SyncReconciler {
  private readonly clock: Clock;
  private readonly batchSize: number;
  private readonly timeoutMs: number;

  constructor(private readonly deps: SyncReconcilerDeps) {
    this.clock = deps.clock ?? systemClock;
    this.batchSize = deps.batchSize ?? DEFAULT_BATCH_SIZE;
    this.timeoutMs = deps.timeoutMs ?? DEFAULT_SYNC_TIMEOUT_MS;
  }

  async syncOnce(signal?: AbortSignal): Promise<SyncResult> {
    const { queue } = this.deps;
    const result = emptyResult(this.clock());

    const conflicted = queue.listConflicted(this.clock());
    const idle =
      conflicted.length === 0 &&
      queue.peekBatch(1, this.clock()).length === 0 &&
      (this.deps.leave?.awaitingServer().length ?? 0) === 0;

    if (idle || signal?.aborted) {
      result.finishedAt = this.clock().toISOString();
      return result;
    }

    const run = new AbortController();
    const timer = setTimeout(() => run.abort(), this.timeoutMs);
    const onAbort = () => run.abort();
    signal?.addEventListener('abort', onAbort, { once: true });
    let batchIds: string[] = [];

    try {
      if (conflicted.length > 0) {
        result.attempted = conflicted.length;
        await settleAll(
          groupByEmployee(conflicted).map(async (items) => {
            for (const item of items) {
              await this.retryConflict(item, run.signal, signal, result);
            }
          })
        );
      }

      const batch = queue.peekBatch(this.batchSize, this.clock());
      batchIds = batch.map((item) => item.record.id);
      result.attempted += batch.length;

      if (run.signal.aborted) {
        result.released.push(...batchIds);
      } else {
        queue.markInFlight(batchIds);
        await settleAll(groupByEmployee(batch).map((items) => this.uploadEmployee(items, run.signal, signal, result)));
      }

      if (!run.signal.aborted) {
        await this.uploadLeave(run.signal, signal, result);
      }

      const settled =
        result.synced.length + result.rejected.length + result.resolvedAccepted.length + result.resolvedSuperseded.length;
      if (settled > 0) {
        await queue.compact();
      }
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
      // anything still in flight (storage failure mid-run) goes back to PENDING
      queue.release(batchIds);
    }

    result.finishedAt = this.clock().toISOString();
    logger.info(
      {
        attempted: result.attempted,
        synced: result.synced.length,
        rejected: result.rejected.length,
        conflicted: result.conflicted.length,
        failed: result.failed.length,
        released: result.released.length,
        error: result.error?.code,
      },
      'Sync run finished'
    );
    return result;
  }

  // ==========================================================================
  // UPLOAD
  // ==========================================================================

  private async uploadEmployee(
    items: SyncQueueItem[],
    runSignal: AbortSignal,
    callerSignal: AbortSignal | undefined,
    result: SyncResult
  ): Promise<void> {
    const employeeId = items[0]?.record.employeeId ?? '';
    const ids = items.map((item) => item.record.id);

    let verdicts: RecordVerdict[];
    try {
      verdicts = await this.deps.api.uploadRecords(
        items.map((item) => ({ record: this.current(item.record) })),
        runSignal
      );
    } catch (error) {
      const syncError = toSyncError(error, runSignal, callerSignal);
      if (callerSignal?.aborted) {
        this.deps.queue.release(ids);
        result.released.push(...ids);
        return;
      }
      result.error ??= syncError;
      const now = this.clock();
      for (const id of ids) {
        await this.deps.queue.markFailed(id, `${syncError.code}: ${syncError.message}`, now);
        result.failed.push(id);
      }
      logger.warn({ employeeId, records: ids.length, code: syncError.code }, 'Upload failed; will retry');
      return;
    }

    for (const item of items) {
      const verdict = verdicts.find((candidate) => candidate.recordId === item.record.id);
      if (!verdict) {
        await this.deps.queue.markFailed(item.record.id, 'SERVER_UNAVAILABLE: no verdict returned', this.clock());
        result.failed.push(item.record.id);
        continue;
      }
      await this.applyVerdict(item.record.id, verdict, runSignal, callerSignal, result);
    }
  }

  private async applyVerdict(
    recordId: string,
    verdict: RecordVerdict,
    runSignal: AbortSignal,
    callerSignal: AbortSignal | undefined,
    result: SyncResult
  ): Promise<void> {
    const { ledger, queue, stateMachine } = this.deps;

    switch (verdict.status) {
      case 'ACCEPTED': {
        const { serverRevision } = verdict;
        await this.withQueuedRecord(recordId, async (record) => {
          const now = this.clock();
          if (record.state === 'QUEUED') {
            await ledger.append(stateMachine.transition(record, 'SYNCED', { serverRevision }));
          }
          await queue.ack([recordId], now);
          result.synced.push(recordId);
        });
        return;
      }

      case 'REJECTED': {
        const reason = verdict.reason;
        await this.withQueuedRecord(recordId, async (record) => {
          if (record.state === 'QUEUED') {
            await ledger.append(stateMachine.transition(record, 'REJECTED', { reason: `SERVER_REJECTED:${reason}` }));
          }
          await queue.remove([recordId], this.clock());
          result.rejected.push(recordId);
          logger.warn({ recordId, reason }, 'Server rejected record');
        });
        return;
      }

      case 'CONFLICTS_WITH': {
        const existing = verdict.existing;
        const conflictedRecord = await this.withQueuedRecord(recordId, async (record) => {
          const now = this.clock();
          const next = record.state === 'QUEUED'
            ? await ledger.append(stateMachine.transition(record, 'CONFLICTED', { reason: 'CONFLICT' }))
            : record;
          await queue.markConflicted(next, now);
          await ledger.upsertRemote(existing, now);
          result.conflicted.push(recordId);
          return next;
        });
        if (conflictedRecord.state === 'CONFLICTED') {
          await this.resolveConflict(conflictedRecord, verdict, runSignal, callerSignal, result);
        }
        return;
      }
    }
  }

  private async uploadLeave(
    runSignal: AbortSignal,
    callerSignal: AbortSignal | undefined,
    result: SyncResult
  ): Promise<void> {
    const leave = this.deps.leave;
    const requests = leave?.awaitingServer() ?? [];
    if (!leave || requests.length === 0) return;

    let verdicts: LeaveVerdict[];
    try {
      verdicts = await this.deps.api.uploadLeaveRequests(requests, runSignal);
    } catch (error) {
      if (callerSignal?.aborted) return;
      const syncError = toSyncError(error, runSignal, callerSignal);
      result.error ??= syncError;
      logger.warn({ requests: requests.length, code: syncError.code }, 'Leave upload failed; will retry');
      return;
    }
    result.leaveSynced.push(...(await leave.applyVerdicts(verdicts, this.clock())));
  }

  // ==========================================================================
  // CONFLICT RESOLUTION
  // ==========================================================================

  private async resolveConflict(
    record: AttendanceRecord,
    verdict: ConflictVerdict,
    runSignal: AbortSignal,
    callerSignal: AbortSignal | undefined,
    result: SyncResult
  ): Promise<void> {
    if (this.breaksServerPairing(record, verdict.existing.id)) {
      await this.supersede(record.id, 'SERVER_WINS_PAIRING', result);
      return;
    }

    if (verdict.sequence <= verdict.existing.serverRevision) {
      await this.supersede(record.id, 'SERVER_RECORD_NEWER', result);
      return;
    }

    const answer = await this.uploadConflicted(
      record,
      verdict.existing.id,
      runSignal,
      callerSignal,
      result
    );
    if (answer?.status === 'ACCEPTED') {
      await this.acceptResolved(record.id, answer.serverRevision, verdict.existing, result);
    } else if (answer) {
      const reason = answer.status === 'REJECTED' ? `SERVER_REJECTED:${answer.reason}` : 'SERVER_RECORD_NEWER';
      await this.supersede(record.id, reason, result);
    }
  }

  /** A CONFLICTED record from an earlier run: ask the server again */
  private async retryConflict(
    item: SyncQueueItem,
    runSignal: AbortSignal,
    callerSignal: AbortSignal | undefined,
    result: SyncResult
  ): Promise<void> {
    if (runSignal.aborted) {
      result.released.push(item.record.id);
      return;
    }
    const record = this.current(item.record);
    if (record.state !== 'CONFLICTED') return;

    const answer = await this.uploadConflicted(record, undefined, runSignal, callerSignal, result);
    if (!answer) return;
    switch (answer.status) {
      case 'ACCEPTED':
        await this.acceptResolved(record.id, answer.serverRevision, undefined, result);
        return;
      case 'REJECTED':
        await this.supersede(record.id, `SERVER_REJECTED:${answer.reason}`, result);
        return;
      case 'CONFLICTS_WITH': {
        const existing = answer.existing;
        await this.withRecord(record.id, async () => {
          await this.deps.ledger.upsertRemote(existing, this.clock());
        });
        await this.resolveConflict(record, answer, runSignal, callerSignal, result);
        return;
      }
    }
  }

  /**
   * Upload one CONFLICTED record. A failure or a missing verdict counts as a
   * failed attempt, so the item backs off and eventually goes stale; a caller
   * cancellation leaves it as it was.
   */
  private async uploadConflicted(
    record: AttendanceRecord,
    supersedes: string | undefined,
    runSignal: AbortSignal,
    callerSignal: AbortSignal | undefined,
    result: SyncResult
  ): Promise<RecordVerdict | undefined> {
    let verdicts: RecordVerdict[];
    try {
      verdicts = await this.deps.api.uploadRecords([{ record, supersedes }], runSignal);
    } catch (error) {
      if (callerSignal?.aborted) {
        result.released.push(record.id);
        return undefined;
      }
      const syncError = toSyncError(error, runSignal, callerSignal);
      result.error ??= syncError;
      await this.deps.queue.markFailed(record.id, `${syncError.code}: ${syncError.message}`, this.clock());
      result.failed.push(record.id);
      logger.warn({ recordId: record.id, code: syncError.code }, 'Conflict re-upload failed; will retry');
      return undefined;
    }

    const answer = verdicts.find((candidate) => candidate.recordId === record.id);
    if (!answer) {
      await this.deps.queue.markFailed(record.id, 'SERVER_UNAVAILABLE: no verdict returned', this.clock());
      result.failed.push(record.id);
    }
    return answer;
  }

  /**
   * Would this record break pairing on the employee's server-confirmed
   * timeline, either added next to the competing record or in its place?
   */
  private breaksServerPairing(record: AttendanceRecord, competingId: string): boolean {
    const timeline = this.deps.ledger
      .listByEmployee(record.employeeId)
      .filter((candidate) => candidate.id !== record.id && SERVER_CONFIRMED_STATES.has(candidate.state));
    const before = validatePairing(timeline).length;
    const added = validatePairing([...timeline, record]).length;
    const replaced = validatePairing([...timeline.filter((candidate) => candidate.id !== competingId), record]).length;
    return added > before || replaced > before;
  }

  private async acceptResolved(
    recordId: string,
    serverRevision: number,
    replaced: ServerRecord | undefined,
    result: SyncResult
  ): Promise<void> {
    await this.withRecord(recordId, async (record) => {
      const now = this.clock();
      if (record.state === 'CONFLICTED') {
        await this.deps.ledger.append(this.deps.stateMachine.transition(record, 'RESOLVED_ACCEPTED', { serverRevision }));
      }
      if (replaced) {
        await this.deps.ledger.supersedeReplica(replaced.id, 'SUPERSEDED_BY_DEVICE', now);
      }
      await this.deps.queue.ack([recordId], now);
      result.resolvedAccepted.push(recordId);
    });
  }

  private async supersede(recordId: string, reason: string, result: SyncResult): Promise<void> {
    await this.withRecord(recordId, async (record) => {
      if (record.state === 'CONFLICTED') {
        await this.deps.ledger.append(this.deps.stateMachine.transition(record, 'RESOLVED_SUPERSEDED', { reason }));
      }
      await this.deps.queue.ack([recordId], this.clock());
      result.resolvedSuperseded.push(recordId);
      result.notices.push(SUPERSEDED_NOTICE);
      logger.info({ recordId, reason }, 'Local record superseded by server record');
    });
  }

  // ==========================================================================
  // HELPERS
  // ==========================================================================

  /** Latest ledger version, under the employee's lock */
  private async withRecord<T>(recordId: string, fn: (record: AttendanceRecord) => Promise<T>): Promise<T> {
    const snapshot = this.deps.ledger.get(recordId);
    if (!snapshot) {
      throw new StorageError(`Queued record ${recordId} is missing from the ledger`);
    }
    return this.deps.mutex.runExclusive(snapshot.employeeId, async () => {
      const record = this.deps.ledger.get(recordId) ?? snapshot;
      return fn(record);
    });
  }

  /**
   * withRecord, after lifting a VERIFIED record to QUEUED: the queue item is
   * written before the ledger's QUEUED entry, and a crash can fall between.
   */
  private async withQueuedRecord<T>(recordId: string, fn: (record: AttendanceRecord) => Promise<T>): Promise<T> {
    return this.withRecord(recordId, async (record) => {
      if (record.state !== 'VERIFIED') return fn(record);
      logger.warn({ recordId }, 'Queued record was still VERIFIED in the ledger; marking it QUEUED');
      return fn(await this.deps.ledger.append(this.deps.stateMachine.transition(record, 'QUEUED')));
    });
  }

  private current(record: AttendanceRecord): AttendanceRecord {
    return this.deps.ledger.get(record.id) ?? record;
  }
}

function emptyResult(now: Date): SyncResult {
  return {
    startedAt: now.toISOString(),
    finishedAt: now.toISOString(),
    attempted: 0,
    synced: [],
    rejected: [],
    conflicted: [],
    resolvedAccepted: [],
    resolvedSuperseded: [],
    failed: [],
    released: [],
    notices: [],
    leaveSynced: [],
  };
}

function groupByEmployee(items: readonly SyncQueueItem[]): SyncQueueItem[][] {
  const groups = new Map<string, SyncQueueItem[]>();
  for (const item of items) {
    const group = groups.get(item.record.employeeId);
    if (group) {
      group.push(item);
    } else {
      groups.set(item.record.employeeId, [item]);
    }
  }
  return [...groups.values()];
}

/** Wait for every task; rethrow the first failure */
async function settleAll(work: Promise<void>[]): Promise<void> {
  const outcomes = await Promise.allSettled(work);
  const failure = outcomes.find((outcome): outcome is PromiseRejectedResult => outcome.status === 'rejected');
  if (failure) throw failure.reason;
}

function toSyncError(error: unknown, runSignal: AbortSignal, callerSignal: AbortSignal | undefined): SyncError {
  if (error instanceof SyncError) {
    // the run's own deadline fired, not the caller's
    if (runSignal.aborted && !callerSignal?.aborted && error.code === 'NETWORK_UNAVAILABLE') {
      return new SyncError('SERVER_TIMEOUT', 'Sync attempt exceeded its time limit');
    }
    return error;
  }
  if (runSignal.aborted && !callerSignal?.aborted) {
    return new SyncError('SERVER_TIMEOUT', 'Sync attempt exceeded its time limit');
  }
  return new SyncError('NETWORK_UNAVAILABLE', errorMessage(error));
}
