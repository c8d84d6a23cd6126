/**
 * OFFLINE QUEUE
 *
 * Durable, append-only log of records waiting for the server.
 *
 * STATUSES:
 * - PENDING: waiting for nextAttemptAt
 * - IN_FLIGHT: part of a running upload (memory only, never persisted)
 * - CONFLICTED: server reported a competing record; resolution pending,
 *   with the same backoff and retry horizon as PENDING
 * - STALE_UNSYNCED: retry horizon passed; excluded from automatic retry
 *
 * INVARIANTS ENFORCED:
 * - Enqueue is idempotent on record id
 * - State is rebuilt by replaying the log; a crash mid-upload reopens the item as PENDING
 * - Per employee, a batch never skips past an item that is not yet due or
 *   still CONFLICTED
 * - Acknowledged items leave the queue; compaction drops their events
 */

import { z } from 'zod';
import { StorageError } from '../../lib/errors/index.js';
import { attendanceRecordSchema } from '../../lib/validators.js';
import { STREAMS, type LogEntry, type LogStore } from '../../infra/storage/LogStore.js';
import type { AttendanceRecord, SyncQueueItem } from '../../types/index.js';
import { calculateBackoff, DEFAULT_BACKOFF, type BackoffOptions } from '../../utils/backoff.js';
import { syncLogger } from '../../utils/logger.js';
import { compareEvents } from '../policy/pairing.js';

const logger = syncLogger.child({ module: 'OfflineQueue' });

export const DEFAULT_RETRY_HORIZON_MS = 14 * 24 * 60 * 60 * 1000;

// ============================================================================
// LOG EVENTS
// ============================================================================

const queueEventSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('ENQUEUED'), record: attendanceRecordSchema, at: z.string() }),
  z.object({
    kind: z.literal('FAILED'),
    id: z.string(),
    at: z.string(),
    error: z.string(),
    attemptCount: z.number().int(),
    nextAttemptAt: z.string(),
    stale: z.boolean(),
  }),
  z.object({ kind: z.literal('CONFLICTED'), id: z.string(), record: attendanceRecordSchema, at: z.string() }),
  z.object({ kind: z.literal('REVIVED'), id: z.string(), at: z.string() }),
  z.object({ kind: z.literal('ACKED'), ids: z.array(z.string()), at: z.string() }),
  z.object({ kind: z.literal('REMOVED'), ids: z.array(z.string()), at: z.string() }),
]);

type QueueEvent = z.infer<typeof queueEventSchema>;

export interface OfflineQueueOptions {
  backoff?: BackoffOptions;
  retryHorizonMs?: number;
  /** True when the record already reached a final state elsewhere; such records are never queued again */
  isSettled?: (recordId: string) => boolean;
}

// ============================================================================
// QUEUE
// ============================================================================

export class OfflineQueue {
  private readonly items = new Map<string, SyncQueueItem>();
  /** Acked or removed since the last compaction */
  private readonly settled = new Set<string>();
  private readonly backoff: BackoffOptions;
  private readonly retryHorizonMs: number;
  private readonly isSettled: (recordId: string) => boolean;
  private opened = false;

  constructor(private readonly store: LogStore, options: OfflineQueueOptions = {}) {
    this.backoff = options.backoff ?? DEFAULT_BACKOFF;
    this.retryHorizonMs = options.retryHorizonMs ?? DEFAULT_RETRY_HORIZON_MS;
    this.isSettled = options.isSettled ?? (() => false);
  }

  async open(): Promise<void> {
    if (this.opened) return;
    const entries = await this.store.readRange(STREAMS.syncQueue);
    for (const entry of entries) {
      this.apply(parseEvent(entry));
    }
    this.opened = true;
    logger.info({ depth: this.items.size }, 'Offline queue replayed');
  }

  /** false when the record is already queued or already settled */
  async enqueue(record: AttendanceRecord, now: Date): Promise<boolean> {
    if (this.items.has(record.id)) {
      logger.debug({ recordId: record.id }, 'Duplicate enqueue ignored');
      return false;
    }
    if (this.settled.has(record.id) || this.isSettled(record.id)) {
      logger.debug({ recordId: record.id }, 'Enqueue of a settled record ignored');
      return false;
    }
    await this.persist({ kind: 'ENQUEUED', record, at: now.toISOString() });
    return true;
  }

  /**
   * Due PENDING items in record-timestamp order, at most `maxItems`.
   * An employee's items stop at the first one still in flight, conflicted or
   * not yet due.
   */
  peekBatch(maxItems: number, now: Date): SyncQueueItem[] {
    const blocked = new Set<string>();
    const batch: SyncQueueItem[] = [];

    for (const item of this.ordered()) {
      if (batch.length >= maxItems) break;
      const employeeId = item.record.employeeId;
      if (blocked.has(employeeId)) continue;

      if (item.status === 'IN_FLIGHT' || item.status === 'CONFLICTED') {
        blocked.add(employeeId);
      } else if (item.status === 'PENDING') {
        if (Date.parse(item.nextAttemptAt) <= now.getTime()) {
          batch.push(cloneItem(item));
        } else {
          blocked.add(employeeId);
        }
      }
    }
    return batch;
  }

  markInFlight(ids: readonly string[]): void {
    for (const id of ids) {
      const item = this.items.get(id);
      if (item?.status === 'PENDING') item.status = 'IN_FLIGHT';
    }
  }

  /** Cancelled upload: back to PENDING without counting an attempt */
  release(ids: readonly string[]): void {
    for (const id of ids) {
      const item = this.items.get(id);
      if (item?.status === 'IN_FLIGHT') item.status = 'PENDING';
    }
  }

  async markFailed(id: string, error: string, now: Date): Promise<SyncQueueItem | undefined> {
    const item = this.items.get(id);
    if (!item) return undefined;

    const attemptCount = item.attemptCount + 1;
    const stale = now.getTime() - Date.parse(item.enqueuedAt) >= this.retryHorizonMs;
    const nextAttemptAt = new Date(now.getTime() + calculateBackoff(attemptCount, this.backoff)).toISOString();

    await this.persist({ kind: 'FAILED', id, at: now.toISOString(), error, attemptCount, nextAttemptAt, stale });
    if (stale) {
      logger.warn({ recordId: id, attemptCount }, 'Record exceeded retry horizon; marked stale');
    }
    return this.get(id);
  }

  async markConflicted(record: AttendanceRecord, now: Date): Promise<void> {
    if (!this.items.has(record.id)) return;
    await this.persist({ kind: 'CONFLICTED', id: record.id, record, at: now.toISOString() });
  }

  /** Manual retry of stale items; the retry horizon restarts */
  async revive(ids: readonly string[], now: Date): Promise<number> {
    let revived = 0;
    for (const id of ids) {
      if (this.items.get(id)?.status !== 'STALE_UNSYNCED') continue;
      await this.persist({ kind: 'REVIVED', id, at: now.toISOString() });
      revived++;
    }
    return revived;
  }

  async ack(ids: readonly string[], now: Date): Promise<void> {
    const known = ids.filter((id) => this.items.has(id));
    if (known.length === 0) return;
    await this.persist({ kind: 'ACKED', ids: known, at: now.toISOString() });
  }

  /** Terminal rejection: the record is never retried */
  async remove(ids: readonly string[], now: Date): Promise<void> {
    const known = ids.filter((id) => this.items.has(id));
    if (known.length === 0) return;
    await this.persist({ kind: 'REMOVED', ids: known, at: now.toISOString() });
  }

  get(id: string): SyncQueueItem | undefined {
    const item = this.items.get(id);
    return item ? cloneItem(item) : undefined;
  }

  list(): SyncQueueItem[] {
    return this.ordered().map(cloneItem);
  }

  /** CONFLICTED items in record-timestamp order; with `now`, only those due */
  listConflicted(now?: Date): SyncQueueItem[] {
    return this.ordered()
      .filter((item) => item.status === 'CONFLICTED')
      .filter((item) => !now || Date.parse(item.nextAttemptAt) <= now.getTime())
      .map(cloneItem);
  }

  depth(): number {
    return this.items.size;
  }

  staleCount(): number {
    return [...this.items.values()].filter((item) => item.status === 'STALE_UNSYNCED').length;
  }

  /**
   * Drop the events of acknowledged and removed items from the log.
   */
  async compact(): Promise<number> {
    const settled = new Set(this.settled);
    if (settled.size === 0) return 0;

    const removed = await this.store.compactAck(STREAMS.syncQueue, (entry) => {
      const event = parseEvent(entry);
      switch (event.kind) {
        case 'ENQUEUED':
          return !settled.has(event.record.id);
        case 'ACKED':
        case 'REMOVED':
          return !event.ids.every((id) => settled.has(id));
        default:
          return !settled.has(event.id);
      }
    });

    settled.forEach((id) => this.settled.delete(id));
    logger.info({ removed }, 'Offline queue compacted');
    return removed;
  }

  // ==========================================================================
  // INTERNALS
  // ==========================================================================

  private async persist(event: QueueEvent): Promise<void> {
    await this.store.append(STREAMS.syncQueue, [event]);
    this.apply(event);
  }

  private apply(event: QueueEvent): void {
    switch (event.kind) {
      case 'ENQUEUED':
        if (this.items.has(event.record.id)) return;
        this.settled.delete(event.record.id);
        this.items.set(event.record.id, {
          record: event.record,
          status: 'PENDING',
          attemptCount: 0,
          enqueuedAt: event.at,
          nextAttemptAt: event.at,
        });
        return;

      case 'FAILED': {
        const item = this.items.get(event.id);
        if (!item) return;
        item.status = event.stale ? 'STALE_UNSYNCED' : waitingStatus(item);
        item.attemptCount = event.attemptCount;
        item.lastAttemptAt = event.at;
        item.lastError = event.error;
        item.nextAttemptAt = event.nextAttemptAt;
        return;
      }

      case 'CONFLICTED': {
        const item = this.items.get(event.id);
        if (!item) return;
        item.status = 'CONFLICTED';
        item.record = event.record;
        item.lastAttemptAt = event.at;
        return;
      }

      case 'REVIVED': {
        const item = this.items.get(event.id);
        if (!item) return;
        item.status = waitingStatus(item);
        item.enqueuedAt = event.at;
        item.nextAttemptAt = event.at;
        return;
      }

      case 'ACKED':
      case 'REMOVED':
        for (const id of event.ids) {
          this.items.delete(id);
          this.settled.add(id);
        }
        return;
    }
  }

  private ordered(): SyncQueueItem[] {
    return [...this.items.values()].sort((a, b) => compareEvents(a.record, b.record));
  }
}

/** A conflicted record goes back to conflict resolution, anything else to upload */
function waitingStatus(item: SyncQueueItem): SyncQueueItem['status'] {
  return item.record.state === 'CONFLICTED' ? 'CONFLICTED' : 'PENDING';
}

function cloneItem(item: SyncQueueItem): SyncQueueItem {
  return { ...item, record: { ...item.record } };
}

function parseEvent(entry: LogEntry): QueueEvent {
  const parsed = queueEventSchema.safeParse(entry.payload);
  if (!parsed.success) {
    throw new StorageError(`Corrupt sync queue event at offset ${entry.offset}`);
  }
  return parsed.data;
}
