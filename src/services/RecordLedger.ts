/**
 * RecordLedger - versioned store of attendance records.
 *
 * Every record version is appended to the `records` stream; the latest
 * version per id is the current record and the full list is its history.
 * Before first acknowledgment the device owns a record; afterwards this is a
 * replica that reconciliation may overwrite with server truth.
 */

import { InvalidTransitionError, StorageError } from '../lib/errors/index.js';
import { attendanceRecordSchema } from '../lib/validators.js';
import { STREAMS, type LogEntry, type LogStore } from '../infra/storage/LogStore.js';
import type { AttendanceRecord, PunchType, RecordState, ServerRecord } from '../types/index.js';
import { createLogger } from '../utils/logger.js';
import { sortEvents } from './policy/pairing.js';

const logger = createLogger('RecordLedger');

export interface RecordQuery {
  /** Inclusive lower bound on timestamp */
  from?: Date;
  /** Exclusive upper bound on timestamp */
  to?: Date;
  types?: PunchType[];
  states?: RecordState[];
}

export class RecordLedger {
  private readonly latest = new Map<string, AttendanceRecord>();
  private readonly versions = new Map<string, AttendanceRecord[]>();
  private opened = false;

  constructor(private readonly store: LogStore) {}

  async open(): Promise<void> {
    if (this.opened) return;
    const entries = await this.store.readRange(STREAMS.records);
    for (const entry of entries) {
      this.apply(parseRecord(entry));
    }
    this.opened = true;
    logger.info({ records: this.latest.size, versions: entries.length }, 'Record ledger replayed');
  }

  /**
   * Append the next version of a record. The version must follow the
   * current one exactly; a brand-new record starts at version 1.
   */
  async append(record: AttendanceRecord): Promise<AttendanceRecord> {
    const expected = (this.latest.get(record.id)?.version ?? 0) + 1;
    if (record.version !== expected) {
      throw new InvalidTransitionError(`Record ${record.id} version ${record.version} does not follow ${expected - 1}`, {
        recordId: record.id,
      });
    }
    await this.store.append(STREAMS.records, [record]);
    this.apply(record);
    return record;
  }

  get(id: string): AttendanceRecord | undefined {
    return this.latest.get(id);
  }

  history(id: string): AttendanceRecord[] {
    return [...(this.versions.get(id) ?? [])];
  }

  /** Current records of one employee, in timestamp order */
  listByEmployee(employeeId: string, query: RecordQuery = {}): AttendanceRecord[] {
    const from = query.from?.getTime() ?? Number.NEGATIVE_INFINITY;
    const to = query.to?.getTime() ?? Number.POSITIVE_INFINITY;

    const matches = [...this.latest.values()].filter((record) => {
      if (record.employeeId !== employeeId) return false;
      const at = Date.parse(record.timestamp);
      if (at < from || at >= to) return false;
      if (query.types && !query.types.includes(record.type)) return false;
      if (query.states && !query.states.includes(record.state)) return false;
      return true;
    });
    return sortEvents(matches);
  }

  /**
   * Store a server record as a REMOTE replica entry. Unchanged revisions are
   * not rewritten.
   */
  async upsertRemote(server: ServerRecord, now: Date): Promise<AttendanceRecord> {
    const current = this.latest.get(server.id);
    if (current && current.state === 'SYNCED' && current.serverRevision === server.serverRevision) {
      return current;
    }

    return this.append({
      id: server.id,
      employeeId: server.employeeId,
      deviceId: server.deviceId,
      timestamp: new Date(server.timestamp).toISOString(),
      clockSkewMs: current?.clockSkewMs ?? 0,
      type: server.type,
      verificationMethod: server.verificationMethod,
      verification: server.verification,
      secondaryVerification: current?.secondaryVerification,
      state: 'SYNCED',
      serverRevision: server.serverRevision,
      origin: current?.origin ?? 'REMOTE',
      version: (current?.version ?? 0) + 1,
      updatedAt: now.toISOString(),
    });
  }

  /**
   * Server truth replaced a replica entry (a conflict winner superseded it).
   * This overwrites the replica directly; it is not a lifecycle transition.
   */
  async supersedeReplica(id: string, reason: string, now: Date): Promise<AttendanceRecord | undefined> {
    const current = this.latest.get(id);
    if (!current || current.state === 'RESOLVED_SUPERSEDED') return current;

    return this.append({
      ...current,
      state: 'RESOLVED_SUPERSEDED',
      stateReason: reason,
      version: current.version + 1,
      updatedAt: now.toISOString(),
    });
  }

  all(): AttendanceRecord[] {
    return sortEvents([...this.latest.values()]);
  }

  private apply(record: AttendanceRecord): void {
    this.latest.set(record.id, record);
    const history = this.versions.get(record.id);
    if (history) {
      history.push(record);
    } else {
      this.versions.set(record.id, [record]);
    }
  }
}

function parseRecord(entry: LogEntry): AttendanceRecord {
  const parsed = attendanceRecordSchema.safeParse(entry.payload);
  if (!parsed.success) {
    throw new StorageError(`Corrupt attendance record at offset ${entry.offset}`);
  }
  return parsed.data;
}
