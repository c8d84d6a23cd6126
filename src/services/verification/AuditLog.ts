/**
 * AuditLog: append-only record of every verification decision.
 *
 * One entry per dispatch, pass or fail: method, verdict, evidence digest, time.
 * Entries are never deleted. `archive` copies old entries to the archive
 * stream first and only then drops them from the live stream.
 */

import { ulid } from 'ulidx';
import { z } from 'zod';
import { StorageError } from '../../lib/errors/index.js';
import { verificationMethodSchema } from '../../lib/validators.js';
import { STREAMS, type LogEntry, type LogStore } from '../../infra/storage/LogStore.js';
import type { VerificationMethod } from '../../types/index.js';
import { createLogger } from '../../utils/logger.js';

const auditLogger = createLogger('audit');

// ============================================================================
// Types
// ============================================================================

const auditEntrySchema = z.object({
  id: z.string(),
  employeeId: z.string(),
  deviceId: z.string(),
  recordId: z.string().optional(),
  method: verificationMethodSchema,
  secondaryMethod: verificationMethodSchema.optional(),
  passed: z.boolean(),
  failure: z.string().optional(),
  evidenceDigest: z.string(),
  timestamp: z.string(),
});

export type AuditEntry = z.infer<typeof auditEntrySchema>;

export interface AuditEntryInput {
  employeeId: string;
  deviceId: string;
  recordId?: string;
  method: VerificationMethod;
  secondaryMethod?: VerificationMethod;
  passed: boolean;
  failure?: string;
  evidenceDigest: string;
  timestamp: string;
}

// ============================================================================
// Service
// ============================================================================

export class AuditLog {
  constructor(private readonly store: LogStore) {}

  async append(input: AuditEntryInput): Promise<AuditEntry> {
    const entry: AuditEntry = { id: ulid(), ...input };

    // Structured log first, so a failed write still leaves a trace
    auditLogger.info(
      {
        auditId: entry.id,
        employeeId: entry.employeeId,
        method: entry.method,
        passed: entry.passed,
        failure: entry.failure,
      },
      'Verification audited'
    );

    await this.store.append(STREAMS.audit, [entry]);
    return entry;
  }

  async list(employeeId?: string): Promise<AuditEntry[]> {
    const entries = (await this.store.readRange(STREAMS.audit)).map(parseEntry);
    return employeeId ? entries.filter((entry) => entry.employeeId === employeeId) : entries;
  }

  async listArchived(): Promise<AuditEntry[]> {
    return (await this.store.readRange(STREAMS.auditArchive)).map(parseEntry);
  }

  /**
   * Move entries older than `before` to the archive stream.
   */
  async archive(before: Date): Promise<number> {
    const live = (await this.store.readRange(STREAMS.audit)).map(parseEntry);
    const cutoff = before.getTime();
    const old = live.filter((entry) => Date.parse(entry.timestamp) < cutoff);
    if (old.length === 0) return 0;

    // a crash after the copy leaves entries in both streams; copy those once
    const alreadyArchived = new Set((await this.listArchived()).map((entry) => entry.id));
    const toCopy = old.filter((entry) => !alreadyArchived.has(entry.id));
    if (toCopy.length > 0) {
      await this.store.append(STREAMS.auditArchive, toCopy);
    }

    const archivedIds = new Set(old.map((entry) => entry.id));
    const removed = await this.store.compactAck(
      STREAMS.audit,
      (logEntry) => !archivedIds.has(parseEntry(logEntry).id)
    );

    auditLogger.info({ archived: removed, before: before.toISOString() }, 'Audit entries archived');
    return removed;
  }
}

function parseEntry(entry: LogEntry): AuditEntry {
  const parsed = auditEntrySchema.safeParse(entry.payload);
  if (!parsed.success) {
    throw new StorageError(`Corrupt audit entry at offset ${entry.offset}`);
  }
  return parsed.data;
}
