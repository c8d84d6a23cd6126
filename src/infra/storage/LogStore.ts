/**
 * Durable log storage contract.
 *
 * Any engine that survives a process crash with at-least-once durability fits:
 * an entry is durable once `append` resolves. Entries are never edited in place;
 * `compactAck` rewrites a stream keeping a subset and swaps it in atomically.
 */

export interface LogEntry {
  /** Monotonic per stream, preserved across compaction */
  offset: number;
  payload: unknown;
}

export interface LogStore {
  /** Appends in order; resolves with the offset of the last entry written */
  append(stream: string, payloads: unknown[]): Promise<number>;

  /** Entries with offset >= fromOffset, in offset order */
  readRange(stream: string, fromOffset?: number, limit?: number): Promise<LogEntry[]>;

  /** Drops entries for which `keep` is false; resolves with the number removed */
  compactAck(stream: string, keep: (entry: LogEntry) => boolean): Promise<number>;
}

export const STREAMS = {
  records: 'records',
  syncQueue: 'sync-queue',
  audit: 'audit',
  auditArchive: 'audit-archive',
  pinLockout: 'pin-lockout',
  consumedTokens: 'consumed-tokens',
  leaveRequests: 'leave-requests',
} as const;
