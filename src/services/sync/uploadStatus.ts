import type { AttendanceRecord, SyncQueueItem, UploadStatus } from '../../types/index.js';

const ANSWERED_STATES: ReadonlySet<AttendanceRecord['state']> = new Set([
  'SYNCED',
  'RESOLVED_ACCEPTED',
  'RESOLVED_SUPERSEDED',
]);

/**
 * Upload status shown next to a record.
 *
 * - PENDING: waiting in the queue, conflicted included
 * - STALE: gave up retrying; needs a manual retry
 * - UPLOADED: the server answered for it, a server rejection included
 * - LOCAL_ONLY: never queued (not verified yet, or rejected on the device)
 */
export function uploadStatusOf(record: AttendanceRecord, item: SyncQueueItem | undefined): UploadStatus {
  if (item) {
    return item.status === 'STALE_UNSYNCED' ? 'STALE' : 'PENDING';
  }
  if (record.origin === 'REMOTE' || ANSWERED_STATES.has(record.state)) {
    return 'UPLOADED';
  }
  if (record.state === 'REJECTED') {
    return record.stateReason?.startsWith('SERVER_REJECTED') ? 'UPLOADED' : 'LOCAL_ONLY';
  }
  return record.state === 'QUEUED' || record.state === 'CONFLICTED' ? 'PENDING' : 'LOCAL_ONLY';
}
