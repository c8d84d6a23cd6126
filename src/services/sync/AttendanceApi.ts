import type { LeaveRequest, LeaveVerdict, OvertimePolicy, RecordVerdict, UploadRecord } from '../../types/index.js';

/**
 * Server of record.
 *
 * Implementations throw SyncError for batch-level failures; per-record
 * outcomes come back as verdicts, one per uploaded record.
 */
export interface AttendanceApi {
  /** POST /attendance/records - idempotent by record id */
  uploadRecords(records: UploadRecord[], signal?: AbortSignal): Promise<RecordVerdict[]>;

  /** POST /attendance/leave-requests - idempotent by request id; answers with each request's approval state */
  uploadLeaveRequests(requests: LeaveRequest[], signal?: AbortSignal): Promise<LeaveVerdict[]>;

  /** GET /attendance/policy/{policyId}?asOf= - undefined when the server has none */
  fetchPolicy(policyId: string, asOf: Date, signal?: AbortSignal): Promise<OvertimePolicy | undefined>;
}
