/**
 * Leave Domain Types
 *
 * Leave types carry an allowance per fixed period; leave requests are
 * applied for on the device and approved by the server.
 */

export type LeaveCriteria = 'WEEKLY' | 'FORTNIGHTLY' | 'MONTHLY' | 'QUARTERLY' | 'HALF_YEARLY' | 'YEARLY';

export const LEAVE_PERIOD_DAYS: Record<LeaveCriteria, number> = {
  WEEKLY: 7,
  FORTNIGHTLY: 14,
  MONTHLY: 30,
  QUARTERLY: 90,
  HALF_YEARLY: 180,
  YEARLY: 365,
};

export type LeaveStatus = 'PENDING' | 'APPROVED';

/** Whether the server has seen a locally created item */
export type UploadStatus = 'LOCAL_ONLY' | 'PENDING' | 'UPLOADED' | 'STALE';

export interface LeaveType {
  id: string;
  name: string;
  /** Days allowed per period */
  maximumDays: number;
  criteria: LeaveCriteria;
}

export interface LeaveApplication {
  /** Reuse on re-submission; generated when absent */
  requestId?: string;
  employeeId: string;
  deviceId: string;
  leaveTypeId: string;
  /** YYYY-MM-DD, inclusive */
  startDate: string;
  /** YYYY-MM-DD, inclusive */
  endDate: string;
  remark?: string;
}

export interface LeaveRequest {
  id: string;
  employeeId: string;
  deviceId: string;
  leaveTypeId: string;
  startDate: string;
  endDate: string;
  days: number;
  remark?: string;
  status: LeaveStatus;
  approvedBy?: string;
  approvedAt?: string;
  appliedAt: string;
  uploadStatus: 'PENDING' | 'UPLOADED';
  uploadedAt?: string;
}

export interface LeaveBalance {
  employeeId: string;
  leaveTypeId: string;
  /** First day of the period containing the queried date */
  periodStart: string;
  periodEnd: string;
  maximumDays: number;
  usedDays: number;
  remainingDays: number;
}

export type LeaveVerdict =
  | { requestId: string; status: 'PENDING' }
  | { requestId: string; status: 'APPROVED'; approvedBy: string; approvedAt: string };
