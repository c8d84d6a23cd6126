/**
 * LEAVE BOOK
 *
 * Durable log of leave requests applied for on this device.
 *
 * ALLOWANCE:
 * - Every calendar day of a request counts as one leave day
 * - Periods are fixed windows of the type's length (7, 14, 30, 90, 180 or
 *   365 days) counted from Monday 1970-01-05
 * - PENDING and APPROVED days of the same type count against each period
 *   a new request touches
 *
 * LIFECYCLE:
 * - APPLIED: PENDING, waiting for upload
 * - UPLOADED: the server has the request
 * - APPROVED: the server approved it; approval is never withdrawn locally
 */

import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { KeyedMutex } from '../../infra/KeyedMutex.js';
import { STREAMS, type LogEntry, type LogStore } from '../../infra/storage/LogStore.js';
import { AppError, NotFoundError, StorageError, ValidationError } from '../../lib/errors/index.js';
import { leaveApplicationSchema, leaveRequestSchema } from '../../lib/validators.js';
import {
  LEAVE_PERIOD_DAYS,
  type LeaveBalance,
  type LeaveRequest,
  type LeaveType,
  type LeaveVerdict,
  type ServiceResult,
} from '../../types/index.js';
import { createLogger } from '../../utils/logger.js';
import type { LeaveTypeRegistry } from './LeaveTypeRegistry.js';

const logger = createLogger('LeaveBook');

const MS_PER_DAY = 24 * 60 * 60 * 1000;
/** Day number of Monday 1970-01-05 */
const PERIOD_ANCHOR_DAY = 4;

// ============================================================================
// LOG EVENTS
// ============================================================================

const leaveEventSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('APPLIED'), request: leaveRequestSchema }),
  z.object({ kind: z.literal('APPROVED'), id: z.string(), approvedBy: z.string(), approvedAt: z.string() }),
  z.object({ kind: z.literal('UPLOADED'), ids: z.array(z.string()), at: z.string() }),
]);

type LeaveEvent = z.infer<typeof leaveEventSchema>;

export type LeaveError = ValidationError | NotFoundError;

// ============================================================================
// BOOK
// ============================================================================

export class LeaveBook {
  private readonly requests = new Map<string, LeaveRequest>();
  private readonly mutex = new KeyedMutex();
  private opened = false;

  constructor(
    private readonly store: LogStore,
    private readonly types: LeaveTypeRegistry
  ) {}

  async open(): Promise<void> {
    if (this.opened) return;
    for (const entry of await this.store.readRange(STREAMS.leaveRequests)) {
      this.apply(parseEvent(entry));
    }
    this.opened = true;
    logger.info({ requests: this.requests.size }, 'Leave book replayed');
  }

  /**
   * Validate and record a leave request. Re-applying with the same
   * requestId returns the stored request.
   */
  async applyForLeave(input: unknown, now: Date): Promise<ServiceResult<LeaveRequest, LeaveError>> {
    const parsed = leaveApplicationSchema.safeParse(input);
    if (!parsed.success) {
      return {
        success: false,
        error: new ValidationError('Invalid leave application', {
          issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
        }),
      };
    }
    const application = parsed.data;

    const leaveType = this.types.get(application.leaveTypeId);
    if (!leaveType) {
      return { success: false, error: AppError.notFound('Leave type', application.leaveTypeId) };
    }

    const start = dayNumber(application.startDate);
    const end = dayNumber(application.endDate);
    if (start === undefined || end === undefined) {
      return { success: false, error: new ValidationError('Leave dates must be real calendar dates') };
    }
    if (end < start) {
      return { success: false, error: new ValidationError('Leave cannot end before it starts') };
    }

    return this.mutex.runExclusive(application.employeeId, async (): Promise<ServiceResult<LeaveRequest, LeaveError>> => {
      const existing = application.requestId ? this.requests.get(application.requestId) : undefined;
      if (existing) {
        if (existing.employeeId !== application.employeeId) {
          return { success: false, error: new ValidationError(`Leave request ${existing.id} belongs to another employee`) };
        }
        return { success: true, data: { ...existing } };
      }

      const overlapping = this.listByEmployee(application.employeeId).find(
        (request) => dayNumberOrThrow(request.startDate) <= end && start <= dayNumberOrThrow(request.endDate)
      );
      if (overlapping) {
        return {
          success: false,
          error: new ValidationError('Leave overlaps an existing request', { requestId: overlapping.id }),
        };
      }

      const exceeded = this.firstExceededPeriod(application.employeeId, leaveType, start, end);
      if (exceeded) {
        return {
          success: false,
          error: new ValidationError(`Leave exceeds the ${leaveType.name} allowance`, {
            reason: 'LEAVE_ALLOWANCE_EXCEEDED',
            ...exceeded,
          }),
        };
      }

      const request: LeaveRequest = {
        id: application.requestId ?? uuidv4(),
        employeeId: application.employeeId,
        deviceId: application.deviceId,
        leaveTypeId: leaveType.id,
        startDate: application.startDate,
        endDate: application.endDate,
        days: end - start + 1,
        remark: application.remark,
        status: 'PENDING',
        appliedAt: now.toISOString(),
        uploadStatus: 'PENDING',
      };
      await this.persist({ kind: 'APPLIED', request });
      logger.info({ requestId: request.id, employeeId: request.employeeId, days: request.days }, 'Leave applied for');
      return { success: true, data: { ...request } };
    });
  }

  /** Throws NotFoundError for an unknown request; approving twice is a no-op */
  async approve(requestId: string, approvedBy: string, approvedAt: string): Promise<LeaveRequest> {
    const request = this.requests.get(requestId);
    if (!request) throw AppError.notFound('Leave request', requestId);
    if (request.status === 'APPROVED') return { ...request };

    await this.persist({ kind: 'APPROVED', id: requestId, approvedBy, approvedAt });
    logger.info({ requestId, approvedBy }, 'Leave approved');
    return { ...request, status: 'APPROVED', approvedBy, approvedAt };
  }

  /** Requests the server has not seen or not yet approved, oldest first */
  awaitingServer(): LeaveRequest[] {
    return [...this.requests.values()]
      .filter((request) => request.uploadStatus === 'PENDING' || request.status === 'PENDING')
      .sort((a, b) => a.appliedAt.localeCompare(b.appliedAt) || a.id.localeCompare(b.id))
      .map((request) => ({ ...request }));
  }

  /** Merge the server's answers; answers for unknown requests are skipped */
  async applyVerdicts(verdicts: readonly LeaveVerdict[], now: Date): Promise<string[]> {
    const known = verdicts.filter((verdict) => this.requests.has(verdict.requestId));
    const firstUpload = known
      .map((verdict) => verdict.requestId)
      .filter((id) => this.requests.get(id)?.uploadStatus === 'PENDING');
    if (firstUpload.length > 0) {
      await this.persist({ kind: 'UPLOADED', ids: firstUpload, at: now.toISOString() });
    }

    for (const verdict of known) {
      if (verdict.status === 'APPROVED') {
        await this.approve(verdict.requestId, verdict.approvedBy, verdict.approvedAt);
      }
    }
    if (known.length < verdicts.length) {
      logger.warn({ unknown: verdicts.length - known.length }, 'Server answered for unknown leave requests');
    }
    return known.map((verdict) => verdict.requestId);
  }

  get(requestId: string): LeaveRequest | undefined {
    const request = this.requests.get(requestId);
    return request ? { ...request } : undefined;
  }

  /** Newest first */
  listByEmployee(employeeId: string): LeaveRequest[] {
    return [...this.requests.values()]
      .filter((request) => request.employeeId === employeeId)
      .sort((a, b) => b.startDate.localeCompare(a.startDate) || a.id.localeCompare(b.id))
      .map((request) => ({ ...request }));
  }

  /** Allowance of the period containing `date` */
  balance(employeeId: string, leaveTypeId: string, date: string): ServiceResult<LeaveBalance, LeaveError> {
    const leaveType = this.types.get(leaveTypeId);
    if (!leaveType) {
      return { success: false, error: AppError.notFound('Leave type', leaveTypeId) };
    }
    const day = dayNumber(date);
    if (day === undefined) {
      return { success: false, error: new ValidationError(`Invalid date '${date}'`) };
    }

    const [periodStart, periodEnd] = periodOf(day, leaveType);
    const usedDays = this.usedDays(employeeId, leaveType.id, periodStart, periodEnd);
    return {
      success: true,
      data: {
        employeeId,
        leaveTypeId,
        periodStart: formatDay(periodStart),
        periodEnd: formatDay(periodEnd),
        maximumDays: leaveType.maximumDays,
        usedDays,
        remainingDays: Math.max(0, leaveType.maximumDays - usedDays),
      },
    };
  }

  // ==========================================================================
  // INTERNALS
  // ==========================================================================

  private firstExceededPeriod(
    employeeId: string,
    leaveType: LeaveType,
    start: number,
    end: number
  ): { periodStart: string; usedDays: number; requestedDays: number; maximumDays: number } | undefined {
    for (let day = start; day <= end; ) {
      const [periodStart, periodEnd] = periodOf(day, leaveType);
      const requestedDays = Math.min(end, periodEnd) - day + 1;
      const usedDays = this.usedDays(employeeId, leaveType.id, periodStart, periodEnd);
      if (usedDays + requestedDays > leaveType.maximumDays) {
        return { periodStart: formatDay(periodStart), usedDays, requestedDays, maximumDays: leaveType.maximumDays };
      }
      day = periodEnd + 1;
    }
    return undefined;
  }

  private usedDays(employeeId: string, leaveTypeId: string, from: number, to: number): number {
    let used = 0;
    for (const request of this.requests.values()) {
      if (request.employeeId !== employeeId || request.leaveTypeId !== leaveTypeId) continue;
      const start = Math.max(dayNumberOrThrow(request.startDate), from);
      const end = Math.min(dayNumberOrThrow(request.endDate), to);
      if (end >= start) used += end - start + 1;
    }
    return used;
  }

  private async persist(event: LeaveEvent): Promise<void> {
    await this.store.append(STREAMS.leaveRequests, [event]);
    this.apply(event);
  }

  private apply(event: LeaveEvent): void {
    switch (event.kind) {
      case 'APPLIED':
        if (!this.requests.has(event.request.id)) {
          this.requests.set(event.request.id, event.request);
        }
        return;

      case 'APPROVED': {
        const request = this.requests.get(event.id);
        if (!request) return;
        this.requests.set(event.id, {
          ...request,
          status: 'APPROVED',
          approvedBy: event.approvedBy,
          approvedAt: event.approvedAt,
        });
        return;
      }

      case 'UPLOADED':
        for (const id of event.ids) {
          const request = this.requests.get(id);
          if (request) this.requests.set(id, { ...request, uploadStatus: 'UPLOADED', uploadedAt: event.at });
        }
        return;
    }
  }
}

// ============================================================================
// CALENDAR DAYS
// ============================================================================

/** Days since 1970-01-01 for a real YYYY-MM-DD date */
function dayNumber(date: string): number | undefined {
  const ms = Date.parse(`${date}T00:00:00.000Z`);
  if (Number.isNaN(ms) || new Date(ms).toISOString().slice(0, 10) !== date) return undefined;
  return ms / MS_PER_DAY;
}

/** For dates already validated on the way in */
function dayNumberOrThrow(date: string): number {
  const day = dayNumber(date);
  if (day === undefined) throw new StorageError(`Stored leave date '${date}' is not a calendar date`);
  return day;
}

function formatDay(day: number): string {
  return new Date(day * MS_PER_DAY).toISOString().slice(0, 10);
}

/** Inclusive [first, last] day of the period containing `day` */
function periodOf(day: number, leaveType: LeaveType): [number, number] {
  const length = LEAVE_PERIOD_DAYS[leaveType.criteria];
  const first = PERIOD_ANCHOR_DAY + Math.floor((day - PERIOD_ANCHOR_DAY) / length) * length;
  return [first, first + length - 1];
}

function parseEvent(entry: LogEntry): LeaveEvent {
  const parsed = leaveEventSchema.safeParse(entry.payload);
  if (!parsed.success) {
    throw new StorageError(`Corrupt leave event at offset ${entry.offset}`);
  }
  return parsed.data;
}
