/**
 * RECORD STATE MACHINE
 *
 * Lifecycle of an attendance record.
 *
 * STATES:
 * - CAPTURED: punch taken on the device, not yet verified
 * - VERIFIED: evidence passed, waiting for the queue
 * - QUEUED: durable in the offline queue
 * - SYNCED: acknowledged by the server (terminal)
 * - REJECTED: failed verification or refused by the server (terminal)
 * - CONFLICTED: server holds a competing record for the same slot
 * - RESOLVED_ACCEPTED / RESOLVED_SUPERSEDED: conflict outcome (terminal)
 *
 * INVARIANTS ENFORCED:
 * - Transitions are one-directional; no state is re-entered
 * - REJECTED carries a reason code
 * - SYNCED / RESOLVED_ACCEPTED carry a serverRevision
 * - Records are never mutated: a transition returns the next version
 */

import { v4 as uuidv4 } from 'uuid';
import { InvalidTransitionError } from '../lib/errors/index.js';
import {
  systemClock,
  type AttendanceRecord,
  type Clock,
  type PunchAttempt,
  type RecordState,
  type RecordedEvidence,
} from '../types/index.js';
import { createLogger } from '../utils/logger.js';
import { describeEvidence } from './verification/VerificationDispatcher.js';

const logger = createLogger('RecordStateMachine');

// ============================================================================
// VALID TRANSITIONS
// ============================================================================

export const RECORD_TRANSITIONS: Record<RecordState, RecordState[]> = {
  CAPTURED: ['VERIFIED', 'REJECTED'],
  VERIFIED: ['QUEUED'],
  QUEUED: ['SYNCED', 'REJECTED', 'CONFLICTED'],
  SYNCED: [],              // Terminal
  REJECTED: [],            // Terminal
  CONFLICTED: ['RESOLVED_ACCEPTED', 'RESOLVED_SUPERSEDED'],
  RESOLVED_ACCEPTED: [],   // Terminal
  RESOLVED_SUPERSEDED: [], // Terminal
};

export const TERMINAL_RECORD_STATES: RecordState[] = ['SYNCED', 'REJECTED', 'RESOLVED_ACCEPTED', 'RESOLVED_SUPERSEDED'];

/** States that count towards hours */
export const SUMMARY_STATES: ReadonlySet<RecordState> = new Set<RecordState>([
  'VERIFIED',
  'QUEUED',
  'SYNCED',
  'RESOLVED_ACCEPTED',
]);

/** States the server has confirmed */
export const SERVER_CONFIRMED_STATES: ReadonlySet<RecordState> = new Set<RecordState>(['SYNCED', 'RESOLVED_ACCEPTED']);

export function canTransition(from: RecordState, to: RecordState): boolean {
  return RECORD_TRANSITIONS[from].includes(to);
}

export interface RecordTransitionContext {
  reason?: string;
  serverRevision?: number;
  evidence?: RecordedEvidence;
  secondaryEvidence?: RecordedEvidence;
  pairingWarning?: string;
}

// ============================================================================
// STATE MACHINE
// ============================================================================

export class RecordStateMachine {
  private readonly clock: Clock;

  constructor(clock: Clock = systemClock) {
    this.clock = clock;
  }

  /**
   * New CAPTURED record for an attempt. Reuses attempt.recordId so a
   * re-submission after a crash keeps its identity.
   */
  capture(attempt: PunchAttempt): AttendanceRecord {
    const now = this.clock().toISOString();
    return {
      id: attempt.recordId ?? uuidv4(),
      employeeId: attempt.employeeId,
      deviceId: attempt.deviceId,
      timestamp: new Date(attempt.timestamp).toISOString(),
      clockSkewMs: attempt.clockSkewMs ?? 0,
      type: attempt.type,
      verificationMethod: attempt.evidence.method,
      verification: describeEvidence(attempt.evidence),
      secondaryVerification: attempt.secondary ? describeEvidence(attempt.secondary) : undefined,
      state: 'CAPTURED',
      origin: 'LOCAL',
      workLocation: attempt.workLocation,
      version: 1,
      updatedAt: now,
    };
  }

  transition(record: AttendanceRecord, to: RecordState, ctx: RecordTransitionContext = {}): AttendanceRecord {
    if (!canTransition(record.state, to)) {
      throw new InvalidTransitionError(`Cannot transition record from ${record.state} to ${to}`, {
        recordId: record.id,
        from: record.state,
        to,
      });
    }

    if (to === 'REJECTED' && !ctx.reason) {
      throw new InvalidTransitionError('REJECTED requires a reason code', { recordId: record.id });
    }
    if ((to === 'SYNCED' || to === 'RESOLVED_ACCEPTED') && ctx.serverRevision === undefined) {
      throw new InvalidTransitionError(`${to} requires a serverRevision`, { recordId: record.id });
    }

    const next: AttendanceRecord = {
      ...record,
      state: to,
      stateReason: ctx.reason ?? record.stateReason,
      serverRevision: ctx.serverRevision ?? record.serverRevision,
      verification: ctx.evidence ?? record.verification,
      secondaryVerification: ctx.secondaryEvidence ?? record.secondaryVerification,
      pairingWarning: ctx.pairingWarning ?? record.pairingWarning,
      version: record.version + 1,
      updatedAt: this.clock().toISOString(),
    };

    logger.debug({ recordId: record.id, from: record.state, to, version: next.version }, 'Record transitioned');
    return next;
  }
}
