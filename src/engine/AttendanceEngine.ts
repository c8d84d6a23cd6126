/**
 * ATTENDANCE ENGINE
 *
 * Facade the UI talks to. Wires verification, the record lifecycle, the
 * offline queue, sync and the policy engine over one LogStore.
 *
 * FLOW (submitPunch):
 *   validate → capture → verify → VERIFIED | REJECTED → enqueue → QUEUED
 *
 * Work for one employee runs under that employee's key; a re-submitted
 * attempt (same recordId) resumes where a crash left it.
 */

import type { EngineConfig } from '../config/env.js';
import { KeyedMutex } from '../infra/KeyedMutex.js';
import { FileLogStore } from '../infra/storage/FileLogStore.js';
import type { LogStore } from '../infra/storage/LogStore.js';
import { DerivationError, ValidationError, VerificationFailure, errorMessage } from '../lib/errors/index.js';
import { punchAttemptSchema } from '../lib/validators.js';
import { RecordLedger, type RecordQuery } from '../services/RecordLedger.js';
import { RecordStateMachine, SUMMARY_STATES, TERMINAL_RECORD_STATES } from '../services/RecordStateMachine.js';
import { GeoVerifier } from '../services/geo/GeoVerifier.js';
import { LeaveBook, type LeaveError } from '../services/leave/LeaveBook.js';
import { LeaveTypeRegistry } from '../services/leave/LeaveTypeRegistry.js';
import { SiteRegistry } from '../services/geo/SiteRegistry.js';
import {
  PolicyEngine,
  groupByWorkDate,
  localDate,
  localDayStart,
  toMinute,
} from '../services/policy/PolicyEngine.js';
import { PolicyRegistry } from '../services/policy/PolicyRegistry.js';
import { validatePairing, workStatus, type WorkStatus } from '../services/policy/pairing.js';
import type { AttendanceApi } from '../services/sync/AttendanceApi.js';
import { HttpAttendanceApi } from '../services/sync/HttpAttendanceApi.js';
import { OfflineQueue } from '../services/sync/OfflineQueue.js';
import { SyncReconciler, type SyncResult } from '../services/sync/SyncReconciler.js';
import { SyncScheduler } from '../services/sync/SyncScheduler.js';
import { uploadStatusOf } from '../services/sync/uploadStatus.js';
import { AuditLog, type AuditEntry } from '../services/verification/AuditLog.js';
import { PinCredentialStore, PinLockoutStore } from '../services/verification/PinLockout.js';
import { TokenRegistry } from '../services/verification/TokenRegistry.js';
import { VerificationDispatcher } from '../services/verification/VerificationDispatcher.js';
import {
  systemClock,
  type AttendanceRecord,
  type Clock,
  type LeaveBalance,
  type LeaveRequest,
  type ServiceResult,
  type UploadStatus,
  type WeeklySummary,
  type WorkSummary,
} from '../types/index.js';
import { createLogger } from '../utils/logger.js';
import type { AttendanceDirectory } from './AttendanceDirectory.js';

const logger = createLogger('AttendanceEngine');

const MS_PER_DAY = 24 * 60 * 60 * 1000;

// ============================================================================
// TYPES
// ============================================================================

export interface EngineState {
  queueDepth: number;
  staleCount: number;
  lastSyncAt?: string;
  /** Shown only after repeated consecutive failures */
  lastSyncError?: string;
  consecutiveSyncFailures: number;
  online: boolean;
  /** User-facing notices from the last sync run */
  notices: string[];
}

export type EngineListener = (state: EngineState) => void;

export type PunchError = ValidationError | VerificationFailure;

export interface AttendanceEngineOptions {
  config: EngineConfig;
  store: LogStore;
  api: AttendanceApi;
  directory: AttendanceDirectory;
  sites?: SiteRegistry;
  policies?: PolicyRegistry;
  pins?: PinCredentialStore;
  tokens?: TokenRegistry;
  leaveTypes?: LeaveTypeRegistry;
  clock?: Clock;
  /** Jitter source for retry backoff */
  random?: () => number;
}

// ============================================================================
// ENGINE
// ============================================================================

export class AttendanceEngine {
  readonly sites: SiteRegistry;
  readonly policies: PolicyRegistry;
  readonly pins: PinCredentialStore;
  readonly tokens: TokenRegistry;
  readonly leaveTypes: LeaveTypeRegistry;

  private readonly clock: Clock;
  private readonly directory: AttendanceDirectory;
  private readonly mutex = new KeyedMutex();
  private readonly ledger: RecordLedger;
  private readonly queue: OfflineQueue;
  private readonly leave: LeaveBook;
  private readonly audit: AuditLog;
  private readonly lockouts: PinLockoutStore;
  private readonly dispatcher: VerificationDispatcher;
  private readonly stateMachine: RecordStateMachine;
  private readonly policyEngine = new PolicyEngine();
  private readonly reconciler: SyncReconciler;
  private readonly scheduler: SyncScheduler;
  private readonly errorVisibilityThreshold: number;
  private readonly listeners = new Set<EngineListener>();

  private lastSyncAt?: string;
  private lastSyncError?: string;
  private consecutiveSyncFailures = 0;
  private notices: string[] = [];
  private opened = false;

  constructor(options: AttendanceEngineOptions) {
    const { config, store } = options;
    this.clock = options.clock ?? systemClock;
    this.directory = options.directory;
    this.errorVisibilityThreshold = config.sync.errorVisibilityThreshold;

    this.sites = options.sites ?? new SiteRegistry();
    this.policies = options.policies ?? new PolicyRegistry(options.api);
    this.pins = options.pins ?? new PinCredentialStore();
    this.tokens = options.tokens ?? new TokenRegistry(store);
    this.leaveTypes = options.leaveTypes ?? new LeaveTypeRegistry();

    this.ledger = new RecordLedger(store);
    this.queue = new OfflineQueue(store, {
      backoff: {
        baseDelayMs: config.sync.backoffBaseMs,
        maxDelayMs: config.sync.backoffCapMs,
        jitter: config.sync.backoffJitter,
        random: options.random,
      },
      retryHorizonMs: config.sync.retryHorizonMs,
      isSettled: (recordId) => {
        const state = this.ledger.get(recordId)?.state;
        return state !== undefined && TERMINAL_RECORD_STATES.includes(state);
      },
    });
    this.leave = new LeaveBook(store, this.leaveTypes);
    this.audit = new AuditLog(store);
    this.lockouts = new PinLockoutStore(store, config.pin);
    this.stateMachine = new RecordStateMachine(this.clock);

    this.dispatcher = new VerificationDispatcher({
      geo: new GeoVerifier({ accuracyCeilingMeters: config.geo.accuracyCeilingMeters }),
      sites: this.sites,
      pins: this.pins,
      lockouts: this.lockouts,
      tokens: this.tokens,
      audit: this.audit,
      clock: this.clock,
    });

    this.reconciler = new SyncReconciler({
      queue: this.queue,
      ledger: this.ledger,
      stateMachine: this.stateMachine,
      api: options.api,
      mutex: this.mutex,
      leave: this.leave,
      clock: this.clock,
      batchSize: config.sync.batchSize,
      timeoutMs: config.sync.timeoutMs,
    });

    this.scheduler = new SyncScheduler({
      reconciler: this.reconciler,
      intervalMs: config.sync.intervalMs,
      onRun: (result) => this.recordSyncRun(result),
      onError: (error) => this.recordSyncFailure(errorMessage(error)),
    });
  }

  /**
   * Production wiring: file-backed storage under the configured data
   * directory and the HTTP server client.
   */
  static create(config: EngineConfig, directory: AttendanceDirectory): AttendanceEngine {
    return new AttendanceEngine({
      config,
      directory,
      store: new FileLogStore(config.storage.dataDir),
      api: new HttpAttendanceApi({
        baseUrl: config.api.baseUrl,
        token: config.api.token,
        timeoutMs: config.sync.timeoutMs,
      }),
    });
  }

  // ==========================================================================
  // LIFECYCLE
  // ==========================================================================

  /** Replays every durable stream. Call once before anything else. */
  async open(): Promise<void> {
    if (this.opened) return;
    await this.ledger.open();
    await this.queue.open();
    await this.healQueuedRecords();
    await this.leave.open();
    await this.lockouts.open();
    await this.tokens.open();
    this.opened = true;
    logger.info({ queueDepth: this.queue.depth() }, 'Attendance engine opened');
    this.emit();
  }

  /** A crash between the queue write and the ledger's QUEUED entry leaves the ledger at VERIFIED */
  private async healQueuedRecords(): Promise<void> {
    for (const item of this.queue.list()) {
      const record = this.ledger.get(item.record.id);
      if (record?.state !== 'VERIFIED') continue;
      await this.ledger.append(this.stateMachine.transition(record, 'QUEUED'));
      logger.warn({ recordId: record.id }, 'Queued record was still VERIFIED in the ledger; marked QUEUED');
    }
  }

  startSync(): void {
    this.scheduler.start();
  }

  setOnline(online: boolean): void {
    this.scheduler.setOnline(online);
    this.emit();
  }

  async close(): Promise<void> {
    await this.scheduler.stop();
    this.listeners.clear();
    logger.info('Attendance engine closed');
  }

  // ==========================================================================
  // PUNCHES
  // ==========================================================================

  /**
   * Verify and record a punch. A re-submitted attempt (same recordId) resumes
   * from the stored record's state; one already past verification is
   * returned as it stands.
   */
  async submitPunch(input: unknown): Promise<ServiceResult<AttendanceRecord, PunchError>> {
    const parsed = punchAttemptSchema.safeParse(input);
    if (!parsed.success) {
      return {
        success: false,
        error: new ValidationError('Invalid punch attempt', {
          issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
        }),
      };
    }
    const attempt = parsed.data;

    const settings = this.directory.settingsFor(attempt.employeeId);
    if (!settings) {
      return {
        success: false,
        error: new ValidationError(`No attendance settings for employee '${attempt.employeeId}'`),
      };
    }

    const result = await this.mutex.runExclusive(
      attempt.employeeId,
      async (): Promise<ServiceResult<AttendanceRecord, PunchError>> => {
        let record = attempt.recordId ? this.ledger.get(attempt.recordId) : undefined;
        if (record && record.employeeId !== attempt.employeeId) {
          return {
            success: false,
            error: new ValidationError(`Record ${record.id} belongs to another employee`),
          };
        }

        if (!record) {
          const captured = this.stateMachine.capture(attempt);
          record = await this.ledger.append({ ...captured, pairingWarning: this.pairingWarning(captured) });
        }

        if (record.state === 'CAPTURED') {
          const verdict = await this.dispatcher.dispatch(attempt, settings, record.id);
          if (!verdict.passed) {
            await this.ledger.append(
              this.stateMachine.transition(record, 'REJECTED', {
                reason: verdict.failure.code,
                evidence: verdict.evidence,
                secondaryEvidence: verdict.secondaryEvidence,
              })
            );
            return { success: false, error: verdict.failure };
          }
          record = await this.ledger.append(
            this.stateMachine.transition(record, 'VERIFIED', {
              evidence: verdict.evidence,
              secondaryEvidence: verdict.secondaryEvidence,
            })
          );
        }

        if (record.state === 'VERIFIED') {
          const queued = this.stateMachine.transition(record, 'QUEUED');
          // queue first: a crash before the ledger write is healed on open, by re-submission or by the next sync
          await this.queue.enqueue(queued, this.clock());
          record = await this.ledger.append(queued);
        }

        return { success: true, data: record };
      }
    );

    this.emit();
    return result;
  }

  // ==========================================================================
  // SYNC
  // ==========================================================================

  forceSync(): Promise<SyncResult | undefined> {
    return this.scheduler.trigger('FORCE');
  }

  /** Put STALE_UNSYNCED records (all, or the given ids) back into rotation */
  async retryStale(recordIds?: string[]): Promise<number> {
    const ids =
      recordIds ??
      this.queue
        .list()
        .filter((item) => item.status === 'STALE_UNSYNCED')
        .map((item) => item.record.id);
    const revived = await this.queue.revive(ids, this.clock());
    this.emit();
    return revived;
  }

  // ==========================================================================
  // SUMMARIES
  // ==========================================================================

  async getDailySummary(
    employeeId: string,
    date: string,
    asOf?: Date
  ): Promise<ServiceResult<WorkSummary, DerivationError>> {
    const shift = this.directory.shiftFor(employeeId, date);
    if (!shift) {
      return {
        success: false,
        error: new DerivationError('MISSING_SHIFT_TEMPLATE', `No shift template for ${employeeId} on ${date}`),
      };
    }
    const settings = this.directory.settingsFor(employeeId);
    if (!settings) {
      return { success: false, error: new DerivationError('MISSING_POLICY', `No policy assigned to ${employeeId}`) };
    }

    const records = this.recordsForWorkDate(employeeId, date, shift.utcOffsetMinutes);
    const first = records[0];
    const policyAt = first ? new Date(first.timestamp) : localDayStart(date, shift.utcOffsetMinutes);
    const policy = await this.policies.resolveOrFetch(settings.policyId, policyAt);

    const now = this.clock();
    const isToday = localDate(toMinute(now.toISOString()), shift.utcOffsetMinutes) === date;

    return this.policyEngine.computeSummary(records, policy, shift, {
      asOf: asOf ?? (isToday ? now : undefined),
      date,
      employeeId,
    });
  }

  /** Seven days from weekStart; days off without punches are skipped */
  async getWeeklySummary(employeeId: string, weekStart: string): Promise<ServiceResult<WeeklySummary, DerivationError>> {
    const settings = this.directory.settingsFor(employeeId);
    if (!settings) {
      return { success: false, error: new DerivationError('MISSING_POLICY', `No policy assigned to ${employeeId}`) };
    }

    const days: WorkSummary[] = [];
    for (let offset = 0; offset < 7; offset++) {
      const date = addDays(weekStart, offset);
      const shift = this.directory.shiftFor(employeeId, date);
      if (!shift) {
        if (this.hasRecordsOnUtcDate(employeeId, date)) {
          return {
            success: false,
            error: new DerivationError('MISSING_SHIFT_TEMPLATE', `No shift template for ${employeeId} on ${date}`),
          };
        }
        continue;
      }
      if (this.recordsForWorkDate(employeeId, date, shift.utcOffsetMinutes).length === 0) continue;

      const day = await this.getDailySummary(employeeId, date);
      if (!day.success) return day;
      days.push(day.data);
    }

    const weekShift = this.directory.shiftFor(employeeId, weekStart);
    const policy = await this.policies.resolveOrFetch(
      settings.policyId,
      localDayStart(weekStart, weekShift?.utcOffsetMinutes ?? 0)
    );
    return this.policyEngine.computeWeeklySummary(employeeId, weekStart, days, policy);
  }

  // ==========================================================================
  // QUERIES
  // ==========================================================================

  getRecords(employeeId: string, query: RecordQuery = {}): AttendanceRecord[] {
    return this.ledger.listByEmployee(employeeId, query);
  }

  getRecord(recordId: string): AttendanceRecord | undefined {
    return this.ledger.get(recordId);
  }

  getRecordHistory(recordId: string): AttendanceRecord[] {
    return this.ledger.history(recordId);
  }

  getUploadStatus(recordId: string): UploadStatus | undefined {
    const record = this.ledger.get(recordId);
    return record ? uploadStatusOf(record, this.queue.get(recordId)) : undefined;
  }

  getCurrentStatus(employeeId: string): WorkStatus {
    return workStatus(this.ledger.listByEmployee(employeeId, { states: [...SUMMARY_STATES] }));
  }

  getAuditTrail(employeeId?: string): Promise<AuditEntry[]> {
    return this.audit.list(employeeId);
  }

  archiveAudit(before: Date): Promise<number> {
    return this.audit.archive(before);
  }

  // ==========================================================================
  // LEAVE
  // ==========================================================================

  /** Uploaded with the next sync run; approval comes back from the server */
  async applyForLeave(input: unknown): Promise<ServiceResult<LeaveRequest, LeaveError>> {
    const result = await this.leave.applyForLeave(input, this.clock());
    if (result.success) this.emit();
    return result;
  }

  getLeaveRequests(employeeId: string): LeaveRequest[] {
    return this.leave.listByEmployee(employeeId);
  }

  getLeaveBalance(employeeId: string, leaveTypeId: string, date: string): ServiceResult<LeaveBalance, LeaveError> {
    return this.leave.balance(employeeId, leaveTypeId, date);
  }

  // ==========================================================================
  // OBSERVABLE STATE
  // ==========================================================================

  getState(): EngineState {
    return {
      queueDepth: this.queue.depth(),
      staleCount: this.queue.staleCount(),
      lastSyncAt: this.lastSyncAt,
      lastSyncError:
        this.consecutiveSyncFailures >= this.errorVisibilityThreshold ? this.lastSyncError : undefined,
      consecutiveSyncFailures: this.consecutiveSyncFailures,
      online: this.scheduler.isOnline(),
      notices: [...this.notices],
    };
  }

  /** Called immediately with the current state; returns an unsubscribe function */
  subscribe(listener: EngineListener): () => void {
    this.listeners.add(listener);
    listener(this.getState());
    return () => {
      this.listeners.delete(listener);
    };
  }

  // ==========================================================================
  // INTERNALS
  // ==========================================================================

  private pairingWarning(record: AttendanceRecord): string | undefined {
    const timeline = this.ledger.listByEmployee(record.employeeId, { states: [...SUMMARY_STATES] });
    const codes = validatePairing([...timeline, record])
      .filter((violation) => violation.recordId === record.id)
      .map((violation) => violation.code);
    return codes.length > 0 ? codes.join(',') : undefined;
  }

  private recordsForWorkDate(employeeId: string, date: string, utcOffsetMinutes: number): AttendanceRecord[] {
    // a shift that opened the previous evening may carry into this date
    const from = new Date(localDayStart(date, utcOffsetMinutes).getTime() - MS_PER_DAY);
    const to = new Date(from.getTime() + 3 * MS_PER_DAY);
    const records = this.ledger.listByEmployee(employeeId, { from, to });
    return groupByWorkDate(records, utcOffsetMinutes).get(date) ?? [];
  }

  private hasRecordsOnUtcDate(employeeId: string, date: string): boolean {
    const from = new Date(`${date}T00:00:00.000Z`);
    const to = new Date(from.getTime() + MS_PER_DAY);
    return this.ledger.listByEmployee(employeeId, { from, to, states: [...SUMMARY_STATES] }).length > 0;
  }

  private recordSyncRun(result: SyncResult): void {
    this.notices = result.notices;
    if (result.error) {
      this.recordSyncFailure(`${result.error.code}: ${result.error.message}`);
      return;
    }
    this.consecutiveSyncFailures = 0;
    this.lastSyncError = undefined;
    this.lastSyncAt = result.finishedAt;
    this.emit();
  }

  private recordSyncFailure(message: string): void {
    this.consecutiveSyncFailures++;
    this.lastSyncError = message;
    if (this.consecutiveSyncFailures === this.errorVisibilityThreshold) {
      logger.warn({ failures: this.consecutiveSyncFailures, error: message }, 'Sync keeps failing');
    }
    this.emit();
  }

  private emit(): void {
    if (this.listeners.size === 0) return;
    const state = this.getState();
    for (const listener of this.listeners) {
      try {
        listener(state);
      } catch (error) {
        logger.error({ err: error }, 'State listener threw');
      }
    }
  }
}

function addDays(date: string, days: number): string {
  return new Date(Date.parse(`${date}T00:00:00.000Z`) + days * MS_PER_DAY).toISOString().slice(0, 10);
}
