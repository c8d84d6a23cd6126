/**
 * Attendance Engine - public API
 *
 * Verifies time punches, records them durably while offline, reconciles them
 * with the server of record and derives labor metrics from the result.
 */

export { AttendanceEngine } from './engine/AttendanceEngine.js';
export type {
  AttendanceEngineOptions,
  EngineListener,
  EngineState,
  PunchError,
} from './engine/AttendanceEngine.js';
export { StaticAttendanceDirectory } from './engine/AttendanceDirectory.js';
export type { AttendanceDirectory } from './engine/AttendanceDirectory.js';

export { EnvMode, detectMode, loadEngineConfig } from './config/env.js';
export type { EngineConfig } from './config/env.js';

export { GeoVerifier, DEFAULT_ACCURACY_CEILING_METERS } from './services/geo/GeoVerifier.js';
export { SiteRegistry } from './services/geo/SiteRegistry.js';
export type { SiteDraft } from './services/geo/SiteRegistry.js';

export { VerificationDispatcher } from './services/verification/VerificationDispatcher.js';
export type { VerificationVerdict } from './services/verification/VerificationDispatcher.js';
export { AuditLog } from './services/verification/AuditLog.js';
export type { AuditEntry } from './services/verification/AuditLog.js';
export { PinCredentialStore, PinLockoutStore } from './services/verification/PinLockout.js';
export { TokenRegistry } from './services/verification/TokenRegistry.js';
export type { PunchToken, TokenCheck } from './services/verification/TokenRegistry.js';

export { RecordStateMachine, RECORD_TRANSITIONS, canTransition } from './services/RecordStateMachine.js';
export { RecordLedger } from './services/RecordLedger.js';
export type { RecordQuery } from './services/RecordLedger.js';

export { PolicyEngine } from './services/policy/PolicyEngine.js';
export type { SummaryOptions } from './services/policy/PolicyEngine.js';
export { PolicyRegistry } from './services/policy/PolicyRegistry.js';
export { validatePairing, workStatus } from './services/policy/pairing.js';
export type { PairingViolation, WorkStatus } from './services/policy/pairing.js';

export { LeaveBook } from './services/leave/LeaveBook.js';
export type { LeaveError } from './services/leave/LeaveBook.js';
export { LeaveTypeRegistry } from './services/leave/LeaveTypeRegistry.js';

export { OfflineQueue } from './services/sync/OfflineQueue.js';
export { uploadStatusOf } from './services/sync/uploadStatus.js';
export { SyncReconciler, SUPERSEDED_NOTICE } from './services/sync/SyncReconciler.js';
export type { SyncResult } from './services/sync/SyncReconciler.js';
export { SyncScheduler } from './services/sync/SyncScheduler.js';
export type { SyncTrigger } from './services/sync/SyncScheduler.js';
export { HttpAttendanceApi } from './services/sync/HttpAttendanceApi.js';
export type { AttendanceApi } from './services/sync/AttendanceApi.js';

export { CircuitBreaker, CircuitOpenError } from './infra/CircuitBreaker.js';
export { KeyedMutex } from './infra/KeyedMutex.js';
export { FileLogStore } from './infra/storage/FileLogStore.js';
export { MemoryLogStore } from './infra/storage/MemoryLogStore.js';
export { STREAMS } from './infra/storage/LogStore.js';
export type { LogEntry, LogStore } from './infra/storage/LogStore.js';

export {
  AppError,
  DerivationError,
  InvalidTransitionError,
  StorageError,
  SyncError,
  ValidationError,
  VerificationFailure,
} from './lib/errors/index.js';

export * from './types/index.js';
