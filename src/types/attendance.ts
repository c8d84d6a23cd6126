/**
 * Attendance Domain Types
 *
 * Shared by verification, record lifecycle, policy computation and sync.
 * Records are immutable values: every change produces a new version.
 */

// ============================================================================
// ENUMS
// ============================================================================

export type PunchType = 'CLOCK_IN' | 'CLOCK_OUT' | 'BREAK_START' | 'BREAK_END';

export type VerificationMethod = 'GEO' | 'BIOMETRIC' | 'KIOSK_PIN' | 'QR_TOKEN' | 'NFC_TOKEN';

export type RecordState =
  | 'CAPTURED'
  | 'VERIFIED'
  | 'QUEUED'
  | 'SYNCED'              // TERMINAL
  | 'REJECTED'            // TERMINAL
  | 'CONFLICTED'
  | 'RESOLVED_ACCEPTED'   // TERMINAL
  | 'RESOLVED_SUPERSEDED'; // TERMINAL

export type RecordOrigin = 'LOCAL' | 'REMOTE';

export type SecurityMode = 'STANDARD' | 'HIGH_SECURITY';

export type RoundingRule = 'NEAREST_MINUTE' | 'NEAREST_QUARTER_HOUR';

export type GeoResult = 'INSIDE' | 'OUTSIDE' | 'INDETERMINATE';

/** REMOTE punches (work from home) are exempt from the geofence */
export type WorkLocation = 'SITE' | 'REMOTE';

// ============================================================================
// GEOGRAPHY
// ============================================================================

export interface GeoPoint {
  lat: number;
  lon: number;
}

export interface Site {
  id: string;
  version: number;
  name: string;
  /** Vertices in order; the ring is closed implicitly */
  polygon: GeoPoint[];
  radiusToleranceMeters: number;
  beaconIds?: string[];
  wifiSsids?: string[];
  activeTokenGeneration: number;
}

// ============================================================================
// EVIDENCE (raw, as supplied with a punch attempt)
// ============================================================================

export interface BiometricVerificationResult {
  /** 0..1 */
  confidenceScore: number;
  liveness: boolean;
  capturedAt: string;
}

export interface GeoEvidence {
  method: 'GEO';
  point: GeoPoint;
  accuracyMeters: number;
  beaconIds?: string[];
  wifiSsid?: string;
}

export interface BiometricEvidence {
  method: 'BIOMETRIC';
  result: BiometricVerificationResult;
}

export interface KioskPinEvidence {
  method: 'KIOSK_PIN';
  kioskId: string;
  pin: string;
}

export interface TokenEvidence {
  method: 'QR_TOKEN' | 'NFC_TOKEN';
  tokenId: string;
  siteId: string;
}

export type PunchEvidence = GeoEvidence | BiometricEvidence | KioskPinEvidence | TokenEvidence;

export type SecondaryEvidence = KioskPinEvidence | TokenEvidence;

export interface PunchAttempt {
  /** Reuse on re-submission after a crash; generated when absent */
  recordId?: string;
  employeeId: string;
  deviceId: string;
  type: PunchType;
  timestamp: string;
  clockSkewMs?: number;
  evidence: PunchEvidence;
  secondary?: SecondaryEvidence;
  /** SITE when absent */
  workLocation?: WorkLocation;
}

// ============================================================================
// EVIDENCE (as recorded on an AttendanceRecord; never holds secrets)
// ============================================================================

export type RecordedEvidence =
  | {
      method: 'GEO';
      point: GeoPoint;
      accuracyMeters: number;
      siteId?: string;
      siteVersion?: number;
    }
  | { method: 'BIOMETRIC'; confidenceScore: number; liveness: boolean; capturedAt: string }
  | { method: 'KIOSK_PIN'; kioskId: string; pinHashMatched: boolean }
  | { method: 'QR_TOKEN' | 'NFC_TOKEN'; tokenId: string; siteId: string; generation?: number };

// ============================================================================
// RECORDS
// ============================================================================

export interface AttendanceRecord {
  id: string;
  employeeId: string;
  deviceId: string;
  timestamp: string;
  clockSkewMs: number;
  type: PunchType;
  verificationMethod: VerificationMethod;
  verification: RecordedEvidence;
  secondaryVerification?: RecordedEvidence;
  state: RecordState;
  stateReason?: string;
  serverRevision?: number;
  origin: RecordOrigin;
  workLocation?: WorkLocation;
  version: number;
  updatedAt: string;
  pairingWarning?: string;
}

// ============================================================================
// SETTINGS / SHIFTS / POLICY
// ============================================================================

export interface AttendanceSettings {
  allowedPunchMethods: VerificationMethod[];
  siteIds: string[];
  policyId: string;
  securityMode: SecurityMode;
  biometricThreshold: number;
  accuracyCeilingMeters?: number;
  /** Allows REMOTE punches */
  remoteWorkAllowed?: boolean;
}

export interface TimeWindow {
  /** "HH:MM" local time */
  start: string;
  end: string;
}

export interface ShiftTemplate {
  id: string;
  name: string;
  startTime: string;
  endTime: string;
  breakWindows: TimeWindow[];
  flexibleHours: boolean;
  graceMinutes: number;
  /** Offset of the site's local time from UTC */
  utcOffsetMinutes: number;
}

export interface ActualShift {
  templateId: string;
  /** YYYY-MM-DD in shift-local time */
  date: string;
  scheduledStart: string;
  scheduledEnd: string;
  actualStart?: string;
  actualEnd?: string;
}

export interface OvertimePolicy {
  id: string;
  version: number;
  effectiveFrom: string;
  dailyThresholdMinutes: number;
  weeklyThresholdMinutes: number;
  overtimeMultiplier: number;
  nightWindow: TimeWindow;
  nightDiffMultiplier: number;
  rounding: RoundingRule;
  carryoverCapMinutes: number;
}

// ============================================================================
// SUMMARIES
// ============================================================================

export type SummaryFlagCode = 'LATE_ARRIVAL' | 'EARLY_DEPARTURE' | 'POLICY_VIOLATION';

export interface SummaryFlag {
  code: SummaryFlagCode;
  recordId?: string;
  detail?: string;
}

export interface WorkSummary {
  employeeId: string;
  date: string;
  policyId: string;
  policyVersion: number;
  workedMinutes: number;
  regularMinutes: number;
  overtimeMinutes: number;
  nightDiffMinutes: number;
  overtimeNightMinutes: number;
  breakMinutes: number;
  payableMinutes: number;
  inProgress: boolean;
  provisional: boolean;
  flags: SummaryFlag[];
}

export interface WeeklySummary {
  employeeId: string;
  weekStart: string;
  days: WorkSummary[];
  workedMinutes: number;
  regularMinutes: number;
  overtimeMinutes: number;
  dailyOvertimeMinutes: number;
  weeklyOvertimeMinutes: number;
  nightDiffMinutes: number;
  breakMinutes: number;
  carryoverMinutes: number;
  inProgress: boolean;
}

// ============================================================================
// SYNC QUEUE
// ============================================================================

export type SyncQueueStatus = 'PENDING' | 'IN_FLIGHT' | 'CONFLICTED' | 'STALE_UNSYNCED';

export interface SyncQueueItem {
  record: AttendanceRecord;
  status: SyncQueueStatus;
  attemptCount: number;
  enqueuedAt: string;
  lastAttemptAt?: string;
  lastError?: string;
  nextAttemptAt: string;
}

// ============================================================================
// SERVER PROTOCOL
// ============================================================================

export interface ServerRecord {
  id: string;
  employeeId: string;
  deviceId: string;
  type: PunchType;
  timestamp: string;
  verificationMethod: VerificationMethod;
  verification: RecordedEvidence;
  serverRevision: number;
}

export type RecordVerdict =
  | { recordId: string; status: 'ACCEPTED'; serverRevision: number }
  | { recordId: string; status: 'REJECTED'; reason: string }
  | {
      recordId: string;
      status: 'CONFLICTS_WITH';
      existingRecordId: string;
      existing: ServerRecord;
      /** Sequence the server assigned to this upload */
      sequence: number;
    };

export interface UploadRecord {
  record: AttendanceRecord;
  /** Set when re-submitting the winner of a conflict */
  supersedes?: string;
}
