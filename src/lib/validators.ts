import { z } from 'zod';

const isoInstant = z.string().datetime({ offset: true });
const hhmm = z.string().regex(/^([01]\d|2[0-3]):[0-5]\d$/, 'Expected HH:MM');
const id = z.string().min(1).max(128);

export const punchTypeSchema = z.enum(['CLOCK_IN', 'CLOCK_OUT', 'BREAK_START', 'BREAK_END']);

export const verificationMethodSchema = z.enum(['GEO', 'BIOMETRIC', 'KIOSK_PIN', 'QR_TOKEN', 'NFC_TOKEN']);

export const recordStateSchema = z.enum([
  'CAPTURED',
  'VERIFIED',
  'QUEUED',
  'SYNCED',
  'REJECTED',
  'CONFLICTED',
  'RESOLVED_ACCEPTED',
  'RESOLVED_SUPERSEDED',
]);

export const workLocationSchema = z.enum(['SITE', 'REMOTE']);

export const geoPointSchema = z.object({
  lat: z.number().min(-90).max(90),
  lon: z.number().min(-180).max(180),
});

export const timeWindowSchema = z.object({ start: hhmm, end: hhmm });

// ============================================================================
// PUNCH ATTEMPTS (input)
// ============================================================================

const geoEvidenceSchema = z.object({
  method: z.literal('GEO'),
  point: geoPointSchema,
  accuracyMeters: z.number(),
  beaconIds: z.array(z.string()).optional(),
  wifiSsid: z.string().optional(),
});

const biometricEvidenceSchema = z.object({
  method: z.literal('BIOMETRIC'),
  result: z.object({
    confidenceScore: z.number().min(0).max(1),
    liveness: z.boolean(),
    capturedAt: isoInstant,
  }),
});

const kioskPinEvidenceSchema = z.object({
  method: z.literal('KIOSK_PIN'),
  kioskId: id,
  pin: z.string().regex(/^\d{4,8}$/, 'PIN must be 4-8 digits'),
});

const qrEvidenceSchema = z.object({ method: z.literal('QR_TOKEN'), tokenId: id, siteId: id });
const nfcEvidenceSchema = z.object({ method: z.literal('NFC_TOKEN'), tokenId: id, siteId: id });

export const punchEvidenceSchema = z.discriminatedUnion('method', [
  geoEvidenceSchema,
  biometricEvidenceSchema,
  kioskPinEvidenceSchema,
  qrEvidenceSchema,
  nfcEvidenceSchema,
]);

export const secondaryEvidenceSchema = z.discriminatedUnion('method', [
  kioskPinEvidenceSchema,
  qrEvidenceSchema,
  nfcEvidenceSchema,
]);

export const punchAttemptSchema = z.object({
  recordId: z.string().uuid().optional(),
  employeeId: id,
  deviceId: id,
  type: punchTypeSchema,
  timestamp: isoInstant,
  clockSkewMs: z.number().int().optional(),
  evidence: punchEvidenceSchema,
  secondary: secondaryEvidenceSchema.optional(),
  workLocation: workLocationSchema.optional(),
});

// ============================================================================
// RECORDS (storage)
// ============================================================================

export const recordedEvidenceSchema = z.discriminatedUnion('method', [
  z.object({
    method: z.literal('GEO'),
    point: geoPointSchema,
    accuracyMeters: z.number(),
    siteId: z.string().optional(),
    siteVersion: z.number().int().optional(),
  }),
  z.object({
    method: z.literal('BIOMETRIC'),
    confidenceScore: z.number(),
    liveness: z.boolean(),
    capturedAt: z.string(),
  }),
  z.object({ method: z.literal('KIOSK_PIN'), kioskId: z.string(), pinHashMatched: z.boolean() }),
  z.object({
    method: z.literal('QR_TOKEN'),
    tokenId: z.string(),
    siteId: z.string(),
    generation: z.number().int().optional(),
  }),
  z.object({
    method: z.literal('NFC_TOKEN'),
    tokenId: z.string(),
    siteId: z.string(),
    generation: z.number().int().optional(),
  }),
]);

export const attendanceRecordSchema = z.object({
  id: z.string(),
  employeeId: z.string(),
  deviceId: z.string(),
  timestamp: z.string(),
  clockSkewMs: z.number(),
  type: punchTypeSchema,
  verificationMethod: verificationMethodSchema,
  verification: recordedEvidenceSchema,
  secondaryVerification: recordedEvidenceSchema.optional(),
  state: recordStateSchema,
  stateReason: z.string().optional(),
  serverRevision: z.number().int().optional(),
  origin: z.enum(['LOCAL', 'REMOTE']),
  workLocation: workLocationSchema.optional(),
  version: z.number().int().positive(),
  updatedAt: z.string(),
  pairingWarning: z.string().optional(),
});

// ============================================================================
// CONFIGURATION (from the admin service)
// ============================================================================

export const attendanceSettingsSchema = z.object({
  allowedPunchMethods: z.array(verificationMethodSchema).min(1),
  siteIds: z.array(id),
  policyId: id,
  securityMode: z.enum(['STANDARD', 'HIGH_SECURITY']).default('STANDARD'),
  biometricThreshold: z.number().min(0).max(1).default(0.8),
  accuracyCeilingMeters: z.number().positive().optional(),
  remoteWorkAllowed: z.boolean().default(false),
});

export const overtimePolicySchema = z.object({
  id,
  version: z.number().int().positive(),
  effectiveFrom: isoInstant,
  dailyThresholdMinutes: z.number().int().nonnegative(),
  weeklyThresholdMinutes: z.number().int().nonnegative(),
  overtimeMultiplier: z.number().min(1),
  nightWindow: timeWindowSchema,
  nightDiffMultiplier: z.number().min(1),
  rounding: z.enum(['NEAREST_MINUTE', 'NEAREST_QUARTER_HOUR']),
  carryoverCapMinutes: z.number().int().nonnegative(),
});

export const shiftTemplateSchema = z.object({
  id,
  name: z.string().min(1),
  startTime: hhmm,
  endTime: hhmm,
  breakWindows: z.array(timeWindowSchema).default([]),
  flexibleHours: z.boolean().default(false),
  graceMinutes: z.number().int().nonnegative().default(0),
  utcOffsetMinutes: z.number().int().min(-14 * 60).max(14 * 60).default(0),
});

export const siteSchema = z.object({
  id,
  version: z.number().int().positive(),
  name: z.string().min(1),
  polygon: z.array(geoPointSchema).min(3, 'A site polygon needs at least 3 vertices'),
  radiusToleranceMeters: z.number().nonnegative().default(0),
  beaconIds: z.array(z.string()).optional(),
  wifiSsids: z.array(z.string()).optional(),
  activeTokenGeneration: z.number().int().nonnegative().default(0),
});

// ============================================================================
// LEAVE
// ============================================================================

const calendarDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected YYYY-MM-DD');

export const leaveCriteriaSchema = z.enum(['WEEKLY', 'FORTNIGHTLY', 'MONTHLY', 'QUARTERLY', 'HALF_YEARLY', 'YEARLY']);

export const leaveTypeSchema = z.object({
  id,
  name: z.string().min(1),
  maximumDays: z.number().int().positive(),
  criteria: leaveCriteriaSchema,
});

export const leaveApplicationSchema = z.object({
  requestId: z.string().uuid().optional(),
  employeeId: id,
  deviceId: id,
  leaveTypeId: id,
  startDate: calendarDate,
  endDate: calendarDate,
  remark: z.string().max(500).optional(),
});

export const leaveRequestSchema = z.object({
  id: z.string(),
  employeeId: z.string(),
  deviceId: z.string(),
  leaveTypeId: z.string(),
  startDate: calendarDate,
  endDate: calendarDate,
  days: z.number().int().positive(),
  remark: z.string().optional(),
  status: z.enum(['PENDING', 'APPROVED']),
  approvedBy: z.string().optional(),
  approvedAt: z.string().optional(),
  appliedAt: z.string(),
  uploadStatus: z.enum(['PENDING', 'UPLOADED']),
  uploadedAt: z.string().optional(),
});

// ============================================================================
// SERVER PROTOCOL
// ============================================================================

export const serverRecordSchema = z.object({
  id: z.string(),
  employeeId: z.string(),
  deviceId: z.string(),
  type: punchTypeSchema,
  timestamp: z.string(),
  verificationMethod: verificationMethodSchema,
  verification: recordedEvidenceSchema,
  serverRevision: z.number().int().nonnegative(),
});

export const recordVerdictSchema = z.discriminatedUnion('status', [
  z.object({ recordId: z.string(), status: z.literal('ACCEPTED'), serverRevision: z.number().int().nonnegative() }),
  z.object({ recordId: z.string(), status: z.literal('REJECTED'), reason: z.string() }),
  z.object({
    recordId: z.string(),
    status: z.literal('CONFLICTS_WITH'),
    existingRecordId: z.string(),
    existing: serverRecordSchema,
    sequence: z.number().int().nonnegative(),
  }),
]);

export const uploadResponseSchema = z.object({
  results: z.array(recordVerdictSchema),
});

export const leaveVerdictSchema = z.discriminatedUnion('status', [
  z.object({ requestId: z.string(), status: z.literal('PENDING') }),
  z.object({ requestId: z.string(), status: z.literal('APPROVED'), approvedBy: z.string(), approvedAt: isoInstant }),
]);

export const leaveUploadResponseSchema = z.object({
  results: z.array(leaveVerdictSchema),
});

export const policySnapshotResponseSchema = z.object({
  policy: overtimePolicySchema,
});

export type PunchAttemptInput = z.infer<typeof punchAttemptSchema>;
