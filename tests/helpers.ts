/**
 * Shared fixtures for the attendance tests.
 */

import type {
    AttendanceRecord,
    AttendanceSettings,
    Clock,
    OvertimePolicy,
    PunchType,
    RecordState,
    ShiftTemplate,
    WorkSummary,
} from '../src/types/index.js';
import type { SiteDraft } from '../src/services/geo/SiteRegistry.js';

export class ManualClock {
    private current: number;

    constructor(start: string) {
        this.current = Date.parse(start);
    }

    readonly now: Clock = () => new Date(this.current);

    advance(ms: number): void {
        this.current += ms;
    }

    set(iso: string): void {
        this.current = Date.parse(iso);
    }
}

export const MINUTE = 60 * 1000;
export const HOUR = 60 * MINUTE;
export const DAY = 24 * HOUR;

/** Roughly 110 m square just north-east of (0, 0) */
export const DEPOT: SiteDraft = {
    id: 'site-depot',
    name: 'North Depot',
    polygon: [
        { lat: 0, lon: 0 },
        { lat: 0, lon: 0.001 },
        { lat: 0.001, lon: 0.001 },
        { lat: 0.001, lon: 0 },
    ],
    radiusToleranceMeters: 0,
    activeTokenGeneration: 0,
};

export const INSIDE_DEPOT = { lat: 0.0005, lon: 0.0005 };
export const OUTSIDE_DEPOT = { lat: 0.002, lon: 0.0005 };

export function standardPolicy(overrides: Partial<OvertimePolicy> = {}): OvertimePolicy {
    return {
        id: 'policy-standard',
        version: 1,
        effectiveFrom: '2026-01-01T00:00:00.000Z',
        dailyThresholdMinutes: 480,
        weeklyThresholdMinutes: 2400,
        overtimeMultiplier: 1.5,
        nightWindow: { start: '22:00', end: '06:00' },
        nightDiffMultiplier: 1.1,
        rounding: 'NEAREST_QUARTER_HOUR',
        carryoverCapMinutes: 120,
        ...overrides,
    };
}

export function dayShift(overrides: Partial<ShiftTemplate> = {}): ShiftTemplate {
    return {
        id: 'shift-day',
        name: 'Day',
        startTime: '09:00',
        endTime: '18:00',
        breakWindows: [{ start: '12:00', end: '12:30' }],
        flexibleHours: false,
        graceMinutes: 5,
        utcOffsetMinutes: 0,
        ...overrides,
    };
}

export function geoSettings(overrides: Partial<AttendanceSettings> = {}): AttendanceSettings {
    return {
        allowedPunchMethods: ['GEO', 'BIOMETRIC', 'KIOSK_PIN', 'QR_TOKEN', 'NFC_TOKEN'],
        siteIds: [DEPOT.id],
        policyId: 'policy-standard',
        securityMode: 'STANDARD',
        biometricThreshold: 0.8,
        ...overrides,
    };
}

export interface RecordFields {
    id: string;
    type: PunchType;
    timestamp: string;
    state?: RecordState;
    employeeId?: string;
    deviceId?: string;
}

export function makeRecord(fields: RecordFields): AttendanceRecord {
    return {
        id: fields.id,
        employeeId: fields.employeeId ?? 'emp-1',
        deviceId: fields.deviceId ?? 'phone-1',
        timestamp: fields.timestamp,
        clockSkewMs: 0,
        type: fields.type,
        verificationMethod: 'GEO',
        verification: { method: 'GEO', point: INSIDE_DEPOT, accuracyMeters: 8, siteId: DEPOT.id, siteVersion: 1 },
        state: fields.state ?? 'SYNCED',
        serverRevision: fields.state === undefined || fields.state === 'SYNCED' ? 1 : undefined,
        origin: 'LOCAL',
        version: 1,
        updatedAt: fields.timestamp,
    };
}

export function daySummary(date: string, overrides: Partial<WorkSummary> = {}): WorkSummary {
    return {
        employeeId: 'emp-1',
        date,
        policyId: 'policy-standard',
        policyVersion: 1,
        workedMinutes: 480,
        regularMinutes: 480,
        overtimeMinutes: 0,
        nightDiffMinutes: 0,
        overtimeNightMinutes: 0,
        breakMinutes: 30,
        payableMinutes: 480,
        inProgress: false,
        provisional: false,
        flags: [],
        ...overrides,
    };
}
