/**
 * VerificationDispatcher
 *
 * Routes a punch attempt to the check for its evidence type and returns a
 * pass/fail verdict with the evidence as it will be recorded.
 *
 * RULES:
 * - Every method used must be in settings.allowedPunchMethods (METHOD_NOT_ALLOWED)
 * - GEO: GeoVerifier over the configured sites; INDETERMINATE → LOCATION_ACCURACY_INSUFFICIENT
 * - BIOMETRIC: confidence >= threshold AND liveness
 * - KIOSK_PIN: bcrypt match; N consecutive failures lock the PIN (durable)
 * - QR/NFC: known, unexpired, current generation, single use
 * - Secondary evidence combines by security mode: HIGH_SECURITY = AND, STANDARD = OR
 * - Every dispatch appends an audit entry, pass or fail
 *
 * Lockout counters and audit appends for one employee run under that
 * employee's key; nothing is locked globally.
 */

import { VerificationFailure, type VerificationFailureCode } from '../../lib/errors/index.js';
import { KeyedMutex } from '../../infra/KeyedMutex.js';
import {
  assertNever,
  systemClock,
  type AttendanceSettings,
  type Clock,
  type PunchAttempt,
  type PunchEvidence,
  type RecordedEvidence,
  type Site,
  type VerificationMethod,
} from '../../types/index.js';
import { digestOf } from '../../utils/digest.js';
import { createLogger } from '../../utils/logger.js';
import type { GeoVerifier } from '../geo/GeoVerifier.js';
import type { SiteRegistry } from '../geo/SiteRegistry.js';
import type { AuditLog } from './AuditLog.js';
import type { PinCredentialStore, PinLockoutStore } from './PinLockout.js';
import type { TokenRegistry } from './TokenRegistry.js';

const logger = createLogger('VerificationDispatcher');

// ============================================================================
// TYPES
// ============================================================================

export type VerificationVerdict =
  | {
      passed: true;
      method: VerificationMethod;
      evidence: RecordedEvidence;
      secondaryEvidence?: RecordedEvidence;
      site?: Site;
      auditId: string;
    }
  | {
      passed: false;
      method: VerificationMethod;
      evidence: RecordedEvidence;
      secondaryEvidence?: RecordedEvidence;
      failure: VerificationFailure;
      auditId: string;
    };

type MethodOutcome =
  | { passed: true; evidence: RecordedEvidence; site?: Site }
  | { passed: false; evidence: RecordedEvidence; failure: VerificationFailure };

export interface VerificationDispatcherDeps {
  geo: GeoVerifier;
  sites: SiteRegistry;
  pins: PinCredentialStore;
  lockouts: PinLockoutStore;
  tokens: TokenRegistry;
  audit: AuditLog;
  clock?: Clock;
}

// ============================================================================
// DISPATCHER
// ============================================================================

export class VerificationDispatcher {
  private readonly mutex = new KeyedMutex();
  private readonly clock: Clock;

  constructor(private readonly deps: VerificationDispatcherDeps) {
    this.clock = deps.clock ?? systemClock;
  }

  async dispatch(attempt: PunchAttempt, settings: AttendanceSettings, recordId?: string): Promise<VerificationVerdict> {
    return this.mutex.runExclusive(`employee:${attempt.employeeId}`, async () => {
      const now = this.clock();
      const { outcome, secondaryEvidence } = await this.evaluateAttempt(attempt, settings, now);

      const auditEntry = await this.deps.audit.append({
        employeeId: attempt.employeeId,
        deviceId: attempt.deviceId,
        recordId,
        method: attempt.evidence.method,
        secondaryMethod: attempt.secondary?.method,
        passed: outcome.passed,
        failure: outcome.passed ? undefined : outcome.failure.code,
        evidenceDigest: digestOf({
          employeeId: attempt.employeeId,
          type: attempt.type,
          timestamp: attempt.timestamp,
          evidence: outcome.evidence,
          secondaryEvidence,
        }),
        timestamp: now.toISOString(),
      });

      if (!outcome.passed) {
        logger.info(
          { employeeId: attempt.employeeId, method: attempt.evidence.method, failure: outcome.failure.code },
          'Punch verification failed'
        );
        return {
          passed: false,
          method: attempt.evidence.method,
          evidence: outcome.evidence,
          secondaryEvidence,
          failure: outcome.failure,
          auditId: auditEntry.id,
        };
      }

      return {
        passed: true,
        method: attempt.evidence.method,
        evidence: outcome.evidence,
        secondaryEvidence,
        site: outcome.site,
        auditId: auditEntry.id,
      };
    });
  }

  private async evaluateAttempt(
    attempt: PunchAttempt,
    settings: AttendanceSettings,
    now: Date
  ): Promise<{ outcome: MethodOutcome; secondaryEvidence?: RecordedEvidence }> {
    const secondaryUnevaluated = attempt.secondary ? describeEvidence(attempt.secondary) : undefined;

    const disallowed = [attempt.evidence.method, attempt.secondary?.method].find(
      (method): method is VerificationMethod =>
        method !== undefined && !settings.allowedPunchMethods.includes(method)
    );
    if (disallowed) {
      return {
        outcome: {
          passed: false,
          evidence: describeEvidence(attempt.evidence),
          failure: fail('METHOD_NOT_ALLOWED', `Punch method ${disallowed} is not allowed`, { method: disallowed }),
        },
        secondaryEvidence: secondaryUnevaluated,
      };
    }

    const remote = attempt.workLocation === 'REMOTE';
    if (remote && !settings.remoteWorkAllowed) {
      return {
        outcome: {
          passed: false,
          evidence: describeEvidence(attempt.evidence),
          failure: fail('REMOTE_WORK_NOT_ALLOWED', 'Working from home is not enabled for this employee'),
        },
        secondaryEvidence: secondaryUnevaluated,
      };
    }

    const evidence = attempt.evidence;
    const primary =
      remote && evidence.method === 'GEO'
        ? this.evaluateRemoteGeo(evidence)
        : await this.evaluate(evidence, attempt.employeeId, settings, now);
    if (!attempt.secondary) {
      return { outcome: primary };
    }

    const highSecurity = settings.securityMode === 'HIGH_SECURITY';

    // AND stops at the first failure; OR stops at the first pass, and only an
    // imprecise fix may fall back to the secondary
    if (highSecurity && !primary.passed) {
      return { outcome: primary, secondaryEvidence: secondaryUnevaluated };
    }
    if (!highSecurity && (primary.passed || primary.failure.code !== 'LOCATION_ACCURACY_INSUFFICIENT')) {
      return { outcome: primary, secondaryEvidence: secondaryUnevaluated };
    }

    const secondary = await this.evaluate(attempt.secondary, attempt.employeeId, settings, now);

    if (highSecurity) {
      // primary passed; the verdict is the secondary's
      return {
        outcome: secondary.passed ? primary : { passed: false, evidence: primary.evidence, failure: secondary.failure },
        secondaryEvidence: secondary.evidence,
      };
    }

    return {
      outcome: secondary.passed ? { passed: true, evidence: primary.evidence, site: secondary.site } : primary,
      secondaryEvidence: secondary.evidence,
    };
  }

  // ==========================================================================
  // METHOD CHECKS
  // ==========================================================================

  private async evaluate(
    evidence: PunchEvidence,
    employeeId: string,
    settings: AttendanceSettings,
    now: Date
  ): Promise<MethodOutcome> {
    switch (evidence.method) {
      case 'GEO':
        return this.evaluateGeo(evidence, settings);
      case 'BIOMETRIC':
        return this.evaluateBiometric(evidence, settings);
      case 'KIOSK_PIN':
        return this.evaluatePin(evidence, employeeId, now);
      case 'QR_TOKEN':
      case 'NFC_TOKEN':
        return this.evaluateToken(evidence, employeeId, settings, now);
      default:
        return assertNever(evidence);
    }
  }

  private evaluateGeo(evidence: Extract<PunchEvidence, { method: 'GEO' }>, settings: AttendanceSettings): MethodOutcome {
    const sites = this.deps.sites.resolve(settings.siteIds);
    const match = this.deps.geo.verifyAgainstSites(
      evidence.point,
      evidence.accuracyMeters,
      sites,
      settings.accuracyCeilingMeters
    );
    const recorded: RecordedEvidence = {
      method: 'GEO',
      point: { ...evidence.point },
      accuracyMeters: evidence.accuracyMeters,
      siteId: match.site?.id,
      siteVersion: match.site?.version,
    };

    switch (match.result) {
      case 'INDETERMINATE':
        return {
          passed: false,
          evidence: recorded,
          failure: fail('LOCATION_ACCURACY_INSUFFICIENT', 'Location fix is too imprecise; use another punch method', {
            accuracyMeters: evidence.accuracyMeters,
          }),
        };
      case 'OUTSIDE':
        return {
          passed: false,
          evidence: recorded,
          failure: fail('LOCATION_OUTSIDE_GEOFENCE', 'Location is outside every approved site'),
        };
      case 'INSIDE': {
        const site = match.site;
        if (site && !matchesNetworkAllowlist(site, evidence)) {
          return {
            passed: false,
            evidence: recorded,
            failure: fail('LOCATION_OUTSIDE_GEOFENCE', 'No approved beacon or Wi-Fi network was observed', {
              siteId: site.id,
              reason: 'NETWORK_MISMATCH',
            }),
          };
        }
        return { passed: true, evidence: recorded, site };
      }
      default:
        return assertNever(match.result);
    }
  }

  /** Work from home: the fix is recorded, no site is checked */
  private evaluateRemoteGeo(evidence: Extract<PunchEvidence, { method: 'GEO' }>): MethodOutcome {
    return {
      passed: true,
      evidence: { method: 'GEO', point: { ...evidence.point }, accuracyMeters: evidence.accuracyMeters },
    };
  }

  private evaluateBiometric(
    evidence: Extract<PunchEvidence, { method: 'BIOMETRIC' }>,
    settings: AttendanceSettings
  ): MethodOutcome {
    const { confidenceScore, liveness, capturedAt } = evidence.result;
    const recorded: RecordedEvidence = { method: 'BIOMETRIC', confidenceScore, liveness, capturedAt };

    if (!liveness || confidenceScore < settings.biometricThreshold) {
      return {
        passed: false,
        evidence: recorded,
        failure: fail('BIOMETRIC_LOW_CONFIDENCE', 'Biometric match below threshold or liveness not confirmed', {
          confidenceScore,
          threshold: settings.biometricThreshold,
          liveness,
        }),
      };
    }
    return { passed: true, evidence: recorded };
  }

  private async evaluatePin(
    evidence: Extract<PunchEvidence, { method: 'KIOSK_PIN' }>,
    employeeId: string,
    now: Date
  ): Promise<MethodOutcome> {
    const { lockouts, pins } = this.deps;
    const lockedOut = (): MethodOutcome => ({
      passed: false,
      evidence: { method: 'KIOSK_PIN', kioskId: evidence.kioskId, pinHashMatched: false },
      failure: fail('PIN_LOCKED_OUT', 'PIN is locked after repeated failures; try again later', {
        lockedUntil: lockouts.getState(employeeId).lockedUntil,
      }),
    });

    if (lockouts.isLocked(employeeId, now)) {
      return lockedOut();
    }

    if (await pins.matches(employeeId, evidence.pin)) {
      await lockouts.recordSuccess(employeeId, now);
      return { passed: true, evidence: { method: 'KIOSK_PIN', kioskId: evidence.kioskId, pinHashMatched: true } };
    }

    const nowLocked = await lockouts.recordFailure(employeeId, now);
    if (nowLocked) {
      return lockedOut();
    }
    return {
      passed: false,
      evidence: { method: 'KIOSK_PIN', kioskId: evidence.kioskId, pinHashMatched: false },
      failure: fail('PIN_MISMATCH', 'PIN does not match', {
        consecutiveFailures: lockouts.getState(employeeId).consecutiveFailures,
      }),
    };
  }

  private async evaluateToken(
    evidence: Extract<PunchEvidence, { method: 'QR_TOKEN' | 'NFC_TOKEN' }>,
    employeeId: string,
    settings: AttendanceSettings,
    now: Date
  ): Promise<MethodOutcome> {
    // Token use is serialized per token so two employees cannot both spend it
    return this.mutex.runExclusive(`token:${evidence.tokenId}`, async () => {
      const site = settings.siteIds.includes(evidence.siteId) ? this.deps.sites.get(evidence.siteId) : undefined;
      const check = this.deps.tokens.check(evidence.tokenId, site, evidence.siteId, now);

      if (!check.valid) {
        return {
          passed: false,
          evidence: { method: evidence.method, tokenId: evidence.tokenId, siteId: evidence.siteId },
          failure: fail('TOKEN_EXPIRED_OR_REUSED', 'Punch code is expired, superseded or already used', {
            reason: check.reason,
          }),
        };
      }

      await this.deps.tokens.consume(evidence.tokenId, employeeId, now);
      return {
        passed: true,
        evidence: {
          method: evidence.method,
          tokenId: evidence.tokenId,
          siteId: evidence.siteId,
          generation: check.token.generation,
        },
        site,
      };
    });
  }
}

// ============================================================================
// HELPERS
// ============================================================================

function fail(code: VerificationFailureCode, message: string, details?: Record<string, unknown>): VerificationFailure {
  return new VerificationFailure(code, message, details);
}

function matchesNetworkAllowlist(site: Site, evidence: Extract<PunchEvidence, { method: 'GEO' }>): boolean {
  const beacons = site.beaconIds ?? [];
  const ssids = site.wifiSsids ?? [];
  if (beacons.length === 0 && ssids.length === 0) return true;

  const beaconMatch = (evidence.beaconIds ?? []).some((beacon) => beacons.includes(beacon));
  const ssidMatch = evidence.wifiSsid !== undefined && ssids.includes(evidence.wifiSsid);
  return beaconMatch || ssidMatch;
}

/**
 * Evidence as recorded when the method was never evaluated. Secrets are dropped.
 */
export function describeEvidence(evidence: PunchEvidence): RecordedEvidence {
  switch (evidence.method) {
    case 'GEO':
      return { method: 'GEO', point: { ...evidence.point }, accuracyMeters: evidence.accuracyMeters };
    case 'BIOMETRIC':
      return {
        method: 'BIOMETRIC',
        confidenceScore: evidence.result.confidenceScore,
        liveness: evidence.result.liveness,
        capturedAt: evidence.result.capturedAt,
      };
    case 'KIOSK_PIN':
      return { method: 'KIOSK_PIN', kioskId: evidence.kioskId, pinHashMatched: false };
    case 'QR_TOKEN':
    case 'NFC_TOKEN':
      return { method: evidence.method, tokenId: evidence.tokenId, siteId: evidence.siteId };
    default:
      return assertNever(evidence);
  }
}
