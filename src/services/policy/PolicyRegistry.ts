/**
 * PolicyRegistry
 *
 * Overtime policy versions by id. A day is always evaluated under the version
 * that was effective at its first punch, so editing a policy never rewrites
 * closed days.
 *
 * Versions come from the admin service (register) or, when nothing local
 * covers an instant, from the server's policy snapshot endpoint.
 */

import { SyncError, ValidationError } from '../../lib/errors/index.js';
import { overtimePolicySchema } from '../../lib/validators.js';
import type { OvertimePolicy } from '../../types/index.js';
import { createLogger } from '../../utils/logger.js';
import type { AttendanceApi } from '../sync/AttendanceApi.js';

const logger = createLogger('PolicyRegistry');

export class PolicyRegistry {
  private readonly versions = new Map<string, OvertimePolicy[]>();

  constructor(private readonly api?: AttendanceApi) {}

  register(policy: OvertimePolicy): OvertimePolicy {
    const parsed = overtimePolicySchema.safeParse(policy);
    if (!parsed.success) {
      throw new ValidationError(`Invalid overtime policy '${policy.id}'`, { issues: parsed.error.issues });
    }

    const stored = Object.freeze({ ...parsed.data, nightWindow: Object.freeze({ ...parsed.data.nightWindow }) });
    const others = (this.versions.get(stored.id) ?? []).filter((existing) => existing.version !== stored.version);
    this.versions.set(
      stored.id,
      [...others, stored].sort((a, b) => Date.parse(a.effectiveFrom) - Date.parse(b.effectiveFrom) || a.version - b.version)
    );

    logger.debug({ policyId: stored.id, version: stored.version }, 'Policy version registered');
    return stored;
  }

  /** Version in effect at `asOf`, if any is known locally */
  resolve(policyId: string, asOf: Date): OvertimePolicy | undefined {
    const at = asOf.getTime();
    const effective = (this.versions.get(policyId) ?? []).filter((policy) => Date.parse(policy.effectiveFrom) <= at);
    return effective[effective.length - 1];
  }

  /**
   * Local lookup, then the server. A failed fetch resolves to undefined
   * (the caller reports MISSING_POLICY) instead of failing the summary.
   */
  async resolveOrFetch(policyId: string, asOf: Date, signal?: AbortSignal): Promise<OvertimePolicy | undefined> {
    const local = this.resolve(policyId, asOf);
    if (local || !this.api) return local;

    try {
      const remote = await this.api.fetchPolicy(policyId, asOf, signal);
      if (!remote) return undefined;
      this.register(remote);
      return this.resolve(policyId, asOf);
    } catch (error) {
      if (error instanceof SyncError) {
        logger.warn({ policyId, code: error.code }, 'Policy snapshot unavailable');
        return undefined;
      }
      throw error;
    }
  }
}
