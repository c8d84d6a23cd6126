/**
 * LeaveTypeRegistry
 *
 * Leave types from the admin service. Re-registering an id replaces it;
 * requests already applied for keep the days they were granted.
 */

import { ValidationError } from '../../lib/errors/index.js';
import { leaveTypeSchema } from '../../lib/validators.js';
import type { LeaveType } from '../../types/index.js';
import { createLogger } from '../../utils/logger.js';

const logger = createLogger('LeaveTypeRegistry');

export class LeaveTypeRegistry {
  private readonly types = new Map<string, LeaveType>();

  register(input: LeaveType): LeaveType {
    const parsed = leaveTypeSchema.safeParse(input);
    if (!parsed.success) {
      throw new ValidationError(`Invalid leave type '${input.id}'`, { issues: parsed.error.issues });
    }

    const leaveType: LeaveType = Object.freeze({ ...parsed.data });
    this.types.set(leaveType.id, leaveType);
    logger.debug({ leaveTypeId: leaveType.id, criteria: leaveType.criteria }, 'Leave type registered');
    return leaveType;
  }

  get(leaveTypeId: string): LeaveType | undefined {
    return this.types.get(leaveTypeId);
  }

  list(): LeaveType[] {
    return [...this.types.values()].sort((a, b) => a.name.localeCompare(b.name));
  }
}
