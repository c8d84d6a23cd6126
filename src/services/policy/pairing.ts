/**
 * Punch pairing
 *
 * Walks an employee's punches in time order and reports every event that
 * breaks ClockIn → (BreakStart → BreakEnd)* → ClockOut.
 */

import type { PunchType } from '../../types/index.js';

export interface PairingEvent {
  id: string;
  type: PunchType;
  timestamp: string;
}

export type PairingViolationCode =
  | 'CLOCK_IN_WHILE_OPEN'
  | 'CLOCK_OUT_WITHOUT_CLOCK_IN'
  | 'BREAK_OUTSIDE_SHIFT'
  | 'BREAK_ALREADY_OPEN'
  | 'BREAK_END_WITHOUT_START'
  | 'BREAK_OPEN_AT_CLOCK_OUT';

export interface PairingViolation {
  code: PairingViolationCode;
  recordId: string;
}

export type WorkStatus = 'OFF_CLOCK' | 'ON_CLOCK' | 'ON_BREAK';

export function compareEvents(a: PairingEvent, b: PairingEvent): number {
  const diff = Date.parse(a.timestamp) - Date.parse(b.timestamp);
  if (diff !== 0) return diff;
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

export function sortEvents<T extends PairingEvent>(events: readonly T[]): T[] {
  return [...events].sort(compareEvents);
}

interface PairingWalk {
  status: WorkStatus;
  violations: PairingViolation[];
}

function walk(events: readonly PairingEvent[]): PairingWalk {
  let status: WorkStatus = 'OFF_CLOCK';
  const violations: PairingViolation[] = [];
  const flag = (code: PairingViolationCode, recordId: string) => violations.push({ code, recordId });

  for (const event of sortEvents(events)) {
    switch (event.type) {
      case 'CLOCK_IN':
        if (status !== 'OFF_CLOCK') flag('CLOCK_IN_WHILE_OPEN', event.id);
        status = 'ON_CLOCK';
        break;
      case 'CLOCK_OUT':
        if (status === 'OFF_CLOCK') flag('CLOCK_OUT_WITHOUT_CLOCK_IN', event.id);
        if (status === 'ON_BREAK') flag('BREAK_OPEN_AT_CLOCK_OUT', event.id);
        status = 'OFF_CLOCK';
        break;
      case 'BREAK_START':
        if (status === 'OFF_CLOCK') flag('BREAK_OUTSIDE_SHIFT', event.id);
        else if (status === 'ON_BREAK') flag('BREAK_ALREADY_OPEN', event.id);
        else status = 'ON_BREAK';
        break;
      case 'BREAK_END':
        if (status === 'OFF_CLOCK') flag('BREAK_OUTSIDE_SHIFT', event.id);
        else if (status === 'ON_CLOCK') flag('BREAK_END_WITHOUT_START', event.id);
        else status = 'ON_CLOCK';
        break;
    }
  }

  return { status, violations };
}

export function validatePairing(events: readonly PairingEvent[]): PairingViolation[] {
  return walk(events).violations;
}

/** Where the employee stands after the last event */
export function workStatus(events: readonly PairingEvent[]): WorkStatus {
  return walk(events).status;
}
