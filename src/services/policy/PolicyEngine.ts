/**
 * POLICY ENGINE
 *
 * Derives labor metrics from one employee's punches. Pure: the same records,
 * policy and shift always give the same summary.
 *
 * RULES:
 * - Timestamps are truncated to whole minutes; all arithmetic is integer
 * - ClockIn/ClockOut must alternate, otherwise UNPAIRED_EVENTS (no partial summary)
 * - Paired breaks inside a shift are subtracted; stray breaks are flagged, not subtracted
 * - Daily overtime = rounded worked minutes above the daily threshold
 * - Weekly overtime converts regular minutes beyond the weekly threshold,
 *   walking days in order; daily overtime is never counted twice
 * - Night minutes are counted on local time regardless of overtime;
 *   overtime × night stacks multiplicatively in payableMinutes
 */

import { DerivationError } from '../../lib/errors/index.js';
import type {
  ActualShift,
  AttendanceRecord,
  OvertimePolicy,
  ServiceResult,
  ShiftTemplate,
  SummaryFlag,
  TimeWindow,
  WeeklySummary,
  WorkSummary,
} from '../../types/index.js';
import { SERVER_CONFIRMED_STATES, SUMMARY_STATES } from '../RecordStateMachine.js';
import { sortEvents } from './pairing.js';

const MINUTES_PER_DAY = 24 * 60;
const MS_PER_MINUTE = 60_000;
const WEIGHT_SCALE = 1000;

export interface SummaryOptions {
  /** End of a still-open shift; defaults to the last record */
  asOf?: Date;
  /** YYYY-MM-DD; defaults to the shift-local date of the first record */
  date?: string;
  /** Used when there are no records */
  employeeId?: string;
}

interface Interval {
  start: number;
  end: number;
}

interface DayWalk {
  worked: Interval[];
  breakMinutes: number;
  inProgress: boolean;
  flags: SummaryFlag[];
  firstClockIn?: AttendanceRecord;
  lastClockOut?: AttendanceRecord;
}

// ============================================================================
// TIME HELPERS
// ============================================================================

export function toMinute(iso: string): number {
  return Math.floor(Date.parse(iso) / MS_PER_MINUTE);
}

export function parseClockTime(hhmm: string): number {
  const [hours, minutes] = hhmm.split(':').map(Number);
  return (hours ?? 0) * 60 + (minutes ?? 0);
}

function localMinuteOfDay(minute: number, utcOffsetMinutes: number): number {
  const local = (minute + utcOffsetMinutes) % MINUTES_PER_DAY;
  return local < 0 ? local + MINUTES_PER_DAY : local;
}

export function localDate(minute: number, utcOffsetMinutes: number): string {
  return new Date((minute + utcOffsetMinutes) * MS_PER_MINUTE).toISOString().slice(0, 10);
}

/** UTC minute at which a local date starts */
function localDayStartMinute(date: string, utcOffsetMinutes: number): number {
  return Date.parse(`${date}T00:00:00.000Z`) / MS_PER_MINUTE - utcOffsetMinutes;
}

function inWindow(minuteOfDay: number, window: TimeWindow): boolean {
  const start = parseClockTime(window.start);
  const end = parseClockTime(window.end);
  if (start === end) return false;
  if (start < end) return minuteOfDay >= start && minuteOfDay < end;
  return minuteOfDay >= start || minuteOfDay < end;
}

export function roundMinutes(minutes: number, rule: OvertimePolicy['rounding']): number {
  switch (rule) {
    case 'NEAREST_MINUTE':
      return minutes;
    case 'NEAREST_QUARTER_HOUR':
      // half up: 7m30s rounds to 15
      return Math.floor((minutes * 2 + 15) / 30) * 15;
  }
}

/**
 * Assigns each record to the shift-local date of the ClockIn that opened its
 * shift, so an overnight shift stays on one day. Records outside a shift keep
 * their own date.
 */
export function groupByWorkDate(
  records: readonly AttendanceRecord[],
  utcOffsetMinutes: number
): Map<string, AttendanceRecord[]> {
  const groups = new Map<string, AttendanceRecord[]>();
  let openDate: string | undefined;

  for (const record of sortEvents(records.filter((candidate) => SUMMARY_STATES.has(candidate.state)))) {
    const own = localDate(toMinute(record.timestamp), utcOffsetMinutes);
    if (record.type === 'CLOCK_IN') openDate = own;
    const date = openDate ?? own;

    const group = groups.get(date);
    if (group) {
      group.push(record);
    } else {
      groups.set(date, [record]);
    }
    if (record.type === 'CLOCK_OUT') openDate = undefined;
  }
  return groups;
}

/** UTC instant at which a shift-local date starts */
export function localDayStart(date: string, utcOffsetMinutes: number): Date {
  return new Date(localDayStartMinute(date, utcOffsetMinutes) * MS_PER_MINUTE);
}

function compareFlags(a: SummaryFlag, b: SummaryFlag): number {
  const keyA = `${a.code}|${a.recordId ?? ''}|${a.detail ?? ''}`;
  const keyB = `${b.code}|${b.recordId ?? ''}|${b.detail ?? ''}`;
  return keyA < keyB ? -1 : keyA > keyB ? 1 : 0;
}

// ============================================================================
// ENGINE
// ============================================================================

export class PolicyEngine {
  computeSummary(
    records: readonly AttendanceRecord[],
    policy: OvertimePolicy | undefined,
    shift: ShiftTemplate | undefined,
    options: SummaryOptions = {}
  ): ServiceResult<WorkSummary, DerivationError> {
    if (!policy) {
      return { success: false, error: new DerivationError('MISSING_POLICY', 'No overtime policy for this day') };
    }
    if (!shift) {
      return {
        success: false,
        error: new DerivationError('MISSING_SHIFT_TEMPLATE', 'No shift template for this day'),
      };
    }

    const included = sortEvents(records.filter((record) => SUMMARY_STATES.has(record.state)));
    const walked = this.walkDay(included, options.asOf);
    if (!walked.success) return walked;
    const day = walked.data;

    const first = included[0];
    const date = options.date ?? (first ? localDate(toMinute(first.timestamp), shift.utcOffsetMinutes) : '');

    const rawWorked = day.worked.reduce((sum, interval) => sum + (interval.end - interval.start), 0);
    const workedMinutes = roundMinutes(rawWorked, policy.rounding);
    const regularMinutes = Math.min(workedMinutes, policy.dailyThresholdMinutes);
    const overtimeMinutes = Math.max(0, workedMinutes - policy.dailyThresholdMinutes);

    const night = this.countNightMinutes(day.worked, policy, shift);
    const overtimeNightMinutes = Math.min(night.afterThreshold, overtimeMinutes);

    const flags = [...day.flags];
    if (!shift.flexibleHours && date) {
      flags.push(...this.scheduleFlags(day, shift, date));
    }

    return {
      success: true,
      data: {
        employeeId: first?.employeeId ?? options.employeeId ?? '',
        date,
        policyId: policy.id,
        policyVersion: policy.version,
        workedMinutes,
        regularMinutes,
        overtimeMinutes,
        nightDiffMinutes: night.total,
        overtimeNightMinutes,
        breakMinutes: day.breakMinutes,
        payableMinutes: payableMinutes(regularMinutes, overtimeMinutes, night.total, overtimeNightMinutes, policy),
        inProgress: day.inProgress,
        provisional: included.some((record) => !SERVER_CONFIRMED_STATES.has(record.state)),
        flags: flags.sort(compareFlags),
      },
    };
  }

  /**
   * Weekly roll-up. Days are walked in date order; once the week's regular
   * minutes pass the weekly threshold the excess becomes overtime.
   */
  computeWeeklySummary(
    employeeId: string,
    weekStart: string,
    days: readonly WorkSummary[],
    policy: OvertimePolicy | undefined
  ): ServiceResult<WeeklySummary, DerivationError> {
    if (!policy) {
      return { success: false, error: new DerivationError('MISSING_POLICY', 'No overtime policy for this week') };
    }

    const ordered = [...days].sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));

    let regularSoFar = 0;
    let weeklyOvertimeMinutes = 0;
    for (const day of ordered) {
      const allowance = Math.max(0, policy.weeklyThresholdMinutes - regularSoFar);
      const converted = Math.max(0, day.regularMinutes - allowance);
      weeklyOvertimeMinutes += converted;
      regularSoFar += day.regularMinutes - converted;
    }

    const sum = (pick: (day: WorkSummary) => number) => ordered.reduce((total, day) => total + pick(day), 0);
    const dailyOvertimeMinutes = sum((day) => day.overtimeMinutes);
    const overtimeMinutes = dailyOvertimeMinutes + weeklyOvertimeMinutes;

    return {
      success: true,
      data: {
        employeeId,
        weekStart,
        days: ordered,
        workedMinutes: sum((day) => day.workedMinutes),
        regularMinutes: regularSoFar,
        overtimeMinutes,
        dailyOvertimeMinutes,
        weeklyOvertimeMinutes,
        nightDiffMinutes: sum((day) => day.nightDiffMinutes),
        breakMinutes: sum((day) => day.breakMinutes),
        carryoverMinutes: Math.min(overtimeMinutes, policy.carryoverCapMinutes),
        inProgress: ordered.some((day) => day.inProgress),
      },
    };
  }

  bindActualShift(shift: ShiftTemplate, date: string, records: readonly AttendanceRecord[]): ActualShift {
    const dayStart = localDayStartMinute(date, shift.utcOffsetMinutes);
    const start = parseClockTime(shift.startTime);
    let end = parseClockTime(shift.endTime);
    if (end <= start) end += MINUTES_PER_DAY;

    const ordered = sortEvents(records.filter((record) => SUMMARY_STATES.has(record.state)));
    const clockIns = ordered.filter((record) => record.type === 'CLOCK_IN');
    const clockOuts = ordered.filter((record) => record.type === 'CLOCK_OUT');

    return {
      templateId: shift.id,
      date,
      scheduledStart: new Date((dayStart + start) * MS_PER_MINUTE).toISOString(),
      scheduledEnd: new Date((dayStart + end) * MS_PER_MINUTE).toISOString(),
      actualStart: clockIns[0]?.timestamp,
      actualEnd: clockOuts[clockOuts.length - 1]?.timestamp,
    };
  }

  // ==========================================================================
  // INTERNALS
  // ==========================================================================

  private walkDay(records: readonly AttendanceRecord[], asOf: Date | undefined): ServiceResult<DayWalk, DerivationError> {
    const worked: Interval[] = [];
    const flags: SummaryFlag[] = [];
    let breakMinutes = 0;
    let segmentStart: number | undefined;
    let breakStart: number | undefined;
    let firstClockIn: AttendanceRecord | undefined;
    let lastClockOut: AttendanceRecord | undefined;

    const violation = (record: AttendanceRecord, detail: string) =>
      flags.push({ code: 'POLICY_VIOLATION', recordId: record.id, detail });

    const unpaired = (record: AttendanceRecord, message: string): ServiceResult<DayWalk, DerivationError> => ({
      success: false,
      error: new DerivationError('UNPAIRED_EVENTS', message, { recordId: record.id, timestamp: record.timestamp }),
    });

    for (const record of records) {
      const minute = toMinute(record.timestamp);
      const onShift = segmentStart !== undefined || breakStart !== undefined;

      switch (record.type) {
        case 'CLOCK_IN':
          if (onShift) return unpaired(record, 'ClockIn while a shift is already open');
          segmentStart = minute;
          firstClockIn ??= record;
          break;

        case 'CLOCK_OUT':
          if (!onShift) return unpaired(record, 'ClockOut without an open ClockIn');
          if (breakStart !== undefined) {
            violation(record, 'BREAK_OPEN_AT_CLOCK_OUT');
            breakMinutes += minute - breakStart;
            breakStart = undefined;
          } else if (segmentStart !== undefined) {
            worked.push({ start: segmentStart, end: minute });
          }
          segmentStart = undefined;
          lastClockOut = record;
          break;

        case 'BREAK_START':
          if (!onShift) {
            violation(record, 'BREAK_OUTSIDE_SHIFT');
          } else if (breakStart !== undefined) {
            violation(record, 'BREAK_ALREADY_OPEN');
          } else if (segmentStart !== undefined) {
            worked.push({ start: segmentStart, end: minute });
            segmentStart = undefined;
            breakStart = minute;
          }
          break;

        case 'BREAK_END':
          if (!onShift) {
            violation(record, 'BREAK_OUTSIDE_SHIFT');
          } else if (breakStart === undefined) {
            violation(record, 'BREAK_END_WITHOUT_START');
          } else {
            breakMinutes += minute - breakStart;
            breakStart = undefined;
            segmentStart = minute;
          }
          break;
      }
    }

    let inProgress = false;
    if (segmentStart !== undefined || breakStart !== undefined) {
      inProgress = true;
      const last = records[records.length - 1];
      const lastMinute = last ? toMinute(last.timestamp) : 0;
      const end = Math.max(lastMinute, asOf ? Math.floor(asOf.getTime() / MS_PER_MINUTE) : lastMinute);
      if (breakStart !== undefined) {
        breakMinutes += end - breakStart;
      } else if (segmentStart !== undefined) {
        worked.push({ start: segmentStart, end });
      }
    }

    return {
      success: true,
      data: { worked: worked.filter((i) => i.end > i.start), breakMinutes, inProgress, flags, firstClockIn, lastClockOut },
    };
  }

  /** Night minutes in total, and those falling after the daily threshold */
  private countNightMinutes(
    worked: readonly Interval[],
    policy: OvertimePolicy,
    shift: ShiftTemplate
  ): { total: number; afterThreshold: number } {
    let ordinal = 0;
    let total = 0;
    let afterThreshold = 0;
    for (const interval of worked) {
      for (let minute = interval.start; minute < interval.end; minute++, ordinal++) {
        if (!inWindow(localMinuteOfDay(minute, shift.utcOffsetMinutes), policy.nightWindow)) continue;
        total++;
        if (ordinal >= policy.dailyThresholdMinutes) afterThreshold++;
      }
    }
    return { total, afterThreshold };
  }

  private scheduleFlags(day: DayWalk, shift: ShiftTemplate, date: string): SummaryFlag[] {
    const flags: SummaryFlag[] = [];
    const dayStart = localDayStartMinute(date, shift.utcOffsetMinutes);
    const start = parseClockTime(shift.startTime);
    let end = parseClockTime(shift.endTime);
    if (end <= start) end += MINUTES_PER_DAY;

    if (day.firstClockIn) {
      const lateBy = toMinute(day.firstClockIn.timestamp) - (dayStart + start);
      if (lateBy > shift.graceMinutes) {
        flags.push({ code: 'LATE_ARRIVAL', recordId: day.firstClockIn.id, detail: `${lateBy} minutes late` });
      }
    }
    if (day.lastClockOut && !day.inProgress) {
      const earlyBy = dayStart + end - toMinute(day.lastClockOut.timestamp);
      if (earlyBy > shift.graceMinutes) {
        flags.push({ code: 'EARLY_DEPARTURE', recordId: day.lastClockOut.id, detail: `${earlyBy} minutes early` });
      }
    }
    return flags;
  }
}

/**
 * Weighted minutes. Multipliers are scaled to integers so the sum is exact
 * before the final rounding.
 */
function payableMinutes(
  regular: number,
  overtime: number,
  night: number,
  overtimeNight: number,
  policy: OvertimePolicy
): number {
  const ot = Math.round(policy.overtimeMultiplier * WEIGHT_SCALE);
  const nd = Math.round(policy.nightDiffMultiplier * WEIGHT_SCALE);
  const base = WEIGHT_SCALE * WEIGHT_SCALE;

  const regularNight = Math.max(0, Math.min(night - overtimeNight, regular));
  const regularDay = regular - regularNight;
  const overtimeDay = overtime - overtimeNight;

  const weighted =
    regularDay * base + regularNight * nd * WEIGHT_SCALE + overtimeDay * ot * WEIGHT_SCALE + overtimeNight * ot * nd;
  return Math.round(weighted / base);
}
