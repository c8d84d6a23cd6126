/**
 * Admin-supplied configuration the engine reads but never edits:
 * per-employee settings and the shift template assigned to each day.
 */

import { ValidationError } from '../lib/errors/index.js';
import { attendanceSettingsSchema, shiftTemplateSchema } from '../lib/validators.js';
import type { AttendanceSettings, ShiftTemplate } from '../types/index.js';

export interface AttendanceDirectory {
  settingsFor(employeeId: string): AttendanceSettings | undefined;
  /** Template worked on a shift-local date; undefined on days off */
  shiftFor(employeeId: string, date: string): ShiftTemplate | undefined;
}

type SettingsInput = Omit<AttendanceSettings, 'securityMode' | 'biometricThreshold'> &
  Partial<Pick<AttendanceSettings, 'securityMode' | 'biometricThreshold'>>;

/**
 * In-memory directory, filled from the admin service's payloads.
 */
export class StaticAttendanceDirectory implements AttendanceDirectory {
  private readonly settings = new Map<string, AttendanceSettings>();
  private readonly templates = new Map<string, ShiftTemplate>();
  private readonly defaultTemplate = new Map<string, string>();
  private readonly assignments = new Map<string, string>();

  setSettings(employeeId: string, input: SettingsInput): AttendanceSettings {
    const parsed = attendanceSettingsSchema.safeParse(input);
    if (!parsed.success) {
      throw new ValidationError(`Invalid attendance settings for '${employeeId}'`, { issues: parsed.error.issues });
    }
    this.settings.set(employeeId, parsed.data);
    return parsed.data;
  }

  addShiftTemplate(template: ShiftTemplate): ShiftTemplate {
    const parsed = shiftTemplateSchema.safeParse(template);
    if (!parsed.success) {
      throw new ValidationError(`Invalid shift template '${template.id}'`, { issues: parsed.error.issues });
    }
    this.templates.set(parsed.data.id, parsed.data);
    return parsed.data;
  }

  /** Template for every day without an explicit assignment */
  assignDefaultShift(employeeId: string, templateId: string): void {
    this.defaultTemplate.set(employeeId, templateId);
  }

  assignShift(employeeId: string, date: string, templateId: string): void {
    this.assignments.set(`${employeeId}|${date}`, templateId);
  }

  settingsFor(employeeId: string): AttendanceSettings | undefined {
    return this.settings.get(employeeId);
  }

  shiftFor(employeeId: string, date: string): ShiftTemplate | undefined {
    const templateId = this.assignments.get(`${employeeId}|${date}`) ?? this.defaultTemplate.get(employeeId);
    return templateId ? this.templates.get(templateId) : undefined;
  }
}
