/**
 * Attendance report aggregation.
 *
 * Reads the event's registrations, joins each with its latest accepted
 * check-in record, and produces one ordered row stream for every encoder.
 * Read-only and lock-free: check-ins committing while a report is built may
 * or may not be included.
 */

import { AuditLog } from '../audit';
import { Registration, RegistrationLedger, compareRegistrations } from '../ledger';
import { AttendanceReport, BuildReportOptions, ReportRow, SubjectDirectory } from './types';

function latestTimestamp(registrations: Registration[]): number {
  let latest = 0;
  for (const r of registrations) {
    latest = Math.max(latest, r.createdAt, r.checkedInAt ?? 0, r.voidedAt ?? 0);
  }
  return latest;
}

export class ReportBuilder {
  private readonly ledger: RegistrationLedger;
  private readonly audit: AuditLog;
  private readonly directory?: SubjectDirectory;

  constructor(ledger: RegistrationLedger, audit: AuditLog, directory?: SubjectDirectory) {
    this.ledger = ledger;
    this.audit = audit;
    this.directory = directory;
  }

  async buildReport(eventId: string, options: BuildReportOptions = {}): Promise<AttendanceReport> {
    const attendanceOnly = options.attendanceOnly === true;
    const registrations = (await this.ledger.listByEvent(eventId)).sort(compareRegistrations);

    const acceptedAt = new Map<string, number>();
    for (const record of this.audit.list({ eventId, outcomes: ['accepted'] })) {
      if (record.registrationId !== null) {
        acceptedAt.set(record.registrationId, record.recordedAt);
      }
    }

    const selected = attendanceOnly ? registrations.filter((r) => r.state === 'checked_in') : registrations;

    const rows: ReportRow[] = [];
    for (const registration of selected) {
      const checkedInAt = acceptedAt.get(registration.registrationId) ?? registration.checkedInAt ?? null;
      const subjectName = this.directory ? (await this.directory.displayName(registration.subjectId)) ?? null : null;
      rows.push({
        position: rows.length + 1,
        registrationId: registration.registrationId,
        subjectId: registration.subjectId,
        subjectName,
        state: registration.state,
        registeredAt: registration.createdAt,
        checkedInAt,
      });
    }

    return {
      eventId,
      attendanceOnly,
      generatedAt: latestTimestamp(registrations),
      // Totals describe the whole event, also when only attendees are listed
      totals: {
        registered: registrations.length,
        checkedIn: registrations.filter((r) => r.state === 'checked_in').length,
        voided: registrations.filter((r) => r.state === 'void').length,
      },
      rows,
    };
  }
}
