import { RegistrationState } from '../ledger';

export interface ReportRow {
  position: number;
  registrationId: string;
  subjectId: string;
  subjectName: string | null;
  state: RegistrationState;
  registeredAt: number;
  checkedInAt: number | null;
}

export interface ReportTotals {
  registered: number;
  checkedIn: number;
  voided: number;
}

/**
 * Canonical attendance report. Rows are in registration order and every
 * encoder renders them exactly as given.
 */
export interface AttendanceReport {
  eventId: string;
  attendanceOnly: boolean;
  // Latest timestamp in the event's ledger rows; 0 for an empty event
  generatedAt: number;
  totals: ReportTotals;
  rows: ReportRow[];
}

export interface BuildReportOptions {
  /** Keep only checked-in registrations. */
  attendanceOnly?: boolean;
}

/**
 * Display names for subjects, supplied by the identity system.
 */
export interface SubjectDirectory {
  displayName(subjectId: string): Promise<string | undefined>;
}
