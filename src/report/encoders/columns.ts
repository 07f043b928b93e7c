import { RegistrationState } from '../../ledger';
import { ReportRow } from '../types';

export const REPORT_COLUMNS = [
  '#',
  'Registration ID',
  'Subject ID',
  'Subject Name',
  'State',
  'Registered At',
  'Checked In At',
] as const;

const STATE_LABELS: Record<RegistrationState, string> = {
  issued: 'issued',
  checked_in: 'checked-in',
  void: 'void',
};

export function formatTimestamp(ms: number | null): string {
  return ms === null ? '' : new Date(ms).toISOString();
}

export function rowCells(row: ReportRow): string[] {
  return [
    String(row.position),
    row.registrationId,
    row.subjectId,
    row.subjectName ?? '',
    STATE_LABELS[row.state],
    formatTimestamp(row.registeredAt),
    formatTimestamp(row.checkedInAt),
  ];
}
