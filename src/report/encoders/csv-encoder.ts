import { AttendanceReport } from '../types';
import { REPORT_COLUMNS, rowCells } from './columns';

const BOM = '\uFEFF';

/**
 * Quotes a field when it contains a comma, double quote or line break.
 */
export function escapeCsvCell(value: string): string {
  if (value.includes(',') || value.includes('"') || value.includes('\n') || value.includes('\r')) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/**
 * RFC 4180 CSV with a UTF-8 byte order mark so spreadsheet tools pick the
 * right encoding. Every line, including the last, ends in CRLF.
 */
export function encodeCsv(report: AttendanceReport): string {
  const lines = [REPORT_COLUMNS.map(escapeCsvCell).join(',')];
  for (const row of report.rows) {
    lines.push(rowCells(row).map(escapeCsvCell).join(','));
  }
  return BOM + lines.map((line) => line + '\r\n').join('');
}
