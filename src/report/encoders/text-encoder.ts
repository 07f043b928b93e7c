import { AttendanceReport } from '../types';
import { REPORT_COLUMNS, formatTimestamp, rowCells } from './columns';

function renderTable(header: readonly string[], rows: string[][]): string[] {
  const widths = header.map((title, col) => Math.max(title.length, ...rows.map((cells) => cells[col].length)));
  const render = (cells: readonly string[]) =>
    cells
      .map((cell, col) => cell.padEnd(widths[col]))
      .join('  ')
      .trimEnd();

  return [render(header), render(widths.map((w) => '-'.repeat(w))), ...rows.map(render)];
}

/**
 * Plain-text report with a fixed-width table, for terminals and e-mail.
 */
export function encodeText(report: AttendanceReport): string {
  const lines = [
    `Attendance report for event ${report.eventId}${report.attendanceOnly ? ' (attended only)' : ''}`,
    `Generated at ${formatTimestamp(report.generatedAt)}`,
    `Registered: ${report.totals.registered}  Checked in: ${report.totals.checkedIn}  Voided: ${report.totals.voided}`,
    '',
  ];

  if (report.rows.length === 0) {
    lines.push('No registrations.');
  } else {
    lines.push(...renderTable(REPORT_COLUMNS, report.rows.map(rowCells)));
  }

  return lines.join('\n') + '\n';
}
