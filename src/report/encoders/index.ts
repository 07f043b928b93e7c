import { AttendanceReport } from '../types';
import { encodeCsv } from './csv-encoder';
import { encodePdf } from './pdf-encoder';
import { encodeText } from './text-encoder';

export const REPORT_FORMATS = ['csv', 'text', 'pdf', 'json'] as const;

export type ReportFormat = (typeof REPORT_FORMATS)[number];

export interface EncodedReport {
  format: ReportFormat;
  contentType: string;
  extension: string;
  body: Buffer;
}

export function isReportFormat(value: string): value is ReportFormat {
  return REPORT_FORMATS.some((format) => format === value);
}

export function encodeJson(report: AttendanceReport): string {
  return JSON.stringify(report, null, 2) + '\n';
}

/**
 * Encodes the canonical row stream. Encoders render rows in the order given
 * and never filter them.
 */
export async function encodeReport(report: AttendanceReport, format: ReportFormat): Promise<EncodedReport> {
  switch (format) {
    case 'csv':
      return { format, contentType: 'text/csv; charset=utf-8', extension: 'csv', body: Buffer.from(encodeCsv(report), 'utf8') };
    case 'text':
      return { format, contentType: 'text/plain; charset=utf-8', extension: 'txt', body: Buffer.from(encodeText(report), 'utf8') };
    case 'pdf':
      return { format, contentType: 'application/pdf', extension: 'pdf', body: await encodePdf(report) };
    case 'json':
      return { format, contentType: 'application/json; charset=utf-8', extension: 'json', body: Buffer.from(encodeJson(report), 'utf8') };
  }
}

/**
 * Download file name, stable for an unchanged report.
 */
export function reportFilename(report: AttendanceReport, extension: string): string {
  const safeEventId = report.eventId.replace(/[^A-Za-z0-9_-]+/g, '_');
  const stamp = new Date(report.generatedAt).toISOString().replace(/[-:]/g, '').replace(/\.\d{3}Z$/, 'Z');
  const kind = report.attendanceOnly ? 'attendance' : 'registrations';
  return `${safeEventId}_${kind}_${stamp}.${extension}`;
}

export { encodeCsv, escapeCsvCell } from './csv-encoder';
export { encodeText } from './text-encoder';
export { encodePdf, pageCount, ROWS_PER_PAGE } from './pdf-encoder';
export { REPORT_COLUMNS, formatTimestamp, rowCells } from './columns';
