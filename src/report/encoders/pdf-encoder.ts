/**
 * Paginated PDF rendering of the attendance report through pdfkit.
 *
 * The document's creation date is the report's `generatedAt`, and pdfkit
 * derives the file ID from the document info, so an unchanged report always
 * renders to the same bytes.
 */

import PDFDocument from 'pdfkit';
import { AttendanceReport } from '../types';
import { REPORT_COLUMNS, formatTimestamp, rowCells } from './columns';

export const ROWS_PER_PAGE = 25;

const MARGIN = 36;
const ROW_HEIGHT = 16;
const TABLE_TOP = 96;
const FOOTER_Y = 540;
const COLUMN_WIDTHS = [30, 200, 110, 140, 70, 110, 110];

function chunkRows<T>(rows: T[], size: number): T[][] {
  const pages: T[][] = [];
  for (let i = 0; i < rows.length; i += size) {
    pages.push(rows.slice(i, i + size));
  }
  return pages.length > 0 ? pages : [[]];
}

function drawRow(doc: PDFKit.PDFDocument, cells: readonly string[], y: number): void {
  let x = MARGIN;
  cells.forEach((cell, col) => {
    doc.text(cell, x + 2, y + 4, { width: COLUMN_WIDTHS[col] - 4, lineBreak: false, ellipsis: true });
    x += COLUMN_WIDTHS[col];
  });
}

export function pageCount(report: AttendanceReport): number {
  return Math.max(1, Math.ceil(report.rows.length / ROWS_PER_PAGE));
}

export function encodePdf(report: AttendanceReport): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];

    const doc = new PDFDocument({
      size: 'A4',
      layout: 'landscape',
      margin: MARGIN,
      autoFirstPage: false,
      info: {
        Title: `Attendance report ${report.eventId}`,
        Creator: 'event-checkin-node',
        CreationDate: new Date(report.generatedAt),
      },
    });

    doc.on('data', (chunk: Buffer) => chunks.push(chunk));
    doc.on('end', () => resolve(Buffer.concat(chunks)));
    doc.on('error', reject);

    const pages = chunkRows(report.rows, ROWS_PER_PAGE);
    const tableWidth = COLUMN_WIDTHS.reduce((sum, w) => sum + w, 0);

    pages.forEach((rows, pageIndex) => {
      doc.addPage({ size: 'A4', layout: 'landscape', margin: MARGIN });

      doc.font('Helvetica-Bold').fontSize(14);
      doc.text(`Attendance report: ${report.eventId}`, MARGIN, MARGIN, { lineBreak: false });
      doc.font('Helvetica').fontSize(9);
      doc.text(
        `Generated at ${formatTimestamp(report.generatedAt)}   ` +
          `Registered: ${report.totals.registered}   Checked in: ${report.totals.checkedIn}   ` +
          `Voided: ${report.totals.voided}${report.attendanceOnly ? '   (attended only)' : ''}`,
        MARGIN,
        MARGIN + 22,
        { lineBreak: false }
      );

      doc.rect(MARGIN, TABLE_TOP, tableWidth, ROW_HEIGHT).fill('#2c7be5');
      doc.fillColor('#ffffff').font('Helvetica-Bold').fontSize(8);
      drawRow(doc, REPORT_COLUMNS, TABLE_TOP);

      doc.fillColor('#000000').font('Helvetica').fontSize(8);
      rows.forEach((row, i) => {
        const y = TABLE_TOP + ROW_HEIGHT * (i + 1);
        doc.rect(MARGIN, y, tableWidth, ROW_HEIGHT).lineWidth(0.3).stroke('#000000');
        drawRow(doc, rowCells(row), y);
      });

      if (rows.length === 0) {
        doc.text('No registrations.', MARGIN, TABLE_TOP + ROW_HEIGHT + 4, { lineBreak: false });
      }

      doc.fontSize(8).text(`Page ${pageIndex + 1} of ${pages.length}`, MARGIN, FOOTER_Y, {
        width: tableWidth,
        align: 'right',
        lineBreak: false,
      });
    });

    doc.end();
  });
}
