import { AttendanceReport } from '../types';
import {
  encodeCsv,
  encodeJson,
  encodePdf,
  encodeReport,
  encodeText,
  escapeCsvCell,
  isReportFormat,
  pageCount,
  reportFilename,
} from './index';

function sampleReport(overrides: Partial<AttendanceReport> = {}): AttendanceReport {
  return {
    eventId: 'E1',
    attendanceOnly: false,
    generatedAt: 120_000,
    totals: { registered: 2, checkedIn: 1, voided: 0 },
    rows: [
      {
        position: 1,
        registrationId: 'reg-a',
        subjectId: 'student-a',
        subjectName: 'Ada, L.',
        state: 'issued',
        registeredAt: 0,
        checkedInAt: null,
      },
      {
        position: 2,
        registrationId: 'reg-b',
        subjectId: 'student-b',
        subjectName: null,
        state: 'checked_in',
        registeredAt: 60_000,
        checkedInAt: 120_000,
      },
    ],
    ...overrides,
  };
}

describe('report encoders', () => {
  describe('csv', () => {
    it('renders a header and one line per row', () => {
      expect(encodeCsv(sampleReport())).toBe(
        '\uFEFF#,Registration ID,Subject ID,Subject Name,State,Registered At,Checked In At\r\n' +
          '1,reg-a,student-a,"Ada, L.",issued,1970-01-01T00:00:00.000Z,\r\n' +
          '2,reg-b,student-b,,checked-in,1970-01-01T00:01:00.000Z,1970-01-01T00:02:00.000Z\r\n'
      );
    });

    it('quotes cells with separators, quotes and line breaks', () => {
      expect(escapeCsvCell('plain')).toBe('plain');
      expect(escapeCsvCell('a,b')).toBe('"a,b"');
      expect(escapeCsvCell('say "hi"')).toBe('"say ""hi"""');
      expect(escapeCsvCell('two\nlines')).toBe('"two\nlines"');
    });
  });

  describe('text', () => {
    it('renders a summary and an aligned table', () => {
      expect(encodeText(sampleReport())).toBe(
        [
          'Attendance report for event E1',
          'Generated at 1970-01-01T00:02:00.000Z',
          'Registered: 2  Checked in: 1  Voided: 0',
          '',
          '#  Registration ID  Subject ID  Subject Name  State       Registered At             Checked In At',
          '-  ---------------  ----------  ------------  ----------  ------------------------  ------------------------',
          '1  reg-a            student-a   Ada, L.       issued      1970-01-01T00:00:00.000Z',
          '2  reg-b            student-b                 checked-in  1970-01-01T00:01:00.000Z  1970-01-01T00:02:00.000Z',
          '',
        ].join('\n')
      );
    });

    it('says so when there are no rows', () => {
      const text = encodeText(
        sampleReport({ rows: [], attendanceOnly: true, totals: { registered: 0, checkedIn: 0, voided: 0 } })
      );
      expect(text.split('\n')).toEqual([
        'Attendance report for event E1 (attended only)',
        'Generated at 1970-01-01T00:02:00.000Z',
        'Registered: 0  Checked in: 0  Voided: 0',
        '',
        'No registrations.',
        '',
      ]);
    });
  });

  describe('json', () => {
    it('round-trips the report', () => {
      const report = sampleReport();
      expect(JSON.parse(encodeJson(report))).toEqual(report);
    });
  });

  describe('pdf', () => {
    it('produces a PDF document', async () => {
      const pdf = await encodePdf(sampleReport());
      expect(pdf.subarray(0, 5).toString('latin1')).toBe('%PDF-');
    });

    it('produces identical bytes for an unchanged report', async () => {
      const first = await encodePdf(sampleReport());
      const second = await encodePdf(sampleReport());
      expect(first.equals(second)).toBe(true);
    });

    it('paginates long reports', () => {
      const rows = Array.from({ length: 26 }, (_, i) => ({
        ...sampleReport().rows[0],
        position: i + 1,
      }));
      expect(pageCount(sampleReport({ rows }))).toBe(2);
      expect(pageCount(sampleReport({ rows: [] }))).toBe(1);
    });
  });

  describe('encodeReport', () => {
    it('attaches content types and extensions', async () => {
      const report = sampleReport();

      const csv = await encodeReport(report, 'csv');
      expect(csv.contentType).toBe('text/csv; charset=utf-8');
      expect(csv.body.toString('utf8')).toBe(encodeCsv(report));

      const text = await encodeReport(report, 'text');
      expect(text.extension).toBe('txt');

      const pdf = await encodeReport(report, 'pdf');
      expect(pdf.contentType).toBe('application/pdf');
    });

    it('recognises supported formats', () => {
      expect(isReportFormat('pdf')).toBe(true);
      expect(isReportFormat('xlsx')).toBe(false);
    });

    it('names the download after the event and the report time', () => {
      expect(reportFilename(sampleReport({ eventId: 'Spring Fair/2024' }), 'csv')).toBe(
        'Spring_Fair_2024_registrations_19700101T000200Z.csv'
      );
      expect(reportFilename(sampleReport({ attendanceOnly: true }), 'pdf')).toBe(
        'E1_attendance_19700101T000200Z.pdf'
      );
    });
  });
});
