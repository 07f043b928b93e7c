import request from 'supertest';
import { Express } from 'express';
import { loadConfig } from '../config';
import { StorageUnavailableError } from '../errors';
import { CheckInServices, createServices } from '../services';
import { createApp } from './server';

const STAFF = { 'x-role': 'staff', 'x-device-id': 'gate-1' };
const ADMIN = { 'x-role': 'admin', 'x-subject-id': 'admin-1' };

function student(subjectId: string): Record<string, string> {
  return { 'x-role': 'student', 'x-subject-id': subjectId };
}

describe('HTTP API', () => {
  let now: number;
  let services: CheckInServices;
  let app: Express;

  beforeEach(() => {
    now = 1_000;
    services = createServices(loadConfig({ CHECKIN_STORAGE: 'memory' }), { clock: () => now });
    app = createApp(services);
  });

  async function register(subjectId: string, eventId = 'E1'): Promise<{ registrationId: string; artifact: string }> {
    const res = await request(app).post('/api/registrations').set(student(subjectId)).send({ eventId }).expect(201);
    return { registrationId: res.body.registration.registrationId, artifact: res.body.artifact };
  }

  describe('registrations', () => {
    it('registers the calling student and never returns the secret', async () => {
      const res = await request(app).post('/api/registrations').set(student('student-a')).send({ eventId: 'E1' });

      expect(res.status).toBe(201);
      expect(res.body.success).toBe(true);
      expect(res.body.registration).toMatchObject({ subjectId: 'student-a', eventId: 'E1', state: 'issued' });
      expect(res.body.registration.secret).toBeUndefined();
      expect(res.body.artifact).toMatch(/^CHK1\.[0-9a-f]{32}\.[0-9a-f]{32}$/);
    });

    it('rejects a duplicate registration with 409', async () => {
      await register('student-a');
      const res = await request(app).post('/api/registrations').set(student('student-a')).send({ eventId: 'E1' });

      expect(res.status).toBe(409);
      expect(res.body).toEqual({
        success: false,
        error: { code: 'DUPLICATE_REGISTRATION', message: 'Subject student-a is already registered for event E1' },
      });
    });

    it('lets staff register another subject but not students', async () => {
      await request(app)
        .post('/api/registrations')
        .set(STAFF)
        .send({ eventId: 'E1', subjectId: 'student-b' })
        .expect(201);

      const res = await request(app)
        .post('/api/registrations')
        .set(student('student-a'))
        .send({ eventId: 'E1', subjectId: 'student-c' });
      expect(res.status).toBe(403);
      expect(res.body.error.code).toBe('FORBIDDEN');
    });

    it('validates the body', async () => {
      const res = await request(app).post('/api/registrations').set(student('student-a')).send({ eventId: 42 });
      expect(res.status).toBe(400);
      expect(res.body.error.code).toBe('VALIDATION_FAILED');

      const malformed = await request(app)
        .post('/api/registrations')
        .set(student('student-a'))
        .set('Content-Type', 'application/json')
        .send('{"eventId":');
      expect(malformed.status).toBe(400);
      expect(malformed.body.error.code).toBe('VALIDATION_FAILED');
    });

    it('answers 413 for an oversized body', async () => {
      const res = await request(app)
        .post('/api/registrations')
        .set(student('student-a'))
        .send({ eventId: 'E1', note: 'x'.repeat(100 * 1024) });

      expect(res.status).toBe(413);
      expect(res.body).toEqual({
        success: false,
        error: { code: 'PAYLOAD_TOO_LARGE', message: 'Request body is too large' },
      });
    });

    it('answers 409 EVENT_FULL past the capacity staff set', async () => {
      await request(app)
        .put('/api/events/E1/capacity')
        .set(STAFF)
        .send({ capacity: 1 })
        .expect(200, { success: true, eventId: 'E1', capacity: 1 });

      await register('s1');
      const res = await request(app).post('/api/registrations').set(student('s2')).send({ eventId: 'E1' });
      expect(res.status).toBe(409);
      expect(res.body.error.code).toBe('EVENT_FULL');
    });

    it('ignores a capacity sent with a registration', async () => {
      const limited = createApp(
        createServices(loadConfig({ CHECKIN_STORAGE: 'memory', CHECKIN_DEFAULT_CAPACITY: '1' }))
      );
      await request(limited).post('/api/registrations').set(student('s1')).send({ eventId: 'E1' }).expect(201);

      const res = await request(limited)
        .post('/api/registrations')
        .set(student('s2'))
        .send({ eventId: 'E1', capacity: 100 });

      expect(res.status).toBe(409);
      expect(res.body.error.code).toBe('EVENT_FULL');
    });

    it('lets only staff and admins set capacity', async () => {
      await request(app).put('/api/events/E1/capacity').set(student('s1')).send({ capacity: 100 }).expect(403);
      await request(app).put('/api/events/E1/capacity').set(STAFF).send({ capacity: 0 }).expect(400);
      await request(app).put('/api/events/E1/capacity').set(STAFF).send({}).expect(400);
    });

    it('shows a registration to its owner and to staff only', async () => {
      const { registrationId, artifact } = await register('student-a');

      const own = await request(app).get(`/api/registrations/${registrationId}/artifact`).set(student('student-a'));
      expect(own.body.artifact).toBe(artifact);

      await request(app).get(`/api/registrations/${registrationId}`).set(STAFF).expect(200);
      await request(app).get(`/api/registrations/${registrationId}`).set(student('student-b')).expect(403);
      await request(app).get(`/api/registrations/${'0'.repeat(32)}`).set(STAFF).expect(404);
    });

    it('serves the artifact as a QR image', async () => {
      const { registrationId } = await register('student-a');

      const png = await request(app).get(`/api/registrations/${registrationId}/qr.png`).set(student('student-a'));
      expect(png.status).toBe(200);
      expect(png.headers['content-type']).toBe('image/png');

      const svg = await request(app).get(`/api/registrations/${registrationId}/qr.svg`).set(student('student-a'));
      expect(svg.status).toBe(200);
      expect(svg.headers['content-type']).toContain('image/svg+xml');
    });
  });

  describe('voiding', () => {
    it('is reserved to admins', async () => {
      const { registrationId } = await register('student-a');
      await request(app).post(`/api/registrations/${registrationId}/void`).set(STAFF).send({}).expect(403);

      const res = await request(app)
        .post(`/api/registrations/${registrationId}/void`)
        .set(ADMIN)
        .send({ reason: 'withdrew' });
      expect(res.status).toBe(200);
      expect(res.body.registration.state).toBe('void');
    });

    it('refuses to void a checked-in registration unless overridden', async () => {
      const { registrationId, artifact } = await register('student-a');
      await request(app).post('/api/checkins/scan').set(STAFF).send({ artifact }).expect(200);

      const plain = await request(app).post(`/api/registrations/${registrationId}/void`).set(ADMIN).send({});
      expect(plain.status).toBe(409);
      expect(plain.body.error.code).toBe('ALREADY_CHECKED_IN');

      await request(app).post(`/api/registrations/${registrationId}/void-override`).set(ADMIN).send({}).expect(400);

      const override = await request(app)
        .post(`/api/registrations/${registrationId}/void-override`)
        .set(ADMIN)
        .send({ reason: 'scanned the wrong badge' });
      expect(override.status).toBe(200);
      expect(override.body.registration).toMatchObject({ state: 'void', voidedBy: 'admin-1' });
    });
  });

  describe('check-in', () => {
    it('accepts, then reports duplicates, then rejects garbage', async () => {
      const { artifact } = await register('student-a');
      now = 5_000;

      const accepted = await request(app).post('/api/checkins/scan').set(STAFF).send({ artifact });
      expect(accepted.status).toBe(200);
      expect(accepted.body).toMatchObject({ success: true, outcome: 'accepted', checkedInAt: 5_000 });

      const duplicate = await request(app).post('/api/checkins/scan').set(STAFF).send({ artifact });
      expect(duplicate.body).toMatchObject({
        outcome: 'duplicate',
        message: 'already checked in at 1970-01-01T00:00:05.000Z',
      });

      const invalid = await request(app).post('/api/checkins/scan').set(STAFF).send({ artifact: 'nope' });
      expect(invalid.body).toEqual({
        success: true,
        outcome: 'invalid',
        reason: 'invalid_format',
        message: 'Unrecognized check-in code',
      });
    });

    it('requires staff and a device id', async () => {
      const { artifact } = await register('student-a');

      await request(app).post('/api/checkins/scan').set(student('student-a')).send({ artifact }).expect(403);
      const res = await request(app).post('/api/checkins/scan').set({ 'x-role': 'staff' }).send({ artifact });
      expect(res.status).toBe(400);
    });

    it('checks in manually by registration id', async () => {
      const { registrationId } = await register('student-a');
      const res = await request(app).post('/api/checkins/manual').set(STAFF).send({ registrationId });
      expect(res.body.outcome).toBe('accepted');
    });

    it('answers 503 when storage is unavailable', async () => {
      const { artifact } = await register('student-a');
      jest
        .spyOn(services.store, 'compareAndSetState')
        .mockRejectedValue(new StorageUnavailableError('disk unavailable'));

      const res = await request(app).post('/api/checkins/scan').set(STAFF).send({ artifact });
      expect(res.status).toBe(503);
      expect(res.body.error.code).toBe('STORAGE_UNAVAILABLE');
    });

    it('pages through the audit history with filters', async () => {
      const { artifact } = await register('student-a');
      await request(app).post('/api/checkins/scan').set(STAFF).send({ artifact });
      await request(app).post('/api/checkins/scan').set(STAFF).send({ artifact });
      await request(app).post('/api/checkins/scan').set(STAFF).send({ artifact: 'nope' });

      const page = await request(app).get('/api/checkins?limit=2').set(STAFF);
      expect(page.body.items.map((r: { outcome: string }) => r.outcome)).toEqual(['accepted', 'duplicate']);
      expect(page.body.pagination).toEqual({ page: 1, limit: 2, total: 3, totalPages: 2, hasMore: true });

      const invalid = await request(app).get('/api/checkins?outcome=invalid').set(STAFF);
      expect(invalid.body.items).toHaveLength(1);

      await request(app).get('/api/checkins?outcome=maybe').set(STAFF).expect(400);

      const recent = await request(app).get('/api/checkins/recent').set(STAFF);
      expect(recent.body.items).toHaveLength(1);
    });

    it('verifies the audit chain for admins', async () => {
      const { artifact } = await register('student-a');
      await request(app).post('/api/checkins/scan').set(STAFF).send({ artifact });

      const res = await request(app).get('/api/audit/verify').set(ADMIN);
      expect(res.body).toEqual({ success: true, valid: true, records: 1 });
    });
  });

  describe('reports', () => {
    it('exports the event as CSV with a stable file name', async () => {
      now = 1_000;
      await register('student-a');
      now = 2_000;
      const b = await register('student-b');
      now = 3_000;
      await request(app).post('/api/checkins/scan').set(STAFF).send({ artifact: b.artifact });

      const res = await request(app).get('/api/events/E1/report?format=csv').set(STAFF);

      expect(res.status).toBe(200);
      expect(res.headers['content-type']).toBe('text/csv; charset=utf-8');
      expect(res.headers['content-disposition']).toBe(
        'attachment; filename="E1_registrations_19700101T000003Z.csv"'
      );
      const lines = res.text.replace('\uFEFF', '').trim().split('\r\n');
      expect(lines).toHaveLength(3);
      expect(lines[1]).toMatch(/^1,[0-9a-f]{32},student-a,,issued,1970-01-01T00:00:01\.000Z,$/);
      expect(lines[2]).toMatch(
        /^2,[0-9a-f]{32},student-b,,checked-in,1970-01-01T00:00:02\.000Z,1970-01-01T00:00:03\.000Z$/
      );
    });

    it('returns JSON and honours attendanceOnly', async () => {
      const a = await register('student-a');
      await register('student-b');
      await request(app).post('/api/checkins/scan').set(STAFF).send({ artifact: a.artifact });

      const res = await request(app).get('/api/events/E1/report?format=json&attendanceOnly=true').set(STAFF);

      expect(res.body.rows.map((r: { subjectId: string }) => r.subjectId)).toEqual(['student-a']);
      expect(res.body.attendanceOnly).toBe(true);
    });

    it('rejects unknown formats and non-staff callers', async () => {
      await request(app).get('/api/events/E1/report?format=xlsx').set(STAFF).expect(400);
      await request(app).get('/api/events/E1/report').set(student('student-a')).expect(403);
    });
  });

  describe('operations', () => {
    it('reports health and metrics', async () => {
      const { artifact } = await register('student-a');
      await request(app).post('/api/checkins/scan').set(STAFF).send({ artifact });
      await request(app).post('/api/checkins/scan').set(STAFF).send({ artifact });

      await request(app).get('/health').expect(200, { status: 'ok', auditRecords: 2 });

      const metrics = await request(app).get('/metrics');
      expect(metrics.text).toContain('checkin_registrations_issued_total 1\n');
      expect(metrics.text).toContain('checkin_scans_accepted_total 1\n');
      expect(metrics.text).toContain('checkin_scans_duplicate_total 1\n');
    });

    it('answers unknown routes with 404', async () => {
      const res = await request(app).get('/api/nowhere');
      expect(res.status).toBe(404);
      expect(res.body.error.code).toBe('NOT_FOUND');
    });
  });
});
