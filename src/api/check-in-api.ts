/**
 * HTTP handlers for registration, check-in, audit and report operations.
 *
 * Every handler answers `{ success: true, ... }` or
 * `{ success: false, error: { code, message } }`. Scan outcomes, including
 * duplicates and invalid codes, are successful requests.
 */

import { NextFunction, Request, Response, Router } from 'express';
import { AuditLog, CheckInOutcome, isCheckInOutcome } from '../audit';
import { CheckInProtocol, ScanResult } from '../checkin';
import { ForbiddenError, PayloadTooLargeError, ValidationError, errorMessage, isCheckInError } from '../errors';
import { Registration, RegistrationLedger, toView } from '../ledger';
import { logger } from '../logging';
import { ReportBuilder, encodeReport, isReportFormat, reportFilename } from '../report';
import { MetricsCollector } from '../scaling/metrics';
import { paginate, parsePagination } from '../scaling/pagination';
import { QrRenderer } from '../token';
import { Identity, identityOf, requireRole } from './identity';

export interface CheckInApiDeps {
  ledger: RegistrationLedger;
  audit: AuditLog;
  protocol: CheckInProtocol;
  reports: ReportBuilder;
  qr: QrRenderer;
  metrics: MetricsCollector;
}

type Body = Record<string, unknown>;

function bodyOf(req: Request): Body {
  const body: unknown = req.body;
  if (typeof body !== 'object' || body === null || Array.isArray(body)) {
    return {};
  }
  return Object.fromEntries(Object.entries(body));
}

function requiredString(body: Body, field: string): string {
  const value = body[field];
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw new ValidationError(`${field} is required`, { field });
  }
  return value;
}

function optionalString(body: Body, field: string): string | undefined {
  const value = body[field];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') {
    throw new ValidationError(`${field} must be a string`, { field });
  }
  return value;
}

function optionalInteger(body: Body, field: string): number | undefined {
  const value = body[field];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw new ValidationError(`${field} must be an integer`, { field });
  }
  return value;
}

function queryString(req: Request, name: string): string | undefined {
  const value = req.query[name];
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

function isPrivileged(identity: Identity): boolean {
  return identity.role === 'staff' || identity.role === 'admin';
}

function requireDevice(identity: Identity): string {
  if (!identity.deviceId) {
    throw new ValidationError('x-device-id header is required', { field: 'x-device-id' });
  }
  return identity.deviceId;
}

export function sendError(res: Response, err: unknown): void {
  if (isCheckInError(err)) {
    res.status(err.status).json({ success: false, error: { code: err.code, message: err.message } });
    return;
  }
  logger.error('CheckInApi', 'Unhandled error', { error: errorMessage(err) });
  res.status(500).json({ success: false, error: { code: 'INTERNAL', message: 'Internal server error' } });
}

interface BodyParserError {
  type: string;
  status: number;
}

// express.json() reports failures as http-errors carrying `type` and `status`
function bodyParserError(err: unknown): BodyParserError | undefined {
  if (typeof err !== 'object' || err === null) return undefined;
  if (!('type' in err) || typeof err.type !== 'string') return undefined;
  if (!('status' in err) || typeof err.status !== 'number') return undefined;
  return { type: err.type, status: err.status };
}

/**
 * Final express error handler, for errors passed to `next` by middleware.
 */
export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction): void {
  const parserError = bodyParserError(err);
  if (parserError?.type === 'entity.too.large') {
    sendError(res, new PayloadTooLargeError('Request body is too large'));
    return;
  }
  if (parserError !== undefined && parserError.status >= 400 && parserError.status < 500) {
    sendError(res, new ValidationError('Malformed request body', { type: parserError.type }));
    return;
  }
  sendError(res, err);
}

function scanBody(result: ScanResult): Body {
  switch (result.outcome) {
    case 'accepted':
      return {
        success: true,
        outcome: 'accepted',
        registration: result.registration,
        checkedInAt: result.checkedInAt,
      };
    case 'duplicate':
      return {
        success: true,
        outcome: 'duplicate',
        message: result.message,
        registration: result.registration,
        checkedInAt: result.checkedInAt,
      };
    case 'invalid':
      return {
        success: true,
        outcome: 'invalid',
        reason: result.reason,
        message: result.message,
      };
  }
}

export class CheckInApi {
  private readonly deps: CheckInApiDeps;

  constructor(deps: CheckInApiDeps) {
    this.deps = deps;
  }

  routes(): Router {
    const router = Router();

    router.post('/registrations', (req, res) => this.issue(req, res));
    router.get('/registrations/:id', (req, res) => this.getRegistration(req, res));
    router.get('/registrations/:id/artifact', (req, res) => this.getArtifact(req, res));
    router.get('/registrations/:id/qr.png', (req, res) => this.getQr(req, res, 'png'));
    router.get('/registrations/:id/qr.svg', (req, res) => this.getQr(req, res, 'svg'));
    router.post('/registrations/:id/void', requireRole('admin'), (req, res) => this.voidRegistration(req, res));
    router.post('/registrations/:id/void-override', requireRole('admin'), (req, res) => this.overrideVoid(req, res));

    router.post('/checkins/scan', requireRole('staff', 'admin'), (req, res) => this.scan(req, res));
    router.post('/checkins/manual', requireRole('staff', 'admin'), (req, res) => this.manual(req, res));
    router.get('/checkins/recent', requireRole('staff', 'admin'), (req, res) => this.recent(req, res));
    router.get('/checkins', requireRole('staff', 'admin'), (req, res) => this.history(req, res));

    router.get('/audit/verify', requireRole('admin'), (req, res) => this.verifyAudit(req, res));
    router.put('/events/:eventId/capacity', requireRole('staff', 'admin'), (req, res) => this.setCapacity(req, res));
    router.get('/events/:eventId/report', requireRole('staff', 'admin'), (req, res) => this.report(req, res));

    return router;
  }

  /**
   * Students register themselves; staff and admins may register any subject.
   */
  async issue(req: Request, res: Response): Promise<void> {
    try {
      const identity = identityOf(req);
      const body = bodyOf(req);
      const eventId = requiredString(body, 'eventId');
      const requestedSubject = optionalString(body, 'subjectId');

      let subjectId: string;
      if (requestedSubject !== undefined && isPrivileged(identity)) {
        subjectId = requestedSubject;
      } else if (identity.subjectId) {
        if (requestedSubject !== undefined && requestedSubject !== identity.subjectId) {
          throw new ForbiddenError('Students may only register themselves');
        }
        subjectId = identity.subjectId;
      } else {
        throw new ValidationError('subjectId is required', { field: 'subjectId' });
      }

      const registration = await this.deps.ledger.issue(subjectId, eventId, {
        expiresAt: optionalInteger(body, 'expiresAt'),
      });
      this.deps.metrics.incCounter('checkin_registrations_issued_total');

      res.status(201).json({
        success: true,
        registration: toView(registration),
        artifact: this.deps.ledger.artifactOf(registration),
      });
    } catch (err) {
      sendError(res, err);
    }
  }

  async getRegistration(req: Request, res: Response): Promise<void> {
    try {
      const registration = await this.visibleRegistration(req);
      res.json({ success: true, registration: toView(registration) });
    } catch (err) {
      sendError(res, err);
    }
  }

  async getArtifact(req: Request, res: Response): Promise<void> {
    try {
      const registration = await this.visibleRegistration(req);
      res.json({
        success: true,
        registrationId: registration.registrationId,
        artifact: this.deps.ledger.artifactOf(registration),
      });
    } catch (err) {
      sendError(res, err);
    }
  }

  async getQr(req: Request, res: Response, kind: 'png' | 'svg'): Promise<void> {
    try {
      const registration = await this.visibleRegistration(req);
      const artifact = this.deps.ledger.artifactOf(registration);
      if (kind === 'png') {
        res.type('image/png').send(await this.deps.qr.renderPng(artifact));
      } else {
        res.type('image/svg+xml').send(await this.deps.qr.renderSvg(artifact));
      }
    } catch (err) {
      sendError(res, err);
    }
  }

  async voidRegistration(req: Request, res: Response): Promise<void> {
    try {
      const reason = optionalString(bodyOf(req), 'reason');
      const registration = await this.deps.ledger.void(req.params.id, reason);
      this.deps.metrics.incCounter('checkin_registrations_voided_total');
      res.json({ success: true, registration: toView(registration) });
    } catch (err) {
      sendError(res, err);
    }
  }

  async overrideVoid(req: Request, res: Response): Promise<void> {
    try {
      const identity = identityOf(req);
      const reason = requiredString(bodyOf(req), 'reason');
      const actorId = identity.subjectId ?? identity.deviceId ?? 'admin';
      const registration = await this.deps.ledger.overrideVoid(req.params.id, actorId, reason);
      this.deps.metrics.incCounter('checkin_registrations_voided_total');
      res.json({ success: true, registration: toView(registration) });
    } catch (err) {
      sendError(res, err);
    }
  }

  async scan(req: Request, res: Response): Promise<void> {
    try {
      const deviceId = requireDevice(identityOf(req));
      const artifact = requiredString(bodyOf(req), 'artifact');
      const result = await this.deps.protocol.attemptCheckIn(artifact, deviceId);
      res.json(scanBody(result));
    } catch (err) {
      sendError(res, err);
    }
  }

  async manual(req: Request, res: Response): Promise<void> {
    try {
      const deviceId = requireDevice(identityOf(req));
      const registrationId = requiredString(bodyOf(req), 'registrationId');
      const result = await this.deps.protocol.manualCheckIn(registrationId, deviceId);
      res.json(scanBody(result));
    } catch (err) {
      sendError(res, err);
    }
  }

  async history(req: Request, res: Response): Promise<void> {
    try {
      const outcome = queryString(req, 'outcome');
      let outcomes: CheckInOutcome[] | undefined;
      if (outcome !== undefined) {
        if (!isCheckInOutcome(outcome)) {
          throw new ValidationError(`Unknown outcome "${outcome}"`, { field: 'outcome' });
        }
        outcomes = [outcome];
      }

      const records = this.deps.audit.list({
        registrationId: queryString(req, 'registrationId'),
        eventId: queryString(req, 'eventId'),
        deviceId: queryString(req, 'deviceId'),
        outcomes,
      });
      res.json({ success: true, ...paginate(records, parsePagination(req.query)) });
    } catch (err) {
      sendError(res, err);
    }
  }

  async recent(req: Request, res: Response): Promise<void> {
    try {
      const raw = queryString(req, 'limit');
      const limit = raw === undefined ? 20 : Math.min(Math.max(parseInt(raw, 10) || 20, 1), 200);
      const records = this.deps.audit.recent(limit, { eventId: queryString(req, 'eventId') });
      res.json({ success: true, items: records });
    } catch (err) {
      sendError(res, err);
    }
  }

  async verifyAudit(_req: Request, res: Response): Promise<void> {
    try {
      res.json({ success: true, ...this.deps.audit.verifyChain() });
    } catch (err) {
      sendError(res, err);
    }
  }

  /**
   * Event capacity is a property of the event, set by staff, never by the
   * registering caller.
   */
  async setCapacity(req: Request, res: Response): Promise<void> {
    try {
      const capacity = optionalInteger(bodyOf(req), 'capacity');
      if (capacity === undefined) {
        throw new ValidationError('capacity is required', { field: 'capacity' });
      }
      await this.deps.ledger.setCapacity(req.params.eventId, capacity);
      res.json({ success: true, eventId: req.params.eventId, capacity });
    } catch (err) {
      sendError(res, err);
    }
  }

  async report(req: Request, res: Response): Promise<void> {
    try {
      const format = queryString(req, 'format') ?? 'csv';
      if (!isReportFormat(format)) {
        throw new ValidationError(`Unknown report format "${format}"`, { field: 'format' });
      }
      const attendanceOnly = queryString(req, 'attendanceOnly') === 'true';

      const report = await this.deps.reports.buildReport(req.params.eventId, { attendanceOnly });
      const encoded = await encodeReport(report, format);

      res.setHeader('Content-Type', encoded.contentType);
      if (format !== 'json') {
        res.setHeader('Content-Disposition', `attachment; filename="${reportFilename(report, encoded.extension)}"`);
      }
      res.send(encoded.body);
    } catch (err) {
      sendError(res, err);
    }
  }

  /**
   * Students only see their own registrations.
   */
  private async visibleRegistration(req: Request): Promise<Registration> {
    const identity = identityOf(req);
    const registration = await this.deps.ledger.get(req.params.id);
    if (!isPrivileged(identity) && registration.subjectId !== identity.subjectId) {
      throw new ForbiddenError('Registration belongs to another subject');
    }
    return registration;
  }
}
