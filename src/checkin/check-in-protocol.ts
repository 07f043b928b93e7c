/**
 * Check-In Protocol
 *
 * The procedure a scanning device invokes to check a registration in:
 *
 *   decode ─▶ look up ─▶ verify ─▶ compare-and-set issued → checked_in
 *
 * Guarantees:
 * - at most one `accepted` outcome per registration, however many scans race
 *   (the transition is a per-registration compare-and-set in the store)
 * - repeating a scan is safe: the second attempt reports `duplicate` with the
 *   original check-in time instead of failing or counting twice
 * - every attempt appends exactly one audit record
 * - storage failures fail closed: StorageUnavailableError is thrown and
 *   nothing is reported as accepted
 *
 * No attempt is retried internally; callers retry and idempotence makes that
 * safe. An accepted check-in cannot be retracted.
 */

import { EventEmitter } from 'events';
import { AuditLog, CheckInMethod, CheckInOutcome, CheckInReason, CheckInRecord } from '../audit';
import { InvalidStateError, StorageUnavailableError, errorMessage } from '../errors';
import { Registration, RegistrationLedger, RegistrationView, toView } from '../ledger';
import { logger } from '../logging';
import { TokenCodec } from '../token';

export type InvalidReason = Exclude<CheckInReason, 'checked_in' | 'already_checked_in' | 'storage_unavailable'>;

export interface AcceptedScan {
  outcome: 'accepted';
  registration: RegistrationView;
  checkedInAt: number;
  record: CheckInRecord;
}

export interface DuplicateScan {
  outcome: 'duplicate';
  registration: RegistrationView;
  checkedInAt: number;
  message: string;
  record: CheckInRecord;
}

export interface InvalidScan {
  outcome: 'invalid';
  reason: InvalidReason;
  message: string;
  registration?: RegistrationView;
  record: CheckInRecord;
}

export type ScanResult = AcceptedScan | DuplicateScan | InvalidScan;

export interface CheckInProtocolOptions {
  clock?: () => number;
}

const INVALID_MESSAGES: Record<InvalidReason, string> = {
  invalid_format: 'Unrecognized check-in code',
  not_found: 'Unknown registration',
  forged: 'Check-in code failed verification',
  voided: 'registration voided',
  expired: 'Check-in code has expired',
};

interface AttemptContext {
  deviceId: string;
  method: CheckInMethod;
  registration?: Registration;
  // Set once the check-in transition has been committed to the ledger
  committedAt?: number;
}

export class CheckInProtocol extends EventEmitter {
  private readonly ledger: RegistrationLedger;
  private readonly audit: AuditLog;
  private readonly codec: TokenCodec;
  private readonly clock: () => number;

  constructor(ledger: RegistrationLedger, audit: AuditLog, codec: TokenCodec, options: CheckInProtocolOptions = {}) {
    super();
    this.ledger = ledger;
    this.audit = audit;
    this.codec = codec;
    this.clock = options.clock ?? Date.now;
  }

  /**
   * Attempts a check-in with a scanned artifact.
   */
  async attemptCheckIn(artifact: string, deviceId: string): Promise<ScanResult> {
    const context: AttemptContext = { deviceId, method: 'scan' };
    return this.failClosed(context, async () => {
      const decoded = this.codec.decode(artifact);
      if (!decoded.ok) {
        return this.reject(context, 'invalid_format');
      }

      const registration = await this.ledger.find(decoded.value.registrationId);
      if (!registration) {
        return this.reject(context, 'not_found');
      }
      context.registration = registration;

      if (this.codec.verify(decoded.value, registration.secret) === 'forged') {
        logger.warn('CheckInProtocol', 'Verification mismatch', {
          registrationId: registration.registrationId,
          deviceId,
        });
        return this.reject(context, 'forged');
      }

      return this.transition(context, registration);
    });
  }

  /**
   * Staff check-in by registration id, for attendees who cannot present their
   * code. Same transition, outcomes and audit record as a scan.
   */
  async manualCheckIn(registrationId: string, deviceId: string): Promise<ScanResult> {
    const context: AttemptContext = { deviceId, method: 'manual' };
    return this.failClosed(context, async () => {
      const registration = await this.ledger.find(registrationId);
      if (!registration) {
        return this.reject(context, 'not_found');
      }
      context.registration = registration;
      return this.transition(context, registration);
    });
  }

  private async transition(context: AttemptContext, registration: Registration): Promise<ScanResult> {
    const now = this.clock();

    if (registration.state === 'issued' && registration.expiresAt !== undefined && now > registration.expiresAt) {
      return this.reject(context, 'expired');
    }

    const result = await this.ledger.markCheckedIn(registration.registrationId, 'issued', now);
    if (result.ok) {
      context.committedAt = now;
      const record = await this.record(context, result.registration, 'accepted', 'checked_in', now);
      const accepted: AcceptedScan = {
        outcome: 'accepted',
        registration: toView(result.registration),
        checkedInAt: now,
        record,
      };
      logger.info('CheckInProtocol', 'Checked in', {
        registrationId: registration.registrationId,
        deviceId: context.deviceId,
        method: context.method,
      });
      this.emit('scan', accepted);
      return accepted;
    }

    const current = result.current;
    if (!current) {
      return this.reject(context, 'not_found');
    }
    context.registration = current;

    switch (current.state) {
      case 'checked_in': {
        const checkedInAt = current.checkedInAt ?? now;
        const record = await this.record(context, current, 'duplicate', 'already_checked_in');
        const duplicate: DuplicateScan = {
          outcome: 'duplicate',
          registration: toView(current),
          checkedInAt,
          message: `already checked in at ${new Date(checkedInAt).toISOString()}`,
          record,
        };
        this.emit('scan', duplicate);
        return duplicate;
      }
      case 'void':
        return this.reject(context, 'voided');
      case 'issued':
        // The store refused the transition while still reporting `issued`
        throw new InvalidStateError(`Registration ${current.registrationId} could not be checked in`, {
          registrationId: current.registrationId,
        });
    }
  }

  private async reject(context: AttemptContext, reason: InvalidReason): Promise<InvalidScan> {
    const outcome: CheckInOutcome = reason === 'expired' ? 'expired' : 'invalid';
    const record = await this.record(context, context.registration, outcome, reason);
    const invalid: InvalidScan = {
      outcome: 'invalid',
      reason,
      message: INVALID_MESSAGES[reason],
      registration: context.registration ? toView(context.registration) : undefined,
      record,
    };
    logger.debug('CheckInProtocol', 'Scan rejected', { reason, deviceId: context.deviceId });
    this.emit('scan', invalid);
    return invalid;
  }

  private record(
    context: AttemptContext,
    registration: Registration | undefined,
    outcome: CheckInOutcome,
    reason: CheckInReason,
    at: number = this.clock()
  ): Promise<CheckInRecord> {
    return this.audit.append({
      registrationId: registration?.registrationId ?? null,
      eventId: registration?.eventId ?? null,
      subjectId: registration?.subjectId ?? null,
      outcome,
      reason,
      method: context.method,
      deviceId: context.deviceId,
      recordedAt: at,
    });
  }

  /**
   * Runs an attempt; when storage is unavailable the attempt is audited as
   * invalid (if the audit log can still be written) and the error rethrown.
   * After a committed transition nothing is audited: a retried scan reports
   * the check-in as a duplicate.
   */
  private async failClosed(context: AttemptContext, attempt: () => Promise<ScanResult>): Promise<ScanResult> {
    try {
      return await attempt();
    } catch (err) {
      if (!(err instanceof StorageUnavailableError)) {
        throw err;
      }

      if (context.committedAt !== undefined) {
        // The registration is checked in; an `invalid` record would contradict the ledger
        logger.error('CheckInProtocol', 'Check-in committed but its audit record could not be written', {
          deviceId: context.deviceId,
          registrationId: context.registration?.registrationId,
          checkedInAt: context.committedAt,
          error: err.message,
        });
        this.emit('rejected', err);
        throw err;
      }

      logger.error('CheckInProtocol', 'Storage unavailable, scan rejected', {
        deviceId: context.deviceId,
        registrationId: context.registration?.registrationId,
        error: err.message,
      });
      try {
        await this.record(context, context.registration, 'invalid', 'storage_unavailable');
      } catch (auditErr) {
        logger.error('CheckInProtocol', 'Could not audit rejected scan', { error: errorMessage(auditErr) });
      }
      this.emit('rejected', err);
      throw err;
    }
  }
}
