/**
 * Registration Ledger
 *
 * The authoritative record of which registrations exist and what state they
 * are in. Issuance, voiding and the check-in transition all go through the
 * store's constraint and compare-and-set primitives; nothing here reads a
 * state and then writes based on it without the store re-checking it.
 */

import { generateId, generateSecret } from '../crypto';
import {
  AlreadyCheckedInError,
  EventFullError,
  InvalidStateError,
  NotFoundError,
  ValidationError,
} from '../errors';
import { logger } from '../logging';
import { KeyedMutex } from '../scaling/keyed-mutex';
import { TokenCodec } from '../token';
import { CompareAndSetResult, LedgerStore, Registration, RegistrationState } from './types';

export interface IssueOptions {
  /** Scans after this instant are rejected as expired. */
  expiresAt?: number;
}

export interface RegistrationLedgerOptions {
  clock?: () => number;
  defaultCapacity?: number;
}

const MAX_ID_LENGTH = 128;

function assertIdentifier(field: string, value: string): void {
  if (value.trim().length === 0 || value.length > MAX_ID_LENGTH) {
    throw new ValidationError(`${field} must be a non-empty string of at most ${MAX_ID_LENGTH} characters`, {
      field,
    });
  }
}

export class RegistrationLedger {
  private readonly store: LedgerStore;
  private readonly codec: TokenCodec;
  private readonly clock: () => number;
  private readonly defaultCapacity?: number;
  // Capacity checks are serialized per event, never across events
  private readonly eventLocks = new KeyedMutex();

  constructor(store: LedgerStore, codec: TokenCodec, options: RegistrationLedgerOptions = {}) {
    this.store = store;
    this.codec = codec;
    this.clock = options.clock ?? Date.now;
    this.defaultCapacity = options.defaultCapacity;
  }

  async issue(subjectId: string, eventId: string, options: IssueOptions = {}): Promise<Registration> {
    assertIdentifier('subjectId', subjectId);
    assertIdentifier('eventId', eventId);

    return this.eventLocks.runExclusive(eventId, async () => {
      const capacity = await this.capacityOf(eventId);
      if (capacity !== undefined) {
        const existing = await this.store.listRegistrationsByEvent(eventId);
        const active = existing.filter((r) => r.state !== 'void').length;
        if (active >= capacity) {
          throw new EventFullError(eventId, capacity);
        }
      }

      const registration = await this.store.insertRegistration({
        registrationId: generateId(),
        subjectId,
        eventId,
        secret: generateSecret(),
        state: 'issued',
        createdAt: this.clock(),
        expiresAt: options.expiresAt,
      });

      logger.info('RegistrationLedger', 'Registration issued', {
        registrationId: registration.registrationId,
        subjectId,
        eventId,
      });
      return registration;
    });
  }

  /**
   * Sets the maximum number of non-void registrations of an event. Existing
   * registrations are kept when the limit drops below their count.
   */
  async setCapacity(eventId: string, capacity: number): Promise<void> {
    assertIdentifier('eventId', eventId);
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new ValidationError('capacity must be a positive integer', { capacity });
    }

    await this.eventLocks.runExclusive(eventId, () => this.store.setEventCapacity(eventId, capacity));
    logger.info('RegistrationLedger', 'Event capacity set', { eventId, capacity });
  }

  /**
   * Capacity in force for an event: its own, else the configured default.
   */
  async capacityOf(eventId: string): Promise<number | undefined> {
    return (await this.store.getEventCapacity(eventId)) ?? this.defaultCapacity;
  }

  async find(registrationId: string): Promise<Registration | undefined> {
    return this.store.getRegistration(registrationId);
  }

  async get(registrationId: string): Promise<Registration> {
    const registration = await this.store.getRegistration(registrationId);
    if (!registration) {
      throw new NotFoundError('Registration', registrationId);
    }
    return registration;
  }

  async listByEvent(eventId: string): Promise<Registration[]> {
    return this.store.listRegistrationsByEvent(eventId);
  }

  /**
   * Voids an issued registration. Voiding is terminal and forecloses check-in.
   */
  async void(registrationId: string, reason?: string): Promise<Registration> {
    const current = await this.get(registrationId);
    if (current.state === 'checked_in') {
      throw new AlreadyCheckedInError(registrationId, current.checkedInAt);
    }
    if (current.state === 'void') {
      throw new InvalidStateError(`Registration ${registrationId} is already void`, { registrationId });
    }

    const result = await this.store.compareAndSetState(registrationId, 'issued', 'void', {
      voidedAt: this.clock(),
      voidReason: reason,
    });
    if (!result.ok) {
      // Lost a race against a check-in or another void
      if (result.current?.state === 'checked_in') {
        throw new AlreadyCheckedInError(registrationId, result.current.checkedInAt);
      }
      throw new InvalidStateError(`Registration ${registrationId} changed state while voiding`, { registrationId });
    }

    logger.info('RegistrationLedger', 'Registration voided', { registrationId, reason });
    return result.registration;
  }

  /**
   * Privileged void that also applies to checked-in registrations. The
   * original check-in time is kept for the audit history.
   */
  async overrideVoid(registrationId: string, actorId: string, reason: string): Promise<Registration> {
    assertIdentifier('actorId', actorId);
    if (reason.trim().length === 0) {
      throw new ValidationError('An override requires a reason', { field: 'reason' });
    }

    const current = await this.get(registrationId);
    if (current.state === 'void') {
      throw new InvalidStateError(`Registration ${registrationId} is already void`, { registrationId });
    }

    const result = await this.store.compareAndSetState(registrationId, current.state, 'void', {
      voidedAt: this.clock(),
      voidReason: reason,
      voidedBy: actorId,
    });
    if (!result.ok) {
      throw new InvalidStateError(`Registration ${registrationId} changed state during override`, { registrationId });
    }

    logger.warn('RegistrationLedger', 'Registration voided by override', {
      registrationId,
      actorId,
      previousState: current.state,
      reason,
    });
    return result.registration;
  }

  /**
   * The only primitive that moves a registration to checked_in. Succeeds only
   * if the stored state still equals `expectedState`.
   */
  markCheckedIn(registrationId: string, expectedState: RegistrationState, at: number): Promise<CompareAndSetResult> {
    return this.store.compareAndSetState(registrationId, expectedState, 'checked_in', { checkedInAt: at });
  }

  /**
   * Regenerates the artifact of a registration. Deterministic, so a lost code
   * can be re-issued without invalidating the printed one.
   */
  async artifactFor(registrationId: string): Promise<string> {
    const registration = await this.get(registrationId);
    return this.codec.encode(registration.registrationId, registration.secret);
  }

  artifactOf(registration: Registration): string {
    return this.codec.encode(registration.registrationId, registration.secret);
  }
}
