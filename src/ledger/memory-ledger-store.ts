import { DuplicateRegistrationError, InvalidStateError, StorageUnavailableError, errorMessage } from '../errors';
import { KeyedMutex } from '../scaling/keyed-mutex';
import {
  CompareAndSetResult,
  LedgerStore,
  NewRegistration,
  Registration,
  RegistrationPatch,
  RegistrationState,
  compareRegistrations,
} from './types';

function pairKey(subjectId: string, eventId: string): string {
  return `${subjectId}\u0000${eventId}`;
}

/**
 * In-process ledger store.
 *
 * The uniqueness check and the insert happen in one synchronous step, so two
 * concurrent `insertRegistration` calls for the same pair cannot both pass.
 * Conditional updates run under a lock scoped to the registration id.
 *
 * Subclasses make mutations durable by overriding `persist`; when it throws,
 * the in-memory change is rolled back and the caller sees
 * StorageUnavailableError.
 */
export class MemoryLedgerStore implements LedgerStore {
  protected registrations: Map<string, Registration> = new Map();
  protected pairIndex: Map<string, string> = new Map();
  protected capacities: Map<string, number> = new Map();
  protected nextSequence = 1;
  private rowLocks = new KeyedMutex();
  private closed = false;

  async insertRegistration(input: NewRegistration): Promise<Registration> {
    this.assertOpen();

    const key = pairKey(input.subjectId, input.eventId);
    if (this.pairIndex.has(key)) {
      throw new DuplicateRegistrationError(input.subjectId, input.eventId);
    }
    if (this.registrations.has(input.registrationId)) {
      throw new InvalidStateError(`Registration id ${input.registrationId} is already allocated`);
    }

    const row: Registration = { ...input, sequence: this.nextSequence };
    this.registrations.set(row.registrationId, row);
    this.pairIndex.set(key, row.registrationId);
    this.nextSequence++;

    try {
      this.persist();
    } catch (err) {
      this.registrations.delete(row.registrationId);
      this.pairIndex.delete(key);
      throw this.storageError('insert registration', err);
    }

    return { ...row };
  }

  async getRegistration(registrationId: string): Promise<Registration | undefined> {
    this.assertOpen();
    const row = this.registrations.get(registrationId);
    return row ? { ...row } : undefined;
  }

  async listRegistrationsByEvent(eventId: string): Promise<Registration[]> {
    this.assertOpen();
    const rows: Registration[] = [];
    for (const row of this.registrations.values()) {
      if (row.eventId === eventId) rows.push({ ...row });
    }
    return rows.sort(compareRegistrations);
  }

  compareAndSetState(
    registrationId: string,
    expected: RegistrationState,
    next: RegistrationState,
    patch: RegistrationPatch
  ): Promise<CompareAndSetResult> {
    return this.rowLocks.runExclusive<CompareAndSetResult>(registrationId, () => {
      this.assertOpen();

      const current = this.registrations.get(registrationId);
      if (!current || current.state !== expected) {
        return { ok: false, current: current ? { ...current } : undefined };
      }

      const updated: Registration = { ...current, ...patch, state: next };
      this.registrations.set(registrationId, updated);

      try {
        this.persist();
      } catch (err) {
        this.registrations.set(registrationId, current);
        throw this.storageError('update registration state', err);
      }

      return { ok: true, registration: { ...updated } };
    });
  }

  async getEventCapacity(eventId: string): Promise<number | undefined> {
    this.assertOpen();
    return this.capacities.get(eventId);
  }

  async setEventCapacity(eventId: string, capacity: number): Promise<void> {
    this.assertOpen();

    const previous = this.capacities.get(eventId);
    this.capacities.set(eventId, capacity);

    try {
      this.persist();
    } catch (err) {
      if (previous === undefined) {
        this.capacities.delete(eventId);
      } else {
        this.capacities.set(eventId, previous);
      }
      throw this.storageError('set event capacity', err);
    }
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  /**
   * Hook for durable subclasses; called after every in-memory mutation.
   */
  protected persist(): void {
    // Nothing to persist in memory-only mode
  }

  protected snapshotRows(): Registration[] {
    return Array.from(this.registrations.values()).sort((a, b) => a.sequence - b.sequence);
  }

  protected snapshotCapacities(): Record<string, number> {
    const entries = Array.from(this.capacities.entries()).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return Object.fromEntries(entries);
  }

  protected loadCapacities(capacities: Record<string, number>): void {
    this.capacities = new Map(Object.entries(capacities));
  }

  protected loadRows(rows: Registration[], nextSequence: number): void {
    this.registrations.clear();
    this.pairIndex.clear();
    let maxSequence = 0;
    for (const row of rows) {
      this.registrations.set(row.registrationId, { ...row });
      this.pairIndex.set(pairKey(row.subjectId, row.eventId), row.registrationId);
      maxSequence = Math.max(maxSequence, row.sequence);
    }
    this.nextSequence = Math.max(nextSequence, maxSequence + 1);
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new StorageUnavailableError('Ledger store is closed');
    }
  }

  private storageError(operation: string, err: unknown): StorageUnavailableError {
    if (err instanceof StorageUnavailableError) return err;
    return new StorageUnavailableError(`Failed to ${operation}: ${errorMessage(err)}`, err);
  }
}
