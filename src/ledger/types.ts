/**
 * Registration Ledger Types
 *
 * A registration binds one subject to one event and owns the secret its
 * check-in artifact is verified against. State moves forward only:
 *
 *   issued ──▶ checked_in
 *     │            │ (privileged override only)
 *     ▼            ▼
 *    void ◀────────┘
 */

export type RegistrationState = 'issued' | 'checked_in' | 'void';

export interface Registration {
  registrationId: string;
  subjectId: string;
  eventId: string;
  secret: string;
  state: RegistrationState;
  createdAt: number;
  // Insertion order; breaks ties between equal createdAt values
  sequence: number;
  expiresAt?: number;
  checkedInAt?: number;
  voidedAt?: number;
  voidReason?: string;
  voidedBy?: string;
}

/**
 * Registration as shown to anyone outside the ledger: no secret.
 */
export type RegistrationView = Omit<Registration, 'secret'>;

export type NewRegistration = Omit<Registration, 'sequence'>;

export type RegistrationPatch = Pick<Registration, 'checkedInAt' | 'voidedAt' | 'voidReason' | 'voidedBy'>;

export type CompareAndSetResult =
  | { ok: true; registration: Registration }
  | { ok: false; current: Registration | undefined };

/**
 * Persistence contract of the ledger. Mirrors a relational table with a
 * unique (subjectId, eventId) constraint and a per-row conditional update:
 *
 *   UPDATE registrations SET state = :next, ...
 *    WHERE registration_id = :id AND state = :expected
 *
 * Implementations raise StorageUnavailableError when the backing store cannot
 * be reached, and DuplicateRegistrationError from `insertRegistration` when
 * the pair already exists. A failed call changes nothing.
 */
export interface LedgerStore {
  insertRegistration(registration: NewRegistration): Promise<Registration>;
  getRegistration(registrationId: string): Promise<Registration | undefined>;
  /** Ordered by createdAt, then sequence. */
  listRegistrationsByEvent(eventId: string): Promise<Registration[]>;
  compareAndSetState(
    registrationId: string,
    expected: RegistrationState,
    next: RegistrationState,
    patch: RegistrationPatch
  ): Promise<CompareAndSetResult>;
  /** Maximum number of non-void registrations; undefined when unlimited. */
  getEventCapacity(eventId: string): Promise<number | undefined>;
  setEventCapacity(eventId: string, capacity: number): Promise<void>;
  close(): Promise<void>;
}

export function toView(registration: Registration): RegistrationView {
  const { secret: _secret, ...view } = registration;
  return view;
}

export function compareRegistrations(a: Registration, b: Registration): number {
  return a.createdAt - b.createdAt || a.sequence - b.sequence;
}
