/**
 * Check-in audit trail types.
 *
 * Every verification attempt, successful or not, produces exactly one record.
 * Records are immutable and hash-chained: each carries the hash of its
 * predecessor, so rewriting any past record breaks every later link.
 */

export type CheckInOutcome = 'accepted' | 'duplicate' | 'invalid' | 'expired';

export type CheckInReason =
  | 'checked_in'
  | 'already_checked_in'
  | 'invalid_format'
  | 'not_found'
  | 'forged'
  | 'voided'
  | 'expired'
  | 'storage_unavailable';

export type CheckInMethod = 'scan' | 'manual';

export interface CheckInRecordInput {
  // null when the artifact could not be decoded or resolved
  registrationId: string | null;
  eventId: string | null;
  subjectId: string | null;
  outcome: CheckInOutcome;
  reason: CheckInReason;
  method: CheckInMethod;
  deviceId: string;
  recordedAt: number;
}

export interface CheckInRecord extends CheckInRecordInput {
  sequence: number;
  prevHash: string;
  hash: string;
}

export interface AuditFilter {
  registrationId?: string;
  eventId?: string;
  deviceId?: string;
  outcomes?: CheckInOutcome[];
}

export interface ChainVerification {
  valid: boolean;
  records: number;
  brokenAt?: number;
  error?: string;
}

export const CHECK_IN_OUTCOMES: readonly CheckInOutcome[] = ['accepted', 'duplicate', 'invalid', 'expired'];

export function isCheckInOutcome(value: string): value is CheckInOutcome {
  return CHECK_IN_OUTCOMES.some((outcome) => outcome === value);
}
