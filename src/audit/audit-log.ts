/**
 * Check-In Audit Log
 *
 * Append-only log of check-in attempts with hash chains, in the manner of an
 * event store: each record is content-addressed and linked to the previous
 * record. With a file path the log is kept as JSON lines, appended and
 * fsynced record by record, and replayed on start.
 */

import * as fs from 'fs';
import * as path from 'path';
import { canonicalJson, taggedHash } from '../crypto';
import { StorageUnavailableError, errorMessage } from '../errors';
import { logger } from '../logging';
import {
  AuditFilter,
  ChainVerification,
  CheckInOutcome,
  CheckInReason,
  CheckInRecord,
  CheckInRecordInput,
  isCheckInOutcome,
} from './types';

const HASH_DOMAIN = 'CHECKIN_AUDIT_V1';

const REASONS: readonly CheckInReason[] = [
  'checked_in',
  'already_checked_in',
  'invalid_format',
  'not_found',
  'forged',
  'voided',
  'expired',
  'storage_unavailable',
];

export interface AuditLogOptions {
  /** JSON-lines file; omit for an in-memory log. */
  filePath?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function nullableString(row: Record<string, unknown>, field: string): string | null {
  const value = row[field];
  if (value === null || typeof value === 'string') return value;
  throw new Error(`${field} must be a string or null`);
}

function requireString(row: Record<string, unknown>, field: string): string {
  const value = row[field];
  if (typeof value !== 'string') throw new Error(`${field} must be a string`);
  return value;
}

function requireNumber(row: Record<string, unknown>, field: string): number {
  const value = row[field];
  if (typeof value !== 'number') throw new Error(`${field} must be a number`);
  return value;
}

function parseOutcome(value: string): CheckInOutcome {
  if (!isCheckInOutcome(value)) throw new Error(`unknown outcome "${value}"`);
  return value;
}

function parseReason(value: string): CheckInReason {
  const reason = REASONS.find((r) => r === value);
  if (!reason) throw new Error(`unknown reason "${value}"`);
  return reason;
}

export function parseCheckInRecord(raw: unknown): CheckInRecord {
  if (!isRecord(raw)) throw new Error('audit record is not an object');
  const method = requireString(raw, 'method');
  if (method !== 'scan' && method !== 'manual') throw new Error(`unknown method "${method}"`);
  return {
    sequence: requireNumber(raw, 'sequence'),
    registrationId: nullableString(raw, 'registrationId'),
    eventId: nullableString(raw, 'eventId'),
    subjectId: nullableString(raw, 'subjectId'),
    outcome: parseOutcome(requireString(raw, 'outcome')),
    reason: parseReason(requireString(raw, 'reason')),
    method,
    deviceId: requireString(raw, 'deviceId'),
    recordedAt: requireNumber(raw, 'recordedAt'),
    prevHash: requireString(raw, 'prevHash'),
    hash: requireString(raw, 'hash'),
  };
}

export function calculateRecordHash(record: Omit<CheckInRecord, 'hash'>): string {
  const canonical = {
    sequence: record.sequence,
    prevHash: record.prevHash,
    registrationId: record.registrationId,
    eventId: record.eventId,
    subjectId: record.subjectId,
    outcome: record.outcome,
    reason: record.reason,
    method: record.method,
    deviceId: record.deviceId,
    recordedAt: record.recordedAt,
  };
  return taggedHash(HASH_DOMAIN, canonicalJson(canonical));
}

function matches(record: CheckInRecord, filter: AuditFilter): boolean {
  if (filter.registrationId !== undefined && record.registrationId !== filter.registrationId) return false;
  if (filter.eventId !== undefined && record.eventId !== filter.eventId) return false;
  if (filter.deviceId !== undefined && record.deviceId !== filter.deviceId) return false;
  if (filter.outcomes !== undefined && !filter.outcomes.includes(record.outcome)) return false;
  return true;
}

export class AuditLog {
  private records: CheckInRecord[] = [];
  private readonly filePath?: string;

  constructor(options: AuditLogOptions = {}) {
    this.filePath = options.filePath;
    if (this.filePath) {
      this.load(this.filePath);
    }
  }

  get size(): number {
    return this.records.length;
  }

  get headHash(): string {
    return this.records.length > 0 ? this.records[this.records.length - 1].hash : '';
  }

  /**
   * Appends one record. Appends are synchronous, so records are chained in
   * exactly the order `append` is called.
   */
  async append(input: CheckInRecordInput): Promise<CheckInRecord> {
    const body: Omit<CheckInRecord, 'hash'> = {
      ...input,
      sequence: this.records.length + 1,
      prevHash: this.headHash,
    };
    const record: CheckInRecord = { ...body, hash: calculateRecordHash(body) };

    if (this.filePath) {
      try {
        this.writeLine(this.filePath, JSON.stringify(record));
      } catch (err) {
        throw new StorageUnavailableError(`Failed to append audit record: ${errorMessage(err)}`, err);
      }
    }

    this.records.push(record);
    return { ...record };
  }

  /**
   * Records matching the filter, in append order.
   */
  list(filter: AuditFilter = {}): CheckInRecord[] {
    return this.records.filter((record) => matches(record, filter)).map((record) => ({ ...record }));
  }

  /**
   * Most recent accepted check-ins, newest first.
   */
  recent(limit: number, filter: Omit<AuditFilter, 'outcomes'> = {}): CheckInRecord[] {
    const accepted = this.list({ ...filter, outcomes: ['accepted'] });
    return accepted.reverse().slice(0, Math.max(0, limit));
  }

  latestFor(registrationId: string, outcomes?: CheckInOutcome[]): CheckInRecord | undefined {
    for (let i = this.records.length - 1; i >= 0; i--) {
      const record = this.records[i];
      if (record.registrationId === registrationId && (!outcomes || outcomes.includes(record.outcome))) {
        return { ...record };
      }
    }
    return undefined;
  }

  verifyChain(): ChainVerification {
    let prevHash = '';
    for (let i = 0; i < this.records.length; i++) {
      const record = this.records[i];
      const { hash, ...body } = record;

      if (record.sequence !== i + 1) {
        return { valid: false, records: this.records.length, brokenAt: i + 1, error: 'Sequence gap' };
      }
      if (record.prevHash !== prevHash) {
        return { valid: false, records: this.records.length, brokenAt: record.sequence, error: 'Chain link broken' };
      }
      if (calculateRecordHash(body) !== hash) {
        return { valid: false, records: this.records.length, brokenAt: record.sequence, error: 'Record hash mismatch' };
      }
      prevHash = hash;
    }
    return { valid: true, records: this.records.length };
  }

  private load(filePath: string): void {
    if (!fs.existsSync(filePath)) {
      return;
    }

    const lines = fs.readFileSync(filePath, 'utf8').split('\n');
    for (let i = 0; i < lines.length; i++) {
      const line = lines[i].trim();
      if (!line) continue;
      try {
        this.records.push(parseCheckInRecord(JSON.parse(line)));
      } catch (err) {
        throw new StorageUnavailableError(`Audit log line ${i + 1} is unreadable: ${errorMessage(err)}`, err);
      }
    }

    const verification = this.verifyChain();
    if (verification.valid) {
      logger.info('AuditLog', 'Audit log replayed', { records: this.records.length });
    } else {
      logger.error('AuditLog', 'Audit chain integrity check failed', { ...verification });
    }
  }

  private writeLine(filePath: string, line: string): void {
    const dir = path.dirname(filePath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
    const bytes = Buffer.from(line + '\n', 'utf8');
    const fd = fs.openSync(filePath, 'a');
    try {
      const sizeBefore = fs.fstatSync(fd).size;
      try {
        let written = 0;
        while (written < bytes.length) {
          written += fs.writeSync(fd, bytes, written, bytes.length - written);
        }
        fs.fsyncSync(fd);
      } catch (err) {
        // A record that is not kept in memory must not stay on disk either
        this.truncate(fd, sizeBefore);
        throw err;
      }
    } finally {
      fs.closeSync(fd);
    }
  }

  private truncate(fd: number, size: number): void {
    try {
      fs.ftruncateSync(fd, size);
    } catch (err) {
      logger.error('AuditLog', 'Could not roll back a partial audit write', { size, error: errorMessage(err) });
    }
  }
}
