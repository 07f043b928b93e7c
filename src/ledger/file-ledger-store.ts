import * as path from 'path';
import { StorageUnavailableError } from '../errors';
import { logger } from '../logging';
import { AtomicStorage } from '../storage';
import { MemoryLedgerStore } from './memory-ledger-store';
import { Registration, RegistrationState } from './types';

interface LedgerSnapshot {
  nextSequence: number;
  registrations: Registration[];
  capacities: Record<string, number>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalNumber(row: Record<string, unknown>, field: string): number | undefined {
  const value = row[field];
  if (value === undefined) return undefined;
  if (typeof value !== 'number') throw new Error(`${field} must be a number`);
  return value;
}

function optionalString(row: Record<string, unknown>, field: string): string | undefined {
  const value = row[field];
  if (value === undefined) return undefined;
  if (typeof value !== 'string') throw new Error(`${field} must be a string`);
  return value;
}

function requireString(row: Record<string, unknown>, field: string): string {
  const value = optionalString(row, field);
  if (value === undefined) throw new Error(`${field} is missing`);
  return value;
}

function requireNumber(row: Record<string, unknown>, field: string): number {
  const value = optionalNumber(row, field);
  if (value === undefined) throw new Error(`${field} is missing`);
  return value;
}

function parseState(value: string): RegistrationState {
  switch (value) {
    case 'issued':
    case 'checked_in':
    case 'void':
      return value;
    default:
      throw new Error(`unknown state "${value}"`);
  }
}

function parseRegistration(raw: unknown): Registration {
  if (!isRecord(raw)) throw new Error('registration row is not an object');
  return {
    registrationId: requireString(raw, 'registrationId'),
    subjectId: requireString(raw, 'subjectId'),
    eventId: requireString(raw, 'eventId'),
    secret: requireString(raw, 'secret'),
    state: parseState(requireString(raw, 'state')),
    createdAt: requireNumber(raw, 'createdAt'),
    sequence: requireNumber(raw, 'sequence'),
    expiresAt: optionalNumber(raw, 'expiresAt'),
    checkedInAt: optionalNumber(raw, 'checkedInAt'),
    voidedAt: optionalNumber(raw, 'voidedAt'),
    voidReason: optionalString(raw, 'voidReason'),
    voidedBy: optionalString(raw, 'voidedBy'),
  };
}

function parseCapacities(raw: unknown): Record<string, number> {
  if (raw === undefined) return {};
  if (!isRecord(raw)) throw new Error('capacities must be an object');
  const capacities: Record<string, number> = {};
  for (const [eventId, value] of Object.entries(raw)) {
    if (typeof value !== 'number' || !Number.isInteger(value) || value < 1) {
      throw new Error(`capacity of ${eventId} must be a positive integer`);
    }
    capacities[eventId] = value;
  }
  return capacities;
}

export function parseLedgerSnapshot(raw: unknown): LedgerSnapshot {
  if (!isRecord(raw) || !Array.isArray(raw.registrations)) {
    throw new Error('ledger snapshot has no registrations array');
  }
  const nextSequence = typeof raw.nextSequence === 'number' ? raw.nextSequence : 1;
  return {
    nextSequence,
    registrations: raw.registrations.map(parseRegistration),
    capacities: parseCapacities(raw.capacities),
  };
}

/**
 * Durable ledger store: the in-memory store plus an atomically replaced,
 * checksummed JSON snapshot written after every committed mutation.
 */
export class FileLedgerStore extends MemoryLedgerStore {
  readonly filePath: string;

  constructor(dataDir: string) {
    super();
    this.filePath = path.join(dataDir, 'ledger.json');
    AtomicStorage.cleanupTempFiles(dataDir);

    if (!AtomicStorage.exists(this.filePath)) {
      logger.info('FileLedgerStore', 'Starting with an empty ledger', { filePath: this.filePath });
      return;
    }

    const result = AtomicStorage.readFileAtomic(this.filePath, parseLedgerSnapshot);
    if (!result.success) {
      throw new StorageUnavailableError(`Ledger snapshot unreadable: ${result.error}`);
    }

    this.loadRows(result.data.registrations, result.data.nextSequence);
    this.loadCapacities(result.data.capacities);
    logger.info('FileLedgerStore', 'Loaded ledger snapshot', {
      registrations: result.data.registrations.length,
      recoveredFromBackup: result.recoveredFromBackup === true,
    });
  }

  protected persist(): void {
    const snapshot: LedgerSnapshot = {
      nextSequence: this.nextSequence,
      registrations: this.snapshotRows(),
      capacities: this.snapshotCapacities(),
    };
    AtomicStorage.writeFileAtomic(this.filePath, snapshot);
  }
}
