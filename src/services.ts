/**
 * Wires the check-in components together from a configuration.
 */

import * as path from 'path';
import { AppOptions } from './api';
import { AuditLog } from './audit';
import { CheckInProtocol } from './checkin';
import { CheckInConfig } from './config';
import { FileLedgerStore, LedgerStore, MemoryLedgerStore, RegistrationLedger } from './ledger';
import { ReportBuilder, SubjectDirectory } from './report';
import { MetricsCollector } from './scaling/metrics';
import { QrRenderer, TokenCodec } from './token';

export interface CheckInServices extends AppOptions {
  store: LedgerStore;
  codec: TokenCodec;
}

export interface ServiceOverrides {
  clock?: () => number;
  directory?: SubjectDirectory;
}

export function createServices(config: CheckInConfig, overrides: ServiceOverrides = {}): CheckInServices {
  const persistent = config.storage === 'file';
  const store: LedgerStore = persistent ? new FileLedgerStore(config.dataDir) : new MemoryLedgerStore();
  const audit = new AuditLog(persistent ? { filePath: path.join(config.dataDir, 'audit.log.jsonl') } : {});

  const codec = new TokenCodec(config.tokenPrefix);
  const ledger = new RegistrationLedger(store, codec, {
    clock: overrides.clock,
    defaultCapacity: config.defaultCapacity,
  });
  const protocol = new CheckInProtocol(ledger, audit, codec, { clock: overrides.clock });

  return {
    store,
    codec,
    ledger,
    audit,
    protocol,
    reports: new ReportBuilder(ledger, audit, overrides.directory),
    qr: new QrRenderer({ width: config.qrWidth }),
    metrics: new MetricsCollector(),
  };
}
