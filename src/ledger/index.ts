/**
 * Registration Ledger Module
 */

export * from './types';
export * from './memory-ledger-store';
export * from './file-ledger-store';
export * from './registration-ledger';
