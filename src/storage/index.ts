/**
 * Storage Module Exports
 *
 * Crash-safe snapshot storage for the durable ledger.
 */

export { AtomicStorage, ChecksummedFile, ReadResult, Parser } from './atomic-storage';
