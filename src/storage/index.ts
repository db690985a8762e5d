/**
 * Storage Module Exports
 *
 * Crash-safe persistence for ledger snapshots.
 */

export { AtomicStorage, ChecksummedFile, ReadResult } from './atomic-storage';
export { LedgerSnapshot, LedgerSnapshotStore, encodeBigInts, decodeBigInts } from './snapshot-store';
