/**
 * Ledger Snapshot Store
 *
 * Committed ledger state on disk:
 *
 *   <dataDir>/modules/<address>.json   one checksummed file per hosted module
 *   <dataDir>/journal.jsonl            the event journal, one entry per line
 *
 * A commit rewrites only the modules it wrote and appends its journal
 * entries, so persisting costs what the commit touched rather than the size
 * of the whole ledger. bigint values are tagged as { "$bigint": "<decimal>" }
 * on disk and revived on load; module schemas validate everything else.
 */

import * as fs from 'fs';
import * as path from 'path';
import { JournalEntry, journalEntrySchema } from '../event-store/event-journal';
import { Address, toAddress } from '../ledger/address';
import { logger } from '../scaling/structured-logger';
import { AtomicStorage } from './atomic-storage';

const COMPONENT = 'LedgerSnapshotStore';
const MODULES_DIR = 'modules';
const MODULE_EXTENSION = '.json';
const JOURNAL_FILE = 'journal.jsonl';
const BIGINT_TAG = '$bigint';

export interface LedgerSnapshot {
  modules: Record<Address, unknown>;
  journal: JournalEntry[];
}

/**
 * Replace bigint values with tagged objects so the tree survives JSON.
 */
export function encodeBigInts(value: unknown): unknown {
  if (typeof value === 'bigint') return { [BIGINT_TAG]: value.toString() };
  if (Array.isArray(value)) return value.map(encodeBigInts);
  if (typeof value === 'object' && value !== null) {
    const encoded: Record<string, unknown> = {};
    for (const [key, member] of Object.entries(value)) {
      encoded[key] = encodeBigInts(member);
    }
    return encoded;
  }
  return value;
}

export function decodeBigInts(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(decodeBigInts);
  if (typeof value === 'object' && value !== null) {
    const entries = Object.entries(value);
    if (entries.length === 1 && entries[0][0] === BIGINT_TAG && typeof entries[0][1] === 'string') {
      return BigInt(entries[0][1]);
    }
    const decoded: Record<string, unknown> = {};
    for (const [key, member] of entries) {
      decoded[key] = decodeBigInts(member);
    }
    return decoded;
  }
  return value;
}

export class LedgerSnapshotStore {
  readonly modulesDir: string;
  readonly journalPath: string;

  constructor(dataDir: string) {
    this.modulesDir = path.join(dataDir, MODULES_DIR);
    this.journalPath = path.join(dataDir, JOURNAL_FILE);
  }

  modulePath(address: Address): string {
    return path.join(this.modulesDir, `${address}${MODULE_EXTENSION}`);
  }

  saveModule(address: Address, state: unknown): void {
    AtomicStorage.writeFileAtomic(this.modulePath(address), encodeBigInts(state));
  }

  appendJournal(entries: JournalEntry[]): void {
    AtomicStorage.appendLines(this.journalPath, entries.map(entry => JSON.stringify(entry)));
  }

  /**
   * null when nothing has been saved yet. A file that exists but cannot be
   * read or validated is an error: starting empty would fork the ledger.
   */
  load(): LedgerSnapshot | null {
    const moduleFiles = AtomicStorage.listFiles(this.modulesDir, MODULE_EXTENSION);
    const hasJournal = fs.existsSync(this.journalPath);
    if (moduleFiles.length === 0 && !hasJournal) {
      return null;
    }

    const modules: Record<Address, unknown> = {};
    for (const filePath of moduleFiles) {
      const address = toAddress(path.basename(filePath, MODULE_EXTENSION));
      const result = AtomicStorage.readFileAtomic(filePath);
      if (!result.success) {
        throw new Error(`Ledger snapshot unreadable for module ${address}: ${result.error}`);
      }
      modules[address] = decodeBigInts(result.data);
    }

    return { modules, journal: hasJournal ? this.readJournal() : [] };
  }

  private readJournal(): JournalEntry[] {
    const lines = fs.readFileSync(this.journalPath, 'utf8').split('\n');
    // Everything after the last newline is an append that never completed
    const torn = lines.pop();
    if (torn) {
      logger.warn(COMPONENT, 'Discarding unterminated journal line', { length: torn.length });
    }

    return lines.map((line, index) => {
      try {
        return journalEntrySchema.parse(JSON.parse(line));
      } catch (err) {
        throw new Error(
          `Ledger journal unreadable at line ${index + 1}: ${err instanceof Error ? err.message : String(err)}`
        );
      }
    });
  }
}
