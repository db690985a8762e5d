/**
 * Event Journal
 *
 * Append-only, hash-chained record of committed notifications. It is the
 * notification sink of the ledger node: modules emit during a unit of work,
 * and the journal only ever sees what the host committed.
 *
 * hash(n) = sha256(hash(n-1) || 0x00 || canonicalJson(notification))
 */

import { z } from 'zod';
import { canonicalJson, sha256 } from '../crypto';
import { addressSchema } from '../ledger/schemas';
import { Notification, NotificationSink, NotificationType } from '../ledger/types';
import { logger as defaultLogger, StructuredLogger } from '../scaling/structured-logger';

const COMPONENT = 'EventJournal';

export interface JournalEntry {
  sequence: number;
  prevHash: string;
  hash: string;
  notification: Notification;
}

const notificationTypes: [NotificationType, ...NotificationType[]] = [
  'AdminAdded',
  'AdminRemoved',
  'MerchantAdded',
  'MerchantRemoved',
  'MerchantBalanceUpdated',
  'MerchantPayoutAddressUpdated',
  'ProductAdded',
  'ProductUpdated',
  'ProductDeleted',
  'OrderProcessed',
  'OrderCounterReset',
  'PaymentApproved',
  'CommissionRateUpdated',
  'PlatformWalletUpdated',
  'CollaboratorRotated',
  'TokenTransfer',
  'TokenApproval',
];

export const journalEntrySchema = z.object({
  sequence: z.number().int().positive(),
  prevHash: z.string(),
  hash: z.string().regex(/^[0-9a-f]{64}$/),
  notification: z.object({
    type: z.enum(notificationTypes),
    message: z.string(),
    timestamp: z.number().int().nonnegative(),
    subsystem: z.string(),
    subjects: z.array(addressSchema),
    data: z.record(z.union([z.string(), z.number(), z.boolean()])).optional(),
  }),
});

export function hashJournalEntry(prevHash: string, notification: Notification): string {
  return sha256(`${prevHash}\u0000${canonicalJson(notification)}`);
}

export class EventJournal implements NotificationSink {
  private entries: JournalEntry[] = [];
  private logger: StructuredLogger;

  constructor(opts: { logger?: StructuredLogger } = {}) {
    this.logger = opts.logger ?? defaultLogger;
  }

  publish(notification: Notification): void {
    const prevHash = this.headHash;
    const entry: JournalEntry = {
      sequence: this.entries.length + 1,
      prevHash,
      hash: hashJournalEntry(prevHash, notification),
      notification,
    };
    this.entries.push(entry);

    this.logger.info(notification.subsystem, notification.message, {
      type: notification.type,
      sequence: entry.sequence,
      subjects: notification.subjects,
      ...notification.data,
    });
  }

  get length(): number {
    return this.entries.length;
  }

  get headHash(): string {
    return this.entries[this.entries.length - 1]?.hash ?? '';
  }

  /**
   * Entries with sequence > `afterSequence`, oldest first.
   */
  getEntries(afterSequence = 0, limit = 100): JournalEntry[] {
    return this.entries.slice(Math.max(0, afterSequence), Math.max(0, afterSequence) + limit);
  }

  getEntriesByType(type: NotificationType): JournalEntry[] {
    return this.entries.filter(entry => entry.notification.type === type);
  }

  verifyChain(): boolean {
    let prevHash = '';
    for (let i = 0; i < this.entries.length; i++) {
      const entry = this.entries[i];
      if (entry.sequence !== i + 1 || entry.prevHash !== prevHash) return false;
      if (entry.hash !== hashJournalEntry(prevHash, entry.notification)) return false;
      prevHash = entry.hash;
    }
    return true;
  }

  snapshot(): JournalEntry[] {
    return [...this.entries];
  }

  /**
   * Replace the journal with persisted entries. A broken chain is refused.
   */
  load(entries: JournalEntry[]): void {
    const previous = this.entries;
    this.entries = [...entries];
    if (!this.verifyChain()) {
      this.entries = previous;
      throw new Error('Persisted journal fails hash-chain verification');
    }
    this.logger.debug(COMPONENT, 'Journal loaded', { entries: entries.length });
  }
}
