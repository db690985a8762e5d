import { sha256, canonicalJson } from '../crypto';
import { Notification } from '../ledger/types';
import { MASTER, ADMIN_A, START_SECONDS } from '../test-support/fixtures';
import { EventJournal, hashJournalEntry } from './event-journal';

function notification(type: Notification['type'], message: string): Notification {
  return {
    type,
    message,
    timestamp: START_SECONDS,
    subsystem: 'AdminRegistry',
    subjects: [ADMIN_A, MASTER],
  };
}

describe('EventJournal', () => {
  let journal: EventJournal;

  beforeEach(() => {
    journal = new EventJournal();
    journal.publish(notification('AdminAdded', 'first'));
    journal.publish(notification('AdminRemoved', 'second'));
    journal.publish(notification('AdminAdded', 'third'));
  });

  it('numbers entries and chains their hashes', () => {
    const [first, second, third] = journal.getEntries();

    expect([first.sequence, second.sequence, third.sequence]).toEqual([1, 2, 3]);
    expect(first.prevHash).toBe('');
    expect(first.hash).toBe(sha256(`\u0000${canonicalJson(first.notification)}`));
    expect(second.prevHash).toBe(first.hash);
    expect(third.hash).toBe(hashJournalEntry(second.hash, third.notification));
    expect(journal.headHash).toBe(third.hash);
    expect(journal.verifyChain()).toBe(true);
  });

  it('pages by sequence', () => {
    expect(journal.getEntries(1, 1).map(entry => entry.notification.message)).toEqual(['second']);
    expect(journal.getEntries(3)).toEqual([]);
  });

  it('filters by notification type', () => {
    expect(journal.getEntriesByType('AdminAdded').map(entry => entry.sequence)).toEqual([1, 3]);
  });

  it('hashes independently of key order', () => {
    const reordered: Notification = {
      subjects: [ADMIN_A, MASTER],
      subsystem: 'AdminRegistry',
      timestamp: START_SECONDS,
      message: 'first',
      type: 'AdminAdded',
    };
    expect(hashJournalEntry('', reordered)).toBe(journal.getEntries()[0].hash);
  });

  it('reloads an intact chain', () => {
    const copy = new EventJournal();
    copy.load(journal.snapshot());
    expect(copy.length).toBe(3);
    expect(copy.headHash).toBe(journal.headHash);
  });

  it('refuses a tampered chain and keeps its entries', () => {
    const entries = journal.snapshot();
    const tampered = entries.map(entry =>
      entry.sequence === 2 ? { ...entry, notification: { ...entry.notification, message: 'edited' } } : entry
    );

    const copy = new EventJournal();
    copy.publish(notification('AdminAdded', 'local'));

    expect(() => copy.load(tampered)).toThrow('Persisted journal fails hash-chain verification');
    expect(copy.length).toBe(1);
    expect(copy.getEntries()[0].notification.message).toBe('local');
  });
});
