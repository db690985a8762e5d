/**
 * Event Store Module
 *
 * Hash-chained journal of committed ledger notifications.
 */

export * from './event-journal';
