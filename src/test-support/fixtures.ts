/**
 * Shared test fixtures: placeholder addresses, a fixed clock and a fully
 * wired ledger node that never listens on a port.
 */

import { LedgerConfig } from '../config';
import { LedgerNode } from '../ledger-node';
import { Address } from '../ledger/address';
import { isLedgerError, LedgerError } from '../ledger/errors';
import { MetricsCollector } from '../scaling/metrics';

// Digits only, so the checksummed form equals the literal
export function testAddress(group: number, n: number): Address {
  return `0x${group}${String(n).padStart(39, '0')}`;
}

export const OWNER = testAddress(7, 1);
export const MASTER = testAddress(1, 1);
export const ADMIN_A = testAddress(1, 2);
export const ADMIN_B = testAddress(1, 3);
export const ADMIN_C = testAddress(1, 4);
export const MERCHANT_M = testAddress(2, 1);
export const MERCHANT_N = testAddress(2, 2);
export const BUYER = testAddress(3, 1);
export const PLATFORM_WALLET = testAddress(4, 1);
export const PAYOUT_WALLET = testAddress(5, 1);
export const LIQUIDITY = testAddress(6, 1);
export const OUTSIDER = testAddress(9, 9);
export const NULL_ADDRESS = '0x0000000000000000000000000000000000000000';

export const START_MS = 1_700_000_000_000;
export const START_SECONDS = 1_700_000_000;

/**
 * Clock that only moves when told to.
 */
export class ManualClock {
  constructor(private ms: number = START_MS) {}

  now = (): number => this.ms;

  advanceSeconds(seconds: number): void {
    this.ms += seconds * 1000;
  }
}

export function testConfig(overrides: Partial<LedgerConfig> = {}): LedgerConfig {
  return {
    owner: MASTER,
    masterAdmin: MASTER,
    platformWallet: PLATFORM_WALLET,
    merchantPayoutAddress: PAYOUT_WALLET,
    liquidityOperator: LIQUIDITY,
    commissionRateBp: 200,
    tokenName: 'Platform Credit',
    port: 0,
    ...overrides,
  };
}

export function createTestNode(
  overrides: Partial<LedgerConfig> = {},
  clock: ManualClock = new ManualClock()
): LedgerNode {
  return new LedgerNode(testConfig(overrides), { clock: clock.now, metrics: new MetricsCollector() });
}

/**
 * Run `fn` and return the LedgerError it throws. Anything else fails the test.
 */
export function catchLedgerError(fn: () => unknown): LedgerError {
  try {
    fn();
  } catch (error) {
    if (isLedgerError(error)) return error;
    throw error;
  }
  throw new Error('Expected a LedgerError, but the call succeeded');
}
