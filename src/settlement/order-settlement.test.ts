import { LedgerNode } from '../ledger-node';
import { Order } from '../ledger/types';
import { AdminRegistry } from '../registry/admin-registry';
import { ScriptedToken, StubOracle } from '../test-support/stub-modules';
import {
  ADMIN_A,
  BUYER,
  ManualClock,
  MASTER,
  OUTSIDER,
  PAYOUT_WALLET,
  PLATFORM_WALLET,
  START_SECONDS,
  catchLedgerError,
  createTestNode,
  testAddress,
} from '../test-support/fixtures';
import { splitPayment } from './order-settlement';

describe('splitPayment', () => {
  it('takes 2% of 10 000 as commission', () => {
    expect(splitPayment(10_000n, 200)).toEqual({ commission: 200n, merchantPayout: 9_800n });
  });

  it('rounds the commission down and gives the rest to the merchant', () => {
    expect(splitPayment(999n, 200)).toEqual({ commission: 19n, merchantPayout: 980n });
    expect(splitPayment(1n, 200)).toEqual({ commission: 0n, merchantPayout: 1n });
  });

  it('handles the rate bounds', () => {
    expect(splitPayment(5_000n, 0)).toEqual({ commission: 0n, merchantPayout: 5_000n });
    expect(splitPayment(5_000n, 10_000)).toEqual({ commission: 5_000n, merchantPayout: 0n });
  });

  it('always adds up to the total', () => {
    for (const total of [1n, 7n, 333n, 10_001n, 123_456_789n]) {
      for (const rate of [1, 150, 200, 9_999]) {
        const { commission, merchantPayout } = splitPayment(total, rate);
        expect(commission + merchantPayout).toBe(total);
      }
    }
  });
});

describe('OrderSettlement', () => {
  let clock: ManualClock;
  let node: LedgerNode;

  function fund(amount: bigint, allowance: bigint = amount): void {
    node.host.execute(MASTER, () => node.token.mint(BUYER, amount));
    node.host.execute(BUYER, () => node.settlement.approvePayment(allowance, node.settlement.address));
  }

  function settle(total: bigint, reference = 'order-ref'): Order {
    return node.host.execute(BUYER, () => node.settlement.processOrder(BUYER, reference, total));
  }

  beforeEach(() => {
    clock = new ManualClock();
    node = createTestNode({}, clock);
  });

  it('settles an order into the platform wallet and the merchant payout address', () => {
    fund(50_000n, 10_000n);

    const order = settle(10_000n, 'order-ref-1');

    expect(order).toEqual({
      orderId: 1,
      createdBy: BUYER,
      orderReference: 'order-ref-1',
      totalAmount: 10_000n,
      commission: 200n,
      merchantPayout: 9_800n,
      createdAt: START_SECONDS,
    });
    expect(node.token.balanceOf(PLATFORM_WALLET)).toBe(200n);
    expect(node.token.balanceOf(PAYOUT_WALLET)).toBe(9_800n);
    expect(node.token.balanceOf(BUYER)).toBe(40_000n);
    expect(node.token.allowance(BUYER, node.settlement.address)).toBe(0n);
    expect(node.settlement.getNextOrderId()).toBe(2);
    expect(node.settlement.getOrder(1)).toEqual(order);
  });

  it('records the approval under the end caller', () => {
    fund(1_000n, 600n);
    expect(node.token.allowance(BUYER, node.settlement.address)).toBe(600n);
    expect(node.journal.getEntriesByType('PaymentApproved')[0].notification.subjects).toEqual([
      BUYER,
      node.settlement.address,
    ]);
  });

  it('hands out strictly increasing ids', () => {
    fund(30_000n);

    const ids = [settle(100n), settle(200n), settle(300n)].map(order => order.orderId);

    expect(ids).toEqual([1, 2, 3]);
    expect(node.settlement.getOrdersByCreator(BUYER).map(order => order.totalAmount)).toEqual([100n, 200n, 300n]);
    expect(node.settlement.getOrders()).toHaveLength(3);
  });

  it('rolls back the order, the counter and the first transfer when the payout fails', () => {
    fund(50_000n, 200n);

    const error = catchLedgerError(() => settle(10_000n));

    expect(error.code).toBe('ExternalCallFailed');
    expect(error.details.orderId).toBe(1);
    expect(node.settlement.getNextOrderId()).toBe(1);
    expect(node.settlement.getOrders()).toEqual([]);
    expect(node.token.balanceOf(BUYER)).toBe(50_000n);
    expect(node.token.balanceOf(PLATFORM_WALLET)).toBe(0n);
    expect(node.token.allowance(BUYER, node.settlement.address)).toBe(200n);
    expect(node.journal.getEntriesByType('OrderProcessed')).toEqual([]);
  });

  it('fails ExternalCallFailed without any allowance', () => {
    node.host.execute(MASTER, () => node.token.mint(BUYER, 50_000n));
    expect(catchLedgerError(() => settle(10_000n)).code).toBe('ExternalCallFailed');
    expect(node.settlement.getNextOrderId()).toBe(1);
  });

  it('reuses no id after a failed settlement', () => {
    fund(10_000n, 10_000n);
    expect(catchLedgerError(() => settle(20_000n)).code).toBe('ExternalCallFailed');

    expect(settle(1_000n).orderId).toBe(1);
    expect(settle(1_000n).orderId).toBe(2);
  });

  it('lets admins settle on behalf of a buyer, but nobody else', () => {
    fund(10_000n);

    const order = node.host.execute(MASTER, () => node.settlement.processOrder(BUYER, 'on-behalf', 1_000n));
    expect(order.createdBy).toBe(BUYER);

    const error = catchLedgerError(() =>
      node.host.execute(OUTSIDER, () => node.settlement.processOrder(BUYER, 'theft', 1_000n))
    );
    expect(error.code).toBe('AccessDenied');
    expect(node.token.balanceOf(BUYER)).toBe(9_000n);
  });

  it('rejects empty totals and references', () => {
    fund(10_000n);
    expect(catchLedgerError(() => settle(0n)).code).toBe('InvalidArgument');
    expect(catchLedgerError(() => settle(100n, '   ')).code).toBe('InvalidArgument');
    expect(node.settlement.getNextOrderId()).toBe(1);
  });

  it('appends the order before calling the token', () => {
    const token = node.host.deploy(
      address => new ScriptedToken(node.host, address, [true, true], () => node.settlement.getOrders().length)
    );
    node.host.execute(MASTER, () => node.settlement.setToken(token.address));

    settle(10_000n);

    expect(token.calls).toEqual([
      { sender: node.settlement.address, from: BUYER, to: PLATFORM_WALLET, amount: 200n, observed: 1 },
      { sender: node.settlement.address, from: BUYER, to: PAYOUT_WALLET, amount: 9_800n, observed: 1 },
    ]);
  });

  it('treats a token that reports failure like a failed transfer', () => {
    const token = node.host.deploy(
      address => new ScriptedToken(node.host, address, [true, false], () => node.settlement.getOrders().length)
    );
    node.host.execute(MASTER, () => node.settlement.setToken(token.address));

    expect(catchLedgerError(() => settle(10_000n)).code).toBe('ExternalCallFailed');
    expect(token.calls).toHaveLength(2);
    expect(node.settlement.getOrders()).toEqual([]);
  });

  it('pays whatever payout address the merchant registry reports at settlement time', () => {
    const wallet = testAddress(5, 9);
    fund(10_000n);
    node.host.execute(MASTER, () => node.merchantRegistry.setMerchantPayoutAddress(wallet));

    settle(10_000n);

    expect(node.token.balanceOf(wallet)).toBe(9_800n);
    expect(node.token.balanceOf(PAYOUT_WALLET)).toBe(0n);
  });

  describe('administration', () => {
    it('moves the order counter forward only', () => {
      expect(node.host.execute(MASTER, () => node.settlement.resetOrderCounter(100))).toBe(1);
      fund(1_000n);
      expect(settle(1_000n).orderId).toBe(100);

      const error = catchLedgerError(() => node.host.execute(MASTER, () => node.settlement.resetOrderCounter(50)));
      expect(error.code).toBe('InvalidArgument');
      expect(error.details.current).toBe(101);
      expect(catchLedgerError(() => node.host.execute(MASTER, () => node.settlement.resetOrderCounter(101.5))).code).toBe(
        'InvalidArgument'
      );
      expect(catchLedgerError(() => node.host.execute(OUTSIDER, () => node.settlement.resetOrderCounter(500))).code).toBe(
        'AccessDenied'
      );
      expect(node.settlement.getNextOrderId()).toBe(101);
    });

    it('applies a new commission rate to later orders', () => {
      node.host.execute(MASTER, () => node.settlement.setCommissionRate(500));
      fund(10_000n);

      const order = settle(10_000n);

      expect([order.commission, order.merchantPayout]).toEqual([500n, 9_500n]);
      expect(catchLedgerError(() => node.host.execute(MASTER, () => node.settlement.setCommissionRate(10_001))).code).toBe(
        'InvalidArgument'
      );
      expect(node.settlement.getCommissionRate()).toBe(500);
    });

    it('changes the platform wallet', () => {
      const wallet = testAddress(4, 2);
      expect(node.host.execute(MASTER, () => node.settlement.setPlatformWallet(wallet))).toBe(PLATFORM_WALLET);
      fund(10_000n);

      settle(10_000n);

      expect(node.token.balanceOf(wallet)).toBe(200n);
    });

    it('fails OrderNotFound for unknown ids', () => {
      expect(catchLedgerError(() => node.settlement.getOrder(7)).code).toBe('OrderNotFound');
    });

    it('accepts only platform oracles as merchant registry', () => {
      const adminOnly = node.host.deploy(address => new AdminRegistry(node.host, address, { owner: MASTER, masterAdmin: MASTER }));
      expect(
        catchLedgerError(() => node.host.execute(MASTER, () => node.settlement.setMerchantRegistry(adminOnly.address)))
          .code
      ).toBe('ExternalCallFailed');

      const oracle = node.host.deploy(address => new StubOracle(node.host, address, [MASTER], testAddress(5, 5)));
      node.host.execute(MASTER, () => node.settlement.setMerchantRegistry(oracle.address));
      expect(node.settlement.getCollaborators().merchantRegistry).toBe(oracle.address);
    });

    it('follows admin changes made in the admin registry', () => {
      node.host.execute(MASTER, () => node.adminRegistry.addAdmin(ADMIN_A));
      node.host.execute(ADMIN_A, () => node.settlement.setCommissionRate(300));
      expect(node.settlement.getCommissionRate()).toBe(300);
    });
  });
});
