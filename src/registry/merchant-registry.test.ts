import { ExecutionHost } from '../host/execution-host';
import { ZERO_ADDRESS } from '../ledger/address';
import { Notification } from '../ledger/types';
import { MetricsCollector } from '../scaling/metrics';
import { IdentityToken } from '../settlement/identity-token';
import { decodeBigInts, encodeBigInts } from '../storage/snapshot-store';
import {
  ADMIN_A,
  LIQUIDITY,
  ManualClock,
  MASTER,
  MERCHANT_M,
  MERCHANT_N,
  NULL_ADDRESS,
  OUTSIDER,
  PAYOUT_WALLET,
  START_SECONDS,
  catchLedgerError,
  testAddress,
} from '../test-support/fixtures';
import { AdminRegistry } from './admin-registry';
import { MerchantRegistry } from './merchant-registry';

describe('MerchantRegistry', () => {
  let host: ExecutionHost;
  let admins: AdminRegistry;
  let merchants: MerchantRegistry;
  let delivered: Notification[];

  beforeEach(() => {
    host = new ExecutionHost({ clock: new ManualClock().now, metrics: new MetricsCollector() });
    admins = host.deploy(address => new AdminRegistry(host, address, { owner: MASTER, masterAdmin: MASTER }));
    merchants = host.deploy(
      address =>
        new MerchantRegistry(host, address, {
          owner: MASTER,
          adminRegistry: admins.address,
          liquidityOperator: LIQUIDITY,
          payoutAddress: PAYOUT_WALLET,
        })
    );
    delivered = [];
    host.addSink({ publish: notification => delivered.push(notification) });
  });

  describe('membership', () => {
    it('adds a merchant with a zero balance', () => {
      const profile = host.execute(MASTER, () => merchants.addMerchant(MERCHANT_M));

      expect(profile).toEqual({ address: MERCHANT_M, addedBy: MASTER, addedAt: START_SECONDS, balance: 0n });
      expect(merchants.getPlatformMerchants()).toEqual([profile]);
      expect(merchants.getMerchantRegistrations(MASTER)).toEqual([profile]);
      expect(merchants.checkIsMerchant(MERCHANT_M)).toBe(true);
      expect(delivered.map(notification => notification.type)).toEqual(['MerchantAdded']);
    });

    it('rejects a non-admin without changing anything', () => {
      const before = merchants.snapshot();

      const error = catchLedgerError(() => host.execute(OUTSIDER, () => merchants.addMerchant(MERCHANT_M)));

      expect(error.code).toBe('AccessDenied');
      expect(merchants.snapshot()).toEqual(before);
      expect(merchants.getPlatformMerchants()).toEqual([]);
      expect(merchants.checkIsMerchant(MERCHANT_M)).toBe(false);
      expect(delivered).toEqual([]);
    });

    it('takes admin rights from the admin registry', () => {
      host.execute(MASTER, () => admins.addAdmin(ADMIN_A));

      host.execute(ADMIN_A, () => merchants.addMerchant(MERCHANT_M));

      expect(merchants.checkIsAdmin(ADMIN_A)).toBe(true);
      expect(merchants.getMerchantProfile(MERCHANT_M).addedBy).toBe(ADMIN_A);
    });

    it('fails AlreadyMerchant with the existing profile', () => {
      const existing = host.execute(MASTER, () => merchants.addMerchant(MERCHANT_M));

      const error = catchLedgerError(() => host.execute(MASTER, () => merchants.addMerchant(MERCHANT_M)));

      expect(error.code).toBe('AlreadyMerchant');
      expect(error.existing).toEqual(existing);
    });

    it('rejects the null address', () => {
      const error = catchLedgerError(() => host.execute(MASTER, () => merchants.addMerchant(NULL_ADDRESS)));
      expect(error.code).toBe('ZeroAddress');
    });

    it('swap-removes merchants', () => {
      const third = testAddress(2, 3);
      host.execute(MASTER, () => {
        merchants.addMerchant(MERCHANT_M);
        merchants.addMerchant(MERCHANT_N);
        merchants.addMerchant(third);
      });

      host.execute(MASTER, () => merchants.removeMerchant(MERCHANT_M));

      expect(merchants.getPlatformMerchants().map(profile => profile.address)).toEqual([third, MERCHANT_N]);
      expect(merchants.getMerchantRegistrations(MASTER).map(profile => profile.address)).toEqual([third, MERCHANT_N]);
      expect(catchLedgerError(() => merchants.getMerchantProfile(MERCHANT_M)).code).toBe('NotMerchant');
    });

    it('fails NotMerchant when removing an unknown merchant', () => {
      const error = catchLedgerError(() => host.execute(MASTER, () => merchants.removeMerchant(MERCHANT_M)));
      expect(error.code).toBe('NotMerchant');
    });
  });

  describe('balances', () => {
    beforeEach(() => {
      host.execute(MASTER, () => merchants.addMerchant(MERCHANT_M));
      delivered = [];
    });

    it('lets admins set a balance, visible from every view', () => {
      host.execute(MASTER, () => merchants.updateMerchantBalance(MERCHANT_M, 1_500n));

      expect(merchants.getMerchantBalance(MERCHANT_M)).toBe(1_500n);
      expect(merchants.getMerchantProfile(MERCHANT_M).balance).toBe(1_500n);
      expect(merchants.getPlatformMerchants()[0].balance).toBe(1_500n);
      expect(merchants.getMerchantRegistrations(MASTER)[0].balance).toBe(1_500n);
      expect(delivered[0].data).toEqual({ balance: '1500' });
    });

    it('lets the liquidity operator set a balance', () => {
      host.execute(LIQUIDITY, () => merchants.updateMerchantBalance(MERCHANT_M, 42n));
      expect(merchants.getMerchantBalance(MERCHANT_M)).toBe(42n);
    });

    it('rejects everyone else', () => {
      const error = catchLedgerError(() =>
        host.execute(MERCHANT_M, () => merchants.updateMerchantBalance(MERCHANT_M, 1n))
      );
      expect(error.code).toBe('ApprovedOperatorsOnly');
      expect(error.category).toBe('AccessDenied');
      expect(merchants.getMerchantBalance(MERCHANT_M)).toBe(0n);
    });

    it('rejects negative balances', () => {
      const error = catchLedgerError(() => host.execute(MASTER, () => merchants.updateMerchantBalance(MERCHANT_M, -1n)));
      expect(error.code).toBe('InvalidArgument');
    });

    it('keeps a phantom balance for an address that is not a merchant', () => {
      const profile = host.execute(MASTER, () => merchants.updateMerchantBalance(MERCHANT_N, 77n));

      expect(profile).toEqual({ address: MERCHANT_N, addedBy: ZERO_ADDRESS, addedAt: 0, balance: 77n });
      expect(merchants.getMerchantBalance(MERCHANT_N)).toBe(77n);
      expect(merchants.checkIsMerchant(MERCHANT_N)).toBe(false);
      expect(merchants.getPlatformMerchants().map(merchant => merchant.address)).toEqual([MERCHANT_M]);
      expect(catchLedgerError(() => merchants.getMerchantProfile(MERCHANT_N)).code).toBe('NotMerchant');
    });

    it('replaces a phantom balance when the address becomes a merchant', () => {
      host.execute(MASTER, () => merchants.updateMerchantBalance(MERCHANT_N, 77n));

      host.execute(MASTER, () => merchants.addMerchant(MERCHANT_N));

      expect(merchants.getMerchantBalance(MERCHANT_N)).toBe(0n);
      expect(merchants.snapshot().phantoms).toEqual([]);
    });

    it('reports zero for addresses it has never seen', () => {
      expect(merchants.getMerchantBalance(OUTSIDER)).toBe(0n);
    });
  });

  describe('payout address and collaborators', () => {
    it('lets admins change the payout address', () => {
      const wallet = testAddress(5, 2);
      host.execute(MASTER, () => merchants.setMerchantPayoutAddress(wallet));
      expect(merchants.getMerchantPayoutAddress()).toBe(wallet);

      expect(catchLedgerError(() => host.execute(OUTSIDER, () => merchants.setMerchantPayoutAddress(OUTSIDER))).code).toBe(
        'AccessDenied'
      );
      expect(catchLedgerError(() => host.execute(MASTER, () => merchants.setMerchantPayoutAddress(NULL_ADDRESS))).code).toBe(
        'ZeroAddress'
      );
      expect(merchants.getMerchantPayoutAddress()).toBe(wallet);
    });

    it('only rotates the liquidity operator to a live module', () => {
      const token = host.deploy(address => new IdentityToken(host, address, { owner: MASTER }));

      expect(catchLedgerError(() => host.execute(MASTER, () => merchants.setLiquidityOperator(OUTSIDER))).code).toBe(
        'ExternalCallFailed'
      );

      host.execute(MASTER, () => merchants.setLiquidityOperator(token.address));
      expect(merchants.getLiquidityOperator()).toBe(token.address);

      host.execute(MASTER, () => merchants.addMerchant(MERCHANT_M));
      expect(catchLedgerError(() => host.execute(LIQUIDITY, () => merchants.updateMerchantBalance(MERCHANT_M, 1n))).code).toBe(
        'ApprovedOperatorsOnly'
      );
    });

    it('survives a snapshot round trip through its schema', () => {
      host.execute(MASTER, () => {
        merchants.addMerchant(MERCHANT_M);
        merchants.updateMerchantBalance(MERCHANT_M, 10n);
        merchants.updateMerchantBalance(MERCHANT_N, 5n);
      });

      const persisted: unknown = JSON.parse(JSON.stringify(encodeBigInts(merchants.snapshot())));
      const state = merchants.parseState(decodeBigInts(persisted));
      const copy = new MerchantRegistry(host, merchants.address, {
        owner: MASTER,
        adminRegistry: admins.address,
        liquidityOperator: LIQUIDITY,
        payoutAddress: PAYOUT_WALLET,
      });
      copy.restore(state);

      expect(copy.getPlatformMerchants()).toEqual(merchants.getPlatformMerchants());
      expect(copy.getMerchantBalance(MERCHANT_N)).toBe(5n);
    });
  });
});

