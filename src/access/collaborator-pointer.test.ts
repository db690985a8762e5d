import { ExecutionHost } from '../host/execution-host';
import { Notification } from '../ledger/types';
import { AdminRegistry } from '../registry/admin-registry';
import { MerchantRegistry } from '../registry/merchant-registry';
import { MetricsCollector } from '../scaling/metrics';
import { IdentityToken } from '../settlement/identity-token';
import { StubOracle } from '../test-support/stub-modules';
import {
  ADMIN_A,
  LIQUIDITY,
  ManualClock,
  MASTER,
  NULL_ADDRESS,
  OUTSIDER,
  PAYOUT_WALLET,
  catchLedgerError,
  testAddress,
} from '../test-support/fixtures';
import { isAdminOracle, isIdentityToken, isPlatformOracle } from './collaborator-pointer';

describe('CollaboratorPointer rotation', () => {
  let host: ExecutionHost;
  let admins: AdminRegistry;
  let merchants: MerchantRegistry;
  let rotations: Notification[];

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
    rotations = [];
    host.addSink({
      publish: notification => {
        if (notification.type === 'CollaboratorRotated') rotations.push(notification);
      },
    });
  });

  function deployStub(stubAdmins: string[]): StubOracle {
    return host.deploy(address => new StubOracle(host, address, stubAdmins, PAYOUT_WALLET));
  }

  it('commits a rotation to a registry that still recognizes the caller', () => {
    const replacement = host.deploy(address => new AdminRegistry(host, address, { owner: MASTER, masterAdmin: MASTER }));

    const previous = host.execute(MASTER, () => merchants.setAdminRegistry(replacement.address));

    expect(previous).toBe(admins.address);
    expect(merchants.getAdminRegistry()).toBe(replacement.address);
    expect(rotations).toHaveLength(1);
    expect(rotations[0].subsystem).toBe('MerchantRegistry');
    expect(rotations[0].subjects).toEqual([admins.address, replacement.address, MASTER]);
    expect(rotations[0].data).toEqual({ pointer: 'adminRegistry' });
  });

  it('routes admin checks through the new registry after rotation', () => {
    const replacement = host.deploy(address => new AdminRegistry(host, address, { owner: MASTER, masterAdmin: MASTER }));
    host.execute(MASTER, () => replacement.addAdmin(ADMIN_A));
    expect(merchants.checkIsAdmin(ADMIN_A)).toBe(false);

    host.execute(MASTER, () => merchants.setAdminRegistry(replacement.address));

    expect(merchants.checkIsAdmin(ADMIN_A)).toBe(true);
  });

  it('only lets current admins rotate', () => {
    const replacement = host.deploy(address => new AdminRegistry(host, address, { owner: OUTSIDER, masterAdmin: OUTSIDER }));

    const error = catchLedgerError(() => host.execute(OUTSIDER, () => merchants.setAdminRegistry(replacement.address)));

    expect(error.code).toBe('AccessDenied');
    expect(merchants.getAdminRegistry()).toBe(admins.address);
  });

  it('rejects the null address', () => {
    const error = catchLedgerError(() => host.execute(MASTER, () => merchants.setAdminRegistry(NULL_ADDRESS)));
    expect(error.code).toBe('ZeroAddress');
    expect(merchants.getAdminRegistry()).toBe(admins.address);
  });

  it('fails ExternalCallFailed when nothing answers at the address', () => {
    const nobody = testAddress(8, 1);
    const error = catchLedgerError(() => host.execute(MASTER, () => merchants.setAdminRegistry(nobody)));
    expect(error.code).toBe('ExternalCallFailed');
    expect(error.details.address).toBe(nobody);
  });

  it('fails ExternalCallFailed for a module of the wrong kind', () => {
    const token = host.deploy(address => new IdentityToken(host, address, { owner: MASTER }));
    const error = catchLedgerError(() => host.execute(MASTER, () => merchants.setAdminRegistry(token.address)));
    expect(error.code).toBe('ExternalCallFailed');
  });

  it('fails NonMatchingAddress when the candidate misreports itself, leaving the pointer unchanged', () => {
    const liar = deployStub([MASTER]);
    liar.reportedAddress = admins.address;

    const error = catchLedgerError(() => host.execute(MASTER, () => merchants.setAdminRegistry(liar.address)));

    expect(error.code).toBe('NonMatchingAddress');
    expect(error.details).toEqual({ expected: liar.address, reported: admins.address });
    expect(merchants.getAdminRegistry()).toBe(admins.address);
    expect(rotations).toEqual([]);
  });

  it('accepts a self-report that differs only in letter case', () => {
    const stub = deployStub([MASTER]);
    stub.reportedAddress = stub.address.toLowerCase();

    host.execute(MASTER, () => merchants.setAdminRegistry(stub.address));

    expect(merchants.getAdminRegistry()).toBe(stub.address);
  });

  it('refuses a registry under which the caller would lose admin rights', () => {
    const foreign = host.deploy(address => new AdminRegistry(host, address, { owner: OUTSIDER, masterAdmin: OUTSIDER }));

    const error = catchLedgerError(() => host.execute(MASTER, () => merchants.setAdminRegistry(foreign.address)));

    expect(error.code).toBe('AccessDenied');
    expect(error.details.candidate).toBe(foreign.address);
    expect(merchants.getAdminRegistry()).toBe(admins.address);
    // The caller can still administer through the old registry
    expect(merchants.checkIsAdmin(MASTER)).toBe(true);
  });

  it('refuses to point a registry at itself and keeps it usable', () => {
    const error = catchLedgerError(() => host.execute(MASTER, () => merchants.setAdminRegistry(merchants.address)));

    expect(error.code).toBe('InvalidArgument');
    expect(error.details.address).toBe(merchants.address);
    expect(merchants.getAdminRegistry()).toBe(admins.address);
    expect(host.execute(MASTER, () => merchants.addMerchant(ADMIN_A)).address).toBe(ADMIN_A);
  });

  it('refuses a rotation that would close a delegation cycle', () => {
    const second = host.deploy(
      address =>
        new MerchantRegistry(host, address, {
          owner: MASTER,
          adminRegistry: admins.address,
          liquidityOperator: LIQUIDITY,
          payoutAddress: PAYOUT_WALLET,
        })
    );
    host.execute(MASTER, () => second.setAdminRegistry(merchants.address));

    const error = catchLedgerError(() => host.execute(MASTER, () => merchants.setAdminRegistry(second.address)));

    expect(error.code).toBe('AccessDenied');
    expect(error.details.candidate).toBe(second.address);
    expect(merchants.getAdminRegistry()).toBe(admins.address);
    expect(merchants.checkIsAdmin(MASTER)).toBe(true);
    expect(second.checkIsAdmin(MASTER)).toBe(true);
    expect(rotations).toHaveLength(1);
  });

  it('undoes a rotation when the rest of the unit fails', () => {
    const replacement = host.deploy(address => new AdminRegistry(host, address, { owner: MASTER, masterAdmin: MASTER }));

    expect(() =>
      host.execute(MASTER, () => {
        merchants.setAdminRegistry(replacement.address);
        throw new Error('abort');
      })
    ).toThrow('abort');

    expect(merchants.getAdminRegistry()).toBe(admins.address);
    expect(rotations).toEqual([]);
  });

  it('accepts a lowercase target and stores it checksummed', () => {
    const replacement = host.deploy(address => new AdminRegistry(host, address, { owner: MASTER, masterAdmin: MASTER }));
    host.execute(MASTER, () => merchants.setAdminRegistry(replacement.address.toLowerCase()));
    expect(merchants.getAdminRegistry()).toBe(replacement.address);
  });
});

describe('interface guards', () => {
  it('tell collaborator kinds apart', () => {
    const host = new ExecutionHost({ metrics: new MetricsCollector() });
    const admins = host.deploy(address => new AdminRegistry(host, address, { owner: MASTER, masterAdmin: MASTER }));
    const token = host.deploy(address => new IdentityToken(host, address, { owner: MASTER }));
    const stub = host.deploy(address => new StubOracle(host, address, [], PAYOUT_WALLET));

    expect([isAdminOracle(admins), isPlatformOracle(admins), isIdentityToken(admins)]).toEqual([true, false, false]);
    expect([isAdminOracle(token), isPlatformOracle(token), isIdentityToken(token)]).toEqual([false, false, true]);
    expect([isAdminOracle(stub), isPlatformOracle(stub)]).toEqual([true, true]);
    expect(isAdminOracle(null)).toBe(false);
    expect(isAdminOracle({ checkIsAdmin: true, checkIsMerchant: true, selfIdentify: true })).toBe(false);
  });
});
