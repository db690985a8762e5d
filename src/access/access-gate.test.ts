import { AccessGate } from './access-gate';
import { isLedgerError } from '../ledger/errors';
import { ADMIN_A, MASTER, MERCHANT_M, OUTSIDER, catchLedgerError } from '../test-support/fixtures';

describe('AccessGate', () => {
  const admins = { checkIsAdmin: (address: string) => address === ADMIN_A };
  const merchants = { checkIsMerchant: (address: string) => address === MERCHANT_M };

  it('answers each role from its source', () => {
    const gate = new AccessGate({ owner: MASTER, admins: () => admins, merchants: () => merchants });

    expect(gate.isOwner(MASTER)).toBe(true);
    expect(gate.isOwner(MASTER.toLowerCase())).toBe(true);
    expect(gate.isAdmin(ADMIN_A)).toBe(true);
    expect(gate.isAdmin(MASTER)).toBe(false);
    expect(gate.isMerchant(MERCHANT_M)).toBe(true);
  });

  it('treats owner, admin and merchant as verified managers', () => {
    const gate = new AccessGate({ owner: MASTER, admins: () => admins, merchants: () => merchants });

    expect([MASTER, ADMIN_A, MERCHANT_M, OUTSIDER].map(address => gate.isVerifiedManager(address))).toEqual([
      true,
      true,
      true,
      false,
    ]);
  });

  it('knows no merchants without a merchant source', () => {
    const gate = new AccessGate({ owner: MASTER, admins: () => admins });
    expect(gate.isMerchant(MERCHANT_M)).toBe(false);
    expect(gate.isVerifiedManager(MERCHANT_M)).toBe(false);
  });

  it('consults the source at check time', () => {
    let current = admins;
    const gate = new AccessGate({ owner: MASTER, admins: () => current });
    expect(gate.isAdmin(ADMIN_A)).toBe(true);

    current = { checkIsAdmin: () => false };
    expect(gate.isAdmin(ADMIN_A)).toBe(false);
  });

  it('fails AccessDenied with the caller attached', () => {
    const gate = new AccessGate({ owner: MASTER, admins: () => admins });

    const error = catchLedgerError(() => gate.requireAdmin(OUTSIDER));
    expect(isLedgerError(error, 'AccessDenied')).toBe(true);
    expect(error.category).toBe('AccessDenied');
    expect(error.details.caller).toBe(OUTSIDER);

    expect(() => gate.requireAdmin(ADMIN_A)).not.toThrow();
    expect(catchLedgerError(() => gate.requireVerifiedManager(OUTSIDER)).code).toBe('AccessDenied');
  });
});
