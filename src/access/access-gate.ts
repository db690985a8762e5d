/**
 * Access Gate
 *
 * Role predicates evaluated against registry state. A module hands the gate
 * functions that return its current authority sources: either the module
 * itself (local state) or whatever its collaborator pointer resolves to at
 * the time of the check. The gate never mutates anything.
 */

import { Address, sameAddress } from '../ledger/address';
import { LedgerError } from '../ledger/errors';
import { AdminOracle } from '../ledger/types';

export interface RoleSources {
  owner: Address;
  admins: () => Pick<AdminOracle, 'checkIsAdmin'>;
  merchants?: () => Pick<AdminOracle, 'checkIsMerchant'>;
}

export class AccessGate {
  constructor(private readonly sources: RoleSources) {}

  isOwner(address: Address): boolean {
    return sameAddress(address, this.sources.owner);
  }

  isAdmin(address: Address): boolean {
    return this.sources.admins().checkIsAdmin(address);
  }

  isMerchant(address: Address): boolean {
    if (!this.sources.merchants) return false;
    return this.sources.merchants().checkIsMerchant(address);
  }

  /**
   * Owner, admin or merchant. Gate for product mutations.
   */
  isVerifiedManager(address: Address): boolean {
    return this.isOwner(address) || this.isAdmin(address) || this.isMerchant(address);
  }

  requireAdmin(address: Address): void {
    if (!this.isAdmin(address)) {
      throw new LedgerError('AccessDenied', `${address} is not a platform admin`, { caller: address });
    }
  }

  /**
   * Gate for changes to the admin set itself, so an owner who is not (or no
   * longer) an admin can still appoint one.
   */
  requireOwnerOrAdmin(address: Address): void {
    if (!this.isOwner(address) && !this.isAdmin(address)) {
      throw new LedgerError('AccessDenied', `${address} is neither the owner nor a platform admin`, {
        caller: address,
      });
    }
  }

  requireVerifiedManager(address: Address): void {
    if (!this.isVerifiedManager(address)) {
      throw new LedgerError('AccessDenied', `${address} is not a verified manager`, { caller: address });
    }
  }
}
