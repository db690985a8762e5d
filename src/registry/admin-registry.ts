/**
 * Admin Registry
 *
 * Platform administrators, kept in three views over one arena:
 * the global admin list, one list per adding admin, and address -> profile.
 * The master admin is seeded at construction as added by the owner; every
 * later change is open to the owner and to admins.
 */

import { z } from 'zod';
import { AccessGate } from '../access/access-gate';
import { ExecutionHost } from '../host/execution-host';
import { HostedContract } from '../host/hosted-contract';
import { Address, toAddress, toNonZeroAddress } from '../ledger/address';
import { LedgerError } from '../ledger/errors';
import { adminProfileSchema } from '../ledger/schemas';
import { AdminOracle, AdminProfile } from '../ledger/types';
import { CollectionState, collectionIndexesSchema, IndexedCollection } from './indexed-collection';

export interface AdminRegistryState {
  admins: CollectionState<AdminProfile>;
}

const adminRegistryStateSchema = z.object({
  admins: z.object({
    records: z.array(adminProfileSchema),
    indexes: collectionIndexesSchema,
  }),
});

export interface AdminRegistryOptions {
  owner: Address;
  masterAdmin: Address;
}

export class AdminRegistry extends HostedContract<AdminRegistryState> implements AdminOracle {
  readonly gate: AccessGate;
  protected readonly stateSchema = adminRegistryStateSchema;

  private admins = new IndexedCollection<AdminProfile, 'addedBy'>(
    admin => admin.address,
    { addedBy: admin => admin.addedBy }
  );

  constructor(host: ExecutionHost, address: Address, opts: AdminRegistryOptions) {
    super(host, address, 'AdminRegistry');
    const owner = toNonZeroAddress(opts.owner);
    this.gate = new AccessGate({ owner, admins: () => this });
    this.admins.insert({
      address: toNonZeroAddress(opts.masterAdmin),
      addedBy: owner,
      addedAt: host.timestamp,
    });
  }

  // ============================================================================
  // Mutations
  // ============================================================================

  addAdmin(address: string): AdminProfile {
    const caller = this.host.sender;
    this.gate.requireOwnerOrAdmin(caller);

    const target = toNonZeroAddress(address);
    const existing = this.admins.get(target);
    if (existing) {
      throw new LedgerError('AlreadyAdmin', `${target} is already an admin`, { existing });
    }

    const profile: AdminProfile = {
      address: target,
      addedBy: caller,
      addedAt: this.host.timestamp,
    };
    this.touch();
    this.admins.insert(profile);

    this.emit('AdminAdded', 'Platform admin added', [target, caller]);
    this.log.debug(this.name, 'Admin added', { admin: target, addedBy: caller });
    return profile;
  }

  /**
   * Drops the admin from the global list and from its adder's list.
   * Both removals swap the last entry into the freed slot.
   */
  removeAdmin(address: string): AdminProfile {
    const caller = this.host.sender;
    this.gate.requireOwnerOrAdmin(caller);

    const target = toAddress(address);
    this.touch();
    const removed = this.admins.remove(target);
    if (!removed) {
      throw new LedgerError('NotAdmin', `${target} is not an admin`);
    }

    this.emit('AdminRemoved', 'Platform admin removed', [target, caller]);
    this.log.debug(this.name, 'Admin removed', { admin: target, removedBy: caller });
    return removed;
  }

  // ============================================================================
  // Reads
  // ============================================================================

  getPlatformAdmins(): AdminProfile[] {
    return this.admins.list();
  }

  getAdminRegistrations(adder: string): AdminProfile[] {
    return this.admins.listBy('addedBy', toAddress(adder));
  }

  checkIsAdmin(address: string): boolean {
    return this.admins.has(toAddress(address));
  }

  // Merchants live in the merchant registry
  checkIsMerchant(_address: string): boolean {
    return false;
  }

  getAdminProfile(address: string): AdminProfile {
    const target = toAddress(address);
    const profile = this.admins.get(target);
    if (!profile) {
      throw new LedgerError('NotAdmin', `${target} is not an admin`);
    }
    return profile;
  }

  // ============================================================================
  // State
  // ============================================================================

  snapshot(): AdminRegistryState {
    return { admins: this.admins.snapshot() };
  }

  restore(state: AdminRegistryState): void {
    this.admins.restore(state.admins);
  }
}
