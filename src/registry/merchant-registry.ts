/**
 * Merchant Registry
 *
 * Merchants, with the same three views as the admin registry plus a balance
 * per merchant, the payout destination used by order settlement, and the
 * liquidity operator allowed to write balances.
 *
 * Admin checks are not answered locally: they go through the admin-registry
 * pointer, which can only be rotated with verify-before-commit.
 */

import { z } from 'zod';
import { AccessGate } from '../access/access-gate';
import { CollaboratorPointer, isAdminOracle, isIdentifiable } from '../access/collaborator-pointer';
import { ExecutionHost } from '../host/execution-host';
import { HostedContract } from '../host/hosted-contract';
import { Address, sameAddress, toAddress, toNonZeroAddress, ZERO_ADDRESS } from '../ledger/address';
import { LedgerError } from '../ledger/errors';
import { addressSchema, merchantProfileSchema } from '../ledger/schemas';
import { AdminOracle, Identifiable, MerchantProfile, PlatformOracle } from '../ledger/types';
import { CollectionState, collectionIndexesSchema, IndexedCollection } from './indexed-collection';

export interface MerchantRegistryState {
  merchants: CollectionState<MerchantProfile>;
  // Balances written for addresses that are not merchants
  phantoms: MerchantProfile[];
  payoutAddress: Address;
  adminRegistry: Address;
  liquidityOperator: Address;
}

const merchantRegistryStateSchema = z.object({
  merchants: z.object({
    records: z.array(merchantProfileSchema),
    indexes: collectionIndexesSchema,
  }),
  phantoms: z.array(merchantProfileSchema),
  payoutAddress: addressSchema,
  adminRegistry: addressSchema,
  liquidityOperator: addressSchema,
});

export interface MerchantRegistryOptions {
  owner: Address;
  adminRegistry: Address;
  liquidityOperator: Address;
  payoutAddress: Address;
}

export class MerchantRegistry extends HostedContract<MerchantRegistryState> implements PlatformOracle {
  readonly gate: AccessGate;
  protected readonly stateSchema = merchantRegistryStateSchema;

  private merchants = new IndexedCollection<MerchantProfile, 'addedBy'>(
    merchant => merchant.address,
    { addedBy: merchant => merchant.addedBy }
  );
  private phantoms: Map<Address, MerchantProfile> = new Map();
  private payoutAddress: Address;
  private readonly adminRegistry: CollaboratorPointer<AdminOracle>;
  private readonly liquidityOperator: CollaboratorPointer<Identifiable>;

  constructor(host: ExecutionHost, address: Address, opts: MerchantRegistryOptions) {
    super(host, address, 'MerchantRegistry');

    this.adminRegistry = new CollaboratorPointer<AdminOracle>({
      label: 'adminRegistry',
      subsystem: this.name,
      host,
      holder: this.address,
      initial: opts.adminRegistry,
      accepts: isAdminOracle,
      currentAuthority: caller => this.gate.isAdmin(caller),
      candidateAuthority: (candidate, caller) => candidate.checkIsAdmin(caller),
    });

    this.liquidityOperator = new CollaboratorPointer<Identifiable>({
      label: 'liquidityOperator',
      subsystem: this.name,
      host,
      holder: this.address,
      initial: opts.liquidityOperator,
      accepts: isIdentifiable,
      currentAuthority: caller => this.gate.isAdmin(caller),
    });

    this.gate = new AccessGate({
      owner: toAddress(opts.owner),
      admins: () => this.adminRegistry.resolve(),
      merchants: () => this,
    });

    this.payoutAddress = toNonZeroAddress(opts.payoutAddress);
  }

  // ============================================================================
  // Mutations
  // ============================================================================

  addMerchant(address: string): MerchantProfile {
    const caller = this.host.sender;
    this.gate.requireAdmin(caller);

    const target = toNonZeroAddress(address);
    const existing = this.merchants.get(target);
    if (existing) {
      throw new LedgerError('AlreadyMerchant', `${target} is already a merchant`, { existing });
    }

    const profile: MerchantProfile = {
      address: target,
      addedBy: caller,
      addedAt: this.host.timestamp,
      balance: 0n,
    };
    this.touch();
    // A real record supersedes any phantom balance
    this.phantoms.delete(target);
    this.merchants.insert(profile);

    this.emit('MerchantAdded', 'Merchant added', [target, caller]);
    this.log.debug(this.name, 'Merchant added', { merchant: target, addedBy: caller });
    return profile;
  }

  removeMerchant(address: string): MerchantProfile {
    const caller = this.host.sender;
    this.gate.requireAdmin(caller);

    const target = toAddress(address);
    this.touch();
    const removed = this.merchants.remove(target);
    if (!removed) {
      throw new LedgerError('NotMerchant', `${target} is not a merchant`);
    }

    this.emit('MerchantRemoved', 'Merchant removed', [target, caller]);
    this.log.debug(this.name, 'Merchant removed', { merchant: target, removedBy: caller });
    return removed;
  }

  /**
   * Admins and the liquidity operator may set a balance. There is
   * deliberately no merchant check: a balance written for an unknown address
   * lands in the profile map as a phantom entry, outside every list view.
   */
  updateMerchantBalance(address: string, newBalance: bigint): MerchantProfile {
    const caller = this.host.sender;
    if (!this.gate.isAdmin(caller) && !sameAddress(caller, this.liquidityOperator.address)) {
      throw new LedgerError('ApprovedOperatorsOnly', `${caller} may not update merchant balances`, { caller });
    }
    if (newBalance < 0n) {
      throw new LedgerError('InvalidArgument', 'Balance cannot be negative');
    }

    const target = toAddress(address);
    const existing = this.merchants.get(target);
    this.touch();
    let profile: MerchantProfile;
    if (existing) {
      profile = { ...existing, balance: newBalance };
      this.merchants.replace(profile);
    } else {
      profile = this.phantoms.get(target) ?? { address: target, addedBy: ZERO_ADDRESS, addedAt: 0, balance: 0n };
      profile = Object.freeze({ ...profile, balance: newBalance });
      this.phantoms.set(target, profile);
      this.log.warn(this.name, 'Balance written for an address that is not a merchant', { address: target });
    }

    this.emit('MerchantBalanceUpdated', 'Merchant balance updated', [target, caller], {
      balance: newBalance.toString(),
    });
    return profile;
  }

  setMerchantPayoutAddress(address: string): Address {
    const caller = this.host.sender;
    this.gate.requireAdmin(caller);

    const target = toNonZeroAddress(address);
    const previous = this.payoutAddress;
    this.touch();
    this.payoutAddress = target;

    this.emit('MerchantPayoutAddressUpdated', 'Merchant payout address updated', [previous, target, caller]);
    return target;
  }

  setAdminRegistry(address: string): Address {
    return this.adminRegistry.rotate(this.host.sender, address);
  }

  setLiquidityOperator(address: string): Address {
    return this.liquidityOperator.rotate(this.host.sender, address);
  }

  // ============================================================================
  // Reads
  // ============================================================================

  getPlatformMerchants(): MerchantProfile[] {
    return this.merchants.list();
  }

  getMerchantRegistrations(adder: string): MerchantProfile[] {
    return this.merchants.listBy('addedBy', toAddress(adder));
  }

  checkIsMerchant(address: string): boolean {
    return this.merchants.has(toAddress(address));
  }

  checkIsAdmin(address: string): boolean {
    return this.gate.isAdmin(toAddress(address));
  }

  getMerchantProfile(address: string): MerchantProfile {
    const target = toAddress(address);
    const profile = this.merchants.get(target);
    if (!profile) {
      throw new LedgerError('NotMerchant', `${target} is not a merchant`);
    }
    return profile;
  }

  /**
   * Balance as stored in the profile map, phantom entries included.
   */
  getMerchantBalance(address: string): bigint {
    const target = toAddress(address);
    return (this.merchants.get(target) ?? this.phantoms.get(target))?.balance ?? 0n;
  }

  getMerchantPayoutAddress(): Address {
    return this.payoutAddress;
  }

  getAdminRegistry(): Address {
    return this.adminRegistry.address;
  }

  getLiquidityOperator(): Address {
    return this.liquidityOperator.address;
  }

  // ============================================================================
  // State
  // ============================================================================

  snapshot(): MerchantRegistryState {
    return {
      merchants: this.merchants.snapshot(),
      phantoms: Array.from(this.phantoms.values()),
      payoutAddress: this.payoutAddress,
      adminRegistry: this.adminRegistry.snapshot(),
      liquidityOperator: this.liquidityOperator.snapshot(),
    };
  }

  restore(state: MerchantRegistryState): void {
    this.merchants.restore(state.merchants);
    this.phantoms = new Map(state.phantoms.map(profile => [profile.address, profile]));
    this.payoutAddress = state.payoutAddress;
    this.adminRegistry.restore(state.adminRegistry);
    this.liquidityOperator.restore(state.liquidityOperator);
  }
}
