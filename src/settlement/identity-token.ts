/**
 * Identity Token
 *
 * Minimal fungible token the settlement module pays through. Allowances are
 * keyed by (owner, spender); `transferFrom` spends the allowance of whoever
 * is calling, which for settlement is the settlement module itself.
 *
 * Insufficient balance or allowance is reported as `false`, never thrown:
 * deciding whether that is fatal is the caller's business.
 */

import { z } from 'zod';
import { ExecutionHost } from '../host/execution-host';
import { HostedContract } from '../host/hosted-contract';
import { Address, sameAddress, toAddress, toNonZeroAddress } from '../ledger/address';
import { LedgerError } from '../ledger/errors';
import { addressSchema } from '../ledger/schemas';
import { IdentityTokenLike } from '../ledger/types';

export interface IdentityTokenState {
  totalSupply: bigint;
  balances: Array<[Address, bigint]>;
  allowances: Array<[Address, Address, bigint]>;
}

const identityTokenStateSchema = z.object({
  totalSupply: z.bigint().nonnegative(),
  balances: z.array(z.tuple([addressSchema, z.bigint().nonnegative()])),
  allowances: z.array(z.tuple([addressSchema, addressSchema, z.bigint().nonnegative()])),
});

export interface IdentityTokenOptions {
  owner: Address;
  name?: string;
}

function allowanceKey(owner: Address, spender: Address): string {
  return `${owner}:${spender}`;
}

export class IdentityToken extends HostedContract<IdentityTokenState> implements IdentityTokenLike {
  readonly owner: Address;
  protected readonly stateSchema = identityTokenStateSchema;

  private totalSupply = 0n;
  private balances: Map<Address, bigint> = new Map();
  private allowances: Map<string, { owner: Address; spender: Address; amount: bigint }> = new Map();

  constructor(host: ExecutionHost, address: Address, opts: IdentityTokenOptions) {
    super(host, address, opts.name ?? 'IdentityToken');
    this.owner = toNonZeroAddress(opts.owner);
  }

  /**
   * Issue new units. Owner only.
   */
  mint(to: string, amount: bigint): bigint {
    const caller = this.host.sender;
    if (!sameAddress(caller, this.owner)) {
      throw new LedgerError('AccessDenied', `${caller} may not mint ${this.name}`, { caller });
    }
    if (amount <= 0n) {
      throw new LedgerError('InvalidArgument', 'Mint amount must be positive');
    }

    const recipient = toNonZeroAddress(to);
    this.touch();
    this.balances.set(recipient, this.balanceOf(recipient) + amount);
    this.totalSupply += amount;

    this.emit('TokenTransfer', 'Tokens minted', [recipient], { amount: amount.toString() });
    return this.balanceOf(recipient);
  }

  transfer(to: string, amount: bigint): boolean {
    return this.move(this.host.sender, toNonZeroAddress(to), amount);
  }

  /**
   * Let `spender` move up to `amount` of the caller's balance. Replaces any
   * previous allowance.
   */
  approve(spender: string, amount: bigint): boolean {
    const owner = this.host.sender;
    const target = toNonZeroAddress(spender);
    if (amount < 0n) {
      throw new LedgerError('InvalidArgument', 'Allowance cannot be negative');
    }

    const key = allowanceKey(owner, target);
    this.touch();
    if (amount === 0n) {
      this.allowances.delete(key);
    } else {
      this.allowances.set(key, { owner, spender: target, amount });
    }

    this.emit('TokenApproval', 'Allowance set', [owner, target], { amount: amount.toString() });
    return true;
  }

  transferFrom(from: string, to: string, amount: bigint): boolean {
    const spender = this.host.sender;
    const source = toAddress(from);
    const key = allowanceKey(source, spender);
    const allowed = this.allowance(source, spender);
    if (amount < 0n || allowed < amount) {
      return false;
    }

    if (!this.move(source, toNonZeroAddress(to), amount)) {
      return false;
    }

    const remaining = allowed - amount;
    if (remaining === 0n) {
      this.allowances.delete(key);
    } else {
      this.allowances.set(key, { owner: source, spender, amount: remaining });
    }
    return true;
  }

  balanceOf(account: string): bigint {
    return this.balances.get(toAddress(account)) ?? 0n;
  }

  allowance(owner: string, spender: string): bigint {
    return this.allowances.get(allowanceKey(toAddress(owner), toAddress(spender)))?.amount ?? 0n;
  }

  getTotalSupply(): bigint {
    return this.totalSupply;
  }

  snapshot(): IdentityTokenState {
    return {
      totalSupply: this.totalSupply,
      balances: Array.from(this.balances.entries()),
      allowances: Array.from(this.allowances.values(), entry => [entry.owner, entry.spender, entry.amount]),
    };
  }

  restore(state: IdentityTokenState): void {
    this.totalSupply = state.totalSupply;
    this.balances = new Map(state.balances);
    this.allowances = new Map(
      state.allowances.map(([owner, spender, amount]) => [allowanceKey(owner, spender), { owner, spender, amount }])
    );
  }

  private move(from: Address, to: Address, amount: bigint): boolean {
    const available = this.balanceOf(from);
    if (amount < 0n || available < amount) {
      return false;
    }

    this.touch();
    this.balances.set(from, available - amount);
    this.balances.set(to, this.balanceOf(to) + amount);

    this.emit('TokenTransfer', 'Tokens transferred', [from, to], { amount: amount.toString() });
    return true;
  }
}
