/**
 * Hosted modules that misbehave on purpose, for collaborator tests.
 */

import { z } from 'zod';
import { ExecutionHost } from '../host/execution-host';
import { HostedContract } from '../host/hosted-contract';
import { Address, sameAddress } from '../ledger/address';
import { Identity, IdentityTokenLike, PlatformOracle } from '../ledger/types';

interface StubOracleState {
  admins: string[];
}

/**
 * Platform oracle with a fixed admin set whose self-report can be forged.
 */
export class StubOracle extends HostedContract<StubOracleState> implements PlatformOracle {
  protected readonly stateSchema = z.object({ admins: z.array(z.string()) });
  reportedAddress: Address | null = null;
  private admins: string[];

  constructor(host: ExecutionHost, address: Address, admins: Address[], private readonly payout: Address) {
    super(host, address, 'StubOracle');
    this.admins = [...admins];
  }

  selfIdentify(): Identity {
    const identity = super.selfIdentify();
    return this.reportedAddress ? { ...identity, address: this.reportedAddress } : identity;
  }

  checkIsAdmin(address: string): boolean {
    return this.admins.some(admin => sameAddress(admin, address));
  }

  checkIsMerchant(_address: string): boolean {
    return false;
  }

  getMerchantPayoutAddress(): Address {
    return this.payout;
  }

  snapshot(): StubOracleState {
    return { admins: [...this.admins] };
  }

  restore(state: StubOracleState): void {
    this.admins = [...state.admins];
  }
}

export interface TransferCall {
  sender: Address;
  from: Address;
  to: Address;
  amount: bigint;
  observed: number;
}

/**
 * Token that answers transferFrom from a script and records what the
 * settlement looked like at each call. The record survives rollbacks.
 */
export class ScriptedToken extends HostedContract<{ calls: number }> implements IdentityTokenLike {
  protected readonly stateSchema = z.object({ calls: z.number().int() });
  readonly calls: TransferCall[] = [];
  private callCount = 0;

  constructor(
    host: ExecutionHost,
    address: Address,
    private readonly script: boolean[],
    private readonly observe: () => number
  ) {
    super(host, address, 'ScriptedToken');
  }

  transferFrom(from: string, to: string, amount: bigint): boolean {
    this.calls.push({ sender: this.host.sender, from, to, amount, observed: this.observe() });
    const result = this.script[this.callCount] ?? true;
    this.touch();
    this.callCount++;
    return result;
  }

  approve(_spender: string, _amount: bigint): boolean {
    return true;
  }

  balanceOf(_account: string): bigint {
    return 0n;
  }

  allowance(_owner: string, _spender: string): bigint {
    return 0n;
  }

  snapshot(): { calls: number } {
    return { calls: this.callCount };
  }

  restore(state: { calls: number }): void {
    this.callCount = state.calls;
  }
}
