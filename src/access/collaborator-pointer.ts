/**
 * Collaborator Pointer: verify-before-commit rotation
 *
 * A module that trusts another module for its access checks stores that
 * module's address here. Repointing to a broken or foreign registry would
 * make every later admin check fail, including the one guarding the next
 * rotation, so a rotation is only committed once the candidate has
 *
 *   1. been proposed by a caller authorized under the current collaborator
 *   2. a non-null address other than the holding module's own
 *   3. answered a liveness probe reporting exactly its own address
 *   4. recognized the same caller as admin (authority pointers only)
 *
 * Step 4 is evaluated with the pointer already moved to the candidate, so a
 * candidate that delegates back into the holding module answers exactly as
 * it would after the commit. A delegation cycle never settles; it is refused.
 * The pointer is back in place before step 4 returns, so steps 1-4 have no
 * side effects. If the candidate lies in its self-report the pointer still
 * moves: that residual trust is accepted.
 */

import { ExecutionHost } from '../host/execution-host';
import { Address, isZeroAddress, sameAddress, toAddress } from '../ledger/address';
import { LedgerError } from '../ledger/errors';
import { AdminOracle, Identifiable, IdentityTokenLike, PlatformOracle } from '../ledger/types';

export type InterfaceGuard<T> = (candidate: unknown) => candidate is T;

export interface CollaboratorPointerOptions<T extends Identifiable> {
  label: string;
  subsystem: string;
  host: ExecutionHost;
  // Address of the module that holds this pointer
  holder: Address;
  initial: Address;
  accepts: InterfaceGuard<T>;
  // Step 1: is the caller authorized under the collaborator in force now?
  currentAuthority: (caller: Address) => boolean;
  // Step 4: would the caller still be authorized under the candidate?
  candidateAuthority?: (candidate: T, caller: Address) => boolean;
}

export class CollaboratorPointer<T extends Identifiable> {
  readonly label: string;
  private current: Address;
  private readonly opts: CollaboratorPointerOptions<T>;

  constructor(opts: CollaboratorPointerOptions<T>) {
    this.opts = opts;
    this.label = opts.label;
    this.current = toAddress(opts.initial);
  }

  get address(): Address {
    return this.current;
  }

  /**
   * The collaborator currently pointed to.
   */
  resolve(): T {
    return this.lookup(this.current);
  }

  /**
   * Side-effect free checks for a proposed address (steps 2 and 3).
   */
  probe(newAddress: string): T {
    const target = toAddress(newAddress);
    if (isZeroAddress(target)) {
      throw new LedgerError('ZeroAddress', `${this.label} cannot point to the null address`);
    }
    if (sameAddress(target, this.opts.holder)) {
      throw new LedgerError('InvalidArgument', `${this.label} cannot point to its own module`, { address: target });
    }

    const candidate = this.lookup(target);
    const identity = candidate.selfIdentify();
    if (!sameAddress(identity.address, target)) {
      throw new LedgerError(
        'NonMatchingAddress',
        `${this.label} candidate at ${target} reports itself as ${identity.address}`,
        { expected: target, reported: identity.address }
      );
    }
    return candidate;
  }

  rotate(caller: Address, newAddress: string): Address {
    if (!this.opts.currentAuthority(caller)) {
      throw new LedgerError('AccessDenied', `${caller} may not rotate ${this.label}`, { caller });
    }

    const candidate = this.probe(newAddress);
    const target = toAddress(newAddress);

    const check = this.opts.candidateAuthority;
    if (check && !this.evaluateUnder(target, () => check(candidate, caller))) {
      throw new LedgerError(
        'AccessDenied',
        `${caller} would not be an admin on ${target}; refusing to rotate ${this.label}`,
        { caller, candidate: target }
      );
    }

    const previous = this.current;
    this.opts.host.touch(this.opts.holder);
    this.current = target;

    this.opts.host.emit({
      type: 'CollaboratorRotated',
      message: `${this.label} rotated`,
      subsystem: this.opts.subsystem,
      subjects: [previous, target, caller],
      data: { pointer: this.label },
    });

    return previous;
  }

  // Pointer state lives inside the owning module's snapshot
  snapshot(): Address {
    return this.current;
  }

  restore(address: Address): void {
    this.current = address;
  }

  private evaluateUnder(target: Address, check: () => boolean): boolean {
    const previous = this.current;
    this.current = target;
    try {
      return check();
    } catch (error) {
      if (error instanceof LedgerError) throw error;
      // A delegation cycle ends in a stack overflow
      throw new LedgerError(
        'AccessDenied',
        `${this.label} candidate ${target} could not confirm the caller: ${error instanceof Error ? error.message : String(error)}`,
        { candidate: target }
      );
    } finally {
      this.current = previous;
    }
  }

  private lookup(address: Address): T {
    const contract = this.opts.host.resolve(address);
    if (!contract || !this.opts.accepts(contract)) {
      throw new LedgerError(
        'ExternalCallFailed',
        `${this.label}: no compatible module at ${address}`,
        { address }
      );
    }
    return contract;
  }
}

// ============================================================================
// Interface guards
// ============================================================================

function hasMethods(candidate: unknown, names: string[]): candidate is Record<string, unknown> {
  if (typeof candidate !== 'object' || candidate === null) return false;
  return names.every(name => name in candidate && typeof Reflect.get(candidate, name) === 'function');
}

export function isIdentifiable(candidate: unknown): candidate is Identifiable {
  return hasMethods(candidate, ['selfIdentify']);
}

export function isAdminOracle(candidate: unknown): candidate is AdminOracle {
  return hasMethods(candidate, ['selfIdentify', 'checkIsAdmin', 'checkIsMerchant']);
}

export function isPlatformOracle(candidate: unknown): candidate is PlatformOracle {
  return isAdminOracle(candidate) && hasMethods(candidate, ['getMerchantPayoutAddress']);
}

export function isIdentityToken(candidate: unknown): candidate is IdentityTokenLike {
  return hasMethods(candidate, ['selfIdentify', 'transferFrom', 'approve', 'balanceOf', 'allowance']);
}
