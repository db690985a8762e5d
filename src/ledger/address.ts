/**
 * Account addresses
 *
 * Every participant (admin, merchant, buyer, hosted module) is identified by a
 * 20-byte address rendered as EIP-55 checksummed hex. Inputs are normalized
 * once at the boundary so that map keys and comparisons are byte-exact.
 */

import { getAddress, isAddress, ZeroAddress } from 'ethers';
import { LedgerError } from './errors';

export type Address = string;

export const ZERO_ADDRESS: Address = ZeroAddress;

/**
 * Normalize an address to its checksummed form.
 * Fails InvalidArgument for anything that is not 20 bytes of hex.
 */
export function toAddress(value: string): Address {
  if (!isAddress(value)) {
    throw new LedgerError('InvalidArgument', `Invalid address: ${value}`);
  }
  return getAddress(value);
}

export function isZeroAddress(address: Address): boolean {
  return address === ZERO_ADDRESS;
}

/**
 * Same as toAddress, but the null address fails ZeroAddress.
 */
export function toNonZeroAddress(value: string): Address {
  const address = toAddress(value);
  if (isZeroAddress(address)) {
    throw new LedgerError('ZeroAddress', 'The null address is not allowed here');
  }
  return address;
}

export function sameAddress(a: Address, b: Address): boolean {
  return a.toLowerCase() === b.toLowerCase();
}
