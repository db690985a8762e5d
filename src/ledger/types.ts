/**
 * Ledger Types
 *
 * Entity records kept by the registries and the settlement module, plus the
 * narrow interfaces through which modules talk to each other.
 */

import { Address } from './address';

// ============================================================================
// Entities
// ============================================================================

export interface AdminProfile {
  address: Address;
  addedBy: Address;
  addedAt: number;
}

export interface MerchantProfile {
  address: Address;
  addedBy: Address;
  addedAt: number;
  // Only field that changes after creation
  balance: bigint;
}

export interface Product {
  id: string;
  addedBy: Address;
  addedAt: number;
  updatedAt: number;
  imageReference: string;
  metadataReference: string;
  merchantAddress: Address;
}

export interface Order {
  orderId: number;
  createdBy: Address;
  orderReference: string;
  totalAmount: bigint;
  commission: bigint;
  merchantPayout: bigint;
  createdAt: number;
}

// ============================================================================
// Collaborator interfaces
// ============================================================================

/**
 * Answer to a liveness probe: who a hosted module says it is.
 */
export interface Identity {
  name: string;
  address: Address;
  timestamp: number;
}

export interface Identifiable {
  selfIdentify(): Identity;
}

/**
 * Authority source consulted for role checks.
 */
export interface AdminOracle extends Identifiable {
  checkIsAdmin(address: Address): boolean;
  checkIsMerchant(address: Address): boolean;
}

/**
 * Authority source that also knows where merchant proceeds are paid.
 */
export interface PlatformOracle extends AdminOracle {
  getMerchantPayoutAddress(): Address;
}

/**
 * Fungible value transfer collaborator. `false` means the transfer did not
 * happen (insufficient balance or allowance).
 */
export interface IdentityTokenLike extends Identifiable {
  transferFrom(from: Address, to: Address, amount: bigint): boolean;
  approve(spender: Address, amount: bigint): boolean;
  balanceOf(account: Address): bigint;
  allowance(owner: Address, spender: Address): bigint;
}

// ============================================================================
// Notifications
// ============================================================================

export type NotificationType =
  | 'AdminAdded'
  | 'AdminRemoved'
  | 'MerchantAdded'
  | 'MerchantRemoved'
  | 'MerchantBalanceUpdated'
  | 'MerchantPayoutAddressUpdated'
  | 'ProductAdded'
  | 'ProductUpdated'
  | 'ProductDeleted'
  | 'OrderProcessed'
  | 'OrderCounterReset'
  | 'PaymentApproved'
  | 'CommissionRateUpdated'
  | 'PlatformWalletUpdated'
  | 'CollaboratorRotated'
  | 'TokenTransfer'
  | 'TokenApproval';

export interface Notification {
  type: NotificationType;
  message: string;
  timestamp: number;
  subsystem: string;
  subjects: Address[];
  data?: Record<string, string | number | boolean>;
}

/**
 * Consumer of committed notifications. A sink failure never fails the
 * operation that produced the notification.
 */
export interface NotificationSink {
  publish(notification: Notification): void;
}
