/**
 * Order Settlement
 *
 * Settles an order in one unit of work:
 *
 *   allocate ledger id -> split total -> append order -> pull commission to
 *   the platform wallet -> pull payout to the merchant payout address
 *
 * The order is appended before either transfer so that anything the token
 * calls back into already sees the order as settled. A transfer reporting
 * failure aborts the unit, and the host rolls back the order, the counter
 * and any transfer that did go through.
 *
 * Ledger ids come from a counter that only moves forward.
 */

import { z } from 'zod';
import { AccessGate } from '../access/access-gate';
import {
  CollaboratorPointer,
  isAdminOracle,
  isIdentityToken,
  isPlatformOracle,
} from '../access/collaborator-pointer';
import { ExecutionHost } from '../host/execution-host';
import { HostedContract } from '../host/hosted-contract';
import { Address, sameAddress, toAddress, toNonZeroAddress } from '../ledger/address';
import { LedgerError } from '../ledger/errors';
import { addressSchema, orderSchema } from '../ledger/schemas';
import { AdminOracle, IdentityTokenLike, Order, PlatformOracle } from '../ledger/types';
import { CollectionState, collectionIndexesSchema, IndexedCollection } from '../registry/indexed-collection';

export const BASIS_POINTS = 10_000;

export interface PaymentSplit {
  commission: bigint;
  merchantPayout: bigint;
}

/**
 * Commission is rounded down and taken first; the merchant gets the rest,
 * so the two parts always add up to the total.
 */
export function splitPayment(totalAmount: bigint, commissionRateBp: number): PaymentSplit {
  const commission = (totalAmount * BigInt(commissionRateBp)) / BigInt(BASIS_POINTS);
  return { commission, merchantPayout: totalAmount - commission };
}

function assertCommissionRate(rateBp: number): void {
  if (!Number.isInteger(rateBp) || rateBp < 0 || rateBp > BASIS_POINTS) {
    throw new LedgerError('InvalidArgument', `Commission rate must be an integer between 0 and ${BASIS_POINTS} bp`);
  }
}

export interface OrderSettlementState {
  orders: CollectionState<Order>;
  nextOrderId: number;
  commissionRateBp: number;
  platformWallet: Address;
  adminRegistry: Address;
  merchantRegistry: Address;
  token: Address;
}

const orderSettlementStateSchema = z.object({
  orders: z.object({
    records: z.array(orderSchema),
    indexes: collectionIndexesSchema,
  }),
  nextOrderId: z.number().int().positive(),
  commissionRateBp: z.number().int().min(0).max(BASIS_POINTS),
  platformWallet: addressSchema,
  adminRegistry: addressSchema,
  merchantRegistry: addressSchema,
  token: addressSchema,
});

export interface OrderSettlementOptions {
  owner: Address;
  adminRegistry: Address;
  merchantRegistry: Address;
  token: Address;
  platformWallet: Address;
  commissionRateBp: number;
}

export class OrderSettlement extends HostedContract<OrderSettlementState> {
  readonly gate: AccessGate;
  protected readonly stateSchema = orderSettlementStateSchema;

  private orders = new IndexedCollection<Order, 'createdBy'>(
    order => String(order.orderId),
    { createdBy: order => order.createdBy }
  );
  private nextOrderId = 1;
  private commissionRateBp: number;
  private platformWallet: Address;
  private readonly adminRegistry: CollaboratorPointer<AdminOracle>;
  private readonly merchantRegistry: CollaboratorPointer<PlatformOracle>;
  private readonly token: CollaboratorPointer<IdentityTokenLike>;

  constructor(host: ExecutionHost, address: Address, opts: OrderSettlementOptions) {
    super(host, address, 'OrderSettlement');

    const currentAuthority = (caller: Address): boolean => this.gate.isAdmin(caller);
    const candidateAuthority = (candidate: AdminOracle, caller: Address): boolean => candidate.checkIsAdmin(caller);

    this.adminRegistry = new CollaboratorPointer<AdminOracle>({
      label: 'adminRegistry',
      subsystem: this.name,
      host,
      holder: this.address,
      initial: opts.adminRegistry,
      accepts: isAdminOracle,
      currentAuthority,
      candidateAuthority,
    });
    this.merchantRegistry = new CollaboratorPointer<PlatformOracle>({
      label: 'merchantRegistry',
      subsystem: this.name,
      host,
      holder: this.address,
      initial: opts.merchantRegistry,
      accepts: isPlatformOracle,
      currentAuthority,
      candidateAuthority,
    });
    this.token = new CollaboratorPointer<IdentityTokenLike>({
      label: 'token',
      subsystem: this.name,
      host,
      holder: this.address,
      initial: opts.token,
      accepts: isIdentityToken,
      currentAuthority,
    });

    this.gate = new AccessGate({
      owner: toAddress(opts.owner),
      admins: () => this.adminRegistry.resolve(),
      merchants: () => this.merchantRegistry.resolve(),
    });

    assertCommissionRate(opts.commissionRateBp);
    this.commissionRateBp = opts.commissionRateBp;
    this.platformWallet = toNonZeroAddress(opts.platformWallet);
  }

  // ============================================================================
  // Payments
  // ============================================================================

  /**
   * Grant `settlementContract` an allowance over the caller's tokens. The
   * token sees the original caller as the owner of the allowance.
   */
  approvePayment(amount: bigint, settlementContract: string): boolean {
    const caller = this.host.sender;
    if (amount < 0n) {
      throw new LedgerError('InvalidArgument', 'Allowance cannot be negative');
    }
    const spender = toNonZeroAddress(settlementContract);

    if (!this.token.resolve().approve(spender, amount)) {
      throw new LedgerError('ExternalCallFailed', 'Token rejected the approval', { spender });
    }

    this.emit('PaymentApproved', 'Payment approved', [caller, spender], { amount: amount.toString() });
    return true;
  }

  processOrder(createdBy: string, orderReference: string, totalAmount: bigint): Order {
    const caller = this.host.sender;
    const creator = toNonZeroAddress(createdBy);
    if (!sameAddress(caller, creator) && !this.gate.isAdmin(caller)) {
      throw new LedgerError('AccessDenied', `${caller} may not settle orders for ${creator}`, { caller });
    }
    if (totalAmount <= 0n) {
      throw new LedgerError('InvalidArgument', 'Order total must be positive');
    }
    const reference = orderReference.trim();
    if (reference.length === 0) {
      throw new LedgerError('InvalidArgument', 'Order reference cannot be empty');
    }

    const merchantWallet = this.merchantRegistry.resolve().getMerchantPayoutAddress();
    const platformWallet = this.platformWallet;
    const token = this.token.resolve();
    const { commission, merchantPayout } = splitPayment(totalAmount, this.commissionRateBp);

    const order: Order = {
      orderId: this.nextOrderId,
      createdBy: creator,
      orderReference: reference,
      totalAmount,
      commission,
      merchantPayout,
      createdAt: this.host.timestamp,
    };
    this.touch();
    this.nextOrderId++;
    this.orders.insert(order);

    this.host.call(this.address, () => {
      if (!token.transferFrom(creator, platformWallet, commission)) {
        throw new LedgerError('ExternalCallFailed', `Commission transfer for order ${order.orderId} failed`, {
          orderId: order.orderId,
        });
      }
      if (!token.transferFrom(creator, merchantWallet, merchantPayout)) {
        throw new LedgerError('ExternalCallFailed', `Merchant payout for order ${order.orderId} failed`, {
          orderId: order.orderId,
        });
      }
    });

    this.emit('OrderProcessed', `Order ${order.orderId} processed`, [creator, platformWallet, merchantWallet], {
      orderId: order.orderId,
      totalAmount: totalAmount.toString(),
      commission: commission.toString(),
      merchantPayout: merchantPayout.toString(),
    });
    this.log.debug(this.name, 'Order processed', { orderId: order.orderId, createdBy: creator });
    return order;
  }

  // ============================================================================
  // Administration
  // ============================================================================

  /**
   * Move the counter forward, e.g. to continue the id sequence of a previous
   * deployment. Ids already handed out can never be handed out again.
   */
  resetOrderCounter(nextOrderId: number): number {
    const caller = this.host.sender;
    this.gate.requireAdmin(caller);

    if (!Number.isSafeInteger(nextOrderId) || nextOrderId < this.nextOrderId) {
      throw new LedgerError(
        'InvalidArgument',
        `Next order id must be an integer of at least ${this.nextOrderId}`,
        { current: this.nextOrderId }
      );
    }

    const previous = this.nextOrderId;
    this.touch();
    this.nextOrderId = nextOrderId;
    this.emit('OrderCounterReset', 'Order counter reset', [caller], { previous, next: nextOrderId });
    return previous;
  }

  setCommissionRate(rateBp: number): number {
    const caller = this.host.sender;
    this.gate.requireAdmin(caller);
    assertCommissionRate(rateBp);

    const previous = this.commissionRateBp;
    this.touch();
    this.commissionRateBp = rateBp;
    this.emit('CommissionRateUpdated', 'Commission rate updated', [caller], { previous, next: rateBp });
    return previous;
  }

  setPlatformWallet(address: string): Address {
    const caller = this.host.sender;
    this.gate.requireAdmin(caller);

    const target = toNonZeroAddress(address);
    const previous = this.platformWallet;
    this.touch();
    this.platformWallet = target;
    this.emit('PlatformWalletUpdated', 'Platform wallet updated', [previous, target, caller]);
    return previous;
  }

  setAdminRegistry(address: string): Address {
    return this.adminRegistry.rotate(this.host.sender, address);
  }

  setMerchantRegistry(address: string): Address {
    return this.merchantRegistry.rotate(this.host.sender, address);
  }

  setToken(address: string): Address {
    return this.token.rotate(this.host.sender, address);
  }

  // ============================================================================
  // Reads
  // ============================================================================

  getOrders(): Order[] {
    return this.orders.list();
  }

  getOrder(orderId: number): Order {
    const order = this.orders.get(String(orderId));
    if (!order) {
      throw new LedgerError('OrderNotFound', `Order ${orderId} not found`);
    }
    return order;
  }

  getOrdersByCreator(creator: string): Order[] {
    return this.orders.listBy('createdBy', toAddress(creator));
  }

  getNextOrderId(): number {
    return this.nextOrderId;
  }

  getCommissionRate(): number {
    return this.commissionRateBp;
  }

  getPlatformWallet(): Address {
    return this.platformWallet;
  }

  getCollaborators(): { adminRegistry: Address; merchantRegistry: Address; token: Address } {
    return {
      adminRegistry: this.adminRegistry.address,
      merchantRegistry: this.merchantRegistry.address,
      token: this.token.address,
    };
  }

  // ============================================================================
  // State
  // ============================================================================

  snapshot(): OrderSettlementState {
    return {
      orders: this.orders.snapshot(),
      nextOrderId: this.nextOrderId,
      commissionRateBp: this.commissionRateBp,
      platformWallet: this.platformWallet,
      adminRegistry: this.adminRegistry.snapshot(),
      merchantRegistry: this.merchantRegistry.snapshot(),
      token: this.token.snapshot(),
    };
  }

  restore(state: OrderSettlementState): void {
    this.orders.restore(state.orders);
    this.nextOrderId = state.nextOrderId;
    this.commissionRateBp = state.commissionRateBp;
    this.platformWallet = state.platformWallet;
    this.adminRegistry.restore(state.adminRegistry);
    this.merchantRegistry.restore(state.merchantRegistry);
    this.token.restore(state.token);
  }
}
