/**
 * Product Registry
 *
 * Products are filed in four views over one arena: the global list, the
 * adder's list, the merchant's list and id -> product. Every mutation is
 * open to verified managers (owner, admin or merchant); role and merchant
 * checks go through the merchant-registry pointer.
 */

import { z } from 'zod';
import { AccessGate } from '../access/access-gate';
import { CollaboratorPointer, isAdminOracle } from '../access/collaborator-pointer';
import { ExecutionHost } from '../host/execution-host';
import { HostedContract } from '../host/hosted-contract';
import { Address, toAddress } from '../ledger/address';
import { LedgerError } from '../ledger/errors';
import { addressSchema, productSchema } from '../ledger/schemas';
import { AdminOracle, Product } from '../ledger/types';
import { CollectionState, collectionIndexesSchema, IndexedCollection } from './indexed-collection';

export interface ProductRegistryState {
  products: CollectionState<Product>;
  merchantRegistry: Address;
}

const productRegistryStateSchema = z.object({
  products: z.object({
    records: z.array(productSchema),
    indexes: collectionIndexesSchema,
  }),
  merchantRegistry: addressSchema,
});

export interface ProductRegistryOptions {
  owner: Address;
  merchantRegistry: Address;
}

export interface ProductInput {
  id: string;
  imageReference: string;
  metadataReference: string;
  merchantAddress: string;
}

// Ids are compared exactly, so edge whitespace would make lookalike ids
function validateProductId(id: string): string {
  if (id.length === 0) {
    throw new LedgerError('InvalidArgument', 'Product id cannot be empty');
  }
  if (id.trim() !== id) {
    throw new LedgerError('InvalidArgument', `Product id "${id}" has leading or trailing whitespace`);
  }
  return id;
}

export class ProductRegistry extends HostedContract<ProductRegistryState> {
  readonly gate: AccessGate;
  protected readonly stateSchema = productRegistryStateSchema;

  private products = new IndexedCollection<Product, 'addedBy' | 'merchant'>(
    product => product.id,
    {
      addedBy: product => product.addedBy,
      merchant: product => product.merchantAddress,
    }
  );
  private readonly merchantRegistry: CollaboratorPointer<AdminOracle>;

  constructor(host: ExecutionHost, address: Address, opts: ProductRegistryOptions) {
    super(host, address, 'ProductRegistry');

    this.merchantRegistry = new CollaboratorPointer<AdminOracle>({
      label: 'merchantRegistry',
      subsystem: this.name,
      host,
      holder: this.address,
      initial: opts.merchantRegistry,
      accepts: isAdminOracle,
      currentAuthority: caller => this.gate.isAdmin(caller),
      candidateAuthority: (candidate, caller) => candidate.checkIsAdmin(caller),
    });

    this.gate = new AccessGate({
      owner: toAddress(opts.owner),
      admins: () => this.merchantRegistry.resolve(),
      merchants: () => this.merchantRegistry.resolve(),
    });
  }

  // ============================================================================
  // Mutations
  // ============================================================================

  addProduct(input: ProductInput): Product {
    const caller = this.host.sender;
    this.gate.requireVerifiedManager(caller);

    const id = validateProductId(input.id);
    const existing = this.products.get(id);
    if (existing) {
      throw new LedgerError('ProductExists', `Product ${id} already exists`, { existing });
    }

    const merchantAddress = toAddress(input.merchantAddress);
    if (!this.merchantRegistry.resolve().checkIsMerchant(merchantAddress)) {
      throw new LedgerError('MerchantNotFound', `${merchantAddress} is not a merchant`);
    }

    const now = this.host.timestamp;
    const product: Product = {
      id,
      addedBy: caller,
      addedAt: now,
      updatedAt: now,
      imageReference: input.imageReference,
      metadataReference: input.metadataReference,
      merchantAddress,
    };
    this.touch();
    this.products.insert(product);

    this.emit('ProductAdded', `Product ${id} added`, [merchantAddress, caller], { productId: id });
    this.log.debug(this.name, 'Product added', { productId: id, merchant: merchantAddress, addedBy: caller });
    return product;
  }

  /**
   * Only the references and updatedAt change; the merchant is not re-checked.
   */
  updateProduct(id: string, imageReference: string, metadataReference: string): Product {
    const caller = this.host.sender;
    this.gate.requireVerifiedManager(caller);

    const existing = this.requireProduct(validateProductId(id));
    const updated: Product = {
      ...existing,
      imageReference,
      metadataReference,
      updatedAt: this.host.timestamp,
    };
    this.touch();
    this.products.replace(updated);

    this.emit('ProductUpdated', `Product ${updated.id} updated`, [updated.merchantAddress, caller], {
      productId: updated.id,
    });
    return updated;
  }

  deleteProduct(id: string): Product {
    const caller = this.host.sender;
    this.gate.requireVerifiedManager(caller);

    const productId = validateProductId(id);
    this.touch();
    const removed = this.products.remove(productId);
    if (!removed) {
      throw new LedgerError('ProductNotFound', `Product ${productId} not found`);
    }

    this.emit('ProductDeleted', `Product ${productId} deleted`, [removed.merchantAddress, caller], {
      productId,
    });
    return removed;
  }

  setMerchantRegistry(address: string): Address {
    return this.merchantRegistry.rotate(this.host.sender, address);
  }

  // ============================================================================
  // Reads
  // ============================================================================

  getProduct(id: string): Product {
    return this.requireProduct(validateProductId(id));
  }

  hasProduct(id: string): boolean {
    return this.products.has(id);
  }

  /**
   * Products filed by one adder. The adder must still be a verified manager.
   */
  getProductsByAdder(adder: string): Product[] {
    const address = toAddress(adder);
    if (!this.gate.isVerifiedManager(address)) {
      throw new LedgerError('NotAdmin', `${address} is not an active manager`);
    }
    return this.products.listBy('addedBy', address);
  }

  getProductsByMerchant(merchant: string): Product[] {
    return this.products.listBy('merchant', toAddress(merchant));
  }

  getAllProducts(): Product[] {
    return this.products.list();
  }

  getMerchantRegistry(): Address {
    return this.merchantRegistry.address;
  }

  // ============================================================================
  // State
  // ============================================================================

  snapshot(): ProductRegistryState {
    return {
      products: this.products.snapshot(),
      merchantRegistry: this.merchantRegistry.snapshot(),
    };
  }

  restore(state: ProductRegistryState): void {
    this.products.restore(state.products);
    this.merchantRegistry.restore(state.merchantRegistry);
  }

  private requireProduct(id: string): Product {
    const product = this.products.get(id);
    if (!product) {
      throw new LedgerError('ProductNotFound', `Product ${id} not found`);
    }
    return product;
  }
}
