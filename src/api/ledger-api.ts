/**
 * Ledger HTTP API
 *
 * JSON surface over the registries and settlement. Every mutating route runs
 * as one unit of work on the execution host, with the caller taken from the
 * `x-caller-address` header (identity is established upstream).
 *
 * Amounts are exchanged as decimal strings.
 */

import express, { Express, Request, Response } from 'express';
import { z } from 'zod';
import { ExecutionHost } from '../host/execution-host';
import { EventJournal } from '../event-store/event-journal';
import { Address, toAddress } from '../ledger/address';
import { isLedgerError, LedgerErrorCategory } from '../ledger/errors';
import { addressSchema, amountSchema } from '../ledger/schemas';
import { AdminRegistry } from '../registry/admin-registry';
import { MerchantRegistry } from '../registry/merchant-registry';
import { ProductRegistry } from '../registry/product-registry';
import { IdentityToken } from '../settlement/identity-token';
import { OrderSettlement } from '../settlement/order-settlement';
import { metrics as defaultMetrics, MetricsCollector } from '../scaling/metrics';
import { paginate, parsePagination } from '../scaling/pagination';
import { logger } from '../scaling/structured-logger';

const COMPONENT = 'LedgerAPI';
const CALLER_HEADER = 'x-caller-address';

export interface LedgerModules {
  host: ExecutionHost;
  adminRegistry: AdminRegistry;
  merchantRegistry: MerchantRegistry;
  productRegistry: ProductRegistry;
  token: IdentityToken;
  settlement: OrderSettlement;
  journal: EventJournal;
}

const STATUS_BY_CATEGORY: Record<LedgerErrorCategory, number> = {
  AlreadyExists: 409,
  NotFound: 404,
  AccessDenied: 403,
  InvalidArgument: 400,
  ExternalCallFailed: 502,
  Host: 500,
};

const addressBody = z.object({ address: addressSchema });
const balanceBody = z.object({ balance: amountSchema });
const productBody = z.object({
  id: z.string().min(1),
  imageReference: z.string(),
  metadataReference: z.string(),
  merchantAddress: addressSchema,
});
const productUpdateBody = z.object({
  imageReference: z.string(),
  metadataReference: z.string(),
});
const orderBody = z.object({
  createdBy: addressSchema.optional(),
  orderReference: z.string().min(1),
  totalAmount: amountSchema,
});
const approveBody = z.object({
  amount: amountSchema,
  spender: addressSchema.optional(),
});
const mintBody = z.object({ to: addressSchema, amount: amountSchema });
const rateBody = z.object({ rateBp: z.number().int() });
const counterBody = z.object({ nextOrderId: z.number().int() });

class BadRequest extends Error {
  constructor(message: string, readonly issues?: unknown) {
    super(message);
  }
}

function parseBody<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown): T {
  const result = schema.safeParse(body);
  if (!result.success) {
    throw new BadRequest('Invalid request body', result.error.flatten().fieldErrors);
  }
  return result.data;
}

function jsonReplacer(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value;
}

export class LedgerAPI {
  private readonly rotators: Record<string, Record<string, (address: string) => Address>>;

  constructor(private readonly modules: LedgerModules) {
    const { merchantRegistry, productRegistry, settlement } = modules;
    this.rotators = {
      'merchant-registry': {
        'admin-registry': address => merchantRegistry.setAdminRegistry(address),
        'liquidity-operator': address => merchantRegistry.setLiquidityOperator(address),
      },
      'product-registry': {
        'merchant-registry': address => productRegistry.setMerchantRegistry(address),
      },
      'order-settlement': {
        'admin-registry': address => settlement.setAdminRegistry(address),
        'merchant-registry': address => settlement.setMerchantRegistry(address),
        token: address => settlement.setToken(address),
      },
    };
  }

  // ============================================================================
  // Admins
  // ============================================================================

  listAdmins(req: Request, res: Response): void {
    this.respond(res, () => {
      const page = paginate(this.modules.adminRegistry.getPlatformAdmins(), parsePagination(req.query));
      return { success: true, admins: page.items, pagination: page.pagination };
    });
  }

  addAdmin(req: Request, res: Response): void {
    this.respond(res, () => {
      const { address } = parseBody(addressBody, req.body);
      const admin = this.execute(req, () => this.modules.adminRegistry.addAdmin(address));
      return { success: true, admin };
    }, 201);
  }

  getAdmin(req: Request, res: Response): void {
    this.respond(res, () => ({
      success: true,
      admin: this.modules.adminRegistry.getAdminProfile(req.params.address),
    }));
  }

  removeAdmin(req: Request, res: Response): void {
    this.respond(res, () => {
      const admin = this.execute(req, () => this.modules.adminRegistry.removeAdmin(req.params.address));
      return { success: true, admin };
    });
  }

  getAdminRegistrations(req: Request, res: Response): void {
    this.respond(res, () => ({
      success: true,
      admins: this.modules.adminRegistry.getAdminRegistrations(req.params.address),
    }));
  }

  getProductsByAdder(req: Request, res: Response): void {
    this.respond(res, () => ({
      success: true,
      products: this.modules.productRegistry.getProductsByAdder(req.params.address),
    }));
  }

  // ============================================================================
  // Merchants
  // ============================================================================

  listMerchants(req: Request, res: Response): void {
    this.respond(res, () => {
      const page = paginate(this.modules.merchantRegistry.getPlatformMerchants(), parsePagination(req.query));
      return { success: true, merchants: page.items, pagination: page.pagination };
    });
  }

  addMerchant(req: Request, res: Response): void {
    this.respond(res, () => {
      const { address } = parseBody(addressBody, req.body);
      const merchant = this.execute(req, () => this.modules.merchantRegistry.addMerchant(address));
      return { success: true, merchant };
    }, 201);
  }

  getMerchant(req: Request, res: Response): void {
    this.respond(res, () => ({
      success: true,
      merchant: this.modules.merchantRegistry.getMerchantProfile(req.params.address),
    }));
  }

  removeMerchant(req: Request, res: Response): void {
    this.respond(res, () => {
      const merchant = this.execute(req, () => this.modules.merchantRegistry.removeMerchant(req.params.address));
      return { success: true, merchant };
    });
  }

  getMerchantRegistrations(req: Request, res: Response): void {
    this.respond(res, () => ({
      success: true,
      merchants: this.modules.merchantRegistry.getMerchantRegistrations(req.params.address),
    }));
  }

  getProductsByMerchant(req: Request, res: Response): void {
    this.respond(res, () => ({
      success: true,
      products: this.modules.productRegistry.getProductsByMerchant(req.params.address),
    }));
  }

  getMerchantBalance(req: Request, res: Response): void {
    this.respond(res, () => ({
      success: true,
      address: toAddress(req.params.address),
      balance: this.modules.merchantRegistry.getMerchantBalance(req.params.address),
    }));
  }

  updateMerchantBalance(req: Request, res: Response): void {
    this.respond(res, () => {
      const { balance } = parseBody(balanceBody, req.body);
      const merchant = this.execute(req, () =>
        this.modules.merchantRegistry.updateMerchantBalance(req.params.address, balance)
      );
      return { success: true, merchant };
    });
  }

  getPayoutAddress(_req: Request, res: Response): void {
    this.respond(res, () => ({
      success: true,
      address: this.modules.merchantRegistry.getMerchantPayoutAddress(),
    }));
  }

  setPayoutAddress(req: Request, res: Response): void {
    this.respond(res, () => {
      const { address } = parseBody(addressBody, req.body);
      const updated = this.execute(req, () => this.modules.merchantRegistry.setMerchantPayoutAddress(address));
      return { success: true, address: updated };
    });
  }

  // ============================================================================
  // Products
  // ============================================================================

  listProducts(req: Request, res: Response): void {
    this.respond(res, () => {
      const page = paginate(this.modules.productRegistry.getAllProducts(), parsePagination(req.query));
      return { success: true, products: page.items, pagination: page.pagination };
    });
  }

  addProduct(req: Request, res: Response): void {
    this.respond(res, () => {
      const input = parseBody(productBody, req.body);
      const product = this.execute(req, () => this.modules.productRegistry.addProduct(input));
      return { success: true, product };
    }, 201);
  }

  getProduct(req: Request, res: Response): void {
    this.respond(res, () => ({
      success: true,
      product: this.modules.productRegistry.getProduct(req.params.id),
    }));
  }

  updateProduct(req: Request, res: Response): void {
    this.respond(res, () => {
      const { imageReference, metadataReference } = parseBody(productUpdateBody, req.body);
      const product = this.execute(req, () =>
        this.modules.productRegistry.updateProduct(req.params.id, imageReference, metadataReference)
      );
      return { success: true, product };
    });
  }

  deleteProduct(req: Request, res: Response): void {
    this.respond(res, () => {
      const product = this.execute(req, () => this.modules.productRegistry.deleteProduct(req.params.id));
      return { success: true, product };
    });
  }

  // ============================================================================
  // Orders & payments
  // ============================================================================

  listOrders(req: Request, res: Response): void {
    this.respond(res, () => {
      const createdBy = typeof req.query.createdBy === 'string' ? req.query.createdBy : undefined;
      const orders = createdBy
        ? this.modules.settlement.getOrdersByCreator(createdBy)
        : this.modules.settlement.getOrders();
      const page = paginate(orders, parsePagination(req.query));
      return { success: true, orders: page.items, pagination: page.pagination };
    });
  }

  processOrder(req: Request, res: Response): void {
    this.respond(res, () => {
      const caller = this.caller(req);
      const body = parseBody(orderBody, req.body);
      const order = this.modules.host.execute(caller, () =>
        this.modules.settlement.processOrder(body.createdBy ?? caller, body.orderReference, body.totalAmount)
      );
      return { success: true, order };
    }, 201);
  }

  getOrder(req: Request, res: Response): void {
    this.respond(res, () => {
      const orderId = Number(req.params.orderId);
      if (!Number.isSafeInteger(orderId) || orderId < 1) {
        throw new BadRequest('orderId must be a positive integer');
      }
      return { success: true, order: this.modules.settlement.getOrder(orderId) };
    });
  }

  approvePayment(req: Request, res: Response): void {
    this.respond(res, () => {
      const { amount, spender } = parseBody(approveBody, req.body);
      const target = spender ?? this.modules.settlement.address;
      this.execute(req, () => this.modules.settlement.approvePayment(amount, target));
      return { success: true, spender: target, amount };
    });
  }

  getSettlement(_req: Request, res: Response): void {
    const { settlement } = this.modules;
    this.respond(res, () => ({
      success: true,
      address: settlement.address,
      commissionRateBp: settlement.getCommissionRate(),
      platformWallet: settlement.getPlatformWallet(),
      nextOrderId: settlement.getNextOrderId(),
      collaborators: settlement.getCollaborators(),
    }));
  }

  setCommissionRate(req: Request, res: Response): void {
    this.respond(res, () => {
      const { rateBp } = parseBody(rateBody, req.body);
      const previous = this.execute(req, () => this.modules.settlement.setCommissionRate(rateBp));
      return { success: true, previous, commissionRateBp: rateBp };
    });
  }

  setPlatformWallet(req: Request, res: Response): void {
    this.respond(res, () => {
      const { address } = parseBody(addressBody, req.body);
      const previous = this.execute(req, () => this.modules.settlement.setPlatformWallet(address));
      return { success: true, previous, platformWallet: address };
    });
  }

  resetOrderCounter(req: Request, res: Response): void {
    this.respond(res, () => {
      const { nextOrderId } = parseBody(counterBody, req.body);
      const previous = this.execute(req, () => this.modules.settlement.resetOrderCounter(nextOrderId));
      return { success: true, previous, nextOrderId };
    });
  }

  // ============================================================================
  // Token
  // ============================================================================

  mint(req: Request, res: Response): void {
    this.respond(res, () => {
      const { to, amount } = parseBody(mintBody, req.body);
      const balance = this.execute(req, () => this.modules.token.mint(to, amount));
      return { success: true, address: to, balance };
    }, 201);
  }

  getTokenBalance(req: Request, res: Response): void {
    this.respond(res, () => ({
      success: true,
      address: toAddress(req.params.address),
      balance: this.modules.token.balanceOf(req.params.address),
    }));
  }

  // ============================================================================
  // Pointers & journal
  // ============================================================================

  rotatePointer(req: Request, res: Response): void {
    this.respond(res, () => {
      const rotate = this.rotators[req.params.module]?.[req.params.pointer];
      if (!rotate) {
        throw new BadRequest(`Unknown pointer ${req.params.module}/${req.params.pointer}`);
      }
      const { address } = parseBody(addressBody, req.body);
      const previous = this.execute(req, () => rotate(address));
      return { success: true, previous, address };
    });
  }

  getJournal(req: Request, res: Response): void {
    this.respond(res, () => {
      const after = Math.max(0, parseInt(String(req.query.after ?? '0'), 10) || 0);
      const { limit } = parsePagination(req.query);
      return {
        success: true,
        headHash: this.modules.journal.headHash,
        entries: this.modules.journal.getEntries(after, limit),
      };
    });
  }

  // ============================================================================
  // Plumbing
  // ============================================================================

  private caller(req: Request): Address {
    const header = req.header(CALLER_HEADER);
    if (!header) {
      throw new BadRequest(`Missing ${CALLER_HEADER} header`);
    }
    return toAddress(header);
  }

  private execute<R>(req: Request, fn: () => R): R {
    return this.modules.host.execute(this.caller(req), fn);
  }

  private respond(res: Response, fn: () => object, status = 200): void {
    try {
      res.status(status).json(fn());
    } catch (error) {
      if (error instanceof BadRequest) {
        res.status(400).json({ success: false, error: error.message, issues: error.issues });
        return;
      }
      if (isLedgerError(error)) {
        res.status(STATUS_BY_CATEGORY[error.category]).json({
          success: false,
          error: error.message,
          code: error.code,
          existing: error.existing,
        });
        return;
      }
      logger.error(COMPONENT, 'Unhandled error', {
        error: error instanceof Error ? error.message : String(error),
      });
      res.status(500).json({ success: false, error: 'Internal error' });
    }
  }
}

export function createLedgerApp(modules: LedgerModules, opts: { metrics?: MetricsCollector } = {}): Express {
  const metrics = opts.metrics ?? defaultMetrics;
  const api = new LedgerAPI(modules);
  const app = express();

  app.set('json replacer', jsonReplacer);
  app.use(express.json({ limit: '1mb' }));
  app.use(metrics.httpMiddleware());

  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      modules: modules.host.getDeployedModules().map(module => ({ name: module.name, address: module.address })),
    });
  });
  app.get('/metrics', (_req: Request, res: Response) => {
    res.type('text/plain').send(metrics.render());
  });

  app.get('/api/admins', (req, res) => api.listAdmins(req, res));
  app.post('/api/admins', (req, res) => api.addAdmin(req, res));
  app.get('/api/admins/:address', (req, res) => api.getAdmin(req, res));
  app.delete('/api/admins/:address', (req, res) => api.removeAdmin(req, res));
  app.get('/api/admins/:address/registrations', (req, res) => api.getAdminRegistrations(req, res));
  app.get('/api/admins/:address/products', (req, res) => api.getProductsByAdder(req, res));

  app.get('/api/merchants', (req, res) => api.listMerchants(req, res));
  app.post('/api/merchants', (req, res) => api.addMerchant(req, res));
  app.get('/api/merchants/:address', (req, res) => api.getMerchant(req, res));
  app.delete('/api/merchants/:address', (req, res) => api.removeMerchant(req, res));
  app.get('/api/merchants/:address/registrations', (req, res) => api.getMerchantRegistrations(req, res));
  app.get('/api/merchants/:address/products', (req, res) => api.getProductsByMerchant(req, res));
  app.get('/api/merchants/:address/balance', (req, res) => api.getMerchantBalance(req, res));
  app.put('/api/merchants/:address/balance', (req, res) => api.updateMerchantBalance(req, res));
  app.get('/api/merchant-payout-address', (req, res) => api.getPayoutAddress(req, res));
  app.put('/api/merchant-payout-address', (req, res) => api.setPayoutAddress(req, res));

  app.get('/api/products', (req, res) => api.listProducts(req, res));
  app.post('/api/products', (req, res) => api.addProduct(req, res));
  app.get('/api/products/:id', (req, res) => api.getProduct(req, res));
  app.put('/api/products/:id', (req, res) => api.updateProduct(req, res));
  app.delete('/api/products/:id', (req, res) => api.deleteProduct(req, res));

  app.get('/api/orders', (req, res) => api.listOrders(req, res));
  app.post('/api/orders', (req, res) => api.processOrder(req, res));
  app.get('/api/orders/:orderId', (req, res) => api.getOrder(req, res));
  app.post('/api/payments/approve', (req, res) => api.approvePayment(req, res));

  app.get('/api/settlement', (req, res) => api.getSettlement(req, res));
  app.put('/api/settlement/commission-rate', (req, res) => api.setCommissionRate(req, res));
  app.put('/api/settlement/platform-wallet', (req, res) => api.setPlatformWallet(req, res));
  app.post('/api/settlement/order-counter', (req, res) => api.resetOrderCounter(req, res));

  app.post('/api/token/mint', (req, res) => api.mint(req, res));
  app.get('/api/token/balances/:address', (req, res) => api.getTokenBalance(req, res));

  app.put('/api/pointers/:module/:pointer', (req, res) => api.rotatePointer(req, res));
  app.get('/api/journal', (req, res) => api.getJournal(req, res));

  return app;
}
