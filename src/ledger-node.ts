/**
 * Ledger Node
 *
 * Deploys the registries, the settlement module and its token onto one
 * execution host, journals every committed notification, persists committed
 * state when a data directory is configured, and serves the HTTP API.
 */

import * as fs from 'fs';
import { Server } from 'http';
import { Express } from 'express';
import { LedgerConfig } from './config';
import { createLedgerApp, LedgerModules } from './api/ledger-api';
import { EventJournal } from './event-store';
import { ExecutionHost } from './host/execution-host';
import { Address } from './ledger/address';
import { Notification } from './ledger/types';
import { AdminRegistry, MerchantRegistry, ProductRegistry } from './registry';
import { IdentityToken, OrderSettlement } from './settlement';
import { metrics as defaultMetrics, MetricsCollector } from './scaling/metrics';
import { logger as defaultLogger, StructuredLogger } from './scaling/structured-logger';
import { LedgerSnapshotStore } from './storage';

const COMPONENT = 'LedgerNode';

export interface LedgerNodeOptions {
  clock?: () => number;
  logger?: StructuredLogger;
  metrics?: MetricsCollector;
}

export class LedgerNode implements LedgerModules {
  readonly host: ExecutionHost;
  readonly adminRegistry: AdminRegistry;
  readonly merchantRegistry: MerchantRegistry;
  readonly productRegistry: ProductRegistry;
  readonly token: IdentityToken;
  readonly settlement: OrderSettlement;
  readonly journal: EventJournal;
  readonly app: Express;

  private readonly snapshotStore: LedgerSnapshotStore | null;
  // Journal entries already on disk
  private persistedSequence = 0;
  // Set once every module has a file on disk
  private baselineWritten = false;
  private readonly logger: StructuredLogger;
  private readonly metrics: MetricsCollector;
  private httpServer: Server | null = null;

  constructor(private readonly config: LedgerConfig, opts: LedgerNodeOptions = {}) {
    this.logger = opts.logger ?? defaultLogger;
    this.metrics = opts.metrics ?? defaultMetrics;
    this.host = new ExecutionHost({ clock: opts.clock, logger: this.logger, metrics: this.metrics });

    // Deploy order fixes every module address
    this.adminRegistry = this.host.deploy(
      address => new AdminRegistry(this.host, address, { owner: config.owner, masterAdmin: config.masterAdmin })
    );
    this.merchantRegistry = this.host.deploy(
      address =>
        new MerchantRegistry(this.host, address, {
          owner: config.owner,
          adminRegistry: this.adminRegistry.address,
          liquidityOperator: config.liquidityOperator,
          payoutAddress: config.merchantPayoutAddress,
        })
    );
    this.productRegistry = this.host.deploy(
      address =>
        new ProductRegistry(this.host, address, {
          owner: config.owner,
          merchantRegistry: this.merchantRegistry.address,
        })
    );
    this.token = this.host.deploy(
      address => new IdentityToken(this.host, address, { owner: config.owner, name: config.tokenName })
    );
    this.settlement = this.host.deploy(
      address =>
        new OrderSettlement(this.host, address, {
          owner: config.owner,
          adminRegistry: this.adminRegistry.address,
          merchantRegistry: this.merchantRegistry.address,
          token: this.token.address,
          platformWallet: config.platformWallet,
          commissionRateBp: config.commissionRateBp,
        })
    );

    this.journal = new EventJournal({ logger: this.logger });
    this.host.addSink(this.journal);
    this.host.onCommit(notifications => this.recordMetrics(notifications));

    this.snapshotStore = config.dataDir ? new LedgerSnapshotStore(config.dataDir) : null;
    if (this.snapshotStore) {
      this.host.onCommit((_notifications, touched) => this.persist(touched));
    }

    this.app = createLedgerApp(this, { metrics: this.metrics });
  }

  async start(): Promise<void> {
    if (this.config.dataDir && !fs.existsSync(this.config.dataDir)) {
      fs.mkdirSync(this.config.dataDir, { recursive: true });
    }

    this.loadPersistedState();

    await new Promise<void>(resolve => {
      this.httpServer = this.app.listen(this.config.port, () => resolve());
    });

    this.logger.info(COMPONENT, 'Ledger node started', {
      port: this.config.port,
      adminRegistry: this.adminRegistry.address,
      merchantRegistry: this.merchantRegistry.address,
      productRegistry: this.productRegistry.address,
      token: this.token.address,
      settlement: this.settlement.address,
    });
  }

  async stop(): Promise<void> {
    const server = this.httpServer;
    if (server) {
      await new Promise<void>((resolve, reject) => {
        server.close(error => (error ? reject(error) : resolve()));
      });
      this.httpServer = null;
    }

    if (this.snapshotStore) {
      this.persist();
    }
    this.logger.info(COMPONENT, 'Ledger node stopped');
  }

  /**
   * Restore module state and journal from the data directory, if any was
   * saved. Returns whether a snapshot was found.
   */
  loadPersistedState(): boolean {
    if (!this.snapshotStore) {
      return false;
    }

    const snapshot = this.snapshotStore.load();
    if (!snapshot) {
      this.logger.info(COMPONENT, 'No persisted ledger state, starting fresh');
      return false;
    }

    this.host.importState(snapshot.modules);
    this.journal.load(snapshot.journal);
    this.persistedSequence = this.journal.length;
    this.baselineWritten = true;
    this.metrics.setGauge('ledger_next_order_id', this.settlement.getNextOrderId());
    this.logger.info(COMPONENT, 'Ledger state restored', {
      modules: Object.keys(snapshot.modules).length,
      journalEntries: snapshot.journal.length,
    });
    return true;
  }

  /**
   * Write the given modules (all of them when omitted, and on the first
   * write) and append the journal entries not yet on disk.
   */
  persist(touched?: readonly Address[]): void {
    const store = this.snapshotStore;
    if (!store) {
      return;
    }

    const states = this.host.exportState(this.baselineWritten ? touched : undefined);
    for (const [address, state] of Object.entries(states)) {
      store.saveModule(address, state);
    }
    this.baselineWritten = true;

    const pending = this.journal.getEntries(this.persistedSequence, this.journal.length - this.persistedSequence);
    store.appendJournal(pending);
    this.persistedSequence += pending.length;
  }

  private recordMetrics(notifications: readonly Notification[]): void {
    for (const notification of notifications) {
      if (notification.type === 'OrderProcessed') {
        this.metrics.incCounter('ledger_orders_processed_total');
      } else if (notification.type === 'CollaboratorRotated') {
        this.metrics.incCounter('ledger_rotations_total');
      }
    }
    this.metrics.setGauge('ledger_next_order_id', this.settlement.getNextOrderId());
  }
}
