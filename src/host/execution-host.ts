/**
 * Execution Host
 *
 * In-process stand-in for the platform a ledger module runs on. It provides
 * the guarantees the modules assume and never implement themselves:
 *
 * - a directory of deployed modules addressed like accounts
 * - the sender of the current call (nested cross-module calls included)
 * - a block timestamp that is fixed for a whole unit of work
 * - all-or-nothing units of work: any error restores the state of every
 *   module written during the unit
 * - notifications that reach their sinks only once the unit has committed
 *
 * Units of work are synchronous. Node runs one at a time, so there is no
 * locking: the commit boundary of the outermost call is the only lock.
 */

import { getCreateAddress } from 'ethers';
import { Address, toAddress } from '../ledger/address';
import { LedgerError } from '../ledger/errors';
import { Notification, NotificationSink } from '../ledger/types';
import { metrics as defaultMetrics, MetricsCollector } from '../scaling/metrics';
import { logger as defaultLogger, StructuredLogger } from '../scaling/structured-logger';
import type { HostedContract } from './hosted-contract';

const COMPONENT = 'ExecutionHost';
const DEFAULT_DEPLOYER = '0x00000000000000000000000000000000000d3710';

export interface ExecutionHostOptions {
  // Milliseconds since epoch
  clock?: () => number;
  deployer?: Address;
  logger?: StructuredLogger;
  metrics?: MetricsCollector;
}

// `touched` lists the modules written during the committed unit
export type CommitListener = (notifications: readonly Notification[], touched: readonly Address[]) => void;

interface CallFrame {
  sender: Address;
}

interface UnitOfWork {
  timestamp: number;
  // Pre-unit state of each module, taken on its first write
  snapshots: Map<Address, unknown>;
  notifications: Notification[];
}

export class ExecutionHost {
  readonly deployer: Address;

  private contracts: Map<Address, HostedContract<unknown>> = new Map();
  private frames: CallFrame[] = [];
  private unit: UnitOfWork | null = null;
  private sinks: NotificationSink[] = [];
  private commitListeners: CommitListener[] = [];
  private deployNonce = 0;
  private clock: () => number;
  private logger: StructuredLogger;
  private metrics: MetricsCollector;

  constructor(opts: ExecutionHostOptions = {}) {
    this.clock = opts.clock ?? Date.now;
    this.deployer = toAddress(opts.deployer ?? DEFAULT_DEPLOYER);
    this.logger = opts.logger ?? defaultLogger;
    this.metrics = opts.metrics ?? defaultMetrics;
  }

  // ============================================================================
  // Directory
  // ============================================================================

  /**
   * Deploy a module at the next deterministic address.
   * Addresses depend only on the deployer and deploy order, so a node that
   * deploys the same modules in the same order gets the same addresses back.
   */
  deploy<C extends HostedContract<unknown>>(factory: (address: Address) => C): C {
    if (this.unit) {
      throw new Error('Modules cannot be deployed inside a unit of work');
    }

    const address = getCreateAddress({ from: this.deployer, nonce: this.deployNonce });
    this.deployNonce++;

    const contract = factory(address);
    if (contract.address !== address) {
      throw new Error(`Module ${contract.name} must be constructed at ${address}`);
    }

    this.contracts.set(address, contract);
    this.logger.debug(COMPONENT, 'Module deployed', { name: contract.name, address });
    return contract;
  }

  resolve(address: Address): HostedContract<unknown> | undefined {
    return this.contracts.get(address);
  }

  getDeployedModules(): HostedContract<unknown>[] {
    return Array.from(this.contracts.values());
  }

  // ============================================================================
  // Call context
  // ============================================================================

  get sender(): Address {
    const frame = this.frames[this.frames.length - 1];
    if (!frame) {
      throw new LedgerError('NoActiveCall', 'No call in progress: wrap the operation in host.execute()');
    }
    return frame.sender;
  }

  /**
   * Block time in seconds. Inside a unit of work every read returns the same value.
   */
  get timestamp(): number {
    return this.unit?.timestamp ?? Math.floor(this.clock() / 1000);
  }

  get inUnitOfWork(): boolean {
    return this.unit !== null;
  }

  /**
   * Run `fn` as `sender`. The outermost call is one unit of work: if anything
   * throws, every module written during the unit is restored and buffered
   * notifications are dropped. Nested calls join the enclosing unit.
   */
  execute<R>(sender: Address, fn: () => R): R {
    if (this.unit) {
      return this.withFrame(sender, fn);
    }

    const unit: UnitOfWork = {
      timestamp: Math.floor(this.clock() / 1000),
      snapshots: new Map(),
      notifications: [],
    };

    this.unit = unit;
    this.frames.push({ sender });

    let result: R;
    try {
      result = fn();
      if (result instanceof Promise) {
        throw new Error('Units of work must be synchronous');
      }
    } catch (error) {
      this.rollback(unit);
      throw error;
    } finally {
      this.frames.pop();
      this.unit = null;
    }

    this.commit(unit);
    return result;
  }

  /**
   * Called by a module before it writes its state. The first call in a unit
   * of work saves the module's state for rollback; later calls are free.
   * Outside a unit (deployment, import) there is nothing to roll back.
   */
  touch(address: Address): void {
    const unit = this.unit;
    if (!unit || unit.snapshots.has(address)) return;

    const contract = this.contracts.get(address);
    if (!contract) {
      throw new Error(`No module deployed at ${address}`);
    }
    unit.snapshots.set(address, contract.snapshot());
  }

  /**
   * Cross-module call: inside `fn`, `sender` is the calling module.
   */
  call<R>(from: Address, fn: () => R): R {
    if (!this.unit) {
      throw new LedgerError('NoActiveCall', 'Cross-module calls must happen inside a unit of work');
    }
    return this.withFrame(from, fn);
  }

  // ============================================================================
  // Notifications
  // ============================================================================

  emit(notification: Omit<Notification, 'timestamp'>): void {
    if (!this.unit) {
      throw new LedgerError('NoActiveCall', 'Notifications can only be emitted inside a unit of work');
    }
    this.unit.notifications.push({ ...notification, timestamp: this.unit.timestamp });
  }

  addSink(sink: NotificationSink): void {
    this.sinks.push(sink);
  }

  onCommit(listener: CommitListener): void {
    this.commitListeners.push(listener);
  }

  // ============================================================================
  // State export / import
  // ============================================================================

  /**
   * State of every deployed module, or of the listed ones only.
   */
  exportState(only?: readonly Address[]): Record<Address, unknown> {
    const state: Record<Address, unknown> = {};
    for (const [address, contract] of this.contracts) {
      if (only && !only.includes(address)) continue;
      state[address] = contract.snapshot();
    }
    return state;
  }

  /**
   * Restore persisted module state. Every entry is validated before any
   * module is touched.
   */
  importState(state: Record<Address, unknown>): void {
    if (this.unit) {
      throw new Error('State cannot be imported inside a unit of work');
    }

    const parsed: Array<[HostedContract<unknown>, unknown]> = [];
    for (const [address, raw] of Object.entries(state)) {
      const contract = this.contracts.get(address);
      if (!contract) {
        throw new Error(`No module deployed at ${address}`);
      }
      parsed.push([contract, contract.parseState(raw)]);
    }

    for (const [contract, value] of parsed) {
      contract.restore(value);
    }
  }

  // ============================================================================
  // Internals
  // ============================================================================

  private withFrame<R>(sender: Address, fn: () => R): R {
    this.frames.push({ sender });
    try {
      return fn();
    } finally {
      this.frames.pop();
    }
  }

  private rollback(unit: UnitOfWork): void {
    for (const [address, saved] of unit.snapshots) {
      this.contracts.get(address)?.restore(saved);
    }
    this.metrics.incCounter('ledger_units_rolled_back_total');
    this.logger.debug(COMPONENT, 'Unit of work rolled back', {
      droppedNotifications: unit.notifications.length,
    });
  }

  private commit(unit: UnitOfWork): void {
    const { notifications } = unit;
    const touched = Array.from(unit.snapshots.keys());
    this.metrics.incCounter('ledger_units_committed_total');

    for (const notification of notifications) {
      for (const sink of this.sinks) {
        try {
          sink.publish(notification);
          this.metrics.incCounter('ledger_notifications_total');
        } catch (error) {
          this.metrics.incCounter('ledger_sink_failures_total');
          this.logger.warn(COMPONENT, 'Notification sink failed', {
            type: notification.type,
            error: error instanceof Error ? error.message : String(error),
          });
        }
      }
    }

    for (const listener of this.commitListeners) {
      try {
        listener(notifications, touched);
      } catch (error) {
        this.logger.error(COMPONENT, 'Commit listener failed', {
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
  }
}
