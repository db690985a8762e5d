/**
 * Base class for modules deployed on the execution host.
 *
 * A hosted module owns its state exclusively. Before its first write in a
 * unit of work a module calls touch(); the host then snapshots it and
 * restores it if the unit fails. Subclasses describe their state
 * (snapshot/restore) and its schema for loading from disk.
 */

import { z } from 'zod';
import { Address } from '../ledger/address';
import { Identifiable, Identity, NotificationType } from '../ledger/types';
import { logger, StructuredLogger } from '../scaling/structured-logger';
import type { ExecutionHost } from './execution-host';

export abstract class HostedContract<S> implements Identifiable {
  protected readonly log: StructuredLogger;

  protected abstract readonly stateSchema: z.ZodType<S>;

  constructor(
    protected readonly host: ExecutionHost,
    readonly address: Address,
    readonly name: string
  ) {
    this.log = logger.child({ address });
  }

  /**
   * Copy of the module state. Must not share mutable structure with the live
   * state: the host hands it back to restore() after a failed unit of work.
   */
  abstract snapshot(): S;

  abstract restore(state: S): void;

  /**
   * Validate a persisted state blob before it is restored.
   */
  parseState(raw: unknown): S {
    return this.stateSchema.parse(raw);
  }

  selfIdentify(): Identity {
    return {
      name: this.name,
      address: this.address,
      timestamp: this.host.timestamp,
    };
  }

  /**
   * Must precede every state write made inside a unit of work.
   */
  protected touch(): void {
    this.host.touch(this.address);
  }

  protected emit(
    type: NotificationType,
    message: string,
    subjects: Address[],
    data?: Record<string, string | number | boolean>
  ): void {
    this.host.emit({ type, message, subsystem: this.name, subjects, data });
  }
}
