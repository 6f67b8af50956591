/**
 * Readiness State Machine
 *
 * Single owner of every peripheral's `ConnectionReadiness`. List and summary
 * views hold denormalized copies and are updated through `ReadinessView`
 * in the same call as the authoritative record.
 *
 * @module ble/readiness-machine
 */

import type { LogTarget } from '../utils/logger';
import { createLogger } from '../utils/logger';
import type { Unsubscribe } from '../utils/listeners';
import { ListenerSet } from '../utils/listeners';
import type { ConnectionReadiness } from './readiness';
import { Readiness, canTransition, describeReadiness, readinessEquals } from './readiness';

export type ReadinessListener = (
  peripheralId: string,
  next: ConnectionReadiness,
  previous: ConnectionReadiness
) => void;

/**
 * A holder of denormalized readiness copies
 */
export interface ReadinessView {
  applyReadiness(peripheralId: string, readiness: ConnectionReadiness): void;
}

/**
 * The part of the radio the machine touches when a device becomes ready
 */
export interface ScanController {
  isScanning(): boolean;
  stopScanning(): void;
}

export interface ReadinessStateMachineOptions {
  scanner?: ScanController;
  logger?: LogTarget;
}

export class ReadinessStateMachine {
  private readonly records = new Map<string, ConnectionReadiness>();
  private readonly views = new Set<ReadinessView>();
  private readonly listeners: ListenerSet<Parameters<ReadinessListener>>;
  private readonly scanner?: ScanController;
  private readonly logger: LogTarget;

  constructor(options: ReadinessStateMachineOptions = {}) {
    this.scanner = options.scanner;
    this.logger = options.logger ?? createLogger('ble:readiness');
    this.listeners = new ListenerSet('readiness', this.logger);
  }

  /**
   * Current readiness; `disconnected` for unknown peripherals
   */
  get(peripheralId: string): ConnectionReadiness {
    return this.records.get(peripheralId) ?? Readiness.disconnected;
  }

  snapshot(): ReadonlyMap<string, ConnectionReadiness> {
    return new Map(this.records);
  }

  /**
   * Move `peripheralId` to `next`.
   *
   * Returns false (and leaves every copy untouched) for an illegal
   * transition. A same-state transition is a no-op that returns true.
   */
  transition(peripheralId: string, next: ConnectionReadiness): boolean {
    const previous = this.get(peripheralId);

    if (readinessEquals(previous, next)) {
      return true;
    }

    if (!canTransition(previous, next)) {
      this.logger.warn('Ignoring illegal readiness transition', {
        peripheralId,
        from: describeReadiness(previous),
        to: describeReadiness(next),
      });
      return false;
    }

    this.records.set(peripheralId, next);
    for (const view of this.views) {
      view.applyReadiness(peripheralId, next);
    }

    this.logger.debug('Readiness changed', {
      peripheralId,
      from: previous.kind,
      to: next.kind,
    });
    this.listeners.emit(peripheralId, next, previous);

    const scanner = this.scanner;
    if (next.kind === 'ready' && scanner && scanner.isScanning()) {
      this.logger.info('Peripheral ready, stopping scan', { peripheralId });
      scanner.stopScanning();
    }

    return true;
  }

  /**
   * Drop the record for `peripheralId`; it reads as `disconnected` afterwards
   */
  forget(peripheralId: string): void {
    this.records.delete(peripheralId);
  }

  onChange(listener: ReadinessListener): Unsubscribe {
    return this.listeners.add(listener);
  }

  addView(view: ReadinessView): Unsubscribe {
    this.views.add(view);
    return () => {
      this.views.delete(view);
    };
  }
}
