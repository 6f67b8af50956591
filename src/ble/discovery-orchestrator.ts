/**
 * Discovery & Readiness Orchestrator
 *
 * Drives a freshly connected peripheral from `connected` to `ready`:
 *
 * 1. discover services (mandatory)
 * 2. discover characteristics (mandatory)
 * 3. enable the main notification channel (mandatory)
 * 4. enable secondary channels (best-effort)
 * 5. device configuration (best-effort)
 *
 * Every step is bounded by the step timeout and the link is re-checked
 * after each one. A lost link or an aborted signal ends the run as
 * `disconnected`; a failed mandatory step ends it as `failed`.
 *
 * @module ble/discovery-orchestrator
 */

import { DEFAULT_CONNECTION_CONFIG } from '../config/defaults';
import type { LogTarget } from '../utils/logger';
import { createLogger, toError } from '../utils/logger';
import type { BleErrorCode } from './errors';
import { BleError, isBleError } from './errors';
import type { ConnectionReadiness } from './readiness';
import { Readiness, isLinkEstablished } from './readiness';
import type { ReadinessStateMachine } from './readiness-machine';
import { withTimeout } from './timeout';
import type { PeripheralDriver } from './transport';

export type DiscoveryOutcome =
  | { status: 'ready' }
  | { status: 'failed'; reason: string }
  | { status: 'disconnected' };

export interface DiscoveryOrchestratorOptions {
  readiness: ReadinessStateMachine;
  /** Current link state of a peripheral, usually `transport.isConnected` */
  isLinkUp: (peripheralId: string) => boolean;
  stepTimeoutMs?: number;
  logger?: LogTarget;
}

interface MandatoryStep {
  label: string;
  code: BleErrorCode;
  before: ConnectionReadiness;
  after?: ConnectionReadiness;
  run: (driver: PeripheralDriver, signal: AbortSignal) => Promise<void>;
}

const MANDATORY_STEPS: readonly MandatoryStep[] = [
  {
    label: 'Service discovery',
    code: 'serviceDiscoveryFailed',
    before: Readiness.discoveringServices,
    after: Readiness.servicesDiscovered,
    run: (driver, signal) => driver.discoverServices(signal),
  },
  {
    label: 'Characteristic discovery',
    code: 'characteristicDiscoveryFailed',
    before: Readiness.discoveringCharacteristics,
    after: Readiness.characteristicsDiscovered,
    run: (driver, signal) => driver.discoverCharacteristics(signal),
  },
  {
    label: 'Notification setup',
    code: 'notificationSetupFailed',
    before: Readiness.enablingNotifications,
    run: (driver, signal) => driver.enableNotifications(signal),
  },
];

/** Thrown internally to unwind the run when the link drops */
class LinkLost extends Error {
  constructor(readonly stage: string) {
    super(`Link lost ${stage}`);
    this.name = 'LinkLost';
  }
}

export class DiscoveryOrchestrator {
  private readonly readiness: ReadinessStateMachine;
  private readonly isLinkUp: (peripheralId: string) => boolean;
  private readonly stepTimeoutMs: number;
  private readonly logger: LogTarget;

  constructor(options: DiscoveryOrchestratorOptions) {
    this.readiness = options.readiness;
    this.isLinkUp = options.isLinkUp;
    this.stepTimeoutMs = options.stepTimeoutMs ?? DEFAULT_CONNECTION_CONFIG.stepTimeoutMs;
    this.logger = options.logger ?? createLogger('ble:discovery');
  }

  async runDiscovery(
    peripheralId: string,
    driver: PeripheralDriver,
    signal: AbortSignal
  ): Promise<DiscoveryOutcome> {
    try {
      this.ensureLink(peripheralId, signal, 'before discovery');

      for (const step of MANDATORY_STEPS) {
        this.advance(peripheralId, step.before);
        await this.runMandatory(peripheralId, step, driver, signal);
        this.ensureLink(peripheralId, signal, `during ${step.label.toLowerCase()}`);
        if (step.after) this.advance(peripheralId, step.after);
      }

      for (const channel of driver.secondaryChannels) {
        await this.runBestEffort(
          peripheralId,
          `Secondary notifications (${channel})`,
          (stepSignal) => driver.enableSecondaryNotifications(channel, stepSignal),
          signal
        );
        this.ensureLink(peripheralId, signal, `while enabling ${channel}`);
      }

      const configure = driver.configure?.bind(driver);
      if (configure) {
        await this.runBestEffort(peripheralId, 'Device configuration', configure, signal);
        this.ensureLink(peripheralId, signal, 'during configuration');
      }

      this.advance(peripheralId, Readiness.ready);
      this.logger.info('Peripheral ready', { peripheralId, name: driver.name });
      return { status: 'ready' };
    } catch (err) {
      if (err instanceof LinkLost || signal.aborted || !this.isLinkUp(peripheralId)) {
        const stage = err instanceof LinkLost ? err.stage : 'during discovery';
        this.logger.warn(`Peripheral disconnected ${stage}`, { peripheralId });
        if (isLinkEstablished(this.readiness.get(peripheralId))) {
          this.readiness.transition(peripheralId, Readiness.disconnected);
        }
        return { status: 'disconnected' };
      }

      const error = toError(err);
      this.logger.error('Discovery failed', error, { peripheralId });
      this.readiness.transition(peripheralId, Readiness.failed(error.message));
      return { status: 'failed', reason: error.message };
    }
  }

  private ensureLink(peripheralId: string, signal: AbortSignal, stage: string): void {
    if (signal.aborted || !this.isLinkUp(peripheralId)) {
      throw new LinkLost(stage);
    }
  }

  private advance(peripheralId: string, next: ConnectionReadiness): void {
    if (!this.readiness.transition(peripheralId, next)) {
      throw new LinkLost(`before ${next.kind}`);
    }
  }

  private async runMandatory(
    peripheralId: string,
    step: MandatoryStep,
    driver: PeripheralDriver,
    signal: AbortSignal
  ): Promise<void> {
    try {
      await withTimeout((stepSignal) => step.run(driver, stepSignal), this.stepTimeoutMs, {
        label: step.label,
        signal,
      });
    } catch (err) {
      if (isBleError(err)) throw err;
      throw new BleError(step.code, toError(err).message, peripheralId, { cause: err });
    }
  }

  private async runBestEffort(
    peripheralId: string,
    label: string,
    operation: (signal: AbortSignal) => Promise<void>,
    signal: AbortSignal
  ): Promise<void> {
    try {
      await withTimeout(operation, this.stepTimeoutMs, { label, signal });
    } catch (err) {
      if (signal.aborted) throw err;
      this.logger.warn(`${label} failed (non-critical)`, {
        peripheralId,
        error: toError(err).message,
      });
    }
  }
}
