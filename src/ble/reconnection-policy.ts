/**
 * Reconnection & Liveness Policy
 *
 * Per-peripheral retry bookkeeping with exponential backoff after an
 * unexpected disconnection, plus RSSI polling and idle detection for
 * connected peripherals.
 *
 * The policy decides *when* to retry; the actual attempt is injected so the
 * device manager keeps ownership of the transport and readiness.
 *
 * @module ble/reconnection-policy
 */

import { DEFAULT_CONNECTION_CONFIG } from '../config/defaults';
import type { ConnectionConfig } from '../types';
import type { LogTarget } from '../utils/logger';
import { createLogger, toError } from '../utils/logger';
import type { Unsubscribe } from '../utils/listeners';
import { ListenerSet } from '../utils/listeners';

export type ReconnectionEvent =
  | { type: 'attemptStarted'; peripheralId: string; attempt: number }
  | { type: 'attemptFailed'; peripheralId: string; attempt: number; error: Error }
  | { type: 'succeeded'; peripheralId: string }
  | { type: 'gaveUp'; peripheralId: string; attempts: number }
  | { type: 'rssiUpdated'; peripheralId: string; rssi: number }
  | { type: 'connectionStale'; peripheralId: string; idleMs: number };

export type ReconnectionEventListener = (event: ReconnectionEvent) => void;

/** One reconnection attempt; rejects on failure and must honour `signal` */
export type ReconnectAttempt = (peripheralId: string, signal: AbortSignal) => Promise<void>;

export type RssiReader = (peripheralId: string) => Promise<number>;

export type ReconnectionPolicyConfig = Pick<
  ConnectionConfig,
  | 'maxReconnectAttempts'
  | 'reconnectBaseDelayMs'
  | 'reconnectMaxDelayMs'
  | 'rssiPollIntervalMs'
  | 'staleThresholdMs'
>;

export interface ReconnectionPolicyOptions {
  attempt: ReconnectAttempt;
  readRssi: RssiReader;
  config?: Partial<ReconnectionPolicyConfig>;
  clock?: () => number;
  logger?: LogTarget;
}

interface RetryEntry {
  /** Attempts started so far */
  attempts: number;
  timer: ReturnType<typeof setTimeout> | null;
  controller: AbortController | null;
}

/**
 * Delay before attempt `attempt` (1-based): base · 2^(attempt-1), capped
 */
export function reconnectDelay(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
  return Math.min(baseDelayMs * Math.pow(2, Math.max(0, attempt - 1)), maxDelayMs);
}

export class ReconnectionPolicy {
  readonly config: Readonly<ReconnectionPolicyConfig>;

  private readonly attempt: ReconnectAttempt;
  private readonly readRssi: RssiReader;
  private readonly clock: () => number;
  private readonly logger: LogTarget;
  private readonly events: ListenerSet<[ReconnectionEvent]>;

  private readonly retries = new Map<string, RetryEntry>();
  private readonly exhausted = new Set<string>();

  private readonly connected = new Set<string>();
  private readonly lastActivity = new Map<string, number>();
  private readonly lastRssi = new Map<string, number>();
  private readonly stale = new Set<string>();
  private pollTimer: ReturnType<typeof setInterval> | null = null;
  private polling = false;

  constructor(options: ReconnectionPolicyOptions) {
    this.attempt = options.attempt;
    this.readRssi = options.readRssi;
    this.config = {
      maxReconnectAttempts: DEFAULT_CONNECTION_CONFIG.maxReconnectAttempts,
      reconnectBaseDelayMs: DEFAULT_CONNECTION_CONFIG.reconnectBaseDelayMs,
      reconnectMaxDelayMs: DEFAULT_CONNECTION_CONFIG.reconnectMaxDelayMs,
      rssiPollIntervalMs: DEFAULT_CONNECTION_CONFIG.rssiPollIntervalMs,
      staleThresholdMs: DEFAULT_CONNECTION_CONFIG.staleThresholdMs,
      ...options.config,
    };
    this.clock = options.clock ?? Date.now;
    this.logger = options.logger ?? createLogger('ble:reconnect');
    this.events = new ListenerSet('reconnection', this.logger);
  }

  subscribe(listener: ReconnectionEventListener): Unsubscribe {
    return this.events.add(listener);
  }

  // ==========================================================================
  // Reconnection
  // ==========================================================================

  isRetrying(peripheralId: string): boolean {
    return this.retries.has(peripheralId);
  }

  isExhausted(peripheralId: string): boolean {
    return this.exhausted.has(peripheralId);
  }

  handleDisconnection(peripheralId: string, wasUnexpected: boolean): void {
    this.untrack(peripheralId);

    if (!wasUnexpected) {
      this.logger.debug('Expected disconnection, not retrying', { peripheralId });
      return;
    }
    if (this.exhausted.has(peripheralId)) {
      this.logger.debug('Retries exhausted, ignoring disconnection', { peripheralId });
      return;
    }
    if (this.retries.has(peripheralId)) {
      return;
    }

    const entry: RetryEntry = { attempts: 0, timer: null, controller: null };
    this.retries.set(peripheralId, entry);
    this.logger.info('Starting auto-reconnect', { peripheralId });
    this.scheduleNext(peripheralId, entry);
  }

  /**
   * Clear all retry state for the peripheral, including the exhausted flag.
   * A pending retry counts as succeeded.
   */
  handleConnectionSuccess(peripheralId: string): void {
    this.exhausted.delete(peripheralId);

    const entry = this.retries.get(peripheralId);
    if (!entry) return;

    if (entry.timer) clearTimeout(entry.timer);
    this.retries.delete(peripheralId);
    this.logger.info('Auto-reconnect succeeded', { peripheralId, attempts: entry.attempts });
    this.events.emit({ type: 'succeeded', peripheralId });
  }

  /**
   * Abort any pending or in-flight retry for the peripheral
   */
  cancel(peripheralId: string): void {
    this.exhausted.delete(peripheralId);

    const entry = this.retries.get(peripheralId);
    if (!entry) return;

    if (entry.timer) clearTimeout(entry.timer);
    entry.controller?.abort();
    this.retries.delete(peripheralId);
    this.logger.debug('Reconnection cancelled', { peripheralId });
  }

  cancelAll(): void {
    for (const peripheralId of [...this.retries.keys()]) {
      this.cancel(peripheralId);
    }
    this.exhausted.clear();
  }

  private scheduleNext(peripheralId: string, entry: RetryEntry): void {
    const { maxReconnectAttempts, reconnectBaseDelayMs, reconnectMaxDelayMs } = this.config;

    if (entry.attempts >= maxReconnectAttempts) {
      this.retries.delete(peripheralId);
      this.exhausted.add(peripheralId);
      this.logger.warn('Auto-reconnect gave up', { peripheralId, attempts: entry.attempts });
      this.events.emit({ type: 'gaveUp', peripheralId, attempts: entry.attempts });
      return;
    }

    const attempt = entry.attempts + 1;
    const delayMs = reconnectDelay(attempt, reconnectBaseDelayMs, reconnectMaxDelayMs);
    this.logger.debug('Scheduling reconnect attempt', { peripheralId, attempt, delayMs });

    entry.timer = setTimeout(() => {
      entry.timer = null;
      this.runAttempt(peripheralId, entry, attempt).catch((err: unknown) => {
        this.logger.error('Reconnect attempt crashed', toError(err), { peripheralId, attempt });
      });
    }, delayMs);
  }

  private async runAttempt(peripheralId: string, entry: RetryEntry, attempt: number): Promise<void> {
    if (this.retries.get(peripheralId) !== entry) return;

    const controller = new AbortController();
    entry.attempts = attempt;
    entry.controller = controller;
    this.events.emit({ type: 'attemptStarted', peripheralId, attempt });

    try {
      await this.attempt(peripheralId, controller.signal);
    } catch (err) {
      if (controller.signal.aborted || this.retries.get(peripheralId) !== entry) return;

      entry.controller = null;
      const error = toError(err);
      this.logger.warn('Reconnect attempt failed', { peripheralId, attempt, error: error.message });
      this.events.emit({ type: 'attemptFailed', peripheralId, attempt, error });
      this.scheduleNext(peripheralId, entry);
      return;
    }

    if (this.retries.get(peripheralId) === entry) {
      this.handleConnectionSuccess(peripheralId);
    }
  }

  // ==========================================================================
  // Liveness
  // ==========================================================================

  /**
   * Replace the set of connected peripherals. Polling runs while the set is
   * non-empty.
   */
  setConnected(peripheralIds: Iterable<string>): void {
    const next = new Set(peripheralIds);
    const now = this.clock();

    for (const id of [...this.connected]) {
      if (!next.has(id)) this.untrack(id);
    }
    for (const id of next) {
      if (!this.connected.has(id)) {
        this.connected.add(id);
        this.lastActivity.set(id, now);
      }
    }

    if (this.connected.size > 0 && this.pollTimer === null) {
      this.pollTimer = setInterval(() => {
        this.pollOnce().catch((err: unknown) => {
          this.logger.error('Liveness poll failed', toError(err));
        });
      }, this.config.rssiPollIntervalMs);
    } else if (this.connected.size === 0) {
      this.stopPolling();
    }
  }

  get isPolling(): boolean {
    return this.pollTimer !== null;
  }

  /**
   * Note traffic from the peripheral; ends a stale episode
   */
  recordActivity(peripheralId: string): void {
    if (!this.connected.has(peripheralId)) return;
    this.lastActivity.set(peripheralId, this.clock());
    this.stale.delete(peripheralId);
  }

  /**
   * One liveness pass: read every RSSI, then flag idle peripherals
   */
  async pollOnce(): Promise<void> {
    if (this.polling) return;
    this.polling = true;

    try {
      await Promise.all([...this.connected].map((id) => this.pollRssi(id)));

      const now = this.clock();
      for (const id of this.connected) {
        const idleMs = now - (this.lastActivity.get(id) ?? now);
        if (idleMs >= this.config.staleThresholdMs && !this.stale.has(id)) {
          this.stale.add(id);
          this.logger.warn('Connection appears stale', { peripheralId: id, idleMs });
          this.events.emit({ type: 'connectionStale', peripheralId: id, idleMs });
        }
      }
    } finally {
      this.polling = false;
    }
  }

  private async pollRssi(peripheralId: string): Promise<void> {
    try {
      const rssi = await this.readRssi(peripheralId);
      if (!this.connected.has(peripheralId) || this.lastRssi.get(peripheralId) === rssi) return;

      this.lastRssi.set(peripheralId, rssi);
      this.recordActivity(peripheralId);
      this.events.emit({ type: 'rssiUpdated', peripheralId, rssi });
    } catch (err) {
      this.logger.warn('RSSI read failed', { peripheralId, error: toError(err).message });
    }
  }

  private untrack(peripheralId: string): void {
    this.connected.delete(peripheralId);
    this.lastActivity.delete(peripheralId);
    this.lastRssi.delete(peripheralId);
    this.stale.delete(peripheralId);
    if (this.connected.size === 0) this.stopPolling();
  }

  private stopPolling(): void {
    if (this.pollTimer !== null) {
      clearInterval(this.pollTimer);
      this.pollTimer = null;
    }
  }

  dispose(): void {
    this.cancelAll();
    this.setConnected([]);
    this.events.clear();
  }
}
