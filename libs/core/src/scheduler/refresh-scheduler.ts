/**
 * Refresh scheduler - timer-driven alert polling with single-flight fetches
 * and capped exponential backoff
 */

import type { EventEmitter } from 'node:events';
import type { Alert } from '../alerts/alert.types';
import { RateLimitedError, toGatewayError } from '../errors';
import type { GatewayError } from '../errors';
import { DECK_EVENT } from '../events';
import type { DeckEvent, SchedulerState } from '../events';
import type { AlertGateway } from '../gateway/types';
import { MAX_PAGE_SIZE } from '../gateway/types';
import { createSilentLogger } from '../logging/logger';
import type { Logger } from '../logging/logger';
import type { AlertStore } from '../store/alert-store';
import type { SnapshotSink } from '../store/types';
import { withTimeout } from '../utils/timeout';
import type { RefreshSchedulerOptions, RefreshTrigger } from './types';

const DEFAULT_INTERVAL = 30_000;
const DEFAULT_PAGE_SIZE = 100;
const DEFAULT_REQUEST_TIMEOUT = 20_000;
const DEFAULT_INITIAL_BACKOFF = 5_000;
const DEFAULT_MAX_BACKOFF = 300_000;

export class RefreshScheduler {
  private readonly gateway: AlertGateway;
  private readonly store: AlertStore;
  private readonly sink: SnapshotSink;
  private readonly emitter: EventEmitter;
  private readonly logger: Logger;
  private readonly intervalMs: number;
  private readonly pageSize: number;
  private readonly requestTimeoutMs: number;
  private readonly initialBackoffMs: number;
  private readonly maxBackoffMs: number;

  private currentState: SchedulerState = 'stopped';
  private timer: ReturnType<typeof setTimeout> | null = null;
  private inFlight: Promise<void> | null = null;
  /** Bumped on stop() so completions of abandoned fetches are discarded */
  private generation = 0;
  private consecutiveFailures = 0;

  constructor(
    gateway: AlertGateway,
    store: AlertStore,
    sink: SnapshotSink,
    emitter: EventEmitter,
    options?: RefreshSchedulerOptions,
    logger?: Logger,
  ) {
    this.gateway = gateway;
    this.store = store;
    this.sink = sink;
    this.emitter = emitter;
    this.logger = (logger ?? createSilentLogger()).child({ component: 'scheduler' });
    this.intervalMs = options?.intervalMs ?? DEFAULT_INTERVAL;
    this.pageSize = Math.min(options?.pageSize ?? DEFAULT_PAGE_SIZE, MAX_PAGE_SIZE);
    this.requestTimeoutMs = options?.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT;
    this.initialBackoffMs = options?.initialBackoffMs ?? DEFAULT_INITIAL_BACKOFF;
    this.maxBackoffMs = options?.maxBackoffMs ?? DEFAULT_MAX_BACKOFF;
  }

  get state(): SchedulerState {
    return this.currentState;
  }

  /** Start polling with an immediate fetch */
  start(): Promise<void> {
    if (this.currentState !== 'stopped') return this.inFlight ?? Promise.resolve();
    this.logger.info({ intervalMs: this.intervalMs, pageSize: this.pageSize }, 'Auto-refresh enabled');
    this.setState('idle');
    return this.fetchNow('schedule');
  }

  /** Stop polling; an in-flight fetch is abandoned and its result discarded */
  stop(): void {
    if (this.currentState === 'stopped') return;
    this.clearTimer();
    this.generation++;
    this.inFlight = null;
    this.setState('stopped');
  }

  /**
   * Operator-requested refresh. Joins the in-flight fetch instead of
   * starting a second one; skips the remaining backoff delay.
   */
  requestRefresh(): Promise<void> {
    switch (this.currentState) {
      case 'stopped':
      case 'halted':
        this.logger.debug({ state: this.currentState }, 'Manual refresh ignored');
        return Promise.resolve();
      case 'fetching':
        return this.inFlight ?? Promise.resolve();
      default:
        return this.fetchNow('manual');
    }
  }

  private fetchNow(trigger: RefreshTrigger): Promise<void> {
    if (this.inFlight) return this.inFlight;

    this.clearTimer();
    this.setState('fetching');
    this.emit({ type: 'refresh:started', trigger });
    this.logger.debug({ trigger }, 'Refreshing alerts');

    // Patches issued while this page is in flight are newer than it
    const run: Promise<void> = this.runFetch(this.generation, this.store.issuedVersion).finally(() => {
      if (this.inFlight === run) this.inFlight = null;
    });
    this.inFlight = run;
    return run;
  }

  private async runFetch(generation: number, issuedAtVersion: number): Promise<void> {
    let alerts: Alert[];
    try {
      alerts = await withTimeout(this.gateway.listAlerts(this.pageSize), this.requestTimeoutMs, 'listAlerts');
    } catch (err) {
      if (generation !== this.generation) return;
      this.handleFailure(toGatewayError(err));
      return;
    }
    if (generation !== this.generation) return;

    this.consecutiveFailures = 0;
    const snapshot = this.store.applyRefresh(alerts, { issuedAtVersion });
    this.logger.info({ count: snapshot.alerts.length }, 'Refresh completed');
    this.setState('idle');
    this.schedule(this.intervalMs, 'schedule');
    this.emit({ type: 'refresh:completed', count: snapshot.alerts.length, at: new Date().toISOString() });
    this.sink(snapshot);
  }

  private handleFailure(error: GatewayError): void {

    if (error.kind === 'auth') {
      this.logger.error({ err: error }, 'Authentication failed, polling halted');
      this.setState('halted');
      this.emit({ type: 'refresh:halted', error: error.message });
      return;
    }

    this.consecutiveFailures++;
    const retryInMs = this.backoffDelay(error);
    this.logger.warn(
      { kind: error.kind, failures: this.consecutiveFailures, retryInMs, reason: error.message },
      'Refresh failed, backing off',
    );
    this.setState('backoff');
    this.schedule(retryInMs, 'retry');
    this.emit({
      type: 'refresh:failed',
      kind: error.kind,
      error: error.message,
      retryInMs,
      attempt: this.consecutiveFailures,
    });
  }

  /** initial · 2^(failures-1), capped; a rate limit waits at least its Retry-After */
  private backoffDelay(error: GatewayError): number {
    const exponential = this.initialBackoffMs * 2 ** Math.max(this.consecutiveFailures - 1, 0);
    const delay = Math.min(exponential, this.maxBackoffMs);
    if (error instanceof RateLimitedError && error.retryAfterMs !== undefined) {
      return Math.max(delay, error.retryAfterMs);
    }
    return delay;
  }

  private schedule(delayMs: number, trigger: RefreshTrigger): void {
    this.clearTimer();
    this.timer = setTimeout(() => {
      this.timer = null;
      this.fetchNow(trigger).catch((err: unknown) => {
        this.logger.error({ err }, 'Scheduled refresh crashed');
      });
    }, delayMs);
  }

  private clearTimer(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  private setState(state: SchedulerState): void {
    if (this.currentState === state) return;
    this.currentState = state;
    this.emit({ type: 'refresh:state', state });
  }

  private emit(event: DeckEvent): void {
    this.emitter.emit(DECK_EVENT, event);
  }
}
