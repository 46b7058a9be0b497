/**
 * AlertDeck - main entry point wiring store, scheduler and coordinator
 *
 * The deck is the presentation boundary: UIs read snapshots from it, listen
 * for 'snapshot' and 'deck-event', and send intents back. They never touch
 * the store directly.
 */

import { EventEmitter } from 'node:events';
import type { ActionKind } from './alerts/alert.types';
import type { DeckConfig } from './config/loader';
import { ActionCoordinator } from './coordinator/action-coordinator';
import type { DetailsResult } from './coordinator/types';
import { DECK_EVENT, SNAPSHOT_EVENT } from './events';
import type { DeckEvent, SchedulerState } from './events';
import { HttpAlertGateway } from './gateway/http.gateway';
import type { AlertGateway } from './gateway/types';
import { createSilentLogger } from './logging/logger';
import type { Logger } from './logging/logger';
import { RefreshScheduler } from './scheduler/refresh-scheduler';
import type { RefreshSchedulerOptions } from './scheduler/types';
import { AlertStore } from './store/alert-store';
import type { Snapshot, SnapshotSink } from './store/types';

export interface AlertDeckOptions {
  gateway: AlertGateway;
  logger?: Logger;
  /** Operator shown as acknowledger while an acknowledge is pending */
  actor?: string;
  scheduler?: Omit<RefreshSchedulerOptions, 'requestTimeoutMs'>;
  /** Timeout applied to every gateway call (default: 20000) */
  requestTimeoutMs?: number;
  /** Conflicting refreshes a pending patch survives (default: 3) */
  stalenessLimit?: number;
  now?: () => Date;
}

export class AlertDeck extends EventEmitter {
  readonly store: AlertStore;
  readonly scheduler: RefreshScheduler;
  readonly coordinator: ActionCoordinator;

  private readonly logger: Logger;
  private stopped = false;

  constructor(options: AlertDeckOptions) {
    super();
    this.logger = options.logger ?? createSilentLogger();

    const sink: SnapshotSink = (snapshot) => {
      this.emit(SNAPSHOT_EVENT, snapshot);
    };

    this.store = new AlertStore({
      stalenessLimit: options.stalenessLimit,
      now: options.now,
      onResolved: (resolution) => {
        this.emitDeckEvent({ type: 'patch:resolved', ...resolution });
      },
    });
    this.scheduler = new RefreshScheduler(
      options.gateway,
      this.store,
      sink,
      this,
      { ...options.scheduler, requestTimeoutMs: options.requestTimeoutMs },
      this.logger,
    );
    this.coordinator = new ActionCoordinator(
      options.gateway,
      this.store,
      sink,
      this,
      { actor: options.actor, requestTimeoutMs: options.requestTimeoutMs },
      this.logger,
    );
  }

  get schedulerState(): SchedulerState {
    return this.scheduler.state;
  }

  currentSnapshot(): Snapshot {
    return this.store.currentSnapshot();
  }

  /** Begin polling; resolves after the first fetch settles */
  start(): Promise<void> {
    return this.scheduler.start();
  }

  /** Stop polling and detach from in-flight gateway calls */
  stop(): void {
    if (this.stopped) return;
    this.stopped = true;
    this.scheduler.stop();
    this.coordinator.dispose();
    this.store.dispose();
    this.logger.info('Alert deck stopped');
  }

  /**
   * Acknowledge or close an alert. Throws PatchConflictError,
   * InvalidTransitionError or UnknownAlertError when the action is rejected.
   */
  requestAction(alertId: string, action: ActionKind): Snapshot {
    const snapshot = this.coordinator.requestAction(alertId, action);
    this.emit(SNAPSHOT_EVENT, snapshot);
    return snapshot;
  }

  requestManualRefresh(): Promise<void> {
    return this.scheduler.requestRefresh();
  }

  requestDetails(alertId: string): Promise<DetailsResult> {
    return this.coordinator.requestDetails(alertId);
  }

  private emitDeckEvent(event: DeckEvent): void {
    this.emit(DECK_EVENT, event);
  }
}

/** HTTP gateway configured from the deck configuration */
export function createAlertGateway(config: DeckConfig, logger?: Logger): AlertGateway {
  return new HttpAlertGateway(
    {
      baseUrl: config.baseUrl,
      auth: config.auth,
      timeout: config.requestTimeoutSeconds * 1000,
      logHttpBody: config.logHttpBody,
      includeClosed: config.includeClosed,
    },
    logger,
  );
}

/** Build a deck from configuration, talking to the real alert API unless a gateway is given */
export function createAlertDeck(
  config: DeckConfig,
  logger?: Logger,
  gateway: AlertGateway = createAlertGateway(config, logger),
): AlertDeck {
  return new AlertDeck({
    gateway,
    logger,
    actor: config.actor,
    requestTimeoutMs: config.requestTimeoutSeconds * 1000,
    scheduler: {
      intervalMs: config.refreshIntervalSeconds * 1000,
      pageSize: config.pageSize,
    },
  });
}
