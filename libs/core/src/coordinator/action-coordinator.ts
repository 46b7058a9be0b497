/**
 * Action coordinator - applies operator actions optimistically and
 * reconciles them with the gateway outcome in the background
 */

import type { EventEmitter } from 'node:events';
import { formatAckedBy } from '../alerts/alert.schema';
import { canApplyAction, targetStatus } from '../alerts/alert.utils';
import type { ActionKind } from '../alerts/alert.types';
import { InvalidTransitionError, PatchConflictError, toGatewayError, UnknownAlertError } from '../errors';
import { DECK_EVENT } from '../events';
import type { DeckEvent } from '../events';
import type { AlertGateway } from '../gateway/types';
import { createSilentLogger } from '../logging/logger';
import type { Logger } from '../logging/logger';
import type { AlertStore } from '../store/alert-store';
import type { PatchOutcome, PatchRef, Snapshot, SnapshotSink } from '../store/types';
import { withTimeout } from '../utils/timeout';
import type { ActionCoordinatorOptions, DetailsResult } from './types';

const DEFAULT_REQUEST_TIMEOUT = 20_000;

export class ActionCoordinator {
  private readonly gateway: AlertGateway;
  private readonly store: AlertStore;
  private readonly sink: SnapshotSink;
  private readonly emitter: EventEmitter;
  private readonly logger: Logger;
  private readonly actor?: string;
  private readonly requestTimeoutMs: number;

  /** Bumped on dispose(); completions from an older epoch are dropped */
  private epoch = 0;
  private readonly inFlight: Set<Promise<void>> = new Set();

  constructor(
    gateway: AlertGateway,
    store: AlertStore,
    sink: SnapshotSink,
    emitter: EventEmitter,
    options?: ActionCoordinatorOptions,
    logger?: Logger,
  ) {
    this.gateway = gateway;
    this.store = store;
    this.sink = sink;
    this.emitter = emitter;
    this.logger = (logger ?? createSilentLogger()).child({ component: 'coordinator' });
    this.actor = formatAckedBy(options?.actor);
    this.requestTimeoutMs = options?.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT;
  }

  /** Number of gateway actions still running */
  get pendingCount(): number {
    return this.inFlight.size;
  }

  /**
   * Apply an action optimistically and dispatch it to the gateway.
   * Returns the optimistic snapshot synchronously; the reconciled one is
   * pushed to the sink once the gateway answers.
   */
  requestAction(alertId: string, action: ActionKind): Snapshot {
    const alert = this.store.getAlert(alertId);
    if (!alert) throw new UnknownAlertError(alertId);
    if (this.store.hasPending(alertId)) throw new PatchConflictError(alertId);
    if (!canApplyAction(alert.status, action)) {
      throw new InvalidTransitionError(alertId, action, alert.status);
    }

    const intendedAckedBy = action === 'acknowledge' ? this.actor : undefined;
    const { patch, snapshot } = this.store.applyOptimistic(alertId, targetStatus(action), intendedAckedBy);

    this.logger.info({ alertId, action, version: patch.version }, 'Action applied optimistically');
    this.emit({ type: 'action:dispatched', alertId, action, version: patch.version });

    const task: Promise<void> = this.dispatch(patch, action, this.epoch)
      .catch((err: unknown) => {
        this.logger.error({ err, alertId, action }, 'Action reconciliation crashed');
      })
      .finally(() => {
        this.inFlight.delete(task);
      });
    this.inFlight.add(task);

    return snapshot;
  }

  /** Fetch the full record of an alert; failures come back as a result, never a rejection */
  async requestDetails(alertId: string): Promise<DetailsResult> {
    this.logger.debug({ alertId }, 'Fetching alert details');
    try {
      const alert = await withTimeout(this.gateway.getDetails(alertId), this.requestTimeoutMs, `details ${alertId}`);
      this.emit({ type: 'details:fetched', alertId });
      return { success: true, alert };
    } catch (err) {
      const error = toGatewayError(err);
      this.logger.error({ alertId, kind: error.kind, reason: error.message }, 'Failed to fetch alert details');
      this.emit({ type: 'details:failed', alertId, error: error.message });
      return { success: false, error };
    }
  }

  /** Resolves once every dispatched action has settled */
  async drain(): Promise<void> {
    await Promise.allSettled([...this.inFlight]);
  }

  /** Detach from in-flight actions; their completions become no-ops */
  dispose(): void {
    this.epoch++;
  }

  private async dispatch(patch: PatchRef, action: ActionKind, epoch: number): Promise<void> {
    let outcome: PatchOutcome;
    try {
      const call = action === 'acknowledge' ? this.gateway.acknowledge(patch.alertId) : this.gateway.close(patch.alertId);
      const echoed = await withTimeout(call, this.requestTimeoutMs, `${action} ${patch.alertId}`);
      outcome = { type: 'success', alert: echoed };
    } catch (err) {
      outcome = { type: 'failure', reason: toGatewayError(err).message };
    }

    if (epoch !== this.epoch || this.store.isDisposed) {
      this.logger.debug({ alertId: patch.alertId, action }, 'Discarding action result after shutdown');
      return;
    }

    if (outcome.type === 'success') {
      this.logger.info({ alertId: patch.alertId, action, echoed: Boolean(outcome.alert) }, 'Action accepted');
      this.emit({ type: 'action:succeeded', alertId: patch.alertId, action, version: patch.version });
    } else {
      this.logger.error({ alertId: patch.alertId, action, reason: outcome.reason }, 'Action failed, rolling back');
      this.emit({ type: 'action:failed', alertId: patch.alertId, action, version: patch.version, error: outcome.reason });
    }

    this.sink(this.store.confirmOrFail(patch, outcome));
  }

  private emit(event: DeckEvent): void {
    this.emitter.emit(DECK_EVENT, event);
  }
}
