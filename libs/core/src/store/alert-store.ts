/**
 * AlertStore - single owner of the authoritative alert list and the
 * optimistic patches layered on top of it.
 *
 * Every method is synchronous, so on Node's event loop each mutation runs to
 * completion before any other code observes the store. Snapshots are rebuilt
 * and frozen after every mutation and never touched again.
 */

import { statusReaches } from '../alerts/alert.utils';
import type { Alert, AlertStatus } from '../alerts/alert.types';
import { DeckError, InvalidTransitionError, PatchConflictError, UnknownAlertError } from '../errors';
import type {
  ActionFailure,
  AlertStoreOptions,
  OptimisticPatch,
  PatchOutcome,
  PatchRef,
  PatchResolution,
  PatchState,
  RefreshOptions,
  Snapshot,
} from './types';

export const DEFAULT_STALENESS_LIMIT = 3;
const DEFAULT_FAILURE_HISTORY = 5;

export interface OptimisticResult {
  patch: PatchRef;
  snapshot: Snapshot;
}

export class AlertStore {
  private readonly stalenessLimit: number;
  private readonly failureHistory: number;
  private readonly now: () => Date;
  private readonly onResolved?: (resolution: PatchResolution) => void;

  private authoritative: Alert[] = [];
  private readonly patches: Map<string, OptimisticPatch> = new Map();
  private failures: ActionFailure[] = [];
  private nextVersion = 1;
  private disposed = false;
  private snapshot: Snapshot;

  constructor(options?: AlertStoreOptions) {
    this.stalenessLimit = options?.stalenessLimit ?? DEFAULT_STALENESS_LIMIT;
    this.failureHistory = options?.failureHistory ?? DEFAULT_FAILURE_HISTORY;
    this.now = options?.now ?? (() => new Date());
    this.onResolved = options?.onResolved;
    this.snapshot = this.buildSnapshot();
  }

  /** Pure read of the last produced snapshot */
  currentSnapshot(): Snapshot {
    return this.snapshot;
  }

  /** The alert as the UI sees it (patch overlaid), if loaded */
  getAlert(alertId: string): Alert | undefined {
    return this.snapshot.alerts.find((alert) => alert.id === alertId);
  }

  /** Version of the newest patch issued so far (0 before the first) */
  get issuedVersion(): number {
    return this.nextVersion - 1;
  }

  hasPending(alertId: string): boolean {
    return this.patches.has(alertId);
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  /**
   * Replace the authoritative set with a freshly fetched page and reconcile
   * pending patches against it.
   *
   * `issuedAtVersion` is the store's `issuedVersion` when the fetch started.
   * Patches issued after that can be confirmed by the page but are never
   * counted as conflicting or dropped by it.
   */
  applyRefresh(alerts: readonly Alert[], options?: RefreshOptions): Snapshot {
    if (this.disposed) return this.snapshot;

    const byId = new Map<string, Alert>();
    const ordered: Alert[] = [];
    for (const alert of alerts) {
      if (byId.has(alert.id)) continue;
      const frozen = freezeAlert(alert);
      byId.set(alert.id, frozen);
      ordered.push(frozen);
    }
    this.authoritative = ordered;

    const issuedAtVersion = options?.issuedAtVersion ?? this.issuedVersion;

    for (const patch of [...this.patches.values()]) {
      const fresh = byId.get(patch.alertId);
      const pageOlderThanPatch = patch.version > issuedAtVersion;
      if (!fresh) {
        if (pageOlderThanPatch) continue;
        // Gone from the page: a close left the open filter as intended
        this.resolve(patch, patch.intendedStatus === 'closed' ? 'confirmed' : 'superseded');
        continue;
      }
      if (statusReaches(fresh.status, patch.intendedStatus)) {
        this.resolve(patch, 'confirmed');
        continue;
      }
      if (pageOlderThanPatch) continue;
      patch.conflictCount += 1;
      if (patch.conflictCount > this.stalenessLimit) {
        this.resolve(patch, 'superseded');
      }
    }

    return this.publish();
  }

  /**
   * Overlay an intended status on a loaded alert.
   * Throws PatchConflictError while another patch for the alert is pending.
   */
  applyOptimistic(alertId: string, intendedStatus: AlertStatus, intendedAckedBy?: string): OptimisticResult {
    if (this.disposed) throw new DeckError('Alert store has been disposed', 'STORE_DISPOSED');
    if (this.patches.has(alertId)) throw new PatchConflictError(alertId);

    const current = this.authoritative.find((alert) => alert.id === alertId);
    if (!current) throw new UnknownAlertError(alertId);

    const action = intendedStatus === 'closed' ? 'close' : 'acknowledge';
    if (intendedStatus === 'open' || statusReaches(current.status, intendedStatus)) {
      throw new InvalidTransitionError(alertId, action, current.status);
    }

    const patch: OptimisticPatch = {
      alertId,
      version: this.nextVersion++,
      action,
      intendedStatus,
      intendedAckedBy,
      issuedAt: this.now().toISOString(),
      state: 'pending',
      conflictCount: 0,
    };
    this.patches.set(alertId, patch);

    return { patch: { alertId, version: patch.version }, snapshot: this.publish() };
  }

  /**
   * Record the gateway outcome for a patch.
   *
   * Success keeps the patch pending until a refresh agrees, unless the
   * gateway echoed an alert that already reached the intended status.
   * Failure drops the patch so the alert reverts to its authoritative value.
   * Refs that no longer name the pending patch are ignored.
   */
  confirmOrFail(ref: PatchRef, outcome: PatchOutcome): Snapshot {
    if (this.disposed) return this.snapshot;

    const patch = this.patches.get(ref.alertId);
    if (!patch || patch.version !== ref.version) return this.snapshot;

    if (outcome.type === 'failure') {
      this.resolve(patch, 'failed');
      this.failures = [
        { alertId: patch.alertId, action: patch.action, reason: outcome.reason, at: this.now().toISOString() },
        ...this.failures,
      ].slice(0, this.failureHistory);
      return this.publish();
    }

    const echoed = outcome.alert;
    if (!echoed || echoed.id !== ref.alertId || !statusReaches(echoed.status, patch.intendedStatus)) {
      return this.snapshot;
    }

    const frozen = freezeAlert(echoed);
    this.authoritative = this.authoritative.map((alert) => (alert.id === frozen.id ? frozen : alert));
    this.resolve(patch, 'confirmed');
    return this.publish();
  }

  /** Tear down: later refreshes and completions become no-ops */
  dispose(): void {
    this.disposed = true;
    this.patches.clear();
  }

  private resolve(patch: OptimisticPatch, state: Exclude<PatchState, 'pending'>): void {
    patch.state = state;
    this.patches.delete(patch.alertId);
    this.onResolved?.({ alertId: patch.alertId, version: patch.version, state });
  }

  private publish(): Snapshot {
    this.snapshot = this.buildSnapshot();
    return this.snapshot;
  }

  private buildSnapshot(): Snapshot {
    const alerts = this.authoritative.map((alert) => {
      const patch = this.patches.get(alert.id);
      if (!patch) return alert;
      return freezeAlert({
        ...alert,
        status: patch.intendedStatus,
        ...(patch.intendedAckedBy ? { ackedBy: patch.intendedAckedBy } : {}),
      });
    });

    return Object.freeze({
      alerts: Object.freeze(alerts),
      pendingIds: Object.freeze(alerts.filter((alert) => this.patches.has(alert.id)).map((alert) => alert.id)),
      failures: Object.freeze([...this.failures]),
    });
  }
}

function freezeAlert(alert: Alert): Alert {
  if (Object.isFrozen(alert)) return alert;
  return Object.freeze({ ...alert, tags: Object.freeze([...alert.tags]) });
}
