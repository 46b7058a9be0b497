/**
 * Alert store types - optimistic patches and immutable snapshots
 */

import type { ActionKind, Alert, AlertStatus } from '../alerts/alert.types';

export type PatchState = 'pending' | 'confirmed' | 'failed' | 'superseded';

export interface OptimisticPatch {
  readonly alertId: string;
  /** Store-wide monotonically increasing counter */
  readonly version: number;
  readonly action: ActionKind;
  readonly intendedStatus: AlertStatus;
  readonly intendedAckedBy?: string;
  readonly issuedAt: string;
  state: PatchState;
  /** Consecutive refreshes that reported a status short of the intent */
  conflictCount: number;
}

/** Handle returned to the caller that issued the patch */
export interface PatchRef {
  readonly alertId: string;
  readonly version: number;
}

export type PatchOutcome =
  | { readonly type: 'success'; readonly alert?: Alert | null }
  | { readonly type: 'failure'; readonly reason: string };

export interface ActionFailure {
  readonly alertId: string;
  readonly action: ActionKind;
  readonly reason: string;
  readonly at: string;
}

/** What the UI should currently show. Frozen once produced. */
export interface Snapshot {
  readonly alerts: readonly Alert[];
  readonly pendingIds: readonly string[];
  /** Most recent action failures, newest first */
  readonly failures: readonly ActionFailure[];
}

/** Terminal transition of a patch, reported so callers can log or emit it */
export interface PatchResolution {
  readonly alertId: string;
  readonly version: number;
  readonly state: Exclude<PatchState, 'pending'>;
}

export interface AlertStoreOptions {
  /** Conflicting refreshes a pending patch survives before it is superseded (default: 3) */
  stalenessLimit?: number;
  /** Failures kept in snapshots (default: 5) */
  failureHistory?: number;
  /** Clock used for patch and failure timestamps */
  now?: () => Date;
  /** Called for every patch that leaves the pending state */
  onResolved?: (resolution: PatchResolution) => void;
}

export interface RefreshOptions {
  /** Store `issuedVersion` at the moment the page was requested */
  issuedAtVersion?: number;
}

/** Receives every snapshot a mutation produces, e.g. to re-render */
export type SnapshotSink = (snapshot: Snapshot) => void;
