/**
 * Deck lifecycle events, emitted on the shared emitter as 'deck-event'
 */

import type { ActionKind } from './alerts/alert.types';
import type { GatewayErrorKind } from './errors';
import type { PatchState } from './store/types';

export type SchedulerState = 'stopped' | 'idle' | 'fetching' | 'backoff' | 'halted';

export type DeckEvent =
  // Refresh
  | { type: 'refresh:state'; state: SchedulerState }
  | { type: 'refresh:started'; trigger: 'schedule' | 'manual' | 'retry' }
  | { type: 'refresh:completed'; count: number; at: string }
  | { type: 'refresh:failed'; kind: GatewayErrorKind; error: string; retryInMs: number; attempt: number }
  | { type: 'refresh:halted'; error: string }
  // Actions
  | { type: 'action:dispatched'; alertId: string; action: ActionKind; version: number }
  | { type: 'action:succeeded'; alertId: string; action: ActionKind; version: number }
  | { type: 'action:failed'; alertId: string; action: ActionKind; version: number; error: string }
  | { type: 'patch:resolved'; alertId: string; version: number; state: Exclude<PatchState, 'pending'> }
  // Details
  | { type: 'details:fetched'; alertId: string }
  | { type: 'details:failed'; alertId: string; error: string };

export const DECK_EVENT = 'deck-event';
export const SNAPSHOT_EVENT = 'snapshot';
