/**
 * Table cursor that follows the selected alert across refreshes
 */

import type { Alert } from '@opsdeck/core';

export interface Cursor {
  /** Alert the operator selected, null before the first selection */
  id: string | null;
  /** Row index, used when the selected alert is gone */
  index: number;
}

export const INITIAL_CURSOR: Cursor = { id: null, index: 0 };

/**
 * Re-anchor the cursor on a new alert list: stay on the same alert when it is
 * still listed, otherwise keep the row index, clamped to the list.
 */
export function followCursor(cursor: Cursor, alerts: readonly Alert[]): Cursor {
  if (alerts.length === 0) return { id: null, index: 0 };

  if (cursor.id !== null) {
    const found = alerts.findIndex((alert) => alert.id === cursor.id);
    if (found >= 0) return { id: cursor.id, index: found };
  }

  const index = clamp(cursor.index, alerts.length);
  return { id: alerts[index]?.id ?? null, index };
}

export function moveCursor(cursor: Cursor, alerts: readonly Alert[], delta: number): Cursor {
  if (alerts.length === 0) return { id: null, index: 0 };
  const index = clamp(followCursor(cursor, alerts).index + delta, alerts.length);
  return { id: alerts[index]?.id ?? null, index };
}

function clamp(index: number, length: number): number {
  return Math.min(Math.max(index, 0), length - 1);
}
