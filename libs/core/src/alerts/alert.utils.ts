/**
 * Alert helpers shared by the store, coordinator and presentation layer
 */

import { differenceInSeconds, isValid, parseISO } from 'date-fns';
import { ACTION_TARGET_STATUS, STATUS_RANK } from './alert.types';
import type { ActionKind, Alert, AlertStatus } from './alert.types';

/** True when `status` is at or beyond `target` in the forward order */
export function statusReaches(status: AlertStatus, target: AlertStatus): boolean {
  return STATUS_RANK[status] >= STATUS_RANK[target];
}

/**
 * Whether an action is legal from the given status.
 * Acknowledge needs an open alert; close works on anything not yet closed.
 */
export function canApplyAction(status: AlertStatus, action: ActionKind): boolean {
  if (action === 'acknowledge') return status === 'open';
  return status !== 'closed';
}

export function targetStatus(action: ActionKind): AlertStatus {
  return ACTION_TARGET_STATUS[action];
}

export function isActive(alert: Alert): boolean {
  return alert.status !== 'closed';
}

/**
 * Compact age of an alert: whole days, else hours, else minutes.
 * Returns "-" when the creation time is unknown.
 */
export function alertAge(alert: Pick<Alert, 'createdAt'>, now: Date = new Date()): string {
  if (!alert.createdAt) return '-';
  const created = parseISO(alert.createdAt);
  if (!isValid(created)) return '-';

  const totalSeconds = Math.max(differenceInSeconds(now, created), 0);
  const days = Math.floor(totalSeconds / 86_400);
  if (days) return `${days}d`;
  const hours = Math.floor(totalSeconds / 3_600);
  if (hours) return `${hours}h`;
  return `${Math.floor(totalSeconds / 60)}m`;
}
