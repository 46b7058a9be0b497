/**
 * Alert domain types
 *
 * Alerts are fetched from the remote alert API and only ever held in memory.
 */

export type AlertPriority = 'P1' | 'P2' | 'P3' | 'P4' | 'P5' | 'UNKNOWN';

export type AlertStatus = 'open' | 'acknowledged' | 'closed';

export type ActionKind = 'acknowledge' | 'close';

export interface Alert {
  readonly id: string;
  readonly priority: AlertPriority;
  readonly status: AlertStatus;
  /** ISO-8601 creation time, null when the API did not send a usable one */
  readonly createdAt: string | null;
  readonly ackedBy?: string;
  readonly message: string;
  readonly description: string;
  readonly tags: readonly string[];
  readonly detailsUrl?: string;
  readonly runbookUrl?: string;
}

/** Forward order of the optimistic layer: open → acknowledged → closed */
export const STATUS_RANK: Record<AlertStatus, number> = {
  open: 0,
  acknowledged: 1,
  closed: 2,
};

export const PRIORITY_ORDER: readonly AlertPriority[] = ['P1', 'P2', 'P3', 'P4', 'P5', 'UNKNOWN'];

/** Status each action drives an alert to */
export const ACTION_TARGET_STATUS: Record<ActionKind, AlertStatus> = {
  acknowledge: 'acknowledged',
  close: 'closed',
};
