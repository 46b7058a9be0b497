/**
 * Refresh scheduler types
 */

export type { SchedulerState } from '../events';

export interface RefreshSchedulerOptions {
  /** Delay between successful refreshes in milliseconds (default: 30000) */
  intervalMs?: number;
  /** Page size passed to listAlerts (default: 100, max: 500) */
  pageSize?: number;
  /** Timeout for a single listAlerts call (default: 20000) */
  requestTimeoutMs?: number;
  /** First retry delay after a failed refresh (default: 5000) */
  initialBackoffMs?: number;
  /** Upper bound of the retry delay (default: 300000) */
  maxBackoffMs?: number;
}

export type RefreshTrigger = 'schedule' | 'manual' | 'retry';
