/**
 * Action coordinator types
 */

import type { Alert } from '../alerts/alert.types';
import type { GatewayError } from '../errors';

export interface ActionCoordinatorOptions {
  /** Operator shown as acknowledger while an acknowledge is pending */
  actor?: string;
  /** Timeout for a single gateway call (default: 20000) */
  requestTimeoutMs?: number;
}

export type DetailsResult =
  | { success: true; alert: Alert }
  | { success: false; error: GatewayError };
