/**
 * Alert gateway interface - the remote alert API as the core consumes it
 *
 * Implementations reject with GatewayError subclasses (see ../errors).
 */

import type { Alert } from '../alerts/alert.types';

export const MAX_PAGE_SIZE = 500;

export interface AlertGateway {
  listAlerts(pageSize: number): Promise<Alert[]>;
  /** Resolves with the updated alert when the API echoes one, otherwise null */
  acknowledge(alertId: string): Promise<Alert | null>;
  close(alertId: string): Promise<Alert | null>;
  getDetails(alertId: string): Promise<Alert>;
}

export type GatewayAuth =
  | { type: 'bearer'; token: string }
  | { type: 'basic'; email: string; apiToken: string };

export interface HttpAlertGatewayOptions {
  baseUrl: string;
  auth: GatewayAuth;
  /** Per-request timeout in milliseconds (default: 20000) */
  timeout?: number;
  /** Include truncated response bodies in logs and error messages */
  logHttpBody?: boolean;
  /** Keep closed alerts in list results (default: false) */
  includeClosed?: boolean;
  /** Injected fetch, defaults to the global one */
  fetch?: typeof fetch;
}
