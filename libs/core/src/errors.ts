/**
 * Typed error classes for the opsdeck core
 */

import type { ActionKind } from './alerts/alert.types';

export class DeckError extends Error {
  public readonly code: string;

  constructor(message: string, code: string) {
    super(message);
    this.name = 'DeckError';
    this.code = code;
    Error.captureStackTrace?.(this, this.constructor);
  }
}

export class ConfigError extends DeckError {
  constructor(message: string) {
    super(message, 'CONFIG_INVALID');
    this.name = 'ConfigError';
  }
}

// ---- Gateway failures ----

export type GatewayErrorKind =
  | 'auth'
  | 'rate-limited'
  | 'network'
  | 'server'
  | 'conflict'
  | 'not-found';

export class GatewayError extends DeckError {
  public readonly kind: GatewayErrorKind;
  public readonly statusCode?: number;
  public readonly responseBody?: string;

  constructor(message: string, kind: GatewayErrorKind, opts?: { statusCode?: number; responseBody?: string }) {
    super(message, `GATEWAY_${kind.toUpperCase().replace('-', '_')}`);
    this.name = 'GatewayError';
    this.kind = kind;
    this.statusCode = opts?.statusCode;
    this.responseBody = opts?.responseBody;
  }

  /** Transient failures put the scheduler into backoff instead of halting it */
  get retryable(): boolean {
    return this.kind === 'rate-limited' || this.kind === 'network' || this.kind === 'server';
  }
}

export class AuthError extends GatewayError {
  constructor(message: string, statusCode?: number, responseBody?: string) {
    super(message, 'auth', { statusCode, responseBody });
    this.name = 'AuthError';
  }
}

export class RateLimitedError extends GatewayError {
  /** Server-requested wait before the next attempt, when it sent one */
  public readonly retryAfterMs?: number;

  constructor(message: string, retryAfterMs?: number, responseBody?: string) {
    super(message, 'rate-limited', { statusCode: 429, responseBody });
    this.name = 'RateLimitedError';
    this.retryAfterMs = retryAfterMs;
  }
}

export class NetworkError extends GatewayError {
  public readonly timedOut: boolean;

  constructor(message: string, opts?: { timedOut?: boolean }) {
    super(message, 'network');
    this.name = 'NetworkError';
    this.timedOut = opts?.timedOut ?? false;
  }
}

export class ServerError extends GatewayError {
  constructor(message: string, statusCode?: number, responseBody?: string) {
    super(message, 'server', { statusCode, responseBody });
    this.name = 'ServerError';
  }
}

export class AlertConflictError extends GatewayError {
  public readonly alertId: string;

  constructor(alertId: string, message?: string, responseBody?: string) {
    super(message ?? `Alert ${alertId} cannot change state (already closed?)`, 'conflict', {
      statusCode: 409,
      responseBody,
    });
    this.name = 'AlertConflictError';
    this.alertId = alertId;
  }
}

export class AlertNotFoundError extends GatewayError {
  public readonly alertId: string;

  constructor(alertId: string, responseBody?: string) {
    super(`Alert not found: ${alertId}`, 'not-found', { statusCode: 404, responseBody });
    this.name = 'AlertNotFoundError';
    this.alertId = alertId;
  }
}

/**
 * Normalise anything a gateway call rejected with into a GatewayError.
 */
export function toGatewayError(err: unknown): GatewayError {
  if (err instanceof GatewayError) return err;
  const message = err instanceof Error ? err.message : String(err);
  return new NetworkError(message);
}

// ---- Store / coordinator rejections ----

export class PatchConflictError extends DeckError {
  public readonly alertId: string;

  constructor(alertId: string) {
    super(`An action is already pending for alert ${alertId}`, 'PATCH_CONFLICT');
    this.name = 'PatchConflictError';
    this.alertId = alertId;
  }
}

export class InvalidTransitionError extends DeckError {
  public readonly alertId: string;
  public readonly action: ActionKind;
  public readonly fromStatus: string;

  constructor(alertId: string, action: ActionKind, fromStatus: string) {
    super(`Cannot ${action} alert ${alertId} while it is ${fromStatus}`, 'INVALID_TRANSITION');
    this.name = 'InvalidTransitionError';
    this.alertId = alertId;
    this.action = action;
    this.fromStatus = fromStatus;
  }
}

export class UnknownAlertError extends DeckError {
  public readonly alertId: string;

  constructor(alertId: string) {
    super(`Alert is not loaded: ${alertId}`, 'UNKNOWN_ALERT');
    this.name = 'UnknownAlertError';
    this.alertId = alertId;
  }
}
