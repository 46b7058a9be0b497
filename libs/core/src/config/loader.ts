/**
 * Configuration loader
 *
 * Reads JSM_* environment variables, applies command-line overrides on top
 * and validates the result. Invalid input raises ConfigError with the first
 * problem found.
 */

import { ConfigError } from '../errors';
import type { GatewayAuth } from '../gateway/types';
import { jsmBaseUrl } from '../gateway/http.gateway';
import type { LogLevel } from '../logging/logger';
import { CONFIG_DEFAULTS, ENV } from './defaults';
import { EnvConfigSchema } from './schema';

export interface DeckConfig {
  cloudId: string;
  baseUrl: string;
  auth: GatewayAuth;
  /** Operator identity shown while an acknowledge is pending (basic auth email) */
  actor?: string;
  pageSize: number;
  refreshIntervalSeconds: number;
  requestTimeoutSeconds: number;
  logLevel: LogLevel;
  logFile: string;
  logHttpBody: boolean;
  includeClosed: boolean;
}

/** Command-line values, still unparsed, that take precedence over the environment */
export interface ConfigOverrides {
  pageSize?: string;
  interval?: string;
  logLevel?: string;
  logFile?: string;
  includeClosed?: boolean;
}

export function loadConfig(
  env: Record<string, string | undefined> = process.env,
  overrides?: ConfigOverrides,
): DeckConfig {
  const merged: Record<string, string | undefined> = { ...env };
  if (overrides?.pageSize !== undefined) merged[ENV.pageSize] = overrides.pageSize;
  if (overrides?.interval !== undefined) merged[ENV.refreshInterval] = overrides.interval;
  if (overrides?.logLevel !== undefined) merged[ENV.logLevel] = overrides.logLevel;
  if (overrides?.logFile !== undefined) merged[ENV.logFile] = overrides.logFile;
  if (overrides?.includeClosed !== undefined) merged[ENV.includeClosed] = String(overrides.includeClosed);

  const parsed = EnvConfigSchema.safeParse(merged);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues[0]?.message ?? 'Invalid configuration');
  }
  const data = parsed.data;

  // Bearer token wins when both credential styles are present
  let auth: GatewayAuth;
  if (data.JSM_BEARER_TOKEN) {
    auth = { type: 'bearer', token: data.JSM_BEARER_TOKEN };
  } else if (data.JSM_API_EMAIL && data.JSM_API_TOKEN) {
    auth = { type: 'basic', email: data.JSM_API_EMAIL, apiToken: data.JSM_API_TOKEN };
  } else {
    throw new ConfigError('Authentication is required. Set JSM_BEARER_TOKEN or JSM_API_EMAIL + JSM_API_TOKEN.');
  }

  return {
    cloudId: data.JSM_CLOUD_ID,
    baseUrl: data.JSM_BASE_URL ?? jsmBaseUrl(data.JSM_CLOUD_ID),
    auth,
    actor: data.JSM_API_EMAIL,
    pageSize: data.JSM_PAGE_SIZE,
    refreshIntervalSeconds: data.JSM_REFRESH_INTERVAL_SECONDS,
    requestTimeoutSeconds: data.JSM_REQUEST_TIMEOUT_SECONDS,
    logLevel: data.JSM_LOG_LEVEL,
    logFile: data.JSM_LOG_FILE ?? CONFIG_DEFAULTS.logFile,
    logHttpBody: data.JSM_LOG_HTTP_BODY,
    includeClosed: data.JSM_INCLUDE_CLOSED,
  };
}

/** Config as safe to log: credentials reduced to the auth mode */
export function describeConfig(config: DeckConfig): Record<string, unknown> {
  const { auth, ...rest } = config;
  return { ...rest, authMode: auth.type };
}
