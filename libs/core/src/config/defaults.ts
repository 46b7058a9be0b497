/**
 * Default configuration values
 */

export const CONFIG_DEFAULTS = {
  pageSize: 100,
  refreshIntervalSeconds: 30,
  requestTimeoutSeconds: 20,
  logLevel: 'info',
  logFile: 'logs/opsdeck.log',
  logHttpBody: false,
  includeClosed: false,
} as const;

/** Environment variables read by loadConfig */
export const ENV = {
  cloudId: 'JSM_CLOUD_ID',
  apiEmail: 'JSM_API_EMAIL',
  apiToken: 'JSM_API_TOKEN',
  bearerToken: 'JSM_BEARER_TOKEN',
  baseUrl: 'JSM_BASE_URL',
  pageSize: 'JSM_PAGE_SIZE',
  refreshInterval: 'JSM_REFRESH_INTERVAL_SECONDS',
  requestTimeout: 'JSM_REQUEST_TIMEOUT_SECONDS',
  logLevel: 'JSM_LOG_LEVEL',
  logFile: 'JSM_LOG_FILE',
  logHttpBody: 'JSM_LOG_HTTP_BODY',
  includeClosed: 'JSM_INCLUDE_CLOSED',
} as const;
