/**
 * @opsdeck/core - Alert store, refresh scheduling and optimistic actions
 *
 * @packageDocumentation
 */

// Deck
export { AlertDeck, createAlertDeck, createAlertGateway } from './deck';
export type { AlertDeckOptions } from './deck';

// Alerts
export {
  STATUS_RANK,
  PRIORITY_ORDER,
  ACTION_TARGET_STATUS,
  statusReaches,
  canApplyAction,
  targetStatus,
  isActive,
  alertAge,
  parseAlertPayload,
  extractAlertList,
  extractAlertRecord,
  extractRunbookUrl,
  formatAckedBy,
  normalizeStatus,
  normalizePriority,
} from './alerts';
export type { Alert, AlertPriority, AlertStatus, ActionKind } from './alerts';

// Store
export { AlertStore, DEFAULT_STALENESS_LIMIT } from './store';
export type {
  OptimisticResult,
  OptimisticPatch,
  PatchRef,
  PatchState,
  PatchOutcome,
  PatchResolution,
  RefreshOptions,
  ActionFailure,
  Snapshot,
  SnapshotSink,
  AlertStoreOptions,
} from './store';

// Scheduler
export { RefreshScheduler } from './scheduler';
export type { RefreshSchedulerOptions, RefreshTrigger } from './scheduler';

// Coordinator
export { ActionCoordinator } from './coordinator';
export type { ActionCoordinatorOptions, DetailsResult } from './coordinator';

// Gateway
export { HttpAlertGateway, jsmBaseUrl, truncate, MAX_PAGE_SIZE } from './gateway';
export type { AlertGateway, GatewayAuth, HttpAlertGatewayOptions } from './gateway';

// Config
export { loadConfig, describeConfig, CONFIG_DEFAULTS, ENV } from './config';
export type { DeckConfig, ConfigOverrides } from './config';

// Logging
export { createLogger, createSilentLogger, LOG_LEVELS } from './logging';
export type { Logger, LogLevel, LoggerOptions } from './logging';

// Events
export { DECK_EVENT, SNAPSHOT_EVENT } from './events';
export type { DeckEvent, SchedulerState } from './events';

// Errors
export {
  DeckError,
  ConfigError,
  GatewayError,
  AuthError,
  RateLimitedError,
  NetworkError,
  ServerError,
  AlertConflictError,
  AlertNotFoundError,
  PatchConflictError,
  InvalidTransitionError,
  UnknownAlertError,
  toGatewayError,
} from './errors';
export type { GatewayErrorKind } from './errors';

// Utils
export { withTimeout } from './utils/timeout';
