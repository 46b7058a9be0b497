export * from './types';
export { AlertStore, DEFAULT_STALENESS_LIMIT } from './alert-store';
export type { OptimisticResult } from './alert-store';
