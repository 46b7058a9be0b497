export * from './types';
export { RefreshScheduler } from './refresh-scheduler';
