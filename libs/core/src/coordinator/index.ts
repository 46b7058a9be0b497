export * from './types';
export { ActionCoordinator } from './action-coordinator';
