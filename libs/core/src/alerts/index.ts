export * from './alert.types';
export * from './alert.utils';
export * from './alert.schema';
