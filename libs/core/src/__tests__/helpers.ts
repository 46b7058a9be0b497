/**
 * Shared test fixtures for the core specs
 */

import type { Alert } from '../alerts/alert.types';
import type { AlertGateway } from '../gateway/types';

export function makeAlert(id: string, overrides?: Partial<Alert>): Alert {
  return {
    id,
    priority: 'P3',
    status: 'open',
    createdAt: '2026-03-01T10:00:00.000Z',
    message: `Alert ${id}`,
    description: `Alert ${id}`,
    tags: [],
    ...overrides,
  };
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (err: unknown) => void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (err: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

export type MockGateway = jest.Mocked<AlertGateway>;

export function createMockGateway(alerts: Alert[] = []): MockGateway {
  return {
    listAlerts: jest.fn<Promise<Alert[]>, [number]>().mockResolvedValue(alerts),
    acknowledge: jest.fn<Promise<Alert | null>, [string]>().mockResolvedValue(null),
    close: jest.fn<Promise<Alert | null>, [string]>().mockResolvedValue(null),
    getDetails: jest.fn<Promise<Alert>, [string]>((id) => Promise.resolve(makeAlert(id))),
  };
}
