/**
 * Shared fixtures for the CLI specs
 */

import type { Alert, AlertGateway } from '@opsdeck/core';

export const NOW = new Date('2026-03-01T12:00:00.000Z');

export function makeAlert(id: string, overrides?: Partial<Alert>): Alert {
  return {
    id,
    priority: 'P3',
    status: 'open',
    createdAt: '2026-03-01T11:00:00.000Z',
    message: `Alert ${id}`,
    description: `Alert ${id}`,
    tags: [],
    ...overrides,
  };
}

/** The two-alert page used across the CLI specs */
export function samplePage(): Alert[] {
  return [
    makeAlert('A', {
      priority: 'P1',
      createdAt: '2026-03-01T10:00:00.000Z',
      message: 'Disk full on db-1',
      description: 'Volume /var is at 98%. Runbook: https://wiki.example.test/rb/disk',
      runbookUrl: 'https://wiki.example.test/rb/disk',
      tags: ['db', 'disk'],
    }),
    makeAlert('B', {
      status: 'acknowledged',
      createdAt: '2026-02-27T09:00:00.000Z',
      ackedBy: 'sam',
      message: 'CPU high',
    }),
  ];
}

export type MockGateway = jest.Mocked<AlertGateway>;

export function createMockGateway(alerts: Alert[] = samplePage()): MockGateway {
  return {
    listAlerts: jest.fn<Promise<Alert[]>, [number]>().mockResolvedValue(alerts),
    acknowledge: jest.fn<Promise<Alert | null>, [string]>().mockResolvedValue(null),
    close: jest.fn<Promise<Alert | null>, [string]>().mockResolvedValue(null),
    getDetails: jest.fn<Promise<Alert>, [string]>((id) => {
      const found = alerts.find((alert) => alert.id === id);
      return found ? Promise.resolve(found) : Promise.reject(new Error(`Alert not found: ${id}`));
    }),
  };
}

const ANSI_PATTERN = /\u001B\[[0-9;]*m/g;

/** Frame text without colour codes, one entry per line with trailing blanks removed */
export function frameLines(frame: string | undefined): string[] {
  return (frame ?? '')
    .replace(ANSI_PATTERN, '')
    .split('\n')
    .map((line) => line.trimEnd());
}

/** Let React flush effects and pending promise callbacks */
export function tick(ms = 20): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
