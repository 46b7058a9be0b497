/**
 * Alert formatting shared by the dashboard and the one-shot commands
 */

import { alertAge, isActive } from '@opsdeck/core';
import type { Alert, AlertStatus } from '@opsdeck/core';

export type ColumnKey = 'prio' | 'status' | 'age' | 'ackedBy' | 'tags' | 'message';

export interface Column {
  key: ColumnKey;
  title: string;
  width: number;
}

export const COLUMNS: readonly Column[] = [
  { key: 'prio', title: 'Prio', width: 4 },
  { key: 'status', title: 'Status', width: 12 },
  { key: 'age', title: 'Age', width: 4 },
  { key: 'ackedBy', title: 'Acked By', width: 12 },
  { key: 'tags', title: 'Tags', width: 10 },
  { key: 'message', title: 'Message', width: 40 },
];

export type AlertCells = Record<ColumnKey, string>;

export function columnWidth(key: ColumnKey): number {
  return COLUMNS.find((column) => column.key === key)?.width ?? 0;
}

const STATUS_COLORS: Record<AlertStatus, string> = {
  open: 'red',
  acknowledged: 'green',
  closed: 'yellow',
};

export function statusColor(status: AlertStatus): string {
  return STATUS_COLORS[status];
}

/** Cut a value to `max` characters, ending in "..." when shortened */
export function truncateCell(value: string, max: number): string {
  if (value.length <= max) return value;
  if (max <= 3) return '.'.repeat(Math.max(max, 0));
  return `${value.slice(0, max - 3)}...`;
}

export function padCell(value: string, width: number): string {
  return truncateCell(value, width).padEnd(width);
}

/** Alerts still needing attention (anything not closed) */
export function openAlertCount(alerts: readonly Alert[]): number {
  return alerts.filter(isActive).length;
}

export function alertCells(alert: Alert, now: Date): AlertCells {
  return {
    prio: alert.priority,
    status: alert.status,
    age: alertAge(alert, now),
    ackedBy: alert.ackedBy ?? '-',
    tags: alert.tags.length ? alert.tags.join(',') : '-',
    // Tables are one line per alert
    message: alert.message.replace(/\s+/g, ' ').trim(),
  };
}

export function headerLine(): string {
  return COLUMNS.map((column) => padCell(column.title, column.width)).join(' ');
}

export function rowLine(cells: AlertCells): string {
  return COLUMNS.map((column) => padCell(cells[column.key], column.width)).join(' ');
}

/** Plain-text table for non-interactive output */
export function formatAlertTable(alerts: readonly Alert[], now: Date = new Date()): string {
  const lines = [`Open alerts: ${openAlertCount(alerts)}`, '', headerLine().trimEnd()];
  if (alerts.length === 0) {
    lines.push('(no alerts)');
  }
  for (const alert of alerts) {
    lines.push(rowLine(alertCells(alert, now)).trimEnd());
  }
  return lines.join('\n');
}

/** Label/value pairs for the details view */
export function detailFields(alert: Alert, now: Date = new Date()): Array<[string, string]> {
  return [
    ['ID', alert.id],
    ['Priority', alert.priority],
    ['Status', alert.status],
    ['Age', alertAge(alert, now)],
    ['Created', alert.createdAt ?? '-'],
    ['Acked by', alert.ackedBy ?? '-'],
    ['Tags', alert.tags.length ? alert.tags.join(', ') : '-'],
    ['Message', alert.message],
    ['Details URL', alert.detailsUrl ?? '-'],
    ['Runbook', alert.runbookUrl ?? '-'],
  ];
}

export function formatAlertDetails(alert: Alert, now: Date = new Date()): string {
  const fields = detailFields(alert, now);
  const labelWidth = Math.max(...fields.map(([label]) => label.length)) + 1;
  const lines = fields.map(([label, value]) => `${`${label}:`.padEnd(labelWidth)} ${value}`);
  return [...lines, '', 'Description:', alert.description].join('\n');
}
