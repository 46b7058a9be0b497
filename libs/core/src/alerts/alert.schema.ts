/**
 * Zod schemas for alert API payloads
 *
 * The alert API is loose about field names and shapes, so every field is
 * optional and falls back to undefined instead of failing the whole record.
 */

import { z } from 'zod';
import { isValid, parseISO } from 'date-fns';
import { PRIORITY_ORDER } from './alert.types';
import type { Alert, AlertPriority, AlertStatus } from './alert.types';

const optionalString = () => z.string().optional().catch(undefined);
const optionalId = () =>
  z.union([z.string(), z.number()]).transform(String).optional().catch(undefined);
const optionalList = () => z.array(z.unknown()).optional().catch(undefined);

export const RecordSchema = z.record(z.unknown());

export const AlertPayloadSchema = z.object({
  id: optionalId(),
  tinyId: optionalId(),
  priority: optionalString(),
  status: optionalString(),
  acknowledged: z.boolean().optional().catch(undefined),
  message: optionalString(),
  alias: optionalString(),
  description: optionalString(),
  details: z.unknown(),
  createdAt: optionalString(),
  created_at: optionalString(),
  insertedAt: optionalString(),
  lastOccurredAt: optionalString(),
  acknowledgedBy: z.unknown(),
  acknowledged_by: z.unknown(),
  acknowledgers: z.unknown(),
  acknowledgedByUser: z.unknown(),
  owner: z.unknown(),
  tags: optionalList(),
  alertTags: optionalList(),
  labels: optionalList(),
  runbookUrl: optionalString(),
  detailsUrl: optionalString(),
  link: optionalString(),
  url: optionalString(),
});

export type AlertPayload = z.output<typeof AlertPayloadSchema>;

const PersonSchema = z.object({
  fullName: optionalString(),
  displayName: optionalString(),
  name: optionalString(),
  username: optionalString(),
  email: optionalString(),
  emailAddress: optionalString(),
});

const TagObjectSchema = z.object({
  name: optionalString(),
  label: optionalString(),
  value: optionalString(),
  key: optionalString(),
});

const URL_PATTERN = /(?<!\()(https?:\/\/[^\s<>)]+)/;
const RUNBOOK_MARKDOWN_PATTERN = /\[[^\]]*runbook[^\]]*\]\((https?:\/\/[^)\s]+)\)/i;
const RUNBOOK_PLAIN_PATTERN = /runbook\s*[:=-]?\s*(https?:\/\/[^\s<>)]+)/i;

/**
 * Parse one raw alert record from the API into an Alert.
 * Never throws; records without any id come back with an empty id.
 */
export function parseAlertPayload(raw: unknown): Alert {
  const payload = AlertPayloadSchema.parse(RecordSchema.safeParse(raw).success ? raw : {});

  const message = firstNonEmpty(payload.message, payload.alias) ?? '(no message)';
  const detailsText = typeof payload.details === 'string' ? payload.details : undefined;
  const description = firstNonEmpty(payload.description, detailsText) ?? message;

  const ackedBy = formatAckedBy(
    firstNonEmpty(
      personName(payload.acknowledgedBy),
      personName(payload.acknowledged_by),
      personName(payload.acknowledgers),
      personName(payload.acknowledgedByUser),
      personName(payload.owner),
    ),
  );

  const runbookUrl =
    firstNonEmpty(payload.runbookUrl, runbookFromDetails(payload.details)) ?? extractRunbookUrl(description);
  const detailsUrl = firstNonEmpty(payload.detailsUrl, payload.link, payload.url);

  return {
    id: firstNonEmpty(payload.id, payload.tinyId) ?? '',
    priority: normalizePriority(payload.priority),
    status: normalizeStatus(payload.status, payload.acknowledged),
    createdAt: normalizeTimestamp(
      firstNonEmpty(payload.createdAt, payload.created_at, payload.insertedAt, payload.lastOccurredAt),
    ),
    message,
    description,
    tags: extractTags(payload),
    ...(ackedBy ? { ackedBy } : {}),
    ...(detailsUrl ? { detailsUrl } : {}),
    ...(runbookUrl ? { runbookUrl } : {}),
  };
}

/** Alert records from a list response: the first array among data, values, alerts */
export function extractAlertList(payload: unknown): unknown[] {
  const record = RecordSchema.safeParse(payload);
  if (!record.success) return [];
  for (const key of ['data', 'values', 'alerts']) {
    const raw = record.data[key];
    if (Array.isArray(raw)) {
      return raw.filter((item) => RecordSchema.safeParse(item).success);
    }
  }
  return [];
}

/** The alert record from a single-alert response, or null when none is recognisable */
export function extractAlertRecord(payload: unknown): Record<string, unknown> | null {
  const record = RecordSchema.safeParse(payload);
  if (!record.success) return null;
  for (const key of ['data', 'value', 'alert']) {
    const nested = RecordSchema.safeParse(record.data[key]);
    if (nested.success) return nested.data;
  }
  const looksLikeAlert = ['id', 'tinyId', 'message', 'status'].some((key) => key in record.data);
  return looksLikeAlert ? record.data : null;
}

export function normalizeStatus(status: string | undefined, acknowledged?: boolean): AlertStatus {
  const normalized = status?.trim().toLowerCase() ?? '';
  if (normalized === 'closed' || normalized === 'resolved') return 'closed';
  if (normalized === 'acked' || normalized === 'acknowledged' || acknowledged === true) return 'acknowledged';
  return 'open';
}

export function normalizePriority(priority: string | undefined): AlertPriority {
  const normalized = priority?.trim().toUpperCase() ?? '';
  return PRIORITY_ORDER.find((p) => p === normalized) ?? 'UNKNOWN';
}

function normalizeTimestamp(raw: string | undefined): string | null {
  if (!raw) return null;
  const parsed = parseISO(raw);
  return isValid(parsed) ? parsed.toISOString() : null;
}

/**
 * Pick the runbook link out of free text: a markdown link labelled
 * "runbook", then a "runbook: <url>" label, then the first bare URL.
 */
export function extractRunbookUrl(text: string): string | undefined {
  const match =
    RUNBOOK_MARKDOWN_PATTERN.exec(text) ?? RUNBOOK_PLAIN_PATTERN.exec(text) ?? URL_PATTERN.exec(text);
  return match?.[1] ? match[1].replace(/[.,;:]+$/, '') : undefined;
}

function runbookFromDetails(details: unknown): string | undefined {
  const record = RecordSchema.safeParse(details);
  if (!record.success) return undefined;
  for (const [key, value] of Object.entries(record.data)) {
    if (/runbook/i.test(key) && typeof value === 'string' && URL_PATTERN.test(value)) {
      return value.trim();
    }
  }
  return undefined;
}

function personName(value: unknown): string {
  if (typeof value === 'string') return value.trim();

  if (Array.isArray(value)) {
    const names: string[] = [];
    for (const item of value) {
      const name = personName(item);
      if (name && !names.includes(name)) names.push(name);
    }
    return names.join(', ');
  }

  const person = PersonSchema.safeParse(value);
  if (!person.success) return '';
  const { fullName, displayName, name, username, email, emailAddress } = person.data;
  return firstNonEmpty(fullName, displayName, name, username, email, emailAddress) ?? '';
}

/** Shorten email addresses to their local part and re-join multiple acknowledgers */
export function formatAckedBy(value: string | undefined): string | undefined {
  if (!value) return undefined;
  const parts = value
    .split(',')
    .map((part) => part.trim())
    .filter(Boolean)
    .map((part) => {
      if (!part.includes('@')) return part;
      const local = part.split('@', 1)[0]?.trim();
      return local || part;
    });
  return parts.length ? parts.join(', ') : undefined;
}

function extractTags(payload: AlertPayload): string[] {
  for (const raw of [payload.tags, payload.alertTags, payload.labels]) {
    if (!raw) continue;
    const tags: string[] = [];
    for (const item of raw) {
      const tag = tagName(item);
      if (tag && !tags.includes(tag)) tags.push(tag);
    }
    if (tags.length) return tags;
  }
  return [];
}

function tagName(value: unknown): string {
  if (typeof value === 'string') return value.trim();
  const tag = TagObjectSchema.safeParse(value);
  if (!tag.success) return '';
  const { name, label, value: tagValue, key } = tag.data;
  return firstNonEmpty(name?.trim(), label?.trim(), tagValue?.trim(), key?.trim()) ?? '';
}

function firstNonEmpty(...values: Array<string | undefined>): string | undefined {
  return values.find((value): value is string => typeof value === 'string' && value.length > 0);
}
