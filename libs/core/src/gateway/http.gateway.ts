/**
 * HTTP alert gateway - fetch-based client for the JSM Ops alert API
 */

import { extractAlertList, extractAlertRecord, parseAlertPayload, RecordSchema } from '../alerts/alert.schema';
import type { Alert } from '../alerts/alert.types';
import {
  AlertConflictError,
  AlertNotFoundError,
  AuthError,
  GatewayError,
  NetworkError,
  RateLimitedError,
  ServerError,
} from '../errors';
import { createSilentLogger } from '../logging/logger';
import type { Logger } from '../logging/logger';
import { MAX_PAGE_SIZE } from './types';
import type { AlertGateway, GatewayAuth, HttpAlertGatewayOptions } from './types';

const DEFAULT_TIMEOUT = 20_000;
const MAX_BODY_LOG_LENGTH = 500;

type HttpMethod = 'GET' | 'POST';

interface RequestOptions {
  params?: Record<string, string | number>;
  body?: Record<string, unknown>;
  /** Alert the request is about, used to type 404/409 failures */
  alertId?: string;
}

export function jsmBaseUrl(cloudId: string): string {
  return `https://api.atlassian.com/jsm/ops/api/${encodeURIComponent(cloudId)}`;
}

export class HttpAlertGateway implements AlertGateway {
  private readonly baseUrl: string;
  private readonly auth: GatewayAuth;
  private readonly timeout: number;
  private readonly logHttpBody: boolean;
  private readonly includeClosed: boolean;
  private readonly fetchImpl: typeof fetch;
  private readonly logger: Logger;

  constructor(options: HttpAlertGatewayOptions, logger?: Logger) {
    this.baseUrl = options.baseUrl.replace(/\/$/, '');
    this.auth = options.auth;
    this.timeout = options.timeout ?? DEFAULT_TIMEOUT;
    this.logHttpBody = options.logHttpBody ?? false;
    this.includeClosed = options.includeClosed ?? false;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.logger = (logger ?? createSilentLogger()).child({ component: 'gateway' });

    this.logger.info(
      { baseUrl: this.baseUrl, authMode: this.auth.type, timeoutMs: this.timeout },
      'Initialized alert gateway',
    );
  }

  async listAlerts(pageSize: number): Promise<Alert[]> {
    const size = Math.min(Math.max(Math.floor(pageSize), 1), MAX_PAGE_SIZE);
    const payload = await this.requestJson('GET', '/v1/alerts', { params: { size } });

    const alerts: Alert[] = [];
    for (const raw of extractAlertList(payload)) {
      const alert = parseAlertPayload(raw);
      this.logger.debug(
        {
          alertId: alert.id,
          priority: alert.priority,
          status: alert.status,
          ackedBy: alert.ackedBy,
          tags: alert.tags,
          message: truncate(alert.message, 250),
        },
        'Alert received',
      );
      if (!alert.id) continue;
      if (alert.status === 'closed' && !this.includeClosed) continue;
      alerts.push(alert);
    }

    // Newest first; alerts without a timestamp sink to the bottom
    return alerts.sort((a, b) => (b.createdAt ?? '').localeCompare(a.createdAt ?? ''));
  }

  async getDetails(alertId: string): Promise<Alert> {
    const payload = await this.requestJson('GET', `/v1/alerts/${encodeURIComponent(alertId)}`, { alertId });
    const record = extractAlertRecord(payload);
    if (!record) {
      this.logger.error({ alertId, keys: Object.keys(payload).sort() }, 'Invalid alert details response format');
      throw new ServerError(`Invalid alert response format for ${alertId}`);
    }
    const alert = parseAlertPayload(record);
    return alert.id ? alert : { ...alert, id: alertId };
  }

  async acknowledge(alertId: string): Promise<Alert | null> {
    return this.postAction(alertId, 'acknowledge');
  }

  async close(alertId: string): Promise<Alert | null> {
    return this.postAction(alertId, 'close');
  }

  private async postAction(alertId: string, action: 'acknowledge' | 'close'): Promise<Alert | null> {
    this.logger.info({ alertId, action }, 'Sending alert action');
    const payload = await this.requestJson('POST', `/v1/alerts/${encodeURIComponent(alertId)}/${action}`, {
      body: {},
      alertId,
    });
    // The API usually answers with a request receipt, not the alert itself
    const record = extractAlertRecord(payload);
    if (!record) return null;
    const echoed = parseAlertPayload(record);
    return echoed.id === alertId ? echoed : null;
  }

  private headers(): Record<string, string> {
    const h: Record<string, string> = {
      Accept: 'application/json',
      'Content-Type': 'application/json',
    };
    if (this.auth.type === 'bearer') {
      h['Authorization'] = `Bearer ${this.auth.token}`;
    } else {
      const encoded = Buffer.from(`${this.auth.email}:${this.auth.apiToken}`).toString('base64');
      h['Authorization'] = `Basic ${encoded}`;
    }
    return h;
  }

  private async requestJson(method: HttpMethod, path: string, opts?: RequestOptions): Promise<Record<string, unknown>> {
    const query = opts?.params
      ? `?${new URLSearchParams(Object.entries(opts.params).map(([k, v]): [string, string] => [k, String(v)]))}`
      : '';
    const started = Date.now();
    this.logger.debug(
      { method, path, params: redactParams(opts?.params), bodyKeys: opts?.body ? Object.keys(opts.body).sort() : null },
      'Alert API request',
    );

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeout);

    try {
      let res: Response;
      let text: string;
      try {
        res = await this.fetchImpl(`${this.baseUrl}${path}${query}`, {
          method,
          headers: this.headers(),
          body: opts?.body ? JSON.stringify(opts.body) : undefined,
          signal: controller.signal,
        });
        text = await res.text();
      } catch (err) {
        const timedOut = controller.signal.aborted;
        const reason = err instanceof Error ? err.message : String(err);
        this.logger.error({ method, path, durationMs: Date.now() - started, timedOut, reason }, 'Alert API transport error');
        throw new NetworkError(
          timedOut ? `${method} ${path} timed out after ${this.timeout}ms` : `${method} ${path} failed: ${reason}`,
          { timedOut },
        );
      }

      const durationMs = Date.now() - started;
      if (!res.ok) {
        throw this.httpError(method, path, res, text, durationMs, opts?.alertId);
      }

      this.logger.info({ method, path, status: res.status, durationMs }, 'Alert API response');
      return this.parseJson(method, path, res.status, text);
    } finally {
      clearTimeout(timer);
    }
  }

  private httpError(
    method: HttpMethod,
    path: string,
    res: Response,
    text: string,
    durationMs: number,
    alertId?: string,
  ): GatewayError {
    const body = this.logHttpBody ? truncate(text.trim(), MAX_BODY_LOG_LENGTH) : '<hidden>';
    const responseBody = this.logHttpBody ? body : undefined;
    this.logger.error({ method, path, status: res.status, durationMs, body }, 'Alert API HTTP error');

    const message = `${method} ${path} failed with ${res.status}: ${body}`;
    switch (res.status) {
      case 401:
      case 403:
        return new AuthError(message, res.status, responseBody);
      case 429:
        return new RateLimitedError(message, parseRetryAfter(res.headers.get('retry-after')), responseBody);
      case 409:
        return new AlertConflictError(alertId ?? '', message, responseBody);
      case 404:
        if (alertId) return new AlertNotFoundError(alertId, responseBody);
        return new ServerError(message, res.status, responseBody);
      default:
        return new ServerError(message, res.status, responseBody);
    }
  }

  private parseJson(method: HttpMethod, path: string, status: number, text: string): Record<string, unknown> {
    if (!text.trim()) return {};

    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch {
      this.logger.error(
        { method, path, status, body: this.logHttpBody ? truncate(text, MAX_BODY_LOG_LENGTH) : '<hidden>' },
        'Alert API non-JSON response',
      );
      throw new ServerError(`${method} ${path} returned non-JSON response`, status);
    }

    const record = RecordSchema.safeParse(data);
    if (!record.success) {
      this.logger.error({ method, path, type: Array.isArray(data) ? 'array' : typeof data }, 'Alert API unexpected JSON payload');
      throw new ServerError(`${method} ${path} returned unexpected JSON payload`, status);
    }
    return record.data;
  }
}

function redactParams(params?: Record<string, string | number>): Record<string, string | number> | null {
  if (!params) return null;
  const redacted: Record<string, string | number> = {};
  for (const [key, value] of Object.entries(params)) {
    const lower = key.toLowerCase();
    redacted[key] = lower.includes('token') || lower.includes('password') ? '<redacted>' : value;
  }
  return redacted;
}

function parseRetryAfter(header: string | null): number | undefined {
  if (!header) return undefined;
  const seconds = Number(header);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds * 1000 : undefined;
}

export function truncate(text: string, maxLength: number): string {
  if (text.length <= maxLength) return text;
  return `${text.slice(0, maxLength)}...<truncated>`;
}
