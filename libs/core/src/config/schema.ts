/**
 * Zod schema for environment-based configuration
 */

import { z } from 'zod';
import { LOG_LEVELS } from '../logging/logger';
import type { LogLevel } from '../logging/logger';
import { MAX_PAGE_SIZE } from '../gateway/types';
import { CONFIG_DEFAULTS } from './defaults';

/** Level names from other logging conventions mapped onto pino's */
const LEVEL_ALIASES: Record<string, LogLevel> = {
  warning: 'warn',
  critical: 'fatal',
  notset: 'trace',
};

const optionalText = () =>
  z
    .string()
    .optional()
    .transform((value) => value?.trim() || undefined);

function integer(name: string, fallback: number, min: number, max?: number) {
  const bounds = z
    .number()
    .int()
    .min(min, max === undefined ? `${name} must be >= ${min}` : `${name} must be between ${min} and ${max}`);
  return z
    .string()
    .optional()
    .transform((raw, ctx) => {
      const value = raw?.trim() || String(fallback);
      if (!/^[+-]?\d+$/.test(value)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${name} must be an integer` });
        return z.NEVER;
      }
      return Number(value);
    })
    .pipe(max === undefined ? bounds : bounds.max(max, `${name} must be between ${min} and ${max}`));
}

function flag(name: string, fallback: boolean) {
  return z
    .string()
    .optional()
    .transform((raw, ctx) => {
      const value = raw?.trim().toLowerCase();
      if (!value) return fallback;
      if (['1', 'true', 'yes', 'on'].includes(value)) return true;
      if (['0', 'false', 'no', 'off'].includes(value)) return false;
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${name} must be a boolean (true/false)` });
      return z.NEVER;
    });
}

const logLevel = z
  .string()
  .optional()
  .transform((raw, ctx): LogLevel => {
    const value = raw?.trim().toLowerCase() || CONFIG_DEFAULTS.logLevel;
    const level = LOG_LEVELS.find((candidate) => candidate === value) ?? LEVEL_ALIASES[value];
    if (!level) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'JSM_LOG_LEVEL must be a valid logging level name' });
      return z.NEVER;
    }
    return level;
  });

export const EnvConfigSchema = z
  .object({
    JSM_CLOUD_ID: optionalText().pipe(
      z.string({ required_error: 'Missing required environment variable: JSM_CLOUD_ID' }),
    ),
    JSM_API_EMAIL: optionalText(),
    JSM_API_TOKEN: optionalText(),
    JSM_BEARER_TOKEN: optionalText(),
    JSM_BASE_URL: optionalText().pipe(z.string().url('JSM_BASE_URL must be a valid URL').optional()),
    JSM_PAGE_SIZE: integer('JSM_PAGE_SIZE', CONFIG_DEFAULTS.pageSize, 1, MAX_PAGE_SIZE),
    JSM_REFRESH_INTERVAL_SECONDS: integer('JSM_REFRESH_INTERVAL_SECONDS', CONFIG_DEFAULTS.refreshIntervalSeconds, 1),
    JSM_REQUEST_TIMEOUT_SECONDS: integer('JSM_REQUEST_TIMEOUT_SECONDS', CONFIG_DEFAULTS.requestTimeoutSeconds, 1),
    JSM_LOG_LEVEL: logLevel,
    JSM_LOG_FILE: optionalText(),
    JSM_LOG_HTTP_BODY: flag('JSM_LOG_HTTP_BODY', CONFIG_DEFAULTS.logHttpBody),
    JSM_INCLUDE_CLOSED: flag('JSM_INCLUDE_CLOSED', CONFIG_DEFAULTS.includeClosed),
  })
  .superRefine((env, ctx) => {
    if (!env.JSM_BEARER_TOKEN && !(env.JSM_API_EMAIL && env.JSM_API_TOKEN)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'Authentication is required. Set JSM_BEARER_TOKEN or JSM_API_EMAIL + JSM_API_TOKEN.',
      });
    }
  });

export type EnvConfig = z.output<typeof EnvConfigSchema>;
