/**
 * Command context - configuration, logger and gateway shared by every command
 */

import type { Command } from 'commander';
import { createAlertGateway, createLogger, describeConfig, loadConfig } from '@opsdeck/core';
import type { AlertGateway, ConfigOverrides, DeckConfig, Logger } from '@opsdeck/core';

/** Raw option values as commander hands them over */
export interface DeckOptions {
  pageSize?: string;
  interval?: string;
  logLevel?: string;
  logFile?: string;
  includeClosed?: boolean;
}

export interface CommandContext {
  config: DeckConfig;
  logger: Logger;
  gateway: AlertGateway;
}

/**
 * Register the options every command understands
 */
export function addDeckOptions(cmd: Command, opts?: { interval?: boolean }): Command {
  cmd
    .option('--page-size <n>', 'Alerts fetched per refresh (1-500)')
    .option('--log-level <level>', 'Log level (fatal, error, warn, info, debug, trace)')
    .option('--log-file <path>', 'Log file path')
    .option('--include-closed', 'Show closed alerts as well');
  if (opts?.interval) {
    cmd.option('--interval <seconds>', 'Seconds between refreshes');
  }
  return cmd;
}

export function toOverrides(options: DeckOptions): ConfigOverrides {
  return {
    pageSize: options.pageSize,
    interval: options.interval,
    logLevel: options.logLevel,
    logFile: options.logFile,
    includeClosed: options.includeClosed,
  };
}

export interface ContextOptions {
  /** Write log lines synchronously, for commands that may exit right after a failure */
  syncLogs?: boolean;
}

/**
 * Load configuration and build the logger and gateway.
 * Throws ConfigError when the environment is incomplete or invalid.
 */
export function createCommandContext(
  options: DeckOptions,
  env: Record<string, string | undefined> = process.env,
  contextOptions?: ContextOptions,
): CommandContext {
  const config = loadConfig(env, toOverrides(options));
  const logger = createLogger({ level: config.logLevel, file: config.logFile, sync: contextOptions?.syncLogs });
  logger.info({ config: describeConfig(config) }, 'Configuration loaded');

  const gateway = createAlertGateway(config, logger);

  return { config, logger, gateway };
}
