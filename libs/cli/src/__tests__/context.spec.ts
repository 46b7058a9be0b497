/**
 * Command context tests
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { ConfigError, HttpAlertGateway } from '@opsdeck/core';
import { createCommandContext } from '../context';

const ENV = { JSM_CLOUD_ID: 'cloud-1', JSM_BEARER_TOKEN: 'test-token' };

function readLines(file: string): Array<Record<string, unknown>> {
  return fs
    .readFileSync(file, 'utf-8')
    .split('\n')
    .filter(Boolean)
    .map((line): Record<string, unknown> => JSON.parse(line));
}

describe('createCommandContext', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'opsdeck-context-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('applies command-line overrides over the environment', () => {
    const logFile = path.join(dir, 'deck.log');
    const ctx = createCommandContext({ pageSize: '20', logFile }, ENV, { syncLogs: true });

    expect(ctx.config.pageSize).toBe(20);
    expect(ctx.config.logFile).toBe(logFile);
    expect(ctx.gateway).toBeInstanceOf(HttpAlertGateway);
  });

  it('has log lines on disk before the command returns when logs are synchronous', () => {
    const logFile = path.join(dir, 'logs', 'deck.log');
    const ctx = createCommandContext({ logFile }, ENV, { syncLogs: true });

    ctx.logger.error({ alertId: 'A' }, 'Action failed');

    const lines = readLines(logFile);
    expect(lines.map((line) => line.msg)).toEqual(['Configuration loaded', 'Action failed']);
    expect(lines[0]?.config).toMatchObject({ cloudId: 'cloud-1', authMode: 'bearer' });
    expect(lines[1]).toMatchObject({ level: 50, alertId: 'A' });
  });

  it('rejects an incomplete environment', () => {
    expect(() => createCommandContext({ logFile: path.join(dir, 'deck.log') }, { JSM_CLOUD_ID: 'cloud-1' })).toThrow(
      ConfigError,
    );
  });
});
