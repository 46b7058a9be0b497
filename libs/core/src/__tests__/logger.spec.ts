/**
 * Logger factory tests
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { createLogger, createSilentLogger } from '../logging/logger';

function readLines(file: string): Array<Record<string, unknown>> {
  return fs
    .readFileSync(file, 'utf-8')
    .split('\n')
    .filter(Boolean)
    .map((line): Record<string, unknown> => JSON.parse(line));
}

describe('createLogger', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'opsdeck-logger-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('writes JSON lines to a file, creating its directory', () => {
    const file = path.join(dir, 'nested', 'deck.log');
    const logger = createLogger({ level: 'info', file, sync: true });

    logger.info({ alertId: 'a1' }, 'Action applied optimistically');

    const [line] = readLines(file);
    expect(line).toMatchObject({ level: 30, name: 'opsdeck', alertId: 'a1', msg: 'Action applied optimistically' });
    expect(typeof line?.time).toBe('string');
  });

  it('drops records below the configured level', () => {
    const file = path.join(dir, 'deck.log');
    const logger = createLogger({ level: 'warn', file, sync: true });

    logger.info('quiet');
    logger.warn('loud');

    expect(readLines(file).map((line) => line.msg)).toEqual(['loud']);
  });

  it('redacts credentials', () => {
    const file = path.join(dir, 'deck.log');
    const logger = createLogger({ level: 'info', file, sync: true });

    logger.info({ authorization: 'Bearer test-token', config: { apiToken: 'test-secret' } }, 'request');

    expect(readLines(file)[0]).toMatchObject({
      authorization: '<redacted>',
      config: { apiToken: '<redacted>' },
    });
  });
});

describe('createSilentLogger', () => {
  it('is silent', () => {
    expect(createSilentLogger().level).toBe('silent');
  });
});
