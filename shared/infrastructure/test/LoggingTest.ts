/**
 * LoggingTest
 *
 * Tests for log line formatting, level filtering and file rotation
 */

import { after, beforeEach, describe, it, mock } from 'node:test';
import assert from 'node:assert/strict';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { setTimeout as delay } from 'timers/promises';
import { LogLevel, Logger, getLogger } from '../logging.js';

Logger.configure({ enabled: false });

const TIMESTAMP = new Date(Date.UTC(2025, 0, 1));

describe('Logger.formatEntry', () => {
  it('formats a plain line', () => {
    assert.equal(Logger.formatEntry(LogLevel.INFO, 'hello', 'Ctx', undefined, TIMESTAMP), '2025-01-01T00:00:00.000Z [INFO] [Ctx] hello\n');
  });

  it('appends object metadata as JSON', () => {
    assert.equal(
      Logger.formatEntry(LogLevel.INFO, 'hello', 'Ctx', { a: 1 }, TIMESTAMP),
      '2025-01-01T00:00:00.000Z [INFO] [Ctx] hello {"a":1}\n'
    );
  });

  it('reduces an error to its name and message', () => {
    assert.equal(
      Logger.formatEntry(LogLevel.ERROR, 'failed', 'Ctx', new TypeError('bad input'), TIMESTAMP),
      '2025-01-01T00:00:00.000Z [ERROR] [Ctx] failed {"name":"TypeError","message":"bad input"}\n'
    );
  });

  it('appends scalar metadata as text', () => {
    assert.equal(Logger.formatEntry(LogLevel.WARN, 'count', 'Ctx', 3, TIMESTAMP), '2025-01-01T00:00:00.000Z [WARN] [Ctx] count 3\n');
  });
});

describe('Logger file output', () => {
  const logDirs: string[] = [];
  let logDir = '';

  beforeEach(() => {
    logDir = fs.mkdtempSync(path.join(os.tmpdir(), 'sitemap-logs-'));
    logDirs.push(logDir);
  });

  after(async () => {
    Logger.configure({ enabled: false });
    await getLogger().flush();
    for (const dir of logDirs) {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it('honours the minimum level', () => {
    Logger.configure({ enabled: true, logDir, minLevel: LogLevel.WARN });
    const logger = getLogger();

    assert.equal(logger.isLevelEnabled(LogLevel.ERROR), true);
    assert.equal(logger.isLevelEnabled(LogLevel.WARN), true);
    assert.equal(logger.isLevelEnabled(LogLevel.INFO), false);
    assert.equal(logger.isLevelEnabled(LogLevel.DEBUG), false);

    Logger.configure({ enabled: false });
    assert.equal(logger.isLevelEnabled(LogLevel.ERROR), false);
  });

  it('writes enabled levels to the log file', async () => {
    Logger.configure({ enabled: true, logDir, logFile: 'test.log', minLevel: LogLevel.INFO, maxFileSize: 1024 * 1024 });
    const logger = getLogger();

    logger.info('registry ready', 'LoggingTest', { size: 2 });
    logger.debug('not written', 'LoggingTest');
    logger.warn('slow render', 'LoggingTest');
    await logger.flush();

    const lines = fs.readFileSync(path.join(logDir, 'test.log'), 'utf8').trimEnd().split('\n');
    assert.equal(lines.length, 2);
    assert.match(lines[0] ?? '', /^\d{4}-\d{2}-\d{2}T[\d:.]+Z \[INFO\] \[LoggingTest\] registry ready \{"size":2\}$/);
    assert.match(lines[1] ?? '', /\[WARN\] \[LoggingTest\] slow render$/);
  });

  it('opens no file while disabled', async () => {
    Logger.configure({ enabled: false, logDir, logFile: 'quiet.log' });
    getLogger().error('dropped', 'LoggingTest');
    await getLogger().flush();

    assert.equal(fs.existsSync(path.join(logDir, 'quiet.log')), false);
  });

  it('rotates the file once it reaches the size limit', async () => {
    Logger.configure({ enabled: true, logDir, logFile: 'rotate.log', minLevel: LogLevel.INFO, maxFileSize: 1, maxFiles: 3 });
    const logger = getLogger();

    logger.info('one', 'LoggingTest');
    logger.info('two', 'LoggingTest');
    logger.info('three', 'LoggingTest');
    await logger.flush();

    const read = (name: string) => fs.readFileSync(path.join(logDir, name), 'utf8');
    assert.match(read('rotate.log'), /\] three\n$/);
    assert.match(read('rotate.log.1'), /\] two\n$/);
    assert.match(read('rotate.log.2'), /\] one\n$/);
    assert.equal(fs.existsSync(path.join(logDir, 'rotate.log.3')), false);
  });

  it('reports a failed write on the console and keeps running', { skip: !fs.existsSync('/dev/full') }, async () => {
    const consoleError = mock.method(console, 'error', () => undefined);
    try {
      // Every write to /dev/full fails asynchronously with ENOSPC
      Logger.configure({ enabled: true, logDir: '/dev', logFile: 'full', minLevel: LogLevel.INFO, maxFileSize: 1024 * 1024 });
      getLogger().info('lost line', 'LoggingTest');

      for (let attempt = 0; attempt < 100 && consoleError.mock.callCount() === 0; attempt++) {
        await delay(10);
      }
      await getLogger().flush();

      assert.equal(consoleError.mock.calls[0]?.arguments[0], 'Failed to write log:');
    } finally {
      Logger.configure({ enabled: false });
      consoleError.mock.restore();
    }
  });
});
