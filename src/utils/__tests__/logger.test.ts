/**
 * Logger Tests
 */

import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { Logger, LogLevel, parseLogLevel, serializeError } from '../logger';

function readEntries(file: string): unknown[] {
  return fs
    .readFileSync(file, 'utf8')
    .trim()
    .split('\n')
    .map((line) => JSON.parse(line));
}

describe('serializeError', () => {
  it('cause を含めて Error をプレーンオブジェクトにする', () => {
    const error = new Error('outer', { cause: new TypeError('inner') });

    expect(serializeError(error)).toMatchObject({
      name: 'Error',
      message: 'outer',
      cause: { name: 'TypeError', message: 'inner' },
    });
  });

  it('プリミティブは文字列にする', () => {
    expect(serializeError(42)).toBe('42');
    expect(serializeError({ code: 'E1' })).toEqual({ code: 'E1' });
  });
});

describe('parseLogLevel', () => {
  it('大文字小文字を区別しない', () => {
    expect(parseLogLevel('Info')).toBe(LogLevel.INFO);
    expect(parseLogLevel(' error ')).toBe(LogLevel.ERROR);
    expect(parseLogLevel('trace')).toBeUndefined();
  });
});

describe('Logger', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'agent-core-test-'));
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('JSON Lines 形式でファイルに書き込む', () => {
    const log = new Logger('Test');
    log.configure({ dir, level: LogLevel.DEBUG });

    log.info('hello', { attempt: 1 });
    log.child('Sub').warn('careful');

    const file = log.logFile;
    expect(file).toBeDefined();
    expect(path.dirname(file ?? '')).toBe(dir);
    expect(readEntries(file ?? '')).toEqual([
      expect.objectContaining({
        level: 'info',
        subsystem: 'Test',
        message: 'hello',
        meta: { attempt: 1 },
      }),
      expect.objectContaining({
        level: 'warn',
        subsystem: 'Test:Sub',
        message: 'careful',
      }),
    ]);
  });

  it('最小レベル未満のログは出力しない', () => {
    const log = new Logger('Test');
    log.configure({ dir: null, level: LogLevel.WARN });

    log.debug('noise');
    log.info('noise');
    log.error('problem');

    expect(console.log).not.toHaveBeenCalled();
    expect(console.error).toHaveBeenCalledTimes(1);
  });

  it('親の configure は作成済みの子にも反映される', () => {
    const log = new Logger('Test');
    const child = log.child('Child');

    log.configure({ dir: null, level: LogLevel.ERROR });
    child.info('hidden');

    expect(console.log).not.toHaveBeenCalled();
  });

  it('ファイル書き込みに失敗したら一度だけ報告してコンソールのみになる', () => {
    const blocker = path.join(dir, 'blocker');
    fs.writeFileSync(blocker, '');
    const log = new Logger('Test');
    log.configure({ dir: path.join(blocker, 'logs'), level: LogLevel.DEBUG });

    log.info('first');
    log.info('second');

    expect(console.error).toHaveBeenCalledTimes(1);
    expect(vi.mocked(console.error).mock.calls[0][0]).toMatch(
      /^\[Test\] File logging disabled: /
    );
    expect(console.log).toHaveBeenCalledTimes(2);
    expect(log.logFile).toBeUndefined();
  });
});
