/**
 * @fileoverview Tests for session logger creation, buffering and flushing
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import {
  initLoggers,
  setConsoleLevel,
  flushMemoryLogger,
  settleLoggers,
  attachedLogFiles,
} from '../src/session.js';
import { SessionFileTransport } from '../src/transports.js';
import type { Verbosity } from '../src/types.js';

function readLines(file: string): string[] {
  return fs.readFileSync(file, 'utf-8').split('\n').filter((line) => line.length > 0);
}

describe('initLoggers', () => {
  it('should create both loggers at debug level', () => {
    const loggers = initLoggers({ console: false });

    expect(loggers.userLogger.level).toBe('debug');
    expect(loggers.traceLogger.level).toBe('debug');
    expect(loggers.consoleHandler).toBeUndefined();
    expect(loggers.fileHandler).toBeUndefined();
  });

  it('should map verbosity to the console level', () => {
    expect(initLoggers({ verbosity: 'quiet' }).consoleHandler?.level).toBe('warn');
    expect(initLoggers({ verbosity: 'default' }).consoleHandler?.level).toBe('info');
    expect(initLoggers({ verbosity: 'debug' }).consoleHandler?.level).toBe('debug');
  });

  it.each<Verbosity>(['quiet', 'default', 'debug'])(
    'should buffer every record under %s verbosity',
    async (verbosity) => {
      const loggers = initLoggers({ console: false, verbosity });

      loggers.userLogger.debug('first');
      loggers.userLogger.info('second');
      loggers.userLogger.warn('third');
      loggers.userLogger.error('fourth');
      await settleLoggers();

      const messages = loggers.memoryHandler.snapshot().map((record) => record.message);
      expect(messages).toEqual(['first', 'second', 'third', 'fourth']);
    }
  );

  it('should buffer trace records next to user records', async () => {
    const loggers = initLoggers({ console: false });

    loggers.userLogger.info('visible');
    loggers.traceLogger.error('trace only');
    await settleLoggers();

    const records = loggers.memoryHandler.snapshot();
    expect(records).toHaveLength(2);
    expect(records.map((record) => record['component'])).toEqual(
      expect.arrayContaining(['jobsub', 'jobsub:trace'])
    );
  });

  it('should add a timestamp to every record', async () => {
    const loggers = initLoggers({ console: false });

    loggers.userLogger.info('stamped');
    await settleLoggers();

    const [record] = loggers.memoryHandler.snapshot();
    expect(typeof record?.['timestamp']).toBe('string');
  });
});

describe('setConsoleLevel', () => {
  it('should only change the console transport', () => {
    const loggers = initLoggers({ verbosity: 'default' });

    setConsoleLevel(loggers, 'quiet');
    expect(loggers.consoleHandler?.level).toBe('warn');
    expect(loggers.memoryHandler.level).toBe('debug');

    setConsoleLevel(loggers, 'debug');
    expect(loggers.consoleHandler?.level).toBe('debug');
  });

  it('should be a no-op without a console transport', () => {
    const loggers = initLoggers({ console: false });

    expect(() => setConsoleLevel(loggers, 'quiet')).not.toThrow();
  });
});

describe('flushMemoryLogger', () => {
  let workDir: string;

  beforeEach(() => {
    workDir = fs.mkdtempSync(path.join(os.tmpdir(), 'jobsub-logger-'));
  });

  afterEach(() => {
    fs.rmSync(workDir, { recursive: true, force: true });
  });

  it('should replay buffered records into the log file in order', async () => {
    const loggers = initLoggers({ console: false, verbosity: 'quiet' });
    const logFile = path.join(workDir, 'project', 'jobsub.log');

    loggers.userLogger.debug('resolving command');
    loggers.userLogger.info('contacting server');
    await settleLoggers();

    const result = flushMemoryLogger(loggers, logFile);

    expect(result).toEqual({ status: 'attached', logFilePath: logFile, replayed: 2 });
    const lines = readLines(logFile);
    expect(lines).toHaveLength(2);
    expect(lines[0]).toMatch(/^\[.+\] jobsub:DEBUG resolving command$/);
    expect(lines[1]).toMatch(/^\[.+\] jobsub:INFO contacting server$/);
    expect(loggers.memoryHandler.size).toBe(0);
  });

  it('should send later records straight to the file', async () => {
    const loggers = initLoggers({ console: false });
    const logFile = path.join(workDir, 'jobsub.log');

    loggers.userLogger.info('before');
    await settleLoggers();
    flushMemoryLogger(loggers, logFile);

    loggers.userLogger.info('after');
    loggers.traceLogger.error('trace after');
    await settleLoggers();

    const lines = readLines(logFile);
    expect(lines).toHaveLength(3);
    expect(lines[0]).toContain('jobsub:INFO before');
    expect(lines[1]).toContain('jobsub:INFO after');
    expect(lines[2]).toContain('jobsub:trace:ERROR trace after');
    expect(loggers.memoryHandler.size).toBe(0);
  });

  it('should attach one file handler and write nothing on a second flush', async () => {
    const loggers = initLoggers({ console: false });
    const logFile = path.join(workDir, 'jobsub.log');

    loggers.userLogger.info('only once');
    await settleLoggers();

    flushMemoryLogger(loggers, logFile);
    const second = flushMemoryLogger(loggers, logFile);

    expect(second).toEqual({ status: 'already-attached', logFilePath: logFile, replayed: 0 });
    expect(readLines(logFile)).toHaveLength(1);
    const fileHandlers = loggers.userLogger.transports.filter(
      (transport) => transport instanceof SessionFileTransport
    );
    expect(fileHandlers).toHaveLength(1);
    expect(attachedLogFiles(loggers.traceLogger)).toEqual([logFile]);
  });

  it('should apply the memory level to records written after the flush', async () => {
    const loggers = initLoggers({ console: false, memoryLevel: 'info' });
    const logFile = path.join(workDir, 'jobsub.log');

    loggers.userLogger.debug('dropped before flush');
    loggers.userLogger.info('kept before flush');
    await settleLoggers();
    flushMemoryLogger(loggers, logFile);

    loggers.traceLogger.debug('dropped after flush');
    loggers.userLogger.warn('kept after flush');
    await settleLoggers();

    const lines = readLines(logFile);
    expect(lines).toHaveLength(2);
    expect(lines[0]).toMatch(/^\[.+\] jobsub:INFO kept before flush$/);
    expect(lines[1]).toMatch(/^\[.+\] jobsub:WARN kept after flush$/);
    expect(loggers.fileHandler?.level).toBe('info');
  });

  it('should keep the first file when asked for another one', async () => {
    const loggers = initLoggers({ console: false });
    const first = path.join(workDir, 'first.log');
    const second = path.join(workDir, 'second.log');

    loggers.userLogger.info('message');
    await settleLoggers();

    flushMemoryLogger(loggers, first);
    const result = flushMemoryLogger(loggers, second);

    expect(result.status).toBe('already-attached');
    expect(result.logFilePath).toBe(first);
    expect(fs.existsSync(second)).toBe(false);
  });

  it('should write stack traces after the record line', async () => {
    const loggers = initLoggers({ console: false });
    const logFile = path.join(workDir, 'jobsub.log');

    loggers.traceLogger.error(new Error('boom'));
    await settleLoggers();
    flushMemoryLogger(loggers, logFile);

    const content = fs.readFileSync(logFile, 'utf-8');
    expect(content).toContain('jobsub:trace:ERROR boom\nError: boom\n');
  });
});
