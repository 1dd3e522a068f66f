/**
 * Tests for the built-in uploadlog command
 */

import { describe, it, expect, vi } from 'vitest';
import { initLoggers, settleLoggers } from '@jobsub/logger';
import { UploadLogCommand, parseUploadLogArgs, uploadLogCommand } from '../src/commands/uploadlog.command.js';
import { UsageError } from '../src/commands/errors.js';
import type { LogUploader } from '../src/services/log-upload.service.js';

const STORED_URL = 'https://jobs.example.org/jobsub/cache/logs/jobsub.log';

function commandConfig(uploader: LogUploader) {
  return { uploader, defaultLogFile: 'jobsub.log', defaultInstance: 'prod', cwd: '/work/project' };
}

describe('parseUploadLogArgs', () => {
  it('should accept separate and inline values', () => {
    expect(parseUploadLogArgs(['--proxy=/tmp/x509up_test', '--logfile', 'old.log', '--instance', 'dev'])).toEqual({
      proxy: '/tmp/x509up_test',
      logFile: 'old.log',
      instance: 'dev',
    });
  });

  it('should reject unknown arguments', () => {
    expect(() => parseUploadLogArgs(['--force'])).toThrow('Unknown uploadlog argument "--force"');
  });

  it('should reject a flag without a value', () => {
    expect(() => parseUploadLogArgs(['--instance'])).toThrow('--instance needs a value');
    expect(() => parseUploadLogArgs(['--proxy='])).toThrow('--proxy needs a value');
  });
});

describe('UploadLogCommand', () => {
  it('should upload the default log file and record the proxy', async () => {
    const loggers = initLoggers({ console: false });
    const uploader = vi.fn<LogUploader>().mockResolvedValue(STORED_URL);
    const command = new UploadLogCommand(loggers.userLogger, ['--proxy', 'x509up_test'], commandConfig(uploader));

    expect(command.proxyFilePath).toBeUndefined();
    await command.execute();
    await settleLoggers();

    expect(uploader).toHaveBeenCalledWith(
      loggers.userLogger,
      '/work/project/x509up_test',
      '/work/project/jobsub.log',
      'prod'
    );
    expect(command.proxyFilePath).toBe('/work/project/x509up_test');
    expect(command.instance).toBe('prod');
    expect(loggers.memoryHandler.snapshot().at(-1)?.message).toBe(`Log file uploaded to ${STORED_URL}`);
  });

  it('should require a proxy file', async () => {
    const uploader = vi.fn<LogUploader>();
    const command = new UploadLogCommand(initLoggers({ console: false }).userLogger, [], commandConfig(uploader));

    await expect(command.execute()).rejects.toBeInstanceOf(UsageError);
    expect(uploader).not.toHaveBeenCalled();
  });

  it('should leave the proxy unset when the upload fails', async () => {
    const uploader = vi.fn<LogUploader>().mockRejectedValue(new Error('connection reset'));
    const command = new UploadLogCommand(
      initLoggers({ console: false }).userLogger,
      ['--proxy', '/tmp/x509up_test'],
      commandConfig(uploader)
    );

    await expect(command.execute()).rejects.toThrow('connection reset');
    expect(command.proxyFilePath).toBeUndefined();
  });
});

describe('uploadLogCommand', () => {
  it('should register as uploadlog with alias ul', () => {
    const descriptor = uploadLogCommand(commandConfig(vi.fn<LogUploader>()));

    expect(descriptor.name).toBe('uploadlog');
    expect([...descriptor.shortAliases]).toEqual(['ul']);
  });
});
