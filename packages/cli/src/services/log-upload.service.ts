/**
 * Upload of session log files to the server's log cache
 */

import { readFile } from 'node:fs/promises';
import https from 'node:https';
import path from 'node:path';
import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import type { Logger } from '@jobsub/logger';
import { ClientError, normalizeRemoteFailure } from '../commands/errors.js';

const uploadResponseSchema = z.object({
  url: z.string().min(1),
});

export interface LogUploaderOptions {
  /** Base URL per server instance */
  baseUrls: Readonly<Record<string, string>>;
  timeoutMs: number;
  httpClient?: Pick<AxiosInstance, 'put'>;
}

/**
 * Uploads `logFilePath` with the credentials in `proxyFilePath` and returns
 * the URL the server stored it under.
 */
export type LogUploader = (
  logger: Logger,
  proxyFilePath: string,
  logFilePath: string,
  instance: string
) => Promise<string>;

/**
 * Where the server keeps a log file of the given name.
 */
export function logCacheUrl(baseUrl: string, logFilePath: string): string {
  return `${baseUrl.replace(/\/+$/, '')}/cache/logs/${encodeURIComponent(path.basename(logFilePath))}`;
}

async function readInput(file: string, what: string): Promise<Buffer> {
  try {
    return await readFile(file);
  } catch (error) {
    throw new ClientError(`Unable to read ${what} ${file}`, { context: { file }, cause: error });
  }
}

/**
 * Creates the uploader. The proxy file holds both the client certificate
 * and its key, so it authenticates the PUT over mutual TLS.
 *
 * @example
 * ```typescript
 * const upload = createLogUploader({ baseUrls: { prod: 'https://jobs.example.org/jobsub' }, timeoutMs: 30000 });
 * const url = await upload(logger, '/tmp/x509up_u1000', '/work/project/jobsub.log', 'prod');
 * ```
 */
export function createLogUploader(options: LogUploaderOptions): LogUploader {
  const http = options.httpClient ?? axios.create({ timeout: options.timeoutMs });

  return async (logger, proxyFilePath, logFilePath, instance) => {
    const baseUrl = options.baseUrls[instance];
    if (baseUrl === undefined) {
      throw new ClientError(`Unknown server instance "${instance}"`, {
        context: { known: Object.keys(options.baseUrls) },
      });
    }

    const credentials = await readInput(proxyFilePath, 'proxy file');
    const content = await readInput(logFilePath, 'log file');
    const url = logCacheUrl(baseUrl, logFilePath);

    logger.debug('Uploading log file', { url, bytes: content.length });

    let data: unknown;
    try {
      const response = await http.put(url, content, {
        httpsAgent: new https.Agent({ cert: credentials, key: credentials }),
        headers: { 'Content-Type': 'text/plain' },
        timeout: options.timeoutMs,
      });
      data = response.data;
    } catch (error) {
      throw normalizeRemoteFailure(error);
    }

    const parsed = uploadResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new ClientError('Log upload returned an unexpected answer', {
        context: { url, issues: parsed.error.errors.map((e) => e.message) },
      });
    }

    logger.debug('Log file uploaded', { url: parsed.data.url });
    return parsed.data.url;
  };
}
