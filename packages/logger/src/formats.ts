/**
 * @fileoverview Custom Winston formats for the jobsub session logger
 * Includes secret redaction, standard fields and the console/file line layouts.
 */

import { format } from 'winston';
import type { LogRecord } from './types.js';

/**
 * Metadata keys whose values never reach a transport.
 * The session log may be uploaded to the remote cache, so credentials
 * passed as metadata are replaced before the memory buffer sees them.
 */
const SENSITIVE_FIELD_PATTERNS = [
  /password/i,
  /passwd/i,
  /passphrase/i,
  /secret/i,
  /token/i,
  /api[_-]?key/i,
  /private[_-]?key/i,
  /authorization/i,
  /cookie/i,
];

/**
 * Replacement value for redacted sensitive data.
 */
export const REDACTED = '[REDACTED]';

/**
 * Fields winston owns or that are rendered separately in a line.
 */
const CORE_FIELDS = new Set(['level', 'message', 'timestamp', 'component', 'stack']);

export function isSensitiveFieldName(key: string): boolean {
  return SENSITIVE_FIELD_PATTERNS.some((pattern) => pattern.test(key));
}

/**
 * Returns a copy of `value` with sensitive keys replaced, at any depth.
 * Errors are kept as they are so their stack survives.
 *
 * @example
 * ```typescript
 * redactSensitiveFields({ user: 'alice', auth: { token: 'abc' } });
 * // { user: 'alice', auth: { token: '[REDACTED]' } }
 * ```
 */
export function redactSensitiveFields(value: unknown): unknown {
  if (value === null || typeof value !== 'object' || value instanceof Error) {
    return value;
  }

  if (Array.isArray(value)) {
    return value.map((item) => redactSensitiveFields(item));
  }

  const redacted: Record<string, unknown> = {};
  for (const [key, nested] of Object.entries(value)) {
    redacted[key] = isSensitiveFieldName(key) ? REDACTED : redactSensitiveFields(nested);
  }
  return redacted;
}

/**
 * Winston format that redacts sensitive fields from log metadata.
 * Must run before anything is buffered or written.
 *
 * @example
 * ```typescript
 * logger.info('Proxy loaded', { path: '/tmp/x509up', passphrase: 'test-secret' });
 * // passphrase is written as "[REDACTED]"
 * ```
 */
export const redactSecrets = format((info) => {
  for (const key of Object.keys(info)) {
    if (CORE_FIELDS.has(key)) {
      continue;
    }
    info[key] = isSensitiveFieldName(key) ? REDACTED : redactSensitiveFields(info[key]);
  }
  return info;
});

/**
 * Timestamp plus stack extraction for Error messages.
 */
export const standardFields = format.combine(
  format.timestamp(),
  format.errors({ stack: true })
);

/**
 * Renders a message of any type as a single string.
 */
export function messageText(message: unknown): string {
  if (typeof message === 'string') {
    return message;
  }
  if (message instanceof Error) {
    return message.message;
  }
  if (message === undefined || message === null) {
    return '';
  }
  return typeof message === 'object' ? JSON.stringify(message) : String(message);
}

function metadataReplacer(_key: string, value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  return value;
}

function stringField(record: LogRecord, key: string): string | undefined {
  const value = record[key];
  return typeof value === 'string' ? value : undefined;
}

function metadataText(record: LogRecord): string {
  const extra: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(record)) {
    if (!CORE_FIELDS.has(key) && value !== undefined) {
      extra[key] = value;
    }
  }
  return Object.keys(extra).length > 0 ? ` ${JSON.stringify(extra, metadataReplacer)}` : '';
}

/**
 * Terminal layout: informational messages verbatim, other levels prefixed.
 *
 * @example
 * ```typescript
 * renderConsoleLine({ level: 'warn', message: 'Proxy expires soon' });
 * // 'WARNING: Proxy expires soon'
 * ```
 */
export function renderConsoleLine(record: LogRecord): string {
  const text = messageText(record.message);
  switch (record.level) {
    case 'info':
      return text;
    case 'warn':
      return `WARNING: ${text}`;
    default:
      return `${record.level.toUpperCase()}: ${text}`;
  }
}

/**
 * Session log layout, one record per line plus an optional stack trace.
 *
 * @example
 * ```typescript
 * // [2026-01-01T10:00:00.000Z] jobsub:INFO Task submitted {"task":"t-1"}
 * ```
 */
export function renderFileLine(record: LogRecord): string {
  const timestamp = stringField(record, 'timestamp') ?? new Date().toISOString();
  const component = stringField(record, 'component') ?? 'jobsub';
  const stack = stringField(record, 'stack');
  const base = `[${timestamp}] ${component}:${record.level.toUpperCase()} ${messageText(record.message)}${metadataText(record)}`;
  return stack ? `${base}\n${stack}` : base;
}

/**
 * Winston format applying {@link renderConsoleLine}.
 */
export const consoleLine = format.printf((info) => renderConsoleLine(info));
