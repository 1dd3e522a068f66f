/**
 * Error taxonomy for jobsub commands
 *
 * Commands signal every outcome other than a normal return by throwing one
 * of these classes. The failure translator maps each of them to an exit code.
 */

import { isAxiosError, type AxiosError } from 'axios';

/**
 * Fixed exit codes. Remote, transport and client errors carry their own.
 */
export const EXIT_CODES = {
  SUCCESS: 0,
  USAGE: -1,
  FAILURE: 1,
  CONFIG: 2,
} as const;

export interface ClientErrorOptions {
  exitCode?: number;
  context?: Record<string, unknown>;
  cause?: unknown;
}

/**
 * A locally detected, expected failure: bad input or a local precondition
 * that does not hold. The exit code is part of the command's contract.
 */
export class ClientError extends Error {
  readonly exitCode: number;
  readonly context?: Record<string, unknown>;

  constructor(message: string, options: ClientErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'ClientError';
    this.exitCode = options.exitCode ?? EXIT_CODES.FAILURE;
    this.context = options.context;

    // Maintains proper stack trace for where our error was thrown
    Error.captureStackTrace(this, new.target);
  }

  /**
   * Format error for display
   */
  format(verbose = false): string {
    const lines: string[] = [`Error: ${this.message}`, `Exit code: ${this.exitCode}`];

    if (this.context && Object.keys(this.context).length > 0) {
      lines.push('Context:');
      for (const [key, value] of Object.entries(this.context)) {
        lines.push(`  ${key}: ${JSON.stringify(value)}`);
      }
    }

    if (verbose && this.cause instanceof Error) {
      lines.push('Caused by:');
      lines.push(`  ${this.cause.message}`);
    }

    if (verbose && this.stack) {
      lines.push('Stack trace:');
      lines.push(this.stack);
    }

    return lines.join('\n');
  }

  /**
   * Convert error to JSON for structured logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      exitCode: this.exitCode,
      context: this.context,
      cause:
        this.cause instanceof Error ? { name: this.cause.name, message: this.cause.message } : undefined,
    };
  }
}

/**
 * Bad command line: missing or unknown command, conflicting global flags.
 */
export class UsageError extends ClientError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, { exitCode: EXIT_CODES.USAGE, context });
    this.name = 'UsageError';
  }
}

export class UnknownCommandError extends UsageError {
  readonly token: string;

  constructor(token: string) {
    super(`"${token}" is not a valid command`, { token });
    this.name = 'UnknownCommandError';
    this.token = token;
  }
}

/**
 * Two installed commands claim the same name or alias.
 */
export class RegistryConfigError extends ClientError {
  readonly conflicts: readonly string[];

  constructor(conflicts: readonly string[]) {
    super(`Conflicting command registrations: ${conflicts.join('; ')}`, {
      exitCode: EXIT_CODES.CONFIG,
      context: { conflicts },
    });
    this.name = 'RegistryConfigError';
    this.conflicts = conflicts;
  }
}

export class PluginLoadError extends ClientError {
  readonly specifier: string;

  constructor(specifier: string, reason: string, cause?: unknown) {
    super(`Unable to load command plug-in "${specifier}": ${reason}`, {
      exitCode: EXIT_CODES.CONFIG,
      context: { specifier },
      cause,
    });
    this.name = 'PluginLoadError';
    this.specifier = specifier;
  }
}

/**
 * Thrown by a command that finished its work early on purpose.
 * Always maps to exit code 0.
 */
export class ControlledStop extends Error {
  constructor(message = 'Command stopped early') {
    super(message);
    this.name = 'ControlledStop';
  }
}

/**
 * The user interrupted the run (SIGINT / SIGTERM).
 */
export class UserCancelledError extends Error {
  readonly signal: string;

  constructor(signal = 'SIGINT') {
    super(`Command cancelled by ${signal}`);
    this.name = 'UserCancelledError';
    this.signal = signal;
  }
}

/**
 * Response headers as reported by the remote service.
 */
export type RemoteHeaders = Readonly<Record<string, string>>;

export interface RemoteServiceErrorDetails {
  status: number;
  reason: string;
  headers: RemoteHeaders;
  url: string;
  reqData?: unknown;
  result?: unknown;
}

/**
 * The remote service answered with a structured error.
 */
export class RemoteServiceError extends Error {
  readonly status: number;
  readonly reason: string;
  readonly headers: RemoteHeaders;
  readonly url: string;
  readonly reqData?: unknown;
  readonly result?: unknown;

  constructor(details: RemoteServiceErrorDetails) {
    super(`HTTP ${details.status} ${details.reason} from ${details.url}`);
    this.name = 'RemoteServiceError';
    this.status = details.status;
    this.reason = details.reason;
    this.headers = details.headers;
    this.url = details.url;
    this.reqData = details.reqData;
    this.result = details.result;
  }

  /**
   * Case-insensitive header lookup.
   */
  header(name: string): string | undefined {
    const wanted = name.toLowerCase();
    for (const [key, value] of Object.entries(this.headers)) {
      if (key.toLowerCase() === wanted) {
        return value;
      }
    }
    return undefined;
  }
}

/**
 * Low-level network failure: no answer from the remote service at all.
 */
export class TransportError extends Error {
  readonly code: number;
  readonly url?: string;

  constructor(code: number, message: string, url?: string) {
    super(message);
    this.name = 'TransportError';
    this.code = code;
    this.url = url;
  }
}

/**
 * Curl-compatible exit codes for system-level network errors, so that
 * wrappers see the same codes whatever the transport library.
 */
const TRANSPORT_EXIT_CODES: Record<string, number> = {
  ENOTFOUND: 6,
  EAI_AGAIN: 6,
  ECONNREFUSED: 7,
  EHOSTUNREACH: 7,
  ENETUNREACH: 7,
  ETIMEDOUT: 28,
  ECONNABORTED: 28,
  EPIPE: 55,
  ECONNRESET: 56,
  CERT_HAS_EXPIRED: 60,
  DEPTH_ZERO_SELF_SIGNED_CERT: 60,
  SELF_SIGNED_CERT_IN_CHAIN: 60,
  UNABLE_TO_VERIFY_LEAF_SIGNATURE: 60,
};

export function isNetworkErrorCode(code: string | undefined): boolean {
  return code !== undefined && Object.hasOwn(TRANSPORT_EXIT_CODES, code);
}

/**
 * Numeric transport code for a system error code, falling back to the
 * absolute errno and then to 1.
 */
export function transportExitCode(code: string | undefined, errno?: number): number {
  if (code !== undefined && Object.hasOwn(TRANSPORT_EXIT_CODES, code)) {
    const mapped = TRANSPORT_EXIT_CODES[code];
    if (mapped !== undefined) {
      return mapped;
    }
  }
  if (errno !== undefined && Number.isInteger(errno) && errno !== 0) {
    return Math.abs(errno);
  }
  return EXIT_CODES.FAILURE;
}

function normalizeHeaders(headers: Record<string, unknown> | undefined): Record<string, string> {
  const normalized: Record<string, string> = {};
  if (!headers) {
    return normalized;
  }
  for (const [key, value] of Object.entries(headers)) {
    if (typeof value === 'string') {
      normalized[key] = value;
    } else if (typeof value === 'number' || typeof value === 'boolean') {
      normalized[key] = String(value);
    } else if (Array.isArray(value)) {
      normalized[key] = value.map(String).join(', ');
    }
  }
  return normalized;
}

function errnoOf(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'errno' in error && typeof error.errno === 'number') {
    return error.errno;
  }
  return undefined;
}

/**
 * Converts an axios failure into the remote-error contract: a response
 * means the service answered, no response means the transport failed.
 */
export function fromAxiosError(error: AxiosError): RemoteServiceError | TransportError {
  const url = error.config?.url ?? '';

  if (error.response) {
    return new RemoteServiceError({
      status: error.response.status,
      reason: error.response.statusText,
      headers: normalizeHeaders({ ...error.response.headers }),
      url,
      reqData: error.config?.data,
      result: error.response.data,
    });
  }

  const errno = errnoOf(error.cause) ?? errnoOf(error);
  return new TransportError(transportExitCode(error.code, errno), error.message, url);
}

/**
 * Converts transport-library failures into the remote-error contract and
 * returns anything else unchanged.
 */
export function normalizeRemoteFailure(error: unknown): unknown {
  if (isAxiosError(error)) {
    return fromAxiosError(error);
  }
  if (error instanceof Error && 'code' in error && typeof error.code === 'string' && isNetworkErrorCode(error.code)) {
    return new TransportError(transportExitCode(error.code, errnoOf(error)), error.message);
  }
  return error;
}
