/**
 * Maps the outcome of a command run to an exit code and the messages that
 * describe it
 */

import {
  ClientError,
  ControlledStop,
  EXIT_CODES,
  RemoteServiceError,
  TransportError,
  UserCancelledError,
  normalizeRemoteFailure,
} from '../commands/errors.js';
import { expandParameterAliases, type ParameterAliases } from './parameter-aliases.js';

export type RunOutcome = { kind: 'returned' } | { kind: 'threw'; error: unknown };

export type FailureCategory =
  | 'success'
  | 'remote-service-error'
  | 'transport-error'
  | 'client-error'
  | 'user-cancelled'
  | 'controlled-stop'
  | 'unhandled-error';

export type SummaryLevel = 'info' | 'warn' | 'error';

interface ClassificationBase<C extends FailureCategory> {
  readonly category: C;
  /** Short lines for the terminal */
  readonly summary: readonly string[];
  /** Full detail, written to the session log only */
  readonly trace: readonly string[];
  readonly level: SummaryLevel;
  readonly exitCode: number;
  /** Whether the session log should be uploaded, given a known proxy file */
  readonly uploadLog: boolean;
}

export type FailureClassification =
  | ClassificationBase<'success'>
  | (ClassificationBase<'remote-service-error'> & { readonly error: RemoteServiceError })
  | (ClassificationBase<'transport-error'> & { readonly error: TransportError })
  | (ClassificationBase<'client-error'> & { readonly error: ClientError })
  | (ClassificationBase<'user-cancelled'> & { readonly error: UserCancelledError })
  | (ClassificationBase<'controlled-stop'> & { readonly error: ControlledStop })
  | (ClassificationBase<'unhandled-error'> & { readonly error: unknown });

export interface ClassifyContext {
  parameterAliases: ParameterAliases;
  version: string;
  supportContact: string;
}

export const SERVICE_UNAVAILABLE_MARKER = 'CMSWEB Error: Service unavailable';

export const SCHEDULED_INTERVENTION_ADVISORY =
  'The server is unavailable, most likely because of a scheduled intervention. ' +
  'Check the service status announcements and try again later.';

function bodyText(body: unknown): string {
  if (body === undefined || body === null) {
    return '';
  }
  if (typeof body === 'string') {
    return body;
  }
  try {
    return JSON.stringify(body);
  } catch {
    return String(body);
  }
}

function stackLines(error: Error): string[] {
  return error.stack ? [error.stack] : [`${error.name}: ${error.message}`];
}

/**
 * Lines describing a remote error. Header lookups ignore case.
 */
export function describeRemoteError(error: RemoteServiceError, context: ClassifyContext): string[] {
  const lines = ['The server answered with an error.'];

  if (error.status === 503 && bodyText(error.result).includes(SERVICE_UNAVAILABLE_MARKER)) {
    lines.push(SCHEDULED_INTERVENTION_ADVISORY);
  }

  lines.push(`HTTP status: ${`${error.status} ${error.reason}`.trim()}`);

  const detail = error.header('X-Error-Detail');
  if (detail) {
    lines.push(`Error detail: ${detail}`);
  }
  const info = error.header('X-Error-Info');
  if (info) {
    lines.push(`Error reason: ${expandParameterAliases(info, context.parameterAliases)}`);
  }
  const id = error.header('X-Error-Id');
  if (id) {
    lines.push(`Error id: ${id}`);
  }

  return lines;
}

function describeThrown(error: unknown): { name: string; message: string; trace: string[] } {
  if (error instanceof Error) {
    return { name: error.name, message: error.message, trace: stackLines(error) };
  }
  const message = bodyText(error);
  return { name: 'Error', message, trace: [`Non-error value thrown: ${message}`] };
}

/**
 * Classifies a run outcome. Pure: nothing is logged and nothing exits.
 *
 * | Thrown                   | Category             | Exit code         |
 * |--------------------------|----------------------|-------------------|
 * | nothing                  | success              | 0                 |
 * | ControlledStop           | controlled-stop      | 0                 |
 * | UserCancelledError       | user-cancelled       | 1                 |
 * | RemoteServiceError       | remote-service-error | HTTP status       |
 * | TransportError           | transport-error      | transport code    |
 * | ClientError              | client-error         | the error's code  |
 * | anything else            | unhandled-error      | 1                 |
 *
 * Axios and Node network errors are converted to remote or transport errors
 * first.
 */
export function classify(outcome: RunOutcome, context: ClassifyContext): FailureClassification {
  if (outcome.kind === 'returned') {
    return { category: 'success', summary: [], trace: [], level: 'info', exitCode: EXIT_CODES.SUCCESS, uploadLog: false };
  }

  const error = normalizeRemoteFailure(outcome.error);

  if (error instanceof ControlledStop) {
    return {
      category: 'controlled-stop',
      error,
      summary: [],
      trace: [`Controlled stop: ${error.message}`],
      level: 'info',
      exitCode: EXIT_CODES.SUCCESS,
      uploadLog: false,
    };
  }

  if (error instanceof UserCancelledError) {
    return {
      category: 'user-cancelled',
      error,
      summary: [error.message],
      trace: [`Interrupted by ${error.signal}`],
      level: 'warn',
      exitCode: EXIT_CODES.FAILURE,
      uploadLog: false,
    };
  }

  if (error instanceof RemoteServiceError) {
    const trace = [`URL: ${error.url}`];
    if (error.reqData !== undefined) {
      trace.push(`Request data: ${bodyText(error.reqData)}`);
    }
    if (error.result !== undefined) {
      trace.push(`Result: ${bodyText(error.result)}`);
    }
    trace.push(...stackLines(error));

    return {
      category: 'remote-service-error',
      error,
      summary: describeRemoteError(error, context),
      trace,
      level: 'error',
      exitCode: error.status,
      uploadLog: true,
    };
  }

  if (error instanceof TransportError) {
    const target = error.url ? ` at ${error.url}` : '';
    return {
      category: 'transport-error',
      error,
      summary: [`Unable to reach the server${target}: ${error.message}`],
      trace: stackLines(error),
      level: 'error',
      exitCode: error.code,
      uploadLog: true,
    };
  }

  if (error instanceof ClientError) {
    const trace = stackLines(error);
    if (error.context) {
      trace.push(`Context: ${bodyText(error.context)}`);
    }
    return {
      category: 'client-error',
      error,
      summary: [error.message],
      trace,
      level: 'error',
      exitCode: error.exitCode,
      uploadLog: true,
    };
  }

  return classifyUnhandled(error, context);
}

/**
 * Classification of a failure nothing else recognises.
 */
export function classifyUnhandled(
  error: unknown,
  context: ClassifyContext
): ClassificationBase<'unhandled-error'> & { readonly error: unknown } {
  const thrown = describeThrown(error);
  return {
    category: 'unhandled-error',
    error,
    summary: [
      'ERROR: Unhandled exception.',
      `${thrown.name}: ${thrown.message}`,
      `jobsub version ${context.version}`,
      `Please report this problem to ${context.supportContact}`,
    ],
    trace: thrown.trace,
    level: 'error',
    exitCode: EXIT_CODES.FAILURE,
    uploadLog: true,
  };
}
