/**
 * Tests for outcome classification
 */

import { describe, it, expect } from 'vitest';
import { AxiosError, AxiosHeaders, type InternalAxiosRequestConfig } from 'axios';
import {
  classify,
  SCHEDULED_INTERVENTION_ADVISORY,
  type ClassifyContext,
} from '../src/failure/classify.js';
import {
  ClientError,
  ControlledStop,
  RemoteServiceError,
  TransportError,
  UnknownCommandError,
  UserCancelledError,
} from '../src/commands/errors.js';

const context: ClassifyContext = {
  parameterAliases: {
    jobtype: ['JobType.pluginName'],
    events: ['Data.totalUnits', 'JobType.eventsPerLumi'],
  },
  version: '1.2.3',
  supportContact: 'support@example.org',
};

const TASK_URL = 'https://jobs.example.org/jobsub/task';

function threw(error: unknown) {
  return classify({ kind: 'threw', error }, context);
}

describe('classify', () => {
  it('should report success for a normal return', () => {
    expect(classify({ kind: 'returned' }, context)).toEqual({
      category: 'success',
      summary: [],
      trace: [],
      level: 'info',
      exitCode: 0,
      uploadLog: false,
    });
  });

  describe('remote service errors', () => {
    it('should add the scheduled intervention advisory on 503', () => {
      const result = threw(
        new RemoteServiceError({
          status: 503,
          reason: 'Service Unavailable',
          headers: {},
          url: TASK_URL,
          result: '<html><body>CMSWEB Error: Service unavailable</body></html>',
        })
      );

      expect(result.category).toBe('remote-service-error');
      expect(result.exitCode).toBe(503);
      expect(result.uploadLog).toBe(true);
      expect(result.summary).toEqual([
        'The server answered with an error.',
        SCHEDULED_INTERVENTION_ADVISORY,
        'HTTP status: 503 Service Unavailable',
      ]);
    });

    it('should not add the advisory to other 503 answers', () => {
      const result = threw(
        new RemoteServiceError({ status: 503, reason: 'Service Unavailable', headers: {}, url: TASK_URL, result: 'busy' })
      );

      expect(result.summary).not.toContain(SCHEDULED_INTERVENTION_ADVISORY);
    });

    it('should report the error headers with parameter aliases expanded', () => {
      const result = threw(
        new RemoteServiceError({
          status: 400,
          reason: 'Bad Request',
          headers: {
            'x-error-info': "Invalid value for parameter 'jobtype'",
            'X-Error-Detail': 'Submission refused',
            'x-error-id': 'e-17',
          },
          url: TASK_URL,
        })
      );

      expect(result.exitCode).toBe(400);
      expect(result.summary).toEqual([
        'The server answered with an error.',
        'HTTP status: 400 Bad Request',
        'Error detail: Submission refused',
        "Error reason: Invalid value for parameter 'JobType.pluginName'",
        'Error id: e-17',
      ]);
    });

    it('should keep request and result in the trace', () => {
      const result = threw(
        new RemoteServiceError({
          status: 500,
          reason: 'Internal Server Error',
          headers: {},
          url: TASK_URL,
          reqData: 'workflow=w1',
          result: { error: 'database down' },
        })
      );

      expect(result.trace.slice(0, 3)).toEqual([
        `URL: ${TASK_URL}`,
        'Request data: workflow=w1',
        'Result: {"error":"database down"}',
      ]);
      expect(result.trace[3]).toContain(`HTTP 500 Internal Server Error from ${TASK_URL}`);
    });

    it('should classify axios errors carrying a response', () => {
      const config: InternalAxiosRequestConfig = { url: TASK_URL, headers: new AxiosHeaders() };
      const error = new AxiosError('Request failed with status code 403', 'ERR_BAD_REQUEST', config, undefined, {
        status: 403,
        statusText: 'Forbidden',
        headers: {},
        data: '',
        config,
      });

      const result = threw(error);

      expect(result.category).toBe('remote-service-error');
      expect(result.exitCode).toBe(403);
    });
  });

  describe('transport errors', () => {
    it('should exit with the transport code', () => {
      const result = threw(new TransportError(7, 'connect ECONNREFUSED', TASK_URL));

      expect(result.category).toBe('transport-error');
      expect(result.exitCode).toBe(7);
      expect(result.summary).toEqual([`Unable to reach the server at ${TASK_URL}: connect ECONNREFUSED`]);
      expect(result.uploadLog).toBe(true);
    });

    it('should map Node network errors', () => {
      const result = threw(Object.assign(new Error('getaddrinfo ENOTFOUND jobs.example.org'), { code: 'ENOTFOUND' }));

      expect(result.category).toBe('transport-error');
      expect(result.exitCode).toBe(6);
      expect(result.summary).toEqual(['Unable to reach the server: getaddrinfo ENOTFOUND jobs.example.org']);
    });
  });

  describe('client errors', () => {
    it('should exit with the code the command chose', () => {
      const result = threw(new ClientError('Task t-1 does not exist', { exitCode: 42 }));

      expect(result.category).toBe('client-error');
      expect(result.exitCode).toBe(42);
      expect(result.summary).toEqual(['Task t-1 does not exist']);
      expect(result.level).toBe('error');
    });

    it('should exit with -1 on usage errors', () => {
      expect(threw(new UnknownCommandError('frobnicate')).exitCode).toBe(-1);
    });

    it('should append the context to the trace', () => {
      const result = threw(new ClientError('Task t-1 does not exist', { context: { task: 't-1' } }));

      expect(result.trace.at(-1)).toBe('Context: {"task":"t-1"}');
    });
  });

  it('should always exit with 0 on a controlled stop', () => {
    const result = threw(new ControlledStop('Nothing left to resubmit'));

    expect(result.category).toBe('controlled-stop');
    expect(result.exitCode).toBe(0);
    expect(result.summary).toEqual([]);
    expect(result.trace).toEqual(['Controlled stop: Nothing left to resubmit']);
    expect(result.uploadLog).toBe(false);
  });

  it('should exit with 1 when the user cancels', () => {
    const result = threw(new UserCancelledError('SIGTERM'));

    expect(result.category).toBe('user-cancelled');
    expect(result.exitCode).toBe(1);
    expect(result.level).toBe('warn');
    expect(result.summary).toEqual(['Command cancelled by SIGTERM']);
    expect(result.uploadLog).toBe(false);
  });

  describe('unhandled errors', () => {
    it('should summarise with version and support contact', () => {
      const error = new TypeError('boom');
      const result = threw(error);

      expect(result.category).toBe('unhandled-error');
      expect(result.exitCode).toBe(1);
      expect(result.uploadLog).toBe(true);
      expect(result.summary).toEqual([
        'ERROR: Unhandled exception.',
        'TypeError: boom',
        'jobsub version 1.2.3',
        'Please report this problem to support@example.org',
      ]);
      expect(result.trace).toEqual([error.stack]);
    });

    it('should describe thrown values that are not errors', () => {
      const result = threw('oops');

      expect(result.summary[1]).toBe('Error: oops');
      expect(result.trace).toEqual(['Non-error value thrown: oops']);
    });
  });
});
