/**
 * @fileoverview Transports backing the session log
 * A memory buffer for records emitted before the log file is known, and an
 * append-only file transport for everything after.
 */

import { appendFileSync, mkdirSync } from 'node:fs';
import path from 'node:path';
import TransportStream from 'winston-transport';
import { renderFileLine } from './formats.js';
import type { LogRecord } from './types.js';

/**
 * Holds every record it receives, in arrival order, until drained.
 *
 * One instance is shared by the user and trace loggers so that the replay
 * into the session log keeps their interleaving.
 */
export class MemoryTransport extends TransportStream {
  private records: LogRecord[] = [];

  constructor(options: TransportStream.TransportStreamOptions = {}) {
    super({ level: 'debug', ...options });
  }

  log(info: LogRecord, next: () => void): void {
    this.records.push({ ...info });
    setImmediate(() => this.emit('logged', info));
    next();
  }

  get size(): number {
    return this.records.length;
  }

  snapshot(): readonly LogRecord[] {
    return [...this.records];
  }

  /**
   * Removes and returns everything buffered so far.
   */
  drain(): LogRecord[] {
    const drained = this.records;
    this.records = [];
    return drained;
  }
}

export interface SessionFileTransportOptions extends TransportStream.TransportStreamOptions {
  filename: string;
}

/**
 * Appends rendered records to the session log file.
 *
 * Writes are synchronous: the process may exit straight after the last
 * record of a failure report and nothing queued may be lost.
 */
export class SessionFileTransport extends TransportStream {
  readonly filename: string;

  constructor(options: SessionFileTransportOptions) {
    const { filename, ...rest } = options;
    super({ level: 'debug', ...rest });
    this.filename = path.resolve(filename);
    mkdirSync(path.dirname(this.filename), { recursive: true });
  }

  log(info: LogRecord, next: () => void): void {
    try {
      this.append(info);
    } catch (error) {
      this.emit('warn', error);
    }
    setImmediate(() => this.emit('logged', info));
    next();
  }

  append(record: LogRecord): void {
    appendFileSync(this.filename, `${renderFileLine(record)}\n`, 'utf8');
  }
}
