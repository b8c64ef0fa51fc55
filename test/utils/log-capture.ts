/**
 * Log Capture
 *
 * Builds a winston logger that records every entry in memory.
 * Formats run synchronously inside logger.log(), so entries are
 * available as soon as the logging call returns.
 */

import { Writable } from 'stream';
import * as winston from 'winston';
import { LoggerService } from '../../src/core/logger/logger.service';
import { LogChannel } from '../../src/core/logger/logger.constants';

export type CapturedLog = Record<string, unknown> & {
  level: string;
  message: string;
};

export interface LogCapture {
  winston: winston.Logger;
  entries: CapturedLog[];
  /** Creates a LoggerService writing into this capture */
  createLogger(context?: string): LoggerService;
  /** Entries written to the given channel */
  channel(name: LogChannel): CapturedLog[];
  clear(): void;
}

export function createLogCapture(): LogCapture {
  const entries: CapturedLog[] = [];

  const record = winston.format((info) => {
    entries.push({ ...info, level: info.level, message: String(info.message) });
    return info;
  });

  const sink = new Writable({
    write(_chunk, _encoding, callback) {
      callback();
    },
  });

  const logger = winston.createLogger({
    level: 'debug',
    format: record(),
    transports: [new winston.transports.Stream({ stream: sink })],
  });

  return {
    winston: logger,
    entries,
    createLogger(context?: string): LoggerService {
      const service = new LoggerService(logger);
      if (context) {
        service.setContext(context);
      }
      return service;
    },
    channel(name: LogChannel): CapturedLog[] {
      return entries.filter((entry) => entry.channel === name);
    },
    clear(): void {
      entries.length = 0;
    },
  };
}
