import { createLineLogger, type EventClientLogger, type LogLevel } from '@ttp-events/client';
import { reportFault } from './fault-reporter';

export type { LogLevel };

/** Receives one formatted line per log record. */
export type HostLogSink = (line: string) => void;

export interface HostLoggerOptions {
  prefix?: string;
  /** Records below this level are dropped. Default: info. */
  level?: LogLevel;
}

/**
 * Adapt a host line sink into a client logger, formatting records as
 * `[prefix] LEVEL message key=value`. A throwing sink is reported as a fault.
 */
export function createHostLogger(sink: HostLogSink, options: HostLoggerOptions = {}): EventClientLogger {
  return createLineLogger((_level, line) => {
    try {
      sink(line);
    } catch (error) {
      reportFault(error, 'log sink failed');
    }
  }, options);
}
