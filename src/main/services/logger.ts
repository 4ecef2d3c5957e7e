/**
 * Tagged logger with a per-service prefix.
 * Replaces direct console.log/warn/error use across the pipeline.
 *
 * Usage:
 *   const log = createLogger('HistoryStore');
 *   log.info('Opened history');
 *   log.warn('Artifact missing', { id: 3 });
 *   log.error('Upsert failed', err);
 *
 * Every line that passes the level filter is also handed to the registered
 * sinks, which is how the diagnostics log file gets written.
 */

import * as fs from 'fs';
import * as path from 'path';
import { format } from 'util';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export interface LogRecord {
  level: LogLevel;
  tag: string;
  message: string;
  args: unknown[];
  timestamp: Date;
}

export type LogSink = (record: LogRecord) => void;

/** Global log level, adjustable at runtime */
let globalLogLevel: LogLevel = 'info';

const sinks = new Set<LogSink>();

const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function setLogLevel(level: LogLevel): void {
  globalLogLevel = level;
}

export function getLogLevel(): LogLevel {
  return globalLogLevel;
}

/**
 * Register a sink receiving every emitted record. Returns a remover.
 */
export function addLogSink(sink: LogSink): () => void {
  sinks.add(sink);
  return () => {
    sinks.delete(sink);
  };
}

/** One line per record: `2026-01-02T03:04:05.000Z [WARN] [Monitor] message args` */
export function formatLogRecord(record: LogRecord): string {
  const text = format(record.message, ...record.args);
  return `${record.timestamp.toISOString()} [${record.level.toUpperCase()}] [${record.tag}] ${text}`;
}

/**
 * Sink appending formatted lines to a file (the diagnostics log).
 * Write failures are reported on stderr and never thrown.
 */
export function createFileSink(filePath: string): LogSink {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  return (record) => {
    try {
      fs.appendFileSync(filePath, formatLogRecord(record) + '\n', 'utf8');
    } catch (err) {
      console.error('[Logger]', `Failed to write ${filePath}:`, err);
    }
  };
}

/**
 * Create a tagged logger for a specific service/module.
 *
 * @param tag - Service/module name (e.g. 'Monitor', 'HistoryStore')
 */
export function createLogger(tag: string): Logger {
  const prefix = `[${tag}]`;

  const shouldLog = (level: LogLevel): boolean => {
    return LOG_LEVEL_ORDER[level] >= LOG_LEVEL_ORDER[globalLogLevel];
  };

  const dispatch = (level: LogLevel, message: string, args: unknown[]): void => {
    if (sinks.size === 0) return;
    const record: LogRecord = { level, tag, message, args, timestamp: new Date() };
    for (const sink of sinks) {
      sink(record);
    }
  };

  return {
    debug(message: string, ...args: unknown[]) {
      if (shouldLog('debug')) {
        console.debug(prefix, message, ...args);
        dispatch('debug', message, args);
      }
    },
    info(message: string, ...args: unknown[]) {
      if (shouldLog('info')) {
        console.log(prefix, message, ...args);
        dispatch('info', message, args);
      }
    },
    warn(message: string, ...args: unknown[]) {
      if (shouldLog('warn')) {
        console.warn(prefix, message, ...args);
        dispatch('warn', message, args);
      }
    },
    error(message: string, ...args: unknown[]) {
      if (shouldLog('error')) {
        console.error(prefix, message, ...args);
        dispatch('error', message, args);
      }
    },
  };
}
