/**
 * Structured Logging Module
 *
 * Provides pino-based structured logging with scoped child loggers.
 * Supports JSON output for production and pretty-printing for development,
 * plus per-device housekeeping log files.
 */

import * as path from 'path';
import pino, { Logger } from 'pino';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export interface LoggerConfig {
  level?: LogLevel;
  pretty?: boolean;
}

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'];

let rootLogger: Logger | null = null;

function envLevel(): LogLevel | undefined {
  const raw = process.env.LOG_LEVEL;
  return LOG_LEVELS.find((level) => level === raw);
}

/**
 * Initialize the root logger. Call once at startup.
 */
export function initLogger(config: LoggerConfig = {}): Logger {
  const level = config.level ?? envLevel() ?? 'info';
  const pretty = config.pretty ?? (process.env.NODE_ENV !== 'production' && process.stdout.isTTY === true);

  if (pretty) {
    rootLogger = pino({
      level,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss',
          ignore: 'pid,hostname',
          messageFormat: '[{module}] {msg}',
        },
      },
    });
  } else {
    rootLogger = pino({ level });
  }
  return rootLogger;
}

/**
 * Get the root logger instance.
 * Auto-initializes if not already initialized.
 */
export function getRootLogger(): Logger {
  return rootLogger ?? initLogger();
}

/**
 * Get a scoped logger for a specific module.
 */
export function getLogger(module: string): Logger {
  return getRootLogger().child({ module });
}

/** Local timestamp as YYYYMMDD_HHMMSS */
export function fileTimestamp(date = new Date()): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

export interface HousekeepingLog {
  logger: Logger;
  filePath: string;
  close(): void;
}

/**
 * Open a housekeeping log file for one device:
 *   <dir>/<deviceId>_HK_<YYYYMMDD_HHMMSS>.log
 * Writes are synchronous so a record is on disk once emit() returns.
 */
export function createHousekeepingLog(deviceId: string, dir: string, now = new Date()): HousekeepingLog {
  const filePath = path.join(dir, `${deviceId}_HK_${fileTimestamp(now)}.log`);
  const destination = pino.destination({ dest: filePath, mkdir: true, sync: true });
  const logger = pino(
    {
      level: 'info',
      base: { deviceId },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    destination,
  );
  return {
    logger,
    filePath,
    close: () => destination.end(),
  };
}
