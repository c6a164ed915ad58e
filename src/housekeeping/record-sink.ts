/**
 * Record sinks: where monitor records end up.
 *
 * One log line per reading, in the fixed measurement layout
 *   "<deviceId>   <port>   <measure>   <value>//<unit>"
 * with the structured fields alongside for JSON consumers.
 */

import { Logger } from 'pino';
import { createHousekeepingLog, LogLevel } from '../logger';
import { MonitorRecord, Reading, RecordSink } from './types';

export function formatReading(deviceId: string, port: string, reading: Reading): string {
  return `${deviceId}   ${port}   ${reading.measure}   ${reading.value}//${reading.unit}`;
}

/** Warn-level when any reading carries an alarm */
export function recordLevel(record: MonitorRecord): LogLevel {
  return record.readings.some((r) => r.alarm) ? 'warn' : 'info';
}

export class LoggerRecordSink implements RecordSink {
  private logger: Logger;
  private onClose?: () => void;

  constructor(logger: Logger, onClose?: () => void) {
    this.logger = logger;
    this.onClose = onClose;
  }

  emit(record: MonitorRecord, level: LogLevel): void {
    for (const reading of record.readings) {
      this.logger[level](
        { measure: reading.measure, value: reading.value, unit: reading.unit },
        formatReading(record.deviceId, record.port, reading),
      );
    }
  }

  close(): void {
    this.onClose?.();
    this.onClose = undefined;
  }
}

/** Sink backed by a fresh <deviceId>_HK_<timestamp>.log under dir */
export function openFileRecordSink(deviceId: string, dir: string): { sink: LoggerRecordSink; filePath: string } {
  const hkLog = createHousekeepingLog(deviceId, dir);
  return {
    sink: new LoggerRecordSink(hkLog.logger, hkLog.close),
    filePath: hkLog.filePath,
  };
}
