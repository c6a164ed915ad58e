import { describe, it } from 'node:test';
import * as assert from 'node:assert/strict';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import pino from 'pino';
import { formatReading, LoggerRecordSink, recordLevel } from '../housekeeping/record-sink';
import { createMonitorRecord } from '../housekeeping/types';
import { createHousekeepingLog, fileTimestamp } from '../logger';
import './helpers';

function captureLogger() {
  const lines: Array<Record<string, unknown>> = [];
  const logger = pino(
    { level: 'info', base: undefined, timestamp: false },
    {
      write(msg: string) {
        lines.push(JSON.parse(msg));
      },
    },
  );
  return { logger, lines };
}

describe('formatReading', () => {
  it('lays out device, port, measure and value//unit', () => {
    assert.equal(
      formatReading('gauge1', '/dev/ttyUSB2', { measure: 'Pressure_1', value: 0.001, unit: 'hPa' }),
      'gauge1   /dev/ttyUSB2   Pressure_1   0.001//hPa',
    );
  });

  it('keeps the separator for unitless readings', () => {
    assert.equal(
      formatReading('hv1', 'COM5', { measure: 'Main_State', value: 'STATE_ON', unit: '' }),
      'hv1   COM5   Main_State   STATE_ON//',
    );
  });
});

describe('recordLevel', () => {
  it('is info without alarms and warn with one', () => {
    const clean = createMonitorRecord('d', 'p', [
      { measure: 'A', value: 1, unit: '' },
      { measure: 'B', value: 'OK', unit: '', alarm: false },
    ]);
    const alarmed = createMonitorRecord('d', 'p', [
      { measure: 'A', value: 1, unit: '' },
      { measure: 'B', value: 'ERROR', unit: '', alarm: true },
    ]);
    assert.equal(recordLevel(clean), 'info');
    assert.equal(recordLevel(alarmed), 'warn');
  });
});

describe('LoggerRecordSink', () => {
  it('writes one line per reading at the given level', () => {
    const { logger, lines } = captureLogger();
    const sink = new LoggerRecordSink(logger);
    const record = createMonitorRecord('chiller1', 'COM3', [
      { measure: 'Cur_Temp', value: 21.5, unit: 'degC' },
      { measure: 'Dev_Stat', value: 'ERROR', unit: '', alarm: true },
    ]);

    sink.emit(record, 'warn');

    assert.deepEqual(lines, [
      { level: 40, measure: 'Cur_Temp', value: 21.5, unit: 'degC', msg: 'chiller1   COM3   Cur_Temp   21.5//degC' },
      { level: 40, measure: 'Dev_Stat', value: 'ERROR', unit: '', msg: 'chiller1   COM3   Dev_Stat   ERROR//' },
    ]);
  });

  it('runs its close hook once', () => {
    const { logger } = captureLogger();
    let closes = 0;
    const sink = new LoggerRecordSink(logger, () => closes++);

    sink.close();
    sink.close();

    assert.equal(closes, 1);
  });
});

describe('housekeeping log files', () => {
  it('fileTimestamp formats local time as YYYYMMDD_HHMMSS', () => {
    assert.equal(fileTimestamp(new Date(2026, 0, 2, 3, 4, 5)), '20260102_030405');
    assert.equal(fileTimestamp(new Date(2025, 11, 31, 23, 59, 58)), '20251231_235958');
  });

  it('createHousekeepingLog names the file after device and start time', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'hklog-'));
    const hkLog = createHousekeepingLog('pump1', path.join(dir, 'nested'), new Date(2026, 4, 6, 7, 8, 9));

    hkLog.logger.info('first');
    hkLog.close();

    assert.equal(hkLog.filePath, path.join(dir, 'nested', 'pump1_HK_20260506_070809.log'));
    const line = JSON.parse(fs.readFileSync(hkLog.filePath, 'utf-8').trim());
    assert.equal(line.deviceId, 'pump1');
    assert.equal(line.msg, 'first');
    assert.equal(typeof line.time, 'string');

    fs.rmSync(dir, { recursive: true, force: true });
  });
});
