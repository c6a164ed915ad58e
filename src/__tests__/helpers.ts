/**
 * Shared test fixtures: quiet logging, an in-memory record sink, and
 * emulator-backed drivers.
 */

import { initLogger, LogLevel } from '../logger';
import { ChillerDriver } from '../drivers/chiller-driver';
import { CommLock } from '../drivers/comm-lock';
import { ChillerEmulator } from '../emulators/chiller-emulator';
import { ExchangeRecorder } from '../emulators/exchange-recorder';
import { ExternalWorkerHandle, MonitorRecord, RecordSink } from '../housekeeping/types';
import { Result, Transport, TransportFactory } from '../transport/types';

initLogger({ level: 'fatal', pretty: false });

export class MemorySink implements RecordSink {
  readonly entries: Array<{ record: MonitorRecord; level: LogLevel }> = [];
  closed = false;

  emit(record: MonitorRecord, level: LogLevel): void {
    this.entries.push({ record, level });
  }

  close(): void {
    this.closed = true;
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Wraps a factory and counts how often it was called */
export function countingFactory(inner: TransportFactory): { factory: TransportFactory; opens: () => number } {
  let opens = 0;
  return {
    factory: (settings): Promise<Result<Transport>> => {
      opens++;
      return inner(settings);
    },
    opens: () => opens,
  };
}

export interface ChillerRigOptions {
  deviceId?: string;
  port?: string;
  latencyMs?: number;
  timeoutMs?: number;
  recorder?: ExchangeRecorder;
  commLock?: CommLock;
  hkWorker?: ExternalWorkerHandle;
  intervalMs?: number;
  logToFile?: boolean;
}

export interface ChillerRig {
  emulator: ChillerEmulator;
  driver: ChillerDriver;
  sink: MemorySink;
}

/** A chiller driver wired to its emulator, recording into a MemorySink */
export function chillerRig(options: ChillerRigOptions = {}): ChillerRig {
  const port = options.port ?? 'emu-chiller';
  const emulator = new ChillerEmulator(port, { latencyMs: options.latencyMs, recorder: options.recorder });
  const sink = new MemorySink();
  const driver = new ChillerDriver({
    deviceId: options.deviceId ?? 'chiller1',
    port,
    timeoutMs: options.timeoutMs,
    transportFactory: emulator.factory(),
    recordSink: sink,
    commLock: options.commLock,
    hkWorker: options.hkWorker,
    intervalMs: options.intervalMs,
    logToFile: options.logToFile,
  });
  return { emulator, driver, sink };
}
