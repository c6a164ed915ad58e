/**
 * Housekeeping Types
 *
 * Ownership modes, monitor records and the logging collaborator contract.
 */

import type { LogLevel } from '../logger';

/**
 * Caller-owned worker identity. Passing one to a driver selects external
 * mode; the driver only records its name for diagnostics.
 */
export interface ExternalWorkerHandle {
  readonly name: string;
}

/** Minimal view of a driver-owned worker, as seen by the mode variant */
export interface OwnedWorker {
  readonly name: string;
  /** Re-arm the pending sleep with a new interval */
  reschedule(intervalMs: number): void;
  /** Cut the pending sleep short */
  wake(): void;
  /** Settles once the loop has exited */
  readonly done: Promise<void>;
}

/**
 * Who drives the monitor loop. Fixed at construction; only the internal
 * variant can ever hold a worker.
 */
export type HousekeepingMode =
  | { kind: 'internal'; worker: OwnedWorker | null }
  | { kind: 'external'; handle: ExternalWorkerHandle };

export type ModeKind = HousekeepingMode['kind'];

/** One decoded status field */
export interface Reading {
  measure: string;
  value: number | string | boolean;
  unit: string;
  /** Set when the value indicates a device fault */
  alarm?: boolean;
}

/** Snapshot produced by one monitor cycle */
export interface MonitorRecord {
  readonly deviceId: string;
  readonly port: string;
  readonly timestamp: Date;
  readonly readings: readonly Readonly<Reading>[];
}

/** Logging collaborator. A throwing sink never fails the cycle. */
export interface RecordSink {
  emit(record: MonitorRecord, level: LogLevel): void;
  close?(): void;
}

export interface HousekeepingSnapshot {
  enabled: boolean;
  intervalMs: number;
  logToFile: boolean;
  mode: ModeKind;
  /** Owned worker name (internal) or caller's handle name (external) */
  worker: string | null;
}

export interface HousekeepingDefaults {
  intervalMs: number;
  logToFile: boolean;
}

export const DEFAULT_HOUSEKEEPING: HousekeepingDefaults = {
  intervalMs: 30000,
  logToFile: true,
};

export function createMonitorRecord(
  deviceId: string,
  port: string,
  readings: Reading[],
  timestamp = new Date(),
): MonitorRecord {
  return Object.freeze({
    deviceId,
    port,
    timestamp,
    readings: Object.freeze(readings.map((r) => Object.freeze({ ...r }))),
  });
}
