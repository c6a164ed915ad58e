/**
 * Housekeeping Controller
 *
 * Owns the housekeeping state of one driver: enabled flag, interval,
 * file-logging switch and ownership mode. Transitions run under a
 * coordination lock of their own, separate from the communication lock,
 * so toggling monitoring never queues behind an in-flight exchange.
 *
 * Internal mode: start() spawns a HousekeepingWorker, stop() wakes it and
 * waits for it to exit. Once stop() resolves, no cycle is running and none
 * will start.
 *
 * External mode: start()/stop() only flip the flag. The caller's loop
 * polls shouldContinue() and calls the driver's cycle itself; stop() cannot
 * wait for a loop it does not own, so there is no such guarantee here.
 */

import { Logger } from 'pino';
import { CommLock } from '../drivers/comm-lock';
import { HousekeepingWorker } from './housekeeping-worker';
import {
  ExternalWorkerHandle,
  HousekeepingDefaults,
  HousekeepingMode,
  HousekeepingSnapshot,
  ModeKind,
} from './types';

export interface HousekeepingControllerOptions {
  deviceId: string;
  defaults: HousekeepingDefaults;
  /** Present ⇒ external mode */
  externalWorker?: ExternalWorkerHandle;
  /** The monitor cycle run by the owned worker */
  runCycle: () => Promise<unknown>;
  log: Logger;
}

export class HousekeepingController {
  readonly deviceId: string;

  private mode: HousekeepingMode;
  private enabled = false;
  private _intervalMs: number;
  private _logToFile: boolean;
  private coordination: CommLock;
  private runCycle: () => Promise<unknown>;
  private log: Logger;

  constructor(options: HousekeepingControllerOptions) {
    this.deviceId = options.deviceId;
    this._intervalMs = assertInterval(options.defaults.intervalMs);
    this._logToFile = options.defaults.logToFile;
    this.runCycle = options.runCycle;
    this.log = options.log;
    this.coordination = new CommLock(`hk:${options.deviceId}`);
    this.mode = options.externalWorker
      ? { kind: 'external', handle: options.externalWorker }
      : { kind: 'internal', worker: null };
  }

  get modeKind(): ModeKind {
    return this.mode.kind;
  }

  get intervalMs(): number {
    return this._intervalMs;
  }

  get logToFile(): boolean {
    return this._logToFile;
  }

  /**
   * Read of the enabled flag. A plain property read cannot observe a
   * half-finished transition on the event loop, so this stays synchronous.
   */
  shouldContinue(): boolean {
    return this.enabled;
  }

  /** Whether an owned worker is alive (always false in external mode) */
  hasWorker(): boolean {
    return this.mode.kind === 'internal' && this.mode.worker !== null;
  }

  async start(intervalMs = this._intervalMs, logToFile = this._logToFile): Promise<void> {
    assertInterval(intervalMs);

    await this.coordination.runExclusive(async () => {
      const wasEnabled = this.enabled;
      this.enabled = true;
      this._intervalMs = intervalMs;
      this._logToFile = logToFile;

      if (this.mode.kind === 'external') {
        this.log.info(
          { intervalMs, worker: this.mode.handle.name },
          wasEnabled ? 'Housekeeping interval updated (external mode)' : 'Housekeeping enabled (external mode)',
        );
        return;
      }

      if (this.mode.worker) {
        this.mode.worker.reschedule(intervalMs);
        this.log.info({ intervalMs }, 'Housekeeping interval updated (internal mode)');
        return;
      }

      const worker = new HousekeepingWorker(
        `HK_${this.deviceId}`,
        {
          intervalMs: () => this._intervalMs,
          isEnabled: () => this.enabled,
          runCycle: this.runCycle,
        },
        this.log,
      );
      this.mode = { kind: 'internal', worker };
      this.log.info({ intervalMs, worker: worker.name }, 'Housekeeping started (internal mode)');
    });
  }

  async stop(): Promise<void> {
    await this.coordination.runExclusive(async () => {
      const wasEnabled = this.enabled;
      this.enabled = false;

      if (this.mode.kind === 'external') {
        if (wasEnabled) this.log.info('Housekeeping stopped (external mode)');
        return;
      }

      const worker = this.mode.worker;
      if (!worker) return;
      worker.wake();
      await worker.done;
      this.mode = { kind: 'internal', worker: null };
      this.log.info('Housekeeping stopped (internal mode)');
    });
  }

  snapshot(): HousekeepingSnapshot {
    return {
      enabled: this.enabled,
      intervalMs: this._intervalMs,
      logToFile: this._logToFile,
      mode: this.mode.kind,
      worker: this.mode.kind === 'external' ? this.mode.handle.name : this.mode.worker?.name ?? null,
    };
  }
}

function assertInterval(intervalMs: number): number {
  if (!Number.isFinite(intervalMs) || intervalMs <= 0) {
    throw new RangeError(`Housekeeping interval must be > 0 ms (got ${intervalMs})`);
  }
  return intervalMs;
}
