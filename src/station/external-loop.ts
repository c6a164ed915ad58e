/**
 * ExternalHousekeepingLoop: a caller-owned monitor loop for one bus
 *
 * Drivers built with this loop as their hkWorker run in external mode: their
 * start/stopHousekeeping only flip the enabled flag, and this loop decides
 * when cycles run. Each pass visits every attached driver whose flag is set,
 * runs one cycle, then sleeps for the bus interval.
 */

import { Logger } from 'pino';
import { errorMessage } from '../errors';
import { getLogger } from '../logger';
import { InterruptibleSleep } from '../housekeeping/housekeeping-worker';
import { ExternalWorkerHandle, MonitorRecord } from '../housekeeping/types';

/** The slice of a driver the loop needs */
export interface HousekeepingTarget {
  readonly deviceId: string;
  shouldContinueHousekeeping(): boolean;
  doHousekeepingCycle(): Promise<MonitorRecord>;
}

export interface ExternalLoopStatus {
  name: string;
  running: boolean;
  intervalMs: number;
  passes: number;
  failures: number;
  devices: string[];
}

export class ExternalHousekeepingLoop implements ExternalWorkerHandle {
  readonly name: string;
  readonly intervalMs: number;

  private targets: HousekeepingTarget[] = [];
  private running = false;
  private done: Promise<void> | null = null;
  private sleep = new InterruptibleSleep();
  private passes = 0;
  private failures = 0;
  private log: Logger;

  constructor(name: string, intervalMs: number, log: Logger = getLogger('Station')) {
    if (!Number.isFinite(intervalMs) || intervalMs <= 0) {
      throw new RangeError(`Loop interval must be > 0 ms (got ${intervalMs})`);
    }
    this.name = name;
    this.intervalMs = intervalMs;
    this.log = log.child({ loop: name });
  }

  attach(target: HousekeepingTarget): void {
    this.targets.push(target);
  }

  get isRunning(): boolean {
    return this.running;
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    this.done = this.loop();
  }

  /** Stop the loop and wait for the pass in progress to finish */
  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;
    this.sleep.interrupt();
    await this.done;
    this.done = null;
  }

  /** One pass over the attached drivers, skipping those not enabled */
  async runPass(): Promise<void> {
    this.passes++;
    for (const target of this.targets) {
      if (!target.shouldContinueHousekeeping()) continue;
      try {
        await target.doHousekeepingCycle();
      } catch (err) {
        this.failures++;
        this.log.error({ deviceId: target.deviceId, error: errorMessage(err) }, 'Housekeeping cycle failed');
      }
    }
  }

  getStatus(): ExternalLoopStatus {
    return {
      name: this.name,
      running: this.running,
      intervalMs: this.intervalMs,
      passes: this.passes,
      failures: this.failures,
      devices: this.targets.map((t) => t.deviceId),
    };
  }

  private async loop(): Promise<void> {
    this.log.info({ intervalMs: this.intervalMs, devices: this.targets.length }, 'Bus loop started');
    while (this.running) {
      await this.runPass();
      if (!this.running) break;
      await this.sleep.wait(this.intervalMs);
    }
    this.log.info({ passes: this.passes }, 'Bus loop stopped');
  }
}
