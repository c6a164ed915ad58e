/**
 * HousekeepingWorker: the driver-owned monitor loop (internal mode)
 *
 * Loop: sleep up to the interval, then run one cycle if still enabled.
 * The sleep can be cut short by wake() or re-armed by reschedule(); a cycle
 * that has started always runs to completion. `done` settles once the loop
 * has exited, which is what stopHousekeeping() awaits.
 */

import { Logger } from 'pino';
import { errorMessage } from '../errors';
import { OwnedWorker } from './types';

export interface WorkerHooks {
  /** Current interval; read before every sleep */
  intervalMs(): number;
  /** Enabled flag; the loop exits once this reads false */
  isEnabled(): boolean;
  /** One monitor cycle */
  runCycle(): Promise<unknown>;
}

/** A setTimeout wait that can be interrupted or re-armed */
export class InterruptibleSleep {
  private timer: ReturnType<typeof setTimeout> | null = null;
  private resolveWait: (() => void) | null = null;

  wait(ms: number): Promise<void> {
    return new Promise<void>((resolve) => {
      this.resolveWait = resolve;
      this.timer = setTimeout(() => this.finish(), ms);
    });
  }

  reschedule(ms: number): void {
    if (!this.timer) return;
    clearTimeout(this.timer);
    this.timer = setTimeout(() => this.finish(), ms);
  }

  interrupt(): void {
    this.finish();
  }

  private finish(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    const resolve = this.resolveWait;
    this.resolveWait = null;
    resolve?.();
  }
}

export class HousekeepingWorker implements OwnedWorker {
  readonly name: string;
  readonly done: Promise<void>;

  private hooks: WorkerHooks;
  private log: Logger;
  private sleep = new InterruptibleSleep();
  private _cycles = 0;
  private _failures = 0;

  constructor(name: string, hooks: WorkerHooks, log: Logger) {
    this.name = name;
    this.hooks = hooks;
    this.log = log;
    this.done = this.loop();
  }

  /** Cycles attempted so far */
  get cycles(): number {
    return this._cycles;
  }

  /** Cycles that rejected */
  get failures(): number {
    return this._failures;
  }

  reschedule(intervalMs: number): void {
    this.sleep.reschedule(intervalMs);
  }

  wake(): void {
    this.sleep.interrupt();
  }

  private async loop(): Promise<void> {
    this.log.info({ worker: this.name }, 'Housekeeping worker started');

    while (this.hooks.isEnabled()) {
      await this.sleep.wait(this.hooks.intervalMs());
      if (!this.hooks.isEnabled()) break;

      this._cycles++;
      try {
        await this.hooks.runCycle();
      } catch (err) {
        // The next scheduled cycle still runs
        this._failures++;
        this.log.error({ worker: this.name, error: errorMessage(err) }, 'Housekeeping cycle failed');
      }
    }

    this.log.info({ worker: this.name, cycles: this._cycles }, 'Housekeeping worker stopped');
  }
}
