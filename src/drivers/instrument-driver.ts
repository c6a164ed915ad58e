/**
 * InstrumentDriver: base class for every instrument driver
 *
 * Owns the lifecycle of one device handle:
 *   construct (mode fixed) → connect() → startHousekeeping()
 *     → facade calls and monitor cycles interleave through the CommLock
 *   → stopHousekeeping() → disconnect()
 *
 * Subclasses supply two things: how to open their channel, and the fixed
 * status query sequence for one monitor cycle. Facade methods wrap each
 * exchange in withChannel(), which is the only route to the channel.
 *
 * Ownership modes:
 *   - no hkWorker, no commLock   internal worker, private lock
 *   - hkWorker given             external mode (caller runs the loop)
 *   - commLock given             that lock is the communication lock,
 *                                whatever the worker mode
 *
 * Events:
 *   'connected'     channel attached
 *   'disconnected'  channel detached
 *   'housekeeping'  (record: MonitorRecord) after every successful cycle
 */

import { EventEmitter } from 'events';
import * as path from 'path';
import { Logger } from 'pino';
import { CommLock } from './comm-lock';
import { CommunicationError, ConnectionError, StateError, errorMessage } from '../errors';
import { getLogger } from '../logger';
import { HousekeepingController } from '../housekeeping/housekeeping-controller';
import { openFileRecordSink, recordLevel } from '../housekeeping/record-sink';
import {
  DEFAULT_HOUSEKEEPING,
  ExternalWorkerHandle,
  HousekeepingSnapshot,
  MonitorRecord,
  Reading,
  RecordSink,
  createMonitorRecord,
} from '../housekeeping/types';
import { Result } from '../transport/types';

/** Anything a driver can hold open to talk to its instrument */
export interface DriverChannel {
  readonly address: string;
  close(): Promise<Result<void>>;
}

/** Options common to every driver */
export interface InstrumentDriverOptions {
  /** Identity label used in logs and records */
  deviceId: string;
  /** Transport target (serial path, COM name, library port label) */
  port: string;
  /** Caller-owned worker; presence selects external mode */
  hkWorker?: ExternalWorkerHandle;
  /** Caller-owned lock; presence replaces the private communication lock */
  commLock?: CommLock;
  /** Default housekeeping interval */
  intervalMs?: number;
  /** Default for handing records to the record sink */
  logToFile?: boolean;
  /** Logging collaborator; defaults to a per-device file under logDir */
  recordSink?: RecordSink;
  /** Directory for housekeeping log files */
  logDir?: string;
  logger?: Logger;
}

export interface DriverStatus {
  deviceId: string;
  type: string;
  port: string;
  connected: boolean;
  externalLock: boolean;
  housekeeping: HousekeepingSnapshot;
}

export const DEFAULT_LOG_DIR = path.join(process.cwd(), 'logs');

export abstract class InstrumentDriver<TChannel extends DriverChannel> extends EventEmitter {
  abstract readonly type: string;

  readonly deviceId: string;
  readonly port: string;

  protected readonly log: Logger;

  private channel: TChannel | null = null;
  private readonly commLock: CommLock;
  private readonly externalLock: boolean;
  private readonly housekeeping: HousekeepingController;
  private sink: RecordSink | null;
  private readonly ownsSink: boolean;
  private readonly logDir: string;

  constructor(options: InstrumentDriverOptions, defaultIntervalMs = DEFAULT_HOUSEKEEPING.intervalMs) {
    super();
    this.deviceId = options.deviceId;
    this.port = options.port;
    this.log = (options.logger ?? getLogger('Driver')).child({ deviceId: options.deviceId });

    this.externalLock = options.commLock !== undefined;
    this.commLock = options.commLock ?? new CommLock(`comm:${options.deviceId}`);

    this.sink = options.recordSink ?? null;
    this.ownsSink = options.recordSink === undefined;
    this.logDir = options.logDir ?? DEFAULT_LOG_DIR;

    this.housekeeping = new HousekeepingController({
      deviceId: options.deviceId,
      defaults: {
        intervalMs: options.intervalMs ?? defaultIntervalMs,
        logToFile: options.logToFile ?? DEFAULT_HOUSEKEEPING.logToFile,
      },
      externalWorker: options.hkWorker,
      runCycle: () => this.doHousekeepingCycle(),
      log: this.log,
    });

    this.log.debug(
      {
        port: this.port,
        mode: this.housekeeping.modeKind,
        worker: options.hkWorker?.name,
        lock: this.externalLock ? `external (${this.commLock.name})` : 'internal',
      },
      'Driver created',
    );
  }

  // --- Subclass contract ---

  /** Open the instrument channel. Called with the communication lock held. */
  protected abstract openChannel(): Promise<Result<TChannel>>;

  /**
   * The fixed status query sequence of one monitor cycle. Called with the
   * communication lock held; must not take it again or sleep.
   */
  protected abstract pollStatus(channel: TChannel): Promise<Reading[]>;

  /** Optional post-open setup, still under the lock (buffer flush, speed) */
  protected async prepareChannel(_channel: TChannel): Promise<void> {}

  // --- Lifecycle ---

  isConnected(): boolean {
    return this.channel !== null;
  }

  async connect(): Promise<void> {
    await this.commLock.runExclusive(async () => {
      if (this.channel) {
        throw new StateError(this.deviceId, 'Already connected; disconnect first');
      }

      this.log.info({ port: this.port }, 'Connecting');
      const opened = await this.openChannel();
      if (!opened.ok) {
        this.log.error({ port: this.port, error: opened.error.message }, 'Connection failed');
        throw new ConnectionError(this.deviceId, `Cannot open ${this.port}: ${opened.error.message}`, {
          cause: opened.error,
        });
      }

      try {
        await this.prepareChannel(opened.value);
      } catch (err) {
        await opened.value.close();
        throw new ConnectionError(this.deviceId, `Setup of ${this.port} failed: ${errorMessage(err)}`, {
          cause: err,
        });
      }
      this.channel = opened.value;
    });

    this.log.info({ port: this.port }, 'Connected');
    this.emit('connected');
  }

  /**
   * Detach the channel. Rejects with StateError while housekeeping is
   * enabled; stop it first, or use shutdown().
   */
  async disconnect(): Promise<void> {
    if (this.housekeeping.shouldContinue()) {
      throw new StateError(this.deviceId, 'Housekeeping still enabled; call stopHousekeeping() before disconnect()');
    }

    const closed = await this.commLock.runExclusive(async () => {
      const channel = this.channel;
      if (!channel) return false;
      this.channel = null;
      const result = await channel.close();
      if (!result.ok) {
        this.log.warn({ error: result.error.message }, 'Channel close reported an error');
      }
      return true;
    });

    if (!closed) {
      this.log.warn('No active connection to close');
      return;
    }

    if (this.ownsSink && this.sink) {
      this.sink.close?.();
      this.sink = null;
    }
    this.log.info('Disconnected');
    this.emit('disconnected');
  }

  /** Stop housekeeping (joining an owned worker), then disconnect */
  async shutdown(): Promise<void> {
    await this.stopHousekeeping();
    await this.disconnect();
  }

  // --- Housekeeping ---

  /** Enable housekeeping. Rejects with StateError until connect() has succeeded. */
  async startHousekeeping(intervalMs?: number, logToFile?: boolean): Promise<void> {
    if (!this.isConnected()) {
      throw new StateError(this.deviceId, 'Cannot start housekeeping: not connected');
    }
    await this.housekeeping.start(intervalMs, logToFile);
  }

  async stopHousekeeping(): Promise<void> {
    await this.housekeeping.stop();
  }

  shouldContinueHousekeeping(): boolean {
    return this.housekeeping.shouldContinue();
  }

  /** Interval an external loop should sleep between cycles */
  get housekeepingIntervalMs(): number {
    return this.housekeeping.intervalMs;
  }

  /**
   * Run one monitor cycle now, whether or not housekeeping is enabled.
   * Rejects with the cycle's error; the lock is released either way.
   */
  async doHousekeepingCycle(): Promise<MonitorRecord> {
    const readings = await this.withChannel('run housekeeping cycle', (channel) => this.pollStatus(channel));
    const record = createMonitorRecord(this.deviceId, this.port, readings);

    if (this.housekeeping.logToFile) {
      this.emitRecord(record);
    }
    this.emit('housekeeping', record);
    return record;
  }

  // --- Facade plumbing ---

  /**
   * Run one exchange with the channel under the communication lock.
   * Fails with StateError before touching the lock when not connected.
   */
  protected async withChannel<T>(operation: string, fn: (channel: TChannel) => Promise<T>): Promise<T> {
    if (!this.channel) {
      throw new StateError(this.deviceId, `Cannot ${operation}: not connected`);
    }
    return this.commLock.runExclusive(async () => {
      const channel = this.channel;
      if (!channel) {
        throw new StateError(this.deviceId, `Cannot ${operation}: disconnected while waiting`);
      }
      return fn(channel);
    });
  }

  /** Wrap a transport or protocol failure as a CommunicationError */
  protected communicationError(operation: string, err: unknown): CommunicationError {
    if (err instanceof CommunicationError) return err;
    return new CommunicationError(this.deviceId, `${operation} failed: ${errorMessage(err)}`, { cause: err });
  }

  getStatus(): DriverStatus {
    return {
      deviceId: this.deviceId,
      type: this.type,
      port: this.port,
      connected: this.isConnected(),
      externalLock: this.externalLock,
      housekeeping: this.housekeeping.snapshot(),
    };
  }

  // --- Record emission ---

  private emitRecord(record: MonitorRecord): void {
    try {
      this.recordSink().emit(record, recordLevel(record));
    } catch (err) {
      this.log.warn({ error: errorMessage(err) }, 'Housekeeping record could not be logged');
    }
  }

  private recordSink(): RecordSink {
    if (!this.sink) {
      const { sink, filePath } = openFileRecordSink(this.deviceId, this.logDir);
      this.log.info({ filePath }, 'Housekeeping file logging enabled');
      this.sink = sink;
    }
    return this.sink;
  }
}
