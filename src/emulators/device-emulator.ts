/**
 * DeviceEmulator: abstract base for in-process instrument emulators
 *
 * Implements the Transport contract, so a driver cannot tell an emulator
 * from a serial port. Provides the shared infrastructure:
 *   - command framing on a per-instrument terminator
 *   - reply latency (what makes overlapping exchanges observable)
 *   - command log ring buffer with timestamps
 *   - fault injection: offline (send fails) and mute (no reply)
 *   - optional ExchangeRecorder shared across emulators on one bus
 */

import { Logger } from 'pino';
import { getLogger } from '../logger';
import { BufferedTransport } from '../transport/buffered-transport';
import { Done, Err, Ok, Result, Transport, TransportFactory } from '../transport/types';
import { ExchangeRecorder } from './exchange-recorder';

export interface EmulatorLogEntry {
  timestamp: number;
  action: string;
  details: string;
}

export interface EmulatorOptions {
  /** Delay before a reply is delivered */
  latencyMs?: number;
  recorder?: ExchangeRecorder;
}

export abstract class DeviceEmulator extends BufferedTransport {
  abstract readonly name: string;

  /** Terminator that ends one command on the wire */
  protected abstract readonly commandTerminator: string;

  latencyMs: number;
  /** While set, send() fails as if the cable were pulled */
  offline = false;
  /** While set, commands are accepted but never answered */
  mute = false;
  /** While set, opening the emulated port fails */
  refuseOpen = false;

  protected readonly recorder: ExchangeRecorder | null;
  protected readonly emuLog: Logger;

  private _open = true;
  private pendingInput = '';
  private _log: EmulatorLogEntry[] = [];
  private readonly maxLogSize = 200;
  private _commands: string[] = [];

  constructor(address: string, options: EmulatorOptions = {}) {
    super(address);
    this.latencyMs = options.latencyMs ?? 0;
    this.recorder = options.recorder ?? null;
    this.emuLog = getLogger('Emulator').child({ port: address });
  }

  /**
   * Answer one command (terminator stripped). Return null for no reply.
   * The reply is written to the wire as-is, so include its terminator.
   */
  protected abstract respond(command: string): string | null;

  /** Device-specific state snapshot */
  abstract getState(): Record<string, unknown>;

  async send(data: Buffer): Promise<Result<void>> {
    if (!this._open) return Err(new Error(`Emulated port ${this.address} is closed`));
    if (this.offline) return Err(new Error(`Emulated port ${this.address} is offline`));

    this.pendingInput += data.toString('utf8');
    let idx = this.pendingInput.indexOf(this.commandTerminator);
    while (idx >= 0) {
      const command = this.pendingInput.slice(0, idx);
      this.pendingInput = this.pendingInput.slice(idx + this.commandTerminator.length);
      this.dispatch(command);
      idx = this.pendingInput.indexOf(this.commandTerminator);
    }
    return Done;
  }

  async close(): Promise<Result<void>> {
    this._open = false;
    this.log('Close', 'Emulated port closed');
    return Done;
  }

  isOpen(): boolean {
    return this._open;
  }

  /** Re-attach after close(); device state survives */
  reopen(): void {
    this._open = true;
    this.pendingInput = '';
    this.discardInput();
    this.resetFailure();
    this.log('Open', 'Emulated port opened');
  }

  /**
   * A TransportFactory that hands out this emulator, so drivers can be
   * wired to it exactly as they would be to a serial port.
   */
  factory(): TransportFactory {
    return async (): Promise<Result<Transport>> => {
      if (this.refuseOpen) {
        return Err(new Error(`Emulated port ${this.address} refused to open`));
      }
      this.reopen();
      return Ok(this);
    };
  }

  /** Every command received since construction, in order */
  get commands(): readonly string[] {
    return this._commands;
  }

  /** Get all log entries */
  getLog(): EmulatorLogEntry[] {
    return [...this._log];
  }

  /** Append to ring buffer and debug log */
  protected log(action: string, details: string): void {
    const entry: EmulatorLogEntry = {
      timestamp: Date.now(),
      action,
      details,
    };

    this._log.push(entry);
    if (this._log.length > this.maxLogSize) {
      this._log.shift();
    }

    this.emuLog.debug({ emulator: this.name, action }, details);
  }

  private dispatch(command: string): void {
    this._commands.push(command);
    this.recorder?.begin(`${this.address}:${command}`);
    this.log('Command', command);

    const reply = this.mute ? null : this.respond(command);
    const deliver = () => {
      if (reply !== null && this._open) {
        this.log('Reply', reply.trimEnd());
        this.accept(Buffer.from(reply, 'utf8'));
      }
      this.recorder?.end();
    };

    if (this.latencyMs > 0) {
      setTimeout(deliver, this.latencyMs);
    } else {
      deliver();
    }
  }
}
