/**
 * Syringe Pump Driver
 *
 * Plain-text commands terminated by CR. Replies are one or more lines with
 * no end marker, so each exchange collects whatever arrives within the
 * reply window. A reply line starting with "ERROR" is a rejection.
 *
 * Multi-axis pumps take the axis number as a command prefix ("2 start");
 * start additionally takes the operating mode as a suffix (mode - 1).
 */

import { Reading } from '../housekeeping/types';
import { Transport } from '../transport/types';
import { SerialDriverOptions, SerialInstrumentDriver } from './serial-instrument-driver';

export const PUMP_UNITS = {
  'mL/min': '0',
  'mL/hr': '1',
  'μL/min': '2',
  'μL/hr': '3',
} as const;

export type PumpUnits = keyof typeof PUMP_UNITS;

/** A single value or one value per step of a multi-step program */
export type StepValue = number | readonly number[];

export interface Quantity {
  value: number;
  unit: string;
}

export interface SyringePumpOptions extends SerialDriverOptions {
  /** Axis prefix; 0 sends none */
  axis?: number;
  /** Operating mode suffix for start; 0 sends none */
  mode?: number;
  /** How long replies are collected after a command */
  responseWindowMs?: number;
}

function isPumpUnits(units: string): units is PumpUnits {
  return Object.prototype.hasOwnProperty.call(PUMP_UNITS, units);
}

/** "key = value" lines to a record; other lines are skipped */
export function parseKeyValueLines(lines: readonly string[]): Record<string, string> {
  const result: Record<string, string> = {};
  for (const line of lines) {
    const idx = line.indexOf('=');
    if (idx <= 0) continue;
    result[line.slice(0, idx).trim()] = line.slice(idx + 1).trim();
  }
  return result;
}

export class SyringePumpDriver extends SerialInstrumentDriver {
  readonly type = 'syringe-pump';
  readonly axis: number;
  readonly mode: number;
  readonly responseWindowMs: number;

  constructor(options: SyringePumpOptions) {
    super(options, { baudRate: 9600, timeoutMs: 1000 });
    this.axis = options.axis ?? 0;
    this.mode = options.mode ?? 0;
    this.responseWindowMs = options.responseWindowMs ?? 500;
  }

  /** Prefix the axis number when one is configured */
  withAxis(command: string): string {
    return this.axis === 0 ? command : `${this.axis} ${command}`;
  }

  /** Append the mode argument when a mode is configured */
  withMode(command: string): string {
    return this.mode === 0 ? command : `${command} ${this.mode - 1}`;
  }

  // --- Motion ---

  async start(): Promise<string[]> {
    const reply = await this.command(this.withMode(this.withAxis('start')));
    this.log.info('Pump started');
    return reply;
  }

  async stop(): Promise<string[]> {
    const reply = await this.command(this.withAxis('stop'));
    this.log.info('Pump stopped');
    return reply;
  }

  async pause(): Promise<string[]> {
    const reply = await this.command(this.withAxis('pause'));
    this.log.info('Pump paused');
    return reply;
  }

  async restart(): Promise<string[]> {
    const reply = await this.command('restart');
    this.log.info('Pump restarted');
    return reply;
  }

  // --- Parameters ---

  async setUnits(units: PumpUnits): Promise<string[]> {
    if (!isPumpUnits(units)) {
      throw new RangeError(`Invalid units "${String(units)}"; expected one of ${Object.keys(PUMP_UNITS).join(', ')}`);
    }
    const reply = await this.command(`set units ${PUMP_UNITS[units]}`);
    this.log.info({ units }, 'Units set');
    return reply;
  }

  async setDiameter(diameterMm: number): Promise<string[]> {
    if (!Number.isFinite(diameterMm) || diameterMm <= 0) {
      throw new RangeError(`Syringe diameter must be > 0 mm (got ${diameterMm})`);
    }
    const reply = await this.command(`set diameter ${diameterMm}`);
    this.log.info({ diameterMm }, 'Diameter set');
    return reply;
  }

  setRate(rate: StepValue): Promise<string[]> {
    return this.setStepped('rate', rate);
  }

  setVolume(volume: StepValue): Promise<string[]> {
    return this.setStepped('volume', volume);
  }

  setDelay(delay: StepValue): Promise<string[]> {
    return this.setStepped('delay', delay);
  }

  async setTime(timer: number): Promise<string[]> {
    const reply = await this.command(`set time ${timer}`);
    this.log.info({ timer }, 'Timer set');
    return reply;
  }

  // --- Reads ---

  async readParameterLimits(): Promise<Record<string, string>> {
    return parseKeyValueLines(await this.command('read limit parameter'));
  }

  async readParameters(): Promise<Record<string, string>> {
    return parseKeyValueLines(await this.command('view parameter'));
  }

  readDispensedVolume(): Promise<Quantity> {
    return this.withChannel('read dispensed volume', (ch) => this.askQuantity(ch, 'dispensed volume'));
  }

  readElapsedTime(): Promise<Quantity> {
    return this.withChannel('read elapsed time', (ch) => this.askQuantity(ch, 'elapsed time'));
  }

  readPumpStatus(): Promise<string> {
    return this.withChannel('read pump status', (ch) => this.askStatus(ch));
  }

  // --- Monitor cycle ---

  protected async pollStatus(channel: Transport): Promise<Reading[]> {
    const status = await this.askStatus(channel);
    const volume = await this.askQuantity(channel, 'dispensed volume');
    const elapsed = await this.askQuantity(channel, 'elapsed time');

    return [
      { measure: 'Pump_Stat', value: status, unit: '' },
      { measure: 'Disp_Vol', value: volume.value, unit: volume.unit },
      { measure: 'Elap_Time', value: elapsed.value, unit: elapsed.unit },
    ];
  }

  // --- Exchanges ---

  private async setStepped(name: 'rate' | 'volume' | 'delay', value: StepValue): Promise<string[]> {
    const values = typeof value === 'number' ? [value] : value;
    if (values.length === 0 || values.some((v) => !Number.isFinite(v))) {
      throw new RangeError(`Invalid ${name} ${JSON.stringify(value)}`);
    }
    const reply = await this.command(`set ${name} ${values.join(',')}`);
    this.log.info({ [name]: value }, `${name[0].toUpperCase()}${name.slice(1)} set`);
    return reply;
  }

  private command(command: string): Promise<string[]> {
    return this.withChannel(`send "${command}"`, (ch) => this.ask(ch, command));
  }

  private async ask(channel: Transport, command: string): Promise<string[]> {
    const reply = await this.transact(channel, `${command}\r`, { timeoutMs: this.responseWindowMs });
    const lines = reply
      .split(/\r\n|\r|\n/)
      .map((line) => line.trim())
      .filter((line) => line.length > 0);

    if (lines.length === 0) {
      throw this.communicationError(`Command "${command}"`, new Error(`No reply within ${this.responseWindowMs}ms`));
    }
    const rejected = lines.find((line) => line.startsWith('ERROR'));
    if (rejected) {
      throw this.communicationError(`Command "${command}"`, new Error(rejected));
    }
    return lines;
  }

  private async askStatus(channel: Transport): Promise<string> {
    const [status] = await this.ask(channel, 'pump status');
    return status;
  }

  private async askQuantity(channel: Transport, command: string): Promise<Quantity> {
    const [line] = await this.ask(channel, command);
    const match = /^(-?\d+(?:\.\d+)?)\s*(\S*)$/.exec(line);
    if (!match) {
      throw this.communicationError(`Read "${command}"`, new Error(`Unexpected reply "${line}"`));
    }
    return { value: Number(match[1]), unit: match[2] };
  }
}
