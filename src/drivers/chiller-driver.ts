/**
 * Chiller Driver
 *
 * Recirculating chiller on a serial line (9600 baud, CRLF framing).
 * Every command gets exactly one reply line: a raw value for reads, "OK"
 * for writes.
 *
 * Reads:
 *   IN_PV_00    bath temperature (°C)
 *   IN_SP_00    temperature set point (°C)
 *   IN_SP_01    pump level (1-6)
 *   IN_SP_02    cooling mode (0 off, 1 on, 2 auto)
 *   IN_MODE_00  keylock (0 unlocked, 1 locked)
 *   IN_MODE_02  running state (0 running, 1 standby)
 *   STATUS      device status (0 ok, otherwise error)
 *   STAT        diagnostic text
 *
 * Writes:
 *   OUT_SP_00 <nnn.nn>   set point
 *   OUT_SP_01 <nnn>      pump level
 *   OUT_MODE_00 <0|1>    keylock
 *   START / STOP
 */

import { Reading } from '../housekeeping/types';
import { Transport } from '../transport/types';
import { SerialDriverOptions, SerialInstrumentDriver } from './serial-instrument-driver';

const CRLF = '\r\n';

export const ChillerCommands = {
  READ_TEMP: 'IN_PV_00',
  READ_SET_TEMP: 'IN_SP_00',
  READ_PUMP_LEVEL: 'IN_SP_01',
  READ_COOLING_MODE: 'IN_SP_02',
  READ_KEYLOCK: 'IN_MODE_00',
  READ_RUNNING_STATE: 'IN_MODE_02',
  READ_STATUS: 'STATUS',
  READ_DIAGNOSTICS: 'STAT',
  SET_TEMP: 'OUT_SP_00',
  SET_PUMP_LEVEL: 'OUT_SP_01',
  SET_KEYLOCK: 'OUT_MODE_00',
  START_DEVICE: 'START',
  STOP_DEVICE: 'STOP',
} as const;

export type CoolingMode = 'OFF' | 'ON' | 'AUTO';
export type KeylockState = 'UNLOCKED' | 'LOCKED';
export type RunningState = 'DEVICE RUNNING' | 'DEVICE STANDBY';
export type ChillerStatus = 'OK' | 'ERROR';

const COOLING: Record<string, CoolingMode> = { '0': 'OFF', '1': 'ON', '2': 'AUTO' };
const KEYLOCK: Record<string, KeylockState> = { '0': 'UNLOCKED', '1': 'LOCKED' };
const RUNNING: Record<string, RunningState> = { '0': 'DEVICE RUNNING', '1': 'DEVICE STANDBY' };

export const PUMP_LEVEL_MIN = 1;
export const PUMP_LEVEL_MAX = 6;

export type ChillerOptions = SerialDriverOptions;

/** Set point as the chiller expects it: 6 wide, 2 decimals, zero padded */
export function formatSetpoint(celsius: number): string {
  const text = Math.abs(celsius).toFixed(2);
  return celsius < 0 ? `-${text.padStart(5, '0')}` : text.padStart(6, '0');
}

export class ChillerDriver extends SerialInstrumentDriver {
  readonly type = 'chiller';

  constructor(options: ChillerOptions) {
    super(options, { baudRate: 9600, timeoutMs: 1000 });
  }

  // --- Reads ---

  readTemperature(): Promise<number> {
    return this.query(ChillerCommands.READ_TEMP, (ch) => this.askNumber(ch, ChillerCommands.READ_TEMP));
  }

  readSetTemperature(): Promise<number> {
    return this.query(ChillerCommands.READ_SET_TEMP, (ch) => this.askNumber(ch, ChillerCommands.READ_SET_TEMP));
  }

  readPumpLevel(): Promise<number> {
    return this.query(ChillerCommands.READ_PUMP_LEVEL, (ch) => this.askNumber(ch, ChillerCommands.READ_PUMP_LEVEL));
  }

  readCooling(): Promise<CoolingMode> {
    return this.query(ChillerCommands.READ_COOLING_MODE, (ch) =>
      this.askMapped(ch, ChillerCommands.READ_COOLING_MODE, COOLING),
    );
  }

  readKeylock(): Promise<KeylockState> {
    return this.query(ChillerCommands.READ_KEYLOCK, (ch) => this.askMapped(ch, ChillerCommands.READ_KEYLOCK, KEYLOCK));
  }

  readRunning(): Promise<RunningState> {
    return this.query(ChillerCommands.READ_RUNNING_STATE, (ch) =>
      this.askMapped(ch, ChillerCommands.READ_RUNNING_STATE, RUNNING),
    );
  }

  readStatus(): Promise<ChillerStatus> {
    return this.query(ChillerCommands.READ_STATUS, (ch) => this.askStatus(ch));
  }

  readDiagnostics(): Promise<string> {
    return this.query(ChillerCommands.READ_DIAGNOSTICS, (ch) => this.ask(ch, ChillerCommands.READ_DIAGNOSTICS));
  }

  // --- Writes ---

  async setTemperature(celsius: number): Promise<void> {
    if (!Number.isFinite(celsius)) {
      throw new RangeError(`Set point must be a finite temperature (got ${celsius})`);
    }
    await this.set(`${ChillerCommands.SET_TEMP} ${formatSetpoint(celsius)}`);
    this.log.info({ setPoint: celsius }, 'Temperature set point changed');
  }

  async setPumpLevel(level: number): Promise<void> {
    if (!Number.isInteger(level) || level < PUMP_LEVEL_MIN || level > PUMP_LEVEL_MAX) {
      throw new RangeError(`Pump level must be between ${PUMP_LEVEL_MIN} and ${PUMP_LEVEL_MAX} (got ${level})`);
    }
    await this.set(`${ChillerCommands.SET_PUMP_LEVEL} ${String(level).padStart(3, '0')}`);
    this.log.info({ level }, 'Pump level changed');
  }

  async setKeylock(locked: boolean): Promise<void> {
    await this.set(`${ChillerCommands.SET_KEYLOCK} ${locked ? 1 : 0}`);
    this.log.info({ locked }, 'Keylock changed');
  }

  async startDevice(): Promise<void> {
    await this.set(ChillerCommands.START_DEVICE);
    this.log.info('Chiller started');
  }

  async stopDevice(): Promise<void> {
    await this.set(ChillerCommands.STOP_DEVICE);
    this.log.info('Chiller stopped');
  }

  // --- Monitor cycle ---

  protected async pollStatus(channel: Transport): Promise<Reading[]> {
    const current = await this.askNumber(channel, ChillerCommands.READ_TEMP);
    const setPoint = await this.askNumber(channel, ChillerCommands.READ_SET_TEMP);
    const running = await this.askMapped(channel, ChillerCommands.READ_RUNNING_STATE, RUNNING);
    const status = await this.askStatus(channel);
    const pumpLevel = await this.askNumber(channel, ChillerCommands.READ_PUMP_LEVEL);
    const cooling = await this.askMapped(channel, ChillerCommands.READ_COOLING_MODE, COOLING);

    return [
      { measure: 'Cur_Temp', value: current, unit: 'degC' },
      { measure: 'Set_Temp', value: setPoint, unit: 'degC' },
      { measure: 'Run_Stat', value: running, unit: '' },
      { measure: 'Dev_Stat', value: status, unit: '', alarm: status === 'ERROR' },
      { measure: 'Pump_Lvl', value: pumpLevel, unit: '' },
      { measure: 'Col_Stat', value: cooling, unit: '' },
    ];
  }

  // --- Exchanges (lock held by caller) ---

  private query<T>(command: string, fn: (channel: Transport) => Promise<T>): Promise<T> {
    return this.withChannel(`read ${command}`, fn);
  }

  private async set(command: string): Promise<void> {
    const reply = await this.withChannel(`write ${command}`, (ch) => this.ask(ch, command));
    if (reply !== 'OK') {
      throw this.communicationError(`Set "${command}"`, new Error(`Failed to set parameter, chiller replied "${reply}"`));
    }
  }

  private async ask(channel: Transport, command: string): Promise<string> {
    const reply = await this.transact(channel, `${command}${CRLF}`, { terminator: CRLF, timeoutMs: this.timeoutMs });
    return reply.trim();
  }

  private async askNumber(channel: Transport, command: string): Promise<number> {
    const reply = await this.ask(channel, command);
    const value = Number(reply);
    if (reply === '' || !Number.isFinite(value)) {
      throw this.communicationError(`Read "${command}"`, new Error(`Unexpected reply "${reply}"`));
    }
    return value;
  }

  private async askMapped<T>(channel: Transport, command: string, table: Record<string, T>): Promise<T> {
    const reply = await this.ask(channel, command);
    const mapped = table[reply];
    if (mapped === undefined) {
      throw this.communicationError(`Read "${command}"`, new Error(`Unexpected reply "${reply}"`));
    }
    return mapped;
  }

  private async askStatus(channel: Transport): Promise<ChillerStatus> {
    const reply = await this.ask(channel, ChillerCommands.READ_STATUS);
    if (reply === '' || !Number.isFinite(Number(reply))) {
      throw this.communicationError('Read "STATUS"', new Error(`Unexpected reply "${reply}"`));
    }
    return Number(reply) === 0 ? 'OK' : 'ERROR';
  }
}
