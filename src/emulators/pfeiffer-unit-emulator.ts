/**
 * PfeifferUnitEmulator: RS-485 line with one or more Pfeiffer units
 *
 * Each unit is a table of parameters held as their wire strings. Queries
 * return the stored value; control telegrams are checked against the
 * parameter's type, access and range before they are stored and echoed.
 * Writing parameter 797 moves the unit to its new address.
 */

import { DataFormatError, PfeifferDataType, PfeifferValue, decodeValue, encodeValue } from '../protocols/pfeiffer-data';
import { ParameterSpec, PUMP_PARAMETERS } from '../protocols/pfeiffer-parameters';
import { Telegram, TelegramError, buildReply, parseTelegram } from '../protocols/pfeiffer-telegram';
import { DeviceEmulator } from './device-emulator';

export interface ParameterCell {
  type: PfeifferDataType;
  raw: string;
  writable: boolean;
  /** Accepted numeric range for writes */
  range?: [number, number];
}

type Unit = Map<number, ParameterCell>;

export interface CellOptions {
  writable?: boolean;
  range?: [number, number];
}

export abstract class PfeifferUnitEmulator extends DeviceEmulator {
  protected readonly commandTerminator = '\r';

  private readonly units = new Map<number, Unit>();

  /** Called after a write was accepted */
  protected afterWrite(_address: number, _parameter: number): void {}

  /** Add a parameter to the unit at `address` */
  protected define<K extends PfeifferDataType>(
    address: number,
    spec: ParameterSpec<K>,
    value: PfeifferValue<K>,
    options: CellOptions = {},
  ): void {
    let unit = this.units.get(address);
    if (!unit) {
      unit = new Map();
      this.units.set(address, unit);
    }
    unit.set(spec.number, {
      type: spec.type,
      raw: encodeValue(spec.type, value),
      writable: options.writable ?? false,
      range: options.range,
    });
  }

  /** Decoded value of a parameter */
  parameter<K extends PfeifferDataType>(address: number, spec: ParameterSpec<K>): PfeifferValue<K> {
    return decodeValue(spec.type, this.cell(address, spec.number).raw);
  }

  /** Overwrite a parameter as the unit itself would (read-only ones too) */
  setParameter<K extends PfeifferDataType>(address: number, spec: ParameterSpec<K>, value: PfeifferValue<K>): void {
    this.cell(address, spec.number).raw = encodeValue(spec.type, value);
  }

  hasUnit(address: number): boolean {
    return this.units.has(address);
  }

  getState(): Record<string, unknown> {
    const state: Record<string, unknown> = {};
    for (const [address, unit] of this.units) {
      state[String(address)] = Object.fromEntries([...unit].map(([parameter, cell]) => [parameter, cell.raw]));
    }
    return state;
  }

  protected respond(command: string): string | null {
    let telegram: Telegram;
    try {
      telegram = parseTelegram(`${command}\r`);
    } catch (err) {
      if (err instanceof TelegramError) {
        this.log('Ignored', `${err.code}: ${err.message}`);
        return null;
      }
      throw err;
    }

    const { address, parameter, data } = telegram;
    const unit = this.units.get(address);
    if (!unit) return null;

    const isQuery = telegram.action === 0 && data === '=?';
    const value = isQuery ? this.read(unit, parameter) : this.write(unit, address, parameter, data);
    return buildReply(address, parameter, value);
  }

  private cell(address: number, parameter: number): ParameterCell {
    const cell = this.units.get(address)?.get(parameter);
    if (!cell) {
      throw new Error(`${this.name} has no parameter ${parameter} at address ${address}`);
    }
    return cell;
  }

  private read(unit: Unit, parameter: number): string {
    return unit.get(parameter)?.raw ?? 'NO_DEF';
  }

  private write(unit: Unit, address: number, parameter: number, data: string): string {
    const cell = unit.get(parameter);
    if (!cell) return 'NO_DEF';
    if (!cell.writable) return '_LOGIC';

    let value: PfeifferValue<PfeifferDataType>;
    try {
      value = decodeValue(cell.type, data);
    } catch (err) {
      if (err instanceof DataFormatError) return '_RANGE';
      throw err;
    }
    if (cell.range && (typeof value !== 'number' || value < cell.range[0] || value > cell.range[1])) {
      return '_RANGE';
    }

    cell.raw = data;
    this.log('Write', `address ${address} parameter ${parameter} = ${data}`);

    if (parameter === PUMP_PARAMETERS.RS485_ADDRESS.number && typeof value === 'number' && value !== address) {
      this.units.delete(address);
      this.units.set(value, unit);
      this.log('Address', `RS-485 address ${address} -> ${value}`);
      this.afterWrite(value, parameter);
    } else {
      this.afterWrite(address, parameter);
    }
    return data;
  }
}
