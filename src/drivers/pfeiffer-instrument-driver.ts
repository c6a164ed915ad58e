/**
 * PfeifferInstrumentDriver: base for units on the Pfeiffer RS-485 telegram
 * protocol
 *
 * Several units can share one line, each at its own address. Every exchange
 * is a query or control telegram for one parameter, answered by a reply
 * telegram from the same address for the same parameter.
 */

import { CommunicationError } from '../errors';
import { Reading } from '../housekeeping/types';
import { DataFormatError, PfeifferDataType, PfeifferValue, decodeValue, encodeValue } from '../protocols/pfeiffer-data';
import { ParameterSpec } from '../protocols/pfeiffer-parameters';
import {
  TELEGRAM_TERMINATOR,
  Telegram,
  TelegramError,
  buildControlCommand,
  buildDataRequest,
  parseTelegram,
} from '../protocols/pfeiffer-telegram';
import { Transport } from '../transport/types';
import { SerialDriverOptions, SerialInstrumentDriver } from './serial-instrument-driver';

export interface PfeifferDriverOptions extends SerialDriverOptions {
  /** RS-485 address of the unit (1-255) */
  deviceAddress?: number;
}

/** One parameter read by a monitor cycle */
export interface MonitoredParameter {
  measure: string;
  spec: ParameterSpec;
  unit: string;
  /** Marks the reading as a fault when true */
  alarmWhen?: (value: PfeifferValue<PfeifferDataType>) => boolean;
}

export function assertRange(name: string, value: number, min: number, max: number, integer = false): void {
  if (!Number.isFinite(value) || (integer && !Number.isInteger(value)) || value < min || value > max) {
    throw new RangeError(`${name} must be between ${min} and ${max} (got ${value})`);
  }
}

export function assertRs485Address(address: number): void {
  assertRange('RS-485 address', address, 1, 255, true);
}

export abstract class PfeifferInstrumentDriver extends SerialInstrumentDriver {
  readonly deviceAddress: number;

  constructor(
    options: PfeifferDriverOptions,
    defaults: { deviceAddress: number; baudRate?: number; timeoutMs?: number },
  ) {
    super(options, { baudRate: defaults.baudRate ?? 9600, timeoutMs: defaults.timeoutMs ?? 2000 });
    this.deviceAddress = options.deviceAddress ?? defaults.deviceAddress;
    assertRs485Address(this.deviceAddress);
  }

  /** Read one parameter of the unit at `address` */
  protected readAt<K extends PfeifferDataType>(address: number, spec: ParameterSpec<K>): Promise<PfeifferValue<K>> {
    return this.withChannel(`query parameter ${spec.number}`, (channel) => this.readIn(channel, address, spec));
  }

  /** Write a parameter; resolves once the unit echoes the value */
  protected async writeAt<K extends PfeifferDataType>(
    address: number,
    spec: ParameterSpec<K>,
    value: PfeifferValue<K>,
  ): Promise<void> {
    const data = encodeValue(spec.type, value);
    await this.withChannel(`write parameter ${spec.number}`, (channel) =>
      this.writeIn(channel, address, spec.number, data),
    );
    this.log.info({ parameter: spec.number, value: data, address }, 'Parameter written');
  }

  // --- Exchanges (lock held by caller) ---

  protected async readIn<K extends PfeifferDataType>(
    channel: Transport,
    address: number,
    spec: ParameterSpec<K>,
  ): Promise<PfeifferValue<K>> {
    const data = await this.exchange(channel, buildDataRequest(address, spec.number), address, spec.number);
    return this.decode(spec.number, spec.type, data);
  }

  protected async writeIn(channel: Transport, address: number, parameter: number, data: string): Promise<void> {
    const reply = await this.exchange(channel, buildControlCommand(address, parameter, data), address, parameter);
    if (reply !== data) {
      throw new CommunicationError(
        this.deviceId,
        `Invalid acknowledgment for parameter ${parameter}: sent "${data}", got "${reply}"`,
      );
    }
  }

  /** Read each monitored parameter of the unit at `address`, in order */
  protected async pollParameters(
    channel: Transport,
    address: number,
    parameters: readonly MonitoredParameter[],
  ): Promise<Reading[]> {
    const readings: Reading[] = [];
    for (const { measure, spec, unit, alarmWhen } of parameters) {
      const value = await this.readIn(channel, address, spec);
      readings.push(alarmWhen ? { measure, value, unit, alarm: alarmWhen(value) } : { measure, value, unit });
    }
    return readings;
  }

  private async exchange(channel: Transport, frame: string, address: number, parameter: number): Promise<string> {
    const reply = await this.transact(channel, frame, {
      terminator: TELEGRAM_TERMINATOR,
      timeoutMs: this.timeoutMs,
    });

    let telegram: Telegram;
    try {
      telegram = parseTelegram(reply);
    } catch (err) {
      if (err instanceof TelegramError) {
        throw new CommunicationError(this.deviceId, err.message, { cause: err, code: err.code });
      }
      throw err;
    }

    if (telegram.address !== address || telegram.action !== 1 || telegram.parameter !== parameter) {
      throw new CommunicationError(
        this.deviceId,
        `Unexpected reply for address ${address} parameter ${parameter}: ` +
          `address ${telegram.address}, parameter ${telegram.parameter}`,
      );
    }
    return telegram.data;
  }

  private decode<K extends PfeifferDataType>(parameter: number, type: K, data: string): PfeifferValue<K> {
    try {
      return decodeValue(type, data);
    } catch (err) {
      if (err instanceof DataFormatError) {
        throw new CommunicationError(this.deviceId, `Parameter ${parameter}: ${err.message}`, { cause: err });
      }
      throw err;
    }
  }
}
