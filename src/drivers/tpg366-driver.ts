/**
 * TPG366 Driver
 *
 * Six-channel pressure gauge controller on the Pfeiffer RS-485 telegram
 * protocol. The controller answers at its own address; gauge channel n
 * answers at address + n.
 */

import { Reading } from '../housekeeping/types';
import { PfeifferDataType, PfeifferValue } from '../protocols/pfeiffer-data';
import { NO_ERROR_CODE, PUMP_PARAMETERS } from '../protocols/pfeiffer-parameters';
import { Transport } from '../transport/types';
import { PfeifferDriverOptions, PfeifferInstrumentDriver } from './pfeiffer-instrument-driver';

export { NO_ERROR_CODE };

export const TPG366_PARAMETERS = {
  ERROR_CODE: PUMP_PARAMETERS.ERROR_CODE,
  SOFTWARE_VERSION: PUMP_PARAMETERS.SOFTWARE_VERSION,
  ELECTRONICS_NAME: PUMP_PARAMETERS.ELECTRONICS_NAME,
  PRESSURE: PUMP_PARAMETERS.PRESSURE,
  RS485_ADDRESS: PUMP_PARAMETERS.RS485_ADDRESS,
} as const;

export const TPG366_CHANNEL_COUNT = 6;

export interface Tpg366Options extends PfeifferDriverOptions {
  /** Gauge channels read by the monitor cycle */
  channels?: number[];
}

function assertChannel(channel: number): void {
  if (!Number.isInteger(channel) || channel < 1 || channel > TPG366_CHANNEL_COUNT) {
    throw new RangeError(`Channel must be between 1 and ${TPG366_CHANNEL_COUNT} (got ${channel})`);
  }
}

export class Tpg366Driver extends PfeifferInstrumentDriver {
  readonly type = 'tpg366';
  readonly channels: readonly number[];

  constructor(options: Tpg366Options) {
    super(options, { deviceAddress: 1 });
    const channels = options.channels ?? [1, 2, 3, 4, 5, 6];
    channels.forEach(assertChannel);
    this.channels = channels;
  }

  /** Pressure of one gauge channel, hPa */
  readPressure(channel: number): Promise<number> {
    assertChannel(channel);
    return this.readAt(this.deviceAddress + channel, TPG366_PARAMETERS.PRESSURE);
  }

  readError(): Promise<string> {
    return this.readAt(this.deviceAddress, TPG366_PARAMETERS.ERROR_CODE);
  }

  readSoftwareVersion(): Promise<string> {
    return this.readAt(this.deviceAddress, TPG366_PARAMETERS.SOFTWARE_VERSION);
  }

  readElectronicsName(): Promise<string> {
    return this.readAt(this.deviceAddress, TPG366_PARAMETERS.ELECTRONICS_NAME);
  }

  readRs485Address(): Promise<number> {
    return this.readAt(this.deviceAddress, TPG366_PARAMETERS.RS485_ADDRESS);
  }

  /**
   * Read any parameter and decode it as `type`. Channel 0 addresses the
   * controller itself.
   */
  queryParameter<K extends PfeifferDataType>(parameter: number, type: K, channel = 0): Promise<PfeifferValue<K>> {
    return this.readAt(this.deviceAddress + channel, { number: parameter, type });
  }

  /** Write a parameter; resolves once the controller echoes the value */
  writeParameter<K extends PfeifferDataType>(
    parameter: number,
    type: K,
    value: PfeifferValue<K>,
    channel = 0,
  ): Promise<void> {
    return this.writeAt(this.deviceAddress + channel, { number: parameter, type }, value);
  }

  // --- Monitor cycle ---

  protected async pollStatus(channel: Transport): Promise<Reading[]> {
    const readings: Reading[] = [];

    for (const n of this.channels) {
      const pressure = await this.readIn(channel, this.deviceAddress + n, TPG366_PARAMETERS.PRESSURE);
      readings.push({ measure: `Pressure_Ch${n}`, value: pressure, unit: 'hPa' });
    }

    const error = await this.readIn(channel, this.deviceAddress, TPG366_PARAMETERS.ERROR_CODE);
    readings.push({ measure: 'Error', value: error, unit: '', alarm: error !== NO_ERROR_CODE });

    return readings;
  }
}
