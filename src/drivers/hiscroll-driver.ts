/**
 * HiScroll Driver
 *
 * HiScroll 12 dry scroll pump on the Pfeiffer telegram protocol. Factory
 * address is 2.
 */

import { Reading } from '../housekeeping/types';
import { NO_ERROR_CODE, PUMP_PARAMETERS } from '../protocols/pfeiffer-parameters';
import { Transport } from '../transport/types';
import {
  MonitoredParameter,
  PfeifferDriverOptions,
  PfeifferInstrumentDriver,
  assertRange,
} from './pfeiffer-instrument-driver';

const P = PUMP_PARAMETERS;

export type HiScrollOptions = PfeifferDriverOptions;

export interface HiScrollTemperatures {
  electronics: number;
  motor: number;
  powerStage: number;
}

const CYCLE: readonly MonitoredParameter[] = [
  { measure: 'Pump_Enabled', spec: P.PUMP_STATION, unit: '' },
  { measure: 'Standby_Mode', spec: P.STANDBY, unit: '' },
  { measure: 'Speed_RPM', spec: P.ACTUAL_SPEED_RPM, unit: 'rpm' },
  { measure: 'Speed_Hz', spec: P.ACTUAL_SPEED_HZ, unit: 'Hz' },
  { measure: 'Temp_Motor', spec: P.TEMP_MOTOR, unit: 'degC' },
  { measure: 'Temp_Electronics', spec: P.TEMP_ELECTRONICS, unit: 'degC' },
  { measure: 'Drive_Current', spec: P.DRIVE_CURRENT, unit: 'A' },
  { measure: 'Drive_Power', spec: P.DRIVE_POWER, unit: 'W' },
  { measure: 'Error', spec: P.ERROR_CODE, unit: '', alarmWhen: (value) => value !== NO_ERROR_CODE },
];

export class HiScrollDriver extends PfeifferInstrumentDriver {
  readonly type = 'hiscroll12';

  constructor(options: HiScrollOptions) {
    super(options, { deviceAddress: 2 });
  }

  readPumpEnabled(): Promise<boolean> {
    return this.readAt(this.deviceAddress, P.PUMP_STATION);
  }

  setPumpEnabled(on: boolean): Promise<void> {
    return this.writeAt(this.deviceAddress, P.PUMP_STATION, on);
  }

  readStandby(): Promise<boolean> {
    return this.readAt(this.deviceAddress, P.STANDBY);
  }

  setStandby(on: boolean): Promise<void> {
    return this.writeAt(this.deviceAddress, P.STANDBY, on);
  }

  acknowledgeError(): Promise<void> {
    return this.writeAt(this.deviceAddress, P.ERROR_ACK, true);
  }

  resetToFactorySettings(): Promise<void> {
    return this.writeAt(this.deviceAddress, P.FACTORY_RESET, true);
  }

  /** Speed set point, percent of nominal */
  async setSpeedSetpoint(percent: number): Promise<void> {
    assertRange('Speed set point', percent, 40, 100);
    await this.writeAt(this.deviceAddress, P.SPEED_SETPOINT, percent);
  }

  readSpeedSetpoint(): Promise<number> {
    return this.readAt(this.deviceAddress, P.SPEED_SETPOINT);
  }

  /** Speed in standby, percent of nominal */
  async setStandbySetpoint(percent: number): Promise<void> {
    assertRange('Standby set point', percent, 40, 100);
    await this.writeAt(this.deviceAddress, P.STANDBY_SPEED, percent);
  }

  readStandbySetpoint(): Promise<number> {
    return this.readAt(this.deviceAddress, P.STANDBY_SPEED);
  }

  readSpeedHz(): Promise<number> {
    return this.readAt(this.deviceAddress, P.ACTUAL_SPEED_HZ);
  }

  readSpeedRpm(): Promise<number> {
    return this.readAt(this.deviceAddress, P.ACTUAL_SPEED_RPM);
  }

  readNominalSpeedRpm(): Promise<number> {
    return this.readAt(this.deviceAddress, P.NOMINAL_SPEED_RPM);
  }

  readTemperatures(): Promise<HiScrollTemperatures> {
    const address = this.deviceAddress;
    return this.withChannel('read temperatures', async (channel) => ({
      electronics: await this.readIn(channel, address, P.TEMP_ELECTRONICS),
      motor: await this.readIn(channel, address, P.TEMP_MOTOR),
      powerStage: await this.readIn(channel, address, P.TEMP_POWER_STAGE),
    }));
  }

  readError(): Promise<string> {
    return this.readAt(this.deviceAddress, P.ERROR_CODE);
  }

  readSerialNumber(): Promise<string> {
    return this.readAt(this.deviceAddress, P.SERIAL_NUMBER);
  }

  readSoftwareVersion(): Promise<string> {
    return this.readAt(this.deviceAddress, P.SOFTWARE_VERSION);
  }

  protected pollStatus(channel: Transport): Promise<Reading[]> {
    return this.pollParameters(channel, this.deviceAddress, CYCLE);
  }
}
