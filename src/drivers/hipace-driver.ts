/**
 * HiPace Driver
 *
 * HiPace 80 and HiPace 300 turbo pumping stations. The OmniControl answers
 * at the device address, the drive electronics (TC80 on the 80, TC400 on
 * the 300) at their own address, and an optional gauge at a third.
 */

import { Reading } from '../housekeeping/types';
import { NO_ERROR_CODE, PUMP_PARAMETERS } from '../protocols/pfeiffer-parameters';
import { encodeValue } from '../protocols/pfeiffer-data';
import { CommunicationError, StateError } from '../errors';
import { Transport } from '../transport/types';
import {
  MonitoredParameter,
  PfeifferDriverOptions,
  PfeifferInstrumentDriver,
  assertRange,
  assertRs485Address,
} from './pfeiffer-instrument-driver';

const P = PUMP_PARAMETERS;

export type HiPaceModel = 80 | 300;

export interface HiPaceOptions extends PfeifferDriverOptions {
  model: HiPaceModel;
  /** Drive electronics address */
  pumpAddress?: number;
  /** Gauge address, when a gauge is fitted */
  gaugeAddress?: number;
}

export interface HiPaceDrive {
  current: number;
  voltage: number;
  power: number;
}

export interface HiPaceSpeed {
  setHz: number;
  actualHz: number;
  actualRpm: number;
}

export interface OmniControlInfo {
  name: string;
  serialNumber: string;
  softwareVersion: string;
}

const isTrue = (value: unknown): boolean => value === true;

const CYCLE_HEAD: readonly MonitoredParameter[] = [
  { measure: 'Pump_Station', spec: P.PUMP_STATION, unit: '' },
  { measure: 'Standby_Mode', spec: P.STANDBY, unit: '' },
  { measure: 'Motor_Pump', spec: P.MOTOR_PUMP, unit: '' },
  { measure: 'Vent_Enabled', spec: P.VENT_ENABLE, unit: '' },
  { measure: 'Speed_Actual_Hz', spec: P.ACTUAL_SPEED_HZ, unit: 'Hz' },
  { measure: 'Speed_Actual_RPM', spec: P.ACTUAL_SPEED_RPM, unit: 'rpm' },
  { measure: 'Speed_Set_Hz', spec: P.SET_SPEED_HZ, unit: 'Hz' },
  { measure: 'Target_Speed_Reached', spec: P.TARGET_SPEED_REACHED, unit: '' },
  { measure: 'Pump_Accelerating', spec: P.ACCELERATING, unit: '' },
  { measure: 'Drive_Current', spec: P.DRIVE_CURRENT, unit: 'A' },
  { measure: 'Drive_Voltage', spec: P.DRIVE_VOLTAGE, unit: 'V' },
  { measure: 'Drive_Power', spec: P.DRIVE_POWER, unit: 'W' },
  { measure: 'Temp_Electronics', spec: P.TEMP_ELECTRONICS, unit: 'degC' },
  { measure: 'Temp_Pump_Bottom', spec: P.TEMP_PUMP_BOTTOM, unit: 'degC' },
];

/** Readings only one drive reports */
const CYCLE_MODEL: Record<HiPaceModel, readonly MonitoredParameter[]> = {
  80: [
    { measure: 'Temp_Power_Stage', spec: P.TEMP_POWER_STAGE, unit: 'degC' },
    { measure: 'Temp_Rotor', spec: P.TEMP_ROTOR, unit: 'degC' },
  ],
  300: [
    { measure: 'Temp_Bearing', spec: P.TEMP_BEARING, unit: 'degC' },
    { measure: 'Temp_Motor', spec: P.TEMP_MOTOR, unit: 'degC' },
    { measure: 'Seal_Gas_Flow', spec: P.SEAL_GAS_FLOW, unit: 'sccm' },
  ],
};

const CYCLE_TAIL: readonly MonitoredParameter[] = [
  { measure: 'Overtemp_Electronics', spec: P.OVERTEMP_ELECTRONICS, unit: '', alarmWhen: isTrue },
  { measure: 'Overtemp_Pump', spec: P.OVERTEMP_PUMP, unit: '', alarmWhen: isTrue },
  { measure: 'Operating_Hours_Pump', spec: P.OPERATING_HOURS_PUMP, unit: 'h' },
  { measure: 'Operating_Hours_Electronics', spec: P.OPERATING_HOURS_ELECTRONICS, unit: 'h' },
  { measure: 'Error', spec: P.ERROR_CODE, unit: '', alarmWhen: (value) => value !== NO_ERROR_CODE },
];

export class HiPaceDriver extends PfeifferInstrumentDriver {
  readonly type = 'hipace';
  readonly model: HiPaceModel;
  readonly gaugeAddress: number | null;

  private _pumpAddress: number;
  private readonly monitored: readonly MonitoredParameter[];

  constructor(options: HiPaceOptions) {
    super(options, { deviceAddress: 1 });
    this.model = options.model;
    this._pumpAddress = options.pumpAddress ?? 2;
    this.gaugeAddress = options.gaugeAddress ?? null;
    assertRs485Address(this._pumpAddress);
    if (this.gaugeAddress !== null) assertRs485Address(this.gaugeAddress);
    this.monitored = [...CYCLE_HEAD, ...CYCLE_MODEL[this.model], ...CYCLE_TAIL];
  }

  get pumpAddress(): number {
    return this._pumpAddress;
  }

  // --- Pumping station control ---

  readPumpStation(): Promise<boolean> {
    return this.readAt(this._pumpAddress, P.PUMP_STATION);
  }

  setPumpStation(on: boolean): Promise<void> {
    return this.writeAt(this._pumpAddress, P.PUMP_STATION, on);
  }

  readStandby(): Promise<boolean> {
    return this.readAt(this._pumpAddress, P.STANDBY);
  }

  setStandby(on: boolean): Promise<void> {
    return this.writeAt(this._pumpAddress, P.STANDBY, on);
  }

  readMotorPump(): Promise<boolean> {
    return this.readAt(this._pumpAddress, P.MOTOR_PUMP);
  }

  setMotorPump(on: boolean): Promise<void> {
    return this.writeAt(this._pumpAddress, P.MOTOR_PUMP, on);
  }

  readVent(): Promise<boolean> {
    return this.readAt(this._pumpAddress, P.VENT_ENABLE);
  }

  setVent(on: boolean): Promise<void> {
    return this.writeAt(this._pumpAddress, P.VENT_ENABLE, on);
  }

  setHeating(on: boolean): Promise<void> {
    return this.writeAt(this._pumpAddress, P.HEATING, on);
  }

  acknowledgeError(): Promise<void> {
    return this.writeAt(this._pumpAddress, P.ERROR_ACK, true);
  }

  /** 0 heavy gases, 1 light gases, 2 helium */
  async setGasMode(mode: number): Promise<void> {
    assertRange('Gas mode', mode, 0, 2, true);
    await this.writeAt(this._pumpAddress, P.GAS_MODE, mode);
  }

  readGasMode(): Promise<number> {
    return this.readAt(this._pumpAddress, P.GAS_MODE);
  }

  /** 0 delayed, 1 no venting, 2 direct */
  async setVentMode(mode: number): Promise<void> {
    assertRange('Vent mode', mode, 0, 2, true);
    await this.writeAt(this._pumpAddress, P.VENT_MODE, mode);
  }

  readVentMode(): Promise<number> {
    return this.readAt(this._pumpAddress, P.VENT_MODE);
  }

  // --- Set points ---

  /** Rotation speed set point, percent of nominal */
  async setSpeedSetpoint(percent: number): Promise<void> {
    assertRange('Speed set point', percent, 20, 100);
    await this.writeAt(this._pumpAddress, P.SPEED_SETPOINT, percent);
  }

  readSpeedSetpoint(): Promise<number> {
    return this.readAt(this._pumpAddress, P.SPEED_SETPOINT);
  }

  async setPowerSetpoint(percent: number): Promise<void> {
    assertRange('Power set point', percent, 10, 100, true);
    await this.writeAt(this._pumpAddress, P.POWER_SETPOINT, percent);
  }

  readPowerSetpoint(): Promise<number> {
    return this.readAt(this._pumpAddress, P.POWER_SETPOINT);
  }

  async setRampUpTime(minutes: number): Promise<void> {
    assertRange('Ramp-up time', minutes, 1, 120, true);
    await this.writeAt(this._pumpAddress, P.RAMP_UP_TIME, minutes);
  }

  readRampUpTime(): Promise<number> {
    return this.readAt(this._pumpAddress, P.RAMP_UP_TIME);
  }

  // --- Reads ---

  readSpeed(): Promise<HiPaceSpeed> {
    const address = this._pumpAddress;
    return this.withChannel('read speed', async (channel) => ({
      setHz: await this.readIn(channel, address, P.SET_SPEED_HZ),
      actualHz: await this.readIn(channel, address, P.ACTUAL_SPEED_HZ),
      actualRpm: await this.readIn(channel, address, P.ACTUAL_SPEED_RPM),
    }));
  }

  readDrive(): Promise<HiPaceDrive> {
    const address = this._pumpAddress;
    return this.withChannel('read drive', async (channel) => ({
      current: await this.readIn(channel, address, P.DRIVE_CURRENT),
      voltage: await this.readIn(channel, address, P.DRIVE_VOLTAGE),
      power: await this.readIn(channel, address, P.DRIVE_POWER),
    }));
  }

  readPumpError(): Promise<string> {
    return this.readAt(this._pumpAddress, P.ERROR_CODE);
  }

  readOmniError(): Promise<string> {
    return this.readAt(this.deviceAddress, P.ERROR_CODE);
  }

  readOmniInfo(): Promise<OmniControlInfo> {
    const address = this.deviceAddress;
    return this.withChannel('read OmniControl info', async (channel) => ({
      name: await this.readIn(channel, address, P.ELECTRONICS_NAME),
      serialNumber: await this.readIn(channel, address, P.SERIAL_NUMBER),
      softwareVersion: await this.readIn(channel, address, P.SOFTWARE_VERSION),
    }));
  }

  /** Gauge pressure, hPa */
  async readGaugePressure(): Promise<number> {
    if (this.gaugeAddress === null) {
      throw new StateError(this.deviceId, 'No gauge address configured');
    }
    return this.readAt(this.gaugeAddress, P.PRESSURE);
  }

  /**
   * Move the drive electronics to a new RS-485 address. The change is
   * confirmed by reading the address back from the new one; the driver
   * keeps the old address when that fails.
   */
  async setPumpAddress(address: number): Promise<void> {
    assertRs485Address(address);
    const previous = this._pumpAddress;
    const spec = P.RS485_ADDRESS;

    await this.withChannel('set pump address', async (channel) => {
      await this.writeIn(channel, previous, spec.number, encodeValue(spec.type, address));
      const confirmed = await this.readIn(channel, address, spec);
      if (confirmed !== address) {
        throw new CommunicationError(
          this.deviceId,
          `Address change not confirmed: expected ${address}, got ${confirmed}`,
        );
      }
    });
    this._pumpAddress = address;
    this.log.info({ from: previous, to: address }, 'Pump address changed');
  }

  // --- Monitor cycle ---

  protected async pollStatus(channel: Transport): Promise<Reading[]> {
    const readings = await this.pollParameters(channel, this._pumpAddress, this.monitored);
    if (this.gaugeAddress !== null) {
      const pressure = await this.readIn(channel, this.gaugeAddress, P.PRESSURE);
      readings.push({ measure: 'Gauge_Pressure', value: pressure, unit: 'hPa' });
    }
    return readings;
  }
}
