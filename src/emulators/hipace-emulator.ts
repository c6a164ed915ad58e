/**
 * HiPaceEmulator: virtual HiPace 80 / 300 pumping station
 *
 * Three units on one line: the OmniControl, the drive electronics and an
 * optional gauge. The rotor reaches its set speed at once; while the
 * station or the motor pump is off it stands still.
 */

import type { HiPaceModel } from '../drivers/hipace-driver';
import { NO_ERROR_CODE, PUMP_PARAMETERS } from '../protocols/pfeiffer-parameters';
import { EmulatorOptions } from './device-emulator';
import { PfeifferUnitEmulator } from './pfeiffer-unit-emulator';

const P = PUMP_PARAMETERS;

/** Nominal rotor speed per model, Hz */
export const HIPACE_NOMINAL_HZ: Record<HiPaceModel, number> = { 80: 1500, 300: 1000 };

export interface HiPaceEmulatorOptions extends EmulatorOptions {
  model: HiPaceModel;
  deviceAddress?: number;
  pumpAddress?: number;
  gaugeAddress?: number;
}

export class HiPaceEmulator extends PfeifferUnitEmulator {
  readonly name: string;
  readonly model: HiPaceModel;
  readonly omniAddress: number;
  pumpAddress: number;

  constructor(address = 'emulated-hipace', options: HiPaceEmulatorOptions = { model: 80 }) {
    super(address, options);
    this.model = options.model;
    this.name = `HiPace ${options.model}`;
    this.omniAddress = options.deviceAddress ?? 1;
    this.pumpAddress = options.pumpAddress ?? 2;

    const omni = this.omniAddress;
    this.define(omni, P.ERROR_CODE, NO_ERROR_CODE);
    this.define(omni, P.ELECTRONICS_NAME, 'OmniCt');
    this.define(omni, P.SERIAL_NUMBER, 'PT0001A');
    this.define(omni, P.SOFTWARE_VERSION, '010200');
    this.define(omni, P.RS485_ADDRESS, omni);

    this.definePump(this.pumpAddress);

    if (options.gaugeAddress !== undefined) {
      this.define(options.gaugeAddress, P.PRESSURE, 5e-8);
      this.define(options.gaugeAddress, P.RS485_ADDRESS, options.gaugeAddress);
    }
  }

  /** Raise a drive error, as the electronics would on a fault */
  raiseError(code: string): void {
    this.setParameter(this.pumpAddress, P.ERROR_CODE, code);
  }

  protected afterWrite(address: number, parameter: number): void {
    if (parameter === P.RS485_ADDRESS.number && !this.hasUnit(this.pumpAddress)) {
      this.pumpAddress = address;
    }
    if (address !== this.pumpAddress) return;

    if (parameter === P.ERROR_ACK.number && this.parameter(address, P.ERROR_ACK)) {
      this.setParameter(address, P.ERROR_CODE, NO_ERROR_CODE);
      this.setParameter(address, P.ERROR_ACK, false);
      this.log('Error', 'acknowledged');
    }
    this.updateRotor();
  }

  private definePump(pump: number): void {
    const writable = { writable: true };
    this.define(pump, P.PUMP_STATION, false, writable);
    this.define(pump, P.STANDBY, false, writable);
    this.define(pump, P.MOTOR_PUMP, true, writable);
    this.define(pump, P.VENT_ENABLE, false, writable);
    this.define(pump, P.HEATING, false, writable);
    this.define(pump, P.ERROR_ACK, false, writable);
    this.define(pump, P.GAS_MODE, 0, { writable: true, range: [0, 2] });
    this.define(pump, P.VENT_MODE, 0, { writable: true, range: [0, 2] });
    this.define(pump, P.SPEED_SETPOINT, 100, { writable: true, range: [20, 100] });
    this.define(pump, P.POWER_SETPOINT, 100, { writable: true, range: [10, 100] });
    this.define(pump, P.RAMP_UP_TIME, 8, { writable: true, range: [1, 120] });
    this.define(pump, P.RS485_ADDRESS, pump, { writable: true, range: [1, 255] });

    this.define(pump, P.ERROR_CODE, NO_ERROR_CODE);
    this.define(pump, P.ELECTRONICS_NAME, this.model === 80 ? 'TC80' : 'TC400');
    this.define(pump, P.SOFTWARE_VERSION, '010500');
    this.define(pump, P.SET_SPEED_HZ, HIPACE_NOMINAL_HZ[this.model]);
    this.define(pump, P.ACTUAL_SPEED_HZ, 0);
    this.define(pump, P.ACTUAL_SPEED_RPM, 0);
    this.define(pump, P.TARGET_SPEED_REACHED, false);
    this.define(pump, P.ACCELERATING, false);
    this.define(pump, P.DRIVE_CURRENT, 0);
    this.define(pump, P.DRIVE_VOLTAGE, 24);
    this.define(pump, P.DRIVE_POWER, 0);
    this.define(pump, P.TEMP_ELECTRONICS, 31);
    this.define(pump, P.TEMP_PUMP_BOTTOM, 27);
    this.define(pump, P.OVERTEMP_ELECTRONICS, false);
    this.define(pump, P.OVERTEMP_PUMP, false);
    this.define(pump, P.OPERATING_HOURS_PUMP, 1240);
    this.define(pump, P.OPERATING_HOURS_ELECTRONICS, 1302);

    if (this.model === 80) {
      this.define(pump, P.TEMP_POWER_STAGE, 33);
      this.define(pump, P.TEMP_ROTOR, 29);
    } else {
      this.define(pump, P.TEMP_BEARING, 30);
      this.define(pump, P.TEMP_MOTOR, 32);
      this.define(pump, P.SEAL_GAS_FLOW, 0);
    }
  }

  private updateRotor(): void {
    const pump = this.pumpAddress;
    const percent = this.parameter(pump, P.SPEED_SETPOINT);
    const setHz = Math.round((HIPACE_NOMINAL_HZ[this.model] * percent) / 100);
    const running = this.parameter(pump, P.PUMP_STATION) && this.parameter(pump, P.MOTOR_PUMP);
    const actualHz = running ? setHz : 0;

    this.setParameter(pump, P.SET_SPEED_HZ, setHz);
    this.setParameter(pump, P.ACTUAL_SPEED_HZ, actualHz);
    this.setParameter(pump, P.ACTUAL_SPEED_RPM, actualHz * 60);
    this.setParameter(pump, P.TARGET_SPEED_REACHED, running);
    this.setParameter(pump, P.DRIVE_CURRENT, running ? 0.5 : 0);
    this.setParameter(pump, P.DRIVE_POWER, running ? 12 : 0);
  }
}
