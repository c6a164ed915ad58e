/**
 * HiScrollEmulator: virtual HiScroll 12 scroll pump
 */

import { NO_ERROR_CODE, PUMP_PARAMETERS } from '../protocols/pfeiffer-parameters';
import { EmulatorOptions } from './device-emulator';
import { PfeifferUnitEmulator } from './pfeiffer-unit-emulator';

const P = PUMP_PARAMETERS;

export const HISCROLL_NOMINAL_HZ = 30;

const FACTORY_SPEED_SETPOINT = 100;
const FACTORY_STANDBY_SPEED = 70;

export class HiScrollEmulator extends PfeifferUnitEmulator {
  readonly name = 'HiScroll 12';
  unitAddress: number;

  constructor(address = 'emulated-hiscroll', options: EmulatorOptions & { deviceAddress?: number } = {}) {
    super(address, options);
    const unit = options.deviceAddress ?? 2;
    this.unitAddress = unit;

    this.define(unit, P.PUMP_STATION, false, { writable: true });
    this.define(unit, P.STANDBY, false, { writable: true });
    this.define(unit, P.ERROR_ACK, false, { writable: true });
    this.define(unit, P.FACTORY_RESET, false, { writable: true });
    this.define(unit, P.SPEED_SETPOINT, FACTORY_SPEED_SETPOINT, { writable: true, range: [40, 100] });
    this.define(unit, P.STANDBY_SPEED, FACTORY_STANDBY_SPEED, { writable: true, range: [40, 100] });
    this.define(unit, P.RS485_ADDRESS, unit, { writable: true, range: [1, 255] });

    this.define(unit, P.ACTUAL_SPEED_HZ, 0);
    this.define(unit, P.ACTUAL_SPEED_RPM, 0);
    this.define(unit, P.NOMINAL_SPEED_RPM, HISCROLL_NOMINAL_HZ * 60);
    this.define(unit, P.TEMP_MOTOR, 35);
    this.define(unit, P.TEMP_ELECTRONICS, 30);
    this.define(unit, P.TEMP_POWER_STAGE, 33);
    this.define(unit, P.DRIVE_CURRENT, 0);
    this.define(unit, P.DRIVE_POWER, 0);
    this.define(unit, P.ERROR_CODE, NO_ERROR_CODE);
    this.define(unit, P.ELECTRONICS_NAME, 'HiScrl');
    this.define(unit, P.SERIAL_NUMBER, 'HS12000042');
    this.define(unit, P.SOFTWARE_VERSION, '010100');
  }

  raiseError(code: string): void {
    this.setParameter(this.unitAddress, P.ERROR_CODE, code);
  }

  protected afterWrite(address: number, parameter: number): void {
    this.unitAddress = address;

    if (parameter === P.ERROR_ACK.number && this.parameter(address, P.ERROR_ACK)) {
      this.setParameter(address, P.ERROR_CODE, NO_ERROR_CODE);
      this.setParameter(address, P.ERROR_ACK, false);
    }
    if (parameter === P.FACTORY_RESET.number && this.parameter(address, P.FACTORY_RESET)) {
      this.setParameter(address, P.SPEED_SETPOINT, FACTORY_SPEED_SETPOINT);
      this.setParameter(address, P.STANDBY_SPEED, FACTORY_STANDBY_SPEED);
      this.setParameter(address, P.FACTORY_RESET, false);
      this.log('Reset', 'factory settings restored');
    }

    const running = this.parameter(address, P.PUMP_STATION);
    const percent = this.parameter(address, this.parameter(address, P.STANDBY) ? P.STANDBY_SPEED : P.SPEED_SETPOINT);
    const hz = running ? Math.round((HISCROLL_NOMINAL_HZ * percent) / 100) : 0;
    this.setParameter(address, P.ACTUAL_SPEED_HZ, hz);
    this.setParameter(address, P.ACTUAL_SPEED_RPM, hz * 60);
    this.setParameter(address, P.DRIVE_CURRENT, running ? 1.2 : 0);
    this.setParameter(address, P.DRIVE_POWER, running ? 150 : 0);
  }
}
