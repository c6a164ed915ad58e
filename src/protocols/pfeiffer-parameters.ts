/**
 * Pfeiffer Vacuum parameter numbers shared by the turbo pump drives
 * (TC80, TC400), the OmniControl and the HiScroll. Each entry carries the
 * data type its value travels as.
 */

import { PfeifferDataType } from './pfeiffer-data';

export interface ParameterSpec<K extends PfeifferDataType = PfeifferDataType> {
  readonly number: number;
  readonly type: K;
}

/** Error code parameter value of a healthy unit */
export const NO_ERROR_CODE = '000000';

export const PUMP_PARAMETERS = {
  HEATING: { number: 1, type: 'boolean_old' },
  STANDBY: { number: 2, type: 'boolean_old' },
  ERROR_ACK: { number: 9, type: 'boolean_old' },
  PUMP_STATION: { number: 10, type: 'boolean_old' },
  VENT_ENABLE: { number: 12, type: 'boolean_old' },
  MOTOR_PUMP: { number: 23, type: 'boolean_old' },
  GAS_MODE: { number: 27, type: 'u_short_int' },
  VENT_MODE: { number: 30, type: 'u_short_int' },
  FACTORY_RESET: { number: 95, type: 'boolean_old' },
  ERROR_CODE: { number: 303, type: 'string' },
  OVERTEMP_ELECTRONICS: { number: 304, type: 'boolean_old' },
  OVERTEMP_PUMP: { number: 305, type: 'boolean_old' },
  TARGET_SPEED_REACHED: { number: 306, type: 'boolean_old' },
  ACCELERATING: { number: 307, type: 'boolean_old' },
  SET_SPEED_HZ: { number: 308, type: 'u_integer' },
  ACTUAL_SPEED_HZ: { number: 309, type: 'u_integer' },
  DRIVE_CURRENT: { number: 310, type: 'u_real' },
  OPERATING_HOURS_PUMP: { number: 311, type: 'u_integer' },
  SOFTWARE_VERSION: { number: 312, type: 'string' },
  DRIVE_VOLTAGE: { number: 313, type: 'u_real' },
  OPERATING_HOURS_ELECTRONICS: { number: 314, type: 'u_integer' },
  DRIVE_POWER: { number: 316, type: 'u_integer' },
  TEMP_POWER_STAGE: { number: 324, type: 'u_integer' },
  TEMP_ELECTRONICS: { number: 326, type: 'u_integer' },
  TEMP_PUMP_BOTTOM: { number: 330, type: 'u_integer' },
  SEAL_GAS_FLOW: { number: 337, type: 'u_integer' },
  TEMP_BEARING: { number: 342, type: 'u_integer' },
  TEMP_MOTOR: { number: 346, type: 'u_integer' },
  ELECTRONICS_NAME: { number: 349, type: 'string' },
  SERIAL_NUMBER: { number: 355, type: 'string16' },
  TEMP_ROTOR: { number: 384, type: 'u_integer' },
  ACTUAL_SPEED_RPM: { number: 398, type: 'u_integer' },
  NOMINAL_SPEED_RPM: { number: 399, type: 'u_integer' },
  RAMP_UP_TIME: { number: 700, type: 'u_integer' },
  SPEED_SETPOINT: { number: 707, type: 'u_real' },
  POWER_SETPOINT: { number: 708, type: 'u_short_int' },
  STANDBY_SPEED: { number: 717, type: 'u_real' },
  PRESSURE: { number: 740, type: 'u_expo_new' },
  RS485_ADDRESS: { number: 797, type: 'u_integer' },
} as const;
