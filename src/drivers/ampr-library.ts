/**
 * AMPR amplifier crate: vendor library surface
 *
 * A controller with up to twelve plug-in amplifier modules (addresses 0-11),
 * each with four voltage channels. Like the PSU, it is driven through a
 * vendor library whose calls return a status code plus their outputs.
 */

import codes from './ampr-codes.json';
import {
  CodeTable,
  CpuData,
  LIBRARY_NO_ERR,
  LedData,
  LibraryReply,
  LibrarySession,
  codeName,
  flagNames,
  hex16,
} from './library-codes';

export const AMPR_NO_ERR = LIBRARY_NO_ERR;
export const AMPR_MAX_PORT = 255;
export const AMPR_MODULE_COUNT = 12;
export const AMPR_CHANNELS = [1, 2, 3, 4] as const;
export const AMPR_FAN_PWM_MAX = 10000;

export type AmprChannelNo = (typeof AMPR_CHANNELS)[number];
export type AmprReply<T> = LibraryReply<T>;

export const AMPR_STATE_ON = 0;
export const AMPR_STATE_STANDBY = 2;

/** Device-state bits that report a failure (everything but DS_PSU_ENB) */
export const AMPR_DEVICE_FAILURE_MASK = 0x7f00;

export interface AmprHousekeeping {
  volt12v: number;
  volt5v0: number;
  volt3v3: number;
  voltAgnd: number;
  volt12vp: number;
  volt12vn: number;
  voltHvp: number;
  voltHvn: number;
  tempCpu: number;
  tempAdc: number;
  tempAv: number;
  tempHvp: number;
  tempHvn: number;
  lineFreq: number;
}

export interface AmprFanData {
  failed: boolean;
  maxRpm: number;
  setRpm: number;
  measuredRpm: number;
  /** 0..AMPR_FAN_PWM_MAX */
  pwm: number;
}

export type AmprLedData = LedData;
export type AmprCpuData = CpuData;

/** Presence code per module slot */
export type ModulePresence = 'absent' | 'present' | 'invalid';

export interface AmprModulePresence {
  valid: boolean;
  maxModule: number;
  /** One entry per address 0..AMPR_MODULE_COUNT */
  slots: ModulePresence[];
}

export interface AmprModuleHousekeeping {
  volt24vp: number;
  volt24vn: number;
  volt12vp: number;
  volt12vn: number;
  volt5v0: number;
  volt3v3: number;
  tempPsu: number;
  tempBoard: number;
  voltRef: number;
}

/** One open port on the library */
export interface AmprSession extends LibrarySession {
  /** Resolves with the baud rate the controller actually took */
  setBaudRate(baudRate: number): Promise<AmprReply<number>>;
  getProductNo(): Promise<AmprReply<number>>;
  getState(): Promise<AmprReply<number>>;
  getDeviceState(): Promise<AmprReply<number>>;
  getHousekeeping(): Promise<AmprReply<AmprHousekeeping>>;
  getVoltageState(): Promise<AmprReply<number>>;
  getTemperatureState(): Promise<AmprReply<number>>;
  getInterlockState(): Promise<AmprReply<number>>;
  getFanData(): Promise<AmprReply<AmprFanData>>;
  getLedData(): Promise<AmprReply<AmprLedData>>;
  getCpuData(): Promise<AmprReply<AmprCpuData>>;
  getModulePresence(): Promise<AmprReply<AmprModulePresence>>;
  /** Resolves with the enable bit as the controller now reports it */
  enablePsu(enable: boolean): Promise<AmprReply<boolean>>;
  restart(): Promise<number>;
  getModuleState(address: number): Promise<AmprReply<number>>;
  getModuleHousekeeping(address: number): Promise<AmprReply<AmprModuleHousekeeping>>;
  setModuleVoltage(address: number, channel: AmprChannelNo, voltage: number): Promise<number>;
  getModuleVoltageSetpoint(address: number, channel: AmprChannelNo): Promise<AmprReply<number>>;
  getModuleVoltageMeasured(address: number, channel: AmprChannelNo): Promise<AmprReply<number>>;
}

export interface AmprLibrary {
  /** Open COM port `com` (1..255) */
  openPort(com: number): Promise<AmprReply<AmprSession | null>>;
}

const statusNames: CodeTable = codes.status;
const mainStateNames: CodeTable = codes.mainState;
const deviceStateBits: CodeTable = codes.deviceStateBits;
const voltageStateBits: CodeTable = codes.voltageStateBits;
const temperatureStateBits: CodeTable = codes.temperatureStateBits;
const interlockStateBits: CodeTable = codes.interlockStateBits;

export function amprStatusName(status: number): string {
  return codeName(statusNames, status, (code) => `ERR_UNKNOWN(${code})`);
}

export function amprStateName(state: number): string {
  return codeName(mainStateNames, state, (code) => `ST_UNKNOWN(${hex16(code)})`);
}

/** Set device-state flags; ["DEVICE_OK"] when none are set */
export function amprDeviceStateNames(state: number): string[] {
  const names = flagNames(deviceStateBits, state);
  return names.length > 0 ? names : ['DEVICE_OK'];
}

export function amprVoltageStateNames(state: number): string[] {
  return flagNames(voltageStateBits, state);
}

export function amprTemperatureStateNames(state: number): string[] {
  return flagNames(temperatureStateBits, state);
}

export function amprInterlockStateNames(state: number): string[] {
  return flagNames(interlockStateBits, state);
}

export function isAmprChannel(channel: number): channel is AmprChannelNo {
  return AMPR_CHANNELS.some((c) => c === channel);
}
