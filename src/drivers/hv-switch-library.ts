/**
 * HV switch controller: vendor library surface
 *
 * A four-channel high-voltage switch with an internal oscillator, four
 * pulsers (the first two with burst counters) and per-switch trigger and
 * enable routing. Calls return a status code plus their outputs, as for
 * the PSU and AMPR.
 */

import codes from './hv-switch-codes.json';
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

export const HV_SWITCH_NO_ERR = LIBRARY_NO_ERR;
export const HV_SWITCH_MAX_PORT = 16;

/** FPGA clock, Hz */
export const HV_SWITCH_CLOCK = 100e6;
export const HV_SWITCH_OSC_OFFSET = 2;

export const HV_SWITCH_PULSER_COUNT = 4;
export const HV_SWITCH_BURST_PULSER_COUNT = 2;
export const HV_SWITCH_MAX_BURST = 2 ** 24;
export const HV_SWITCH_COUNT = 4;
/** Switch delays are 4-bit */
export const HV_SWITCH_DELAY_MAX = 16;
/** Switch trigger and enable configs are 6-bit */
export const HV_SWITCH_CONFIG_MAX = 64;
export const HV_SWITCH_FAN_COUNT = 3;
export const HV_SWITCH_FAN_PWM_MAX = 1000;

export type HvSwitchReply<T> = LibraryReply<T>;

export interface HvSwitchHousekeeping {
  volt12v: number;
  volt5v0: number;
  volt3v3: number;
  tempCpu: number;
}

export interface HvSwitchFanData {
  enabled: boolean;
  failed: boolean;
  setRpm: number;
  measuredRpm: number;
  /** 0..HV_SWITCH_FAN_PWM_MAX */
  pwm: number;
}

export interface SwitchTriggerDelay {
  rise: number;
  fall: number;
}

/** One open port on the library */
export interface HvSwitchSession extends LibrarySession {
  /** Resolves with the baud rate the controller actually took */
  setBaudRate(baudRate: number): Promise<HvSwitchReply<number>>;
  getProductNo(): Promise<HvSwitchReply<number>>;
  getMainState(): Promise<HvSwitchReply<number>>;
  getDeviceState(): Promise<HvSwitchReply<number>>;
  getHousekeeping(): Promise<HvSwitchReply<HvSwitchHousekeeping>>;
  getSensorData(): Promise<HvSwitchReply<[number, number, number]>>;
  /** One entry per fan */
  getFanData(): Promise<HvSwitchReply<HvSwitchFanData[]>>;
  getLedData(): Promise<HvSwitchReply<LedData>>;
  getCpuData(): Promise<HvSwitchReply<CpuData>>;
  getControllerState(): Promise<HvSwitchReply<number>>;
  /** Lower eight bits of the controller state */
  setControllerConfig(config: number): Promise<number>;
  getDeviceEnable(): Promise<HvSwitchReply<boolean>>;
  setDeviceEnable(enable: boolean): Promise<number>;
  getOscillatorPeriod(): Promise<HvSwitchReply<number>>;
  setOscillatorPeriod(period: number): Promise<number>;
  getPulserDelay(pulser: number): Promise<HvSwitchReply<number>>;
  setPulserDelay(pulser: number, delay: number): Promise<number>;
  getPulserWidth(pulser: number): Promise<HvSwitchReply<number>>;
  setPulserWidth(pulser: number, width: number): Promise<number>;
  getPulserBurst(pulser: number): Promise<HvSwitchReply<number>>;
  setPulserBurst(pulser: number, burst: number): Promise<number>;
  getSwitchTriggerConfig(switchNo: number): Promise<HvSwitchReply<number>>;
  setSwitchTriggerConfig(switchNo: number, config: number): Promise<number>;
  getSwitchEnableConfig(switchNo: number): Promise<HvSwitchReply<number>>;
  setSwitchEnableConfig(switchNo: number, config: number): Promise<number>;
  getSwitchTriggerDelay(switchNo: number): Promise<HvSwitchReply<SwitchTriggerDelay>>;
  setSwitchTriggerDelay(switchNo: number, rise: number, fall: number): Promise<number>;
  getSwitchEnableDelay(switchNo: number): Promise<HvSwitchReply<number>>;
  setSwitchEnableDelay(switchNo: number, delay: number): Promise<number>;
  restart(): Promise<number>;
}

export interface HvSwitchLibrary {
  /** Open COM port `com` (1..16) */
  openPort(com: number): Promise<HvSwitchReply<HvSwitchSession | null>>;
}

const statusNames: CodeTable = codes.status;
const mainStateNames: CodeTable = codes.mainState;
const deviceStateBits: CodeTable = codes.deviceStateBits;
const controllerStateBits: CodeTable = codes.controllerStateBits;

export function hvSwitchStatusName(status: number): string {
  return codeName(statusNames, status, (code) => `ERR_UNKNOWN(${code})`);
}

export function hvSwitchStateName(state: number): string {
  return codeName(mainStateNames, state, (code) => `STATE_UNKNOWN(${hex16(code)})`);
}

/** Set device-state flags; ["DEVST_OK"] when none are set */
export function hvSwitchDeviceStateNames(state: number): string[] {
  const names = flagNames(deviceStateBits, state);
  return names.length > 0 ? names : ['DEVST_OK'];
}

export function hvSwitchControllerStateNames(state: number): string[] {
  return flagNames(controllerStateBits, state);
}

/** Oscillator frequency in Hz for a period register value; 0 when stopped */
export function oscillatorFrequency(period: number): number {
  return period > 0 ? HV_SWITCH_CLOCK / (period + HV_SWITCH_OSC_OFFSET) : 0;
}
