/**
 * Dual high-voltage PSU controller: vendor library surface
 *
 * The controller is driven through a vendor library rather than a byte
 * stream. Every call returns a status code (0 = success, negative = error)
 * plus its outputs. The library is injected into the driver; binding it to
 * the vendor's shared object is the host application's business.
 */

import codes from './psu-codes.json';
import {
  CodeTable,
  LIBRARY_NO_ERR,
  LibraryReply,
  LibrarySession,
  codeName,
  flagNames,
  hex16,
} from './library-codes';

export const PSU_NO_ERR = LIBRARY_NO_ERR;

/** Positive (0) and negative (1) supply */
export type PsuIndex = 0 | 1;
export const PSU_POS: PsuIndex = 0;
export const PSU_NEG: PsuIndex = 1;

export type PsuReply<T> = LibraryReply<T>;

export interface PsuHousekeeping {
  voltRect: number;
  volt5v0: number;
  volt3v3: number;
  tempCpu: number;
}

/** Converter rails and temperature of one supply's ADC */
export interface PsuAdcHousekeeping {
  voltAvdd: number;
  voltDvdd: number;
  voltAldo: number;
  voltDldo: number;
  voltRef: number;
  tempAdc: number;
}

/** Auxiliary rails of one supply */
export interface PsuSupplyHousekeeping {
  volt24vp: number;
  volt12vp: number;
  volt12vn: number;
  voltRef: number;
}

export interface PsuData {
  voltage: number;
  current: number;
  voltDropout: number;
}

/** One open port on the library */
export interface PsuSession extends LibrarySession {
  setComSpeed(baudRate: number): Promise<number>;
  getProductNo(): Promise<PsuReply<number>>;
  getMainState(): Promise<PsuReply<number>>;
  getDeviceState(): Promise<PsuReply<number>>;
  getHousekeeping(): Promise<PsuReply<PsuHousekeeping>>;
  /** Temperatures of the three sensors (negative PSU, middle, positive PSU) */
  getSensorData(): Promise<PsuReply<[number, number, number]>>;
  getAdcHousekeeping(psu: PsuIndex): Promise<PsuReply<PsuAdcHousekeeping>>;
  getPsuHousekeeping(psu: PsuIndex): Promise<PsuReply<PsuSupplyHousekeeping>>;
  getPsuData(psu: PsuIndex): Promise<PsuReply<PsuData>>;
  setPsuOutputVoltage(psu: PsuIndex, voltage: number): Promise<number>;
  getPsuOutputVoltage(psu: PsuIndex): Promise<PsuReply<number>>;
  setPsuOutputCurrent(psu: PsuIndex, current: number): Promise<number>;
  getPsuOutputCurrent(psu: PsuIndex): Promise<PsuReply<number>>;
  setPsuEnable(psu0: boolean, psu1: boolean): Promise<number>;
  getPsuEnable(): Promise<PsuReply<[boolean, boolean]>>;
}

export interface PsuLibrary {
  /** Open COM port `com` (1..16) */
  openPort(com: number): Promise<PsuReply<PsuSession | null>>;
}

export const PSU_MAX_PORT = 16;

const statusNames: CodeTable = codes.status;
const mainStateNames: CodeTable = codes.mainState;
const deviceStateBits: CodeTable = codes.deviceStateBits;

export function statusName(status: number): string {
  return codeName(statusNames, status, (code) => `ERR_UNKNOWN(${code})`);
}

export function mainStateName(state: number): string {
  return codeName(mainStateNames, state, (code) => `STATE_UNKNOWN(${hex16(code)})`);
}

/** Names of the set device-state flags; ["DEVST_OK"] when none are set */
export function deviceStateNames(state: number): string[] {
  const names = flagNames(deviceStateBits, state);
  return names.length > 0 ? names : ['DEVST_OK'];
}
