/**
 * PsuEmulator: in-process stand-in for the PSU vendor library
 *
 * One emulated controller behind openPort(). Each library call takes
 * latencyMs and is reported to the shared ExchangeRecorder, so overlapping
 * calls on a bus show up the same way they do for byte-stream emulators.
 * Any call can be made to fail by naming it in `failures`.
 */

import { Logger } from 'pino';
import { getLogger } from '../logger';
import {
  PSU_MAX_PORT,
  PSU_NO_ERR,
  PsuAdcHousekeeping,
  PsuData,
  PsuHousekeeping,
  PsuIndex,
  PsuLibrary,
  PsuReply,
  PsuSession,
  PsuSupplyHousekeeping,
} from '../drivers/psu-library';
import { ExchangeRecorder } from './exchange-recorder';
import { EmulatorLogEntry, EmulatorOptions } from './device-emulator';

const ERR_PORT_RANGE = -1;
const ERR_OPEN = -2;
const ERR_ARGUMENT = -15;
const ERR_NOT_CONNECTED = -100;

export const PSU_MAX_VOLTAGE = 4000;
export const PSU_MAX_CURRENT = 0.003;

export interface PsuEmulatorState {
  productNo: number;
  mainState: number;
  deviceState: number;
  housekeeping: PsuHousekeeping;
  sensors: [number, number, number];
  adc: [PsuAdcHousekeeping, PsuAdcHousekeeping];
  supply: [PsuSupplyHousekeeping, PsuSupplyHousekeeping];
  setVoltage: [number, number];
  setCurrent: [number, number];
  enabled: [boolean, boolean];
  baudRate: number;
}

export class PsuEmulator implements PsuLibrary {
  readonly name = 'PSU';
  latencyMs: number;
  /** Call name → status code returned instead of success */
  readonly failures = new Map<keyof PsuSession | 'openPort', number>();

  readonly state: PsuEmulatorState = {
    productNo: 2404,
    mainState: 0x0000,
    deviceState: 0,
    housekeeping: { voltRect: 24.1, volt5v0: 5.02, volt3v3: 3.31, tempCpu: 41.5 },
    sensors: [28.5, 26, 29.1],
    adc: [
      { voltAvdd: 5.01, voltDvdd: 3.3, voltAldo: 2.5, voltDldo: 1.8, voltRef: 2.048, tempAdc: 35.2 },
      { voltAvdd: 4.99, voltDvdd: 3.29, voltAldo: 2.5, voltDldo: 1.8, voltRef: 2.047, tempAdc: 34.8 },
    ],
    supply: [
      { volt24vp: 24.02, volt12vp: 12.01, volt12vn: -12.03, voltRef: 2.5 },
      { volt24vp: 23.98, volt12vp: 11.99, volt12vn: -11.98, voltRef: 2.5 },
    ],
    setVoltage: [0, 0],
    setCurrent: [0, 0],
    enabled: [false, false],
    baudRate: 230400,
  };

  private readonly recorder: ExchangeRecorder | null;
  private readonly emuLog: Logger;
  private openCom: number | null = null;
  private _log: EmulatorLogEntry[] = [];
  private readonly maxLogSize = 200;

  constructor(options: EmulatorOptions = {}) {
    this.latencyMs = options.latencyMs ?? 0;
    this.recorder = options.recorder ?? null;
    this.emuLog = getLogger('Emulator').child({ emulator: this.name });
  }

  get isOpen(): boolean {
    return this.openCom !== null;
  }

  async openPort(com: number): Promise<PsuReply<PsuSession | null>> {
    const status = await this.exchange('openPort', () => {
      if (!Number.isInteger(com) || com < 1 || com > PSU_MAX_PORT) return ERR_PORT_RANGE;
      if (this.openCom !== null) return ERR_OPEN;
      this.openCom = com;
      return PSU_NO_ERR;
    });
    if (status !== PSU_NO_ERR) return { status, value: null };
    return { status, value: this.session() };
  }

  getLog(): EmulatorLogEntry[] {
    return [...this._log];
  }

  getState(): Record<string, unknown> {
    return { ...this.state, open: this.isOpen };
  }

  /** Measured output of one supply: follows the set point while enabled */
  private psuData(psu: PsuIndex): PsuData {
    const on = this.state.enabled[psu];
    return {
      voltage: on ? this.state.setVoltage[psu] : 0,
      current: on ? this.state.setCurrent[psu] : 0,
      voltDropout: on ? 1.5 : 0,
    };
  }

  private session(): PsuSession {
    const read = <T>(name: keyof PsuSession, value: () => T): Promise<PsuReply<T>> =>
      this.exchange(name, () => PSU_NO_ERR).then((status) => ({ status, value: value() }));

    const checkPsu = (psu: number): boolean => psu === 0 || psu === 1;

    return {
      setComSpeed: (baudRate) =>
        this.exchange('setComSpeed', () => {
          this.state.baudRate = baudRate;
          return PSU_NO_ERR;
        }),
      getProductNo: () => read('getProductNo', () => this.state.productNo),
      getMainState: () => read('getMainState', () => this.state.mainState),
      getDeviceState: () => read('getDeviceState', () => this.state.deviceState),
      getHousekeeping: () => read('getHousekeeping', () => ({ ...this.state.housekeeping })),
      getSensorData: () => read('getSensorData', (): [number, number, number] => [...this.state.sensors]),
      getAdcHousekeeping: (psu) => read('getAdcHousekeeping', () => ({ ...this.state.adc[psu] })),
      getPsuHousekeeping: (psu) => read('getPsuHousekeeping', () => ({ ...this.state.supply[psu] })),
      getPsuData: (psu) => read('getPsuData', () => this.psuData(psu)),
      setPsuOutputVoltage: (psu, voltage) =>
        this.exchange('setPsuOutputVoltage', () => {
          if (!checkPsu(psu) || voltage < 0 || voltage > PSU_MAX_VOLTAGE) return ERR_ARGUMENT;
          this.state.setVoltage[psu] = voltage;
          return PSU_NO_ERR;
        }),
      getPsuOutputVoltage: (psu) => read('getPsuOutputVoltage', () => this.state.setVoltage[psu]),
      setPsuOutputCurrent: (psu, current) =>
        this.exchange('setPsuOutputCurrent', () => {
          if (!checkPsu(psu) || current < 0 || current > PSU_MAX_CURRENT) return ERR_ARGUMENT;
          this.state.setCurrent[psu] = current;
          return PSU_NO_ERR;
        }),
      getPsuOutputCurrent: (psu) => read('getPsuOutputCurrent', () => this.state.setCurrent[psu]),
      setPsuEnable: (psu0, psu1) =>
        this.exchange('setPsuEnable', () => {
          this.state.enabled = [psu0, psu1];
          return PSU_NO_ERR;
        }),
      getPsuEnable: () => read('getPsuEnable', (): [boolean, boolean] => [...this.state.enabled]),
      closePort: () =>
        this.exchange('closePort', () => {
          this.openCom = null;
          return PSU_NO_ERR;
        }),
    };
  }

  /** One library call: latency, recorder bookkeeping, failure injection */
  private async exchange(name: keyof PsuSession | 'openPort', apply: () => number): Promise<number> {
    this.recorder?.begin(`psu:${name}`);
    try {
      if (this.latencyMs > 0) {
        await new Promise<void>((resolve) => setTimeout(resolve, this.latencyMs));
      }
      const injected = this.failures.get(name);
      if (injected !== undefined) {
        this.log(name, `failing with status ${injected}`);
        return injected;
      }
      if (name !== 'openPort' && this.openCom === null) {
        return ERR_NOT_CONNECTED;
      }
      const status = apply();
      this.log(name, `status ${status}`);
      return status;
    } finally {
      this.recorder?.end();
    }
  }

  private log(action: string, details: string): void {
    this._log.push({ timestamp: Date.now(), action, details });
    if (this._log.length > this.maxLogSize) {
      this._log.shift();
    }
    this.emuLog.debug({ action }, details);
  }
}
