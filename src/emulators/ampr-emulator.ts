/**
 * AmprEmulator: in-process stand-in for the AMPR vendor library
 *
 * One crate controller with plug-in modules. Module outputs follow their
 * set points while the module supplies are enabled. Calls share the
 * latency, recorder and failure-injection behaviour of PsuEmulator.
 */

import { Logger } from 'pino';
import { getLogger } from '../logger';
import {
  AMPR_MAX_PORT,
  AMPR_MODULE_COUNT,
  AMPR_NO_ERR,
  AMPR_STATE_ON,
  AMPR_STATE_STANDBY,
  AmprCpuData,
  AmprFanData,
  AmprHousekeeping,
  AmprLedData,
  AmprLibrary,
  AmprModuleHousekeeping,
  AmprModulePresence,
  AmprReply,
  AmprSession,
  ModulePresence,
  isAmprChannel,
} from '../drivers/ampr-library';
import { ExchangeRecorder } from './exchange-recorder';
import { EmulatorLogEntry, EmulatorOptions } from './device-emulator';

const ERR_PORT_RANGE = -1;
const ERR_OPEN = -2;
const ERR_ARGUMENT = -15;
const ERR_NOT_CONNECTED = -100;

const DS_PSU_ENB = 0x0001;

export const AMPR_MODULE_MAX_VOLTAGE = 500;

export interface AmprModuleState {
  state: number;
  housekeeping: AmprModuleHousekeeping;
  /** Set points of channels 1-4 */
  setpoints: [number, number, number, number];
}

export interface AmprEmulatorState {
  productNo: number;
  mainState: number;
  deviceState: number;
  housekeeping: AmprHousekeeping;
  voltageState: number;
  temperatureState: number;
  interlockState: number;
  fan: AmprFanData;
  led: AmprLedData;
  cpu: AmprCpuData;
  /** Plugged-in modules by address; an invalid slot holds 'invalid' */
  modules: Map<number, AmprModuleState | 'invalid'>;
  restarts: number;
  baudRate: number;
}

function moduleState(): AmprModuleState {
  return {
    state: 0,
    housekeeping: {
      volt24vp: 24.1,
      volt24vn: -24.05,
      volt12vp: 12,
      volt12vn: -12,
      volt5v0: 5,
      volt3v3: 3.3,
      tempPsu: 35,
      tempBoard: 33.5,
      voltRef: 2.5,
    },
    setpoints: [0, 0, 0, 0],
  };
}

export class AmprEmulator implements AmprLibrary {
  readonly name = 'AMPR';
  latencyMs: number;
  /** Call name → status code returned instead of success */
  readonly failures = new Map<keyof AmprSession | 'openPort', number>();

  readonly state: AmprEmulatorState = {
    productNo: 3100,
    mainState: AMPR_STATE_ON,
    deviceState: DS_PSU_ENB,
    housekeeping: {
      volt12v: 12.05,
      volt5v0: 5.01,
      volt3v3: 3.3,
      voltAgnd: 0.002,
      volt12vp: 12.1,
      volt12vn: -12.08,
      voltHvp: 101.5,
      voltHvn: -101.2,
      tempCpu: 45.5,
      tempAdc: 38,
      tempAv: 36.5,
      tempHvp: 40.25,
      tempHvn: 39.75,
      lineFreq: 50,
    },
    voltageState: 0x00ff,
    temperatureState: 0,
    interlockState: 0,
    fan: { failed: false, maxRpm: 6000, setRpm: 3000, measuredRpm: 2980, pwm: 4500 },
    led: { red: false, green: true, blue: false },
    cpu: { load: 0.25, frequencyHz: 48e6 },
    modules: new Map([
      [0, moduleState()],
      [1, moduleState()],
    ]),
    restarts: 0,
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

  get psuEnabled(): boolean {
    return (this.state.deviceState & DS_PSU_ENB) !== 0;
  }

  async openPort(com: number): Promise<AmprReply<AmprSession | null>> {
    const status = await this.exchange('openPort', () => {
      if (!Number.isInteger(com) || com < 1 || com > AMPR_MAX_PORT) return ERR_PORT_RANGE;
      if (this.openCom !== null) return ERR_OPEN;
      this.openCom = com;
      return AMPR_NO_ERR;
    });
    if (status !== AMPR_NO_ERR) return { status, value: null };
    return { status, value: this.session() };
  }

  getLog(): EmulatorLogEntry[] {
    return [...this._log];
  }

  getState(): Record<string, unknown> {
    return { ...this.state, modules: [...this.state.modules.keys()], open: this.isOpen };
  }

  private presence(): AmprModulePresence {
    const slots: ModulePresence[] = [];
    for (let address = 0; address < AMPR_MODULE_COUNT; address++) {
      const entry = this.state.modules.get(address);
      slots.push(entry === undefined ? 'absent' : entry === 'invalid' ? 'invalid' : 'present');
    }
    const maxModule = slots.reduce((max, slot, address) => (slot === 'absent' ? max : address), -1);
    return { valid: true, maxModule, slots };
  }

  private module(address: number): AmprModuleState | null {
    const entry = this.state.modules.get(address);
    return entry === undefined || entry === 'invalid' ? null : entry;
  }

  private setEnable(enable: boolean): void {
    this.state.deviceState = enable ? this.state.deviceState | DS_PSU_ENB : this.state.deviceState & ~DS_PSU_ENB;
    this.state.mainState = enable ? AMPR_STATE_ON : AMPR_STATE_STANDBY;
  }

  private session(): AmprSession {
    const read = <T>(name: keyof AmprSession, value: () => T): Promise<AmprReply<T>> =>
      this.exchange(name, () => AMPR_NO_ERR).then((status) => ({ status, value: value() }));

    /** Read from one module; an empty or invalid slot is ERR_ARGUMENT */
    const readModule = <T>(
      name: keyof AmprSession,
      address: number,
      value: (slot: AmprModuleState) => T,
      fallback: T,
    ): Promise<AmprReply<T>> =>
      this.exchange(name, () => (this.module(address) === null ? ERR_ARGUMENT : AMPR_NO_ERR)).then((status) => {
        const slot = this.module(address);
        return { status, value: status === AMPR_NO_ERR && slot !== null ? value(slot) : fallback };
      });

    return {
      setBaudRate: (baudRate) =>
        this.exchange('setBaudRate', () => {
          this.state.baudRate = baudRate;
          return AMPR_NO_ERR;
        }).then((status) => ({ status, value: this.state.baudRate })),
      getProductNo: () => read('getProductNo', () => this.state.productNo),
      getState: () => read('getState', () => this.state.mainState),
      getDeviceState: () => read('getDeviceState', () => this.state.deviceState),
      getHousekeeping: () => read('getHousekeeping', () => ({ ...this.state.housekeeping })),
      getVoltageState: () => read('getVoltageState', () => this.state.voltageState),
      getTemperatureState: () => read('getTemperatureState', () => this.state.temperatureState),
      getInterlockState: () => read('getInterlockState', () => this.state.interlockState),
      getFanData: () => read('getFanData', () => ({ ...this.state.fan })),
      getLedData: () => read('getLedData', () => ({ ...this.state.led })),
      getCpuData: () => read('getCpuData', () => ({ ...this.state.cpu })),
      getModulePresence: () => read('getModulePresence', () => this.presence()),
      enablePsu: (enable) =>
        this.exchange('enablePsu', () => {
          this.setEnable(enable);
          return AMPR_NO_ERR;
        }).then((status) => ({ status, value: this.psuEnabled })),
      restart: () =>
        this.exchange('restart', () => {
          this.state.restarts++;
          for (const slot of this.state.modules.values()) {
            if (slot !== 'invalid') slot.setpoints = [0, 0, 0, 0];
          }
          this.setEnable(false);
          return AMPR_NO_ERR;
        }),
      getModuleState: (address) => readModule('getModuleState', address, (m) => m.state, 0),
      getModuleHousekeeping: (address) =>
        readModule('getModuleHousekeeping', address, (m) => ({ ...m.housekeeping }), moduleState().housekeeping),
      setModuleVoltage: (address, channel, voltage) =>
        this.exchange('setModuleVoltage', () => {
          const slot = this.module(address);
          if (slot === null || !isAmprChannel(channel) || Math.abs(voltage) > AMPR_MODULE_MAX_VOLTAGE) {
            return ERR_ARGUMENT;
          }
          slot.setpoints[channel - 1] = voltage;
          return AMPR_NO_ERR;
        }),
      getModuleVoltageSetpoint: (address, channel) =>
        readModule('getModuleVoltageSetpoint', address, (m) => m.setpoints[channel - 1], 0),
      getModuleVoltageMeasured: (address, channel) =>
        readModule('getModuleVoltageMeasured', address, (m) => (this.psuEnabled ? m.setpoints[channel - 1] : 0), 0),
      closePort: () =>
        this.exchange('closePort', () => {
          this.openCom = null;
          return AMPR_NO_ERR;
        }),
    };
  }

  /** One library call: latency, recorder bookkeeping, failure injection */
  private async exchange(name: keyof AmprSession | 'openPort', apply: () => number): Promise<number> {
    this.recorder?.begin(`ampr:${name}`);
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
