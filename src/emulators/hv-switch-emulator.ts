/**
 * HvSwitchEmulator: in-process stand-in for the HV switch vendor library
 *
 * Holds the pulser and switch registers and reports them back. The ENABLE
 * bit of the controller state follows the device enable; its low byte is
 * the last controller config written. Calls share the latency, recorder
 * and failure-injection behaviour of PsuEmulator.
 */

import { Logger } from 'pino';
import { getLogger } from '../logger';
import { CpuData, LedData } from '../drivers/library-codes';
import {
  HV_SWITCH_BURST_PULSER_COUNT,
  HV_SWITCH_CONFIG_MAX,
  HV_SWITCH_COUNT,
  HV_SWITCH_DELAY_MAX,
  HV_SWITCH_MAX_BURST,
  HV_SWITCH_MAX_PORT,
  HV_SWITCH_NO_ERR,
  HV_SWITCH_PULSER_COUNT,
  HvSwitchFanData,
  HvSwitchHousekeeping,
  HvSwitchLibrary,
  HvSwitchReply,
  HvSwitchSession,
  SwitchTriggerDelay,
} from '../drivers/hv-switch-library';
import { ExchangeRecorder } from './exchange-recorder';
import { EmulatorLogEntry, EmulatorOptions } from './device-emulator';

const ERR_PORT_RANGE = -1;
const ERR_OPEN = -2;
const ERR_ARGUMENT = -15;
const ERR_NOT_CONNECTED = -100;

const CTRL_ENABLE = 0x0100;
const CTRL_CLRN = 0x0400;

export interface HvSwitchEmulatorState {
  productNo: number;
  mainState: number;
  deviceState: number;
  housekeeping: HvSwitchHousekeeping;
  sensors: [number, number, number];
  fans: HvSwitchFanData[];
  led: LedData;
  cpu: CpuData;
  controllerConfig: number;
  deviceEnable: boolean;
  oscillatorPeriod: number;
  pulserDelay: number[];
  pulserWidth: number[];
  pulserBurst: number[];
  triggerConfig: number[];
  enableConfig: number[];
  triggerDelay: SwitchTriggerDelay[];
  enableDelay: number[];
  restarts: number;
  baudRate: number;
}

function inRange(value: number, count: number): boolean {
  return Number.isInteger(value) && value >= 0 && value < count;
}

function filled<T>(count: number, value: () => T): T[] {
  return Array.from({ length: count }, value);
}

function defaultRegisters() {
  return {
    controllerConfig: 0,
    oscillatorPeriod: 99998,
    pulserDelay: filled(HV_SWITCH_PULSER_COUNT, () => 0),
    pulserWidth: filled(HV_SWITCH_PULSER_COUNT, () => 0),
    pulserBurst: filled(HV_SWITCH_BURST_PULSER_COUNT, () => 0),
    triggerConfig: filled(HV_SWITCH_COUNT, () => 0),
    enableConfig: filled(HV_SWITCH_COUNT, () => 0),
    triggerDelay: filled(HV_SWITCH_COUNT, () => ({ rise: 0, fall: 0 })),
    enableDelay: filled(HV_SWITCH_COUNT, () => 0),
  };
}

export class HvSwitchEmulator implements HvSwitchLibrary {
  readonly name = 'HV switch';
  latencyMs: number;
  /** Call name → status code returned instead of success */
  readonly failures = new Map<keyof HvSwitchSession | 'openPort', number>();

  readonly state: HvSwitchEmulatorState = {
    productNo: 4104,
    mainState: 0,
    deviceState: 0,
    housekeeping: { volt12v: 12.02, volt5v0: 5.01, volt3v3: 3.3, tempCpu: 42.5 },
    sensors: [31.5, 30, 32.25],
    fans: [
      { enabled: true, failed: false, setRpm: 4000, measuredRpm: 3950, pwm: 500 },
      { enabled: true, failed: false, setRpm: 4000, measuredRpm: 4020, pwm: 500 },
      { enabled: false, failed: true, setRpm: 0, measuredRpm: 0, pwm: 0 },
    ],
    led: { red: false, green: true, blue: false },
    cpu: { load: 0.12, frequencyHz: 100e6 },
    deviceEnable: false,
    ...defaultRegisters(),
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

  get controllerState(): number {
    return CTRL_CLRN | (this.state.deviceEnable ? CTRL_ENABLE : 0) | this.state.controllerConfig;
  }

  async openPort(com: number): Promise<HvSwitchReply<HvSwitchSession | null>> {
    const status = await this.exchange('openPort', () => {
      if (!Number.isInteger(com) || com < 1 || com > HV_SWITCH_MAX_PORT) return ERR_PORT_RANGE;
      if (this.openCom !== null) return ERR_OPEN;
      this.openCom = com;
      return HV_SWITCH_NO_ERR;
    });
    if (status !== HV_SWITCH_NO_ERR) return { status, value: null };
    return { status, value: this.session() };
  }

  getLog(): EmulatorLogEntry[] {
    return [...this._log];
  }

  getState(): Record<string, unknown> {
    return { ...this.state, controllerState: this.controllerState, open: this.isOpen };
  }

  private session(): HvSwitchSession {
    const read = <T>(name: keyof HvSwitchSession, value: () => T): Promise<HvSwitchReply<T>> =>
      this.exchange(name, () => HV_SWITCH_NO_ERR).then((status) => ({ status, value: value() }));

    /** Read one register of an indexed bank; an index outside it is ERR_ARGUMENT */
    const readAt = <T>(name: keyof HvSwitchSession, bank: T[], index: number, fallback: T): Promise<HvSwitchReply<T>> =>
      this.exchange(name, () => (inRange(index, bank.length) ? HV_SWITCH_NO_ERR : ERR_ARGUMENT)).then((status) => ({
        status,
        value: status === HV_SWITCH_NO_ERR ? bank[index] : fallback,
      }));

    /** Write one register of an indexed bank after checking index and value */
    const writeAt = <T>(name: keyof HvSwitchSession, bank: T[], index: number, value: T, valid: boolean): Promise<number> =>
      this.exchange(name, () => {
        if (!inRange(index, bank.length) || !valid) return ERR_ARGUMENT;
        bank[index] = value;
        return HV_SWITCH_NO_ERR;
      });

    const s = this.state;
    const isDelay = (delay: number) => inRange(delay, HV_SWITCH_DELAY_MAX);
    const isConfig = (config: number) => inRange(config, HV_SWITCH_CONFIG_MAX);
    const isUint32 = (value: number) => inRange(value, 2 ** 32);

    return {
      setBaudRate: (baudRate) =>
        this.exchange('setBaudRate', () => {
          s.baudRate = baudRate;
          return HV_SWITCH_NO_ERR;
        }).then((status) => ({ status, value: s.baudRate })),
      getProductNo: () => read('getProductNo', () => s.productNo),
      getMainState: () => read('getMainState', () => s.mainState),
      getDeviceState: () => read('getDeviceState', () => s.deviceState),
      getHousekeeping: () => read('getHousekeeping', () => ({ ...s.housekeeping })),
      getSensorData: () => read('getSensorData', (): [number, number, number] => [...s.sensors]),
      getFanData: () => read('getFanData', () => s.fans.map((fan) => ({ ...fan }))),
      getLedData: () => read('getLedData', () => ({ ...s.led })),
      getCpuData: () => read('getCpuData', () => ({ ...s.cpu })),
      getControllerState: () => read('getControllerState', () => this.controllerState),
      setControllerConfig: (config) =>
        this.exchange('setControllerConfig', () => {
          if (!inRange(config, 0x100)) return ERR_ARGUMENT;
          s.controllerConfig = config;
          return HV_SWITCH_NO_ERR;
        }),
      getDeviceEnable: () => read('getDeviceEnable', () => s.deviceEnable),
      setDeviceEnable: (enable) =>
        this.exchange('setDeviceEnable', () => {
          s.deviceEnable = enable;
          return HV_SWITCH_NO_ERR;
        }),
      getOscillatorPeriod: () => read('getOscillatorPeriod', () => s.oscillatorPeriod),
      setOscillatorPeriod: (period) =>
        this.exchange('setOscillatorPeriod', () => {
          if (!isUint32(period)) return ERR_ARGUMENT;
          s.oscillatorPeriod = period;
          return HV_SWITCH_NO_ERR;
        }),
      getPulserDelay: (pulser) => readAt('getPulserDelay', s.pulserDelay, pulser, 0),
      setPulserDelay: (pulser, delay) => writeAt('setPulserDelay', s.pulserDelay, pulser, delay, isUint32(delay)),
      getPulserWidth: (pulser) => readAt('getPulserWidth', s.pulserWidth, pulser, 0),
      setPulserWidth: (pulser, width) => writeAt('setPulserWidth', s.pulserWidth, pulser, width, isUint32(width)),
      getPulserBurst: (pulser) => readAt('getPulserBurst', s.pulserBurst, pulser, 0),
      setPulserBurst: (pulser, burst) =>
        writeAt('setPulserBurst', s.pulserBurst, pulser, burst, inRange(burst, HV_SWITCH_MAX_BURST)),
      getSwitchTriggerConfig: (sw) => readAt('getSwitchTriggerConfig', s.triggerConfig, sw, 0),
      setSwitchTriggerConfig: (sw, config) =>
        writeAt('setSwitchTriggerConfig', s.triggerConfig, sw, config, isConfig(config)),
      getSwitchEnableConfig: (sw) => readAt('getSwitchEnableConfig', s.enableConfig, sw, 0),
      setSwitchEnableConfig: (sw, config) =>
        writeAt('setSwitchEnableConfig', s.enableConfig, sw, config, isConfig(config)),
      getSwitchTriggerDelay: (sw) =>
        readAt('getSwitchTriggerDelay', s.triggerDelay, sw, { rise: 0, fall: 0 }).then((reply) => ({
          status: reply.status,
          value: { ...reply.value },
        })),
      setSwitchTriggerDelay: (sw, rise, fall) =>
        writeAt('setSwitchTriggerDelay', s.triggerDelay, sw, { rise, fall }, isDelay(rise) && isDelay(fall)),
      getSwitchEnableDelay: (sw) => readAt('getSwitchEnableDelay', s.enableDelay, sw, 0),
      setSwitchEnableDelay: (sw, delay) => writeAt('setSwitchEnableDelay', s.enableDelay, sw, delay, isDelay(delay)),
      restart: () =>
        this.exchange('restart', () => {
          s.restarts++;
          Object.assign(s, defaultRegisters());
          s.deviceEnable = false;
          return HV_SWITCH_NO_ERR;
        }),
      closePort: () =>
        this.exchange('closePort', () => {
          this.openCom = null;
          return HV_SWITCH_NO_ERR;
        }),
    };
  }

  /** One library call: latency, recorder bookkeeping, failure injection */
  private async exchange(name: keyof HvSwitchSession | 'openPort', apply: () => number): Promise<number> {
    this.recorder?.begin(`hvswitch:${name}`);
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
