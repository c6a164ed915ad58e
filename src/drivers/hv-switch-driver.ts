/**
 * HV Switch Driver
 *
 * Four-channel high-voltage switch controller driven through its vendor
 * library. Pulser, switch and delay arguments are range-checked before
 * the library is touched.
 */

import { Reading } from '../housekeeping/types';
import { CpuData, LedData, hex16, ledName } from './library-codes';
import { LibraryChannel, LibraryDriverOptions, LibraryInstrumentDriver } from './library-instrument-driver';
import {
  HV_SWITCH_BURST_PULSER_COUNT,
  HV_SWITCH_CONFIG_MAX,
  HV_SWITCH_COUNT,
  HV_SWITCH_DELAY_MAX,
  HV_SWITCH_FAN_COUNT,
  HV_SWITCH_MAX_BURST,
  HV_SWITCH_MAX_PORT,
  HV_SWITCH_PULSER_COUNT,
  HvSwitchFanData,
  HvSwitchHousekeeping,
  HvSwitchLibrary,
  HvSwitchReply,
  HvSwitchSession,
  SwitchTriggerDelay,
  hvSwitchControllerStateNames,
  hvSwitchDeviceStateNames,
  hvSwitchStateName,
  hvSwitchStatusName,
  oscillatorFrequency,
} from './hv-switch-library';

export interface HvSwitchOptions extends LibraryDriverOptions {
  library: HvSwitchLibrary;
}

export interface HvSwitchState {
  code: number;
  name: string;
}

export interface HvSwitchFlags {
  code: number;
  flags: string[];
}

export interface OscillatorSetting {
  period: number;
  frequencyHz: number;
}

/** Full routing of one switch */
export interface SwitchSetting {
  triggerConfig: number;
  enableConfig: number;
  triggerDelay: SwitchTriggerDelay;
  enableDelay: number;
}

const UINT32_MAX = 2 ** 32 - 1;

function checkRange(what: string, value: number, min: number, max: number): number {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new RangeError(`${what} ${value} outside ${min}-${max}`);
  }
  return value;
}

const checkPulser = (pulser: number) => checkRange('Pulser', pulser, 0, HV_SWITCH_PULSER_COUNT - 1);
const checkBurstPulser = (pulser: number) => checkRange('Burst pulser', pulser, 0, HV_SWITCH_BURST_PULSER_COUNT - 1);
const checkSwitch = (switchNo: number) => checkRange('Switch', switchNo, 0, HV_SWITCH_COUNT - 1);
const checkDelay = (delay: number) => checkRange('Switch delay', delay, 0, HV_SWITCH_DELAY_MAX - 1);
const checkConfig = (config: number) => checkRange('Switch config', config, 0, HV_SWITCH_CONFIG_MAX - 1);

function configHex(config: number): string {
  return `0x${config.toString(16).toUpperCase().padStart(2, '0')}`;
}

export class HvSwitchDriver extends LibraryInstrumentDriver<HvSwitchSession> {
  readonly type = 'hv-switch';

  protected readonly maxPort = HV_SWITCH_MAX_PORT;
  private readonly library: HvSwitchLibrary;

  constructor(options: HvSwitchOptions) {
    super(options, 230400);
    this.library = options.library;
  }

  protected statusName(status: number): string {
    return hvSwitchStatusName(status);
  }

  protected openSession(com: number): Promise<HvSwitchReply<HvSwitchSession | null>> {
    return this.library.openPort(com);
  }

  protected async setSpeed(session: HvSwitchSession, baudRate: number): Promise<number> {
    const reply = await session.setBaudRate(baudRate);
    return reply.status;
  }

  // --- Controller reads ---

  readProductNo(): Promise<number> {
    return this.call('getProductNo', (s) => s.getProductNo());
  }

  async readMainState(): Promise<HvSwitchState> {
    const code = await this.call('getMainState', (s) => s.getMainState());
    return { code, name: hvSwitchStateName(code) };
  }

  async readDeviceState(): Promise<HvSwitchFlags> {
    const code = await this.call('getDeviceState', (s) => s.getDeviceState());
    return { code, flags: hvSwitchDeviceStateNames(code) };
  }

  readHousekeeping(): Promise<HvSwitchHousekeeping> {
    return this.call('getHousekeeping', (s) => s.getHousekeeping());
  }

  readSensorData(): Promise<[number, number, number]> {
    return this.call('getSensorData', (s) => s.getSensorData());
  }

  readFanData(): Promise<HvSwitchFanData[]> {
    return this.call('getFanData', (s) => s.getFanData());
  }

  readLedData(): Promise<LedData> {
    return this.call('getLedData', (s) => s.getLedData());
  }

  readCpuData(): Promise<CpuData> {
    return this.call('getCpuData', (s) => s.getCpuData());
  }

  async readControllerState(): Promise<HvSwitchFlags> {
    const code = await this.call('getControllerState', (s) => s.getControllerState());
    return { code, flags: hvSwitchControllerStateNames(code) };
  }

  readDeviceEnable(): Promise<boolean> {
    return this.call('getDeviceEnable', (s) => s.getDeviceEnable());
  }

  // --- Controller writes ---

  async setControllerConfig(config: number): Promise<void> {
    const byte = checkRange('Controller config', config, 0, 0xff);
    await this.command('setControllerConfig', (s) => s.setControllerConfig(byte));
    this.log.info({ config: hex16(byte) }, 'Controller config set');
  }

  async setDeviceEnable(enable: boolean): Promise<void> {
    await this.command('setDeviceEnable', (s) => s.setDeviceEnable(enable));
    this.log.info({ enable }, 'Device enable set');
  }

  async restart(): Promise<void> {
    await this.command('restart', (s) => s.restart());
    this.log.info('Controller restarted');
  }

  // --- Oscillator and pulsers ---

  async readOscillator(): Promise<OscillatorSetting> {
    const period = await this.call('getOscillatorPeriod', (s) => s.getOscillatorPeriod());
    return { period, frequencyHz: oscillatorFrequency(period) };
  }

  async setOscillatorPeriod(period: number): Promise<void> {
    const value = checkRange('Oscillator period', period, 0, UINT32_MAX);
    await this.command('setOscillatorPeriod', (s) => s.setOscillatorPeriod(value));
    this.log.info({ period: value, frequencyHz: oscillatorFrequency(value) }, 'Oscillator period set');
  }

  async readPulserDelay(pulser: number): Promise<number> {
    const p = checkPulser(pulser);
    return this.call('getPulserDelay', (s) => s.getPulserDelay(p));
  }

  async setPulserDelay(pulser: number, delay: number): Promise<void> {
    const p = checkPulser(pulser);
    const value = checkRange('Pulser delay', delay, 0, UINT32_MAX);
    await this.command('setPulserDelay', (s) => s.setPulserDelay(p, value));
    this.log.info({ pulser: p, delay: value }, 'Pulser delay set');
  }

  async readPulserWidth(pulser: number): Promise<number> {
    const p = checkPulser(pulser);
    return this.call('getPulserWidth', (s) => s.getPulserWidth(p));
  }

  async setPulserWidth(pulser: number, width: number): Promise<void> {
    const p = checkPulser(pulser);
    const value = checkRange('Pulser width', width, 0, UINT32_MAX);
    await this.command('setPulserWidth', (s) => s.setPulserWidth(p, value));
    this.log.info({ pulser: p, width: value }, 'Pulser width set');
  }

  async readPulserBurst(pulser: number): Promise<number> {
    const p = checkBurstPulser(pulser);
    return this.call('getPulserBurst', (s) => s.getPulserBurst(p));
  }

  async setPulserBurst(pulser: number, burst: number): Promise<void> {
    const p = checkBurstPulser(pulser);
    const value = checkRange('Pulser burst', burst, 0, HV_SWITCH_MAX_BURST - 1);
    await this.command('setPulserBurst', (s) => s.setPulserBurst(p, value));
    this.log.info({ pulser: p, burst: value }, 'Pulser burst set');
  }

  // --- Switches ---

  async setSwitchTriggerConfig(switchNo: number, config: number): Promise<void> {
    const sw = checkSwitch(switchNo);
    const value = checkConfig(config);
    await this.command('setSwitchTriggerConfig', (s) => s.setSwitchTriggerConfig(sw, value));
    this.log.info({ switch: sw, config: configHex(value) }, 'Switch trigger config set');
  }

  async setSwitchEnableConfig(switchNo: number, config: number): Promise<void> {
    const sw = checkSwitch(switchNo);
    const value = checkConfig(config);
    await this.command('setSwitchEnableConfig', (s) => s.setSwitchEnableConfig(sw, value));
    this.log.info({ switch: sw, config: configHex(value) }, 'Switch enable config set');
  }

  async setSwitchTriggerDelay(switchNo: number, rise: number, fall: number): Promise<void> {
    const sw = checkSwitch(switchNo);
    const r = checkDelay(rise);
    const f = checkDelay(fall);
    await this.command('setSwitchTriggerDelay', (s) => s.setSwitchTriggerDelay(sw, r, f));
    this.log.info({ switch: sw, rise: r, fall: f }, 'Switch trigger delay set');
  }

  async setSwitchEnableDelay(switchNo: number, delay: number): Promise<void> {
    const sw = checkSwitch(switchNo);
    const value = checkDelay(delay);
    await this.command('setSwitchEnableDelay', (s) => s.setSwitchEnableDelay(sw, value));
    this.log.info({ switch: sw, delay: value }, 'Switch enable delay set');
  }

  /** Trigger and enable routing of one switch, in one lock hold */
  async readSwitch(switchNo: number): Promise<SwitchSetting> {
    const sw = checkSwitch(switchNo);
    return this.withChannel('readSwitch', (channel) => this.switchSetting(channel.session, sw));
  }

  private async switchSetting(s: HvSwitchSession, sw: number): Promise<SwitchSetting> {
    return {
      triggerConfig: await this.invoke('getSwitchTriggerConfig', () => s.getSwitchTriggerConfig(sw)),
      enableConfig: await this.invoke('getSwitchEnableConfig', () => s.getSwitchEnableConfig(sw)),
      triggerDelay: await this.invoke('getSwitchTriggerDelay', () => s.getSwitchTriggerDelay(sw)),
      enableDelay: await this.invoke('getSwitchEnableDelay', () => s.getSwitchEnableDelay(sw)),
    };
  }

  // --- Monitor cycle ---

  protected async pollStatus(channel: LibraryChannel<HvSwitchSession>): Promise<Reading[]> {
    const s = channel.session;
    const productNo = await this.invoke('getProductNo', () => s.getProductNo());
    const state = await this.invoke('getMainState', () => s.getMainState());
    const device = await this.invoke('getDeviceState', () => s.getDeviceState());
    const hk = await this.invoke('getHousekeeping', () => s.getHousekeeping());
    const sensors = await this.invoke('getSensorData', () => s.getSensorData());
    const fans = await this.invoke('getFanData', () => s.getFanData());
    const led = await this.invoke('getLedData', () => s.getLedData());
    const controller = await this.invoke('getControllerState', () => s.getControllerState());
    const cpu = await this.invoke('getCpuData', () => s.getCpuData());
    const period = await this.invoke('getOscillatorPeriod', () => s.getOscillatorPeriod());

    const readings: Reading[] = [
      { measure: 'Product_No', value: productNo, unit: '' },
      { measure: 'Main_State', value: hvSwitchStateName(state), unit: '', alarm: state !== 0 },
      { measure: 'Dev_State', value: hvSwitchDeviceStateNames(device).join(','), unit: '', alarm: device !== 0 },
      { measure: 'Volt_12V', value: hk.volt12v, unit: 'V' },
      { measure: 'Volt_5V0', value: hk.volt5v0, unit: 'V' },
      { measure: 'Volt_3V3', value: hk.volt3v3, unit: 'V' },
      { measure: 'Temp_CPU', value: hk.tempCpu, unit: 'degC' },
    ];
    sensors.forEach((temp, i) => readings.push({ measure: `Temp_Sen${i + 1}`, value: temp, unit: 'degC' }));
    fans.slice(0, HV_SWITCH_FAN_COUNT).forEach((fan, i) =>
      readings.push({ measure: `Fan${i + 1}_RPM`, value: fan.measuredRpm, unit: 'rpm', alarm: fan.enabled && fan.failed }),
    );
    readings.push(
      { measure: 'LED', value: ledName(led), unit: '' },
      { measure: 'Ctrl_State', value: hvSwitchControllerStateNames(controller).join(',') || 'NONE', unit: '' },
      { measure: 'CPU_Load', value: cpu.load * 100, unit: '%' },
      { measure: 'CPU_Freq', value: cpu.frequencyHz / 1e6, unit: 'MHz' },
      { measure: 'Osc_Period', value: period, unit: '' },
      { measure: 'Osc_Freq', value: oscillatorFrequency(period), unit: 'Hz' },
    );

    for (let p = 0; p < HV_SWITCH_PULSER_COUNT; p++) {
      const delay = await this.invoke('getPulserDelay', () => s.getPulserDelay(p));
      const width = await this.invoke('getPulserWidth', () => s.getPulserWidth(p));
      readings.push(
        { measure: `Pulser${p}_Delay`, value: delay, unit: '' },
        { measure: `Pulser${p}_Width`, value: width, unit: '' },
      );
    }
    for (let p = 0; p < HV_SWITCH_BURST_PULSER_COUNT; p++) {
      const burst = await this.invoke('getPulserBurst', () => s.getPulserBurst(p));
      readings.push({ measure: `Pulser${p}_Burst`, value: burst, unit: '' });
    }
    for (let sw = 0; sw < HV_SWITCH_COUNT; sw++) {
      const setting = await this.switchSetting(s, sw);
      readings.push(
        { measure: `Switch${sw}_Trig_Cfg`, value: configHex(setting.triggerConfig), unit: '' },
        { measure: `Switch${sw}_Enb_Cfg`, value: configHex(setting.enableConfig), unit: '' },
        { measure: `Switch${sw}_Rise_Delay`, value: setting.triggerDelay.rise, unit: '' },
        { measure: `Switch${sw}_Fall_Delay`, value: setting.triggerDelay.fall, unit: '' },
        { measure: `Switch${sw}_Enb_Delay`, value: setting.enableDelay, unit: '' },
      );
    }
    return readings;
  }
}
