/**
 * AMPR Driver
 *
 * Amplifier crate controller driven through its vendor library. Module
 * calls take an address (0-11) and a channel (1-4); both are checked before
 * the library is touched.
 */

import { Reading } from '../housekeeping/types';
import { ledName } from './library-codes';
import { LibraryChannel, LibraryDriverOptions, LibraryInstrumentDriver } from './library-instrument-driver';
import {
  AMPR_CHANNELS,
  AMPR_DEVICE_FAILURE_MASK,
  AMPR_FAN_PWM_MAX,
  AMPR_MAX_PORT,
  AMPR_MODULE_COUNT,
  AMPR_STATE_ON,
  AMPR_STATE_STANDBY,
  AmprChannelNo,
  AmprCpuData,
  AmprFanData,
  AmprHousekeeping,
  AmprLedData,
  AmprLibrary,
  AmprModuleHousekeeping,
  AmprModulePresence,
  AmprReply,
  AmprSession,
  amprDeviceStateNames,
  amprInterlockStateNames,
  amprStateName,
  amprStatusName,
  amprTemperatureStateNames,
  amprVoltageStateNames,
  isAmprChannel,
} from './ampr-library';

export interface AmprOptions extends LibraryDriverOptions {
  library: AmprLibrary;
}

export interface AmprState {
  code: number;
  name: string;
}

export interface AmprFlags {
  code: number;
  flags: string[];
}

export interface AmprChannelVoltage {
  channel: AmprChannelNo;
  setpoint: number;
  measured: number;
}

function checkAddress(address: number): number {
  if (!Number.isInteger(address) || address < 0 || address >= AMPR_MODULE_COUNT) {
    throw new RangeError(`Module address ${address} outside 0-${AMPR_MODULE_COUNT - 1}`);
  }
  return address;
}

function checkChannel(channel: number): AmprChannelNo {
  if (!isAmprChannel(channel)) {
    throw new RangeError(`Channel ${channel} outside 1-${AMPR_CHANNELS.length}`);
  }
  return channel;
}

function isRunning(state: number): boolean {
  return state === AMPR_STATE_ON || state === AMPR_STATE_STANDBY;
}

function presentModules(presence: AmprModulePresence): string {
  const present = presence.slots.flatMap((slot, address) => (slot === 'present' ? [String(address)] : []));
  return present.length > 0 ? present.join(',') : 'none';
}

export class AmprDriver extends LibraryInstrumentDriver<AmprSession> {
  readonly type = 'ampr';

  protected readonly maxPort = AMPR_MAX_PORT;
  private readonly library: AmprLibrary;

  constructor(options: AmprOptions) {
    super(options, 230400);
    this.library = options.library;
  }

  protected statusName(status: number): string {
    return amprStatusName(status);
  }

  protected openSession(com: number): Promise<AmprReply<AmprSession | null>> {
    return this.library.openPort(com);
  }

  protected async setSpeed(session: AmprSession, baudRate: number): Promise<number> {
    const reply = await session.setBaudRate(baudRate);
    return reply.status;
  }

  // --- Controller reads ---

  readProductNo(): Promise<number> {
    return this.call('getProductNo', (s) => s.getProductNo());
  }

  async readState(): Promise<AmprState> {
    const code = await this.call('getState', (s) => s.getState());
    return { code, name: amprStateName(code) };
  }

  async readDeviceState(): Promise<AmprFlags> {
    const code = await this.call('getDeviceState', (s) => s.getDeviceState());
    return { code, flags: amprDeviceStateNames(code) };
  }

  readHousekeeping(): Promise<AmprHousekeeping> {
    return this.call('getHousekeeping', (s) => s.getHousekeeping());
  }

  async readVoltageState(): Promise<AmprFlags> {
    const code = await this.call('getVoltageState', (s) => s.getVoltageState());
    return { code, flags: amprVoltageStateNames(code) };
  }

  async readTemperatureState(): Promise<AmprFlags> {
    const code = await this.call('getTemperatureState', (s) => s.getTemperatureState());
    return { code, flags: amprTemperatureStateNames(code) };
  }

  async readInterlockState(): Promise<AmprFlags> {
    const code = await this.call('getInterlockState', (s) => s.getInterlockState());
    return { code, flags: amprInterlockStateNames(code) };
  }

  readFanData(): Promise<AmprFanData> {
    return this.call('getFanData', (s) => s.getFanData());
  }

  readLedData(): Promise<AmprLedData> {
    return this.call('getLedData', (s) => s.getLedData());
  }

  readCpuData(): Promise<AmprCpuData> {
    return this.call('getCpuData', (s) => s.getCpuData());
  }

  readModulePresence(): Promise<AmprModulePresence> {
    return this.call('getModulePresence', (s) => s.getModulePresence());
  }

  // --- Controller writes ---

  /** Switch the module supplies; resolves with the enable bit the controller reports back */
  async enablePsu(enable: boolean): Promise<boolean> {
    const enabled = await this.call('enablePsu', (s) => s.enablePsu(enable));
    this.log.info({ enable, enabled }, 'Module supplies switched');
    return enabled;
  }

  async restart(): Promise<void> {
    await this.command('restart', (s) => s.restart());
    this.log.info('Controller restarted');
  }

  // --- Modules ---

  async readModuleState(address: number): Promise<number> {
    const addr = checkAddress(address);
    return this.call('getModuleState', (s) => s.getModuleState(addr));
  }

  async readModuleHousekeeping(address: number): Promise<AmprModuleHousekeeping> {
    const addr = checkAddress(address);
    return this.call('getModuleHousekeeping', (s) => s.getModuleHousekeeping(addr));
  }

  async setModuleVoltage(address: number, channel: number, voltage: number): Promise<void> {
    const addr = checkAddress(address);
    const ch = checkChannel(channel);
    await this.command('setModuleVoltage', (s) => s.setModuleVoltage(addr, ch, voltage));
    this.log.info({ address: addr, channel: ch, voltage }, 'Module voltage set');
  }

  async readModuleVoltageSetpoint(address: number, channel: number): Promise<number> {
    const addr = checkAddress(address);
    const ch = checkChannel(channel);
    return this.call('getModuleVoltageSetpoint', (s) => s.getModuleVoltageSetpoint(addr, ch));
  }

  async readModuleVoltageMeasured(address: number, channel: number): Promise<number> {
    const addr = checkAddress(address);
    const ch = checkChannel(channel);
    return this.call('getModuleVoltageMeasured', (s) => s.getModuleVoltageMeasured(addr, ch));
  }

  /** Set point and measurement of all four channels of one module, in one lock hold */
  async readModuleVoltages(address: number): Promise<AmprChannelVoltage[]> {
    const addr = checkAddress(address);
    return this.withChannel('readModuleVoltages', async (channel) => {
      const s = channel.session;
      const voltages: AmprChannelVoltage[] = [];
      for (const ch of AMPR_CHANNELS) {
        const setpoint = await this.invoke('getModuleVoltageSetpoint', () => s.getModuleVoltageSetpoint(addr, ch));
        const measured = await this.invoke('getModuleVoltageMeasured', () => s.getModuleVoltageMeasured(addr, ch));
        voltages.push({ channel: ch, setpoint, measured });
      }
      return voltages;
    });
  }

  // --- Monitor cycle ---

  protected async pollStatus(channel: LibraryChannel<AmprSession>): Promise<Reading[]> {
    const s = channel.session;
    const productNo = await this.invoke('getProductNo', () => s.getProductNo());
    const state = await this.invoke('getState', () => s.getState());
    const device = await this.invoke('getDeviceState', () => s.getDeviceState());
    const hk = await this.invoke('getHousekeeping', () => s.getHousekeeping());
    const voltState = await this.invoke('getVoltageState', () => s.getVoltageState());
    const tempState = await this.invoke('getTemperatureState', () => s.getTemperatureState());
    const ilockState = await this.invoke('getInterlockState', () => s.getInterlockState());
    const fan = await this.invoke('getFanData', () => s.getFanData());
    const led = await this.invoke('getLedData', () => s.getLedData());
    const cpu = await this.invoke('getCpuData', () => s.getCpuData());
    const presence = await this.invoke('getModulePresence', () => s.getModulePresence());

    return [
      { measure: 'Product_No', value: productNo, unit: '' },
      { measure: 'Main_State', value: amprStateName(state), unit: '', alarm: !isRunning(state) },
      {
        measure: 'Dev_State',
        value: amprDeviceStateNames(device).join(','),
        unit: '',
        alarm: (device & AMPR_DEVICE_FAILURE_MASK) !== 0,
      },
      { measure: 'Volt_12V', value: hk.volt12v, unit: 'V' },
      { measure: 'Volt_5V0', value: hk.volt5v0, unit: 'V' },
      { measure: 'Volt_3V3', value: hk.volt3v3, unit: 'V' },
      { measure: 'Volt_AGND', value: hk.voltAgnd, unit: 'V' },
      { measure: 'Volt_12VP', value: hk.volt12vp, unit: 'V' },
      { measure: 'Volt_12VN', value: hk.volt12vn, unit: 'V' },
      { measure: 'Volt_HVP', value: hk.voltHvp, unit: 'V' },
      { measure: 'Volt_HVN', value: hk.voltHvn, unit: 'V' },
      { measure: 'Temp_CPU', value: hk.tempCpu, unit: 'degC' },
      { measure: 'Temp_ADC', value: hk.tempAdc, unit: 'degC' },
      { measure: 'Temp_AV', value: hk.tempAv, unit: 'degC' },
      { measure: 'Temp_HVP', value: hk.tempHvp, unit: 'degC' },
      { measure: 'Temp_HVN', value: hk.tempHvn, unit: 'degC' },
      { measure: 'Line_Freq', value: hk.lineFreq, unit: 'Hz' },
      { measure: 'Volt_State', value: amprVoltageStateNames(voltState).join(','), unit: '' },
      {
        measure: 'Temp_State',
        value: amprTemperatureStateNames(tempState).join(',') || 'OK',
        unit: '',
        alarm: tempState !== 0,
      },
      { measure: 'Ilock_State', value: amprInterlockStateNames(ilockState).join(','), unit: '' },
      { measure: 'Fan_RPM', value: fan.measuredRpm, unit: 'rpm', alarm: fan.failed },
      { measure: 'Fan_PWM', value: (fan.pwm / AMPR_FAN_PWM_MAX) * 100, unit: '%' },
      { measure: 'LED', value: ledName(led), unit: '' },
      { measure: 'CPU_Load', value: cpu.load * 100, unit: '%' },
      { measure: 'CPU_Freq', value: cpu.frequencyHz / 1e6, unit: 'MHz' },
      {
        measure: 'Modules',
        value: presentModules(presence),
        unit: '',
        alarm: !presence.valid || presence.slots.includes('invalid'),
      },
    ];
  }
}
