/**
 * PSU Driver
 *
 * Dual (positive/negative) high-voltage supply driven through the vendor
 * library. Each facade call is one library call under the communication
 * lock.
 */

import { Reading } from '../housekeeping/types';
import { LibraryChannel, LibraryDriverOptions, LibraryInstrumentDriver } from './library-instrument-driver';
import {
  PSU_MAX_PORT,
  PSU_NEG,
  PSU_POS,
  PsuAdcHousekeeping,
  PsuData,
  PsuHousekeeping,
  PsuIndex,
  PsuLibrary,
  PsuReply,
  PsuSession,
  PsuSupplyHousekeeping,
  deviceStateNames,
  mainStateName,
  statusName,
} from './psu-library';

export interface PsuOptions extends LibraryDriverOptions {
  library: PsuLibrary;
}

export interface PsuMainState {
  code: number;
  name: string;
}

export interface PsuDeviceState {
  code: number;
  flags: string[];
}

function psuName(psu: PsuIndex): string {
  return psu === PSU_POS ? 'PSU0' : 'PSU1';
}

export class PsuDriver extends LibraryInstrumentDriver<PsuSession> {
  readonly type = 'psu';

  protected readonly maxPort = PSU_MAX_PORT;
  private readonly library: PsuLibrary;

  constructor(options: PsuOptions) {
    super(options, 230400);
    this.library = options.library;
  }

  protected statusName(status: number): string {
    return statusName(status);
  }

  protected openSession(com: number): Promise<PsuReply<PsuSession | null>> {
    return this.library.openPort(com);
  }

  protected setSpeed(session: PsuSession, baudRate: number): Promise<number> {
    return session.setComSpeed(baudRate);
  }

  // --- Reads ---

  readProductNo(): Promise<number> {
    return this.call('getProductNo', (s) => s.getProductNo());
  }

  async readMainState(): Promise<PsuMainState> {
    const code = await this.call('getMainState', (s) => s.getMainState());
    return { code, name: mainStateName(code) };
  }

  async readDeviceState(): Promise<PsuDeviceState> {
    const code = await this.call('getDeviceState', (s) => s.getDeviceState());
    return { code, flags: deviceStateNames(code) };
  }

  readHousekeeping(): Promise<PsuHousekeeping> {
    return this.call('getHousekeeping', (s) => s.getHousekeeping());
  }

  readSensorData(): Promise<[number, number, number]> {
    return this.call('getSensorData', (s) => s.getSensorData());
  }

  readAdcHousekeeping(psu: PsuIndex): Promise<PsuAdcHousekeeping> {
    return this.call('getAdcHousekeeping', (s) => s.getAdcHousekeeping(psu));
  }

  readPsuHousekeeping(psu: PsuIndex): Promise<PsuSupplyHousekeeping> {
    return this.call('getPsuHousekeeping', (s) => s.getPsuHousekeeping(psu));
  }

  readPsuData(psu: PsuIndex): Promise<PsuData> {
    return this.call('getPsuData', (s) => s.getPsuData(psu));
  }

  readOutputVoltage(psu: PsuIndex): Promise<number> {
    return this.call('getPsuOutputVoltage', (s) => s.getPsuOutputVoltage(psu));
  }

  readOutputCurrent(psu: PsuIndex): Promise<number> {
    return this.call('getPsuOutputCurrent', (s) => s.getPsuOutputCurrent(psu));
  }

  readEnable(): Promise<[boolean, boolean]> {
    return this.call('getPsuEnable', (s) => s.getPsuEnable());
  }

  // --- Writes ---

  async setOutputVoltage(psu: PsuIndex, voltage: number): Promise<void> {
    await this.command('setPsuOutputVoltage', (s) => s.setPsuOutputVoltage(psu, voltage));
    this.log.info({ psu: psuName(psu), voltage }, 'Output voltage set');
  }

  async setOutputCurrent(psu: PsuIndex, current: number): Promise<void> {
    await this.command('setPsuOutputCurrent', (s) => s.setPsuOutputCurrent(psu, current));
    this.log.info({ psu: psuName(psu), current }, 'Output current set');
  }

  async setEnable(psu0: boolean, psu1: boolean): Promise<void> {
    await this.command('setPsuEnable', (s) => s.setPsuEnable(psu0, psu1));
    this.log.info({ psu0, psu1 }, 'Supply enable changed');
  }

  // --- Monitor cycle ---

  protected async pollStatus(channel: LibraryChannel<PsuSession>): Promise<Reading[]> {
    const s = channel.session;
    const main = await this.invoke('getMainState', () => s.getMainState());
    const device = await this.invoke('getDeviceState', () => s.getDeviceState());
    const hk = await this.invoke('getHousekeeping', () => s.getHousekeeping());
    const [sensor0, sensor1, sensor2] = await this.invoke('getSensorData', () => s.getSensorData());
    const psu0 = await this.invoke('getPsuData', () => s.getPsuData(PSU_POS));
    const psu1 = await this.invoke('getPsuData', () => s.getPsuData(PSU_NEG));

    const flags = deviceStateNames(device);
    return [
      { measure: 'Main_State', value: mainStateName(main), unit: '', alarm: main !== 0 },
      { measure: 'Dev_State', value: flags.join(','), unit: '', alarm: device !== 0 },
      { measure: 'Volt_Rect', value: hk.voltRect, unit: 'V' },
      { measure: 'Volt_5V0', value: hk.volt5v0, unit: 'V' },
      { measure: 'Volt_3V3', value: hk.volt3v3, unit: 'V' },
      { measure: 'Temp_CPU', value: hk.tempCpu, unit: 'degC' },
      { measure: 'Temp_Sen0', value: sensor0, unit: 'degC' },
      { measure: 'Temp_Sen1', value: sensor1, unit: 'degC' },
      { measure: 'Temp_Sen2', value: sensor2, unit: 'degC' },
      { measure: 'PSU0_Volt', value: psu0.voltage, unit: 'V' },
      { measure: 'PSU0_Curr', value: psu0.current, unit: 'A' },
      { measure: 'PSU1_Volt', value: psu1.voltage, unit: 'V' },
      { measure: 'PSU1_Curr', value: psu1.current, unit: 'A' },
    ];
  }
}
