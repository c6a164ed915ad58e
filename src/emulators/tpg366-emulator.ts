/**
 * Tpg366Emulator: virtual six-channel pressure gauge controller
 *
 * Answers Pfeiffer telegrams addressed to the controller (base address) or
 * to one of its gauge channels (base + 1..6). Unknown parameters answer
 * NO_DEF, writes to read-only parameters _LOGIC, out-of-range writes
 * _RANGE. Frames with a bad checksum are ignored, as on a real RS-485 bus.
 */

import { encodeExpo, encodeValue } from '../protocols/pfeiffer-data';
import { Telegram, TelegramError, buildReply, parseTelegram } from '../protocols/pfeiffer-telegram';
import { DeviceEmulator, EmulatorOptions } from './device-emulator';

export const TPG366_CHANNELS = 6;

export interface Tpg366State {
  address: number;
  /** Pressure in hPa per channel 1..6 (index 0 = channel 1) */
  pressures: number[];
  /** Error code string, "000000" when healthy */
  errorCode: string;
  softwareVersion: string;
  electronicsName: string;
}

export class Tpg366Emulator extends DeviceEmulator {
  readonly name = 'TPG366';
  protected readonly commandTerminator = '\r';

  readonly state: Tpg366State;

  constructor(address = 'emulated-tpg366', options: EmulatorOptions & { deviceAddress?: number } = {}) {
    super(address, options);
    this.state = {
      address: options.deviceAddress ?? 1,
      pressures: [1e-3, 2.5e-3, 1013, 5e-7, 1e-2, 3.3e-5],
      errorCode: '000000',
      softwareVersion: '010300',
      electronicsName: 'TPG366',
    };
  }

  protected respond(command: string): string | null {
    let telegram: Telegram;
    try {
      telegram = parseTelegram(`${command}\r`);
    } catch (err) {
      if (err instanceof TelegramError) {
        this.log('Ignored', `${err.code}: ${err.message}`);
        return null;
      }
      throw err;
    }

    const { address, parameter, data } = telegram;
    const channel = address - this.state.address;
    if (channel < 0 || channel > TPG366_CHANNELS) return null;

    const isQuery = telegram.action === 0 && data === '=?';
    const value = isQuery ? this.read(channel, parameter) : this.write(channel, parameter, data);
    return buildReply(address, parameter, value);
  }

  getState(): Record<string, unknown> {
    return { ...this.state, pressures: [...this.state.pressures] };
  }

  private read(channel: number, parameter: number): string {
    if (channel > 0) {
      return parameter === 740 ? encodeExpo(this.state.pressures[channel - 1]) : 'NO_DEF';
    }
    switch (parameter) {
      case 303:
        return encodeValue('string', this.state.errorCode);
      case 312:
        return encodeValue('string', this.state.softwareVersion);
      case 349:
        return encodeValue('string', this.state.electronicsName);
      case 797:
        return encodeValue('u_integer', this.state.address);
      default:
        return 'NO_DEF';
    }
  }

  /** Acknowledge a control telegram by echoing its data */
  private write(channel: number, parameter: number, data: string): string {
    if (channel > 0 || parameter === 740) return '_LOGIC';
    switch (parameter) {
      case 303:
      case 312:
      case 349:
        return '_LOGIC';
      case 797: {
        const next = /^\d{6}$/.test(data) ? parseInt(data, 10) : NaN;
        if (!(next >= 1 && next <= 255)) return '_RANGE';
        this.log('Address', `RS-485 address ${this.state.address} -> ${next}`);
        this.state.address = next;
        return data;
      }
      default:
        return 'NO_DEF';
    }
  }
}
