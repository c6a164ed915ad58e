/**
 * SyringePumpEmulator: virtual syringe pump
 *
 * Commands end in CR; replies are one or more CRLF-terminated lines with no
 * closing marker, so the driver collects whatever arrives within its reply
 * window. An optional leading axis number ("2 start") is accepted and
 * ignored, as is the trailing mode argument of start.
 */

import { DeviceEmulator, EmulatorOptions } from './device-emulator';

export const PUMP_UNITS = ['mL/min', 'mL/hr', 'μL/min', 'μL/hr'] as const;

export type PumpRunState = 'running' | 'stopped' | 'paused';

export interface SyringePumpState {
  status: PumpRunState;
  /** Index into PUMP_UNITS */
  units: number;
  diameter: number;
  rate: string;
  volume: string;
  delay: string;
  time: string;
  dispensedVolume: number;
  elapsedSeconds: number;
}

export class SyringePumpEmulator extends DeviceEmulator {
  readonly name = 'SyringePump';
  protected readonly commandTerminator = '\r';

  readonly state: SyringePumpState = {
    status: 'stopped',
    units: 0,
    diameter: 14.5,
    rate: '1',
    volume: '1',
    delay: '0',
    time: '0',
    dispensedVolume: 0,
    elapsedSeconds: 0,
  };

  constructor(address = 'emulated-syringe-pump', options: EmulatorOptions = {}) {
    super(address, options);
  }

  protected respond(command: string): string | null {
    const tokens = command.trim().split(/\s+/);
    if (tokens.length > 1 && /^\d+$/.test(tokens[0])) tokens.shift();
    const text = tokens.join(' ');

    if (tokens[0] === 'start') return this.transition('running');
    if (text === 'stop') return this.transition('stopped');
    if (text === 'pause') return this.transition('paused');
    if (text === 'restart') {
      this.state.dispensedVolume = 0;
      this.state.elapsedSeconds = 0;
      return this.transition('running');
    }

    if (tokens[0] === 'set' && tokens.length === 3) {
      return this.set(tokens[1], tokens[2]);
    }

    switch (text) {
      case 'pump status':
        return this.lines(this.state.status);
      case 'dispensed volume':
        return this.lines(`${this.state.dispensedVolume.toFixed(3)} ${this.volumeUnit()}`);
      case 'elapsed time':
        return this.lines(`${this.state.elapsedSeconds.toFixed(1)} s`);
      case 'view parameter':
        return this.lines(
          `units = ${PUMP_UNITS[this.state.units]}`,
          `diameter = ${this.state.diameter}`,
          `rate = ${this.state.rate}`,
          `volume = ${this.state.volume}`,
          `delay = ${this.state.delay}`,
          `time = ${this.state.time}`,
        );
      case 'read limit parameter':
        return this.lines('max rate = 50.0', 'min rate = 0.001', 'max volume = 60.0');
      default:
        return this.lines(`ERROR: unknown command "${text}"`);
    }
  }

  getState(): Record<string, unknown> {
    return { ...this.state };
  }

  private volumeUnit(): string {
    return this.state.units < 2 ? 'mL' : 'μL';
  }

  private transition(status: PumpRunState): string {
    this.state.status = status;
    this.log('State', status);
    return this.lines('OK');
  }

  private set(name: string, value: string): string {
    switch (name) {
      case 'units': {
        const idx = Number(value);
        if (!Number.isInteger(idx) || idx < 0 || idx >= PUMP_UNITS.length) {
          return this.lines(`ERROR: invalid units "${value}"`);
        }
        this.state.units = idx;
        break;
      }
      case 'diameter': {
        const diameter = Number(value);
        if (!Number.isFinite(diameter) || diameter <= 0) {
          return this.lines(`ERROR: invalid diameter "${value}"`);
        }
        this.state.diameter = diameter;
        break;
      }
      case 'rate':
      case 'volume':
      case 'delay':
      case 'time':
        this.state[name] = value;
        break;
      default:
        return this.lines(`ERROR: unknown parameter "${name}"`);
    }
    return this.lines('OK');
  }

  private lines(...text: string[]): string {
    return text.map((line) => `${line}\r\n`).join('');
  }
}
