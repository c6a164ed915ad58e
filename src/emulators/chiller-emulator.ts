/**
 * ChillerEmulator: virtual recirculating chiller
 *
 * Speaks the chiller's line protocol: one CRLF-terminated command, one
 * CRLF-terminated reply. Reads answer with the raw value, writes with OK,
 * anything unrecognised with ERROR.
 */

import { DeviceEmulator, EmulatorOptions } from './device-emulator';

const CRLF = '\r\n';

export interface ChillerState {
  temperature: number;
  setTemperature: number;
  pumpLevel: number;
  /** 0 off, 1 on, 2 auto */
  coolingMode: number;
  keylock: boolean;
  running: boolean;
  /** 0 ok, anything else is an error status */
  status: number;
  diagnostics: string;
}

export class ChillerEmulator extends DeviceEmulator {
  readonly name = 'Chiller';
  protected readonly commandTerminator = CRLF;

  readonly state: ChillerState = {
    temperature: 21.5,
    setTemperature: 20,
    pumpLevel: 3,
    coolingMode: 1,
    keylock: false,
    running: false,
    status: 0,
    diagnostics: 'NO_ERROR',
  };

  constructor(address = 'emulated-chiller', options: EmulatorOptions = {}) {
    super(address, options);
  }

  protected respond(command: string): string | null {
    const [verb, arg] = command.trim().split(/\s+/, 2);

    switch (verb) {
      case 'IN_PV_00':
        return this.reply(this.state.temperature.toFixed(2));
      case 'IN_SP_00':
        return this.reply(this.state.setTemperature.toFixed(2));
      case 'IN_SP_01':
        return this.reply(String(this.state.pumpLevel).padStart(3, '0'));
      case 'IN_SP_02':
        return this.reply(String(this.state.coolingMode));
      case 'IN_MODE_00':
        return this.reply(this.state.keylock ? '1' : '0');
      case 'IN_MODE_02':
        // 0 = running, 1 = standby
        return this.reply(this.state.running ? '0' : '1');
      case 'STATUS':
        return this.reply(String(this.state.status));
      case 'STAT':
        return this.reply(this.state.diagnostics);
      case 'OUT_SP_00':
        return this.write(arg, (v) => {
          this.state.setTemperature = v;
        });
      case 'OUT_SP_01':
        return this.write(arg, (v) => {
          this.state.pumpLevel = v;
        });
      case 'OUT_MODE_00':
        return this.write(arg, (v) => {
          this.state.keylock = v === 1;
        });
      case 'START':
        this.state.running = true;
        this.log('Start', 'Circulation started');
        return this.reply('OK');
      case 'STOP':
        this.state.running = false;
        this.log('Stop', 'Circulation stopped');
        return this.reply('OK');
      default:
        return this.reply('ERROR');
    }
  }

  getState(): Record<string, unknown> {
    return { ...this.state };
  }

  private reply(text: string): string {
    return `${text}${CRLF}`;
  }

  private write(arg: string | undefined, apply: (value: number) => void): string {
    const value = arg === undefined ? NaN : Number(arg);
    if (!Number.isFinite(value)) return this.reply('ERROR');
    apply(value);
    return this.reply('OK');
  }
}
