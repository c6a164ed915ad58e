/**
 * Emulator barrel exports and factory.
 *
 * Usage:
 *   import { createEmulator } from './emulators';
 *   const { transportFactory, psuLibrary, amprLibrary, hvSwitchLibrary } = createEmulator(deviceConfig, { latencyMs: 5 });
 */

export { DeviceEmulator } from './device-emulator';
export type { EmulatorLogEntry, EmulatorOptions } from './device-emulator';
export { ExchangeRecorder } from './exchange-recorder';
export { ChillerEmulator } from './chiller-emulator';
export { SyringePumpEmulator } from './syringe-pump-emulator';
export { Tpg366Emulator } from './tpg366-emulator';
export { PfeifferUnitEmulator } from './pfeiffer-unit-emulator';
export { HiPaceEmulator } from './hipace-emulator';
export { HiScrollEmulator } from './hiscroll-emulator';
export { PsuEmulator } from './psu-emulator';
export { AmprEmulator } from './ampr-emulator';
export { HvSwitchEmulator } from './hv-switch-emulator';

import { DeviceConfig } from '../config-schema';
import { AmprLibrary } from '../drivers/ampr-library';
import { HvSwitchLibrary } from '../drivers/hv-switch-library';
import { PsuLibrary } from '../drivers/psu-library';
import { TransportFactory } from '../transport/types';
import { AmprEmulator } from './ampr-emulator';
import { ChillerEmulator } from './chiller-emulator';
import { DeviceEmulator, EmulatorOptions } from './device-emulator';
import { HiPaceEmulator } from './hipace-emulator';
import { HiScrollEmulator } from './hiscroll-emulator';
import { HvSwitchEmulator } from './hv-switch-emulator';
import { PsuEmulator } from './psu-emulator';
import { SyringePumpEmulator } from './syringe-pump-emulator';
import { Tpg366Emulator } from './tpg366-emulator';

export type InstrumentEmulator = DeviceEmulator | PsuEmulator | AmprEmulator | HvSwitchEmulator;

/** An emulator plus the seam a driver plugs into */
export interface EmulatedDevice {
  emulator: InstrumentEmulator;
  transportFactory?: TransportFactory;
  psuLibrary?: PsuLibrary;
  amprLibrary?: AmprLibrary;
  hvSwitchLibrary?: HvSwitchLibrary;
}

/**
 * Create an emulator for the given device config.
 * Mirrors createDriver() but returns the device's stand-in.
 */
export function createEmulator(device: DeviceConfig, options: EmulatorOptions = {}): EmulatedDevice {
  switch (device.type) {
    case 'chiller':
      return fromTransport(new ChillerEmulator(device.port, options));
    case 'syringe-pump':
      return fromTransport(new SyringePumpEmulator(device.port, options));
    case 'tpg366':
      return fromTransport(new Tpg366Emulator(device.port, { ...options, deviceAddress: device.deviceAddress }));
    case 'hipace':
      return fromTransport(
        new HiPaceEmulator(device.port, {
          ...options,
          model: device.model,
          deviceAddress: device.deviceAddress,
          pumpAddress: device.pumpAddress,
          gaugeAddress: device.gaugeAddress,
        }),
      );
    case 'hiscroll12':
      return fromTransport(new HiScrollEmulator(device.port, { ...options, deviceAddress: device.deviceAddress }));
    case 'psu': {
      const emulator = new PsuEmulator(options);
      return { emulator, psuLibrary: emulator };
    }
    case 'ampr': {
      const emulator = new AmprEmulator(options);
      return { emulator, amprLibrary: emulator };
    }
    case 'hv-switch': {
      const emulator = new HvSwitchEmulator(options);
      return { emulator, hvSwitchLibrary: emulator };
    }
  }
}

function fromTransport(emulator: DeviceEmulator): EmulatedDevice {
  return { emulator, transportFactory: emulator.factory() };
}
