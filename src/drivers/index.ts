/**
 * Driver barrel exports and factory
 */

export { CommLock } from './comm-lock';
export { InstrumentDriver } from './instrument-driver';
export type { InstrumentDriverOptions, DriverChannel, DriverStatus } from './instrument-driver';
export { SerialInstrumentDriver } from './serial-instrument-driver';
export type { SerialDriverOptions } from './serial-instrument-driver';
export { ChillerDriver } from './chiller-driver';
export type { ChillerOptions } from './chiller-driver';
export { SyringePumpDriver } from './syringe-pump-driver';
export type { SyringePumpOptions } from './syringe-pump-driver';
export { Tpg366Driver } from './tpg366-driver';
export type { Tpg366Options } from './tpg366-driver';
export { PfeifferInstrumentDriver } from './pfeiffer-instrument-driver';
export type { PfeifferDriverOptions } from './pfeiffer-instrument-driver';
export { HiPaceDriver } from './hipace-driver';
export type { HiPaceModel, HiPaceOptions } from './hipace-driver';
export { HiScrollDriver } from './hiscroll-driver';
export type { HiScrollOptions } from './hiscroll-driver';
export { PsuDriver } from './psu-driver';
export type { PsuOptions } from './psu-driver';
export type { PsuLibrary, PsuSession } from './psu-library';
export { AmprDriver } from './ampr-driver';
export type { AmprOptions } from './ampr-driver';
export type { AmprLibrary, AmprSession } from './ampr-library';
export { HvSwitchDriver } from './hv-switch-driver';
export type { HvSwitchOptions } from './hv-switch-driver';
export type { HvSwitchLibrary, HvSwitchSession } from './hv-switch-library';

import { DeviceConfig } from '../config-schema';
import { AmprDriver } from './ampr-driver';
import { AmprLibrary } from './ampr-library';
import { ExternalWorkerHandle, HousekeepingDefaults } from '../housekeeping/types';
import { TransportFactory } from '../transport/types';
import { ChillerDriver } from './chiller-driver';
import { CommLock } from './comm-lock';
import { HiPaceDriver } from './hipace-driver';
import { HiScrollDriver } from './hiscroll-driver';
import { HvSwitchDriver } from './hv-switch-driver';
import { HvSwitchLibrary } from './hv-switch-library';
import { PsuDriver } from './psu-driver';
import { PsuLibrary } from './psu-library';
import { SyringePumpDriver } from './syringe-pump-driver';
import { Tpg366Driver } from './tpg366-driver';

export type AnyInstrumentDriver =
  | ChillerDriver
  | SyringePumpDriver
  | Tpg366Driver
  | HiPaceDriver
  | HiScrollDriver
  | PsuDriver
  | AmprDriver
  | HvSwitchDriver;

/** What the station hands every driver it builds */
export interface DriverContext {
  /** Shared bus lock */
  commLock?: CommLock;
  /** Bus loop handle; presence selects external mode */
  hkWorker?: ExternalWorkerHandle;
  /** Overrides the serial port (emulation) */
  transportFactory?: TransportFactory;
  /** Binding of the PSU vendor library */
  psuLibrary?: PsuLibrary;
  /** Binding of the AMPR vendor library */
  amprLibrary?: AmprLibrary;
  /** Binding of the HV switch vendor library */
  hvSwitchLibrary?: HvSwitchLibrary;
  housekeeping: HousekeepingDefaults;
  logDir: string;
}

/** Create an instrument driver from a config entry */
export function createDriver(device: DeviceConfig, ctx: DriverContext): AnyInstrumentDriver {
  const common = {
    deviceId: device.id,
    port: device.port,
    commLock: ctx.commLock,
    hkWorker: ctx.hkWorker,
    intervalMs: device.housekeeping?.intervalMs ?? ctx.housekeeping.intervalMs,
    logToFile: device.housekeeping?.logToFile ?? ctx.housekeeping.logToFile,
    logDir: ctx.logDir,
  };
  const serial = {
    ...common,
    baudRate: device.baudRate,
    timeoutMs: device.timeoutMs,
    transportFactory: ctx.transportFactory,
  };

  switch (device.type) {
    case 'chiller':
      return new ChillerDriver(serial);
    case 'syringe-pump':
      return new SyringePumpDriver({
        ...serial,
        axis: device.axis,
        mode: device.mode,
        responseWindowMs: device.responseWindowMs,
      });
    case 'tpg366':
      return new Tpg366Driver({ ...serial, deviceAddress: device.deviceAddress, channels: device.channels });
    case 'hipace':
      return new HiPaceDriver({
        ...serial,
        model: device.model,
        deviceAddress: device.deviceAddress,
        pumpAddress: device.pumpAddress,
        gaugeAddress: device.gaugeAddress,
      });
    case 'hiscroll12':
      return new HiScrollDriver({ ...serial, deviceAddress: device.deviceAddress });
    case 'psu':
      if (!ctx.psuLibrary) {
        throw new Error(`PSU "${device.id}" needs a vendor library binding (run with --emulate to use the emulated library)`);
      }
      return new PsuDriver({ ...common, baudRate: device.baudRate, library: ctx.psuLibrary });
    case 'ampr':
      if (!ctx.amprLibrary) {
        throw new Error(`AMPR "${device.id}" needs a vendor library binding (run with --emulate to use the emulated library)`);
      }
      return new AmprDriver({ ...common, baudRate: device.baudRate, library: ctx.amprLibrary });
    case 'hv-switch':
      if (!ctx.hvSwitchLibrary) {
        throw new Error(`HV switch "${device.id}" needs a vendor library binding (run with --emulate to use the emulated library)`);
      }
      return new HvSwitchDriver({ ...common, baudRate: device.baudRate, library: ctx.hvSwitchLibrary });
  }
}
