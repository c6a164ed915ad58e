/**
 * DeviceStation: every instrument in one config, wired and run together
 *
 * Devices sharing a `bus` share one CommLock, and devices on the same bus
 * and port share one transport through the bus's SharedTransportPool. On an
 * external bus the station also owns the monitor loop: one
 * ExternalHousekeepingLoop polls every device on it. Devices on an internal
 * bus, or on no bus, run their own housekeeping workers.
 */

import { Logger } from 'pino';
import { BusConfig, DeviceConfig, StationConfig } from '../config-schema';
import { AnyInstrumentDriver, createDriver } from '../drivers';
import { AmprLibrary } from '../drivers/ampr-library';
import { CommLock } from '../drivers/comm-lock';
import { HvSwitchLibrary } from '../drivers/hv-switch-library';
import { DriverStatus } from '../drivers/instrument-driver';
import { PsuLibrary } from '../drivers/psu-library';
import { EmulatorOptions, InstrumentEmulator, createEmulator } from '../emulators';
import { errorMessage } from '../errors';
import { MonitorRecord } from '../housekeeping/types';
import { getLogger } from '../logger';
import { openSerialTransport } from '../transport/serial-transport';
import { SharedTransportPool } from '../transport/shared-transport';
import { TransportFactory } from '../transport/types';
import { ExternalHousekeepingLoop, ExternalLoopStatus } from './external-loop';

export interface DeviceStationOptions {
  /** Wire every device to its in-process emulator */
  emulate?: boolean;
  emulatorOptions?: EmulatorOptions;
  /** Vendor library binding for PSU devices (ignored when emulating) */
  psuLibrary?: PsuLibrary;
  /** Vendor library binding for AMPR devices (ignored when emulating) */
  amprLibrary?: AmprLibrary;
  /** Vendor library binding for HV switch devices (ignored when emulating) */
  hvSwitchLibrary?: HvSwitchLibrary;
  /** Opens real ports; defaults to the serial port (ignored when emulating) */
  transportFactory?: TransportFactory;
}

export type CycleOutcome =
  | { deviceId: string; ok: true; record: MonitorRecord }
  | { deviceId: string; ok: false; error: string };

export interface BusStatus {
  name: string;
  mode: BusConfig['mode'];
  devices: string[];
  loop: ExternalLoopStatus | null;
}

export interface StationStatus {
  devices: DriverStatus[];
  buses: BusStatus[];
}

interface StationEntry {
  config: DeviceConfig;
  driver: AnyInstrumentDriver;
  emulator: InstrumentEmulator | null;
}

export class DeviceStation {
  private readonly config: StationConfig;
  private readonly entries: StationEntry[] = [];
  private readonly locks = new Map<string, CommLock>();
  private readonly loops = new Map<string, ExternalHousekeepingLoop>();
  private readonly pools = new Map<string, SharedTransportPool>();
  private readonly log: Logger;
  private started = false;

  constructor(config: StationConfig, options: DeviceStationOptions = {}) {
    this.config = config;
    this.log = getLogger('Station');

    const opener = options.transportFactory ?? openSerialTransport;
    for (const bus of config.buses) {
      this.locks.set(bus.name, new CommLock(`bus:${bus.name}`));
      this.pools.set(bus.name, new SharedTransportPool(opener));
      if (bus.mode === 'external') {
        const intervalMs = bus.intervalMs ?? config.housekeeping.intervalMs;
        this.loops.set(bus.name, new ExternalHousekeepingLoop(`HK_BUS_${bus.name}`, intervalMs, this.log));
      }
    }

    for (const device of config.devices) {
      const emulated = options.emulate ? createEmulator(device, options.emulatorOptions) : null;
      const bus = device.bus;
      const loop = bus !== undefined ? this.loops.get(bus) : undefined;
      const pool = bus !== undefined ? this.pools.get(bus) : undefined;

      const driver = createDriver(device, {
        commLock: bus !== undefined ? this.locks.get(bus) : undefined,
        hkWorker: loop,
        transportFactory: emulated ? emulated.transportFactory : pool?.factory ?? options.transportFactory,
        psuLibrary: emulated ? emulated.psuLibrary : options.psuLibrary,
        amprLibrary: emulated ? emulated.amprLibrary : options.amprLibrary,
        hvSwitchLibrary: emulated ? emulated.hvSwitchLibrary : options.hvSwitchLibrary,
        housekeeping: config.housekeeping,
        logDir: config.logging.dir,
      });
      loop?.attach(driver);

      this.entries.push({ config: device, driver, emulator: emulated?.emulator ?? null });
      this.log.info(
        { deviceId: device.id, type: device.type, port: device.port, bus: device.bus, emulated: emulated !== null },
        'Registered device',
      );
    }
  }

  get drivers(): AnyInstrumentDriver[] {
    return this.entries.map((e) => e.driver);
  }

  getDriver(deviceId: string): AnyInstrumentDriver | undefined {
    return this.entries.find((e) => e.driver.deviceId === deviceId)?.driver;
  }

  getEmulator(deviceId: string): InstrumentEmulator | undefined {
    return this.entries.find((e) => e.driver.deviceId === deviceId)?.emulator ?? undefined;
  }

  /**
   * Connect every device. A device that fails to connect is logged and
   * skipped. Resolves with the ids of the devices that are up.
   */
  async connectAll(): Promise<string[]> {
    const connected: string[] = [];
    for (const { driver } of this.entries) {
      if (driver.isConnected()) {
        connected.push(driver.deviceId);
        continue;
      }
      try {
        await driver.connect();
        connected.push(driver.deviceId);
      } catch (err) {
        this.log.error({ deviceId: driver.deviceId, error: errorMessage(err) }, 'Device could not be connected');
      }
    }
    return connected;
  }

  /**
   * Connect all devices, enable housekeeping on each connected one (unless
   * its config says `enabled: false`), then start the bus loops.
   */
  async start(): Promise<string[]> {
    const connected = await this.connectAll();

    for (const { config, driver } of this.entries) {
      if (!driver.isConnected() || config.housekeeping?.enabled === false) continue;
      await driver.startHousekeeping();
    }
    for (const loop of this.loops.values()) {
      loop.start();
    }

    this.started = true;
    this.log.info({ devices: this.entries.length, connected: connected.length }, 'Station started');
    return connected;
  }

  /** One housekeeping cycle on every connected device */
  async runOnce(): Promise<CycleOutcome[]> {
    const active = this.entries.filter((e) => e.driver.isConnected());
    return Promise.all(
      active.map(async ({ driver }): Promise<CycleOutcome> => {
        try {
          return { deviceId: driver.deviceId, ok: true, record: await driver.doHousekeepingCycle() };
        } catch (err) {
          this.log.error({ deviceId: driver.deviceId, error: errorMessage(err) }, 'Housekeeping cycle failed');
          return { deviceId: driver.deviceId, ok: false, error: errorMessage(err) };
        }
      }),
    );
  }

  getStatus(): StationStatus {
    return {
      devices: this.entries.map((e) => e.driver.getStatus()),
      buses: this.config.buses.map((bus) => ({
        name: bus.name,
        mode: bus.mode,
        devices: this.entries.filter((e) => e.config.bus === bus.name).map((e) => e.config.id),
        loop: this.loops.get(bus.name)?.getStatus() ?? null,
      })),
    };
  }

  /** Stop bus loops, stop every device's housekeeping, disconnect */
  async shutdown(): Promise<void> {
    for (const loop of this.loops.values()) {
      await loop.stop();
    }

    for (const { driver } of this.entries) {
      try {
        await driver.stopHousekeeping();
        if (driver.isConnected()) {
          await driver.disconnect();
        }
      } catch (err) {
        this.log.error({ deviceId: driver.deviceId, error: errorMessage(err) }, 'Device shutdown failed');
      }
    }

    if (this.started) {
      this.log.info('Station stopped');
      this.started = false;
    }
  }
}
