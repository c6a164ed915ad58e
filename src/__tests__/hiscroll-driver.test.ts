import { describe, it, afterEach } from 'node:test';
import * as assert from 'node:assert/strict';
import { DeviceConfig } from '../config-schema';
import { createDriver } from '../drivers';
import { HiScrollDriver, HiScrollOptions } from '../drivers/hiscroll-driver';
import { createEmulator } from '../emulators';
import { HiScrollEmulator } from '../emulators/hiscroll-emulator';
import { MemorySink } from './helpers';

function scrollRig(options: Partial<HiScrollOptions> = {}, emulator = new HiScrollEmulator('emu-scroll')) {
  const sink = new MemorySink();
  const driver = new HiScrollDriver({
    deviceId: 'scroll1',
    port: 'emu-scroll',
    transportFactory: emulator.factory(),
    recordSink: sink,
    ...options,
  });
  return { emulator, driver, sink };
}

describe('HiScrollDriver', () => {
  let driver: HiScrollDriver | null = null;

  afterEach(async () => {
    await driver?.shutdown();
    driver = null;
  });

  it('reads the pump identity', async () => {
    const rig = scrollRig();
    driver = rig.driver;
    await driver.connect();

    assert.equal(await driver.readSerialNumber(), 'HS12000042');
    assert.equal(await driver.readSoftwareVersion(), '010100');
    assert.equal(await driver.readNominalSpeedRpm(), 1800);
    assert.deepEqual(await driver.readTemperatures(), { electronics: 30, motor: 35, powerStage: 33 });
  });

  it('runs at full speed once enabled', async () => {
    const rig = scrollRig();
    driver = rig.driver;
    await driver.connect();

    await driver.setPumpEnabled(true);

    assert.deepEqual(rig.emulator.commands, ['0021001006111111016']);
    assert.equal(await driver.readPumpEnabled(), true);
    assert.equal(await driver.readSpeedHz(), 30);
    assert.equal(await driver.readSpeedRpm(), 1800);
  });

  it('slows to the standby set point in standby', async () => {
    const rig = scrollRig();
    driver = rig.driver;
    await driver.connect();
    await driver.setPumpEnabled(true);

    await driver.setStandby(true);
    assert.equal(await driver.readStandby(), true);
    assert.equal(await driver.readSpeedHz(), 21);

    await driver.setStandbySetpoint(50);
    assert.equal(rig.emulator.commands[rig.emulator.commands.length - 1], '0021071706005000029');
    assert.equal(await driver.readStandbySetpoint(), 50);
    assert.equal(await driver.readSpeedRpm(), 900);
  });

  it('refuses a set point below 40 percent', async () => {
    const rig = scrollRig();
    driver = rig.driver;
    await driver.connect();

    await assert.rejects(driver.setSpeedSetpoint(30), {
      name: 'RangeError',
      message: 'Speed set point must be between 40 and 100 (got 30)',
    });
    assert.equal(rig.emulator.commands.length, 0);
  });

  it('restores the factory set points', async () => {
    const rig = scrollRig();
    driver = rig.driver;
    await driver.connect();

    await driver.setSpeedSetpoint(80);
    await driver.setStandbySetpoint(45);
    assert.equal(await driver.readSpeedSetpoint(), 80);

    await driver.resetToFactorySettings();

    assert.equal(await driver.readSpeedSetpoint(), 100);
    assert.equal(await driver.readStandbySetpoint(), 70);
  });

  it('polls the pump and flags its error code', async () => {
    const rig = scrollRig();
    driver = rig.driver;
    await driver.connect();
    rig.emulator.raiseError('Err007');

    const record = await driver.doHousekeepingCycle();

    assert.deepEqual(
      record.readings.map((r) => [r.measure, r.value, r.unit, r.alarm ?? false]),
      [
        ['Pump_Enabled', false, '', false],
        ['Standby_Mode', false, '', false],
        ['Speed_RPM', 0, 'rpm', false],
        ['Speed_Hz', 0, 'Hz', false],
        ['Temp_Motor', 35, 'degC', false],
        ['Temp_Electronics', 30, 'degC', false],
        ['Drive_Current', 0, 'A', false],
        ['Drive_Power', 0, 'W', false],
        ['Error', 'Err007', '', true],
      ],
    );
    assert.equal(rig.sink.entries[0].level, 'warn');

    await driver.acknowledgeError();
    assert.equal(await driver.readError(), '000000');
  });

  it('is built from config at a custom address', async () => {
    const device: DeviceConfig = { id: 'scroll1', type: 'hiscroll12', port: 'emu-scroll', deviceAddress: 20 };
    const emulated = createEmulator(device);
    assert.ok(emulated.emulator instanceof HiScrollEmulator);

    const built = createDriver(device, {
      housekeeping: { intervalMs: 30000, logToFile: false },
      logDir: 'logs',
      transportFactory: emulated.transportFactory,
    });
    assert.ok(built instanceof HiScrollDriver);
    driver = built;
    await driver.connect();

    assert.equal(await driver.readPumpEnabled(), false);
    assert.deepEqual(emulated.emulator.commands, ['0200001002=?097']);
  });
});
