import { describe, it, afterEach } from 'node:test';
import * as assert from 'node:assert/strict';
import { StationConfigInput, validateStationConfig } from '../config-schema';
import { ChillerEmulator } from '../emulators/chiller-emulator';
import { ExchangeRecorder } from '../emulators/exchange-recorder';
import { Tpg366Emulator } from '../emulators/tpg366-emulator';
import { parseArgs } from '../index';
import { DeviceStation } from '../station/device-station';
import { ExternalHousekeepingLoop } from '../station/external-loop';
import { countingFactory, sleep } from './helpers';

function stationConfig(input: StationConfigInput) {
  return validateStationConfig({ ...input, housekeeping: { logToFile: false, ...input.housekeeping } });
}

const gaugeBus: StationConfigInput = {
  buses: [{ name: 'rs485', mode: 'external', intervalMs: 20 }],
  devices: [
    { id: 'gauge1', type: 'tpg366', port: '/dev/ttyUSB2', bus: 'rs485', deviceAddress: 1, channels: [1, 2] },
    { id: 'gauge2', type: 'tpg366', port: '/dev/ttyUSB2', bus: 'rs485', deviceAddress: 11, channels: [3] },
  ],
};

describe('DeviceStation', () => {
  let station: DeviceStation | null = null;

  afterEach(async () => {
    await station?.shutdown();
    station = null;
  });

  it('keeps devices on one bus off the wire at the same time', async () => {
    const recorder = new ExchangeRecorder();
    station = new DeviceStation(stationConfig(gaugeBus), { emulate: true, emulatorOptions: { latencyMs: 3, recorder } });
    assert.deepEqual(await station.connectAll(), ['gauge1', 'gauge2']);

    const [outcomes] = await Promise.all([
      station.runOnce(),
      station.getDriver('gauge1')?.doHousekeepingCycle(),
      station.getDriver('gauge2')?.doHousekeepingCycle(),
    ]);

    assert.equal(recorder.maxConcurrent, 1);
    assert.deepEqual(
      outcomes.map((o) => [o.deviceId, o.ok]),
      [
        ['gauge1', true],
        ['gauge2', true],
      ],
    );
    // gauge1: two channels + error code; gauge2: one channel + error code; each cycle run twice
    assert.equal(recorder.completed, 2 * (3 + 2));
  });

  it('reports failing devices in runOnce without failing the others', async () => {
    station = new DeviceStation(
      stationConfig({
        devices: [
          { id: 'chiller1', type: 'chiller', port: 'COM3', timeoutMs: 20 },
          { id: 'hv1', type: 'psu', port: 'COM5' },
        ],
      }),
      { emulate: true },
    );
    await station.connectAll();
    const chiller = station.getEmulator('chiller1');
    assert.ok(chiller instanceof ChillerEmulator);
    chiller.mute = true;

    const outcomes = await station.runOnce();

    assert.equal(outcomes.length, 2);
    assert.deepEqual(outcomes[0], {
      deviceId: 'chiller1',
      ok: false,
      error: '[chiller1] Reply to "IN_PV_00" failed: No terminated response within 20ms on COM3',
    });
    const psu = outcomes[1];
    assert.ok(psu.ok);
    assert.equal(psu.record.readings.length, 13);
  });

  it('skips devices that cannot be connected', async () => {
    station = new DeviceStation(
      stationConfig({
        devices: [
          { id: 'chiller1', type: 'chiller', port: 'COM3' },
          { id: 'chiller2', type: 'chiller', port: 'COM4' },
        ],
      }),
      { emulate: true },
    );
    const second = station.getEmulator('chiller2');
    assert.ok(second instanceof ChillerEmulator);
    second.refuseOpen = true;

    assert.deepEqual(await station.connectAll(), ['chiller1']);
    assert.deepEqual(
      (await station.runOnce()).map((o) => o.deviceId),
      ['chiller1'],
    );
  });

  it('start() enables housekeeping and runs the bus loop until shutdown', async () => {
    station = new DeviceStation(
      stationConfig({
        ...gaugeBus,
        devices: [
          ...(gaugeBus.devices ?? []),
          { id: 'chiller1', type: 'chiller', port: 'COM3', housekeeping: { intervalMs: 20 } },
          { id: 'hv1', type: 'psu', port: 'COM5', housekeeping: { enabled: false } },
        ],
      }),
      { emulate: true },
    );

    assert.deepEqual(await station.start(), ['gauge1', 'gauge2', 'chiller1', 'hv1']);
    await sleep(70);

    const status = station.getStatus();
    const bus = status.buses[0];
    assert.equal(bus.name, 'rs485');
    assert.deepEqual(bus.devices, ['gauge1', 'gauge2']);
    assert.ok(bus.loop);
    assert.equal(bus.loop.name, 'HK_BUS_rs485');
    assert.equal(bus.loop.running, true);
    assert.ok(bus.loop.passes >= 2, `expected at least 2 passes, got ${bus.loop.passes}`);
    assert.equal(bus.loop.failures, 0);

    const byId = new Map(status.devices.map((d) => [d.deviceId, d]));
    assert.deepEqual(byId.get('gauge1')?.housekeeping, {
      enabled: true,
      intervalMs: 30000,
      logToFile: false,
      mode: 'external',
      worker: 'HK_BUS_rs485',
    });
    assert.equal(byId.get('gauge1')?.externalLock, true);
    assert.equal(byId.get('chiller1')?.housekeeping.worker, 'HK_chiller1');
    assert.equal(byId.get('chiller1')?.externalLock, false);
    assert.equal(byId.get('hv1')?.housekeeping.enabled, false);

    const gauge1 = station.getEmulator('gauge1');
    assert.ok(gauge1 instanceof Tpg366Emulator);
    const chiller = station.getEmulator('chiller1');
    assert.ok(chiller instanceof ChillerEmulator);
    assert.ok(gauge1.commands.length >= 2 * 3);
    assert.ok(chiller.commands.length >= 6);

    await station.shutdown();

    const after = station.getStatus();
    assert.equal(after.buses[0].loop?.running, false);
    assert.ok(after.devices.every((d) => !d.connected && !d.housekeeping.enabled));
    const sent = gauge1.commands.length;
    await sleep(50);
    assert.equal(gauge1.commands.length, sent);
  });

  it('shares one transport between devices on the same bus port', async () => {
    const emulator = new Tpg366Emulator('/dev/ttyUSB2');
    const { factory, opens } = countingFactory(emulator.factory());
    station = new DeviceStation(
      stationConfig({
        buses: [{ name: 'rs485' }],
        devices: [
          { id: 'gauge1', type: 'tpg366', port: '/dev/ttyUSB2', bus: 'rs485', channels: [1] },
          { id: 'gauge1b', type: 'tpg366', port: '/dev/ttyUSB2', bus: 'rs485', channels: [2] },
        ],
      }),
      { transportFactory: factory },
    );

    await station.connectAll();
    const outcomes = await station.runOnce();

    assert.equal(opens(), 1);
    assert.deepEqual(
      outcomes.map((o) => o.ok),
      [true, true],
    );
    assert.deepEqual(emulator.commands, ['0020074002=?107', '0010030302=?101', '0030074002=?108', '0010030302=?101']);

    await station.shutdown();
    assert.equal(emulator.isOpen(), false);
  });

  it('needs a library binding for PSU devices outside emulation', () => {
    const config = stationConfig({ devices: [{ id: 'hv1', type: 'psu', port: 'COM5' }] });
    assert.throws(() => new DeviceStation(config), {
      message: 'PSU "hv1" needs a vendor library binding (run with --emulate to use the emulated library)',
    });
  });
});

describe('ExternalHousekeepingLoop', () => {
  it('refuses a non-positive interval', () => {
    assert.throws(() => new ExternalHousekeepingLoop('HK_BUS_x', 0), RangeError);
  });

  it('visits enabled targets and counts failures', async () => {
    const visited: string[] = [];
    const loop = new ExternalHousekeepingLoop('HK_BUS_bench', 1000);
    const target = (deviceId: string, enabled: boolean, fails = false) => ({
      deviceId,
      shouldContinueHousekeeping: () => enabled,
      doHousekeepingCycle: async () => {
        visited.push(deviceId);
        if (fails) throw new Error('no reply');
        return { deviceId, port: 'p', timestamp: new Date(), readings: [] };
      },
    });
    loop.attach(target('a', true));
    loop.attach(target('b', false));
    loop.attach(target('c', true, true));

    await loop.runPass();

    assert.deepEqual(visited, ['a', 'c']);
    assert.deepEqual(loop.getStatus(), {
      name: 'HK_BUS_bench',
      running: false,
      intervalMs: 1000,
      passes: 1,
      failures: 1,
      devices: ['a', 'b', 'c'],
    });
  });
});

describe('parseArgs', () => {
  it('reads flags after the node and script arguments', () => {
    assert.deepEqual(parseArgs(['node', 'cli', '--emulate', '--once', '-c', 'lab.yml', '-v']), {
      configPath: 'lab.yml',
      verbose: true,
      emulate: true,
      once: true,
      listPorts: false,
      help: false,
    });
  });

  it('rejects a missing config path and unknown arguments', () => {
    assert.throws(() => parseArgs(['node', 'cli', '--config']), {
      message: '--config requires a file path (e.g. --config ./config.yml)',
    });
    assert.throws(() => parseArgs(['node', 'cli', '--fast']), { message: 'Unknown argument "--fast" (see --help)' });
  });
});
