import { describe, it, afterEach } from 'node:test';
import * as assert from 'node:assert/strict';
import { Tpg366Driver, Tpg366Options } from '../drivers/tpg366-driver';
import { Tpg366Emulator } from '../emulators/tpg366-emulator';
import { CommunicationError } from '../errors';
import { buildReply } from '../protocols/pfeiffer-telegram';
import { MemorySink } from './helpers';

/** Answers every telegram as if it came from another unit */
class CrossedWires extends Tpg366Emulator {
  protected respond(command: string): string | null {
    return super.respond(command) === null ? null : buildReply(5, 740, '100017');
  }
}

/** Acknowledges every address write with the wrong value */
class GarbledAck extends Tpg366Emulator {
  protected respond(command: string): string | null {
    return command.startsWith('0011079') ? buildReply(1, 797, '000009') : super.respond(command);
  }
}

function gaugeRig(options: Partial<Tpg366Options> = {}, emulator = new Tpg366Emulator('emu-gauge')) {
  const sink = new MemorySink();
  const driver = new Tpg366Driver({
    deviceId: 'gauge1',
    port: 'emu-gauge',
    transportFactory: emulator.factory(),
    recordSink: sink,
    ...options,
  });
  return { emulator, driver, sink };
}

describe('Tpg366Driver', () => {
  let driver: Tpg366Driver | null = null;

  afterEach(async () => {
    await driver?.shutdown();
    driver = null;
  });

  it('reads the pressure of every channel', async () => {
    const rig = gaugeRig();
    driver = rig.driver;
    await driver.connect();

    const pressures: number[] = [];
    for (let ch = 1; ch <= 6; ch++) {
      pressures.push(await driver.readPressure(ch));
    }

    assert.deepEqual(pressures, [0.001, 0.0025, 1013, 5e-7, 0.01, 3.3e-5]);
    assert.equal(rig.emulator.commands[0], '0020074002=?107');
  });

  it('refuses channels outside 1-6', async () => {
    const rig = gaugeRig();
    driver = rig.driver;
    await driver.connect();

    assert.throws(() => driver?.readPressure(7), RangeError);
    assert.throws(() => driver?.readPressure(0), RangeError);
    assert.equal(rig.emulator.commands.length, 0);
  });

  it('refuses a monitor channel outside 1-6 at construction', () => {
    assert.throws(() => gaugeRig({ channels: [0] }), RangeError);
  });

  it('reads the controller parameters', async () => {
    const rig = gaugeRig();
    driver = rig.driver;
    await driver.connect();

    assert.equal(await driver.readError(), '000000');
    assert.equal(await driver.readSoftwareVersion(), '010300');
    assert.equal(await driver.readElectronicsName(), 'TPG366');
    assert.equal(await driver.readRs485Address(), 1);
  });

  it('writes the RS-485 address and sees the echo', async () => {
    const rig = gaugeRig();
    driver = rig.driver;
    await driver.connect();

    await driver.writeParameter(797, 'u_integer', 2);

    assert.deepEqual(rig.emulator.commands, ['0011079706000002033']);
    assert.equal(rig.emulator.state.address, 2);
  });

  it('reports instrument rejections with their error word', async () => {
    const rig = gaugeRig();
    driver = rig.driver;
    await driver.connect();

    await assert.rejects(driver.writeParameter(740, 'u_expo_new', 1e-3), (err: unknown) => {
      assert.ok(err instanceof CommunicationError);
      assert.equal(err.code, '_LOGIC');
      assert.equal(err.message, '[gauge1] Instrument rejected parameter 740: logic access violation');
      return true;
    });
    await assert.rejects(driver.queryParameter(999, 'string'), {
      code: 'NO_DEF',
      message: '[gauge1] Instrument rejected parameter 999: undefined parameter number',
    });
    await assert.rejects(driver.writeParameter(797, 'u_integer', 300), {
      code: '_RANGE',
      message: '[gauge1] Instrument rejected parameter 797: data is out of range',
    });
    assert.equal(rig.emulator.state.address, 1);
  });

  it('rejects a reply from the wrong unit', async () => {
    const rig = gaugeRig({}, new CrossedWires('emu-gauge'));
    driver = rig.driver;
    await driver.connect();

    await assert.rejects(driver.readError(), {
      name: 'CommunicationError',
      message: '[gauge1] Unexpected reply for address 1 parameter 303: address 5, parameter 740',
    });
  });

  it('rejects a write whose echo differs', async () => {
    const rig = gaugeRig({}, new GarbledAck('emu-gauge'));
    driver = rig.driver;
    await driver.connect();

    await assert.rejects(driver.writeParameter(797, 'u_integer', 2), {
      name: 'CommunicationError',
      message: '[gauge1] Invalid acknowledgment for parameter 797: sent "000002", got "000009"',
    });
  });

  it('polls the configured channels and the error code', async () => {
    const rig = gaugeRig({ channels: [1, 3] });
    driver = rig.driver;
    await driver.connect();

    const record = await driver.doHousekeepingCycle();

    assert.deepEqual(
      record.readings.map((r) => [r.measure, r.value, r.unit, r.alarm ?? false]),
      [
        ['Pressure_Ch1', 0.001, 'hPa', false],
        ['Pressure_Ch3', 1013, 'hPa', false],
        ['Error', '000000', '', false],
      ],
    );
    assert.deepEqual(rig.emulator.commands, ['0020074002=?107', '0040074002=?109', '0010030302=?101']);
    assert.equal(rig.sink.entries[0].level, 'info');
  });

  it('raises an alarm when the controller reports an error', async () => {
    const rig = gaugeRig({ channels: [1] });
    driver = rig.driver;
    await driver.connect();
    rig.emulator.state.errorCode = '000001';

    const record = await driver.doHousekeepingCycle();

    assert.deepEqual(record.readings[1], { measure: 'Error', value: '000001', unit: '', alarm: true });
    assert.equal(rig.sink.entries[0].level, 'warn');
  });

  it('addresses channels relative to the controller address', async () => {
    const rig = gaugeRig({ deviceAddress: 11 }, new Tpg366Emulator('emu-gauge', { deviceAddress: 11 }));
    driver = rig.driver;
    await driver.connect();

    assert.equal(await driver.readPressure(2), 0.0025);
    assert.equal(await driver.readRs485Address(), 11);
    assert.deepEqual(rig.emulator.commands, ['0130074002=?109', '0110079702=?119']);
  });

  it('times out when the unit stays silent', async () => {
    const rig = gaugeRig({ timeoutMs: 30 });
    driver = rig.driver;
    await driver.connect();
    rig.emulator.mute = true;

    await assert.rejects(driver.readPressure(1), {
      name: 'CommunicationError',
      message: '[gauge1] Reply to "0020074002=?107" failed: No terminated response within 30ms on emu-gauge',
    });
  });
});
