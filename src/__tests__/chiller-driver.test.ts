import { describe, it, beforeEach, afterEach } from 'node:test';
import * as assert from 'node:assert/strict';
import { ChillerDriver, formatSetpoint } from '../drivers/chiller-driver';
import { ChillerEmulator } from '../emulators/chiller-emulator';
import { CommunicationError } from '../errors';
import { ChillerRig, chillerRig } from './helpers';

/** Refuses every write */
class StubbornChiller extends ChillerEmulator {
  protected respond(command: string): string | null {
    return command.startsWith('OUT_') ? 'ERROR\r\n' : super.respond(command);
  }
}

describe('formatSetpoint', () => {
  it('zero pads to six characters with two decimals', () => {
    assert.equal(formatSetpoint(25.5), '025.50');
    assert.equal(formatSetpoint(5), '005.00');
    assert.equal(formatSetpoint(-5), '-05.00');
    assert.equal(formatSetpoint(-12.25), '-12.25');
  });
});

describe('ChillerDriver', () => {
  let rig: ChillerRig;

  beforeEach(async () => {
    rig = chillerRig();
    await rig.driver.connect();
  });

  afterEach(async () => {
    await rig.driver.shutdown();
  });

  it('reads the bath state', async () => {
    assert.equal(await rig.driver.readTemperature(), 21.5);
    assert.equal(await rig.driver.readSetTemperature(), 20);
    assert.equal(await rig.driver.readPumpLevel(), 3);
    assert.equal(await rig.driver.readCooling(), 'ON');
    assert.equal(await rig.driver.readKeylock(), 'UNLOCKED');
    assert.equal(await rig.driver.readRunning(), 'DEVICE STANDBY');
    assert.equal(await rig.driver.readStatus(), 'OK');
    assert.equal(await rig.driver.readDiagnostics(), 'NO_ERROR');

    assert.deepEqual(rig.emulator.commands, [
      'IN_PV_00',
      'IN_SP_00',
      'IN_SP_01',
      'IN_SP_02',
      'IN_MODE_00',
      'IN_MODE_02',
      'STATUS',
      'STAT',
    ]);
  });

  it('writes the set point in the fixed-width format', async () => {
    await rig.driver.setTemperature(25.5);
    await rig.driver.setTemperature(-5);

    assert.deepEqual(rig.emulator.commands, ['OUT_SP_00 025.50', 'OUT_SP_00 -05.00']);
    assert.equal(rig.emulator.state.setTemperature, -5);
  });

  it('rejects a non-finite set point before sending', async () => {
    await assert.rejects(rig.driver.setTemperature(Number.NaN), RangeError);
    assert.equal(rig.emulator.commands.length, 0);
  });

  it('sets the pump level within 1-6', async () => {
    await rig.driver.setPumpLevel(4);

    assert.deepEqual(rig.emulator.commands, ['OUT_SP_01 004']);
    assert.equal(rig.emulator.state.pumpLevel, 4);
    await assert.rejects(rig.driver.setPumpLevel(0), RangeError);
    await assert.rejects(rig.driver.setPumpLevel(7), RangeError);
    await assert.rejects(rig.driver.setPumpLevel(2.5), RangeError);
    assert.equal(rig.emulator.commands.length, 1);
  });

  it('toggles the keylock', async () => {
    await rig.driver.setKeylock(true);
    assert.equal(await rig.driver.readKeylock(), 'LOCKED');
    await rig.driver.setKeylock(false);

    assert.deepEqual(rig.emulator.commands, ['OUT_MODE_00 1', 'IN_MODE_00', 'OUT_MODE_00 0']);
  });

  it('starts and stops circulation', async () => {
    await rig.driver.startDevice();
    assert.equal(await rig.driver.readRunning(), 'DEVICE RUNNING');
    await rig.driver.stopDevice();
    assert.equal(await rig.driver.readRunning(), 'DEVICE STANDBY');
  });

  it('reports an alarm status as ERROR', async () => {
    rig.emulator.state.status = 2;
    assert.equal(await rig.driver.readStatus(), 'ERROR');
  });

  it('fails a read on an unparseable reply', async () => {
    rig.emulator.state.temperature = Number.NaN;

    await assert.rejects(rig.driver.readTemperature(), (err: unknown) => {
      assert.ok(err instanceof CommunicationError);
      assert.equal(err.message, '[chiller1] Read "IN_PV_00" failed: Unexpected reply "NaN"');
      return true;
    });
  });

  it('fails a write the chiller does not acknowledge', async () => {
    const emulator = new StubbornChiller('emu-chiller');
    const driver = new ChillerDriver({ deviceId: 'chiller1', port: 'emu-chiller', transportFactory: emulator.factory() });
    await driver.connect();

    await assert.rejects(driver.setPumpLevel(5), (err: unknown) => {
      assert.ok(err instanceof CommunicationError);
      assert.equal(
        err.message,
        '[chiller1] Set "OUT_SP_01 005" failed: Failed to set parameter, chiller replied "ERROR"',
      );
      return true;
    });
    assert.equal(emulator.state.pumpLevel, 3);
    await driver.disconnect();
  });

  it('fails when the line is down', async () => {
    rig.emulator.offline = true;

    await assert.rejects(rig.driver.readTemperature(), (err: unknown) => {
      assert.ok(err instanceof CommunicationError);
      assert.equal(err.message, '[chiller1] Send "IN_PV_00" failed: Emulated port emu-chiller is offline');
      return true;
    });

    rig.emulator.offline = false;
    assert.equal(await rig.driver.readTemperature(), 21.5);
  });
});
