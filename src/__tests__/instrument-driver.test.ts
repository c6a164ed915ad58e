import { describe, it, afterEach } from 'node:test';
import * as assert from 'node:assert/strict';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ChillerDriver } from '../drivers/chiller-driver';
import { ChillerEmulator } from '../emulators/chiller-emulator';
import { CommunicationError, ConnectionError, StateError } from '../errors';
import { MonitorRecord, RecordSink } from '../housekeeping/types';
import { ChillerRig, MemorySink, chillerRig, countingFactory, sleep } from './helpers';

describe('InstrumentDriver lifecycle', () => {
  let rig: ChillerRig;

  afterEach(async () => {
    await rig.driver.shutdown();
  });

  it('connect() attaches the channel and emits connected', async () => {
    rig = chillerRig();
    let connected = 0;
    rig.driver.on('connected', () => connected++);

    await rig.driver.connect();

    assert.equal(rig.driver.isConnected(), true);
    assert.equal(connected, 1);
    assert.deepEqual(rig.driver.getStatus(), {
      deviceId: 'chiller1',
      type: 'chiller',
      port: 'emu-chiller',
      connected: true,
      externalLock: false,
      housekeeping: { enabled: false, intervalMs: 30000, logToFile: true, mode: 'internal', worker: null },
    });
  });

  it('a second connect() fails with StateError', async () => {
    rig = chillerRig();
    await rig.driver.connect();
    await assert.rejects(rig.driver.connect(), StateError);
    assert.equal(rig.driver.isConnected(), true);
  });

  it('an unopenable port fails with ConnectionError', async () => {
    rig = chillerRig();
    rig.emulator.refuseOpen = true;

    await assert.rejects(rig.driver.connect(), (err: unknown) => {
      assert.ok(err instanceof ConnectionError);
      assert.equal(err.message, '[chiller1] Cannot open emu-chiller: Emulated port emu-chiller refused to open');
      assert.equal(err.deviceId, 'chiller1');
      return true;
    });
    assert.equal(rig.driver.isConnected(), false);
  });

  it('a read before connect() fails with StateError without touching the transport', async () => {
    const emulator = new ChillerEmulator('emu-chiller');
    const { factory, opens } = countingFactory(emulator.factory());
    const driver = new ChillerDriver({ deviceId: 'chiller1', port: 'emu-chiller', transportFactory: factory });
    rig = { emulator, driver, sink: new MemorySink() };

    await assert.rejects(driver.readTemperature(), (err: unknown) => {
      assert.ok(err instanceof StateError);
      assert.equal(err.message, '[chiller1] Cannot read IN_PV_00: not connected');
      return true;
    });
    assert.equal(opens(), 0);
    assert.equal(emulator.commands.length, 0);
  });

  it('startHousekeeping() before connect() fails with StateError and spawns no worker', async () => {
    rig = chillerRig();

    await assert.rejects(rig.driver.startHousekeeping(20), (err: unknown) => {
      assert.ok(err instanceof StateError);
      assert.equal(err.message, '[chiller1] Cannot start housekeeping: not connected');
      return true;
    });

    assert.equal(rig.driver.shouldContinueHousekeeping(), false);
    assert.deepEqual(rig.driver.getStatus().housekeeping, {
      enabled: false,
      intervalMs: 30000,
      logToFile: true,
      mode: 'internal',
      worker: null,
    });
    await sleep(50);
    assert.equal(rig.emulator.commands.length, 0);
  });

  it('disconnect() is refused while housekeeping is enabled', async () => {
    rig = chillerRig();
    await rig.driver.connect();
    await rig.driver.startHousekeeping(5000);

    await assert.rejects(rig.driver.disconnect(), StateError);
    assert.equal(rig.driver.isConnected(), true);

    await rig.driver.stopHousekeeping();
    let disconnected = 0;
    rig.driver.on('disconnected', () => disconnected++);
    await rig.driver.disconnect();

    assert.equal(rig.driver.isConnected(), false);
    assert.equal(rig.emulator.isOpen(), false);
    assert.equal(disconnected, 1);
    assert.equal(rig.sink.closed, false, 'a caller-supplied sink is not closed by the driver');
  });

  it('shutdown() stops housekeeping and disconnects', async () => {
    rig = chillerRig();
    await rig.driver.connect();
    await rig.driver.startHousekeeping(5000);

    await rig.driver.shutdown();

    const status = rig.driver.getStatus();
    assert.equal(status.connected, false);
    assert.equal(status.housekeeping.enabled, false);
    assert.equal(status.housekeeping.worker, null);
  });

  it('disconnect() without a connection resolves', async () => {
    rig = chillerRig();
    await rig.driver.disconnect();
    assert.equal(rig.driver.isConnected(), false);
  });

  it('can reconnect after disconnect', async () => {
    rig = chillerRig();
    await rig.driver.connect();
    await rig.driver.disconnect();
    await rig.driver.connect();
    assert.equal(await rig.driver.readTemperature(), 21.5);
  });
});

describe('doHousekeepingCycle', () => {
  let rig: ChillerRig;

  afterEach(async () => {
    await rig.driver.shutdown();
  });

  it('runs while housekeeping is disabled and returns a frozen record', async () => {
    rig = chillerRig();
    await rig.driver.connect();

    const record = await rig.driver.doHousekeepingCycle();

    assert.equal(record.deviceId, 'chiller1');
    assert.equal(record.port, 'emu-chiller');
    assert.ok(record.timestamp instanceof Date);
    assert.deepEqual(
      record.readings.map((r) => [r.measure, r.value, r.unit]),
      [
        ['Cur_Temp', 21.5, 'degC'],
        ['Set_Temp', 20, 'degC'],
        ['Run_Stat', 'DEVICE STANDBY', ''],
        ['Dev_Stat', 'OK', ''],
        ['Pump_Lvl', 3, ''],
        ['Col_Stat', 'ON', ''],
      ],
    );
    assert.equal(Object.isFrozen(record), true);
    assert.equal(Object.isFrozen(record.readings), true);
    assert.equal(Object.isFrozen(record.readings[0]), true);
  });

  it('hands the record to the sink at info level and emits housekeeping', async () => {
    rig = chillerRig();
    await rig.driver.connect();
    const events: MonitorRecord[] = [];
    rig.driver.on('housekeeping', (record: MonitorRecord) => events.push(record));

    const record = await rig.driver.doHousekeepingCycle();

    assert.equal(rig.sink.entries.length, 1);
    assert.equal(rig.sink.entries[0].record, record);
    assert.equal(rig.sink.entries[0].level, 'info');
    assert.deepEqual(events, [record]);
  });

  it('logs at warn when a reading carries an alarm', async () => {
    rig = chillerRig();
    await rig.driver.connect();
    rig.emulator.state.status = 3;

    const record = await rig.driver.doHousekeepingCycle();

    const devStat = record.readings.find((r) => r.measure === 'Dev_Stat');
    assert.deepEqual(devStat, { measure: 'Dev_Stat', value: 'ERROR', unit: '', alarm: true });
    assert.equal(rig.sink.entries[0].level, 'warn');
  });

  it('skips the sink when logToFile is off', async () => {
    rig = chillerRig({ logToFile: false });
    await rig.driver.connect();
    let events = 0;
    rig.driver.on('housekeeping', () => events++);

    await rig.driver.doHousekeepingCycle();

    assert.equal(rig.sink.entries.length, 0);
    assert.equal(events, 1);
  });

  it('startHousekeeping(interval, false) turns file logging off', async () => {
    rig = chillerRig();
    await rig.driver.connect();
    await rig.driver.startHousekeeping(5000, false);

    await rig.driver.doHousekeepingCycle();

    assert.equal(rig.sink.entries.length, 0);
    assert.equal(rig.driver.getStatus().housekeeping.logToFile, false);
  });

  it('a failing sink does not fail the cycle', async () => {
    const emulator = new ChillerEmulator('emu-chiller');
    const brokenSink: RecordSink = {
      emit: () => {
        throw new Error('disk full');
      },
    };
    const driver = new ChillerDriver({
      deviceId: 'chiller1',
      port: 'emu-chiller',
      transportFactory: emulator.factory(),
      recordSink: brokenSink,
    });
    rig = { emulator, driver, sink: new MemorySink() };
    await driver.connect();

    const record = await driver.doHousekeepingCycle();
    assert.equal(record.readings.length, 6);
  });

  it('rejects with the cycle error and releases the lock', async () => {
    rig = chillerRig({ timeoutMs: 20 });
    await rig.driver.connect();
    rig.emulator.mute = true;

    await assert.rejects(rig.driver.doHousekeepingCycle(), (err: unknown) => {
      assert.ok(err instanceof CommunicationError);
      assert.equal(
        err.message,
        '[chiller1] Reply to "IN_PV_00" failed: No terminated response within 20ms on emu-chiller',
      );
      return true;
    });
    assert.equal(rig.sink.entries.length, 0);

    rig.emulator.mute = false;
    assert.equal(await rig.driver.readTemperature(), 21.5);
  });

  it('writes records to a per-device file when no sink is given', async () => {
    const logDir = fs.mkdtempSync(path.join(os.tmpdir(), 'hk-'));
    const emulator = new ChillerEmulator('emu-chiller');
    const driver = new ChillerDriver({
      deviceId: 'chiller1',
      port: 'emu-chiller',
      transportFactory: emulator.factory(),
      logDir,
    });
    rig = { emulator, driver, sink: new MemorySink() };
    await driver.connect();

    await driver.doHousekeepingCycle();
    await driver.disconnect();

    const files = fs.readdirSync(logDir);
    assert.equal(files.length, 1);
    assert.match(files[0], /^chiller1_HK_\d{8}_\d{6}\.log$/);

    const lines = fs
      .readFileSync(path.join(logDir, files[0]), 'utf-8')
      .trim()
      .split('\n')
      .map((line) => JSON.parse(line));
    assert.equal(lines.length, 6);
    assert.equal(lines[0].msg, 'chiller1   emu-chiller   Cur_Temp   21.5//degC');
    assert.equal(lines[0].deviceId, 'chiller1');
    assert.equal(lines[0].measure, 'Cur_Temp');
    assert.equal(lines[2].msg, 'chiller1   emu-chiller   Run_Stat   DEVICE STANDBY//');

    fs.rmSync(logDir, { recursive: true, force: true });
  });
});
