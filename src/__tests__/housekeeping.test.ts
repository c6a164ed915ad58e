import { describe, it, beforeEach, afterEach } from 'node:test';
import * as assert from 'node:assert/strict';
import { CommLock } from '../drivers/comm-lock';
import { ExchangeRecorder } from '../emulators/exchange-recorder';
import { HousekeepingController } from '../housekeeping/housekeeping-controller';
import { HousekeepingWorker } from '../housekeeping/housekeeping-worker';
import { getLogger } from '../logger';
import { ChillerRig, chillerRig, sleep } from './helpers';

const CYCLE_COMMANDS = 6;

function controller(overrides: { intervalMs?: number; external?: string; runCycle?: () => Promise<unknown> } = {}) {
  return new HousekeepingController({
    deviceId: 'dev',
    defaults: { intervalMs: overrides.intervalMs ?? 1000, logToFile: false },
    externalWorker: overrides.external ? { name: overrides.external } : undefined,
    runCycle: overrides.runCycle ?? (async () => undefined),
    log: getLogger('Test'),
  });
}

// =========================================================================
// HousekeepingController
// =========================================================================

describe('HousekeepingController', () => {
  it('is created disabled with no worker', () => {
    const ctl = controller();
    assert.equal(ctl.shouldContinue(), false);
    assert.equal(ctl.hasWorker(), false);
    assert.deepEqual(ctl.snapshot(), {
      enabled: false,
      intervalMs: 1000,
      logToFile: false,
      mode: 'internal',
      worker: null,
    });
  });

  it('rejects a non-positive interval without enabling', async () => {
    const ctl = controller();
    await assert.rejects(ctl.start(0), RangeError);
    assert.equal(ctl.shouldContinue(), false);
    assert.equal(ctl.hasWorker(), false);
  });

  it('start twice keeps one worker and the latest interval', async () => {
    let cycles = 0;
    const ctl = controller({
      runCycle: async () => {
        cycles++;
      },
    });

    await ctl.start(1000);
    await ctl.start(40);
    assert.equal(ctl.hasWorker(), true);
    assert.equal(ctl.snapshot().worker, 'HK_dev');
    assert.equal(ctl.intervalMs, 40);

    await sleep(130);
    await ctl.stop();

    // One worker at 40ms gives ~3 cycles; the 1000ms sleep was re-armed
    assert.ok(cycles >= 2 && cycles <= 4, `expected 2-4 cycles, got ${cycles}`);
    assert.equal(ctl.hasWorker(), false);
  });

  it('flag reads false for every caller once stop() resolves', async () => {
    const ctl = controller();
    await ctl.start(1000);
    assert.equal(ctl.shouldContinue(), true);

    await ctl.stop();
    assert.deepEqual([ctl.shouldContinue(), ctl.shouldContinue(), ctl.shouldContinue()], [false, false, false]);

    await ctl.start();
    assert.equal(ctl.shouldContinue(), true);
    await ctl.stop();
  });

  it('external mode never spawns a worker', async () => {
    let cycles = 0;
    const ctl = controller({
      external: 'bench-loop',
      runCycle: async () => {
        cycles++;
      },
    });

    await ctl.start(5);
    await sleep(40);

    assert.equal(cycles, 0);
    assert.equal(ctl.hasWorker(), false);
    assert.deepEqual(ctl.snapshot(), {
      enabled: true,
      intervalMs: 5,
      logToFile: false,
      mode: 'external',
      worker: 'bench-loop',
    });

    await ctl.stop();
    assert.equal(ctl.shouldContinue(), false);
  });

  it('stop() before any start() is a no-op', async () => {
    const ctl = controller();
    await ctl.stop();
    assert.equal(ctl.shouldContinue(), false);
  });
});

// =========================================================================
// HousekeepingWorker
// =========================================================================

describe('HousekeepingWorker', () => {
  it('keeps its cadence when cycles fail', async () => {
    let enabled = true;
    const worker = new HousekeepingWorker(
      'HK_test',
      {
        intervalMs: () => 20,
        isEnabled: () => enabled,
        runCycle: async () => {
          throw new Error('device unplugged');
        },
      },
      getLogger('Test'),
    );

    await sleep(110);
    enabled = false;
    worker.wake();
    await worker.done;

    assert.ok(worker.cycles >= 3, `expected at least 3 cycles, got ${worker.cycles}`);
    assert.equal(worker.failures, worker.cycles);
  });

  it('sleeps before the first cycle', async () => {
    let cycles = 0;
    let enabled = true;
    const worker = new HousekeepingWorker(
      'HK_test',
      {
        intervalMs: () => 200,
        isEnabled: () => enabled,
        runCycle: async () => {
          cycles++;
        },
      },
      getLogger('Test'),
    );

    await sleep(30);
    assert.equal(cycles, 0);

    enabled = false;
    worker.wake();
    await worker.done;
    assert.equal(cycles, 0);
  });
});

// =========================================================================
// Driver housekeeping: internal mode
// =========================================================================

describe('Internal mode housekeeping', () => {
  let rig: ChillerRig;

  afterEach(async () => {
    await rig.driver.shutdown();
  });

  it('runs 2-4 cycles in 350ms at a 100ms interval', async () => {
    rig = chillerRig();
    await rig.driver.connect();

    await rig.driver.startHousekeeping(100);
    await sleep(350);
    await rig.driver.stopHousekeeping();

    const cycles = rig.sink.entries.length;
    assert.ok(cycles >= 2 && cycles <= 4, `expected 2-4 cycles, got ${cycles}`);
    assert.equal(rig.emulator.commands.length, cycles * CYCLE_COMMANDS);
  });

  it('no exchange happens after stopHousekeeping() resolves', async () => {
    const recorder = new ExchangeRecorder();
    rig = chillerRig({ latencyMs: 10, recorder });
    await rig.driver.connect();

    await rig.driver.startHousekeeping(20);
    await sleep(100);
    await rig.driver.stopHousekeeping();

    const sent = rig.emulator.commands.length;
    assert.equal(recorder.active, 0);
    // The cycle in flight at stop() ran to completion
    assert.equal(sent % CYCLE_COMMANDS, 0);
    assert.equal(rig.sink.entries.length, sent / CYCLE_COMMANDS);

    await sleep(100);
    assert.equal(rig.emulator.commands.length, sent);
  });

  it('shouldContinueHousekeeping() is false right after stop', async () => {
    rig = chillerRig();
    await rig.driver.connect();

    await rig.driver.startHousekeeping(1000);
    assert.equal(rig.driver.shouldContinueHousekeeping(), true);

    await rig.driver.stopHousekeeping();
    assert.deepEqual(
      [1, 2, 3].map(() => rig.driver.shouldContinueHousekeeping()),
      [false, false, false],
    );
    assert.equal(rig.driver.getStatus().housekeeping.worker, null);
  });

  it('a repeated start reports the new interval and one worker', async () => {
    rig = chillerRig();
    await rig.driver.connect();

    await rig.driver.startHousekeeping(5000);
    await rig.driver.startHousekeeping(30);

    assert.deepEqual(rig.driver.getStatus().housekeeping, {
      enabled: true,
      intervalMs: 30,
      logToFile: true,
      mode: 'internal',
      worker: 'HK_chiller1',
    });
    assert.equal(rig.driver.housekeepingIntervalMs, 30);

    await sleep(100);
    await rig.driver.stopHousekeeping();
    assert.ok(rig.sink.entries.length >= 2, `expected cycles at the new interval, got ${rig.sink.entries.length}`);
  });

  it('keeps cycling after failed cycles', async () => {
    rig = chillerRig({ timeoutMs: 10 });
    await rig.driver.connect();
    rig.emulator.mute = true;

    await rig.driver.startHousekeeping(20);
    await sleep(80);
    rig.emulator.mute = false;
    await sleep(80);
    await rig.driver.stopHousekeeping();

    const firstQueries = rig.emulator.commands.filter((c) => c === 'IN_PV_00').length;
    assert.ok(rig.sink.entries.length >= 1, 'expected a successful cycle after unmuting');
    assert.ok(firstQueries > rig.sink.entries.length, 'expected failed cycles before the successful ones');
  });
});

// =========================================================================
// Driver housekeeping: external mode
// =========================================================================

describe('External mode housekeeping', () => {
  let rig: ChillerRig;

  beforeEach(() => {
    rig = chillerRig({ hkWorker: { name: 'bench-loop' }, commLock: new CommLock('bench') });
  });

  afterEach(async () => {
    await rig.driver.shutdown();
  });

  it('start spawns nothing; only explicit cycles touch the transport', async () => {
    await rig.driver.connect();
    await rig.driver.startHousekeeping(5);
    await sleep(50);

    assert.equal(rig.emulator.commands.length, 0);
    assert.equal(rig.driver.getStatus().housekeeping.mode, 'external');
    assert.equal(rig.driver.getStatus().housekeeping.worker, 'bench-loop');

    await rig.driver.doHousekeepingCycle();
    assert.equal(rig.emulator.commands.length, CYCLE_COMMANDS);
  });

  it('three manual cycles emit exactly three records', async () => {
    await rig.driver.connect();
    await rig.driver.startHousekeeping();

    for (let i = 0; i < 3; i++) {
      await rig.driver.doHousekeepingCycle();
    }
    await sleep(30);

    assert.equal(rig.sink.entries.length, 3);
    assert.equal(rig.emulator.commands.length, 3 * CYCLE_COMMANDS);
    assert.ok(rig.sink.entries.every((e) => e.record.deviceId === 'chiller1'));
  });

  it('stop only flips the flag; a caller may still run cycles', async () => {
    await rig.driver.connect();
    await rig.driver.startHousekeeping();
    await rig.driver.stopHousekeeping();

    assert.equal(rig.driver.shouldContinueHousekeeping(), false);
    const record = await rig.driver.doHousekeepingCycle();
    assert.equal(record.readings.length, 6);
  });
});
