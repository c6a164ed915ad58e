import { describe, it } from 'node:test';
import * as assert from 'node:assert/strict';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { loadConfig, parseConfig } from '../config';
import { formatZodError, stationConfigSchema } from '../config-schema';
import './helpers';

function configError(document: unknown): string {
  try {
    parseConfig(document, '/srv/lab');
  } catch (err) {
    assert.ok(err instanceof Error);
    return err.message;
  }
  assert.fail('expected the config to be rejected');
}

describe('parseConfig', () => {
  it('fills defaults for an empty document', () => {
    const config = parseConfig(null, '/srv/lab');

    assert.deepEqual(config.housekeeping, { intervalMs: 30000, logToFile: true });
    assert.equal(config.logging.dir, path.resolve('/srv/lab', 'logs'));
    assert.equal(config.logging.level, undefined);
    assert.deepEqual(config.buses, []);
    assert.deepEqual(config.devices, []);
  });

  it('resolves the log directory against the config directory', () => {
    assert.equal(parseConfig({ logging: { dir: 'hk' } }, '/srv/lab').logging.dir, path.resolve('/srv/lab', 'hk'));
    assert.equal(parseConfig({ logging: { dir: '/var/log/lab' } }, '/srv/lab').logging.dir, '/var/log/lab');
  });

  it('parses every device type with its own fields', () => {
    const config = parseConfig(
      {
        buses: [{ name: 'rs485' }],
        devices: [
          { id: 'chiller1', type: 'chiller', port: 'COM3' },
          { id: 'pump1', type: 'syringe-pump', port: 'COM4', axis: 2, mode: 1, housekeeping: { intervalMs: 5000 } },
          { id: 'gauge1', type: 'tpg366', port: '/dev/ttyUSB2', bus: 'rs485', deviceAddress: 11, channels: [1, 2] },
          { id: 'turbo1', type: 'hipace', port: '/dev/ttyUSB2', bus: 'rs485', model: 300, pumpAddress: 12 },
          { id: 'scroll1', type: 'hiscroll12', port: '/dev/ttyUSB2', bus: 'rs485', deviceAddress: 20 },
          { id: 'hv1', type: 'psu', port: 'COM5' },
          { id: 'amp1', type: 'ampr', port: 'COM7', baudRate: 115200 },
          { id: 'sw1', type: 'hv-switch', port: 'COM9' },
        ],
      },
      '/srv/lab',
    );

    assert.deepEqual(config.buses, [{ name: 'rs485', mode: 'external' }]);
    assert.deepEqual(
      config.devices.map((d) => d.type),
      ['chiller', 'syringe-pump', 'tpg366', 'hipace', 'hiscroll12', 'psu', 'ampr', 'hv-switch'],
    );

    const pump = config.devices[1];
    assert.ok(pump.type === 'syringe-pump');
    assert.equal(pump.axis, 2);
    assert.deepEqual(pump.housekeeping, { enabled: true, intervalMs: 5000 });

    const gauge = config.devices[2];
    assert.ok(gauge.type === 'tpg366');
    assert.equal(gauge.deviceAddress, 11);
    assert.deepEqual(gauge.channels, [1, 2]);

    const turbo = config.devices[3];
    assert.ok(turbo.type === 'hipace');
    assert.equal(turbo.model, 300);
    assert.equal(turbo.pumpAddress, 12);
    assert.equal(turbo.deviceAddress, undefined);
  });

  it('rejects duplicate device ids', () => {
    const message = configError({
      devices: [
        { id: 'g1', type: 'tpg366', port: 'COM1' },
        { id: 'g1', type: 'tpg366', port: 'COM2' },
      ],
    });
    assert.equal(message, '[Config] Validation failed:\n  - devices.1.id: Duplicate device id "g1"');
  });

  it('rejects duplicate buses and devices on unknown buses', () => {
    const message = configError({
      buses: [{ name: 'rs485' }, { name: 'rs485', mode: 'internal' }],
      devices: [{ id: 'g1', type: 'tpg366', port: 'COM1', bus: 'rs232' }],
    });
    assert.equal(
      message,
      '[Config] Validation failed:\n' +
        '  - buses.1.name: Duplicate bus "rs485"\n' +
        '  - devices.0.bus: Unknown bus "rs232"',
    );
  });

  it('rejects a device interval on an external bus', () => {
    const message = configError({
      buses: [{ name: 'rs485', intervalMs: 200 }],
      devices: [{ id: 'g1', type: 'tpg366', port: 'COM1', bus: 'rs485', housekeeping: { intervalMs: 20 } }],
    });
    assert.equal(
      message,
      '[Config] Validation failed:\n' +
        '  - devices.0.housekeeping.intervalMs: Devices on external bus "rs485" are polled at the bus interval; ' +
        'set buses[].intervalMs instead',
    );
  });

  it('keeps a device interval on an internal bus', () => {
    const config = parseConfig(
      {
        buses: [{ name: 'bench', mode: 'internal' }],
        devices: [{ id: 'g1', type: 'tpg366', port: 'COM1', bus: 'bench', housekeeping: { intervalMs: 20 } }],
      },
      '/srv/lab',
    );
    assert.deepEqual(config.devices[0].housekeeping, { enabled: true, intervalMs: 20 });
  });

  it('rejects device ids that cannot name a log file', () => {
    const message = configError({ devices: [{ id: 'gauge 1', type: 'tpg366', port: 'COM1' }] });
    assert.equal(
      message,
      '[Config] Validation failed:\n  - devices.0.id: Device id may contain only letters, digits, ".", "_" and "-"',
    );
  });

  it('rejects unknown device types and out-of-range fields', () => {
    assert.match(
      configError({ devices: [{ id: 'x', type: 'laser', port: 'COM1' }] }),
      /devices\.0\.type: Invalid discriminator value/,
    );
    assert.match(
      configError({ devices: [{ id: 'g', type: 'tpg366', port: 'COM1', channels: [7] }] }),
      /devices\.0\.channels\.0: /,
    );
    assert.match(
      configError({ devices: [{ id: 't', type: 'hipace', port: 'COM1', model: 200 }] }),
      /devices\.0\.model: /,
    );
    assert.match(configError({ housekeeping: { intervalMs: 0 } }), /housekeeping\.intervalMs: /);
  });
});

describe('formatZodError', () => {
  it('names the root "config" when the issue has no path', () => {
    const result = stationConfigSchema.safeParse('not a mapping');
    assert.equal(result.success, false);
    assert.ok(!result.success);
    assert.equal(formatZodError(result.error), '  - config: Expected object, received string');
  });
});

describe('loadConfig', () => {
  it('falls back to defaults when the file is missing', () => {
    const config = loadConfig(path.join(os.tmpdir(), 'no-such-dir', 'config.yml'));
    assert.deepEqual(config.devices, []);
    assert.equal(config.logging.dir, path.resolve(process.cwd(), 'logs'));
  });

  it('reads YAML and resolves paths next to the file', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'lab-config-'));
    const file = path.join(dir, 'config.yml');
    fs.writeFileSync(
      file,
      [
        'logging:',
        '  level: debug',
        '  dir: hk-logs',
        'housekeeping:',
        '  intervalMs: 1000',
        'devices:',
        '  - id: chiller1',
        '    type: chiller',
        '    port: /dev/ttyUSB0',
        '',
      ].join('\n'),
    );

    const config = loadConfig(file);

    assert.equal(config.logging.level, 'debug');
    assert.equal(config.logging.dir, path.join(dir, 'hk-logs'));
    assert.deepEqual(config.housekeeping, { intervalMs: 1000, logToFile: true });
    assert.equal(config.devices[0].id, 'chiller1');

    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('accepts the shipped example config', () => {
    const config = loadConfig(path.join(__dirname, '..', '..', 'config.example.yml'));

    assert.deepEqual(
      config.devices.map((d) => [d.id, d.type, d.bus ?? null]),
      [
        ['chiller1', 'chiller', null],
        ['pump1', 'syringe-pump', null],
        ['gauge1', 'tpg366', 'rs485'],
        ['gauge2', 'tpg366', 'rs485'],
        ['turbo1', 'hipace', 'rs485b'],
        ['scroll1', 'hiscroll12', 'rs485b'],
        ['hv1', 'psu', null],
        ['amp1', 'ampr', null],
        ['sw1', 'hv-switch', null],
      ],
    );
    assert.deepEqual(config.buses, [
      { name: 'rs485', mode: 'external', intervalMs: 10000 },
      { name: 'rs485b', mode: 'internal' },
    ]);
  });
});
