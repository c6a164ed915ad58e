#!/usr/bin/env node

/**
 * Lab Instrument Station
 *
 * Connects the instruments listed in config.yml and keeps their
 * housekeeping monitors running:
 *   chiller       line protocol over serial
 *   syringe-pump  line protocol over serial, multi-line replies
 *   tpg366        Pfeiffer telegram protocol over RS-485
 *   hipace        HiPace 80/300 station: OmniControl, drive, optional gauge
 *   hiscroll12    HiScroll 12 scroll pump, same telegram protocol
 *   psu           vendor library session
 *   ampr          vendor library session, amplifier modules 0-11
 *   hv-switch     vendor library session, four switches and pulsers
 *
 * Usage:
 *   lab-instruments                    # Use config.yml in current directory
 *   lab-instruments --config ./my.yml  # Use a specific config file
 *   lab-instruments --emulate          # Talk to in-process emulators
 *   lab-instruments --once             # One housekeeping cycle per device, then exit
 *   lab-instruments --list-ports       # List serial ports and exit
 */

import * as fs from 'fs';
import { loadConfig } from './config';
import { errorMessage } from './errors';
import { formatReading } from './housekeeping/record-sink';
import { initLogger } from './logger';
import { DeviceStation } from './station/device-station';
import { listSerialPorts } from './transport/serial-transport';

export interface CliOptions {
  configPath?: string;
  verbose: boolean;
  emulate: boolean;
  once: boolean;
  listPorts: boolean;
  help: boolean;
}

function printBanner(): void {
  console.log('');
  console.log('  Lab Instrument Station');
  console.log('  ─────────────────────────────────────────────');
  console.log('');
}

function printHelp(): void {
  console.log('  Options:');
  console.log('    --config, -c <path>   Path to config YAML file');
  console.log('    --verbose, -v         Enable debug logging');
  console.log('    --emulate             Wire every device to its in-process emulator');
  console.log('    --once                Run one housekeeping cycle per device, print it and exit');
  console.log('    --list-ports          List serial ports and exit');
  console.log('    --help, -h            Show this help');
  console.log('');
}

/** Pure argument parsing; unknown arguments are rejected */
export function parseArgs(argv: string[]): CliOptions {
  const options: CliOptions = { verbose: false, emulate: false, once: false, listPorts: false, help: false };

  for (let i = 2; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '--config':
      case '-c': {
        const configPath = argv[++i];
        if (!configPath) {
          throw new Error('--config requires a file path (e.g. --config ./config.yml)');
        }
        options.configPath = configPath;
        break;
      }
      case '--verbose':
      case '-v':
        options.verbose = true;
        break;
      case '--emulate':
        options.emulate = true;
        break;
      case '--once':
        options.once = true;
        break;
      case '--list-ports':
        options.listPorts = true;
        break;
      case '--help':
      case '-h':
        options.help = true;
        break;
      default:
        throw new Error(`Unknown argument "${arg}" (see --help)`);
    }
  }

  return options;
}

async function listPorts(): Promise<void> {
  const ports = await listSerialPorts();
  if (ports.length === 0) {
    console.log('No serial ports found');
    return;
  }
  for (const port of ports) {
    const details = [port.manufacturer, port.serialNumber].filter(Boolean).join(', ');
    console.log(details ? `${port.path}  (${details})` : port.path);
  }
}

/** Connect, run one cycle everywhere, print the readings; exit code 1 if any device failed */
async function runOnce(station: DeviceStation): Promise<number> {
  const connected = await station.connectAll();
  const outcomes = await station.runOnce();

  for (const outcome of outcomes) {
    if (outcome.ok) {
      for (const reading of outcome.record.readings) {
        console.log(formatReading(outcome.record.deviceId, outcome.record.port, reading));
      }
    } else {
      console.error(`[${outcome.deviceId}] ${outcome.error}`);
    }
  }

  await station.shutdown();
  const failed = station.drivers.length - connected.length + outcomes.filter((o) => !o.ok).length;
  return failed === 0 ? 0 : 1;
}

async function main(): Promise<void> {
  let options: CliOptions;
  try {
    options = parseArgs(process.argv);
  } catch (err) {
    console.error(`[Error] ${errorMessage(err)}`);
    process.exit(1);
  }

  if (options.help) {
    printBanner();
    printHelp();
    process.exit(0);
  }

  if (options.listPorts) {
    await listPorts();
    return;
  }

  // An explicit config path must exist; the default one may be missing
  if (options.configPath && !fs.existsSync(options.configPath)) {
    console.error(`[Error] Config file not found: ${options.configPath}`);
    process.exit(1);
  }

  if (options.verbose) initLogger({ level: 'debug' });
  const config = loadConfig(options.configPath);
  initLogger({
    level: options.verbose ? 'debug' : config.logging.level,
    pretty: config.logging.pretty,
  });

  const station = new DeviceStation(config, { emulate: options.emulate });

  if (options.once) {
    process.exitCode = await runOnce(station);
    return;
  }

  printBanner();

  let stopping = false;
  const stop = (): void => {
    if (stopping) return;
    stopping = true;
    console.log('\n[Station] Shutting down...');
    station.shutdown().then(
      () => process.exit(0),
      (err: unknown) => {
        console.error(`[Station] Shutdown failed: ${errorMessage(err)}`);
        process.exit(1);
      },
    );
  };
  process.on('SIGINT', stop);
  process.on('SIGTERM', stop);

  await station.start();
}

// Only run main() when this file is the entry point (not when imported for testing)
if (require.main === module) {
  main().catch((err: unknown) => {
    console.error(`[Error] ${errorMessage(err)}`);
    process.exit(1);
  });
}
