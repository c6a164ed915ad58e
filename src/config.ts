/**
 * Configuration loader
 *
 * Reads the station's YAML config (buses, devices, housekeeping defaults).
 * A missing file is not an error: the station starts empty with defaults.
 */

import * as fs from 'fs';
import * as path from 'path';
import { parse } from 'yaml';
import { ZodError } from 'zod';
import { StationConfig, formatZodError, validateStationConfig } from './config-schema';
import { getLogger } from './logger';

export type { BusConfig, DeviceConfig, DeviceType, StationConfig } from './config-schema';

export const DEFAULT_CONFIG_FILE = 'config.yml';

/**
 * Load and validate config from YAML. Relative logging.dir is resolved
 * against the config file's directory.
 */
export function loadConfig(configPath?: string): StationConfig {
  const log = getLogger('Config');
  const resolvedPath = configPath ?? path.join(process.cwd(), DEFAULT_CONFIG_FILE);

  if (!fs.existsSync(resolvedPath)) {
    log.info({ path: resolvedPath }, 'No config file found, using defaults');
    return parseConfig({}, process.cwd());
  }

  const raw = fs.readFileSync(resolvedPath, 'utf-8');
  const config = parseConfig(parse(raw), path.dirname(resolvedPath));
  log.info({ path: resolvedPath, devices: config.devices.length, buses: config.buses.length }, 'Config loaded');
  return config;
}

/** Validate an already-parsed document; an empty document means defaults */
export function parseConfig(document: unknown, baseDir: string): StationConfig {
  let validated: StationConfig;
  try {
    validated = validateStationConfig(document ?? {});
  } catch (error) {
    if (error instanceof ZodError) {
      throw new Error(`[Config] Validation failed:\n${formatZodError(error)}`);
    }
    throw error;
  }

  return {
    ...validated,
    logging: {
      ...validated.logging,
      dir: path.resolve(baseDir, validated.logging.dir),
    },
  };
}
