/**
 * Config Schema Validation
 *
 * Zod schemas for the instrument station configuration.
 * Provides comprehensive validation with clear error messages.
 */

import { z } from 'zod';

// --- Reusable Validators ---

const positiveMs = z.number().int().positive();

/** Device ids end up in log file names */
const deviceIdSchema = z.string().regex(/^[A-Za-z0-9_.-]+$/, {
  message: 'Device id may contain only letters, digits, ".", "_" and "-"',
});

const housekeepingDefaultsSchema = z.object({
  intervalMs: positiveMs.default(30000),
  logToFile: z.boolean().default(true),
});

const deviceHousekeepingSchema = z.object({
  enabled: z.boolean().default(true),
  intervalMs: positiveMs.optional(),
  logToFile: z.boolean().optional(),
});

// --- Logging Config ---

const loggingConfigSchema = z.object({
  level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).optional(),
  pretty: z.boolean().optional(),
  /** Directory for per-device housekeeping files */
  dir: z.string().min(1).default('logs'),
});

// --- Buses ---

const busSchema = z.object({
  name: z.string().min(1),
  /**
   * external: one station-owned loop polls every device on the bus
   * internal: each device runs its own worker, sharing only the lock
   */
  mode: z.enum(['internal', 'external']).default('external'),
  intervalMs: positiveMs.optional(),
});

// --- Base Device Schema ---

const baseDeviceSchema = z.object({
  id: deviceIdSchema,
  port: z.string().min(1),
  baudRate: z.number().int().positive().optional(),
  timeoutMs: positiveMs.optional(),
  bus: z.string().min(1).optional(),
  housekeeping: deviceHousekeepingSchema.optional(),
});

// --- Device-Specific Schemas ---

const chillerDeviceSchema = baseDeviceSchema.extend({
  type: z.literal('chiller'),
});

const syringePumpDeviceSchema = baseDeviceSchema.extend({
  type: z.literal('syringe-pump'),
  axis: z.number().int().min(0).max(99).optional(),
  mode: z.number().int().min(0).max(9).optional(),
  responseWindowMs: positiveMs.optional(),
});

const tpg366DeviceSchema = baseDeviceSchema.extend({
  type: z.literal('tpg366'),
  deviceAddress: z.number().int().min(1).max(255).optional(),
  channels: z.array(z.number().int().min(1).max(6)).min(1).optional(),
});

const rs485Address = z.number().int().min(1).max(255);

const hipaceDeviceSchema = baseDeviceSchema.extend({
  type: z.literal('hipace'),
  model: z.union([z.literal(80), z.literal(300)]),
  deviceAddress: rs485Address.optional(),
  pumpAddress: rs485Address.optional(),
  gaugeAddress: rs485Address.optional(),
});

const hiscrollDeviceSchema = baseDeviceSchema.extend({
  type: z.literal('hiscroll12'),
  deviceAddress: rs485Address.optional(),
});

const psuDeviceSchema = baseDeviceSchema.extend({
  type: z.literal('psu'),
});

const amprDeviceSchema = baseDeviceSchema.extend({
  type: z.literal('ampr'),
});

const hvSwitchDeviceSchema = baseDeviceSchema.extend({
  type: z.literal('hv-switch'),
});

// --- Discriminated Union for Devices ---

const deviceSchema = z.discriminatedUnion('type', [
  chillerDeviceSchema,
  syringePumpDeviceSchema,
  tpg366DeviceSchema,
  hipaceDeviceSchema,
  hiscrollDeviceSchema,
  psuDeviceSchema,
  amprDeviceSchema,
  hvSwitchDeviceSchema,
]);

// --- Full Station Config Schema ---

export const stationConfigSchema = z.object({
  logging: loggingConfigSchema.default({}),
  housekeeping: housekeepingDefaultsSchema.default({}),
  buses: z.array(busSchema).default([]),
  devices: z.array(deviceSchema).default([]),
}).superRefine((config, ctx) => {
  const ids = new Set<string>();
  config.devices.forEach((device, i) => {
    if (ids.has(device.id)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['devices', i, 'id'], message: `Duplicate device id "${device.id}"` });
    }
    ids.add(device.id);
  });

  const buses = new Set<string>();
  config.buses.forEach((bus, i) => {
    if (buses.has(bus.name)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['buses', i, 'name'], message: `Duplicate bus "${bus.name}"` });
    }
    buses.add(bus.name);
  });

  const externalBuses = new Set(config.buses.filter((bus) => bus.mode === 'external').map((bus) => bus.name));
  config.devices.forEach((device, i) => {
    if (device.bus !== undefined && !buses.has(device.bus)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['devices', i, 'bus'], message: `Unknown bus "${device.bus}"` });
    }
    // the bus loop polls at the bus interval
    if (device.bus !== undefined && externalBuses.has(device.bus) && device.housekeeping?.intervalMs !== undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['devices', i, 'housekeeping', 'intervalMs'],
        message: `Devices on external bus "${device.bus}" are polled at the bus interval; set buses[].intervalMs instead`,
      });
    }
  });
});

// --- Type Exports ---

export type StationConfigInput = z.input<typeof stationConfigSchema>;
export type StationConfig = z.output<typeof stationConfigSchema>;
export type DeviceConfig = StationConfig['devices'][number];
export type DeviceType = DeviceConfig['type'];
export type BusConfig = StationConfig['buses'][number];

/**
 * Validate station config
 */
export function validateStationConfig(data: unknown): StationConfig {
  return stationConfigSchema.parse(data);
}

/**
 * Format Zod errors into readable messages
 */
export function formatZodError(error: z.ZodError): string {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : 'config';
    return `  - ${path}: ${issue.message}`;
  }).join('\n');
}
