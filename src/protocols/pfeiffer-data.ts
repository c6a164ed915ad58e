/**
 * Pfeiffer Vacuum data types
 *
 * Every parameter value travels as fixed-width ASCII. Types by number:
 *   0  boolean_old   "111111" | "000000"
 *   1  u_integer     6 digits, 0-999999
 *   2  u_real        6 digits, value × 100
 *   4  string        6 printable chars, space padded
 *   6  boolean_new   "1" | "0"
 *   7  u_short_int   3 digits, 0-999
 *   10 u_expo_new    4-digit mantissa (× 1000) + 2-digit exponent (+ 20)
 *   11 string16      16 printable chars
 *   12 string8       8 printable chars
 */

export class DataFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DataFormatError';
  }
}

interface PfeifferTypeMap {
  boolean_old: boolean;
  u_integer: number;
  u_real: number;
  string: string;
  boolean_new: boolean;
  u_short_int: number;
  u_expo_new: number;
  string16: string;
  string8: string;
}

export type PfeifferDataType = keyof PfeifferTypeMap;
export type PfeifferValue<K extends PfeifferDataType> = PfeifferTypeMap[K];

interface Codec<T> {
  encode(value: T): string;
  decode(raw: string): T;
}

function digits(raw: string, width: number, type: string): number {
  if (raw.length !== width || !/^\d+$/.test(raw)) {
    throw new DataFormatError(`Invalid ${type} value "${raw}"`);
  }
  return parseInt(raw, 10);
}

function padInt(value: number, width: number, type: string): string {
  const max = 10 ** width - 1;
  if (!Number.isInteger(value) || value < 0 || value > max) {
    throw new RangeError(`${type} value ${value} outside range 0-${max}`);
  }
  return String(value).padStart(width, '0');
}

/** Keep printable ASCII (32-127), pad with spaces or truncate */
function fixedString(value: string, width: number): string {
  const filtered = Array.from(value)
    .filter((c) => {
      const code = c.charCodeAt(0);
      return code >= 32 && code <= 127;
    })
    .join('');
  return filtered.padEnd(width).slice(0, width);
}

export function encodeExpo(value: number): string {
  if (value === 0) return '100000';
  if (!Number.isFinite(value) || value < 0) {
    throw new RangeError(`u_expo_new value ${value} must be a non-negative finite number`);
  }
  // toExponential(3) rounds the mantissa and carries into the exponent
  const [mantissa, exponent] = value.toExponential(3).split('e');
  const mantissaInt = mantissa.replace('.', '');
  const expo = Math.max(0, Math.min(99, parseInt(exponent, 10) + 20));
  return `${mantissaInt}${String(expo).padStart(2, '0')}`;
}

export function decodeExpo(raw: string): number {
  if (!/^\d{6}$/.test(raw)) {
    throw new DataFormatError(`Invalid u_expo_new value "${raw}"`);
  }
  const mantissa = parseInt(raw.slice(0, 4), 10) / 1000;
  const exponent = parseInt(raw.slice(4, 6), 10) - 20;
  // Parsing the decimal form avoids the rounding of mantissa * 10 ** exponent
  return Number(`${mantissa}e${exponent}`);
}

const codecs: { [K in PfeifferDataType]: Codec<PfeifferTypeMap[K]> } = {
  boolean_old: {
    encode: (v) => (v ? '111111' : '000000'),
    decode: (raw) => {
      if (raw === '111111') return true;
      if (raw === '000000') return false;
      throw new DataFormatError(`Invalid boolean_old value "${raw}"`);
    },
  },
  u_integer: {
    encode: (v) => padInt(v, 6, 'u_integer'),
    decode: (raw) => digits(raw, 6, 'u_integer'),
  },
  u_real: {
    encode: (v) => padInt(Math.round(v * 100), 6, 'u_real'),
    decode: (raw) => digits(raw, 6, 'u_real') / 100,
  },
  string: {
    encode: (v) => fixedString(v, 6),
    decode: (raw) => raw.trimEnd(),
  },
  boolean_new: {
    encode: (v) => (v ? '1' : '0'),
    decode: (raw) => {
      if (raw === '1') return true;
      if (raw === '0') return false;
      throw new DataFormatError(`Invalid boolean_new value "${raw}"`);
    },
  },
  u_short_int: {
    encode: (v) => padInt(v, 3, 'u_short_int'),
    decode: (raw) => digits(raw, 3, 'u_short_int'),
  },
  u_expo_new: {
    encode: encodeExpo,
    decode: decodeExpo,
  },
  string16: {
    encode: (v) => fixedString(v, 16),
    decode: (raw) => raw.trimEnd(),
  },
  string8: {
    encode: (v) => fixedString(v, 8),
    decode: (raw) => raw.trimEnd(),
  },
};

export function encodeValue<K extends PfeifferDataType>(type: K, value: PfeifferValue<K>): string {
  return codecs[type].encode(value);
}

export function decodeValue<K extends PfeifferDataType>(type: K, raw: string): PfeifferValue<K> {
  return codecs[type].decode(raw);
}
