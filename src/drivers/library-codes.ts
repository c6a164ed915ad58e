/**
 * Shared vendor-library conventions: the status/value reply shape and
 * lookups into the code tables (status codes, states, state bit fields).
 * Tables are JSON keyed by the decimal code or bit number.
 */

export const LIBRARY_NO_ERR = 0;

export interface LibraryReply<T> {
  status: number;
  value: T;
}

/** What every open library port can do */
export interface LibrarySession {
  closePort(): Promise<number>;
}

/** Front-panel LED of a controller */
export interface LedData {
  red: boolean;
  green: boolean;
  blue: boolean;
}

export interface CpuData {
  /** 0..1 */
  load: number;
  frequencyHz: number;
}

/** Lit colours joined with '+', or 'off' */
export function ledName(led: LedData): string {
  const lit = [led.red ? 'red' : '', led.green ? 'green' : '', led.blue ? 'blue' : ''].filter(Boolean);
  return lit.length > 0 ? lit.join('+') : 'off';
}

export type CodeTable = Record<string, string>;

export function codeName(table: CodeTable, code: number, fallback: (code: number) => string): string {
  return table[String(code)] ?? fallback(code);
}

/** Names of the bits set in `state`, in bit order */
export function flagNames(table: CodeTable, state: number): string[] {
  return Object.entries(table)
    .filter(([bit]) => (state & (2 ** Number(bit))) !== 0)
    .map(([, name]) => name);
}

export function hex16(value: number): string {
  return `0x${value.toString(16).padStart(4, '0')}`;
}
