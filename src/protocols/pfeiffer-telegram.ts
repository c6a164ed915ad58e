/**
 * Pfeiffer Vacuum RS-485 telegram frame
 *
 * Frame:  AAA A0 PPP LL DATA CCC \r
 *   AAA  = unit address (000-999)
 *   A    = action: 0 query / 1 control (replies always carry 1)
 *   PPP  = parameter number
 *   LL   = data length
 *   DATA = LL ASCII characters ("=?" for a query)
 *   CCC  = sum of all preceding character codes, mod 256
 *
 * Replies whose data is NO_DEF, _RANGE or _LOGIC are instrument-side
 * rejections and parse to a TelegramError.
 */

export const TELEGRAM_TERMINATOR = '\r';

/** Shortest well-formed reply: header (10) + checksum (3) + terminator */
const MIN_FRAME_LENGTH = 14;

export const ErrorWord = {
  NO_DEF: 'undefined parameter number',
  _RANGE: 'data is out of range',
  _LOGIC: 'logic access violation',
} as const;

export type ErrorWordCode = keyof typeof ErrorWord;
export type TelegramErrorCode = ErrorWordCode | 'FRAME';

export class TelegramError extends Error {
  readonly code: TelegramErrorCode;

  constructor(code: TelegramErrorCode, message: string) {
    super(message);
    this.name = 'TelegramError';
    this.code = code;
  }
}

export interface Telegram {
  address: number;
  /** 0 = query, 1 = control or reply */
  action: number;
  parameter: number;
  data: string;
}

function isErrorWord(data: string): data is ErrorWordCode {
  return Object.prototype.hasOwnProperty.call(ErrorWord, data);
}

function field(value: number, width: number, name: string): string {
  const max = 10 ** width - 1;
  if (!Number.isInteger(value) || value < 0 || value > max) {
    throw new RangeError(`${name} ${value} outside range 0-${max}`);
  }
  return String(value).padStart(width, '0');
}

export function checksum(text: string): number {
  let sum = 0;
  for (let i = 0; i < text.length; i++) {
    sum += text.charCodeAt(i);
  }
  return sum % 256;
}

function seal(body: string): string {
  return `${body}${field(checksum(body), 3, 'checksum')}${TELEGRAM_TERMINATOR}`;
}

/** Build a query ("=?") telegram for one parameter */
export function buildDataRequest(address: number, parameter: number): string {
  return seal(`${field(address, 3, 'address')}00${field(parameter, 3, 'parameter')}02=?`);
}

/** Build a control telegram writing `data` to one parameter */
export function buildControlCommand(address: number, parameter: number, data: string): string {
  return seal(`${field(address, 3, 'address')}10${field(parameter, 3, 'parameter')}${field(data.length, 2, 'data length')}${data}`);
}

/** Build a reply telegram (what the instrument sends back) */
export function buildReply(address: number, parameter: number, data: string): string {
  return buildControlCommand(address, parameter, data);
}

/**
 * Parse and validate one telegram. Checks length, terminator, checksum and
 * the declared data length, then rejects the three error words.
 */
export function parseTelegram(frame: string): Telegram {
  if (frame.length < MIN_FRAME_LENGTH) {
    throw new TelegramError('FRAME', `Telegram too short to be valid (${frame.length} chars)`);
  }
  if (!frame.endsWith(TELEGRAM_TERMINATOR)) {
    throw new TelegramError('FRAME', 'Telegram incorrectly terminated');
  }

  const body = frame.slice(0, -4);
  const declared = frame.slice(-4, -1);
  if (!/^\d{3}$/.test(declared) || parseInt(declared, 10) !== checksum(body)) {
    throw new TelegramError('FRAME', `Invalid checksum in telegram (got ${declared}, expected ${checksum(body)})`);
  }

  const header = body.slice(0, 10);
  if (!/^\d{10}$/.test(header)) {
    throw new TelegramError('FRAME', `Malformed telegram header "${header}"`);
  }

  const data = body.slice(10);
  const length = parseInt(header.slice(8, 10), 10);
  if (length !== data.length) {
    throw new TelegramError('FRAME', `Telegram declares ${length} data chars but carries ${data.length}`);
  }

  if (isErrorWord(data)) {
    throw new TelegramError(data, `Instrument rejected parameter ${header.slice(5, 8)}: ${ErrorWord[data]}`);
  }

  return {
    address: parseInt(header.slice(0, 3), 10),
    action: parseInt(header.slice(3, 4), 10),
    parameter: parseInt(header.slice(5, 8), 10),
    data,
  };
}
