/**
 * Transport contract
 *
 * A duplex byte channel to one instrument. Every call can fail on its own,
 * so results come back as Result values instead of exceptions; the driver
 * layer decides which error class a failure becomes.
 */

export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function Ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

/** Successful result without a payload */
export const Done: Result<void, never> = { ok: true, value: undefined };

export function Err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

export interface ReceiveOptions {
  timeoutMs: number;
  /**
   * Resolve as soon as this sequence arrives (included in the result).
   * Without one, everything received inside the window is returned.
   */
  terminator?: string | Buffer;
}

export interface Transport {
  /** Port path or label, used in logs */
  readonly address: string;
  send(data: Buffer): Promise<Result<void>>;
  receive(options: ReceiveOptions): Promise<Result<Buffer>>;
  /** Drop anything already buffered from the device */
  discardInput(): void;
  close(): Promise<Result<void>>;
  isOpen(): boolean;
}

export interface SerialSettings {
  path: string;
  baudRate: number;
}

/** Opens a transport to the given target; used by drivers on connect() */
export type TransportFactory = (settings: SerialSettings) => Promise<Result<Transport>>;
