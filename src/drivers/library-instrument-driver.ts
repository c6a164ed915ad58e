/**
 * LibraryInstrumentDriver: base for controllers driven through a vendor library
 *
 * The channel is an open library session rather than a byte stream. Every
 * library call returns a status code (0 = success, negative = error) plus its
 * outputs; a non-zero status or a rejected call becomes a CommunicationError
 * carrying the status name.
 */

import { CommunicationError, errorMessage } from '../errors';
import { Done, Err, Ok, Result } from '../transport/types';
import { DriverChannel, InstrumentDriver, InstrumentDriverOptions } from './instrument-driver';
import { LIBRARY_NO_ERR, LibraryReply, LibrarySession } from './library-codes';

export interface LibraryDriverOptions extends InstrumentDriverOptions {
  baudRate?: number;
}

/** Port label ("COM5", "5") to the library's port number */
export function parseComNumber(port: string, maxPort: number): number | null {
  const match = /(\d+)\s*$/.exec(port);
  if (!match) return null;
  const com = parseInt(match[1], 10);
  return com >= 1 && com <= maxPort ? com : null;
}

/** An open library session presented as a driver channel */
export class LibraryChannel<TSession extends LibrarySession> implements DriverChannel {
  readonly address: string;
  readonly session: TSession;
  private readonly describe: (status: number) => string;

  constructor(address: string, session: TSession, describe: (status: number) => string) {
    this.address = address;
    this.session = session;
    this.describe = describe;
  }

  async close(): Promise<Result<void>> {
    try {
      const status = await this.session.closePort();
      if (status !== LIBRARY_NO_ERR) {
        return Err(new Error(`closePort returned ${this.describe(status)}`));
      }
      return Done;
    } catch (err) {
      return Err(new Error(`closePort failed: ${errorMessage(err)}`));
    }
  }
}

export abstract class LibraryInstrumentDriver<TSession extends LibrarySession> extends InstrumentDriver<
  LibraryChannel<TSession>
> {
  readonly baudRate: number;

  constructor(options: LibraryDriverOptions, defaultBaudRate: number) {
    super(options);
    this.baudRate = options.baudRate ?? defaultBaudRate;
  }

  /** Highest COM number the library can open */
  protected abstract readonly maxPort: number;

  protected abstract statusName(status: number): string;

  protected abstract openSession(com: number): Promise<LibraryReply<TSession | null>>;

  /** Set the link speed on a fresh session; resolves with the library status */
  protected abstract setSpeed(session: TSession, baudRate: number): Promise<number>;

  protected async openChannel(): Promise<Result<LibraryChannel<TSession>>> {
    const com = parseComNumber(this.port, this.maxPort);
    if (com === null) {
      return Err(new Error(`Port "${this.port}" does not name a COM port 1-${this.maxPort}`));
    }

    try {
      const opened = await this.openSession(com);
      if (opened.status !== LIBRARY_NO_ERR || opened.value === null) {
        return Err(new Error(`openPort(${com}) returned ${this.statusName(opened.status)}`));
      }

      const channel = new LibraryChannel(this.port, opened.value, (status) => this.statusName(status));
      const speed = await this.setSpeed(channel.session, this.baudRate);
      if (speed !== LIBRARY_NO_ERR) {
        await channel.close();
        return Err(new Error(`Setting ${this.baudRate} baud returned ${this.statusName(speed)}`));
      }
      return Ok(channel);
    } catch (err) {
      return Err(new Error(`openPort(${com}) failed: ${errorMessage(err)}`));
    }
  }

  // --- Library calls ---

  /** One library read under the communication lock */
  protected call<T>(name: string, fn: (session: TSession) => Promise<LibraryReply<T>>): Promise<T> {
    return this.withChannel(name, (channel) => this.invoke(name, () => fn(channel.session)));
  }

  /** One library write under the communication lock */
  protected command(name: string, fn: (session: TSession) => Promise<number>): Promise<void> {
    return this.withChannel(name, async (channel) => {
      let status: number;
      try {
        status = await fn(channel.session);
      } catch (err) {
        throw this.communicationError(name, err);
      }
      this.check(name, status);
    });
  }

  /** Await one library call; a rejection or a non-zero status becomes a CommunicationError */
  protected async invoke<T>(name: string, fn: () => Promise<LibraryReply<T>>): Promise<T> {
    let reply: LibraryReply<T>;
    try {
      reply = await fn();
    } catch (err) {
      throw this.communicationError(name, err);
    }
    this.check(name, reply.status);
    return reply.value;
  }

  private check(name: string, status: number): void {
    if (status !== LIBRARY_NO_ERR) {
      const code = this.statusName(status);
      throw new CommunicationError(this.deviceId, `${name} returned ${code} (${status})`, { code });
    }
  }
}
