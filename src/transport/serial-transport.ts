/**
 * Serial Transport
 *
 * Byte transport over a serial port (serialport). The port is opened with
 * autoOpen disabled so open failures come back as a Result instead of an
 * 'error' event. A port that closes or errors underneath us fails every
 * later receive and send.
 */

import { Logger } from 'pino';
import { SerialPort } from 'serialport';
import { getLogger } from '../logger';
import { BufferedTransport } from './buffered-transport';
import { Done, Err, Ok, Result, SerialSettings, Transport, TransportFactory } from './types';

/**
 * The slice of a serialport stream this transport uses. SerialPort and
 * SerialPortMock both satisfy it.
 */
export interface SerialLink {
  readonly path: string;
  readonly isOpen: boolean;
  on(event: 'data', listener: (chunk: Buffer) => void): unknown;
  on(event: 'error', listener: (err: Error) => void): unknown;
  on(event: 'close', listener: () => void): unknown;
  removeAllListeners(): unknown;
  write(chunk: Buffer, callback: (err: Error | null | undefined) => void): boolean;
  drain(callback: (err: Error | null) => void): void;
  close(callback: (err: Error | null) => void): void;
}

export class SerialTransport extends BufferedTransport {
  private link: SerialLink;
  private closing = false;
  private log: Logger;

  /** Wrap an already-open port */
  constructor(link: SerialLink) {
    super(link.path);
    this.link = link;
    this.log = getLogger('Serial').child({ port: link.path });

    link.on('data', (chunk: Buffer) => this.accept(chunk));
    link.on('error', (err: Error) => {
      this.log.warn({ error: err.message }, 'Serial port error');
      this.fail(new Error(`SERIAL_PORT_ERROR: ${err.message}`));
    });
    link.on('close', () => {
      if (!this.closing) {
        this.log.warn('Serial port closed unexpectedly');
        this.fail(new Error('SERIAL_PORT_DISCONNECTED: Port closed'));
      }
    });
  }

  async send(data: Buffer): Promise<Result<void>> {
    if (!this.link.isOpen) {
      return Err(new Error(`Port ${this.address} is not open`));
    }
    try {
      await new Promise<void>((resolve, reject) => {
        this.link.write(data, (err) => (err ? reject(err) : resolve()));
      });
      await new Promise<void>((resolve, reject) => {
        this.link.drain((err) => (err ? reject(err) : resolve()));
      });
    } catch (e) {
      return Err(e instanceof Error ? e : new Error(String(e)));
    }
    return Done;
  }

  async close(): Promise<Result<void>> {
    if (!this.link.isOpen) {
      this.link.removeAllListeners();
      return Done;
    }
    this.closing = true;
    try {
      await new Promise<void>((resolve, reject) => {
        this.link.close((err) => (err ? reject(err) : resolve()));
      });
    } catch (e) {
      return Err(e instanceof Error ? e : new Error(String(e)));
    } finally {
      this.link.removeAllListeners();
    }
    return Done;
  }

  isOpen(): boolean {
    return this.link.isOpen;
  }
}

/** Open a serial port and wrap it; failures come back as Err */
export const openSerialTransport: TransportFactory = async (settings: SerialSettings): Promise<Result<Transport>> => {
  const port = new SerialPort({
    path: settings.path,
    baudRate: settings.baudRate,
    autoOpen: false,
  });

  try {
    await new Promise<void>((resolve, reject) => {
      port.open((err) => (err ? reject(err) : resolve()));
    });
  } catch (e) {
    return Err(e instanceof Error ? e : new Error(String(e)));
  }

  getLogger('Serial').debug({ port: settings.path, baudRate: settings.baudRate }, 'Serial port opened');
  return Ok(new SerialTransport(port));
};

export interface SerialPortSummary {
  path: string;
  manufacturer?: string;
  serialNumber?: string;
}

/** Enumerate serial ports known to the OS */
export async function listSerialPorts(): Promise<SerialPortSummary[]> {
  const ports = await SerialPort.list();
  return ports.map((p) => ({
    path: p.path,
    manufacturer: p.manufacturer,
    serialNumber: p.serialNumber,
  }));
}
