/**
 * Shared transports for a multi-drop bus
 *
 * Instruments on one RS-485 line sit behind a single serial port. Drivers
 * on the bus open their channel through the same pool and each get a lease
 * on one underlying transport; the bus CommLock keeps their exchanges
 * apart. The port closes when the last lease is closed.
 */

import { Done, Err, Ok, ReceiveOptions, Result, SerialSettings, Transport, TransportFactory } from './types';

interface PoolEntry {
  transport: Transport;
  baudRate: number;
  leases: number;
}

class TransportLease implements Transport {
  private released = false;
  private inner: Transport;
  private release: () => Promise<Result<void>>;

  constructor(inner: Transport, release: () => Promise<Result<void>>) {
    this.inner = inner;
    this.release = release;
  }

  get address(): string {
    return this.inner.address;
  }

  send(data: Buffer): Promise<Result<void>> {
    if (this.released) return Promise.resolve(Err(new Error(`Lease on ${this.address} is closed`)));
    return this.inner.send(data);
  }

  receive(options: ReceiveOptions): Promise<Result<Buffer>> {
    if (this.released) return Promise.resolve(Err(new Error(`Lease on ${this.address} is closed`)));
    return this.inner.receive(options);
  }

  discardInput(): void {
    if (!this.released) this.inner.discardInput();
  }

  async close(): Promise<Result<void>> {
    if (this.released) return Done;
    this.released = true;
    return this.release();
  }

  isOpen(): boolean {
    return !this.released && this.inner.isOpen();
  }
}

export class SharedTransportPool {
  private readonly opener: TransportFactory;
  private readonly entries = new Map<string, Promise<Result<PoolEntry>>>();
  private readonly held = new Map<string, PoolEntry>();

  constructor(opener: TransportFactory) {
    this.opener = opener;
  }

  /** Ports currently held open, with their lease counts */
  get openPorts(): Array<{ path: string; leases: number }> {
    return [...this.held].map(([path, entry]) => ({ path, leases: entry.leases }));
  }

  /** TransportFactory handing out leases on the pooled ports */
  readonly factory: TransportFactory = async (settings: SerialSettings): Promise<Result<Transport>> => {
    let pending = this.entries.get(settings.path);
    if (!pending) {
      pending = this.openEntry(settings);
      this.entries.set(settings.path, pending);
    }

    const opened = await pending;
    if (!opened.ok) {
      if (this.entries.get(settings.path) === pending) this.entries.delete(settings.path);
      return opened;
    }
    const entry = opened.value;
    if (entry.baudRate !== settings.baudRate) {
      return Err(new Error(
        `${settings.path} is already open at ${entry.baudRate} baud (requested ${settings.baudRate})`,
      ));
    }

    entry.leases++;
    return Ok(new TransportLease(entry.transport, () => this.release(settings.path, entry)));
  };

  private async openEntry(settings: SerialSettings): Promise<Result<PoolEntry>> {
    const opened = await this.opener(settings);
    if (!opened.ok) return opened;
    const entry: PoolEntry = { transport: opened.value, baudRate: settings.baudRate, leases: 0 };
    this.held.set(settings.path, entry);
    return Ok(entry);
  }

  private async release(path: string, entry: PoolEntry): Promise<Result<void>> {
    entry.leases--;
    if (entry.leases > 0) return Done;
    this.entries.delete(path);
    this.held.delete(path);
    return entry.transport.close();
  }
}
