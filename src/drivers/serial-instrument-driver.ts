/**
 * SerialInstrumentDriver: base for drivers that talk over a byte stream
 *
 * Adds the transport factory, baud rate and reply timeout to the common
 * InstrumentDriver, plus transact(): one request/reply on a channel the
 * caller already holds the lock for.
 */

import { InstrumentDriver, InstrumentDriverOptions } from './instrument-driver';
import { openSerialTransport } from '../transport/serial-transport';
import { ReceiveOptions, Result, Transport, TransportFactory } from '../transport/types';

export interface SerialDriverOptions extends InstrumentDriverOptions {
  baudRate?: number;
  /** Reply timeout per exchange */
  timeoutMs?: number;
  /** Opens the channel; defaults to a real serial port */
  transportFactory?: TransportFactory;
}

export abstract class SerialInstrumentDriver extends InstrumentDriver<Transport> {
  readonly baudRate: number;
  readonly timeoutMs: number;

  private readonly transportFactory: TransportFactory;

  constructor(
    options: SerialDriverOptions,
    defaults: { baudRate: number; timeoutMs: number; intervalMs?: number },
  ) {
    super(options, defaults.intervalMs);
    this.baudRate = options.baudRate ?? defaults.baudRate;
    this.timeoutMs = options.timeoutMs ?? defaults.timeoutMs;
    this.transportFactory = options.transportFactory ?? openSerialTransport;
  }

  protected openChannel(): Promise<Result<Transport>> {
    return this.transportFactory({ path: this.port, baudRate: this.baudRate });
  }

  protected async prepareChannel(channel: Transport): Promise<void> {
    channel.discardInput();
  }

  /**
   * Send `request` and wait for the reply. Stale input is dropped first.
   * Transport failures become CommunicationError.
   */
  protected async transact(channel: Transport, request: string, receive: ReceiveOptions): Promise<string> {
    const label = request.trim();
    channel.discardInput();

    const sent = await channel.send(Buffer.from(request, 'utf8'));
    if (!sent.ok) {
      throw this.communicationError(`Send "${label}"`, sent.error);
    }

    const reply = await channel.receive(receive);
    if (!reply.ok) {
      throw this.communicationError(`Reply to "${label}"`, reply.error);
    }

    const text = reply.value.toString('utf8');
    this.log.debug({ command: label, reply: text.trim() }, 'Exchange');
    return text;
  }
}
