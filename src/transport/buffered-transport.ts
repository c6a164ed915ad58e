/**
 * BufferedTransport: receive-side plumbing shared by every byte transport
 *
 * Incoming chunks are appended to one buffer; receive() cuts a frame at the
 * first terminator, or hands back everything that arrived within the window
 * when no terminator is given. Only one receive is pending at a time (the
 * driver's CommLock guarantees that).
 */

import { TimeoutError } from '../errors';
import { Err, Ok, ReceiveOptions, Result, Transport } from './types';

export abstract class BufferedTransport implements Transport {
  readonly address: string;

  private buffer: Buffer = Buffer.alloc(0);
  private notify: (() => void) | null = null;
  private failure: Error | null = null;

  constructor(address: string) {
    this.address = address;
  }

  abstract send(data: Buffer): Promise<Result<void>>;
  abstract close(): Promise<Result<void>>;
  abstract isOpen(): boolean;

  /** Append bytes arriving from the device */
  protected accept(chunk: Buffer): void {
    this.buffer = Buffer.concat([this.buffer, chunk]);
    this.notify?.();
  }

  /** Fail the pending and every later receive with this error */
  protected fail(err: Error): void {
    this.failure = err;
    this.notify?.();
  }

  /** Clear a recorded failure (after a successful reopen) */
  protected resetFailure(): void {
    this.failure = null;
  }

  discardInput(): void {
    this.buffer = Buffer.alloc(0);
  }

  receive(options: ReceiveOptions): Promise<Result<Buffer>> {
    const { timeoutMs } = options;
    const terminator = typeof options.terminator === 'string'
      ? Buffer.from(options.terminator, 'latin1')
      : options.terminator;

    return new Promise<Result<Buffer>>((resolve) => {
      let timer: ReturnType<typeof setTimeout> | null = null;

      const finish = (result: Result<Buffer>) => {
        if (timer) clearTimeout(timer);
        this.notify = null;
        resolve(result);
      };

      const check = (): boolean => {
        if (this.failure) {
          finish(Err(this.failure));
          return true;
        }
        if (!terminator) return false;
        const idx = this.buffer.indexOf(terminator);
        if (idx < 0) return false;
        const end = idx + terminator.length;
        const frame = Buffer.from(this.buffer.subarray(0, end));
        this.buffer = this.buffer.subarray(end);
        finish(Ok(frame));
        return true;
      };

      if (check()) return;
      this.notify = () => {
        check();
      };

      timer = setTimeout(() => {
        if (terminator) {
          finish(Err(new TimeoutError(timeoutMs, `No terminated response within ${timeoutMs}ms on ${this.address}`)));
          return;
        }
        const collected = this.buffer;
        this.buffer = Buffer.alloc(0);
        finish(Ok(collected));
      }, timeoutMs);
    });
  }
}
