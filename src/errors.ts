/**
 * Driver error taxonomy
 *
 *   ConnectionError     transport could not be opened or attached
 *   CommunicationError  send/receive failed, timed out, or the instrument
 *                       answered with something unusable
 *   StateError          operation attempted in the wrong lifecycle state
 *
 * Facade calls reject with these; nothing here retries.
 */

export class DriverError extends Error {
  readonly deviceId: string;

  constructor(deviceId: string, message: string, options?: { cause?: unknown }) {
    super(`[${deviceId}] ${message}`, options);
    this.name = 'DriverError';
    this.deviceId = deviceId;
  }
}

export class ConnectionError extends DriverError {
  constructor(deviceId: string, message: string, options?: { cause?: unknown }) {
    super(deviceId, message, options);
    this.name = 'ConnectionError';
  }
}

export class CommunicationError extends DriverError {
  /** Instrument or library status name, when the device reported one */
  readonly code: string | undefined;

  constructor(deviceId: string, message: string, options?: { cause?: unknown; code?: string }) {
    super(deviceId, message, options);
    this.name = 'CommunicationError';
    this.code = options?.code;
  }
}

export class StateError extends DriverError {
  constructor(deviceId: string, message: string) {
    super(deviceId, message);
    this.name = 'StateError';
  }
}

/** Raised by transports when a receive window elapses without a full reply */
export class TimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(timeoutMs: number, message = `No response within ${timeoutMs}ms`) {
    super(message);
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
