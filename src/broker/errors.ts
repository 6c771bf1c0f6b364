/**
 * Bus Error Codes and Error Classes
 *
 * Only configuration and lifecycle failures (and RPC timeouts) cross the
 * public API. Delivery problems are reported through publish results and
 * statistics instead.
 */

/**
 * Error codes following the BUS_E### format
 */
export enum BusErrorCode {
  /** Required collaborator missing */
  MISSING_COLLABORATOR = 'BUS_E001',
  /** Channel argument missing or empty */
  MISSING_CHANNEL = 'BUS_E002',
  /** Option outside its allowed range */
  INVALID_OPTION = 'BUS_E003',

  /** Operation requires a running broker */
  NOT_RUNNING = 'BUS_E010',
  /** One or more collaborators failed to stop */
  STOP_FAILED = 'BUS_E011',

  /** Request got no reply in time */
  REQUEST_TIMEOUT = 'BUS_E020',

  /** Event failed its presence checks or could not be decoded */
  INVALID_EVENT = 'BUS_E030',
}

/**
 * Base class of every error raised by the bus
 */
export class BusError extends Error {
  constructor(
    public readonly code: BusErrorCode,
    message: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'BusError';
  }
}

/**
 * Missing collaborator, missing channel or bad option
 */
export class ConfigurationError extends BusError {
  constructor(code: BusErrorCode, message: string, context?: Record<string, unknown>) {
    super(code, message, context);
    this.name = 'ConfigurationError';
  }
}

export class BrokerNotRunningError extends BusError {
  constructor(operation: string) {
    super(
      BusErrorCode.NOT_RUNNING,
      `Broker is not running. Call start() before ${operation}().`,
      { operation }
    );
    this.name = 'BrokerNotRunningError';
  }
}

/**
 * Raised by request() when no reply arrives within the timeout
 */
export class RequestTimeoutError extends BusError {
  constructor(
    public readonly channel: string,
    public readonly correlationId: string,
    public readonly timeout: number
  ) {
    super(
      BusErrorCode.REQUEST_TIMEOUT,
      `Request on channel '${channel}' timed out after ${timeout}ms`,
      { channel, correlationId, timeout }
    );
    this.name = 'RequestTimeoutError';
  }
}

export class EventValidationError extends BusError {
  constructor(message: string, public readonly issues: string[] = []) {
    super(BusErrorCode.INVALID_EVENT, message, { issues });
    this.name = 'EventValidationError';
  }
}

/**
 * Aggregate of every failure seen while stopping several brokers
 */
export class BrokerStopError extends BusError {
  constructor(public readonly errors: unknown[]) {
    super(
      BusErrorCode.STOP_FAILED,
      `Failed to stop ${errors.length} broker(s): ${errors.map(describe).join('; ')}`,
      { count: errors.length }
    );
    this.name = 'BrokerStopError';
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Check that a channel argument is a non-empty string
 *
 * @throws ConfigurationError when it is not
 */
export function assertChannel(channel: string | undefined | null): asserts channel is string {
  if (typeof channel !== 'string' || channel.length === 0) {
    throw new ConfigurationError(BusErrorCode.MISSING_CHANNEL, 'channel is required');
  }
}
