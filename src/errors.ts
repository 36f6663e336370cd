/**
 * Error types raised by readers, the time-range parser and the auth gate
 */

export type ErrorKind = 'configuration' | 'access' | 'transport';

export class LogstreamError extends Error {
  readonly kind: ErrorKind;

  constructor(kind: ErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.kind = kind;
    this.name = new.target.name;
  }
}

/**
 * Invalid user input (bad --from value, bad option). Not retried.
 */
export class ConfigurationError extends LogstreamError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('configuration', message, options);
  }
}

/**
 * The remote access probe failed
 */
export class AccessError extends LogstreamError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('access', message, options);
  }
}

/**
 * A query, send or receive failed, or the producer loop faulted
 */
export class TransportError extends LogstreamError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('transport', message, options);
  }
}

/**
 * Returns a printable message for any thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Converts any thrown value into a TransportError, keeping existing ones as they are
 */
export function toTransportError(error: unknown): TransportError {
  if (error instanceof TransportError) {
    return error;
  }
  return new TransportError(errorMessage(error), { cause: error });
}
