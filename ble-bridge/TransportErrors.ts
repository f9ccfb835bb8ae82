/**
 * Transport error kinds. All are recoverable and drive the reconnect cycle.
 */

export type TransportErrorKind =
  | 'NotFound'
  | 'ConnectFailed'
  | 'SubscribeFailed'
  | 'Timeout'
  | 'Disconnected';

export class TransportError extends Error {
  constructor(
    public readonly kind: TransportErrorKind,
    message: string,
    public readonly originalError?: unknown
  ) {
    super(message);
    this.name = 'TransportError';
  }
}

export class AdapterUnavailableError extends Error {
  constructor(transportName: string) {
    super(`No usable Bluetooth adapter (${transportName})`);
    this.name = 'AdapterUnavailableError';
  }
}

/**
 * Wrap anything thrown by a host stack call; existing TransportErrors pass through
 */
export function toTransportError(error: unknown, fallback: TransportErrorKind): TransportError {
  if (error instanceof TransportError) return error;
  const message = error instanceof Error ? error.message : String(error);
  return new TransportError(fallback, message, error);
}
