/**
 * Exception classes for the Aranet4 client.
 *
 * Two disjoint families: {@link ConnectionError} is fatal to a `connect()`
 * attempt, {@link DeviceError} is fatal to one operation on a device that
 * stays usable afterwards. Each carries a `kind` for exhaustive switching.
 */

export class Aranet4Error extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'Aranet4Error';
  }
}

export type ConnectionErrorKind =
  | 'adapter-unavailable'
  | 'search-timeout'
  | 'characteristic-not-found'
  | 'transport';

export abstract class ConnectionError extends Aranet4Error {
  abstract readonly kind: ConnectionErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConnectionError';
  }
}

export class AdapterUnavailableError extends ConnectionError {
  readonly kind = 'adapter-unavailable';

  constructor(options?: { cause?: unknown }) {
    super('Failed to find a Bluetooth adapter', options);
    this.name = 'AdapterUnavailableError';
  }
}

export class SearchTimeoutError extends ConnectionError {
  readonly kind = 'search-timeout';

  constructor(readonly timeoutMs: number) {
    super(`Failed to find an Aranet4 device within ${timeoutMs}ms`);
    this.name = 'SearchTimeoutError';
  }
}

export class CharacteristicNotFoundError extends ConnectionError {
  readonly kind = 'characteristic-not-found';

  constructor(readonly uuid: string) {
    super(`The characteristic ${uuid} was not found`);
    this.name = 'CharacteristicNotFoundError';
  }
}

export class ConnectionTransportError extends ConnectionError {
  readonly kind = 'transport';

  constructor(cause: unknown) {
    super(`Bluetooth transport failed: ${describeCause(cause)}`, { cause });
    this.name = 'ConnectionTransportError';
  }
}

export type DeviceErrorKind =
  | 'missing-attribute'
  | 'invalid-attribute'
  | 'io'
  | 'transport';

export abstract class DeviceError extends Aranet4Error {
  abstract readonly kind: DeviceErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DeviceError';
  }
}

export class MissingAttributeError extends DeviceError {
  readonly kind = 'missing-attribute';

  constructor(readonly attribute: string) {
    super(`Device did not expose the ${attribute} attribute`);
    this.name = 'MissingAttributeError';
  }
}

export class InvalidAttributeError extends DeviceError {
  readonly kind = 'invalid-attribute';

  constructor(readonly attribute: string, cause: unknown) {
    super(`Invalid ${attribute} attribute: ${describeCause(cause)}`, { cause });
    this.name = 'InvalidAttributeError';
  }
}

/**
 * Malformed payload: too short, or a field outside its declared range.
 */
export class DecodeError extends DeviceError {
  readonly kind = 'io';

  constructor(message: string) {
    super(message);
    this.name = 'DecodeError';
  }
}

export class DeviceTransportError extends DeviceError {
  readonly kind = 'transport';

  constructor(cause: unknown) {
    super(`Bluetooth transport failed: ${describeCause(cause)}`, { cause });
    this.name = 'DeviceTransportError';
  }
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.message;
  }
  return String(cause);
}
