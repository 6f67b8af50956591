/**
 * Connection engine errors
 * @module ble/errors
 */

export type BleTransportErrorCode =
  | 'bluetoothUnavailable'
  | 'bluetoothUnauthorized'
  | 'connectionFailed'
  | 'connectionTimeout'
  | 'unexpectedDisconnection'
  | 'peripheralNotFound'
  | 'maxReconnectionAttemptsExceeded';

export type BleProtocolErrorCode =
  | 'serviceDiscoveryFailed'
  | 'characteristicDiscoveryFailed'
  | 'notificationSetupFailed'
  | 'operationTimeout'
  | 'cancelled';

export type BleErrorCode = BleTransportErrorCode | BleProtocolErrorCode;

export type BleErrorCategory = 'transport' | 'protocol';

const PROTOCOL_CODES: ReadonlySet<BleErrorCode> = new Set<BleProtocolErrorCode>([
  'serviceDiscoveryFailed',
  'characteristicDiscoveryFailed',
  'notificationSetupFailed',
  'operationTimeout',
  'cancelled',
]);

export function categoryOf(code: BleErrorCode): BleErrorCategory {
  return PROTOCOL_CODES.has(code) ? 'protocol' : 'transport';
}

/**
 * Error raised by the radio transport or a GATT setup step
 */
export class BleError extends Error {
  readonly category: BleErrorCategory;

  constructor(
    public readonly code: BleErrorCode,
    message: string,
    public readonly peripheralId?: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'BleError';
    this.category = categoryOf(code);
  }

  static bluetoothUnavailable(state: string): BleError {
    return new BleError('bluetoothUnavailable', `Bluetooth is not available (state: ${state})`);
  }

  static peripheralNotFound(peripheralId: string): BleError {
    return new BleError('peripheralNotFound', `Peripheral ${peripheralId} has not been discovered`, peripheralId);
  }

  static connectionFailed(peripheralId: string, cause: unknown): BleError {
    const reason = cause instanceof Error ? cause.message : String(cause);
    return new BleError('connectionFailed', `Connection to ${peripheralId} failed: ${reason}`, peripheralId, {
      cause,
    });
  }

  static maxReconnectionAttemptsExceeded(peripheralId: string, attempts: number): BleError {
    return new BleError(
      'maxReconnectionAttemptsExceeded',
      `Reconnection failed after ${attempts} attempts`,
      peripheralId
    );
  }

  static operationTimeout(label: string, timeoutMs: number): BleError {
    return new BleError('operationTimeout', `${label} timed out after ${timeoutMs} ms`);
  }

  static cancelled(label: string): BleError {
    return new BleError('cancelled', `${label} was cancelled`);
  }
}

export function isBleError(value: unknown, code?: BleErrorCode): value is BleError {
  return value instanceof BleError && (code === undefined || value.code === code);
}
