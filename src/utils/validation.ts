/**
 * Input validation utilities
 * @module utils/validation
 */

/**
 * Validation error with details
 */
export class ValidationError extends Error {
  constructor(
    message: string,
    public field: string,
    public value: unknown
  ) {
    super(`${field}: ${message}`);
    this.name = 'ValidationError';
  }
}

/**
 * Validate a sample rate in Hz
 */
export function validateSampleRate(sampleRate: unknown, field = 'sampleRate'): number {
  if (typeof sampleRate !== 'number' || !Number.isFinite(sampleRate) || sampleRate <= 0) {
    throw new ValidationError('Sample rate must be a positive number', field, sampleRate);
  }
  return sampleRate;
}

/**
 * Validate a cutoff frequency against the Nyquist limit for `sampleRate`
 */
export function validateCutoff(cutoff: unknown, sampleRate: number, field: string): number {
  if (typeof cutoff !== 'number' || !Number.isFinite(cutoff) || cutoff <= 0) {
    throw new ValidationError('Cutoff must be a positive number', field, cutoff);
  }

  const nyquist = sampleRate / 2;
  if (cutoff >= nyquist) {
    throw new ValidationError(
      `Cutoff must be below the Nyquist frequency (${nyquist} Hz)`,
      field,
      cutoff
    );
  }
  return cutoff;
}

/**
 * Validate a positive integer option (window sizes, capacities, attempt counts)
 */
export function validatePositiveInteger(value: unknown, field: string): number {
  if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0) {
    throw new ValidationError('Must be a positive integer', field, value);
  }
  return value;
}

/**
 * Extract the peripheral id from a connect/disconnect target.
 *
 * Accepts either a bare id or any object carrying a non-empty `id`.
 */
export function validatePeripheralTarget(target: unknown): string {
  if (typeof target === 'string') {
    if (target.trim().length === 0) {
      throw new ValidationError('Peripheral id must not be empty', 'target', target);
    }
    return target;
  }

  if (!target || typeof target !== 'object' || !('id' in target)) {
    throw new ValidationError('Target must be a peripheral id or carry an id', 'target', target);
  }

  const { id } = target;
  if (typeof id !== 'string' || id.trim().length === 0) {
    throw new ValidationError('Peripheral id must be a non-empty string', 'target.id', id);
  }
  return id;
}
