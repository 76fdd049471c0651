/**
 * Error types raised by the sorted map
 *
 * Missing keys on get/remove are not errors (they return undefined).
 * These classes cover contract violations callers may want to tell apart.
 */

export class SortedMapError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SortedMapError';
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Thrown by indexed access (`at`) when the caller asserted a key is present
 */
export class KeyNotFoundError extends SortedMapError {
  readonly key: unknown;

  constructor(key: unknown) {
    super(`Key not found: ${describeKey(key)}`);
    this.name = 'KeyNotFoundError';
    this.key = key;
  }
}

/**
 * Thrown by the default comparator for keys it cannot put in a total order
 */
export class InvalidKeyError extends SortedMapError {
  constructor(key: unknown, reason: string) {
    super(`Invalid key ${describeKey(key)}: ${reason}`);
    this.name = 'InvalidKeyError';
  }
}

export type InvariantName =
  | 'color'
  | 'root-black'
  | 'red-red'
  | 'black-height'
  | 'key-order'
  | 'parent-link'
  | 'size';

/**
 * Thrown by tree validation when one of the red-black properties does not hold
 */
export class TreeInvariantError extends SortedMapError {
  readonly invariant: InvariantName;

  constructor(invariant: InvariantName, message: string) {
    super(`Red-black invariant "${invariant}" violated: ${message}`);
    this.name = 'TreeInvariantError';
    this.invariant = invariant;
  }
}

/**
 * Extracts a printable message from anything that was thrown
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  try {
    return JSON.stringify(error);
  } catch {
    return String(error);
  }
}

export function describeKey(key: unknown): string {
  if (typeof key === 'string') return JSON.stringify(key);
  if (typeof key === 'bigint') return `${key}n`;
  if (key instanceof Date) return Number.isNaN(key.getTime()) ? 'Invalid Date' : key.toISOString();
  return String(key);
}
