import type { Comparator } from '../types/tree.js';
import { InvalidKeyError } from './errors.js';

type Orderable =
  | { kind: 'number' | 'boolean' | 'date'; rank: number }
  | { kind: 'string'; rank: string }
  | { kind: 'bigint'; rank: bigint };

/**
 * Maps a natural key onto a primitive that orders correctly with < and >
 * Dates compare by timestamp, booleans as false < true
 */
function toOrderable(key: unknown): Orderable {
  if (typeof key === 'number') {
    if (Number.isNaN(key)) throw new InvalidKeyError(key, 'NaN has no ordering');
    return { kind: 'number', rank: key };
  }
  if (typeof key === 'string') return { kind: 'string', rank: key };
  if (typeof key === 'bigint') return { kind: 'bigint', rank: key };
  if (typeof key === 'boolean') return { kind: 'boolean', rank: key ? 1 : 0 };
  if (key instanceof Date) {
    const time = key.getTime();
    if (Number.isNaN(time)) throw new InvalidKeyError(key, 'invalid Date has no ordering');
    return { kind: 'date', rank: time };
  }
  throw new InvalidKeyError(key, 'no natural ordering; pass a compare function');
}

function threeWay<T extends number | string | bigint>(a: T, b: T): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Default comparator used when a map is built without one
 * Orders NaturalKey values; any other key type needs its own compare function
 * Strings compare by UTF-16 code unit (same as Array.prototype.sort), not locale
 * Mixing key kinds (e.g. numbers with strings) is rejected
 */
export function naturalCompare(a: unknown, b: unknown): number {
  const left = toOrderable(a);
  const right = toOrderable(b);

  if (left.kind === 'string' && right.kind === 'string') return threeWay(left.rank, right.rank);
  if (left.kind === 'bigint' && right.kind === 'bigint') return threeWay(left.rank, right.rank);
  if (left.kind === right.kind && typeof left.rank === 'number' && typeof right.rank === 'number') {
    return threeWay(left.rank, right.rank);
  }
  throw new InvalidKeyError(b, `a ${right.kind} key cannot be compared with a ${left.kind} key`);
}

/**
 * Flips a comparator, e.g. for bid-side price levels (highest first)
 */
export function reverseComparator<K>(compare: Comparator<K>): Comparator<K> {
  return (a, b) => compare(b, a);
}
