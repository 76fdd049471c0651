import type { Logger } from 'pino';
import { RedBlackTree } from './red-black-tree.js';
import { validateTree, isValidTree, type TreeReport } from './tree-validator.js';
import type { Comparator, Entry } from '../types/tree.js';
import { naturalCompare } from '../utils/comparators.js';
import { isTruthy } from '../utils/config.js';
import { KeyNotFoundError, getErrorMessage } from '../utils/errors.js';

export interface SortedMapOptions<K> {
  compare?: Comparator<K>;        // Key ordering; defaults to naturalCompare
  logger?: Logger;                // Optional pino logger for debug output and verification failures
  verifyInvariants?: boolean;     // Validate the tree after every mutation (defaults to SORTED_MAP_VERIFY)
}

/**
 * Sorted map backed by a red-black tree
 *
 * Same surface as the built-in Map (get/set/has/delete/size/iteration) plus
 * ordered extras: first/last, popFirst/popLast, reverse iteration and
 * indexed access that throws on a missing key.
 *
 * Every operation runs synchronously to completion. Do not mutate the map
 * while iterating over it.
 */
export class SortedMap<K, V> implements Iterable<Entry<K, V>> {
  private readonly tree: RedBlackTree<K, V>;
  private readonly logger: Logger | undefined;
  private readonly verifyInvariants: boolean;

  constructor(options: SortedMapOptions<K> = {}) {
    this.tree = new RedBlackTree<K, V>(options.compare ?? naturalCompare);
    this.logger = options.logger;
    this.verifyInvariants = options.verifyInvariants ?? isTruthy(process.env['SORTED_MAP_VERIFY']);
  }

  /**
   * Builds a map from key-value pairs; later duplicates overwrite earlier ones
   */
  static from<K, V>(entries: Iterable<readonly [K, V]>, options: SortedMapOptions<K> = {}): SortedMap<K, V> {
    const map = new SortedMap<K, V>(options);
    for (const [key, value] of entries) {
      map.insert(key, value);
    }
    map.logger?.debug(`SortedMap built with ${map.size} entries`);
    return map;
  }

  get size(): number {
    return this.tree.getSize();
  }

  get length(): number {
    return this.tree.getSize();
  }

  get [Symbol.toStringTag](): string {
    return 'SortedMap';
  }

  isEmpty(): boolean {
    return this.tree.isEmpty();
  }

  /**
   * Inserts or overwrites a key
   * @returns The previous value when the key was already present
   */
  insert(key: K, value: V): V | undefined {
    const previous = this.tree.insert(key, value);
    this.afterMutation('insert');
    return previous;
  }

  /**
   * Map-style insert; returns the map for chaining
   */
  set(key: K, value: V): this {
    this.insert(key, value);
    return this;
  }

  get(key: K): V | undefined {
    return this.tree.find(key);
  }

  getEntry(key: K): Entry<K, V> | undefined {
    return this.tree.findEntry(key);
  }

  has(key: K): boolean {
    return this.tree.has(key);
  }

  /**
   * Indexed access for keys the caller knows are present
   * @throws KeyNotFoundError when the key is absent
   */
  at(key: K): V {
    const entry = this.tree.findEntry(key);
    if (!entry) {
      throw new KeyNotFoundError(key);
    }
    return entry[1];
  }

  /**
   * Rewrites the value of a present key in place
   * @returns The new value, or undefined (and no call to updater) if the key is absent
   */
  update(key: K, updater: (value: V, key: K) => V): V | undefined {
    return this.tree.update(key, updater);
  }

  /**
   * @returns The removed value, or undefined if the key was absent
   */
  remove(key: K): V | undefined {
    return this.removeEntry(key)?.[1];
  }

  removeEntry(key: K): Entry<K, V> | undefined {
    const entry = this.tree.removeEntry(key);
    if (entry) this.afterMutation('remove');
    return entry;
  }

  /**
   * Map-style removal
   * @returns Whether a key was removed
   */
  delete(key: K): boolean {
    return this.removeEntry(key) !== undefined;
  }

  first(): Entry<K, V> | undefined {
    return this.tree.findMin();
  }

  last(): Entry<K, V> | undefined {
    return this.tree.findMax();
  }

  popFirst(): Entry<K, V> | undefined {
    const entry = this.tree.removeMin();
    if (entry) this.afterMutation('popFirst');
    return entry;
  }

  popLast(): Entry<K, V> | undefined {
    const entry = this.tree.removeMax();
    if (entry) this.afterMutation('popLast');
    return entry;
  }

  clear(): void {
    const removed = this.tree.getSize();
    this.tree.clear();
    this.logger?.debug(`SortedMap cleared ${removed} entries`);
  }

  /**
   * Ascending [key, value] pairs
   */
  entries(): IterableIterator<Entry<K, V>> {
    return this.tree.inOrderTraversal();
  }

  *keys(): IterableIterator<K> {
    for (const [key] of this.tree.inOrderTraversal()) yield key;
  }

  *values(): IterableIterator<V> {
    for (const [, value] of this.tree.inOrderTraversal()) yield value;
  }

  /**
   * Descending [key, value] pairs
   */
  reverseEntries(): IterableIterator<Entry<K, V>> {
    return this.tree.reverseOrderTraversal();
  }

  *reverseKeys(): IterableIterator<K> {
    for (const [key] of this.tree.reverseOrderTraversal()) yield key;
  }

  *reverseValues(): IterableIterator<V> {
    for (const [, value] of this.tree.reverseOrderTraversal()) yield value;
  }

  [Symbol.iterator](): IterableIterator<Entry<K, V>> {
    return this.entries();
  }

  forEach(callback: (value: V, key: K, map: this) => void): void {
    for (const [key, value] of this.entries()) {
      callback(value, key, this);
    }
  }

  /**
   * Nodes on the longest root-to-leaf path; at most 2·log2(size + 1)
   */
  height(): number {
    return this.tree.height();
  }

  /**
   * Checks all red-black invariants
   * @throws TreeInvariantError naming the violated invariant
   */
  validate(): TreeReport {
    return validateTree(this.tree.getRoot(), this.tree.getComparator(), this.tree.getSize());
  }

  isValid(): boolean {
    return isValidTree(this.tree.getRoot(), this.tree.getComparator(), this.tree.getSize());
  }

  private afterMutation(operation: string): void {
    if (!this.verifyInvariants) return;
    try {
      const report = this.validate();
      this.logger?.trace(report, `SortedMap ${operation} verified`);
    } catch (error) {
      this.logger?.error(`SortedMap invariant check failed after ${operation}: ${getErrorMessage(error)}`);
      throw error;
    }
  }
}
