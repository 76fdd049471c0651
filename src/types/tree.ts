/**
 * Red-Black tree node colors used to maintain balance properties
 * RED = 0: Red nodes allow for insertions/deletions without immediate rebalancing
 * BLACK = 1: Black nodes maintain the height balance constraint
 */
export enum Color {
  RED = 0,
  BLACK = 1
}

/**
 * Red-Black Tree Node interface
 * Each node contains a key-value pair and maintains tree structure through pointers
 * An absent child (null) counts as BLACK and contributes nothing to black-height
 */
export interface RBNode<K, V> {
  key: K;                           // The sorting key for this node
  value: V;                         // The data stored at this node
  color: Color;                     // RED or BLACK for balancing
  left: RBNode<K, V> | null;       // Left child (smaller keys)
  right: RBNode<K, V> | null;      // Right child (larger keys)
  parent: RBNode<K, V> | null;     // Non-owning back link, null at the root
}

/**
 * Three-way comparison: <0 if a<b, 0 if a==b, >0 if a>b
 * Must describe a total order over every key stored in one tree
 */
export type Comparator<K> = (a: K, b: K) => number;

export type Entry<K, V> = [key: K, value: V];

/**
 * Key types the default comparator knows how to order
 */
export type NaturalKey = number | string | bigint | boolean | Date;
