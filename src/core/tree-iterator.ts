import type { RBNode } from '../types/tree.js';

export type TraversalOrder = 'ascending' | 'descending';

/**
 * Lazy in-order walk over a subtree
 * Visits: left subtree → node → right subtree (mirrored for 'descending')
 *
 * Uses an explicit stack bounded by tree height instead of recursive generators,
 * so each step is O(1) amortized. Never mutates the tree; the tree must not be
 * modified while the returned iterator is being consumed. Calling it again
 * restarts the walk from the given root.
 */
export function* traverse<K, V>(
  root: RBNode<K, V> | null,
  order: TraversalOrder = 'ascending'
): IterableIterator<RBNode<K, V>> {
  const ascending = order === 'ascending';
  const stack: RBNode<K, V>[] = [];
  let current = root;

  while (current || stack.length > 0) {
    // Descend as far as possible toward the smallest (or largest) key
    while (current) {
      stack.push(current);
      current = ascending ? current.left : current.right;
    }
    const node = stack.pop();
    if (!node) return;
    yield node;
    current = ascending ? node.right : node.left;
  }
}
