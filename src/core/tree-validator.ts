import { Color, type Comparator, type RBNode } from '../types/tree.js';
import { TreeInvariantError, describeKey } from '../utils/errors.js';
import { traverse } from './tree-iterator.js';

export interface TreeReport {
  size: number;         // Nodes reachable from the root
  blackHeight: number;  // BLACK nodes on every root-to-leaf path (root included)
  height: number;       // Nodes on the longest root-to-leaf path
}

/**
 * Checks every red-black property over the whole tree
 * Throws TreeInvariantError naming the first broken invariant
 * Time complexity: O(n)
 * @param expectedSize - Cached size to compare against the reachable node count
 */
export function validateTree<K, V>(
  root: RBNode<K, V> | null,
  compare: Comparator<K>,
  expectedSize?: number
): TreeReport {
  if (root && root.parent !== null) {
    throw new TreeInvariantError('parent-link', 'root has a parent');
  }
  if (root && root.color !== Color.BLACK) {
    throw new TreeInvariantError('root-black', `root ${describeKey(root.key)} is RED`);
  }

  const { blackHeight, height } = checkSubtree(root);

  let size = 0;
  let previous: RBNode<K, V> | null = null;
  for (const node of traverse(root)) {
    if (previous && compare(previous.key, node.key) >= 0) {
      throw new TreeInvariantError(
        'key-order',
        `${describeKey(previous.key)} is not less than its in-order successor ${describeKey(node.key)}`
      );
    }
    previous = node;
    size++;
  }

  if (expectedSize !== undefined && size !== expectedSize) {
    throw new TreeInvariantError('size', `recorded size ${expectedSize} but ${size} nodes are reachable`);
  }

  return { size, blackHeight, height };
}

/**
 * Boolean form of validateTree
 */
export function isValidTree<K, V>(root: RBNode<K, V> | null, compare: Comparator<K>, expectedSize?: number): boolean {
  try {
    validateTree(root, compare, expectedSize);
    return true;
  } catch (error) {
    if (error instanceof TreeInvariantError) return false;
    throw error;
  }
}

/**
 * Recursive post-order check of colors, parent links and black-height
 * Depth is bounded by the tree height
 */
function checkSubtree<K, V>(node: RBNode<K, V> | null): { blackHeight: number; height: number } {
  if (!node) return { blackHeight: 0, height: 0 };

  if (node.color !== Color.RED && node.color !== Color.BLACK) {
    throw new TreeInvariantError('color', `node ${describeKey(node.key)} is neither RED nor BLACK`);
  }

  for (const child of [node.left, node.right]) {
    if (!child) continue;
    if (child.parent !== node) {
      throw new TreeInvariantError('parent-link', `child ${describeKey(child.key)} does not point back to ${describeKey(node.key)}`);
    }
    if (node.color === Color.RED && child.color === Color.RED) {
      throw new TreeInvariantError('red-red', `RED node ${describeKey(node.key)} has RED child ${describeKey(child.key)}`);
    }
  }

  const left = checkSubtree(node.left);
  const right = checkSubtree(node.right);
  if (left.blackHeight !== right.blackHeight) {
    throw new TreeInvariantError(
      'black-height',
      `node ${describeKey(node.key)} has black-height ${left.blackHeight} on the left and ${right.blackHeight} on the right`
    );
  }

  return {
    blackHeight: left.blackHeight + (node.color === Color.BLACK ? 1 : 0),
    height: Math.max(left.height, right.height) + 1
  };
}
