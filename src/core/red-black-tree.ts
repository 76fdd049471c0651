import { Color, type Comparator, type Entry, type RBNode } from '../types/tree.js';
import { TreeInvariantError, describeKey } from '../utils/errors.js';
import { traverse, type TraversalOrder } from './tree-iterator.js';

function isRed<K, V>(node: RBNode<K, V> | null): node is RBNode<K, V> {
  return node !== null && node.color === Color.RED;
}

function isBlack<K, V>(node: RBNode<K, V> | null): boolean {
  return !isRed(node);
}

/**
 * Self-balancing binary search tree
 * Guarantees O(log n) insert, delete, and search operations
 *
 * Key properties, restored before every public method returns:
 * - Root is always BLACK
 * - All RED nodes have BLACK children (no consecutive RED nodes)
 * - Every path from a node to an absent child contains the same number of BLACK nodes
 * - In-order keys are strictly increasing under compareFn
 *
 * Fixups walk parent links in a loop rather than recursing.
 */
export class RedBlackTree<K, V> {
  private root: RBNode<K, V> | null = null;     // Root of the tree
  private size = 0;                             // Total number of nodes for O(1) size queries
  private readonly compareFn: Comparator<K>;    // Custom comparison function for ordering

  /**
   * @param compareFn - Function that returns <0 if a<b, 0 if a==b, >0 if a>b
   */
  constructor(compareFn: Comparator<K>) {
    this.compareFn = compareFn;
  }

  /**
   * Inserts a key-value pair into the tree
   * If key exists, overwrites the value in place with no structural change
   * Time complexity: O(log n)
   * @returns The previous value for an existing key, undefined for a new key
   */
  insert(key: K, value: V): V | undefined {
    let current = this.root;
    let parent: RBNode<K, V> | null = null;
    let cmp = 0;

    // Find insertion point using binary search
    while (current) {
      parent = current;
      cmp = this.compareFn(key, current.key);
      if (cmp < 0) {
        current = current.left;
      } else if (cmp > 0) {
        current = current.right;
      } else {
        const previous = current.value;
        current.value = value;
        return previous;
      }
    }

    const newNode: RBNode<K, V> = {
      key,
      value,
      color: Color.RED,    // New nodes are always RED so black-height is untouched
      left: null,
      right: null,
      parent
    };

    if (!parent) {
      this.root = newNode;
    } else if (cmp < 0) {
      parent.left = newNode;
    } else {
      parent.right = newNode;
    }

    this.size++;
    this.fixAfterInsertion(newNode);
    return undefined;
  }

  /**
   * Removes the node with the given key
   * Time complexity: O(log n)
   * @returns The removed value, or undefined if key not found
   */
  remove(key: K): V | undefined {
    return this.removeEntry(key)?.[1];
  }

  /**
   * Removes the node with the given key, returning the stored key as well as the value
   */
  removeEntry(key: K): Entry<K, V> | undefined {
    const node = this.findNode(key);
    if (!node) return undefined;

    const entry: Entry<K, V> = [node.key, node.value];
    this.deleteNode(node);
    this.size--;
    return entry;
  }

  /**
   * Finds a value by its key
   * Time complexity: O(log n)
   */
  find(key: K): V | undefined {
    return this.findNode(key)?.value;
  }

  findEntry(key: K): Entry<K, V> | undefined {
    const node = this.findNode(key);
    return node ? [node.key, node.value] : undefined;
  }

  has(key: K): boolean {
    return this.findNode(key) !== null;
  }

  /**
   * Replaces the value of an existing key with updater(currentValue)
   * Leaves the tree untouched when the key is absent
   * @returns The new value, or undefined if key not found
   */
  update(key: K, updater: (value: V, key: K) => V): V | undefined {
    const node = this.findNode(key);
    if (!node) return undefined;
    node.value = updater(node.value, node.key);
    return node.value;
  }

  /**
   * Finds the minimum key-value pair in the tree
   * Time complexity: O(log n)
   */
  findMin(): Entry<K, V> | undefined {
    if (!this.root) return undefined;
    const node = this.findMinNode(this.root);
    return [node.key, node.value];
  }

  /**
   * Finds the maximum key-value pair in the tree
   * Time complexity: O(log n)
   */
  findMax(): Entry<K, V> | undefined {
    if (!this.root) return undefined;
    const node = this.findMaxNode(this.root);
    return [node.key, node.value];
  }

  /**
   * Removes and returns the minimum key-value pair
   */
  removeMin(): Entry<K, V> | undefined {
    if (!this.root) return undefined;
    const node = this.findMinNode(this.root);
    const entry: Entry<K, V> = [node.key, node.value];
    this.deleteNode(node);
    this.size--;
    return entry;
  }

  /**
   * Removes and returns the maximum key-value pair
   */
  removeMax(): Entry<K, V> | undefined {
    if (!this.root) return undefined;
    const node = this.findMaxNode(this.root);
    const entry: Entry<K, V> = [node.key, node.value];
    this.deleteNode(node);
    this.size--;
    return entry;
  }

  /**
   * Returns the number of nodes in the tree
   * Time complexity: O(1)
   */
  getSize(): number {
    return this.size;
  }

  isEmpty(): boolean {
    return this.size === 0;
  }

  /**
   * Drops every node
   * Nodes are unlinked from the root down so no detached node keeps its subtree reachable
   */
  clear(): void {
    const stack: RBNode<K, V>[] = this.root ? [this.root] : [];
    let node = stack.pop();
    while (node) {
      if (node.left) stack.push(node.left);
      if (node.right) stack.push(node.right);
      node.left = null;
      node.right = null;
      node.parent = null;
      node = stack.pop();
    }
    this.root = null;
    this.size = 0;
  }

  /**
   * Number of nodes on the longest root-to-leaf path (0 for an empty tree)
   * Time complexity: O(n)
   */
  height(): number {
    if (!this.root) return 0;
    let max = 0;
    const stack: Array<[RBNode<K, V>, number]> = [[this.root, 1]];
    let item = stack.pop();
    while (item) {
      const [node, depth] = item;
      if (depth > max) max = depth;
      if (node.left) stack.push([node.left, depth + 1]);
      if (node.right) stack.push([node.right, depth + 1]);
      item = stack.pop();
    }
    return max;
  }

  /**
   * Root node for read-only inspection (validation, traversal)
   * Callers must not relink or recolor the returned nodes
   */
  getRoot(): RBNode<K, V> | null {
    return this.root;
  }

  getComparator(): Comparator<K> {
    return this.compareFn;
  }

  /**
   * Iterator for in-order traversal (sorted key order)
   * Time complexity: O(n) for full traversal, O(log n) extra memory
   */
  *inOrderTraversal(): IterableIterator<Entry<K, V>> {
    yield* this.entries('ascending');
  }

  /**
   * Iterator for reverse in-order traversal (reverse sorted key order)
   */
  *reverseOrderTraversal(): IterableIterator<Entry<K, V>> {
    yield* this.entries('descending');
  }

  private *entries(order: TraversalOrder): IterableIterator<Entry<K, V>> {
    for (const node of traverse(this.root, order)) {
      yield [node.key, node.value];
    }
  }

  /**
   * Internal method to find a node by key using binary search
   */
  private findNode(key: K): RBNode<K, V> | null {
    let current = this.root;
    while (current) {
      const cmp = this.compareFn(key, current.key);
      if (cmp < 0) {
        current = current.left;
      } else if (cmp > 0) {
        current = current.right;
      } else {
        return current;
      }
    }
    return null;
  }

  private findMinNode(node: RBNode<K, V>): RBNode<K, V> {
    let current = node;
    while (current.left) {
      current = current.left;
    }
    return current;
  }

  private findMaxNode(node: RBNode<K, V>): RBNode<K, V> {
    let current = node;
    while (current.right) {
      current = current.right;
    }
    return current;
  }

  /**
   * Points whatever referenced `node` (its parent's child slot, or the root) at `replacement`
   */
  private replaceInParent(node: RBNode<K, V>, replacement: RBNode<K, V> | null): void {
    const parent = node.parent;
    if (!parent) {
      this.root = replacement;
    } else if (node === parent.left) {
      parent.left = replacement;
    } else {
      parent.right = replacement;
    }
    if (replacement) {
      replacement.parent = parent;
    }
  }

  /**
   * Performs left rotation
   * Transforms: node.right takes node's place, node becomes its left child
   *
   *     node              right
   *    /    \            /     \
   *   a    right  =>   node     c
   *        /   \      /    \
   *       b     c    a      b
   */
  private rotateLeft(node: RBNode<K, V>): void {
    const right = node.right;
    if (!right) {
      throw new TreeInvariantError('parent-link', `rotateLeft at ${describeKey(node.key)} has no right child`);
    }

    // Move right's left subtree to node's right
    node.right = right.left;
    if (right.left) {
      right.left.parent = node;
    }

    // Connect right to node's parent (or make it the root)
    this.replaceInParent(node, right);

    right.left = node;
    node.parent = right;
  }

  /**
   * Performs right rotation, the mirror of rotateLeft
   */
  private rotateRight(node: RBNode<K, V>): void {
    const left = node.left;
    if (!left) {
      throw new TreeInvariantError('parent-link', `rotateRight at ${describeKey(node.key)} has no left child`);
    }

    node.left = left.right;
    if (left.right) {
      left.right.parent = node;
    }

    this.replaceInParent(node, left);

    left.right = node;
    node.parent = left;
  }

  /**
   * Restores Red-Black tree properties after insertion
   * Only violation possible: the new RED node under a RED parent
   */
  private fixAfterInsertion(inserted: RBNode<K, V>): void {
    let node = inserted;
    let parent = node.parent;

    while (parent && parent.color === Color.RED) {
      // A RED parent is never the root, so the grandparent exists
      const grandparent = parent.parent;
      if (!grandparent) break;

      if (parent === grandparent.left) {
        const uncle = grandparent.right;
        if (isRed(uncle)) {
          // Case 1: Uncle is RED - recolor and move up
          parent.color = Color.BLACK;
          uncle.color = Color.BLACK;
          grandparent.color = Color.RED;
          node = grandparent;
        } else {
          // Case 2: triangle (node is right child) - rotate into a line
          let top = parent;
          if (node === parent.right) {
            this.rotateLeft(parent);
            top = node;
            node = parent;
          }
          // Case 3: line - rotate at grandparent, this ends the fixup
          top.color = Color.BLACK;
          grandparent.color = Color.RED;
          this.rotateRight(grandparent);
        }
      } else {
        // Parent is right child of grandparent (mirror cases)
        const uncle = grandparent.left;
        if (isRed(uncle)) {
          parent.color = Color.BLACK;
          uncle.color = Color.BLACK;
          grandparent.color = Color.RED;
          node = grandparent;
        } else {
          let top = parent;
          if (node === parent.left) {
            this.rotateRight(parent);
            top = node;
            node = parent;
          }
          top.color = Color.BLACK;
          grandparent.color = Color.RED;
          this.rotateLeft(grandparent);
        }
      }
      parent = node.parent;
    }

    // Ensure root is always BLACK
    if (this.root) {
      this.root.color = Color.BLACK;
    }
  }

  /**
   * Unlinks a node from the tree
   * A node with two children takes its in-order successor's entry, and the successor
   * (which has at most one child) is spliced out instead
   */
  private deleteNode(node: RBNode<K, V>): void {
    let target = node;
    if (node.left && node.right) {
      target = this.findMinNode(node.right);
      node.key = target.key;
      node.value = target.value;
    }

    const child = target.left ?? target.right;
    const parent = target.parent;
    this.replaceInParent(target, child);

    target.left = null;
    target.right = null;
    target.parent = null;

    // Removing a RED node never changes black-height
    if (target.color === Color.BLACK) {
      this.fixAfterDeletion(child, parent);
    }
  }

  /**
   * Restores Red-Black tree properties after a BLACK node was spliced out
   * The position that lost a BLACK node may be empty, so its parent is tracked separately
   * @param start - Node now occupying the spliced position, or null
   * @param startParent - Parent of that position
   */
  private fixAfterDeletion(start: RBNode<K, V> | null, startParent: RBNode<K, V> | null): void {
    let node = start;
    let parent = startParent;

    while (node !== this.root && isBlack(node) && parent) {
      if (node === parent.left) {
        let sibling = this.requireChild(parent, 'right');
        if (sibling.color === Color.RED) {
          // Case 1: Sibling is RED - rotate so the new sibling is BLACK
          sibling.color = Color.BLACK;
          parent.color = Color.RED;
          this.rotateLeft(parent);
          sibling = this.requireChild(parent, 'right');
        }
        if (isBlack(sibling.left) && isBlack(sibling.right)) {
          // Case 2: Sibling and its children are BLACK - move the deficiency up
          sibling.color = Color.RED;
          node = parent;
          parent = node.parent;
        } else {
          if (isBlack(sibling.right)) {
            // Case 3: only the near nephew is RED - rotate it into the far position
            if (sibling.left) sibling.left.color = Color.BLACK;
            sibling.color = Color.RED;
            this.rotateRight(sibling);
            sibling = this.requireChild(parent, 'right');
          }
          // Case 4: far nephew is RED - final rotation
          sibling.color = parent.color;
          parent.color = Color.BLACK;
          if (sibling.right) sibling.right.color = Color.BLACK;
          this.rotateLeft(parent);
          node = this.root;
          parent = null;
        }
      } else {
        // Node is right child - sibling is left child (mirror cases)
        let sibling = this.requireChild(parent, 'left');
        if (sibling.color === Color.RED) {
          sibling.color = Color.BLACK;
          parent.color = Color.RED;
          this.rotateRight(parent);
          sibling = this.requireChild(parent, 'left');
        }
        if (isBlack(sibling.right) && isBlack(sibling.left)) {
          sibling.color = Color.RED;
          node = parent;
          parent = node.parent;
        } else {
          if (isBlack(sibling.left)) {
            if (sibling.right) sibling.right.color = Color.BLACK;
            sibling.color = Color.RED;
            this.rotateLeft(sibling);
            sibling = this.requireChild(parent, 'left');
          }
          sibling.color = parent.color;
          parent.color = Color.BLACK;
          if (sibling.left) sibling.left.color = Color.BLACK;
          this.rotateRight(parent);
          node = this.root;
          parent = null;
        }
      }
    }

    // A RED replacement (or the root) absorbs the extra BLACK
    if (node) node.color = Color.BLACK;
  }

  /**
   * The sibling of a BLACK-deficient position always exists: the removed BLACK node
   * gave that side a black-height of at least one, so the other side has one too
   */
  private requireChild(parent: RBNode<K, V>, side: 'left' | 'right'): RBNode<K, V> {
    const child = parent[side];
    if (!child) {
      throw new TreeInvariantError('black-height', `missing ${side} sibling during delete fixup`);
    }
    return child;
  }
}
