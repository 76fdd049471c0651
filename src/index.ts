export { SortedMap, type SortedMapOptions } from './core/sorted-map.js';
export { RedBlackTree } from './core/red-black-tree.js';
export { traverse, type TraversalOrder } from './core/tree-iterator.js';
export { validateTree, isValidTree, type TreeReport } from './core/tree-validator.js';
export { Color, type RBNode, type Comparator, type Entry, type NaturalKey } from './types/tree.js';
export { naturalCompare, reverseComparator } from './utils/comparators.js';
export {
  SortedMapError,
  KeyNotFoundError,
  InvalidKeyError,
  TreeInvariantError,
  getErrorMessage,
  type InvariantName
} from './utils/errors.js';
export { loadConfig, getConfig, resetConfig, type SortedMapConfig } from './utils/config.js';
export { createLogger, type Logger } from './utils/logger.js';
