/**
 * Scan namespace: O(n) operations.
 * All functions in this namespace perform full document traversals.
 * Use `query.*` for efficient lookups when possible.
 */

import { getValue, getWordCount, iterateChunks, verifyRope } from '../store/core/rope.ts';
import { executeSearch } from '../store/features/search.ts';

export const scan = {
  /** @complexity O(n): joins every chunk into a single string */
  getValue,
  /** @complexity O(n): in-order walk, yields chunk text */
  iterateChunks,
  /** @complexity O(n): whitespace tokenization across chunks */
  getWordCount,
  /** @complexity O(n): case-folded scan of the whole document */
  search: executeSearch,
  /** @complexity O(n): checks red-black and aggregate invariants */
  verifyRope,
} as const;
