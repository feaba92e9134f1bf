/**
 * Query namespace: O(1) and O(log n) operations.
 * Functions here are read-only selectors over immutable buffer state.
 */

import {
  getLength,
  getLineCount,
  ropeSlice,
  charAt,
  getLineRange,
  getLineLength,
  getLineText,
  offsetToLineCol,
  lineColToOffset,
} from '../store/core/rope.ts';
import { currentMatch } from '../store/features/search.ts';
import { canRedo, canUndo, getRedoCount, getUndoCount } from '../store/features/history.ts';

export const query = {
  /** @complexity O(1): cached on buffer state */
  getLength,
  /** @complexity O(1): cached on buffer state */
  getLineCount,
  /** @complexity O(log n + m): tree descent, then collect m code points */
  slice: ropeSlice,
  /** @complexity O(log n): tree descent via subtreeLength */
  charAt,
  /** @complexity O(log n): newline rank lookups via subtreeNewlines */
  getLineRange,
  /** @complexity O(log n): two newline rank lookups */
  getLineLength,
  /** @complexity O(log n + line_length): line lookup + text extraction */
  getLineText,
  /** @complexity O(log n): newline count before offset */
  offsetToLineCol,
  /** @complexity O(log n): line start lookup */
  lineColToOffset,
  /** @complexity O(1) */
  currentMatch,
  /** @complexity O(1) */
  canUndo,
  /** @complexity O(1) */
  canRedo,
  /** @complexity O(1) */
  getUndoCount,
  /** @complexity O(1) */
  getRedoCount,
} as const;
