/**
 * Undo/redo engine.
 *
 * Edits are recorded as plain deltas and folded into undo groups. An edit
 * joins the open group when it has the same class, starts where the group
 * left the cursor, and arrives within the grouping window of the previous
 * edit. Anything else closes the group and starts a new one.
 */

import type {
  BufferState,
  Delta,
  EditClass,
  HistoryState,
  UndoGroup,
} from '../../types/state.ts';
import type { CharOffset } from '../../types/branded.ts';
import { EditorError, err, ok, type Result } from '../../types/errors.ts';
import { applyDelta } from '../core/rope.ts';
import { withHistoryState } from '../core/state.ts';

/**
 * One buffer mutation as seen by the history.
 */
export interface RecordedEdit {
  readonly delta: Delta;
  readonly editClass: EditClass;
  readonly cursorBefore: CharOffset;
  readonly cursorAfter: CharOffset;
  readonly timestamp: number;
}

export interface HistoryApplyResult {
  readonly buffer: BufferState;
  readonly history: HistoryState;
  /** Where the cursor goes after undo or redo */
  readonly cursor: CharOffset;
}

// =============================================================================
// Queries
// =============================================================================

export function canUndo(history: HistoryState): boolean {
  return history.openGroup !== null || history.undoStack.length > 0;
}

export function canRedo(history: HistoryState): boolean {
  return history.redoStack.length > 0;
}

/**
 * Closed groups plus the open one, if any.
 */
export function getUndoCount(history: HistoryState): number {
  return history.undoStack.length + (history.openGroup !== null ? 1 : 0);
}

export function getRedoCount(history: HistoryState): number {
  return history.redoStack.length;
}

// =============================================================================
// Grouping
// =============================================================================

/**
 * Whether `edit` continues `group`.
 */
export function canExtendGroup(
  group: UndoGroup,
  edit: RecordedEdit,
  windowMs: number
): boolean {
  return (
    group.editClass === edit.editClass &&
    edit.cursorBefore === group.cursorAfter &&
    edit.timestamp - group.lastEditAt <= windowMs
  );
}

function startGroup(edit: RecordedEdit): UndoGroup {
  return Object.freeze({
    editClass: edit.editClass,
    deltas: Object.freeze([edit.delta]),
    createdAt: edit.timestamp,
    lastEditAt: edit.timestamp,
    cursorBefore: edit.cursorBefore,
    cursorAfter: edit.cursorAfter,
  });
}

function extendGroup(group: UndoGroup, edit: RecordedEdit): UndoGroup {
  return Object.freeze({
    ...group,
    deltas: Object.freeze([...group.deltas, edit.delta]),
    lastEditAt: edit.timestamp,
    cursorAfter: edit.cursorAfter,
  });
}

/**
 * Push a group onto the undo stack, dropping the oldest beyond the limit.
 */
function pushUndo(history: HistoryState, group: UndoGroup): readonly UndoGroup[] {
  const stack = [...history.undoStack, group];
  while (stack.length > history.limit) {
    stack.shift();
  }
  return Object.freeze(stack);
}

/**
 * Close the open group, if any.
 */
export function closeGroup(history: HistoryState): HistoryState {
  if (history.openGroup === null) return history;
  return withHistoryState(history, {
    undoStack: pushUndo(history, history.openGroup),
    openGroup: null,
  });
}

/**
 * Record an edit. Clears the redo stack.
 * A standalone edit becomes its own closed group and never merges.
 */
export function recordEdit(
  history: HistoryState,
  edit: RecordedEdit,
  options: { standalone?: boolean } = {}
): HistoryState {
  const open = history.openGroup;
  if (!options.standalone && open !== null && canExtendGroup(open, edit, history.groupWindowMs)) {
    return withHistoryState(history, {
      openGroup: extendGroup(open, edit),
      redoStack: Object.freeze([]),
    });
  }

  const closed = closeGroup(history);
  if (options.standalone) {
    return withHistoryState(closed, {
      undoStack: pushUndo(closed, startGroup(edit)),
      redoStack: Object.freeze([]),
    });
  }
  return withHistoryState(closed, {
    openGroup: startGroup(edit),
    redoStack: Object.freeze([]),
  });
}

// =============================================================================
// Undo / Redo
// =============================================================================

export function invertDelta(delta: Delta): Delta {
  return Object.freeze({ offset: delta.offset, removed: delta.inserted, inserted: delta.removed });
}

/**
 * Revert the most recent group, closing the open one first.
 */
export function historyUndo(
  buffer: BufferState,
  history: HistoryState
): Result<HistoryApplyResult> {
  const closed = closeGroup(history);
  const group = closed.undoStack[closed.undoStack.length - 1];
  if (group === undefined) {
    return err(new EditorError('nothing_to_undo', 'Nothing to undo'));
  }

  let next = buffer;
  for (let i = group.deltas.length - 1; i >= 0; i--) {
    next = applyDelta(next, invertDelta(group.deltas[i]));
  }

  return ok({
    buffer: next,
    history: withHistoryState(closed, {
      undoStack: Object.freeze(closed.undoStack.slice(0, -1)),
      redoStack: Object.freeze([...closed.redoStack, group]),
    }),
    cursor: group.cursorBefore,
  });
}

/**
 * Reapply the most recently undone group.
 */
export function historyRedo(
  buffer: BufferState,
  history: HistoryState
): Result<HistoryApplyResult> {
  const closed = closeGroup(history);
  const group = closed.redoStack[closed.redoStack.length - 1];
  if (group === undefined) {
    return err(new EditorError('nothing_to_redo', 'Nothing to redo'));
  }

  let next = buffer;
  for (const delta of group.deltas) {
    next = applyDelta(next, delta);
  }

  return ok({
    buffer: next,
    history: withHistoryState(closed, {
      undoStack: pushUndo(closed, group),
      redoStack: Object.freeze(closed.redoStack.slice(0, -1)),
    }),
    cursor: group.cursorAfter,
  });
}
