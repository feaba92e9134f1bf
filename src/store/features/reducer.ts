/**
 * Editor reducer.
 * Pure state transitions for buffer edits, cursor movement, undo history,
 * search and modes. No side effects: file writes and version storage
 * happen in the session around it.
 */

import type { EditorState, SearchState, StatusKind } from '../../types/state.ts';
import type { EditorAction } from '../../types/actions.ts';
import type { CharOffset } from '../../types/branded.ts';
import type { Result } from '../../types/errors.ts';
import { charOffset } from '../../types/branded.ts';
import { withState, createInitialCursorState, createInitialHistoryState } from '../core/state.ts';
import {
  createBufferState,
  getLineRange,
  getLineText,
  offsetToLineCol,
  ropeDelete,
  ropeInsert,
  type BufferEdit,
} from '../core/rope.ts';
import { codePointLength } from '../core/text.ts';
import { clampCursor, moveCursor, normalizeForNavigate } from './cursor.ts';
import { closeGroup, historyRedo, historyUndo, recordEdit, type HistoryApplyResult } from './history.ts';
import { executeSearch, selectFrom, stepMatch } from './search.ts';

// =============================================================================
// Helpers
// =============================================================================

function cursorAt(offset: number) {
  return Object.freeze({ offset: charOffset(offset), stickyColumn: null });
}

function withStatus(
  state: EditorState,
  text: string,
  kind: StatusKind,
  timestamp: number,
  durationMs?: number
): EditorState {
  const timeout = durationMs ?? state.config.statusTimeoutSeconds * 1000;
  return withState(state, {
    status: Object.freeze({
      text,
      kind,
      expiresAt: timeout > 0 ? timestamp + timeout : null,
    }),
  });
}

/**
 * Recompute matches after an edit so highlights never point past the
 * document. The current selection is dropped.
 */
function refreshSearch(search: SearchState | null, state: EditorState): SearchState | null {
  return search === null ? null : executeSearch(state.buffer, search.query);
}

/**
 * Apply a buffer edit and record it in the undo history.
 */
function commitEdit(
  state: EditorState,
  edit: BufferEdit,
  editClass: 'insert' | 'delete',
  cursorAfter: number,
  timestamp: number,
  standalone: boolean = false
): EditorState {
  const history = recordEdit(
    state.history,
    {
      delta: edit.delta,
      editClass,
      cursorBefore: state.cursor.offset,
      cursorAfter: charOffset(cursorAfter),
      timestamp,
    },
    { standalone }
  );
  const next = withState(state, {
    buffer: edit.state,
    cursor: cursorAt(cursorAfter),
    history,
    dirty: true,
  });
  return withState(next, { search: refreshSearch(state.search, next) });
}

function applyHistoryResult(
  state: EditorState,
  result: Result<HistoryApplyResult>,
  timestamp: number
): EditorState {
  if (!result.ok) {
    return withStatus(state, result.error.message, 'info', timestamp);
  }
  const { buffer, history, cursor } = result.value;
  const next = withState(state, {
    buffer,
    history,
    cursor: clampCursor(buffer, cursorAt(cursor)),
    dirty: true,
  });
  return withState(next, { search: refreshSearch(state.search, next) });
}

// =============================================================================
// Line Commands
// =============================================================================

/**
 * Remove the cursor's line with its newline. The last line loses only its
 * text; an empty last line takes the newline before it.
 */
function deleteLine(state: EditorState, timestamp: number): EditorState {
  const { buffer } = state;
  const { line } = offsetToLineCol(buffer, state.cursor.offset);
  const { start, end } = getLineRange(buffer, line);
  const text = getLineText(buffer, line);

  let from: number;
  let to: number;
  if (line < buffer.lineCount - 1) {
    from = start;
    to = end + 1;
  } else if (start < end) {
    from = start;
    to = end;
  } else if (line > 0) {
    from = start - 1;
    to = start;
  } else {
    return state;
  }

  const edit = ropeDelete(buffer, charOffset(from), charOffset(to));
  const targetLine = Math.min(line, edit.state.lineCount - 1);
  const cursorAfter = getLineRange(edit.state, targetLine).start;
  const next = commitEdit(state, edit, 'delete', cursorAfter, timestamp, true);
  return withState(next, { register: text });
}

function yankLine(state: EditorState): EditorState {
  const { line } = offsetToLineCol(state.buffer, state.cursor.offset);
  return withState(state, { register: getLineText(state.buffer, line) });
}

/**
 * Insert the register as a new line below the cursor's line.
 */
function pasteLine(state: EditorState, timestamp: number): EditorState {
  const register = state.register;
  if (register === null) return state;

  const { buffer } = state;
  const { line } = offsetToLineCol(buffer, state.cursor.offset);
  const { end } = getLineRange(buffer, line);

  let at: CharOffset;
  let text: string;
  let cursorAfter: number;
  if (line < buffer.lineCount - 1) {
    at = charOffset(end + 1);
    text = register + '\n';
    cursorAfter = at;
  } else {
    at = charOffset(buffer.length);
    text = '\n' + register;
    cursorAfter = at + 1;
  }

  return commitEdit(state, ropeInsert(buffer, at, text), 'insert', cursorAfter, timestamp, true);
}

// =============================================================================
// Settling
// =============================================================================

/**
 * Keep the cursor legal for the mode and visible in the viewport.
 */
function settle(state: EditorState): EditorState {
  let next = state;

  if (next.mode.kind === 'navigate') {
    const cursor = normalizeForNavigate(next.buffer, next.cursor);
    if (cursor !== next.cursor) next = withState(next, { cursor });
  }

  const { line } = offsetToLineCol(next.buffer, next.cursor.offset);
  const { rows, scrollTop } = next.viewport;
  let top = scrollTop;
  if (line < top) top = line;
  if (line >= top + rows) top = line - rows + 1;
  if (top !== scrollTop) {
    next = withState(next, { viewport: Object.freeze({ ...next.viewport, scrollTop: top }) });
  }

  return next;
}

// =============================================================================
// Reducer
// =============================================================================

function reduce(state: EditorState, action: EditorAction): EditorState {
  switch (action.type) {
    case 'INSERT_TEXT': {
      if (action.text.length === 0) return state;
      const offset = state.cursor.offset;
      const edit = ropeInsert(state.buffer, offset, action.text);
      return commitEdit(state, edit, 'insert', offset + codePointLength(action.text), action.timestamp);
    }

    case 'DELETE_BACKWARD': {
      const offset = state.cursor.offset;
      if (offset === 0) return state;
      const edit = ropeDelete(state.buffer, charOffset(offset - 1), offset);
      return commitEdit(state, edit, 'delete', offset - 1, action.timestamp);
    }

    case 'DELETE_FORWARD': {
      const offset = state.cursor.offset;
      if (offset === state.buffer.length) return state;
      const edit = ropeDelete(state.buffer, offset, charOffset(offset + 1));
      return commitEdit(state, edit, 'delete', offset, action.timestamp);
    }

    case 'DELETE_LINE':
      return deleteLine(state, action.timestamp);

    case 'YANK_LINE':
      return yankLine(state);

    case 'PASTE_LINE':
      return pasteLine(state, action.timestamp);

    case 'LOAD_CONTENT':
      return withState(state, {
        buffer: createBufferState(action.content),
        cursor: createInitialCursorState(),
        history: createInitialHistoryState(state.history.limit, state.history.groupWindowMs),
        search: null,
        dirty: true,
      });

    case 'MOVE':
      return withState(state, {
        cursor: moveCursor(state.buffer, state.cursor, action.motion, {
          navigate: state.mode.kind === 'navigate',
          pageSize: state.viewport.rows,
        }),
      });

    case 'UNDO':
      return applyHistoryResult(state, historyUndo(state.buffer, state.history), action.timestamp);

    case 'REDO':
      return applyHistoryResult(state, historyRedo(state.buffer, state.history), action.timestamp);

    case 'CLOSE_UNDO_GROUP':
      return withState(state, { history: closeGroup(state.history) });

    case 'ENTER_WRITE':
      return withState(state, {
        mode: Object.freeze({ kind: 'write' }),
        history: closeGroup(state.history),
        search: null,
      });

    case 'ENTER_NAVIGATE':
      return withState(state, {
        mode: Object.freeze({ kind: 'navigate', pending: null }),
        history: closeGroup(state.history),
      });

    case 'SET_PENDING':
      if (state.mode.kind !== 'navigate') return state;
      return withState(state, { mode: Object.freeze({ kind: 'navigate', pending: action.prefix }) });

    case 'ENTER_SEARCH':
      return withState(state, {
        mode: Object.freeze({ kind: 'search', query: '' }),
        history: closeGroup(state.history),
        search: null,
      });

    case 'SEARCH_INPUT':
      if (state.mode.kind !== 'search') return state;
      return withState(state, {
        mode: Object.freeze({ kind: 'search', query: action.query }),
        search: executeSearch(state.buffer, action.query),
      });

    case 'SEARCH_COMMIT': {
      if (state.mode.kind !== 'search') return state;
      const navigate = withState(state, { mode: Object.freeze({ kind: 'navigate', pending: null }) });
      const search = executeSearch(state.buffer, state.mode.query);
      if (search === null) {
        return withState(navigate, { search: null });
      }
      const selected = selectFrom(search, state.cursor.offset);
      if (!selected.ok) {
        return withStatus(withState(navigate, { search }), selected.error.message, 'info', action.timestamp);
      }
      return withState(navigate, {
        search: selected.value,
        cursor: cursorAt(selected.value.matches[selected.value.current].start),
      });
    }

    case 'SEARCH_CANCEL':
      if (state.mode.kind !== 'search') return state;
      return withState(state, {
        mode: Object.freeze({ kind: 'navigate', pending: null }),
        search: null,
      });

    case 'SEARCH_STEP': {
      const stepped = stepMatch(state.search, action.direction);
      if (!stepped.ok) {
        return withStatus(state, stepped.error.message, 'info', action.timestamp);
      }
      return withState(state, {
        search: stepped.value,
        cursor: cursorAt(stepped.value.matches[stepped.value.current].start),
      });
    }

    case 'CLEAR_SEARCH':
      return state.search === null ? state : withState(state, { search: null });

    case 'OPEN_OVERLAY':
      return withState(state, {
        mode: Object.freeze({ kind: 'overlay', overlay: action.overlay }),
        history: closeGroup(state.history),
      });

    case 'OPEN_HISTORY':
      return withState(state, {
        mode: Object.freeze({
          kind: 'overlay',
          overlay: 'history',
          entries: action.entries,
          selected: 0,
          view: Object.freeze({ kind: 'list' }),
        }),
        history: closeGroup(state.history),
      });

    case 'HISTORY_SELECT': {
      const mode = state.mode;
      if (mode.kind !== 'overlay' || mode.overlay !== 'history') return state;
      const last = Math.max(0, mode.entries.length - 1);
      const selected = Math.max(0, Math.min(mode.selected + action.delta, last));
      return selected === mode.selected
        ? state
        : withState(state, { mode: Object.freeze({ ...mode, selected }) });
    }

    case 'HISTORY_SHOW': {
      const mode = state.mode;
      if (mode.kind !== 'overlay' || mode.overlay !== 'history') return state;
      return withState(state, { mode: Object.freeze({ ...mode, view: action.view }) });
    }

    case 'CLOSE_OVERLAY': {
      const mode = state.mode;
      if (mode.kind !== 'overlay') return state;
      if (mode.overlay === 'history' && mode.view.kind !== 'list') {
        return withState(state, { mode: Object.freeze({ ...mode, view: Object.freeze({ kind: 'list' }) }) });
      }
      return withState(state, { mode: Object.freeze({ kind: 'navigate', pending: null }) });
    }

    case 'REQUEST_QUIT': {
      const mode = state.mode;
      if (mode.kind === 'confirm-quit') return state;
      if (!state.dirty) return withState(state, { quitRequested: true });
      return withState(state, { mode: Object.freeze({ kind: 'confirm-quit', previous: mode }) });
    }

    case 'CANCEL_QUIT':
      if (state.mode.kind !== 'confirm-quit') return state;
      return withState(state, { mode: state.mode.previous });

    case 'FORCE_QUIT':
      return withState(state, { quitRequested: true });

    case 'MARK_SAVED':
      return withState(state, {
        dirty: false,
        history: action.closeUndoGroup ? closeGroup(state.history) : state.history,
      });

    case 'SET_STATUS':
      return withStatus(state, action.text, action.kind, action.timestamp, action.durationMs);

    case 'EXPIRE_STATUS': {
      const status = state.status;
      if (status === null || status.expiresAt === null || action.timestamp < status.expiresAt) {
        return state;
      }
      return withState(state, { status: null });
    }

    case 'TOGGLE_STATUS_LINE':
      return withState(state, { statusVisible: !state.statusVisible });

    case 'SET_VIEWPORT':
      return withState(state, {
        viewport: Object.freeze({
          ...state.viewport,
          rows: Math.max(1, action.rows),
          columns: Math.max(1, action.columns),
        }),
      });

    default: {
      // Exhaustive check - TypeScript will error if we miss an action type
      const exhaustiveCheck: never = action;
      return exhaustiveCheck;
    }
  }
}

/**
 * Apply an action. Returns the same reference when nothing changed.
 */
export function editorReducer(state: EditorState, action: EditorAction): EditorState {
  const next = reduce(state, action);
  return next === state ? state : settle(next);
}
