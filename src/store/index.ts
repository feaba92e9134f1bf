/**
 * Store exports for the editing engine.
 */

// Session factory and loop
export { createEditorSession, SAVED_STATUS_MS } from './features/session.ts';
export type { EditorSessionOptions } from './features/session.ts';
export { runEventLoop, DEFAULT_POLL_INTERVAL_MS } from './features/loop.ts';
export type { InputSource, EventLoopOptions } from './features/loop.ts';

// Action creators
export { EditorActions } from './features/actions.ts';

// State factories
export {
  createInitialState,
  createInitialCursorState,
  createInitialHistoryState,
  withState,
  withHistoryState,
} from './core/state.ts';
export type { EditorStateOptions } from './core/state.ts';

// Reducer and key map
export { editorReducer } from './features/reducer.ts';
export { resolveKey } from './features/keymap.ts';
export type { KeyCommand, SessionEffect } from './features/keymap.ts';

// Rope operations
export {
  CHUNK_CAPACITY,
  createBufferState,
  ropeInsert,
  ropeDelete,
  applyDelta,
  getValue,
  getLength,
  getLineCount,
  ropeSlice,
  charAt,
  iterateChunks,
  getWordCount,
  getLineRange,
  getLineLength,
  getLineText,
  offsetToLineCol,
  lineColToOffset,
  verifyRope,
} from './core/rope.ts';
export type { BufferEdit, LineRange, LineColumn } from './core/rope.ts';

// Text helpers
export { codePointLength, countWords, charClass, foldCase, normalizeLineEndings } from './core/text.ts';
export type { CharClass } from './core/text.ts';

// Cursor movement
export { moveCursor, clampCursor, normalizeForNavigate, isPastLineEnd } from './features/cursor.ts';
export type { MoveContext } from './features/cursor.ts';

// Undo history
export {
  recordEdit,
  closeGroup,
  canExtendGroup,
  historyUndo,
  historyRedo,
  invertDelta,
  canUndo,
  canRedo,
  getUndoCount,
  getRedoCount,
} from './features/history.ts';
export type { RecordedEdit, HistoryApplyResult } from './features/history.ts';

// Search
export { findMatches, executeSearch, selectFrom, stepMatch, currentMatch } from './features/search.ts';

// Stats
export {
  createStatsState,
  observeWordCount,
  rebaseWordCount,
  streak,
  progress,
  sessionStats,
  formatElapsed,
  dateKey,
  previousDay,
  wordsOn,
} from './features/stats.ts';
export type { DailyTotals, StatsState, GoalProgress, SessionStats } from './features/stats.ts';

// Render view
export { buildRenderView, displayColumn, expandTabs, modeLabel, CONFIRM_QUIT_PROMPT } from './features/view.ts';
export type { RenderView, ViewLine, Highlight, StatsSnapshot, OverlayView } from './features/view.ts';

// Events
export { createEventEmitter } from './events.ts';
export type {
  SessionEvent,
  SaveEvent,
  SaveTrigger,
  BackupEvent,
  RestoreEvent,
  QuitEvent,
  ErrorEvent,
  SessionEventMap,
  SessionEventEmitter,
  EventHandler,
} from './events.ts';
