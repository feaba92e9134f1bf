/**
 * Action creators.
 * Type-safe factories for every EditorAction; all return frozen objects.
 */

import type {
  ClearSearchAction,
  CancelQuitAction,
  CloseOverlayAction,
  CloseUndoGroupAction,
  DeleteBackwardAction,
  DeleteForwardAction,
  DeleteLineAction,
  EnterNavigateAction,
  EnterSearchAction,
  EnterWriteAction,
  ExpireStatusAction,
  ForceQuitAction,
  HistorySelectAction,
  HistoryShowAction,
  InsertTextAction,
  LoadContentAction,
  MarkSavedAction,
  Motion,
  MoveAction,
  OpenHistoryAction,
  OpenOverlayAction,
  PasteLineAction,
  RedoAction,
  RequestQuitAction,
  SearchCancelAction,
  SearchCommitAction,
  SearchInputAction,
  SearchStepAction,
  SetPendingAction,
  SetStatusAction,
  SetViewportAction,
  ToggleStatusLineAction,
  UndoAction,
  YankLineAction,
} from '../../types/actions.ts';
import type {
  HistoryView,
  PendingPrefix,
  StatusKind,
  VersionSummary,
} from '../../types/state.ts';

export const EditorActions = {
  // ---------------------------------------------------------------------------
  // Editing
  // ---------------------------------------------------------------------------

  insertText(text: string, timestamp: number): InsertTextAction {
    return Object.freeze({ type: 'INSERT_TEXT', text, timestamp });
  },

  deleteBackward(timestamp: number): DeleteBackwardAction {
    return Object.freeze({ type: 'DELETE_BACKWARD', timestamp });
  },

  deleteForward(timestamp: number): DeleteForwardAction {
    return Object.freeze({ type: 'DELETE_FORWARD', timestamp });
  },

  deleteLine(timestamp: number): DeleteLineAction {
    return Object.freeze({ type: 'DELETE_LINE', timestamp });
  },

  yankLine(): YankLineAction {
    return Object.freeze({ type: 'YANK_LINE' });
  },

  pasteLine(timestamp: number): PasteLineAction {
    return Object.freeze({ type: 'PASTE_LINE', timestamp });
  },

  loadContent(content: string): LoadContentAction {
    return Object.freeze({ type: 'LOAD_CONTENT', content });
  },

  move(motion: Motion): MoveAction {
    return Object.freeze({ type: 'MOVE', motion });
  },

  // ---------------------------------------------------------------------------
  // History
  // ---------------------------------------------------------------------------

  undo(timestamp: number): UndoAction {
    return Object.freeze({ type: 'UNDO', timestamp });
  },

  redo(timestamp: number): RedoAction {
    return Object.freeze({ type: 'REDO', timestamp });
  },

  closeUndoGroup(): CloseUndoGroupAction {
    return Object.freeze({ type: 'CLOSE_UNDO_GROUP' });
  },

  // ---------------------------------------------------------------------------
  // Modes
  // ---------------------------------------------------------------------------

  enterWrite(): EnterWriteAction {
    return Object.freeze({ type: 'ENTER_WRITE' });
  },

  enterNavigate(): EnterNavigateAction {
    return Object.freeze({ type: 'ENTER_NAVIGATE' });
  },

  setPending(prefix: PendingPrefix | null): SetPendingAction {
    return Object.freeze({ type: 'SET_PENDING', prefix });
  },

  enterSearch(): EnterSearchAction {
    return Object.freeze({ type: 'ENTER_SEARCH' });
  },

  searchInput(query: string): SearchInputAction {
    return Object.freeze({ type: 'SEARCH_INPUT', query });
  },

  searchCommit(timestamp: number): SearchCommitAction {
    return Object.freeze({ type: 'SEARCH_COMMIT', timestamp });
  },

  searchCancel(): SearchCancelAction {
    return Object.freeze({ type: 'SEARCH_CANCEL' });
  },

  searchStep(direction: 'next' | 'previous', timestamp: number): SearchStepAction {
    return Object.freeze({ type: 'SEARCH_STEP', direction, timestamp });
  },

  clearSearch(): ClearSearchAction {
    return Object.freeze({ type: 'CLEAR_SEARCH' });
  },

  // ---------------------------------------------------------------------------
  // Overlays
  // ---------------------------------------------------------------------------

  openOverlay(overlay: 'help' | 'stats'): OpenOverlayAction {
    return Object.freeze({ type: 'OPEN_OVERLAY', overlay });
  },

  openHistory(entries: readonly VersionSummary[]): OpenHistoryAction {
    return Object.freeze({ type: 'OPEN_HISTORY', entries });
  },

  historySelect(delta: number): HistorySelectAction {
    return Object.freeze({ type: 'HISTORY_SELECT', delta });
  },

  historyShow(view: HistoryView): HistoryShowAction {
    return Object.freeze({ type: 'HISTORY_SHOW', view });
  },

  closeOverlay(): CloseOverlayAction {
    return Object.freeze({ type: 'CLOSE_OVERLAY' });
  },

  // ---------------------------------------------------------------------------
  // Session
  // ---------------------------------------------------------------------------

  requestQuit(): RequestQuitAction {
    return Object.freeze({ type: 'REQUEST_QUIT' });
  },

  cancelQuit(): CancelQuitAction {
    return Object.freeze({ type: 'CANCEL_QUIT' });
  },

  forceQuit(): ForceQuitAction {
    return Object.freeze({ type: 'FORCE_QUIT' });
  },

  markSaved(closeUndoGroup: boolean): MarkSavedAction {
    return Object.freeze({ type: 'MARK_SAVED', closeUndoGroup });
  },

  setStatus(text: string, kind: StatusKind, timestamp: number, durationMs?: number): SetStatusAction {
    return Object.freeze(
      durationMs === undefined
        ? { type: 'SET_STATUS', text, kind, timestamp }
        : { type: 'SET_STATUS', text, kind, timestamp, durationMs }
    );
  },

  expireStatus(timestamp: number): ExpireStatusAction {
    return Object.freeze({ type: 'EXPIRE_STATUS', timestamp });
  },

  toggleStatusLine(): ToggleStatusLineAction {
    return Object.freeze({ type: 'TOGGLE_STATUS_LINE' });
  },

  setViewport(rows: number, columns: number): SetViewportAction {
    return Object.freeze({ type: 'SET_VIEWPORT', rows, columns });
  },
} as const;
