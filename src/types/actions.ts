/**
 * Editor action types.
 * Every state transition of the pure reducer is expressed as a serializable
 * action. Effects (file writes, version storage, quitting the process) are
 * handled by the session around the reducer, never inside it.
 */

import type {
  HistoryView,
  PendingPrefix,
  StatusKind,
  VersionSummary,
} from './state.ts';

// =============================================================================
// Text Editing Actions
// =============================================================================

/**
 * Insert text at the cursor.
 */
export interface InsertTextAction {
  readonly type: 'INSERT_TEXT';
  readonly text: string;
  /** Drives undo grouping */
  readonly timestamp: number;
}

/**
 * Remove the character before the cursor.
 */
export interface DeleteBackwardAction {
  readonly type: 'DELETE_BACKWARD';
  readonly timestamp: number;
}

/**
 * Remove the character under the cursor.
 */
export interface DeleteForwardAction {
  readonly type: 'DELETE_FORWARD';
  readonly timestamp: number;
}

export interface DeleteLineAction {
  readonly type: 'DELETE_LINE';
  readonly timestamp: number;
}

export interface YankLineAction {
  readonly type: 'YANK_LINE';
}

export interface PasteLineAction {
  readonly type: 'PASTE_LINE';
  readonly timestamp: number;
}

/**
 * Replace the whole document, as a version restore does.
 * Resets the cursor and undo history and marks the document modified.
 */
export interface LoadContentAction {
  readonly type: 'LOAD_CONTENT';
  readonly content: string;
}

// =============================================================================
// Movement Actions
// =============================================================================

export type Motion =
  | 'left'
  | 'right'
  | 'up'
  | 'down'
  | 'word-forward'
  | 'word-backward'
  | 'paragraph-forward'
  | 'paragraph-backward'
  | 'line-start'
  | 'line-end'
  | 'document-start'
  | 'document-end'
  | 'page-up'
  | 'page-down';

export interface MoveAction {
  readonly type: 'MOVE';
  readonly motion: Motion;
}

// =============================================================================
// History Actions
// =============================================================================

export interface UndoAction {
  readonly type: 'UNDO';
  readonly timestamp: number;
}

export interface RedoAction {
  readonly type: 'REDO';
  readonly timestamp: number;
}

/**
 * Push the open undo group onto the undo stack.
 */
export interface CloseUndoGroupAction {
  readonly type: 'CLOSE_UNDO_GROUP';
}

// =============================================================================
// Mode Actions
// =============================================================================

export interface EnterWriteAction {
  readonly type: 'ENTER_WRITE';
}

export interface EnterNavigateAction {
  readonly type: 'ENTER_NAVIGATE';
}

export interface SetPendingAction {
  readonly type: 'SET_PENDING';
  readonly prefix: PendingPrefix | null;
}

export interface EnterSearchAction {
  readonly type: 'ENTER_SEARCH';
}

/**
 * Replace the in-progress query and recompute highlights.
 */
export interface SearchInputAction {
  readonly type: 'SEARCH_INPUT';
  readonly query: string;
}

export interface SearchCommitAction {
  readonly type: 'SEARCH_COMMIT';
  readonly timestamp: number;
}

export interface SearchCancelAction {
  readonly type: 'SEARCH_CANCEL';
}

export interface SearchStepAction {
  readonly type: 'SEARCH_STEP';
  readonly direction: 'next' | 'previous';
  readonly timestamp: number;
}

export interface ClearSearchAction {
  readonly type: 'CLEAR_SEARCH';
}

// =============================================================================
// Overlay Actions
// =============================================================================

export interface OpenOverlayAction {
  readonly type: 'OPEN_OVERLAY';
  readonly overlay: 'help' | 'stats';
}

export interface OpenHistoryAction {
  readonly type: 'OPEN_HISTORY';
  /** Newest first */
  readonly entries: readonly VersionSummary[];
}

export interface HistorySelectAction {
  readonly type: 'HISTORY_SELECT';
  readonly delta: number;
}

export interface HistoryShowAction {
  readonly type: 'HISTORY_SHOW';
  readonly view: HistoryView;
}

/**
 * Go back one overlay level: a history content or diff view returns to the
 * list, anything else returns to Navigate.
 */
export interface CloseOverlayAction {
  readonly type: 'CLOSE_OVERLAY';
}

// =============================================================================
// Session Actions
// =============================================================================

/**
 * Quit immediately when clean, otherwise ask for confirmation.
 */
export interface RequestQuitAction {
  readonly type: 'REQUEST_QUIT';
}

export interface CancelQuitAction {
  readonly type: 'CANCEL_QUIT';
}

export interface ForceQuitAction {
  readonly type: 'FORCE_QUIT';
}

export interface MarkSavedAction {
  readonly type: 'MARK_SAVED';
  /** Manual saves close the open undo group, autosaves do not */
  readonly closeUndoGroup: boolean;
}

export interface SetStatusAction {
  readonly type: 'SET_STATUS';
  readonly text: string;
  readonly kind: StatusKind;
  readonly timestamp: number;
  /** Overrides the configured status timeout */
  readonly durationMs?: number;
}

/**
 * Drop the status message if it has expired at `timestamp`.
 */
export interface ExpireStatusAction {
  readonly type: 'EXPIRE_STATUS';
  readonly timestamp: number;
}

export interface ToggleStatusLineAction {
  readonly type: 'TOGGLE_STATUS_LINE';
}

export interface SetViewportAction {
  readonly type: 'SET_VIEWPORT';
  readonly rows: number;
  readonly columns: number;
}

// =============================================================================
// Union
// =============================================================================

export type EditorAction =
  | InsertTextAction
  | DeleteBackwardAction
  | DeleteForwardAction
  | DeleteLineAction
  | YankLineAction
  | PasteLineAction
  | LoadContentAction
  | MoveAction
  | UndoAction
  | RedoAction
  | CloseUndoGroupAction
  | EnterWriteAction
  | EnterNavigateAction
  | SetPendingAction
  | EnterSearchAction
  | SearchInputAction
  | SearchCommitAction
  | SearchCancelAction
  | SearchStepAction
  | ClearSearchAction
  | OpenOverlayAction
  | OpenHistoryAction
  | HistorySelectAction
  | HistoryShowAction
  | CloseOverlayAction
  | RequestQuitAction
  | CancelQuitAction
  | ForceQuitAction
  | MarkSavedAction
  | SetStatusAction
  | ExpireStatusAction
  | ToggleStatusLineAction
  | SetViewportAction;

export type EditorActionType = EditorAction['type'];

// =============================================================================
// Action Type Guards
// =============================================================================

/**
 * Check if an action mutates the document through the undo history.
 */
export function isTextEditAction(
  action: EditorAction
): action is
  | InsertTextAction
  | DeleteBackwardAction
  | DeleteForwardAction
  | DeleteLineAction
  | PasteLineAction {
  return (
    action.type === 'INSERT_TEXT' ||
    action.type === 'DELETE_BACKWARD' ||
    action.type === 'DELETE_FORWARD' ||
    action.type === 'DELETE_LINE' ||
    action.type === 'PASTE_LINE'
  );
}
