/**
 * Type exports for the editing engine.
 */

// State types
export type {
  NodeColor,
  RBNode,
  RopeNode,
  BufferState,
  CursorState,
  Delta,
  EditClass,
  UndoGroup,
  HistoryState,
  SearchMatch,
  SearchState,
  PendingPrefix,
  WriteMode,
  NavigateMode,
  SearchMode,
  InfoOverlayMode,
  VersionSummary,
  LineOpType,
  LineOp,
  HistoryView,
  HistoryOverlayMode,
  OverlayMode,
  BaseMode,
  ConfirmQuitMode,
  Mode,
  ModeKind,
  StatusKind,
  StatusMessage,
  ViewportState,
  EditorConfig,
  EditorState,
} from './state.ts';

// Action types
export type {
  InsertTextAction,
  DeleteBackwardAction,
  DeleteForwardAction,
  DeleteLineAction,
  YankLineAction,
  PasteLineAction,
  LoadContentAction,
  Motion,
  MoveAction,
  UndoAction,
  RedoAction,
  CloseUndoGroupAction,
  EnterWriteAction,
  EnterNavigateAction,
  SetPendingAction,
  EnterSearchAction,
  SearchInputAction,
  SearchCommitAction,
  SearchCancelAction,
  SearchStepAction,
  ClearSearchAction,
  OpenOverlayAction,
  OpenHistoryAction,
  HistorySelectAction,
  HistoryShowAction,
  CloseOverlayAction,
  RequestQuitAction,
  CancelQuitAction,
  ForceQuitAction,
  MarkSavedAction,
  SetStatusAction,
  ExpireStatusAction,
  ToggleStatusLineAction,
  SetViewportAction,
  EditorAction,
  EditorActionType,
} from './actions.ts';

export { isTextEditAction } from './actions.ts';

// Session types
export type { StoreListener, Unsubscribe, EditorSession } from './store.ts';

// Key events
export type { NamedKey, KeyEvent } from './keys.ts';
export { isNamedKey, isPrintable, isTypedChar, key, ctrl } from './keys.ts';

// Errors
export type { EditorErrorCode, Result, Logger } from './errors.ts';
export { EditorError, ok, err, ioError, isEditorError } from './errors.ts';

// Branded position types
export type { CharOffset, LineNumber, ColumnNumber } from './branded.ts';
export {
  charOffset,
  lineNumber,
  columnNumber,
  isValidOffset,
  ZERO_CHAR_OFFSET,
} from './branded.ts';
