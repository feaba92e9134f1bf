/**
 * Core state types for the editing engine.
 * All state structures are immutable; updates produce new frozen objects
 * that share unchanged subtrees with the previous state.
 */

import type { CharOffset } from './branded.ts';

// =============================================================================
// Red-Black Tree Types
// =============================================================================

export type NodeColor = 'red' | 'black';

/**
 * Generic base interface for Red-Black tree nodes.
 * Uses F-bounded polymorphism for type-safe self-referential children.
 */
export interface RBNode<T extends RBNode<T>> {
  readonly color: NodeColor;
  readonly left: T | null;
  readonly right: T | null;
}

/**
 * One chunk of document text in the rope.
 * Lengths are in code points; `newlines` counts `\n` in this chunk only.
 */
export interface RopeNode extends RBNode<RopeNode> {
  readonly text: string;
  readonly length: number;
  readonly newlines: number;
  /** Code points in this node and both subtrees */
  readonly subtreeLength: number;
  /** Newlines in this node and both subtrees */
  readonly subtreeNewlines: number;
}

/**
 * Document content. `length` and `lineCount` mirror the root aggregates
 * so they can be read without touching the tree.
 */
export interface BufferState {
  readonly root: RopeNode | null;
  readonly length: number;
  readonly lineCount: number;
}

// =============================================================================
// Cursor
// =============================================================================

/**
 * Cursor position plus the column vertical moves try to return to.
 * `stickyColumn` is null until a vertical move establishes one.
 */
export interface CursorState {
  readonly offset: CharOffset;
  readonly stickyColumn: number | null;
}

// =============================================================================
// Undo History
// =============================================================================

/**
 * One buffer mutation, recorded as plain data.
 * Applying it replaces `removed` at `offset` with `inserted`.
 */
export interface Delta {
  readonly offset: CharOffset;
  readonly removed: string;
  readonly inserted: string;
}

export type EditClass = 'insert' | 'delete';

/**
 * The unit undo and redo act on.
 */
export interface UndoGroup {
  readonly editClass: EditClass;
  readonly deltas: readonly Delta[];
  readonly createdAt: number;
  /** Timestamp of the most recent edit merged into this group */
  readonly lastEditAt: number;
  readonly cursorBefore: CharOffset;
  readonly cursorAfter: CharOffset;
}

export interface HistoryState {
  readonly undoStack: readonly UndoGroup[];
  readonly redoStack: readonly UndoGroup[];
  /** Group still accepting edits, not yet on the undo stack */
  readonly openGroup: UndoGroup | null;
  readonly limit: number;
  readonly groupWindowMs: number;
}

// =============================================================================
// Search
// =============================================================================

export interface SearchMatch {
  readonly start: CharOffset;
  readonly end: CharOffset;
}

export interface SearchState {
  readonly query: string;
  readonly matches: readonly SearchMatch[];
  /** Index into `matches`, -1 when nothing is selected */
  readonly current: number;
}

// =============================================================================
// Modes
// =============================================================================

export type PendingPrefix = 'g' | 'd' | 'y';

export interface WriteMode {
  readonly kind: 'write';
}

export interface NavigateMode {
  readonly kind: 'navigate';
  readonly pending: PendingPrefix | null;
}

export interface SearchMode {
  readonly kind: 'search';
  readonly query: string;
}

export interface InfoOverlayMode {
  readonly kind: 'overlay';
  readonly overlay: 'help' | 'stats';
}

/**
 * A stored version as shown in the history list.
 */
export interface VersionSummary {
  readonly id: number;
  readonly timestamp: number;
  readonly wordCount: number;
  readonly preview: string;
}

export type LineOpType = 'equal' | 'insert' | 'delete';

export interface LineOp {
  readonly type: LineOpType;
  readonly lines: readonly string[];
}

export type HistoryView =
  | { readonly kind: 'list' }
  | { readonly kind: 'content'; readonly text: string }
  | { readonly kind: 'diff'; readonly ops: readonly LineOp[] };

export interface HistoryOverlayMode {
  readonly kind: 'overlay';
  readonly overlay: 'history';
  /** Newest first */
  readonly entries: readonly VersionSummary[];
  readonly selected: number;
  readonly view: HistoryView;
}

export type OverlayMode = InfoOverlayMode | HistoryOverlayMode;

export type BaseMode = WriteMode | NavigateMode | SearchMode | OverlayMode;

/**
 * Quit was requested with unsaved changes. Only the confirmation keys
 * are accepted until it resolves; cancelling returns to `previous`.
 */
export interface ConfirmQuitMode {
  readonly kind: 'confirm-quit';
  readonly previous: BaseMode;
}

export type Mode = BaseMode | ConfirmQuitMode;

export type ModeKind = Mode['kind'];

// =============================================================================
// Status & Viewport
// =============================================================================

export type StatusKind = 'info' | 'success' | 'error';

export interface StatusMessage {
  readonly text: string;
  readonly kind: StatusKind;
  /** Epoch milliseconds after which the message is dropped, null to keep it */
  readonly expiresAt: number | null;
}

export interface ViewportState {
  readonly rows: number;
  readonly columns: number;
  /** First document line shown */
  readonly scrollTop: number;
}

// =============================================================================
// Configuration
// =============================================================================

/**
 * Resolved configuration. Produced by `resolveConfig`; the engine never
 * reads configuration sources itself.
 */
export interface EditorConfig {
  readonly textWidth: number;
  readonly tabWidth: number;
  /** 0 disables autosave */
  readonly autosaveIntervalSeconds: number;
  /** 0 disables goals */
  readonly dailyGoal: number;
  readonly showStreak: boolean;
  readonly showProgress: boolean;
  readonly versionsEnabled: boolean;
  readonly maxVersions: number;
  readonly versionOnAutosave: boolean;
  readonly statusTimeoutSeconds: number;
  readonly undoGroupWindowMs: number;
  readonly historyLimit: number;
}

// =============================================================================
// Editor State
// =============================================================================

export interface EditorState {
  readonly buffer: BufferState;
  readonly cursor: CursorState;
  readonly history: HistoryState;
  readonly search: SearchState | null;
  readonly mode: Mode;
  /** Last yanked or deleted line, without its newline */
  readonly register: string | null;
  readonly viewport: ViewportState;
  readonly status: StatusMessage | null;
  readonly statusVisible: boolean;
  readonly dirty: boolean;
  readonly quitRequested: boolean;
  readonly config: EditorConfig;
}
