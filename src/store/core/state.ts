/**
 * State factories for the editing engine.
 * All factories return frozen objects.
 */

import type {
  CursorState,
  EditorConfig,
  EditorState,
  HistoryState,
  ViewportState,
} from '../../types/state.ts';
import { ZERO_CHAR_OFFSET } from '../../types/branded.ts';
import { DEFAULT_CONFIG } from '../../config/config.ts';
import { createBufferState } from './rope.ts';

export interface EditorStateOptions {
  readonly content?: string;
  readonly config?: EditorConfig;
  readonly viewport?: Partial<Pick<ViewportState, 'rows' | 'columns'>>;
}

export function createInitialCursorState(): CursorState {
  return Object.freeze({ offset: ZERO_CHAR_OFFSET, stickyColumn: null });
}

export function createInitialHistoryState(
  limit: number = DEFAULT_CONFIG.historyLimit,
  groupWindowMs: number = DEFAULT_CONFIG.undoGroupWindowMs
): HistoryState {
  return Object.freeze({
    undoStack: Object.freeze([]),
    redoStack: Object.freeze([]),
    openGroup: null,
    limit,
    groupWindowMs,
  });
}

/**
 * Fresh session state: cursor at the start, Write mode, clean document.
 */
export function createInitialState(options: EditorStateOptions = {}): EditorState {
  const config = options.config ?? DEFAULT_CONFIG;
  return Object.freeze({
    buffer: createBufferState(options.content ?? ''),
    cursor: createInitialCursorState(),
    history: createInitialHistoryState(config.historyLimit, config.undoGroupWindowMs),
    search: null,
    mode: Object.freeze({ kind: 'write' }),
    register: null,
    viewport: Object.freeze({
      rows: options.viewport?.rows ?? 24,
      columns: options.viewport?.columns ?? config.textWidth,
      scrollTop: 0,
    }),
    status: null,
    statusVisible: true,
    dirty: false,
    quitRequested: false,
    config,
  });
}

/**
 * Copy state with changes. Centralizes EditorState construction so every
 * update is frozen.
 */
export function withState(state: EditorState, changes: Partial<EditorState>): EditorState {
  return Object.freeze({ ...state, ...changes });
}

export function withHistoryState(
  history: HistoryState,
  changes: Partial<HistoryState>
): HistoryState {
  return Object.freeze({ ...history, ...changes });
}
