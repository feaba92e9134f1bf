/**
 * Render view: the read-only snapshot handed to the display layer.
 *
 * Everything is in screen terms where the renderer needs it (tab-expanded
 * text, screen columns for the cursor and highlights) and in document
 * terms where the status line shows it.
 */

import type {
  EditorState,
  HistoryView,
  Mode,
  ModeKind,
  PendingPrefix,
  StatusMessage,
  VersionSummary,
} from '../../types/state.ts';
import type { GoalProgress, SessionStats } from './stats.ts';
import { getLineText, getWordCount, offsetToLineCol } from '../core/rope.ts';
import { codePointLength } from '../core/text.ts';

// =============================================================================
// Types
// =============================================================================

export interface ViewLine {
  /** 0-indexed document line */
  readonly lineNumber: number;
  /** Line text with tabs expanded, without its newline */
  readonly text: string;
}

/**
 * A search match on one visible line, in screen columns.
 */
export interface Highlight {
  readonly line: number;
  readonly startColumn: number;
  readonly endColumn: number;
  readonly current: boolean;
}

export interface StatsSnapshot {
  readonly session: SessionStats;
  readonly todayWords: number;
  readonly dailyGoal: number;
  /** null when streaks are hidden or goals are off */
  readonly streak: number | null;
  /** null when progress is hidden or goals are off */
  readonly progress: GoalProgress | null;
}

export type OverlayView =
  | { readonly kind: 'help' }
  | { readonly kind: 'stats'; readonly stats: StatsSnapshot }
  | {
      readonly kind: 'history';
      readonly entries: readonly VersionSummary[];
      readonly selected: number;
      readonly view: HistoryView;
    }
  | { readonly kind: 'confirm-quit'; readonly prompt: string };

export interface RenderView {
  readonly lines: readonly ViewLine[];
  readonly firstLine: number;
  readonly totalLines: number;
  /** Cursor on screen, relative to the first visible line */
  readonly cursor: { readonly row: number; readonly column: number };
  /** Cursor in the document, 0-indexed */
  readonly position: { readonly line: number; readonly column: number };
  readonly mode: ModeKind;
  readonly modeLabel: string;
  readonly pending: PendingPrefix | null;
  /** null while the status line is hidden */
  readonly status: StatusMessage | null;
  readonly statusVisible: boolean;
  readonly searchQuery: string | null;
  readonly highlights: readonly Highlight[];
  readonly matchCount: number;
  readonly overlay: OverlayView | null;
  readonly dirty: boolean;
  readonly wordCount: number;
  readonly textWidth: number;
  readonly quitRequested: boolean;
}

export const CONFIRM_QUIT_PROMPT = 'Unsaved changes. Save before quitting? (y)es (n)o (c)ancel';

// =============================================================================
// Tabs
// =============================================================================

/**
 * Screen column of code point `column` in `text`.
 */
export function displayColumn(text: string, column: number, tabWidth: number): number {
  let screen = 0;
  let index = 0;
  for (const ch of text) {
    if (index >= column) break;
    screen = ch === '\t' ? screen + tabWidth - (screen % tabWidth) : screen + 1;
    index++;
  }
  return screen;
}

export function expandTabs(text: string, tabWidth: number): string {
  if (!text.includes('\t')) return text;
  let result = '';
  let screen = 0;
  for (const ch of text) {
    if (ch === '\t') {
      const width = tabWidth - (screen % tabWidth);
      result += ' '.repeat(width);
      screen += width;
    } else {
      result += ch;
      screen++;
    }
  }
  return result;
}

// =============================================================================
// Pieces
// =============================================================================

export function modeLabel(mode: Mode): string {
  switch (mode.kind) {
    case 'write':
      return 'WRITE';
    case 'navigate':
      return 'NAVIGATE';
    case 'search':
      return 'SEARCH';
    case 'overlay':
      return mode.overlay.toUpperCase();
    case 'confirm-quit':
      return 'QUIT';
    default: {
      const exhaustiveCheck: never = mode;
      return exhaustiveCheck;
    }
  }
}

function overlayView(mode: Mode, stats: StatsSnapshot): OverlayView | null {
  switch (mode.kind) {
    case 'overlay':
      if (mode.overlay === 'history') {
        return { kind: 'history', entries: mode.entries, selected: mode.selected, view: mode.view };
      }
      if (mode.overlay === 'help') return { kind: 'help' };
      return { kind: 'stats', stats };
    case 'confirm-quit':
      return { kind: 'confirm-quit', prompt: CONFIRM_QUIT_PROMPT };
    default:
      return null;
  }
}

function searchQuery(state: EditorState): string | null {
  if (state.mode.kind === 'search') return state.mode.query;
  return state.search?.query ?? null;
}

function visibleHighlights(
  state: EditorState,
  firstLine: number,
  lastLine: number
): Highlight[] {
  const search = state.search;
  if (search === null) return [];

  const { tabWidth } = state.config;
  const highlights: Highlight[] = [];
  search.matches.forEach((match, index) => {
    const start = offsetToLineCol(state.buffer, match.start);
    if (start.line < firstLine || start.line > lastLine) return;
    const end = offsetToLineCol(state.buffer, match.end);
    const text = getLineText(state.buffer, start.line);
    const endColumn = end.line === start.line ? end.column : codePointLength(text);
    highlights.push({
      line: start.line,
      startColumn: displayColumn(text, start.column, tabWidth),
      endColumn: displayColumn(text, endColumn, tabWidth),
      current: index === search.current,
    });
  });
  return highlights;
}

// =============================================================================
// Builder
// =============================================================================

/**
 * Build the render view for `state`. Stats live outside the editor state
 * and are passed in by the session.
 */
export function buildRenderView(state: EditorState, stats: StatsSnapshot): RenderView {
  const { buffer, viewport, config, mode } = state;
  const firstLine = Math.min(viewport.scrollTop, buffer.lineCount - 1);
  const lastLine = Math.min(buffer.lineCount - 1, firstLine + viewport.rows - 1);

  const lines: ViewLine[] = [];
  for (let line = firstLine; line <= lastLine; line++) {
    lines.push({ lineNumber: line, text: expandTabs(getLineText(buffer, line), config.tabWidth) });
  }

  const position = offsetToLineCol(buffer, state.cursor.offset);
  const cursorLine = getLineText(buffer, position.line);
  const highlights = visibleHighlights(state, firstLine, lastLine);

  return Object.freeze({
    lines: Object.freeze(lines),
    firstLine,
    totalLines: buffer.lineCount,
    cursor: {
      row: position.line - firstLine,
      column: displayColumn(cursorLine, position.column, config.tabWidth),
    },
    position: { line: position.line, column: position.column },
    mode: mode.kind,
    modeLabel: modeLabel(mode),
    pending: mode.kind === 'navigate' ? mode.pending : null,
    status: state.statusVisible ? state.status : null,
    statusVisible: state.statusVisible,
    searchQuery: searchQuery(state),
    highlights: Object.freeze(highlights),
    matchCount: state.search?.matches.length ?? 0,
    overlay: overlayView(mode, stats),
    dirty: state.dirty,
    wordCount: getWordCount(buffer),
    textWidth: config.textWidth,
    quitRequested: state.quitRequested,
  });
}
