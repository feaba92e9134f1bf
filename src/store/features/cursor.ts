/**
 * Cursor movement engine.
 * Pure functions from (buffer, cursor, motion) to a new cursor. Movement
 * never fails: targets are clamped to the document before the buffer is
 * asked anything.
 */

import type { BufferState, CursorState } from '../../types/state.ts';
import type { Motion } from '../../types/actions.ts';
import type { CharOffset } from '../../types/branded.ts';
import { charOffset } from '../../types/branded.ts';
import {
  charAt,
  getLineLength,
  getLineRange,
  getLineText,
  offsetToLineCol,
} from '../core/rope.ts';
import { charClass } from '../core/text.ts';

export interface MoveContext {
  /** Navigate mode forbids resting one past the end of a non-empty line */
  readonly navigate: boolean;
  /** Lines moved by page-up/page-down */
  readonly pageSize: number;
}

function cursorAt(offset: number, stickyColumn: number | null = null): CursorState {
  return Object.freeze({ offset: charOffset(offset), stickyColumn });
}

// =============================================================================
// Navigate-mode Resting Rule
// =============================================================================

/**
 * True when `offset` sits after the last character of a non-empty line.
 */
export function isPastLineEnd(buffer: BufferState, offset: CharOffset): boolean {
  const { line, column } = offsetToLineCol(buffer, offset);
  const length = getLineLength(buffer, line);
  return length > 0 && column === length;
}

function canRest(buffer: BufferState, offset: number, navigate: boolean): boolean {
  return !navigate || !isPastLineEnd(buffer, charOffset(offset));
}

/**
 * Pull a cursor back onto the last character when Navigate mode forbids
 * its current spot. The sticky column is kept.
 */
export function normalizeForNavigate(buffer: BufferState, cursor: CursorState): CursorState {
  if (!isPastLineEnd(buffer, cursor.offset)) return cursor;
  return cursorAt(cursor.offset - 1, cursor.stickyColumn);
}

/**
 * Clamp after a mutation that may have shortened the document.
 */
export function clampCursor(buffer: BufferState, cursor: CursorState): CursorState {
  if (cursor.offset <= buffer.length) return cursor;
  return cursorAt(buffer.length, cursor.stickyColumn);
}

// =============================================================================
// Character-wise
// =============================================================================

/**
 * Step one code point, wrapping across line ends in both modes. Navigate
 * mode skips the slot past the end of a non-empty line.
 */
function moveHorizontal(
  buffer: BufferState,
  cursor: CursorState,
  step: 1 | -1,
  navigate: boolean
): CursorState {
  let candidate = cursor.offset + step;
  while (candidate >= 0 && candidate <= buffer.length && !canRest(buffer, candidate, navigate)) {
    candidate += step;
  }
  if (candidate < 0 || candidate > buffer.length) {
    return cursorAt(cursor.offset);
  }
  return cursorAt(candidate);
}

// =============================================================================
// Line-wise
// =============================================================================

function lastColumn(buffer: BufferState, line: number, navigate: boolean): number {
  const length = getLineLength(buffer, line);
  return navigate && length > 0 ? length - 1 : length;
}

function moveToLine(
  buffer: BufferState,
  cursor: CursorState,
  targetLine: number,
  navigate: boolean
): CursorState {
  const { column } = offsetToLineCol(buffer, cursor.offset);
  const desired = cursor.stickyColumn ?? column;
  const line = Math.max(0, Math.min(targetLine, buffer.lineCount - 1));
  const { start } = getLineRange(buffer, line);
  return cursorAt(start + Math.min(desired, lastColumn(buffer, line, navigate)), desired);
}

// =============================================================================
// Word-wise
// =============================================================================

function classAt(buffer: BufferState, offset: number) {
  return charClass(charAt(buffer, charOffset(offset)));
}

/**
 * Start of the next class run, skipping whitespace.
 */
export function nextWordStart(buffer: BufferState, offset: number): number {
  const length = buffer.length;
  let pos = offset;
  if (pos >= length) return length;

  const current = classAt(buffer, pos);
  if (current !== 'space') {
    while (pos < length && classAt(buffer, pos) === current) pos++;
  }
  while (pos < length && classAt(buffer, pos) === 'space') pos++;
  return pos;
}

/**
 * Start of the previous class run, skipping whitespace.
 */
export function previousWordStart(buffer: BufferState, offset: number): number {
  if (offset <= 0) return 0;
  let pos = offset - 1;
  while (pos > 0 && classAt(buffer, pos) === 'space') pos--;

  const current = classAt(buffer, pos);
  if (current === 'space') return pos;
  while (pos > 0 && classAt(buffer, pos - 1) === current) pos--;
  return pos;
}

// =============================================================================
// Paragraph-wise
// =============================================================================

function isBlankLine(buffer: BufferState, line: number): boolean {
  return getLineText(buffer, line).trim() === '';
}

/**
 * First line of the next paragraph, or the last line.
 */
export function nextParagraphLine(buffer: BufferState, line: number): number {
  const last = buffer.lineCount - 1;
  let target = line;
  while (target < last && !isBlankLine(buffer, target)) target++;
  while (target < last && isBlankLine(buffer, target)) target++;
  return target;
}

/**
 * First line of the current paragraph when inside one past its first line,
 * otherwise first line of the previous paragraph.
 */
export function previousParagraphLine(buffer: BufferState, line: number): number {
  let target = line > 0 ? line - 1 : 0;
  while (target > 0 && isBlankLine(buffer, target)) target--;
  while (target > 0 && !isBlankLine(buffer, target - 1)) target--;
  return target;
}

// =============================================================================
// Dispatch
// =============================================================================

/**
 * Apply a motion. Vertical and page moves keep the sticky column; every
 * other motion clears it.
 */
export function moveCursor(
  buffer: BufferState,
  cursor: CursorState,
  motion: Motion,
  context: MoveContext
): CursorState {
  const { navigate } = context;
  const { line } = offsetToLineCol(buffer, cursor.offset);
  let next: CursorState;

  switch (motion) {
    case 'left':
      return moveHorizontal(buffer, cursor, -1, navigate);
    case 'right':
      return moveHorizontal(buffer, cursor, 1, navigate);
    case 'up':
      if (line === 0) return cursor;
      return moveToLine(buffer, cursor, line - 1, navigate);
    case 'down':
      if (line === buffer.lineCount - 1) return cursor;
      return moveToLine(buffer, cursor, line + 1, navigate);
    case 'page-up':
      return moveToLine(buffer, cursor, line - Math.max(1, context.pageSize), navigate);
    case 'page-down':
      return moveToLine(buffer, cursor, line + Math.max(1, context.pageSize), navigate);
    case 'word-forward':
      next = cursorAt(nextWordStart(buffer, cursor.offset));
      break;
    case 'word-backward':
      next = cursorAt(previousWordStart(buffer, cursor.offset));
      break;
    case 'paragraph-forward':
      next = cursorAt(getLineRange(buffer, nextParagraphLine(buffer, line)).start);
      break;
    case 'paragraph-backward':
      next = cursorAt(getLineRange(buffer, previousParagraphLine(buffer, line)).start);
      break;
    case 'line-start':
      next = cursorAt(getLineRange(buffer, line).start);
      break;
    case 'line-end':
      next = cursorAt(getLineRange(buffer, line).end);
      break;
    case 'document-start':
      next = cursorAt(0);
      break;
    case 'document-end':
      next = cursorAt(buffer.length);
      break;
    default: {
      const exhaustive: never = motion;
      return exhaustive;
    }
  }

  return navigate ? normalizeForNavigate(buffer, next) : next;
}
