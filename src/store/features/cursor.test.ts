/**
 * Tests for cursor motions.
 */

import { describe, it, expect } from 'vitest';
import type { CursorState } from '../../types/state.ts';
import type { Motion } from '../../types/actions.ts';
import { charOffset } from '../../types/branded.ts';
import { createBufferState } from '../core/rope.ts';
import {
  clampCursor,
  isPastLineEnd,
  moveCursor,
  nextParagraphLine,
  nextWordStart,
  normalizeForNavigate,
  previousParagraphLine,
  previousWordStart,
} from './cursor.ts';

function at(offset: number, stickyColumn: number | null = null): CursorState {
  return { offset: charOffset(offset), stickyColumn };
}

const WRITE = { navigate: false, pageSize: 10 };
const NAVIGATE = { navigate: true, pageSize: 10 };

// =============================================================================
// Character Motion Tests
// =============================================================================

describe('horizontal motion', () => {
  const buffer = createBufferState('ab\ncd');

  it('should cross line boundaries in write mode', () => {
    expect(moveCursor(buffer, at(3), 'left', WRITE).offset).toBe(2);
    expect(moveCursor(buffer, at(2), 'right', WRITE).offset).toBe(3);
  });

  it('should skip the slot past a line end in navigate mode', () => {
    expect(moveCursor(buffer, at(3), 'left', NAVIGATE).offset).toBe(1);
    expect(moveCursor(buffer, at(1), 'right', NAVIGATE).offset).toBe(3);
  });

  it('should wrap onto an empty line in navigate mode', () => {
    const gapped = createBufferState('ab\n\ncd');
    expect(moveCursor(gapped, at(1), 'right', NAVIGATE).offset).toBe(3);
    expect(moveCursor(gapped, at(3), 'right', NAVIGATE).offset).toBe(4);
    expect(moveCursor(gapped, at(4), 'left', NAVIGATE).offset).toBe(3);
  });

  it('should stay put at the document edges', () => {
    expect(moveCursor(buffer, at(0), 'left', WRITE).offset).toBe(0);
    expect(moveCursor(buffer, at(5), 'right', WRITE).offset).toBe(5);
    expect(moveCursor(buffer, at(4), 'right', NAVIGATE).offset).toBe(4);
  });

  it('should clear the sticky column', () => {
    expect(moveCursor(buffer, at(1, 7), 'right', WRITE).stickyColumn).toBeNull();
  });
});

// =============================================================================
// Line Motion Tests
// =============================================================================

describe('vertical motion', () => {
  const buffer = createBufferState('abcdef\nab\nabcdef');

  it('should clamp to a short line and remember the column', () => {
    const down = moveCursor(buffer, at(5), 'down', WRITE);
    expect(down).toEqual({ offset: 9, stickyColumn: 5 });

    const again = moveCursor(buffer, down, 'down', WRITE);
    expect(again).toEqual({ offset: 15, stickyColumn: 5 });
  });

  it('should stop on the last character in navigate mode', () => {
    expect(moveCursor(buffer, at(5), 'down', NAVIGATE).offset).toBe(8);
  });

  it('should return the same cursor at the first and last line', () => {
    const top = at(2);
    expect(moveCursor(buffer, top, 'up', WRITE)).toBe(top);
    const bottom = at(12);
    expect(moveCursor(buffer, bottom, 'down', WRITE)).toBe(bottom);
  });

  it('should move by pages and clamp to the document', () => {
    const lines = createBufferState('a\nb\nc\nd\ne');
    expect(moveCursor(lines, at(0), 'page-down', { navigate: false, pageSize: 2 }).offset).toBe(4);
    expect(moveCursor(lines, at(4), 'page-down', WRITE).offset).toBe(8);
    expect(moveCursor(lines, at(6), 'page-up', WRITE).offset).toBe(0);
  });
});

describe('line and document motion', () => {
  const buffer = createBufferState('ab\ncd');
  const cases: Array<[Motion, number, number, boolean]> = [
    ['line-start', 4, 3, false],
    ['line-end', 0, 2, false],
    ['line-end', 0, 1, true],
    ['document-start', 4, 0, false],
    ['document-end', 0, 5, false],
    ['document-end', 0, 4, true],
  ];

  it.each(cases)('should apply %s from %i to %i (navigate: %s)', (motion, from, to, navigate) => {
    expect(moveCursor(buffer, at(from), motion, { navigate, pageSize: 10 }).offset).toBe(to);
  });
});

// =============================================================================
// Word Motion Tests
// =============================================================================

describe('word motion', () => {
  const buffer = createBufferState('foo.bar  baz');

  it('should stop at each class change going forward', () => {
    expect(nextWordStart(buffer, 0)).toBe(3);
    expect(nextWordStart(buffer, 3)).toBe(4);
    expect(nextWordStart(buffer, 4)).toBe(9);
    expect(nextWordStart(buffer, 9)).toBe(12);
  });

  it('should stop at each class change going backward', () => {
    expect(previousWordStart(buffer, 12)).toBe(9);
    expect(previousWordStart(buffer, 9)).toBe(4);
    expect(previousWordStart(buffer, 4)).toBe(3);
    expect(previousWordStart(buffer, 3)).toBe(0);
    expect(previousWordStart(buffer, 0)).toBe(0);
  });

  it('should settle on the last character in navigate mode', () => {
    expect(moveCursor(buffer, at(9), 'word-forward', NAVIGATE).offset).toBe(11);
    expect(moveCursor(buffer, at(9), 'word-forward', WRITE).offset).toBe(12);
  });

  it('should cross newlines as whitespace', () => {
    const lines = createBufferState('one\n  two');
    expect(nextWordStart(lines, 0)).toBe(6);
    expect(previousWordStart(lines, 6)).toBe(0);
  });
});

// =============================================================================
// Paragraph Motion Tests
// =============================================================================

describe('paragraph motion', () => {
  const buffer = createBufferState('a\nb\n\n\nc\nd\n\ne');

  it('should find the next paragraph start', () => {
    expect(nextParagraphLine(buffer, 0)).toBe(4);
    expect(nextParagraphLine(buffer, 4)).toBe(7);
    expect(nextParagraphLine(buffer, 7)).toBe(7);
    expect(moveCursor(buffer, at(0), 'paragraph-forward', WRITE).offset).toBe(6);
    expect(moveCursor(buffer, at(6), 'paragraph-forward', WRITE).offset).toBe(11);
  });

  it('should find the current or previous paragraph start', () => {
    expect(previousParagraphLine(buffer, 5)).toBe(4);
    expect(previousParagraphLine(buffer, 4)).toBe(0);
    expect(moveCursor(buffer, at(8), 'paragraph-backward', WRITE).offset).toBe(6);
    expect(moveCursor(buffer, at(6), 'paragraph-backward', WRITE).offset).toBe(0);
  });
});

// =============================================================================
// Normalization Tests
// =============================================================================

describe('navigate normalization', () => {
  const buffer = createBufferState('ab\n\ncd');

  it('should detect the slot past a non-empty line', () => {
    expect(isPastLineEnd(buffer, charOffset(2))).toBe(true);
    expect(isPastLineEnd(buffer, charOffset(1))).toBe(false);
    expect(isPastLineEnd(buffer, charOffset(3))).toBe(false);
  });

  it('should pull the cursor back and keep the sticky column', () => {
    expect(normalizeForNavigate(buffer, at(2, 4))).toEqual({ offset: 1, stickyColumn: 4 });
    const empty = at(3);
    expect(normalizeForNavigate(buffer, empty)).toBe(empty);
  });

  it('should clamp a cursor beyond a shortened document', () => {
    expect(clampCursor(buffer, at(40)).offset).toBe(6);
  });
});
