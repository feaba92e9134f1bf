/**
 * Tests for the editor reducer.
 */

import { describe, it, expect } from 'vitest';
import type { EditorState, VersionSummary } from '../../types/state.ts';
import type { EditorAction } from '../../types/actions.ts';
import { isTextEditAction } from '../../types/actions.ts';
import { withConfig } from '../../config/config.ts';
import { createInitialState } from '../core/state.ts';
import { getValue } from '../core/rope.ts';
import { EditorActions } from './actions.ts';
import { editorReducer } from './reducer.ts';

function run(state: EditorState, ...actions: EditorAction[]): EditorState {
  return actions.reduce(editorReducer, state);
}

function typeAt(text: string, start: number, stepMs: number): EditorAction[] {
  return Array.from(text).map((ch, i) => EditorActions.insertText(ch, start + i * stepMs));
}

function lines(state: EditorState): string[] {
  return getValue(state.buffer).split('\n');
}

// =============================================================================
// Editing Tests
// =============================================================================

describe('text editing', () => {
  it('should insert at the cursor and mark the document dirty', () => {
    const state = run(createInitialState(), ...typeAt('hello', 0, 50));
    expect(getValue(state.buffer)).toBe('hello');
    expect(state.cursor.offset).toBe(5);
    expect(state.dirty).toBe(true);
  });

  it('should delete around the cursor', () => {
    let state = run(createInitialState({ content: 'abc' }), EditorActions.move('right'));
    state = run(state, EditorActions.deleteBackward(0));
    expect(getValue(state.buffer)).toBe('bc');
    expect(state.cursor.offset).toBe(0);

    state = run(state, EditorActions.deleteForward(10));
    expect(getValue(state.buffer)).toBe('c');
  });

  it('should return the same state for edits with no effect', () => {
    const state = createInitialState({ content: 'abc' });
    expect(editorReducer(state, EditorActions.deleteBackward(0))).toBe(state);
    expect(editorReducer(state, EditorActions.insertText('', 0))).toBe(state);
    const atEnd = run(state, EditorActions.move('document-end'));
    expect(editorReducer(atEnd, EditorActions.deleteForward(0))).toBe(atEnd);
  });
});

// =============================================================================
// Undo Tests
// =============================================================================

describe('undo and redo', () => {
  it('should undo typing within the window as one step', () => {
    let state = run(createInitialState(), ...typeAt('abc', 0, 100));
    state = run(state, EditorActions.insertText('d', 2500));
    expect(getValue(state.buffer)).toBe('abcd');

    state = run(state, EditorActions.undo(2600));
    expect(getValue(state.buffer)).toBe('abc');
    expect(state.cursor.offset).toBe(3);

    state = run(state, EditorActions.undo(2700));
    expect(getValue(state.buffer)).toBe('');

    state = run(state, EditorActions.redo(2800), EditorActions.redo(2900));
    expect(getValue(state.buffer)).toBe('abcd');
    expect(state.cursor.offset).toBe(4);
  });

  it('should split groups at mode changes', () => {
    let state = run(createInitialState(), EditorActions.insertText('a', 0));
    state = run(state, EditorActions.enterNavigate(), EditorActions.enterWrite());
    state = run(state, EditorActions.move('document-end'), EditorActions.insertText('b', 100));
    expect(getValue(state.buffer)).toBe('ab');

    state = run(state, EditorActions.undo(200));
    expect(getValue(state.buffer)).toBe('a');
  });

  it('should report an empty history in the status line', () => {
    const state = run(createInitialState(), EditorActions.undo(1000));
    expect(state.status).toEqual({ text: 'Nothing to undo', kind: 'info', expiresAt: 4000 });
  });

  it('should keep the open group on a save unless asked to close it', () => {
    const typed = run(createInitialState(), EditorActions.insertText('a', 0));
    expect(run(typed, EditorActions.markSaved(false)).history.openGroup).not.toBeNull();
    const closed = run(typed, EditorActions.markSaved(true));
    expect(closed.history.openGroup).toBeNull();
    expect(closed.dirty).toBe(false);
  });
});

// =============================================================================
// Line Command Tests
// =============================================================================

describe('line commands', () => {
  function navigateAtLine(content: string, line: number): EditorState {
    let state = run(createInitialState({ content }), EditorActions.enterNavigate());
    for (let i = 0; i < line; i++) state = run(state, EditorActions.move('down'));
    return state;
  }

  it('should delete the cursor line and land on the next one', () => {
    const state = run(navigateAtLine('a\nb\nc', 1), EditorActions.deleteLine(0));
    expect(lines(state)).toEqual(['a', 'c']);
    expect(state.cursor.offset).toBe(2);
    expect(state.register).toBe('b');
  });

  it('should undo a line delete as one step', () => {
    const state = run(navigateAtLine('a\nb\nc', 1), EditorActions.deleteLine(0), EditorActions.undo(10));
    expect(getValue(state.buffer)).toBe('a\nb\nc');
    expect(state.cursor.offset).toBe(2);
  });

  it('should empty the last line before removing it', () => {
    let state = run(navigateAtLine('a\nb', 1), EditorActions.deleteLine(0));
    expect(getValue(state.buffer)).toBe('a\n');
    expect(state.cursor.offset).toBe(2);

    state = run(state, EditorActions.deleteLine(10));
    expect(getValue(state.buffer)).toBe('a');
    expect(state.cursor.offset).toBe(0);
  });

  it('should leave an empty document alone', () => {
    const state = navigateAtLine('', 0);
    expect(editorReducer(state, EditorActions.deleteLine(0))).toBe(state);
  });

  it('should paste a yanked line below the cursor', () => {
    const state = run(navigateAtLine('a\nb', 0), EditorActions.yankLine(), EditorActions.pasteLine(0));
    expect(lines(state)).toEqual(['a', 'a', 'b']);
    expect(state.cursor.offset).toBe(2);
  });

  it('should paste below the last line', () => {
    const state = run(navigateAtLine('a\nb', 1), EditorActions.yankLine(), EditorActions.pasteLine(0));
    expect(lines(state)).toEqual(['a', 'b', 'b']);
    expect(state.cursor.offset).toBe(4);
  });

  it('should ignore paste with an empty register', () => {
    const state = navigateAtLine('a', 0);
    expect(editorReducer(state, EditorActions.pasteLine(0))).toBe(state);
  });
});

// =============================================================================
// Search Tests
// =============================================================================

describe('search', () => {
  function searchFor(content: string, query: string): EditorState {
    return run(
      createInitialState({ content }),
      EditorActions.enterNavigate(),
      EditorActions.enterSearch(),
      EditorActions.searchInput(query)
    );
  }

  it('should update matches while typing and jump on commit', () => {
    let state = searchFor('The cat, the mat', 'the');
    expect(state.mode).toEqual({ kind: 'search', query: 'the' });
    expect(state.search?.matches).toHaveLength(2);

    state = run(state, EditorActions.searchCommit(0));
    expect(state.mode).toEqual({ kind: 'navigate', pending: null });
    expect(state.cursor.offset).toBe(0);
    expect(state.search?.current).toBe(0);
  });

  it('should step through matches and wrap', () => {
    let state = run(searchFor('The cat, the mat', 'the'), EditorActions.searchCommit(0));
    state = run(state, EditorActions.searchStep('next', 0));
    expect(state.cursor.offset).toBe(9);
    state = run(state, EditorActions.searchStep('next', 0));
    expect(state.cursor.offset).toBe(0);
  });

  it('should report a query without matches', () => {
    const state = run(searchFor('The cat', 'dog'), EditorActions.searchCommit(500));
    expect(state.mode.kind).toBe('navigate');
    expect(state.status?.text).toBe('No matches for "dog"');
    expect(state.search?.matches).toHaveLength(0);
  });

  it('should clear the search on cancel', () => {
    const state = run(searchFor('The cat', 'cat'), EditorActions.searchCancel());
    expect(state.search).toBeNull();
    expect(state.mode.kind).toBe('navigate');
  });

  it('should recompute matches after an edit', () => {
    let state = run(searchFor('a\nb\nc', 'c'), EditorActions.searchCommit(0));
    expect(state.cursor.offset).toBe(4);
    state = run(state, EditorActions.move('up'), EditorActions.deleteLine(0));
    expect(state.search?.matches).toEqual([{ start: 2, end: 3 }]);
    expect(state.search?.current).toBe(-1);
  });
});

// =============================================================================
// Mode Tests
// =============================================================================

describe('modes', () => {
  it('should start in write mode', () => {
    expect(createInitialState().mode).toEqual({ kind: 'write' });
  });

  it('should only set a pending prefix in navigate mode', () => {
    const state = createInitialState();
    expect(editorReducer(state, EditorActions.setPending('d'))).toBe(state);
    const navigate = run(state, EditorActions.enterNavigate(), EditorActions.setPending('d'));
    expect(navigate.mode).toEqual({ kind: 'navigate', pending: 'd' });
  });

  it('should pull the cursor off the line end when entering navigate', () => {
    const state = run(createInitialState({ content: 'abc' }), EditorActions.move('document-end'));
    expect(state.cursor.offset).toBe(3);
    expect(run(state, EditorActions.enterNavigate()).cursor.offset).toBe(2);
  });

  it('should quit immediately when clean and confirm when dirty', () => {
    const clean = run(createInitialState(), EditorActions.requestQuit());
    expect(clean.quitRequested).toBe(true);

    const dirty = run(createInitialState(), EditorActions.insertText('x', 0), EditorActions.requestQuit());
    expect(dirty.quitRequested).toBe(false);
    expect(dirty.mode).toEqual({ kind: 'confirm-quit', previous: { kind: 'write' } });

    expect(run(dirty, EditorActions.cancelQuit()).mode).toEqual({ kind: 'write' });
    expect(run(dirty, EditorActions.forceQuit()).quitRequested).toBe(true);
  });
});

describe('history overlay', () => {
  const entries: VersionSummary[] = [3, 2, 1].map((id) => ({
    id,
    timestamp: id * 1000,
    wordCount: id,
    preview: `version ${id}`,
  }));

  it('should clamp the selection to the entries', () => {
    let state = run(createInitialState(), EditorActions.openHistory(entries));
    state = run(state, EditorActions.historySelect(1));
    expect(state.mode.kind === 'overlay' && state.mode.overlay === 'history' && state.mode.selected).toBe(1);
    state = run(state, EditorActions.historySelect(5));
    expect(state.mode.kind === 'overlay' && state.mode.overlay === 'history' && state.mode.selected).toBe(2);
    expect(editorReducer(state, EditorActions.historySelect(1))).toBe(state);
  });

  it('should step back to the list before closing', () => {
    let state = run(
      createInitialState(),
      EditorActions.openHistory(entries),
      EditorActions.historyShow({ kind: 'content', text: 'old text' }),
      EditorActions.closeOverlay()
    );
    expect(state.mode.kind === 'overlay' && state.mode.overlay === 'history' && state.mode.view).toEqual({
      kind: 'list',
    });

    state = run(state, EditorActions.closeOverlay());
    expect(state.mode).toEqual({ kind: 'navigate', pending: null });
  });
});

// =============================================================================
// Status and Viewport Tests
// =============================================================================

describe('status line', () => {
  it('should expire a status at its deadline', () => {
    const state = run(createInitialState(), EditorActions.setStatus('hi', 'info', 1000));
    expect(state.status?.expiresAt).toBe(4000);
    expect(editorReducer(state, EditorActions.expireStatus(3999))).toBe(state);
    expect(run(state, EditorActions.expireStatus(4000)).status).toBeNull();
  });

  it('should honor an explicit duration', () => {
    const state = run(createInitialState(), EditorActions.setStatus('Saved', 'success', 1000, 2000));
    expect(state.status?.expiresAt).toBe(3000);
  });

  it('should keep a status forever when the timeout is zero', () => {
    const state = run(
      createInitialState({ config: withConfig({ statusTimeoutSeconds: 0 }) }),
      EditorActions.setStatus('sticky', 'info', 1000),
      EditorActions.expireStatus(1_000_000)
    );
    expect(state.status?.text).toBe('sticky');
  });

  it('should toggle visibility', () => {
    const state = run(createInitialState(), EditorActions.toggleStatusLine());
    expect(state.statusVisible).toBe(false);
  });
});

describe('viewport', () => {
  it('should scroll to keep the cursor visible', () => {
    const content = Array.from({ length: 10 }, (_, i) => `line ${i}`).join('\n');
    let state = createInitialState({ content, viewport: { rows: 3 } });
    state = run(state, EditorActions.move('document-end'));
    expect(state.viewport.scrollTop).toBe(7);
    state = run(state, EditorActions.move('document-start'));
    expect(state.viewport.scrollTop).toBe(0);
  });

  it('should keep at least one row and column', () => {
    const state = run(createInitialState(), EditorActions.setViewport(0, -5));
    expect(state.viewport).toEqual({ rows: 1, columns: 1, scrollTop: 0 });
  });
});

describe('isTextEditAction', () => {
  it('should recognize actions that change the buffer', () => {
    expect(isTextEditAction(EditorActions.insertText('a', 0))).toBe(true);
    expect(isTextEditAction(EditorActions.deleteLine(0))).toBe(true);
    expect(isTextEditAction(EditorActions.pasteLine(0))).toBe(true);
    expect(isTextEditAction(EditorActions.yankLine())).toBe(false);
    expect(isTextEditAction(EditorActions.move('left'))).toBe(false);
  });
});
