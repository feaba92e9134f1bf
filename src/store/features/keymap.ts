/**
 * Key map: translates a logical key event into commands for the active mode.
 *
 * Pure. Commands are either reducer actions or effects the session carries
 * out (saving, reading versions). Universal bindings are checked before the
 * mode's own bindings in every mode except the quit confirmation.
 */

import type { EditorAction, Motion } from '../../types/actions.ts';
import type { EditorState, HistoryOverlayMode, NavigateMode, PendingPrefix } from '../../types/state.ts';
import type { KeyEvent } from '../../types/keys.ts';
import { isTypedChar } from '../../types/keys.ts';
import { EditorActions } from './actions.ts';

export type SessionEffect =
  | 'save'
  | 'save-and-quit'
  | 'open-history'
  | 'view-version'
  | 'diff-version'
  | 'restore-version';

export type KeyCommand =
  | { readonly type: 'action'; readonly action: EditorAction }
  | { readonly type: 'effect'; readonly effect: SessionEffect };

const NONE: readonly KeyCommand[] = Object.freeze([]);

function act(...actions: EditorAction[]): readonly KeyCommand[] {
  return actions.map((action): KeyCommand => ({ type: 'action', action }));
}

function effect(name: SessionEffect): readonly KeyCommand[] {
  return [{ type: 'effect', effect: name }];
}

function move(motion: Motion): readonly KeyCommand[] {
  return act(EditorActions.move(motion));
}

function isCtrl(event: KeyEvent, name: string): boolean {
  return event.ctrl === true && event.key.toLowerCase() === name;
}

// =============================================================================
// Universal
// =============================================================================

function universal(event: KeyEvent, now: number): readonly KeyCommand[] | null {
  if (!event.ctrl) return null;
  switch (event.key.toLowerCase()) {
    case 's':
      return effect('save');
    case 'q':
      return act(EditorActions.requestQuit());
    case 'g':
      return act(EditorActions.toggleStatusLine());
    case 'z':
      return act(EditorActions.undo(now));
    case 'y':
      return act(EditorActions.redo(now));
    default:
      return null;
  }
}

// =============================================================================
// Shared Movement Keys
// =============================================================================

/**
 * Arrow, Home/End and Page keys, identical in Write and Navigate.
 */
function movementKey(event: KeyEvent): readonly KeyCommand[] | null {
  switch (event.key) {
    case 'ArrowLeft':
      return move(event.ctrl ? 'word-backward' : 'left');
    case 'ArrowRight':
      return move(event.ctrl ? 'word-forward' : 'right');
    case 'ArrowUp':
      return move('up');
    case 'ArrowDown':
      return move('down');
    case 'Home':
      return move(event.ctrl ? 'document-start' : 'line-start');
    case 'End':
      return move(event.ctrl ? 'document-end' : 'line-end');
    case 'PageUp':
      return move('page-up');
    case 'PageDown':
      return move('page-down');
    default:
      return null;
  }
}

// =============================================================================
// Write
// =============================================================================

function writeKey(event: KeyEvent, now: number): readonly KeyCommand[] {
  switch (event.key) {
    case 'Escape':
      return act(EditorActions.enterNavigate());
    case 'Enter':
      return act(EditorActions.insertText('\n', now));
    case 'Tab':
      return act(EditorActions.insertText('\t', now));
    case 'Backspace':
      return act(EditorActions.deleteBackward(now));
    case 'Delete':
      return act(EditorActions.deleteForward(now));
  }
  const movement = movementKey(event);
  if (movement !== null) return movement;
  if (isTypedChar(event)) {
    return act(EditorActions.insertText(event.key, now));
  }
  return NONE;
}

// =============================================================================
// Navigate
// =============================================================================

function completeSequence(
  prefix: PendingPrefix,
  event: KeyEvent,
  now: number
): readonly KeyCommand[] | null {
  if (!isTypedChar(event) || event.key !== prefix) return null;
  switch (prefix) {
    case 'g':
      return move('document-start');
    case 'd':
      return act(EditorActions.deleteLine(now));
    case 'y':
      return act(EditorActions.yankLine());
  }
}

function navigateSingle(event: KeyEvent, now: number): readonly KeyCommand[] {
  if (isCtrl(event, 'r')) {
    return act(EditorActions.redo(now));
  }
  if (event.key === 'Escape') {
    return act(EditorActions.clearSearch());
  }
  const movement = movementKey(event);
  if (movement !== null) return movement;
  if (!isTypedChar(event)) return NONE;

  switch (event.key) {
    case 'i':
      return act(EditorActions.enterWrite());
    case 'h':
      return move('left');
    case 'l':
      return move('right');
    case 'j':
      return move('down');
    case 'k':
      return move('up');
    case 'w':
      return move('word-forward');
    case 'b':
      return move('word-backward');
    case '{':
      return move('paragraph-backward');
    case '}':
      return move('paragraph-forward');
    case '0':
      return move('line-start');
    case '$':
      return move('line-end');
    case 'G':
      return move('document-end');
    case 'g':
      return act(EditorActions.setPending('g'));
    case 'd':
      return act(EditorActions.setPending('d'));
    case 'y':
      return act(EditorActions.setPending('y'));
    case 'p':
      return act(EditorActions.pasteLine(now));
    case 'u':
      return act(EditorActions.undo(now));
    case '/':
      return act(EditorActions.enterSearch());
    case 'n':
      return act(EditorActions.searchStep('next', now));
    case 'N':
      return act(EditorActions.searchStep('previous', now));
    case '?':
      return act(EditorActions.openOverlay('help'));
    case 's':
      return act(EditorActions.openOverlay('stats'));
    case 'v':
      return effect('open-history');
    default:
      return NONE;
  }
}

/**
 * A pending prefix either completes into its two-key command, or is
 * dropped and the key is handled as if no prefix had been typed.
 */
function navigateKey(mode: NavigateMode, event: KeyEvent, now: number): readonly KeyCommand[] {
  if (mode.pending === null) {
    return navigateSingle(event, now);
  }
  const reset = act(EditorActions.setPending(null));
  const completed = completeSequence(mode.pending, event, now);
  return [...reset, ...(completed ?? navigateSingle(event, now))];
}

// =============================================================================
// Search
// =============================================================================

function searchKey(query: string, event: KeyEvent, now: number): readonly KeyCommand[] {
  switch (event.key) {
    case 'Escape':
      return act(EditorActions.searchCancel());
    case 'Enter':
      return act(EditorActions.searchCommit(now));
    case 'Backspace':
      return act(EditorActions.searchInput(Array.from(query).slice(0, -1).join('')));
  }
  if (isTypedChar(event)) {
    return act(EditorActions.searchInput(query + event.key));
  }
  return NONE;
}

// =============================================================================
// Overlays
// =============================================================================

function isDismiss(event: KeyEvent): boolean {
  return event.key === 'Escape' || (isTypedChar(event) && event.key === 'q');
}

function infoOverlayKey(overlay: 'help' | 'stats', event: KeyEvent): readonly KeyCommand[] {
  const ownKey = overlay === 'help' ? '?' : 's';
  if (isDismiss(event) || (isTypedChar(event) && event.key === ownKey)) {
    return act(EditorActions.closeOverlay());
  }
  return NONE;
}

function historyOverlayKey(mode: HistoryOverlayMode, event: KeyEvent): readonly KeyCommand[] {
  if (isDismiss(event)) {
    return act(EditorActions.closeOverlay());
  }
  if (isTypedChar(event) && event.key === 'r') {
    return effect('restore-version');
  }
  if (mode.view.kind !== 'list') {
    return NONE;
  }

  switch (event.key) {
    case 'j':
    case 'ArrowDown':
      return act(EditorActions.historySelect(1));
    case 'k':
    case 'ArrowUp':
      return act(EditorActions.historySelect(-1));
    case 'Enter':
      return effect('view-version');
    case 'd':
      return effect('diff-version');
    default:
      return NONE;
  }
}

// =============================================================================
// Quit Confirmation
// =============================================================================

function confirmQuitKey(event: KeyEvent): readonly KeyCommand[] {
  if (event.key === 'Escape') {
    return act(EditorActions.cancelQuit());
  }
  if (event.ctrl || event.alt) return NONE;
  switch (event.key) {
    case 'y':
    case 'Y':
      return effect('save-and-quit');
    case 'n':
    case 'N':
      return act(EditorActions.forceQuit());
    case 'c':
    case 'C':
      return act(EditorActions.cancelQuit());
    default:
      return NONE;
  }
}

// =============================================================================
// Entry Point
// =============================================================================

/**
 * Commands for `event` in the current state, in the order to run them.
 */
export function resolveKey(state: EditorState, event: KeyEvent, now: number): readonly KeyCommand[] {
  const mode = state.mode;
  if (mode.kind === 'confirm-quit') {
    return confirmQuitKey(event);
  }

  const global = universal(event, now);
  if (global !== null) return global;

  switch (mode.kind) {
    case 'write':
      return writeKey(event, now);
    case 'navigate':
      return navigateKey(mode, event, now);
    case 'search':
      return searchKey(mode.query, event, now);
    case 'overlay':
      return mode.overlay === 'history'
        ? historyOverlayKey(mode, event)
        : infoOverlayKey(mode.overlay, event);
    default: {
      const exhaustiveCheck: never = mode;
      return exhaustiveCheck;
    }
  }
}
