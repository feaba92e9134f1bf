/**
 * EditorSession interface.
 * One session owns one document, its undo history, register and version
 * log. The display layer subscribes and reads snapshots; the input layer
 * feeds key events. Neither touches the state directly.
 */

import type { EditorState } from './state.ts';
import type { KeyEvent } from './keys.ts';
import type { Result } from './errors.ts';
import type { RenderView } from '../store/features/view.ts';
import type { SessionEventMap, EventHandler } from '../store/events.ts';

/**
 * Listener function type for session subscriptions.
 */
export type StoreListener = () => void;

/**
 * Unsubscribe function returned by subscribe.
 */
export type Unsubscribe = () => void;

export interface EditorSession {
  /**
   * Subscribe to view changes.
   * @returns Unsubscribe function to remove the listener
   */
  subscribe(listener: StoreListener): Unsubscribe;

  /**
   * Current render view.
   * Returns the same reference until something visible changes.
   */
  getSnapshot(): RenderView;

  /**
   * Current editor state, for tests and tooling.
   */
  getState(): EditorState;

  /**
   * Interpret one key in the active mode. Never throws for user input;
   * failures become status messages.
   */
  handleKey(event: KeyEvent, now: number): void;

  /**
   * Periodic maintenance: status expiry, stats, autosave.
   */
  tick(now: number): void;

  setViewport(rows: number, columns: number): void;

  /**
   * Persist stats. The document itself is only written by save commands
   * and autosave.
   */
  close(now: number): Result<void>;

  addEventListener<K extends keyof SessionEventMap>(
    type: K,
    handler: EventHandler<SessionEventMap[K]>
  ): Unsubscribe;
}
