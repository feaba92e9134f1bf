/**
 * Session events.
 * Typed pub/sub for things that happen outside the reducer: file writes,
 * restores and quitting. Render updates go through `subscribe` instead.
 */

import type { EditorError, Logger } from '../types/errors.ts';

// =============================================================================
// Event Types
// =============================================================================

export interface SessionEvent {
  readonly type: string;
  readonly timestamp: number;
}

export type SaveTrigger = 'manual' | 'autosave';

/**
 * Fired after the document was written to disk.
 */
export interface SaveEvent extends SessionEvent {
  readonly type: 'save';
  readonly path: string;
  readonly trigger: SaveTrigger;
  /** Version recorded alongside the save, if any */
  readonly versionId: number | null;
}

/**
 * Fired once, when the pre-edit copy of the document is written.
 */
export interface BackupEvent extends SessionEvent {
  readonly type: 'backup';
  readonly path: string;
}

export interface RestoreEvent extends SessionEvent {
  readonly type: 'restore';
  readonly versionId: number;
}

export interface QuitEvent extends SessionEvent {
  readonly type: 'quit';
  /** False when changes were discarded */
  readonly saved: boolean;
}

/**
 * Fired for every failure that was turned into a status message.
 */
export interface ErrorEvent extends SessionEvent {
  readonly type: 'error';
  readonly error: EditorError;
}

export interface SessionEventMap {
  'save': SaveEvent;
  'backup': BackupEvent;
  'restore': RestoreEvent;
  'quit': QuitEvent;
  'error': ErrorEvent;
}

export type EventHandler<T> = (event: T) => void;

export type Unsubscribe = () => void;

// =============================================================================
// Event Emitter
// =============================================================================

export interface SessionEventEmitter {
  addEventListener<K extends keyof SessionEventMap>(
    type: K,
    handler: EventHandler<SessionEventMap[K]>
  ): Unsubscribe;

  removeEventListener<K extends keyof SessionEventMap>(
    type: K,
    handler: EventHandler<SessionEventMap[K]>
  ): void;

  emit<K extends keyof SessionEventMap>(type: K, event: SessionEventMap[K]): void;

  removeAllListeners(): void;
}

type HandlerSets = {
  [K in keyof SessionEventMap]: Set<EventHandler<SessionEventMap[K]>>;
};

export function createEventEmitter(logger: Logger = console): SessionEventEmitter {
  const handlers: HandlerSets = {
    'save': new Set(),
    'backup': new Set(),
    'restore': new Set(),
    'quit': new Set(),
    'error': new Set(),
  };

  return {
    addEventListener<K extends keyof SessionEventMap>(
      type: K,
      handler: EventHandler<SessionEventMap[K]>
    ): Unsubscribe {
      handlers[type].add(handler);
      return () => {
        handlers[type].delete(handler);
      };
    },

    removeEventListener<K extends keyof SessionEventMap>(
      type: K,
      handler: EventHandler<SessionEventMap[K]>
    ): void {
      handlers[type].delete(handler);
    },

    emit<K extends keyof SessionEventMap>(type: K, event: SessionEventMap[K]): void {
      for (const handler of handlers[type]) {
        try {
          handler(event);
        } catch (error) {
          logger.error(`Event handler error for '${type}':`, error);
        }
      }
    },

    removeAllListeners(): void {
      for (const set of Object.values(handlers)) {
        set.clear();
      }
    },
  };
}

// =============================================================================
// Event Helpers
// =============================================================================

export function createSaveEvent(
  path: string,
  trigger: SaveTrigger,
  versionId: number | null,
  timestamp: number
): SaveEvent {
  return Object.freeze({ type: 'save', timestamp, path, trigger, versionId });
}

export function createBackupEvent(path: string, timestamp: number): BackupEvent {
  return Object.freeze({ type: 'backup', timestamp, path });
}

export function createRestoreEvent(versionId: number, timestamp: number): RestoreEvent {
  return Object.freeze({ type: 'restore', timestamp, versionId });
}

export function createQuitEvent(saved: boolean, timestamp: number): QuitEvent {
  return Object.freeze({ type: 'quit', timestamp, saved });
}

export function createErrorEvent(error: EditorError, timestamp: number): ErrorEvent {
  return Object.freeze({ type: 'error', timestamp, error });
}
