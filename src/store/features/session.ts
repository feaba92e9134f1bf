/**
 * Editor session.
 * Factory that wires the pure reducer to the outside world: the document
 * file, the version log, the stats file and the display layer. All I/O is
 * synchronous and happens here; every failure becomes a status message.
 */

import type { EditorConfig, EditorState, StatusKind } from '../../types/state.ts';
import type { EditorAction } from '../../types/actions.ts';
import type { KeyEvent } from '../../types/keys.ts';
import type { EditorSession, StoreListener, Unsubscribe } from '../../types/store.ts';
import type { FileSystem } from '../../persistence/filesystem.ts';
import type { EditorError, Logger, Result } from '../../types/errors.ts';
import { ok } from '../../types/errors.ts';
import { DEFAULT_CONFIG } from '../../config/config.ts';
import { createInitialState } from '../core/state.ts';
import { getValue, getWordCount } from '../core/rope.ts';
import { loadDocument, saveDocument, writeBackup, type LoadedDocument } from '../../persistence/document-file.ts';
import { createVersionStore, type VersionStore } from '../../persistence/version-store.ts';
import { loadStats, saveStats } from '../../persistence/stats-store.ts';
import { diffLines } from '../../persistence/line-diff.ts';
import {
  createBackupEvent,
  createErrorEvent,
  createEventEmitter,
  createQuitEvent,
  createRestoreEvent,
  createSaveEvent,
  type SaveTrigger,
} from '../events.ts';
import { EditorActions } from './actions.ts';
import { editorReducer } from './reducer.ts';
import { resolveKey, type SessionEffect } from './keymap.ts';
import {
  createStatsState,
  dateKey,
  observeWordCount,
  progress,
  rebaseWordCount,
  sessionStats,
  streak,
  wordsOn,
  type StatsState,
} from './stats.ts';
import { buildRenderView, type RenderView, type StatsSnapshot } from './view.ts';

/** How long the save confirmation stays up */
export const SAVED_STATUS_MS = 2000;

export interface EditorSessionOptions {
  readonly path: string;
  readonly fs: FileSystem;
  readonly config?: EditorConfig;
  /** Directory for version logs */
  readonly versionsDirectory: string;
  /** JSON file holding per-day word totals */
  readonly statsPath: string;
  /** Session start, epoch ms */
  readonly now: number;
  readonly viewport?: { readonly rows?: number; readonly columns?: number };
  readonly logger?: Logger;
}

/**
 * Open `path` and build a session around it. Fails only when the document
 * exists but cannot be read.
 */
export function createEditorSession(options: EditorSessionOptions): Result<EditorSession> {
  const { fs, path } = options;
  const config = options.config ?? DEFAULT_CONFIG;
  const logger = options.logger ?? console;

  let clock = options.now;

  const loaded = loadDocument(fs, path);
  if (!loaded.ok) return loaded;
  const document: LoadedDocument = loaded.value;

  let state: EditorState = createInitialState({
    content: document.content,
    config,
    viewport: options.viewport,
  });

  const versions: VersionStore | null = config.versionsEnabled
    ? createVersionStore({
        fs,
        directory: options.versionsDirectory,
        maxVersions: config.maxVersions,
        logger,
        now: () => clock,
      })
    : null;

  const loadedStats = loadStats(fs, options.statsPath, logger);
  if (!loadedStats.ok) {
    logger.warn(loadedStats.error.message);
  }
  let stats: StatsState = createStatsState(
    loadedStats.ok ? loadedStats.value : {},
    getWordCount(state.buffer),
    options.now
  );

  const listeners = new Set<StoreListener>();
  const events = createEventEmitter(logger);

  let lastSaveAttempt = options.now;
  let backupAttempted = document.originalBytes === null;
  let observedBuffer = state.buffer;
  let view: RenderView | null = null;
  let changed = false;

  // ---------------------------------------------------------------------------
  // State plumbing
  // ---------------------------------------------------------------------------

  function notifyListeners(): void {
    for (const listener of listeners) {
      try {
        listener();
      } catch (error) {
        logger.error('Session listener threw an error:', error);
      }
    }
  }

  function dispatch(action: EditorAction): boolean {
    const next = editorReducer(state, action);
    if (next === state) return false;
    const bufferChanged = next.buffer !== state.buffer;
    state = next;
    view = null;
    changed = true;
    if (bufferChanged) ensureBackup();
    return true;
  }

  function setStatus(text: string, kind: StatusKind, durationMs?: number): void {
    dispatch(EditorActions.setStatus(text, kind, clock, durationMs));
  }

  function report(error: EditorError): void {
    setStatus(error.message, 'error');
    events.emit('error', createErrorEvent(error, clock));
  }

  /**
   * Copy the bytes read at open beside the document, once, as soon as the
   * buffer first changes. A failed backup is reported and not retried.
   */
  function ensureBackup(): void {
    if (backupAttempted || document.originalBytes === null) return;
    backupAttempted = true;
    const written = writeBackup(fs, path, document.originalBytes);
    if (written.ok) {
      events.emit('backup', createBackupEvent(written.value, clock));
    } else {
      report(written.error);
    }
  }

  function observeStats(): void {
    if (state.buffer === observedBuffer) return;
    observedBuffer = state.buffer;
    stats = observeWordCount(stats, getWordCount(state.buffer), clock);
  }

  function persistStats(): Result<void> {
    observeStats();
    return saveStats(fs, options.statsPath, stats.days);
  }

  function statsSnapshot(): StatsSnapshot {
    const today = dateKey(clock);
    const goal = config.dailyGoal;
    return {
      session: sessionStats(stats, getWordCount(state.buffer), clock),
      todayWords: wordsOn(stats.days, today),
      dailyGoal: goal,
      streak: config.showStreak && goal > 0 ? streak(stats.days, goal, today) : null,
      progress: config.showProgress && goal > 0 ? progress(stats.days, goal, today) : null,
    };
  }

  // ---------------------------------------------------------------------------
  // Saving
  // ---------------------------------------------------------------------------

  /**
   * Write the document, then record a version and persist stats. Only the
   * document write decides success; version and stats failures are
   * reported on their own.
   */
  function save(trigger: SaveTrigger): boolean {
    lastSaveAttempt = clock;
    const content = getValue(state.buffer);
    const written = saveDocument(fs, path, content);
    if (!written.ok) {
      report(written.error);
      return false;
    }
    dispatch(EditorActions.markSaved(trigger === 'manual'));

    let versionId: number | null = null;
    let problem: EditorError | null = null;
    if (versions !== null && (trigger === 'manual' || config.versionOnAutosave)) {
      const recorded = trigger === 'manual'
        ? versions.record(path, content)
        : versions.recordIfChanged(path, content);
      if (recorded.ok) {
        versionId = recorded.value?.id ?? null;
      } else {
        problem = recorded.error;
      }
    }

    const statsSaved = persistStats();
    if (!statsSaved.ok) problem ??= statsSaved.error;

    if (problem !== null) {
      report(problem);
    } else if (trigger === 'manual') {
      setStatus('Saved', 'success', SAVED_STATUS_MS);
    }
    events.emit('save', createSaveEvent(path, trigger, versionId, clock));
    return true;
  }

  function autosaveDue(): boolean {
    const interval = config.autosaveIntervalSeconds * 1000;
    return interval > 0 && state.dirty && clock - lastSaveAttempt >= interval;
  }

  // ---------------------------------------------------------------------------
  // Version history
  // ---------------------------------------------------------------------------

  function selectedVersion(): number | null {
    const mode = state.mode;
    if (mode.kind !== 'overlay' || mode.overlay !== 'history') return null;
    return mode.entries[mode.selected]?.id ?? null;
  }

  function openHistory(): void {
    if (versions === null) {
      setStatus('Version history is disabled', 'info');
      return;
    }
    const summaries = versions.summaries(path);
    if (!summaries.ok) {
      report(summaries.error);
      return;
    }
    dispatch(EditorActions.openHistory(summaries.value));
  }

  function readSelected(): { id: number; content: string } | null {
    const id = selectedVersion();
    if (versions === null || id === null) return null;
    const content = versions.read(path, id);
    if (!content.ok) {
      report(content.error);
      return null;
    }
    return { id, content: content.value };
  }

  function restoreSelected(): void {
    const id = selectedVersion();
    if (versions === null || id === null) return;
    const restored = versions.restore(path, id, getValue(state.buffer));
    if (!restored.ok) {
      report(restored.error);
      return;
    }
    observeStats();
    dispatch(EditorActions.loadContent(restored.value));
    dispatch(EditorActions.enterNavigate());
    // Restored words were written on another day
    observedBuffer = state.buffer;
    stats = rebaseWordCount(stats, getWordCount(state.buffer));
    setStatus(`Restored version ${id}`, 'success');
    events.emit('restore', createRestoreEvent(id, clock));
  }

  function perform(effect: SessionEffect): void {
    switch (effect) {
      case 'save':
        save('manual');
        return;
      case 'save-and-quit':
        if (save('manual')) {
          dispatch(EditorActions.forceQuit());
        }
        return;
      case 'open-history':
        openHistory();
        return;
      case 'view-version': {
        const selected = readSelected();
        if (selected !== null) {
          dispatch(EditorActions.historyShow({ kind: 'content', text: selected.content }));
        }
        return;
      }
      case 'diff-version': {
        const selected = readSelected();
        if (selected !== null) {
          const ops = diffLines(selected.content, getValue(state.buffer));
          dispatch(EditorActions.historyShow({ kind: 'diff', ops }));
        }
        return;
      }
      case 'restore-version':
        restoreSelected();
        return;
      default: {
        // Exhaustive check - TypeScript will error if we miss an effect
        const exhaustiveCheck: never = effect;
        return exhaustiveCheck;
      }
    }
  }

  // ---------------------------------------------------------------------------
  // Public surface
  // ---------------------------------------------------------------------------

  /**
   * Run `work` and notify subscribers once if it changed anything.
   */
  function runAndNotify(work: () => void): void {
    changed = false;
    const wasQuitting = state.quitRequested;
    work();
    if (!wasQuitting && state.quitRequested) {
      events.emit('quit', createQuitEvent(!state.dirty, clock));
    }
    if (changed) notifyListeners();
  }

  return ok({
    subscribe(listener: StoreListener): Unsubscribe {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },

    getSnapshot(): RenderView {
      view ??= buildRenderView(state, statsSnapshot());
      return view;
    },

    getState(): EditorState {
      return state;
    },

    handleKey(event: KeyEvent, now: number): void {
      clock = now;
      runAndNotify(() => {
        for (const command of resolveKey(state, event, now)) {
          if (command.type === 'action') {
            dispatch(command.action);
          } else {
            perform(command.effect);
          }
        }
      });
    },

    tick(now: number): void {
      clock = now;
      runAndNotify(() => {
        dispatch(EditorActions.expireStatus(now));
        observeStats();
        if (autosaveDue()) {
          save('autosave');
        }
        const mode = state.mode;
        if (mode.kind === 'overlay' && mode.overlay === 'stats') {
          view = null;
          changed = true;
        }
      });
    },

    setViewport(rows: number, columns: number): void {
      runAndNotify(() => {
        dispatch(EditorActions.setViewport(rows, columns));
      });
    },

    close(now: number): Result<void> {
      clock = now;
      return persistStats();
    },

    addEventListener: events.addEventListener,
  });
}
