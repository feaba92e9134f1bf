/**
 * Tests for the event system.
 */

import { describe, it, expect, vi } from 'vitest';
import { EditorError } from '../types/errors.ts';
import {
  createEventEmitter,
  createBackupEvent,
  createErrorEvent,
  createQuitEvent,
  createRestoreEvent,
  createSaveEvent,
} from './events.ts';

describe('Event Emitter', () => {
  describe('addEventListener', () => {
    it('should add and call event handlers', () => {
      const emitter = createEventEmitter();
      const handler = vi.fn();

      emitter.addEventListener('save', handler);

      const event = createSaveEvent('/docs/a.txt', 'manual', 3, 1000);
      emitter.emit('save', event);

      expect(handler).toHaveBeenCalledTimes(1);
      expect(handler).toHaveBeenCalledWith(event);
    });

    it('should support multiple handlers for same event', () => {
      const emitter = createEventEmitter();
      const handler1 = vi.fn();
      const handler2 = vi.fn();

      emitter.addEventListener('quit', handler1);
      emitter.addEventListener('quit', handler2);
      emitter.emit('quit', createQuitEvent(true, 1000));

      expect(handler1).toHaveBeenCalledTimes(1);
      expect(handler2).toHaveBeenCalledTimes(1);
    });

    it('should return unsubscribe function', () => {
      const emitter = createEventEmitter();
      const handler = vi.fn();

      const unsubscribe = emitter.addEventListener('backup', handler);
      emitter.emit('backup', createBackupEvent('/docs/a.txt.backup', 1000));
      expect(handler).toHaveBeenCalledTimes(1);

      unsubscribe();
      emitter.emit('backup', createBackupEvent('/docs/a.txt.backup', 2000));
      expect(handler).toHaveBeenCalledTimes(1);
    });

    it('should only call handlers of the emitted type', () => {
      const emitter = createEventEmitter();
      const saveHandler = vi.fn();
      const restoreHandler = vi.fn();

      emitter.addEventListener('save', saveHandler);
      emitter.addEventListener('restore', restoreHandler);
      emitter.emit('restore', createRestoreEvent(2, 1000));

      expect(saveHandler).not.toHaveBeenCalled();
      expect(restoreHandler).toHaveBeenCalledTimes(1);
    });
  });

  describe('removeEventListener', () => {
    it('should remove a specific handler', () => {
      const emitter = createEventEmitter();
      const handler1 = vi.fn();
      const handler2 = vi.fn();

      emitter.addEventListener('quit', handler1);
      emitter.addEventListener('quit', handler2);
      emitter.removeEventListener('quit', handler1);
      emitter.emit('quit', createQuitEvent(false, 1000));

      expect(handler1).not.toHaveBeenCalled();
      expect(handler2).toHaveBeenCalledTimes(1);
    });
  });

  describe('removeAllListeners', () => {
    it('should remove every handler of every type', () => {
      const emitter = createEventEmitter();
      const handler = vi.fn();

      emitter.addEventListener('save', handler);
      emitter.addEventListener('quit', handler);
      emitter.removeAllListeners();

      emitter.emit('save', createSaveEvent('/docs/a.txt', 'autosave', null, 1000));
      emitter.emit('quit', createQuitEvent(true, 1000));
      expect(handler).not.toHaveBeenCalled();
    });
  });

  describe('error handling', () => {
    it('should log handler errors and keep calling the rest', () => {
      const logger = { warn: vi.fn(), error: vi.fn() };
      const emitter = createEventEmitter(logger);
      const failure = new Error('handler failed');
      const after = vi.fn();

      emitter.addEventListener('save', () => {
        throw failure;
      });
      emitter.addEventListener('save', after);
      emitter.emit('save', createSaveEvent('/docs/a.txt', 'manual', null, 1000));

      expect(logger.error).toHaveBeenCalledWith("Event handler error for 'save':", failure);
      expect(after).toHaveBeenCalledTimes(1);
    });
  });
});

describe('Event Creators', () => {
  it('should create save events', () => {
    expect(createSaveEvent('/docs/a.txt', 'autosave', null, 5000)).toEqual({
      type: 'save',
      timestamp: 5000,
      path: '/docs/a.txt',
      trigger: 'autosave',
      versionId: null,
    });
  });

  it('should create restore and quit events', () => {
    expect(createRestoreEvent(4, 10)).toEqual({ type: 'restore', timestamp: 10, versionId: 4 });
    expect(createQuitEvent(false, 20)).toEqual({ type: 'quit', timestamp: 20, saved: false });
  });

  it('should carry the error in error events', () => {
    const error = new EditorError('io_error', 'Failed to save /docs/a.txt: EIO');
    const event = createErrorEvent(error, 30);
    expect(event.type).toBe('error');
    expect(event.error).toBe(error);
  });

  it('should freeze events', () => {
    expect(Object.isFrozen(createBackupEvent('/docs/a.txt.backup', 0))).toBe(true);
  });
});
