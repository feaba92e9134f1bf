/**
 * Primary document file: load, one-time backup, atomic save.
 */

import { dirname } from 'node:path';
import type { FileSystem } from './filesystem.ts';
import { err, ioError, ok, type Result } from '../types/errors.ts';
import { normalizeLineEndings } from '../store/core/text.ts';

export const BACKUP_SUFFIX = '.backup';
export const TEMP_SUFFIX = '.tmp';

export interface LoadedDocument {
  readonly path: string;
  /** Decoded text with line endings normalized to LF */
  readonly content: string;
  /** Bytes as read, null when the file did not exist */
  readonly originalBytes: Uint8Array | null;
}

const decoder = new TextDecoder('utf-8');
const encoder = new TextEncoder();

/**
 * Read the document. A missing file opens as an empty, new document.
 */
export function loadDocument(fs: FileSystem, path: string): Result<LoadedDocument> {
  if (!fs.exists(path)) {
    return ok({ path, content: '', originalBytes: null });
  }
  try {
    const bytes = fs.readFile(path);
    return ok({
      path,
      content: normalizeLineEndings(decoder.decode(bytes)),
      originalBytes: bytes,
    });
  } catch (error) {
    return err(ioError('read', path, error));
  }
}

export function backupPath(path: string): string {
  return path + BACKUP_SUFFIX;
}

/**
 * Write the pre-edit bytes beside the document. Returns the backup path.
 */
export function writeBackup(fs: FileSystem, path: string, bytes: Uint8Array): Result<string> {
  const target = backupPath(path);
  try {
    fs.writeFile(target, bytes);
    return ok(target);
  } catch (error) {
    return err(ioError('write backup', target, error));
  }
}

/**
 * Replace the document in one step: write a temporary sibling, then rename
 * it over the original.
 */
export function saveDocument(fs: FileSystem, path: string, content: string): Result<void> {
  const temp = path + TEMP_SUFFIX;
  try {
    const directory = dirname(path);
    if (!fs.exists(directory)) {
      fs.mkdir(directory);
    }
    fs.writeFile(temp, encoder.encode(content));
    fs.rename(temp, path);
    return ok(undefined);
  } catch (error) {
    return err(ioError('save', path, error));
  }
}
