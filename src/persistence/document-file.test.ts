/**
 * Tests for loading, backing up and saving the document file.
 */

import { describe, it, expect } from 'vitest';
import { InMemoryFileSystem } from './in-memory-fs.ts';
import { backupPath, loadDocument, saveDocument, writeBackup } from './document-file.ts';

const PATH = '/docs/draft.txt';

describe('loadDocument', () => {
  it('should open a missing file as a new, empty document', () => {
    const result = loadDocument(new InMemoryFileSystem(), PATH);
    expect(result).toEqual({ ok: true, value: { path: PATH, content: '', originalBytes: null } });
  });

  it('should normalize line endings but keep the original bytes', () => {
    const fs = new InMemoryFileSystem();
    fs.setFile(PATH, 'one\r\ntwo\rthree');
    const result = loadDocument(fs, PATH);
    if (!result.ok) throw result.error;
    expect(result.value.content).toBe('one\ntwo\nthree');
    expect(result.value.originalBytes).toEqual(new TextEncoder().encode('one\r\ntwo\rthree'));
  });

  it('should fail when the file exists but cannot be read', () => {
    const fs = new InMemoryFileSystem();
    fs.setFile(PATH, 'text');
    fs.failOn('readFile');
    const result = loadDocument(fs, PATH);
    expect(!result.ok && result.error.code).toBe('io_error');
    expect(!result.ok && result.error.message).toBe(`Failed to read ${PATH}: EIO: readFile failed`);
  });
});

describe('writeBackup', () => {
  it('should copy the bytes beside the document', () => {
    const fs = new InMemoryFileSystem();
    const result = writeBackup(fs, PATH, new TextEncoder().encode('before'));
    expect(result).toEqual({ ok: true, value: '/docs/draft.txt.backup' });
    expect(fs.getText(backupPath(PATH))).toBe('before');
  });

  it('should report a failed write', () => {
    const fs = new InMemoryFileSystem();
    fs.failOn('writeFile', 'EACCES: permission denied');
    const result = writeBackup(fs, PATH, new Uint8Array(0));
    expect(!result.ok && result.error.message).toBe(
      'Failed to write backup /docs/draft.txt.backup: EACCES: permission denied'
    );
  });
});

describe('saveDocument', () => {
  it('should write through a temporary file and leave only the document', () => {
    const fs = new InMemoryFileSystem();
    expect(saveDocument(fs, PATH, 'hello\n').ok).toBe(true);
    expect(fs.getText(PATH)).toBe('hello\n');
    expect(fs.paths()).toEqual([PATH]);
    expect(fs.exists('/docs')).toBe(true);
  });

  it('should keep the previous content when the rename fails', () => {
    const fs = new InMemoryFileSystem();
    fs.setFile(PATH, 'old');
    fs.failOn('rename');
    const result = saveDocument(fs, PATH, 'new');
    expect(!result.ok && result.error.code).toBe('io_error');
    expect(fs.getText(PATH)).toBe('old');
  });
});
