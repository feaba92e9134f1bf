/**
 * Version history store.
 *
 * One append-only log per document path, indexed in memory the first time
 * the path is touched. Recording appends a record; going over the cap
 * rewrites the log without the oldest records. Damaged records are logged
 * and left out of the index, so one bad record never hides the others.
 */

import { createHash } from 'node:crypto';
import { join, resolve } from 'node:path';
import type { FileSystem } from './filesystem.ts';
import type { LineOp, VersionSummary } from '../types/state.ts';
import { EditorError, err, ioError, ok, type Logger, type Result } from '../types/errors.ts';
import { countWords } from '../store/core/text.ts';
import {
  decodePayload,
  encodeRecord,
  HEADER_SIZE,
  payloadOf,
  recordLength,
  scanRecords,
  type ScannedRecord,
} from './version-codec.ts';
import { diffLines } from './line-diff.ts';

const PREVIEW_LENGTH = 50;

export interface VersionEntry {
  /** Stable for the life of the store instance */
  readonly id: number;
  readonly timestamp: number;
  readonly wordCount: number;
  /** Byte offset of the record in the log */
  readonly offset: number;
  readonly payloadLength: number;
}

export interface VersionStoreOptions {
  readonly fs: FileSystem;
  /** Directory holding one log per document */
  readonly directory: string;
  readonly maxVersions: number;
  readonly logger?: Logger;
  readonly now?: () => number;
}

export interface VersionStore {
  /** Oldest first */
  list(path: string): Result<readonly VersionEntry[]>;
  latest(path: string): Result<VersionEntry | null>;
  record(path: string, content: string): Result<VersionEntry>;
  /** Records only when `content` differs from the newest stored version */
  recordIfChanged(path: string, content: string): Result<VersionEntry | null>;
  read(path: string, id: number): Result<string>;
  /** Newest first, with content previews */
  summaries(path: string): Result<VersionSummary[]>;
  /**
   * Snapshot `currentContent`, then return the content of version `id`
   * for the caller to load.
   */
  restore(path: string, id: number, currentContent: string): Result<string>;
  diff(before: string, after: string): LineOp[];
  logPath(path: string): string;
}

interface PathIndex {
  entries: VersionEntry[];
  /** Bytes in the log, including any damaged regions */
  size: number;
  nextId: number;
}

/**
 * First 50 characters on one line, with "..." when cut.
 */
export function makePreview(content: string): string {
  const flat = content.replace(/\n/g, ' ').trim();
  const chars = Array.from(flat);
  return chars.length > PREVIEW_LENGTH
    ? chars.slice(0, PREVIEW_LENGTH).join('') + '...'
    : flat;
}

export function createVersionStore(options: VersionStoreOptions): VersionStore {
  const { fs, directory, maxVersions } = options;
  const logger = options.logger ?? console;
  const now = options.now ?? Date.now;
  const indexes = new Map<string, PathIndex>();

  function logPath(path: string): string {
    const digest = createHash('sha256').update(resolve(path)).digest('hex');
    return join(directory, `${digest}.log`);
  }

  function warnCorrupt(file: string, offset: number, reason: string): void {
    const error = new EditorError(
      'version_record_corrupt',
      `Skipping version record at byte ${offset} in ${file}: ${reason}`
    );
    logger.warn(error.message);
  }

  /**
   * Build the index for a log. The scan has already dropped, and reported,
   * every record that does not decode.
   */
  function buildIndex(file: string, bytes: Uint8Array): PathIndex {
    const scanned = scanRecords(bytes, (offset, reason) => warnCorrupt(file, offset, reason));
    const entries = scanned.map((record, id) => toEntry(record, id));
    return { entries, size: bytes.length, nextId: entries.length };
  }

  function toEntry(record: ScannedRecord, id: number): VersionEntry {
    return Object.freeze({
      id,
      timestamp: record.timestamp,
      wordCount: record.wordCount,
      offset: record.offset,
      payloadLength: record.payloadLength,
    });
  }

  function open(path: string): Result<PathIndex> {
    const cached = indexes.get(path);
    if (cached !== undefined) return ok(cached);

    const file = logPath(path);
    try {
      const index: PathIndex = fs.exists(file)
        ? buildIndex(file, fs.readFile(file))
        : { entries: [], size: 0, nextId: 0 };
      indexes.set(path, index);
      return ok(index);
    } catch (error) {
      return err(ioError('read version log', file, error));
    }
  }

  /**
   * Rewrite the log with only the newest `maxVersions` records.
   */
  function evict(path: string, index: PathIndex): Result<void> {
    const excess = index.entries.length - maxVersions;
    if (excess <= 0) return ok(undefined);

    const file = logPath(path);
    const temp = `${file}.tmp`;
    try {
      const bytes = fs.readFile(file);
      const kept = index.entries.slice(excess);
      const total = kept.reduce((sum, entry) => sum + recordLength(entry), 0);
      const compacted = new Uint8Array(total);
      const entries: VersionEntry[] = [];
      let offset = 0;
      for (const entry of kept) {
        const length = recordLength(entry);
        compacted.set(bytes.subarray(entry.offset, entry.offset + length), offset);
        entries.push(Object.freeze({ ...entry, offset }));
        offset += length;
      }
      fs.writeFile(temp, compacted);
      fs.rename(temp, file);
      index.entries = entries;
      index.size = compacted.length;
      return ok(undefined);
    } catch (error) {
      return err(ioError('prune version log', file, error));
    }
  }

  function list(path: string): Result<readonly VersionEntry[]> {
    const index = open(path);
    return index.ok ? ok(index.value.entries.slice()) : index;
  }

  function latest(path: string): Result<VersionEntry | null> {
    const index = open(path);
    if (!index.ok) return index;
    return ok(index.value.entries[index.value.entries.length - 1] ?? null);
  }

  function record(path: string, content: string): Result<VersionEntry> {
    const opened = open(path);
    if (!opened.ok) return opened;
    const index = opened.value;

    const file = logPath(path);
    const wordCount = countWords([content]);
    const timestamp = Math.max(0, Math.floor(now()));
    const bytes = encodeRecord(timestamp, wordCount, content);
    try {
      if (!fs.exists(directory)) {
        fs.mkdir(directory);
      }
      fs.appendFile(file, bytes);
    } catch (error) {
      return err(ioError('append to version log', file, error));
    }

    const entry: VersionEntry = Object.freeze({
      id: index.nextId++,
      timestamp,
      wordCount,
      offset: index.size,
      payloadLength: bytes.length - HEADER_SIZE,
    });
    index.entries.push(entry);
    index.size += bytes.length;

    const evicted = evict(path, index);
    return evicted.ok ? ok(entry) : evicted;
  }

  function read(path: string, id: number): Result<string> {
    const opened = open(path);
    if (!opened.ok) return opened;
    const entry = opened.value.entries.find((candidate) => candidate.id === id);
    if (entry === undefined) {
      return err(new EditorError('version_record_corrupt', `Version ${id} is not in the history`));
    }
    const file = logPath(path);
    try {
      const bytes = fs.readFile(file);
      return decodePayload(payloadOf(bytes, entry));
    } catch (error) {
      return err(ioError('read version log', file, error));
    }
  }

  function recordIfChanged(path: string, content: string): Result<VersionEntry | null> {
    const newest = latest(path);
    if (!newest.ok) return newest;
    if (newest.value !== null) {
      const previous = read(path, newest.value.id);
      if (previous.ok && previous.value === content) {
        return ok(null);
      }
    }
    return record(path, content);
  }

  function summaries(path: string): Result<VersionSummary[]> {
    const entries = list(path);
    if (!entries.ok) return entries;
    const result: VersionSummary[] = [];
    for (const entry of [...entries.value].reverse()) {
      const content = read(path, entry.id);
      result.push(Object.freeze({
        id: entry.id,
        timestamp: entry.timestamp,
        wordCount: entry.wordCount,
        preview: content.ok ? makePreview(content.value) : '',
      }));
    }
    return ok(result);
  }

  function restore(path: string, id: number, currentContent: string): Result<string> {
    const target = read(path, id);
    if (!target.ok) return target;
    const snapshot = record(path, currentContent);
    return snapshot.ok ? target : snapshot;
  }

  return {
    list,
    latest,
    record,
    recordIfChanged,
    read,
    summaries,
    restore,
    diff: diffLines,
    logPath,
  };
}
