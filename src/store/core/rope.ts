/**
 * Rope text buffer.
 *
 * Document text lives in a Red-Black tree of bounded chunks. Each node
 * carries its chunk's code point and newline counts plus the totals of its
 * subtree, so offset lookups, line lookups and edits are O(log n).
 *
 * Every edit returns a new BufferState that shares untouched subtrees with
 * the old one, together with the exact Delta it applied. Out-of-range
 * offsets throw `invalid_position`; nothing here clamps.
 */

import type { BufferState, Delta, NodeColor, RopeNode } from '../../types/state.ts';
import type { CharOffset, ColumnNumber, LineNumber } from '../../types/branded.ts';
import { charOffset, columnNumber, isValidOffset, lineNumber } from '../../types/branded.ts';
import { EditorError } from '../../types/errors.ts';
import {
  buildBalancedTree,
  ensureBlackRoot,
  fixInsertWithPath,
  isRed,
  joinTrees,
  walkInOrder,
  type InsertionPathEntry,
} from './rb-tree.ts';
import {
  codePointLength,
  countNewlines,
  countWords,
  nthNewline,
  sliceCodePoints,
  splitIntoChunks,
  unitIndex,
} from './text.ts';

/** Maximum code points per chunk */
export const CHUNK_CAPACITY = 512;

// =============================================================================
// Node Construction
// =============================================================================

export type RopeNodeUpdates = Partial<Pick<RopeNode, 'color' | 'left' | 'right' | 'text'>>;

export function createRopeNode(
  text: string,
  color: NodeColor = 'red',
  left: RopeNode | null = null,
  right: RopeNode | null = null
): RopeNode {
  const length = codePointLength(text);
  const newlines = countNewlines(text);
  return Object.freeze({
    text,
    length,
    newlines,
    color,
    left,
    right,
    subtreeLength: length + (left?.subtreeLength ?? 0) + (right?.subtreeLength ?? 0),
    subtreeNewlines: newlines + (left?.subtreeNewlines ?? 0) + (right?.subtreeNewlines ?? 0),
  });
}

/**
 * Copy a node with changes. Subtree aggregates are always recomputed from
 * the children and the chunk, so they cannot be set directly.
 */
export function withRopeNode(node: RopeNode, changes: RopeNodeUpdates): RopeNode {
  const text = changes.text ?? node.text;
  const length = changes.text === undefined ? node.length : codePointLength(text);
  const newlines = changes.text === undefined ? node.newlines : countNewlines(text);
  const left = 'left' in changes ? changes.left ?? null : node.left;
  const right = 'right' in changes ? changes.right ?? null : node.right;

  return Object.freeze({
    text,
    length,
    newlines,
    color: changes.color ?? node.color,
    left,
    right,
    subtreeLength: length + (left?.subtreeLength ?? 0) + (right?.subtreeLength ?? 0),
    subtreeNewlines: newlines + (left?.subtreeNewlines ?? 0) + (right?.subtreeNewlines ?? 0),
  });
}

const withNode = (
  node: RopeNode,
  updates: Partial<{ color: NodeColor; left: RopeNode | null; right: RopeNode | null }>
): RopeNode => withRopeNode(node, updates);

function bufferFromRoot(root: RopeNode | null): BufferState {
  return Object.freeze({
    root,
    length: root?.subtreeLength ?? 0,
    lineCount: (root?.subtreeNewlines ?? 0) + 1,
  });
}

/**
 * Create a buffer holding `content`. Chunks are built into a balanced tree
 * directly rather than inserted one by one.
 */
export function createBufferState(content: string = ''): BufferState {
  const root = buildBalancedTree<string, RopeNode>(
    splitIntoChunks(content, CHUNK_CAPACITY),
    (text, color, left, right) => createRopeNode(text, color, left, right)
  );
  return bufferFromRoot(root);
}

// =============================================================================
// Validation
// =============================================================================

function assertOffset(buffer: BufferState, offset: number): void {
  if (!isValidOffset(offset) || offset > buffer.length) {
    throw new EditorError(
      'invalid_position',
      `Offset ${offset} is outside the document [0, ${buffer.length}]`
    );
  }
}

function assertRange(buffer: BufferState, start: number, end: number): void {
  assertOffset(buffer, start);
  assertOffset(buffer, end);
  if (start > end) {
    throw new EditorError('invalid_position', `Range [${start}, ${end}) is inverted`);
  }
}

function assertLine(buffer: BufferState, line: number): void {
  if (!isValidOffset(line) || line >= buffer.lineCount) {
    throw new EditorError(
      'invalid_position',
      `Line ${line} is outside the document [0, ${buffer.lineCount})`
    );
  }
}

// =============================================================================
// Lookup
// =============================================================================

interface PathEntry {
  node: RopeNode;
  direction: 'left' | 'right';
}

interface ChunkLocation {
  node: RopeNode;
  /** Document offset of the chunk's first code point */
  start: number;
  /** Ancestors from the root down to the chunk's parent */
  path: PathEntry[];
}

/**
 * Find the chunk containing `offset`. At a chunk boundary the earlier chunk
 * wins, so appends extend the chunk they follow.
 */
function findChunk(root: RopeNode, offset: number): ChunkLocation {
  const path: PathEntry[] = [];
  let node = root;
  let base = 0;

  for (;;) {
    const leftLength = node.left?.subtreeLength ?? 0;
    if (node.left !== null && offset <= base + leftLength) {
      path.push({ node, direction: 'left' });
      node = node.left;
      continue;
    }
    const start = base + leftLength;
    if (offset <= start + node.length || node.right === null) {
      return { node, start, path };
    }
    path.push({ node, direction: 'right' });
    base = start + node.length;
    node = node.right;
  }
}

/**
 * Rebuild the ancestors of a replaced node. O(log n) new nodes.
 */
function replaceOnPath(path: PathEntry[], replacement: RopeNode): RopeNode {
  let current = replacement;
  for (let i = path.length - 1; i >= 0; i--) {
    const { node, direction } = path[i];
    current = direction === 'left'
      ? withRopeNode(node, { left: current })
      : withRopeNode(node, { right: current });
  }
  return current;
}

/**
 * Insert a new chunk so that it starts at `position`, which must be a
 * chunk boundary.
 */
function insertChunk(root: RopeNode, position: number, text: string): RopeNode {
  const leaf = createRopeNode(text, 'red');
  const path: InsertionPathEntry<RopeNode>[] = [];
  let node: RopeNode | null = root;
  let base = 0;

  while (node !== null) {
    const start: number = base + (node.left?.subtreeLength ?? 0);
    if (position <= start) {
      path.push({ node, direction: 'left' });
      node = node.left;
    } else {
      path.push({ node, direction: 'right' });
      base = start + node.length;
      node = node.right;
    }
  }

  const parent = path[path.length - 1];
  parent.node = parent.direction === 'left'
    ? withRopeNode(parent.node, { left: leaf })
    : withRopeNode(parent.node, { right: leaf });

  return fixInsertWithPath(path, withNode);
}

// =============================================================================
// Editing
// =============================================================================

export interface BufferEdit {
  readonly state: BufferState;
  /** What was applied, in a form the undo history can invert */
  readonly delta: Delta;
}

/**
 * Insert `text` at `offset`.
 */
export function ropeInsert(buffer: BufferState, offset: CharOffset, text: string): BufferEdit {
  assertOffset(buffer, offset);
  const delta: Delta = Object.freeze({ offset, removed: '', inserted: text });
  if (text.length === 0) {
    return { state: buffer, delta };
  }
  if (buffer.root === null) {
    return { state: createBufferState(text), delta };
  }

  const { node, start, path } = findChunk(buffer.root, offset);
  const split = unitIndex(node.text, offset - start);
  const combined = node.text.slice(0, split) + text + node.text.slice(split);
  const [first, ...rest] = splitIntoChunks(combined, CHUNK_CAPACITY);

  let root = replaceOnPath(path, withRopeNode(node, { text: first }));
  let position = start + codePointLength(first);
  for (const chunk of rest) {
    root = insertChunk(root, position, chunk);
    position += codePointLength(chunk);
  }

  return { state: bufferFromRoot(root), delta };
}

/**
 * Delete the range [start, end). A range inside one chunk trims that chunk
 * in place; anything wider splits the tree at both ends and joins the
 * outer parts, which keeps the tree balanced.
 */
export function ropeDelete(buffer: BufferState, start: CharOffset, end: CharOffset): BufferEdit {
  assertRange(buffer, start, end);
  const removed = ropeSlice(buffer, start, end);
  const delta: Delta = Object.freeze({ offset: start, removed, inserted: '' });
  if (start === end || buffer.root === null) {
    return { state: buffer, delta };
  }

  const { node, start: chunkStart, path } = findChunk(buffer.root, start);
  if (end <= chunkStart + node.length && end - start < node.length) {
    const text =
      sliceCodePoints(node.text, 0, start - chunkStart, node.length) +
      sliceCodePoints(node.text, end - chunkStart, node.length, node.length);
    return { state: bufferFromRoot(replaceOnPath(path, withRopeNode(node, { text }))), delta };
  }

  const [before, rest] = splitAt(buffer.root, start);
  const [, after] = splitAt(rest, end - start);
  const root = concat(before, after);
  return {
    state: bufferFromRoot(root === null ? null : ensureBlackRoot(root, withNode)),
    delta,
  };
}

/**
 * Apply a delta: remove `delta.removed` at `delta.offset`, then insert
 * `delta.inserted` there.
 */
export function applyDelta(buffer: BufferState, delta: Delta): BufferState {
  const removedLength = codePointLength(delta.removed);
  const afterDelete = ropeDelete(buffer, delta.offset, charOffset(delta.offset + removedLength)).state;
  return ropeInsert(afterDelete, delta.offset, delta.inserted).state;
}

// =============================================================================
// Split and Join
// =============================================================================

function join(left: RopeNode | null, pivot: RopeNode, right: RopeNode | null): RopeNode {
  return joinTrees(left, pivot, right, withNode);
}

/**
 * Split into the content before `position` and the content from it on,
 * cutting a chunk in two when `position` falls inside it. O(log n).
 */
function splitAt(node: RopeNode | null, position: number): [RopeNode | null, RopeNode | null] {
  if (node === null) return [null, null];

  const leftLength = node.left?.subtreeLength ?? 0;
  if (position <= leftLength) {
    const [before, after] = splitAt(node.left, position);
    return [before, join(after, node, node.right)];
  }

  const chunkEnd = leftLength + node.length;
  if (position >= chunkEnd) {
    const [before, after] = splitAt(node.right, position - chunkEnd);
    return [join(node.left, node, before), after];
  }

  const cut = position - leftLength;
  const head = createRopeNode(sliceCodePoints(node.text, 0, cut, node.length));
  const tail = createRopeNode(sliceCodePoints(node.text, cut, node.length, node.length));
  return [join(node.left, head, null), join(null, tail, node.right)];
}

/**
 * Join two trees whose contents are adjacent, using the last chunk of
 * `left` as the pivot.
 */
function concat(left: RopeNode | null, right: RopeNode | null): RopeNode | null {
  if (left === null) return right;
  if (right === null) return left;

  let last = left;
  while (last.right !== null) {
    last = last.right;
  }
  const [rest] = splitAt(left, left.subtreeLength - last.length);
  return join(rest, last, right);
}

// =============================================================================
// Reading
// =============================================================================

export function getLength(buffer: BufferState): number {
  return buffer.length;
}

export function getLineCount(buffer: BufferState): number {
  return buffer.lineCount;
}

/**
 * Text in [start, end).
 */
export function ropeSlice(buffer: BufferState, start: CharOffset, end: CharOffset): string {
  assertRange(buffer, start, end);
  const parts: string[] = [];

  function collect(node: RopeNode | null, offset: number): void {
    if (node === null) return;
    const chunkStart = offset + (node.left?.subtreeLength ?? 0);
    const chunkEnd = chunkStart + node.length;
    if (start < chunkStart) collect(node.left, offset);
    if (start < chunkEnd && end > chunkStart) {
      parts.push(sliceCodePoints(
        node.text,
        Math.max(start, chunkStart) - chunkStart,
        Math.min(end, chunkEnd) - chunkStart,
        node.length
      ));
    }
    if (end > chunkEnd) collect(node.right, chunkEnd);
  }

  collect(buffer.root, 0);
  return parts.join('');
}

/**
 * The code point at `offset`, or the empty string at the end of the document.
 */
export function charAt(buffer: BufferState, offset: CharOffset): string {
  assertOffset(buffer, offset);
  if (offset === buffer.length) return '';
  return ropeSlice(buffer, offset, charOffset(offset + 1));
}

export function* iterateChunks(buffer: BufferState): Generator<string> {
  for (const node of walkInOrder(buffer.root)) {
    yield node.text;
  }
}

export function getValue(buffer: BufferState): string {
  return Array.from(iterateChunks(buffer)).join('');
}

/**
 * Whitespace-delimited word count of the whole document.
 */
export function getWordCount(buffer: BufferState): number {
  return countWords(iterateChunks(buffer));
}

// =============================================================================
// Lines
// =============================================================================

/**
 * Offset just after the k-th newline (k >= 1).
 */
function offsetAfterNewline(root: RopeNode, k: number): number {
  let node: RopeNode | null = root;
  let base = 0;
  let remaining = k;

  while (node !== null) {
    const leftNewlines: number = node.left?.subtreeNewlines ?? 0;
    if (remaining <= leftNewlines) {
      node = node.left;
      continue;
    }
    remaining -= leftNewlines;
    const chunkStart: number = base + (node.left?.subtreeLength ?? 0);
    if (remaining <= node.newlines) {
      return chunkStart + nthNewline(node.text, remaining) + 1;
    }
    remaining -= node.newlines;
    base = chunkStart + node.length;
    node = node.right;
  }

  throw new EditorError('invalid_position', `Newline ${k} does not exist`);
}

/**
 * Number of newlines in [0, offset).
 */
function newlinesBefore(root: RopeNode | null, offset: number): number {
  let node = root;
  let base = 0;
  let count = 0;

  while (node !== null) {
    const chunkStart = base + (node.left?.subtreeLength ?? 0);
    if (offset < chunkStart) {
      node = node.left;
      continue;
    }
    count += node.left?.subtreeNewlines ?? 0;
    if (offset <= chunkStart + node.length) {
      return count + countNewlines(sliceCodePoints(node.text, 0, offset - chunkStart, node.length));
    }
    count += node.newlines;
    base = chunkStart + node.length;
    node = node.right;
  }

  return count;
}

export interface LineRange {
  readonly start: CharOffset;
  /** Exclusive, before the line's newline */
  readonly end: CharOffset;
}

export function getLineRange(buffer: BufferState, line: number): LineRange {
  assertLine(buffer, line);
  const root = buffer.root;
  if (root === null) {
    return { start: charOffset(0), end: charOffset(0) };
  }
  const start = line === 0 ? 0 : offsetAfterNewline(root, line);
  const end = line + 1 < buffer.lineCount ? offsetAfterNewline(root, line + 1) - 1 : buffer.length;
  return { start: charOffset(start), end: charOffset(end) };
}

export function getLineLength(buffer: BufferState, line: number): number {
  const { start, end } = getLineRange(buffer, line);
  return end - start;
}

/**
 * Line content without its newline.
 */
export function getLineText(buffer: BufferState, line: number): string {
  const { start, end } = getLineRange(buffer, line);
  return ropeSlice(buffer, start, end);
}

export interface LineColumn {
  readonly line: LineNumber;
  readonly column: ColumnNumber;
}

export function offsetToLineCol(buffer: BufferState, offset: CharOffset): LineColumn {
  assertOffset(buffer, offset);
  const line = newlinesBefore(buffer.root, offset);
  const { start } = getLineRange(buffer, line);
  return { line: lineNumber(line), column: columnNumber(offset - start) };
}

/**
 * Offset of a line and column. The column may equal the line length
 * (end of line) but not exceed it.
 */
export function lineColToOffset(buffer: BufferState, line: number, column: number): CharOffset {
  const { start, end } = getLineRange(buffer, line);
  if (!isValidOffset(column) || column > end - start) {
    throw new EditorError(
      'invalid_position',
      `Column ${column} is outside line ${line} [0, ${end - start}]`
    );
  }
  return charOffset(start + column);
}

// =============================================================================
// Diagnostics
// =============================================================================

/**
 * Check the Red-Black and aggregate invariants. Returns the black height,
 * or throws describing the first violation.
 */
export function verifyRope(buffer: BufferState): number {
  if (isRed(buffer.root)) {
    throw new Error('Root must be black');
  }

  function check(node: RopeNode | null): number {
    if (node === null) return 1;
    if (node.length === 0) throw new Error('Empty chunk in tree');
    if (isRed(node) && (isRed(node.left) || isRed(node.right))) {
      throw new Error('Red node with red child');
    }
    const expectedLength = node.length + (node.left?.subtreeLength ?? 0) + (node.right?.subtreeLength ?? 0);
    if (node.subtreeLength !== expectedLength) {
      throw new Error('Stale subtreeLength');
    }
    const leftHeight = check(node.left);
    const rightHeight = check(node.right);
    if (leftHeight !== rightHeight) {
      throw new Error('Unequal black height');
    }
    return leftHeight + (node.color === 'black' ? 1 : 0);
  }

  return check(buffer.root);
}
