/**
 * Line-level diff between two versions of a document.
 *
 * Common leading and trailing lines are trimmed first; the differing middle
 * goes through an LCS table when small and through Myers' O(ND) search
 * when the table would be too large. Output is a list of tagged line runs
 * for display; nothing applies it.
 *
 * Reference: "An O(ND) Difference Algorithm and Its Variations" by Eugene W. Myers
 */

import type { LineOp, LineOpType } from '../types/state.ts';

export type { LineOp, LineOpType };

export interface LineDiffSummary {
  readonly inserted: number;
  readonly deleted: number;
  readonly unchanged: number;
}

/** Largest LCS table (cells) built before switching to Myers */
const TABLE_LIMIT = 1_000_000;

interface LineEdit {
  type: LineOpType;
  line: string;
}

// =============================================================================
// Entry Points
// =============================================================================

export function splitLines(content: string): string[] {
  return content.split('\n');
}

/**
 * Minimal edit script turning `before` into `after`, as runs of lines.
 */
export function diffLines(before: string, after: string): LineOp[] {
  if (before === after) {
    return before.length === 0 ? [] : [{ type: 'equal', lines: splitLines(before) }];
  }
  const oldLines = before.length === 0 ? [] : splitLines(before);
  const newLines = after.length === 0 ? [] : splitLines(after);
  return consolidate(diffSequences(oldLines, newLines));
}

export function summarize(ops: readonly LineOp[]): LineDiffSummary {
  let inserted = 0;
  let deleted = 0;
  let unchanged = 0;
  for (const op of ops) {
    if (op.type === 'insert') inserted += op.lines.length;
    else if (op.type === 'delete') deleted += op.lines.length;
    else unchanged += op.lines.length;
  }
  return { inserted, deleted, unchanged };
}

// =============================================================================
// Core
// =============================================================================

function diffSequences(oldLines: readonly string[], newLines: readonly string[]): LineEdit[] {
  let prefix = 0;
  while (prefix < oldLines.length && prefix < newLines.length && oldLines[prefix] === newLines[prefix]) {
    prefix++;
  }

  let suffix = 0;
  while (
    suffix < oldLines.length - prefix &&
    suffix < newLines.length - prefix &&
    oldLines[oldLines.length - 1 - suffix] === newLines[newLines.length - 1 - suffix]
  ) {
    suffix++;
  }

  const oldMiddle = oldLines.slice(prefix, oldLines.length - suffix);
  const newMiddle = newLines.slice(prefix, newLines.length - suffix);

  const edits: LineEdit[] = [];
  for (const line of oldLines.slice(0, prefix)) edits.push({ type: 'equal', line });

  if (oldMiddle.length === 0) {
    for (const line of newMiddle) edits.push({ type: 'insert', line });
  } else if (newMiddle.length === 0) {
    for (const line of oldMiddle) edits.push({ type: 'delete', line });
  } else if (oldMiddle.length * newMiddle.length <= TABLE_LIMIT) {
    edits.push(...tableDiff(oldMiddle, newMiddle));
  } else {
    edits.push(...myersDiff(oldMiddle, newMiddle));
  }

  for (const line of oldLines.slice(oldLines.length - suffix)) edits.push({ type: 'equal', line });
  return edits;
}

/**
 * LCS dynamic programming over a flat table. Deletions are emitted before
 * insertions within a changed run.
 */
function tableDiff(oldLines: readonly string[], newLines: readonly string[]): LineEdit[] {
  const n = oldLines.length;
  const m = newLines.length;
  const cols = m + 1;
  // dp[i * cols + j] = LCS length of oldLines[i..] and newLines[j..]
  const dp = new Int32Array((n + 1) * cols);

  for (let i = n - 1; i >= 0; i--) {
    for (let j = m - 1; j >= 0; j--) {
      dp[i * cols + j] = oldLines[i] === newLines[j]
        ? dp[(i + 1) * cols + (j + 1)] + 1
        : Math.max(dp[(i + 1) * cols + j], dp[i * cols + (j + 1)]);
    }
  }

  const edits: LineEdit[] = [];
  let i = 0;
  let j = 0;
  while (i < n || j < m) {
    if (i < n && j < m && oldLines[i] === newLines[j]) {
      edits.push({ type: 'equal', line: oldLines[i] });
      i++;
      j++;
    } else if (i < n && (j === m || dp[(i + 1) * cols + j] >= dp[i * cols + (j + 1)])) {
      edits.push({ type: 'delete', line: oldLines[i] });
      i++;
    } else {
      edits.push({ type: 'insert', line: newLines[j] });
      j++;
    }
  }
  return edits;
}

/**
 * Myers' greedy forward search with a saved trace for backtracking.
 */
function myersDiff(oldLines: readonly string[], newLines: readonly string[]): LineEdit[] {
  const n = oldLines.length;
  const m = newLines.length;
  const max = n + m;
  const v = new Int32Array(2 * max + 2);
  const trace: Int32Array[] = [];

  for (let d = 0; d <= max; d++) {
    trace.push(v.slice());
    for (let k = -d; k <= d; k += 2) {
      const index = k + max;
      let x = k === -d || (k !== d && v[index - 1] < v[index + 1])
        ? v[index + 1]
        : v[index - 1] + 1;
      let y = x - k;
      while (x < n && y < m && oldLines[x] === newLines[y]) {
        x++;
        y++;
      }
      v[index] = x;
      if (x >= n && y >= m) {
        return backtrack(trace, oldLines, newLines, d, max);
      }
    }
  }

  return tableDiff(oldLines, newLines);
}

function backtrack(
  trace: Int32Array[],
  oldLines: readonly string[],
  newLines: readonly string[],
  d: number,
  max: number
): LineEdit[] {
  const edits: LineEdit[] = [];
  let x = oldLines.length;
  let y = newLines.length;

  for (let step = d; step > 0; step--) {
    const previous = trace[step];
    const k = x - y;
    const prevK = k === -step || (k !== step && previous[k - 1 + max] < previous[k + 1 + max])
      ? k + 1
      : k - 1;
    const prevX = previous[prevK + max];
    const prevY = prevX - prevK;

    while (x > prevX && y > prevY) {
      edits.push({ type: 'equal', line: oldLines[x - 1] });
      x--;
      y--;
    }
    if (x === prevX) {
      edits.push({ type: 'insert', line: newLines[y - 1] });
      y--;
    } else {
      edits.push({ type: 'delete', line: oldLines[x - 1] });
      x--;
    }
  }

  while (x > 0 && y > 0) {
    edits.push({ type: 'equal', line: oldLines[x - 1] });
    x--;
    y--;
  }

  return edits.reverse();
}

/**
 * Merge consecutive edits of the same type into runs.
 */
function consolidate(edits: readonly LineEdit[]): LineOp[] {
  const ops: { type: LineOpType; lines: string[] }[] = [];
  for (const edit of edits) {
    const last = ops[ops.length - 1];
    if (last !== undefined && last.type === edit.type) {
      last.lines.push(edit.line);
    } else {
      ops.push({ type: edit.type, lines: [edit.line] });
    }
  }
  return ops;
}
