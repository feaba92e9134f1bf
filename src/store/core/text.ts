/**
 * Code point helpers.
 * JavaScript strings index UTF-16 code units; document offsets count
 * Unicode scalar values. Everything that crosses that boundary goes
 * through here.
 */

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

function isLowSurrogate(code: number): boolean {
  return code >= 0xdc00 && code <= 0xdfff;
}

/**
 * Number of code points in `text`.
 */
export function codePointLength(text: string): number {
  let count = 0;
  for (let i = 0; i < text.length; i++) {
    if (isHighSurrogate(text.charCodeAt(i)) && isLowSurrogate(text.charCodeAt(i + 1))) {
      i++;
    }
    count++;
  }
  return count;
}

/**
 * UTF-16 index of the code point at position `codePoint`.
 * Positions past the end map to `text.length`.
 */
export function unitIndex(text: string, codePoint: number): number {
  let unit = 0;
  for (let cp = 0; cp < codePoint && unit < text.length; cp++) {
    if (isHighSurrogate(text.charCodeAt(unit)) && isLowSurrogate(text.charCodeAt(unit + 1))) {
      unit += 2;
    } else {
      unit += 1;
    }
  }
  return unit;
}

/**
 * Slice by code point positions.
 * `length` is the code point length of `text` when known; it enables the
 * fast path for text without surrogate pairs.
 */
export function sliceCodePoints(
  text: string,
  start: number,
  end: number,
  length: number = codePointLength(text)
): string {
  if (length === text.length) {
    return text.slice(start, end);
  }
  return text.slice(unitIndex(text, start), unitIndex(text, end));
}

export function countNewlines(text: string): number {
  let count = 0;
  let index = text.indexOf('\n');
  while (index !== -1) {
    count++;
    index = text.indexOf('\n', index + 1);
  }
  return count;
}

/**
 * Code point position of the k-th (1-based) newline, or -1.
 */
export function nthNewline(text: string, k: number): number {
  let seen = 0;
  let cp = 0;
  for (let i = 0; i < text.length; i++) {
    const code = text.charCodeAt(i);
    if (code === 10) {
      seen++;
      if (seen === k) return cp;
    } else if (isHighSurrogate(code) && isLowSurrogate(text.charCodeAt(i + 1))) {
      i++;
    }
    cp++;
  }
  return -1;
}

/**
 * Split text into pieces of at most `capacity` code points, sized evenly
 * and never splitting a surrogate pair.
 */
export function splitIntoChunks(text: string, capacity: number): string[] {
  const total = codePointLength(text);
  if (total === 0) return [];
  const pieces = Math.ceil(total / capacity);
  const size = Math.ceil(total / pieces);

  const chunks: string[] = [];
  let unit = 0;
  while (unit < text.length) {
    const end = unit + unitIndex(text.slice(unit, unit + size * 2), size);
    chunks.push(text.slice(unit, end));
    unit = end;
  }
  return chunks;
}

// =============================================================================
// Character Classes
// =============================================================================

export type CharClass = 'word' | 'punctuation' | 'space';

const WORD_CHAR = /^[\p{L}\p{N}\p{M}_]$/u;
const SPACE_CHAR = /^\s$/u;

export function isWhitespace(ch: string): boolean {
  return SPACE_CHAR.test(ch);
}

/**
 * Classify one code point for word motions.
 */
export function charClass(ch: string): CharClass {
  if (SPACE_CHAR.test(ch)) return 'space';
  if (WORD_CHAR.test(ch)) return 'word';
  return 'punctuation';
}

/**
 * Count whitespace-delimited words across a sequence of text pieces.
 * Words may span piece boundaries.
 */
export function countWords(pieces: Iterable<string>): number {
  let words = 0;
  let inWord = false;
  for (const piece of pieces) {
    for (const ch of piece) {
      if (isWhitespace(ch)) {
        inWord = false;
      } else if (!inWord) {
        inWord = true;
        words++;
      }
    }
  }
  return words;
}

/**
 * Lowercase each code point on its own, keeping the original when the
 * lowercase form is not a single code point. The result has the same
 * code point length as the input, so match positions carry over.
 */
export function foldCase(text: string): string {
  let folded = '';
  for (const ch of text) {
    const lower = ch.toLowerCase();
    folded += codePointLength(lower) === 1 ? lower : ch;
  }
  return folded;
}

/**
 * Normalize CRLF and lone CR line endings to LF.
 */
export function normalizeLineEndings(text: string): string {
  return text.replace(/\r\n?/g, '\n');
}
