/**
 * Search engine.
 * Case-insensitive substring search over the whole document. Matches are
 * non-overlapping, earliest start first. Nothing here moves the cursor;
 * callers relocate it to the selected match's start.
 */

import type { BufferState, SearchMatch, SearchState } from '../../types/state.ts';
import type { CharOffset } from '../../types/branded.ts';
import { charOffset } from '../../types/branded.ts';
import { EditorError, err, ok, type Result } from '../../types/errors.ts';
import { getValue } from '../core/rope.ts';
import { codePointLength, foldCase } from '../core/text.ts';

/**
 * Find every match of `query` in `text`, in code point offsets.
 */
export function findMatches(text: string, query: string): SearchMatch[] {
  if (query.length === 0) return [];
  const haystack = foldCase(text);
  const needle = foldCase(query);
  const needleLength = codePointLength(query);
  const matches: SearchMatch[] = [];

  // Walk forward converting UTF-16 indices to code point offsets as we go.
  let unit = 0;
  let codePoint = 0;
  let index = haystack.indexOf(needle);
  while (index !== -1) {
    codePoint += codePointLength(haystack.slice(unit, index));
    unit = index;
    matches.push(Object.freeze({
      start: charOffset(codePoint),
      end: charOffset(codePoint + needleLength),
    }));
    unit += needle.length;
    codePoint += needleLength;
    index = haystack.indexOf(needle, unit);
  }
  return matches;
}

/**
 * Run `query` against the buffer. An empty query yields null: no search
 * state and no matches. The current index starts at -1.
 */
export function executeSearch(buffer: BufferState, query: string): SearchState | null {
  if (query.length === 0) return null;
  return Object.freeze({
    query,
    matches: Object.freeze(findMatches(getValue(buffer), query)),
    current: -1,
  });
}

/**
 * Select the first match starting at or after `offset`, wrapping to the
 * first match.
 */
export function selectFrom(search: SearchState, offset: CharOffset): Result<SearchState> {
  if (search.matches.length === 0) {
    return err(new EditorError('no_matches', `No matches for "${search.query}"`));
  }
  const index = search.matches.findIndex((match) => match.start >= offset);
  return ok(Object.freeze({ ...search, current: index === -1 ? 0 : index }));
}

/**
 * Move the current match cyclically. From no selection, `next` selects the
 * first match and `previous` the last.
 */
export function stepMatch(
  search: SearchState | null,
  direction: 'next' | 'previous'
): Result<SearchState> {
  if (search === null || search.matches.length === 0) {
    return err(new EditorError('no_matches', search === null ? 'No active search' : `No matches for "${search.query}"`));
  }
  const count = search.matches.length;
  let current: number;
  if (search.current === -1) {
    current = direction === 'next' ? 0 : count - 1;
  } else {
    current = direction === 'next'
      ? (search.current + 1) % count
      : (search.current - 1 + count) % count;
  }
  return ok(Object.freeze({ ...search, current }));
}

export function currentMatch(search: SearchState | null): SearchMatch | null {
  if (search === null || search.current < 0) return null;
  return search.matches[search.current] ?? null;
}
