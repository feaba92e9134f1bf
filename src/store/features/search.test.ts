/**
 * Tests for the search engine.
 */

import { describe, it, expect } from 'vitest';
import type { SearchState } from '../../types/state.ts';
import { charOffset } from '../../types/branded.ts';
import { createBufferState } from '../core/rope.ts';
import { currentMatch, executeSearch, findMatches, selectFrom, stepMatch } from './search.ts';

function search(text: string, query: string): SearchState {
  const result = executeSearch(createBufferState(text), query);
  if (result === null) throw new Error('expected a search');
  return result;
}

// =============================================================================
// Matching Tests
// =============================================================================

describe('findMatches', () => {
  it('should match case-insensitively', () => {
    expect(findMatches('The cat, the mat', 'the')).toEqual([
      { start: 0, end: 3 },
      { start: 9, end: 12 },
    ]);
  });

  it('should not report overlapping matches', () => {
    expect(findMatches('aaaa', 'aa')).toEqual([
      { start: 0, end: 2 },
      { start: 2, end: 4 },
    ]);
  });

  it('should report positions in code points', () => {
    expect(findMatches('😀 ab 😀 AB', 'ab')).toEqual([
      { start: 2, end: 4 },
      { start: 7, end: 9 },
    ]);
  });

  it('should find nothing for an empty query', () => {
    expect(findMatches('anything', '')).toEqual([]);
  });
});

describe('executeSearch', () => {
  it('should return null for an empty query', () => {
    expect(executeSearch(createBufferState('text'), '')).toBeNull();
  });

  it('should start with no current match', () => {
    const state = search('The cat, the mat', 'the');
    expect(state.matches).toHaveLength(2);
    expect(state.current).toBe(-1);
    expect(currentMatch(state)).toBeNull();
  });
});

// =============================================================================
// Selection Tests
// =============================================================================

describe('selectFrom', () => {
  const state = search('The cat, the mat', 'the');

  it('should select the first match at or after the offset', () => {
    const selected = selectFrom(state, charOffset(0));
    expect(selected.ok && selected.value.current).toBe(0);
    const later = selectFrom(state, charOffset(4));
    expect(later.ok && later.value.current).toBe(1);
  });

  it('should wrap to the first match', () => {
    const wrapped = selectFrom(state, charOffset(10));
    expect(wrapped.ok && wrapped.value.current).toBe(0);
  });

  it('should fail when nothing matched', () => {
    const result = selectFrom(search('The cat', 'dog'), charOffset(0));
    expect(!result.ok && result.error.message).toBe('No matches for "dog"');
  });
});

describe('stepMatch', () => {
  const state = search('The cat, the mat', 'the');

  it('should select the first or last match when nothing is selected', () => {
    const next = stepMatch(state, 'next');
    expect(next.ok && next.value.current).toBe(0);
    const previous = stepMatch(state, 'previous');
    expect(previous.ok && previous.value.current).toBe(1);
  });

  it('should wrap in both directions', () => {
    const last = { ...state, current: 1 };
    const next = stepMatch(last, 'next');
    expect(next.ok && currentMatch(next.value)).toEqual({ start: 0, end: 3 });

    const first = { ...state, current: 0 };
    const previous = stepMatch(first, 'previous');
    expect(previous.ok && currentMatch(previous.value)).toEqual({ start: 9, end: 12 });
  });

  it('should fail without an active search', () => {
    const result = stepMatch(null, 'next');
    expect(!result.ok && result.error.message).toBe('No active search');
  });
});
