/**
 * Branded types for type-safe position handling.
 *
 * Branded types keep different kinds of numeric positions apart at compile
 * time. A character offset counts Unicode scalar values from the start of the
 * document, so it must not be mixed up with a line number, a column, or a
 * UTF-16 index into a JavaScript string.
 *
 * Usage:
 * ```typescript
 * const pos = charOffset(5);
 * const line = lineNumber(2);
 *
 * // Type error: can't assign LineNumber to CharOffset
 * const wrong: CharOffset = line;
 * ```
 */

// =============================================================================
// Brand Symbol
// =============================================================================

/**
 * Unique symbol used for branding types.
 * This symbol is never used at runtime - it only exists for the type system.
 */
declare const brand: unique symbol;

interface Brand<B> {
  readonly [brand]: B;
}

type Branded<T, B> = T & Brand<B>;

// =============================================================================
// Position Types
// =============================================================================

/**
 * Offset in the document, counted in Unicode scalar values (code points).
 * Valid offsets lie in [0, length].
 */
export type CharOffset = Branded<number, 'CharOffset'>;

/**
 * Line number (0-indexed).
 */
export type LineNumber = Branded<number, 'LineNumber'>;

/**
 * Column number (0-indexed), counted in code points within a line.
 */
export type ColumnNumber = Branded<number, 'ColumnNumber'>;

// =============================================================================
// Constructor Functions
// =============================================================================

/**
 * Create a CharOffset from a number.
 * Use this for explicit conversions from raw numbers.
 */
export function charOffset(value: number): CharOffset {
  return value as CharOffset;
}

/**
 * Create a LineNumber from a number.
 */
export function lineNumber(value: number): LineNumber {
  return value as LineNumber;
}

/**
 * Create a ColumnNumber from a number.
 */
export function columnNumber(value: number): ColumnNumber {
  return value as ColumnNumber;
}

// =============================================================================
// Validation
// =============================================================================

/**
 * Check whether a value can be used as an offset or index at all
 * (a non-negative integer). Bounds are checked by the buffer.
 */
export function isValidOffset(value: number): boolean {
  return Number.isInteger(value) && value >= 0;
}

// =============================================================================
// Constants
// =============================================================================

export const ZERO_CHAR_OFFSET: CharOffset = 0 as CharOffset;
