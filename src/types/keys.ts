/**
 * Logical key events, as produced by the (external) input decoder.
 */

export type NamedKey =
  | 'Escape'
  | 'Enter'
  | 'Backspace'
  | 'Delete'
  | 'Tab'
  | 'ArrowLeft'
  | 'ArrowRight'
  | 'ArrowUp'
  | 'ArrowDown'
  | 'Home'
  | 'End'
  | 'PageUp'
  | 'PageDown';

/**
 * `key` is either a NamedKey or a single printable character.
 * Modifier flags default to false.
 */
export interface KeyEvent {
  readonly key: string;
  readonly ctrl?: boolean;
  readonly alt?: boolean;
  readonly shift?: boolean;
}

const NAMED_KEYS: ReadonlySet<string> = new Set<NamedKey>([
  'Escape',
  'Enter',
  'Backspace',
  'Delete',
  'Tab',
  'ArrowLeft',
  'ArrowRight',
  'ArrowUp',
  'ArrowDown',
  'Home',
  'End',
  'PageUp',
  'PageDown',
]);

export function isNamedKey(key: string): key is NamedKey {
  return NAMED_KEYS.has(key);
}

/**
 * A single code point that is not a control character.
 */
export function isPrintable(key: string): boolean {
  if (isNamedKey(key)) return false;
  const codePoints = Array.from(key);
  if (codePoints.length !== 1) return false;
  return !/\p{Cc}/u.test(key);
}

/**
 * Plain character typed without ctrl or alt.
 */
export function isTypedChar(event: KeyEvent): boolean {
  return !event.ctrl && !event.alt && isPrintable(event.key);
}

/**
 * Build a key event. Handy in tests and input decoders.
 */
export function key(name: string, modifiers: Omit<KeyEvent, 'key'> = {}): KeyEvent {
  return Object.freeze({ key: name, ...modifiers });
}

export function ctrl(name: string): KeyEvent {
  return key(name, { ctrl: true });
}
