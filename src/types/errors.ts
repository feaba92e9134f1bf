/**
 * Error taxonomy for the editing engine.
 *
 * Buffer operations throw `EditorError('invalid_position')` because an
 * out-of-range offset is a defect in the caller. Everything a user can
 * trigger returns a `Result` instead, and the session turns failures into
 * status messages.
 */

export type EditorErrorCode =
  | 'invalid_position'
  | 'nothing_to_undo'
  | 'nothing_to_redo'
  | 'no_matches'
  | 'io_error'
  | 'version_record_corrupt'
  | 'config_invalid';

export class EditorError extends Error {
  constructor(
    public readonly code: EditorErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'EditorError';
  }
}

export type Result<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: EditorError };

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function err<T = never>(error: EditorError): Result<T> {
  return { ok: false, error };
}

/**
 * Wrap a thrown file-system failure into an `io_error`.
 */
export function ioError(action: string, path: string, cause: unknown): EditorError {
  const detail = cause instanceof Error ? cause.message : String(cause);
  return new EditorError('io_error', `Failed to ${action} ${path}: ${detail}`, { cause });
}

export function isEditorError(value: unknown): value is EditorError {
  return value instanceof EditorError;
}

/**
 * Logging surface used across the engine. Defaults to the global console.
 */
export type Logger = Pick<Console, 'warn' | 'error'>;
