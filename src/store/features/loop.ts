/**
 * Event loop: alternates between waiting for input and session
 * maintenance until the session asks to quit.
 */

import type { EditorSession } from '../../types/store.ts';
import type { KeyEvent } from '../../types/keys.ts';
import type { Result } from '../../types/errors.ts';

export const DEFAULT_POLL_INTERVAL_MS = 250;

/**
 * Source of decoded key events. `next` resolves with null when nothing
 * arrived within `timeoutMs`.
 */
export interface InputSource {
  next(timeoutMs: number): Promise<KeyEvent | null>;
}

export interface EventLoopOptions {
  readonly pollIntervalMs?: number;
  readonly clock?: () => number;
}

/**
 * Drive `session` until quit is requested, then close it.
 * Resolves with the result of closing. If input or the session throws,
 * the session is still closed before the error propagates.
 */
export async function runEventLoop(
  session: EditorSession,
  input: InputSource,
  options: EventLoopOptions = {}
): Promise<Result<void>> {
  const pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
  const clock = options.clock ?? Date.now;

  try {
    while (!session.getState().quitRequested) {
      const event = await input.next(pollIntervalMs);
      if (event !== null) {
        session.handleKey(event, clock());
      }
      session.tick(clock());
    }
  } catch (error) {
    const closed = session.close(clock());
    if (!closed.ok) {
      throw new AggregateError([error, closed.error], 'Event loop failed and the session did not close');
    }
    throw error;
  }

  return session.close(clock());
}
