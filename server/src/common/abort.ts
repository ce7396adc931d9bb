/**
 * Atrium Roomserver - Abort Checkpoint
 *
 * Fails a perform operation whose caller has given up on it.
 */

import { describeError, PerformError } from './errors/perform-error';

export function ensureNotAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw PerformError.internal(`Peek aborted: ${describeError(signal.reason)}`);
  }
}
