/**
 * Deadline helper for outbound calls
 *
 * @module utils/timeout
 */

import { TransientNetworkError } from './errors';

/**
 * Race `operation` against a deadline. The timer is always cleared so no
 * handle outlives the call.
 *
 * @throws TransientNetworkError when the deadline expires first
 */
export async function withTimeout<T>(operation: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new TransientNetworkError(`${label} timed out after ${timeoutMs}ms`));
    }, timeoutMs);
  });

  try {
    return await Promise.race([operation, deadline]);
  } finally {
    clearTimeout(timer);
  }
}
