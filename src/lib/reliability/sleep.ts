import { setTimeout as delay } from 'node:timers/promises';

/**
 * Sleep utility for retry loops; rejects with an AbortError when `signal` fires
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return delay(ms, undefined, { signal });
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}
