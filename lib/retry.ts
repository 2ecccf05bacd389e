import { setTimeout as sleep } from 'node:timers/promises';
import { errorMessage } from './errors';

export interface RetryOptions {
  attempts: number;
  delayMs: number;
  /** Errors for which this returns false are rethrown immediately. */
  retryIf?: (error: unknown) => boolean;
  label?: string;
}

/** Runs `operation` up to `attempts` times with linear backoff between tries. */
export async function withRetry<T>(operation: () => Promise<T>, options: RetryOptions): Promise<T> {
  const { attempts, delayMs, retryIf = () => true, label = 'operation' } = options;
  for (let attempt = 1; ; attempt++) {
    try {
      return await operation();
    } catch (error) {
      if (attempt >= attempts || !retryIf(error)) {
        throw error;
      }
      console.warn(`[RETRY] ${label} failed (attempt ${attempt} of ${attempts}): ${errorMessage(error)}`);
      if (delayMs > 0) {
        await sleep(delayMs * attempt);
      }
    }
  }
}
