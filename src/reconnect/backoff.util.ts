import { ReconnectOptions } from '../config/client-options';

type BackoffOptions = Pick<ReconnectOptions, 'maxRetries' | 'initialDelayMs' | 'maxDelayMs' | 'backoffMultiplier' | 'jitterMs'>;

/**
 * Delay before reconnect attempt number `attempt` (zero-based).
 *
 * Exponential from `initialDelayMs`, capped at `maxDelayMs`, plus a uniform
 * jitter in `[0, jitterMs)`.
 *
 * @returns `null` once `attempt` reaches `maxRetries` (give up).
 */
export function computeBackoffDelay(
  attempt: number,
  options: BackoffOptions,
  random: () => number = Math.random,
): number | null {
  if (attempt >= options.maxRetries) return null;
  const base = Math.min(options.initialDelayMs * options.backoffMultiplier ** attempt, options.maxDelayMs);
  return base + random() * options.jitterMs;
}

/** Sleep for `ms`, resolving early (and clearing the timer) when `signal` aborts. */
export function abortableDelay(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal.addEventListener('abort', onAbort, { once: true });
  });
}
