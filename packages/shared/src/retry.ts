import type { Logger } from './logger.js';

/** Retry with exponential backoff for calls to the queue store and the speech service. */

export interface RetryOptions {
  maxAttempts?: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
  backoffMultiplier?: number;
  retryOn?: (error: unknown) => boolean;
}

const DEFAULTS: Required<RetryOptions> = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  maxDelayMs: 15_000,
  backoffMultiplier: 2,
  retryOn: isRetryableError,
};

export async function withRetry<T>(
  fn: () => Promise<T>,
  logger: Logger,
  label: string,
  options?: RetryOptions,
): Promise<T> {
  const opts = { ...DEFAULTS, ...options };
  let delay = opts.initialDelayMs;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);

      if (attempt >= opts.maxAttempts || !opts.retryOn(err)) {
        logger.error({ attempt, label, error: message }, 'Giving up');
        throw err;
      }

      logger.warn(
        { attempt, maxAttempts: opts.maxAttempts, label, error: message, nextRetryMs: delay },
        'Retrying after failure',
      );

      await sleep(delay);
      delay = Math.min(delay * opts.backoffMultiplier, opts.maxDelayMs);
    }
  }
}

const RETRYABLE_STATUS = new Set([408, 429, 500, 502, 503, 504]);

/** Transient network and server-side failures; auth and validation errors are not retried. */
export function isRetryableError(err: unknown): boolean {
  if (!(err instanceof Error)) return false;

  // Gaxios (googleapis) errors carry the HTTP status
  const status = 'status' in err ? err.status : undefined;
  if (typeof status === 'number') return RETRYABLE_STATUS.has(status);

  const msg = err.message.toLowerCase();
  if (msg.includes('429') || msg.includes('rate limit') || msg.includes('too many requests')) return true;
  if (msg.includes('500') || msg.includes('502') || msg.includes('503') || msg.includes('504')) return true;
  if (
    msg.includes('econnreset') ||
    msg.includes('etimedout') ||
    msg.includes('eai_again') ||
    msg.includes('socket hang up') ||
    msg.includes('fetch failed')
  ) {
    return true;
  }

  return false;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
