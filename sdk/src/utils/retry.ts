import { DeployerError, toDeployerError } from '../errors/index.js';

export interface RetryOptions {
  attempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
  /** Wall-clock budget for all attempts; no further attempt starts once the next delay would pass it. */
  deadlineMs?: number;
  retryableError?: (error: unknown) => boolean;
  onRetry?: (event: RetryEvent) => void;
}

export interface RetryEvent {
  operationName: string;
  attempt: number;
  delayMs: number;
  error: unknown;
}

export const DEFAULT_RETRY_OPTIONS: RetryOptions = {
  attempts: 3,
  initialDelayMs: 150,
  maxDelayMs: 1_000,
  backoffMultiplier: 2,
  retryableError: () => true,
};

export function backoffDelay(attempt: number, cfg: RetryOptions): number {
  return Math.min(cfg.maxDelayMs, Math.round(cfg.initialDelayMs * cfg.backoffMultiplier ** (attempt - 1)));
}

async function sleep(ms: number): Promise<void> {
  await new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
}

/**
 * Runs `fn` until it succeeds, a non-retryable error is thrown, or the
 * attempt/deadline budget runs out. Non-retryable errors propagate unchanged;
 * exhaustion is reported as `RETRY_EXHAUSTED` with the last error as details.
 */
export async function withRetry<T>(
  operationName: string,
  fn: () => Promise<T>,
  options: Partial<RetryOptions> = {},
): Promise<T> {
  const cfg: RetryOptions = { ...DEFAULT_RETRY_OPTIONS, ...options };
  const startedAt = Date.now();
  let lastError: unknown;
  let attempt = 0;
  while (attempt < cfg.attempts) {
    attempt += 1;
    try {
      return await fn();
    } catch (error) {
      lastError = error;
      const retryable = cfg.retryableError?.(error) ?? false;
      if (!retryable) {
        throw error;
      }
      if (attempt === cfg.attempts) {
        break;
      }
      const delay = backoffDelay(attempt, cfg);
      if (cfg.deadlineMs !== undefined && Date.now() - startedAt + delay > cfg.deadlineMs) {
        break;
      }
      cfg.onRetry?.({ operationName, attempt, delayMs: delay, error });
      await sleep(delay);
    }
  }
  throw new DeployerError(
    'RETRY_EXHAUSTED',
    `Operation '${operationName}' failed after ${attempt} attempts`,
    toDeployerError(lastError, 'CONNECTIVITY_ERROR'),
  );
}
