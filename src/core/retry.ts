/**
 * Retry Runner
 *
 * Exponential backoff with jitter for provider calls. Only errors the
 * caller classifies as retryable are retried.
 */

/**
 * Retry configuration options
 */
export type RetryConfig = {
  /** Total attempts including the first */
  attempts?: number;
  minDelayMs?: number;
  maxDelayMs?: number;
  /** Fraction of the delay to randomize, 0..1 */
  jitter?: number;
};

/**
 * Retry attempt information
 */
export type RetryInfo = {
  attempt: number;
  maxAttempts: number;
  delayMs: number;
  err: unknown;
  label?: string;
};

/**
 * Retry options
 */
export type RetryOptions = RetryConfig & {
  label?: string;
  shouldRetry?: (err: unknown, attempt: number) => boolean;
  onRetry?: (info: RetryInfo) => void;
};

export const RETRY_DEFAULTS: Required<RetryConfig> = {
  attempts: 3,
  minDelayMs: 500,
  maxDelayMs: 30_000,
  jitter: 0.2,
};

const sleep = (ms: number) => new Promise((r) => setTimeout(r, ms));

export function resolveRetryConfig(
  defaults: Required<RetryConfig>,
  overrides?: RetryConfig
): Required<RetryConfig> {
  const attempts = Math.max(1, Math.round(overrides?.attempts ?? defaults.attempts));
  const minDelayMs = Math.max(0, Math.round(overrides?.minDelayMs ?? defaults.minDelayMs));
  const maxDelayMs = Math.max(minDelayMs, Math.round(overrides?.maxDelayMs ?? defaults.maxDelayMs));
  const jitter = Math.min(1, Math.max(0, overrides?.jitter ?? defaults.jitter));
  return { attempts, minDelayMs, maxDelayMs, jitter };
}

function applyJitter(delayMs: number, jitter: number): number {
  if (jitter <= 0) return delayMs;
  const offset = (Math.random() * 2 - 1) * jitter;
  return Math.max(0, Math.round(delayMs * (1 + offset)));
}

/**
 * Delay before the retry following `attempt` (1-based).
 */
export function backoffDelay(attempt: number, config: Required<RetryConfig>): number {
  let delay = Math.min(config.minDelayMs * 2 ** (attempt - 1), config.maxDelayMs);
  delay = applyJitter(delay, config.jitter);
  return Math.min(Math.max(delay, config.minDelayMs), config.maxDelayMs);
}

/**
 * Run `fn` until it succeeds, attempts run out, or `shouldRetry` says no.
 * `fn` receives the 1-based attempt number.
 *
 * @throws The last error raised by `fn`
 */
export async function retryAsync<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const resolved = resolveRetryConfig(RETRY_DEFAULTS, options);
  const maxAttempts = resolved.attempts;
  const shouldRetry = options.shouldRetry ?? (() => true);
  let lastErr: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
    try {
      return await fn(attempt);
    } catch (err) {
      lastErr = err;
      if (attempt >= maxAttempts || !shouldRetry(err, attempt)) break;

      const delay = backoffDelay(attempt, resolved);
      options.onRetry?.({
        attempt,
        maxAttempts,
        delayMs: delay,
        err,
        label: options.label,
      });
      await sleep(delay);
    }
  }

  throw lastErr ?? new Error('Retry failed');
}
