export interface RetryOptions {
  retries: number;
  baseDelayMs: number;
  factor: number;
  maxDelayMs?: number;
  jitterMs?: number;
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (info: { attempt: number; delayMs: number; error: unknown }) => void;
  sleep?: (ms: number) => Promise<void>;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
}

export function computeBackoffDelay(
  attempt: number,
  options: Pick<RetryOptions, "baseDelayMs" | "factor" | "maxDelayMs" | "jitterMs">,
  random: () => number = Math.random,
): number {
  const exponential = options.baseDelayMs * Math.pow(options.factor, attempt);
  const capped =
    options.maxDelayMs === undefined
      ? exponential
      : Math.min(exponential, options.maxDelayMs);
  const jitter = options.jitterMs ? random() * options.jitterMs : 0;
  return capped + jitter;
}

export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  const wait = options.sleep ?? sleep;
  let attempt = 0;
  let lastError: unknown;

  while (attempt <= options.retries) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error;
      if (attempt === options.retries) {
        break;
      }
      if (options.shouldRetry && !options.shouldRetry(error)) {
        break;
      }

      const delay = computeBackoffDelay(attempt, options);
      options.onRetry?.({ attempt: attempt + 1, delayMs: delay, error });
      await wait(delay);
      attempt += 1;
    }
  }

  throw lastError;
}
