export type RetryOptions = {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
  shouldRetry?: (error: unknown) => boolean;
  signal?: AbortSignal;
};

const defaultRetryOptions: RetryOptions = {
  maxAttempts: 3,
  baseDelayMs: 100,
  maxDelayMs: 5_000,
  backoffMultiplier: 2,
};

export const computeBackoffMs = (
  attempt: number,
  options: Pick<RetryOptions, 'baseDelayMs' | 'maxDelayMs' | 'backoffMultiplier'>,
): number =>
  Math.min(
    options.baseDelayMs * Math.pow(options.backoffMultiplier, Math.max(attempt - 1, 0)),
    options.maxDelayMs,
  );

export const sleep = (ms: number, signal?: AbortSignal): Promise<void> =>
  new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });

export const retry = async <T>(
  fn: (attempt: number) => Promise<T>,
  options: Partial<RetryOptions> = {},
): Promise<T> => {
  const opts = { ...defaultRetryOptions, ...options };
  let lastError: unknown;

  for (let attempt = 1; attempt <= opts.maxAttempts; attempt += 1) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error;

      if (attempt === opts.maxAttempts || opts.signal?.aborted) {
        break;
      }

      if (opts.shouldRetry && !opts.shouldRetry(error)) {
        break;
      }

      const delay = computeBackoffMs(attempt, opts);
      // ±10% jitter
      const jitter = delay * 0.1 * (Math.random() * 2 - 1);
      await sleep(delay + jitter, opts.signal);
    }
  }

  throw lastError;
};
