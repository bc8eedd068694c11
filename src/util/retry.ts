type BackoffOptions = {
  maxAttempts?: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
  factor?: number;
  jitter?: boolean;
  sleep?: (ms: number) => Promise<void>;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  shouldRetry?: (error: unknown, attempt: number) => boolean;
};

/** Retry settings shared by the embedding and chat-completion clients. */
type RetryPolicy = {
  maxAttempts: number;
  initialDelayMs: number;
};

const wait = (ms: number): Promise<void> =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

export const computeDelay = (
  attempt: number,
  { initialDelayMs = 500, maxDelayMs = 30_000, factor = 2, jitter = true }: BackoffOptions = {},
): number => {
  const exponentialDelay = initialDelayMs * factor ** (attempt - 1);
  const cappedDelay = Math.min(exponentialDelay, maxDelayMs);

  return jitter
    ? Math.round(cappedDelay / 2 + Math.random() * (cappedDelay / 2))
    : Math.round(cappedDelay);
};

export const exponentialBackoff = async <T>(
  action: (attempt: number) => Promise<T>,
  options: BackoffOptions = {},
): Promise<T> => {
  const { maxAttempts = 5, sleep = wait, onRetry, shouldRetry } = options;

  let attempt = 0;

  // eslint-disable-next-line no-constant-condition
  while (true) {
    attempt += 1;

    try {
      return await action(attempt);
    } catch (error) {
      if (attempt >= Math.max(1, maxAttempts)) {
        throw error;
      }

      if (typeof shouldRetry === 'function' && !shouldRetry(error, attempt)) {
        throw error;
      }

      const delay = computeDelay(attempt, options);

      if (typeof onRetry === 'function') {
        try {
          onRetry(error, attempt, delay);
        } catch (hookError) {
          console.warn('Retry hook threw an error.', hookError);
        }
      }

      await sleep(delay);
    }
  }
};

export type { BackoffOptions, RetryPolicy };
