// Retry utility with exponential backoff and jitter, used by adapters that talk to remote stores

export interface RetryOptions {
  maxRetries: number;
  baseDelay: number;      // milliseconds
  maxDelay: number;       // milliseconds
  jitterFactor: number;   // 0-1 (e.g., 0.1 = 10% jitter)
}

export class RetryExhaustedError extends Error {
  constructor(
    message: string,
    public readonly attempts: number,
    public readonly lastError: Error
  ) {
    super(message);
    this.name = 'RetryExhaustedError';
  }
}

export function calculateDelay(attempt: number, options: RetryOptions): number {
  const exponentialDelay = options.baseDelay * Math.pow(2, attempt);
  const cappedDelay = Math.min(exponentialDelay, options.maxDelay);

  // Add jitter: randomize ±jitterFactor
  const jitterRange = cappedDelay * options.jitterFactor;
  const jitter = (Math.random() - 0.5) * 2 * jitterRange;

  return Math.max(0, cappedDelay + jitter);
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

export async function retryWithBackoff<T>(
  operation: () => Promise<T>,
  options: RetryOptions,
  isRetryable: (error: Error) => boolean,
  label = 'operation'
): Promise<T> {
  const attempts = options.maxRetries + 1;
  let lastError = new Error(`${label} was not attempted`);

  for (let attempt = 0; attempt < attempts; attempt++) {
    try {
      return await operation();
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      if (!isRetryable(lastError)) {
        throw lastError;
      }

      // No delay after the last attempt
      if (attempt < attempts - 1) {
        const delay = calculateDelay(attempt, options);
        console.warn(`[Retry] ${label} failed (attempt ${attempt + 1}/${attempts}): ${lastError.message}; retrying in ${Math.round(delay)}ms`);
        await sleep(delay);
      }
    }
  }

  throw new RetryExhaustedError(
    `${label} failed after ${attempts} attempts: ${lastError.message}`,
    attempts,
    lastError
  );
}

// Common retry predicates
export function isNetworkError(error: Error): boolean {
  const message = error.message.toLowerCase();
  return (
    message.includes('timeout') ||
    message.includes('econnrefused') ||
    message.includes('econnreset') ||
    message.includes('enotfound') ||
    message.includes('network')
  );
}

export function isHttpRetryable(statusCode?: number): boolean {
  if (!statusCode) return false;
  return (
    statusCode === 429 ||  // Too Many Requests
    statusCode >= 500      // Server errors
  );
}
