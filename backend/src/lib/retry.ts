import logger from './logger';

export interface RetryOptions {
  /** Maximum number of retry attempts (default: 3) */
  maxRetries?: number;
  /** Initial delay in milliseconds (default: 500) */
  initialDelayMs?: number;
  /** Maximum delay in milliseconds (default: 5000) */
  maxDelayMs?: number;
  /** Exponential backoff factor (default: 2) */
  backoffFactor?: number;
  /** Decides whether an error is worth another attempt (default: isTransientError) */
  isRetryable?: (error: unknown) => boolean;
  /** Operation name for logging */
  operationName?: string;
}

const DEFAULT_OPTIONS: Required<Omit<RetryOptions, 'isRetryable' | 'operationName'>> = {
  maxRetries: 3,
  initialDelayMs: 500,
  maxDelayMs: 5000,
  backoffFactor: 2,
};

const NETWORK_ERROR_CODES = ['ECONNRESET', 'ETIMEDOUT', 'ECONNREFUSED', 'ENOTFOUND', 'EAI_AGAIN'];

const NETWORK_ERROR_MESSAGES = ['socket hang up', 'network error', 'fetch failed', 'ECONNRESET', 'ETIMEDOUT'];

interface ErrorShape {
  name?: unknown;
  statusCode?: unknown;
  status?: unknown;
  response?: { statusCode?: unknown; status?: unknown };
  code?: unknown;
  message?: unknown;
  cause?: unknown;
}

function asErrorShape(error: unknown): ErrorShape | undefined {
  return error !== null && typeof error === 'object' ? error : undefined;
}

/**
 * HTTP status carried by an error from the Kubernetes client, a fetch
 * wrapper or a plain `{ statusCode }` object
 */
export function getErrorStatusCode(error: unknown): number | undefined {
  const err = asErrorShape(error);
  if (!err) {
    return undefined;
  }
  const candidates = [err.statusCode, err.status, err.response?.statusCode, err.response?.status];
  return candidates.find((value): value is number => typeof value === 'number');
}

/**
 * Whether an error from the Kubernetes API or an HTTP metrics backend is
 * likely to go away on its own: 5xx, 429, timeouts and network failures.
 */
export function isTransientError(error: unknown): boolean {
  const err = asErrorShape(error);
  if (!err) {
    return false;
  }

  const statusCode = getErrorStatusCode(err);
  if (statusCode !== undefined && (statusCode >= 500 || statusCode === 429)) {
    return true;
  }

  if (err.name === 'AbortError' || err.name === 'TimeoutError') {
    return true;
  }

  if (typeof err.code === 'string' && NETWORK_ERROR_CODES.includes(err.code)) {
    return true;
  }

  const message = err.message;
  if (typeof message === 'string' && NETWORK_ERROR_MESSAGES.some((msg) => message.includes(msg))) {
    return true;
  }

  // undici wraps the socket error in `cause`
  if (err.cause !== undefined && err.cause !== error) {
    return isTransientError(err.cause);
  }

  return false;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Execute an async function with retry logic and exponential backoff
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const {
    maxRetries = DEFAULT_OPTIONS.maxRetries,
    initialDelayMs = DEFAULT_OPTIONS.initialDelayMs,
    maxDelayMs = DEFAULT_OPTIONS.maxDelayMs,
    backoffFactor = DEFAULT_OPTIONS.backoffFactor,
    isRetryable = isTransientError,
    operationName = 'operation',
  } = options;

  let delay = initialDelayMs;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (attempt >= maxRetries || !isRetryable(error)) {
        throw error;
      }

      logger.warn(
        {
          operationName,
          attempt: attempt + 1,
          maxRetries,
          delayMs: Math.round(delay),
          statusCode: getErrorStatusCode(error),
          errorMessage: error instanceof Error ? error.message : String(error),
        },
        `Retrying ${operationName} after transient error (attempt ${attempt + 1}/${maxRetries})`
      );

      await sleep(delay);

      // Exponential backoff with +/-15% jitter
      const jitter = Math.random() * 0.3 + 0.85;
      delay = Math.min(delay * backoffFactor * jitter, maxDelayMs);
    }
  }
}

/**
 * Create a retry wrapper with preset options
 */
export function createRetryWrapper(defaultOptions: RetryOptions) {
  return <T>(fn: () => Promise<T>, overrideOptions?: RetryOptions): Promise<T> => {
    return withRetry(fn, { ...defaultOptions, ...overrideOptions });
  };
}

/**
 * Retry preset for Kubernetes API reads
 */
export const k8sRetry = createRetryWrapper({
  maxRetries: 3,
  initialDelayMs: 500,
  maxDelayMs: 5000,
  backoffFactor: 2,
});
