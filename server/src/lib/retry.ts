const TRANSIENT_STATUSES = new Set([408, 425, 429, 500, 502, 503, 504]);
const TRANSIENT_ERROR_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'ETIMEDOUT',
  'ECONNABORTED',
  'EAI_AGAIN',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
]);
const TRANSIENT_PATTERNS = [
  'rate limit',
  'too many requests',
  'overloaded',
  'temporarily unavailable',
  'socket hang up',
  'fetch failed',
  'network error',
  'service unavailable',
  'bad gateway',
];

export interface RetryOptions {
  maxAttempts?: number;
  baseDelay?: number;
  /** Stops retrying (and aborts the backoff wait) once the caller gives up. */
  signal?: AbortSignal;
  onRetry?: (attempt: number, error: Error) => void;
}

function readField(source: unknown, key: string): unknown {
  if (typeof source !== 'object' || source === null) return undefined;
  return Reflect.get(source, key);
}

function readHeader(headers: unknown, name: string): string | null {
  if (headers instanceof Headers) {
    return headers.get(name);
  }
  if (typeof headers !== 'object' || headers === null) return null;
  const key = Object.keys(headers).find((k) => k.toLowerCase() === name.toLowerCase());
  const value = key ? readField(headers, key) : undefined;
  return typeof value === 'string' ? value : null;
}

function getStatusCode(error: unknown): number | null {
  const status = readField(error, 'status') ?? readField(error, 'statusCode');
  if (typeof status === 'number') return status;
  const responseStatus = readField(readField(error, 'response'), 'status');
  return typeof responseStatus === 'number' ? responseStatus : null;
}

function getErrorCode(error: unknown): string | null {
  const code = readField(error, 'code') ?? readField(readField(error, 'cause'), 'code');
  return typeof code === 'string' ? code.toUpperCase() : null;
}

export function isTransient(error: Error, rawError?: unknown): boolean {
  const candidate = rawError ?? error;
  const status = getStatusCode(candidate);
  if (status != null) return TRANSIENT_STATUSES.has(status);

  const code = getErrorCode(candidate);
  if (code && TRANSIENT_ERROR_CODES.has(code)) return true;

  const msg = error.message.toLowerCase();
  return TRANSIENT_PATTERNS.some((p) => msg.includes(p));
}

/** Retry-After in milliseconds, capped at 60s; 0 when absent. */
function getRetryAfterMs(error: unknown): number {
  const topHeaders = readField(error, 'headers');
  const responseHeaders = readField(readField(error, 'response'), 'headers');
  const retryAfter = readHeader(topHeaders, 'retry-after') ?? readHeader(responseHeaders, 'retry-after');
  if (!retryAfter) return 0;

  const seconds = parseFloat(retryAfter);
  if (!isNaN(seconds) && seconds > 0) {
    return Math.min(seconds, 60) * 1000;
  }
  return 0;
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    const timer = setTimeout(done, ms);
    function done() {
      clearTimeout(timer);
      signal?.removeEventListener('abort', done);
      resolve();
    }
    signal?.addEventListener('abort', done, { once: true });
  });
}

export async function withRetry<T>(fn: () => Promise<T>, options?: RetryOptions): Promise<T> {
  const maxAttempts = options?.maxAttempts ?? 3;
  const baseDelay = options?.baseDelay ?? 1000;
  const signal = options?.signal;

  let lastError: Error | undefined;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (err) {
      lastError = err instanceof Error ? err : new Error(String(err));

      if (attempt >= maxAttempts || signal?.aborted || !isTransient(lastError, err)) {
        throw lastError;
      }

      options?.onRetry?.(attempt, lastError);

      // Server-specified Retry-After wins over exponential backoff
      const retryAfterMs = getRetryAfterMs(err);
      const delay = retryAfterMs > 0
        ? retryAfterMs
        : baseDelay * Math.pow(2, attempt - 1) * (0.5 + Math.random());
      await sleep(delay, signal);
      if (signal?.aborted) {
        throw lastError;
      }
    }
  }

  throw lastError ?? new Error('withRetry called with maxAttempts < 1');
}
