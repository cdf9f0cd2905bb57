import { createCombinedAbortSignal } from '../lib/abort-signal.js';

// ─── Envelopes ───────────────────────────────────────────────────────

export interface HttpErrorEnvelope {
  error: 'HTTPError';
  status_code: number;
  details: string;
}

export interface ExceptionEnvelope {
  error: 'Exception';
  details: string;
}

export type ErrorEnvelope = HttpErrorEnvelope | ExceptionEnvelope;

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface TargetApiClientOptions {
  baseUrl: string;
  timeoutMs: number;
  /** Defaults to the global fetch; tests route requests into an in-process app */
  fetchImpl?: FetchLike;
}

export interface TargetRequest {
  query?: Record<string, string>;
  body?: Record<string, unknown>;
  signal?: AbortSignal;
}

/**
 * Thin HTTP client for the API under test. Every call resolves: non-2xx
 * responses become an HTTPError envelope carrying the raw body text, and any
 * other fault (network, timeout, undecodable body) an Exception envelope.
 */
export class TargetApiClient {
  readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;

  constructor(options: TargetApiClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs;
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  async request(method: 'GET' | 'POST', path: string, options: TargetRequest = {}): Promise<unknown> {
    let url = `${this.baseUrl}${path}`;
    if (options.query) {
      url += `?${new URLSearchParams(options.query).toString()}`;
    }

    const { signal, cleanup } = createCombinedAbortSignal(options.signal, this.timeoutMs);
    try {
      const response = await this.fetchImpl(url, {
        method,
        headers: options.body ? { 'Content-Type': 'application/json' } : undefined,
        body: options.body ? JSON.stringify(options.body) : undefined,
        signal,
      });

      const text = await response.text();
      if (!response.ok) {
        const envelope: HttpErrorEnvelope = { error: 'HTTPError', status_code: response.status, details: text };
        return envelope;
      }
      return JSON.parse(text) as unknown;
    } catch (err) {
      const envelope: ExceptionEnvelope = { error: 'Exception', details: describeFault(err, signal) };
      return envelope;
    } finally {
      cleanup();
    }
  }
}

function describeFault(err: unknown, signal: AbortSignal): string {
  // fetch rejects with a generic AbortError; the signal's reason says why
  if (signal.aborted && signal.reason instanceof Error) {
    return signal.reason.message;
  }
  return err instanceof Error ? err.message : String(err);
}
