import fetch, { FetchError, RequestInit, Response } from 'node-fetch';
import { Settings } from '../config';
import { RemoteRejectedError, TransportError } from '../utils/errors';
import { loggers } from '../utils/logger';

export type QueryValue = string | number | boolean | undefined;
export type QueryParams = Record<string, QueryValue>;

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

/**
 * Outbound access to the remote modeling service. Paths are relative to the
 * configured base URL; bodies are JSON; non-success statuses reject with
 * RemoteRejectedError.
 */
export interface Transport {
  get(path: string, query?: QueryParams): Promise<unknown>;
  post(path: string, body: unknown): Promise<unknown>;
  put(path: string, body: unknown): Promise<unknown>;
  delete(path: string): Promise<void>;
}

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  minDelayMs: number;
  maxDelayMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 500,
  minDelayMs: 500,
  maxDelayMs: 4000,
};

export type FetchFunction = (url: string, init?: RequestInit) => Promise<Response>;

/**
 * Delay before the attempt that follows `attempt` (1-based)
 */
export function backoffDelay(attempt: number, policy: RetryPolicy = DEFAULT_RETRY_POLICY): number {
  const exponential = policy.baseDelayMs * 2 ** (attempt - 1);
  return Math.min(policy.maxDelayMs, Math.max(policy.minDelayMs, exponential));
}

const TRANSIENT_FETCH_ERRORS = new Set(['system', 'request-timeout', 'body-timeout']);

/**
 * Connection errors and request or body read timeouts are transient; HTTP statuses never are.
 */
export function isTransientError(error: unknown): boolean {
  return error instanceof FetchError && TRANSIENT_FETCH_ERRORS.has(error.type);
}

export function buildQueryString(query: QueryParams = {}): string {
  const params = new URLSearchParams();
  for (const [key, value] of Object.entries(query)) {
    if (value !== undefined) {
      params.append(key, String(value));
    }
  }
  const encoded = params.toString();
  return encoded ? `?${encoded}` : '';
}

export class HttpTransport implements Transport {
  private readonly logger = loggers.transport();
  private readonly retryPolicy: RetryPolicy;

  constructor(
    private readonly settings: Settings,
    private readonly fetchImpl: FetchFunction = fetch,
    private readonly sleep: (ms: number) => Promise<void> = (ms) =>
      new Promise((resolve) => setTimeout(resolve, ms)),
  ) {
    this.retryPolicy = { ...DEFAULT_RETRY_POLICY, maxAttempts: settings.maxAttempts };
  }

  async get(path: string, query?: QueryParams): Promise<unknown> {
    return this.request('GET', path + buildQueryString(query));
  }

  async post(path: string, body: unknown): Promise<unknown> {
    return this.request('POST', path, body);
  }

  async put(path: string, body: unknown): Promise<unknown> {
    return this.request('PUT', path, body);
  }

  async delete(path: string): Promise<void> {
    await this.request('DELETE', path);
  }

  private headers(hasBody: boolean): Record<string, string> {
    const headers: Record<string, string> = { Accept: 'application/json' };
    if (hasBody) {
      headers['Content-Type'] = 'application/json';
    }
    if (this.settings.apiToken) {
      headers.Authorization = `Bearer ${this.settings.apiToken}`;
    }
    return headers;
  }

  private async request(method: HttpMethod, path: string, body?: unknown): Promise<unknown> {
    const url = `${this.settings.baseUrl}${path}`;
    const init: RequestInit = {
      method,
      headers: this.headers(body !== undefined),
      body: body === undefined ? undefined : JSON.stringify(body),
      timeout: this.settings.requestTimeoutMs,
    };

    const { maxAttempts } = this.retryPolicy;
    let lastError: unknown;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      try {
        this.logger.debug({ method, path, attempt, body }, `${method} ${path}`);
        const response = await this.fetchImpl(url, init);
        return await this.readResponse(method, path, response);
      } catch (error) {
        if (!isTransientError(error)) {
          throw error;
        }
        lastError = error;
        this.logger.warn({ method, path, attempt, error: String(error) }, 'Transient transport failure');

        if (attempt < maxAttempts) {
          const delay = backoffDelay(attempt, this.retryPolicy);
          this.logger.debug({ delay }, 'Waiting before retry');
          await this.sleep(delay);
        }
      }
    }

    throw new TransportError(
      `${method} ${path} failed after ${maxAttempts} attempts: ${String(lastError)}`,
      maxAttempts,
      { cause: lastError },
    );
  }

  private async readResponse(method: HttpMethod, path: string, response: Response): Promise<unknown> {
    const text = await response.text();
    if (!response.ok) {
      throw new RemoteRejectedError(method, path, response.status, text);
    }
    if (!text) {
      return undefined;
    }
    try {
      return JSON.parse(text);
    } catch {
      // Non-JSON success bodies (plain confirmations) are returned verbatim.
      return text;
    }
  }
}
