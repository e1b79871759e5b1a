/**
 * JSON over HTTP with per-attempt timeout and retry with jittered backoff
 */

import { config } from './config';
import { HttpError, errorMessage } from './errors';
import { Logger } from './logger';

const logger = new Logger('http');

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface HttpOptions {
  headers?: Record<string, string>;
  timeoutMs?: number;
  retries?: number;
  baseDelayMs?: number;
  fetchImpl?: FetchLike;
  sleep?: (ms: number) => Promise<void>;
}

export const defaultSleep = (ms: number): Promise<void> =>
  new Promise(resolve => setTimeout(resolve, ms));

function isRetryableStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

function parseRetryAfter(value: string | null): number | null {
  if (!value) return null;
  const seconds = Number(value);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds * 1000 : null;
}

async function attempt(url: string, options: Required<HttpOptions>): Promise<unknown> {
  let response: Response;
  try {
    response = await options.fetchImpl(url, {
      headers: { Accept: 'application/json', ...options.headers },
      signal: AbortSignal.timeout(options.timeoutMs),
    });
  } catch (error) {
    // network failure or timeout
    throw new HttpError(`Request failed: ${errorMessage(error)}`, 0, true);
  }

  if (!response.ok) {
    throw new HttpError(
      `API request failed: ${response.status} ${response.statusText}`,
      response.status,
      isRetryableStatus(response.status),
      parseRetryAfter(response.headers.get('Retry-After'))
    );
  }

  try {
    return await response.json();
  } catch (error) {
    throw new HttpError(`Invalid JSON body: ${errorMessage(error)}`, response.status, false);
  }
}

/**
 * GET a JSON document. Retries 429, 5xx, timeouts and network failures;
 * other statuses throw immediately.
 */
export async function fetchJson(url: string, options: HttpOptions = {}): Promise<unknown> {
  const resolved: Required<HttpOptions> = {
    headers: options.headers ?? {},
    timeoutMs: options.timeoutMs ?? config.httpTimeoutMs,
    retries: options.retries ?? config.httpRetries,
    baseDelayMs: options.baseDelayMs ?? 500,
    fetchImpl: options.fetchImpl ?? fetch,
    sleep: options.sleep ?? defaultSleep,
  };

  let backoff = resolved.baseDelayMs;
  for (let tries = 0; ; tries++) {
    try {
      return await attempt(url, resolved);
    } catch (error) {
      if (!(error instanceof HttpError) || !error.retryable || tries >= resolved.retries) {
        throw error;
      }
      const wait = error.retryAfterMs ?? backoff + Math.random() * backoff * 0.25;
      logger.warn(`Retrying ${redact(url)} in ${Math.round(wait)}ms (${error.message})`);
      await resolved.sleep(wait);
      backoff *= 2;
    }
  }
}

/** Strip credentials from a URL before logging it */
export function redact(url: string): string {
  try {
    const parsed = new URL(url);
    for (const key of ['apiKey', 'api_key', 'key']) {
      if (parsed.searchParams.has(key)) parsed.searchParams.set(key, '***');
    }
    return parsed.toString();
  } catch {
    return url;
  }
}
