import { PermanentRemoteError, TransientRemoteError, errorMessage } from '../errors.js';
import { exponentialBackoffMs, formatDuration, parseRetryAfter } from '../utils/time.js';
import { sleep as defaultSleep, type Sleeper } from '../utils/sleep.js';
import type { CacheClient } from '../cache/cache.js';
import type { FetchEvent, FetchResult } from '../types/index.js';

export interface PosterClientOptions {
  apiKey: string;
  cache: CacheClient;
  apiBaseUrl?: string;
  imageBaseUrl?: string;
  maxRetries?: number;
  backoffCapSeconds?: number;
  retryDelayMs?: number;
  requestTimeoutMs?: number;
  fetchImpl?: typeof fetch;
  sleep?: Sleeper;
  clock?: () => number;
  logger?: (message: string) => void;
  onEvent?: (event: FetchEvent) => void;
}

export const DEFAULT_API_BASE_URL = 'https://api.themoviedb.org/3/movie';
export const DEFAULT_IMAGE_BASE_URL = 'https://image.tmdb.org/t/p';
const POSTER_SIZE = 'w500';

const REQUEST_HEADERS = {
  Accept: 'application/json',
  'Accept-Language': 'en-US,en;q=0.9',
  'User-Agent': 'similar-items-cli/0.1.0',
};

/**
 * Resolves one item's poster URL. Cached answers (including "no poster")
 * are returned without a request. Lookups that still fail after the retry
 * budget are cached as "no poster" too, so a failing id is not retried on
 * every run; `ResourceCache.delete` or the no-poster TTL clears them.
 */
export class PosterClient {
  private readonly apiKey: string;
  private readonly cache: CacheClient;
  private readonly apiBaseUrl: string;
  private readonly imageBaseUrl: string;
  private readonly maxRetries: number;
  private readonly backoffCapSeconds: number;
  private readonly retryDelayMs: number;
  private readonly requestTimeoutMs: number;
  private readonly fetchImpl: typeof fetch;
  private readonly sleep: Sleeper;
  private readonly clock: () => number;
  private readonly logger: ((message: string) => void) | undefined;
  private readonly onEvent: ((event: FetchEvent) => void) | undefined;

  constructor(options: PosterClientOptions) {
    this.apiKey = options.apiKey;
    this.cache = options.cache;
    this.apiBaseUrl = trimTrailingSlash(options.apiBaseUrl ?? DEFAULT_API_BASE_URL);
    this.imageBaseUrl = trimTrailingSlash(options.imageBaseUrl ?? DEFAULT_IMAGE_BASE_URL);
    this.maxRetries = Math.max(1, options.maxRetries ?? 3);
    this.backoffCapSeconds = options.backoffCapSeconds ?? 10;
    this.retryDelayMs = options.retryDelayMs ?? 1000;
    this.requestTimeoutMs = options.requestTimeoutMs ?? 10_000;
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
    this.sleep = options.sleep ?? defaultSleep;
    this.clock = options.clock ?? Date.now;
    this.logger = options.logger;
    this.onEvent = options.onEvent;
  }

  async fetch(itemId: number, signal?: AbortSignal): Promise<FetchResult> {
    const key = String(itemId);
    const cached = this.cache.get(key);
    if (cached.found) {
      this.emit({ type: 'cache-hit', itemId, url: cached.value }, `Cache hit for ${itemId}`);
      return { itemId, url: cached.value, outcome: 'hit' };
    }

    let attempts = 0;
    let reason = 'no attempt made';
    while (attempts < this.maxRetries) {
      if (signal?.aborted) {
        return this.abandon(itemId, attempts);
      }

      attempts += 1;
      this.emit({ type: 'attempt', itemId, attempt: attempts }, `Looking up poster for ${itemId} (attempt ${attempts}/${this.maxRetries})`);

      try {
        const url = await this.lookup(itemId, signal);
        await this.cache.put(key, url);
        this.emit({ type: 'resolved', itemId, url }, url ? `Resolved poster for ${itemId}` : `No poster exists for ${itemId}`);
        return { itemId, url, outcome: 'fetched' };
      } catch (error) {
        if (signal?.aborted) {
          return this.abandon(itemId, attempts);
        }
        reason = errorMessage(error);
        if (!(error instanceof TransientRemoteError) || attempts >= this.maxRetries) {
          break;
        }

        const waitMs = this.retryDelay(error, attempts - 1);
        this.emit(
          { type: 'retry', itemId, attempt: attempts, waitMs, reason },
          `${reason} for ${itemId}. Waiting ${formatDuration(waitMs)} before retry #${attempts}.`,
        );
        try {
          await this.sleep(waitMs, signal);
        } catch (sleepError) {
          if (signal?.aborted) {
            return this.abandon(itemId, attempts);
          }
          throw sleepError;
        }
      }
    }

    await this.cache.put(key, null);
    this.emit(
      { type: 'failed', itemId, attempts, reason, cached: true },
      `Giving up on ${itemId} after ${attempts} attempt(s): ${reason}`,
    );
    return { itemId, url: null, outcome: 'failed-permanent', reason };
  }

  private async lookup(itemId: number, signal: AbortSignal | undefined): Promise<string | null> {
    const query = new URLSearchParams({ api_key: this.apiKey, language: 'en-US' });
    const url = `${this.apiBaseUrl}/${itemId}?${query.toString()}`;
    const timeout = AbortSignal.timeout(this.requestTimeoutMs);
    const requestSignal = signal ? AbortSignal.any([signal, timeout]) : timeout;

    let response: Response;
    try {
      response = await this.fetchImpl(url, { headers: REQUEST_HEADERS, signal: requestSignal });
    } catch (error) {
      if (signal?.aborted) {
        throw error;
      }
      throw new TransientRemoteError(
        timeout.aborted
          ? `Request timed out after ${formatDuration(this.requestTimeoutMs)}`
          : `Network error: ${errorMessage(error)}`,
      );
    }

    if (response.status === 429) {
      const retryAfterMs = parseRetryAfter(response.headers.get('retry-after'), this.clock());
      throw new TransientRemoteError('Rate limited (429)', 429, retryAfterMs);
    }

    if (!response.ok) {
      const message = `Lookup failed with status ${response.status}`;
      if (response.status >= 500 || response.status === 408) {
        throw new TransientRemoteError(message, response.status);
      }
      throw new PermanentRemoteError(message, response.status);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      if (signal?.aborted) {
        throw error;
      }
      throw new PermanentRemoteError(`Malformed response body: ${errorMessage(error)}`, response.status);
    }

    const posterPath: unknown = body && typeof body === 'object' ? Reflect.get(body, 'poster_path') : undefined;
    if (typeof posterPath === 'string' && posterPath.trim().length > 0) {
      return `${this.imageBaseUrl}/${POSTER_SIZE}${posterPath}`;
    }
    return null;
  }

  private retryDelay(error: TransientRemoteError, attemptIndex: number): number {
    if (error.status === 429) {
      return error.retryAfterMs ?? exponentialBackoffMs(attemptIndex, this.backoffCapSeconds);
    }
    return this.retryDelayMs;
  }

  private abandon(itemId: number, attempts: number): FetchResult {
    const reason = 'aborted';
    this.emit({ type: 'failed', itemId, attempts, reason, cached: false }, `Abandoned lookup for ${itemId}`);
    return { itemId, url: null, outcome: 'failed-permanent', reason };
  }

  private emit(event: FetchEvent, message: string) {
    this.onEvent?.(event);
    this.logger?.(message);
  }
}

function trimTrailingSlash(value: string): string {
  return value.replace(/\/+$/, '');
}
