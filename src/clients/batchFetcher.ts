import pLimit from 'p-limit';
import { InvalidArgumentError, errorMessage } from '../errors.js';
import { sleep as defaultSleep, type Sleeper } from '../utils/sleep.js';
import type { FetchResult } from '../types/index.js';

export interface PosterFetcher {
  fetch(itemId: number, signal?: AbortSignal): Promise<FetchResult>;
}

export interface BatchFetcherOptions {
  concurrency?: number;
  /** Dispatch of the n-th key is delayed by `n * staggerMs`. */
  staggerMs?: number;
  deadlineMs?: number;
  sleep?: Sleeper;
  logger?: (message: string) => void;
}

export interface FetchAllOptions {
  deadlineMs?: number;
  signal?: AbortSignal;
}

export const DEADLINE_REASON = 'deadline exceeded';

export class BatchFetcher {
  private readonly concurrency: number;
  private readonly staggerMs: number;
  private readonly deadlineMs: number;
  private readonly sleep: Sleeper;
  private readonly logger: ((message: string) => void) | undefined;

  constructor(
    private readonly client: PosterFetcher,
    options: BatchFetcherOptions = {},
  ) {
    this.concurrency = options.concurrency ?? 5;
    this.staggerMs = options.staggerMs ?? 100;
    this.deadlineMs = options.deadlineMs ?? 30_000;
    this.sleep = options.sleep ?? defaultSleep;
    this.logger = options.logger;
    if (!Number.isInteger(this.concurrency) || this.concurrency < 1) {
      throw new InvalidArgumentError(`concurrency must be a positive integer, got ${this.concurrency}.`);
    }
    if (this.staggerMs < 0) {
      throw new InvalidArgumentError(`staggerMs must not be negative, got ${this.staggerMs}.`);
    }
  }

  /**
   * Resolves every id through the poster client with at most `concurrency`
   * lookups in flight. The returned map has exactly one result per distinct
   * id. When the deadline passes, outstanding work is aborted, awaited, and
   * reported as failed.
   */
  async fetchAll(itemIds: readonly number[], options: FetchAllOptions = {}): Promise<Map<number, FetchResult>> {
    const deadlineMs = options.deadlineMs ?? this.deadlineMs;
    if (!(deadlineMs > 0)) {
      throw new InvalidArgumentError(`deadlineMs must be positive, got ${deadlineMs}.`);
    }
    for (const id of itemIds) {
      if (!Number.isInteger(id)) {
        throw new InvalidArgumentError(`Item ids must be integers, got ${id}.`);
      }
    }

    const results = new Map<number, FetchResult>();
    const unique = [...new Set(itemIds)];
    if (unique.length === 0) {
      return results;
    }

    const controller = new AbortController();
    const onCallerAbort = () => controller.abort(options.signal?.reason);
    options.signal?.addEventListener('abort', onCallerAbort, { once: true });
    if (options.signal?.aborted) {
      controller.abort(options.signal.reason);
    }
    let deadlineReached = false;
    const deadline = setTimeout(() => {
      deadlineReached = true;
      this.logger?.(`Batch deadline of ${deadlineMs}ms reached with ${unique.length - results.size} lookup(s) outstanding`);
      controller.abort(new Error(DEADLINE_REASON));
    }, deadlineMs);

    const limit = pLimit(this.concurrency);
    const tasks = unique.map(async (itemId, index) => {
      try {
        const result = await this.dispatch(itemId, index, limit, controller.signal);
        if (result) {
          results.set(itemId, result);
        }
      } catch (error) {
        this.logger?.(`Lookup for ${itemId} failed: ${errorMessage(error)}`);
        results.set(itemId, { itemId, url: null, outcome: 'failed-permanent', reason: errorMessage(error) });
      }
    });

    try {
      await Promise.all(tasks);
    } finally {
      clearTimeout(deadline);
      options.signal?.removeEventListener('abort', onCallerAbort);
    }

    const reason = deadlineReached ? DEADLINE_REASON : 'aborted';
    for (const itemId of unique) {
      const result = results.get(itemId);
      if (!result || (deadlineReached && result.reason === 'aborted')) {
        results.set(itemId, { itemId, url: null, outcome: 'failed-permanent', reason });
      }
    }

    this.logger?.(`Resolved ${unique.length} poster lookup(s)${deadlineReached ? ' (deadline reached)' : ''}`);
    return results;
  }

  private async dispatch(
    itemId: number,
    index: number,
    limit: ReturnType<typeof pLimit>,
    signal: AbortSignal,
  ): Promise<FetchResult | undefined> {
    try {
      await this.sleep(index * this.staggerMs, signal);
    } catch (error) {
      if (signal.aborted) {
        return undefined;
      }
      throw error;
    }

    return limit(async () => {
      if (signal.aborted) {
        return undefined;
      }
      return this.client.fetch(itemId, signal);
    });
  }
}
