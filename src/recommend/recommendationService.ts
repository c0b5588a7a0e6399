import { InvalidArgumentError, NotFoundError } from '../errors.js';
import { DEFAULT_TOP_K, type SimilarityIndex } from '../similarity/similarityIndex.js';
import type { FetchAllOptions } from '../clients/batchFetcher.js';
import type { FetchResult, Item, Recommendation, RecommendationResult } from '../types/index.js';

export interface PosterBatch {
  fetchAll(itemIds: readonly number[], options?: FetchAllOptions): Promise<Map<number, FetchResult>>;
}

export interface RecommendationServiceOptions {
  count?: number;
  deadlineMs?: number;
  logger?: (message: string) => void;
}

export class RecommendationService {
  private readonly count: number;
  private readonly deadlineMs: number | undefined;
  private readonly logger: ((message: string) => void) | undefined;

  constructor(
    private readonly index: SimilarityIndex,
    private readonly posters: PosterBatch,
    options: RecommendationServiceOptions = {},
  ) {
    this.count = options.count ?? DEFAULT_TOP_K;
    this.deadlineMs = options.deadlineMs;
    this.logger = options.logger;
    const maxK = index.size - 2;
    if (!Number.isInteger(this.count) || this.count < 1 || this.count > maxK) {
      throw new InvalidArgumentError(`Recommendation count must be between 1 and ${maxK}, got ${this.count}.`);
    }
  }

  /**
   * Returns the items most similar to `title` in rank order, each with its
   * poster URL or `null`. An unknown title yields a `no-recommendations`
   * result carrying close title matches instead of an error.
   */
  async recommend(title: string, signal?: AbortSignal): Promise<RecommendationResult> {
    let ranked: Item[];
    try {
      ranked = this.index.topK(title, this.count);
    } catch (error) {
      if (error instanceof NotFoundError) {
        this.logger?.(error.message);
        return {
          kind: 'no-recommendations',
          title,
          reason: error.message,
          suggestions: this.index.suggest(title),
        };
      }
      throw error;
    }

    this.logger?.(`Top ${ranked.length} matches for "${title}": ${ranked.map((item) => item.title).join(', ')}`);

    const fetched = await this.posters.fetchAll(
      ranked.map((item) => item.id),
      {
        ...(this.deadlineMs !== undefined ? { deadlineMs: this.deadlineMs } : {}),
        ...(signal ? { signal } : {}),
      },
    );

    const items = ranked.map(
      (item) =>
        ({
          id: item.id,
          title: item.title,
          imageUrl: fetched.get(item.id)?.url ?? null,
        }) satisfies Recommendation,
    );
    return { kind: 'recommendations', title, items };
  }
}
