export interface Item {
  id: number;
  title: string;
}

/** Row i, column j holds the similarity between catalog items i and j. */
export type SimilarityMatrix = number[][];

export interface Catalog {
  items: Item[];
  similarity: SimilarityMatrix;
}

/** `null` means the lookup ran and no image exists. */
export type CachedImage = string | null;

export type CacheLookup = { found: false } | { found: true; value: CachedImage };

export type FetchOutcome = 'hit' | 'fetched' | 'failed-permanent';

export interface FetchResult {
  itemId: number;
  url: string | null;
  outcome: FetchOutcome;
  reason?: string;
}

export type FetchEvent =
  | { type: 'cache-hit'; itemId: number; url: string | null }
  | { type: 'attempt'; itemId: number; attempt: number }
  | { type: 'retry'; itemId: number; attempt: number; waitMs: number; reason: string }
  | { type: 'resolved'; itemId: number; url: string | null }
  | { type: 'failed'; itemId: number; attempts: number; reason: string; cached: boolean };

export interface Recommendation {
  id: number;
  title: string;
  imageUrl: string | null;
}

export type RecommendationResult =
  | { kind: 'recommendations'; title: string; items: Recommendation[] }
  | { kind: 'no-recommendations'; title: string; reason: string; suggestions: string[] };
