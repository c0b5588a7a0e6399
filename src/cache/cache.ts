import type { CachedImage, CacheLookup } from '../types/index.js';

export interface CacheClient {
  get(key: string): CacheLookup;
  put(key: string, value: CachedImage): Promise<void>;
  delete(key: string): boolean;
}

export interface CacheStats {
  entries: number;
  present: number;
  absent: number;
}
