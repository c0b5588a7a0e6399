import path from 'node:path';
import { InvalidArgumentError } from './errors.js';
import { DEFAULT_ABSENT_TTL_MS, DEFAULT_CACHE_FILE } from './cache/resourceCache.js';
import { DEFAULT_API_BASE_URL, DEFAULT_IMAGE_BASE_URL } from './clients/posterClient.js';
import { DEFAULT_TOP_K } from './similarity/similarityIndex.js';

export interface RawCommonOptions {
  dataDir?: string;
  cacheFile?: string;
  quiet?: boolean;
}

export interface RawRecommendOptions extends RawCommonOptions {
  count?: string;
  concurrency?: string;
  stagger?: string;
  deadline?: string;
  retries?: string;
  absentTtl?: string;
}

export interface CommonContext {
  dataDir: string;
  cacheFile: string;
  quiet: boolean;
}

export interface RecommendContext extends CommonContext {
  count: number;
  concurrency: number;
  staggerMs: number;
  deadlineMs: number;
  maxRetries: number;
  absentTtlMs: number;
  apiBaseUrl: string;
  imageBaseUrl: string;
}

type Env = Record<string, string | undefined>;

export function buildCommonContext(raw: RawCommonOptions, env: Env = process.env): CommonContext {
  return {
    dataDir: path.resolve(raw.dataDir?.trim() || env.RECOMMENDER_DATA_DIR || 'data'),
    cacheFile: path.resolve(raw.cacheFile?.trim() || env.RECOMMENDER_CACHE_FILE || DEFAULT_CACHE_FILE),
    quiet: raw.quiet ?? false,
  };
}

export function buildRecommendContext(raw: RawRecommendOptions, env: Env = process.env): RecommendContext {
  return {
    ...buildCommonContext(raw, env),
    count: parsePositiveInteger(raw.count, DEFAULT_TOP_K, 'count'),
    concurrency: parsePositiveInteger(raw.concurrency, 5, 'concurrency'),
    staggerMs: parseNonNegativeInteger(raw.stagger, 100, 'stagger'),
    deadlineMs: parsePositiveInteger(raw.deadline, 30_000, 'deadline'),
    maxRetries: parsePositiveInteger(raw.retries, 3, 'retries'),
    absentTtlMs: parseAbsentTtl(raw.absentTtl),
    apiBaseUrl: env.TMDB_API_BASE?.trim() || DEFAULT_API_BASE_URL,
    imageBaseUrl: env.TMDB_IMAGE_BASE?.trim() || DEFAULT_IMAGE_BASE_URL,
  };
}

export function requireApiKey(env: Env = process.env): string {
  const apiKey = env.TMDB_API_KEY?.trim();
  if (!apiKey) {
    throw new InvalidArgumentError('TMDB_API_KEY is missing from the environment.');
  }
  return apiKey;
}

/** Hours, or `never` to keep no-poster entries forever. */
export function parseAbsentTtl(value: string | undefined): number {
  if (value === undefined) {
    return DEFAULT_ABSENT_TTL_MS;
  }
  if (value.trim().toLowerCase() === 'never') {
    return Number.POSITIVE_INFINITY;
  }

  const hours = Number(value);
  if (!Number.isFinite(hours) || hours <= 0) {
    throw new InvalidArgumentError('Option --absent-ttl must be a positive number of hours or "never".');
  }
  return hours * 60 * 60 * 1000;
}

export function parsePositiveInteger(value: string | undefined, fallback: number, flagName: string): number {
  if (value === undefined) {
    return fallback;
  }

  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < 1) {
    throw new InvalidArgumentError(`Option --${flagName} must be a positive number.`);
  }
  return Math.floor(parsed);
}

export function parseNonNegativeInteger(value: string | undefined, fallback: number, flagName: string): number {
  if (value === undefined) {
    return fallback;
  }

  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new InvalidArgumentError(`Option --${flagName} must be zero or a positive number.`);
  }
  return Math.floor(parsed);
}

/** Titles are matched exactly, so only surrounding whitespace is dropped. */
export function parseTitle(value: string): string {
  const title = value.trim();
  if (!title) {
    throw new InvalidArgumentError('Title must not be empty.');
  }
  return title;
}

export function parseItemId(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError(`Item id must be an integer, got "${value}".`);
  }
  return parsed;
}
