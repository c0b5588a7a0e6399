import { promises as fs } from 'node:fs';
import path from 'node:path';
import { CacheIOError, errorMessage, isErrnoException } from '../errors.js';
import type { CachedImage, CacheLookup } from '../types/index.js';
import type { CacheClient, CacheStats } from './cache.js';

interface MetadataFile {
  storedAt: string;
  absentSince: Record<string, number>;
}

export interface ResourceCacheOptions {
  filePath?: string;
  /** Flush after this many `put` calls. */
  flushEvery?: number;
  /** Age after which a resolved-absent entry is forgotten. */
  absentTtlMs?: number;
  clock?: () => number;
  logger?: (message: string) => void;
}

export const DEFAULT_CACHE_FILE = path.join('.cache', 'posters.json');
export const DEFAULT_ABSENT_TTL_MS = 24 * 60 * 60 * 1000;

/**
 * Item id to poster URL store persisted as a single JSON object. `null`
 * values record lookups that found no image; the time each was recorded
 * lives in a `.meta.json` sidecar so it can expire.
 */
export class ResourceCache implements CacheClient {
  readonly filePath: string;
  private readonly metaPath: string;
  private readonly flushEvery: number;
  private readonly absentTtlMs: number;
  private readonly clock: () => number;
  private readonly logger: ((message: string) => void) | undefined;

  private readonly entries = new Map<string, CachedImage>();
  private readonly absentSince = new Map<string, number>();
  private unflushedPuts = 0;
  private writeQueue: Promise<unknown> = Promise.resolve();

  constructor(options: ResourceCacheOptions = {}) {
    this.filePath = options.filePath ?? DEFAULT_CACHE_FILE;
    this.metaPath = `${this.filePath.replace(/\.json$/, '')}.meta.json`;
    this.flushEvery = Math.max(1, options.flushEvery ?? 2);
    this.absentTtlMs = options.absentTtlMs ?? DEFAULT_ABSENT_TTL_MS;
    this.clock = options.clock ?? Date.now;
    this.logger = options.logger;
  }

  get size(): number {
    return this.entries.size;
  }

  get(key: string): CacheLookup {
    if (!this.entries.has(key)) {
      return { found: false };
    }

    const value = this.entries.get(key) ?? null;
    if (value === null && this.isExpired(key)) {
      this.entries.delete(key);
      this.absentSince.delete(key);
      this.logger?.(`Forgot expired no-image entry for ${key}`);
      return { found: false };
    }
    return { found: true, value };
  }

  async put(key: string, value: CachedImage): Promise<void> {
    this.entries.set(key, value);
    if (value === null) {
      this.absentSince.set(key, this.clock());
    } else {
      this.absentSince.delete(key);
    }

    this.unflushedPuts += 1;
    if (this.unflushedPuts >= this.flushEvery) {
      await this.flush();
    }
  }

  delete(key: string): boolean {
    this.absentSince.delete(key);
    return this.entries.delete(key);
  }

  stats(): CacheStats {
    let present = 0;
    for (const value of this.entries.values()) {
      if (value !== null) {
        present += 1;
      }
    }
    return { entries: this.entries.size, present, absent: this.entries.size - present };
  }

  /**
   * Replaces the in-memory state with the backing file. A missing file is an
   * empty cache; an unreadable or corrupt one is logged and also treated as
   * empty.
   */
  async load(): Promise<number> {
    this.entries.clear();
    this.absentSince.clear();
    this.unflushedPuts = 0;

    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf8');
    } catch (error) {
      if (!(isErrnoException(error) && error.code === 'ENOENT')) {
        this.report(new CacheIOError(`Could not read ${this.filePath}: ${errorMessage(error)}`, { cause: error }));
      }
      return 0;
    }

    let parsed: Record<string, CachedImage>;
    try {
      parsed = parseSnapshot(JSON.parse(raw));
    } catch (error) {
      this.report(new CacheIOError(`Ignoring corrupt cache file ${this.filePath}: ${errorMessage(error)}`, { cause: error }));
      return 0;
    }

    const recorded = await this.readMetadata();
    const loadedAt = this.clock();
    for (const [key, value] of Object.entries(parsed)) {
      this.entries.set(key, value);
      if (value === null) {
        this.absentSince.set(key, recorded[key] ?? loadedAt);
      }
    }

    this.logger?.(`Loaded ${this.entries.size} cached poster entries from ${this.filePath}`);
    return this.entries.size;
  }

  /**
   * Writes the current snapshot. Calls are queued so only one write touches
   * the file at a time. Resolves to `false` when the write failed; the
   * in-memory entries are kept either way.
   */
  flush(): Promise<boolean> {
    const run = this.writeQueue.then(() => this.writeSnapshot());
    this.writeQueue = run;
    return run;
  }

  /** Empties the store and removes the backing files. */
  clear(): Promise<boolean> {
    this.entries.clear();
    this.absentSince.clear();
    this.unflushedPuts = 0;

    const run = this.writeQueue.then(async () => {
      try {
        await Promise.all([fs.rm(this.filePath, { force: true }), fs.rm(this.metaPath, { force: true })]);
        return true;
      } catch (error) {
        this.report(new CacheIOError(`Could not remove ${this.filePath}: ${errorMessage(error)}`, { cause: error }));
        return false;
      }
    });
    this.writeQueue = run;
    return run;
  }

  private async writeSnapshot(): Promise<boolean> {
    this.unflushedPuts = 0;
    const snapshot = Object.fromEntries(this.entries);
    const metadata: MetadataFile = {
      storedAt: new Date(this.clock()).toISOString(),
      absentSince: Object.fromEntries(this.absentSince),
    };

    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await Promise.all([
        writeAtomically(this.filePath, JSON.stringify(snapshot, null, 2)),
        writeAtomically(this.metaPath, JSON.stringify(metadata, null, 2)),
      ]);
      return true;
    } catch (error) {
      this.report(new CacheIOError(`Could not write ${this.filePath}: ${errorMessage(error)}`, { cause: error }));
      return false;
    }
  }

  private async readMetadata(): Promise<Record<string, number>> {
    try {
      const meta: unknown = JSON.parse(await fs.readFile(this.metaPath, 'utf8'));
      const absentSince: unknown = meta && typeof meta === 'object' ? Reflect.get(meta, 'absentSince') : undefined;
      if (!absentSince || typeof absentSince !== 'object') {
        return {};
      }
      const recorded: Record<string, number> = {};
      for (const [key, value] of Object.entries(absentSince)) {
        if (typeof value === 'number' && Number.isFinite(value)) {
          recorded[key] = value;
        }
      }
      return recorded;
    } catch (error) {
      if (!(isErrnoException(error) && error.code === 'ENOENT')) {
        this.logger?.(`Ignoring unreadable cache metadata ${this.metaPath}: ${errorMessage(error)}`);
      }
      return {};
    }
  }

  private isExpired(key: string): boolean {
    if (!Number.isFinite(this.absentTtlMs)) {
      return false;
    }
    const since = this.absentSince.get(key);
    return since !== undefined && this.clock() - since >= this.absentTtlMs;
  }

  private report(error: CacheIOError) {
    this.logger?.(`${error.name}: ${error.message}`);
  }
}

function parseSnapshot(value: unknown): Record<string, CachedImage> {
  if (!value || typeof value !== 'object' || Array.isArray(value)) {
    throw new TypeError('cache file must contain a JSON object');
  }

  const snapshot: Record<string, CachedImage> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (entry !== null && typeof entry !== 'string') {
      throw new TypeError(`value for ${key} must be a string or null`);
    }
    snapshot[key] = entry;
  }
  return snapshot;
}

async function writeAtomically(filePath: string, body: string): Promise<void> {
  const tempPath = `${filePath}.${process.pid}.tmp`;
  await fs.writeFile(tempPath, body, 'utf8');
  await fs.rename(tempPath, filePath);
}
