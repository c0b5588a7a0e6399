import { promises as fs } from 'node:fs';
import path from 'node:path';
import { promisify } from 'node:util';
import { gunzip } from 'node:zlib';
import { InvalidArgumentError, MissingInputError, isErrnoException } from '../errors.js';
import type { Catalog, Item, SimilarityMatrix } from '../types/index.js';

const gunzipAsync = promisify(gunzip);

export const CATALOG_FILE = 'movie_list.json';
export const SIMILARITY_FILE = 'similarity.json';

export interface CatalogLoaderOptions {
  dataDir: string;
  catalogFile?: string;
  similarityFile?: string;
  logger?: (message: string) => void;
}

export async function loadCatalog(options: CatalogLoaderOptions): Promise<Catalog> {
  const catalogName = options.catalogFile ?? CATALOG_FILE;
  const similarityName = options.similarityFile ?? SIMILARITY_FILE;

  const [rawItems, rawSimilarity] = await Promise.all([
    readArtifact(options.dataDir, catalogName),
    readArtifact(options.dataDir, similarityName),
  ]);

  const items = parseItems(rawItems.value, rawItems.path);
  const similarity = parseMatrix(rawSimilarity.value, rawSimilarity.path);
  options.logger?.(
    `Loaded ${items.length} items from ${rawItems.path} and a ${similarity.length}x${similarity[0]?.length ?? 0} matrix from ${rawSimilarity.path}`,
  );
  return { items, similarity };
}

/**
 * Reads `<name>.gz` when present, otherwise `<name>`. The compressed form
 * wins when both exist.
 */
export async function readArtifact(dataDir: string, name: string): Promise<{ path: string; value: unknown }> {
  const plainPath = path.join(dataDir, name);
  const gzPath = `${plainPath}.gz`;

  const compressed = await readIfExists(gzPath);
  if (compressed) {
    const inflated = await gunzipAsync(compressed);
    return { path: gzPath, value: JSON.parse(inflated.toString('utf8')) };
  }

  const plain = await readIfExists(plainPath);
  if (plain) {
    return { path: plainPath, value: JSON.parse(plain.toString('utf8')) };
  }

  throw new MissingInputError(`Neither ${plainPath} nor ${gzPath} exists.`, [plainPath, gzPath]);
}

async function readIfExists(filePath: string): Promise<Buffer | null> {
  try {
    return await fs.readFile(filePath);
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return null;
    }
    throw error;
  }
}

function parseItems(value: unknown, source: string): Item[] {
  if (!Array.isArray(value)) {
    throw new InvalidArgumentError(`Catalog ${source} must be a JSON array.`);
  }

  return value.map((entry: unknown, index) => {
    if (!entry || typeof entry !== 'object') {
      throw new InvalidArgumentError(`Catalog entry ${index} in ${source} must be an object.`);
    }
    const id: unknown = Reflect.get(entry, 'id');
    const title: unknown = Reflect.get(entry, 'title');
    if (typeof id !== 'number' || !Number.isInteger(id)) {
      throw new InvalidArgumentError(`Catalog entry ${index} in ${source} has a non-integer id.`);
    }
    if (typeof title !== 'string' || title.length === 0) {
      throw new InvalidArgumentError(`Catalog entry ${index} in ${source} has no title.`);
    }
    return { id, title };
  });
}

function parseMatrix(value: unknown, source: string): SimilarityMatrix {
  if (!Array.isArray(value)) {
    throw new InvalidArgumentError(`Similarity matrix ${source} must be a JSON array of rows.`);
  }

  return value.map((row: unknown, rowIndex) => {
    if (!Array.isArray(row)) {
      throw new InvalidArgumentError(`Similarity row ${rowIndex} in ${source} is not an array.`);
    }
    return row.map((score: unknown, column) => {
      if (typeof score !== 'number' || !Number.isFinite(score)) {
        throw new InvalidArgumentError(`Similarity [${rowIndex}][${column}] in ${source} is not a finite number.`);
      }
      return score;
    });
  });
}
