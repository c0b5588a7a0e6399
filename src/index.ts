#!/usr/bin/env node
import { Command } from 'commander';
import dotenv from 'dotenv';
import { ResourceCache } from './cache/resourceCache.js';
import { loadCatalog } from './catalog/loader.js';
import { BatchFetcher } from './clients/batchFetcher.js';
import { PosterClient } from './clients/posterClient.js';
import {
  buildCommonContext,
  buildRecommendContext,
  parseItemId,
  parseTitle,
  requireApiKey,
  type RawCommonOptions,
  type RawRecommendOptions,
} from './config.js';
import { errorMessage } from './errors.js';
import { RecommendationService } from './recommend/recommendationService.js';
import { renderRecommendations } from './recommend/render.js';
import { SimilarityIndex } from './similarity/similarityIndex.js';

dotenv.config();

const program = new Command();
program
  .name('similar-items')
  .description('Recommend catalog items similar to a chosen title and resolve their poster images.');

configureCommonOptions(
  program
    .command('recommend')
    .description('Show the items most similar to <title>, each with its poster URL.')
    .argument('<title>', 'Exact catalog title to start from.'),
)
  .option('-k, --count <number>', 'Number of recommendations (default 4).')
  .option('--concurrency <number>', 'Concurrent poster lookups (default 5).')
  .option('--stagger <ms>', 'Delay added per lookup before dispatch in ms (default 100).')
  .option('--deadline <ms>', 'Overall time budget for poster lookups in ms (default 30000).')
  .option('--retries <number>', 'Attempts per poster lookup (default 3).')
  .option('--absent-ttl <hours>', 'Hours to remember that an item has no poster, or "never" (default 24).')
  .action(async (title: string, rawOptions: RawRecommendOptions) => {
    await handleRecommend(title, rawOptions);
  });

configureCommonOptions(
  program
    .command('titles')
    .description('List catalog titles, optionally only those containing [query].')
    .argument('[query]', 'Case-insensitive substring to filter by.'),
).action(async (query: string | undefined, rawOptions: RawCommonOptions) => {
  await handleTitles(query, rawOptions);
});

const cacheCommand = program.command('cache').description('Inspect or reset the poster cache.');

configureCommonOptions(cacheCommand.command('stats').description('Show how many poster entries are cached.')).action(
  async (rawOptions: RawCommonOptions) => {
    const cache = await openCache(rawOptions);
    const stats = cache.stats();
    console.log(`${cache.filePath}: ${stats.entries} entries (${stats.present} with poster, ${stats.absent} without)`);
  },
);

configureCommonOptions(
  cacheCommand
    .command('delete')
    .description('Forget the cached poster for one item so it is looked up again.')
    .argument('<id>', 'Item id.'),
).action(async (id: string, rawOptions: RawCommonOptions) => {
  const itemId = parseItemId(id);
  const cache = await openCache(rawOptions);
  if (!cache.delete(String(itemId))) {
    console.log(`No cached entry for ${itemId}.`);
    return;
  }
  await cache.flush();
  console.log(`Removed cached entry for ${itemId}.`);
});

configureCommonOptions(cacheCommand.command('clear').description('Remove every cached poster entry.')).action(
  async (rawOptions: RawCommonOptions) => {
    const cache = await openCache(rawOptions);
    const removed = cache.size;
    await cache.clear();
    console.log(`Cleared ${removed} cached entries from ${cache.filePath}.`);
  },
);

program.parseAsync().catch((error: unknown) => {
  console.error(errorMessage(error));
  process.exitCode = 1;
});

function configureCommonOptions(command: Command): Command {
  return command
    .option('--data-dir <path>', 'Directory holding movie_list.json and similarity.json (or their .gz forms).')
    .option('--cache-file <path>', 'Poster cache file (default .cache/posters.json).')
    .option('-q, --quiet', 'Only print results.');
}

async function handleRecommend(rawTitle: string, rawOptions: RawRecommendOptions) {
  const context = buildRecommendContext(rawOptions);
  const apiKey = requireApiKey();
  const title = parseTitle(rawTitle);

  const catalog = await loadCatalog({ dataDir: context.dataDir, logger: createLogger('catalog', context.quiet) });
  const index = new SimilarityIndex(catalog);
  const cache = new ResourceCache({
    filePath: context.cacheFile,
    absentTtlMs: context.absentTtlMs,
    logger: createLogger('cache', context.quiet),
  });
  await cache.load();

  const client = new PosterClient({
    apiKey,
    cache,
    apiBaseUrl: context.apiBaseUrl,
    imageBaseUrl: context.imageBaseUrl,
    maxRetries: context.maxRetries,
    logger: createLogger('posters', context.quiet),
  });
  const fetcher = new BatchFetcher(client, {
    concurrency: context.concurrency,
    staggerMs: context.staggerMs,
    deadlineMs: context.deadlineMs,
    logger: createLogger('batch', context.quiet),
  });
  const service = new RecommendationService(index, fetcher, {
    count: context.count,
    logger: createLogger('recommend', context.quiet),
  });

  try {
    const result = await service.recommend(title);
    for (const line of renderRecommendations(result)) {
      console.log(line);
    }
    if (result.kind === 'no-recommendations') {
      process.exitCode = 1;
    }
  } finally {
    await cache.flush();
  }
}

async function handleTitles(query: string | undefined, rawOptions: RawCommonOptions) {
  const context = buildCommonContext(rawOptions);
  const catalog = await loadCatalog({ dataDir: context.dataDir, logger: createLogger('catalog', context.quiet) });
  const index = new SimilarityIndex(catalog);
  const titles = query ? index.suggest(query, index.size) : index.titles();
  for (const title of titles) {
    console.log(title);
  }
}

async function openCache(rawOptions: RawCommonOptions): Promise<ResourceCache> {
  const context = buildCommonContext(rawOptions);
  const cache = new ResourceCache({ filePath: context.cacheFile, logger: createLogger('cache', context.quiet) });
  await cache.load();
  return cache;
}

function createLogger(scope: string, quiet: boolean) {
  if (quiet) {
    return undefined;
  }
  return (message: string) => console.log(`[${scope}] ${message}`);
}
