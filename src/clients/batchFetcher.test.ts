import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { BatchFetcher, DEADLINE_REASON, type PosterFetcher } from './batchFetcher.js';
import { PosterClient } from './posterClient.js';
import { InvalidArgumentError } from '../errors.js';
import { sleep } from '../utils/sleep.js';
import { MemoryCache, jsonReply, recordingSleep, scriptedFetch } from '../testing/fakes.js';
import type { FetchResult } from '../types/index.js';

function fetched(itemId: number): FetchResult {
  return { itemId, url: `https://image.test/${itemId}.jpg`, outcome: 'fetched' };
}

class RecordingFetcher implements PosterFetcher {
  readonly calls: number[] = [];
  inFlight = 0;
  maxInFlight = 0;

  constructor(private readonly handler: (itemId: number, signal?: AbortSignal) => Promise<FetchResult>) {}

  async fetch(itemId: number, signal?: AbortSignal): Promise<FetchResult> {
    this.calls.push(itemId);
    this.inFlight += 1;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      return await this.handler(itemId, signal);
    } finally {
      this.inFlight -= 1;
    }
  }
}

describe('BatchFetcher', () => {
  it('returns an empty map for no ids without doing any work', async () => {
    const client = new RecordingFetcher(async (itemId) => fetched(itemId));
    const results = await new BatchFetcher(client, { staggerMs: 0 }).fetchAll([]);
    assert.equal(results.size, 0);
    assert.deepEqual(client.calls, []);
  });

  it('returns exactly one result per distinct id', async () => {
    const client = new RecordingFetcher(async (itemId) => {
      await sleep(itemId === 1 ? 15 : 1);
      return fetched(itemId);
    });

    const results = await new BatchFetcher(client, { staggerMs: 0 }).fetchAll([1, 2, 2, 3]);
    assert.deepEqual([...results.keys()].sort(), [1, 2, 3]);
    assert.deepEqual(results.get(1), fetched(1));
    assert.deepEqual(client.calls.sort(), [1, 2, 3]);
  });

  it('keeps at most `concurrency` lookups in flight', async () => {
    const client = new RecordingFetcher(async (itemId) => {
      await sleep(5);
      return fetched(itemId);
    });

    const results = await new BatchFetcher(client, { concurrency: 2, staggerMs: 0 }).fetchAll([1, 2, 3, 4, 5, 6]);
    assert.equal(results.size, 6);
    assert.equal(client.maxInFlight, 2);
  });

  it('staggers dispatch by index', async () => {
    const client = new RecordingFetcher(async (itemId) => fetched(itemId));
    const { sleep: recordSleep, waits } = recordingSleep();

    await new BatchFetcher(client, { staggerMs: 150, sleep: recordSleep }).fetchAll([10, 20, 30]);
    assert.deepEqual(waits, [0, 150, 300]);
  });

  it('isolates a failing lookup from its siblings', async () => {
    const client = new RecordingFetcher(async (itemId) => {
      if (itemId === 2) {
        return { itemId, url: null, outcome: 'failed-permanent', reason: 'Lookup failed with status 500' };
      }
      if (itemId === 3) {
        throw new Error('boom');
      }
      return fetched(itemId);
    });

    const results = await new BatchFetcher(client, { staggerMs: 0 }).fetchAll([1, 2, 3, 4]);
    assert.deepEqual(results.get(1), fetched(1));
    assert.deepEqual(results.get(2), {
      itemId: 2,
      url: null,
      outcome: 'failed-permanent',
      reason: 'Lookup failed with status 500',
    });
    assert.deepEqual(results.get(3), { itemId: 3, url: null, outcome: 'failed-permanent', reason: 'boom' });
    assert.deepEqual(results.get(4), fetched(4));
  });

  it('reports unresolved ids as failed once the deadline passes', async () => {
    const client = new RecordingFetcher(async (itemId, signal) => {
      if (itemId === 1) {
        return fetched(itemId);
      }
      await new Promise<void>((resolve) => signal?.addEventListener('abort', () => resolve(), { once: true }));
      return { itemId, url: null, outcome: 'failed-permanent', reason: 'aborted' };
    });

    const results = await new BatchFetcher(client, { concurrency: 1, staggerMs: 0, deadlineMs: 20 }).fetchAll([1, 2, 3]);
    assert.deepEqual(results.get(1), fetched(1));
    assert.deepEqual(results.get(2), { itemId: 2, url: null, outcome: 'failed-permanent', reason: DEADLINE_REASON });
    assert.deepEqual(results.get(3), { itemId: 3, url: null, outcome: 'failed-permanent', reason: DEADLINE_REASON });
    assert.deepEqual(client.calls, [1, 2]);
    assert.equal(client.inFlight, 0);
  });

  it('reports outstanding ids as aborted when the caller cancels', async () => {
    const client = new RecordingFetcher(async (itemId, signal) => {
      await new Promise<void>((resolve) => signal?.addEventListener('abort', () => resolve(), { once: true }));
      return { itemId, url: null, outcome: 'failed-permanent', reason: 'aborted' };
    });
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 10);

    const results = await new BatchFetcher(client, { concurrency: 1, staggerMs: 0 }).fetchAll([1, 2], {
      signal: controller.signal,
    });
    assert.deepEqual(results.get(1), { itemId: 1, url: null, outcome: 'failed-permanent', reason: 'aborted' });
    assert.deepEqual(results.get(2), { itemId: 2, url: null, outcome: 'failed-permanent', reason: 'aborted' });
    assert.deepEqual(client.calls, [1]);
    assert.equal(client.inFlight, 0);
  });

  it('mixes cache hits and network lookups in one batch', async () => {
    const cache = new MemoryCache();
    cache.entries.set('1', 'https://image.test/t/p/w500/cached.jpg');
    cache.entries.set('2', null);
    const network = scriptedFetch([jsonReply({ poster_path: '/fresh.jpg' })]);
    const client = new PosterClient({
      apiKey: 'test-key',
      cache,
      imageBaseUrl: 'https://image.test/t/p',
      fetchImpl: network.impl,
    });

    const results = await new BatchFetcher(client, { staggerMs: 0 }).fetchAll([1, 2, 3]);
    assert.deepEqual(results.get(1), { itemId: 1, url: 'https://image.test/t/p/w500/cached.jpg', outcome: 'hit' });
    assert.deepEqual(results.get(2), { itemId: 2, url: null, outcome: 'hit' });
    assert.deepEqual(results.get(3), { itemId: 3, url: 'https://image.test/t/p/w500/fresh.jpg', outcome: 'fetched' });
    assert.equal(network.calls.length, 1);
  });

  it('rejects structurally invalid calls', async () => {
    const batch = new BatchFetcher(new RecordingFetcher(async (itemId) => fetched(itemId)), { staggerMs: 0 });
    await assert.rejects(batch.fetchAll([1.5]), InvalidArgumentError);
    await assert.rejects(batch.fetchAll([1], { deadlineMs: 0 }), InvalidArgumentError);
    assert.throws(() => new BatchFetcher(new RecordingFetcher(async (itemId) => fetched(itemId)), { concurrency: 0 }), InvalidArgumentError);
  });
});
